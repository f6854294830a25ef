import { describe, it, expect } from 'vitest';
import { ConfigError } from '../../provisioning/errors.js';
import { displayNameOf, planRollout, toTargetRef } from '../plan.js';
import { target } from './fake-stack-set.js';

describe('planRollout', () => {
  const catalog = [
    target('111111111111', 'alpha'),
    target('222222222222', 'bravo'),
    target('333333333333', 'charlie'),
    target('444444444444', 'delta'),
  ];

  describe('create', () => {
    it('should keep unprovisioned targets in catalog order', () => {
      const plan = planRollout({
        targets: catalog,
        provisioned: new Set(['111111111111', '333333333333']),
        action: 'create',
      });

      expect(plan.pending.map(t => t.accountId)).toEqual(['222222222222', '444444444444']);
      expect(plan.next?.accountId).toBe('222222222222');
    });

    it('should pick the first catalog entry whatever order the remote reports', () => {
      for (const provisioned of [new Set<string>(), new Set(['999999999999']), new Set(['444444444444'])]) {
        const plan = planRollout({ targets: catalog, provisioned, action: 'create' });
        expect(plan.next?.accountId).toBe('111111111111');
      }
    });

    it('should report nothing to do when everything is provisioned', () => {
      const plan = planRollout({
        targets: catalog,
        provisioned: new Set(catalog.map(t => t.accountId)),
        action: 'create',
      });

      expect(plan.pending).toEqual([]);
      expect(plan.next).toBeUndefined();
    });

    it('should skip settled accounts', () => {
      const plan = planRollout({
        targets: catalog,
        provisioned: new Set(),
        action: 'create',
        settled: new Set(['111111111111']),
      });

      expect(plan.next?.accountId).toBe('222222222222');
    });
  });

  describe('update', () => {
    it('should keep only provisioned targets', () => {
      const plan = planRollout({
        targets: catalog,
        provisioned: new Set(['333333333333', '222222222222', '999999999999']),
        action: 'update',
      });

      expect(plan.pending.map(t => t.accountId)).toEqual(['222222222222', '333333333333']);
    });

    it('should narrow to the requested account', () => {
      const plan = planRollout({
        targets: catalog,
        provisioned: new Set(['222222222222', '333333333333']),
        action: 'update',
        accountId: '333333333333',
      });

      expect(plan.pending.map(t => t.accountId)).toEqual(['333333333333']);
    });

    it('should have nothing to do when the requested account is not provisioned', () => {
      const plan = planRollout({
        targets: catalog,
        provisioned: new Set(['222222222222']),
        action: 'update',
        accountId: '444444444444',
      });

      expect(plan.next).toBeUndefined();
    });
  });

  it('should reject an account that is not in the catalog', () => {
    expect(() =>
      planRollout({ targets: catalog, provisioned: new Set(), action: 'create', accountId: '555555555555' })
    ).toThrow(ConfigError);
  });
});

describe('display names', () => {
  it('should read the display-name parameter', () => {
    expect(displayNameOf(target('111111111111', 'alpha'), 'AccountName')).toBe('alpha');
    expect(toTargetRef(target('111111111111', 'alpha'), 'AccountName')).toEqual({
      accountId: '111111111111',
      displayName: 'alpha',
    });
  });

  it('should fall back to the account id', () => {
    expect(displayNameOf(target('111111111111', 'alpha'), 'Missing')).toBe('111111111111');
  });
});
