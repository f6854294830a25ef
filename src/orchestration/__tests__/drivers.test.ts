import { describe, it, expect, beforeEach } from 'vitest';
import { resolveSettings } from '../../config/settings.js';
import {
  RejectedRequestError,
  ResourceNotFoundError,
  TransientReadError,
  WriteConflictError,
} from '../../provisioning/errors.js';
import { RolloutSettings } from '../../types/index.js';
import { DriverOptions, runContinuous, runSingleStep } from '../drivers.js';
import { FakeStackSet, RecordingReporter, recordingSleeper, target } from './fake-stack-set.js';

const A = target('111111111111', 'alpha');
const B = target('222222222222', 'bravo');
const C = target('333333333333', 'charlie');

const settings: RolloutSettings = resolveSettings({
  pollIntervalMs: 20,
  definitionPollIntervalMs: 15,
  maxPollAttempts: 3,
  conflictBackoffMs: 30,
  writeConflictBackoffMs: 60,
  interStepPauseMs: 10,
  failureBackoffMs: 31,
  maxTargetAttempts: 2,
  maxConsecutiveReadFailures: 2,
});

describe('mode drivers', () => {
  let stackSet: FakeStackSet;
  let reporter: RecordingReporter;
  let clock: ReturnType<typeof recordingSleeper>;

  const options = (overrides: Partial<DriverOptions> = {}): DriverOptions => ({
    gateway: stackSet,
    settings,
    stackSetName: 'demo',
    targets: [A, B, C],
    displayNameParameter: 'AccountName',
    action: 'create',
    reporter,
    sleep: clock.sleep,
    ...overrides,
  });

  beforeEach(() => {
    stackSet = new FakeStackSet();
    reporter = new RecordingReporter();
    clock = recordingSleeper();
  });

  describe('runSingleStep', () => {
    it('should create B only when A is provisioned and leave C for later', async () => {
      stackSet.provisioned.add(A.accountId);

      const result = await runSingleStep(options());

      expect(stackSet.calls.map(call => call.method === 'createInstances' && call.accountId)).toEqual([B.accountId]);
      expect(result.kind).toBe('progressed');
      expect(result.remaining).toEqual([C.accountId]);
      expect(stackSet.provisioned.has(C.accountId)).toBe(false);
    });

    it('should return without mutating while an operation is RUNNING', async () => {
      stackSet.latest = { operationId: 'op-other', status: 'RUNNING' };

      const result = await runSingleStep(options());

      expect(result.kind).toBe('waiting');
      expect(stackSet.calls).toEqual([]);
      expect(clock.delays).toEqual([]);
    });
  });

  describe('runContinuous', () => {
    it('should deploy every missing target one at a time in catalog order', async () => {
      const outcome = await runContinuous(options());

      expect(outcome.status).toBe('completed');
      expect(outcome.succeeded.map(ref => ref.accountId)).toEqual([A.accountId, B.accountId, C.accountId]);
      expect(stackSet.calls).toHaveLength(3);
      expect(outcome.steps).toBe(4);
      expect(clock.delays).toEqual([10, 10, 10]);
    });

    it('should make no mutating calls when re-run after completion', async () => {
      await runContinuous(options());
      const callsAfterFirstRun = stackSet.calls.length;

      const outcome = await runContinuous(options());

      expect(stackSet.calls).toHaveLength(callsAfterFirstRun);
      expect(outcome).toEqual({ status: 'completed', steps: 1, succeeded: [], givenUp: [] });
    });

    it('should back off and re-plan after a write conflict', async () => {
      stackSet.writeErrors.push(new WriteConflictError('OperationInProgressException'));

      const outcome = await runContinuous(options());

      expect(outcome.status).toBe('completed');
      expect(clock.delays[0]).toBe(60);
      expect(stackSet.calls.map(call => call.method === 'createInstances' && call.accountId)).toEqual([
        A.accountId,
        A.accountId,
        B.accountId,
        C.accountId,
      ]);
    });

    it('should wait out an operation started elsewhere', async () => {
      stackSet.latest = { operationId: 'op-other', status: 'RUNNING' };
      const sleepAndFinish = async (ms: number) => {
        clock.delays.push(ms);
        if (stackSet.latest?.operationId === 'op-other') {
          stackSet.latest = { operationId: 'op-other', status: 'SUCCEEDED' };
        }
      };

      const outcome = await runContinuous(options({ sleep: sleepAndFinish }));

      expect(outcome.status).toBe('completed');
      expect(clock.delays[0]).toBe(30);
      expect(reporter.ofType('blocked')).toHaveLength(1);
    });

    it('should stop fatally when the StackSet is missing', async () => {
      stackSet.listErrors.push(new ResourceNotFoundError('StackSetNotFoundException'));

      const outcome = await runContinuous(options());

      expect(outcome.status).toBe('fatal');
      expect(outcome.error?.kind).toBe('resource-not-found');
      expect(stackSet.calls).toEqual([]);
    });

    it('should retry a failed target and give up after the attempt limit', async () => {
      stackSet.accountScripts.set(B.accountId, ['FAILED']);

      const outcome = await runContinuous(options());

      expect(outcome.status).toBe('completed');
      expect(outcome.givenUp).toEqual([{ accountId: B.accountId, displayName: 'bravo' }]);
      expect(outcome.succeeded.map(ref => ref.accountId)).toEqual([A.accountId, C.accountId]);
      expect(stackSet.calls.map(call => call.method === 'createInstances' && call.accountId)).toEqual([
        A.accountId,
        B.accountId,
        B.accountId,
        C.accountId,
      ]);
      expect(reporter.ofType('target-given-up')).toHaveLength(1);
    });

    it('should keep going after a rejected request', async () => {
      stackSet.writeErrors.push(new RejectedRequestError('ValidationError'));

      const outcome = await runContinuous(options());

      expect(outcome.status).toBe('completed');
      expect(outcome.succeeded).toHaveLength(3);
      expect(clock.delays[0]).toBe(31);
    });

    it('should give up once the instance list stays unreadable', async () => {
      stackSet.statusScript = ['FAILED'];
      for (let i = 0; i < 5; i += 1) {
        stackSet.listErrors.push(new TransientReadError('list failed'));
      }

      const outcome = await runContinuous(options({ settings: { ...settings, maxTargetAttempts: 10 } }));

      expect(outcome.status).toBe('fatal');
      expect(outcome.steps).toBe(3);
      expect(outcome.error?.message).toBe('Stack instances unreadable for 3 consecutive steps');
    });

    it('should update every provisioned target once', async () => {
      [A, B, C].forEach(t => stackSet.provisioned.add(t.accountId));

      const outcome = await runContinuous(options({ action: 'update', pushParameters: true }));

      expect(outcome.status).toBe('completed');
      expect(stackSet.calls).toEqual([A, B, C].map(t => ({
        method: 'updateInstances',
        accountId: t.accountId,
        regions: ['us-east-1'],
        includeParameters: true,
      })));
    });

    it('should stop between steps once cancelled', async () => {
      const controller = new AbortController();
      const abortingSleep = async (ms: number) => {
        clock.delays.push(ms);
        controller.abort();
      };

      const outcome = await runContinuous(options({ sleep: abortingSleep, signal: controller.signal }));

      expect(outcome.status).toBe('cancelled');
      expect(outcome.succeeded.map(ref => ref.accountId)).toEqual([A.accountId]);
      expect(stackSet.calls).toHaveLength(1);
    });

    it('should settle a target whose timed-out update later succeeds', async () => {
      [A, B].forEach(t => stackSet.provisioned.add(t.accountId));
      stackSet.accountScripts.set(A.accountId, ['RUNNING', 'RUNNING', 'RUNNING', 'SUCCEEDED']);

      const outcome = await runContinuous(options({ action: 'update' }));

      expect(outcome.status).toBe('completed');
      expect(stackSet.calls.map(call => call.method === 'updateInstances' && call.accountId)).toEqual([
        A.accountId,
        B.accountId,
      ]);
      expect(outcome.succeeded.map(ref => ref.accountId)).toEqual([A.accountId, B.accountId]);
      expect(clock.delays).toEqual([20, 20, 30, 10]);
    });

    it('should retry the definition sync after a failed read', async () => {
      stackSet.latestErrors.push(new TransientReadError('Rate exceeded'));

      const outcome = await runContinuous(options({
        definition: { templateBody: '{}', capabilities: ['CAPABILITY_NAMED_IAM'] },
        targets: [A],
      }));

      expect(outcome.status).toBe('completed');
      expect(stackSet.calls.map(call => call.method)).toEqual(['updateStackSet', 'createInstances']);
      expect(clock.delays).toEqual([30, 10]);
    });

    it('should keep waiting for a definition update whose status read failed', async () => {
      stackSet.statusScript = ['RUNNING', 'SUCCEEDED'];
      stackSet.describeErrors.push(new TransientReadError('Rate exceeded'));

      const outcome = await runContinuous(options({
        definition: { templateBody: '{}', capabilities: ['CAPABILITY_NAMED_IAM'] },
        targets: [A],
      }));

      expect(outcome.status).toBe('completed');
      expect(stackSet.calls.map(call => call.method)).toEqual(['updateStackSet', 'createInstances']);
      expect(clock.delays).toEqual([30, 15, 20, 10]);
    });

    it('should report cancellation during the definition wait', async () => {
      const controller = new AbortController();
      const abortingSleep = async (ms: number) => {
        clock.delays.push(ms);
        controller.abort();
        throw new Error('The operation was aborted');
      };
      stackSet.statusScript = ['RUNNING'];

      const outcome = await runContinuous(options({
        definition: { templateBody: '{}', capabilities: ['CAPABILITY_NAMED_IAM'] },
        sleep: abortingSleep,
        signal: controller.signal,
      }));

      expect(outcome).toEqual({ status: 'cancelled', steps: 0, succeeded: [], givenUp: [] });
      expect(stackSet.calls).toEqual([{ method: 'updateStackSet' }]);
      expect(clock.delays).toEqual([15]);
    });

    it('should sync the definition before touching instances', async () => {
      const outcome = await runContinuous(options({
        definition: { templateBody: '{}', capabilities: ['CAPABILITY_NAMED_IAM'] },
        targets: [A],
      }));

      expect(outcome.status).toBe('completed');
      expect(stackSet.calls.map(call => call.method)).toEqual(['updateStackSet', 'createInstances']);
    });
  });
});
