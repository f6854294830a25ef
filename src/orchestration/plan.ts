import { ConfigError } from '../provisioning/errors.js';
import { DeploymentTarget, RolloutAction } from '../types/index.js';
import { TargetRef } from './types.js';

export interface PlanInput {
  targets: readonly DeploymentTarget[];
  provisioned: ReadonlySet<string>;
  action: RolloutAction;
  accountId?: string;
  settled?: ReadonlySet<string>;
}

export interface RolloutPlan {
  /** Pending targets in catalog order */
  pending: DeploymentTarget[];
  next?: DeploymentTarget;
}

/**
 * Diff the catalog against the provisioned accounts. `create` keeps targets
 * that are missing remotely, `update` keeps the ones already provisioned.
 */
export function planRollout(input: PlanInput): RolloutPlan {
  const { targets, provisioned, action, accountId, settled } = input;
  assertInCatalog(targets, accountId);

  const pending = targets.filter(target => {
    if (accountId !== undefined && target.accountId !== accountId) return false;
    if (settled?.has(target.accountId)) return false;
    const isProvisioned = provisioned.has(target.accountId);
    return action === 'create' ? !isProvisioned : isProvisioned;
  });

  return { pending, next: pending[0] };
}

export function assertInCatalog(targets: readonly DeploymentTarget[], accountId?: string): void {
  if (accountId !== undefined && !targets.some(target => target.accountId === accountId)) {
    throw new ConfigError(`Account ${accountId} is not in the target catalog`);
  }
}

export function displayNameOf(target: DeploymentTarget, displayNameParameter: string): string {
  const parameter = target.parameters.find(p => p.ParameterKey === displayNameParameter);
  return parameter?.ParameterValue ?? target.accountId;
}

export function toTargetRef(target: DeploymentTarget, displayNameParameter: string): TargetRef {
  return { accountId: target.accountId, displayName: displayNameOf(target, displayNameParameter) };
}
