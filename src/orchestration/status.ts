import { StackSetError, classifyReadError } from '../provisioning/errors.js';
import { StackSetGateway } from '../provisioning/types.js';
import { DeploymentTarget, OperationSnapshot, RolloutAction } from '../types/index.js';
import { planRollout, toTargetRef } from './plan.js';
import { TargetRef } from './types.js';

export interface RolloutStatus {
  stackSetExists: boolean;
  provisioned: TargetRef[];
  pending: TargetRef[];
  next?: TargetRef;
  latestOperation?: OperationSnapshot;
  /** Set when the latest operation could not be read */
  operationReadError?: StackSetError;
}

/**
 * Read-only preview of what the next step would act on.
 */
export async function describeRollout(
  gateway: StackSetGateway,
  stackSetName: string,
  targets: readonly DeploymentTarget[],
  displayNameParameter: string,
  action: RolloutAction
): Promise<RolloutStatus> {
  const toRef = (target: DeploymentTarget) => toTargetRef(target, displayNameParameter);

  if (!(await gateway.describeStackSet(stackSetName))) {
    const plan = planRollout({ targets, provisioned: new Set(), action });
    return { stackSetExists: false, provisioned: [], pending: plan.pending.map(toRef), next: plan.next && toRef(plan.next) };
  }

  const provisioned = await gateway.listProvisionedTargets(stackSetName);
  const plan = planRollout({ targets, provisioned, action });

  let latestOperation: OperationSnapshot | undefined;
  let operationReadError: StackSetError | undefined;
  try {
    latestOperation = await gateway.latestOperation(stackSetName);
  } catch (error) {
    operationReadError = classifyReadError(error, `Failed to list operations of ${stackSetName}`);
  }

  return {
    stackSetExists: true,
    provisioned: targets.filter(target => provisioned.has(target.accountId)).map(toRef),
    pending: plan.pending.map(toRef),
    next: plan.next && toRef(plan.next),
    latestOperation,
    operationReadError,
  };
}
