// Remote access contract for a StackSet
import {
  DeploymentTarget,
  OperationPreferences,
  OperationSnapshot,
  ResourceDefinition,
  StackSetSummary,
} from '../types/index.js';

export interface InstanceCallOptions {
  /** Send the target's parameter overrides (always true for creates) */
  includeParameters: boolean;
  operationPreferences?: OperationPreferences;
}

/**
 * Everything the rollout engine needs from the remote StackSet. Implementations
 * must throw only `StackSetError` subclasses.
 */
export interface StackSetGateway {
  describeStackSet(stackSetName: string): Promise<StackSetSummary | undefined>;
  createStackSet(stackSetName: string, definition: ResourceDefinition): Promise<string | undefined>;
  updateStackSet(
    stackSetName: string,
    definition: ResourceDefinition,
    preferences?: OperationPreferences,
  ): Promise<string>;
  listProvisionedTargets(stackSetName: string): Promise<Set<string>>;
  latestOperation(stackSetName: string): Promise<OperationSnapshot | undefined>;
  describeOperation(stackSetName: string, operationId: string): Promise<OperationSnapshot>;
  createInstances(
    stackSetName: string,
    target: DeploymentTarget,
    options: InstanceCallOptions,
  ): Promise<string>;
  updateInstances(
    stackSetName: string,
    target: DeploymentTarget,
    options: InstanceCallOptions,
  ): Promise<string>;
}
