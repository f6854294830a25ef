// Core type definitions for StackSet rollouts

export interface ParameterOverride {
  ParameterKey: string;
  ParameterValue: string;
}

export interface DeploymentTarget {
  accountId: string;
  regions: string[];
  parameters: ParameterOverride[];
}

export interface TargetCatalog {
  /** Parameter whose value names the account in log lines */
  displayNameParameter: string;
  targets: DeploymentTarget[];
}

export type Capability = 'CAPABILITY_IAM' | 'CAPABILITY_NAMED_IAM' | 'CAPABILITY_AUTO_EXPAND';

export interface ResourceDefinition {
  templateBody: string;
  capabilities: Capability[];
  description?: string;
}

export type OperationStatus =
  | 'PENDING'
  | 'QUEUED'
  | 'RUNNING'
  | 'STOPPING'
  | 'SUCCEEDED'
  | 'FAILED'
  | 'STOPPED';

export const TERMINAL_STATUSES: readonly OperationStatus[] = ['SUCCEEDED', 'FAILED', 'STOPPED'];

export function isTerminal(status: OperationStatus): boolean {
  return TERMINAL_STATUSES.includes(status);
}

export type OperationAction = 'CREATE' | 'UPDATE' | 'DELETE' | 'DETECT_DRIFT';

export interface OperationSnapshot {
  operationId: string;
  status: OperationStatus;
  action?: OperationAction;
  statusReason?: string;
}

export interface StackSetSummary {
  name: string;
  status: 'ACTIVE' | 'DELETED';
  stackSetId?: string;
  capabilities: Capability[];
}

/** `create` provisions missing targets, `update` re-deploys provisioned ones */
export type RolloutAction = 'create' | 'update';

export type RolloutMode = 'continuous' | 'step' | 'sync';

export interface OperationPreferences {
  maxConcurrentCount?: number;
  failureToleranceCount?: number;
  regionConcurrencyType?: 'SEQUENTIAL' | 'PARALLEL';
}

export interface RolloutSettings {
  pollIntervalMs: number;
  definitionPollIntervalMs: number;
  maxPollAttempts: number;
  conflictBackoffMs: number;
  writeConflictBackoffMs: number;
  interStepPauseMs: number;
  failureBackoffMs: number;
  maxTargetAttempts: number;
  maxConsecutiveReadFailures: number;
  capabilities: Capability[];
  operationPreferences?: OperationPreferences;
}

export interface AwsSettings {
  region?: string;
  profile?: string;
}
