// Orchestration-specific types
import { StackSetError } from '../provisioning/errors.js';
import {
  DeploymentTarget,
  OperationSnapshot,
  OperationStatus,
  RolloutAction,
} from '../types/index.js';

/** Suspends for `ms`; rejects with an AbortError when the signal fires */
export type Sleeper = (ms: number, signal?: AbortSignal) => Promise<void>;

export interface TargetRef {
  accountId: string;
  displayName: string;
}

export type WaitReason = 'operation-in-progress' | 'write-conflict' | 'wait-timeout' | 'poll-interrupted';

interface StepReport {
  /** Account ids still pending once this step is done; unknown when the step stopped before reading */
  remaining?: string[];
  /** The provisioned set could not be read and was assumed empty */
  readDegraded: boolean;
}

export type ReconciliationResult =
  | (StepReport & { kind: 'no-work-remaining' })
  | (StepReport & {
      kind: 'waiting';
      reason: WaitReason;
      detail: string;
      target?: TargetRef;
      operation?: OperationSnapshot;
    })
  | (StepReport & { kind: 'progressed'; target: TargetRef; operation: OperationSnapshot })
  | (StepReport & { kind: 'failed'; target?: TargetRef; error: StackSetError; fatal: boolean });

export interface StepRequest {
  stackSetName: string;
  targets: readonly DeploymentTarget[];
  displayNameParameter: string;
  action: RolloutAction;
  /** Restrict planning to one account, bypassing catalog order */
  accountId?: string;
  /** Send parameter overrides with update calls */
  pushParameters?: boolean;
  /** Accounts this run already finished with */
  settled?: ReadonlySet<string>;
  signal?: AbortSignal;
}

export type PollOutcome =
  | { kind: 'terminal'; operation: OperationSnapshot; attempts: number }
  | { kind: 'timed-out'; operationId: string; lastStatus: OperationStatus; attempts: number }
  | {
      kind: 'interrupted';
      operationId: string;
      lastStatus: OperationStatus;
      attempts: number;
      error: StackSetError;
    };

export type RolloutEvent =
  | { type: 'status'; action: RolloutAction; provisioned: number; pending: number }
  | { type: 'blocked'; reason: WaitReason; detail: string; operation?: OperationSnapshot }
  | { type: 'read-degraded'; error: StackSetError }
  | { type: 'target-selected'; action: RolloutAction; target: TargetRef; regions: string[] }
  | { type: 'operation-started'; operationId: string; label: string }
  | { type: 'operation-status'; operationId: string; status: OperationStatus; attempt: number }
  | { type: 'operation-finished'; operationId: string; status: OperationStatus; label: string }
  | { type: 'operation-timed-out'; operationId: string; lastStatus: OperationStatus }
  | { type: 'poll-error'; operationId: string; error: StackSetError }
  | { type: 'definition'; change: 'created' | 'updating'; stackSetName: string }
  | { type: 'target-given-up'; target: TargetRef; attempts: number }
  | { type: 'pause'; ms: number; reason: string }
  | { type: 'complete'; message: string }
  | { type: 'error'; error: StackSetError; fatal: boolean };

export interface RolloutReporter {
  report(event: RolloutEvent): void;
}

export const silentReporter: RolloutReporter = {
  report: () => undefined,
};
