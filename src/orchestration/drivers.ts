import { StackSetError, TransientReadError } from '../provisioning/errors.js';
import { StackSetGateway } from '../provisioning/types.js';
import {
  DeploymentTarget,
  OperationSnapshot,
  ResourceDefinition,
  RolloutAction,
  RolloutSettings,
  isTerminal,
} from '../types/index.js';
import { DefinitionSync, DefinitionSyncResult } from './definition-sync.js';
import { defaultSleeper } from './operation-poller.js';
import { Reconciler } from './reconciler.js';
import { ReconciliationResult, RolloutReporter, Sleeper, TargetRef, silentReporter } from './types.js';

export interface DriverOptions {
  gateway: StackSetGateway;
  settings: RolloutSettings;
  stackSetName: string;
  targets: readonly DeploymentTarget[];
  displayNameParameter: string;
  action: RolloutAction;
  accountId?: string;
  pushParameters?: boolean;
  /** Synced before any instance work when given */
  definition?: ResourceDefinition;
  reporter?: RolloutReporter;
  sleep?: Sleeper;
  signal?: AbortSignal;
}

export interface RunOutcome {
  status: 'completed' | 'fatal' | 'cancelled';
  steps: number;
  succeeded: TargetRef[];
  givenUp: TargetRef[];
  error?: StackSetError;
}

/**
 * Run one reconciliation step and hand control back to the operator.
 */
export async function runSingleStep(options: DriverOptions): Promise<ReconciliationResult> {
  const reporter = options.reporter ?? silentReporter;
  const reconciler = new Reconciler(options.gateway, options.settings, {
    sleep: options.sleep,
    reporter,
  });
  return reconciler.reconcileStep({
    stackSetName: options.stackSetName,
    targets: options.targets,
    displayNameParameter: options.displayNameParameter,
    action: options.action,
    accountId: options.accountId,
    pushParameters: options.pushParameters,
    signal: options.signal,
  });
}

/**
 * Sync the definition, retrying while another operation holds the StackSet
 * or a read fails. An update whose status read failed is awaited again
 * rather than started anew. Returns undefined when cancelled.
 */
export async function runDefinitionSync(
  options: DriverOptions & { definition: ResourceDefinition }
): Promise<DefinitionSyncResult | undefined> {
  const { settings, signal } = options;
  const reporter = options.reporter ?? silentReporter;
  const sleep = options.sleep ?? defaultSleeper;
  const sync = new DefinitionSync(options.gateway, settings, { sleep, reporter });
  let inFlight: string | undefined;
  let readFailures = 0;

  while (!signal?.aborted) {
    const result = inFlight
      ? await sync.resume(options.stackSetName, inFlight, signal)
      : await sync.sync(options.stackSetName, options.definition, signal);
    if (!result) {
      return undefined;
    }

    let reason: string;
    if (result.kind === 'blocked') {
      readFailures = 0;
      reason = 'another operation holds the StackSet';
    } else if (result.kind === 'interrupted') {
      readFailures += 1;
      if (readFailures > settings.maxConsecutiveReadFailures) {
        return result;
      }
      inFlight = result.operation?.operationId;
      reason = result.error.message;
    } else {
      return result;
    }

    if (!(await pause(sleep, reporter, settings.conflictBackoffMs, reason, signal))) {
      return undefined;
    }
  }
  return undefined;
}

/**
 * Keep reconciling until nothing is pending, a fatal error occurs or the
 * signal fires. Cancellation is observed between steps and during pauses.
 */
export async function runContinuous(options: DriverOptions): Promise<RunOutcome> {
  const { settings, signal } = options;
  const reporter = options.reporter ?? silentReporter;
  const sleep = options.sleep ?? defaultSleeper;
  const reconciler = new Reconciler(options.gateway, settings, { sleep, reporter });

  const outcome: RunOutcome = { status: 'completed', steps: 0, succeeded: [], givenUp: [] };
  const settled = new Set<string>();
  const attempts = new Map<string, number>();
  /** Operations whose wait ended before they did, keyed by operation id */
  const abandoned = new Map<string, TargetRef>();
  const progress: RunProgress = { settled, attempts, outcome, maxTargetAttempts: settings.maxTargetAttempts, reporter };
  let degradedReads = 0;

  if (options.definition) {
    const synced = await runDefinitionSync({ ...options, definition: options.definition, reporter, sleep });
    if (!synced) {
      return { ...outcome, status: 'cancelled' };
    }
    if (synced.kind === 'failed' || synced.kind === 'interrupted') {
      return { ...outcome, status: 'fatal', error: synced.error };
    }
  }

  while (!signal?.aborted) {
    await settleAbandoned(options.gateway, options.stackSetName, abandoned, progress);

    const result = await reconciler.reconcileStep({
      stackSetName: options.stackSetName,
      targets: options.targets,
      displayNameParameter: options.displayNameParameter,
      action: options.action,
      accountId: options.accountId,
      pushParameters: options.pushParameters,
      settled,
      signal,
    });
    outcome.steps += 1;

    degradedReads = result.readDegraded ? degradedReads + 1 : 0;
    if (degradedReads > settings.maxConsecutiveReadFailures) {
      const error = new TransientReadError(`Stack instances unreadable for ${degradedReads} consecutive steps`);
      reporter.report({ type: 'error', error, fatal: true });
      return { ...outcome, status: 'fatal', error };
    }

    let pauseMs = settings.interStepPauseMs;
    let reason = 'next step';
    switch (result.kind) {
      case 'no-work-remaining':
        reporter.report({ type: 'complete', message: completionMessage(options.action, outcome) });
        return outcome;
      case 'waiting':
        pauseMs = result.reason === 'write-conflict' ? settings.writeConflictBackoffMs : settings.conflictBackoffMs;
        reason = result.detail;
        if (result.target && result.operation) {
          abandoned.set(result.operation.operationId, result.target);
        }
        break;
      case 'progressed':
        settled.add(result.target.accountId);
        outcome.succeeded.push(result.target);
        break;
      case 'failed':
        if (result.fatal) {
          return { ...outcome, status: 'fatal', error: result.error };
        }
        if (result.target) {
          noteFailure(result.target, progress);
        }
        pauseMs = settings.failureBackoffMs;
        reason = result.error.message;
        break;
    }

    if (!(await pause(sleep, reporter, pauseMs, reason, signal))) {
      break;
    }
  }

  return { ...outcome, status: 'cancelled' };
}

interface RunProgress {
  settled: Set<string>;
  attempts: Map<string, number>;
  outcome: RunOutcome;
  maxTargetAttempts: number;
  reporter: RolloutReporter;
}

function noteFailure(target: TargetRef, progress: RunProgress): void {
  const count = (progress.attempts.get(target.accountId) ?? 0) + 1;
  progress.attempts.set(target.accountId, count);
  if (count >= progress.maxTargetAttempts) {
    progress.settled.add(target.accountId);
    progress.outcome.givenUp.push(target);
    progress.reporter.report({ type: 'target-given-up', target, attempts: count });
  }
}

/**
 * Check on operations the run stopped waiting for. A finished one settles
 * its target, so an update is not issued twice for the same account.
 */
async function settleAbandoned(
  gateway: StackSetGateway,
  stackSetName: string,
  abandoned: Map<string, TargetRef>,
  progress: RunProgress
): Promise<void> {
  for (const [operationId, target] of abandoned) {
    let operation: OperationSnapshot;
    try {
      operation = await gateway.describeOperation(stackSetName, operationId);
    } catch (error) {
      if (error instanceof StackSetError && error.kind === 'operation-not-found') {
        abandoned.delete(operationId);
      }
      // Otherwise the conflict check covers it until a later read succeeds
      continue;
    }
    if (!isTerminal(operation.status)) {
      continue;
    }

    abandoned.delete(operationId);
    const label = `${target.accountId} (${target.displayName})`;
    progress.reporter.report({ type: 'operation-finished', operationId, status: operation.status, label });
    if (operation.status === 'SUCCEEDED') {
      progress.settled.add(target.accountId);
      progress.outcome.succeeded.push(target);
    } else {
      noteFailure(target, progress);
    }
  }
}

function completionMessage(action: RolloutAction, outcome: RunOutcome): string {
  const verb = action === 'create' ? 'deployed' : 'updated';
  if (outcome.givenUp.length > 0) {
    return `Finished with ${outcome.givenUp.length} target(s) given up`;
  }
  return outcome.steps === 1 && outcome.succeeded.length === 0
    ? `All targets already ${verb}`
    : `All targets ${verb} successfully`;
}

/** Sleeps unless cancelled; returns false once the signal has fired */
async function pause(
  sleep: Sleeper,
  reporter: RolloutReporter,
  ms: number,
  reason: string,
  signal?: AbortSignal
): Promise<boolean> {
  if (signal?.aborted) {
    return false;
  }
  reporter.report({ type: 'pause', ms, reason });
  try {
    await sleep(ms, signal);
  } catch (error) {
    if (signal?.aborted) {
      return false;
    }
    throw error;
  }
  return !signal?.aborted;
}
