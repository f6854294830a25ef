import {
  OperationFailedError,
  StackSetError,
  WaitTimeoutError,
  classifyReadError,
  classifyWriteError,
} from '../provisioning/errors.js';
import { StackSetGateway } from '../provisioning/types.js';
import { DeploymentTarget, RolloutSettings, isTerminal } from '../types/index.js';
import { OperationPoller, defaultSleeper } from './operation-poller.js';
import { assertInCatalog, planRollout, toTargetRef } from './plan.js';
import {
  PollOutcome,
  ReconciliationResult,
  RolloutReporter,
  Sleeper,
  StepRequest,
  TargetRef,
  silentReporter,
} from './types.js';

export interface ReconcilerOptions {
  sleep?: Sleeper;
  reporter?: RolloutReporter;
}

/**
 * One reconciliation step against a StackSet: check for an in-flight
 * operation, read the provisioned accounts, pick the next pending target and
 * drive a single instance operation for it to a terminal status.
 */
export class Reconciler {
  private readonly poller: OperationPoller;
  private readonly reporter: RolloutReporter;

  constructor(
    private readonly gateway: StackSetGateway,
    private readonly settings: RolloutSettings,
    options: ReconcilerOptions = {}
  ) {
    this.reporter = options.reporter ?? silentReporter;
    this.poller = new OperationPoller(gateway, options.sleep ?? defaultSleeper, this.reporter);
  }

  async reconcileStep(request: StepRequest): Promise<ReconciliationResult> {
    const { stackSetName, targets, action } = request;
    assertInCatalog(targets, request.accountId);

    // Checking for a conflicting operation
    try {
      const latest = await this.gateway.latestOperation(stackSetName);
      if (latest && !isTerminal(latest.status)) {
        const detail = `Operation ${latest.operationId} is ${latest.status}`;
        this.reporter.report({ type: 'blocked', reason: 'operation-in-progress', detail, operation: latest });
        return {
          kind: 'waiting',
          reason: 'operation-in-progress',
          detail,
          operation: latest,
          readDegraded: false,
        };
      }
    } catch (error) {
      const classified = classifyReadError(error, `Failed to check operations of ${stackSetName}`);
      if (classified.kind === 'resource-not-found') {
        return this.fatal(classified);
      }
      this.reporter.report({ type: 'error', error: classified, fatal: false });
    }

    // Reading the provisioned accounts
    let provisioned: Set<string>;
    let readDegraded = false;
    try {
      provisioned = await this.gateway.listProvisionedTargets(stackSetName);
    } catch (error) {
      const classified = classifyReadError(error, `Failed to read instances of ${stackSetName}`);
      if (classified.kind === 'resource-not-found') {
        return this.fatal(classified);
      }
      if (action === 'update') {
        this.reporter.report({ type: 'error', error: classified, fatal: false });
        return { kind: 'failed', error: classified, fatal: false, readDegraded: false };
      }
      this.reporter.report({ type: 'read-degraded', error: classified });
      provisioned = new Set();
      readDegraded = true;
    }

    // Planning
    const plan = planRollout({
      targets,
      provisioned,
      action,
      accountId: request.accountId,
      settled: request.settled,
    });
    const pendingIds = plan.pending.map(target => target.accountId);
    this.reporter.report({
      type: 'status',
      action,
      provisioned: targets.filter(target => provisioned.has(target.accountId)).length,
      pending: plan.pending.length,
    });

    if (!plan.next) {
      return { kind: 'no-work-remaining', remaining: [], readDegraded };
    }

    return this.mutate(request, plan.next, pendingIds, readDegraded);
  }

  private async mutate(
    request: StepRequest,
    target: DeploymentTarget,
    pendingIds: string[],
    readDegraded: boolean
  ): Promise<ReconciliationResult> {
    const { stackSetName, action } = request;
    const ref = toTargetRef(target, request.displayNameParameter);
    this.reporter.report({ type: 'target-selected', action, target: ref, regions: [...target.regions] });

    let operationId: string;
    try {
      const options = {
        includeParameters: action === 'create' || request.pushParameters === true,
        operationPreferences: this.settings.operationPreferences,
      };
      operationId = action === 'create'
        ? await this.gateway.createInstances(stackSetName, target, options)
        : await this.gateway.updateInstances(stackSetName, target, options);
    } catch (error) {
      const classified = classifyWriteError(error, `Failed to ${action} instances for ${target.accountId}`);
      if (classified.kind === 'write-conflict') {
        this.reporter.report({ type: 'blocked', reason: 'write-conflict', detail: classified.message });
        return {
          kind: 'waiting',
          reason: 'write-conflict',
          detail: classified.message,
          target: ref,
          remaining: pendingIds,
          readDegraded,
        };
      }
      if (classified.kind === 'resource-not-found') {
        return this.fatal(classified, ref, pendingIds);
      }
      this.reporter.report({ type: 'error', error: classified, fatal: false });
      return { kind: 'failed', target: ref, error: classified, fatal: false, remaining: pendingIds, readDegraded };
    }

    const label = `${ref.accountId} (${ref.displayName})`;
    this.reporter.report({ type: 'operation-started', operationId, label });
    return this.awaitOperation(request, ref, operationId, label, pendingIds, readDegraded);
  }

  private async awaitOperation(
    request: StepRequest,
    ref: TargetRef,
    operationId: string,
    label: string,
    pendingIds: string[],
    readDegraded: boolean
  ): Promise<ReconciliationResult> {
    let outcome: PollOutcome;
    try {
      outcome = await this.poller.awaitTerminal(request.stackSetName, operationId, {
        pollIntervalMs: this.settings.pollIntervalMs,
        maxAttempts: this.settings.maxPollAttempts,
        signal: request.signal,
      });
    } catch (error) {
      if (request.signal?.aborted) {
        return {
          kind: 'waiting',
          reason: 'poll-interrupted',
          detail: `Stopped waiting for operation ${operationId}; it keeps running remotely`,
          target: ref,
          remaining: pendingIds,
          readDegraded,
        };
      }
      throw error;
    }

    switch (outcome.kind) {
      case 'terminal': {
        const { operation } = outcome;
        this.reporter.report({ type: 'operation-finished', operationId, status: operation.status, label });
        if (operation.status === 'SUCCEEDED') {
          return {
            kind: 'progressed',
            target: ref,
            operation,
            remaining: pendingIds.filter(id => id !== ref.accountId),
            readDegraded,
          };
        }
        return {
          kind: 'failed',
          target: ref,
          error: new OperationFailedError(operationId, operation.status, operation.statusReason),
          fatal: false,
          remaining: pendingIds,
          readDegraded,
        };
      }
      case 'timed-out': {
        const error = new WaitTimeoutError(operationId, outcome.lastStatus, outcome.attempts);
        return {
          kind: 'waiting',
          reason: 'wait-timeout',
          detail: error.message,
          target: ref,
          operation: { operationId, status: outcome.lastStatus },
          remaining: pendingIds,
          readDegraded,
        };
      }
      case 'interrupted':
        return {
          kind: 'waiting',
          reason: 'poll-interrupted',
          detail: outcome.error.message,
          target: ref,
          operation: { operationId, status: outcome.lastStatus },
          remaining: pendingIds,
          readDegraded,
        };
    }
  }

  private fatal(error: StackSetError, target?: TargetRef, remaining?: string[]): ReconciliationResult {
    this.reporter.report({ type: 'error', error, fatal: true });
    return { kind: 'failed', target, error, fatal: true, remaining, readDegraded: false };
  }
}
