import { OperationFailedError, StackSetError, classifyReadError, classifyWriteError } from '../provisioning/errors.js';
import { StackSetGateway } from '../provisioning/types.js';
import { OperationSnapshot, ResourceDefinition, RolloutSettings, isTerminal } from '../types/index.js';
import { OperationPoller, defaultSleeper } from './operation-poller.js';
import { PollOutcome, RolloutReporter, Sleeper, silentReporter } from './types.js';

export type DefinitionSyncResult =
  | { kind: 'created'; stackSetId?: string }
  | { kind: 'updated'; operation: OperationSnapshot }
  | { kind: 'blocked'; detail: string; operation?: OperationSnapshot }
  | { kind: 'timed-out'; operation: OperationSnapshot }
  /** A read failed; `operation` is set when an update was already started */
  | { kind: 'interrupted'; error: StackSetError; operation?: OperationSnapshot }
  | { kind: 'failed'; error: StackSetError; fatal: boolean };

export interface DefinitionSyncOptions {
  sleep?: Sleeper;
  reporter?: RolloutReporter;
}

/**
 * Makes the StackSet carry the given template: defines it when absent,
 * replaces the whole definition when present and waits for the resulting
 * operation to finish. Both `sync` and `resume` resolve to undefined when
 * the signal fires during the wait.
 */
export class DefinitionSync {
  private readonly poller: OperationPoller;
  private readonly reporter: RolloutReporter;

  constructor(
    private readonly gateway: StackSetGateway,
    private readonly settings: RolloutSettings,
    options: DefinitionSyncOptions = {}
  ) {
    this.reporter = options.reporter ?? silentReporter;
    this.poller = new OperationPoller(gateway, options.sleep ?? defaultSleeper, this.reporter);
  }

  async sync(
    stackSetName: string,
    definition: ResourceDefinition,
    signal?: AbortSignal
  ): Promise<DefinitionSyncResult | undefined> {
    let exists: boolean;
    try {
      exists = (await this.gateway.describeStackSet(stackSetName)) !== undefined;
      if (exists) {
        const latest = await this.gateway.latestOperation(stackSetName);
        if (latest && !isTerminal(latest.status)) {
          const detail = `Operation ${latest.operationId} is ${latest.status}`;
          this.reporter.report({ type: 'blocked', reason: 'operation-in-progress', detail, operation: latest });
          return { kind: 'blocked', detail, operation: latest };
        }
      }
    } catch (error) {
      const classified = classifyReadError(error, `Failed to inspect StackSet ${stackSetName}`);
      const fatal = classified.kind === 'resource-not-found';
      this.reporter.report({ type: 'error', error: classified, fatal });
      return fatal ? { kind: 'failed', error: classified, fatal } : { kind: 'interrupted', error: classified };
    }

    if (!exists) {
      try {
        const stackSetId = await this.gateway.createStackSet(stackSetName, definition);
        this.reporter.report({ type: 'definition', change: 'created', stackSetName });
        return { kind: 'created', stackSetId };
      } catch (error) {
        return this.writeFailure(error, `Failed to create StackSet ${stackSetName}`);
      }
    }

    let operationId: string;
    try {
      operationId = await this.gateway.updateStackSet(stackSetName, definition, this.settings.operationPreferences);
    } catch (error) {
      return this.writeFailure(error, `Failed to update StackSet ${stackSetName}`);
    }

    this.reporter.report({ type: 'definition', change: 'updating', stackSetName });
    this.reporter.report({ type: 'operation-started', operationId, label: `definition of ${stackSetName}` });
    return this.resume(stackSetName, operationId, signal);
  }

  /** Wait for a definition update that is already running */
  async resume(stackSetName: string, operationId: string, signal?: AbortSignal): Promise<DefinitionSyncResult | undefined> {
    let outcome: PollOutcome;
    try {
      outcome = await this.poller.awaitTerminal(stackSetName, operationId, {
        pollIntervalMs: this.settings.definitionPollIntervalMs,
        maxAttempts: this.settings.maxPollAttempts,
        signal,
      });
    } catch (error) {
      if (signal?.aborted) {
        return undefined;
      }
      throw error;
    }

    switch (outcome.kind) {
      case 'terminal': {
        const { operation } = outcome;
        const label = `definition of ${stackSetName}`;
        this.reporter.report({ type: 'operation-finished', operationId, status: operation.status, label });
        if (operation.status === 'SUCCEEDED') {
          return { kind: 'updated', operation };
        }
        return {
          kind: 'failed',
          error: new OperationFailedError(operationId, operation.status, operation.statusReason),
          fatal: false,
        };
      }
      case 'timed-out':
        return { kind: 'timed-out', operation: { operationId, status: outcome.lastStatus } };
      case 'interrupted':
        return { kind: 'interrupted', error: outcome.error, operation: { operationId, status: outcome.lastStatus } };
    }
  }

  private writeFailure(error: unknown, context: string): DefinitionSyncResult {
    const classified = classifyWriteError(error, context);
    if (classified.kind === 'write-conflict') {
      this.reporter.report({ type: 'blocked', reason: 'write-conflict', detail: classified.message });
      return { kind: 'blocked', detail: classified.message };
    }
    const fatal = classified.kind === 'resource-not-found';
    this.reporter.report({ type: 'error', error: classified, fatal });
    return { kind: 'failed', error: classified, fatal };
  }
}
