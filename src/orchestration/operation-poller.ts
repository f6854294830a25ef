import { setTimeout as delay } from 'node:timers/promises';
import { StackSetError, TransientReadError } from '../provisioning/errors.js';
import { StackSetGateway } from '../provisioning/types.js';
import { OperationStatus, isTerminal } from '../types/index.js';
import { PollOutcome, RolloutReporter, Sleeper, silentReporter } from './types.js';

export const defaultSleeper: Sleeper = async (ms, signal) => {
  await delay(ms, undefined, { signal });
};

export interface PollOptions {
  pollIntervalMs: number;
  maxAttempts: number;
  /** Status reported by the call that started the operation */
  initialStatus?: OperationStatus;
  signal?: AbortSignal;
}

/**
 * Drives a started StackSet operation to a terminal status. A failed status
 * read ends the wait early without passing a verdict on the operation itself.
 */
export class OperationPoller {
  constructor(
    private readonly gateway: StackSetGateway,
    private readonly sleep: Sleeper = defaultSleeper,
    private readonly reporter: RolloutReporter = silentReporter
  ) {}

  async awaitTerminal(stackSetName: string, operationId: string, options: PollOptions): Promise<PollOutcome> {
    const maxAttempts = Math.max(1, options.maxAttempts);
    let lastStatus: OperationStatus = options.initialStatus ?? 'RUNNING';

    for (let attempt = 1; attempt <= maxAttempts; attempt += 1) {
      if (attempt > 1) {
        await this.sleep(options.pollIntervalMs, options.signal);
      }

      try {
        const operation = await this.gateway.describeOperation(stackSetName, operationId);
        lastStatus = operation.status;
        this.reporter.report({ type: 'operation-status', operationId, status: operation.status, attempt });

        if (isTerminal(operation.status)) {
          return { kind: 'terminal', operation, attempts: attempt };
        }
      } catch (error) {
        const classified = error instanceof StackSetError
          ? error
          : new TransientReadError(`Failed to read operation ${operationId}`, { cause: error });
        this.reporter.report({ type: 'poll-error', operationId, error: classified });
        return { kind: 'interrupted', operationId, lastStatus, attempts: attempt, error: classified };
      }
    }

    this.reporter.report({ type: 'operation-timed-out', operationId, lastStatus });
    return { kind: 'timed-out', operationId, lastStatus, attempts: maxAttempts };
  }
}
