import chalk from 'chalk';
import ora, { type Ora } from 'ora';
import { RolloutEvent, RolloutReporter } from '../orchestration/types.js';

function seconds(ms: number): string {
  return `${Math.round(ms / 1000)}s`;
}

/**
 * Turn an engine event into the status line printed for it
 */
export function formatEvent(event: RolloutEvent, verbose = false): string {
  switch (event.type) {
    case 'status': {
      const done = event.action === 'create' ? 'deployed' : 'provisioned';
      return `📊 Status: ✓ ${event.provisioned} ${done} | ⏳ ${event.pending} remaining`;
    }
    case 'blocked':
      return chalk.yellow(`⏳ ${event.detail} - waiting...`);
    case 'read-degraded':
      return chalk.yellow(`⚠️  ${event.error.message} - assuming no instances are deployed`);
    case 'target-selected': {
      const verb = event.action === 'create' ? 'Deploying' : 'Updating';
      return `🚀 ${verb}: ${event.target.accountId} (${event.target.displayName}) in ${event.regions.join(', ')}`;
    }
    case 'operation-started':
      return `✓ Operation initiated: ${event.operationId}`;
    case 'operation-status':
      return chalk.gray(`   Status: ${event.status}`);
    case 'operation-finished':
      return event.status === 'SUCCEEDED'
        ? chalk.green(`✅ Successfully finished ${event.label}`)
        : chalk.red(`❌ Operation ${event.status} for ${event.label}`);
    case 'operation-timed-out':
      return chalk.yellow(`⌛ Stopped waiting for ${event.operationId} while ${event.lastStatus}; it may still be running`);
    case 'poll-error':
      return chalk.yellow(`⚠️  Error checking status of ${event.operationId}: ${event.error.message}`);
    case 'definition':
      return event.change === 'created'
        ? chalk.green(`📦 Created StackSet ${event.stackSetName}`)
        : `📦 Updating definition of ${event.stackSetName}`;
    case 'target-given-up':
      return chalk.red(`✗ Giving up on ${event.target.accountId} (${event.target.displayName}) after ${event.attempts} attempts`);
    case 'pause':
      return chalk.gray(`   Next check in ${seconds(event.ms)} (${event.reason})`);
    case 'complete':
      return chalk.green(`🎉 ${event.message}`);
    case 'error': {
      const prefix = event.fatal ? '❌ Fatal' : '❌ Error';
      const cause = verbose && event.error.cause !== undefined ? `\n   ${String(event.error.cause)}` : '';
      return chalk.red(`${prefix}: ${event.error.message}`) + cause;
    }
  }
}

/**
 * Prints one line per event. While an operation is in flight its status
 * checks update a spinner instead of printing a line each.
 */
export class ConsoleReporter implements RolloutReporter {
  private spinner?: Ora;

  constructor(private readonly verbose = false) {}

  report(event: RolloutEvent): void {
    const line = formatEvent(event, this.verbose);

    switch (event.type) {
      case 'operation-started':
        console.log(line);
        this.spinner = ora(`Waiting for ${event.label}...`).start();
        return;
      case 'operation-status':
        if (this.spinner) {
          this.spinner.text = `Waiting for ${event.operationId}: ${event.status} (check ${event.attempt})`;
          return;
        }
        break;
      case 'operation-finished':
        if (this.spinner) {
          if (event.status === 'SUCCEEDED') {
            this.spinner.succeed(line);
          } else {
            this.spinner.fail(line);
          }
          this.spinner = undefined;
          return;
        }
        break;
      case 'operation-timed-out':
      case 'poll-error':
        if (this.spinner) {
          this.spinner.warn(line);
          this.spinner = undefined;
          return;
        }
        break;
    }

    if (event.type === 'error') {
      console.error(line);
    } else {
      console.log(line);
    }
  }

  /** Stop a spinner left running by an interrupted wait */
  close(): void {
    this.spinner?.stop();
    this.spinner = undefined;
  }
}
