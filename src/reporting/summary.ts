import chalk from 'chalk';
import { DefinitionSyncResult } from '../orchestration/definition-sync.js';
import { RunOutcome } from '../orchestration/drivers.js';
import { RolloutStatus } from '../orchestration/status.js';
import { ReconciliationResult, TargetRef } from '../orchestration/types.js';

function describeRef(ref: TargetRef): string {
  return `${ref.accountId} (${ref.displayName})`;
}

/**
 * Closing lines for a single step
 */
export function formatStepResult(result: ReconciliationResult): string[] {
  const lines: string[] = [];
  switch (result.kind) {
    case 'no-work-remaining':
      lines.push(chalk.green('🎉 Nothing left to do for this StackSet'));
      break;
    case 'progressed':
      lines.push(chalk.green(`✅ ${describeRef(result.target)} finished with ${result.operation.status}`));
      break;
    case 'waiting':
      lines.push(chalk.yellow(`⏳ Waiting: ${result.detail}`));
      break;
    case 'failed':
      lines.push(chalk.red(`${result.fatal ? '❌ Fatal' : '✗ Failed'}: ${result.error.message}`));
      break;
  }

  if (result.remaining && result.remaining.length > 0) {
    lines.push(`📋 Run again to process the remaining ${result.remaining.length} target(s): ${result.remaining.join(', ')}`);
  } else if (result.kind === 'progressed') {
    lines.push(chalk.green('🎉 All targets processed'));
  }
  return lines;
}

export function formatRunOutcome(outcome: RunOutcome): string[] {
  const lines = [`Steps: ${outcome.steps} | succeeded: ${outcome.succeeded.length} | given up: ${outcome.givenUp.length}`];
  for (const ref of outcome.givenUp) {
    lines.push(chalk.red(`  ✗ ${describeRef(ref)}`));
  }
  if (outcome.status === 'cancelled') {
    lines.push(chalk.yellow('⏹  Cancelled; an operation already started keeps running remotely'));
  }
  if (outcome.status === 'fatal' && outcome.error) {
    lines.push(chalk.red(`❌ Stopped: ${outcome.error.message}`));
  }
  return lines;
}

export function formatSyncResult(stackSetName: string, result: DefinitionSyncResult): string {
  switch (result.kind) {
    case 'created':
      return chalk.green(`📦 StackSet ${stackSetName} created`);
    case 'updated':
      return chalk.green(`📦 StackSet ${stackSetName} definition updated (${result.operation.operationId})`);
    case 'blocked':
      return chalk.yellow(`⏳ Definition not synced: ${result.detail}`);
    case 'timed-out':
      return chalk.yellow(`⌛ Definition update ${result.operation.operationId} still ${result.operation.status}`);
    case 'interrupted':
      return chalk.yellow(`⚠️  Definition sync stopped on a read error: ${result.error.message}`);
    case 'failed':
      return chalk.red(`❌ Definition sync failed: ${result.error.message}`);
  }
}

export function formatRolloutStatus(stackSetName: string, status: RolloutStatus): string[] {
  if (!status.stackSetExists) {
    return [
      chalk.yellow(`StackSet ${stackSetName} does not exist yet`),
      `⏳ Remaining: ${status.pending.length} targets`,
    ];
  }

  const lines = [
    `StackSet ${stackSetName} deployment status:`,
    `✓ Deployed: ${status.provisioned.length} targets`,
    `⏳ Remaining: ${status.pending.length} targets`,
  ];
  if (status.next) {
    lines.push(`🚀 Next: ${describeRef(status.next)}`);
  }
  if (status.latestOperation) {
    const op = status.latestOperation;
    lines.push(`Latest operation: ${op.operationId} ${op.action ?? ''} ${op.status}`.replace(/\s+/g, ' ').trim());
  }
  if (status.operationReadError) {
    lines.push(chalk.yellow(`⚠️  ${status.operationReadError.message}`));
  }
  return lines;
}

export function stepExitCode(result: ReconciliationResult): number {
  return result.kind === 'failed' ? 1 : 0;
}

export function outcomeExitCode(outcome: RunOutcome): number {
  if (outcome.status === 'fatal' || outcome.givenUp.length > 0) {
    return 1;
  }
  return outcome.status === 'cancelled' ? 130 : 0;
}

export function syncExitCode(result: DefinitionSyncResult): number {
  return result.kind === 'created' || result.kind === 'updated' ? 0 : 1;
}
