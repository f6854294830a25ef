import { OperationNotFoundError, StackSetError } from '../../provisioning/errors.js';
import { InstanceCallOptions, StackSetGateway } from '../../provisioning/types.js';
import {
  DeploymentTarget,
  OperationPreferences,
  OperationSnapshot,
  OperationStatus,
  ResourceDefinition,
  StackSetSummary,
} from '../../types/index.js';
import { RolloutEvent, RolloutReporter, Sleeper } from '../types.js';

export type GatewayCall =
  | { method: 'createStackSet' | 'updateStackSet' }
  | { method: 'createInstances' | 'updateInstances'; accountId: string; regions: string[]; includeParameters: boolean };

interface TrackedOperation {
  snapshot: OperationSnapshot;
  statuses: OperationStatus[];
  accountId?: string;
}

/**
 * In-memory StackSet. Each started operation walks through `statusScript`
 * (or the script set for its account), one status per describe call.
 */
export class FakeStackSet implements StackSetGateway {
  exists = true;
  provisioned = new Set<string>();
  latest?: OperationSnapshot;
  /** Mutating calls, in order */
  calls: GatewayCall[] = [];

  statusScript: OperationStatus[] = ['SUCCEEDED'];
  accountScripts = new Map<string, OperationStatus[]>();

  listErrors: StackSetError[] = [];
  latestErrors: StackSetError[] = [];
  writeErrors: StackSetError[] = [];
  describeErrors: StackSetError[] = [];

  private operations = new Map<string, TrackedOperation>();
  private counter = 0;

  async describeStackSet(stackSetName: string): Promise<StackSetSummary | undefined> {
    return this.exists ? { name: stackSetName, status: 'ACTIVE', capabilities: [] } : undefined;
  }

  async createStackSet(): Promise<string | undefined> {
    this.calls.push({ method: 'createStackSet' });
    this.throwScripted(this.writeErrors);
    this.exists = true;
    return 'stackset-id';
  }

  async updateStackSet(
    _stackSetName: string,
    _definition: ResourceDefinition,
    _preferences?: OperationPreferences
  ): Promise<string> {
    this.calls.push({ method: 'updateStackSet' });
    this.throwScripted(this.writeErrors);
    return this.start([...this.statusScript]);
  }

  async listProvisionedTargets(): Promise<Set<string>> {
    this.throwScripted(this.listErrors);
    return new Set(this.provisioned);
  }

  async latestOperation(): Promise<OperationSnapshot | undefined> {
    this.throwScripted(this.latestErrors);
    return this.latest && { ...this.latest };
  }

  async describeOperation(_stackSetName: string, operationId: string): Promise<OperationSnapshot> {
    this.throwScripted(this.describeErrors);
    const operation = this.operations.get(operationId);
    if (!operation) {
      throw new OperationNotFoundError(`Operation ${operationId} not found`);
    }

    const next = operation.statuses.length > 1 ? operation.statuses.shift() : operation.statuses[0];
    if (next) {
      operation.snapshot = { ...operation.snapshot, status: next };
    }
    if (operation.snapshot.status === 'SUCCEEDED' && operation.accountId) {
      this.provisioned.add(operation.accountId);
    }
    this.latest = operation.snapshot;
    return { ...operation.snapshot };
  }

  async createInstances(
    _stackSetName: string,
    target: DeploymentTarget,
    options: InstanceCallOptions
  ): Promise<string> {
    return this.startInstances('createInstances', target, options);
  }

  async updateInstances(
    _stackSetName: string,
    target: DeploymentTarget,
    options: InstanceCallOptions
  ): Promise<string> {
    return this.startInstances('updateInstances', target, options);
  }

  private startInstances(
    method: 'createInstances' | 'updateInstances',
    target: DeploymentTarget,
    options: InstanceCallOptions
  ): string {
    this.calls.push({
      method,
      accountId: target.accountId,
      regions: [...target.regions],
      includeParameters: options.includeParameters,
    });
    this.throwScripted(this.writeErrors);
    const script = this.accountScripts.get(target.accountId) ?? this.statusScript;
    return this.start([...script], target.accountId);
  }

  private start(statuses: OperationStatus[], accountId?: string): string {
    this.counter += 1;
    const operationId = `op-${this.counter}`;
    const snapshot: OperationSnapshot = { operationId, status: 'RUNNING' };
    this.operations.set(operationId, { snapshot, statuses, accountId });
    this.latest = snapshot;
    return operationId;
  }

  private throwScripted(queue: StackSetError[]): void {
    const error = queue.shift();
    if (error) {
      throw error;
    }
  }
}

export function target(accountId: string, name: string, regions: string[] = ['us-east-1']): DeploymentTarget {
  return {
    accountId,
    regions,
    parameters: [
      { ParameterKey: 'AccountName', ParameterValue: name },
      { ParameterKey: 'RecipientEmailAddresses', ParameterValue: 'ops@example.com' },
    ],
  };
}

export function recordingSleeper(): { sleep: Sleeper; delays: number[] } {
  const delays: number[] = [];
  return {
    delays,
    sleep: async ms => {
      delays.push(ms);
    },
  };
}

export class RecordingReporter implements RolloutReporter {
  events: RolloutEvent[] = [];

  report(event: RolloutEvent): void {
    this.events.push(event);
  }

  ofType<T extends RolloutEvent['type']>(type: T): Extract<RolloutEvent, { type: T }>[] {
    return this.events.filter((event): event is Extract<RolloutEvent, { type: T }> => event.type === type);
  }
}
