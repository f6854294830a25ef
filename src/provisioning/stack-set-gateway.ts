import {
  CloudFormationClient,
  CloudFormationClientConfig,
  CreateStackInstancesCommand,
  CreateStackSetCommand,
  DescribeStackSetCommand,
  DescribeStackSetOperationCommand,
  ListStackInstancesCommand,
  ListStackSetOperationsCommand,
  StackSetOperationPreferences as SdkOperationPreferences,
  StackSetOperation,
  StackSetOperationSummary,
  UpdateStackInstancesCommand,
  UpdateStackSetCommand,
} from '@aws-sdk/client-cloudformation';
import { fromIni } from '@aws-sdk/credential-provider-ini';
import { v4 as uuidv4 } from 'uuid';
import {
  AwsSettings,
  DeploymentTarget,
  OperationAction,
  OperationPreferences,
  OperationSnapshot,
  OperationStatus,
  ResourceDefinition,
  StackSetSummary,
} from '../types/index.js';
import {
  RejectedRequestError,
  TransientReadError,
  classifyReadError,
  classifyWriteError,
  extractErrorName,
} from './errors.js';
import { InstanceCallOptions, StackSetGateway } from './types.js';

export type CloudFormationSender = Pick<CloudFormationClient, 'send'>;

const OPERATION_STATUSES: Record<string, OperationStatus> = {
  PENDING: 'PENDING',
  QUEUED: 'QUEUED',
  RUNNING: 'RUNNING',
  STOPPING: 'STOPPING',
  SUCCEEDED: 'SUCCEEDED',
  FAILED: 'FAILED',
  STOPPED: 'STOPPED',
};

const OPERATION_ACTIONS: Record<string, OperationAction> = {
  CREATE: 'CREATE',
  UPDATE: 'UPDATE',
  DELETE: 'DELETE',
  DETECT_DRIFT: 'DETECT_DRIFT',
};

export function createCloudFormationClient(settings: AwsSettings = {}): CloudFormationClient {
  const config: CloudFormationClientConfig = { region: settings.region };
  if (settings.profile) {
    config.credentials = fromIni({ profile: settings.profile });
  }
  return new CloudFormationClient(config);
}

/**
 * StackSet gateway backed by the CloudFormation API. Every SDK failure is
 * classified here so callers only ever see `StackSetError` kinds.
 */
export class CloudFormationStackSetGateway implements StackSetGateway {
  private client: CloudFormationSender;

  constructor(client: CloudFormationSender = createCloudFormationClient()) {
    this.client = client;
  }

  async describeStackSet(stackSetName: string): Promise<StackSetSummary | undefined> {
    try {
      const result = await this.client.send(new DescribeStackSetCommand({ StackSetName: stackSetName }));
      const stackSet = result.StackSet;
      if (!stackSet || stackSet.Status === 'DELETED') {
        return undefined;
      }
      return {
        name: stackSet.StackSetName ?? stackSetName,
        status: 'ACTIVE',
        stackSetId: stackSet.StackSetId,
        capabilities: stackSet.Capabilities ?? [],
      };
    } catch (error) {
      if (extractErrorName(error) === 'StackSetNotFoundException') {
        return undefined;
      }
      throw classifyReadError(error, `Failed to describe StackSet ${stackSetName}`);
    }
  }

  async createStackSet(stackSetName: string, definition: ResourceDefinition): Promise<string | undefined> {
    try {
      const result = await this.client.send(
        new CreateStackSetCommand({
          StackSetName: stackSetName,
          TemplateBody: definition.templateBody,
          Capabilities: definition.capabilities,
          Description: definition.description,
          ClientRequestToken: uuidv4(),
        })
      );
      return result.StackSetId;
    } catch (error) {
      throw classifyWriteError(error, `Failed to create StackSet ${stackSetName}`);
    }
  }

  async updateStackSet(
    stackSetName: string,
    definition: ResourceDefinition,
    preferences?: OperationPreferences
  ): Promise<string> {
    let operationId: string | undefined;
    try {
      const result = await this.client.send(
        new UpdateStackSetCommand({
          StackSetName: stackSetName,
          TemplateBody: definition.templateBody,
          Capabilities: definition.capabilities,
          Description: definition.description,
          OperationPreferences: toSdkPreferences(preferences),
          OperationId: uuidv4(),
        })
      );
      operationId = result.OperationId;
    } catch (error) {
      throw classifyWriteError(error, `Failed to update StackSet ${stackSetName}`);
    }
    return requireOperationId(operationId, `UpdateStackSet on ${stackSetName}`);
  }

  async listProvisionedTargets(stackSetName: string): Promise<Set<string>> {
    const accounts = new Set<string>();
    let nextToken: string | undefined;

    try {
      do {
        const page = await this.client.send(
          new ListStackInstancesCommand({ StackSetName: stackSetName, NextToken: nextToken })
        );
        for (const summary of page.Summaries ?? []) {
          if (summary.Account) {
            accounts.add(summary.Account);
          }
        }
        nextToken = page.NextToken;
      } while (nextToken);
    } catch (error) {
      throw classifyReadError(error, `Failed to list stack instances of ${stackSetName}`);
    }

    return accounts;
  }

  async latestOperation(stackSetName: string): Promise<OperationSnapshot | undefined> {
    let summary: StackSetOperationSummary | undefined;
    try {
      const result = await this.client.send(
        new ListStackSetOperationsCommand({ StackSetName: stackSetName, MaxResults: 1 })
      );
      summary = result.Summaries?.[0];
    } catch (error) {
      throw classifyReadError(error, `Failed to list operations of ${stackSetName}`);
    }

    if (!summary?.OperationId) {
      return undefined;
    }
    return toSnapshot(summary.OperationId, summary.Status, summary.Action, summary.StatusReason);
  }

  async describeOperation(stackSetName: string, operationId: string): Promise<OperationSnapshot> {
    let operation: StackSetOperation | undefined;
    try {
      const result = await this.client.send(
        new DescribeStackSetOperationCommand({ StackSetName: stackSetName, OperationId: operationId })
      );
      operation = result.StackSetOperation;
    } catch (error) {
      throw classifyReadError(error, `Failed to describe operation ${operationId}`);
    }

    if (!operation) {
      throw new TransientReadError(`Operation ${operationId} returned no details`);
    }
    return toSnapshot(operation.OperationId ?? operationId, operation.Status, operation.Action, operation.StatusReason);
  }

  async createInstances(
    stackSetName: string,
    target: DeploymentTarget,
    options: InstanceCallOptions
  ): Promise<string> {
    let operationId: string | undefined;
    try {
      const result = await this.client.send(
        new CreateStackInstancesCommand({
          StackSetName: stackSetName,
          Accounts: [target.accountId],
          Regions: [...target.regions],
          ParameterOverrides: options.includeParameters ? target.parameters.map(p => ({ ...p })) : undefined,
          OperationPreferences: toSdkPreferences(options.operationPreferences),
          OperationId: uuidv4(),
        })
      );
      operationId = result.OperationId;
    } catch (error) {
      throw classifyWriteError(error, `Failed to create stack instances for ${target.accountId}`);
    }
    return requireOperationId(operationId, `CreateStackInstances for ${target.accountId}`);
  }

  async updateInstances(
    stackSetName: string,
    target: DeploymentTarget,
    options: InstanceCallOptions
  ): Promise<string> {
    let operationId: string | undefined;
    try {
      const result = await this.client.send(
        new UpdateStackInstancesCommand({
          StackSetName: stackSetName,
          Accounts: [target.accountId],
          Regions: [...target.regions],
          ParameterOverrides: options.includeParameters ? target.parameters.map(p => ({ ...p })) : undefined,
          OperationPreferences: toSdkPreferences(options.operationPreferences),
          OperationId: uuidv4(),
        })
      );
      operationId = result.OperationId;
    } catch (error) {
      throw classifyWriteError(error, `Failed to update stack instances for ${target.accountId}`);
    }
    return requireOperationId(operationId, `UpdateStackInstances for ${target.accountId}`);
  }
}

function requireOperationId(operationId: string | undefined, call: string): string {
  if (!operationId) {
    throw new RejectedRequestError(`${call} returned no operation id`);
  }
  return operationId;
}

function toSnapshot(
  operationId: string,
  status: string | undefined,
  action: string | undefined,
  statusReason: string | undefined
): OperationSnapshot {
  const parsed = status ? OPERATION_STATUSES[status] : undefined;
  if (!parsed) {
    throw new TransientReadError(`Operation ${operationId} reported unknown status ${status ?? '(none)'}`);
  }
  return {
    operationId,
    status: parsed,
    action: action ? OPERATION_ACTIONS[action] : undefined,
    statusReason,
  };
}

function toSdkPreferences(preferences?: OperationPreferences): SdkOperationPreferences | undefined {
  if (!preferences) {
    return undefined;
  }
  return {
    MaxConcurrentCount: preferences.maxConcurrentCount,
    FailureToleranceCount: preferences.failureToleranceCount,
    RegionConcurrencyType: preferences.regionConcurrencyType,
  };
}
