#!/usr/bin/env node

import { Command, Option } from 'commander';
import chalk from 'chalk';
import ora from 'ora';
import { readFileSync, existsSync, writeFileSync } from 'fs';
import { resolve } from 'path';
import { stringify as stringifyYaml } from 'yaml';
import { DEFAULT_CATALOG_FILES, createCatalogLoader, loadDefaultCatalog } from './config/loader.js';
import { DEFAULT_DISPLAY_NAME_PARAMETER } from './config/settings.js';
import { LoadedCatalog } from './config/types.js';
import { DriverOptions, runContinuous, runDefinitionSync, runSingleStep } from './orchestration/drivers.js';
import { describeRollout } from './orchestration/status.js';
import { ConfigError, formatErrorMessage } from './provisioning/errors.js';
import { CloudFormationStackSetGateway, createCloudFormationClient } from './provisioning/stack-set-gateway.js';
import { ConsoleReporter } from './reporting/console-reporter.js';
import {
  formatRolloutStatus,
  formatRunOutcome,
  formatStepResult,
  formatSyncResult,
  outcomeExitCode,
  stepExitCode,
  syncExitCode,
} from './reporting/summary.js';
import { DefinitionLoader } from './templates/definition-loader.js';
import { ResourceDefinition, RolloutAction, RolloutMode } from './types/index.js';

interface ApplyOptions {
  stackSet: string;
  config?: string;
  template?: string;
  description?: string;
  mode: RolloutMode;
  action: RolloutAction;
  target?: string;
  pushParameters?: boolean;
  skipSync?: boolean;
  minify?: boolean;
  profile?: string;
  region?: string;
  verbose?: boolean;
}

interface StatusOptions {
  stackSet: string;
  config?: string;
  action: RolloutAction;
  profile?: string;
  region?: string;
}

function readVersion(): string {
  const manifest: unknown = JSON.parse(readFileSync(new URL('../package.json', import.meta.url), 'utf8'));
  if (manifest && typeof manifest === 'object' && 'version' in manifest && typeof manifest.version === 'string') {
    return manifest.version;
  }
  return '0.0.0';
}

function fail(error: unknown, verbose?: boolean): never {
  console.error(chalk.red('❌ Error:'), formatErrorMessage(error));
  if (verbose && !(error instanceof ConfigError)) {
    console.error(error);
  }
  process.exit(1);
}

function loadCatalog(config?: string): Promise<LoadedCatalog> {
  return config ? createCatalogLoader().load(resolve(process.cwd(), config)) : loadDefaultCatalog();
}

const configHelp = `Path to the target catalog (default: ${DEFAULT_CATALOG_FILES.join(', ')})`;

const actionOption = () =>
  new Option('-a, --action <action>', 'Create missing instances or update provisioned ones')
    .choices(['create', 'update'])
    .default('create');

const program = new Command();

program
  .name('stackset-rollout')
  .description('Roll a CloudFormation StackSet out to a catalog of accounts, one operation at a time')
  .version(readVersion());

program
  .command('apply')
  .description('Converge stack instances toward the target catalog')
  .requiredOption('-s, --stack-set <name>', 'StackSet name')
  .option('-c, --config <path>', configHelp)
  .option('-t, --template <path>', 'Template to sync into the StackSet before instance work')
  .option('-d, --description <text>', 'StackSet description used when syncing the template')
  .addOption(
    new Option('-m, --mode <mode>', 'continuous loop, one step, or definition sync only')
      .choices(['continuous', 'step', 'sync'])
      .default('continuous')
  )
  .addOption(actionOption())
  .option('--target <accountId>', 'Only act on this account')
  .option('--push-parameters', 'Send parameter overrides with update operations')
  .option('--skip-sync', 'Do not sync the template before instance work')
  .option('--minify', 'Compact a JSON template before sending it')
  .option('--profile <name>', 'AWS credentials profile')
  .option('--region <region>', 'AWS region of the StackSet')
  .option('-v, --verbose', 'Print error causes')
  .action(async (options: ApplyOptions) => {
    const spinner = ora('Loading target catalog...').start();
    let loaded: LoadedCatalog;
    let definition: ResourceDefinition | undefined;

    try {
      loaded = await loadCatalog(options.config);
      if (options.template) {
        definition = await new DefinitionLoader().load(resolve(process.cwd(), options.template), {
          capabilities: loaded.settings.capabilities,
          description: options.description,
          minify: options.minify,
        });
      }
      if (options.mode === 'sync' && !definition) {
        throw new ConfigError('--template is required in sync mode');
      }
      spinner.succeed(`Loaded ${loaded.catalog.targets.length} targets`);
    } catch (error) {
      spinner.fail('Could not prepare the rollout');
      fail(error, options.verbose);
    }

    const reporter = new ConsoleReporter(options.verbose);
    const controller = new AbortController();
    process.once('SIGINT', () => {
      console.log(chalk.yellow('\n⏹  Stopping after the current call; started operations keep running remotely'));
      controller.abort();
    });

    const driverOptions: DriverOptions = {
      gateway: new CloudFormationStackSetGateway(
        createCloudFormationClient({ region: options.region, profile: options.profile })
      ),
      settings: loaded.settings,
      stackSetName: options.stackSet,
      targets: loaded.catalog.targets,
      displayNameParameter: loaded.catalog.displayNameParameter,
      action: options.action,
      accountId: options.target,
      pushParameters: options.pushParameters,
      reporter,
      signal: controller.signal,
    };

    try {
      const syncDefinition = definition && !options.skipSync ? definition : undefined;

      if (options.mode === 'continuous') {
        console.log(chalk.blue(`🔄 Starting continuous rollout of ${options.stackSet}...`));
        const outcome = await runContinuous({ ...driverOptions, definition: syncDefinition });
        reporter.close();
        formatRunOutcome(outcome).forEach(line => console.log(line));
        process.exit(outcomeExitCode(outcome));
      }

      if (options.mode === 'sync' || syncDefinition) {
        const sync = options.mode === 'sync' ? definition : syncDefinition;
        const synced = sync ? await runDefinitionSync({ ...driverOptions, definition: sync }) : undefined;
        reporter.close();
        if (!synced) {
          process.exit(130);
        }
        console.log(formatSyncResult(options.stackSet, synced));
        if (options.mode === 'sync' || syncExitCode(synced) !== 0) {
          process.exit(syncExitCode(synced));
        }
      }

      const result = await runSingleStep(driverOptions);
      reporter.close();
      formatStepResult(result).forEach(line => console.log(line));
      process.exit(stepExitCode(result));
    } catch (error) {
      reporter.close();
      fail(error, options.verbose);
    }
  });

program
  .command('status')
  .description('Show deployed and remaining targets without changing anything')
  .requiredOption('-s, --stack-set <name>', 'StackSet name')
  .option('-c, --config <path>', configHelp)
  .addOption(actionOption())
  .option('--profile <name>', 'AWS credentials profile')
  .option('--region <region>', 'AWS region of the StackSet')
  .action(async (options: StatusOptions) => {
    const spinner = ora('Checking rollout status...').start();

    try {
      const { catalog } = await loadCatalog(options.config);
      const gateway = new CloudFormationStackSetGateway(
        createCloudFormationClient({ region: options.region, profile: options.profile })
      );
      const status = await describeRollout(
        gateway,
        options.stackSet,
        catalog.targets,
        catalog.displayNameParameter,
        options.action
      );
      spinner.succeed(`Status check completed for StackSet: ${options.stackSet}`);
      formatRolloutStatus(options.stackSet, status).forEach(line => console.log(line));
    } catch (error) {
      spinner.fail('Status check failed');
      fail(error);
    }
  });

program
  .command('init')
  .description('Write a sample target catalog')
  .option('-o, --output <path>', 'Output catalog file path', 'account-parameters.json')
  .option('-f, --force', 'Overwrite an existing file')
  .action((options: { output: string; force?: boolean }) => {
    const spinner = ora('Writing sample catalog...').start();

    try {
      if (existsSync(options.output) && !options.force) {
        throw new ConfigError(`${options.output} already exists (use --force to overwrite)`);
      }

      const sample = {
        displayNameParameter: DEFAULT_DISPLAY_NAME_PARAMETER,
        accounts: [
          {
            accountId: '111111111111',
            regions: ['us-east-1'],
            parameters: [
              { ParameterKey: DEFAULT_DISPLAY_NAME_PARAMETER, ParameterValue: 'sandbox' },
              { ParameterKey: 'RecipientEmailAddresses', ParameterValue: 'ops@example.com' },
            ],
          },
        ],
      };

      const content = options.output.endsWith('.json')
        ? `${JSON.stringify(sample, null, 2)}\n`
        : stringifyYaml(sample);
      writeFileSync(options.output, content);

      spinner.succeed(`Catalog file created: ${options.output}`);
      console.log(chalk.green('\n✅ Next steps:'));
      console.log('1. List your accounts, regions and parameter overrides');
      console.log('2. Ensure your AWS credentials are configured');
      console.log(`3. Run: ${chalk.cyan('stackset-rollout apply --stack-set <name> --template <file>')}`);
    } catch (error) {
      spinner.fail('Initialization failed');
      fail(error);
    }
  });

// Error handling for unknown commands
program.on('command:*', () => {
  console.error(chalk.red('❌ Invalid command. See --help for available commands.'));
  process.exit(1);
});

if (!process.argv.slice(2).length) {
  program.outputHelp();
} else {
  program.parseAsync().catch(error => fail(error));
}
