/**
 * Command-line interface.
 *
 * `allocate` (the default command) covers the current account;
 * `multi-account` assumes a role in each configured account and writes one
 * consolidated report. Flags take precedence over the config file.
 */

import { Command, Option } from 'commander';
import type { AllocationMethod } from '@shared/types';
import {
  DEFAULT_CONFIG_FILE,
  loadConfig,
  loadMultiAccountConfig,
  resolveSettings,
  toAccountContext,
  ConfigValidationError,
} from '@core/config';
import { Orchestrator } from '@core/orchestrator';
import { MultiAccountOrchestrator } from '@core/multiAccount';
import { setupLogger } from '@shared/utils/logger';
import { ALLOCATION_METHODS, parseDaysBack, parseList } from './options';

const logger = setupLogger('dh-cost:cli');

export const REQUIRED_PERMISSIONS = [
  'ec2:DescribeHosts',
  'ec2:DescribeInstances',
  'ec2:DescribeInstanceTypes',
  'ce:GetCostAndUsage',
];

export const MULTI_ACCOUNT_TROUBLESHOOTING = [
  "Ensure the config file has an 'accounts' section",
  'Verify the IAM roles exist in the target accounts',
  'Check the trust relationships allow role assumption (sts:AssumeRole)',
  `Grant the assumed roles: ${REQUIRED_PERMISSIONS.join(', ')}`,
];

export interface AllocateCommandOptions {
  config: string;
  regions?: string[];
  tags?: string[];
  method?: AllocationMethod;
  daysBack?: number;
  output?: string;
}

export interface MultiAccountCommandOptions extends AllocateCommandOptions {
  accounts?: string[];
}

function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

/**
 * Runs the single-account allocation.
 */
export async function allocateCommand(options: AllocateCommandOptions): Promise<void> {
  try {
    const config = await loadConfig(options.config);
    const settings = resolveSettings(config, {
      regions: options.regions,
      tagKeys: options.tags,
      method: options.method,
      daysBack: options.daysBack,
    });

    if (settings.regions.length === 0) {
      throw new ConfigValidationError('No regions specified. Set regions in the config file or pass --regions.');
    }

    console.log('AWS Dedicated Host Cost Allocator');
    console.log('='.repeat(40));
    console.log('Configuration:');
    console.log(`  Regions: ${settings.regions.join(', ')}`);
    console.log(`  Tag Keys: ${settings.tagKeys.join(', ')}`);
    console.log(`  Method: ${settings.method}`);
    console.log(`  Days Back: ${settings.daysBack}`);
    console.log();

    await new Orchestrator(settings).run({ outputPath: options.output });
  } catch (error) {
    logger.error({ error: String(error) }, 'Cost allocation failed');
    console.error(`Error: ${errorMessage(error)}`);
    console.error('\nRequired AWS permissions:');
    for (const permission of REQUIRED_PERMISSIONS) {
      console.error(`- ${permission}`);
    }
    process.exitCode = 1;
  }
}

/**
 * Runs the allocation across every configured account.
 */
export async function multiAccountCommand(options: MultiAccountCommandOptions): Promise<void> {
  try {
    const config = await loadMultiAccountConfig(options.config);
    const fallbackRegions = config.regions ?? [];
    const accounts = config.accounts.map((account) =>
      toAccountContext(options.regions ? { ...account, regions: options.regions } : account, fallbackRegions)
    );
    const settings = resolveSettings(config, {
      tagKeys: options.tags,
      method: options.method,
      daysBack: options.daysBack,
    });

    console.log('AWS Dedicated Host Cost Allocator - Multi-Account');
    console.log('='.repeat(50));
    console.log(`Multi-account cost allocator initialized for ${accounts.length} accounts`);

    const orchestrator = new MultiAccountOrchestrator({
      accounts,
      tagKeys: settings.tagKeys,
      method: settings.method,
      daysBack: settings.daysBack,
    });
    const result = await orchestrator.run({
      accountFilter: options.accounts,
      outputPath: options.output,
    });

    console.log(`\nMulti-account processing complete: ${result.records.length} total cost allocations`);
  } catch (error) {
    logger.error({ error: String(error) }, 'Multi-account cost allocation failed');
    console.error(`Error: ${errorMessage(error)}`);
    console.error('\nTroubleshooting:');
    MULTI_ACCOUNT_TROUBLESHOOTING.forEach((step, index) => {
      console.error(`${index + 1}. ${step}`);
    });
    process.exitCode = 1;
  }
}

function addSharedOptions(command: Command): Command {
  return command
    .option('-c, --config <path>', 'configuration file', DEFAULT_CONFIG_FILE)
    .option('-r, --regions <regions>', 'comma-separated AWS regions (overrides config)', parseList)
    .option('-t, --tags <keys>', 'comma-separated tag keys for grouping (overrides config)', parseList)
    .addOption(new Option('-m, --method <method>', 'allocation method').choices(ALLOCATION_METHODS))
    .option('-d, --days-back <days>', 'days of cost data to analyze', parseDaysBack)
    .option('-o, --output <path>', 'CSV report path (default: timestamped file name)');
}

/**
 * Builds the CLI program.
 */
export function createProgram(): Command {
  const program = new Command();

  program
    .name('dh-cost-allocator')
    .description('Allocate AWS Dedicated Host costs to the EC2 instances running on them')
    .version('1.0.0');

  addSharedOptions(
    program
      .command('allocate', { isDefault: true })
      .description('allocate dedicated host costs in the current account')
  ).action(allocateCommand);

  addSharedOptions(
    program
      .command('multi-account')
      .description('allocate dedicated host costs across the accounts listed in the config file')
  )
    .option('-a, --accounts <ids>', 'comma-separated account ids to process (default: all)', parseList)
    .action(multiAccountCommand);

  program.addHelpText(
    'after',
    `
Examples:
  $ dh-cost-allocator
  $ dh-cost-allocator allocate --method equal
  $ dh-cost-allocator allocate --regions us-east-1,eu-west-1
  $ dh-cost-allocator multi-account --accounts 111111111111,222222222222
  $ dh-cost-allocator multi-account --config multi-account.yaml --days-back 60`
  );

  return program;
}
