/**
 * Multi-account orchestrator.
 *
 * Runs the single-account pipeline once per configured account under that
 * account's assumed role, then writes one consolidated report. Each account
 * moves PENDING → ROLE_ASSUMED → DISCOVERED → COSTED → ALLOCATED, or stops
 * at SKIPPED. A skipped account contributes no records and never stops the
 * accounts after it.
 */

import type {
  AccountContext,
  AccountRunResult,
  AccountState,
  AllocationMethod,
  AllocationRecord,
  ScopedCredentials,
} from '@shared/types';
import { createClientFactory, type AwsClientFactory } from '@shared/awsClients';
import { StsRoleCredentialProvider, type CredentialProvider } from '@shared/credentials';
import { setupLogger } from '@shared/utils/logger';
import { Orchestrator } from './orchestrator';
import { formatCost, generateMultiAccountReport } from './report';

const logger = setupLogger('dh-cost:multi-account');

export const ACCOUNT_TAG_KEY = 'Account';

export interface MultiAccountSettings {
  accounts: AccountContext[];
  tagKeys: string[];
  method: AllocationMethod;
  daysBack: number;
}

export interface MultiAccountRunOptions {
  /**
   * Account ids to process; every configured account when omitted or empty.
   */
  accountFilter?: string[];
  outputPath?: string;
  now?: Date;
}

export interface MultiAccountResult {
  accounts: AccountRunResult[];
  records: AllocationRecord[];
  reportPath?: string;
}

/**
 * Adds the account tag key so every record gets an account column.
 */
export function withAccountTagKey(tagKeys: string[]): string[] {
  return tagKeys.includes(ACCOUNT_TAG_KEY) ? [...tagKeys] : [...tagKeys, ACCOUNT_TAG_KEY];
}

/**
 * Stamps records with the account they were produced for.
 */
export function stampAccount(records: AllocationRecord[], account: AccountContext): AllocationRecord[] {
  return records.map((record) => ({
    ...record,
    tags: { ...record.tags, [ACCOUNT_TAG_KEY.toLowerCase()]: account.accountName },
    accountId: account.accountId,
    accountName: account.accountName,
  }));
}

export class MultiAccountOrchestrator {
  private readonly settings: MultiAccountSettings;
  private readonly tagKeys: string[];
  private readonly credentials: CredentialProvider;
  private readonly createClients: (credentials: ScopedCredentials) => AwsClientFactory;

  /**
   * @param settings - Accounts and allocation settings
   * @param credentials - Source of per-account credentials; STS role assumption by default
   * @param createClients - Builds one account's clients from its credentials
   */
  constructor(
    settings: MultiAccountSettings,
    credentials: CredentialProvider = new StsRoleCredentialProvider(),
    createClients: (credentials: ScopedCredentials) => AwsClientFactory = createClientFactory
  ) {
    this.settings = settings;
    this.tagKeys = withAccountTagKey(settings.tagKeys);
    this.credentials = credentials;
    this.createClients = createClients;
  }

  /**
   * Runs discovery and allocation for one account. Never throws.
   */
  async processAccount(account: AccountContext, now: Date = new Date()): Promise<AccountRunResult> {
    const { accountId, accountName } = account;
    let state: AccountState = 'PENDING';
    const transition = (next: AccountState): void => {
      state = next;
      logger.debug({ accountId, state }, 'Account state changed');
    };
    const skip = (reason: string): AccountRunResult => {
      logger.warn({ accountId, accountName, state, reason }, 'Skipping account');
      return { account, state: 'SKIPPED', records: [], error: reason };
    };

    logger.info({ accountId, accountName, regions: account.regions }, 'Processing account');
    console.log(`\nProcessing account: ${accountName} (${accountId})`);

    let credentials: ScopedCredentials;
    try {
      credentials = await this.credentials.getCredentials(account);
    } catch (error) {
      logger.error({ accountId, error: String(error) }, 'Role assumption failed');
      return skip(`Role assumption failed: ${error instanceof Error ? error.message : String(error)}`);
    }
    transition('ROLE_ASSUMED');

    try {
      // Fresh clients per account; credentials are never shared across accounts
      const orchestrator = new Orchestrator(
        {
          regions: account.regions,
          tagKeys: this.tagKeys,
          method: this.settings.method,
          daysBack: this.settings.daysBack,
        },
        this.createClients(credentials)
      );

      const hosts = await orchestrator.discover();
      if (hosts.size === 0) {
        console.log(`  No dedicated hosts found in ${accountName}`);
        return skip('No dedicated hosts found');
      }
      transition('DISCOVERED');

      const window = orchestrator.billingWindow(now);
      const costTable = await orchestrator.fetchCosts(window);
      transition('COSTED');

      const records = stampAccount(await orchestrator.allocate(hosts, costTable, window), account);
      transition('ALLOCATED');

      let instanceCount = 0;
      for (const host of hosts.values()) {
        instanceCount += host.instances.length;
      }
      const allocated = records.reduce((sum, record) => sum + record.allocatedCost, 0);
      console.log(`  Found ${hosts.size} hosts, ${instanceCount} instances`);
      console.log(`  Allocated ${formatCost(allocated)}`);
      console.log(`  Processed ${records.length} instances`);

      return { account, state: 'ALLOCATED', records };
    } catch (error) {
      logger.error({ accountId, state, error: String(error) }, 'Failed to process account');
      return skip(error instanceof Error ? error.message : String(error));
    }
  }

  /**
   * Processes every selected account in order and writes the consolidated report.
   */
  async run(options: MultiAccountRunOptions = {}): Promise<MultiAccountResult> {
    const now = options.now ?? new Date();
    const filter = options.accountFilter ?? [];
    const accounts =
      filter.length > 0
        ? this.settings.accounts.filter((account) => filter.includes(account.accountId))
        : this.settings.accounts;

    if (filter.length > 0) {
      console.log(`Processing filtered accounts: ${accounts.map((account) => account.accountId).join(', ')}`);
    }
    logger.info({ accounts: accounts.length, method: this.settings.method }, 'Starting multi-account allocation');

    const results: AccountRunResult[] = [];
    for (const account of accounts) {
      results.push(await this.processAccount(account, now));
    }

    const records = results.flatMap((result) => result.records);
    const summary = {
      processed: results.filter((result) => result.state === 'ALLOCATED').length,
      skipped: results.filter((result) => result.state === 'SKIPPED').length,
      records: records.length,
    };
    logger.info(summary, 'Multi-account allocation completed');

    if (records.length === 0) {
      console.log('\nNo costs found across all accounts');
      return { accounts: results, records };
    }

    const reportPath = await generateMultiAccountReport(records, this.settings.method, {
      tagKeys: this.tagKeys,
      outputPath: options.outputPath,
      now,
    });

    return { accounts: results, records, reportPath };
  }
}
