/**
 * Single-account orchestrator.
 *
 * Coordinates host discovery, cost retrieval, allocation and reporting for
 * one set of AWS clients. The multi-account orchestrator drives the same
 * steps once per account.
 */

import type { AllocationRecord, BillingWindow, CostTable, HostMap, RunSettings } from '@shared/types';
import { createClientFactory, type AwsClientFactory } from '@shared/awsClients';
import { HostDiscovery } from '@discovery/hostDiscovery';
import { CostRetriever } from '@discovery/costRetriever';
import { VcpuResolver } from '@discovery/vcpuResolver';
import { setupLogger } from '@shared/utils/logger';
import { billingWindowEndingAt, formatIsoDate } from '@shared/utils/time';
import { CostAllocator } from './allocator';
import { generateReport } from './report';

const logger = setupLogger('dh-cost:orchestrator');

export interface RunOptions {
  outputPath?: string;
  now?: Date;
}

export class Orchestrator {
  private readonly settings: RunSettings;
  private readonly discovery: HostDiscovery;
  private readonly costs: CostRetriever;
  private readonly allocator: CostAllocator;

  /**
   * @param settings - Effective run settings
   * @param clients - Client factory for the account; the default credential chain when omitted
   */
  constructor(settings: RunSettings, clients: AwsClientFactory = createClientFactory()) {
    this.settings = settings;
    this.discovery = new HostDiscovery(clients, settings.regions);
    this.costs = new CostRetriever(clients);
    this.allocator = new CostAllocator(new VcpuResolver(clients), settings.tagKeys);
  }

  /**
   * Billing window reaching back the configured number of days from `now`.
   */
  billingWindow(now: Date = new Date()): BillingWindow {
    return billingWindowEndingAt(now, this.settings.daysBack);
  }

  /**
   * Discovers hosts and attaches their instances.
   *
   * @returns Hosts keyed by "<region>:<hostId>"; empty when no hosts exist
   */
  async discover(): Promise<HostMap> {
    const hosts = await this.discovery.discoverHosts();
    if (hosts.size === 0) {
      return hosts;
    }
    return this.discovery.attachInstances(hosts);
  }

  /**
   * Fetches dedicated host costs for the window. Failures propagate.
   */
  async fetchCosts(window: BillingWindow): Promise<CostTable> {
    return this.costs.getCosts(window.start, window.end);
  }

  /**
   * Allocates costs with the configured method.
   */
  async allocate(hosts: HostMap, costTable: CostTable, window: BillingWindow): Promise<AllocationRecord[]> {
    return this.allocator.allocate(hosts, costTable, this.settings.method, window);
  }

  /**
   * Runs discovery, cost retrieval, allocation and reporting.
   *
   * @returns Allocation records; empty when no dedicated hosts were found
   */
  async run(options: RunOptions = {}): Promise<AllocationRecord[]> {
    const window = this.billingWindow(options.now);
    logger.info(
      {
        regions: this.settings.regions,
        method: this.settings.method,
        start: formatIsoDate(window.start),
        end: formatIsoDate(window.end),
      },
      'Starting cost allocation'
    );

    const hosts = await this.discover();
    if (hosts.size === 0) {
      console.log('No dedicated hosts found in specified regions');
      return [];
    }

    const costTable = await this.fetchCosts(window);
    const records = await this.allocate(hosts, costTable, window);

    await generateReport(records, {
      tagKeys: this.settings.tagKeys,
      outputPath: options.outputPath,
      now: options.now,
    });

    logger.info({ hosts: hosts.size, records: records.length }, 'Cost allocation completed');
    return records;
  }
}
