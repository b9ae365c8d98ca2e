/**
 * Dedicated host cost allocation engine.
 *
 * Splits each host's billed cost across the instances placed on it, either
 * evenly or weighted by vCPU count and runtime. Holds no state between calls
 * apart from the vCPU lookup it is given.
 */

import type {
  AllocationLabel,
  AllocationMethod,
  AllocationRecord,
  BillingWindow,
  CostTable,
  Host,
  HostMap,
  Instance,
} from '@shared/types';
import type { VcpuLookup } from '@discovery/vcpuResolver';
import { setupLogger } from '@shared/utils/logger';
import { hoursBetween } from '@shared/utils/time';

const logger = setupLogger('dh-cost:allocator');

// 30 days, used when no billing window is supplied
export const DEFAULT_BILLING_HOURS = 720;

export const UNKNOWN_TAG_VALUE = 'Unknown';

const METHOD_LABELS: Record<AllocationMethod, AllocationLabel> = {
  equal: 'equal_split',
  weighted: 'vcpu_weighted',
};

/**
 * Rounds half away from zero to a fixed number of decimal places.
 */
export function roundTo(value: number, digits: number): number {
  const factor = 10 ** digits;
  return Math.round((value + Number.EPSILON * Math.sign(value)) * factor) / factor;
}

/**
 * Finds the cost entry for a host.
 *
 * The first entry, in table order, whose key contains both the host's region
 * and its family wins. Substring matching means "c5" also matches "c5n" keys.
 *
 * @returns Matched amount, or undefined when no key matches
 */
export function findHostCost(host: Host, costTable: CostTable): number | undefined {
  for (const [key, amount] of costTable) {
    if (key.includes(host.region) && key.includes(host.hostFamily)) {
      return amount;
    }
  }
  return undefined;
}

/**
 * Hours an instance was present in the billing window.
 *
 * Launches before the window start count the whole window. Later launches
 * count the hours up to the window end, capped at the window length and
 * never negative. Without a window every instance counts the full default period.
 */
export function runtimeHours(launchTime: Date, window: BillingWindow | undefined, billingHours: number): number {
  if (!window) {
    return billingHours;
  }
  const runtime =
    launchTime < window.start ? billingHours : Math.min(billingHours, hoursBetween(launchTime, window.end));
  return Math.max(0, runtime);
}

export class CostAllocator {
  private readonly vcpus: VcpuLookup;
  private readonly tagKeys: string[];

  /**
   * @param vcpus - vCPU lookup used by the weighted method
   * @param tagKeys - Tag keys copied onto every record
   */
  constructor(vcpus: VcpuLookup, tagKeys: string[]) {
    this.vcpus = vcpus;
    this.tagKeys = tagKeys;
  }

  /**
   * Allocates host costs to instances.
   *
   * Hosts without instances produce nothing. Hosts whose cost cannot be
   * matched, or match a zero amount, are skipped entirely.
   *
   * @param hosts - Hosts with their instances attached
   * @param costTable - Dedicated host costs for the window
   * @param method - Allocation policy
   * @param window - Billing window; the default 720-hour period applies when omitted
   * @returns One record per instance on every costed host
   */
  async allocate(
    hosts: HostMap,
    costTable: CostTable,
    method: AllocationMethod,
    window?: BillingWindow
  ): Promise<AllocationRecord[]> {
    logger.info({ method }, `Calculating costs using ${method} allocation`);

    const billingHours = window ? hoursBetween(window.start, window.end) : DEFAULT_BILLING_HOURS;
    const records: AllocationRecord[] = [];

    for (const host of hosts.values()) {
      if (host.instances.length === 0) continue;

      const hostCost = findHostCost(host, costTable);
      if (!hostCost) {
        logger.warn({ hostId: host.hostId, region: host.region, hostFamily: host.hostFamily }, 'No cost found for host');
        continue;
      }

      const runtimes = new Map<string, number>();
      for (const instance of host.instances) {
        runtimes.set(instance.instanceId, runtimeHours(instance.launchTime, window, billingHours));
      }
      const runtimeOf = (instance: Instance): number => runtimes.get(instance.instanceId) ?? 0;

      if (method === 'equal') {
        const costPerInstance = hostCost / host.instances.length;
        for (const instance of host.instances) {
          const runtime = runtimeOf(instance);
          const allocated = costPerInstance * (runtime / billingHours);
          records.push(this.createRecord(host, instance, allocated, method, runtime, billingHours));
        }
        continue;
      }

      const weights = new Map<string, number>();
      let totalWeightedRuntime = 0;
      for (const instance of host.instances) {
        const vcpus = await this.vcpus.resolve(instance.instanceType, instance.region);
        weights.set(instance.instanceId, vcpus);
        totalWeightedRuntime += vcpus * runtimeOf(instance);
      }

      for (const instance of host.instances) {
        const vcpus = weights.get(instance.instanceId) ?? 0;
        const runtime = runtimeOf(instance);
        const allocated = totalWeightedRuntime > 0 ? hostCost * ((vcpus * runtime) / totalWeightedRuntime) : 0;
        records.push(this.createRecord(host, instance, allocated, method, runtime, billingHours, vcpus));
      }
    }

    logger.info(`Allocated costs to ${records.length} instances`);
    return records;
  }

  private createRecord(
    host: Host,
    instance: Instance,
    cost: number,
    method: AllocationMethod,
    runtime: number,
    billingHours: number,
    vcpus?: number
  ): AllocationRecord {
    const record: AllocationRecord = {
      region: host.region,
      hostId: host.hostId,
      instanceId: instance.instanceId,
      instanceType: instance.instanceType,
      allocatedCost: roundTo(cost, 2),
      allocationMethod: METHOD_LABELS[method],
      runtimeHours: roundTo(runtime, 1),
      billingPeriodHours: roundTo(billingHours, 1),
      tags: {},
    };

    if (vcpus !== undefined) {
      record.vcpuCount = vcpus;
      record.hourlyRate = runtime > 0 ? roundTo(cost / runtime, 4) : 0;
    }

    for (const tagKey of this.tagKeys) {
      record.tags[tagKey.toLowerCase()] = instance.tags[tagKey] ?? UNKNOWN_TAG_VALUE;
    }

    return record;
  }
}
