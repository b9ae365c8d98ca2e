/**
 * Instance type to vCPU count resolution.
 *
 * Asks EC2 for the default vCPU count of an instance type and falls back to
 * the size suffix of the type name when the lookup fails or returns nothing.
 * Results are memoized per (region, instance type) for the lifetime of the
 * resolver.
 */

import { DescribeInstanceTypesCommand } from '@aws-sdk/client-ec2';
import { LRUCache } from 'lru-cache';
import type { AwsClientFactory } from '@shared/awsClients';
import { setupLogger } from '@shared/utils/logger';

const logger = setupLogger('dh-cost:vcpu');

export const DEFAULT_VCPUS = 2;

/**
 * vCPU count by instance size suffix.
 */
export const SIZE_VCPUS: Readonly<Record<string, number>> = {
  nano: 1,
  micro: 1,
  small: 1,
  medium: 2,
  large: 2,
  xlarge: 4,
  '2xlarge': 8,
  '3xlarge': 12,
  '4xlarge': 16,
  '6xlarge': 24,
  '8xlarge': 32,
  '12xlarge': 48,
  '16xlarge': 64,
};

/**
 * Estimates vCPUs from the size suffix ("m5.2xlarge" → 8).
 * Unknown suffixes and names without a dot give DEFAULT_VCPUS.
 */
export function vcpusFromTypeName(instanceType: string): number {
  const dot = instanceType.indexOf('.');
  if (dot === -1) {
    return DEFAULT_VCPUS;
  }
  return SIZE_VCPUS[instanceType.slice(dot + 1)] ?? DEFAULT_VCPUS;
}

/**
 * Anything that can weigh an instance type by its vCPU count.
 */
export interface VcpuLookup {
  resolve(instanceType: string, region: string): Promise<number>;
}

export class VcpuResolver implements VcpuLookup {
  private readonly clients: AwsClientFactory;
  private readonly cache = new LRUCache<string, number>({ max: 1024 });

  constructor(clients: AwsClientFactory) {
    this.clients = clients;
  }

  /**
   * Resolves the vCPU count of an instance type. Never throws.
   *
   * @returns vCPU count, at least 1
   */
  async resolve(instanceType: string, region: string): Promise<number> {
    const cacheKey = `${region}:${instanceType}`;
    const cached = this.cache.get(cacheKey);
    if (cached !== undefined) {
      return cached;
    }

    const vcpus = (await this.lookup(instanceType, region)) ?? vcpusFromTypeName(instanceType);
    this.cache.set(cacheKey, vcpus);
    return vcpus;
  }

  private async lookup(instanceType: string, region: string): Promise<number | undefined> {
    try {
      const response = await this.clients
        .ec2(region)
        .send(
          new DescribeInstanceTypesCommand({
            Filters: [{ Name: 'instance-type', Values: [instanceType] }],
          })
        );

      // A name filter takes any type string, including ones newer than this SDK release
      const vcpus = response.InstanceTypes?.[0]?.VCpuInfo?.DefaultVCpus;
      if (vcpus === undefined || vcpus < 1) {
        logger.warn({ instanceType, region }, 'No vCPU info returned; estimating vCPUs from size');
        return undefined;
      }
      return vcpus;
    } catch (error) {
      logger.warn({ instanceType, region, error: String(error) }, 'Could not get vCPU count; estimating from size');
      return undefined;
    }
  }
}
