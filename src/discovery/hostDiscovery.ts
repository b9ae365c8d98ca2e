/**
 * Dedicated host and instance discovery.
 *
 * Lists dedicated hosts region by region, then attaches the host-tenancy
 * instances placed on them. A region that fails is logged and skipped so the
 * remaining regions still produce results.
 */

import {
  DescribeHostsCommand,
  DescribeInstancesCommand,
  type Host as Ec2Host,
  type Instance as Ec2Instance,
} from '@aws-sdk/client-ec2';
import type { Host, HostMap, Instance } from '@shared/types';
import type { AwsClientFactory } from '@shared/awsClients';
import { setupLogger } from '@shared/utils/logger';
import { toNaiveUtc } from '@shared/utils/time';

const logger = setupLogger('dh-cost:collector');

const UNKNOWN_FAMILY = 'Unknown';

/**
 * Builds the map key for a host.
 */
export function hostKey(region: string, hostId: string): string {
  return `${region}:${hostId}`;
}

/**
 * Resolves the instance family a host supports.
 *
 * Prefers the reported family; otherwise takes the part of the reported
 * instance type before the first dot ("c5.large" → "c5").
 */
export function resolveHostFamily(host: Ec2Host): string {
  const properties = host.HostProperties;
  if (properties?.InstanceFamily) {
    return properties.InstanceFamily;
  }
  if (properties?.InstanceType) {
    return properties.InstanceType.split('.')[0];
  }
  return UNKNOWN_FAMILY;
}

export class HostDiscovery {
  private readonly clients: AwsClientFactory;
  private readonly regions: string[];

  /**
   * @param clients - Client factory for the account being scanned
   * @param regions - Regions to scan, one at a time
   */
  constructor(clients: AwsClientFactory, regions: string[]) {
    this.clients = clients;
    this.regions = regions;
  }

  /**
   * Discovers all dedicated hosts across the configured regions.
   *
   * @returns Hosts keyed by "<region>:<hostId>", each with an empty instance list
   */
  async discoverHosts(): Promise<HostMap> {
    logger.info(`Discovering dedicated hosts in ${this.regions.length} region(s): ${this.regions.join(', ')}`);
    const hosts: HostMap = new Map();

    for (const region of this.regions) {
      try {
        const regionHosts = await this.describeHosts(region);
        for (const host of regionHosts) {
          hosts.set(hostKey(region, host.hostId), host);
        }
        logger.info({ region, count: regionHosts.length }, `Found ${regionHosts.length} hosts in ${region}`);
      } catch (error) {
        logger.error({ region, error: String(error) }, 'Failed to describe hosts; skipping region');
      }
    }

    return hosts;
  }

  /**
   * Attaches host-tenancy instances to the hosts they are placed on.
   *
   * Instances placed on a host that was not discovered are ignored.
   *
   * @param hosts - Hosts from discoverHosts(); their instance lists are filled in place
   * @returns The same map
   */
  async attachInstances(hosts: HostMap): Promise<HostMap> {
    logger.info('Mapping instances to hosts');

    for (const region of this.regions) {
      try {
        for (const instance of await this.describeHostTenancyInstances(region)) {
          const hostId = instance.Placement?.HostId;
          if (!hostId) continue;

          const host = hosts.get(hostKey(region, hostId));
          if (!host) continue;

          const mapped = HostDiscovery.toInstance(instance, region);
          if (mapped) {
            host.instances.push(mapped);
          }
        }
      } catch (error) {
        logger.error({ region, error: String(error) }, 'Failed to describe instances; skipping region');
      }
    }

    let total = 0;
    for (const host of hosts.values()) {
      total += host.instances.length;
    }
    logger.info(`Found ${total} instances on dedicated hosts`);

    return hosts;
  }

  private async describeHosts(region: string): Promise<Host[]> {
    const client = this.clients.ec2(region);
    const hosts: Host[] = [];
    let nextToken: string | undefined;

    do {
      const response = await client.send(new DescribeHostsCommand({ NextToken: nextToken }));

      for (const host of response.Hosts ?? []) {
        if (!host.HostId) continue;
        hosts.push({
          region,
          hostId: host.HostId,
          hostFamily: resolveHostFamily(host),
          state: host.State ?? 'unknown',
          instances: [],
        });
      }

      nextToken = response.NextToken;
    } while (nextToken);

    return hosts;
  }

  private async describeHostTenancyInstances(region: string): Promise<Ec2Instance[]> {
    const client = this.clients.ec2(region);
    const instances: Ec2Instance[] = [];
    let nextToken: string | undefined;

    do {
      const response = await client.send(
        new DescribeInstancesCommand({
          Filters: [{ Name: 'tenancy', Values: ['host'] }],
          NextToken: nextToken,
        })
      );

      for (const reservation of response.Reservations ?? []) {
        instances.push(...(reservation.Instances ?? []));
      }

      nextToken = response.NextToken;
    } while (nextToken);

    return instances;
  }

  private static toInstance(instance: Ec2Instance, region: string): Instance | undefined {
    if (!instance.InstanceId || !instance.InstanceType || !instance.LaunchTime) {
      logger.warn({ region, instanceId: instance.InstanceId }, 'Instance response missing id, type or launch time');
      return undefined;
    }

    const tags: Record<string, string> = {};
    for (const tag of instance.Tags ?? []) {
      if (tag.Key !== undefined && tag.Value !== undefined) {
        tags[tag.Key] = tag.Value;
      }
    }

    return {
      instanceId: instance.InstanceId,
      instanceType: instance.InstanceType,
      region,
      tags,
      launchTime: toNaiveUtc(instance.LaunchTime),
    };
  }
}
