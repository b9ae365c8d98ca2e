/**
 * Dedicated host cost retrieval from AWS Cost Explorer.
 */

import { GetCostAndUsageCommand, type GetCostAndUsageCommandInput } from '@aws-sdk/client-cost-explorer';
import type { CostTable } from '@shared/types';
import type { AwsClientFactory } from '@shared/awsClients';
import { setupLogger } from '@shared/utils/logger';
import { formatIsoDate } from '@shared/utils/time';

const logger = setupLogger('dh-cost:costs');

export const EC2_COMPUTE_SERVICE = 'Amazon Elastic Compute Cloud - Compute';

// Usage types such as "USE1-HostUsage:m5" or "EUW1-HostUsage:c5"
export const HOST_USAGE_MARKER = 'HostUsage';

const COST_METRIC = 'BlendedCost';

/**
 * Builds the cost table key for a region and usage type.
 */
export function costKey(region: string, usageType: string): string {
  return `${region}:${usageType}`;
}

export class CostRetriever {
  private readonly clients: AwsClientFactory;

  constructor(clients: AwsClientFactory) {
    this.clients = clients;
  }

  /**
   * Fetches dedicated host costs for a billing window.
   *
   * Groups by usage type and region at monthly granularity and keeps only
   * dedicated host usage types. Amounts for the same key are summed across
   * the monthly periods. Request failures propagate.
   *
   * @param start - Window start (inclusive)
   * @param end - Window end (exclusive)
   * @returns Cost per "<region>:<usageType>"
   */
  async getCosts(start: Date, end: Date): Promise<CostTable> {
    logger.info({ start: formatIsoDate(start), end: formatIsoDate(end) }, 'Fetching cost data');

    const client = this.clients.costExplorer();
    const costs: CostTable = new Map();
    let nextPageToken: string | undefined;

    do {
      const input: GetCostAndUsageCommandInput = {
        TimePeriod: {
          Start: formatIsoDate(start),
          End: formatIsoDate(end),
        },
        Granularity: 'MONTHLY',
        Metrics: [COST_METRIC],
        GroupBy: [
          { Type: 'DIMENSION', Key: 'USAGE_TYPE' },
          { Type: 'DIMENSION', Key: 'REGION' },
        ],
        Filter: {
          Dimensions: {
            Key: 'SERVICE',
            Values: [EC2_COMPUTE_SERVICE],
          },
        },
        NextPageToken: nextPageToken,
      };

      const response = await client.send(new GetCostAndUsageCommand(input));

      for (const result of response.ResultsByTime ?? []) {
        for (const group of result.Groups ?? []) {
          const [usageType, region] = group.Keys ?? [];
          if (!usageType || !region || !usageType.includes(HOST_USAGE_MARKER)) continue;

          const amount = Number.parseFloat(group.Metrics?.[COST_METRIC]?.Amount ?? '0');
          if (Number.isNaN(amount)) {
            logger.warn({ usageType, region }, 'Ignoring non-numeric cost amount');
            continue;
          }

          const key = costKey(region, usageType);
          costs.set(key, (costs.get(key) ?? 0) + amount);
        }
      }

      nextPageToken = response.NextPageToken;
    } while (nextPageToken);

    logger.info(`Found costs for ${costs.size} host types`);
    return costs;
  }
}
