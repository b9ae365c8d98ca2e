/**
 * AWS client construction for one account.
 *
 * A factory is bound to one credential set (or the default provider chain)
 * and hands out region-scoped EC2 clients plus the Cost Explorer client.
 * Clients are created lazily and reused for the lifetime of the factory.
 */

import { EC2Client } from '@aws-sdk/client-ec2';
import { CostExplorerClient } from '@aws-sdk/client-cost-explorer';
import type { ScopedCredentials } from './types';

// Cost Explorer is a global service served from us-east-1
export const COST_EXPLORER_REGION = 'us-east-1';

export interface AwsClientFactory {
  ec2(region: string): EC2Client;
  costExplorer(): CostExplorerClient;
}

/**
 * Creates a client factory.
 *
 * @param credentials - Scoped credentials from role assumption; omitted to use the default chain
 */
export function createClientFactory(credentials?: ScopedCredentials): AwsClientFactory {
  const ec2Clients = new Map<string, EC2Client>();
  let costExplorerClient: CostExplorerClient | undefined;
  const credentialConfig = credentials ? { credentials } : {};

  return {
    ec2(region: string): EC2Client {
      let client = ec2Clients.get(region);
      if (!client) {
        client = new EC2Client({ region, ...credentialConfig });
        ec2Clients.set(region, client);
      }
      return client;
    },

    costExplorer(): CostExplorerClient {
      costExplorerClient ??= new CostExplorerClient({
        region: COST_EXPLORER_REGION,
        ...credentialConfig,
      });
      return costExplorerClient;
    },
  };
}
