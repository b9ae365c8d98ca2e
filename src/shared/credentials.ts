/**
 * Cross-account credential issuance.
 *
 * The orchestrator only depends on CredentialProvider, so tests and other
 * credential sources can stand in for STS.
 */

import { STSClient, AssumeRoleCommand, type Credentials } from '@aws-sdk/client-sts';
import type { AccountContext, ScopedCredentials } from './types';
import { setupLogger } from './utils/logger';
import { formatCompactDate } from './utils/time';

const logger = setupLogger('dh-cost:credentials');

export const SESSION_DURATION_SECONDS = 3600;

/**
 * Raised when scoped credentials cannot be obtained for an account.
 */
export class CredentialError extends Error {
  constructor(message: string, options?: ErrorOptions) {
    super(message, options);
    this.name = 'CredentialError';
  }
}

/**
 * Obtains credentials scoped to one account.
 */
export interface CredentialProvider {
  getCredentials(account: AccountContext): Promise<ScopedCredentials>;
}

/**
 * Session name recorded in CloudTrail for an assumed role, e.g. "CostAllocator-111111111111-20240301".
 */
export function roleSessionName(accountId: string, now: Date = new Date()): string {
  return `CostAllocator-${accountId}-${formatCompactDate(now)}`;
}

/**
 * Assumes the account's cost-allocation role through STS.
 */
export class StsRoleCredentialProvider implements CredentialProvider {
  private readonly client: STSClient;

  constructor(client?: STSClient) {
    this.client = client ?? new STSClient({});
  }

  /**
   * @throws {CredentialError} If the role cannot be assumed or STS returns no credentials
   */
  async getCredentials(account: AccountContext): Promise<ScopedCredentials> {
    const sessionName = roleSessionName(account.accountId);
    logger.debug({ accountId: account.accountId, roleArn: account.roleArn, sessionName }, 'Assuming role');

    let credentials: Credentials | undefined;
    try {
      const response = await this.client.send(
        new AssumeRoleCommand({
          RoleArn: account.roleArn,
          RoleSessionName: sessionName,
          DurationSeconds: SESSION_DURATION_SECONDS,
        })
      );
      credentials = response.Credentials;
    } catch (error) {
      throw new CredentialError(
        `Failed to assume role ${account.roleArn} in account ${account.accountId}: ${String(error)}`,
        { cause: error }
      );
    }

    if (!credentials?.AccessKeyId || !credentials.SecretAccessKey) {
      throw new CredentialError(`AssumeRole returned no credentials for account ${account.accountId}`);
    }

    return {
      accessKeyId: credentials.AccessKeyId,
      secretAccessKey: credentials.SecretAccessKey,
      sessionToken: credentials.SessionToken,
      expiration: credentials.Expiration,
    };
  }
}
