/**
 * Configuration loader for the Dedicated Host cost allocator.
 *
 * Loads YAML configuration from a local file, validates its structure, and
 * merges command-line overrides into the effective run settings.
 */

import { readFile } from 'fs/promises';
import yaml from 'js-yaml';
import { z } from 'zod';
import type { AccountConfig, AccountContext, AllocationMethod, Config, RunSettings } from '@shared/types';
import { setupLogger } from '@shared/utils/logger';

const logger = setupLogger('dh-cost:config');

export const DEFAULT_CONFIG_FILE = 'config.yaml';
export const DEFAULT_REGIONS = ['us-east-1', 'us-west-2', 'eu-west-1'];
export const DEFAULT_TAG_KEYS = ['Department', 'Team', 'Project', 'Environment'];
export const DEFAULT_DAYS_BACK = 30;
export const DEFAULT_METHOD: AllocationMethod = 'weighted';
export const DEFAULT_ACCOUNT_REGION = 'us-east-1';

const AllocationMethodSchema = z.enum(['weighted', 'equal']);

const AccountSchema = z.object({
  id: z.string().min(1),
  name: z.coerce.string().optional(),
  role: z.string().min(1),
  regions: z.array(z.string()).optional(),
});

/**
 * Configuration schema validation using Zod.
 */
const ConfigSchema = z.object({
  regions: z.array(z.string()).optional(),
  tag_keys: z.array(z.string()).optional(),
  days_back: z.number().int().positive().optional(),
  method: AllocationMethodSchema.optional(),
  accounts: z.array(AccountSchema).optional(),
});

const MultiAccountConfigSchema = ConfigSchema.extend({
  accounts: z.array(AccountSchema),
});

/**
 * Base exception for configuration errors.
 */
export class ConfigError extends Error {
  constructor(message: string, options?: ErrorOptions) {
    super(message, options);
    this.name = 'ConfigError';
  }
}

/**
 * Raised when the configuration is missing required fields or is invalid.
 */
export class ConfigValidationError extends ConfigError {
  constructor(message: string, options?: ErrorOptions) {
    super(message, options);
    this.name = 'ConfigValidationError';
  }
}

/**
 * Built-in configuration used when a single-account run finds no config file.
 */
export function defaultConfig(): Config {
  return {
    regions: [...DEFAULT_REGIONS],
    tag_keys: [...DEFAULT_TAG_KEYS],
    days_back: DEFAULT_DAYS_BACK,
    method: DEFAULT_METHOD,
  };
}

function isFileNotFound(error: unknown): boolean {
  return typeof error === 'object' && error !== null && 'code' in error && error.code === 'ENOENT';
}

async function readConfigFile(path: string): Promise<string | undefined> {
  try {
    return await readFile(path, 'utf-8');
  } catch (error) {
    if (isFileNotFound(error)) {
      return undefined;
    }
    throw new ConfigError(`Failed to read config file ${path}: ${String(error)}`, { cause: error });
  }
}

function parseYaml(path: string, contents: string): unknown {
  try {
    // An empty file parses to undefined; treat it as an empty mapping
    return yaml.load(contents) ?? {};
  } catch (error) {
    throw new ConfigError(`Failed to parse YAML configuration from ${path}: ${String(error)}`, { cause: error });
  }
}

/**
 * Rejects account ids written as bare YAML numbers. A bare 012345678901
 * loads as 12345678901, so only a quoted id keeps the account number intact.
 */
function assertQuotedAccountIds(path: string, parsed: unknown): void {
  if (typeof parsed !== 'object' || parsed === null || !('accounts' in parsed)) return;
  const accounts: unknown = parsed.accounts;
  if (!Array.isArray(accounts)) return;

  accounts.forEach((account: unknown, index: number) => {
    if (typeof account === 'object' && account !== null && 'id' in account && typeof account.id === 'number') {
      throw new ConfigValidationError(
        `Account id at accounts.${index}.id in ${path} must be a quoted string; it was read as the number ${account.id}`
      );
    }
  });
}

function validate<S extends z.ZodTypeAny>(schema: S, path: string, config: unknown): z.infer<S> {
  const result = schema.safeParse(config);
  if (!result.success) {
    const invalidFields = result.error.errors.map((issue) => issue.path.join('.') || '(root)');
    throw new ConfigValidationError(
      `Configuration validation failed in ${path}. Missing or invalid fields: ${invalidFields.join(', ')}`,
      { cause: result.error }
    );
  }
  return result.data;
}

/**
 * Loads single-account configuration.
 *
 * @param path - Path to the YAML file
 * @returns Parsed configuration, or the built-in default when the file does not exist
 *
 * @throws {ConfigError} If the file cannot be read or parsed
 * @throws {ConfigValidationError} If fields have the wrong shape
 */
export async function loadConfig(path: string = DEFAULT_CONFIG_FILE): Promise<Config> {
  const contents = await readConfigFile(path);
  if (contents === undefined) {
    logger.info({ path }, 'Config file not found; using built-in defaults');
    return defaultConfig();
  }

  const parsed = parseYaml(path, contents);
  assertQuotedAccountIds(path, parsed);
  const config = validate(ConfigSchema, path, parsed);
  logger.info({ path }, 'Config loaded successfully');
  return config;
}

/**
 * Loads multi-account configuration. The file and its accounts section are required.
 *
 * @throws {ConfigError} If the file does not exist, cannot be read, or cannot be parsed
 * @throws {ConfigValidationError} If the accounts section is missing or fields are invalid
 */
export async function loadMultiAccountConfig(
  path: string = DEFAULT_CONFIG_FILE
): Promise<Config & { accounts: AccountConfig[] }> {
  const contents = await readConfigFile(path);
  if (contents === undefined) {
    throw new ConfigError(`Config file ${path} not found. Create one with an 'accounts' section.`);
  }

  const parsed = parseYaml(path, contents);
  if (typeof parsed !== 'object' || parsed === null || !('accounts' in parsed)) {
    throw new ConfigValidationError(
      `No 'accounts' section found in ${path}. For single-account usage, run the allocate command instead.`
    );
  }

  assertQuotedAccountIds(path, parsed);
  const config = validate(MultiAccountConfigSchema, path, parsed);
  logger.info({ path, accounts: config.accounts.length }, 'Multi-account config loaded successfully');
  return config;
}

/**
 * Command-line values that take precedence over the config file.
 */
export interface SettingsOverrides {
  regions?: string[];
  tagKeys?: string[];
  method?: AllocationMethod;
  daysBack?: number;
}

/**
 * Merges CLI overrides, config values and defaults.
 *
 * Region and tag lists given on the command line replace the configured ones.
 * An absent or empty `tag_keys` list means the default tag keys.
 */
export function resolveSettings(config: Config, overrides: SettingsOverrides = {}): RunSettings {
  return {
    regions: overrides.regions ?? config.regions ?? [],
    tagKeys: overrides.tagKeys ?? (config.tag_keys?.length ? config.tag_keys : [...DEFAULT_TAG_KEYS]),
    method: overrides.method ?? config.method ?? DEFAULT_METHOD,
    daysBack: overrides.daysBack ?? config.days_back ?? DEFAULT_DAYS_BACK,
  };
}

/**
 * Resolves an account entry to the identity used for one pass.
 *
 * @param account - Account entry from config
 * @param fallbackRegions - Regions used when the account lists none
 */
export function toAccountContext(account: AccountConfig, fallbackRegions: string[]): AccountContext {
  const regions = account.regions ?? (fallbackRegions.length > 0 ? fallbackRegions : [DEFAULT_ACCOUNT_REGION]);
  return {
    accountId: account.id,
    accountName: account.name ?? account.id,
    roleArn: account.role,
    regions,
  };
}
