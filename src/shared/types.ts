/**
 * Core type definitions for the Dedicated Host cost allocator.
 *
 * Centralizes shared types to avoid circular dependencies.
 */

/**
 * Allocation policy selected on the command line or in config.
 *
 * - equal: split the host cost evenly, scaled by each instance's presence in the window
 * - weighted: split the host cost by vCPU count multiplied by runtime
 */
export type AllocationMethod = 'equal' | 'weighted';

/**
 * Method label written into every allocation record.
 */
export type AllocationLabel = 'equal_split' | 'vcpu_weighted';

/**
 * EC2 instance placed on a dedicated host.
 */
export interface Instance {
  instanceId: string;
  instanceType: string;
  region: string;

  /**
   * Instance tags. Any configured tag key may be absent.
   */
  tags: Record<string, string>;

  /**
   * Launch time on the naive UTC timeline (see shared/utils/time).
   */
  launchTime: Date;
}

/**
 * Dedicated host discovered in one region.
 */
export interface Host {
  region: string;
  hostId: string;

  /**
   * Instance family the host supports (e.g. "m5"), or "Unknown".
   */
  hostFamily: string;

  state: string;
  instances: Instance[];
}

/**
 * Hosts keyed by "<region>:<hostId>".
 */
export type HostMap = Map<string, Host>;

/**
 * Accumulated dedicated-host cost keyed by "<region>:<usageType>".
 * Iteration order is the order in which Cost Explorer returned the groups.
 */
export type CostTable = Map<string, number>;

/**
 * Billing window for an allocation run.
 */
export interface BillingWindow {
  start: Date;
  end: Date;
}

/**
 * Per-instance allocation result.
 */
export interface AllocationRecord {
  region: string;
  hostId: string;
  instanceId: string;
  instanceType: string;
  allocatedCost: number;
  allocationMethod: AllocationLabel;
  runtimeHours: number;
  billingPeriodHours: number;

  /**
   * Present on vcpu_weighted records only.
   */
  vcpuCount?: number;
  hourlyRate?: number;

  /**
   * One entry per configured tag key, keyed by the lowercased tag key.
   * Missing tags carry the literal "Unknown".
   */
  tags: Record<string, string>;

  /**
   * Present on records produced by the multi-account orchestrator.
   */
  accountId?: string;
  accountName?: string;
}

/**
 * One target account from the multi-account configuration.
 */
export interface AccountConfig {
  id: string;
  name?: string;
  role: string;
  regions?: string[];
}

/**
 * Resolved account identity used to scope one discovery and allocation pass.
 */
export interface AccountContext {
  accountId: string;
  accountName: string;
  roleArn: string;
  regions: string[];
}

/**
 * Processing state of one account in a multi-account run.
 */
export type AccountState =
  | 'PENDING'
  | 'ROLE_ASSUMED'
  | 'DISCOVERED'
  | 'COSTED'
  | 'ALLOCATED'
  | 'SKIPPED';

/**
 * Outcome of processing one account.
 */
export interface AccountRunResult {
  account: AccountContext;
  state: AccountState;
  records: AllocationRecord[];
  error?: string;
}

/**
 * Temporary credentials scoped to one account.
 */
export interface ScopedCredentials {
  accessKeyId: string;
  secretAccessKey: string;
  sessionToken?: string;
  expiration?: Date;
}

/**
 * Configuration file contents.
 */
export interface Config {
  regions?: string[];
  tag_keys?: string[];
  days_back?: number;
  method?: AllocationMethod;
  accounts?: AccountConfig[];
}

/**
 * Effective settings after merging CLI flags, config values and defaults.
 */
export interface RunSettings {
  regions: string[];
  tagKeys: string[];
  method: AllocationMethod;
  daysBack: number;
}
