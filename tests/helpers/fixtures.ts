/**
 * Test fixtures and mock data factories.
 *
 * Provides reusable hosts, instances and settings for unit tests.
 */

import type { AccountContext, BillingWindow, Host, HostMap, Instance, RunSettings } from '@shared/types';

/**
 * Thirty-day window ending 2024-03-31T00:00:00Z (720 hours).
 */
export const WINDOW: BillingWindow = {
  start: new Date('2024-03-01T00:00:00Z'),
  end: new Date('2024-03-31T00:00:00Z'),
};

/**
 * Launched well before WINDOW, so present for the full window.
 */
export const LONG_RUNNING = new Date('2024-01-15T08:00:00Z');

/**
 * Creates a mock Instance.
 *
 * @param overrides - Optional overrides for specific instance properties
 */
export function createInstance(overrides: Partial<Instance> = {}): Instance {
  return {
    instanceId: 'i-0000000000000000a',
    instanceType: 'm5.large',
    region: 'us-east-1',
    tags: {},
    launchTime: LONG_RUNNING,
    ...overrides,
  };
}

/**
 * Creates a mock Host.
 *
 * @param overrides - Optional overrides for specific host properties
 */
export function createHost(overrides: Partial<Host> = {}): Host {
  return {
    region: 'us-east-1',
    hostId: 'h-0000000000000000a',
    hostFamily: 'm5',
    state: 'available',
    instances: [],
    ...overrides,
  };
}

/**
 * Builds a HostMap keyed the way discovery keys it.
 */
export function hostMap(...hosts: Host[]): HostMap {
  return new Map(hosts.map((host) => [`${host.region}:${host.hostId}`, host]));
}

/**
 * Creates mock RunSettings.
 */
export function createSettings(overrides: Partial<RunSettings> = {}): RunSettings {
  return {
    regions: ['us-east-1'],
    tagKeys: ['Team'],
    method: 'weighted',
    daysBack: 30,
    ...overrides,
  };
}

/**
 * Creates a mock AccountContext.
 */
export function createAccount(overrides: Partial<AccountContext> = {}): AccountContext {
  return {
    accountId: '111111111111',
    accountName: 'production',
    roleArn: 'arn:aws:iam::111111111111:role/CostAllocatorRole',
    regions: ['us-east-1'],
    ...overrides,
  };
}
