/**
 * CSV report writer and printed cost summaries.
 */

import { writeFile } from 'fs/promises';
import type { AllocationMethod, AllocationRecord } from '@shared/types';
import { setupLogger } from '@shared/utils/logger';
import { formatFileTimestamp } from '@shared/utils/time';
import { UNKNOWN_TAG_VALUE } from './allocator';

const logger = setupLogger('dh-cost:report');

export const SINGLE_ACCOUNT_PREFIX = 'dedicated_host_costs';
export const MULTI_ACCOUNT_PREFIX = 'multi_account_dedicated_host_costs';

// Reported under its own heading in multi-account summaries
const ACCOUNT_TAG = 'account';

export type ReportRow = Record<string, string | number>;

/**
 * Flattens a record into CSV columns.
 *
 * Column order: base fields, vCPU fields (weighted only), one column per
 * tag key, then account fields (multi-account only).
 */
export function toRow(record: AllocationRecord): ReportRow {
  const row: ReportRow = {
    region: record.region,
    host_id: record.hostId,
    instance_id: record.instanceId,
    instance_type: record.instanceType,
    allocated_cost: record.allocatedCost,
    allocation_method: record.allocationMethod,
    runtime_hours: record.runtimeHours,
    billing_period_hours: record.billingPeriodHours,
  };

  if (record.vcpuCount !== undefined) {
    row.vcpu_count = record.vcpuCount;
    row.hourly_rate = record.hourlyRate ?? 0;
  }

  for (const [key, value] of Object.entries(record.tags)) {
    row[key] = value;
  }

  if (record.accountId !== undefined) {
    row.account_id = record.accountId;
    row.account_name = record.accountName ?? record.accountId;
  }

  return row;
}

function escapeCsvField(value: string | number): string {
  const text = String(value);
  return /[",\r\n]/.test(text) ? `"${text.replace(/"/g, '""')}"` : text;
}

/**
 * Serializes rows to CSV. The header is the key set of the first row.
 */
export function toCsv(rows: ReportRow[]): string {
  if (rows.length === 0) {
    return '';
  }

  const headers = Object.keys(rows[0]);
  const lines = [
    headers.map(escapeCsvField).join(','),
    ...rows.map((row) => headers.map((header) => escapeCsvField(row[header] ?? '')).join(',')),
  ];

  return `${lines.join('\r\n')}\r\n`;
}

/**
 * Builds a report file name such as "dedicated_host_costs_vcpu_weighted_20240301_093000.csv".
 */
export function reportFileName(prefix: string, method: string, now: Date = new Date()): string {
  return `${prefix}_${method}_${formatFileTimestamp(now)}.csv`;
}

/**
 * Writes records as CSV.
 *
 * @returns Path written
 */
export async function writeReport(records: AllocationRecord[], outputPath: string): Promise<string> {
  await writeFile(outputPath, toCsv(records.map(toRow)), 'utf-8');
  logger.info({ outputPath, rows: records.length }, 'Report written');
  return outputPath;
}

/**
 * Sums allocated cost per group, sorted by group name.
 */
export function sumBy(
  records: AllocationRecord[],
  groupOf: (record: AllocationRecord) => string | undefined
): Array<[string, number]> {
  const totals = new Map<string, number>();
  for (const record of records) {
    const group = groupOf(record);
    if (group === undefined) continue;
    totals.set(group, (totals.get(group) ?? 0) + record.allocatedCost);
  }
  return [...totals.entries()].sort(([a], [b]) => (a < b ? -1 : a > b ? 1 : 0));
}

export function formatCost(amount: number): string {
  return `$${amount.toFixed(2)}`;
}

function totalCost(records: AllocationRecord[]): number {
  return records.reduce((sum, record) => sum + record.allocatedCost, 0);
}

function printGroups(title: string, groups: Array<[string, number]>): void {
  console.log(`\n${title}:`);
  for (const [group, cost] of groups) {
    console.log(`  ${group}: ${formatCost(cost)}`);
  }
}

function printTagSummaries(records: AllocationRecord[], tagKeys: string[], skip: ReadonlySet<string>): void {
  for (const tagKey of tagKeys) {
    const column = tagKey.toLowerCase();
    if (skip.has(column)) continue;

    const groups = sumBy(records, (record) => record.tags[column]);
    const known = groups.filter(([value]) => value !== UNKNOWN_TAG_VALUE);
    if (known.length > 0) {
      printGroups(`Cost by ${tagKey}`, known);
    }
  }
}

/**
 * Prints the grand total, cost by region, and cost by each tag key.
 * "Unknown" tag values are left out of the printout.
 */
export function printSummary(records: AllocationRecord[], tagKeys: string[]): void {
  console.log(`Total allocated cost: ${formatCost(totalCost(records))}`);
  printGroups('Cost by Region', sumBy(records, (record) => record.region));
  printTagSummaries(records, tagKeys, new Set());
}

/**
 * Prints the consolidated total plus cost by account, region, and tag key.
 * The account tag is covered by the account heading and not repeated.
 */
export function printMultiAccountSummary(records: AllocationRecord[], tagKeys: string[]): void {
  console.log(`Total allocated cost across all accounts: ${formatCost(totalCost(records))}`);
  printGroups('Cost by Account', sumBy(records, (record) => record.accountName));
  printGroups('Cost by Region', sumBy(records, (record) => record.region));
  printTagSummaries(records, tagKeys, new Set([ACCOUNT_TAG]));
}

export interface ReportOptions {
  tagKeys: string[];
  outputPath?: string;
  now?: Date;
}

/**
 * Writes the single-account report and prints its summary.
 *
 * @returns Path written, or undefined when there was nothing to report
 */
export async function generateReport(
  records: AllocationRecord[],
  options: ReportOptions
): Promise<string | undefined> {
  if (records.length === 0) {
    console.log('No costs to report');
    return undefined;
  }

  const outputPath =
    options.outputPath ?? reportFileName(SINGLE_ACCOUNT_PREFIX, records[0].allocationMethod, options.now);
  await writeReport(records, outputPath);

  console.log(`\nReport generated: ${outputPath}`);
  printSummary(records, options.tagKeys);
  return outputPath;
}

/**
 * Writes the consolidated multi-account report and prints its summary.
 *
 * @returns Path written, or undefined when there was nothing to report
 */
export async function generateMultiAccountReport(
  records: AllocationRecord[],
  method: AllocationMethod,
  options: ReportOptions
): Promise<string | undefined> {
  if (records.length === 0) {
    console.log('No costs to report');
    return undefined;
  }

  const outputPath = options.outputPath ?? reportFileName(MULTI_ACCOUNT_PREFIX, method, options.now);
  await writeReport(records, outputPath);

  console.log(`\nMulti-account report generated: ${outputPath}`);
  printMultiAccountSummary(records, options.tagKeys);
  return outputPath;
}
