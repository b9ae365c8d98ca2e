/**
 * Argument parsers shared by the CLI commands.
 */

import { InvalidArgumentError } from 'commander';

export const ALLOCATION_METHODS = ['weighted', 'equal'] as const;

/**
 * Splits a comma-separated flag value, dropping blanks.
 */
export function parseList(value: string): string[] {
  return value
    .split(',')
    .map((item) => item.trim())
    .filter((item) => item.length > 0);
}

/**
 * Parses a positive whole number of days.
 *
 * @throws {InvalidArgumentError} If the value is not a positive integer
 */
export function parseDaysBack(value: string): number {
  const days = Number(value);
  if (!Number.isInteger(days) || days <= 0) {
    throw new InvalidArgumentError('Must be a positive whole number of days.');
  }
  return days;
}
