#!/usr/bin/env tsx
/**
 * Entry point for the `dh-cost-allocator` command.
 */

import { createProgram } from './program';

process.once('SIGINT', () => {
  console.log('\nOperation cancelled by user');
  process.exit(130);
});

createProgram()
  .parseAsync(process.argv)
  .catch((error: unknown) => {
    console.error(`Error: ${error instanceof Error ? error.message : String(error)}`);
    process.exitCode = 1;
  });
