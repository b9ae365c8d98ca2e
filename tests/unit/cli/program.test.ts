import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';
import { mkdtemp, rm, writeFile } from 'fs/promises';
import { tmpdir } from 'os';
import { join } from 'path';
import { allocateCommand, createProgram, multiAccountCommand } from '@cli/program';

describe('CLI commands', () => {
  let dir: string;
  let errors: string[];

  beforeEach(async () => {
    dir = await mkdtemp(join(tmpdir(), 'dh-cost-cli-'));
    errors = [];
    vi.spyOn(console, 'log').mockImplementation(() => undefined);
    vi.spyOn(console, 'error').mockImplementation((message: unknown) => {
      errors.push(String(message));
    });
  });

  afterEach(async () => {
    process.exitCode = undefined;
    await rm(dir, { recursive: true, force: true });
  });

  it('should fail allocate when no regions are configured', async () => {
    const config = join(dir, 'config.yaml');
    await writeFile(config, 'regions: []\n', 'utf-8');

    await allocateCommand({ config });

    expect(process.exitCode).toBe(1);
    expect(errors).toEqual([
      'Error: No regions specified. Set regions in the config file or pass --regions.',
      '\nRequired AWS permissions:',
      '- ec2:DescribeHosts',
      '- ec2:DescribeInstances',
      '- ec2:DescribeInstanceTypes',
      '- ce:GetCostAndUsage',
    ]);
  });

  it('should fail multi-account when the config has no accounts section', async () => {
    const config = join(dir, 'config.yaml');
    await writeFile(config, 'regions: [us-east-1]\n', 'utf-8');

    await multiAccountCommand({ config });

    expect(process.exitCode).toBe(1);
    expect(errors[0]).toBe(
      `Error: No 'accounts' section found in ${config}. For single-account usage, run the allocate command instead.`
    );
    expect(errors[1]).toBe('\nTroubleshooting:');
    expect(errors[2]).toBe("1. Ensure the config file has an 'accounts' section");
  });

  it('should register allocate as the default command', () => {
    const program = createProgram();

    expect(program.commands.map((command) => command.name())).toEqual(['allocate', 'multi-account']);
    expect(program.commands[1].options.map((option) => option.long)).toContain('--accounts');
  });
});
