/**
 * Unit tests for core/orchestrator.ts
 *
 * AWS calls are stubbed with aws-sdk-client-mock; report generation is
 * replaced with a hoisted mock so no file is written.
 */

import { describe, it, expect, beforeEach, vi } from 'vitest';
import { mockClient } from 'aws-sdk-client-mock';
import {
  EC2Client,
  DescribeHostsCommand,
  DescribeInstancesCommand,
  DescribeInstanceTypesCommand,
} from '@aws-sdk/client-ec2';
import { CostExplorerClient, GetCostAndUsageCommand } from '@aws-sdk/client-cost-explorer';
import { createSettings, WINDOW } from '../../helpers/fixtures';

const { mockGenerateReport } = vi.hoisted(() => ({
  mockGenerateReport: vi.fn(),
}));

vi.mock('@core/report', () => ({
  generateReport: mockGenerateReport,
}));

// Import AFTER mocks are defined
import { Orchestrator } from '@core/orchestrator';

const ec2Mock = mockClient(EC2Client);
const ceMock = mockClient(CostExplorerClient);

const LAUNCH_TIME = new Date('2024-01-10T00:00:00Z');

function stubSingleHost(): void {
  ec2Mock.on(DescribeHostsCommand).resolves({
    Hosts: [{ HostId: 'h-1', State: 'available', HostProperties: { InstanceFamily: 'm5' } }],
  });
  ec2Mock.on(DescribeInstancesCommand).resolves({
    Reservations: [
      {
        Instances: [
          {
            InstanceId: 'i-small',
            InstanceType: 'm5.large',
            Placement: { HostId: 'h-1' },
            Tags: [{ Key: 'Team', Value: 'platform' }],
            LaunchTime: LAUNCH_TIME,
          },
          {
            InstanceId: 'i-large',
            InstanceType: 'm5.xlarge',
            Placement: { HostId: 'h-1' },
            Tags: [{ Key: 'Team', Value: 'data' }],
            LaunchTime: LAUNCH_TIME,
          },
        ],
      },
    ],
  });
  ec2Mock
    .on(DescribeInstanceTypesCommand, { Filters: [{ Name: 'instance-type', Values: ['m5.large'] }] })
    .resolves({ InstanceTypes: [{ InstanceType: 'm5.large', VCpuInfo: { DefaultVCpus: 2 } }] });
  ec2Mock
    .on(DescribeInstanceTypesCommand, { Filters: [{ Name: 'instance-type', Values: ['m5.xlarge'] }] })
    .resolves({ InstanceTypes: [{ InstanceType: 'm5.xlarge', VCpuInfo: { DefaultVCpus: 4 } }] });
}

describe('Orchestrator', () => {
  beforeEach(() => {
    ec2Mock.reset();
    ceMock.reset();
    mockGenerateReport.mockReset();
    mockGenerateReport.mockResolvedValue('report.csv');
    vi.spyOn(console, 'log').mockImplementation(() => undefined);
  });

  describe('billingWindow()', () => {
    it('should reach back the configured number of days', () => {
      const orchestrator = new Orchestrator(createSettings({ daysBack: 30 }));

      expect(orchestrator.billingWindow(WINDOW.end)).toEqual(WINDOW);
    });
  });

  describe('run()', () => {
    it('should discover, cost, allocate and report', async () => {
      stubSingleHost();
      ceMock.on(GetCostAndUsageCommand).resolves({
        ResultsByTime: [
          {
            Groups: [{ Keys: ['USE1-HostUsage:m5', 'us-east-1'], Metrics: { BlendedCost: { Amount: '300' } } }],
          },
        ],
      });

      const records = await new Orchestrator(createSettings()).run({ outputPath: 'out.csv', now: WINDOW.end });

      expect(records.map((r) => [r.instanceId, r.allocatedCost, r.vcpuCount, r.tags.team])).toEqual([
        ['i-small', 100, 2, 'platform'],
        ['i-large', 200, 4, 'data'],
      ]);
      expect(ceMock.commandCalls(GetCostAndUsageCommand)[0].args[0].input.TimePeriod).toEqual({
        Start: '2024-03-01',
        End: '2024-03-31',
      });
      expect(mockGenerateReport).toHaveBeenCalledWith(records, {
        tagKeys: ['Team'],
        outputPath: 'out.csv',
        now: WINDOW.end,
      });
    });

    it('should use equal split without looking up vCPUs', async () => {
      stubSingleHost();
      ceMock.on(GetCostAndUsageCommand).resolves({
        ResultsByTime: [
          {
            Groups: [{ Keys: ['USE1-HostUsage:m5', 'us-east-1'], Metrics: { BlendedCost: { Amount: '300' } } }],
          },
        ],
      });

      const records = await new Orchestrator(createSettings({ method: 'equal' })).run({ now: WINDOW.end });

      expect(records.map((r) => r.allocatedCost)).toEqual([150, 150]);
      expect(ec2Mock.commandCalls(DescribeInstanceTypesCommand)).toHaveLength(0);
    });

    it('should stop before cost retrieval when no hosts are found', async () => {
      ec2Mock.on(DescribeHostsCommand).resolves({ Hosts: [] });

      const records = await new Orchestrator(createSettings()).run({ now: WINDOW.end });

      expect(records).toEqual([]);
      expect(console.log).toHaveBeenCalledWith('No dedicated hosts found in specified regions');
      expect(ec2Mock.commandCalls(DescribeInstancesCommand)).toHaveLength(0);
      expect(ceMock.commandCalls(GetCostAndUsageCommand)).toHaveLength(0);
      expect(mockGenerateReport).not.toHaveBeenCalled();
    });

    it('should propagate cost retrieval failures', async () => {
      stubSingleHost();
      ceMock.on(GetCostAndUsageCommand).rejects(new Error('AccessDeniedException'));

      await expect(new Orchestrator(createSettings()).run({ now: WINDOW.end })).rejects.toThrow(
        'AccessDeniedException'
      );
      expect(mockGenerateReport).not.toHaveBeenCalled();
    });
  });
});
