import type { GetCostAndUsageCommand } from '@aws-sdk/client-cost-explorer';
import fs from 'fs';
import os from 'os';
import path from 'path';
import { afterEach, beforeEach, describe, expect, test, vi } from 'vitest';
import {
  downloadCostData,
  EC2_COMPUTE_SERVICE,
  fetchEc2CostSeries,
  resolveDateRange,
} from './cost-fetcher';
import { CostExplorerRequestError, InvalidArgumentError } from './errors';
import { DAILY_TOTAL_FILE, PER_INSTANCE_TYPE_FILE } from './storage';

const mockSend = vi.fn();
const client = { send: mockSend };

const TOTAL_RESULTS = [
  { TimePeriod: { Start: '2024-01-01', End: '2024-01-02' }, Total: { UnblendedCost: { Amount: '3.5', Unit: 'USD' } } },
];
const BY_TYPE_RESULTS = [
  {
    TimePeriod: { Start: '2024-01-01', End: '2024-01-02' },
    Groups: [{ Keys: ['m5.large'], Metrics: { UnblendedCost: { Amount: '3.5', Unit: 'USD' } } }],
  },
];

function mockResponses() {
  mockSend.mockImplementation(async (command: GetCostAndUsageCommand) =>
    command.input.GroupBy ? { ResultsByTime: BY_TYPE_RESULTS } : { ResultsByTime: TOTAL_RESULTS }
  );
}

describe('resolveDateRange', () => {
  const today = new Date(Date.UTC(2024, 2, 15, 18, 30));

  test('looks back the given number of days with an exclusive end after today', () => {
    expect(resolveDateRange({ days: 30, today })).toEqual({ start: '2024-02-14', end: '2024-03-16' });
  });

  test('defaults to 30 days', () => {
    expect(resolveDateRange({ today })).toEqual({ start: '2024-02-14', end: '2024-03-16' });
  });

  test('turns an inclusive end date into an exclusive one', () => {
    expect(resolveDateRange({ start: '2024-01-01', end: '2024-01-31', today })).toEqual({
      start: '2024-01-01',
      end: '2024-02-01',
    });
  });

  test('prefers explicit dates over days', () => {
    expect(resolveDateRange({ days: 7, start: '2024-12-31', end: '2024-12-31' })).toEqual({
      start: '2024-12-31',
      end: '2025-01-01',
    });
  });

  test('rejects a start without an end', () => {
    expect(() => resolveDateRange({ start: '2024-01-01' })).toThrow(InvalidArgumentError);
  });

  test('rejects malformed and impossible dates', () => {
    expect(() => resolveDateRange({ start: '2024-1-01', end: '2024-01-31' })).toThrow(
      'Invalid start date: 2024-1-01. Use YYYY-MM-DD'
    );
    expect(() => resolveDateRange({ start: '2024-01-01', end: '2024-02-30' })).toThrow(
      'Invalid end date: 2024-02-30. Use YYYY-MM-DD'
    );
  });

  test('rejects a start after the end', () => {
    expect(() => resolveDateRange({ start: '2024-02-02', end: '2024-02-01' })).toThrow(
      'Start date 2024-02-02 is after end date 2024-02-01'
    );
  });

  test('rejects non-positive day counts', () => {
    expect(() => resolveDateRange({ days: 0, today })).toThrow('Invalid days: 0. Must be a positive integer');
  });
});

describe('fetchEc2CostSeries', () => {
  beforeEach(() => {
    vi.clearAllMocks();
    vi.spyOn(console, 'log').mockImplementation(() => undefined);
  });

  afterEach(() => {
    vi.restoreAllMocks();
  });

  test('queries the EC2 compute total and the per-instance-type breakdown', async () => {
    mockResponses();

    const series = await fetchEc2CostSeries(client, { start: '2024-01-01', end: '2024-01-02' }, 'DAILY');

    expect(series).toEqual({ total: TOTAL_RESULTS, byType: BY_TYPE_RESULTS });
    expect(mockSend).toHaveBeenCalledTimes(2);

    const [totalCommand] = mockSend.mock.calls[0];
    const [byTypeCommand] = mockSend.mock.calls[1];
    expect(totalCommand.input).toEqual({
      TimePeriod: { Start: '2024-01-01', End: '2024-01-02' },
      Granularity: 'DAILY',
      Metrics: ['UnblendedCost'],
      Filter: { Dimensions: { Key: 'SERVICE', Values: [EC2_COMPUTE_SERVICE] } },
    });
    expect(byTypeCommand.input.GroupBy).toEqual([{ Type: 'DIMENSION', Key: 'INSTANCE_TYPE' }]);
    expect(byTypeCommand.input.Granularity).toBe('DAILY');
  });

  test('returns empty series when the response has no results', async () => {
    mockSend.mockResolvedValue({});

    await expect(fetchEc2CostSeries(client, { start: '2024-01-01', end: '2024-02-01' }, 'MONTHLY')).resolves.toEqual({
      total: [],
      byType: [],
    });
  });

  test('wraps SDK failures', async () => {
    const failure = new Error('User is not authorized to perform: ce:GetCostAndUsage');
    mockSend.mockRejectedValue(failure);

    const result = fetchEc2CostSeries(client, { start: '2024-01-01', end: '2024-01-02' }, 'DAILY');

    await expect(result).rejects.toBeInstanceOf(CostExplorerRequestError);
    await expect(result).rejects.toMatchObject({
      message: 'Cost Explorer request failed: User is not authorized to perform: ce:GetCostAndUsage',
      code: 'COST_EXPLORER_REQUEST',
      cause: failure,
    });
  });
});

describe('downloadCostData', () => {
  let outDir: string;

  beforeEach(() => {
    vi.clearAllMocks();
    vi.spyOn(console, 'log').mockImplementation(() => undefined);
    outDir = path.join(fs.mkdtempSync(path.join(os.tmpdir(), 'fetch-')), 'data');
  });

  afterEach(() => {
    vi.restoreAllMocks();
    fs.rmSync(path.dirname(outDir), { recursive: true, force: true });
  });

  test('writes both series as indented JSON', async () => {
    mockResponses();

    const result = await downloadCostData(client, {
      range: { start: '2024-01-01', end: '2024-01-02' },
      granularity: 'DAILY',
      outDir,
    });

    expect(result).toEqual({
      totalPath: path.join(outDir, DAILY_TOTAL_FILE),
      byTypePath: path.join(outDir, PER_INSTANCE_TYPE_FILE),
    });
    expect(JSON.parse(fs.readFileSync(result.totalPath, 'utf-8'))).toEqual(TOTAL_RESULTS);
    expect(fs.readFileSync(result.byTypePath, 'utf-8')).toBe(`${JSON.stringify(BY_TYPE_RESULTS, null, 2)}\n`);
  });

  test('writes nothing when the request fails', async () => {
    mockSend.mockRejectedValue(new Error('throttled'));

    await expect(
      downloadCostData(client, { range: { start: '2024-01-01', end: '2024-01-02' }, granularity: 'DAILY', outDir })
    ).rejects.toThrow('Cost Explorer request failed: throttled');
    expect(fs.existsSync(outDir)).toBe(false);
  });
});
