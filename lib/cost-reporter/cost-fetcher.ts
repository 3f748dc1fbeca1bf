import {
  type CostExplorerClient,
  GetCostAndUsageCommand,
  type GetCostAndUsageCommandInput,
  type ResultByTime,
} from '@aws-sdk/client-cost-explorer';
import path from 'path';
import { CostExplorerRequestError, InvalidArgumentError } from './errors';
import { DAILY_TOTAL_FILE, PER_INSTANCE_TYPE_FILE, writeJsonFile } from './storage';
import type { DateRange, Granularity } from './types';

export const EC2_COMPUTE_SERVICE = 'Amazon Elastic Compute Cloud - Compute';
export const DEFAULT_LOOKBACK_DAYS = 30;

const DATE_PATTERN = /^\d{4}-\d{2}-\d{2}$/;

export type CostExplorerSender = Pick<CostExplorerClient, 'send'>;

export interface Ec2CostSeries {
  total: ResultByTime[];
  byType: ResultByTime[];
}

export interface DateRangeOptions {
  days?: number;
  start?: string;
  // inclusive
  end?: string;
  today?: Date;
}

export interface DownloadOptions {
  range: DateRange;
  granularity: Granularity;
  outDir: string;
}

export interface DownloadResult {
  totalPath: string;
  byTypePath: string;
}

function toIsoDate(date: Date): string {
  return date.toISOString().split('T')[0];
}

function addDays(date: Date, days: number): Date {
  const shifted = new Date(date);
  shifted.setUTCDate(shifted.getUTCDate() + days);
  return shifted;
}

function parseIsoDate(value: string, label: string): Date {
  const date = new Date(`${value}T00:00:00Z`);
  if (!DATE_PATTERN.test(value) || Number.isNaN(date.getTime()) || toIsoDate(date) !== value) {
    throw new InvalidArgumentError(`Invalid ${label} date: ${value}. Use YYYY-MM-DD`);
  }
  return date;
}

/**
 * Explicit `start`/`end` take precedence over `days`. The returned end is
 * exclusive, one day after the inclusive end date (or after today).
 */
export function resolveDateRange(options: DateRangeOptions): DateRange {
  const { start, end } = options;

  if (start && end) {
    const startDate = parseIsoDate(start, 'start');
    const endExclusive = addDays(parseIsoDate(end, 'end'), 1);
    if (startDate.getTime() >= endExclusive.getTime()) {
      throw new InvalidArgumentError(`Start date ${start} is after end date ${end}`);
    }
    return { start, end: toIsoDate(endExclusive) };
  }

  if (start || end) {
    throw new InvalidArgumentError('Both start and end dates are required when either is given');
  }

  const days = options.days ?? DEFAULT_LOOKBACK_DAYS;
  if (!Number.isInteger(days) || days <= 0) {
    throw new InvalidArgumentError(`Invalid days: ${days}. Must be a positive integer`);
  }

  const today = new Date(options.today ?? new Date());
  today.setUTCHours(0, 0, 0, 0);

  return {
    start: toIsoDate(addDays(today, -days)),
    end: toIsoDate(addDays(today, 1)),
  };
}

function buildCostQuery(
  range: DateRange,
  granularity: Granularity,
  groupByInstanceType: boolean
): GetCostAndUsageCommandInput {
  const input: GetCostAndUsageCommandInput = {
    TimePeriod: {
      Start: range.start,
      End: range.end,
    },
    Granularity: granularity,
    Metrics: ['UnblendedCost'],
    Filter: {
      Dimensions: {
        Key: 'SERVICE',
        Values: [EC2_COMPUTE_SERVICE],
      },
    },
  };

  if (groupByInstanceType) {
    input.GroupBy = [
      {
        Type: 'DIMENSION',
        Key: 'INSTANCE_TYPE',
      },
    ];
  }

  return input;
}

export async function fetchEc2CostSeries(
  client: CostExplorerSender,
  range: DateRange,
  granularity: Granularity
): Promise<Ec2CostSeries> {
  console.log(`Fetching ${granularity} EC2 costs for ${range.start} to ${range.end} (end exclusive)`);

  try {
    // Execute both queries in parallel
    const [totalResponse, byTypeResponse] = await Promise.all([
      client.send(new GetCostAndUsageCommand(buildCostQuery(range, granularity, false))),
      client.send(new GetCostAndUsageCommand(buildCostQuery(range, granularity, true))),
    ]);

    return {
      total: totalResponse.ResultsByTime ?? [],
      byType: byTypeResponse.ResultsByTime ?? [],
    };
  } catch (error) {
    throw new CostExplorerRequestError(error);
  }
}

export async function downloadCostData(
  client: CostExplorerSender,
  options: DownloadOptions
): Promise<DownloadResult> {
  const series = await fetchEc2CostSeries(client, options.range, options.granularity);

  const totalPath = writeJsonFile(path.join(options.outDir, DAILY_TOTAL_FILE), series.total);
  const byTypePath = writeJsonFile(path.join(options.outDir, PER_INSTANCE_TYPE_FILE), series.byType);

  console.log(
    `Cost data saved: ${series.total.length} total entries to ${totalPath}, ${series.byType.length} grouped entries to ${byTypePath}`
  );

  return { totalPath, byTypePath };
}
