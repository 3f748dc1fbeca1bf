import { z } from 'zod';
import { MalformedInputError } from './errors';
import type { CostByTypePoint, CostPoint } from './types';

export const UNKNOWN_INSTANCE_TYPE = 'UNKNOWN';

const DATE_PREFIX_PATTERN = /^\d{4}-\d{2}-\d{2}/;
const DECIMAL_PATTERN = /^[+-]?(\d+\.?\d*|\.\d+)([eE][+-]?\d+)?$/;

// Cost Explorer returns amounts as decimal strings; numbers are accepted too
const AmountSchema = z.union([z.string(), z.number()]).transform((value, ctx) => {
  const amount = typeof value === 'number' ? value : DECIMAL_PATTERN.test(value.trim()) ? Number(value) : NaN;
  if (!Number.isFinite(amount)) {
    ctx.addIssue({ code: z.ZodIssueCode.custom, message: `Invalid amount: "${value}"` });
    return z.NEVER;
  }
  return amount;
});

function isCalendarDate(value: string): boolean {
  const time = Date.parse(`${value}T00:00:00Z`);
  return !Number.isNaN(time) && new Date(time).toISOString().slice(0, 10) === value;
}

const PeriodStartSchema = z.string().transform((value, ctx) => {
  if (!DATE_PREFIX_PATTERN.test(value)) {
    ctx.addIssue({ code: z.ZodIssueCode.custom, message: 'Expected a YYYY-MM-DD date' });
    return z.NEVER;
  }
  const date = value.slice(0, 10);
  if (!isCalendarDate(date)) {
    ctx.addIssue({ code: z.ZodIssueCode.custom, message: `Not a calendar date: ${date}` });
    return z.NEVER;
  }
  return date;
});

const UnblendedCostSchema = z.object({
  UnblendedCost: z.object({
    Amount: AmountSchema,
  }),
});

const TimePeriodSchema = z.object({
  Start: PeriodStartSchema,
});

const DailyTotalSeriesSchema = z.array(
  z.object({
    TimePeriod: TimePeriodSchema,
    Total: UnblendedCostSchema,
  })
);

const GroupedSeriesSchema = z.array(
  z.object({
    TimePeriod: TimePeriodSchema,
    Groups: z
      .array(
        z.object({
          Keys: z.array(z.string()).nullish(),
          Metrics: UnblendedCostSchema,
        })
      )
      .optional(),
  })
);

function formatIssues(error: z.ZodError): string {
  return error.issues
    .map((issue) => (issue.path.length > 0 ? `${issue.path.join('.')}: ${issue.message}` : issue.message))
    .join('; ');
}

function parseSeries<T extends z.ZodTypeAny>(schema: T, raw: unknown, source: string): z.output<T> {
  const result = schema.safeParse(raw);
  if (!result.success) {
    throw new MalformedInputError(`Malformed ${source}: ${formatIssues(result.error)}`, {
      cause: result.error,
    });
  }
  return result.data;
}

function compareDates(a: string, b: string): number {
  if (a < b) return -1;
  if (a > b) return 1;
  return 0;
}

/** Stable ascending sort by date; returns a new array. */
export function sortByDate<T extends { date: string }>(points: readonly T[]): T[] {
  return [...points].sort((a, b) => compareDates(a.date, b.date));
}

export function normalizeDailyTotal(raw: unknown, source: string = 'daily total series'): CostPoint[] {
  const entries = parseSeries(DailyTotalSeriesSchema, raw, source);

  return sortByDate(
    entries.map((entry) => ({
      date: entry.TimePeriod.Start,
      cost: entry.Total.UnblendedCost.Amount,
    }))
  );
}

export function normalizeByInstanceType(
  raw: unknown,
  source: string = 'per-instance-type series'
): CostByTypePoint[] {
  const entries = parseSeries(GroupedSeriesSchema, raw, source);
  const points: CostByTypePoint[] = [];

  for (const entry of entries) {
    for (const group of entry.Groups ?? []) {
      points.push({
        date: entry.TimePeriod.Start,
        instanceType: group.Keys?.[0] ?? UNKNOWN_INSTANCE_TYPE,
        cost: group.Metrics.UnblendedCost.Amount,
      });
    }
  }

  return sortByDate(points);
}
