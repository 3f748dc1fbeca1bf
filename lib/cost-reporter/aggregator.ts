import { sortByDate } from './normalizer';
import type { CostByTypePoint, CostPoint, CostSummary, InstanceTypeTotal } from './types';

export const EMPTY_SUMMARY: CostSummary = Object.freeze({
  totalCost: 0,
  averageCost: 0,
  maxCost: 0,
  maxCostDate: null,
  minCost: 0,
  minCostDate: null,
  days: 0,
});

/**
 * Builds the daily total table from per-instance-type rows. Only used when no
 * explicit daily total series was supplied.
 */
export function deriveDailyFromType(points: readonly CostByTypePoint[]): CostPoint[] {
  const dailyMap = new Map<string, number>();

  for (const point of points) {
    dailyMap.set(point.date, (dailyMap.get(point.date) ?? 0) + point.cost);
  }

  return sortByDate(Array.from(dailyMap, ([date, cost]) => ({ date, cost })));
}

/**
 * Total, average and extremes of a daily series. When several days share the
 * highest (or lowest) cost, the earliest of them is reported.
 */
export function summarize(points: readonly CostPoint[]): CostSummary {
  if (points.length === 0) {
    return EMPTY_SUMMARY;
  }

  const sorted = sortByDate(points);
  let total = 0;
  let max = sorted[0];
  let min = sorted[0];

  for (const point of sorted) {
    total += point.cost;
    if (point.cost > max.cost) max = point;
    if (point.cost < min.cost) min = point;
  }

  return Object.freeze({
    totalCost: total,
    averageCost: total / sorted.length,
    maxCost: max.cost,
    maxCostDate: max.date,
    minCost: min.cost,
    minCostDate: min.date,
    days: sorted.length,
  });
}

// Ties keep the order in which each instance type first appears.
export function totalsByInstanceType(points: readonly CostByTypePoint[]): InstanceTypeTotal[] {
  const typeMap = new Map<string, number>();

  for (const point of sortByDate(points)) {
    typeMap.set(point.instanceType, (typeMap.get(point.instanceType) ?? 0) + point.cost);
  }

  return Array.from(typeMap, ([instanceType, cost]) => ({ instanceType, cost })).sort(
    (a, b) => b.cost - a.cost
  );
}
