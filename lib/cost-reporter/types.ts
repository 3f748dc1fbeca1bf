export type Granularity = 'DAILY' | 'MONTHLY';

export interface DateRange {
  start: string;
  // exclusive, as Cost Explorer expects it
  end: string;
}

export interface CostPoint {
  date: string;
  cost: number;
}

export interface CostByTypePoint {
  date: string;
  instanceType: string;
  cost: number;
}

export interface InstanceTypeTotal {
  instanceType: string;
  cost: number;
}

export type CostSummary = Readonly<{
  totalCost: number;
  averageCost: number;
  maxCost: number;
  maxCostDate: string | null;
  minCost: number;
  minCostDate: string | null;
  days: number;
}>;

/**
 * Raw series as read from disk. The daily total series is optional; when it is
 * missing the daily table is derived from the per-instance-type series.
 */
export type CostInputs =
  | { kind: 'with-total'; totalSeries: unknown; groupedSeries: unknown }
  | { kind: 'grouped-only'; groupedSeries: unknown };

export type DailySource = 'total-series' | 'derived-from-type';

export interface CostTables {
  byType: CostByTypePoint[];
  daily: CostPoint[];
  dailySource: DailySource;
}

export interface ChartPaths {
  lineChartPath: string;
  barChartPath: string;
}

export interface ReportArtifacts extends ChartPaths {
  reportPath: string;
  summary: CostSummary;
  dailySource: DailySource;
}

export interface InstanceRecord {
  instanceId: string | null;
  name: string | null;
  instanceType: string | null;
  state: string | null;
  privateIp: string | null;
  publicIp: string | null;
  vpcId: string | null;
  vpcName: string | null;
  region: string;
}

export interface Ec2Inventory {
  generatedAt: string;
  regions: string[];
  instances: InstanceRecord[];
}
