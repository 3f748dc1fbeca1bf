import fs from 'fs';
import path from 'path';
import { deriveDailyFromType } from './aggregator';
import { MissingRequiredInputError } from './errors';
import { normalizeByInstanceType, normalizeDailyTotal } from './normalizer';
import { DAILY_TOTAL_FILE, PER_INSTANCE_TYPE_FILE, readJsonFile } from './storage';
import type { CostInputs, CostTables } from './types';

export function loadCostInputs(inDir: string): CostInputs {
  const groupedPath = path.join(inDir, PER_INSTANCE_TYPE_FILE);
  const totalPath = path.join(inDir, DAILY_TOTAL_FILE);

  if (!fs.existsSync(groupedPath)) {
    throw new MissingRequiredInputError(groupedPath);
  }

  const groupedSeries = readJsonFile(groupedPath);

  if (fs.existsSync(totalPath)) {
    return { kind: 'with-total', totalSeries: readJsonFile(totalPath), groupedSeries };
  }

  return { kind: 'grouped-only', groupedSeries };
}

export function buildCostTables(inputs: CostInputs): CostTables {
  const byType = normalizeByInstanceType(inputs.groupedSeries, PER_INSTANCE_TYPE_FILE);

  switch (inputs.kind) {
    case 'with-total':
      return {
        byType,
        daily: normalizeDailyTotal(inputs.totalSeries, DAILY_TOTAL_FILE),
        dailySource: 'total-series',
      };
    case 'grouped-only':
      return {
        byType,
        daily: deriveDailyFromType(byType),
        dailySource: 'derived-from-type',
      };
  }
}
