import path from 'path';
import { summarize } from './aggregator';
import { renderCharts } from './chart-renderer';
import { formatCostReportAsHTML } from './html-formatter';
import { buildCostTables, loadCostInputs } from './inputs';
import { IMAGES_DIR, REPORT_FILE, writeFileAtomic } from './storage';
import type { ReportArtifacts } from './types';

export interface GenerateReportOptions {
  inDir: string;
  outDir: string;
  now?: Date;
}

export function generateCostReport(options: GenerateReportOptions): ReportArtifacts {
  const tables = buildCostTables(loadCostInputs(options.inDir));

  console.log(
    `Loaded ${tables.byType.length} instance type rows and ${tables.daily.length} daily rows (${tables.dailySource})`
  );

  const summary = summarize(tables.daily);
  const charts = renderCharts(tables.daily, tables.byType, path.join(options.outDir, IMAGES_DIR));
  const reportPath = path.join(options.outDir, REPORT_FILE);

  writeFileAtomic(
    reportPath,
    formatCostReportAsHTML(summary, {
      ...charts,
      reportPath,
      generatedAt: options.now ?? new Date(),
    })
  );

  console.log(`Cost report generated: ${reportPath}, total: $${summary.totalCost.toFixed(2)} over ${summary.days} days`);

  return {
    ...charts,
    reportPath,
    summary,
    dailySource: tables.dailySource,
  };
}
