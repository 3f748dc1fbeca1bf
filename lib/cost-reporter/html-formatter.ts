import path from 'path';
import type { CostSummary, DailySource, ReportArtifacts } from './types';

export interface HtmlReportOptions {
  reportPath: string;
  lineChartPath: string;
  barChartPath: string;
  generatedAt: Date;
}

export function escapeHtml(value: string): string {
  return value
    .replace(/&/g, '&amp;')
    .replace(/</g, '&lt;')
    .replace(/>/g, '&gt;')
    .replace(/"/g, '&quot;')
    .replace(/'/g, '&#39;');
}

function formatCost(amount: number): string {
  return amount.toFixed(4);
}

function formatDay(date: string | null, amount: number): string {
  return `${date ?? 'N/A'} (${formatCost(amount)} USD)`;
}

/** "2024-01-02 03:04:05 UTC" */
export function formatUtcTimestamp(date: Date): string {
  return `${date.toISOString().slice(0, 19).replace('T', ' ')} UTC`;
}

/** Path of `target` as seen from the directory holding `reportPath`, with forward slashes. */
export function relativeAssetPath(reportPath: string, target: string): string {
  return path.relative(path.dirname(reportPath), target).split(path.sep).join('/');
}

function formatSourceLabel(source: DailySource): string {
  switch (source) {
    case 'total-series':
      return 'daily total series';
    case 'derived-from-type':
      return 'derived from per-instance-type costs';
  }
}

export function formatCostReportAsHTML(summary: CostSummary, options: HtmlReportOptions): string {
  const lineSrc = escapeHtml(relativeAssetPath(options.reportPath, options.lineChartPath));
  const barSrc = escapeHtml(relativeAssetPath(options.reportPath, options.barChartPath));

  const emptyNotice =
    summary.days === 0
      ? `
    <p class="empty">No cost data available for the selected period.</p>`
      : '';

  return `<!DOCTYPE html>
<html>
<head>
  <meta charset="utf-8">
  <meta name="viewport" content="width=device-width, initial-scale=1.0">
  <title>EC2 Cost Report</title>
  <style>
    body { font-family: Arial, sans-serif; padding: 20px; background: #f5f5f5; margin: 0; }
    .container { max-width: 1200px; margin: 0 auto; background: white; padding: 30px; border-radius: 8px; box-shadow: 0 2px 4px rgba(0,0,0,0.1); }
    h1, h2 { color: #232f3e; }
    table { border-collapse: collapse; margin-top: 10px; }
    th { background: #232f3e; color: white; padding: 10px 12px; text-align: left; font-weight: normal; }
    td { padding: 10px 12px; border-bottom: 1px solid #ddd; text-align: right; }
    .empty { color: #d13212; }
    img { max-width: 100%; height: auto; }
    .footer { margin-top: 30px; padding-top: 20px; border-top: 1px solid #ddd; color: #666; font-size: 12px; text-align: center; }
  </style>
</head>
<body>
  <div class="container">
    <h1>EC2 Instance Cost Analysis Report</h1>

    <h2>Summary</h2>${emptyNotice}
    <table>
      <tr><th>Total Cost (USD)</th><td>${formatCost(summary.totalCost)}</td></tr>
      <tr><th>Average Daily Cost (USD)</th><td>${formatCost(summary.averageCost)}</td></tr>
      <tr><th>Highest Cost Day</th><td>${escapeHtml(formatDay(summary.maxCostDate, summary.maxCost))}</td></tr>
      <tr><th>Lowest Cost Day</th><td>${escapeHtml(formatDay(summary.minCostDate, summary.minCost))}</td></tr>
    </table>

    <h2>Daily Cost</h2>
    <img src="${lineSrc}" alt="Daily cost">

    <h2>Cost per Instance Type</h2>
    <img src="${barSrc}" alt="Cost per instance type">

    <div class="footer">
      <p>Generated ${formatUtcTimestamp(options.generatedAt)}</p>
    </div>
  </div>
</body>
</html>
`;
}

export function formatSummaryAsPlainText(artifacts: ReportArtifacts): string {
  const { summary } = artifacts;

  return `
================================================================================
                          EC2 COST REPORT
================================================================================

Days:                   ${summary.days}
Daily costs:            ${formatSourceLabel(artifacts.dailySource)}

Total Cost:             $${formatCost(summary.totalCost)}
Average Daily Cost:     $${formatCost(summary.averageCost)}
Highest Cost Day:       ${formatDay(summary.maxCostDate, summary.maxCost)}
Lowest Cost Day:        ${formatDay(summary.minCostDate, summary.minCost)}

--------------------------------------------------------------------------------
Report:                 ${artifacts.reportPath}
Daily chart:            ${artifacts.lineChartPath}
Instance type chart:    ${artifacts.barChartPath}
================================================================================
`;
}
