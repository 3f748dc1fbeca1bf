import fs from 'fs';
import os from 'os';
import path from 'path';
import { afterEach, beforeEach, describe, expect, test, vi } from 'vitest';
import { MalformedInputError, MissingRequiredInputError } from './errors';
import { generateCostReport } from './report';
import { DAILY_TOTAL_FILE, PER_INSTANCE_TYPE_FILE } from './storage';

function groupedEntry(start: string, groups: Array<[string, string]>) {
  return {
    TimePeriod: { Start: start },
    Groups: groups.map(([key, amount]) => ({ Keys: [key], Metrics: { UnblendedCost: { Amount: amount } } })),
  };
}

const GROUPED_SERIES = [
  groupedEntry('2024-01-01', [
    ['t2.micro', '1.0'],
    ['m5.large', '2.5'],
  ]),
  groupedEntry('2024-01-02', [['t2.micro', '1.2']]),
];

describe('generateCostReport', () => {
  let workDir: string;
  let inDir: string;
  let outDir: string;
  const now = new Date(Date.UTC(2024, 0, 3, 12, 0, 0));

  beforeEach(() => {
    workDir = fs.mkdtempSync(path.join(os.tmpdir(), 'report-'));
    inDir = path.join(workDir, 'in');
    outDir = path.join(workDir, 'out');
    fs.mkdirSync(inDir);
    vi.spyOn(console, 'log').mockImplementation(() => undefined);
  });

  afterEach(() => {
    vi.restoreAllMocks();
    fs.rmSync(workDir, { recursive: true, force: true });
  });

  function writeInput(name: string, data: unknown) {
    fs.writeFileSync(path.join(inDir, name), JSON.stringify(data));
  }

  test('derives daily totals and writes the report with both charts', () => {
    writeInput(PER_INSTANCE_TYPE_FILE, GROUPED_SERIES);

    const artifacts = generateCostReport({ inDir, outDir, now });

    expect(artifacts.dailySource).toBe('derived-from-type');
    expect(artifacts.reportPath).toBe(path.join(outDir, 'ec2_cost_report.html'));
    expect(artifacts.lineChartPath).toBe(path.join(outDir, 'images', 'cost_over_time.png'));
    expect(artifacts.barChartPath).toBe(path.join(outDir, 'images', 'cost_per_instance_type.png'));
    expect(artifacts.summary.totalCost).toBeCloseTo(4.7, 10);
    expect(artifacts.summary.averageCost).toBeCloseTo(2.35, 10);
    expect(artifacts.summary.maxCostDate).toBe('2024-01-01');
    expect(artifacts.summary.maxCost).toBe(3.5);
    expect(artifacts.summary.minCostDate).toBe('2024-01-02');
    expect(artifacts.summary.minCost).toBe(1.2);

    const html = fs.readFileSync(artifacts.reportPath, 'utf-8');
    expect(html).toContain('<tr><th>Total Cost (USD)</th><td>4.7000</td></tr>');
    expect(html).toContain('<img src="images/cost_over_time.png" alt="Daily cost">');
    expect(html).toContain('<p>Generated 2024-01-03 12:00:00 UTC</p>');
    expect(fs.existsSync(artifacts.lineChartPath)).toBe(true);
    expect(fs.existsSync(artifacts.barChartPath)).toBe(true);
  });

  test('uses the daily total series verbatim when supplied', () => {
    writeInput(PER_INSTANCE_TYPE_FILE, GROUPED_SERIES);
    writeInput(DAILY_TOTAL_FILE, [
      { TimePeriod: { Start: '2024-01-01' }, Total: { UnblendedCost: { Amount: '3.5' } } },
      { TimePeriod: { Start: '2024-01-02' }, Total: { UnblendedCost: { Amount: '1.25' } } },
    ]);

    const artifacts = generateCostReport({ inDir, outDir, now });

    expect(artifacts.dailySource).toBe('total-series');
    expect(artifacts.summary.totalCost).toBe(4.75);
    expect(artifacts.summary.minCost).toBe(1.25);
  });

  test('produces a sparse report for an empty grouped series', () => {
    writeInput(PER_INSTANCE_TYPE_FILE, []);

    const artifacts = generateCostReport({ inDir, outDir, now });

    expect(artifacts.summary).toEqual({
      totalCost: 0,
      averageCost: 0,
      maxCost: 0,
      maxCostDate: null,
      minCost: 0,
      minCostDate: null,
      days: 0,
    });
    const html = fs.readFileSync(artifacts.reportPath, 'utf-8');
    expect(html).toContain('<tr><th>Lowest Cost Day</th><td>N/A (0.0000 USD)</td></tr>');
  });

  test('fails without producing a report when the grouped series is missing', () => {
    expect(() => generateCostReport({ inDir, outDir, now })).toThrow(MissingRequiredInputError);
    expect(fs.existsSync(outDir)).toBe(false);
  });

  test('fails the whole run on malformed input', () => {
    writeInput(PER_INSTANCE_TYPE_FILE, [{ TimePeriod: { Start: '2024-01-01' }, Groups: [{ Keys: ['t2.micro'] }] }]);

    expect(() => generateCostReport({ inDir, outDir, now })).toThrow(MalformedInputError);
    expect(fs.existsSync(outDir)).toBe(false);
  });
});
