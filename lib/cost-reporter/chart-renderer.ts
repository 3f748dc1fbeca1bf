import { Resvg } from '@resvg/resvg-js';
import path from 'path';
import { totalsByInstanceType } from './aggregator';
import { sortByDate } from './normalizer';
import { BAR_CHART_FILE, LINE_CHART_FILE, writeFileAtomic } from './storage';
import type { ChartPaths, CostByTypePoint, CostPoint, InstanceTypeTotal } from './types';

export interface ChartOptions {
  width?: number;
  height?: number;
  title?: string;
}

interface Frame {
  width: number;
  height: number;
  plotLeft: number;
  plotRight: number;
  plotTop: number;
  plotBottom: number;
  plotWidth: number;
  plotHeight: number;
}

const FONT_FAMILY = 'Arial, Helvetica, sans-serif';
const LINE_COLOR = '#1f77b4';
const BAR_COLOR = '#ff9900';
const MAX_X_LABELS = 31;
const MAX_LABEL_LENGTH = 18;

export function escapeXml(value: string): string {
  return value
    .replace(/&/g, '&amp;')
    .replace(/</g, '&lt;')
    .replace(/>/g, '&gt;')
    .replace(/"/g, '&quot;')
    .replace(/'/g, '&apos;');
}

function fmt(value: number): string {
  return value.toFixed(2);
}

export function truncateLabel(label: string, maxLength: number = MAX_LABEL_LENGTH): string {
  return label.length > maxLength ? `${label.slice(0, maxLength - 1)}…` : label;
}

/**
 * Y axis ticks on 1/2/5 steps covering 0 and the given range. Costs below
 * zero (credits) extend the axis downwards; with nothing to scale the axis
 * falls back to 0..1.
 */
export function niceTicks(maxValue: number, targetCount: number = 5, minValue: number = 0): number[] {
  const low = Math.min(0, minValue);
  const high = maxValue > 0 ? maxValue : low < 0 ? 0 : 1;
  const rawStep = (high - low) / targetCount;
  const magnitude = 10 ** Math.floor(Math.log10(rawStep));
  const residual = rawStep / magnitude;
  const step = (residual > 5 ? 10 : residual > 2 ? 5 : residual > 1 ? 2 : 1) * magnitude;
  const below = Math.max(0, Math.ceil(-low / step - 1e-9));
  const above = Math.max(0, Math.ceil(high / step - 1e-9));

  return Array.from({ length: below + above + 1 }, (_, i) => Number(((i - below) * step).toPrecision(12)));
}

function ticksFor(values: readonly number[]): number[] {
  return niceTicks(Math.max(0, ...values), 5, Math.min(0, ...values));
}

function scaleY(frame: Frame, ticks: readonly number[]): (value: number) => number {
  const bottom = ticks[0];
  const top = ticks[ticks.length - 1];
  return (value) => frame.plotBottom - ((value - bottom) / (top - bottom)) * frame.plotHeight;
}

function createFrame(width: number, height: number, left: number, bottom: number): Frame {
  const plotLeft = left;
  const plotRight = width - 40;
  const plotTop = 60;
  const plotBottom = height - bottom;
  return {
    width,
    height,
    plotLeft,
    plotRight,
    plotTop,
    plotBottom,
    plotWidth: plotRight - plotLeft,
    plotHeight: plotBottom - plotTop,
  };
}

function openChart(frame: Frame, title: string, xLabel: string, yLabel: string): string[] {
  const midX = frame.plotLeft + frame.plotWidth / 2;
  const midY = frame.plotTop + frame.plotHeight / 2;
  return [
    `<svg xmlns="http://www.w3.org/2000/svg" width="${frame.width}" height="${frame.height}" viewBox="0 0 ${frame.width} ${frame.height}" font-family="${FONT_FAMILY}">`,
    `<rect x="0" y="0" width="${frame.width}" height="${frame.height}" fill="#ffffff"/>`,
    `<text class="title" x="${fmt(frame.width / 2)}" y="32" text-anchor="middle" font-size="20" fill="#232f3e">${escapeXml(title)}</text>`,
    `<text class="axis-label" x="${fmt(midX)}" y="${fmt(frame.height - 12)}" text-anchor="middle" font-size="14" fill="#232f3e">${escapeXml(xLabel)}</text>`,
    `<text class="axis-label" x="20" y="${fmt(midY)}" transform="rotate(-90 20 ${fmt(midY)})" text-anchor="middle" font-size="14" fill="#232f3e">${escapeXml(yLabel)}</text>`,
  ];
}

function drawYAxis(frame: Frame, ticks: number[]): string[] {
  const yOf = scaleY(frame, ticks);
  const parts: string[] = [];

  for (const tick of ticks) {
    const y = yOf(tick);
    parts.push(
      `<line x1="${fmt(frame.plotLeft)}" y1="${fmt(y)}" x2="${fmt(frame.plotRight)}" y2="${fmt(y)}" stroke="#e0e0e0" stroke-width="1"/>`,
      `<text class="y-tick" x="${fmt(frame.plotLeft - 8)}" y="${fmt(y + 4)}" text-anchor="end" font-size="12" fill="#444444">${tick}</text>`
    );
  }

  parts.push(
    `<line x1="${fmt(frame.plotLeft)}" y1="${fmt(frame.plotTop)}" x2="${fmt(frame.plotLeft)}" y2="${fmt(frame.plotBottom)}" stroke="#232f3e" stroke-width="1"/>`,
    `<line x1="${fmt(frame.plotLeft)}" y1="${fmt(frame.plotBottom)}" x2="${fmt(frame.plotRight)}" y2="${fmt(frame.plotBottom)}" stroke="#232f3e" stroke-width="1"/>`
  );
  return parts;
}

function drawXLabel(x: number, frame: Frame, label: string): string {
  const y = frame.plotBottom + 16;
  return `<text class="x-tick" x="${fmt(x)}" y="${fmt(y)}" transform="rotate(-45 ${fmt(x)} ${fmt(y)})" text-anchor="end" font-size="12" fill="#444444">${escapeXml(label)}</text>`;
}

function drawNoData(frame: Frame): string {
  return `<text class="no-data" x="${fmt(frame.plotLeft + frame.plotWidth / 2)}" y="${fmt(frame.plotTop + frame.plotHeight / 2)}" text-anchor="middle" font-size="18" fill="#888888">No data</text>`;
}

/** Daily cost over time, one marker per day. An empty series yields empty axes. */
export function buildLineChartSvg(points: readonly CostPoint[], options: ChartOptions = {}): string {
  const frame = createFrame(options.width ?? 1000, options.height ?? 600, 90, 110);
  const sorted = sortByDate(points);
  const ticks = ticksFor(sorted.map((point) => point.cost));
  const parts = [
    ...openChart(frame, options.title ?? 'Daily EC2 Cost', 'Date', 'Cost (USD)'),
    ...drawYAxis(frame, ticks),
  ];

  if (sorted.length === 0) {
    parts.push(drawNoData(frame), '</svg>');
    return parts.join('\n');
  }

  const times = sorted.map((point) => Date.parse(`${point.date}T00:00:00Z`));
  const first = times[0];
  const last = times[times.length - 1];
  const xOf = (time: number): number =>
    last === first
      ? frame.plotLeft + frame.plotWidth / 2
      : frame.plotLeft + ((time - first) / (last - first)) * frame.plotWidth;
  const yOf = scaleY(frame, ticks);

  const coordinates = sorted.map((point, i) => ({ point, x: xOf(times[i]), y: yOf(point.cost) }));
  const labelStep = Math.ceil(coordinates.length / MAX_X_LABELS);

  parts.push(
    `<polyline class="series" fill="none" stroke="${LINE_COLOR}" stroke-width="2" points="${coordinates
      .map(({ x, y }) => `${fmt(x)},${fmt(y)}`)
      .join(' ')}"/>`
  );

  coordinates.forEach(({ point, x, y }, i) => {
    parts.push(
      `<circle class="point" data-date="${point.date}" data-value="${point.cost.toFixed(4)}" cx="${fmt(x)}" cy="${fmt(y)}" r="4" fill="${LINE_COLOR}"/>`
    );
    if (i % labelStep === 0) {
      parts.push(drawXLabel(x, frame, point.date));
    }
  });

  parts.push('</svg>');
  return parts.join('\n');
}

/** Bars are drawn in the order given; callers pass totals sorted descending. */
export function buildBarChartSvg(totals: readonly InstanceTypeTotal[], options: ChartOptions = {}): string {
  const frame = createFrame(options.width ?? 1200, options.height ?? 600, 90, 140);
  const ticks = ticksFor(totals.map((total) => total.cost));
  const parts = [
    ...openChart(frame, options.title ?? 'EC2 Cost per Instance Type (Period Total)', 'Instance Type', 'Cost (USD)'),
    ...drawYAxis(frame, ticks),
  ];

  if (totals.length === 0) {
    parts.push(drawNoData(frame), '</svg>');
    return parts.join('\n');
  }

  const band = frame.plotWidth / totals.length;
  const yOf = scaleY(frame, ticks);
  const baseline = yOf(0);

  // bars grow up from zero, credits hang below it
  totals.forEach((total, i) => {
    const valueY = yOf(total.cost);
    const x = frame.plotLeft + i * band + band * 0.1;
    parts.push(
      `<rect class="bar" data-label="${escapeXml(total.instanceType)}" data-value="${total.cost.toFixed(4)}" x="${fmt(x)}" y="${fmt(Math.min(baseline, valueY))}" width="${fmt(band * 0.8)}" height="${fmt(Math.abs(baseline - valueY))}" fill="${BAR_COLOR}"/>`,
      drawXLabel(frame.plotLeft + (i + 0.5) * band, frame, truncateLabel(total.instanceType))
    );
  });

  parts.push('</svg>');
  return parts.join('\n');
}

export function renderPng(svg: string): Buffer {
  const resvg = new Resvg(svg, {
    background: 'white',
    font: {
      loadSystemFonts: true,
      defaultFontFamily: 'Arial',
    },
  });
  return resvg.render().asPng();
}

export function renderCharts(
  daily: readonly CostPoint[],
  byType: readonly CostByTypePoint[],
  imagesDir: string
): ChartPaths {
  const lineChartPath = writeFileAtomic(
    path.join(imagesDir, LINE_CHART_FILE),
    renderPng(buildLineChartSvg(daily))
  );
  const barChartPath = writeFileAtomic(
    path.join(imagesDir, BAR_CHART_FILE),
    renderPng(buildBarChartSvg(totalsByInstanceType(byType)))
  );

  return { lineChartPath, barChartPath };
}
