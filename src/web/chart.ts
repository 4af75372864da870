/**
 * SVG scatter-plus-fit chart of displacement against fringe count.
 */

import type { AnalysisResult } from "../types.js";
import { extent } from "../core/math/stats.js";
import {
  escapeHtml,
  formatPercent,
  formatRSquared,
  formatSlope,
  formatWavelength
} from "./renderHelpers.js";

export interface ChartOptions {
  width?: number;
  height?: number;
  title?: string;
}

const MARGIN = { top: 40, right: 24, bottom: 56, left: 96 };
const MAX_TICKS = 50;

/**
 * Round tick positions covering [min, max] with a 1-2-5 step.
 */
export function niceTicks(min: number, max: number, target = 5): number[] {
  if (!Number.isFinite(min) || !Number.isFinite(max)) return [];
  if (max === min) return [min];

  const span = max - min;
  const rawStep = span / target;
  const magnitude = 10 ** Math.floor(Math.log10(rawStep));
  const normalized = rawStep / magnitude;
  const step =
    (normalized < 1.5 ? 1 : normalized < 3 ? 2 : normalized < 7 ? 5 : 10) * magnitude;

  const start = Math.ceil(min / step) * step;
  // Ticks are labelled to 12 significant digits; a finer step cannot be shown.
  if (start + step === start || step <= Math.abs(start) * 1e-11) return [min, max];

  const count = Math.min(Math.floor((max - start) / step + 1e-9), MAX_TICKS - 1);
  const ticks: number[] = [];
  for (let k = 0; k <= count; k++) {
    ticks.push(Number((start + k * step).toPrecision(12)));
  }
  return ticks;
}

function tickDecimals(ticks: number[]): number {
  if (ticks.length < 2) return 2;
  const step = Math.abs(ticks[1] - ticks[0]);
  return Math.min(20, Math.max(0, -Math.floor(Math.log10(step))));
}

/**
 * Pad a data extent so points do not sit on the plot border.
 */
export function paddedDomain(values: readonly number[], fraction = 0.05): [number, number] {
  if (values.length === 0) return [0, 1];
  const [min, max] = extent(values);
  const span = max - min;
  const pad = span > 0 ? span * fraction : Math.abs(min) * fraction || 1;
  return [min - pad, max + pad];
}

export function linearScale(
  domain: [number, number],
  rangeOut: [number, number]
): (value: number) => number {
  const [d0, d1] = domain;
  const [r0, r1] = rangeOut;
  const k = d1 === d0 ? 0 : (r1 - r0) / (d1 - d0);
  return (value) => r0 + (value - d0) * k;
}

function px(value: number): string {
  return value.toFixed(2);
}

export function renderFitChartSvg(result: AnalysisResult, options: ChartOptions = {}): string {
  const width = options.width ?? 800;
  const height = options.height ?? 480;
  const title = options.title ?? "Michelson interferometer: displacement vs fringe count";

  const fringes = result.series.map((p) => p.fringe_count);
  const displacements = result.series.map((p) => p.displacement_mm);

  const xDomain = paddedDomain(fringes);
  const yDomain = paddedDomain(displacements);
  const plotLeft = MARGIN.left;
  const plotRight = width - MARGIN.right;
  const plotTop = MARGIN.top;
  const plotBottom = height - MARGIN.bottom;

  const x = linearScale(xDomain, [plotLeft, plotRight]);
  const y = linearScale(yDomain, [plotBottom, plotTop]);

  const xTicks = niceTicks(xDomain[0], xDomain[1]);
  const yTicks = niceTicks(yDomain[0], yDomain[1]);
  const xDecimals = tickDecimals(xTicks);
  const yDecimals = tickDecimals(yTicks);

  const parts: string[] = [];
  parts.push(
    `<svg xmlns="http://www.w3.org/2000/svg" viewBox="0 0 ${width} ${height}" width="${width}" height="${height}" font-family="Arial, sans-serif" font-size="12">`
  );
  parts.push(`<rect x="0" y="0" width="${width}" height="${height}" fill="#ffffff"/>`);
  parts.push(
    `<text x="${px(width / 2)}" y="24" text-anchor="middle" font-size="16">${escapeHtml(title)}</text>`
  );

  // Grid and ticks
  for (const t of xTicks) {
    const tx = px(x(t));
    parts.push(`<line class="grid" x1="${tx}" y1="${plotTop}" x2="${tx}" y2="${plotBottom}" stroke="#e5e5e5"/>`);
    parts.push(
      `<text x="${tx}" y="${plotBottom + 18}" text-anchor="middle">${t.toFixed(xDecimals)}</text>`
    );
  }
  for (const t of yTicks) {
    const ty = px(y(t));
    parts.push(`<line class="grid" x1="${plotLeft}" y1="${ty}" x2="${plotRight}" y2="${ty}" stroke="#e5e5e5"/>`);
    parts.push(
      `<text x="${plotLeft - 8}" y="${ty}" text-anchor="end" dominant-baseline="middle">${t.toFixed(yDecimals)}</text>`
    );
  }

  parts.push(
    `<rect x="${plotLeft}" y="${plotTop}" width="${plotRight - plotLeft}" height="${plotBottom - plotTop}" fill="none" stroke="#333333"/>`
  );
  parts.push(
    `<text x="${px((plotLeft + plotRight) / 2)}" y="${height - 14}" text-anchor="middle">Fringe count</text>`
  );
  parts.push(
    `<text x="18" y="${px((plotTop + plotBottom) / 2)}" text-anchor="middle" transform="rotate(-90 18 ${px((plotTop + plotBottom) / 2)})">Mirror displacement (mm)</text>`
  );

  // Fit line over the measured fringe range
  if (fringes.length > 0) {
    const [x0, x1] = extent(fringes);
    const y0 = result.slope_mm_per_fringe * x0 + result.intercept_mm;
    const y1 = result.slope_mm_per_fringe * x1 + result.intercept_mm;
    parts.push(
      `<line class="fit" x1="${px(x(x0))}" y1="${px(y(y0))}" x2="${px(x(x1))}" y2="${px(y(y1))}" stroke="#d62728" stroke-width="2"/>`
    );
  }

  for (const point of result.series) {
    parts.push(
      `<circle class="point" cx="${px(x(point.fringe_count))}" cy="${px(y(point.displacement_mm))}" r="4" fill="#1f77b4"/>`
    );
  }

  // Result annotation, top-left inside the plot
  const annotation = [
    `λ = ${formatWavelength(result)}`,
    `Relative uncertainty = ${formatPercent(result.total_relative_uncertainty_pct)}`,
    `Slope = ${formatSlope(result.slope_mm_per_fringe)}`,
    `R² = ${formatRSquared(result.r_squared)}`,
  ];
  const boxX = plotLeft + 12;
  const boxY = plotTop + 12;
  parts.push(
    `<rect x="${boxX}" y="${boxY}" width="260" height="${annotation.length * 16 + 12}" rx="4" fill="#ffffff" fill-opacity="0.85" stroke="#999999"/>`
  );
  annotation.forEach((line, i) => {
    parts.push(
      `<text class="annotation" x="${boxX + 8}" y="${boxY + 20 + i * 16}">${escapeHtml(line)}</text>`
    );
  });

  parts.push(`</svg>`);
  return parts.join("\n");
}
