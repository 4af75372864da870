/**
 * Standalone HTML report for one analysis result.
 */

import type { AnalysisResult } from "../types.js";
import { renderFitChartSvg } from "./chart.js";
import {
  escapeHtml,
  formatCorrections,
  formatNumber,
  formatPercent,
  formatRSquared,
  formatSlope,
  formatWavelength
} from "./renderHelpers.js";

export interface ReportOptions {
  title?: string;
  datasetId?: string;
  measuredAt?: string;
}

export const RECOMMENDATIONS = [
  "Align the optical path carefully so the fringe centre stays as close to the axis as possible.",
  "After zeroing the scale, keep turning the fine drum 3-4 revolutions in the same direction before recording, to take up screw backlash.",
  "Centre the fringe pattern while the fringes are still sparse (small mirror separation).",
  "Recording more data points improves the precision of the fit."
] as const;

function resultItem(label: string, value: string): string {
  return `<div class="result-item"><strong>${escapeHtml(label)}:</strong> ${escapeHtml(value)}</div>`;
}

/**
 * Result fields as an HTML fragment, shared by the report document and the demo page.
 */
export function renderResultSection(result: AnalysisResult): string {
  const corrections = formatCorrections(result.corrections)
    .map((line) => `<li>${escapeHtml(line)}</li>`)
    .join("");

  return `\
<div class="result-box">
  <div class="result-title">Measurement results</div>
  ${resultItem("Wavelength", formatWavelength(result))}
  ${resultItem("Relative uncertainty", formatPercent(result.total_relative_uncertainty_pct))}
  ${resultItem("Goodness of fit R²", formatRSquared(result.r_squared))}
  ${resultItem("Slope", formatSlope(result.slope_mm_per_fringe))}
  ${resultItem("Slope standard error", formatSlope(result.slope_uncertainty_mm_per_fringe))}
  ${resultItem("Data points", `${result.point_count} over ${formatNumber(result.fringe_range, 0)} fringes`)}
  <ul class="corrections">${corrections}</ul>
</div>`;
}

export function renderReportHtml(result: AnalysisResult, options: ReportOptions = {}): string {
  const title = options.title ?? "Michelson interferometer analysis";
  const meta: string[] = [];
  if (options.datasetId) meta.push(`Dataset ${options.datasetId}`);
  if (options.measuredAt) meta.push(`measured at ${options.measuredAt}`);
  const metaLine = meta.length > 0 ? `<p class="meta">${escapeHtml(meta.join(", "))}</p>` : "";
  const recommendations = RECOMMENDATIONS.map(
    (text, i) => `<div class="result-item">${i + 1}. ${escapeHtml(text)}</div>`
  ).join("\n      ");

  return `<!DOCTYPE html>
<html>
<head>
  <title>${escapeHtml(title)}</title>
  <meta charset="UTF-8">
  <meta name="viewport" content="width=device-width, initial-scale=1.0">
  <style>
    body { font-family: Arial, sans-serif; margin: 20px; }
    .container { max-width: 840px; margin: 0 auto; }
    .meta { color: #666666; }
    .result-box { border: 1px solid #dddddd; border-radius: 5px; padding: 15px; margin-bottom: 20px; }
    .result-title { font-size: 18px; font-weight: bold; margin-bottom: 10px; }
    .result-item { margin-bottom: 5px; }
    .plot-container { text-align: center; margin: 20px 0; }
    .plot-container svg { max-width: 100%; height: auto; }
  </style>
</head>
<body>
  <div class="container">
    <h1>${escapeHtml(title)}</h1>
    ${metaLine}
    ${renderResultSection(result)}
    <div class="plot-container">
${renderFitChartSvg(result)}
    </div>
    <div class="result-box">
      <div class="result-title">Recommendations</div>
      ${recommendations}
    </div>
  </div>
</body>
</html>
`;
}
