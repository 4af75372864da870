import type { AnalysisResult, MeasurementSeries } from "../types.js";
import {
  formatCorrections,
  formatPercent,
  formatRSquared,
  formatSlopeWithUncertainty,
  formatWavelength
} from "../web/renderHelpers.js";

export function formatInputTable(series: MeasurementSeries): string[] {
  const lines = ["#     Fringes   Position (mm)", "-".repeat(30)];
  series.forEach((point, i) => {
    lines.push(
      `${String(i + 1).padEnd(5)} ${String(point.fringe_count).padEnd(9)} ${point.displacement_mm.toFixed(6)}`
    );
  });
  return lines;
}

export function formatResultBlock(result: AnalysisResult): string[] {
  return [
    "=== Results ===",
    `Slope = ${formatSlopeWithUncertainty(result)}`,
    `Wavelength = ${formatWavelength(result)}`,
    `Relative uncertainty = ${formatPercent(result.total_relative_uncertainty_pct)}`,
    `R² = ${formatRSquared(result.r_squared)}`,
    ...formatCorrections(result.corrections),
  ];
}
