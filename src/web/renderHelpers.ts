import type { AnalysisCorrections, AnalysisResult } from "../types.js";

export function toNumber(value: unknown): number | undefined {
  if (typeof value === "number" && Number.isFinite(value)) {
    return value;
  }
  return undefined;
}

export function formatNumber(value: unknown, digits = 2): string {
  const numeric = toNumber(value);
  if (numeric === undefined) return "—";
  return numeric.toFixed(digits);
}

export function escapeHtml(text: string): string {
  return text
    .replace(/&/g, "&amp;")
    .replace(/</g, "&lt;")
    .replace(/>/g, "&gt;")
    .replace(/"/g, "&quot;")
    .replace(/'/g, "&#39;");
}

export function formatWavelength(result: Pick<AnalysisResult, "wavelength_nm" | "wavelength_uncertainty_nm">): string {
  return `${formatNumber(result.wavelength_nm, 2)} ± ${formatNumber(result.wavelength_uncertainty_nm, 2)} nm`;
}

export function formatPercent(value: unknown, digits = 2): string {
  const numeric = toNumber(value);
  if (numeric === undefined) return "—";
  return `${numeric.toFixed(digits)}%`;
}

export function formatSlope(value: unknown): string {
  return `${formatNumber(value, 8)} mm/fringe`;
}

export function formatSlopeWithUncertainty(
  result: Pick<AnalysisResult, "slope_mm_per_fringe" | "slope_uncertainty_mm_per_fringe">
): string {
  return `${formatNumber(result.slope_mm_per_fringe, 8)} ± ${formatNumber(result.slope_uncertainty_mm_per_fringe, 8)} mm/fringe`;
}

export function formatRSquared(value: unknown): string {
  return formatNumber(value, 6);
}

export function formatCorrections(corrections: AnalysisCorrections): string[] {
  const lines: string[] = [];

  if (corrections.backlash === null) {
    lines.push("Backlash correction: off");
  } else if (corrections.backlash_applied) {
    lines.push(
      `Backlash correction: applied (first spacings rebuilt at ${formatNumber(corrections.backlash.reference_average, 6)} mm)`
    );
  } else {
    lines.push("Backlash correction: not needed");
  }

  if (corrections.path === null) {
    lines.push("Path correction: none");
  } else {
    const { deviation_cm, path_length_cm, cos_theta } = corrections.path;
    lines.push(
      `Path correction: ${deviation_cm} cm offset over ${path_length_cm} cm (cos θ = ${formatNumber(cos_theta, 6)})`
    );
  }

  return lines;
}

/**
 * Plain JSON record of a result, with the series as two parallel lists.
 */
export function resultToJson(result: AnalysisResult): Record<string, unknown> {
  return {
    wavelength_nm: result.wavelength_nm,
    wavelength_uncertainty_nm: result.wavelength_uncertainty_nm,
    total_relative_uncertainty_pct: result.total_relative_uncertainty_pct,
    slope_mm_per_fringe: result.slope_mm_per_fringe,
    slope_uncertainty_mm_per_fringe: result.slope_uncertainty_mm_per_fringe,
    intercept_mm: result.intercept_mm,
    r_squared: result.r_squared,
    point_count: result.point_count,
    fringe_range: result.fringe_range,
    corrections: result.corrections,
    fringe_counts: result.series.map((p) => p.fringe_count),
    displacements_mm: result.series.map((p) => p.displacement_mm),
  };
}
