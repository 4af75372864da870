/**
 * Combination of the statistical slope uncertainty with the fringe-reading
 * granularity into one relative uncertainty.
 */

import type {
  AnalysisConfig,
  MeasurementSeries,
  RegressionResult,
  UncertaintyReport
} from "./types.js";
import { DegenerateInputError } from "./errors.js";
import { resolveConfig } from "./constants.js";
import { range } from "./math/stats.js";

/**
 * Spread of fringe counts (max - min) across the series.
 */
export function fringeRange(series: MeasurementSeries): number {
  return range(series.map((p) => p.fringe_count));
}

/**
 * Relative uncertainty in percent:
 * 100 * sqrt((se / slope)^2 + (reading / fringe_range)^2)
 *
 * @throws DegenerateInputError if slope or fringe_range is zero
 */
export function combineUncertainty(
  regression: Pick<RegressionResult, "slope" | "standard_error_of_slope" | "wavelength_nm" | "wavelength_uncertainty_nm">,
  fringe_range: number,
  config?: Partial<AnalysisConfig>
): UncertaintyReport {
  if (regression.slope === 0) {
    throw new DegenerateInputError(
      "Fitted slope is zero; relative uncertainty is undefined",
      "zero_slope"
    );
  }
  if (fringe_range === 0) {
    throw new DegenerateInputError(
      "Fringe counts span no range; reading uncertainty is undefined",
      "zero_fringe_range"
    );
  }

  const { fringe_reading_uncertainty } = resolveConfig(config);
  const slope_relative_uncertainty = regression.standard_error_of_slope / regression.slope;
  const reading_relative_uncertainty = fringe_reading_uncertainty / fringe_range;

  return {
    wavelength_nm: regression.wavelength_nm,
    wavelength_uncertainty_nm: regression.wavelength_uncertainty_nm,
    total_relative_uncertainty_pct:
      100 * Math.hypot(slope_relative_uncertainty, reading_relative_uncertainty),
    slope_relative_uncertainty,
    reading_relative_uncertainty,
  };
}
