/**
 * Ordinary least-squares fit of mirror displacement against fringe count.
 *
 * For a Michelson interferometer each fringe corresponds to a mirror travel of
 * half a wavelength, so the fitted slope (mm/fringe) gives the wavelength
 * directly: wavelength = 2 * slope.
 */

import type { MeasurementSeries, RegressionResult } from "../types.js";
import { DegenerateInputError, InsufficientDataError } from "../errors.js";
import { MM_PER_FRINGE_TO_WAVELENGTH_NM } from "../constants.js";
import { allEqual, mean } from "../math/stats.js";

export interface LinearFit {
  slope: number;
  intercept: number;
  standard_error_of_slope: number;
  standard_error_of_intercept: number;
  /** Pearson correlation coefficient, clipped to [-1, 1] */
  r: number;
  point_count: number;
}

/**
 * Fit y = slope * x + intercept by least squares.
 *
 * Standard errors use N - 2 degrees of freedom; with exactly two points the
 * line passes through both and both errors are reported as zero.
 *
 * @throws InsufficientDataError if fewer than 2 points are given
 * @throws DegenerateInputError if every x is identical
 */
export function linearFit(xs: readonly number[], ys: readonly number[]): LinearFit {
  const n = Math.min(xs.length, ys.length);
  if (n < 2) {
    throw new InsufficientDataError(n);
  }
  if (allEqual(xs)) {
    throw new DegenerateInputError(
      "All fringe counts are identical; the slope is undefined",
      "zero_fringe_variance"
    );
  }

  const xMean = mean(xs);
  const yMean = mean(ys);

  let sxx = 0;
  let syy = 0;
  let sxy = 0;
  let sumXSq = 0;
  for (let i = 0; i < n; i++) {
    const dx = xs[i] - xMean;
    const dy = ys[i] - yMean;
    sxx += dx * dx;
    syy += dy * dy;
    sxy += dx * dy;
    sumXSq += xs[i] * xs[i];
  }

  const slope = sxy / sxx;
  const intercept = yMean - slope * xMean;

  let r = 0;
  if (syy > 0) {
    r = Math.max(-1, Math.min(1, sxy / Math.sqrt(sxx * syy)));
  }

  let standard_error_of_slope = 0;
  if (n > 2) {
    // A constant y gives r = 0 and syy = 0, so the residual term is zero too.
    const residual = Math.max(0, (1 - r * r) * syy);
    standard_error_of_slope = Math.sqrt(residual / sxx / (n - 2));
  }
  const standard_error_of_intercept = standard_error_of_slope * Math.sqrt(sumXSq / n);

  return {
    slope,
    intercept,
    standard_error_of_slope,
    standard_error_of_intercept,
    r,
    point_count: n,
  };
}

/**
 * Fit displacement against fringe count and convert the slope to a wavelength.
 */
export function fitFringeDisplacement(series: MeasurementSeries): RegressionResult {
  const fit = linearFit(
    series.map((p) => p.fringe_count),
    series.map((p) => p.displacement_mm)
  );

  return {
    slope: fit.slope,
    intercept: fit.intercept,
    standard_error_of_slope: fit.standard_error_of_slope,
    standard_error_of_intercept: fit.standard_error_of_intercept,
    r_squared: fit.r * fit.r,
    point_count: fit.point_count,
    wavelength_nm: fit.slope * MM_PER_FRINGE_TO_WAVELENGTH_NM,
    wavelength_uncertainty_nm: fit.standard_error_of_slope * MM_PER_FRINGE_TO_WAVELENGTH_NM,
  };
}
