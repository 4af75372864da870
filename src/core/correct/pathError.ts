/**
 * Off-axis viewing correction.
 *
 * If the fringe centre seen on the screen is offset by `deviation_cm` from the
 * optical axis at a distance `path_length_cm`, the observed mirror travel is
 * foreshortened by cos(theta), theta = atan(deviation / path_length).
 */

import type {
  AnalysisConfig,
  MeasurementSeries,
  PathCorrection,
  RegressionResult
} from "../types.js";
import { DegenerateInputError } from "../errors.js";
import { resolveConfig } from "../constants.js";
import { fitFringeDisplacement } from "../fit/linearFit.js";

export interface PathErrorOptions {
  deviation_cm?: number;
  path_length_cm?: number;
  config?: Partial<AnalysisConfig>;
}

/**
 * Compute the viewing angle for a given offset and screen distance.
 *
 * @throws DegenerateInputError for a non-finite deviation or a path length that
 * is not a positive number
 */
export function pathCorrection(deviation_cm: number, path_length_cm: number): PathCorrection {
  if (!Number.isFinite(deviation_cm)) {
    throw new DegenerateInputError(
      `deviation_cm must be a finite number, got ${deviation_cm}`,
      "invalid_path_geometry"
    );
  }
  if (!Number.isFinite(path_length_cm) || path_length_cm <= 0) {
    throw new DegenerateInputError(
      `path_length_cm must be a positive number, got ${path_length_cm}`,
      "invalid_path_geometry"
    );
  }

  const theta_rad = Math.atan(deviation_cm / path_length_cm);
  return {
    deviation_cm,
    path_length_cm,
    theta_rad,
    cos_theta: Math.cos(theta_rad),
  };
}

/**
 * Divide every displacement by cos(theta).
 */
export function scaleForPathError(
  series: MeasurementSeries,
  correction: PathCorrection
): MeasurementSeries {
  return series.map((point) => ({
    fringe_count: point.fringe_count,
    displacement_mm: point.displacement_mm / correction.cos_theta,
  }));
}

export interface PathCorrectedFit {
  regression: RegressionResult;
  /** The series that was fitted */
  series: MeasurementSeries;
  /** Null when the deviation was zero */
  correction: PathCorrection | null;
}

/**
 * Scale the series for off-axis viewing and fit it, keeping the scaled series
 * and the viewing angle alongside the regression.
 */
export function fitWithPathCorrection(
  series: MeasurementSeries,
  options: PathErrorOptions = {}
): PathCorrectedFit {
  const deviation_cm = options.deviation_cm ?? 0;
  if (deviation_cm === 0) {
    return { regression: fitFringeDisplacement(series), series, correction: null };
  }

  const path_length_cm =
    options.path_length_cm ?? resolveConfig(options.config).default_path_length_cm;
  const correction = pathCorrection(deviation_cm, path_length_cm);
  const scaled = scaleForPathError(series, correction);
  return { regression: fitFringeDisplacement(scaled), series: scaled, correction };
}

/**
 * Fit the series after compensating for off-axis viewing.
 *
 * A zero deviation fits the series exactly as given.
 */
export function correctPathError(
  series: MeasurementSeries,
  options: PathErrorOptions = {}
): RegressionResult {
  return fitWithPathCorrection(series, options).regression;
}
