/**
 * End-to-end wavelength analysis of one measurement series.
 *
 * Steps, in order:
 * 1. backlash correction of the leading readings (when enabled)
 * 2. regression, through the off-axis correction when a deviation is given
 * 3. fringe range of the series
 * 4. combined relative uncertainty
 *
 * Nothing here performs I/O; rendering consumes the returned result.
 */

import type {
  AnalysisConfig,
  AnalysisResult,
  BacklashCheck,
  MeasurementSeries,
  PathCorrection
} from "./types.js";
import { resolveConfig } from "./constants.js";
import { applyBacklashCorrection, detectBacklash } from "./correct/backlash.js";
import { fitWithPathCorrection } from "./correct/pathError.js";
import { combineUncertainty, fringeRange } from "./uncertainty.js";
import { noopTracer, type TraceContext } from "./trace.js";

export interface AnalyzeOptions {
  /** Offset of the fringe centre from the optical axis (cm). Default 0. */
  deviation_cm?: number;
  /** Aperture-to-screen distance (cm). Defaults to config.default_path_length_cm. */
  path_length_cm?: number;
  /** Default true. */
  correct_backlash?: boolean;
  config?: Partial<AnalysisConfig>;
  tracer?: TraceContext;
}

function freezeSeries(series: MeasurementSeries): MeasurementSeries {
  return Object.freeze(series.map((p) => Object.freeze({ ...p })));
}

function freezeBacklashCheck(check: BacklashCheck | null): BacklashCheck | null {
  if (!check) return null;
  return Object.freeze({
    ...check,
    differences: Object.freeze([...check.differences]),
    flagged_indices: Object.freeze([...check.flagged_indices]),
  });
}

function freezePathCorrection(correction: PathCorrection | null): PathCorrection | null {
  return correction ? Object.freeze({ ...correction }) : null;
}

/**
 * Compute the wavelength and its uncertainty from a measurement series.
 *
 * @throws InsufficientDataError if the series has fewer than 2 points
 * @throws DegenerateInputError if fringe counts are all identical, the fitted
 * slope is zero, or the path geometry is invalid
 */
export function analyze(series: MeasurementSeries, options: AnalyzeOptions = {}): AnalysisResult {
  const config = resolveConfig(options.config);
  const tracer = options.tracer ?? noopTracer;
  const deviation_cm = options.deviation_cm ?? 0;
  const path_length_cm = options.path_length_cm ?? config.default_path_length_cm;
  const correct_backlash = options.correct_backlash ?? true;

  tracer.onAnalysisStart?.(series.length);

  let working = series;
  let backlash: BacklashCheck | null = null;
  if (correct_backlash) {
    backlash = freezeBacklashCheck(detectBacklash(working, config));
    tracer.onBacklashChecked?.(backlash);
    if (backlash) {
      working = applyBacklashCorrection(working, backlash);
    }
  }

  const fitted = fitWithPathCorrection(working, { deviation_cm, path_length_cm, config });
  const path = freezePathCorrection(fitted.correction);
  if (path) {
    tracer.onPathCorrected?.(path);
  }
  const regression = fitted.regression;
  tracer.onRegression?.(regression);

  const fringe_range = fringeRange(working);
  const uncertainty = combineUncertainty(regression, fringe_range, config);
  tracer.onUncertainty?.(uncertainty, fringe_range);

  const result: AnalysisResult = Object.freeze({
    wavelength_nm: uncertainty.wavelength_nm,
    wavelength_uncertainty_nm: uncertainty.wavelength_uncertainty_nm,
    total_relative_uncertainty_pct: uncertainty.total_relative_uncertainty_pct,
    slope_mm_per_fringe: regression.slope,
    slope_uncertainty_mm_per_fringe: regression.standard_error_of_slope,
    intercept_mm: regression.intercept,
    r_squared: regression.r_squared,
    point_count: regression.point_count,
    fringe_range,
    corrections: Object.freeze({
      backlash_applied: backlash?.correction_needed ?? false,
      backlash,
      path,
    }),
    series: freezeSeries(fitted.series),
  });

  tracer.onComplete?.(result);
  return result;
}
