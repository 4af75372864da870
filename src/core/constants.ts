/**
 * Instrument constants and numerical settings for the analysis.
 */

import type { AnalysisConfig } from "./types.js";

/**
 * Millimetres to nanometres, times two for the double pass of the moving mirror.
 * wavelength_nm = slope_mm_per_fringe * MM_PER_FRINGE_TO_WAVELENGTH_NM
 */
export const MM_PER_FRINGE_TO_WAVELENGTH_NM = 2 * 1e6;

/** A fringe count can only be read to within half a fringe. */
export const FRINGE_READING_UNCERTAINTY = 0.5;

/**
 * Early spacings more than 5% above the stable-region spacing are treated as
 * screw backlash.
 */
export const BACKLASH_THRESHOLD_RATIO = 1.05;

/** Number of leading spacings inspected for backlash. */
export const BACKLASH_LEADING_DIFFERENCES = 3;

/** Fewer points than this leave no stable region to compare against. */
export const BACKLASH_MIN_POINTS = 4;

/** Aperture-to-screen distance of the reference instrument (cm). */
export const DEFAULT_PATH_LENGTH_CM = 41;

export const DEFAULT_ANALYSIS_CONFIG: AnalysisConfig = {
  fringe_reading_uncertainty: FRINGE_READING_UNCERTAINTY,
  backlash_threshold_ratio: BACKLASH_THRESHOLD_RATIO,
  default_path_length_cm: DEFAULT_PATH_LENGTH_CM,
};

/**
 * Resolve a partial config override against the defaults.
 */
export function resolveConfig(config?: Partial<AnalysisConfig>): AnalysisConfig {
  return { ...DEFAULT_ANALYSIS_CONFIG, ...config };
}
