/**
 * Screw backlash compensation.
 *
 * When the micrometer drum is not turned a few revolutions in the measuring
 * direction before the first reading, the dead zone of the thread inflates the
 * first few spacings. The stable spacing further along the series is used to
 * rebuild the affected readings.
 */

import type { AnalysisConfig, BacklashCheck, MeasurementSeries } from "../types.js";
import {
  BACKLASH_LEADING_DIFFERENCES,
  BACKLASH_MIN_POINTS,
  resolveConfig
} from "../constants.js";
import { differences, mean } from "../math/stats.js";

/**
 * Compare the leading displacement spacings with the stable-region average.
 *
 * Returns null when the series is too short to have a stable region.
 */
export function detectBacklash(
  series: MeasurementSeries,
  config?: Partial<AnalysisConfig>
): BacklashCheck | null {
  if (series.length < BACKLASH_MIN_POINTS) {
    return null;
  }

  const { backlash_threshold_ratio } = resolveConfig(config);
  const diffs = differences(series.map((p) => p.displacement_mm));

  const reference_average =
    diffs.length > BACKLASH_LEADING_DIFFERENCES
      ? mean(diffs.slice(BACKLASH_LEADING_DIFFERENCES))
      : mean(diffs);
  const threshold = reference_average * backlash_threshold_ratio;

  const flagged_indices: number[] = [];
  const leading = Math.min(BACKLASH_LEADING_DIFFERENCES, diffs.length);
  for (let i = 0; i < leading; i++) {
    if (diffs[i] > threshold) {
      flagged_indices.push(i);
    }
  }

  return {
    differences: diffs,
    reference_average,
    threshold,
    flagged_indices,
    correction_needed: flagged_indices.length > 0,
  };
}

/**
 * Rewrite points 1..3 onto an evenly spaced ramp from the first reading.
 *
 * Fringe counts are left as read; only displacements change. The input is
 * never mutated.
 */
export function applyBacklashCorrection(
  series: MeasurementSeries,
  check: BacklashCheck
): MeasurementSeries {
  if (!check.correction_needed) {
    return series;
  }

  const last = Math.min(BACKLASH_LEADING_DIFFERENCES, series.length - 1);
  const origin = series[0].displacement_mm;

  return series.map((point, i) =>
    i >= 1 && i <= last
      ? { fringe_count: point.fringe_count, displacement_mm: origin + i * check.reference_average }
      : { ...point }
  );
}

/**
 * Detect and correct backlash in one step.
 *
 * Returns the input series itself when no correction is needed.
 */
export function correctBacklash(
  series: MeasurementSeries,
  config?: Partial<AnalysisConfig>
): MeasurementSeries {
  const check = detectBacklash(series, config);
  return check ? applyBacklashCorrection(series, check) : series;
}
