/**
 * Lightweight tracing for following an analysis run step by step.
 *
 * Usage:
 * ```typescript
 * import { createTracer, noopTracer } from "./trace.js";
 *
 * // For debugging:
 * const tracer = createTracer(console.error);
 *
 * // Default (no overhead):
 * const tracer = noopTracer;
 * ```
 */

import type {
  AnalysisResult,
  BacklashCheck,
  PathCorrection,
  RegressionResult,
  UncertaintyReport
} from "./types.js";

export interface TraceContext {
  /** Called before any correction runs */
  onAnalysisStart?(pointCount: number): void;

  /** Called after the backlash check; null when the series is too short to check */
  onBacklashChecked?(check: BacklashCheck | null): void;

  /** Called when displacements are rescaled for off-axis viewing */
  onPathCorrected?(correction: PathCorrection): void;

  /** Called when the regression completes */
  onRegression?(regression: RegressionResult): void;

  /** Called when the uncertainty has been combined */
  onUncertainty?(report: UncertaintyReport, fringeRange: number): void;

  /** Called with the final result */
  onComplete?(result: AnalysisResult): void;
}

/**
 * No-op tracer that has zero overhead when tracing is disabled.
 */
export const noopTracer: TraceContext = {};

/**
 * Create a tracer that logs to a provided log function.
 */
export function createTracer(log: (message: string) => void): TraceContext {
  return {
    onAnalysisStart(pointCount) {
      log(`[TRACE] Analysis started with ${pointCount} point(s)`);
    },

    onBacklashChecked(check) {
      if (!check) {
        log("[TRACE] backlash: too few points to check");
        return;
      }
      log(
        `[TRACE] backlash: reference spacing=${check.reference_average.toExponential(4)}mm, ` +
          `flagged=[${check.flagged_indices.join(", ")}], corrected=${check.correction_needed}`
      );
    },

    onPathCorrected(correction) {
      log(
        `[TRACE] path: deviation=${correction.deviation_cm}cm over ${correction.path_length_cm}cm, ` +
          `cos(theta)=${correction.cos_theta.toFixed(6)}`
      );
    },

    onRegression(regression) {
      log(
        `[TRACE] regression: slope=${regression.slope.toExponential(6)}mm/fringe, ` +
          `se=${regression.standard_error_of_slope.toExponential(3)}, R²=${regression.r_squared.toFixed(6)}`
      );
    },

    onUncertainty(report, fringeRange) {
      log(
        `[TRACE] uncertainty: fringe range=${fringeRange}, total=${report.total_relative_uncertainty_pct.toFixed(3)}%`
      );
    },

    onComplete(result) {
      log(
        `[TRACE] Complete: ${result.wavelength_nm.toFixed(2)} ± ${result.wavelength_uncertainty_nm.toFixed(2)} nm`
      );
    }
  };
}

/**
 * Create a tracer that collects events into an array for later inspection.
 */
export interface TraceEvent {
  type: string;
  timestamp: number;
  data: Record<string, unknown>;
}

export function createCollectorTracer(): {
  tracer: TraceContext;
  getEvents: () => TraceEvent[];
  clear: () => void;
} {
  const events: TraceEvent[] = [];

  const addEvent = (type: string, data: Record<string, unknown>) => {
    events.push({ type, timestamp: Date.now(), data });
  };

  const tracer: TraceContext = {
    onAnalysisStart(pointCount) {
      addEvent("analysis_start", { pointCount });
    },

    onBacklashChecked(check) {
      addEvent("backlash_checked", { check });
    },

    onPathCorrected(correction) {
      addEvent("path_corrected", { correction });
    },

    onRegression(regression) {
      addEvent("regression", { regression });
    },

    onUncertainty(report, fringeRange) {
      addEvent("uncertainty", { report, fringeRange });
    },

    onComplete(result) {
      addEvent("complete", { wavelength_nm: result.wavelength_nm });
    }
  };

  return {
    tracer,
    getEvents: () => [...events],
    clear: () => {
      events.length = 0;
    }
  };
}

/**
 * Merge multiple tracers into one. Each event triggers all tracers.
 */
export function mergeTracers(...tracers: TraceContext[]): TraceContext {
  return {
    onAnalysisStart(pointCount) {
      for (const t of tracers) t.onAnalysisStart?.(pointCount);
    },
    onBacklashChecked(check) {
      for (const t of tracers) t.onBacklashChecked?.(check);
    },
    onPathCorrected(correction) {
      for (const t of tracers) t.onPathCorrected?.(correction);
    },
    onRegression(regression) {
      for (const t of tracers) t.onRegression?.(regression);
    },
    onUncertainty(report, fringeRange) {
      for (const t of tracers) t.onUncertainty?.(report, fringeRange);
    },
    onComplete(result) {
      for (const t of tracers) t.onComplete?.(result);
    }
  };
}
