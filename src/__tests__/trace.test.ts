import assert from "node:assert/strict";
import { describe, it } from "vitest";
import {
  noopTracer,
  createTracer,
  createCollectorTracer,
  mergeTracers
} from "../core/trace.js";
import { analyze } from "../core/analyze.js";
import type { BacklashCheck, MeasurementSeries, RegressionResult } from "../types.js";

const check: BacklashCheck = {
  differences: [0.0175, 0.016, 0.0156, 0.0158],
  reference_average: 0.0158,
  threshold: 0.01659,
  flagged_indices: [0],
  correction_needed: true
};

const regression: RegressionResult = {
  slope: 3.164e-4,
  intercept: 12.5,
  standard_error_of_slope: 1e-6,
  standard_error_of_intercept: 1e-5,
  r_squared: 0.999912,
  point_count: 10,
  wavelength_nm: 632.8,
  wavelength_uncertainty_nm: 2
};

const run: MeasurementSeries = [0, 100, 200, 300, 400].map((x) => ({
  fringe_count: x,
  displacement_mm: 12.5 + x * 3.164e-4
}));

describe("noopTracer", () => {
  it("has no methods defined (zero overhead)", () => {
    assert.equal(Object.keys(noopTracer).length, 0);
  });

  it("can be called without error", () => {
    noopTracer.onAnalysisStart?.(4);
    noopTracer.onBacklashChecked?.(null);
    noopTracer.onRegression?.(regression);
  });
});

describe("createTracer", () => {
  it("logs to the provided function", () => {
    const logs: string[] = [];
    const tracer = createTracer((msg) => logs.push(msg));

    tracer.onAnalysisStart?.(10);
    tracer.onBacklashChecked?.(check);
    tracer.onRegression?.(regression);

    assert.deepEqual(logs, [
      "[TRACE] Analysis started with 10 point(s)",
      "[TRACE] backlash: reference spacing=1.5800e-2mm, flagged=[0], corrected=true",
      "[TRACE] regression: slope=3.164000e-4mm/fringe, se=1.000e-6, R²=0.999912"
    ]);
  });

  it("logs a skipped backlash check", () => {
    const logs: string[] = [];
    createTracer((msg) => logs.push(msg)).onBacklashChecked?.(null);

    assert.deepEqual(logs, ["[TRACE] backlash: too few points to check"]);
  });

  it("logs path correction and completion", () => {
    const logs: string[] = [];
    const tracer = createTracer((msg) => logs.push(msg));

    tracer.onPathCorrected?.({ deviation_cm: 3, path_length_cm: 4, theta_rad: Math.atan(0.75), cos_theta: 0.8 });
    analyze(run, { tracer });

    assert.equal(logs[0], "[TRACE] path: deviation=3cm over 4cm, cos(theta)=0.800000");
    assert.equal(logs[logs.length - 1], "[TRACE] Complete: 632.80 ± 0.00 nm");
  });
});

describe("createCollectorTracer", () => {
  it("collects events and clears them", () => {
    const { tracer, getEvents, clear } = createCollectorTracer();

    tracer.onAnalysisStart?.(3);
    tracer.onUncertainty?.(
      {
        wavelength_nm: 632.8,
        wavelength_uncertainty_nm: 2,
        total_relative_uncertainty_pct: 0.4,
        slope_relative_uncertainty: 0.003,
        reading_relative_uncertainty: 0.001
      },
      500
    );

    const events = getEvents();
    assert.equal(events.length, 2);
    assert.equal(events[0].type, "analysis_start");
    assert.deepEqual(events[0].data, { pointCount: 3 });
    assert.equal(events[1].type, "uncertainty");
    assert.equal(events[1].data.fringeRange, 500);

    clear();
    assert.equal(getEvents().length, 0);
  });

  it("returns a copy of the events", () => {
    const { tracer, getEvents } = createCollectorTracer();
    tracer.onAnalysisStart?.(3);

    getEvents().pop();
    assert.equal(getEvents().length, 1);
  });
});

describe("mergeTracers", () => {
  it("forwards every event to every tracer", () => {
    const a = createCollectorTracer();
    const b = createCollectorTracer();
    const logs: string[] = [];

    analyze(run, { tracer: mergeTracers(a.tracer, b.tracer, createTracer((m) => logs.push(m))) });

    const types = a.getEvents().map((e) => e.type);
    assert.deepEqual(types, [
      "analysis_start",
      "backlash_checked",
      "regression",
      "uncertainty",
      "complete"
    ]);
    assert.deepEqual(b.getEvents().map((e) => e.type), types);
    assert.equal(logs.length, types.length);
  });
});
