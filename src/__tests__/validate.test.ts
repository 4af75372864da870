import assert from "node:assert/strict";
import { describe, it } from "vitest";
import {
  ValidationError,
  validateAnalysisSettings,
  validateMeasurementDataset
} from "../core/validate.js";
import type { MeasurementDataset } from "../types.js";

describe("validateMeasurementDataset", () => {
  const validDataset: MeasurementDataset = {
    schema_version: "v0.1",
    dataset_id: "test-dataset",
    measured_at: "2025-01-01T00:00:00Z",
    points: [
      { fringe_count: 0, displacement_mm: 1.5 },
      { fringe_count: 50, displacement_mm: 1.516 }
    ],
    settings: { deviation_cm: 0.5, path_length_cm: 40, correct_backlash: false }
  };

  it("accepts a valid dataset", () => {
    const result = validateMeasurementDataset(validDataset);
    assert.deepEqual(result, validDataset);
  });

  it("accepts a dataset without optional fields", () => {
    const result = validateMeasurementDataset({
      schema_version: "v0.1",
      dataset_id: "minimal",
      points: []
    });
    assert.equal(result.dataset_id, "minimal");
    assert.equal(result.settings, undefined);
    assert.equal(result.measured_at, undefined);
  });

  it("rejects non-object input", () => {
    assert.throws(
      () => validateMeasurementDataset(null),
      (err: unknown) => err instanceof ValidationError && err.errors[0] === "Input must be an object"
    );
  });

  it("rejects wrong schema version", () => {
    assert.throws(
      () => validateMeasurementDataset({ ...validDataset, schema_version: "v2" }),
      (err: unknown) =>
        err instanceof ValidationError &&
        err.errors.includes('Expected schema_version "v0.1", got "v2"')
    );
  });

  it("collects every bad point field", () => {
    try {
      validateMeasurementDataset({
        ...validDataset,
        dataset_id: "",
        points: [{ fringe_count: "0", displacement_mm: 1 }, 7, { fringe_count: 1 }]
      });
      assert.fail("expected ValidationError");
    } catch (err) {
      assert.ok(err instanceof ValidationError);
      assert.deepEqual(err.errors, [
        "dataset_id must be a non-empty string",
        "points[0].fringe_count must be a finite number",
        "points[1] must be an object",
        "points[2].displacement_mm must be a finite number"
      ]);
    }
  });

  it("rejects an invalid measured_at", () => {
    assert.throws(
      () => validateMeasurementDataset({ ...validDataset, measured_at: "yesterday" }),
      (err: unknown) =>
        err instanceof ValidationError &&
        err.errors.includes("measured_at must be a valid ISO date string")
    );
  });

  it("rejects bad settings", () => {
    try {
      validateMeasurementDataset({
        ...validDataset,
        settings: { deviation_cm: "1", path_length_cm: 0, correct_backlash: "yes" }
      });
      assert.fail("expected ValidationError");
    } catch (err) {
      assert.ok(err instanceof ValidationError);
      assert.deepEqual(err.errors, [
        "settings.deviation_cm must be a finite number",
        "settings.path_length_cm must be a positive number",
        "settings.correct_backlash must be a boolean"
      ]);
    }
  });
});

describe("validateAnalysisSettings", () => {
  it("keeps only known fields", () => {
    assert.deepEqual(validateAnalysisSettings({ deviation_cm: 1, extra: true }), { deviation_cm: 1 });
  });

  it("rejects a non-object", () => {
    assert.throws(() => validateAnalysisSettings([]), ValidationError);
  });
});
