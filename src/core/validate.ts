/**
 * Runtime validation for analysis inputs read from files or forms.
 * Provides lightweight validation without external dependencies.
 */

import type { AnalysisSettings, MeasurementDataset, MeasurementPoint } from "./types.js";
import { ValidationError } from "./errors.js";

export { ValidationError };

function isFiniteNumber(value: unknown): value is number {
  return typeof value === "number" && Number.isFinite(value);
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

function isISODateString(value: unknown): boolean {
  if (typeof value !== "string") return false;
  const date = Date.parse(value);
  return !Number.isNaN(date);
}

function settingsErrors(settings: Record<string, unknown>, prefix: string): string[] {
  const errors: string[] = [];

  if (settings.deviation_cm !== undefined && !isFiniteNumber(settings.deviation_cm)) {
    errors.push(`${prefix}.deviation_cm must be a finite number`);
  }
  if (
    settings.path_length_cm !== undefined &&
    (!isFiniteNumber(settings.path_length_cm) || settings.path_length_cm <= 0)
  ) {
    errors.push(`${prefix}.path_length_cm must be a positive number`);
  }
  if (settings.correct_backlash !== undefined && typeof settings.correct_backlash !== "boolean") {
    errors.push(`${prefix}.correct_backlash must be a boolean`);
  }

  return errors;
}

/**
 * Validate analysis settings supplied by a user (deviation, path length,
 * backlash switch).
 */
export function validateAnalysisSettings(data: unknown): AnalysisSettings {
  if (!isRecord(data)) {
    throw new ValidationError(["settings must be an object"]);
  }

  const errors = settingsErrors(data, "settings");
  if (errors.length > 0) {
    throw new ValidationError(errors);
  }

  const settings: AnalysisSettings = {};
  if (isFiniteNumber(data.deviation_cm)) settings.deviation_cm = data.deviation_cm;
  if (isFiniteNumber(data.path_length_cm)) settings.path_length_cm = data.path_length_cm;
  if (typeof data.correct_backlash === "boolean") settings.correct_backlash = data.correct_backlash;
  return settings;
}

/**
 * Validate a MeasurementDataset.
 */
export function validateMeasurementDataset(data: unknown): MeasurementDataset {
  const errors: string[] = [];

  if (!isRecord(data)) {
    throw new ValidationError(["Input must be an object"]);
  }

  // Check schema version
  if (data.schema_version !== "v0.1") {
    errors.push(`Expected schema_version "v0.1", got "${String(data.schema_version)}"`);
  }

  if (typeof data.dataset_id !== "string" || data.dataset_id.length === 0) {
    errors.push("dataset_id must be a non-empty string");
  }

  if (data.measured_at !== undefined && !isISODateString(data.measured_at)) {
    errors.push("measured_at must be a valid ISO date string");
  }

  const points: MeasurementPoint[] = [];
  if (!Array.isArray(data.points)) {
    errors.push("points must be an array");
  } else {
    for (let i = 0; i < data.points.length; i++) {
      const point: unknown = data.points[i];
      const prefix = `points[${i}]`;

      if (!isRecord(point)) {
        errors.push(`${prefix} must be an object`);
        continue;
      }

      const { fringe_count, displacement_mm } = point;
      if (!isFiniteNumber(fringe_count)) {
        errors.push(`${prefix}.fringe_count must be a finite number`);
      }
      if (!isFiniteNumber(displacement_mm)) {
        errors.push(`${prefix}.displacement_mm must be a finite number`);
      }
      if (isFiniteNumber(fringe_count) && isFiniteNumber(displacement_mm)) {
        points.push({ fringe_count, displacement_mm });
      }
    }
  }

  let settings: AnalysisSettings | undefined;
  if (data.settings !== undefined) {
    if (!isRecord(data.settings)) {
      errors.push("settings must be an object");
    } else {
      const found = settingsErrors(data.settings, "settings");
      if (found.length > 0) {
        errors.push(...found);
      } else {
        settings = validateAnalysisSettings(data.settings);
      }
    }
  }

  if (errors.length > 0) {
    throw new ValidationError(errors);
  }

  const dataset: MeasurementDataset = {
    schema_version: "v0.1",
    dataset_id: String(data.dataset_id),
    points,
  };
  if (typeof data.measured_at === "string") dataset.measured_at = data.measured_at;
  if (settings) dataset.settings = settings;
  return dataset;
}
