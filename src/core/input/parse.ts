/**
 * Text input for measurement series.
 *
 * Two layouts are accepted, matching the way readings are usually copied out
 * of a lab notebook:
 * - pairs: one "fringe displacement" pair per line
 * - columns: all fringe counts on one line, all displacements on another
 */

import type { MeasurementSeries } from "../types.js";
import { InsufficientDataError, ValidationError } from "../errors.js";

const FIELD_SEPARATOR = /[\s,]+/;

function parseNumber(token: string): number | undefined {
  if (token.length === 0) return undefined;
  const value = Number(token);
  return Number.isFinite(value) ? value : undefined;
}

function splitFields(text: string): string[] {
  const trimmed = text.trim();
  return trimmed.length === 0 ? [] : trimmed.split(FIELD_SEPARATOR);
}

/**
 * Parse "fringe displacement" pairs, one per line. Blank lines and lines
 * starting with "#" are skipped.
 *
 * @throws ValidationError listing every malformed line
 */
export function parsePairs(text: string): MeasurementSeries {
  const errors: string[] = [];
  const points: { fringe_count: number; displacement_mm: number }[] = [];

  const lines = text.split(/\r?\n/);
  for (let i = 0; i < lines.length; i++) {
    const line = lines[i].trim();
    if (line.length === 0 || line.startsWith("#")) continue;

    const fields = splitFields(line);
    if (fields.length !== 2) {
      errors.push(`line ${i + 1}: expected 2 values ("fringe displacement"), got ${fields.length}`);
      continue;
    }

    const fringe = parseNumber(fields[0]);
    const displacement = parseNumber(fields[1]);
    if (fringe === undefined || displacement === undefined) {
      errors.push(`line ${i + 1}: invalid number in "${line}"`);
      continue;
    }

    points.push({ fringe_count: fringe, displacement_mm: displacement });
  }

  if (errors.length === 0 && points.length === 0) {
    errors.push("no measurement data entered");
  }
  if (errors.length > 0) {
    throw new ValidationError(errors);
  }
  return points;
}

/**
 * Parse two whitespace-separated lists into a series.
 *
 * @throws ValidationError if a list is empty, holds an invalid number, or the
 * two lists differ in length
 */
export function parseColumns(fringesText: string, displacementsText: string): MeasurementSeries {
  const errors: string[] = [];

  const fringeFields = splitFields(fringesText);
  const displacementFields = splitFields(displacementsText);

  if (fringeFields.length === 0) errors.push("fringe counts are empty");
  if (displacementFields.length === 0) errors.push("displacements are empty");

  const fringes = fringeFields.map(parseNumber);
  const displacements = displacementFields.map(parseNumber);

  fringes.forEach((v, i) => {
    if (v === undefined) errors.push(`fringe counts[${i}]: invalid number "${fringeFields[i]}"`);
  });
  displacements.forEach((v, i) => {
    if (v === undefined) {
      errors.push(`displacements[${i}]: invalid number "${displacementFields[i]}"`);
    }
  });

  if (
    fringeFields.length > 0 &&
    displacementFields.length > 0 &&
    fringeFields.length !== displacementFields.length
  ) {
    errors.push(
      `fringe counts (${fringeFields.length}) and displacements (${displacementFields.length}) differ in length`
    );
  }

  if (errors.length > 0) {
    throw new ValidationError(errors);
  }

  return fringes.map((fringe, i) => ({
    fringe_count: fringe ?? NaN,
    displacement_mm: displacements[i] ?? NaN,
  }));
}

/**
 * Zip two numeric arrays into a series.
 *
 * @throws ValidationError on a length mismatch or a non-finite value
 */
export function seriesFromColumns(
  fringes: readonly number[],
  displacements: readonly number[]
): MeasurementSeries {
  const errors: string[] = [];
  if (fringes.length !== displacements.length) {
    errors.push(
      `fringe counts (${fringes.length}) and displacements (${displacements.length}) differ in length`
    );
  }
  fringes.forEach((v, i) => {
    if (!Number.isFinite(v)) errors.push(`fringe counts[${i}] must be a finite number`);
  });
  displacements.forEach((v, i) => {
    if (!Number.isFinite(v)) errors.push(`displacements[${i}] must be a finite number`);
  });
  if (errors.length > 0) {
    throw new ValidationError(errors);
  }

  return fringes.map((fringe_count, i) => ({ fringe_count, displacement_mm: displacements[i] }));
}

/**
 * Reject a series that cannot be fitted, before handing it to the analysis.
 */
export function requireMinimumPoints(series: MeasurementSeries, minimum = 2): MeasurementSeries {
  if (series.length < minimum) {
    throw new InsufficientDataError(series.length, minimum);
  }
  return series;
}
