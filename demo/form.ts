/**
 * Form handling for the in-browser analyzer.
 * Reads the active input tab, validates it, and renders the result fragment.
 */

import {
  analyze,
  parseColumns,
  parsePairs,
  requireMinimumPoints,
  ValidationError,
  WavelengthAnalysisError
} from "../src/core/index.js";
import type { AnalysisResult, AnalysisSettings, MeasurementSeries } from "../src/types.js";
import { renderFitChartSvg } from "../src/web/chart.js";
import { renderResultSection } from "../src/web/report.js";

export type InputMode = "pairs" | "columns";

export type ErrorField = "pair" | "fringes" | "positions" | "options" | "analysis";

export type FormReadResult =
  | { ok: true; series: MeasurementSeries; settings: AnalysisSettings }
  | { ok: false; errors: Partial<Record<ErrorField, string[]>> };

const ERROR_FIELDS: ErrorField[] = ["pair", "fringes", "positions", "options", "analysis"];

function inputValue(root: ParentNode, selector: string): string {
  return root.querySelector<HTMLInputElement | HTMLTextAreaElement>(selector)?.value.trim() ?? "";
}

export function getInputMode(root: ParentNode): InputMode {
  const bulk = root.querySelector<HTMLElement>("#bulk-input");
  return bulk && !bulk.hidden ? "columns" : "pairs";
}

export function setInputMode(root: ParentNode, mode: InputMode): void {
  const pairTab = root.querySelector<HTMLElement>("#tab-pair");
  const bulkTab = root.querySelector<HTMLElement>("#tab-bulk");
  const pairInput = root.querySelector<HTMLElement>("#pair-input");
  const bulkInput = root.querySelector<HTMLElement>("#bulk-input");

  pairTab?.classList.toggle("active", mode === "pairs");
  bulkTab?.classList.toggle("active", mode === "columns");
  if (pairInput) pairInput.hidden = mode !== "pairs";
  if (bulkInput) bulkInput.hidden = mode !== "columns";
}

function readNumberField(
  root: ParentNode,
  selector: string,
  label: string,
  errors: string[]
): number | undefined {
  const raw = inputValue(root, selector);
  if (raw.length === 0) return undefined;
  const value = Number(raw);
  if (!Number.isFinite(value)) {
    errors.push(`${label} must be a number`);
    return undefined;
  }
  return value;
}

function readSettings(root: ParentNode, errors: string[]): AnalysisSettings {
  const settings: AnalysisSettings = {
    correct_backlash: root.querySelector<HTMLInputElement>("#correct-backlash")?.checked ?? true,
  };

  const deviation = readNumberField(root, "#deviation", "Fringe centre offset", errors);
  if (deviation !== undefined) settings.deviation_cm = deviation;

  const pathLength = readNumberField(root, "#path-length", "Path length", errors);
  if (pathLength !== undefined) {
    if (pathLength <= 0) {
      errors.push("Path length must be a positive number");
    } else {
      settings.path_length_cm = pathLength;
    }
  }

  return settings;
}

function columnErrorField(message: string): ErrorField {
  return message.startsWith("fringe counts") && !message.includes("differ in length")
    ? "fringes"
    : "positions";
}

/**
 * Read and validate the form without running the analysis.
 */
export function readAnalysisForm(root: ParentNode): FormReadResult {
  const errors: Partial<Record<ErrorField, string[]>> = {};
  const push = (field: ErrorField, message: string) => {
    (errors[field] ??= []).push(message);
  };

  let series: MeasurementSeries = [];
  try {
    series =
      getInputMode(root) === "pairs"
        ? parsePairs(inputValue(root, "#pair-data"))
        : parseColumns(inputValue(root, "#fringes-data"), inputValue(root, "#positions-data"));
  } catch (err) {
    if (!(err instanceof ValidationError)) throw err;
    for (const message of err.errors) {
      push(getInputMode(root) === "pairs" ? "pair" : columnErrorField(message), message);
    }
  }

  const optionErrors: string[] = [];
  const settings = readSettings(root, optionErrors);
  for (const message of optionErrors) push("options", message);

  if (Object.keys(errors).length > 0) {
    return { ok: false, errors };
  }
  return { ok: true, series, settings };
}

export function clearErrors(root: ParentNode): void {
  for (const field of ERROR_FIELDS) {
    const el = root.querySelector<HTMLElement>(`#${field}-error`);
    if (el) el.textContent = "";
  }
}

export function showErrors(root: ParentNode, errors: Partial<Record<ErrorField, string[]>>): void {
  for (const field of ERROR_FIELDS) {
    const messages = errors[field];
    const el = root.querySelector<HTMLElement>(`#${field}-error`);
    if (el && messages) el.textContent = messages.join("; ");
  }
}

/**
 * Validate the form, run the analysis and render the result.
 * Returns the result, or null when the input was rejected.
 */
export function runAnalysisFromForm(root: ParentNode): AnalysisResult | null {
  clearErrors(root);
  const container = root.querySelector<HTMLElement>("#results-container");

  const read = readAnalysisForm(root);
  if (!read.ok) {
    showErrors(root, read.errors);
    if (container) container.hidden = true;
    return null;
  }

  let result: AnalysisResult;
  try {
    result = analyze(requireMinimumPoints(read.series), read.settings);
  } catch (err) {
    if (!(err instanceof WavelengthAnalysisError)) throw err;
    showErrors(root, { analysis: [err.message] });
    if (container) container.hidden = true;
    return null;
  }

  if (container) {
    container.innerHTML = `${renderResultSection(result)}\n<div class="plot-container">${renderFitChartSvg(result)}</div>`;
    container.hidden = false;
  }
  return result;
}
