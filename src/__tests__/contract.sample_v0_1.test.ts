import { readFile } from "node:fs/promises";
import { describe, it, expect } from "vitest";
import { analyze, parsePairs, validateMeasurementDataset } from "../core/index.js";

const datasetDir = "datasets/sample_v0_1";

describe("contract v0.1 sample dataset", () => {
  it("validates and analyzes the JSON dataset with its own settings", async () => {
    const raw: unknown = JSON.parse(await readFile(`${datasetDir}/sample_run.json`, "utf8"));
    const dataset = validateMeasurementDataset(raw);

    expect(dataset.dataset_id).toBe("sample_run");
    expect(dataset.points).toHaveLength(12);
    expect(dataset.settings).toEqual({ deviation_cm: 0, path_length_cm: 41, correct_backlash: false });

    const result = analyze(dataset.points, dataset.settings);
    expect(result.wavelength_nm).toBeCloseTo(629.8042, 3);
    expect(result.total_relative_uncertainty_pct).toBeCloseTo(0.323262, 5);
  });

  it("reads the same readings from the pair text file", async () => {
    const text = await readFile(`${datasetDir}/sample_pairs.txt`, "utf8");
    const raw: unknown = JSON.parse(await readFile(`${datasetDir}/sample_run.json`, "utf8"));

    expect(parsePairs(text)).toEqual(validateMeasurementDataset(raw).points);
  });
});
