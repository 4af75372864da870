#!/usr/bin/env node
import { readFile, writeFile, mkdir } from "node:fs/promises";
import { dirname } from "node:path";
import {
  analyze,
  createTracer,
  parseColumns,
  parsePairs,
  requireMinimumPoints,
  validateMeasurementDataset,
  ValidationError
} from "../core/index.js";
import type { AnalysisSettings, MeasurementSeries } from "../types.js";
import { renderFitChartSvg } from "../web/chart.js";
import { renderReportHtml } from "../web/report.js";
import { resultToJson } from "../web/renderHelpers.js";
import { parseArgs, resolveCliOptions, USAGE, type CliInput, type CliOptions } from "./args.js";
import { formatInputTable, formatResultBlock } from "./summary.js";

interface LoadedInput {
  series: MeasurementSeries;
  settings: AnalysisSettings;
  datasetId?: string;
  measuredAt?: string;
}

async function loadInput(input: CliInput): Promise<LoadedInput> {
  if (input.kind === "columns") {
    return { series: parseColumns(input.fringes, input.positions), settings: {} };
  }

  const text = await readFile(input.path, "utf8");
  if (input.path.toLowerCase().endsWith(".json")) {
    const dataset = validateMeasurementDataset(JSON.parse(text));
    return {
      series: dataset.points,
      settings: dataset.settings ?? {},
      datasetId: dataset.dataset_id,
      measuredAt: dataset.measured_at,
    };
  }
  return { series: parsePairs(text), settings: {} };
}

async function writeOutput(path: string, content: string): Promise<void> {
  await mkdir(dirname(path), { recursive: true });
  await writeFile(path, content, "utf8");
  console.log(`Wrote ${path}`);
}

function readOptions(): CliOptions {
  try {
    return resolveCliOptions(parseArgs(process.argv.slice(2)));
  } catch (err) {
    if (err instanceof ValidationError) {
      for (const message of err.errors) console.error(`Error: ${message}`);
      console.error(USAGE);
      process.exit(1);
    }
    throw err;
  }
}

async function main() {
  const options = readOptions();
  const loaded = await loadInput(options.input);
  const series = requireMinimumPoints(loaded.series);
  const settings = { ...loaded.settings, ...options.settings };

  console.log("Input data:");
  for (const line of formatInputTable(series)) console.log(line);

  const result = analyze(series, {
    ...settings,
    tracer: options.trace ? createTracer(console.error) : undefined,
  });

  console.log("");
  for (const line of formatResultBlock(result)) console.log(line);

  const { html, svg, json } = options.outputs;
  if (html) {
    await writeOutput(
      html,
      renderReportHtml(result, { datasetId: loaded.datasetId, measuredAt: loaded.measuredAt })
    );
  }
  if (svg) {
    await writeOutput(svg, renderFitChartSvg(result) + "\n");
  }
  if (json) {
    await writeOutput(json, JSON.stringify(resultToJson(result), null, 2) + "\n");
  }
}

main().catch((err) => {
  if (err instanceof ValidationError) {
    for (const message of err.errors) console.error(`Error: ${message}`);
  } else {
    console.error(err instanceof Error ? `${err.name}: ${err.message}` : err);
  }
  process.exit(1);
});
