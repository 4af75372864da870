import type { AnalysisSettings } from "../types.js";
import { ValidationError } from "../core/errors.js";

export const DEFAULT_HTML_FILENAME = "michelson_analysis.html";
export const DEFAULT_SVG_FILENAME = "michelson_analysis.svg";
export const DEFAULT_JSON_FILENAME = "michelson_analysis.json";

export const USAGE = [
  "Usage: tsx src/cli/index.ts --data <file> [options]",
  "       tsx src/cli/index.ts --fringes \"0 50 100\" --positions \"54.41 54.4275 54.4435\" [options]",
  "",
  "Options:",
  "  --data <file>          pair text (\"fringe displacement\" per line) or a .json dataset",
  "  --fringes <list>       whitespace-separated fringe counts",
  "  --positions <list>     whitespace-separated displacements (mm)",
  "  --deviation <cm>       fringe centre offset from the optical axis (default 0)",
  "  --path-length <cm>     aperture-to-screen distance (default 41)",
  "  --no-backlash          skip the screw backlash correction",
  `  --html [path]          write an HTML report (default ${DEFAULT_HTML_FILENAME})`,
  `  --svg [path]           write the fit chart (default ${DEFAULT_SVG_FILENAME})`,
  `  --json [path]          write the result as JSON (default ${DEFAULT_JSON_FILENAME})`,
  "  --trace                log each analysis step to stderr"
].join("\n");

export function parseArgs(argv: string[]): Record<string, string> {
  const out: Record<string, string> = {};
  for (let i = 0; i < argv.length; i++) {
    const a = argv[i];
    if (!a.startsWith("--")) continue;
    const key = a.slice(2);
    const val = argv[i + 1];
    if (val === undefined || val.startsWith("--")) {
      out[key] = "true";
    } else {
      out[key] = val;
      i++;
    }
  }
  return out;
}

export type CliInput =
  | { kind: "file"; path: string }
  | { kind: "columns"; fringes: string; positions: string };

export interface CliOutputs {
  html?: string;
  svg?: string;
  json?: string;
}

export interface CliOptions {
  input: CliInput;
  /** Only the settings given on the command line; dataset settings fill the rest. */
  settings: AnalysisSettings;
  outputs: CliOutputs;
  trace: boolean;
}

function outputPath(value: string | undefined, fallback: string): string | undefined {
  if (value === undefined) return undefined;
  return value === "true" ? fallback : value;
}

function numberArg(args: Record<string, string>, key: string, errors: string[]): number | undefined {
  const raw = args[key];
  if (raw === undefined) return undefined;
  const value = Number(raw);
  if (raw === "true" || !Number.isFinite(value)) {
    errors.push(`--${key} must be a number`);
    return undefined;
  }
  return value;
}

/**
 * Turn parsed flags into CLI options.
 *
 * @throws ValidationError listing every bad or missing flag
 */
export function resolveCliOptions(args: Record<string, string>): CliOptions {
  const errors: string[] = [];

  let input: CliInput | undefined;
  const data = args["data"];
  const fringes = args["fringes"];
  const positions = args["positions"];
  if (data !== undefined && data !== "true") {
    input = { kind: "file", path: data };
  } else if (fringes !== undefined && positions !== undefined) {
    input = { kind: "columns", fringes, positions };
  } else {
    errors.push("either --data <file> or both --fringes and --positions are required");
  }

  const settings: AnalysisSettings = {};
  const deviation = numberArg(args, "deviation", errors);
  if (deviation !== undefined) settings.deviation_cm = deviation;
  const pathLength = numberArg(args, "path-length", errors);
  if (pathLength !== undefined) {
    if (pathLength <= 0) {
      errors.push("--path-length must be a positive number");
    } else {
      settings.path_length_cm = pathLength;
    }
  }
  if (args["no-backlash"] === "true") settings.correct_backlash = false;

  if (errors.length > 0 || input === undefined) {
    throw new ValidationError(errors);
  }

  return {
    input,
    settings,
    outputs: {
      html: outputPath(args["html"], DEFAULT_HTML_FILENAME),
      svg: outputPath(args["svg"], DEFAULT_SVG_FILENAME),
      json: outputPath(args["json"], DEFAULT_JSON_FILENAME),
    },
    trace: args["trace"] === "true",
  };
}
