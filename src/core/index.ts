export { analyze } from "./analyze.js";
export type { AnalyzeOptions } from "./analyze.js";
export { fitFringeDisplacement, linearFit } from "./fit/index.js";
export type { LinearFit } from "./fit/index.js";
export {
  applyBacklashCorrection,
  correctBacklash,
  correctPathError,
  detectBacklash,
  fitWithPathCorrection,
  pathCorrection,
  scaleForPathError
} from "./correct/index.js";
export type { PathCorrectedFit, PathErrorOptions } from "./correct/index.js";
export { combineUncertainty, fringeRange } from "./uncertainty.js";
export { parseColumns, parsePairs, requireMinimumPoints, seriesFromColumns } from "./input/index.js";
export { validateAnalysisSettings, validateMeasurementDataset } from "./validate.js";
export {
  DegenerateInputError,
  InsufficientDataError,
  ValidationError,
  WavelengthAnalysisError
} from "./errors.js";
export { DEFAULT_ANALYSIS_CONFIG, resolveConfig } from "./constants.js";
export { createCollectorTracer, createTracer, mergeTracers, noopTracer } from "./trace.js";
export type { TraceContext, TraceEvent } from "./trace.js";
export type {
  AnalysisConfig,
  AnalysisCorrections,
  AnalysisResult,
  AnalysisSettings,
  BacklashCheck,
  MeasurementDataset,
  MeasurementPoint,
  MeasurementSeries,
  PathCorrection,
  RegressionResult,
  UncertaintyReport
} from "./types.js";
