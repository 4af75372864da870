export interface MeasurementPoint {
  fringe_count: number;
  displacement_mm: number;
}

/** Points in acquisition order. Fringe counts are expected to be non-decreasing. */
export type MeasurementSeries = readonly MeasurementPoint[];

export interface RegressionResult {
  /** Fitted displacement per fringe (mm/fringe) */
  slope: number;
  /** Displacement at fringe count zero (mm) */
  intercept: number;
  standard_error_of_slope: number;
  standard_error_of_intercept: number;
  /** Square of the Pearson correlation between fringe count and displacement (0-1) */
  r_squared: number;
  point_count: number;
  wavelength_nm: number;
  wavelength_uncertainty_nm: number;
}

export interface UncertaintyReport {
  wavelength_nm: number;
  wavelength_uncertainty_nm: number;
  total_relative_uncertainty_pct: number;
  /** standard_error_of_slope / slope */
  slope_relative_uncertainty: number;
  /** fringe_reading_uncertainty / fringe_range */
  reading_relative_uncertainty: number;
}

export interface BacklashCheck {
  differences: readonly number[];
  reference_average: number;
  threshold: number;
  /** Indices into `differences` (0..2) that exceeded the threshold */
  flagged_indices: readonly number[];
  correction_needed: boolean;
}

export interface PathCorrection {
  deviation_cm: number;
  path_length_cm: number;
  theta_rad: number;
  cos_theta: number;
}

export interface AnalysisConfig {
  /** Reading granularity of a fringe count, in fringes */
  fringe_reading_uncertainty: number;
  /** Early spacing / stable spacing ratio above which backlash is assumed */
  backlash_threshold_ratio: number;
  /** Distance from the source aperture to the observation screen (cm) */
  default_path_length_cm: number;
}

export interface AnalysisCorrections {
  backlash_applied: boolean;
  /** Null when backlash correction was disabled */
  backlash: BacklashCheck | null;
  /** Null when deviation_cm was zero */
  path: PathCorrection | null;
}

export interface AnalysisResult {
  wavelength_nm: number;
  wavelength_uncertainty_nm: number;
  total_relative_uncertainty_pct: number;
  slope_mm_per_fringe: number;
  slope_uncertainty_mm_per_fringe: number;
  intercept_mm: number;
  r_squared: number;
  point_count: number;
  fringe_range: number;
  corrections: AnalysisCorrections;
  /** The series the fit was run on, after every enabled correction */
  series: MeasurementSeries;
}

export interface AnalysisSettings {
  deviation_cm?: number;
  path_length_cm?: number;
  correct_backlash?: boolean;
}

export interface MeasurementDataset {
  schema_version: "v0.1";
  dataset_id: string;
  measured_at?: string; // ISO 8601
  points: MeasurementPoint[];
  settings?: AnalysisSettings;
}
