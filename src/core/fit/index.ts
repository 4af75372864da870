/**
 * Regression of displacement against fringe count.
 *
 * @example
 * ```ts
 * import { fitFringeDisplacement } from "./fit/index.js";
 *
 * const fit = fitFringeDisplacement([
 *   { fringe_count: 0, displacement_mm: 12.5 },
 *   { fringe_count: 100, displacement_mm: 12.5316 },
 *   { fringe_count: 200, displacement_mm: 12.5633 },
 * ]);
 * console.log(`${fit.wavelength_nm.toFixed(2)} ± ${fit.wavelength_uncertainty_nm.toFixed(2)} nm`);
 * ```
 */

export { linearFit, fitFringeDisplacement } from "./linearFit.js";
export type { LinearFit } from "./linearFit.js";
