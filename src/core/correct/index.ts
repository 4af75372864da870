export {
  detectBacklash,
  applyBacklashCorrection,
  correctBacklash
} from "./backlash.js";

export {
  pathCorrection,
  scaleForPathError,
  fitWithPathCorrection,
  correctPathError,
  type PathErrorOptions,
  type PathCorrectedFit
} from "./pathError.js";
