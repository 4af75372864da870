export {
  parsePairs,
  parseColumns,
  seriesFromColumns,
  requireMinimumPoints
} from "./parse.js";
