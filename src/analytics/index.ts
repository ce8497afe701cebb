export { RatioCalculator, calculateRatios, fiscalDateFor, SNAPSHOT_LOOKBACK_DAYS } from './ratio-calculator';
export type { RatioBatchScope } from './ratio-calculator';
export {
  QualityChecker,
  findPriceOutliers,
  findRatioAnomalies,
  gradeFor,
  RATIO_THRESHOLDS,
} from './quality-checker';
export type { QualityOptions, QualityQuery } from './quality-checker';
