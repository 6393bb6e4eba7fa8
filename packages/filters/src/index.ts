/**
 * @filters - Signal estimators for the tracking stream
 *
 * Provides:
 * - Frame rate estimation over a sliding window of arrival intervals
 */

export {
  RateEstimator,
  type RateEstimatorOptions,
} from './rate-estimator';
