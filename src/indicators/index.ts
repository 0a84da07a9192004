export { RollingWindow } from './RollingWindow.js';
export {
  LinearRegression,
  fitLinearRegression,
  DEFAULT_LINEAR_REGRESSION_CONFIG,
} from './LinearRegression.js';
export {
  LinearRegressionChannel,
  DEFAULT_LINEAR_REGRESSION_CHANNEL_CONFIG,
} from './LinearRegressionChannel.js';
export { SampleStdDev } from './SampleStdDev.js';
export { BollingerChannel, DEFAULT_BOLLINGER_CHANNEL_CONFIG } from './BollingerChannel.js';
export {
  TrendQuality,
  DEFAULT_TREND_QUALITY_CONFIG,
  computeNoise,
  parseNoiseType,
} from './TrendQuality.js';
export type { RegimeSign } from './TrendQuality.js';
export { createChannelIndicator, snapshotChannel } from './channel.js';
export type {
  Indicator,
  ChannelIndicator,
  ChannelSnapshot,
  ChannelSettings,
  RegressionFit,
  NoiseType,
  LinearRegressionConfig,
  LinearRegressionChannelConfig,
  BollingerChannelConfig,
  TrendQualityConfig,
} from './types.js';
