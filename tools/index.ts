import analyzeGeometry from './analyze_geometry.js';

export { analyzeGeometry };
export type { AnalyzeGeometryResult, GeometryData } from './analyze_geometry.js';

export { fitTrendLine, fitTrendLineOrThrow } from './geometry/regression.js';
export { lineThrough, lineValueAt, lineAngleDegrees } from './geometry/trendline.js';
export { findExtrema, findPeaks, findTroughs, calcProminence, prominenceWindow } from './geometry/extrema.js';
export { groupLevels, clusterLevels, locateSupportResistance } from './geometry/levels.js';
export { classifyTrend, fitTrailingWindow } from './geometry/trend_direction.js';
export { detectChannels, countChannelTouches, isParallel } from './geometry/channels.js';
export { toPriceSeries } from './geometry/series.js';
export {
  resolveConfig,
  DEFAULT_CONFIG,
  GeometryConfigSchema,
  EXTREMA_DEFAULTS,
  LEVEL_DEFAULTS,
  TREND_DEFAULTS,
  CHANNEL_DEFAULTS,
} from './geometry/config.js';
export { TrendFitError } from '../lib/error.js';

export type { ExtremaOptions } from './geometry/extrema.js';
export type { SupportResistanceOptions } from './geometry/levels.js';
export type { TrendOptions } from './geometry/trend_direction.js';
export type { ChannelOptions } from './geometry/channels.js';
export type { PriceSeries } from './geometry/series.js';
export type { GeometryConfig, GeometryConfigInput } from './geometry/config.js';
export type {
  Series,
  TrendLine,
  FitResult,
  ExtremumKind,
  PeakTrough,
  ChannelPoint,
  ChannelLine,
  Channel,
  LevelCluster,
  LevelSet,
  TrendDirection,
} from './geometry/types.js';
export type { Candle } from '../src/types/domain.js';
