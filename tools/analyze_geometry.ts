import type { z } from 'zod';
import { ok, failFromError } from '../lib/result.js';
import { logToolRun, logError } from '../lib/logger.js';
import { AnalyzeGeometryInputSchema, AnalyzeGeometryOutputSchema, GeometryDataSchema } from '../src/schemas.js';
import type { Candle } from '../src/types/domain.js';
import type { GeometryConfig, GeometryConfigInput } from './geometry/config.js';
import { findExtrema, type ExtremaOptions } from './geometry/extrema.js';
import { locateSupportResistance } from './geometry/levels.js';
import { classifyTrend, fitTrailingWindow } from './geometry/trend_direction.js';
import { detectChannels } from './geometry/channels.js';
import { toPriceSeries } from './geometry/series.js';

/**
 * analyze_geometry - ローソク足からトレンド / 極値 / 水準 / チャネルを一括算出
 *
 * - トレンド方向と直近区間の回帰直線は終値から
 * - ピークは高値、トラフは安値から（独立に検出）
 * - チャネルはタッチ数降順で maxChannels 本まで
 *
 * 例外は投げず、入力・設定の不備は errorType 'user'、想定外の失敗は 'internal' で返す。
 */

export type AnalyzeGeometryResult = z.infer<typeof AnalyzeGeometryOutputSchema>;
export type GeometryData = z.infer<typeof GeometryDataSchema>;

const TOOL = 'analyze_geometry';
const MIN_CANDLES = 3;

const EMPTY_DATA: GeometryData = {
  trend: 'sideways',
  trendLine: null,
  extrema: { peaks: [], troughs: [] },
  levels: { support: [], resistance: [] },
  channels: [],
};

function computeGeometry(candles: readonly Candle[], cfg: GeometryConfig): GeometryData {
  const { highs, lows, closes } = toPriceSeries(candles);
  const extremaOpts: ExtremaOptions = {
    maxWindow: cfg.extrema.maxWindow,
    strengthRangeFraction: cfg.extrema.strengthRangeFraction,
  };

  const trend = classifyTrend(closes, cfg.trend.period, {
    minRSquared: cfg.trend.minRSquared,
    slopeThreshold: cfg.trend.slopeThreshold,
  });
  const fit = fitTrailingWindow(closes, cfg.trend.period);

  const levels = locateSupportResistance(highs, lows, cfg.levels.lookbackPeriod, {
    minDistance: cfg.levels.minDistance,
    prominenceThreshold: cfg.extrema.prominenceThreshold,
    tolerance: cfg.levels.clusterTolerance,
    extrema: extremaOpts,
  });

  // 高値・安値それぞれ 1 回だけ検出し、payload とチャネル探索で共有する
  const peaks = findExtrema(highs, cfg.extrema.minDistance, cfg.extrema.prominenceThreshold, extremaOpts)
    .filter((p) => p.kind === 'peak');
  const troughs = findExtrema(lows, cfg.extrema.minDistance, cfg.extrema.prominenceThreshold, extremaOpts)
    .filter((p) => p.kind === 'trough');

  const channels = detectChannels(highs, lows, cfg.channels.minTouches, {
    slopeTolerance: cfg.channels.slopeTolerance,
    touchTolerance: cfg.channels.touchTolerance,
    points: { peaks, troughs },
  });

  return {
    trend,
    trendLine: fit.ok ? fit.line : null,
    extrema: { peaks, troughs },
    levels,
    channels: channels.slice(0, cfg.maxChannels),
  };
}

function summarize(data: GeometryData): string {
  return [
    data.trend,
    `support ${data.levels.support.length}`,
    `resistance ${data.levels.resistance.length}`,
    `channels ${data.channels.length}`,
  ].join(' / ');
}

export default function analyzeGeometry(
  candles: readonly Candle[],
  config: GeometryConfigInput = {},
): AnalyzeGeometryResult {
  const t0 = Date.now();
  const inputSize = Array.isArray(candles) ? candles.length : 0;
  try {
    const input = AnalyzeGeometryInputSchema.parse({ candles, config });
    const meta = { count: input.candles.length, params: input.config };

    if (input.candles.length < MIN_CANDLES) {
      const res = AnalyzeGeometryOutputSchema.parse(ok('insufficient data', EMPTY_DATA, meta));
      logToolRun({ tool: TOOL, inputSize, ok: true, ms: Date.now() - t0, summary: res.summary });
      return res;
    }

    const data = computeGeometry(input.candles, input.config);
    const res = AnalyzeGeometryOutputSchema.parse(ok(summarize(data), data, meta));
    logToolRun({ tool: TOOL, inputSize, ok: true, ms: Date.now() - t0, summary: res.summary });
    return res;
  } catch (err: unknown) {
    logError(TOOL, err, { inputSize });
    const res = AnalyzeGeometryOutputSchema.parse(failFromError(err));
    logToolRun({ tool: TOOL, inputSize, ok: false, ms: Date.now() - t0, summary: res.summary });
    return res;
  }
}
