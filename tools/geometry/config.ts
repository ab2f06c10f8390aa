/**
 * ジオメトリ計算のチューニング定数
 *
 * 30% の傾き許容・2% の価格許容などは経験値。導出せずにそのまま既定値として持ち、
 * 呼び出し側が部分的に上書きできるようにする。
 */
import { z } from 'zod';

export const EXTREMA_DEFAULTS = {
  minDistance: 5,
  prominenceThreshold: 0.01,
  /** prominence 探索窓の上限（実際の窓は min(上限, floor(len/4))） */
  maxWindow: 20,
  /** strength = prominence / (valueRange * strengthRangeFraction) */
  strengthRangeFraction: 0.1,
} as const;

export const LEVEL_DEFAULTS = {
  minDistance: 10,
  clusterTolerance: 0.02,
  lookbackPeriod: 50,
} as const;

export const TREND_DEFAULTS = {
  period: 20,
  minRSquared: 0.3,
  slopeThreshold: 0.05,
} as const;

export const CHANNEL_DEFAULTS = {
  minTouches: 3,
  slopeTolerance: 0.3,
  touchTolerance: 0.02,
} as const;

const fraction = z.number().finite().min(0);
const count = z.number().int().min(0);

export const GeometryConfigSchema = z.object({
  extrema: z
    .object({
      minDistance: count.default(EXTREMA_DEFAULTS.minDistance),
      prominenceThreshold: fraction.default(EXTREMA_DEFAULTS.prominenceThreshold),
      maxWindow: z.number().int().min(1).default(EXTREMA_DEFAULTS.maxWindow),
      strengthRangeFraction: z.number().finite().positive().default(EXTREMA_DEFAULTS.strengthRangeFraction),
    })
    .default({}),
  levels: z
    .object({
      minDistance: count.default(LEVEL_DEFAULTS.minDistance),
      clusterTolerance: fraction.default(LEVEL_DEFAULTS.clusterTolerance),
      lookbackPeriod: z.number().int().min(1).default(LEVEL_DEFAULTS.lookbackPeriod),
    })
    .default({}),
  trend: z
    .object({
      period: z.number().int().min(2).default(TREND_DEFAULTS.period),
      minRSquared: fraction.max(1).default(TREND_DEFAULTS.minRSquared),
      slopeThreshold: fraction.default(TREND_DEFAULTS.slopeThreshold),
    })
    .default({}),
  channels: z
    .object({
      minTouches: count.default(CHANNEL_DEFAULTS.minTouches),
      slopeTolerance: fraction.default(CHANNEL_DEFAULTS.slopeTolerance),
      touchTolerance: fraction.default(CHANNEL_DEFAULTS.touchTolerance),
    })
    .default({}),
  /** analyzeGeometry が返すチャネルの上限本数 */
  maxChannels: count.default(10),
});

export type GeometryConfig = z.output<typeof GeometryConfigSchema>;
export type GeometryConfigInput = z.input<typeof GeometryConfigSchema>;

/** 部分的な上書きを既定値にマージして検証する。不正値は ZodError */
export function resolveConfig(overrides: GeometryConfigInput = {}): GeometryConfig {
  return GeometryConfigSchema.parse(overrides);
}

export const DEFAULT_CONFIG: GeometryConfig = resolveConfig();
