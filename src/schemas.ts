import { z } from 'zod';
import { GeometryConfigSchema } from '../tools/geometry/config.js';

// ── Shared base schemas ──

/** 全ツール共通のエラー分岐 */
export const FailResultSchema = z.object({
  ok: z.literal(false),
  summary: z.string(),
  data: z.object({}).passthrough(),
  meta: z.object({ errorType: z.string() }).passthrough(),
});

/** ok/fail Result union を生成するヘルパー */
export function toolResultSchema<D extends z.ZodTypeAny, M extends z.ZodTypeAny>(data: D, meta: M) {
  return z.union([
    z.object({ ok: z.literal(true), summary: z.string(), data, meta }),
    FailResultSchema,
  ]);
}

/** 価格。欠損は null（NaN も受け付けて欠損扱いにする） */
const PriceInputSchema = z.union([z.number(), z.nan(), z.null()]);

export const CandleInputSchema = z.object({
  open: PriceInputSchema,
  high: PriceInputSchema,
  low: PriceInputSchema,
  close: PriceInputSchema,
  volume: PriceInputSchema.optional(),
  isoTime: z.string().nullable().optional(),
});

export const AnalyzeGeometryInputSchema = z.object({
  candles: z.array(CandleInputSchema),
  config: GeometryConfigSchema.optional().default({}),
});

// ── Geometry output ──

export const TrendDirectionEnum = z.enum(['uptrend', 'downtrend', 'sideways']);

export const TrendLineSchema = z.object({
  slope: z.number(),
  intercept: z.number(),
  startIndex: z.number().int(),
  endIndex: z.number().int(),
  rSquared: z.number().min(0),
});

export const PeakTroughSchema = z.object({
  index: z.number().int(),
  value: z.number(),
  kind: z.enum(['peak', 'trough']),
  strength: z.number().min(0).max(1),
  prominence: z.number().min(0),
});

const ChannelPointSchema = z.object({ index: z.number().int(), value: z.number() });

export const ChannelLineSchema = z.object({
  start: ChannelPointSchema,
  end: ChannelPointSchema,
  slope: z.number(),
});

export const ChannelSchema = z.object({
  upperLine: ChannelLineSchema,
  lowerLine: ChannelLineSchema,
  touches: z.number().int().min(4),
  width: z.number().min(0),
});

export const GeometryDataSchema = z.object({
  trend: TrendDirectionEnum,
  trendLine: TrendLineSchema.nullable(),
  extrema: z.object({
    peaks: z.array(PeakTroughSchema),
    troughs: z.array(PeakTroughSchema),
  }),
  levels: z.object({
    support: z.array(z.number()),
    resistance: z.array(z.number()),
  }),
  channels: z.array(ChannelSchema),
});

export const GeometryMetaSchema = z.object({
  count: z.number().int(),
  params: GeometryConfigSchema,
});

export const AnalyzeGeometryOutputSchema = toolResultSchema(GeometryDataSchema, GeometryMetaSchema);
