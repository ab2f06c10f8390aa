/**
 * ローソク足配列 → OHLCV 系列
 */
import { normalizeSeries } from '../../lib/validate.js';
import type { Candle } from '../../src/types/domain.js';
import type { Series } from './types.js';

export interface PriceSeries {
  opens: Series;
  highs: Series;
  lows: Series;
  closes: Series;
  volumes: Series;
}

export function toPriceSeries(candles: readonly Candle[]): PriceSeries {
  return {
    opens: normalizeSeries(candles.map((c) => c.open)),
    highs: normalizeSeries(candles.map((c) => c.high)),
    lows: normalizeSeries(candles.map((c) => c.low)),
    closes: normalizeSeries(candles.map((c) => c.close)),
    volumes: normalizeSeries(candles.map((c) => c.volume)),
  };
}
