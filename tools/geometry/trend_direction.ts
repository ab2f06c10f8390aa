/**
 * トレンド方向の判定（直近 period 本の回帰直線）
 */
import { avg } from '../../lib/math.js';
import { presentValues } from '../../lib/validate.js';
import { TREND_DEFAULTS } from './config.js';
import { fitTrendLine } from './regression.js';
import type { FitResult, Series, TrendDirection } from './types.js';

export interface TrendOptions {
  /** これ未満の R² は方向なし（sideways） */
  minRSquared?: number;
  /** period 全体での変化率（対平均）の閾値 */
  slopeThreshold?: number;
}

/** 直近 period 本の区間にフィット。period が系列より長ければ invalid_range */
export function fitTrailingWindow(values: Series, period: number = TREND_DEFAULTS.period): FitResult {
  return fitTrendLine(values, values.length - period, values.length - 1);
}

export function classifyTrend(
  values: Series,
  period: number = TREND_DEFAULTS.period,
  opts: TrendOptions = {},
): TrendDirection {
  const { minRSquared = TREND_DEFAULTS.minRSquared, slopeThreshold = TREND_DEFAULTS.slopeThreshold } = opts;
  if (!Number.isInteger(period) || period < 1 || values.length < period) return 'sideways';

  const recent = presentValues(values.slice(values.length - period));
  if (recent.length < Math.floor(period / 2)) return 'sideways';

  const fit = fitTrailingWindow(values, period);
  if (!fit.ok) return 'sideways';
  if (fit.line.rSquared < minRSquared) return 'sideways';

  const mean = avg(recent);
  if (mean == null || mean === 0) return 'sideways';

  const slopeFraction = (fit.line.slope * period) / mean;
  if (slopeFraction > slopeThreshold) return 'uptrend';
  if (slopeFraction < -slopeThreshold) return 'downtrend';
  return 'sideways';
}
