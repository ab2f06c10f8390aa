/**
 * 最小二乗法による直線フィット（R² 付き）
 */
import { TrendFitError } from '../../lib/error.js';
import { isPresent, validateIndexRange } from '../../lib/validate.js';
import type { FitResult, Series, TrendLine } from './types.js';

/**
 * values[start..end]（両端含む）に直線をフィットする。
 *
 * - 範囲は補正しない。0 <= start < end < length 以外は invalid_range
 * - 欠損サンプルは除外し、有効点が 2 未満なら insufficient_points
 * - 分母 n·Σx² − (Σx)² が 0 の場合は slope = 0, intercept = mean(y)
 * - 全点が同値（SS_tot = 0）なら R² = 1、それ以外は 1 − SS_res/SS_tot を 0 で下限クリップ
 */
export function fitTrendLine(values: Series, start: number = 0, end: number = values.length - 1): FitResult {
  const range = validateIndexRange(values.length, start, end);
  if (!range.ok) {
    return { ok: false, error: { type: 'invalid_range', message: range.error.message } };
  }

  const xs: number[] = [];
  const ys: number[] = [];
  for (let x = start; x <= end; x++) {
    const y = values[x];
    if (!isPresent(y)) continue;
    xs.push(x);
    ys.push(y);
  }

  const n = xs.length;
  if (n < 2) {
    return {
      ok: false,
      error: { type: 'insufficient_points', message: `有効なデータ点が 2 点以上必要です (valid=${n})` },
    };
  }

  let sumX = 0;
  let sumY = 0;
  let sumXY = 0;
  let sumX2 = 0;
  for (let i = 0; i < n; i++) {
    sumX += xs[i];
    sumY += ys[i];
    sumXY += xs[i] * ys[i];
    sumX2 += xs[i] * xs[i];
  }

  const denominator = n * sumX2 - sumX * sumX;
  let slope = 0;
  let intercept = sumY / n;
  if (denominator !== 0) {
    slope = (n * sumXY - sumX * sumY) / denominator;
    intercept = (sumY - slope * sumX) / n;
  }

  const yMean = sumY / n;
  let ssTot = 0;
  let ssRes = 0;
  for (let i = 0; i < n; i++) {
    ssTot += (ys[i] - yMean) ** 2;
    ssRes += (ys[i] - (slope * xs[i] + intercept)) ** 2;
  }
  const rSquared = ssTot === 0 ? 1 : 1 - ssRes / ssTot;

  const line: TrendLine = {
    slope,
    intercept,
    startIndex: start,
    endIndex: end,
    rSquared: Math.max(0, rSquared),
  };
  return { ok: true, line };
}

/** fitTrendLine の例外版。失敗時は TrendFitError を投げる */
export function fitTrendLineOrThrow(values: Series, start?: number, end?: number): TrendLine {
  const res = fitTrendLine(values, start, end);
  if (!res.ok) throw new TrendFitError(res.error.type, res.error.message);
  return res.line;
}
