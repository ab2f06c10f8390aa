/**
 * ピーク / トラフ検出
 *
 * 隣接 2 点に対する厳密な大小比較で候補を取り、左右窓からの prominence で
 * ノイズを落とす。同種の極値同士は minDistance 以上離す（ピークとトラフは独立に管理）。
 */
import { minMax } from '../../lib/math.js';
import { isPresent, presentValues } from '../../lib/validate.js';
import { EXTREMA_DEFAULTS } from './config.js';
import type { ExtremumKind, PeakTrough, Series } from './types.js';

export interface ExtremaOptions {
  /** prominence 探索窓の上限 */
  maxWindow?: number;
  /** strength の正規化に使う値幅の割合 */
  strengthRangeFraction?: number;
}

/** prominence 探索窓の片側幅。短い系列でも左右 1 点は見る */
export function prominenceWindow(length: number, maxWindow: number = EXTREMA_DEFAULTS.maxWindow): number {
  return Math.max(1, Math.min(maxWindow, Math.floor(length / 4)));
}

/**
 * index の極値としての突出度。
 * ピーク: value − max(左窓の最小, 右窓の最小)
 * トラフ: min(左窓の最大, 右窓の最大) − value
 * 窓内の欠損は無視し、負値は 0 にクリップ
 */
export function calcProminence(values: Series, index: number, kind: ExtremumKind, window: number): number {
  const current = values[index];
  if (!isPresent(current)) return 0;

  const left = presentValues(values.slice(Math.max(0, index - window), index));
  const right = presentValues(values.slice(index + 1, Math.min(values.length, index + window + 1)));
  const l = minMax(left);
  const r = minMax(right);
  if (!l || !r) return 0;

  const prominence = kind === 'peak'
    ? current - Math.max(l.min, r.min)
    : Math.min(l.max, r.max) - current;
  return Math.max(0, prominence);
}

export function findExtrema(
  values: Series,
  minDistance: number = EXTREMA_DEFAULTS.minDistance,
  prominenceThreshold: number = EXTREMA_DEFAULTS.prominenceThreshold,
  opts: ExtremaOptions = {},
): PeakTrough[] {
  const {
    maxWindow = EXTREMA_DEFAULTS.maxWindow,
    strengthRangeFraction = EXTREMA_DEFAULTS.strengthRangeFraction,
  } = opts;
  if (values.length < 3) return [];

  const bounds = minMax(presentValues(values));
  if (!bounds) return [];

  const valueRange = bounds.max - bounds.min;
  const minProminence = valueRange * prominenceThreshold;
  const strengthBase = valueRange * strengthRangeFraction;
  const window = prominenceWindow(values.length, maxWindow);

  const out: PeakTrough[] = [];
  const lastAccepted: Record<ExtremumKind, number | null> = { peak: null, trough: null };

  for (let i = 1; i < values.length - 1; i++) {
    const current = values[i];
    const prev = values[i - 1];
    const next = values[i + 1];
    if (!isPresent(current) || !isPresent(prev) || !isPresent(next)) continue;

    let kind: ExtremumKind;
    if (current > prev && current > next) kind = 'peak';
    else if (current < prev && current < next) kind = 'trough';
    else continue;

    const prominence = calcProminence(values, i, kind, window);
    if (prominence < minProminence) continue;

    const last = lastAccepted[kind];
    if (last != null && i - last < minDistance) continue;

    lastAccepted[kind] = i;
    out.push({
      index: i,
      value: current,
      kind,
      strength: strengthBase > 0 ? Math.min(1, prominence / strengthBase) : 0,
      prominence,
    });
  }

  return out;
}

export function findPeaks(values: Series, minDistance?: number, prominenceThreshold?: number, opts?: ExtremaOptions): PeakTrough[] {
  return findExtrema(values, minDistance, prominenceThreshold, opts).filter((p) => p.kind === 'peak');
}

export function findTroughs(values: Series, minDistance?: number, prominenceThreshold?: number, opts?: ExtremaOptions): PeakTrough[] {
  return findExtrema(values, minDistance, prominenceThreshold, opts).filter((p) => p.kind === 'trough');
}
