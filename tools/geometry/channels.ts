/**
 * 平行チャネル検出
 *
 * 高値のピーク 2 点で上側ライン、安値のトラフ 2 点で下側ラインを作り、
 * 傾きが近い組み合わせのうちタッチ数が最大のものを採用する。
 * ペアの列挙は昇順の二重ループ固定（同点は先に見つかった方が勝つ）。
 */
import { relativeDistance } from '../../lib/math.js';
import { isPresent } from '../../lib/validate.js';
import { CHANNEL_DEFAULTS, EXTREMA_DEFAULTS } from './config.js';
import { findPeaks, findTroughs, type ExtremaOptions } from './extrema.js';
import { lineThrough, lineValueAt } from './trendline.js';
import type { Channel, ChannelLine, PeakTrough, Series } from './types.js';

export interface ChannelOptions {
  minDistance?: number;
  prominenceThreshold?: number;
  /** 上下ラインの傾きの相対差の上限 */
  slopeTolerance?: number;
  /** タッチ判定の価格許容（ライン値に対する割合） */
  touchTolerance?: number;
  /** prominence 窓・strength 正規化の上書き */
  extrema?: ExtremaOptions;
  /** 検出済みのピーク / トラフ。指定時は再検出せず、上の極値パラメータは使わない */
  points?: { peaks: readonly PeakTrough[]; troughs: readonly PeakTrough[] };
}

/** 0 除算回避用 */
const SLOPE_EPSILON = 1e-10;

export function isParallel(upperSlope: number, lowerSlope: number, slopeTolerance: number = CHANNEL_DEFAULTS.slopeTolerance): boolean {
  return Math.abs(upperSlope - lowerSlope) / (Math.abs(upperSlope) + SLOPE_EPSILON) < slopeTolerance;
}

/**
 * チャネルのタッチ数。定義点 4 つを初期値とし、4 点の index 範囲内で
 * 高値が上側ライン・安値が下側ラインの許容内にあるたびに加算する。
 * ライン値がちょうど 0 の点はタッチとしない。
 */
export function countChannelTouches(
  highs: Series,
  lows: Series,
  p1: PeakTrough,
  p2: PeakTrough,
  t1: PeakTrough,
  t2: PeakTrough,
  tolerance: number = CHANNEL_DEFAULTS.touchTolerance,
): number {
  const upper = lineThrough(p1, p2);
  const lower = lineThrough(t1, t2);

  const startIdx = Math.min(p1.index, p2.index, t1.index, t2.index);
  const endIdx = Math.min(
    Math.max(p1.index, p2.index, t1.index, t2.index),
    highs.length - 1,
    lows.length - 1,
  );

  let touches = 4;
  for (let i = startIdx; i <= endIdx; i++) {
    const high = highs[i];
    const low = lows[i];
    if (!isPresent(high) || !isPresent(low)) continue;

    const upperDist = relativeDistance(high, lineValueAt(upper, i));
    if (upperDist != null && upperDist <= tolerance) touches++;

    const lowerDist = relativeDistance(low, lineValueAt(lower, i));
    if (lowerDist != null && lowerDist <= tolerance) touches++;
  }
  return touches;
}

function toChannelLine(a: PeakTrough, b: PeakTrough, slope: number): ChannelLine {
  return {
    start: { index: a.index, value: a.value },
    end: { index: b.index, value: b.value },
    slope,
  };
}

export function detectChannels(
  highs: Series,
  lows: Series,
  minTouches: number = CHANNEL_DEFAULTS.minTouches,
  opts: ChannelOptions = {},
): Channel[] {
  const {
    minDistance = EXTREMA_DEFAULTS.minDistance,
    prominenceThreshold = EXTREMA_DEFAULTS.prominenceThreshold,
    slopeTolerance = CHANNEL_DEFAULTS.slopeTolerance,
    touchTolerance = CHANNEL_DEFAULTS.touchTolerance,
    extrema = {},
    points,
  } = opts;

  const peaks = points?.peaks ?? findPeaks(highs, minDistance, prominenceThreshold, extrema);
  const troughs = points?.troughs ?? findTroughs(lows, minDistance, prominenceThreshold, extrema);
  if (peaks.length < 2 || troughs.length < 2) return [];

  const channels: Channel[] = [];

  for (let i = 0; i < peaks.length - 1; i++) {
    for (let j = i + 1; j < peaks.length; j++) {
      const p1 = peaks[i];
      const p2 = peaks[j];
      if (p1.index === p2.index) continue;
      const upperSlope = lineThrough(p1, p2).slope;

      let best: { t1: PeakTrough; t2: PeakTrough; slope: number; touches: number } | null = null;

      for (let k = 0; k < troughs.length - 1; k++) {
        for (let l = k + 1; l < troughs.length; l++) {
          const t1 = troughs[k];
          const t2 = troughs[l];
          if (t1.index === t2.index) continue;

          const lowerSlope = lineThrough(t1, t2).slope;
          if (!isParallel(upperSlope, lowerSlope, slopeTolerance)) continue;

          const touches = countChannelTouches(highs, lows, p1, p2, t1, t2, touchTolerance);
          if (!best || touches > best.touches) {
            best = { t1, t2, slope: lowerSlope, touches };
          }
        }
      }

      if (best && best.touches >= minTouches) {
        channels.push({
          upperLine: toChannelLine(p1, p2, upperSlope),
          lowerLine: toChannelLine(best.t1, best.t2, best.slope),
          touches: best.touches,
          width: Math.abs(p1.value - best.t1.value),
        });
      }
    }
  }

  // Array.prototype.sort は安定ソート。同タッチ数は列挙順のまま
  return channels.sort((a, b) => b.touches - a.touches);
}
