/**
 * サポート / レジスタンス水準
 */
import { EXTREMA_DEFAULTS, LEVEL_DEFAULTS } from './config.js';
import { findPeaks, findTroughs, type ExtremaOptions } from './extrema.js';
import type { LevelCluster, LevelSet, Series } from './types.js';

/**
 * 近接する価格水準を %ベースでまとめる（昇順ソート後の貪欲 1 パス）。
 * 開いているクラスタの平均に対し |v − mean| / mean <= tolerance なら合流、
 * そうでなければクラスタを閉じて新しく始める。先に来た値ほど平均を強く引っ張る。
 * 平均がちょうど 0 のクラスタには 0 だけが合流する。
 */
export function groupLevels(levels: readonly number[], tolerance: number = LEVEL_DEFAULTS.clusterTolerance): LevelCluster[] {
  if (levels.length === 0) return [];

  const sorted = [...levels].sort((a, b) => a - b);
  const clusters: LevelCluster[] = [];
  let members = [sorted[0]];
  let sum = sorted[0];

  for (let i = 1; i < sorted.length; i++) {
    const v = sorted[i];
    const mean = sum / members.length;
    const near = mean === 0 ? v === 0 : Math.abs(v - mean) / mean <= tolerance;
    if (near) {
      members.push(v);
      sum += v;
    } else {
      clusters.push({ level: mean, members });
      members = [v];
      sum = v;
    }
  }
  clusters.push({ level: sum / members.length, members });

  return clusters;
}

/** クラスタ平均だけを返す */
export function clusterLevels(levels: readonly number[], tolerance: number = LEVEL_DEFAULTS.clusterTolerance): number[] {
  return groupLevels(levels, tolerance).map((c) => c.level);
}

export interface SupportResistanceOptions {
  minDistance?: number;
  prominenceThreshold?: number;
  tolerance?: number;
  /** prominence 窓・strength 正規化の上書き */
  extrema?: ExtremaOptions;
}

/**
 * 高値系列のピーク → レジスタンス、安値系列のトラフ → サポート。
 *
 * @param _lookbackPeriod - インターフェース互換のため受け取るが、入力の切り詰めには使わない
 */
export function locateSupportResistance(
  highs: Series,
  lows: Series,
  _lookbackPeriod: number = LEVEL_DEFAULTS.lookbackPeriod,
  opts: SupportResistanceOptions = {},
): LevelSet {
  const {
    minDistance = LEVEL_DEFAULTS.minDistance,
    prominenceThreshold = EXTREMA_DEFAULTS.prominenceThreshold,
    tolerance = LEVEL_DEFAULTS.clusterTolerance,
    extrema = {},
  } = opts;

  const resistance = clusterLevels(
    findPeaks(highs, minDistance, prominenceThreshold, extrema).map((p) => p.value),
    tolerance,
  );
  const support = clusterLevels(
    findTroughs(lows, minDistance, prominenceThreshold, extrema).map((t) => t.value),
    tolerance,
  );

  return { support, resistance };
}
