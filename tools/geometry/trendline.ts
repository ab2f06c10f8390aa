/**
 * トレンドライン構築ヘルパー
 *
 * 2 点を結ぶ直線と、直線の評価・角度計算。
 * チャネル検出（ペア探索）で回帰を経由せずに直線を作る際に使う。
 */
import type { ChannelPoint } from './types.js';

export interface LineCoefficients {
  slope: number;
  intercept: number;
}

/** 2 点を結ぶ直線。index が同じ 2 点には定義されないため呼び出し側で除外すること */
export function lineThrough(p1: ChannelPoint, p2: ChannelPoint): LineCoefficients {
  const slope = (p2.value - p1.value) / (p2.index - p1.index);
  return { slope, intercept: p1.value - slope * p1.index };
}

export function lineValueAt(line: LineCoefficients, index: number): number {
  return line.slope * index + line.intercept;
}

/** 傾きを角度（度）に変換。1 インデックスあたりの価格変化なので価格スケール依存 */
export function lineAngleDegrees(line: Pick<LineCoefficients, 'slope'>): number {
  return (Math.atan(line.slope) * 180) / Math.PI;
}
