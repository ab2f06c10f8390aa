/**
 * テスト用の合成データ
 */
import type { Candle } from '../../src/types/domain.js';

/**
 * 傾き 0.5 の平行レール（60 本）
 * - 高値: 100 + 0.5i、i % 10 === 5 で +2 のスパイク → ピーク 5, 15, ..., 55
 * - 安値: 90 + 0.5i、i % 10 === 0 で −2 のディップ → トラフ 10, 20, ..., 50
 */
export function ascendingRails(length: number = 60): { highs: number[]; lows: number[] } {
  const highs: number[] = [];
  const lows: number[] = [];
  for (let i = 0; i < length; i++) {
    highs.push(100 + 0.5 * i + (i % 10 === 5 ? 2 : 0));
    lows.push(90 + 0.5 * i - (i % 10 === 0 ? 2 : 0));
  }
  return { highs, lows };
}

/** 高値は上昇、安値は下降（平行にならない） */
export function divergingRails(length: number = 60): { highs: number[]; lows: number[] } {
  const { highs } = ascendingRails(length);
  const lows: number[] = [];
  for (let i = 0; i < length; i++) {
    lows.push(90 - 0.5 * i - (i % 10 === 0 ? 2 : 0));
  }
  return { highs, lows };
}

/** ascendingRails をローソク足化（始値 = 終値 = 95 + 0.5i） */
export function railCandles(length: number = 60): Candle[] {
  const { highs, lows } = ascendingRails(length);
  return highs.map((high, i) => {
    const mid = 95 + 0.5 * i;
    return { open: mid, high, low: lows[i], close: mid, volume: 1000 };
  });
}

/** 決定的な擬似ノイズ系列（sin の合成） */
export function wavySeries(length: number): number[] {
  return Array.from({ length }, (_, i) => 100 + 10 * Math.sin(i * 0.7) + 3 * Math.sin(i * 2.3));
}
