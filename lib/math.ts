/**
 * 数値演算ユーティリティ
 * 各ジオメトリ計算で共通に使う関数を統一
 */

/**
 * 配列の平均値を計算
 * @param arr 数値配列
 * @returns 平均値、空配列の場合はnull
 */
export function avg(arr: readonly number[]): number | null {
	return arr.length ? arr.reduce((s, v) => s + v, 0) / arr.length : null;
}

/**
 * 配列の最小値・最大値を 1 パスで求める（スプレッド演算子のスタック上限を避ける）
 * @returns 空配列の場合はnull
 */
export function minMax(arr: readonly number[]): { min: number; max: number } | null {
	if (!arr.length) return null;
	let min = arr[0];
	let max = arr[0];
	for (let i = 1; i < arr.length; i++) {
		const v = arr[i];
		if (v < min) min = v;
		if (v > max) max = v;
	}
	return { min, max };
}

/** 相対距離 |a - b| / b。b が 0 の場合は null */
export function relativeDistance(a: number, b: number): number | null {
	if (b === 0) return null;
	return Math.abs(a - b) / b;
}
