import type { Series } from '../src/types/domain.js';

export type ValidationResult<T> =
	| { ok: true; value: T }
	| { ok: false; error: { message: string; type: string } };

/** 有効なサンプルか（null / undefined / NaN / ±Infinity は欠損扱い） */
export function isPresent(v: number | null | undefined): v is number {
	return v != null && Number.isFinite(v);
}

/** 欠損表現を null に揃えた系列を返す（入力は変更しない） */
export function normalizeSeries(values: ReadonlyArray<number | null | undefined>): Series {
	return values.map((v) => (isPresent(v) ? v : null));
}

/** 系列から有効サンプルだけを取り出す */
export function presentValues(values: ReadonlyArray<number | null | undefined>): number[] {
	const out: number[] = [];
	for (const v of values) {
		if (isPresent(v)) out.push(v);
	}
	return out;
}

/**
 * インデックス範囲 [start, end] の検証
 * - 整数であること
 * - 0 <= start < end < length
 * 範囲の補正は行わない
 */
export function validateIndexRange(
	length: number,
	start: number,
	end: number,
): ValidationResult<{ start: number; end: number }> {
	if (!Number.isInteger(start) || !Number.isInteger(end)) {
		return { ok: false, error: { message: `start/end は整数で指定してください (start=${start}, end=${end})`, type: 'invalid_range' } };
	}
	if (start < 0 || start >= end || end >= length) {
		return { ok: false, error: { message: `不正な範囲です (start=${start}, end=${end}, length=${length})`, type: 'invalid_range' } };
	}
	return { ok: true, value: { start, end } };
}
