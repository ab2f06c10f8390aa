/**
 * ドメイン共通型（ツール結果エンベロープ / ローソク足）
 */

export interface OkResult<T = Record<string, unknown>, M = Record<string, unknown>> {
  ok: true;
  summary: string;
  data: T;
  meta: M;
}

export interface FailResult<M = Record<string, unknown>> {
  ok: false;
  summary: string;
  data: Record<string, never>;
  meta: M & { errorType: string };
}

export type Result<T = Record<string, unknown>, M = Record<string, unknown>> = OkResult<T, M> | FailResult<M>;

/** データ層から渡されるローソク足。欠損値は null */
export interface Candle {
  open: number | null;
  high: number | null;
  low: number | null;
  close: number | null;
  volume?: number | null;
  isoTime?: string | null;
}

/** インデックス指定の数値系列。欠損サンプルは null */
export type Series = ReadonlyArray<number | null>;
