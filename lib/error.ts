/**
 * エラーユーティリティ
 */

/** unknown 型のエラーからメッセージを取り出す */
export function getErrorMessage(err: unknown): string {
  if (err instanceof Error) return err.message;
  if (typeof err === 'string') return err;
  return String(err);
}

export type TrendFitErrorType = 'invalid_range' | 'insufficient_points';

/**
 * 回帰フィットの失敗。fitTrendLineOrThrow が投げる。
 * type は FitResult の error.type と同じ値。
 */
export class TrendFitError extends Error {
  readonly type: TrendFitErrorType;

  constructor(type: TrendFitErrorType, message: string) {
    super(message);
    this.name = 'TrendFitError';
    this.type = type;
  }
}
