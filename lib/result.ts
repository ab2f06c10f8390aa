import { ZodError } from 'zod';
import type { OkResult, FailResult } from '../src/types/domain.js';
import { getErrorMessage } from './error.js';

export function ok<T, M>(summary: string, data: T, meta: M): OkResult<T, M> {
	return {
		ok: true,
		summary,
		data,
		meta,
	};
}

export function fail(message: string, type: string = 'user'): FailResult {
	return {
		ok: false,
		summary: `Error: ${message}`,
		data: {},
		meta: { errorType: type },
	};
}

/** zod の issue 群を 1 行のメッセージにまとめる */
export function formatZodError(err: ZodError): string {
	return err.issues
		.map((issue) => `${issue.path.length ? issue.path.join('.') : '(root)'}: ${issue.message}`)
		.join('; ');
}

export interface FailFromErrorOptions {
	/** zod 以外のエラーのデフォルトエラータイプ (default: 'internal') */
	defaultType?: string;
	/** getErrorMessage が空を返した場合のフォールバックメッセージ (default: 'internal error') */
	defaultMessage?: string;
}

/**
 * catch ブロックで捕捉したエラーから fail() 結果を生成する共通ヘルパー。
 *
 * - ZodError → 'user' タイプ + issue 一覧
 * - その他 → defaultType + エラーメッセージ
 */
export function failFromError(err: unknown, opts: FailFromErrorOptions = {}): FailResult {
	const { defaultType = 'internal', defaultMessage = 'internal error' } = opts;

	if (err instanceof ZodError) {
		return fail(formatZodError(err) || defaultMessage, 'user');
	}
	return fail(getErrorMessage(err) || defaultMessage, defaultType);
}

/** validate 系ヘルパーの失敗結果を fail() に変換 */
export function failFromValidation(chk: { error: { message: string; type: string } }): FailResult {
	return fail(chk.error.message, chk.error.type);
}
