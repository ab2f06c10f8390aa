/**
 * ツール実行ログ
 *
 * winston で JSON 行を stderr に出す（stdout は結果出力用に空けておく）。
 * LOG_LEVEL でレベルを指定。'silent' で出力を止める。
 */
import winston from 'winston';
import { getErrorMessage } from './error.js';

const ALL_LEVELS = ['error', 'warn', 'info', 'http', 'verbose', 'debug', 'silly'];

/** 未知のレベル指定は 'info' に戻す */
export function resolveLevel(level: string | undefined): string {
	if (level === 'silent') return level;
	return level != null && ALL_LEVELS.includes(level) ? level : 'info';
}

export function createLogger(level: string | undefined = process.env.LOG_LEVEL): winston.Logger {
	const resolved = resolveLevel(level);
	const silent = resolved === 'silent';
	return winston.createLogger({
		level: silent ? 'error' : resolved,
		silent,
		format: winston.format.combine(winston.format.timestamp(), winston.format.json()),
		transports: [new winston.transports.Console({ stderrLevels: ALL_LEVELS })],
	});
}

export const logger = createLogger();

export interface ToolRunLog {
	tool: string;
	/** 入力サイズ（ローソク足本数など） */
	inputSize: number;
	ok: boolean;
	ms: number;
	summary?: string;
}

export function logToolRun(entry: ToolRunLog): void {
	logger.info('tool run', entry);
}

export function logError(tool: string, err: unknown, context: Record<string, unknown> = {}): void {
	logger.error('tool error', {
		tool,
		message: getErrorMessage(err),
		stack: err instanceof Error ? err.stack : undefined,
		...context,
	});
}
