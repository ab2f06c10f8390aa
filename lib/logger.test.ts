import { describe, it, expect, vi, afterEach } from 'vitest';
import { createLogger, resolveLevel, logger, logToolRun, logError } from './logger.js';

describe('createLogger', () => {
  it('指定レベルで生成する', () => {
    const l = createLogger('debug');
    expect(l.level).toBe('debug');
    expect(l.silent).toBe(false);
  });
  it("'silent' は出力を止める", () => {
    const l = createLogger('silent');
    expect(l.silent).toBe(true);
  });
  it('未知のレベルは info にフォールバックする', () => {
    expect(createLogger('verbosee').level).toBe('info');
    expect(resolveLevel('verbosee')).toBe('info');
    expect(resolveLevel(undefined)).toBe('info');
    expect(resolveLevel('warn')).toBe('warn');
  });
});

describe('logToolRun / logError', () => {
  afterEach(() => { vi.restoreAllMocks(); });

  it('logToolRun は info で実行記録を出す', () => {
    const spy = vi.spyOn(logger, 'info');
    logToolRun({ tool: 'analyze_geometry', inputSize: 60, ok: true, ms: 3 });
    expect(spy).toHaveBeenCalledWith('tool run', { tool: 'analyze_geometry', inputSize: 60, ok: true, ms: 3 });
  });

  it('logError は error でメッセージとコンテキストを出す', () => {
    const spy = vi.spyOn(logger, 'error');
    logError('analyze_geometry', new Error('boom'), { inputSize: 2 });
    expect(spy).toHaveBeenCalledTimes(1);
    expect(spy).toHaveBeenCalledWith(
      'tool error',
      expect.objectContaining({ tool: 'analyze_geometry', message: 'boom', inputSize: 2 }),
    );
  });
});
