import { describe, it, expect } from 'vitest';
import { getErrorMessage, TrendFitError } from './error.js';

describe('getErrorMessage', () => {
  it('Error インスタンスから message を取得する', () => {
    expect(getErrorMessage(new Error('test error'))).toBe('test error');
  });
  it('文字列はそのまま返す', () => {
    expect(getErrorMessage('string error')).toBe('string error');
  });
  it('数値は String() で変換する', () => {
    expect(getErrorMessage(42)).toBe('42');
  });
  it('null は "null" を返す', () => {
    expect(getErrorMessage(null)).toBe('null');
  });
  it('undefined は "undefined" を返す', () => {
    expect(getErrorMessage(undefined)).toBe('undefined');
  });
});

describe('TrendFitError', () => {
  it('type と message を保持する', () => {
    const err = new TrendFitError('invalid_range', 'bad range');
    expect(err).toBeInstanceOf(Error);
    expect(err.name).toBe('TrendFitError');
    expect(err.type).toBe('invalid_range');
    expect(getErrorMessage(err)).toBe('bad range');
  });
});
