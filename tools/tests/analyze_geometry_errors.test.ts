import { describe, it, expect, vi } from 'vitest';
import analyzeGeometry from '../analyze_geometry.js';
import { logger } from '../../lib/logger.js';
import { railCandles } from './helpers.js';

vi.mock('../geometry/channels.js', () => ({
  detectChannels: () => {
    throw new Error('channel search failed');
  },
}));

describe('analyzeGeometry (想定外の失敗)', () => {
  it('例外を投げずに internal エラーを返す', () => {
    const error = vi.spyOn(logger, 'error');
    const res = analyzeGeometry(railCandles(60));
    expect(res).toEqual({
      ok: false,
      summary: 'Error: channel search failed',
      data: {},
      meta: { errorType: 'internal' },
    });
    expect(error).toHaveBeenCalledWith(
      'tool error',
      expect.objectContaining({ tool: 'analyze_geometry', message: 'channel search failed', inputSize: 60 }),
    );
  });
});
