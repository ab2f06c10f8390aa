import { describe, it, expect, vi } from 'vitest';
import analyzeGeometry from '../analyze_geometry.js';
import { findExtrema, findPeaks, findTroughs } from '../geometry/extrema.js';
import { railCandles } from './helpers.js';

vi.mock('../geometry/extrema.js', async (importOriginal) => {
  const actual = await importOriginal<typeof import('../geometry/extrema.js')>();
  return {
    ...actual,
    findExtrema: vi.fn(actual.findExtrema),
    findPeaks: vi.fn(actual.findPeaks),
    findTroughs: vi.fn(actual.findTroughs),
  };
});

describe('analyzeGeometry (極値の共有)', () => {
  it('高値・安値の極値検出は 1 回ずつで、チャネル探索は再検出しない', () => {
    const res = analyzeGeometry(railCandles(60));
    expect(res.ok).toBe(true);

    expect(findExtrema).toHaveBeenCalledTimes(2);
    // 残りは水準検出（minDistance 10）の分だけ
    expect(findPeaks).toHaveBeenCalledTimes(1);
    expect(findTroughs).toHaveBeenCalledTimes(1);
    expect(vi.mocked(findPeaks).mock.calls[0][1]).toBe(10);
  });
});
