import { describe, it, expect } from 'vitest';
import { avg, minMax, relativeDistance } from './math.js';

describe('avg', () => {
  it('平均値を計算する', () => {
    expect(avg([1, 2, 3])).toBe(2);
  });
  it('小数を含む配列の平均', () => {
    expect(avg([1.5, 2.5])).toBe(2);
  });
  it('空配列は null を返す', () => {
    expect(avg([])).toBeNull();
  });
  it('単一要素はその値を返す', () => {
    expect(avg([42])).toBe(42);
  });
});

describe('minMax', () => {
  it('最小値と最大値を返す', () => {
    expect(minMax([3, 9, 1, 5])).toEqual({ min: 1, max: 9 });
  });
  it('単一要素は min = max', () => {
    expect(minMax([7])).toEqual({ min: 7, max: 7 });
  });
  it('空配列は null を返す', () => {
    expect(minMax([])).toBeNull();
  });
});

describe('relativeDistance', () => {
  it('基準値に対する相対距離を返す', () => {
    expect(relativeDistance(102, 100)).toBeCloseTo(0.02, 12);
    expect(relativeDistance(98, 100)).toBeCloseTo(0.02, 12);
  });
  it('基準値 0 は null を返す', () => {
    expect(relativeDistance(1, 0)).toBeNull();
  });
});
