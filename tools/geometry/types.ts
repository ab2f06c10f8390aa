/**
 * geometry 系モジュール共通の型定義
 */
import type { TrendFitErrorType } from '../../lib/error.js';

export type { Series } from '../../src/types/domain.js';

/** 区間 [startIndex, endIndex] に最小二乗フィットした直線 value(i) = slope * i + intercept */
export interface TrendLine {
  slope: number;
  intercept: number;
  startIndex: number;
  endIndex: number;
  /** 決定係数。縮退フィットでも負にはしない */
  rSquared: number;
}

export type FitResult =
  | { ok: true; line: TrendLine }
  | { ok: false; error: { type: TrendFitErrorType; message: string } };

export type ExtremumKind = 'peak' | 'trough';

export interface PeakTrough {
  index: number;
  value: number;
  kind: ExtremumKind;
  /** prominence を値幅の 10% で正規化（上限 1） */
  strength: number;
  prominence: number;
}

export interface ChannelPoint {
  index: number;
  value: number;
}

export interface ChannelLine {
  start: ChannelPoint;
  end: ChannelPoint;
  slope: number;
}

export interface Channel {
  upperLine: ChannelLine;
  lowerLine: ChannelLine;
  /** 定義点 4 つを含むタッチ数（常に 4 以上） */
  touches: number;
  /** 上側始点と下側始点の価格差（概算幅） */
  width: number;
}

export interface LevelCluster {
  level: number;
  members: number[];
}

export interface LevelSet {
  support: number[];
  resistance: number[];
}

export type TrendDirection = 'uptrend' | 'downtrend' | 'sideways';
