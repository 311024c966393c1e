import type * as E from 'fp-ts/Either';
import type { CandidateError } from './errors.js';

/** 重みのデフォルト値（中立） */
export const DEFAULT_WEIGHT = 0.5;

export const MS_PER_DAY = 86_400_000;
export const BYTES_PER_MB = 1_048_576;

/**
 * 重み設定のサブテーブル（セレクタ文字列 → [0,1] の重み）
 * 反復順序 = 挿入順序（最初に一致したセレクタを採用）
 */
export type WeightTable = Readonly<Record<string, number>>;

export type WeightTableName = 'by_extension' | 'by_age_days' | 'by_size_mb';

/**
 * 重み設定
 * - by_extension: 拡張子の完全一致（例: ".log"）
 * - by_age_days: 経過日数の範囲（例: "0-7", "30+"）
 * - by_size_mb: サイズ(MB)の範囲（例: "0-1", "10+"）
 */
export interface WeightConfig {
  readonly by_extension?: WeightTable;
  readonly by_age_days?: WeightTable;
  readonly by_size_mb?: WeightTable;
}

/**
 * 候補ファイルのメタデータ
 */
export interface FileStat {
  readonly size: number;
  /** 最終更新時刻（epoch ms） */
  readonly mtimeMs: number;
}

/**
 * 削除候補
 * メタデータは stat() 呼び出し時に遅延読み取りされ、失敗は値として返る
 */
export interface Candidate {
  readonly path: string;
  /** 拡張子（先頭の "." を含む。なければ空文字列） */
  readonly extension: string;
  stat(): E.Either<CandidateError, FileStat>;
}

/**
 * [0, 1) の一様乱数ストリーム
 */
export interface RandomSource {
  readonly seed: number;
  next(): number;
}
