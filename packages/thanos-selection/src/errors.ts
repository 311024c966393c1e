/**
 * @thanos-snap/selection エラー型定義
 * パターン: apps/thanos/src/domain/errors.ts
 */

/**
 * 候補ファイルのメタデータ読み取りエラーコード
 */
export type CandidateErrorCode =
  | 'METADATA_UNAVAILABLE' // stat失敗（削除済み・権限なし等）
  | 'NOT_A_FILE'; // 通常ファイルではない

/**
 * 候補ファイルエラー型
 * 重み計算では該当サブテーブルをスキップするだけで、計算全体は中断しない
 */
export interface CandidateError {
  readonly _tag: 'CandidateError';
  readonly code: CandidateErrorCode;
  readonly path: string;
  readonly message: string;
  readonly cause?: unknown;
}

export const candidateError = (
  code: CandidateErrorCode,
  path: string,
  message: string,
  cause?: unknown
): CandidateError => ({
  _tag: 'CandidateError',
  code,
  path,
  message,
  cause,
});

export const metadataUnavailableError = (path: string, cause?: unknown): CandidateError =>
  candidateError(
    'METADATA_UNAVAILABLE',
    path,
    `Failed to read metadata: ${path}${cause instanceof Error ? ` (${cause.message})` : ''}`,
    cause
  );

export const notAFileError = (path: string): CandidateError =>
  candidateError('NOT_A_FILE', path, `Not a regular file: ${path}`);

export const isCandidateError = (e: unknown): e is CandidateError =>
  typeof e === 'object' &&
  e !== null &&
  '_tag' in e &&
  e._tag === 'CandidateError';

// ========== API境界のプログラミングエラー ==========

/**
 * sample() への構造的に不正な入力
 * 回復不能なので Either ではなく例外で即座に失敗させる
 */
export function invalidSampleInput(detail: string): Error {
  return new Error(`SAMPLE_INPUT_INVALID: ${detail}`);
}

export function invalidSeed(seed: unknown): Error {
  return new Error(`SEED_INVALID: seed must be a safe integer, got ${String(seed)}`);
}
