/**
 * @thanos-snap/selection - 重み計算と重み付き非復元抽出
 *
 * - 重み計算: 拡張子 / 経過日数 / サイズのサブテーブルの平均（デフォルト 0.5）
 * - 抽出: 累積分布による非復元抽出（重み合計 0 なら一様）
 * - 乱数: シード指定可能な mulberry32 ストリーム
 */

// ========== 型定義 ==========
export type {
  WeightTable,
  WeightTableName,
  WeightConfig,
  FileStat,
  Candidate,
  RandomSource,
} from './types.js';

export { DEFAULT_WEIGHT, MS_PER_DAY, BYTES_PER_MB } from './types.js';

// ========== エラー型 ==========
export type { CandidateErrorCode, CandidateError } from './errors.js';
export {
  candidateError,
  metadataUnavailableError,
  notAFileError,
  isCandidateError,
} from './errors.js';

// ========== 候補 ==========
export { createFileCandidate, extensionOf } from './candidate.js';

// ========== 範囲セレクタ ==========
export type { RangeSelector } from './range.js';
export { parseRangeSelector, rangeContains, matchesRange } from './range.js';

// ========== 重み ==========
export type {
  WeightOptions,
  WeightContribution,
  SkippedTable,
  WeightBreakdown,
  WeightCalculator,
} from './weights.js';
export {
  createWeightCalculator,
  describeWeight,
  calculateWeight,
  isEmptyWeightConfig,
} from './weights.js';

// ========== 乱数 ==========
export { mulberry32, createRandomSource, randomIndex } from './random.js';

// ========== 抽出 ==========
export { weightedSample } from './sampler.js';
