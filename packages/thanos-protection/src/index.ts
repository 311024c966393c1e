/**
 * @thanos-snap/protection - gitignore 風の保護パターン判定
 *
 * - パス相対化（基準ディレクトリ外は fail closed）
 * - パターンのコンパイル（Directory / DoubleStar / Wildcard / Exact）
 * - 保護判定（空パターン集合 = 保護オフ）
 */

export type { RelativePath } from './relativize.js';
export { relativize, isInside, OUTSIDE } from './relativize.js';

export type { PatternKind, CompiledPattern, GlobMatcher } from './patterns.js';
export { compilePattern, compilePatterns, compileGlob } from './patterns.js';

export type {
  MatchOptions,
  ProtectionReason,
  ProtectionVerdict,
  ProtectionMatcher,
} from './matcher.js';
export { createProtectionMatcher, isProtected, matchesSegments } from './matcher.js';
