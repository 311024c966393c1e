import { relativize } from './relativize.js';
import { compilePatterns, type CompiledPattern, type GlobMatcher } from './patterns.js';

export interface MatchOptions {
  /** 対象パス自体がディレクトリかどうか（デフォルト: false） */
  readonly isDirectory?: boolean;
}

/**
 * 保護判定の理由
 * - NO_PATTERNS: パターン未設定（空 = 保護オフ）
 * - OUTSIDE_BASE: 基準ディレクトリ外（fail closed）
 * - PATTERN: いずれかのパターンに一致
 * - NO_MATCH: どのパターンにも一致しない
 */
export type ProtectionReason = 'NO_PATTERNS' | 'OUTSIDE_BASE' | 'PATTERN' | 'NO_MATCH';

export interface ProtectionVerdict {
  readonly protected: boolean;
  readonly reason: ProtectionReason;
  /** reason === 'PATTERN' の場合、一致したパターン（入力のまま） */
  readonly pattern?: string;
}

export interface ProtectionMatcher {
  readonly patterns: readonly CompiledPattern[];
  explain(targetPath: string, basePath: string, options?: MatchOptions): ProtectionVerdict;
  isProtected(targetPath: string, basePath: string, options?: MatchOptions): boolean;
}

function runAt(segments: readonly string[], globs: readonly GlobMatcher[], start: number): boolean {
  return (
    start + globs.length <= segments.length &&
    globs.every((g, j) => g(segments[start + j] ?? ''))
  );
}

/**
 * segments の中に globs が連続して現れるか（任意の深さ）
 */
function containsRun(segments: readonly string[], globs: readonly GlobMatcher[]): boolean {
  for (let start = 0; start + globs.length <= segments.length; start++) {
    if (runAt(segments, globs, start)) return true;
  }
  return false;
}

function hasPrefix(segments: readonly string[], prefix: readonly string[]): boolean {
  return prefix.length <= segments.length && prefix.every((p, j) => segments[j] === p);
}

/**
 * コンパイル済みパターン 1 件と相対パスセグメントの一致判定
 *
 * ancestorCount はディレクトリとして扱うセグメント数
 * （ファイルなら最終セグメントを除く祖先、ディレクトリなら全セグメント）。
 */
export function matchesSegments(
  pattern: CompiledPattern,
  segments: readonly string[],
  ancestorCount: number
): boolean {
  switch (pattern.kind) {
    case 'Directory': {
      // ディレクトリ名が祖先のどこか（rooted なら先頭）に現れれば、それ以下はすべて保護
      const ancestors = segments.slice(0, ancestorCount);
      return pattern.rooted
        ? runAt(ancestors, pattern.segments, 0)
        : containsRun(ancestors, pattern.segments);
    }

    case 'Exact':
      if (pattern.segments.length === 1 && !pattern.rooted) {
        const name = pattern.segments[0];
        return segments.some((s) => s === name);
      }
      return hasPrefix(segments, pattern.segments);

    case 'Wildcard': {
      if (pattern.anchored) {
        return (
          segments.length === pattern.segments.length &&
          pattern.segments.every((g, j) => g(segments[j] ?? ''))
        );
      }
      const fileName = segments[segments.length - 1];
      const glob = pattern.segments[0];
      return fileName !== undefined && glob !== undefined && glob(fileName);
    }

    case 'DoubleStar': {
      // 祖先ディレクトリのパスに一致した場合もサブツリー全体を保護
      for (let n = 1; n <= ancestorCount; n++) {
        if (pattern.matcher(segments.slice(0, n).join('/'))) return true;
      }
      if (pattern.directoryOnly && ancestorCount < segments.length) return false;
      return pattern.matcher(segments.join('/'));
    }
  }
}

/**
 * 保護 matcher を構築（パターンは一度だけコンパイル）
 */
export function createProtectionMatcher(patterns: Iterable<string>): ProtectionMatcher {
  const compiled = compilePatterns(patterns);

  const explain = (
    targetPath: string,
    basePath: string,
    options: MatchOptions = {}
  ): ProtectionVerdict => {
    if (compiled.length === 0) {
      return { protected: false, reason: 'NO_PATTERNS' };
    }

    const rel = relativize(targetPath, basePath);
    if (rel.type === 'Outside') {
      return { protected: true, reason: 'OUTSIDE_BASE' };
    }

    const { segments } = rel;
    const ancestorCount = options.isDirectory ? segments.length : segments.length - 1;
    const hit = compiled.find((p) => matchesSegments(p, segments, ancestorCount));
    if (hit !== undefined) {
      return { protected: true, reason: 'PATTERN', pattern: hit.raw };
    }
    return { protected: false, reason: 'NO_MATCH' };
  };

  return {
    patterns: compiled,
    explain,
    isProtected: (targetPath, basePath, options) =>
      explain(targetPath, basePath, options).protected,
  };
}

/**
 * 単発の保護判定
 * 大量のパスを判定する場合は createProtectionMatcher を使うこと
 */
export function isProtected(
  targetPath: string,
  basePath: string,
  patterns: Iterable<string>,
  options?: MatchOptions
): boolean {
  return createProtectionMatcher(patterns).isProtected(targetPath, basePath, options);
}
