import * as path from 'node:path';

/**
 * 基準ディレクトリからの相対パス
 *
 * - Inside: 基準ディレクトリ配下。segments は '/' 区切りで分解済み
 * - Outside: 基準ディレクトリ外（基準ディレクトリ自身も含む）
 */
export type RelativePath =
  | { readonly type: 'Inside'; readonly segments: readonly string[] }
  | { readonly type: 'Outside' };

export const OUTSIDE: RelativePath = { type: 'Outside' };

/**
 * path を base からの相対パスに変換
 *
 * 両方を path.resolve で同じ方法で正規化する（シンボリックリンクは解決しない）。
 * base 配下にない場合は OUTSIDE を返し、呼び出し側で fail closed させる。
 */
export function relativize(targetPath: string, basePath: string): RelativePath {
  const resolvedBase = path.resolve(basePath);
  const resolvedTarget = path.resolve(targetPath);

  const relative = path.relative(resolvedBase, resolvedTarget);
  if (relative === '' || path.isAbsolute(relative)) {
    return OUTSIDE;
  }

  const segments = relative.split(path.sep).filter((s) => s.length > 0);
  if (segments.length === 0 || segments[0] === '..') {
    return OUTSIDE;
  }

  return { type: 'Inside', segments };
}

export const isInside = (
  rel: RelativePath
): rel is { readonly type: 'Inside'; readonly segments: readonly string[] } => rel.type === 'Inside';
