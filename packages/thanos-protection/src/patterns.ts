/**
 * 保護パターンのコンパイル
 *
 * gitignore 風パターン文字列を一度だけ分類し、タグ付きバリアントに変換する。
 * 候補ファイルごとに文字列を再分類しないため、matcher 構築時に呼び出す。
 * glob 部分は picomatch でコンパイルする。
 *
 * 分類ルール（評価順）:
 * - `**` を含む          → DoubleStar（相対パス全体に対する glob）
 * - 末尾が `/`           → Directory（ディレクトリとその配下すべて）
 * - `*` を含む           → Wildcard（ファイル名に対する単一セグメント glob）
 * - それ以外             → Exact（任意の深さのセグメント、または相対パス全体に一致）
 *
 * 先頭の `./` と `/` は取り除く。`/` で始まるパターンは基準ディレクトリ直下から
 * のみ一致する（rooted）。
 */
import picomatch from 'picomatch';

export type PatternKind = 'Directory' | 'DoubleStar' | 'Wildcard' | 'Exact';

/** コンパイル済み glob（文字列を受け取り一致するか返す） */
export type GlobMatcher = (value: string) => boolean;

export type CompiledPattern =
  | {
      readonly kind: 'Directory';
      readonly raw: string;
      /** ディレクトリ名をセグメント単位の glob に分解したもの */
      readonly segments: readonly GlobMatcher[];
      readonly rooted: boolean;
    }
  | {
      readonly kind: 'DoubleStar';
      readonly raw: string;
      readonly matcher: GlobMatcher;
      /** 末尾 `/` 付き: 祖先ディレクトリにのみ一致させる */
      readonly directoryOnly: boolean;
    }
  | {
      readonly kind: 'Wildcard';
      readonly raw: string;
      readonly segments: readonly GlobMatcher[];
      /** `/` を含む、または rooted の場合は相対パス全体とセグメント単位で比較する */
      readonly anchored: boolean;
    }
  | {
      readonly kind: 'Exact';
      readonly raw: string;
      readonly segments: readonly string[];
      readonly rooted: boolean;
    };

/**
 * glob をコンパイル
 * `*` は `/` を跨がない。ドットファイルにも一致し、先頭 `!` は否定ではなく文字として扱う。
 */
export function compileGlob(glob: string): GlobMatcher {
  return picomatch(glob, { dot: true, nonegate: true });
}

function stripTrailingSlashes(pattern: string): string {
  let end = pattern.length;
  while (end > 0 && pattern[end - 1] === '/') end--;
  return pattern.slice(0, end);
}

interface NormalizedPattern {
  /** 先頭 `./` `/` を除いた本体（末尾 `/` は保持） */
  readonly body: string;
  readonly rooted: boolean;
}

function normalizePattern(raw: string): NormalizedPattern {
  if (raw.startsWith('./')) return { body: raw.slice(2), rooted: false };
  if (raw.startsWith('/')) return { body: raw.slice(1), rooted: true };
  return { body: raw, rooted: false };
}

/**
 * 重複判定用のキー（表記ゆれ `./dist/` と `dist/` は同じキー）
 */
function patternKey(pattern: NormalizedPattern): string {
  return pattern.rooted ? `/${pattern.body}` : pattern.body;
}

/**
 * 1 パターンを分類・コンパイル
 * 空文字列（`./` や `/` だけのものを含む）は undefined
 */
export function compilePattern(input: string): CompiledPattern | undefined {
  const raw = input.trim();
  const { body, rooted } = normalizePattern(raw);
  const name = stripTrailingSlashes(body);
  if (name.length === 0) return undefined;

  const directoryOnly = body.endsWith('/');

  if (body.includes('**')) {
    // 相対パス全体と比較するため、rooted かどうかで意味は変わらない
    return { kind: 'DoubleStar', raw, matcher: compileGlob(name), directoryOnly };
  }

  if (directoryOnly) {
    return { kind: 'Directory', raw, segments: name.split('/').map(compileGlob), rooted };
  }

  if (body.includes('*')) {
    return {
      kind: 'Wildcard',
      raw,
      segments: body.split('/').map(compileGlob),
      anchored: rooted || body.includes('/'),
    };
  }

  return { kind: 'Exact', raw, segments: body.split('/'), rooted };
}

/**
 * パターン集合をコンパイル（重複・空パターンは除外）
 *
 * 重複は先頭 `./` を除いた本体で判定し、最初に現れた表記を残す。
 * 入力の順序は保持するが、判定結果（boolean）は順序に依存しない。
 */
export function compilePatterns(patterns: Iterable<string>): CompiledPattern[] {
  const seen = new Set<string>();
  const compiled: CompiledPattern[] = [];
  for (const p of patterns) {
    const c = compilePattern(p);
    if (c === undefined) continue;
    const key = patternKey(normalizePattern(c.raw));
    if (seen.has(key)) continue;
    seen.add(key);
    compiled.push(c);
  }
  return compiled;
}
