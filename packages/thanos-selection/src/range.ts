/**
 * 範囲セレクタ（by_age_days / by_size_mb）
 *
 * 文法:
 *   "<min>-<max>"        min <= x < max
 *   "<min>+" / "<min>-"  x >= min
 * それ以外は不正で、常に不一致（エラーにはしない）。
 */

export type RangeSelector =
  | { readonly kind: 'Between'; readonly min: number; readonly max: number }
  | { readonly kind: 'AtLeast'; readonly min: number };

const NUMBER_PATTERN = /^(?:\d+(?:\.\d*)?|\.\d+)$/;

function parseBound(text: string): number | undefined {
  const trimmed = text.trim();
  return NUMBER_PATTERN.test(trimmed) ? Number(trimmed) : undefined;
}

export function parseRangeSelector(selector: string): RangeSelector | undefined {
  const s = selector.trim();

  if (s.endsWith('+') || s.endsWith('-')) {
    const min = parseBound(s.slice(0, -1));
    return min === undefined ? undefined : { kind: 'AtLeast', min };
  }

  const parts = s.split('-');
  if (parts.length !== 2) return undefined;
  const [lo, hi] = parts;
  const min = parseBound(lo ?? '');
  const max = parseBound(hi ?? '');
  if (min === undefined || max === undefined) return undefined;
  return { kind: 'Between', min, max };
}

export function rangeContains(range: RangeSelector, value: number): boolean {
  switch (range.kind) {
    case 'Between':
      return range.min <= value && value < range.max;
    case 'AtLeast':
      return value >= range.min;
  }
}

export function matchesRange(value: number, selector: string): boolean {
  const range = parseRangeSelector(selector);
  return range !== undefined && rangeContains(range, value);
}
