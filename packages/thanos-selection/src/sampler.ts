/**
 * 重み付き非復元抽出
 *
 * 毎回、残りの候補の重み合計を取り、[0, 合計) の一様乱数に対して累積重みが
 * 初めて乱数以上になる候補を選ぶ（線形走査）。選んだ候補はプールから除く。
 * 合計が 0 の場合は残りから一様に選ぶ。
 */
import { invalidSampleInput } from './errors.js';
import { randomIndex } from './random.js';
import type { RandomSource } from './types.js';

function validateSampleInput(itemCount: number, weights: readonly number[], k: number): void {
  if (weights.length !== itemCount) {
    throw invalidSampleInput(
      `items and weights must have the same length (${itemCount} !== ${weights.length})`
    );
  }
  if (!Number.isInteger(k) || k < 0) {
    throw invalidSampleInput(`k must be a non-negative integer, got ${k}`);
  }
  const bad = weights.findIndex((w) => !Number.isFinite(w) || w < 0);
  if (bad !== -1) {
    throw invalidSampleInput(`weights[${bad}] must be a finite non-negative number, got ${weights[bad]}`);
  }
}

/**
 * 累積分布から1件選ぶ
 *
 * 重み 0 の候補は選ばない（合計 > 0 なので必ず正の重みの候補が存在する）。
 * 浮動小数点の丸めで乱数がすべての累積値を超えた場合は最後の正の重みの候補。
 */
function pickIndex(weights: readonly number[], total: number, random: RandomSource): number {
  const draw = random.next() * total;
  let cumulative = 0;
  let lastPositive = -1;
  for (let i = 0; i < weights.length; i++) {
    const w = weights[i] ?? 0;
    if (w <= 0) continue;
    cumulative += w;
    lastPositive = i;
    if (cumulative >= draw) return i;
  }
  return lastPositive;
}

/**
 * items から k 件を重み付きで非復元抽出
 *
 * 戻り値は選ばれた順序。k が items の件数を超える場合は全件を返す。
 *
 * @throws 長さ不一致・負の重み・不正な k（プログラミングエラー）
 */
export function weightedSample<T>(
  items: readonly T[],
  weights: readonly number[],
  k: number,
  random: RandomSource
): T[] {
  validateSampleInput(items.length, weights, k);

  const pool = [...items];
  const poolWeights = [...weights];
  const selected: T[] = [];

  while (selected.length < k && pool.length > 0) {
    const total = poolWeights.reduce((sum, w) => sum + w, 0);
    const idx = total === 0 ? randomIndex(random, pool.length) : pickIndex(poolWeights, total, random);

    selected.push(...pool.splice(idx, 1));
    poolWeights.splice(idx, 1);
  }

  return selected;
}
