/**
 * シード指定可能な擬似乱数ストリーム（mulberry32）
 *
 * 暗号学的安全性は不要。同じシード・同じ消費順序なら結果はビット単位で再現する。
 * シード未指定時は crypto.randomInt でシードを決め、seed プロパティで参照できる。
 */
import { randomInt } from 'node:crypto';
import { invalidSeed } from './errors.js';
import type { RandomSource } from './types.js';

const UINT32_RANGE = 4294967296;

export function mulberry32(seed: number): () => number {
  let state = seed | 0;
  return () => {
    state = (state + 0x6d2b79f5) | 0;
    let t = state;
    t = Math.imul(t ^ (t >>> 15), t | 1);
    t ^= t + Math.imul(t ^ (t >>> 7), t | 61);
    return ((t ^ (t >>> 14)) >>> 0) / UINT32_RANGE;
  };
}

/**
 * 乱数ストリームを生成
 * 負のシードや 32bit を超えるシードも受け付ける（下位 32bit を使用）
 */
export function createRandomSource(seed?: number): RandomSource {
  if (seed !== undefined && !Number.isSafeInteger(seed)) {
    throw invalidSeed(seed);
  }
  const effectiveSeed = seed ?? randomInt(0, 2 ** 32 - 1);
  const next = mulberry32(effectiveSeed);
  return { seed: effectiveSeed, next };
}

/**
 * [0, n) の一様な整数
 */
export function randomIndex(random: RandomSource, n: number): number {
  return Math.min(Math.floor(random.next() * n), n - 1);
}
