import { describe, it, expect } from 'vitest';
import { createRandomSource, weightedSample } from '../src/index.js';
import { sequenceRandom } from './helpers.js';

const ITEMS = Array.from({ length: 10 }, (_, i) => `file_${i}.txt`);

describe('weightedSample', () => {
  describe('件数', () => {
    it('k件の重複なしの要素を返す', () => {
      const selected = weightedSample(ITEMS, ITEMS.map(() => 0.5), 5, createRandomSource(1));
      expect(selected).toHaveLength(5);
      expect(new Set(selected).size).toBe(5);
      for (const s of selected) expect(ITEMS).toContain(s);
    });

    it('k=0は空配列', () => {
      expect(weightedSample(ITEMS, ITEMS.map(() => 1), 0, createRandomSource(1))).toEqual([]);
    });

    it('kが件数を超える場合は全件を返す', () => {
      const selected = weightedSample(ITEMS, ITEMS.map(() => 1), 25, createRandomSource(3));
      expect(selected).toHaveLength(10);
      expect([...selected].sort()).toEqual([...ITEMS].sort());
    });

    it('空の入力は空配列', () => {
      expect(weightedSample([], [], 3, createRandomSource(1))).toEqual([]);
    });
  });

  describe('累積分布による選択', () => {
    it('累積重みが乱数以上になる最初の候補を選ぶ', () => {
      // 1回目: 0.3 * 4 = 1.2 → b（累積 2）, 2回目: 0.9 * 3 = 2.7 → c（累積 3）
      const selected = weightedSample(['a', 'b', 'c'], [1, 1, 2], 2, sequenceRandom([0.3, 0.9]));
      expect(selected).toEqual(['b', 'c']);
    });

    it('戻り値は選択順（入力順ではない）', () => {
      // 0.9 * 3 = 2.7 → c, 0.0 * 2 = 0 → a
      const selected = weightedSample(['a', 'b', 'c'], [1, 1, 1], 2, sequenceRandom([0.9, 0.0]));
      expect(selected).toEqual(['c', 'a']);
    });

    it('乱数0でも重み0の候補は選ばない', () => {
      const selected = weightedSample(['z', 'a'], [0, 1], 1, sequenceRandom([0]));
      expect(selected).toEqual(['a']);
    });

    it('正の重みが残っている間は重み0の候補を選ばない', () => {
      for (let seed = 0; seed < 50; seed++) {
        const selected = weightedSample(['z', 'a', 'b'], [0, 1, 1], 2, createRandomSource(seed));
        expect([...selected].sort()).toEqual(['a', 'b']);
      }
    });

    it('正の重みを使い切った後は重み0の候補も選ばれる', () => {
      const selected = weightedSample(['z', 'a'], [0, 1], 2, createRandomSource(7));
      expect(selected).toEqual(['a', 'z']);
    });
  });

  describe('重みがすべて0', () => {
    it('一様に選択する', () => {
      // floor(0.5 * 3) = 1 → b, floor(0.99 * 2) = 1 → c
      const selected = weightedSample(['a', 'b', 'c'], [0, 0, 0], 2, sequenceRandom([0.5, 0.99]));
      expect(selected).toEqual(['b', 'c']);
    });

    it('min(k, 件数)件を返す', () => {
      for (const k of [0, 1, 5, 10, 12]) {
        const selected = weightedSample(ITEMS, ITEMS.map(() => 0), k, createRandomSource(k));
        expect(selected).toHaveLength(Math.min(k, ITEMS.length));
        expect(new Set(selected).size).toBe(selected.length);
      }
    });
  });

  describe('再現性', () => {
    it('同じシードなら同じ結果', () => {
      const weights = ITEMS.map((_, i) => (i + 1) / 10);
      const first = weightedSample(ITEMS, weights, 5, createRandomSource(42));
      const second = weightedSample(ITEMS, weights, 5, createRandomSource(42));
      expect(second).toEqual(first);
    });
  });

  describe('偏り', () => {
    it('高い重みの候補は低い重みの候補より頻繁に選ばれる', () => {
      const weights = ITEMS.map((_, i) => (i < 2 ? 0.99 : 0.01));
      const counts = new Map<string, number>(ITEMS.map((item) => [item, 0]));

      for (let seed = 0; seed < 500; seed++) {
        for (const item of weightedSample(ITEMS, weights, 5, createRandomSource(seed))) {
          counts.set(item, (counts.get(item) ?? 0) + 1);
        }
      }

      const high = ITEMS.slice(0, 2).map((item) => counts.get(item) ?? 0);
      const low = ITEMS.slice(2).map((item) => counts.get(item) ?? 0);
      expect(Math.min(...high)).toBeGreaterThan(Math.max(...low));
      expect(Math.min(...high)).toBeGreaterThan(450);
    });
  });

  describe('不正な入力', () => {
    it('長さ不一致は例外', () => {
      expect(() => weightedSample(['a', 'b'], [1], 1, createRandomSource(1))).toThrow(
        /SAMPLE_INPUT_INVALID/
      );
    });

    it('負または非整数のkは例外', () => {
      expect(() => weightedSample(['a'], [1], -1, createRandomSource(1))).toThrow(/SAMPLE_INPUT_INVALID/);
      expect(() => weightedSample(['a'], [1], 1.5, createRandomSource(1))).toThrow(/SAMPLE_INPUT_INVALID/);
    });

    it('負・非有限の重みは例外', () => {
      expect(() => weightedSample(['a', 'b'], [1, -0.1], 1, createRandomSource(1))).toThrow(
        /weights\[1\]/
      );
      expect(() => weightedSample(['a'], [Number.NaN], 1, createRandomSource(1))).toThrow(
        /SAMPLE_INPUT_INVALID/
      );
    });
  });
});
