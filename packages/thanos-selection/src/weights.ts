/**
 * 重み計算
 *
 * 拡張子・経過日数・サイズの3つのサブテーブルから、それぞれ最大1つの値を取り出し、
 * 一致した値の算術平均を最終的な重みとする（一致なしは 0.5）。
 * メタデータ読み取りに失敗したサブテーブルはその候補についてのみスキップする。
 */
import * as E from 'fp-ts/Either';
import { parseRangeSelector, rangeContains, type RangeSelector } from './range.js';
import type { CandidateError } from './errors.js';
import {
  BYTES_PER_MB,
  DEFAULT_WEIGHT,
  MS_PER_DAY,
  type Candidate,
  type FileStat,
  type WeightConfig,
  type WeightTable,
  type WeightTableName,
} from './types.js';

export interface WeightOptions {
  /** 経過日数の基準時刻（epoch ms、デフォルト: Date.now()） */
  readonly now?: number;
}

export interface WeightContribution {
  readonly table: WeightTableName;
  readonly selector: string;
  readonly weight: number;
}

export interface SkippedTable {
  readonly table: WeightTableName;
  readonly error: CandidateError;
}

export interface WeightBreakdown {
  readonly weight: number;
  readonly contributions: readonly WeightContribution[];
  readonly skipped: readonly SkippedTable[];
}

export type WeightCalculator = (candidate: Candidate) => WeightBreakdown;

interface CompiledRangeEntry {
  readonly selector: string;
  readonly range: RangeSelector | undefined;
  readonly weight: number;
}

const NEUTRAL: WeightBreakdown = { weight: DEFAULT_WEIGHT, contributions: [], skipped: [] };

function hasEntries(table: WeightTable | undefined): table is WeightTable {
  return table !== undefined && Object.keys(table).length > 0;
}

export function isEmptyWeightConfig(config: WeightConfig | undefined): boolean {
  return (
    config === undefined ||
    (!hasEntries(config.by_extension) &&
      !hasEntries(config.by_age_days) &&
      !hasEntries(config.by_size_mb))
  );
}

function compileRangeTable(table: WeightTable | undefined): CompiledRangeEntry[] | undefined {
  if (!hasEntries(table)) return undefined;
  return Object.entries(table).map(([selector, weight]) => ({
    selector,
    range: parseRangeSelector(selector),
    weight,
  }));
}

function firstRangeMatch(
  entries: readonly CompiledRangeEntry[],
  value: number
): CompiledRangeEntry | undefined {
  return entries.find((e) => e.range !== undefined && rangeContains(e.range, value));
}

/**
 * 重み計算関数を構築（範囲セレクタは一度だけパース）
 */
export function createWeightCalculator(
  config: WeightConfig | undefined,
  options: WeightOptions = {}
): WeightCalculator {
  if (config === undefined || isEmptyWeightConfig(config)) {
    return () => NEUTRAL;
  }

  const byExtension = hasEntries(config.by_extension) ? config.by_extension : undefined;
  const byAge = compileRangeTable(config.by_age_days);
  const bySize = compileRangeTable(config.by_size_mb);
  const now = options.now ?? Date.now();

  return (candidate) => {
    const contributions: WeightContribution[] = [];
    const skipped: SkippedTable[] = [];

    if (byExtension !== undefined && Object.hasOwn(byExtension, candidate.extension)) {
      const weight = byExtension[candidate.extension];
      if (weight !== undefined) {
        contributions.push({ table: 'by_extension', selector: candidate.extension, weight });
      }
    }

    const rangeTables: ReadonlyArray<
      readonly [WeightTableName, CompiledRangeEntry[] | undefined, (stat: FileStat) => number]
    > = [
      ['by_age_days', byAge, (stat) => (now - stat.mtimeMs) / MS_PER_DAY],
      ['by_size_mb', bySize, (stat) => stat.size / BYTES_PER_MB],
    ];

    for (const [table, entries, measure] of rangeTables) {
      if (entries === undefined) continue;
      const stat = candidate.stat();
      if (E.isLeft(stat)) {
        skipped.push({ table, error: stat.left });
        continue;
      }
      const hit = firstRangeMatch(entries, measure(stat.right));
      if (hit !== undefined) {
        contributions.push({ table, selector: hit.selector, weight: hit.weight });
      }
    }

    const weight =
      contributions.length === 0
        ? DEFAULT_WEIGHT
        : contributions.reduce((sum, c) => sum + c.weight, 0) / contributions.length;

    return { weight, contributions, skipped };
  };
}

/**
 * 重みの内訳（どのセレクタが寄与したか）を計算
 */
export function describeWeight(
  candidate: Candidate,
  config: WeightConfig | undefined,
  options?: WeightOptions
): WeightBreakdown {
  return createWeightCalculator(config, options)(candidate);
}

/**
 * 候補ファイルの重み [0, 1] を計算
 */
export function calculateWeight(
  candidate: Candidate,
  config: WeightConfig | undefined,
  options?: WeightOptions
): number {
  return describeWeight(candidate, config, options).weight;
}
