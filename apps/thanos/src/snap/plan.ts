/**
 * Snap計画
 *
 * 列挙 → 保護判定 → 重み計算 → 重み付き非復元抽出 までを行い、削除対象を決める。
 * ファイルシステムへの変更は行わない（削除は executeSnap）。
 */
import * as E from 'fp-ts/Either';
import { createProtectionMatcher, type ProtectionReason } from '@thanos-snap/protection';
import {
  createFileCandidate,
  createRandomSource,
  createWeightCalculator,
  isEmptyWeightConfig,
  weightedSample,
} from '@thanos-snap/selection';
import type { DomainError } from '../domain/errors.js';
import { loadProtectionPatterns, loadWeightConfig, type ProtectionSource } from '../config/loader.js';
import { listFiles, resolveDirectory } from './fileSystem.js';

/**
 * Snap入力オプション
 */
export interface SnapOptions {
  directory: string; // 対象ディレクトリ
  recursive?: boolean; // サブディレクトリも対象にするか
  seed?: number; // 乱数シード（未指定ならランダム）
  noProtect?: boolean; // すべての保護を無効化
  now?: number; // 経過日数の基準時刻（epoch ms、デフォルト: Date.now()）
}

/**
 * 保護されたファイル
 */
export interface ProtectedFile {
  path: string;
  reason: ProtectionReason;
  pattern?: string; // 一致したパターン
}

/**
 * 重み計算時にメタデータを読めなかったファイル
 */
export interface WeightWarning {
  path: string;
  message: string;
}

export type PlanStatus = 'READY' | 'NO_ELIGIBLE_FILES';

/**
 * Snap計画
 */
export interface SnapPlan {
  status: PlanStatus;
  directory: string; // 正規化済みの対象ディレクトリ
  seed: number; // 実際に使用したシード
  seeded: boolean; // シードが明示されたか
  files: string[]; // 列挙したすべてのファイル（昇順）
  protectedFiles: ProtectedFile[];
  eligible: string[];
  selected: string[]; // 削除対象（抽出順）
  protection?: ProtectionSource; // noProtect の場合は未設定
  weightSource?: string; // 重み設定ファイルのパス
  weighted: boolean; // 重み設定が有効か
  warnings: WeightWarning[];
}

/**
 * 削除件数: 適格ファイル数の半分（切り捨て）
 */
export const eliminationCount = (eligible: number): number => Math.floor(eligible / 2);

/**
 * Snap計画を作成
 *
 * @param options Snap設定
 * @returns 成功時はRight(SnapPlan)、失敗時はLeft(DomainError)
 */
export async function planSnap(options: SnapOptions): Promise<E.Either<DomainError, SnapPlan>> {
  // 1. 対象ディレクトリ検証
  const resolved = await resolveDirectory(options.directory);
  if (E.isLeft(resolved)) {
    return resolved;
  }
  const directory = resolved.right;

  // 2. 保護パターン（--no-protect なら空集合 = 保護オフ）
  let protection: ProtectionSource | undefined;
  if (!options.noProtect) {
    const loaded = await loadProtectionPatterns(directory);
    if (E.isLeft(loaded)) {
      return loaded;
    }
    protection = loaded.right;
  }

  // 3. 重み設定
  const weightSource = await loadWeightConfig(directory);
  if (E.isLeft(weightSource)) {
    return weightSource;
  }
  const { weights, source } = weightSource.right;

  // 4. 列挙
  const listed = await listFiles(directory, options.recursive ?? false);
  if (E.isLeft(listed)) {
    return listed;
  }
  const files = listed.right;

  // 5. 保護判定
  const matcher = createProtectionMatcher(protection?.patterns ?? []);
  const protectedFiles: ProtectedFile[] = [];
  const eligible: string[] = [];
  for (const file of files) {
    const verdict = matcher.explain(file, directory);
    if (verdict.protected) {
      protectedFiles.push({
        path: file,
        reason: verdict.reason,
        ...(verdict.pattern !== undefined && { pattern: verdict.pattern }),
      });
    } else {
      eligible.push(file);
    }
  }

  const random = createRandomSource(options.seed);
  const base = {
    directory,
    seed: random.seed,
    seeded: options.seed !== undefined,
    files,
    protectedFiles,
    eligible,
    ...(protection !== undefined && { protection }),
    ...(source !== undefined && { weightSource: source }),
    weighted: !isEmptyWeightConfig(weights),
  };

  if (eligible.length <= 1) {
    const empty: SnapPlan = { ...base, status: 'NO_ELIGIBLE_FILES', selected: [], warnings: [] };
    return E.right(empty);
  }

  // 6. 重み計算
  const calculate = createWeightCalculator(weights, {
    ...(options.now !== undefined && { now: options.now }),
  });
  const warnings: WeightWarning[] = [];
  const fileWeights = eligible.map((file) => {
    const breakdown = calculate(createFileCandidate(file));
    const firstSkip = breakdown.skipped[0];
    if (firstSkip !== undefined) {
      warnings.push({ path: file, message: firstSkip.error.message });
    }
    return breakdown.weight;
  });

  // 7. 抽出
  const selected = weightedSample(eligible, fileWeights, eliminationCount(eligible.length), random);

  const plan: SnapPlan = { ...base, status: 'READY', selected, warnings };
  return E.right(plan);
}
