/**
 * 設定ファイルの探索と読み込み
 *
 * 対象ディレクトリから親ディレクトリへ向かって探索する（最大 5 階層、ファイルシステムのルートで停止）。
 * - .thanosignore: 保護パターン（見つからない・空ならデフォルトパターン）
 * - .thanosrc.json / .thanosrc.yaml / .thanosrc.yml: 重み設定
 */
import * as fs from 'node:fs/promises';
import * as path from 'node:path';
import * as E from 'fp-ts/Either';
import {
  IGNORE_FILE_NAME,
  RC_FILE_NAMES,
  defaultProtectedPatterns,
  parseIgnoreFile,
  parseRcDocument,
  type RcFormat,
} from '@thanos-snap/config-schemas';
import type { WeightConfig } from '@thanos-snap/selection';
import { configInvalidError, configReadError, type DomainError } from '../domain/errors.js';
import { fileExists } from '../snap/fileSystem.js';

/** 探索する階層数（対象ディレクトリ自身を含む） */
export const MAX_SEARCH_LEVELS = 5;

/**
 * 設定ファイルを探索
 *
 * 各階層で filenames を順に確認し、最初に見つかったファイルを返す。
 *
 * @param directory 探索開始ディレクトリ
 * @param filenames ファイル名（複数指定時は同一階層内での優先順）
 * @returns 見つかったファイルの絶対パス、なければundefined
 */
export async function findConfigFile(
  directory: string,
  filenames: string | readonly string[]
): Promise<string | undefined> {
  const names = typeof filenames === 'string' ? [filenames] : filenames;
  let current = path.resolve(directory);

  for (let level = 0; level < MAX_SEARCH_LEVELS; level++) {
    for (const name of names) {
      const candidate = path.join(current, name);
      if (await fileExists(candidate)) {
        return candidate;
      }
    }
    const parent = path.dirname(current);
    if (parent === current) break;
    current = parent;
  }

  return undefined;
}

async function readConfigText(filePath: string): Promise<E.Either<DomainError, string>> {
  try {
    return E.right(await fs.readFile(filePath, 'utf-8'));
  } catch (error) {
    return E.left(configReadError(filePath, error));
  }
}

/**
 * 保護パターンの読み込み結果
 */
export interface ProtectionSource {
  patterns: Set<string>;
  source?: string; // 読み込んだ .thanosignore のパス
  usingDefaults: boolean; // デフォルトパターンを使用しているか
}

/**
 * 保護パターンを読み込み
 *
 * @param directory 対象ディレクトリ
 * @returns 成功時はRight(ProtectionSource)、読み取り失敗時はLeft(エラー)
 */
export async function loadProtectionPatterns(
  directory: string
): Promise<E.Either<DomainError, ProtectionSource>> {
  const ignorePath = await findConfigFile(directory, IGNORE_FILE_NAME);
  if (ignorePath === undefined) {
    return E.right({ patterns: defaultProtectedPatterns(), usingDefaults: true });
  }

  const content = await readConfigText(ignorePath);
  if (E.isLeft(content)) {
    return content;
  }

  const patterns = parseIgnoreFile(content.right);
  if (patterns.length === 0) {
    return E.right({ patterns: defaultProtectedPatterns(), source: ignorePath, usingDefaults: true });
  }
  return E.right({ patterns: new Set(patterns), source: ignorePath, usingDefaults: false });
}

/**
 * 重み設定の読み込み結果
 */
export interface WeightSource {
  weights: WeightConfig;
  source?: string; // 読み込んだ .thanosrc.* のパス
}

const rcFormatOf = (filePath: string): RcFormat =>
  path.extname(filePath) === '.json' ? 'json' : 'yaml';

/**
 * 重み設定を読み込み
 *
 * 設定ファイルがない場合・weights キーがない場合は空の設定（全ファイル 0.5）。
 *
 * @param directory 対象ディレクトリ
 * @returns 成功時はRight(WeightSource)、読み取り・検証失敗時はLeft(エラー)
 */
export async function loadWeightConfig(
  directory: string
): Promise<E.Either<DomainError, WeightSource>> {
  const rcPath = await findConfigFile(directory, RC_FILE_NAMES);
  if (rcPath === undefined) {
    return E.right({ weights: {} });
  }

  const content = await readConfigText(rcPath);
  if (E.isLeft(content)) {
    return content;
  }

  const parsed = parseRcDocument(content.right, rcFormatOf(rcPath));
  if (!parsed.ok) {
    return E.left(configInvalidError(rcPath, parsed.errors));
  }

  return E.right({ weights: parsed.value.weights ?? {}, source: rcPath });
}
