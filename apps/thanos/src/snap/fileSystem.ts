/**
 * ファイルシステム操作
 *
 * - 対象ディレクトリの検証
 * - ファイル列挙（直下のみ / 再帰）
 * - 設定ファイルの存在確認と書き込み
 */
import * as fs from 'node:fs/promises';
import * as path from 'node:path';
import * as E from 'fp-ts/Either';
import {
  configWriteError,
  directoryNotFoundError,
  directoryReadError,
  notADirectoryError,
  type DomainError,
} from '../domain/errors.js';

const isErrnoException = (error: unknown): error is NodeJS.ErrnoException =>
  error instanceof Error && 'code' in error;

/**
 * 対象ディレクトリを検証
 *
 * @param dirPath 検証するディレクトリパス
 * @returns 成功時はRight(絶対パス)、存在しない・ディレクトリでない場合はLeft(エラー)
 */
export async function resolveDirectory(dirPath: string): Promise<E.Either<DomainError, string>> {
  const resolved = path.resolve(dirPath);
  try {
    const stat = await fs.stat(resolved);
    return stat.isDirectory() ? E.right(resolved) : E.left(notADirectoryError(resolved));
  } catch (error) {
    if (isErrnoException(error) && error.code === 'ENOENT') {
      return E.left(directoryNotFoundError(resolved));
    }
    return E.left(directoryReadError(resolved, error));
  }
}

/**
 * ファイルが存在するかどうかを確認
 *
 * @param filePath 確認するファイルパス
 * @returns 通常ファイルとして存在する場合はtrue
 */
export async function fileExists(filePath: string): Promise<boolean> {
  try {
    const stat = await fs.stat(filePath);
    return stat.isFile();
  } catch {
    return false;
  }
}

async function collectFiles(
  dirPath: string,
  recursive: boolean,
  results: string[]
): Promise<E.Either<DomainError, void>> {
  let entries;
  try {
    entries = await fs.readdir(dirPath, { withFileTypes: true });
  } catch (error) {
    return E.left(directoryReadError(dirPath, error));
  }

  for (const entry of entries) {
    const fullPath = path.join(dirPath, entry.name);

    // シンボリックリンクは辿らない（ディレクトリの循環とリンク先の削除を避ける）
    if (entry.isDirectory() && recursive) {
      const sub = await collectFiles(fullPath, recursive, results);
      if (E.isLeft(sub)) return sub;
    } else if (entry.isFile()) {
      results.push(fullPath);
    }
  }
  return E.right(undefined);
}

/**
 * ディレクトリ内の通常ファイル一覧を取得
 *
 * 結果はパスの昇順。同じシードなら列挙順に依存せず同じ抽出結果になる。
 *
 * @param dirPath 検索するディレクトリパス
 * @param recursive サブディレクトリも検索するか
 * @returns 成功時はRight(絶対パスの配列)、失敗時はLeft(エラー)
 */
export async function listFiles(
  dirPath: string,
  recursive: boolean = false
): Promise<E.Either<DomainError, string[]>> {
  const resolved = await resolveDirectory(dirPath);
  if (E.isLeft(resolved)) {
    return resolved;
  }

  const results: string[] = [];
  const collected = await collectFiles(resolved.right, recursive, results);
  if (E.isLeft(collected)) {
    return collected;
  }

  return E.right(results.sort());
}

/**
 * テキストファイルを新規作成（既存ファイルは上書きしない）
 *
 * @returns 作成した場合はRight(true)、既に存在する場合はRight(false)、失敗時はLeft(エラー)
 */
export async function writeFileIfAbsent(
  filePath: string,
  content: string
): Promise<E.Either<DomainError, boolean>> {
  try {
    await fs.writeFile(filePath, content, { encoding: 'utf-8', flag: 'wx' });
    return E.right(true);
  } catch (error) {
    if (isErrnoException(error) && error.code === 'EEXIST') {
      return E.right(false);
    }
    return E.left(configWriteError(filePath, error));
  }
}
