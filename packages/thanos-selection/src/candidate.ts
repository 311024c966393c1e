/**
 * ファイルシステム上の削除候補
 *
 * stat は最初の呼び出し時に一度だけ実行し、結果（失敗を含む）をキャッシュする。
 * 同期 I/O: 呼び出し側は候補ごとに逐次評価する前提。
 */
import * as fs from 'node:fs';
import * as path from 'node:path';
import * as E from 'fp-ts/Either';
import { metadataUnavailableError, notAFileError, type CandidateError } from './errors.js';
import type { Candidate, FileStat } from './types.js';

/**
 * ファイル名から拡張子を取得
 * ".env" のような先頭ドットのみの名前や "file." は拡張子なし
 */
export function extensionOf(filePath: string): string {
  const ext = path.extname(filePath);
  return ext === '.' ? '' : ext;
}

function readStat(filePath: string): E.Either<CandidateError, FileStat> {
  try {
    const st = fs.statSync(filePath);
    if (!st.isFile()) {
      return E.left(notAFileError(filePath));
    }
    return E.right({ size: st.size, mtimeMs: st.mtimeMs });
  } catch (error) {
    return E.left(metadataUnavailableError(filePath, error));
  }
}

export function createFileCandidate(filePath: string): Candidate {
  let cached: E.Either<CandidateError, FileStat> | undefined;
  return {
    path: filePath,
    extension: extensionOf(filePath),
    stat: () => {
      if (cached === undefined) {
        cached = readStat(filePath);
      }
      return cached;
    },
  };
}
