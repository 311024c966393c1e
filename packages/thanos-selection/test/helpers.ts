/**
 * テスト用の候補・乱数スタブ
 */
import * as E from 'fp-ts/Either';
import {
  extensionOf,
  metadataUnavailableError,
  MS_PER_DAY,
  BYTES_PER_MB,
  type Candidate,
  type RandomSource,
} from '../src/index.js';

export const NOW = Date.UTC(2025, 0, 15, 12, 0, 0);

export interface FakeFile {
  path: string;
  ageDays?: number;
  sizeMb?: number;
}

/** メモリ上の候補（stat は常に成功） */
export function fakeCandidate({ path, ageDays = 0, sizeMb = 0 }: FakeFile): Candidate {
  return {
    path,
    extension: extensionOf(path),
    stat: () => E.right({ size: Math.round(sizeMb * BYTES_PER_MB), mtimeMs: NOW - ageDays * MS_PER_DAY }),
  };
}

/** stat が常に失敗する候補（削除済み・権限なし相当） */
export function brokenCandidate(path: string): Candidate {
  return {
    path,
    extension: extensionOf(path),
    stat: () => E.left(metadataUnavailableError(path, new Error('EACCES: permission denied'))),
  };
}

/** 指定した値を順に返す乱数ソース */
export function sequenceRandom(values: readonly number[]): RandomSource {
  let i = 0;
  return {
    seed: 0,
    next: () => {
      const v = values[i % values.length] ?? 0;
      i++;
      return v;
    },
  };
}
