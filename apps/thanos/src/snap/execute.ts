/**
 * Snap実行
 *
 * 計画で選ばれたファイルを順に削除する。1件の失敗で残りの削除は中断しない。
 * 監査ログが設定されている場合は 1 ファイル 1 レコード + 最後に集計レコードを追記する。
 */
import * as fs from 'node:fs/promises';
import * as E from 'fp-ts/Either';
import type { DomainError } from '../domain/errors.js';
import { appendAuditFile, type AuditFileRecord } from '../audit/log.js';
import type { SnapPlan } from './plan.js';

export type DeletionOutcome =
  | { readonly path: string; readonly ok: true }
  | { readonly path: string; readonly ok: false; readonly message: string };

/**
 * Snap結果
 */
export interface SnapResult {
  eliminated: string[];
  failed: Array<{ path: string; message: string }>;
  auditError?: DomainError; // 監査ログの追記に失敗した場合（以降の追記は行わない）
}

const errorMessage = (error: unknown): string =>
  error instanceof Error ? error.message : String(error);

/**
 * Snap実行
 *
 * @param plan planSnap の結果
 * @param onOutcome 1ファイル削除するごとに呼ばれる
 */
export async function executeSnap(
  plan: SnapPlan,
  onOutcome?: (outcome: DeletionOutcome) => void
): Promise<SnapResult> {
  const result: SnapResult = { eliminated: [], failed: [] };

  const audit = (record: Omit<AuditFileRecord, 'ts'>): void => {
    if (result.auditError !== undefined) return;
    const written = appendAuditFile(record);
    if (E.isLeft(written)) {
      result.auditError = written.left;
    }
  };

  for (const file of plan.selected) {
    let outcome: DeletionOutcome;
    try {
      await fs.unlink(file);
      outcome = { path: file, ok: true };
      result.eliminated.push(file);
    } catch (error) {
      const message = errorMessage(error);
      outcome = { path: file, ok: false, message };
      result.failed.push({ path: file, message });
    }

    audit({
      op: 'delete',
      ok: outcome.ok,
      subject: file,
      ...(!outcome.ok && { error: outcome.message }),
    });
    onOutcome?.(outcome);
  }

  audit({
    op: 'snap',
    ok: result.failed.length === 0,
    subject: plan.directory,
    seed: plan.seed,
    eliminated: result.eliminated.length,
    failed: result.failed.length,
  });

  return result;
}
