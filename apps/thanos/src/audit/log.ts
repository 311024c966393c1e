import { appendFileSync, existsSync, mkdirSync } from 'node:fs';
import { dirname } from 'node:path';
import * as E from 'fp-ts/Either';
import { auditWriteError, type DomainError } from '../domain/errors.js';

/**
 * 監査ログファイル用レコード（JSONL形式）
 */
export interface AuditFileRecord {
  ts: string; // ISO 8601 timestamp
  op: 'delete' | 'snap';
  ok: boolean;
  subject?: string; // 削除対象のパス、または snap 対象ディレクトリ
  seed?: number;
  eliminated?: number;
  failed?: number;
  error?: string;
}

// 監査ログファイルパス（環境変数から取得）
let auditLogPath: string | null = null;

/**
 * 監査ログファイルパスを設定
 */
export function setAuditLogPath(path: string | undefined): void {
  auditLogPath = path ?? null;
}

export function getAuditLogPath(): string | null {
  return auditLogPath;
}

/**
 * 監査ログファイルへの追記（append-only JSONL形式）
 * THANOS_AUDIT_LOG が設定されている場合のみ出力
 */
export function appendAuditFile(record: Omit<AuditFileRecord, 'ts'>): E.Either<DomainError, void> {
  const logPath = auditLogPath;
  if (!logPath) return E.right(undefined);

  try {
    // ディレクトリが存在しない場合は作成
    const dir = dirname(logPath);
    if (!existsSync(dir)) {
      mkdirSync(dir, { recursive: true });
    }

    const fullRecord: AuditFileRecord = {
      ts: new Date().toISOString(),
      ...record,
    };

    // JSONL形式で追記（1行1JSON + 改行）
    const line = JSON.stringify(fullRecord) + '\n';
    appendFileSync(logPath, line, { encoding: 'utf-8' });
    return E.right(undefined);
  } catch (error) {
    return E.left(auditWriteError(logPath, error));
  }
}
