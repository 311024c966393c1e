/**
 * Snap実行テスト
 */
import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import * as fs from 'node:fs/promises';
import * as path from 'node:path';
import * as E from 'fp-ts/Either';
import { planSnap, type SnapPlan } from '../src/snap/plan.js';
import { executeSnap, type DeletionOutcome } from '../src/snap/execute.js';
import { setAuditLogPath, type AuditFileRecord } from '../src/audit/log.js';
import { createWorkspace, remainingFiles, writeFiles } from './helpers.js';

describe('executeSnap', () => {
  let root: string;
  let dir: string;
  let plan: SnapPlan;

  beforeEach(async () => {
    ({ root, dir } = await createWorkspace('thanos-execute-test-'));
    await writeFiles(dir, {
      '.env': 'TOKEN=test-token',
      'a.txt': 'a',
      'b.txt': 'b',
      'c.txt': 'c',
      'd.txt': 'd',
      'e.txt': 'e',
    });
    const result = await planSnap({ directory: dir, seed: 7 });
    if (E.isLeft(result)) throw new Error(result.left.message);
    plan = result.right;
  });

  afterEach(async () => {
    setAuditLogPath(undefined);
    await fs.rm(root, { recursive: true, force: true });
  });

  it('選ばれたファイルだけを削除', async () => {
    const result = await executeSnap(plan);

    expect(result.eliminated).toEqual(plan.selected);
    expect(result.failed).toEqual([]);
    const survivors = plan.eligible.filter((f) => !plan.selected.includes(f));
    const expected = ['.env', ...survivors.map((f) => path.basename(f))].sort();
    expect(await remainingFiles(dir)).toEqual(expected);
    expect(survivors).toHaveLength(3);
  });

  it('削除失敗は記録して残りを続行', async () => {
    const [gone, ...rest] = plan.selected;
    if (gone === undefined) throw new Error('no selection');
    await fs.rm(gone);

    const outcomes: DeletionOutcome[] = [];
    const result = await executeSnap(plan, (o) => outcomes.push(o));

    expect(result.eliminated).toEqual(rest);
    expect(result.failed).toHaveLength(1);
    expect(result.failed[0]?.path).toBe(gone);
    expect(result.failed[0]?.message).toContain('ENOENT');
    expect(outcomes.map((o) => o.ok)).toEqual([false, true]);
  });

  it('監査ログにJSONLで追記', async () => {
    const logPath = path.join(root, 'logs', 'audit.jsonl');
    setAuditLogPath(logPath);

    const result = await executeSnap(plan);

    expect(result.auditError).toBeUndefined();
    const lines = (await fs.readFile(logPath, 'utf-8')).trimEnd().split('\n');
    const records = lines.map((line): AuditFileRecord => JSON.parse(line));
    expect(records).toHaveLength(plan.selected.length + 1);
    expect(records.slice(0, -1).map((r) => [r.op, r.ok, r.subject])).toEqual(
      plan.selected.map((f) => ['delete', true, f])
    );
    expect(records.at(-1)).toMatchObject({
      op: 'snap',
      ok: true,
      subject: dir,
      seed: 7,
      eliminated: 2,
      failed: 0,
    });
  });

  it('監査ログに書けなくても削除は完了しエラーを返す', async () => {
    const blocker = path.join(root, 'not-a-dir');
    await fs.writeFile(blocker, '');
    setAuditLogPath(path.join(blocker, 'audit.jsonl'));

    const result = await executeSnap(plan);

    expect(result.eliminated).toEqual(plan.selected);
    expect(result.auditError?.code).toBe('AUDIT_WRITE_FAILED');
  });
});
