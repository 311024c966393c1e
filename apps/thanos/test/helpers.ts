import * as fs from 'node:fs/promises';
import * as path from 'node:path';
import * as os from 'node:os';

/**
 * テスト用の作業ディレクトリ
 * 設定ファイル探索が一時ディレクトリの外に出ないよう 4 階層下に作る
 */
export async function createWorkspace(prefix: string): Promise<{ root: string; dir: string }> {
  const root = await fs.mkdtemp(path.join(os.tmpdir(), prefix));
  const dir = path.join(root, 'a', 'b', 'c', 'work');
  await fs.mkdir(dir, { recursive: true });
  return { root, dir };
}

/**
 * 相対パスのファイル群を作成（親ディレクトリも作成）
 */
export async function writeFiles(dir: string, files: Record<string, string>): Promise<void> {
  for (const [name, content] of Object.entries(files)) {
    const filePath = path.join(dir, name);
    await fs.mkdir(path.dirname(filePath), { recursive: true });
    await fs.writeFile(filePath, content);
  }
}

/**
 * 残っているファイル（dir からの相対パス、'/' 区切り、昇順）
 */
export async function remainingFiles(dir: string, prefix = ''): Promise<string[]> {
  const results: string[] = [];
  for (const entry of await fs.readdir(dir, { withFileTypes: true })) {
    const rel = prefix === '' ? entry.name : `${prefix}/${entry.name}`;
    if (entry.isDirectory()) {
      results.push(...(await remainingFiles(path.join(dir, entry.name), rel)));
    } else if (entry.isFile()) {
      results.push(rel);
    }
  }
  return results.sort();
}
