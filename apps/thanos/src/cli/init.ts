/**
 * init コマンド
 *
 * Usage:
 *   thanos init [directory]
 *
 * テンプレートの .thanosignore と .thanosrc.json を作成する（既存ファイルは上書きしない）。
 */
import * as E from 'fp-ts/Either';
import * as path from 'node:path';
import { parseArgs } from 'node:util';
import {
  IGNORE_FILE_NAME,
  IGNORE_FILE_TEMPLATE,
  RC_FILE_NAMES,
  RC_FILE_TEMPLATE,
} from '@thanos-snap/config-schemas';
import { resolveDirectory, writeFileIfAbsent } from '../snap/fileSystem.js';
import { expandTilde } from '../shared/paths.js';
import { showHelp } from './help.js';

/** init が生成する重み設定ファイル */
const RC_FILE_NAME = RC_FILE_NAMES[0];

/**
 * init コマンドのエントリポイント
 */
export async function handleInit(args: string[]): Promise<number> {
  let parsed;
  try {
    parsed = parseArgs({
      args,
      options: { help: { type: 'boolean', short: 'h' } },
      allowPositionals: true,
      strict: true,
    });
  } catch (err) {
    console.error(`[thanos] ${err instanceof Error ? err.message : String(err)}`);
    return 1;
  }

  if (parsed.values.help) {
    showHelp();
    return 0;
  }

  const { positionals } = parsed;
  if (positionals.length > 1) {
    console.error(`[thanos] Too many arguments: ${positionals.join(' ')}`);
    return 1;
  }

  const resolved = await resolveDirectory(expandTilde(positionals[0] ?? '.'));
  if (E.isLeft(resolved)) {
    console.error(`[thanos] Error: ${resolved.left.message}`);
    return 1;
  }

  const files: Array<readonly [string, string]> = [
    [path.join(resolved.right, IGNORE_FILE_NAME), IGNORE_FILE_TEMPLATE],
    [path.join(resolved.right, RC_FILE_NAME), JSON.stringify(RC_FILE_TEMPLATE, null, 2) + '\n'],
  ];

  for (const [filePath, content] of files) {
    const written = await writeFileIfAbsent(filePath, content);
    if (E.isLeft(written)) {
      console.error(`[thanos] Error: ${written.left.message}`);
      return 1;
    }
    if (written.right) {
      console.log(`[thanos] Created ${filePath}`);
    } else {
      console.log(`[thanos] ${filePath} already exists`);
    }
  }

  console.log('[thanos] Initialization complete! Edit these files to customize:');
  for (const [filePath] of files) {
    console.log(`  - ${filePath}`);
  }
  console.log("  Run 'thanos snap -d' to test your configuration.");
  return 0;
}
