/**
 * CLI エントリポイント（サブコマンドのディスパッチ）
 *
 * Usage:
 *   thanos [snap] [directory] [options]
 *   thanos init [directory]
 */
import { loadEnv } from '../config/env.js';
import { setAuditLogPath } from '../audit/log.js';
import { expandTilde } from '../shared/paths.js';
import { CLI_NAME, CLI_VERSION, showHelp } from './help.js';
import { handleSnap } from './snap.js';
import { handleInit } from './init.js';

/**
 * CLI のエントリポイント
 * @returns 終了コード（0: 成功・キャンセル、1: エラー）
 */
export async function runCli(args: string[]): Promise<number> {
  try {
    const env = loadEnv();
    setAuditLogPath(env.THANOS_AUDIT_LOG === undefined ? undefined : expandTilde(env.THANOS_AUDIT_LOG));
  } catch (err) {
    console.error(`[${CLI_NAME}] ${err instanceof Error ? err.message : String(err)}`);
    return 1;
  }

  const [subcommand, ...subArgs] = args;

  switch (subcommand) {
    case 'snap':
      return handleSnap(subArgs);
    case 'init':
      return handleInit(subArgs);
    case '--help':
    case '-h':
    case 'help':
    case undefined:
      showHelp();
      return 0;
    case '--version':
    case '-v':
      console.log(CLI_VERSION);
      return 0;
    default:
      // サブコマンド省略時は snap として扱う
      return handleSnap(args);
  }
}
