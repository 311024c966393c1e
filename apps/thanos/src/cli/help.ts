/**
 * CLI 共通のヘルプ表示（トップレベルと各サブコマンドで共有）
 */

export const CLI_NAME = 'thanos';
export const CLI_VERSION = '0.1.0';

export function showHelp(): void {
  console.log(`
${CLI_NAME} v${CLI_VERSION} - Eliminate half of all files with a snap

Usage: thanos [snap] [directory] [options]
       thanos init [directory]

Commands:
  snap      Delete a weighted random half of the eligible files (default)
  init      Create example .thanosignore and .thanosrc.json files

Options for snap:
  -r, --recursive          Include subdirectories
  -d, --dry-run            Preview without deleting
  -s, --seed <int>         Random seed for reproducibility (default: $THANOS_SEED)
  --no-protect             Disable all protections (DANGEROUS!)
  -h, --help               Show this help

Environment:
  THANOS_SEED              Default random seed
  THANOS_AUDIT_LOG         Append a JSONL record for every deletion to this file

Examples:
  thanos snap -d
  thanos snap test_env/ -d
  thanos snap -r --seed 42
  thanos snap -d --seed -7
  thanos init
`);
}
