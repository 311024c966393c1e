/**
 * snap コマンド
 *
 * Usage:
 *   thanos [snap] [directory] [-r|--recursive] [-d|--dry-run] [-s|--seed <int>] [--no-protect] [-h|--help]
 */
import * as E from 'fp-ts/Either';
import { parseArgs } from 'node:util';

import { loadEnv } from '../config/env.js';
import { planSnap, type SnapOptions, type SnapPlan } from '../snap/plan.js';
import { executeSnap } from '../snap/execute.js';
import { displayPath, expandTilde } from '../shared/paths.js';
import { showHelp } from './help.js';
import { ask } from './prompt.js';

/** 一覧表示する削除対象の最大件数 */
const MAX_LISTED_FILES = 20;

/** 保護ファイル一覧を表示する上限（これを超えると件数のみ） */
const MAX_LISTED_PROTECTED = 10;

const CONFIRM_WORD = 'snap';

interface SnapArgs {
  help: boolean;
  directory: string;
  recursive: boolean;
  dryRun: boolean;
  seed?: number;
  noProtect: boolean;
}

/**
 * シード文字列を検証してパース
 * @returns パースされた整数、または無効な場合はnull
 */
function parseSeedOption(value: string): number | null {
  const parsed = Number(value);
  if (!/^-?\d+$/.test(value) || !Number.isSafeInteger(parsed)) {
    console.error(`[thanos] Invalid seed: ${value}`);
    console.error('  Expected: an integer (e.g., 42, 0, -7)');
    return null;
  }
  return parsed;
}

const NEGATIVE_INTEGER = /^-\d+$/;

/**
 * `-s -7` / `--seed -7` を `--seed=-7` に結合
 * parseArgs は `-` で始まる値をオプションとみなして拒否するため、負のシードを先に値として束ねる
 */
function joinNegativeSeed(args: readonly string[]): string[] {
  const joined: string[] = [];
  for (let i = 0; i < args.length; i++) {
    const arg = args[i] ?? '';
    const next = args[i + 1];
    if ((arg === '-s' || arg === '--seed') && next !== undefined && NEGATIVE_INTEGER.test(next)) {
      joined.push(`--seed=${next}`);
      i++;
      continue;
    }
    joined.push(arg);
  }
  return joined;
}

function parseSnapArgs(args: string[]): SnapArgs | null {
  let parsed;
  try {
    parsed = parseArgs({
      args: joinNegativeSeed(args),
      options: {
        help: { type: 'boolean', short: 'h' },
        recursive: { type: 'boolean', short: 'r' },
        'dry-run': { type: 'boolean', short: 'd' },
        seed: { type: 'string', short: 's' },
        'no-protect': { type: 'boolean' },
      },
      allowPositionals: true,
      strict: true,
    });
  } catch (err) {
    console.error(`[thanos] ${err instanceof Error ? err.message : String(err)}`);
    return null;
  }

  const { values, positionals } = parsed;
  if (positionals.length > 1) {
    console.error(`[thanos] Too many arguments: ${positionals.join(' ')}`);
    return null;
  }

  let seed: number | undefined;
  if (values.seed !== undefined) {
    const value = parseSeedOption(values.seed);
    if (value === null) return null;
    seed = value;
  }

  return {
    help: values.help ?? false,
    directory: expandTilde(positionals[0] ?? '.'),
    recursive: values.recursive ?? false,
    dryRun: values['dry-run'] ?? false,
    ...(seed !== undefined && { seed }),
    noProtect: values['no-protect'] ?? false,
  };
}

function printFileList(files: readonly string[], directory: string, marker: string): void {
  for (const file of files.slice(0, MAX_LISTED_FILES)) {
    console.log(`  ${marker} ${displayPath(file, directory)}`);
  }
  if (files.length > MAX_LISTED_FILES) {
    console.log(`  ... and ${files.length - MAX_LISTED_FILES} more files`);
  }
}

function printSources(plan: SnapPlan): void {
  if (plan.seeded) {
    console.log(`[thanos] Using random seed: ${plan.seed}`);
  }

  if (plan.protection === undefined) {
    console.log('[thanos] WARNING: All file protections disabled!');
  } else if (plan.protection.usingDefaults) {
    console.log('[thanos] Default protections enabled');
  } else {
    console.log(
      `[thanos] Loaded ${plan.protection.patterns.size} patterns from ${plan.protection.source ?? ''}`
    );
  }

  if (plan.weighted && plan.weightSource !== undefined) {
    console.log(`[thanos] Weighted selection enabled from ${plan.weightSource}`);
  }

  for (const warning of plan.warnings) {
    console.error(`[thanos] Warning: ${warning.message}`);
  }
}

function printAssessment(plan: SnapPlan): void {
  const toEliminate = plan.selected.length;
  console.log('[thanos] Balance assessment:');
  console.log(`  Total files found:  ${plan.files.length}`);
  console.log(`  Protected files:    ${plan.protectedFiles.length}`);
  console.log(`  Eligible files:     ${plan.eligible.length}`);
  console.log(`  Files to eliminate: ${toEliminate}`);
  console.log(`  Survivors:          ${plan.eligible.length - toEliminate}`);
}

function printDryRun(plan: SnapPlan): void {
  console.log('[thanos] DRY RUN MODE - these files would be eliminated:');
  printFileList(plan.selected, plan.directory, '-');

  if (plan.protectedFiles.length > 0 && plan.protectedFiles.length <= MAX_LISTED_PROTECTED) {
    console.log('[thanos] Protected files:');
    for (const file of plan.protectedFiles) {
      const by = file.pattern !== undefined ? ` (${file.pattern})` : '';
      console.log(`  + ${displayPath(file.path, plan.directory)}${by}`);
    }
  }

  console.log('[thanos] This was a dry run. No files were harmed.');
  console.log(`[thanos] Run with --seed ${plan.seed} to delete these exact files`);
}

async function runSnap(plan: SnapPlan): Promise<number> {
  console.log('[thanos] Files selected for elimination:');
  printFileList(plan.selected, plan.directory, '-');
  console.log('[thanos] WARNING: This will permanently delete the files listed above!');
  console.log('  There is no undo. Files will be gone forever.');

  const answer = await ask(`Type '${CONFIRM_WORD}' to proceed: `);
  if (answer.trim().toLowerCase() !== CONFIRM_WORD) {
    console.log('[thanos] Snap cancelled. The universe remains unchanged.');
    return 0;
  }

  console.log('[thanos] Snapping...');
  const result = await executeSnap(plan, (outcome) => {
    const shown = displayPath(outcome.path, plan.directory);
    if (outcome.ok) {
      console.log(`  ✓ Eliminated: ${shown}`);
    } else {
      console.error(`  ✗ Failed: ${shown} - ${outcome.message}`);
    }
  });

  console.log('[thanos] The snap is complete.');
  console.log(`  Eliminated: ${result.eliminated.length} files`);
  console.log(`  Failed: ${result.failed.length} files`);

  if (result.auditError !== undefined) {
    console.error(`[thanos] ${result.auditError.message}`);
    return 1;
  }
  return 0;
}

/**
 * snap コマンドのエントリポイント
 */
export async function handleSnap(args: string[]): Promise<number> {
  const parsed = parseSnapArgs(args);
  if (parsed === null) {
    return 1;
  }
  if (parsed.help) {
    showHelp();
    return 0;
  }

  const seed = parsed.seed ?? loadEnv().THANOS_SEED;
  const options: SnapOptions = {
    directory: parsed.directory,
    recursive: parsed.recursive,
    noProtect: parsed.noProtect,
    ...(seed !== undefined && { seed }),
  };

  const result = await planSnap(options);
  if (E.isLeft(result)) {
    console.error(`[thanos] Error: ${result.left.message}`);
    return 1;
  }

  const plan = result.right;
  console.log(`[thanos] Target directory: ${plan.directory}`);
  printSources(plan);

  if (plan.status === 'NO_ELIGIBLE_FILES') {
    console.log('[thanos] No eligible files found. The universe is empty (or fully protected).');
    return 0;
  }

  printAssessment(plan);

  if (parsed.dryRun) {
    printDryRun(plan);
    return 0;
  }

  return runSnap(plan);
}
