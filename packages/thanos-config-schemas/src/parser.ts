import { parse } from 'yaml';
import type { RcFormat, ValidationResult } from './types.js';
import { validateRcDocument, type RcDocument } from './schemas.js';

/**
 * .thanosignore の解析
 * 1行1パターン。空行と '#' で始まる行は無視する。重複は除去し、出現順を保持。
 */
export function parseIgnoreFile(content: string): string[] {
  const patterns = new Set<string>();
  for (const line of content.split(/\r?\n/)) {
    const trimmed = line.trim();
    if (trimmed.length === 0 || trimmed.startsWith('#')) continue;
    patterns.add(trimmed);
  }
  return [...patterns];
}

function errorMessage(e: unknown): string {
  return e instanceof Error ? e.message : String(e);
}

/**
 * 重み設定ファイルの解析と検証
 * 空のYAMLドキュメントは空の設定として扱う
 */
export function parseRcDocument(content: string, format: RcFormat): ValidationResult<RcDocument> {
  let parsed: unknown;
  try {
    parsed = format === 'json' ? JSON.parse(content) : parse(content);
  } catch (e) {
    const label = format === 'json' ? 'JSON' : 'YAML';
    return { ok: false, errors: [`${label} parse error: ${errorMessage(e)}`] };
  }

  if (format === 'yaml' && (parsed === null || parsed === undefined)) {
    return { ok: true, value: {} };
  }
  return validateRcDocument(parsed);
}
