/**
 * 重み設定（.thanosrc.json / .thanosrc.yaml）のzodスキーマ
 *
 * {
 *   "weights": {
 *     "by_extension": { ".log": 0.9 },
 *     "by_age_days":  { "0-7": 0.2, "30+": 0.9 },
 *     "by_size_mb":   { "10+": 0.8 }
 *   }
 * }
 *
 * セレクタ文字列の形式はここでは検証しない（不正な範囲は計算時に不一致として扱う）。
 */
import { z } from 'zod';
import type { ValidationResult } from './types.js';

export const WeightValueSchema = z
  .number({ invalid_type_error: 'weight must be a number' })
  .min(0, { message: 'weight must be >= 0' })
  .max(1, { message: 'weight must be <= 1' });

export const WeightTableSchema = z.record(WeightValueSchema);

export const WeightConfigSchema = z
  .object({
    by_extension: WeightTableSchema.optional(),
    by_age_days: WeightTableSchema.optional(),
    by_size_mb: WeightTableSchema.optional(),
  })
  .strict();
export type WeightConfigDocument = z.infer<typeof WeightConfigSchema>;

/**
 * 設定ファイル全体
 * weights 以外のトップレベルキーは将来の拡張のため許容する
 */
export const RcDocumentSchema = z
  .object({
    weights: WeightConfigSchema.optional(),
  })
  .passthrough();
export type RcDocument = z.infer<typeof RcDocumentSchema>;

export function validateRcDocument(input: unknown): ValidationResult<RcDocument> {
  const result = RcDocumentSchema.safeParse(input);
  if (!result.success) {
    const errors = result.error.errors.map((e) =>
      e.path.length > 0 ? `${e.path.join('.')}: ${e.message}` : e.message
    );
    return { ok: false, errors };
  }
  return { ok: true, value: result.data };
}
