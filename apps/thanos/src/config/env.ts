/**
 * 環境変数の読み込みとバリデーション
 * thanos CLI の実行時設定を管理
 */
import { z } from 'zod';

// 環境変数スキーマ定義
const envSchema = z.object({
  // デフォルトの乱数シード（--seed が優先）
  THANOS_SEED: z
    .string()
    .regex(/^-?\d+$/, 'must be an integer')
    .transform(Number)
    .refine(Number.isSafeInteger, 'must be a safe integer')
    .optional(),

  // 監査ログ出力先（ファイルパス）
  THANOS_AUDIT_LOG: z.string().min(1).optional(),

  // 実行環境
  NODE_ENV: z.enum(['development', 'production', 'test']).default('development'),
});

export type Env = z.infer<typeof envSchema>;

let cachedEnv: Env | null = null;

/**
 * 環境変数を読み込み、バリデーションを実行
 */
export function loadEnv(): Env {
  if (cachedEnv) return cachedEnv;

  const result = envSchema.safeParse(process.env);

  if (!result.success) {
    const errors = result.error.errors.map((e) => `${e.path.join('.')}: ${e.message}`).join(', ');
    throw new Error(`ENV_VALIDATION_FAILED: ${errors}`);
  }

  cachedEnv = result.data;
  return cachedEnv;
}

/**
 * テスト用: キャッシュをクリア
 */
export function clearEnvCache(): void {
  cachedEnv = null;
}
