/**
 * @thanos-snap/config-schemas - 設定ファイルのスキーマと解析
 *
 * - .thanosignore の解析（1行1パターン、'#' コメント）
 * - .thanosrc.json / .thanosrc.yaml の zod 検証
 * - デフォルト保護パターンと init テンプレート
 */

export type { ValidationResult, ValidationSuccess, ValidationFailure, RcFormat } from './types.js';

export type { WeightConfigDocument, RcDocument } from './schemas.js';
export {
  WeightValueSchema,
  WeightTableSchema,
  WeightConfigSchema,
  RcDocumentSchema,
  validateRcDocument,
} from './schemas.js';

export { parseIgnoreFile, parseRcDocument } from './parser.js';

export {
  IGNORE_FILE_NAME,
  RC_FILE_NAMES,
  DEFAULT_PROTECTED_PATTERNS,
  defaultProtectedPatterns,
  IGNORE_FILE_TEMPLATE,
  RC_FILE_TEMPLATE,
} from './defaults.js';
