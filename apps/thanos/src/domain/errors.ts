/**
 * ドメインエラー型定義
 * 回復可能な失敗は Either の Left として返す
 */

// エラーコード（Tagged Union）
export type ErrorCode =
  | 'DIRECTORY_NOT_FOUND' // 対象ディレクトリが存在しない
  | 'NOT_A_DIRECTORY' // 対象パスがディレクトリではない
  | 'DIRECTORY_READ_FAILED' // 列挙中の readdir 失敗
  | 'CONFIG_READ_FAILED' // .thanosignore / .thanosrc.* の読み取り失敗
  | 'CONFIG_INVALID' // .thanosrc.* のパース・スキーマ検証エラー
  | 'CONFIG_WRITE_FAILED' // init でのテンプレート書き込み失敗
  | 'AUDIT_WRITE_FAILED'; // 監査ログ追記の失敗

// ドメインエラー型
export interface DomainError {
  readonly _tag: 'DomainError';
  readonly code: ErrorCode;
  readonly message: string;
  readonly cause?: unknown;
}

// エラー生成関数
export const domainError = (code: ErrorCode, message: string, cause?: unknown): DomainError => ({
  _tag: 'DomainError',
  code,
  message,
  cause,
});

const describeCause = (cause: unknown): string =>
  cause instanceof Error ? ` (${cause.message})` : '';

// よく使うエラー生成のショートカット
export const directoryNotFoundError = (dirPath: string): DomainError =>
  domainError('DIRECTORY_NOT_FOUND', `Directory not found: ${dirPath}`);

export const notADirectoryError = (dirPath: string): DomainError =>
  domainError('NOT_A_DIRECTORY', `Not a directory: ${dirPath}`);

export const directoryReadError = (dirPath: string, cause?: unknown): DomainError =>
  domainError('DIRECTORY_READ_FAILED', `Failed to read directory: ${dirPath}${describeCause(cause)}`, cause);

export const configReadError = (filePath: string, cause?: unknown): DomainError =>
  domainError('CONFIG_READ_FAILED', `Failed to read config file: ${filePath}${describeCause(cause)}`, cause);

export const configInvalidError = (filePath: string, errors: readonly string[]): DomainError =>
  domainError('CONFIG_INVALID', `Invalid config file ${filePath}: ${errors.join('; ')}`);

export const configWriteError = (filePath: string, cause?: unknown): DomainError =>
  domainError('CONFIG_WRITE_FAILED', `Failed to write file: ${filePath}${describeCause(cause)}`, cause);

export const auditWriteError = (filePath: string, cause?: unknown): DomainError =>
  domainError('AUDIT_WRITE_FAILED', `Failed to append audit log: ${filePath}${describeCause(cause)}`, cause);
