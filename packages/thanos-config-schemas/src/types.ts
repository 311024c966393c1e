export interface ValidationSuccess<T> {
  readonly ok: true;
  readonly value: T;
}

export interface ValidationFailure {
  readonly ok: false;
  readonly errors: string[];
}

export type ValidationResult<T> = ValidationSuccess<T> | ValidationFailure;

/** 重み設定ファイルの形式 */
export type RcFormat = 'json' | 'yaml';
