import { ErrorCode } from '../types';

export class TranslationError extends Error {
  constructor(
    message: string,
    public code: ErrorCode,
    public originalError?: Error
  ) {
    super(message);
    this.name = 'TranslationError';
    // TypeScript→ES5/ES2016トランスパイル後のinstanceof問題を回避
    Object.setPrototypeOf(this, TranslationError.prototype);
  }
}

export class ConfigError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'ConfigError';
    Object.setPrototypeOf(this, ConfigError.prototype);
  }
}

/**
 * 任意の値からユーザー向けのエラーメッセージを取り出す
 */
export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
