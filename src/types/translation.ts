/**
 * 翻訳プロバイダー関連の型定義
 */

/**
 * 外部翻訳サービスの共通インターフェース
 *
 * 失敗時は TranslationError をスローする
 */
export interface TranslationProvider {
  readonly name: string;
  translate(text: string, sourceLang: string, targetLang: string): Promise<string>;
}

/**
 * 1回のプロバイダー呼び出しの結果（Discriminated Union）
 */
export type ProviderOutcome =
  | { status: 'success'; text: string }
  | { status: 'failure'; reason: string };
