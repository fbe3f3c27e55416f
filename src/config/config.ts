import { envSchema } from './env.schema';
import { ConfigError } from '../utils/errors';

export interface AppConfig {
  readonly discordToken: string;
  readonly allowedGuildIds: ReadonlySet<string>;
  readonly googleTranslateUrl: string;
  readonly myMemoryUrl: string;
  readonly myMemoryEmail?: string;
  readonly logLevel: 'debug' | 'info' | 'warn' | 'error';
  readonly nodeEnv: 'development' | 'production' | 'test';
}

/**
 * 環境変数から設定を読み込む
 *
 * 起動時に一度だけ呼ばれ、結果は変更されない
 * @throws {ConfigError} 必須項目の欠落や形式不正がある場合（全ての問題をまとめて報告）
 */
export function loadConfig(env: NodeJS.ProcessEnv): AppConfig {
  const result = envSchema.safeParse(env);
  if (!result.success) {
    throw new ConfigError(
      result.error.issues.map((issue) => issue.message).join('; ')
    );
  }

  const parsed = result.data;
  return Object.freeze({
    discordToken: parsed.DISCORD_TOKEN,
    allowedGuildIds: parsed.WHITELISTED_SERVER_IDS,
    googleTranslateUrl: parsed.GOOGLE_TRANSLATE_URL,
    myMemoryUrl: parsed.MYMEMORY_URL,
    myMemoryEmail: parsed.MYMEMORY_EMAIL,
    logLevel: parsed.LOG_LEVEL,
    nodeEnv: parsed.NODE_ENV,
  });
}
