import { z } from 'zod';

const GUILD_ID_PATTERN = /^\d+$/;

export const envSchema = z.object({
  // Discord設定
  DISCORD_TOKEN: z
    .string({ required_error: 'DISCORD_TOKEN is required' })
    .min(1, 'DISCORD_TOKEN is required'),
  WHITELISTED_SERVER_IDS: z
    .string({ required_error: 'WHITELISTED_SERVER_IDS is required' })
    .min(1, 'WHITELISTED_SERVER_IDS is required')
    .transform((val, ctx) => {
      const ids = val.split(',').map((id) => id.trim());
      const invalid = ids.filter((id) => !GUILD_ID_PATTERN.test(id));
      if (invalid.length > 0) {
        ctx.addIssue({
          code: z.ZodIssueCode.custom,
          message: `WHITELISTED_SERVER_IDS must be a comma-separated list of numbers (invalid entries: ${invalid
            .map((id) => `"${id}"`)
            .join(', ')})`,
        });
        return z.NEVER;
      }
      // Snowflakeは Number の安全な整数範囲を超えるため、正規化した10進文字列で保持する
      return new Set(ids.map((id) => BigInt(id).toString()));
    }),

  // 翻訳プロバイダー設定
  GOOGLE_TRANSLATE_URL: z
    .string()
    .url()
    .default('https://translate.googleapis.com/translate_a/single'),
  MYMEMORY_URL: z
    .string()
    .url()
    .default('https://api.mymemory.translated.net/get'),
  MYMEMORY_EMAIL: z.string().email().optional(),

  // ログ設定
  LOG_LEVEL: z
    .enum(['debug', 'info', 'warn', 'error'])
    .default('info'),
  NODE_ENV: z
    .enum(['development', 'production', 'test'])
    .default('development'),
});
