import { z } from 'zod';
import { TranslationProvider } from '../types/translation';
import { TranslationError } from '../utils/errors';
import { ErrorCode } from '../types';
import { fetchJson } from './providerHttp';
import logger from '../utils/logger';

const MAX_TEXT_LENGTH = 5000;

// [[["訳文", "原文", ...], ...], null, "検出言語", ...]
const segmentSchema = z.tuple([z.string().nullable()]).rest(z.unknown());
const responseSchema = z.tuple([z.array(segmentSchema)]).rest(z.unknown());

/**
 * Google翻訳（キー不要の gtx エンドポイント）クライアント
 */
export class GoogleTranslateClient implements TranslationProvider {
  readonly name = 'GoogleTranslate';

  constructor(private endpointUrl: string) {}

  async translate(
    text: string,
    sourceLang: string,
    targetLang: string
  ): Promise<string> {
    // 上限はコードポイント数で数える（絵文字などのサロゲートペアを1文字とする）
    if ([...text].length > MAX_TEXT_LENGTH) {
      throw new TranslationError(
        `Text exceeds ${MAX_TEXT_LENGTH} characters`,
        ErrorCode.INVALID_INPUT
      );
    }

    const url = new URL(this.endpointUrl);
    url.search = new URLSearchParams({
      client: 'gtx',
      sl: sourceLang,
      tl: targetLang,
      dt: 't',
      q: text,
    }).toString();

    const data = await fetchJson(this.name, url);
    const parsed = responseSchema.safeParse(data);
    if (!parsed.success) {
      throw new TranslationError(
        'Invalid GoogleTranslate response format',
        ErrorCode.API_ERROR
      );
    }

    const [segments] = parsed.data;
    const result = segments.map(([chunk]) => chunk ?? '').join('');

    logger.debug('GoogleTranslate result', {
      targetLang,
      inputLength: text.length,
      outputLength: result.length,
    });

    return result;
  }
}
