import { z } from 'zod';
import { TranslationProvider } from '../types/translation';
import { TranslationError } from '../utils/errors';
import { ErrorCode } from '../types';
import { fetchJson } from './providerHttp';
import logger from '../utils/logger';

// MyMemoryの無料APIは1リクエスト500文字まで
const MAX_TEXT_LENGTH = 500;
const QUOTA_WARNING_PREFIX = 'MYMEMORY WARNING';

const responseSchema = z.object({
  responseData: z
    .object({ translatedText: z.string().nullable() })
    .nullable(),
  responseStatus: z.union([z.number(), z.string()]),
  responseDetails: z.string().nullish(),
});

/**
 * MyMemory Translated API クライアント
 */
export class MyMemoryClient implements TranslationProvider {
  readonly name = 'MyMemory';

  constructor(
    private endpointUrl: string,
    private contactEmail?: string
  ) {}

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

    const source = sourceLang === 'auto' ? 'Autodetect' : sourceLang;
    const params = new URLSearchParams({
      q: text,
      langpair: `${source}|${targetLang}`,
    });
    if (this.contactEmail) {
      params.set('de', this.contactEmail);
    }

    const url = new URL(this.endpointUrl);
    url.search = params.toString();

    const data = await fetchJson(this.name, url);
    const parsed = responseSchema.safeParse(data);
    if (!parsed.success) {
      throw new TranslationError(
        'Invalid MyMemory response format',
        ErrorCode.API_ERROR
      );
    }

    const { responseData, responseStatus, responseDetails } = parsed.data;
    const status = Number(responseStatus);
    if (status !== 200) {
      throw new TranslationError(
        `MyMemory error: ${responseStatus} - ${responseDetails ?? 'unknown error'}`,
        this.errorCodeFor(status)
      );
    }

    const result = responseData?.translatedText ?? '';
    if (result.startsWith(QUOTA_WARNING_PREFIX)) {
      throw new TranslationError(
        `MyMemory quota exceeded: ${result}`,
        ErrorCode.RATE_LIMIT
      );
    }

    logger.debug('MyMemory result', {
      targetLang,
      inputLength: text.length,
      outputLength: result.length,
    });

    return result;
  }

  private errorCodeFor(status: number): ErrorCode {
    // 403は言語ペア不正などの入力エラーとして返ってくる
    if (status === 429) return ErrorCode.RATE_LIMIT;
    if (status === 403) return ErrorCode.INVALID_INPUT;
    return ErrorCode.API_ERROR;
  }
}
