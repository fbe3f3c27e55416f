import { ProviderOutcome, TranslationProvider } from '../types/translation';
import { errorMessage } from '../utils/errors';
import logger from '../utils/logger';

export const EMPTY_TEXT_NOTICE = 'The message to translate is empty.';

const AUTO_DETECT = 'auto';

export class TranslationRelay {
  constructor(
    private primary: TranslationProvider,
    private secondary: TranslationProvider
  ) {}

  /**
   * プライマリで翻訳し、失敗した場合のみセカンダリにフォールバックする
   *
   * @returns 翻訳結果。両方失敗した場合はnull
   */
  async translate(text: string, targetLang: string): Promise<string | null> {
    if (text.length === 0) {
      return EMPTY_TEXT_NOTICE;
    }

    const primaryOutcome = await this.attempt(this.primary, text, targetLang);
    if (primaryOutcome.status === 'success') {
      return primaryOutcome.text;
    }
    logger.warn(
      `${this.primary.name} failed, falling back to ${this.secondary.name}`,
      { targetLang, reason: primaryOutcome.reason }
    );

    const secondaryOutcome = await this.attempt(this.secondary, text, targetLang);
    if (secondaryOutcome.status === 'success') {
      return secondaryOutcome.text;
    }
    logger.warn(`${this.secondary.name} also failed, unable to translate`, {
      targetLang,
      reason: secondaryOutcome.reason,
    });

    return null;
  }

  private async attempt(
    provider: TranslationProvider,
    text: string,
    targetLang: string
  ): Promise<ProviderOutcome> {
    logger.info(`Attempting translation with ${provider.name}`, {
      targetLang,
      textLength: text.length,
    });

    try {
      const translated = await provider.translate(text, AUTO_DETECT, targetLang);
      if (!translated) {
        return { status: 'failure', reason: 'empty result' };
      }
      return { status: 'success', text: translated };
    } catch (error) {
      return { status: 'failure', reason: errorMessage(error) };
    }
  }
}
