import { Command } from '../types';

const COMMAND_PREFIX = '/translate';
// ISO 639-1 相当の2文字コード（サロゲートペアも1文字として数える）
const LANGUAGE_CODE_PATTERN = /^\p{L}{2}$/u;

export class CommandParser {
  parse(content: string): Command | null {
    const lowered = content.toLowerCase();
    if (!lowered.startsWith(COMMAND_PREFIX)) return null;

    // 最初の空白で2つに分割
    const separator = lowered.search(/\s/);
    if (separator === -1) {
      return { type: 'usage' };
    }

    const code = lowered.slice(separator + 1).trim();
    if (!LANGUAGE_CODE_PATTERN.test(code)) {
      return { type: 'invalid_language', code };
    }

    return { type: 'translate', targetLang: code };
  }
}
