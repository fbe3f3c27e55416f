import { MessageReplyOptions } from 'discord.js';
import { OutboundAction, ReplyAction } from '../types/message';

const MAX_MESSAGE_LENGTH = 2000;
const CHUNK_LENGTH = 1900;
const QUOTE_PREFIX = '>>> ';

// reply()を持つ送信先（discord.jsのMessageがそのまま渡せる）
export interface ReplyTarget {
  reply(options: MessageReplyOptions): Promise<unknown>;
}

/**
 * 1行をmaxLength以内に切る。サロゲートペアの途中では切らない
 */
function splitLine(line: string, maxLength: number): string[] {
  const pieces: string[] = [];
  let piece = '';

  for (const char of line) {
    if (piece.length + char.length > maxLength) {
      pieces.push(piece);
      piece = '';
    }
    piece += char;
  }

  pieces.push(piece);
  return pieces;
}

export class MessageDispatcher {
  /**
   * MessageHandlerが返したアクションを順に送信する
   */
  async dispatch(target: ReplyTarget, actions: OutboundAction[]): Promise<void> {
    for (const action of actions) {
      await this.sendReply(target, action);
    }
  }

  private async sendReply(target: ReplyTarget, action: ReplyAction): Promise<void> {
    for (const content of this.render(action)) {
      await target.reply({
        content,
        // 翻訳文中の@everyoneやロールメンションで通知が飛ばないようにする
        allowedMentions: {
          parse: [],
          users: action.mentionUserIds ?? [],
          repliedUser: true,
        },
      });
    }
  }

  /**
   * 返信アクションを2000文字以内のメッセージ本文に変換
   *
   * 引用部分が長い場合は行単位で分割し、続きのメッセージも引用として送る
   */
  render(action: ReplyAction): string[] {
    if (action.quote === undefined) {
      return this.splitText(action.content, MAX_MESSAGE_LENGTH);
    }

    const message = `${action.content}\n${QUOTE_PREFIX}${action.quote}`;
    if (message.length <= MAX_MESSAGE_LENGTH) {
      return [message];
    }

    return this.splitText(action.quote, CHUNK_LENGTH).map((chunk, i) =>
      i === 0
        ? `${action.content}\n${QUOTE_PREFIX}${chunk}`
        : `${QUOTE_PREFIX}${chunk}`
    );
  }

  /**
   * テキストを指定文字数で分割（改行を考慮）
   */
  private splitText(text: string, maxLength: number): string[] {
    if (text.length <= maxLength) return [text];

    const chunks: string[] = [];
    let current = '';

    for (const line of text.split('\n')) {
      const joined = current ? `${current}\n${line}` : line;
      if (joined.length <= maxLength) {
        current = joined;
        continue;
      }

      if (current) chunks.push(current);
      const pieces = splitLine(line, maxLength);
      const last = pieces.pop() ?? '';
      chunks.push(...pieces);
      current = last;
    }

    if (current) chunks.push(current);
    return chunks;
  }
}
