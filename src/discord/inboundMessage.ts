import { DiscordAPIError, Message, RESTJSONErrorCodes } from 'discord.js';
import { FetchOutcome, InboundMessage } from '../types/message';

const NOT_FOUND_CODES: ReadonlySet<number | string> = new Set<number | string>([
  RESTJSONErrorCodes.UnknownMessage,
  RESTJSONErrorCodes.UnknownChannel,
]);
const FORBIDDEN_CODES: ReadonlySet<number | string> = new Set<number | string>([
  RESTJSONErrorCodes.MissingAccess,
  RESTJSONErrorCodes.MissingPermissions,
]);

/**
 * 返信元のメッセージを取得し、Discordのエラーを結果に変換する
 *
 * 見つからない・権限がない以外のエラーはそのままスローする
 */
export async function fetchReferencedMessage(
  message: Pick<Message, 'fetchReference'>
): Promise<FetchOutcome> {
  try {
    const referenced = await message.fetchReference();
    return {
      status: 'found',
      message: { authorId: referenced.author.id, content: referenced.content },
    };
  } catch (error) {
    if (error instanceof DiscordAPIError) {
      if (NOT_FOUND_CODES.has(error.code) || error.status === 404) {
        return { status: 'not_found' };
      }
      if (FORBIDDEN_CODES.has(error.code) || error.status === 403) {
        return { status: 'forbidden' };
      }
    }
    throw error;
  }
}

/**
 * discord.jsのMessageをMessageHandler用の形に変換
 */
export function toInboundMessage(message: Message): InboundMessage {
  return {
    id: message.id,
    authorId: message.author.id,
    authorName: message.member?.displayName ?? message.author.displayName,
    fromSelf: message.author.id === message.client.user?.id,
    // ギルドがキャッシュされていなくてもIDで許可判定できるようにguildIdを使う
    guild: message.guildId
      ? { id: message.guildId, name: message.guild?.name ?? message.guildId }
      : null,
    content: message.content,
    referencedMessageId: message.reference?.messageId ?? null,
    fetchReference: () => fetchReferencedMessage(message),
  };
}
