import { CommandParser } from '../commands/commandParser';
import { TranslationRelay } from '../services/translationRelay';
import { InboundMessage, OutboundAction } from '../types/message';
import { errorMessage } from '../utils/errors';
import logger, { serializeError } from '../utils/logger';

function reply(content: string): OutboundAction {
  return { type: 'reply', content };
}

/**
 * 受信メッセージ1件を処理し、送信すべき返信のリストを返す
 *
 * Discordへの送信は行わない（MessageDispatcherの役割）
 */
export class MessageHandler {
  constructor(
    private commandParser: CommandParser,
    private translationRelay: TranslationRelay,
    private allowedGuildIds: ReadonlySet<string>
  ) {}

  async handle(message: InboundMessage): Promise<OutboundAction[]> {
    logger.debug('Message received', {
      messageId: message.id,
      authorId: message.authorId,
      authorName: message.authorName,
      guildId: message.guild?.id ?? 'DM',
      content: message.content.substring(0, 50),
    });

    // bot自身のメッセージを無視
    if (message.fromSelf) {
      return [];
    }

    // 許可されていないサーバーは無視（DMはguildがないのでそのまま通す）
    if (message.guild && !this.allowedGuildIds.has(message.guild.id)) {
      logger.info('Ignoring message from unauthorized server', {
        guildId: message.guild.id,
        guildName: message.guild.name,
      });
      return [];
    }

    // 返信でなければコマンドとして扱わない
    if (!message.referencedMessageId) {
      return [];
    }

    const command = this.commandParser.parse(message.content);
    if (!command) {
      return [];
    }

    switch (command.type) {
      case 'usage':
        return [
          reply('Usage: `/translate <language_code>` when replying to a message.'),
        ];

      case 'invalid_language':
        return [
          reply(
            `Invalid language code: \`${command.code}\`. Please use a 2-letter ISO 639-1 code.`
          ),
        ];

      case 'translate':
        try {
          return await this.translateReferenced(message, command.targetLang);
        } catch (error) {
          logger.error('An unexpected error occurred during translation processing', {
            messageId: message.id,
            error: serializeError(error),
          });
          return [
            reply(
              `An internal error occurred: ${errorMessage(error)}. Please try again later.`
            ),
          ];
        }
    }
  }

  private async translateReferenced(
    message: InboundMessage,
    targetLang: string
  ): Promise<OutboundAction[]> {
    const fetched = await message.fetchReference();

    if (fetched.status === 'not_found') {
      return [reply('The message you replied to could not be found.')];
    }
    if (fetched.status === 'forbidden') {
      return [
        reply("I don't have permissions to read the message you replied to."),
      ];
    }

    const original = fetched.message;
    if (!original.content) {
      return [
        reply('The message you replied to has no text content to translate.'),
      ];
    }

    logger.info('Translating referenced message', {
      messageId: message.id,
      referencedMessageId: message.referencedMessageId,
      targetLang,
      requestedBy: message.authorName,
      guildName: message.guild?.name ?? 'DM',
    });

    const translated = await this.translationRelay.translate(
      original.content,
      targetLang
    );

    if (translated === null) {
      return [
        reply(
          `Sorry, I couldn't translate that message to \`${targetLang}\`. Both translation services failed or returned no result.`
        ),
      ];
    }

    return [
      {
        type: 'reply',
        content: `Translation of <@${original.authorId}>'s message to \`${targetLang.toUpperCase()}\`:`,
        quote: translated,
        mentionUserIds: [original.authorId],
      },
    ];
  }
}
