import { Client, GatewayIntentBits, Events, Message, Partials } from 'discord.js';
import { MessageHandler } from './messageHandler';
import { MessageDispatcher } from './messageDispatcher';
import { toInboundMessage } from './inboundMessage';
import logger, { serializeError } from '../utils/logger';

export class DiscordClient {
  private client: Client;

  constructor(
    private token: string,
    private messageHandler: MessageHandler,
    private dispatcher: MessageDispatcher,
    private allowedGuildIds: ReadonlySet<string>
  ) {
    this.client = new Client({
      intents: [
        GatewayIntentBits.Guilds,
        GatewayIntentBits.GuildMessages,
        GatewayIntentBits.DirectMessages,
        GatewayIntentBits.MessageContent,
      ],
      // DMチャンネルはキャッシュされないため Channel パーシャルが必要
      partials: [Partials.Channel],
    });
  }

  async start(): Promise<void> {
    // readyイベント
    this.client.once(Events.ClientReady, (client) => {
      logger.info('Discord bot is ready', {
        tag: client.user.tag,
        id: client.user.id,
        guilds: client.guilds.cache.size,
        allowedGuilds: [...this.allowedGuildIds],
      });
    });

    // messageCreateイベント
    this.client.on(Events.MessageCreate, async (message: Message) => {
      await this.onMessage(message);
    });

    // エラーイベント
    this.client.on(Events.Error, (error) => {
      logger.error('Discord client error', { error: serializeError(error) });
    });

    // ログイン
    logger.info('Attempting to login to Discord');
    try {
      await this.client.login(this.token);
      logger.info('Discord login successful');
    } catch (error) {
      logger.error('Discord login failed', { error: serializeError(error) });
      throw error;
    }
  }

  async shutdown(): Promise<void> {
    logger.info('Shutting down Discord bot');
    await this.client.destroy();
  }

  private async onMessage(message: Message): Promise<void> {
    try {
      const actions = await this.messageHandler.handle(toInboundMessage(message));
      await this.dispatcher.dispatch(message, actions);
    } catch (error) {
      // 返信の送信失敗などはここで止める
      logger.error('Error handling message', {
        messageId: message.id,
        channelId: message.channelId,
        content: message.content.substring(0, 50), // 最初の50文字のみ
        error: serializeError(error),
      });
    }
  }
}
