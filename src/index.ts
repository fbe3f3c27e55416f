import dotenv from 'dotenv';
import { DiscordClient } from './discord/discordClient';
import { MessageHandler } from './discord/messageHandler';
import { MessageDispatcher } from './discord/messageDispatcher';
import { CommandParser } from './commands/commandParser';
import { TranslationRelay } from './services/translationRelay';
import { GoogleTranslateClient } from './services/googleTranslateClient';
import { MyMemoryClient } from './services/myMemoryClient';
import { loadConfig } from './config/config';
import logger, { configureLogger, serializeError } from './utils/logger';

/**
 * クライアントを停止し、プロセスの終了コードを返す（rejectしない）
 */
export async function shutdownGracefully(
  discordClient: Pick<DiscordClient, 'shutdown'>,
  signal: string
): Promise<number> {
  logger.info(`Received ${signal}, shutting down gracefully`);
  try {
    await discordClient.shutdown();
    return 0;
  } catch (error) {
    logger.error('Failed to shut down cleanly', { error: serializeError(error) });
    return 1;
  }
}

export async function main(env: NodeJS.ProcessEnv): Promise<void> {
  try {
    logger.info('Starting Discord translation bot');

    // 設定が不正な場合はDiscordに接続する前に終了する
    const config = loadConfig(env);
    configureLogger(config.logLevel, config.nodeEnv);
    logger.info('Configuration loaded successfully', {
      nodeEnv: config.nodeEnv,
      logLevel: config.logLevel,
      allowedGuilds: config.allowedGuildIds.size,
    });

    // 依存関係の初期化
    const translationRelay = new TranslationRelay(
      new GoogleTranslateClient(config.googleTranslateUrl),
      new MyMemoryClient(config.myMemoryUrl, config.myMemoryEmail)
    );
    const messageHandler = new MessageHandler(
      new CommandParser(),
      translationRelay,
      config.allowedGuildIds
    );

    // DiscordClientの初期化と起動
    const discordClient = new DiscordClient(
      config.discordToken,
      messageHandler,
      new MessageDispatcher(),
      config.allowedGuildIds
    );

    await discordClient.start();

    // グレースフルシャットダウン
    const onSignal = (signal: string) => {
      void shutdownGracefully(discordClient, signal).then((code) => process.exit(code));
    };

    process.on('SIGINT', () => onSignal('SIGINT'));
    process.on('SIGTERM', () => onSignal('SIGTERM'));

    logger.info('Discord translation bot started successfully');
  } catch (error) {
    logger.error('Failed to start bot', { error: serializeError(error) });
    process.exit(1);
  }
}

if (require.main === module) {
  // 環境変数を読み込み
  dotenv.config();
  void main(process.env);
}
