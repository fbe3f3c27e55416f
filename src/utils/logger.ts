import winston from 'winston';

type LogLevel = 'debug' | 'info' | 'warn' | 'error';
type NodeEnv = 'development' | 'production' | 'test';

function buildFormat(nodeEnv: string | undefined): winston.Logform.Format {
  if (nodeEnv === 'production') {
    return winston.format.combine(
      winston.format.timestamp(),
      winston.format.errors({ stack: true }),
      winston.format.json()
    );
  }

  return winston.format.combine(
    winston.format.colorize(),
    winston.format.timestamp({ format: 'HH:mm:ss' }),
    winston.format.printf(({ timestamp, level, message, ...meta }) => {
      const extra = Object.keys(meta).length > 0 ? ` ${JSON.stringify(meta)}` : '';
      return `${timestamp} ${level}: ${message}${extra}`;
    })
  );
}

// 設定の読み込み前に出るログ用の初期値。main()でconfigureLoggerにより上書きされる
const logger = winston.createLogger({
  level: process.env.LOG_LEVEL || 'info',
  // テスト実行中はログを出さない
  silent: process.env.NODE_ENV === 'test',
  format: buildFormat(process.env.NODE_ENV),
  transports: [new winston.transports.Console()],
});

/**
 * 読み込んだ設定（.env を含む）をロガーに反映する
 */
export function configureLogger(level: LogLevel, nodeEnv: NodeEnv): void {
  logger.level = level;
  logger.silent = nodeEnv === 'test';
  logger.format = buildFormat(nodeEnv);
}

/**
 * ログ出力用にエラーをシリアライズ
 */
export function serializeError(error: unknown): unknown {
  return error instanceof Error
    ? { name: error.name, message: error.message, stack: error.stack }
    : error;
}

export default logger;
