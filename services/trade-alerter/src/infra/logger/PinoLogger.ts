import pino from 'pino';
import type { Logger, LogLevel } from '@/application/interfaces/Logger';

export interface PinoLoggerOptions {
  level?: LogLevel;
  pretty?: boolean;
}

/**
 * pino を使用したロガー実装
 *
 * 開発環境では `pino-pretty` を使用して人間可読形式で出力。
 * 本番環境（NODE_ENV=production）では JSON 形式で出力。
 */
export class PinoLogger implements Logger {
  private readonly pinoLogger: pino.Logger;

  constructor(options?: PinoLoggerOptions | pino.Logger) {
    if (options && 'child' in options) {
      // child() から渡された pino インスタンスをそのまま使う
      this.pinoLogger = options;
      return;
    }

    const level = options?.level ?? 'info';
    const usePretty = options?.pretty ?? process.env.NODE_ENV !== 'production';

    if (usePretty) {
      this.pinoLogger = pino({
        level,
        transport: {
          target: 'pino-pretty',
          options: {
            colorize: true,
            translateTime: 'yyyy-mm-dd HH:MM:ss',
            ignore: 'pid,hostname',
          },
        },
      });
    } else {
      this.pinoLogger = pino({ level });
    }
  }

  debug(msg: string, meta?: object): void {
    this.pinoLogger.debug(meta ?? {}, msg);
  }

  info(msg: string, meta?: object): void {
    this.pinoLogger.info(meta ?? {}, msg);
  }

  warn(msg: string, meta?: object): void {
    this.pinoLogger.warn(meta ?? {}, msg);
  }

  error(msg: string, meta?: object): void {
    this.pinoLogger.error(meta ?? {}, msg);
  }

  child(bindings: object): Logger {
    return new PinoLogger(this.pinoLogger.child(bindings));
  }
}
