import type { Logger, LogLevel } from '@/application/interfaces/Logger';
import { PinoLogger } from './PinoLogger';

/**
 * ロガーファクトリー
 *
 * アプリケーション全体で同じロガーインスタンスを使用するシングルトン。
 * main で configure() してから各コンポーネントが create() で取得する。
 */
class LoggerFactory {
  private static instance: Logger | null = null;
  private static level: LogLevel = 'info';

  /**
   * 最初の create() より前に呼ぶ。既にインスタンスがある場合は作り直す。
   */
  static configure(options: { level: LogLevel }): void {
    LoggerFactory.level = options.level;
    LoggerFactory.instance = null;
  }

  /**
   * ロガーインスタンスを取得または作成
   *
   * `NODE_ENV` が production の場合は JSON 形式、それ以外は pretty 形式
   */
  static create(): Logger {
    if (LoggerFactory.instance === null) {
      const pretty = process.env.NODE_ENV !== 'production';
      LoggerFactory.instance = new PinoLogger({ level: LoggerFactory.level, pretty });
    }

    return LoggerFactory.instance;
  }

  /**
   * ロガーインスタンスをリセット（主にテスト用）
   */
  static reset(): void {
    LoggerFactory.instance = null;
    LoggerFactory.level = 'info';
  }
}

export { LoggerFactory };
