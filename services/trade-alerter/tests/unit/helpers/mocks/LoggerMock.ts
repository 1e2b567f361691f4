import { type Mock, vi } from 'vitest';
import type { Logger } from '@/application/interfaces/Logger';

type LogFn = (msg: string, meta?: object) => void;

/**
 * テスト用ロガーモック
 *
 * child() は自分自身を返すので、子ロガー経由の出力も同じモックで検証できる。
 */
export class LoggerMock implements Logger {
  debug: Mock<LogFn> = vi.fn<LogFn>();
  info: Mock<LogFn> = vi.fn<LogFn>();
  warn: Mock<LogFn> = vi.fn<LogFn>();
  error: Mock<LogFn> = vi.fn<LogFn>();
  child: Mock<(bindings: object) => Logger> = vi.fn<(bindings: object) => Logger>(() => this);

  /**
   * 指定レベルで出力されたメッセージの一覧
   */
  messages(level: 'debug' | 'info' | 'warn' | 'error'): string[] {
    return this[level].mock.calls.map(([msg]) => msg);
  }
}
