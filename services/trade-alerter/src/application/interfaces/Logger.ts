/**
 * 設定で指定できるログレベル
 */
export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

export const LOG_LEVELS: readonly LogLevel[] = ['debug', 'info', 'warn', 'error'];

/**
 * ロガーインターフェース
 *
 * 構造化ログを出力するためのインターフェース。実装は pino。
 * エラーは文字列連結せず `{ err }` としてメタデータに渡す。
 */
export interface Logger {
  debug(msg: string, meta?: object): void;
  info(msg: string, meta?: object): void;
  warn(msg: string, meta?: object): void;
  error(msg: string, meta?: object): void;

  /**
   * 子ロガーを作成
   * フィードごとの market / symbol などのコンテキストを自動付与するために使用
   */
  child(bindings: object): Logger;
}
