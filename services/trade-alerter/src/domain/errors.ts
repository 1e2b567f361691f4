/**
 * ドメイン層: エラー分類
 *
 * 起動時の設定・認証エラーのみが致命的。フィード経路と配信経路のエラーはプロセスを終了させない。
 */
export class AlertError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
  }
}

/**
 * 単一メッセージのデコード失敗。ログを出してスキップする。
 */
export class DecodeError extends AlertError {}

/**
 * 接続レベルのエラー（タイムアウト、リセット、プロトコル違反）。BACKOFF に遷移する。
 */
export class ConnectionError extends AlertError {}

export type DeliveryErrorKind = 'transient' | 'permanent';

/**
 * 配信エラー。permanent は宛先がボットをブロックした場合。
 */
export class DeliveryError extends AlertError {
  constructor(
    message: string,
    readonly kind: DeliveryErrorKind,
    options?: { cause?: unknown }
  ) {
    super(message, options);
  }
}

/**
 * 設定の欠落・不正。起動時のみ発生し、致命的。
 */
export class ConfigurationError extends AlertError {}

/**
 * 通知トランスポートの認証確認に失敗した。起動時のみ発生し、致命的。
 */
export class TransportIdentityError extends AlertError {}

/**
 * 宛先スナップショットの読み書き失敗。メモリ上の状態が正とする。
 */
export class PersistenceError extends AlertError {}
