/**
 * ドメイン層: ビジネス概念の型定義
 *
 * 注意: エンティティクラスは作らない。約定・接続状態・配信結果を表す型のみを持つ。
 */

/**
 * 監視対象の市場種別。
 */
export type Market = 'SPOT' | 'FUTURES';

export const MARKETS: readonly Market[] = ['SPOT', 'FUTURES'];

/**
 * 約定の方向（テイカー側）。
 * buyer が maker の場合は売りが成行（sell）、そうでなければ買いが成行（buy）。
 */
export type TradeSide = 'buy' | 'sell';

/**
 * 正規化された約定イベント。構築後は変更しない。
 */
export interface TradeEvent {
  /** 取引ペア（例: 'btcusdt'） */
  readonly symbol: string;
  readonly market: Market;
  readonly price: number;
  readonly quantity: number;
  /** 買い手が板に置いていた側（maker）かどうか */
  readonly isBuyerMaker: boolean;
  /** 約定時刻（エポックミリ秒） */
  readonly eventTimeMillis: number;
}

/**
 * 約定の想定元本（price × quantity）。
 */
export function notionalOf(event: TradeEvent): number {
  return event.price * event.quantity;
}

export function sideOf(event: TradeEvent): TradeSide {
  return event.isBuyerMaker ? 'sell' : 'buy';
}

/**
 * フィード接続の状態。
 *
 * DISCONNECTED → CONNECTING → STREAMING → (切断/エラー) → BACKOFF → CONNECTING ...
 */
export type FeedState = 'DISCONNECTED' | 'CONNECTING' | 'STREAMING' | 'BACKOFF';

export interface FeedStatus {
  readonly symbol: string;
  readonly market: Market;
  readonly state: FeedState;
  /** 直近の BACKOFF で待機した秒数（BACKOFF 以外では 0） */
  readonly backoffSeconds: number;
}

/**
 * 通知の宛先 ID（Telegram の chat id）。
 */
export type RecipientId = number;

/**
 * 1 宛先への配信結果。
 * - delivered: 配信成功
 * - unreachable: 宛先がボットをブロック／削除した（恒久的な失敗）
 * - failed: その他の失敗（一時的な失敗）
 */
export type DeliveryResult =
  | { status: 'delivered' }
  | { status: 'unreachable'; reason: string }
  | { status: 'failed'; reason: string };
