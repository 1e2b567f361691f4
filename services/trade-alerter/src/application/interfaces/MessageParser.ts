import type { Market, TradeEvent } from '@/domain/types';

/**
 * 約定メッセージパーサーのインターフェイス（インフラ層で実装される）。
 */
export interface MessageParser {
  /**
   * 取引所固有の生メッセージを TradeEvent に変換する。
   * @param rawMessage WebSocket から受信した生データ、またはパース済みオブジェクト
   * @throws {DecodeError} 必須フィールドの欠落や不正な値の場合
   */
  parse(rawMessage: unknown, symbol: string, market: Market): TradeEvent;
}
