import type { Market } from '@/domain/types';

/**
 * 受信した生データ（ws の RawData か文字列）
 */
export type RawFeedData = string | Buffer | ArrayBuffer | Buffer[];

/**
 * アプリケーション層: 取引所 WebSocket アダプタの共通インターフェイス
 *
 * 責務: 1 つの (symbol, market) ペアの接続を確立・切断し、受信データとイベントをコールバックで通知する。
 */
export interface MarketDataAdapter {
  readonly symbol: string;
  readonly market: Market;

  /**
   * WebSocket 接続を確立する。
   * @returns Promise<void> 接続が確立されたら解決される。失敗時は ConnectionError で reject
   */
  connect(): Promise<void>;

  /**
   * WebSocket 接続を切断する。切断後はコールバックを呼ばない。
   */
  disconnect(): void;

  /**
   * 受信を一時停止する。再接続後の新しい接続にも引き継ぐ。
   */
  pause(): void;

  resume(): void;

  setOnMessage(callback: (data: RawFeedData) => void): void;

  setOnClose(callback: () => void): void;

  setOnError(callback: (error: Error) => void): void;
}
