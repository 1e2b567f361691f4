import type { RawFeedData } from '@/application/interfaces/MarketDataAdapter';

/**
 * インフラ層: 取引所非依存の WebSocket 接続ラッパ（インターフェース）
 *
 * 責務: WebSocket 接続の確立・管理・イベント処理を抽象化する。
 */
export interface WebSocketConnection {
  /**
   * 接続が確立されたときに呼ばれるコールバック
   */
  onOpen(callback: () => void): void;

  /**
   * メッセージを受信したときに呼ばれるコールバック
   */
  onMessage(callback: (data: RawFeedData) => void): void;

  /**
   * 接続が閉じられたときに呼ばれるコールバック
   */
  onClose(callback: (code: number, reason: string) => void): void;

  /**
   * エラーが発生したときに呼ばれるコールバック
   */
  onError(callback: (error: Error) => void): void;

  send(data: string): void;

  /**
   * 受信を一時停止する。停止中はソケットから読まず、バッファ済みのメッセージだけが届く。
   */
  pause(): void;

  resume(): void;

  /**
   * 接続を閉じる（クローズハンドシェイクを行う）
   */
  close(): void;

  /**
   * すべてのイベントリスナーを削除する
   */
  removeAllListeners(): void;

  /**
   * 接続を強制終了する
   */
  terminate(): void;
}
