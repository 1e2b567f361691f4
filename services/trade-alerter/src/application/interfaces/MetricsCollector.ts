import type { Market } from '@/domain/types';

/**
 * メトリクスレジストリの最小インターフェース
 * prom-client の Registry 型を抽象化
 */
export interface MetricsRegistry {
  contentType: string;
}

export type BroadcastOutcomeLabel = 'sent' | 'rate_limited' | 'no_recipients';

/**
 * メトリクス収集インターフェース
 *
 * 責務: メトリクスの収集・保持・公開を抽象化
 */
export interface MetricsCollector {
  /**
   * 受信した約定数をカウント
   */
  incrementTradeReceived(market: Market, symbol: string): void;

  /**
   * 閾値を超えて生成したアラート数をカウント
   */
  incrementAlertGenerated(market: Market, symbol: string): void;

  /**
   * ブロードキャストの結果をカウント
   */
  incrementBroadcast(outcome: BroadcastOutcomeLabel): void;

  /**
   * 宛先ごとの配信失敗をカウント
   * @param kind transient（一時的）/ permanent（宛先ブロック）
   */
  incrementDeliveryFailure(kind: 'transient' | 'permanent'): void;

  /**
   * エラー数をカウント
   * @param errorType エラータイプ（decode_error, persistence_error, poll_error など）
   */
  incrementError(errorType: string): void;

  /**
   * 再接続回数をカウント
   */
  incrementReconnect(): void;

  /**
   * 現在の宛先数を設定
   */
  setRecipientCount(count: number): void;

  /**
   * Prometheus 形式のメトリクス文字列を取得
   */
  getMetrics(): Promise<string>;

  /**
   * メトリクスレジストリを取得（HTTP サーバーで使用）
   */
  getRegistry(): MetricsRegistry;
}
