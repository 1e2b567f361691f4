import type { Logger } from '@/application/interfaces/Logger';
import type { MetricsCollector } from '@/application/interfaces/MetricsCollector';
import { LoggerFactory } from '@/infra/logger/LoggerFactory';
import { BackoffStrategy } from '@/infra/reconnect/BackoffStrategy';

export interface ReconnectManagerOptions {
  backoff?: BackoffStrategy;
  logger?: Logger;
  metricsCollector?: MetricsCollector;
  /** 再接続タイマーを設定したときに遅延（ミリ秒）を通知する */
  onReconnectScheduled?: (delayMs: number) => void;
}

/**
 * インフラ層: 再接続スケジューラ（connect 関数を受け取って再試行）
 *
 * 責務: 再接続のスケジュール管理。接続関数を受け取り、失敗時に自動的に再接続を試みる。
 * 停止されるまで再試行を続ける（終端状態はない）。
 */
export class ReconnectManager {
  private readonly backoff: BackoffStrategy;
  private readonly logger: Logger;
  private readonly metricsCollector?: MetricsCollector;
  private readonly onReconnectScheduled?: (delayMs: number) => void;
  private reconnectTimer: NodeJS.Timeout | null = null;
  private stopped = false;

  /**
   * @param connectFn 再接続時に実行する接続関数
   */
  constructor(
    private readonly connectFn: () => Promise<void>,
    options: ReconnectManagerOptions = {}
  ) {
    this.backoff = options.backoff ?? new BackoffStrategy({ baseDelayMs: 5000 });
    this.logger = options.logger ?? LoggerFactory.create();
    this.metricsCollector = options.metricsCollector;
    this.onReconnectScheduled = options.onReconnectScheduled;
  }

  /**
   * 再接続管理を開始する。最初の接続試行が終わる（成功または再接続予約）と解決される。
   */
  async start(): Promise<void> {
    this.stopped = false;
    await this.safeConnect();
  }

  /**
   * 再接続をスケジュールする。
   * 既に停止されている場合は何もしない。既存のタイマーは上書きする。
   */
  scheduleReconnect(): void {
    if (this.stopped) {
      return;
    }
    const delay = this.backoff.getNextDelay();
    if (this.reconnectTimer) {
      clearTimeout(this.reconnectTimer);
    }
    this.reconnectTimer = setTimeout(() => {
      this.reconnectTimer = null;
      void this.safeConnect();
    }, delay);
    this.onReconnectScheduled?.(delay);
  }

  /**
   * 再接続管理を停止する。
   */
  stop(): void {
    this.stopped = true;
    if (this.reconnectTimer) {
      clearTimeout(this.reconnectTimer);
      this.reconnectTimer = null;
    }
  }

  isStopped(): boolean {
    return this.stopped;
  }

  /**
   * 安全に接続を試みる。
   * 成功時はバックオフをリセットし、失敗時は再接続をスケジュールする。
   */
  private async safeConnect(): Promise<void> {
    if (this.stopped) {
      return;
    }
    try {
      await this.connectFn();
      this.backoff.reset();
    } catch (error) {
      this.logger.error('Reconnect attempt failed', { err: error });

      // メトリクス収集: 再接続回数
      this.metricsCollector?.incrementReconnect();

      this.scheduleReconnect();
    }
  }
}
