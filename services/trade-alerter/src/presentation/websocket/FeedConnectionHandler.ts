import type { Logger } from '@/application/interfaces/Logger';
import type { MarketDataAdapter, RawFeedData } from '@/application/interfaces/MarketDataAdapter';
import type { MetricsCollector } from '@/application/interfaces/MetricsCollector';
import type { HandleTradeUsecase } from '@/application/usecases/HandleTradeUsecase';
import type { FeedState, FeedStatus } from '@/domain/types';
import { LoggerFactory } from '@/infra/logger/LoggerFactory';
import type { BackoffStrategy } from '@/infra/reconnect/BackoffStrategy';
import { ReconnectManager } from '@/infra/reconnect/ReconnectManager';

export interface FeedConnectionHandlerOptions {
  backoff?: BackoffStrategy;
  logger?: Logger;
  metricsCollector?: MetricsCollector;
}

/**
 * プレゼンテーション層: フィード接続ハンドラ
 *
 * 責務: 1 つの (symbol, market) の接続維持・メッセージ受信
 * - 接続状態（DISCONNECTED / CONNECTING / STREAMING / BACKOFF）の管理
 * - 再接続管理
 * - メッセージを受信順に 1 件ずつ usecase に委譲
 */
export class FeedConnectionHandler {
  readonly reconnectManager: ReconnectManager;
  private readonly logger: Logger;
  private readonly metricsCollector?: MetricsCollector;
  private state: FeedState = 'DISCONNECTED';
  private backoffSeconds = 0;
  // 前のメッセージ（と配信）が終わるまで次のメッセージを処理しない
  private processing: Promise<void> = Promise.resolve();
  // チェーンに積まれて未処理のメッセージ数。1 件以上ある間は受信を止める
  private pending = 0;

  constructor(
    private readonly adapter: MarketDataAdapter,
    private readonly usecase: HandleTradeUsecase,
    options: FeedConnectionHandlerOptions = {}
  ) {
    this.logger = (options.logger ?? LoggerFactory.create()).child({
      market: adapter.market,
      symbol: adapter.symbol,
    });
    this.metricsCollector = options.metricsCollector;

    this.reconnectManager = new ReconnectManager(() => this.connect(), {
      backoff: options.backoff,
      logger: this.logger,
      metricsCollector: options.metricsCollector,
      onReconnectScheduled: (delayMs) => {
        this.state = 'BACKOFF';
        this.backoffSeconds = delayMs / 1000;
        this.logger.info('Reconnect scheduled', { delaySeconds: this.backoffSeconds });
      },
    });

    this.adapter.setOnMessage((data) => {
      this.enqueue(data);
    });

    this.adapter.setOnClose(() => {
      if (this.reconnectManager.isStopped()) {
        return;
      }
      this.state = 'BACKOFF';
      this.reconnectManager.scheduleReconnect();
    });

    this.adapter.setOnError(() => {
      // 再接続は close 側で扱う
      this.metricsCollector?.incrementError('connection_error');
    });
  }

  /**
   * 接続を開始する。
   * ReconnectManager を通じて接続を試み、失敗時は自動的に再接続をスケジュールする。
   */
  async start(): Promise<void> {
    await this.reconnectManager.start();
  }

  /**
   * 接続を切断し、再接続のスケジュールも停止する。処理中のメッセージは drain() で待つ。
   */
  stop(): void {
    this.reconnectManager.stop();
    this.adapter.disconnect();
    this.state = 'DISCONNECTED';
    this.backoffSeconds = 0;
  }

  /**
   * 受信済みメッセージの処理がすべて終わるまで待つ。
   */
  async drain(): Promise<void> {
    await this.processing;
  }

  getStatus(): FeedStatus {
    return {
      symbol: this.adapter.symbol,
      market: this.adapter.market,
      state: this.state,
      backoffSeconds: this.state === 'BACKOFF' ? this.backoffSeconds : 0,
    };
  }

  /**
   * メッセージを処理チェーンの末尾に積む。
   * 処理中は adapter の受信を止め、チェーンが空になったら再開する。
   * @param data WebSocket から受信した生データ
   */
  private enqueue(data: RawFeedData): void {
    this.pending += 1;
    if (this.pending === 1) {
      this.adapter.pause();
    }
    this.processing = this.processing
      .then(() => this.handleMessage(data))
      .finally(() => {
        this.pending -= 1;
        if (this.pending === 0) {
          this.adapter.resume();
        }
      });
  }

  private async handleMessage(data: RawFeedData): Promise<void> {
    try {
      await this.usecase.execute(data, this.adapter.symbol, this.adapter.market);
    } catch (error) {
      // 1 件の失敗で接続やチェーンを止めない
      this.logger.error('Failed to handle trade message', { err: error });
      this.metricsCollector?.incrementError('handler_error');
    }
  }

  private async connect(): Promise<void> {
    this.state = 'CONNECTING';
    try {
      await this.adapter.connect();
    } catch (error) {
      this.state = this.reconnectManager.isStopped() ? 'DISCONNECTED' : 'BACKOFF';
      throw error;
    }

    // 接続中に stop() された場合は開いたソケットを閉じる
    if (this.reconnectManager.isStopped()) {
      this.adapter.disconnect();
      this.state = 'DISCONNECTED';
      return;
    }

    this.state = 'STREAMING';
    this.backoffSeconds = 0;
    this.logger.info('Feed streaming');
  }
}
