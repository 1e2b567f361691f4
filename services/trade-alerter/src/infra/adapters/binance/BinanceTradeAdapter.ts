import type { Logger } from '@/application/interfaces/Logger';
import type { MarketDataAdapter, RawFeedData } from '@/application/interfaces/MarketDataAdapter';
import type { Market } from '@/domain/types';
import { LoggerFactory } from '@/infra/logger/LoggerFactory';
import type { WebSocketConnection } from '@/infra/websocket/interfaces/WebSocketConnection';
import { type BinanceEndpoints, BinanceWebSocketClient, buildTradeStreamUrl } from './BinanceWebSocketClient';

/**
 * BinanceTradeAdapter の初期化オプション
 */
interface BinanceTradeAdapterOptions {
  endpoints: BinanceEndpoints;
  connectTimeoutMs: number;
  logger?: Logger;
  client?: BinanceWebSocketClient;
}

/**
 * インフラ層: MarketDataAdapter 実装
 *
 * 責務: 1 つの (symbol, market) の raw trade ストリームへの接続と、受信・切断・エラーの通知。
 */
export class BinanceTradeAdapter implements MarketDataAdapter {
  private connection: WebSocketConnection | null = null;
  private readonly webSocketClient: BinanceWebSocketClient;
  private readonly logger: Logger;
  private readonly wsUrl: string;
  private paused = false;

  private onMessageCallback?: (data: RawFeedData) => void;
  private onCloseCallback?: () => void;
  private onErrorCallback?: (error: Error) => void;

  /**
   * @param symbol 取引ペア（例: 'btcusdt'）
   * @param market SPOT または FUTURES
   */
  constructor(
    readonly symbol: string,
    readonly market: Market,
    options: BinanceTradeAdapterOptions
  ) {
    this.logger = options.logger ?? LoggerFactory.create();
    this.webSocketClient = options.client ?? new BinanceWebSocketClient(options.connectTimeoutMs);
    this.wsUrl = buildTradeStreamUrl(options.endpoints, symbol, market);
  }

  setOnMessage(callback: (data: RawFeedData) => void): void {
    this.onMessageCallback = callback;
  }

  setOnClose(callback: () => void): void {
    this.onCloseCallback = callback;
  }

  setOnError(callback: (error: Error) => void): void {
    this.onErrorCallback = callback;
  }

  /**
   * WebSocket 接続を確立する。
   * 既存の接続がある場合はリスナーを外して破棄してから新規接続を試みる。
   */
  async connect(): Promise<void> {
    this.release();

    const connection = await this.webSocketClient.connect(this.wsUrl);
    this.connection = connection;
    if (this.paused) {
      connection.pause();
    }

    connection.onMessage((data) => {
      this.onMessageCallback?.(data);
    });

    connection.onClose((code, reason) => {
      this.logger.warn('socket closed', { url: this.wsUrl, code, reason });
      this.connection = null;
      connection.removeAllListeners();
      this.onCloseCallback?.();
    });

    connection.onError((error) => {
      // ws は error の後に必ず close を発火するので、再接続は close 側で扱う
      this.logger.error('socket error', { url: this.wsUrl, err: error });
      this.onErrorCallback?.(error);
    });
  }

  pause(): void {
    this.paused = true;
    this.connection?.pause();
  }

  resume(): void {
    this.paused = false;
    this.connection?.resume();
  }

  /**
   * WebSocket 接続を切断する。リスナーを先に外すので close コールバックは呼ばれない。
   */
  disconnect(): void {
    const connection = this.connection;
    this.connection = null;
    if (connection) {
      connection.removeAllListeners();
      connection.close();
    }
  }

  private release(): void {
    if (this.connection) {
      this.connection.removeAllListeners();
      this.connection.terminate();
      this.connection = null;
    }
  }
}
