import WebSocket from 'ws';
import { ConnectionError } from '@/domain/errors';
import type { Market } from '@/domain/types';
import type { WebSocketConnection } from '@/infra/websocket/interfaces/WebSocketConnection';
import { WsWebSocketConnection } from '@/infra/websocket/WsWebSocketConnection';

export interface BinanceEndpoints {
  spotWsUrl: string;
  futuresWsUrl: string;
}

export const DEFAULT_BINANCE_ENDPOINTS: BinanceEndpoints = {
  spotWsUrl: 'wss://stream.binance.com:9443/ws',
  futuresWsUrl: 'wss://fstream.binance.com/ws',
};

/**
 * (symbol, market) から raw trade ストリームの URL を組み立てる。
 */
export function buildTradeStreamUrl(endpoints: BinanceEndpoints, symbol: string, market: Market): string {
  const base = market === 'SPOT' ? endpoints.spotWsUrl : endpoints.futuresWsUrl;
  return `${base.replace(/\/+$/, '')}/${symbol.toLowerCase()}@trade`;
}

/**
 * インフラ層: Binance WebSocket 接続（低レベル）
 *
 * 責務: WebSocket 接続の確立のみ。Binance の raw ストリームは URL で購読が決まるため購読コマンドは送らない。
 */
export class BinanceWebSocketClient {
  /**
   * @param connectTimeoutMs オープニングハンドシェイクのタイムアウト（ミリ秒）
   */
  constructor(private readonly connectTimeoutMs: number) {}

  /**
   * WebSocket 接続を確立する。
   * @returns 接続が確立されたら解決される。失敗・タイムアウト時は ConnectionError で reject
   */
  async connect(wsUrl: string): Promise<WebSocketConnection> {
    return new Promise<WebSocketConnection>((resolve, reject) => {
      const socket = new WebSocket(wsUrl, { handshakeTimeout: this.connectTimeoutMs });
      const connection = new WsWebSocketConnection(socket);
      let settled = false;

      connection.onOpen(() => {
        settled = true;
        resolve(connection);
      });

      connection.onError((error) => {
        // 接続確立後のエラーはアダプタ側で扱う
        if (settled) {
          return;
        }
        settled = true;
        connection.removeAllListeners();
        connection.terminate();
        reject(new ConnectionError(`WebSocket connection failed: ${wsUrl}`, { cause: error }));
      });
    });
  }
}
