import type WebSocket from 'ws';
import type { RawFeedData } from '@/application/interfaces/MarketDataAdapter';
import type { WebSocketConnection } from './interfaces/WebSocketConnection';

/**
 * `ws` パッケージの WebSocket を使った WebSocket 接続の実装
 *
 * Node.js 20 には標準の WebSocket クライアントがないため `ws` を使う。
 * ソケットのイベントは内部のコールバック配列に中継し、removeAllListeners() で一括解除できるようにする。
 */
export class WsWebSocketConnection implements WebSocketConnection {
  private openCallbacks: Array<() => void> = [];
  private messageCallbacks: Array<(data: RawFeedData) => void> = [];
  private closeCallbacks: Array<(code: number, reason: string) => void> = [];
  private errorCallbacks: Array<(error: Error) => void> = [];

  constructor(private readonly socket: WebSocket) {
    this.socket.on('open', () => {
      for (const cb of this.openCallbacks) {
        cb();
      }
    });

    this.socket.on('message', (data: WebSocket.RawData) => {
      for (const cb of this.messageCallbacks) {
        cb(data);
      }
    });

    this.socket.on('close', (code: number, reason: Buffer) => {
      const text = reason.toString('utf-8');
      for (const cb of this.closeCallbacks) {
        cb(code, text);
      }
    });

    // ws は 'error' にリスナーがないと例外を投げるため、常に 1 つ登録しておく
    this.socket.on('error', (error: Error) => {
      for (const cb of this.errorCallbacks) {
        cb(error);
      }
    });
  }

  onOpen(callback: () => void): void {
    this.openCallbacks.push(callback);
  }

  onMessage(callback: (data: RawFeedData) => void): void {
    this.messageCallbacks.push(callback);
  }

  onClose(callback: (code: number, reason: string) => void): void {
    this.closeCallbacks.push(callback);
  }

  onError(callback: (error: Error) => void): void {
    this.errorCallbacks.push(callback);
  }

  send(data: string): void {
    this.socket.send(data);
  }

  pause(): void {
    this.socket.pause();
  }

  resume(): void {
    this.socket.resume();
  }

  close(): void {
    this.socket.close();
  }

  removeAllListeners(): void {
    this.openCallbacks = [];
    this.messageCallbacks = [];
    this.closeCallbacks = [];
    this.errorCallbacks = [];
  }

  terminate(): void {
    this.socket.terminate();
  }
}
