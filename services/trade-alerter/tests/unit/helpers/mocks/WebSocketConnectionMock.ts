import { type Mock, vi } from 'vitest';
import type { RawFeedData } from '@/application/interfaces/MarketDataAdapter';
import type { WebSocketConnection } from '@/infra/websocket/interfaces/WebSocketConnection';

/**
 * WebSocketConnection のモック
 *
 * 登録されたコールバックを保持し、emitXxx() でイベントを発火できる。
 * removeAllListeners() の後はイベントを発火しても何も呼ばれない。
 */
export class WebSocketConnectionMock implements WebSocketConnection {
  private openCallbacks: Array<() => void> = [];
  private messageCallbacks: Array<(data: RawFeedData) => void> = [];
  private closeCallbacks: Array<(code: number, reason: string) => void> = [];
  private errorCallbacks: Array<(error: Error) => void> = [];

  send: Mock<(data: string) => void> = vi.fn<(data: string) => void>();
  pause: Mock<() => void> = vi.fn<() => void>();
  resume: Mock<() => void> = vi.fn<() => void>();
  close: Mock<() => void> = vi.fn<() => void>();
  terminate: Mock<() => void> = vi.fn<() => void>();
  removeAllListeners: Mock<() => void> = vi.fn<() => void>(() => {
    this.openCallbacks = [];
    this.messageCallbacks = [];
    this.closeCallbacks = [];
    this.errorCallbacks = [];
  });

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

  emitOpen(): void {
    for (const cb of this.openCallbacks) {
      cb();
    }
  }

  emitMessage(data: RawFeedData): void {
    for (const cb of this.messageCallbacks) {
      cb(data);
    }
  }

  emitClose(code = 1006, reason = ''): void {
    for (const cb of this.closeCallbacks) {
      cb(code, reason);
    }
  }

  emitError(error: Error): void {
    for (const cb of this.errorCallbacks) {
      cb(error);
    }
  }
}
