import { type Mock, vi } from 'vitest';
import type { MarketDataAdapter, RawFeedData } from '@/application/interfaces/MarketDataAdapter';
import type { Market } from '@/domain/types';

/**
 * コールバックを直接発火できる MarketDataAdapter
 */
export class FakeMarketDataAdapter implements MarketDataAdapter {
  connect: Mock<() => Promise<void>> = vi.fn<() => Promise<void>>(async () => {});
  disconnect: Mock<() => void> = vi.fn<() => void>();
  pause: Mock<() => void> = vi.fn<() => void>();
  resume: Mock<() => void> = vi.fn<() => void>();

  private onMessageCallback?: (data: RawFeedData) => void;
  private onCloseCallback?: () => void;
  private onErrorCallback?: (error: Error) => void;

  constructor(
    readonly symbol: string,
    readonly market: Market
  ) {}

  setOnMessage(callback: (data: RawFeedData) => void): void {
    this.onMessageCallback = callback;
  }

  setOnClose(callback: () => void): void {
    this.onCloseCallback = callback;
  }

  setOnError(callback: (error: Error) => void): void {
    this.onErrorCallback = callback;
  }

  emitMessage(data: RawFeedData): void {
    this.onMessageCallback?.(data);
  }

  emitClose(): void {
    this.onCloseCallback?.();
  }

  emitError(error: Error): void {
    this.onErrorCallback?.(error);
  }
}
