import { FakeMarketDataAdapter } from '@test/unit/helpers/fakes/FakeMarketDataAdapter';
import { createPipeline } from '@test/unit/helpers/pipeline';
import { rawTrade } from '@test/unit/helpers/trades';
import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest';
import { ConnectionError } from '@/domain/errors';
import type { DeliveryResult } from '@/domain/types';
import { BackoffStrategy } from '@/infra/reconnect/BackoffStrategy';
import { FeedConnectionHandler } from '@/presentation/websocket/FeedConnectionHandler';

/**
 * 単体テスト: FeedConnectionHandler
 *
 * - 接続状態の遷移（CONNECTING / STREAMING / BACKOFF / DISCONNECTED）
 * - 切断からの復旧
 * - メッセージを 1 件ずつ順に処理し、処理中は受信を止める
 * - stop() の動作
 */
describe('FeedConnectionHandler', () => {
  let pipeline: ReturnType<typeof createPipeline>;

  function createHandler(adapter: FakeMarketDataAdapter) {
    return new FeedConnectionHandler(adapter, pipeline.usecase, {
      backoff: new BackoffStrategy({ baseDelayMs: 5000 }),
      logger: pipeline.logger,
      metricsCollector: pipeline.metrics,
    });
  }

  beforeEach(async () => {
    pipeline = createPipeline({ minNotional: 1_000_000 });
    await pipeline.registry.addMany([1]);
  });

  describe('接続状態', () => {
    beforeEach(() => {
      vi.useFakeTimers();
    });

    afterEach(() => {
      vi.useRealTimers();
    });

    it('開始前は DISCONNECTED、接続後は STREAMING', async () => {
      const adapter = new FakeMarketDataAdapter('btcusdt', 'SPOT');
      const handler = createHandler(adapter);
      expect(handler.getStatus()).toEqual({
        symbol: 'btcusdt',
        market: 'SPOT',
        state: 'DISCONNECTED',
        backoffSeconds: 0,
      });

      await handler.start();

      expect(adapter.connect).toHaveBeenCalledTimes(1);
      expect(handler.getStatus().state).toBe('STREAMING');
      expect(pipeline.logger.child).toHaveBeenCalledWith({ market: 'SPOT', symbol: 'btcusdt' });
      handler.stop();
    });

    it('接続中は CONNECTING', async () => {
      const adapter = new FakeMarketDataAdapter('btcusdt', 'SPOT');
      let open: () => void = () => {};
      adapter.connect.mockImplementationOnce(
        () =>
          new Promise<void>((resolve) => {
            open = resolve;
          })
      );
      const handler = createHandler(adapter);

      const starting = handler.start();
      expect(handler.getStatus().state).toBe('CONNECTING');

      open();
      await starting;
      expect(handler.getStatus().state).toBe('STREAMING');
      handler.stop();
    });

    it('接続に失敗すると BACKOFF になり、遅延後に再接続する', async () => {
      const adapter = new FakeMarketDataAdapter('btcusdt', 'SPOT');
      adapter.connect.mockRejectedValueOnce(new ConnectionError('refused'));
      const handler = createHandler(adapter);

      await handler.start();
      expect(handler.getStatus()).toEqual({
        symbol: 'btcusdt',
        market: 'SPOT',
        state: 'BACKOFF',
        backoffSeconds: 5,
      });

      await vi.advanceTimersByTimeAsync(5000);

      expect(adapter.connect).toHaveBeenCalledTimes(2);
      expect(handler.getStatus()).toEqual({
        symbol: 'btcusdt',
        market: 'SPOT',
        state: 'STREAMING',
        backoffSeconds: 0,
      });
      handler.stop();
    });

    it('ストリーミング中の切断で BACKOFF になり、復旧後は配信を再開する', async () => {
      const adapter = new FakeMarketDataAdapter('btcusdt', 'SPOT');
      const handler = createHandler(adapter);
      await handler.start();

      adapter.emitClose();
      expect(handler.getStatus().state).toBe('BACKOFF');
      expect(handler.getStatus().backoffSeconds).toBe(5);

      await vi.advanceTimersByTimeAsync(5000);
      expect(handler.getStatus().state).toBe('STREAMING');

      adapter.emitMessage(rawTrade({ p: '50000', q: '25' }));
      await handler.drain();
      expect(pipeline.transport.deliveredTo).toEqual([1]);
      handler.stop();
    });

    it('1 つのフィードの切断は他のフィードに影響しない', async () => {
      const spot = new FakeMarketDataAdapter('btcusdt', 'SPOT');
      const futures = new FakeMarketDataAdapter('btcusdt', 'FUTURES');
      const spotHandler = createHandler(spot);
      const futuresHandler = createHandler(futures);
      await Promise.all([spotHandler.start(), futuresHandler.start()]);

      spot.emitClose();
      futures.emitMessage(rawTrade({ p: '50000', q: '25' }));
      await futuresHandler.drain();

      expect(spotHandler.getStatus().state).toBe('BACKOFF');
      expect(futuresHandler.getStatus().state).toBe('STREAMING');
      expect(futures.connect).toHaveBeenCalledTimes(1);
      expect(pipeline.transport.deliveredTo).toEqual([1]);

      spotHandler.stop();
      futuresHandler.stop();
    });

    it('socket error はメトリクスに記録し、再接続は close 側に任せる', async () => {
      const adapter = new FakeMarketDataAdapter('btcusdt', 'SPOT');
      const handler = createHandler(adapter);
      await handler.start();

      adapter.emitError(new Error('ECONNRESET'));

      expect(pipeline.metrics.incrementError).toHaveBeenCalledWith('connection_error');
      expect(handler.getStatus().state).toBe('STREAMING');
      expect(vi.getTimerCount()).toBe(0);
      handler.stop();
    });
  });

  describe('stop()', () => {
    beforeEach(() => {
      vi.useFakeTimers();
    });

    afterEach(() => {
      vi.useRealTimers();
    });

    it('切断して DISCONNECTED に戻し、以降の close で再接続しない', async () => {
      const adapter = new FakeMarketDataAdapter('btcusdt', 'SPOT');
      const handler = createHandler(adapter);
      await handler.start();

      handler.stop();
      adapter.emitClose();
      await vi.advanceTimersByTimeAsync(10_000);

      expect(adapter.disconnect).toHaveBeenCalledTimes(1);
      expect(adapter.connect).toHaveBeenCalledTimes(1);
      expect(handler.getStatus().state).toBe('DISCONNECTED');
    });

    it('BACKOFF 中の stop() は予約済みの再接続をキャンセルする', async () => {
      const adapter = new FakeMarketDataAdapter('btcusdt', 'SPOT');
      adapter.connect.mockRejectedValue(new ConnectionError('refused'));
      const handler = createHandler(adapter);
      await handler.start();

      handler.stop();
      await vi.advanceTimersByTimeAsync(10_000);

      expect(adapter.connect).toHaveBeenCalledTimes(1);
      expect(handler.getStatus()).toEqual({
        symbol: 'btcusdt',
        market: 'SPOT',
        state: 'DISCONNECTED',
        backoffSeconds: 0,
      });
    });

    it('接続中に stop() された場合は開いた接続を閉じる', async () => {
      const adapter = new FakeMarketDataAdapter('btcusdt', 'SPOT');
      let open: () => void = () => {};
      adapter.connect.mockImplementationOnce(
        () =>
          new Promise<void>((resolve) => {
            open = resolve;
          })
      );
      const handler = createHandler(adapter);

      const starting = handler.start();
      handler.stop();
      open();
      await starting;

      expect(adapter.disconnect).toHaveBeenCalledTimes(2);
      expect(handler.getStatus().state).toBe('DISCONNECTED');
    });
  });

  describe('メッセージ処理', () => {
    it('前のメッセージの処理が終わるまで次のメッセージを処理しない', async () => {
      const adapter = new FakeMarketDataAdapter('btcusdt', 'SPOT');
      const handler = createHandler(adapter);
      await handler.start();
      const order: string[] = [];
      let releaseFirst: () => void = () => {};
      const execute = vi.spyOn(pipeline.usecase, 'execute');
      execute.mockImplementationOnce(async (raw) => {
        order.push(`start:${String(raw)}`);
        await new Promise<void>((resolve) => {
          releaseFirst = resolve;
        });
        order.push(`end:${String(raw)}`);
        return null;
      });
      execute.mockImplementationOnce(async (raw) => {
        order.push(`start:${String(raw)}`);
        return null;
      });

      adapter.emitMessage('first');
      adapter.emitMessage('second');
      await new Promise((resolve) => setImmediate(resolve));
      expect(order).toEqual(['start:first']);

      releaseFirst();
      await handler.drain();

      expect(order).toEqual(['start:first', 'end:first', 'start:second']);
      expect(execute).toHaveBeenCalledWith('second', 'btcusdt', 'SPOT');
      handler.stop();
    });

    it('処理中の例外はログに残し、次のメッセージを処理する', async () => {
      const adapter = new FakeMarketDataAdapter('btcusdt', 'SPOT');
      const handler = createHandler(adapter);
      await handler.start();
      const error = new Error('boom');
      const execute = vi.spyOn(pipeline.usecase, 'execute');
      execute.mockRejectedValueOnce(error);

      adapter.emitMessage('first');
      adapter.emitMessage(rawTrade({ p: '50000', q: '25' }));
      await handler.drain();

      expect(execute).toHaveBeenCalledTimes(2);
      expect(pipeline.logger.error).toHaveBeenCalledWith('Failed to handle trade message', { err: error });
      expect(pipeline.metrics.incrementError).toHaveBeenCalledWith('handler_error');
      expect(pipeline.transport.deliveredTo).toEqual([1]);
      handler.stop();
    });

    it('デコードできないメッセージがあっても接続は維持する', async () => {
      const adapter = new FakeMarketDataAdapter('btcusdt', 'SPOT');
      const handler = createHandler(adapter);
      await handler.start();

      adapter.emitMessage('not json');
      await handler.drain();

      expect(handler.getStatus().state).toBe('STREAMING');
      expect(adapter.disconnect).not.toHaveBeenCalled();
      expect(pipeline.stats.snapshot().decodeErrors).toBe(1);
      handler.stop();
    });

    it('配信が終わらない間は受信を止め、処理がすべて終わると再開する', async () => {
      const adapter = new FakeMarketDataAdapter('btcusdt', 'SPOT');
      const handler = createHandler(adapter);
      await handler.start();
      let finishDelivery: () => void = () => {};
      pipeline.transport.respondWith(
        1,
        () =>
          new Promise<DeliveryResult>((resolve) => {
            finishDelivery = () => resolve({ status: 'delivered' });
          })
      );

      adapter.emitMessage(rawTrade({ p: '50000', q: '25' }));
      adapter.emitMessage(rawTrade({ p: '1', q: '1' }));
      await new Promise((resolve) => setImmediate(resolve));

      expect(adapter.pause).toHaveBeenCalledTimes(1);
      expect(adapter.resume).not.toHaveBeenCalled();
      expect(pipeline.stats.tradeCount('SPOT', 'btcusdt')).toBe(1);

      finishDelivery();
      await handler.drain();

      expect(adapter.resume).toHaveBeenCalledTimes(1);
      expect(pipeline.stats.tradeCount('SPOT', 'btcusdt')).toBe(2);
      handler.stop();
    });
  });
});
