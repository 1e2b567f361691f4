import { describe, expect, it } from 'vitest';
import { AggregateStats } from '@/application/services/AggregateStats';

/**
 * 単体テスト: AggregateStats
 */
describe('AggregateStats', () => {
  it('snapshot() はカウンターの現在値を返す', () => {
    const stats = new AggregateStats(1234);
    stats.recordTrade('SPOT', 'btcusdt');
    stats.recordTrade('SPOT', 'ethusdt');
    stats.recordTrade('FUTURES', 'btcusdt');
    stats.recordAlert();
    stats.recordDecodeError();
    stats.recordBroadcast(3);
    stats.recordBroadcast(0);

    expect(stats.snapshot()).toEqual({
      startedAt: 1234,
      totalTrades: 3,
      tradesByMarket: {
        SPOT: { btcusdt: 1, ethusdt: 1 },
        FUTURES: { btcusdt: 1 },
      },
      alertsGenerated: 1,
      decodeErrors: 1,
      broadcastsSent: 2,
      deliveriesSucceeded: 3,
    });
  });

  it('snapshot() の後の更新はスナップショットに反映されない', () => {
    const stats = new AggregateStats(0);
    stats.recordTrade('SPOT', 'btcusdt');
    const snapshot = stats.snapshot();

    stats.recordTrade('SPOT', 'btcusdt');

    expect(snapshot.tradesByMarket.SPOT).toEqual({ btcusdt: 1 });
  });
});
