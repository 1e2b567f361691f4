import type { Market } from '@/domain/types';

export interface StatsSnapshot {
  startedAt: number;
  totalTrades: number;
  tradesByMarket: Record<Market, Record<string, number>>;
  alertsGenerated: number;
  decodeErrors: number;
  broadcastsSent: number;
  deliveriesSucceeded: number;
}

/**
 * アプリケーション層: 集計カウンター
 *
 * 各カウンターは対応するデータ経路（分類器・配信器）だけが更新する。レポーターは snapshot() で読むのみ。
 */
export class AggregateStats {
  private readonly trades: Record<Market, Map<string, number>> = {
    SPOT: new Map(),
    FUTURES: new Map(),
  };
  private totalTrades = 0;
  private alertsGenerated = 0;
  private decodeErrors = 0;
  private broadcastsSent = 0;
  private deliveriesSucceeded = 0;

  constructor(readonly startedAt: number = Date.now()) {}

  recordTrade(market: Market, symbol: string): void {
    const counters = this.trades[market];
    counters.set(symbol, (counters.get(symbol) ?? 0) + 1);
    this.totalTrades += 1;
  }

  recordAlert(): void {
    this.alertsGenerated += 1;
  }

  recordDecodeError(): void {
    this.decodeErrors += 1;
  }

  /**
   * 1 回のブロードキャスト完了を記録する。
   * @param delivered 配信に成功した宛先数
   */
  recordBroadcast(delivered: number): void {
    this.broadcastsSent += 1;
    this.deliveriesSucceeded += delivered;
  }

  tradeCount(market: Market, symbol: string): number {
    return this.trades[market].get(symbol) ?? 0;
  }

  marketTotal(market: Market): number {
    let total = 0;
    for (const count of this.trades[market].values()) {
      total += count;
    }
    return total;
  }

  snapshot(): StatsSnapshot {
    return {
      startedAt: this.startedAt,
      totalTrades: this.totalTrades,
      tradesByMarket: {
        SPOT: Object.fromEntries(this.trades.SPOT),
        FUTURES: Object.fromEntries(this.trades.FUTURES),
      },
      alertsGenerated: this.alertsGenerated,
      decodeErrors: this.decodeErrors,
      broadcastsSent: this.broadcastsSent,
      deliveriesSucceeded: this.deliveriesSucceeded,
    };
  }
}
