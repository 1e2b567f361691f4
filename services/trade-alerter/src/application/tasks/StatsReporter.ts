import type { Logger } from '@/application/interfaces/Logger';
import type { AggregateStats } from '@/application/services/AggregateStats';
import type { RecipientRegistry } from '@/application/services/RecipientRegistry';
import type { FeedStatus } from '@/domain/types';

export interface StatsReport {
  uptimeSeconds: number;
  spotTrades: number;
  futuresTrades: number;
  alertsGenerated: number;
  decodeErrors: number;
  broadcastsSent: number;
  deliveriesSucceeded: number;
  subscribers: number;
  threshold: number;
  feedsStreaming: number;
  feedsTotal: number;
}

/**
 * アプリケーション層: 統計の定期レポート
 *
 * 集計値を読むだけで、何も更新しない。
 */
export class StatsReporter {
  /**
   * @param feedStatuses 現在のフィード状態を返す関数
   */
  constructor(
    private readonly stats: AggregateStats,
    private readonly registry: RecipientRegistry,
    private readonly threshold: number,
    private readonly feedStatuses: () => FeedStatus[],
    private readonly logger: Logger,
    private readonly now: () => number = Date.now
  ) {}

  report(): StatsReport {
    const snapshot = this.stats.snapshot();
    const feeds = this.feedStatuses();
    const sum = (counters: Record<string, number>) => Object.values(counters).reduce((acc, n) => acc + n, 0);

    const report: StatsReport = {
      uptimeSeconds: Math.floor((this.now() - snapshot.startedAt) / 1000),
      spotTrades: sum(snapshot.tradesByMarket.SPOT),
      futuresTrades: sum(snapshot.tradesByMarket.FUTURES),
      alertsGenerated: snapshot.alertsGenerated,
      decodeErrors: snapshot.decodeErrors,
      broadcastsSent: snapshot.broadcastsSent,
      deliveriesSucceeded: snapshot.deliveriesSucceeded,
      subscribers: this.registry.size,
      threshold: this.threshold,
      feedsStreaming: feeds.filter((feed) => feed.state === 'STREAMING').length,
      feedsTotal: feeds.length,
    };

    this.logger.info('Stats', { ...report });
    this.logger.debug('Trades by symbol', { ...snapshot.tradesByMarket });
    return report;
  }
}
