import type { Logger } from '@/application/interfaces/Logger';
import type { MetricsCollector } from '@/application/interfaces/MetricsCollector';
import type { BroadcastDispatcher, BroadcastOutcome } from '@/application/services/BroadcastDispatcher';
import type { AggregateStats } from '@/application/services/AggregateStats';
import type { TradeClassifier } from '@/application/services/TradeClassifier';
import { DecodeError } from '@/domain/errors';
import type { Market } from '@/domain/types';

/**
 * アプリケーション層: 約定処理ユースケース
 *
 * 責務: 受信データを分類し、アラートがあれば配信する司令塔
 */
export class HandleTradeUsecase {
  constructor(
    private readonly classifier: TradeClassifier,
    private readonly dispatcher: BroadcastDispatcher,
    private readonly stats: AggregateStats,
    private readonly logger: Logger,
    private readonly metricsCollector?: MetricsCollector
  ) {}

  /**
   * @returns 配信を試みた場合はその結果。閾値未満・デコード失敗の場合は null
   */
  async execute(rawMessage: unknown, symbol: string, market: Market): Promise<BroadcastOutcome | null> {
    // 1. 分類（デコード → カウント → 閾値判定 → 本文生成）
    let alertText: string | null;
    try {
      alertText = this.classifier.classify(rawMessage, symbol, market);
    } catch (error) {
      if (!(error instanceof DecodeError)) {
        throw error;
      }
      // デコード失敗はこのメッセージだけをスキップし、接続は維持する
      this.logger.warn('Failed to decode trade message', { market, symbol, err: error });
      this.stats.recordDecodeError();
      this.metricsCollector?.incrementError('decode_error');
      return null;
    }

    // 2. 閾値未満なら何もしない
    if (alertText === null) {
      return null;
    }

    // 3. 配信
    return this.dispatcher.broadcast(alertText);
  }
}
