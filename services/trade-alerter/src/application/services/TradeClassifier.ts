import type { MessageParser } from '@/application/interfaces/MessageParser';
import type { MetricsCollector } from '@/application/interfaces/MetricsCollector';
import { type Market, notionalOf } from '@/domain/types';
import type { AggregateStats } from './AggregateStats';
import type { AlertFormatter } from './AlertFormatter';

/**
 * アプリケーション層: 約定の分類
 *
 * 責務: 生メッセージを TradeEvent に変換し、カウンターを更新し、
 * 想定元本が閾値以上ならアラート本文を返す。
 */
export class TradeClassifier {
  /**
   * @param minNotional アラート対象とする想定元本の下限（この値ちょうどを含む）
   */
  constructor(
    private readonly parser: MessageParser,
    private readonly formatter: AlertFormatter,
    private readonly stats: AggregateStats,
    private readonly minNotional: number,
    private readonly metricsCollector?: MetricsCollector
  ) {}

  /**
   * @returns アラート本文。閾値未満の場合は null
   * @throws {DecodeError} デコードに失敗した場合（カウンターは更新しない）
   */
  classify(rawMessage: unknown, symbol: string, market: Market): string | null {
    const event = this.parser.parse(rawMessage, symbol, market);

    // 閾値に関係なく必ずカウントする
    this.stats.recordTrade(market, symbol);
    this.metricsCollector?.incrementTradeReceived(market, symbol);

    if (notionalOf(event) < this.minNotional) {
      return null;
    }

    this.stats.recordAlert();
    this.metricsCollector?.incrementAlertGenerated(market, symbol);
    return this.formatter.format(event);
  }

  get threshold(): number {
    return this.minNotional;
  }
}
