import type { Logger } from '@/application/interfaces/Logger';
import type { MetricsCollector } from '@/application/interfaces/MetricsCollector';
import type { NotificationTransport } from '@/application/interfaces/NotificationTransport';
import type { RecipientRegistry } from '@/application/services/RecipientRegistry';

/**
 * アプリケーション層: 新規購読者の取り込み
 *
 * ボットにメッセージを送ってきた送信者を宛先に追加する。永続化は 1 周期につき 1 回。
 */
export class InboxPoller {
  constructor(
    private readonly transport: NotificationTransport,
    private readonly registry: RecipientRegistry,
    private readonly batchSize: number,
    private readonly logger: Logger,
    private readonly metricsCollector?: MetricsCollector
  ) {}

  /**
   * @returns 新規に追加した宛先数。取得に失敗した場合は 0
   */
  async poll(): Promise<number> {
    let senders: number[];
    try {
      senders = await this.transport.fetchInboundSenders(this.batchSize);
    } catch (error) {
      this.logger.error('Failed to fetch inbound messages', { err: error });
      this.metricsCollector?.incrementError('poll_error');
      return 0;
    }

    const added = await this.registry.addMany(senders);
    if (added > 0) {
      this.logger.info('New subscribers', { added, total: this.registry.size });
    }
    if (this.registry.size === 0) {
      this.logger.warn('No subscribers yet, send any message to the bot to subscribe');
    }
    return added;
  }
}
