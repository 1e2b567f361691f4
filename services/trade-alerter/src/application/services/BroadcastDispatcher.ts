import type { Logger } from '@/application/interfaces/Logger';
import type { MetricsCollector } from '@/application/interfaces/MetricsCollector';
import type { NotificationTransport } from '@/application/interfaces/NotificationTransport';
import type { DeliveryResult, RecipientId } from '@/domain/types';
import type { AggregateStats } from './AggregateStats';
import type { RateLimiter } from './RateLimiter';
import type { RecipientRegistry } from './RecipientRegistry';

export type BroadcastOutcome =
  | { status: 'skipped'; reason: 'no-recipients' | 'rate-limited' }
  | { status: 'sent'; delivered: number; transientFailures: number; removed: RecipientId[] };

interface PassResult {
  delivered: number;
  transientFailures: number;
  unreachable: RecipientId[];
}

export interface BroadcastDispatcherOptions {
  /** 1 宛先あたりの配信タイムアウト（ミリ秒） */
  deliveryTimeoutMs: number;
  logger: Logger;
  metricsCollector?: MetricsCollector;
}

/**
 * 配信をタイムアウト付きで実行する。タイムアウト・例外は一時的な失敗として扱う。
 */
async function deliverWithTimeout(
  transport: NotificationTransport,
  recipient: RecipientId,
  text: string,
  timeoutMs: number
): Promise<DeliveryResult> {
  let timer: NodeJS.Timeout | undefined;
  const timeout = new Promise<DeliveryResult>((resolve) => {
    timer = setTimeout(() => {
      resolve({ status: 'failed', reason: `delivery timed out after ${timeoutMs}ms` });
    }, timeoutMs);
  });

  try {
    return await Promise.race([transport.deliver(recipient, text), timeout]);
  } catch (error) {
    return { status: 'failed', reason: error instanceof Error ? error.message : String(error) };
  } finally {
    clearTimeout(timer);
  }
}

/**
 * アプリケーション層: アラートの一斉配信
 *
 * 責務: レート制限を確認し、宛先のスナップショットに順に配信し、
 * ボットをブロックした宛先をまとめて削除する。スキップしたアラートは再送しない。
 */
export class BroadcastDispatcher {
  private readonly logger: Logger;
  private readonly deliveryTimeoutMs: number;
  private readonly metricsCollector?: MetricsCollector;

  constructor(
    private readonly registry: RecipientRegistry,
    private readonly rateLimiter: RateLimiter,
    private readonly transport: NotificationTransport,
    private readonly stats: AggregateStats,
    options: BroadcastDispatcherOptions
  ) {
    this.deliveryTimeoutMs = options.deliveryTimeoutMs;
    this.logger = options.logger;
    this.metricsCollector = options.metricsCollector;
  }

  async broadcast(alertText: string): Promise<BroadcastOutcome> {
    if (this.registry.size === 0) {
      this.logger.warn('No recipients to notify, alert dropped');
      this.metricsCollector?.incrementBroadcast('no_recipients');
      return { status: 'skipped', reason: 'no-recipients' };
    }

    if (!this.rateLimiter.admit()) {
      this.logger.warn('Notification rate limit reached, alert dropped');
      this.metricsCollector?.incrementBroadcast('rate_limited');
      return { status: 'skipped', reason: 'rate-limited' };
    }

    let pass: PassResult;
    try {
      pass = await this.deliverToAll(alertText);
    } catch (error) {
      this.rateLimiter.release();
      throw error;
    }
    const { delivered, transientFailures, unreachable } = pass;

    this.stats.recordBroadcast(delivered);
    this.rateLimiter.record();
    this.metricsCollector?.incrementBroadcast('sent');

    this.logger.info('Alert broadcast', {
      delivered,
      transientFailures,
      removed: unreachable.length,
    });

    return { status: 'sent', delivered, transientFailures, removed: unreachable };
  }

  /**
   * 宛先のスナップショットに順に配信し、ボットをブロックした宛先を 1 回の書き込みで削除する。
   */
  private async deliverToAll(alertText: string): Promise<PassResult> {
    // 配信中の追加・削除はライブの集合に反映し、このスナップショットは変えない
    const recipients = this.registry.snapshot();
    const unreachable: RecipientId[] = [];
    let delivered = 0;
    let transientFailures = 0;

    for (const recipient of recipients) {
      const result = await deliverWithTimeout(this.transport, recipient, alertText, this.deliveryTimeoutMs);
      switch (result.status) {
        case 'delivered':
          delivered += 1;
          break;
        case 'unreachable':
          unreachable.push(recipient);
          this.logger.warn('Recipient unreachable, scheduling removal', { recipient, reason: result.reason });
          this.metricsCollector?.incrementDeliveryFailure('permanent');
          break;
        case 'failed':
          transientFailures += 1;
          this.logger.warn('Delivery failed', { recipient, reason: result.reason });
          this.metricsCollector?.incrementDeliveryFailure('transient');
          break;
      }
    }

    if (unreachable.length > 0) {
      await this.registry.removeMany(unreachable);
    }

    return { delivered, transientFailures, unreachable };
  }
}
