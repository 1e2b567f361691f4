import { Counter, Gauge, Registry } from 'prom-client';
import type {
  BroadcastOutcomeLabel,
  MetricsCollector,
  MetricsRegistry,
} from '@/application/interfaces/MetricsCollector';
import type { Market } from '@/domain/types';

/**
 * Prometheus メトリクスコレクター実装
 * テストで別レジストリを使用するため、シングルトンにはしていない。
 */
export class PrometheusMetricsCollector implements MetricsCollector {
  private readonly register: Registry;
  private readonly tradesCounter: Counter<'market' | 'symbol'>;
  private readonly alertsCounter: Counter<'market' | 'symbol'>;
  private readonly broadcastsCounter: Counter<'outcome'>;
  private readonly deliveryFailuresCounter: Counter<'kind'>;
  private readonly errorCounter: Counter<'error_type'>;
  private readonly reconnectCounter: Counter;
  private readonly recipientsGauge: Gauge;

  constructor() {
    this.register = new Registry();

    this.tradesCounter = new Counter({
      name: 'alerter_trades_received_total',
      help: 'Total number of trades received from market feeds',
      labelNames: ['market', 'symbol'],
      registers: [this.register],
    });

    this.alertsCounter = new Counter({
      name: 'alerter_alerts_generated_total',
      help: 'Total number of trades at or above the notional threshold',
      labelNames: ['market', 'symbol'],
      registers: [this.register],
    });

    this.broadcastsCounter = new Counter({
      name: 'alerter_broadcasts_total',
      help: 'Total number of broadcast attempts by outcome',
      labelNames: ['outcome'],
      registers: [this.register],
    });

    this.deliveryFailuresCounter = new Counter({
      name: 'alerter_delivery_failures_total',
      help: 'Total number of failed deliveries to a single recipient',
      labelNames: ['kind'],
      registers: [this.register],
    });

    this.errorCounter = new Counter({
      name: 'alerter_errors_total',
      help: 'Total number of errors',
      labelNames: ['error_type'],
      registers: [this.register],
    });

    this.reconnectCounter = new Counter({
      name: 'alerter_reconnects_total',
      help: 'Total number of failed connection attempts followed by a scheduled reconnect',
      registers: [this.register],
    });

    this.recipientsGauge = new Gauge({
      name: 'alerter_recipients',
      help: 'Current number of notification recipients',
      registers: [this.register],
    });
  }

  incrementTradeReceived(market: Market, symbol: string): void {
    this.tradesCounter.inc({ market, symbol });
  }

  incrementAlertGenerated(market: Market, symbol: string): void {
    this.alertsCounter.inc({ market, symbol });
  }

  incrementBroadcast(outcome: BroadcastOutcomeLabel): void {
    this.broadcastsCounter.inc({ outcome });
  }

  incrementDeliveryFailure(kind: 'transient' | 'permanent'): void {
    this.deliveryFailuresCounter.inc({ kind });
  }

  incrementError(errorType: string): void {
    this.errorCounter.inc({ error_type: errorType });
  }

  incrementReconnect(): void {
    this.reconnectCounter.inc();
  }

  setRecipientCount(count: number): void {
    this.recipientsGauge.set(count);
  }

  async getMetrics(): Promise<string> {
    return await this.register.metrics();
  }

  getRegistry(): MetricsRegistry {
    return this.register;
  }
}
