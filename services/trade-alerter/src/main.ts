import 'dotenv/config';
import process from 'node:process';
import { AggregateStats } from '@/application/services/AggregateStats';
import { AlertFormatter } from '@/application/services/AlertFormatter';
import { BroadcastDispatcher } from '@/application/services/BroadcastDispatcher';
import { RateLimiter } from '@/application/services/RateLimiter';
import { RecipientRegistry } from '@/application/services/RecipientRegistry';
import { TradeClassifier } from '@/application/services/TradeClassifier';
import { InboxPoller } from '@/application/tasks/InboxPoller';
import { PeriodicTask } from '@/application/tasks/PeriodicTask';
import { StatsReporter } from '@/application/tasks/StatsReporter';
import { HandleTradeUsecase } from '@/application/usecases/HandleTradeUsecase';
import { loadConfig } from '@/config/loadConfig';
import { MARKETS } from '@/domain/types';
import { BinanceTradeAdapter } from '@/infra/adapters/binance/BinanceTradeAdapter';
import { BinanceTradeParser } from '@/infra/adapters/binance/BinanceTradeParser';
import { LoggerFactory } from '@/infra/logger/LoggerFactory';
import { MetricsServer } from '@/infra/metrics/MetricsServer';
import { PrometheusMetricsCollector } from '@/infra/metrics/PrometheusMetricsCollector';
import { BackoffStrategy } from '@/infra/reconnect/BackoffStrategy';
import { JsonFileRecipientStore } from '@/infra/storage/JsonFileRecipientStore';
import { TelegramTransport } from '@/infra/telegram/TelegramTransport';
import { Supervisor } from '@/presentation/supervisor/Supervisor';
import { FeedConnectionHandler } from '@/presentation/websocket/FeedConnectionHandler';

/**
 * エントリーポイント: アプリケーションの起動処理、依存関係の注入、シグナルハンドリング
 *
 * 責務:
 * - 環境変数の検証
 * - コンポーネントの生成と初期化
 * - シグナルハンドリング
 *
 * 注意: 接続の挙動や分類ロジックは main.ts に置かず、ただ「配線するだけ」にする。
 */
async function bootstrap(): Promise<void> {
  // 設定が不正ならどの接続も開く前に落とす
  const config = loadConfig(process.env);
  LoggerFactory.configure({ level: config.logLevel });
  const logger = LoggerFactory.create();

  const metricsCollector = new PrometheusMetricsCollector();
  const metricsServer = config.metricsPort === null ? null : new MetricsServer(metricsCollector, config.metricsPort, logger);
  metricsServer?.start();

  // インフラ層: 通知トランスポート。認証に失敗したらフィードを開く前に落とす
  const transport = new TelegramTransport(config.telegramBotToken, { logger });
  const { username } = await transport.verifyIdentity();

  // アプリケーション層: 宛先・集計・レート制限
  const registry = new RecipientRegistry(new JsonFileRecipientStore(config.subscribersFile), logger, metricsCollector);
  await registry.load();

  const stats = new AggregateStats();
  const rateLimiter = new RateLimiter(config.maxNotificationsPerMinute);
  const formatter = new AlertFormatter({
    linkTemplate: config.tradeLinkTemplate,
    includeLink: config.alertIncludeLink,
    emojiEnabled: config.alertEmojiEnabled,
  });
  const classifier = new TradeClassifier(new BinanceTradeParser(), formatter, stats, config.minNotional, metricsCollector);
  const dispatcher = new BroadcastDispatcher(registry, rateLimiter, transport, stats, {
    deliveryTimeoutMs: config.deliveryTimeoutMs,
    logger,
    metricsCollector,
  });
  const usecase = new HandleTradeUsecase(classifier, dispatcher, stats, logger, metricsCollector);

  // フィードを開く前に 1 回だけ購読者を取り込む
  const poller = new InboxPoller(transport, registry, config.pollBatchSize, logger, metricsCollector);
  await poller.poll();

  // プレゼンテーション層: 有効な市場 × SYMBOLS ごとにハンドラを生成
  const markets = MARKETS.filter((market) => (market === 'SPOT' ? config.enableSpot : config.enableFutures));
  const endpoints = { spotWsUrl: config.spotWsUrl, futuresWsUrl: config.futuresWsUrl };
  const feeds = markets.flatMap((market) =>
    config.symbols.map((symbol) => {
      const adapter = new BinanceTradeAdapter(symbol, market, {
        endpoints,
        connectTimeoutMs: config.connectTimeoutMs,
        logger,
      });
      const backoff = new BackoffStrategy({
        baseDelayMs: config.reconnectDelaySeconds * 1000,
        multiplier: config.reconnectBackoffMultiplier,
        maxDelayMs: config.reconnectMaxDelaySeconds * 1000,
      });
      return new FeedConnectionHandler(adapter, usecase, { backoff, logger, metricsCollector });
    })
  );

  const reporter = new StatsReporter(
    stats,
    registry,
    config.minNotional,
    () => feeds.map((feed) => feed.getStatus()),
    logger
  );
  const tasks = [
    new PeriodicTask(
      'inbox-poller',
      config.subscriberPollIntervalSeconds * 1000,
      async () => {
        await poller.poll();
      },
      { logger }
    ),
    new PeriodicTask(
      'stats-reporter',
      config.statsIntervalSeconds * 1000,
      async () => {
        reporter.report();
      },
      { logger }
    ),
  ];
  const supervisor = new Supervisor(feeds, tasks, logger);

  logger.info('Starting trade alerter', {
    bot: username,
    symbols: config.symbols,
    markets,
    minNotional: config.minNotional,
    maxNotificationsPerMinute: config.maxNotificationsPerMinute,
    subscribers: registry.size,
  });
  await supervisor.start();

  let shuttingDown = false;
  const shutdown = async () => {
    if (shuttingDown) {
      return;
    }
    shuttingDown = true;
    logger.info('Shutting down trade alerter...');
    // SIGINT/SIGTERM でタスクとフィードを止め、未完了の書き込みを待ってから終了する
    await supervisor.stop();
    await registry.flush();
    await metricsServer?.stop();
    process.exit(0);
  };

  process.on('SIGINT', () => void shutdown());
  process.on('SIGTERM', () => void shutdown());
}

bootstrap().catch((error: unknown) => {
  LoggerFactory.create().error('Failed to bootstrap trade alerter', { err: error });
  process.exit(1);
});
