import { LOG_LEVELS, type LogLevel } from '@/application/interfaces/Logger';
import { DEFAULT_LINK_TEMPLATE } from '@/application/services/AlertFormatter';
import { ConfigurationError } from '@/domain/errors';
import { DEFAULT_BINANCE_ENDPOINTS } from '@/infra/adapters/binance/BinanceWebSocketClient';

export interface AppConfig {
  telegramBotToken: string;
  symbols: string[];
  minNotional: number;
  enableSpot: boolean;
  enableFutures: boolean;
  maxNotificationsPerMinute: number;
  reconnectDelaySeconds: number;
  reconnectBackoffMultiplier: number;
  reconnectMaxDelaySeconds: number;
  statsIntervalSeconds: number;
  subscriberPollIntervalSeconds: number;
  pollBatchSize: number;
  logLevel: LogLevel;
  subscribersFile: string;
  deliveryTimeoutMs: number;
  connectTimeoutMs: number;
  spotWsUrl: string;
  futuresWsUrl: string;
  tradeLinkTemplate: string;
  alertIncludeLink: boolean;
  alertEmojiEnabled: boolean;
  /** 未設定の場合はメトリクスサーバーを起動しない */
  metricsPort: number | null;
}

type Env = Readonly<Record<string, string | undefined>>;

/**
 * 必須環境変数を取得する。未設定の場合はエラーを投げる。
 * @throws {ConfigurationError} 環境変数が未設定の場合
 */
function requireEnv(env: Env, key: string): string {
  const value = env[key]?.trim();
  if (!value) {
    throw new ConfigurationError(`Missing required environment variable: ${key}`);
  }
  return value;
}

function optionalEnv(env: Env, key: string): string | undefined {
  const value = env[key]?.trim();
  return value ? value : undefined;
}

function numberEnv(env: Env, key: string, defaultValue: number, options: { min: number; integer?: boolean }): number {
  const raw = optionalEnv(env, key);
  if (raw === undefined) {
    return defaultValue;
  }
  const value = Number(raw);
  if (!Number.isFinite(value) || value < options.min || (options.integer && !Number.isInteger(value))) {
    const kind = options.integer ? 'an integer' : 'a number';
    throw new ConfigurationError(`${key} must be ${kind} >= ${options.min}, got "${raw}"`);
  }
  return value;
}

function booleanEnv(env: Env, key: string, defaultValue: boolean): boolean {
  const raw = optionalEnv(env, key);
  if (raw === undefined) {
    return defaultValue;
  }
  switch (raw.toLowerCase()) {
    case 'true':
    case '1':
    case 'yes':
      return true;
    case 'false':
    case '0':
    case 'no':
      return false;
    default:
      throw new ConfigurationError(`${key} must be true or false, got "${raw}"`);
  }
}

function logLevelEnv(env: Env): LogLevel {
  const raw = optionalEnv(env, 'LOG_LEVEL')?.toLowerCase() ?? 'info';
  const level = LOG_LEVELS.find((candidate) => candidate === raw);
  if (!level) {
    throw new ConfigurationError(`LOG_LEVEL must be one of ${LOG_LEVELS.join(', ')}, got "${raw}"`);
  }
  return level;
}

/**
 * 環境変数から設定を読み込む。接続を開く前に呼ぶ。
 * @throws {ConfigurationError} 必須項目の欠落や値が不正な場合
 */
export function loadConfig(env: Env = process.env): AppConfig {
  const telegramBotToken = requireEnv(env, 'TELEGRAM_BOT_TOKEN');

  // SYMBOLS (カンマ区切り) は小文字に揃え、重複を除く
  const symbols = [
    ...new Set(
      requireEnv(env, 'SYMBOLS')
        .split(',')
        .map((symbol) => symbol.trim().toLowerCase())
        .filter(Boolean)
    ),
  ];
  if (symbols.length === 0) {
    throw new ConfigurationError('SYMBOLS must list at least one symbol');
  }

  const enableSpot = booleanEnv(env, 'ENABLE_SPOT', true);
  const enableFutures = booleanEnv(env, 'ENABLE_FUTURES', true);
  if (!enableSpot && !enableFutures) {
    throw new ConfigurationError('At least one of ENABLE_SPOT and ENABLE_FUTURES must be true');
  }

  const reconnectDelaySeconds = numberEnv(env, 'RECONNECT_DELAY_SECONDS', 5, { min: 0 });
  const reconnectMaxDelaySeconds = numberEnv(env, 'RECONNECT_MAX_DELAY_SECONDS', Math.max(60, reconnectDelaySeconds), {
    min: 0,
  });
  if (reconnectMaxDelaySeconds < reconnectDelaySeconds) {
    throw new ConfigurationError('RECONNECT_MAX_DELAY_SECONDS must not be less than RECONNECT_DELAY_SECONDS');
  }

  const metricsPortRaw = optionalEnv(env, 'METRICS_PORT');

  return {
    telegramBotToken,
    symbols,
    minNotional: numberEnv(env, 'MIN_NOTIONAL', 1_000_000, { min: 0 }),
    enableSpot,
    enableFutures,
    maxNotificationsPerMinute: numberEnv(env, 'MAX_NOTIFICATIONS_PER_MINUTE', 10, { min: 1, integer: true }),
    reconnectDelaySeconds,
    reconnectBackoffMultiplier: numberEnv(env, 'RECONNECT_BACKOFF_MULTIPLIER', 1, { min: 1 }),
    reconnectMaxDelaySeconds,
    statsIntervalSeconds: numberEnv(env, 'STATS_INTERVAL_SECONDS', 60, { min: 1 }),
    subscriberPollIntervalSeconds: numberEnv(env, 'SUBSCRIBER_POLL_INTERVAL_SECONDS', 300, { min: 1 }),
    pollBatchSize: numberEnv(env, 'SUBSCRIBER_POLL_BATCH_SIZE', 100, { min: 1, integer: true }),
    logLevel: logLevelEnv(env),
    subscribersFile: optionalEnv(env, 'SUBSCRIBERS_FILE') ?? 'subscribers.json',
    deliveryTimeoutMs: numberEnv(env, 'DELIVERY_TIMEOUT_MS', 10_000, { min: 1 }),
    connectTimeoutMs: numberEnv(env, 'CONNECT_TIMEOUT_MS', 10_000, { min: 1 }),
    spotWsUrl: optionalEnv(env, 'SPOT_WS_URL') ?? DEFAULT_BINANCE_ENDPOINTS.spotWsUrl,
    futuresWsUrl: optionalEnv(env, 'FUTURES_WS_URL') ?? DEFAULT_BINANCE_ENDPOINTS.futuresWsUrl,
    tradeLinkTemplate: optionalEnv(env, 'TRADE_LINK_TEMPLATE') ?? DEFAULT_LINK_TEMPLATE,
    alertIncludeLink: booleanEnv(env, 'ALERT_INCLUDE_LINK', true),
    alertEmojiEnabled: booleanEnv(env, 'ALERT_EMOJI_ENABLED', true),
    metricsPort:
      metricsPortRaw === undefined ? null : numberEnv(env, 'METRICS_PORT', 0, { min: 1, integer: true }),
  };
}
