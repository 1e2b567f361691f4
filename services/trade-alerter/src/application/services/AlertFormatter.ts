import { type TradeEvent, notionalOf, sideOf } from '@/domain/types';

/**
 * シンボルに含まれる資産コード → 絵文字。先に定義したものが優先される。
 */
export const DEFAULT_ASSET_EMOJIS: Readonly<Record<string, string>> = {
  BCH: '🪙',
  BTC: '₿',
  ETH: 'Ξ',
  BNB: '🟡',
  DYDX: '📊',
  SOL: '☀️',
  SUI: '💎',
  DOGE: '🐕',
  XRP: '💎',
  DOT: '🔗',
  TIA: '🌟',
  XTZ: '🌿',
  NOT: '📝',
  CFX: '🌊',
  NEAR: '🌐',
  EPIC: '🎮',
  FUN: '🎯',
};

const FALLBACK_ASSET_EMOJI = '💱';

export const DEFAULT_LINK_TEMPLATE = 'https://www.binance.com/en/trade/{symbol}';

export interface AlertFormatterOptions {
  /** `{symbol}` を大文字シンボルに置換する */
  linkTemplate?: string;
  includeLink?: boolean;
  emojiEnabled?: boolean;
  assetEmojis?: Readonly<Record<string, string>>;
}

/**
 * 想定元本を $1.25M / $12.5K / $950 の形式に丸める。
 */
export function formatNotional(notional: number): string {
  if (notional >= 1_000_000) {
    return `$${(notional / 1_000_000).toFixed(2)}M`;
  }
  if (notional >= 1_000) {
    return `$${(notional / 1_000).toFixed(1)}K`;
  }
  return `$${notional.toFixed(0)}`;
}

export function formatPrice(price: number): string {
  return `$${price.toLocaleString('en-US', { minimumFractionDigits: 4, maximumFractionDigits: 4 })}`;
}

export function formatQuantity(quantity: number): string {
  return quantity.toFixed(6);
}

/**
 * エポックミリ秒を `YYYY-MM-DD HH:MM:SS UTC` に変換する。
 */
export function formatTimestamp(eventTimeMillis: number): string {
  const iso = new Date(eventTimeMillis).toISOString();
  return `${iso.slice(0, 10)} ${iso.slice(11, 19)} UTC`;
}

/**
 * アプリケーション層: アラート本文（Telegram HTML）の生成
 */
export class AlertFormatter {
  private readonly linkTemplate: string;
  private readonly includeLink: boolean;
  private readonly emojiEnabled: boolean;
  private readonly assetEmojis: Readonly<Record<string, string>>;

  constructor(options: AlertFormatterOptions = {}) {
    this.linkTemplate = options.linkTemplate ?? DEFAULT_LINK_TEMPLATE;
    this.includeLink = options.includeLink ?? true;
    this.emojiEnabled = options.emojiEnabled ?? true;
    this.assetEmojis = options.assetEmojis ?? DEFAULT_ASSET_EMOJIS;
  }

  format(event: TradeEvent): string {
    const symbol = event.symbol.toUpperCase();
    const marketEmoji = event.market === 'SPOT' ? '💱' : '📈';
    const direction = sideOf(event) === 'buy' ? this.withEmoji('🟢', 'BUY') : this.withEmoji('🔴', 'SELL');

    const header = this.emojiEnabled
      ? `${marketEmoji} <b>${event.market} ${symbol}</b> ${this.assetEmoji(symbol)}`
      : `<b>${event.market} ${symbol}</b>`;

    const lines = [
      header,
      '',
      direction,
      this.withEmoji('💰', `Amount: <b>${formatNotional(notionalOf(event))}</b>`),
      this.withEmoji('💵', `Price: <b>${formatPrice(event.price)}</b>`),
      this.withEmoji('📊', `Volume: <b>${formatQuantity(event.quantity)}</b>`),
      this.withEmoji('⏰', `Time: <b>${formatTimestamp(event.eventTimeMillis)}</b>`),
    ];

    if (this.includeLink) {
      lines.push('', this.withEmoji('🔗', `<a href="${this.linkFor(symbol)}">Open on Binance</a>`));
    }

    return lines.join('\n');
  }

  linkFor(symbol: string): string {
    return this.linkTemplate.replaceAll('{symbol}', symbol.toUpperCase());
  }

  assetEmoji(symbol: string): string {
    const upper = symbol.toUpperCase();
    for (const [asset, emoji] of Object.entries(this.assetEmojis)) {
      if (upper.includes(asset)) {
        return emoji;
      }
    }
    return FALLBACK_ASSET_EMOJI;
  }

  private withEmoji(emoji: string, text: string): string {
    return this.emojiEnabled ? `${emoji} ${text}` : text;
  }
}
