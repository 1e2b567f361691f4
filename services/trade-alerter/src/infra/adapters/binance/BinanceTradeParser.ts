import type { RawFeedData } from '@/application/interfaces/MarketDataAdapter';
import type { MessageParser } from '@/application/interfaces/MessageParser';
import { DecodeError } from '@/domain/errors';
import type { Market, TradeEvent } from '@/domain/types';

/**
 * ws から受け取った生データを UTF-8 文字列に変換する。
 */
export function rawFeedDataToText(data: RawFeedData): string {
  if (typeof data === 'string') {
    return data;
  }
  if (Array.isArray(data)) {
    // フラグメント化されたメッセージ
    return Buffer.concat(data).toString('utf-8');
  }
  if (Buffer.isBuffer(data)) {
    return data.toString('utf-8');
  }
  return Buffer.from(data).toString('utf-8');
}

function isRawFeedData(value: unknown): value is RawFeedData {
  return (
    typeof value === 'string' ||
    Buffer.isBuffer(value) ||
    value instanceof ArrayBuffer ||
    (Array.isArray(value) && value.every((chunk) => Buffer.isBuffer(chunk)))
  );
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * 10 進数文字列（または数値）を有限の非負数に変換する。
 */
function toDecimal(value: unknown, field: string): number {
  const parsed = typeof value === 'string' && value.trim() !== '' ? Number(value) : value;
  if (typeof parsed !== 'number' || !Number.isFinite(parsed) || parsed < 0) {
    throw new DecodeError(`invalid decimal field "${field}": ${JSON.stringify(value)}`);
  }
  return parsed;
}

/**
 * インフラ層: Binance の trade メッセージ → TradeEvent への変換
 */
export class BinanceTradeParser implements MessageParser {
  parse(rawMessage: unknown, symbol: string, market: Market): TradeEvent {
    const message = this.toRecord(rawMessage);

    if (message.e !== undefined && message.e !== 'trade') {
      throw new DecodeError(`unexpected event type: ${JSON.stringify(message.e)}`);
    }

    const price = toDecimal(message.p, 'p');
    const quantity = toDecimal(message.q, 'q');

    // 約定時刻 T を優先し、なければイベント時刻 E を使う
    const eventTime = typeof message.T === 'number' ? message.T : message.E;
    if (typeof eventTime !== 'number' || !Number.isFinite(eventTime)) {
      throw new DecodeError('missing trade time field "T"');
    }

    if (typeof message.m !== 'boolean') {
      throw new DecodeError('missing buyer-maker flag "m"');
    }

    return {
      symbol,
      market,
      price,
      quantity,
      isBuyerMaker: message.m,
      eventTimeMillis: eventTime,
    };
  }

  private toRecord(rawMessage: unknown): Record<string, unknown> {
    let value: unknown = rawMessage;
    if (isRawFeedData(rawMessage)) {
      const text = rawFeedDataToText(rawMessage);
      try {
        value = JSON.parse(text);
      } catch (error) {
        throw new DecodeError(`message is not valid JSON: ${text.slice(0, 120)}`, { cause: error });
      }
    }

    if (!isRecord(value)) {
      throw new DecodeError('message is not a JSON object');
    }
    return value;
  }
}
