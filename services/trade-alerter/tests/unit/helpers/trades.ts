import type { BinanceRawTrade } from '@/infra/adapters/binance/messages/BinanceRawTrade';

/**
 * テスト用の raw trade メッセージ（JSON 文字列）を作る。
 */
export function rawTrade(overrides: Partial<BinanceRawTrade> = {}): string {
  const trade: BinanceRawTrade = {
    e: 'trade',
    E: 1700000000000,
    s: 'BTCUSDT',
    t: 1,
    p: '50000.00',
    q: '25.0',
    T: 1700000000000,
    m: false,
    ...overrides,
  };
  return JSON.stringify(trade);
}
