/**
 * Binance の `<symbol>@trade` ストリームから受信するメッセージの型定義。
 * スポット（stream.binance.com）と先物（fstream.binance.com）で共通のフィールドのみ。
 */
export interface BinanceRawTrade {
  e: 'trade'; // イベント種別
  E: number; // イベント時刻（エポックミリ秒）
  s: string; // シンボル（大文字）
  t: number; // 約定 ID
  p: string; // 約定価格（10 進数文字列）
  q: string; // 約定数量（10 進数文字列）
  T: number; // 約定時刻（エポックミリ秒）
  m: boolean; // 買い手が maker か
}
