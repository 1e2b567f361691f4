export interface BackoffOptions {
  /** 初回の遅延（ミリ秒） */
  baseDelayMs: number;
  /** 1 回ごとの倍率。1 なら固定遅延 */
  multiplier?: number;
  /** 遅延の上限（ミリ秒） */
  maxDelayMs?: number;
}

/**
 * インフラ層: 再接続時の遅延戦略
 *
 * multiplier = 1（デフォルト）で固定遅延、> 1 で指数バックオフになる。
 */
export class BackoffStrategy {
  private attempt = 0;
  private readonly baseDelayMs: number;
  private readonly multiplier: number;
  private readonly maxDelayMs: number;

  constructor(options: BackoffOptions) {
    this.baseDelayMs = options.baseDelayMs;
    this.multiplier = options.multiplier ?? 1;
    this.maxDelayMs = options.maxDelayMs ?? Math.max(options.baseDelayMs, 60_000);
  }

  /**
   * 次の再接続までの遅延時間（ミリ秒）を取得する。
   */
  getNextDelay(): number {
    const delay = Math.min(this.baseDelayMs * this.multiplier ** this.attempt, this.maxDelayMs);
    this.attempt += 1;
    return delay;
  }

  /**
   * バックオフカウンターをリセットする。
   * 接続成功時に呼び出される。
   */
  reset(): void {
    this.attempt = 0;
  }
}
