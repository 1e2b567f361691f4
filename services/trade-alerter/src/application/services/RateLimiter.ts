const WINDOW_MS = 60_000;

/**
 * アプリケーション層: スライディングウィンドウ方式の送信レート制限
 *
 * ウィンドウは宛先ごとの送信ではなく、ブロードキャスト 1 回につき 1 件を記録する。
 * 記録はブロードキャストの完了時に行うため、許可済みで未完了のブロードキャストも枠として数える。
 */
export class RateLimiter {
  private timestamps: number[] = [];
  private inFlight = 0;

  /**
   * @param maxPerMinute 60 秒間に許可するブロードキャスト数
   * @param now 現在時刻（エポックミリ秒）を返す関数
   */
  constructor(
    private readonly maxPerMinute: number,
    private readonly now: () => number = Date.now
  ) {}

  /**
   * 60 秒より古い記録を捨ててから、送信可能かどうかを返す。
   * 許可した場合は record() か release() まで 1 枠を確保する。拒否した場合も古い記録は捨てる。
   */
  admit(): boolean {
    const current = this.now();
    this.timestamps = this.timestamps.filter((ts) => current - ts < WINDOW_MS);
    if (this.timestamps.length + this.inFlight >= this.maxPerMinute) {
      return false;
    }
    this.inFlight += 1;
    return true;
  }

  /**
   * ブロードキャスト 1 回分を記録し、確保中の枠があれば解放する。
   */
  record(at: number = this.now()): void {
    this.timestamps.push(at);
    this.release();
  }

  /**
   * 記録せずに確保中の枠を解放する（ブロードキャストが途中で失敗した場合）。
   */
  release(): void {
    this.inFlight = Math.max(0, this.inFlight - 1);
  }

  get windowSize(): number {
    return this.timestamps.length;
  }

  get pending(): number {
    return this.inFlight;
  }
}
