import type { Logger } from '@/application/interfaces/Logger';

export interface PeriodicTaskOptions {
  /** start() 直後に 1 回目を実行する */
  runImmediately?: boolean;
  logger: Logger;
}

/**
 * アプリケーション層: 定期実行タスク
 *
 * setTimeout を連鎖させるため、前回の実行が終わるまで次の実行は始まらない。
 * 実行中の例外はログに残し、次の周期は通常どおり実行する。
 */
export class PeriodicTask {
  private timer: NodeJS.Timeout | null = null;
  private inFlight: Promise<void> | null = null;
  private running = false;
  private readonly logger: Logger;
  private readonly runImmediately: boolean;

  constructor(
    readonly name: string,
    private readonly intervalMs: number,
    private readonly run: () => Promise<void>,
    options: PeriodicTaskOptions
  ) {
    this.logger = options.logger;
    this.runImmediately = options.runImmediately ?? false;
  }

  start(): void {
    if (this.running) {
      return;
    }
    this.running = true;
    this.schedule(this.runImmediately ? 0 : this.intervalMs);
  }

  /**
   * タイマーを解除し、実行中の周期があれば終わるまで待つ。
   */
  async stop(): Promise<void> {
    this.running = false;
    if (this.timer) {
      clearTimeout(this.timer);
      this.timer = null;
    }
    if (this.inFlight) {
      await this.inFlight;
    }
  }

  isRunning(): boolean {
    return this.running;
  }

  private schedule(delayMs: number): void {
    this.timer = setTimeout(() => {
      this.timer = null;
      this.inFlight = this.tick();
    }, delayMs);
  }

  private async tick(): Promise<void> {
    try {
      await this.run();
    } catch (error) {
      this.logger.error('Periodic task failed', { task: this.name, err: error });
    } finally {
      this.inFlight = null;
      if (this.running) {
        this.schedule(this.intervalMs);
      }
    }
  }
}
