import type { Logger } from '@/application/interfaces/Logger';
import type { PeriodicTask } from '@/application/tasks/PeriodicTask';
import type { FeedStatus } from '@/domain/types';
import { LoggerFactory } from '@/infra/logger/LoggerFactory';
import type { FeedConnectionHandler } from '@/presentation/websocket/FeedConnectionHandler';

/**
 * プレゼンテーション層: フィードと定期タスクの起動・停止
 *
 * 各フィードの失敗はそのフィードの中で完結し、他のフィードやタスクを止めない。
 */
export class Supervisor {
  private readonly logger: Logger;

  constructor(
    private readonly feeds: readonly FeedConnectionHandler[],
    private readonly tasks: readonly PeriodicTask[],
    logger?: Logger
  ) {
    this.logger = logger ?? LoggerFactory.create();
  }

  /**
   * すべてのフィードを並列で起動してから、定期タスクを開始する。
   * 初回接続に失敗したフィードは再接続が予約された状態で解決される。
   */
  async start(): Promise<void> {
    await Promise.all(this.feeds.map((feed) => feed.start()));
    for (const task of this.tasks) {
      task.start();
    }
    this.logger.info('Supervisor started', { feeds: this.feeds.length, tasks: this.tasks.length });
  }

  /**
   * 1. 定期タスクを止める 2. フィードを切断する 3. 処理中のメッセージを待つ
   */
  async stop(): Promise<void> {
    await Promise.all(this.tasks.map((task) => task.stop()));
    for (const feed of this.feeds) {
      feed.stop();
    }
    await Promise.all(this.feeds.map((feed) => feed.drain()));
    this.logger.info('Supervisor stopped');
  }

  feedStatuses(): FeedStatus[] {
    return this.feeds.map((feed) => feed.getStatus());
  }
}
