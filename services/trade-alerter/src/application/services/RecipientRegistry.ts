import type { Logger } from '@/application/interfaces/Logger';
import type { MetricsCollector } from '@/application/interfaces/MetricsCollector';
import type { RecipientStore } from '@/application/interfaces/RecipientStore';
import type { RecipientId } from '@/domain/types';

/**
 * アプリケーション層: 通知宛先の集合
 *
 * 責務: 宛先の追加・削除・スナップショットと、変更のたびの永続化（write-through）。
 *
 * 変更とスナップショットのコピーはイベントループ上で同期的に完了するため、配信の途中で
 * 半端な状態が見えることはない。永続化は変更の後に直列化された書き込みチェーンで行い、
 * 配信処理をブロックしない。書き込みに失敗してもメモリ上の集合を正とする。
 */
export class RecipientRegistry {
  private readonly members = new Set<RecipientId>();
  private writeChain: Promise<void> = Promise.resolve();

  constructor(
    private readonly store: RecipientStore,
    private readonly logger: Logger,
    private readonly metricsCollector?: MetricsCollector
  ) {}

  get size(): number {
    return this.members.size;
  }

  has(id: RecipientId): boolean {
    return this.members.has(id);
  }

  /**
   * 現時点の宛先のコピーを返す。以降の変更はコピーに反映されない。
   */
  snapshot(): ReadonlySet<RecipientId> {
    return new Set(this.members);
  }

  /**
   * @returns 新規に追加した場合 true。既に存在する場合は永続化せず false
   */
  async add(id: RecipientId): Promise<boolean> {
    return (await this.addMany([id])) === 1;
  }

  /**
   * 未登録の宛先をまとめて追加し、1 回だけ永続化する。
   * @returns 新規に追加した件数
   */
  async addMany(ids: Iterable<RecipientId>): Promise<number> {
    let added = 0;
    for (const id of ids) {
      if (!this.members.has(id)) {
        this.members.add(id);
        added += 1;
      }
    }
    if (added > 0) {
      this.logger.info('Recipients added', { added, total: this.members.size });
      await this.save();
    }
    return added;
  }

  /**
   * @returns 削除した場合 true。存在しない場合は永続化せず false
   */
  async remove(id: RecipientId): Promise<boolean> {
    return (await this.removeMany([id])) === 1;
  }

  /**
   * まとめて削除し、1 件以上削除した場合のみ 1 回だけ永続化する。
   * @returns 削除した件数
   */
  async removeMany(ids: Iterable<RecipientId>): Promise<number> {
    let removed = 0;
    for (const id of ids) {
      if (this.members.delete(id)) {
        removed += 1;
      }
    }
    if (removed > 0) {
      this.logger.info('Recipients removed', { removed, total: this.members.size });
      await this.save();
    }
    return removed;
  }

  /**
   * 永続化されたスナップショットを読み込み、現在の集合を置き換える。
   * ファイルが壊れている場合はログを出して空の集合から始める。
   */
  async load(): Promise<void> {
    try {
      const snapshot = await this.store.load();
      this.members.clear();
      if (!snapshot) {
        this.logger.info('No recipient snapshot found, starting empty');
      } else {
        // totalCount は診断用なので信用しない
        for (const id of snapshot.ids) {
          this.members.add(id);
        }
        this.logger.info('Recipients loaded', { total: this.members.size });
      }
    } catch (error) {
      this.logger.error('Failed to load recipients', { err: error });
      this.metricsCollector?.incrementError('persistence_error');
    }
    this.metricsCollector?.setRecipientCount(this.members.size);
  }

  /**
   * 現在の集合をスナップショットとして書き込む。書き込みは直列に実行される。
   * 失敗はログに残すのみで、呼び出し元には投げない。
   */
  save(): Promise<void> {
    const ids = [...this.members];
    this.metricsCollector?.setRecipientCount(ids.length);

    this.writeChain = this.writeChain.then(async () => {
      try {
        await this.store.save({
          ids,
          lastUpdated: new Date().toISOString(),
          totalCount: ids.length,
        });
        this.logger.debug('Recipients saved', { total: ids.length });
      } catch (error) {
        this.logger.error('Failed to save recipients', { err: error });
        this.metricsCollector?.incrementError('persistence_error');
      }
    });
    return this.writeChain;
  }

  /**
   * 実行中・待機中の書き込みがすべて終わるまで待つ。
   */
  async flush(): Promise<void> {
    await this.writeChain;
  }
}
