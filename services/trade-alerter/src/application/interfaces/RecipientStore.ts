import type { RecipientId } from '@/domain/types';

/**
 * 永続化される宛先スナップショット。
 * totalCount は外部診断用で、読み込み時には ids を正とする。
 */
export interface RecipientSnapshot {
  ids: RecipientId[];
  lastUpdated: string;
  totalCount: number;
}

/**
 * 宛先スナップショットの永続化インターフェイス（インフラ層で実装される）。
 */
export interface RecipientStore {
  /**
   * スナップショットを読み込む。未作成の場合は null。
   * 読み込みに失敗した場合は PersistenceError を投げる。
   */
  load(): Promise<RecipientSnapshot | null>;

  /**
   * スナップショット全体を上書き保存する。失敗時は PersistenceError を投げる。
   */
  save(snapshot: RecipientSnapshot): Promise<void>;
}
