import { readFile, rename, writeFile } from 'node:fs/promises';
import type { RecipientSnapshot, RecipientStore } from '@/application/interfaces/RecipientStore';
import { PersistenceError } from '@/domain/errors';

/**
 * ファイル上の形式
 */
interface SubscribersFile {
  subscribers: number[];
  last_updated: string;
  total_count: number;
}

function isErrnoException(error: unknown): error is NodeJS.ErrnoException {
  return error instanceof Error && 'code' in error;
}

/**
 * ファイルの内容を検証してスナップショットに変換する。
 * @throws {PersistenceError} 形式が不正な場合
 */
export function parseSubscribersFile(content: string, filePath: string): RecipientSnapshot {
  let data: unknown;
  try {
    data = JSON.parse(content);
  } catch (error) {
    throw new PersistenceError(`subscribers file is not valid JSON: ${filePath}`, { cause: error });
  }

  if (typeof data !== 'object' || data === null || !('subscribers' in data) || !Array.isArray(data.subscribers)) {
    throw new PersistenceError(`subscribers file has no "subscribers" array: ${filePath}`);
  }

  const ids: number[] = [];
  for (const id of data.subscribers) {
    if (typeof id !== 'number' || !Number.isInteger(id)) {
      throw new PersistenceError(`subscribers file contains a non-integer id: ${filePath}`);
    }
    ids.push(id);
  }

  const lastUpdated = 'last_updated' in data && typeof data.last_updated === 'string' ? data.last_updated : '';
  const totalCount = 'total_count' in data && typeof data.total_count === 'number' ? data.total_count : ids.length;

  return { ids, lastUpdated, totalCount };
}

/**
 * インフラ層: RecipientStore 実装（JSON ファイル）
 *
 * 一時ファイルに書いてから rename するため、書き込み途中のファイルが読まれることはない。
 */
export class JsonFileRecipientStore implements RecipientStore {
  constructor(private readonly filePath: string) {}

  async load(): Promise<RecipientSnapshot | null> {
    let content: string;
    try {
      content = await readFile(this.filePath, 'utf-8');
    } catch (error) {
      if (isErrnoException(error) && error.code === 'ENOENT') {
        return null;
      }
      throw new PersistenceError(`failed to read subscribers file: ${this.filePath}`, { cause: error });
    }
    return parseSubscribersFile(content, this.filePath);
  }

  async save(snapshot: RecipientSnapshot): Promise<void> {
    const data: SubscribersFile = {
      subscribers: snapshot.ids,
      last_updated: snapshot.lastUpdated,
      total_count: snapshot.totalCount,
    };
    const tmpPath = `${this.filePath}.tmp`;
    try {
      await writeFile(tmpPath, `${JSON.stringify(data, null, 2)}\n`, 'utf-8');
      await rename(tmpPath, this.filePath);
    } catch (error) {
      throw new PersistenceError(`failed to write subscribers file: ${this.filePath}`, { cause: error });
    }
  }
}
