import { Telegram, TelegramError } from 'telegraf';
import type { Logger } from '@/application/interfaces/Logger';
import type { NotificationTransport } from '@/application/interfaces/NotificationTransport';
import { DeliveryError, TransportIdentityError } from '@/domain/errors';
import type { DeliveryResult, RecipientId } from '@/domain/types';
import { LoggerFactory } from '@/infra/logger/LoggerFactory';

/**
 * getUpdates の結果のうち、このサービスが読む部分
 */
export interface TelegramUpdate {
  update_id: number;
  message?: { chat: { id: number } };
}

export interface TelegramSendExtra {
  parse_mode: 'HTML';
  link_preview_options: { is_disabled: boolean };
}

/**
 * このサービスが使う Bot API の部分集合（telegraf の Telegram クライアントが満たす）
 */
export interface TelegramBotApi {
  getMe(): Promise<{ username: string }>;
  getUpdates(
    timeout: number,
    limit: number,
    offset: number,
    allowedUpdates: undefined
  ): Promise<readonly TelegramUpdate[]>;
  sendMessage(chatId: number, text: string, extra: TelegramSendExtra): Promise<unknown>;
}

// getUpdates のロングポーリング秒数
const UPDATES_TIMEOUT_SECONDS = 1;

/**
 * インフラ層: NotificationTransport 実装（Telegram Bot API）
 *
 * 403（ボットがブロックされた）のみを恒久的な失敗とし、それ以外はすべて一時的な失敗として返す。
 */
export class TelegramTransport implements NotificationTransport {
  private readonly api: TelegramBotApi;
  private readonly logger: Logger;
  // 次に読む update_id。処理済みの更新は二度と返されない
  private offset = 0;

  constructor(token: string, options: { api?: TelegramBotApi; logger?: Logger } = {}) {
    this.api = options.api ?? new Telegram(token);
    this.logger = options.logger ?? LoggerFactory.create();
  }

  async verifyIdentity(): Promise<{ username: string }> {
    try {
      const me = await this.api.getMe();
      this.logger.info('Telegram bot verified', { username: me.username });
      return { username: me.username };
    } catch (error) {
      throw new TransportIdentityError('Telegram bot token verification failed', { cause: error });
    }
  }

  async fetchInboundSenders(limit: number): Promise<RecipientId[]> {
    const updates = await this.api.getUpdates(UPDATES_TIMEOUT_SECONDS, limit, this.offset, undefined);
    const senders = new Set<RecipientId>();
    for (const update of updates) {
      this.offset = Math.max(this.offset, update.update_id + 1);
      if (update.message) {
        senders.add(update.message.chat.id);
      }
    }
    return [...senders];
  }

  async deliver(recipient: RecipientId, text: string): Promise<DeliveryResult> {
    try {
      await this.api.sendMessage(recipient, text, {
        parse_mode: 'HTML',
        link_preview_options: { is_disabled: true },
      });
      return { status: 'delivered' };
    } catch (error) {
      const failure = toDeliveryError(error);
      return { status: failure.kind === 'permanent' ? 'unreachable' : 'failed', reason: failure.message };
    }
  }
}

/**
 * sendMessage のエラーを分類する。403（ボットがブロックされた）のみ permanent。
 */
function toDeliveryError(error: unknown): DeliveryError {
  if (error instanceof TelegramError) {
    if (error.code === 403) {
      return new DeliveryError(error.description, 'permanent', { cause: error });
    }
    return new DeliveryError(`${error.code}: ${error.description}`, 'transient', { cause: error });
  }
  return new DeliveryError(error instanceof Error ? error.message : String(error), 'transient', { cause: error });
}
