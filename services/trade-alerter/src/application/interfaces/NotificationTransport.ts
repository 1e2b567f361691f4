import type { DeliveryResult, RecipientId } from '@/domain/types';

/**
 * 通知トランスポートのインターフェイス（インフラ層で実装される）。
 *
 * 責務: 認証確認、受信メッセージ送信者の取得、テキスト配信。
 */
export interface NotificationTransport {
  /**
   * トランスポートの認証情報を確認する。失敗時は TransportIdentityError を投げる。
   * @returns ボットのユーザー名
   */
  verifyIdentity(): Promise<{ username: string }>;

  /**
   * 最近メッセージを送ってきた送信者の ID を取得する。
   * @param limit 1 回で取得する最大件数
   */
  fetchInboundSenders(limit: number): Promise<RecipientId[]>;

  /**
   * 1 宛先にテキストを配信する。失敗は例外ではなく DeliveryResult で返す。
   */
  deliver(recipient: RecipientId, text: string): Promise<DeliveryResult>;
}
