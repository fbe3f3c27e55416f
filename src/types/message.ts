/**
 * プラットフォーム非依存のメッセージ型定義
 *
 * discord.js の Message は discord/inboundMessage.ts でこの形に変換される
 */

export interface GuildRef {
  id: string;
  name: string;
}

export interface ReferencedMessage {
  authorId: string;
  content: string;
}

/**
 * 返信元メッセージ取得の結果
 */
export type FetchOutcome =
  | { status: 'found'; message: ReferencedMessage }
  | { status: 'not_found' }
  | { status: 'forbidden' };

export interface InboundMessage {
  id: string;
  authorId: string;
  authorName: string;
  /** bot自身が送ったメッセージならtrue */
  fromSelf: boolean;
  /** DMの場合はnull */
  guild: GuildRef | null;
  content: string;
  referencedMessageId: string | null;
  fetchReference(): Promise<FetchOutcome>;
}

/**
 * 受信メッセージへの返信として送る内容
 *
 * quote はブロック引用（`>>> `）として content の後ろに付ける
 */
export interface ReplyAction {
  type: 'reply';
  content: string;
  quote?: string;
  mentionUserIds?: string[];
}

export type OutboundAction = ReplyAction;
