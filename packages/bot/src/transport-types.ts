/**
 * Minimal types from the Telegram Bot API.
 *
 * We vendor just the surface channelgate touches so the package has no
 * runtime dependency on any bot framework. Field names follow the Bot API.
 */

export type ChatMemberStatus =
  | "creator"
  | "administrator"
  | "member"
  | "restricted"
  | "left"
  | "kicked";

export type User = {
  id: number;
  is_bot: boolean;
  first_name: string;
  last_name?: string;
  username?: string;
};

export type Chat = {
  id: number;
  type: "private" | "group" | "supergroup" | "channel";
  title?: string;
  username?: string;
};

export type ChatMember = {
  status: ChatMemberStatus;
  user: User;
  /** Only for "restricted": whether the user is still in the chat */
  is_member?: boolean;
};

/** The `chat_member` update */
export type ChatMemberUpdated = {
  chat: Chat;
  from: User;
  date: number;
  old_chat_member: ChatMember;
  new_chat_member: ChatMember;
};

/** The calls channelgate makes; any bot framework's client can be adapted to it. */
export interface BotApi {
  getChat(chatId: number | string): Promise<Chat>;
  getChatMember(chatId: number | string, userId: number): Promise<ChatMember>;
  sendMessage(chatId: number, text: string): Promise<unknown>;
}
