/**
 * In-memory BotApi for tests.
 */

import type { BotApi, Chat, ChatMember, ChatMemberStatus, ChatMemberUpdated, User } from "./transport-types.js";

export const CHANNEL_ID = -1001234567890;

export function user(id: number, extra: Partial<User> = {}): User {
  return { id, is_bot: false, first_name: `User ${id}`, ...extra };
}

export function member(status: ChatMemberStatus, who: User, isMember?: boolean): ChatMember {
  return isMember === undefined ? { status, user: who } : { status, user: who, is_member: isMember };
}

export function memberUpdate(
  who: User,
  from: ChatMemberStatus,
  to: ChatMemberStatus,
  chatId: number = CHANNEL_ID,
): ChatMemberUpdated {
  return {
    chat: { id: chatId, type: "channel", username: "example_channel" },
    from: who,
    date: 1_700_000_000,
    old_chat_member: member(from, who),
    new_chat_member: member(to, who),
  };
}

export class FakeBotApi implements BotApi {
  public chats: Map<string, Chat> = new Map([
    ["@example_channel", { id: CHANNEL_ID, type: "channel", username: "example_channel" }],
  ]);
  public statuses: Map<number, ChatMemberStatus> = new Map();
  public messages: Array<{ chatId: number; text: string }> = [];
  public blocked: Set<number> = new Set();
  /** When set, getChat and getChatMember reject with this message */
  public failure: string | null = null;
  public getChatCalls = 0;

  async getChat(chatId: number | string): Promise<Chat> {
    this.getChatCalls++;
    if (this.failure !== null) throw new Error(this.failure);
    const chat = this.chats.get(String(chatId));
    if (!chat) throw new Error("Bad Request: chat not found");
    return chat;
  }

  async getChatMember(_chatId: number | string, userId: number): Promise<ChatMember> {
    if (this.failure !== null) throw new Error(this.failure);
    return member(this.statuses.get(userId) ?? "left", user(userId));
  }

  async sendMessage(chatId: number, text: string): Promise<unknown> {
    if (this.blocked.has(chatId)) throw new Error("Forbidden: bot was blocked by the user");
    this.messages.push({ chatId, text });
    return { message_id: this.messages.length };
  }
}
