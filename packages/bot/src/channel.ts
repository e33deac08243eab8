/**
 * Channel identifiers as operators write them.
 *
 *   https://t.me/name, t.me/name, @name, name → @name
 *   -1001234567890                             → unchanged
 */

import type { Logger } from "@channelgate/core";
import { errorMessage } from "@channelgate/core";
import type { BotApi } from "./transport-types.js";

const NUMERIC_ID = /^-\d+$/;

export function isNumericChatId(channel: string): boolean {
  return NUMERIC_ID.test(channel);
}

export function normalizeChannelId(raw: string): string {
  let channel = raw.trim();
  if (channel === "" || isNumericChatId(channel)) return channel;

  channel = channel.replace(/^https?:\/\//, "");
  if (channel.startsWith("t.me/")) channel = channel.slice("t.me/".length);
  if (channel.startsWith("@")) channel = channel.slice(1);
  return `@${channel}`;
}

/** The name for `https://t.me/<name>` links; numeric ids come back unchanged. */
export function channelUsername(channel: string): string {
  const normalized = normalizeChannelId(channel);
  return normalized.startsWith("@") ? normalized.slice(1) : normalized;
}

/**
 * Resolves the configured channel to its numeric chat id, which is what
 * member updates carry. A successful lookup is kept; a failed one is
 * retried on the next update.
 */
export class ChannelResolver {
  readonly channel: string;
  private chatId: number | null = null;

  constructor(
    channel: string,
    private api: BotApi,
    private logger: Logger,
  ) {
    this.channel = normalizeChannelId(channel);
    if (isNumericChatId(this.channel)) this.chatId = Number(this.channel);
  }

  async chatIdOf(): Promise<number | null> {
    if (this.chatId !== null) return this.chatId;
    try {
      const chat = await this.api.getChat(this.channel);
      this.chatId = chat.id;
      return chat.id;
    } catch (e) {
      this.logger.error(`Could not resolve channel ${this.channel}`, { reason: errorMessage(e) });
      return null;
    }
  }
}
