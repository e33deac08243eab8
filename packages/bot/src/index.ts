/**
 * @channelgate/bot — chat transport adapter
 *
 * Provides:
 * - Channel id normalization and resolution
 * - Member-status transition classification
 * - A chat_member update handler driving the core's reconciler
 * - BotApi-backed MembershipQuery and Notifier, and English notice texts
 */

export { normalizeChannelId, channelUsername, isNumericChatId, ChannelResolver } from "./channel.js";
export { classifyTransition, isPresent, isAdministrator } from "./transitions.js";
export type { Transition } from "./transitions.js";
export { createMemberUpdateHandler, displayNameOf } from "./member-handler.js";
export type { HandledUpdate, MemberUpdateHandlerOptions } from "./member-handler.js";
export { BotMembershipQuery, BotNotifier } from "./adapters.js";
export { englishNotice } from "./notices.js";
export { createBot } from "./bot.js";
export type { Bot, BotOptions } from "./bot.js";

export type {
  BotApi,
  Chat,
  ChatMember,
  ChatMemberStatus,
  ChatMemberUpdated,
  User,
} from "./transport-types.js";
