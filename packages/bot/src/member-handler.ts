/**
 * Turns `chat_member` updates for the configured channel into reconciler
 * joins and leaves. Updates for other chats and status changes that do not
 * move a user in or out are ignored.
 */

import type {
  AccessError,
  JoinOutcome,
  LeaveOutcome,
  Logger,
  MembershipReconciler,
  Result,
} from "@channelgate/core";
import { ok, formatAccessError } from "@channelgate/core";
import type { ChatMemberUpdated, User } from "./transport-types.js";
import type { ChannelResolver } from "./channel.js";
import { classifyTransition } from "./transitions.js";

export type HandledUpdate =
  | { kind: "ignored"; reason: "other_chat" | "unresolved_channel" | "no_transition" | "bot" }
  | { kind: "joined"; outcome: JoinOutcome }
  | { kind: "left"; outcome: LeaveOutcome };

export type MemberUpdateHandlerOptions = {
  channel: ChannelResolver;
  reconciler: MembershipReconciler;
  logger: Logger;
};

/** Display name for the registry: the username, or a stand-in built from the id. */
export function displayNameOf(user: User): string {
  return user.username ?? `user_${user.id}`;
}

export function createMemberUpdateHandler(options: MemberUpdateHandlerOptions) {
  const { channel, reconciler, logger } = options;

  return async function handleMemberUpdate(
    update: ChatMemberUpdated,
  ): Promise<Result<HandledUpdate, AccessError>> {
    const target = await channel.chatIdOf();
    if (target === null) return ok({ kind: "ignored", reason: "unresolved_channel" });
    if (update.chat.id !== target) return ok({ kind: "ignored", reason: "other_chat" });

    const user = update.new_chat_member.user;
    if (user.is_bot) return ok({ kind: "ignored", reason: "bot" });

    const transition = classifyTransition(update.old_chat_member, update.new_chat_member);
    logger.debug(`Member update for user ${user.id}`, {
      from: update.old_chat_member.status,
      to: update.new_chat_member.status,
      transition,
    });

    switch (transition) {
      case "joined": {
        const outcome = await reconciler.onJoin(user.id, displayNameOf(user));
        if (!outcome.ok) {
          logger.error(`Join of user ${user.id} not handled`, { reason: formatAccessError(outcome.error) });
          return outcome;
        }
        return ok({ kind: "joined", outcome: outcome.value });
      }
      case "left": {
        const outcome = await reconciler.onLeave(user.id);
        if (!outcome.ok) {
          logger.error(`Leave of user ${user.id} not handled`, { reason: formatAccessError(outcome.error) });
          return outcome;
        }
        return ok({ kind: "left", outcome: outcome.value });
      }
      case "none":
        return ok({ kind: "ignored", reason: "no_transition" });
    }
  };
}
