/**
 * Chat-member status transitions that matter for access.
 */

import type { ChatMember } from "./transport-types.js";

export type Transition = "joined" | "left" | "none";

/** Whether the member counts as being in the channel. */
export function isPresent(member: ChatMember): boolean {
  switch (member.status) {
    case "creator":
    case "administrator":
    case "member":
      return true;
    case "restricted":
      return member.is_member === true;
    case "left":
    case "kicked":
      return false;
  }
}

export function classifyTransition(before: ChatMember, after: ChatMember): Transition {
  const was = isPresent(before);
  const is = isPresent(after);
  if (!was && is) return "joined";
  if (was && !is) return "left";
  return "none";
}

export function isAdministrator(member: ChatMember): boolean {
  return member.status === "creator" || member.status === "administrator";
}
