/**
 * Contracts with the chat transport: who is in the channel, and how to
 * reach a user.
 */

import type { Result } from "./result.js";

export type MembershipError = { kind: "lookup_failed"; message: string };

/**
 * Both checks are remote calls that can fail. A failure is never read as
 * "yes".
 */
export interface MembershipQuery {
  isMember(userId: number): Promise<Result<boolean, MembershipError>>;
  isAdmin(userId: number): Promise<Result<boolean, MembershipError>>;
}

// ── Notices ────────────────────────────────────────────────────────────

export type Notice =
  | { kind: "access_granted"; displayName: string; link: string }
  | { kind: "access_restored"; displayName: string; link: string }
  | { kind: "access_revoked"; displayName: string };

/** Renders a notice in the user's language */
export type NoticeFormatter = (notice: Notice) => string;

export type NotifyError = { kind: "send_failed"; message: string };

export interface Notifier {
  /** Best-effort; callers log failures and move on */
  notify(userId: number, text: string): Promise<Result<void, NotifyError>>;
}
