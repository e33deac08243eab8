/**
 * Test doubles for the chat transport contracts.
 */

import type { MembershipError, MembershipQuery, Notifier, NotifyError } from "./membership.js";
import type { Result } from "./result.js";
import { ok, err } from "./result.js";

export class MockMembershipQuery implements MembershipQuery {
  public members: Set<number> = new Set();
  public admins: Set<number> = new Set();
  /** When set, every lookup fails with this message */
  public failure: string | null = null;

  async isMember(userId: number): Promise<Result<boolean, MembershipError>> {
    if (this.failure !== null) return err({ kind: "lookup_failed", message: this.failure });
    return ok(this.members.has(userId) || this.admins.has(userId));
  }

  async isAdmin(userId: number): Promise<Result<boolean, MembershipError>> {
    if (this.failure !== null) return err({ kind: "lookup_failed", message: this.failure });
    return ok(this.admins.has(userId));
  }
}

export type SentMessage = { userId: number; text: string };

export class MockNotifier implements Notifier {
  public sent: SentMessage[] = [];
  /** Users whose messages fail (blocked the bot, say) */
  public unreachable: Set<number> = new Set();

  async notify(userId: number, text: string): Promise<Result<void, NotifyError>> {
    if (this.unreachable.has(userId)) {
      return err({ kind: "send_failed", message: "bot was blocked by the user" });
    }
    this.sent.push({ userId, text });
    return ok(undefined);
  }
}
