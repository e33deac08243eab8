/**
 * BotApi-backed implementations of the core's transport contracts.
 */

import type {
  MembershipError,
  MembershipQuery,
  Notifier,
  NotifyError,
  Result,
} from "@channelgate/core";
import { ok, err, errorMessage } from "@channelgate/core";
import type { BotApi } from "./transport-types.js";
import type { ChannelResolver } from "./channel.js";
import { isAdministrator, isPresent } from "./transitions.js";

export class BotMembershipQuery implements MembershipQuery {
  constructor(
    private api: BotApi,
    private channel: ChannelResolver,
  ) {}

  async isMember(userId: number): Promise<Result<boolean, MembershipError>> {
    try {
      return ok(isPresent(await this.api.getChatMember(this.channel.channel, userId)));
    } catch (e) {
      return err({ kind: "lookup_failed", message: errorMessage(e) });
    }
  }

  async isAdmin(userId: number): Promise<Result<boolean, MembershipError>> {
    try {
      return ok(isAdministrator(await this.api.getChatMember(this.channel.channel, userId)));
    } catch (e) {
      return err({ kind: "lookup_failed", message: errorMessage(e) });
    }
  }
}

export class BotNotifier implements Notifier {
  constructor(private api: BotApi) {}

  async notify(userId: number, text: string): Promise<Result<void, NotifyError>> {
    try {
      await this.api.sendMessage(userId, text);
      return ok(undefined);
    } catch (e) {
      return err({ kind: "send_failed", message: errorMessage(e) });
    }
  }
}
