/**
 * createBot — wires the core's access layer to a BotApi.
 *
 * The caller owns the update loop: it feeds `chat_member` updates to
 * handleMemberUpdate and routes user commands to `access`.
 */

import type {
  AccessService,
  AccessStats,
  CoreServices,
  MembershipReconciler,
  NoticeFormatter,
} from "@channelgate/core";
import { createAccessLayer } from "@channelgate/core";
import type { BotApi } from "./transport-types.js";
import { ChannelResolver, channelUsername } from "./channel.js";
import { BotMembershipQuery, BotNotifier } from "./adapters.js";
import { createMemberUpdateHandler } from "./member-handler.js";
import { englishNotice } from "./notices.js";

export type BotOptions = {
  api: BotApi;
  core: CoreServices;
  /** Defaults to English */
  formatNotice?: NoticeFormatter;
};

export type Bot = {
  access: AccessService;
  reconciler: MembershipReconciler;
  stats: AccessStats;
  handleMemberUpdate: ReturnType<typeof createMemberUpdateHandler>;
  /** Where to send users who are not members yet */
  channelLink: string;
};

export function createBot(options: BotOptions): Bot {
  const { api, core } = options;
  const channel = new ChannelResolver(core.settings.channel, api, core.logger);

  const layer = createAccessLayer(core, {
    membership: new BotMembershipQuery(api, channel),
    notifier: new BotNotifier(api),
    formatNotice: options.formatNotice ?? englishNotice,
  });

  return {
    ...layer,
    handleMemberUpdate: createMemberUpdateHandler({
      channel,
      reconciler: layer.reconciler,
      logger: core.logger,
    }),
    channelLink: `https://t.me/${channelUsername(core.settings.channel)}`,
  };
}
