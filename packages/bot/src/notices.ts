/**
 * Default English notice texts.
 */

import type { Notice } from "@channelgate/core";

export function englishNotice(notice: Notice): string {
  switch (notice.kind) {
    case "access_granted":
      return [
        `Welcome to the channel, ${notice.displayName}!`,
        "",
        "Your personal proxy is ready. Tap the link to connect:",
        notice.link,
        "",
        "The proxy stays active while you remain in the channel. Please do not share it.",
      ].join("\n");
    case "access_restored":
      return [
        `Welcome back, ${notice.displayName}!`,
        "",
        "Your proxy is still active:",
        notice.link,
      ].join("\n");
    case "access_revoked":
      return [
        "Your proxy has been deactivated because you left the channel.",
        "",
        "Join the channel again to get a new one automatically.",
      ].join("\n");
  }
}
