import { describe, expect, test } from "vitest";
import { createAccessHarness, parseSettings } from "@channelgate/core";
import type { CoreServices } from "@channelgate/core";
import { createBot } from "./bot.js";
import { FakeBotApi, memberUpdate, user } from "./fake-api.js";

function setup(channel = "https://t.me/example_channel") {
  const h = createAccessHarness();
  const core: CoreServices = {
    settings: parseSettings({ version: 1, channel }),
    logger: h.logger,
    clock: h.clock,
    store: h.store,
    coordinator: h.coordinator,
    registry: h.registry,
    links: h.links,
  };
  const api = new FakeBotApi();
  return { h, api, bot: createBot({ api, core }) };
}

describe("createBot", () => {
  test("links to the channel by name", () => {
    expect(setup().bot.channelLink).toBe("https://t.me/example_channel");
  });

  test("a join sends the English welcome with a proxy link", async () => {
    const { api, bot } = setup();

    const result = await bot.handleMemberUpdate(memberUpdate(user(42, { username: "alice" }), "left", "member"));
    await bot.reconciler.flush();

    expect(result.ok && result.value.kind).toBe("joined");
    expect(api.messages).toHaveLength(1);
    const [message] = api.messages;
    expect(message?.chatId).toBe(42);
    expect(message?.text.split("\n")[0]).toBe("Welcome to the channel, alice!");
    expect(message?.text).toMatch(/secret=dd[0-9a-f]{32}/);
    expect(bot.stats.snapshot()).toMatchObject({ joins: 1, proxiesCreated: 1 });
  });

  test("requests check membership through the API", async () => {
    const { api, bot } = setup();

    const denied = await bot.access.requestAccess(42, "alice");
    expect(denied).toEqual({ ok: false, error: { kind: "not_member" } });

    api.statuses.set(42, "member");
    const granted = await bot.access.requestAccess(42, "alice");
    expect(granted.ok && granted.value.kind).toBe("granted");
  });
});
