// shardcore/test/contract_objectCache.test.ts

import test from "node:test";
import assert from "node:assert/strict";

import { sleep } from "../core/time";
import { ChannelType } from "../models/Channel";
import { unavailableGuild } from "../models/Guild";
import { StubClient, rawChannel, rawGuild, rawUser } from "./testUtils";

test("[cache] putGuild indexes the guild's channels and member users", () => {
  const { cache, models } = new StubClient();
  const guild = models.makeGuild(
    rawGuild("10", {
      channels: [rawChannel("50", ChannelType.GuildText)],
      members: [{ user: rawUser("7", "someone") }],
    }),
  );

  assert.equal(cache.putGuild(guild), undefined);
  assert.equal(cache.channel(50n)?.guildId, 10n);
  assert.equal(cache.user(7n)?.username, "someone");
  assert.equal(Object.isFrozen(cache.guild(10n)), true);
});

test("[cache] writes replace the whole value", () => {
  const { cache, models } = new StubClient();
  const before = models.makeGuild(rawGuild("10", { name: "Before" }));
  const after = models.makeGuild(rawGuild("10", { name: "After" }));

  cache.putGuild(before);
  assert.equal(cache.putGuild(after), before);
  assert.equal(cache.availableGuild(10n)?.name, "After");
  assert.equal(before.unavailable ? null : before.name, "Before");
});

test("[cache] availableGuild hides unavailable stubs", () => {
  const { cache } = new StubClient();
  cache.putGuild(unavailableGuild(10n));

  assert.equal(cache.guild(10n)?.unavailable, true);
  assert.equal(cache.availableGuild(10n), undefined);
  assert.deepEqual(cache.guildIds(), [10n]);
});

test("[cache] removeGuild drops the guild's channels too", () => {
  const { cache, models } = new StubClient();
  cache.putGuild(models.makeGuild(rawGuild("10", { channels: [rawChannel("50", ChannelType.GuildText)] })));

  cache.removeGuild(10n);
  assert.equal(cache.guild(10n), undefined);
  assert.equal(cache.channel(50n), undefined);
  assert.equal(cache.removeGuild(10n), undefined);
});

test("[cache] replaceExclusive serialises writers of one key", async () => {
  const { cache, models } = new StubClient();
  cache.putUser(models.makeUser(rawUser("1", "a")));

  const append = () =>
    cache.replaceExclusive("user", 1n, async (current) => {
      const name = current?.username ?? "";
      await sleep(5);
      return models.makeUser(rawUser("1", `${name}x`));
    });

  await Promise.all([append(), append()]);
  assert.equal(cache.user(1n)?.username, "axx");
});

test("[cache] replaceExclusive deletes when the producer returns undefined", async () => {
  const { cache, models } = new StubClient();
  cache.putUser(models.makeUser(rawUser("1", "a")));

  const result = await cache.replaceExclusive("user", 1n, async () => undefined);
  assert.equal(result, undefined);
  assert.equal(cache.user(1n), undefined);
  assert.equal(cache.userCount, 0);
});
