// shardcore/test/contract_models.test.ts

import test from "node:test";
import assert from "node:assert/strict";

import { MalformedPayloadError, UnsupportedOperationError } from "../core/errors";
import { ChannelType, isTextual } from "../models/Channel";
import { parseSnowflake, snowflakeTimestamp, snowflakeToString } from "../models/Snowflake";
import { StubClient, rawChannel, rawGuild, rawMessage, rawUser } from "./testUtils";

test("[models] snowflakes parse from strings and carry their creation time", () => {
  const id = parseSnowflake("175928847299117063");

  assert.equal(id, 175928847299117063n);
  assert.equal(snowflakeTimestamp(id), 1462015105796);
  assert.equal(snowflakeToString(id), "175928847299117063");
  assert.throws(() => parseSnowflake("12a"));
});

test("[models] channel types map onto the closed variant", () => {
  const { models } = new StubClient();

  assert.equal(models.makeChannel(rawChannel("1", ChannelType.GuildText, "10")).kind, "text");
  assert.equal(models.makeChannel(rawChannel("2", ChannelType.GuildVoice, "10")).kind, "voice");
  assert.equal(models.makeChannel(rawChannel("3", ChannelType.GuildCategory, "10")).kind, "category");
  assert.equal(models.makeChannel(rawChannel("4", ChannelType.PublicThread, "10")).kind, "thread");

  const odd = models.makeChannel(rawChannel("5", 99, "10"));
  assert.equal(odd.kind, "unsupported");
  assert.equal(odd.snapshot.kind === "unsupported" ? odd.snapshot.rawType : null, 99);
  assert.equal(isTextual(odd.snapshot), false);
});

test("[models] sending to a voice channel is refused without a request", async () => {
  const client = new StubClient();
  const voice = client.models.makeChannel(rawChannel("2", ChannelType.GuildVoice, "10"));

  await assert.rejects(voice.sendMessage("hello"), UnsupportedOperationError);
  assert.equal(client.http.sent.length, 0);
});

test("[models] sending to a text channel returns the created message", async () => {
  const client = new StubClient();
  const text = client.models.makeChannel(rawChannel("50", ChannelType.GuildText, "10"));

  const message = await text.sendMessage("hello");
  assert.deepEqual(client.http.sent, [{ channelId: 50n, content: "hello" }]);
  assert.equal(message.id, 901n);
  assert.equal(message.content, "hello");
  assert.equal(message.author.bot, true);
});

test("[models] guild updates are copy-on-write", () => {
  const { models } = new StubClient();
  const guild = models.upgradeGuild(
    models.parseGuild(rawGuild("10", { channels: [rawChannel("50", ChannelType.GuildText)] })),
  );

  assert.equal(Object.isFrozen(guild), true);
  assert.equal(guild.channel(50n)?.guildId, 10n);

  const added = guild.withChannel(models.makeChannel(rawChannel("51", ChannelType.GuildText, "10")));
  assert.notEqual(added, guild);
  assert.equal(added.channels.size, 2);
  assert.equal(guild.channels.size, 1);

  const removed = added.withoutChannel(50n);
  assert.deepEqual([...removed.channels.keys()], [51n]);
  assert.equal(removed.withoutChannel(999n), removed);
});

test("[models] an unavailable guild object becomes a stub", () => {
  const { models } = new StubClient();
  const stub = models.makeGuild({ id: "10", unavailable: true });

  assert.equal(stub.unavailable, true);
  assert.equal(stub.id, 10n);
});

test("[models] member display names prefer the nickname", () => {
  const { models } = new StubClient();
  const member = models.makeMember({ user: { ...rawUser("7", "someone"), global_name: "Some One" }, nick: "nick" }, 10n);
  const plain = models.makeMember({ user: { ...rawUser("8", "other"), global_name: "Other" } }, 10n);

  assert.equal(member.displayName, "nick");
  assert.equal(plain.displayName, "Other");
  assert.deepEqual(plain.roles, []);
});

test("[models] invalid bodies raise MalformedPayloadError naming the field", () => {
  const { models } = new StubClient();

  assert.throws(
    () => models.makeMessage(rawMessage({ id: "x1", channelId: "50", content: "hi" })),
    (err: unknown) => err instanceof MalformedPayloadError && err.message.startsWith("malformed message at id"),
  );
});
