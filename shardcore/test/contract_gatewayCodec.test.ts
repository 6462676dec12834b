// shardcore/test/contract_gatewayCodec.test.ts

import test from "node:test";
import assert from "node:assert/strict";
import { deflateSync } from "node:zlib";

import { MalformedPayloadError } from "../core/errors";
import { decodeFrame, encodeCommand, toEnvelope } from "../gateway/GatewayCodec";
import { memberChunkRequest, presenceUpdate } from "../gateway/GatewayEvents";
import { GatewayOp, classifyCloseCode } from "../gateway/GatewayOpcodes";

test("[codec] identify carries token, shard pair and intents", () => {
  const env = toEnvelope({
    type: "identify",
    token: "test-secret",
    shard: { shardId: 1, shardCount: 4 },
    intents: 513,
    properties: { os: "linux", browser: "shardline", device: "shardline" },
  });

  assert.equal(env.op, GatewayOp.Identify);
  assert.deepEqual(env.d, {
    token: "test-secret",
    properties: { os: "linux", browser: "shardline", device: "shardline" },
    compress: false,
    large_threshold: 50,
    shard: [1, 4],
    intents: 513,
  });
});

test("[codec] resume and heartbeat encode to their wire shapes", () => {
  assert.equal(
    encodeCommand({ type: "resume", token: "test-secret", sessionId: "abc", sequence: 12 }),
    '{"op":6,"d":{"token":"test-secret","session_id":"abc","seq":12},"s":null,"t":null}',
  );
  assert.equal(encodeCommand({ type: "heartbeat", sequence: null }), '{"op":1,"d":null,"s":null,"t":null}');
});

test("[codec] member request keeps only the fields that were given", () => {
  const env = toEnvelope(memberChunkRequest({ guildId: 41771983423143937n, query: "", limit: 0 }));

  assert.equal(env.op, GatewayOp.RequestGuildMembers);
  assert.deepEqual(env.d, { guild_id: "41771983423143937", presences: false, query: "", limit: 0 });
});

test("[codec] member request by user ids sends them as strings", () => {
  const env = toEnvelope(memberChunkRequest({ guildId: 10n, userIds: [5n, 6n], nonce: "n1" }));
  assert.deepEqual(env.d, { guild_id: "10", presences: false, user_ids: ["5", "6"], nonce: "n1" });
});

test("[codec] memberChunkRequest rejects incomplete requests", () => {
  assert.throws(() => memberChunkRequest({ guildId: 10n }), RangeError);
  assert.throws(() => memberChunkRequest({ guildId: 10n, query: "ab" }), RangeError);
  assert.throws(() => memberChunkRequest({ guildId: 10n, userIds: [1n], nonce: "x".repeat(33) }), RangeError);
});

test("[codec] presence update for online has no idle timestamp", () => {
  assert.deepEqual(toEnvelope(presenceUpdate("online")).d, {
    since: null,
    activities: [],
    status: "online",
    afk: false,
  });
});

test("[codec] zlib-compressed binary frames decode like text frames", () => {
  const text = '{"op":0,"d":{"x":1},"s":3,"t":"SOMETHING"}';

  const fromBinary = decodeFrame(deflateSync(Buffer.from(text, "utf-8")));
  assert.deepEqual(fromBinary, { op: 0, d: { x: 1 }, s: 3, t: "SOMETHING" });
  assert.deepEqual(decodeFrame(text), fromBinary);
});

test("[codec] missing s and t decode as null", () => {
  assert.deepEqual(decodeFrame('{"op":11}'), { op: 11, d: undefined, s: null, t: null });
});

test("[codec] bad frames raise MalformedPayloadError", () => {
  assert.throws(() => decodeFrame("not json"), MalformedPayloadError);
  assert.throws(() => decodeFrame('{"d":1}'), MalformedPayloadError);
  assert.throws(() => decodeFrame(Buffer.from("plain bytes")), MalformedPayloadError);
});

test("[codec] close codes map to resume, identify or fatal", () => {
  assert.equal(classifyCloseCode(1006), "resume");
  assert.equal(classifyCloseCode(4000), "resume");
  assert.equal(classifyCloseCode(4007), "identify");
  assert.equal(classifyCloseCode(4009), "identify");
  assert.equal(classifyCloseCode(4004), "fatal");
  assert.equal(classifyCloseCode(4014), "fatal");
});
