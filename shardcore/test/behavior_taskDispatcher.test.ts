// shardcore/test/behavior_taskDispatcher.test.ts

import test from "node:test";
import assert from "node:assert/strict";

import { CancelledError, GuildLeftError } from "../core/errors";
import { sleep } from "../core/time";
import { TaskDispatcher } from "../dispatch/TaskDispatcher";
import {
  FakeEventStream,
  StubClient,
  deferred,
  dispatchEvent,
  rawGuild,
  rawMessage,
  readyPayload,
  waitFor,
} from "./testUtils";

function messageDispatch(seq: number, content: string) {
  return dispatchEvent(0, "MESSAGE_CREATE", seq, rawMessage({ id: String(100 + seq), channelId: "50", content }));
}

test("[dispatch:task] no more than maxTasks handlers run at once", async () => {
  const client = new StubClient();
  const dispatcher = new TaskDispatcher(client, { maxTasks: 2 });

  let active = 0;
  let peak = 0;
  let finished = 0;
  dispatcher.on("message_create", async () => {
    active++;
    peak = Math.max(peak, active);
    await sleep(20);
    active--;
    finished++;
  });

  const running = dispatcher.run({ enableChunking: false });
  for (let seq = 1; seq <= 6; seq++) await client.stream.push(messageDispatch(seq, `m${seq}`));
  client.stream.end();
  await running;

  assert.equal(peak, 2);
  assert.equal(finished, 6);
  assert.equal(dispatcher.limiter.borrowed, 0);
});

test("[dispatch:task] a failing handler does not stop other handlers or later events", async () => {
  const client = new StubClient();
  const dispatcher = new TaskDispatcher(client);
  const seen: string[] = [];

  dispatcher.on("message_create", function broken() {
    throw new Error("boom");
  });
  dispatcher.on("message_create", (_ctx, event) => {
    seen.push(event.message.content);
  });

  const running = dispatcher.run({ enableChunking: false });
  await client.stream.push(messageDispatch(1, "one"));
  await client.stream.push(messageDispatch(2, "two"));
  client.stream.end();
  await running;

  assert.deepEqual(seen, ["one", "two"]);
});

test("[dispatch:task] ready fires once, after the shard_ready that completes the set", async () => {
  const client = new StubClient(new FakeEventStream(2));
  const dispatcher = new TaskDispatcher(client);
  const order: string[] = [];

  for (const type of ["connected", "guild_streamed", "shard_ready", "ready"] as const) {
    dispatcher.on(type, (ctx) => {
      order.push(`${type}:${ctx.shardId}`);
    });
  }

  const running = dispatcher.run({ enableChunking: false });
  await client.stream.push(dispatchEvent(0, "READY", 1, readyPayload([])));
  await client.stream.push(dispatchEvent(1, "READY", 1, readyPayload(["10"])));
  await client.stream.push(dispatchEvent(1, "GUILD_CREATE", 2, rawGuild("10")));
  client.stream.end();
  await running;

  assert.deepEqual(order, [
    "connected:0",
    "shard_ready:0",
    "connected:1",
    "guild_streamed:1",
    "shard_ready:1",
    "ready:1",
  ]);
});

test("[dispatch:task] gateway events reach their handlers inline with dispatch context", async () => {
  const client = new StubClient();
  const dispatcher = new TaskDispatcher(client);
  const names: (string | null)[] = [];

  dispatcher.on("gateway.dispatch", (ctx) => {
    names.push(ctx.dispatchName);
  });

  const running = dispatcher.run({ enableChunking: false });
  await client.stream.push(messageDispatch(1, "one"));
  await client.stream.push({ type: "gateway.heartbeat_ack", shardId: 0, ackCount: 1 });
  client.stream.end();
  await running;

  assert.deepEqual(names, ["MESSAGE_CREATE"]);
});

test("[dispatch:task] large guilds get a member request when chunking is on", async () => {
  const client = new StubClient();
  const dispatcher = new TaskDispatcher(client);

  const controller = new AbortController();
  const running = dispatcher.run({}, controller.signal);
  await client.stream.push(dispatchEvent(0, "GUILD_CREATE", 1, rawGuild("10", { large: true })));
  await waitFor(() => client.stream.commands.length === 1, "a member request");

  assert.equal(client.stream.commands[0].command.type, "request_guild_members");
  assert.equal(dispatcher.chunker.isFullyChunked(10n), false);

  await client.stream.push(
    dispatchEvent(0, "GUILD_MEMBERS_CHUNK", 2, { guild_id: "10", members: [], chunk_index: 0, chunk_count: 1 }),
  );
  await dispatcher.chunker.waitForGuild(10n);

  controller.abort();
  await running;
});

test("[dispatch:task] a handler removed with off() is no longer called", async () => {
  const client = new StubClient();
  const dispatcher = new TaskDispatcher(client);
  let calls = 0;

  const registration = dispatcher.on("message_create", () => {
    calls++;
  });

  const running = dispatcher.run({ enableChunking: false });
  await client.stream.push(messageDispatch(1, "one"));
  await waitFor(() => calls === 1, "the first delivery");
  assert.equal(dispatcher.off(registration), true);
  await client.stream.push(messageDispatch(2, "two"));
  client.stream.end();
  await running;

  assert.equal(calls, 1);
});

test("[dispatch:task] aborting mid-handler cancels it and run waits for it to finish", async () => {
  const client = new StubClient();
  const dispatcher = new TaskDispatcher(client);
  const started = deferred();
  const order: string[] = [];

  dispatcher.on("message_create", async (ctx) => {
    started.resolve();
    try {
      await sleep(10_000, ctx.signal);
      order.push("handler completed");
    } catch (err) {
      order.push(err instanceof CancelledError ? "handler cancelled" : "handler failed");
      await sleep(20);
      order.push("handler acknowledged");
      throw err;
    }
  });

  const controller = new AbortController();
  const running = dispatcher.run({ enableChunking: false }, controller.signal);
  await client.stream.push(messageDispatch(1, "one"));
  await started.promise;

  controller.abort();
  await running;
  order.push("run resolved");

  assert.deepEqual(order, ["handler cancelled", "handler acknowledged", "run resolved"]);
});

test("[dispatch:task] leaving a guild mid-chunking settles the chunk wait", async () => {
  const client = new StubClient();
  const dispatcher = new TaskDispatcher(client);

  const controller = new AbortController();
  const running = dispatcher.run({}, controller.signal);
  await client.stream.push(dispatchEvent(0, "GUILD_CREATE", 1, rawGuild("10", { large: true })));
  await waitFor(() => client.stream.commands.length === 1, "a member request");
  const waiting = dispatcher.chunker.waitForGuild(10n);

  await client.stream.push(dispatchEvent(0, "GUILD_DELETE", 2, { id: "10" }));
  await assert.rejects(waiting, GuildLeftError);

  controller.abort();
  await running;
});
