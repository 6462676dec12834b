// shardcore/test/contract_gatewayConnection.test.ts

import test from "node:test";
import assert from "node:assert/strict";
import { getEventListeners } from "node:events";

import { gatewayOptions, type GatewayOptions } from "../config/config";
import { AsyncChannel } from "../core/AsyncChannel";
import { AuthenticationError, RetryBudgetExhaustedError } from "../core/errors";
import { sleep } from "../core/time";
import { GatewayConnection } from "../gateway/GatewayConnection";
import { presenceUpdate, type IncomingGatewayEvent } from "../gateway/GatewayEvents";
import { GatewayOp } from "../gateway/GatewayOpcodes";
import { ScriptedConnector, TEST_GATEWAY_URL, TEST_TOKEN, readyPayload, waitFor, withTimeout } from "./testUtils";

const INITIAL_URL = "wss://gateway.test/?v=10&encoding=json";

function makeConnection(
  connector: ScriptedConnector,
  events: AsyncChannel<IncomingGatewayEvent>,
  overrides: Partial<GatewayOptions> = {},
): GatewayConnection {
  return new GatewayConnection({
    shard: { shardId: 0, shardCount: 1 },
    token: TEST_TOKEN,
    initialUrl: TEST_GATEWAY_URL,
    events,
    options: gatewayOptions({
      connector: connector.connect,
      backoffMinMs: 1,
      backoffMaxMs: 5,
      random: () => 0.5,
      ...overrides,
    }),
  });
}

async function drain(events: AsyncChannel<IncomingGatewayEvent>): Promise<IncomingGatewayEvent[]> {
  const out: IncomingGatewayEvent[] = [];
  while (events.size > 0) out.push(await events.receive());
  return out;
}

test("[shard] identify, steady heartbeat with the live sequence, ack", async () => {
  const connector = new ScriptedConnector();
  const events = new AsyncChannel<IncomingGatewayEvent>(Infinity);
  // 0.005 * 41250 puts the first beat 206ms after Hello.
  const conn = makeConnection(connector, events, { random: () => 0.005 });
  const controller = new AbortController();
  const running = conn.run(controller.signal);

  const socket = await connector.nextSocket();
  assert.equal(connector.urls[0], INITIAL_URL);

  socket.hello(41_250);
  const identify = await socket.nextSent();
  assert.equal(identify.op, GatewayOp.Identify);
  assert.equal(conn.state, "identifying");

  socket.dispatch("READY", 1, readyPayload([], "abc"));
  socket.dispatch("TYPING_START", 2, {});
  await waitFor(() => conn.session.sequence === 2, "sequence 2");
  assert.equal(conn.state, "steady");
  assert.equal(conn.session.sessionId, "abc");

  const beat = await socket.nextSent();
  assert.deepEqual(beat, { op: GatewayOp.Heartbeat, d: 2, s: null, t: null });

  socket.ack();
  await waitFor(() => conn.ackCount === 1, "heartbeat ack");
  assert.equal(conn.heartbeatCount, 1);
  assert.equal(conn.state, "steady");

  controller.abort();
  await running;
  assert.deepEqual(socket.closedWith, { code: 1000, reason: "shutting down" });
  assert.equal(conn.state, "closed");

  const seen = await drain(events);
  assert.deepEqual(
    seen.map((e) => e.type),
    ["gateway.hello", "gateway.dispatch", "gateway.dispatch", "gateway.heartbeat_sent", "gateway.heartbeat_ack"],
  );
});

test("[shard] a missed heartbeat ack closes as zombie and resumes exactly once", async () => {
  const connector = new ScriptedConnector();
  const events = new AsyncChannel<IncomingGatewayEvent>(Infinity);
  const conn = makeConnection(connector, events, { random: () => 0 });
  const controller = new AbortController();
  const running = conn.run(controller.signal);

  const first = await connector.nextSocket();
  first.hello(100);
  first.dispatch("READY", 1, readyPayload([], "abc", "wss://resume.test"));
  assert.equal((await first.nextSent()).op, GatewayOp.Identify);
  assert.equal((await first.nextSent()).op, GatewayOp.Heartbeat);

  const second = await connector.nextSocket();
  assert.deepEqual(first.closedWith, { code: 4100, reason: "heartbeat ack not received" });
  assert.equal(connector.urls[1], "wss://resume.test/?v=10&encoding=json");

  second.hello(100);
  assert.deepEqual(await second.nextSent(), {
    op: GatewayOp.Resume,
    d: { token: TEST_TOKEN, session_id: "abc", seq: 1 },
    s: null,
    t: null,
  });
  assert.equal(connector.sockets.length, 2);

  controller.abort();
  await running;
});

test("[shard] non-resumable invalidation identifies again on the initial url", async () => {
  const connector = new ScriptedConnector();
  const conn = makeConnection(connector, new AsyncChannel<IncomingGatewayEvent>(Infinity));
  const controller = new AbortController();
  const running = conn.run(controller.signal);

  const first = await connector.nextSocket();
  first.hello(41_250);
  await first.nextSent();
  first.dispatch("READY", 1, readyPayload([], "abc", "wss://resume.test"));
  await waitFor(() => conn.state === "steady", "steady");

  first.invalidate(false);
  const second = await connector.nextSocket();
  assert.equal(conn.session.sessionId, null);
  assert.equal(connector.urls[1], INITIAL_URL);

  second.hello(41_250);
  assert.equal((await second.nextSent()).op, GatewayOp.Identify);

  controller.abort();
  await running;
});

test("[shard] resumable invalidation keeps the session and resumes", async () => {
  const connector = new ScriptedConnector();
  const conn = makeConnection(connector, new AsyncChannel<IncomingGatewayEvent>(Infinity));
  const controller = new AbortController();
  const running = conn.run(controller.signal);

  const first = await connector.nextSocket();
  first.hello(41_250);
  await first.nextSent();
  first.dispatch("READY", 1, readyPayload([], "abc"));
  await waitFor(() => conn.state === "steady", "steady");

  first.invalidate(true);
  const second = await connector.nextSocket();
  second.hello(41_250);
  const resume = await second.nextSent();
  assert.equal(resume.op, GatewayOp.Resume);
  assert.deepEqual(resume.d, { token: TEST_TOKEN, session_id: "abc", seq: 1 });

  controller.abort();
  await running;
});

test("[shard] a server reconnect request starts a fresh session", async () => {
  const connector = new ScriptedConnector();
  const conn = makeConnection(connector, new AsyncChannel<IncomingGatewayEvent>(Infinity));
  const controller = new AbortController();
  const running = conn.run(controller.signal);

  const first = await connector.nextSocket();
  first.hello(41_250);
  await first.nextSent();
  first.dispatch("READY", 1, readyPayload([], "abc"));
  await waitFor(() => conn.state === "steady", "steady");

  first.requestReconnect();
  const second = await connector.nextSocket();
  assert.deepEqual(first.closedWith, { code: 4000, reason: "reconnecting" });

  second.hello(41_250);
  assert.equal((await second.nextSent()).op, GatewayOp.Identify);

  controller.abort();
  await running;
});

test("[shard] close code 4004 fails with AuthenticationError and no retry", async () => {
  const connector = new ScriptedConnector();
  const conn = makeConnection(connector, new AsyncChannel<IncomingGatewayEvent>(Infinity));
  const running = conn.run(new AbortController().signal);

  const socket = await connector.nextSocket();
  socket.serverClose(4004, "Authentication failed");

  await assert.rejects(running, AuthenticationError);
  assert.equal(conn.state, "closed");
  assert.equal(connector.sockets.length, 1);
});

test("[shard] consecutive failed attempts exhaust the retry budget", async () => {
  const connector = new ScriptedConnector();
  connector.refuse = new Error("connection refused");
  const conn = makeConnection(connector, new AsyncChannel<IncomingGatewayEvent>(Infinity), { retryBudget: 3 });

  await assert.rejects(
    conn.run(new AbortController().signal),
    (err: unknown) => err instanceof RetryBudgetExhaustedError && err.attempts === 3,
  );
  assert.equal(connector.urls.length, 3);
});

test("[shard] voidable events are dropped while the stream is full; dispatches wait", async () => {
  const connector = new ScriptedConnector();
  const events = new AsyncChannel<IncomingGatewayEvent>(0);
  const conn = makeConnection(connector, events);
  const controller = new AbortController();
  const running = conn.run(controller.signal);

  const socket = await connector.nextSocket();
  socket.hello(41_250);
  await socket.nextSent();
  socket.dispatch("READY", 1, readyPayload([], "abc"));

  await waitFor(() => events.blockedSenders === 1, "a blocked dispatch");
  // Nobody was receiving when Hello arrived.
  assert.equal(conn.droppedEventCount, 1);
  const first = await events.receive();
  assert.equal(first.type, "gateway.dispatch");
  assert.equal(first.type === "gateway.dispatch" ? first.eventName : null, "READY");

  controller.abort();
  await running;
});

test("[shard] a dispatch with an older sequence is dropped", async () => {
  const connector = new ScriptedConnector();
  const events = new AsyncChannel<IncomingGatewayEvent>(Infinity);
  const conn = makeConnection(connector, events);
  const controller = new AbortController();
  const running = conn.run(controller.signal);

  const socket = await connector.nextSocket();
  socket.hello(41_250);
  await socket.nextSent();
  socket.dispatch("READY", 1, readyPayload([], "abc"));
  socket.dispatch("TYPING_START", 3, {});
  socket.dispatch("TYPING_START", 2, {});
  socket.dispatch("PRESENCE_UPDATE", 4, {});
  await waitFor(() => conn.session.sequence === 4, "sequence 4");

  controller.abort();
  await running;

  const sequences = (await drain(events)).flatMap((e) => (e.type === "gateway.dispatch" ? [e.sequence] : []));
  assert.deepEqual(sequences, [1, 3, 4]);
});

test("[shard] commands queued before the session is steady go out after READY", async () => {
  const connector = new ScriptedConnector();
  const conn = makeConnection(connector, new AsyncChannel<IncomingGatewayEvent>(Infinity));
  assert.equal(conn.commands.trySend(presenceUpdate("online")), true);

  const controller = new AbortController();
  const running = conn.run(controller.signal);

  const socket = await connector.nextSocket();
  socket.hello(41_250);
  assert.equal((await socket.nextSent()).op, GatewayOp.Identify);

  await sleep(20);
  assert.equal(socket.sent.size, 0);

  socket.dispatch("READY", 1, readyPayload([], "abc"));
  const presence = await socket.nextSent();
  assert.equal(presence.op, GatewayOp.PresenceUpdate);
  assert.deepEqual(presence.d, { since: null, activities: [], status: "online", afk: false });

  controller.abort();
  await running;
});

test("[shard] heartbeats keep going while frames are backlogged", async () => {
  const connector = new ScriptedConnector();
  const events = new AsyncChannel<IncomingGatewayEvent>(0);
  const conn = makeConnection(connector, events, { random: () => 0 });
  const controller = new AbortController();
  const running = conn.run(controller.signal);

  const socket = await connector.nextSocket();
  socket.hello(100);
  socket.dispatch("READY", 1, readyPayload([], "abc"));
  let seq = 1;
  while (seq < 5) socket.dispatch("TYPING_START", ++seq, {});

  // Slow consumer: one event every few ms, topping the backlog back up each time.
  const consume = async (): Promise<void> => {
    while (conn.heartbeatCount < 3) {
      await events.receive(controller.signal);
      socket.dispatch("TYPING_START", ++seq, {});
      while (socket.sent.size > 0) {
        if ((await socket.sent.receive()).op === GatewayOp.Heartbeat) socket.ack();
      }
      await sleep(5);
    }
  };
  await withTimeout(consume(), 3_000, "three heartbeats");

  assert.equal(connector.sockets.length, 1);
  assert.equal(socket.closedWith, null);
  assert.equal(conn.state, "steady");

  controller.abort();
  await running;
});

test("[shard] a backlog does not hide a missing heartbeat ack", async () => {
  const connector = new ScriptedConnector();
  const events = new AsyncChannel<IncomingGatewayEvent>(0);
  const conn = makeConnection(connector, events, { random: () => 0 });
  const controller = new AbortController();
  const running = conn.run(controller.signal);

  const socket = await connector.nextSocket();
  socket.hello(40);
  socket.dispatch("READY", 1, readyPayload([], "abc"));
  let seq = 1;
  while (seq < 5) socket.dispatch("TYPING_START", ++seq, {});

  const consume = async (): Promise<void> => {
    while (socket.closedWith === null) {
      await events.receive(controller.signal);
      if (socket.closedWith === null) socket.dispatch("TYPING_START", ++seq, {});
      await sleep(5);
    }
  };
  const consuming = consume();

  await connector.nextSocket();
  assert.deepEqual(socket.closedWith, { code: 4100, reason: "heartbeat ack not received" });
  assert.equal(conn.heartbeatCount, 1);

  controller.abort();
  await running;
  await consuming.catch(() => undefined);
});

test("[shard] no Hello within the timeout reconnects", async () => {
  const connector = new ScriptedConnector();
  const conn = makeConnection(connector, new AsyncChannel<IncomingGatewayEvent>(Infinity), { helloTimeoutMs: 30 });
  const controller = new AbortController();
  const running = conn.run(controller.signal);

  const first = await connector.nextSocket();
  const second = await connector.nextSocket();
  assert.deepEqual(first.closedWith, { code: 4000, reason: "reconnecting" });
  assert.equal(first.sent.size, 0);
  assert.equal(connector.urls[1], INITIAL_URL);

  second.hello(41_250);
  assert.equal((await second.nextSent()).op, GatewayOp.Identify);

  controller.abort();
  await running;
});

test("[shard] sustained steady state resets the retry budget", async () => {
  const connector = new ScriptedConnector();
  const conn = makeConnection(connector, new AsyncChannel<IncomingGatewayEvent>(Infinity), {
    retryBudget: 2,
    backoffResetAfterMs: 20,
  });
  const running = conn.run(new AbortController().signal);

  const first = await connector.nextSocket();
  first.hello(41_250);
  await first.nextSent();
  first.dispatch("READY", 1, readyPayload([], "abc"));
  await waitFor(() => conn.state === "steady", "steady");
  await sleep(40);
  first.serverClose(1000);

  // Only the two short sessions after the reset count against the budget.
  (await connector.nextSocket()).serverClose(1000);
  (await connector.nextSocket()).serverClose(1000);

  await assert.rejects(
    running,
    (err: unknown) => err instanceof RetryBudgetExhaustedError && err.attempts === 2,
  );
  assert.equal(connector.sockets.length, 3);
});

test("[shard] reconnects do not pile up abort listeners on the run signal", async () => {
  const connector = new ScriptedConnector();
  const conn = makeConnection(connector, new AsyncChannel<IncomingGatewayEvent>(Infinity), { retryBudget: 0 });
  const controller = new AbortController();
  const running = conn.run(controller.signal);

  for (let i = 0; i < 12; i++) {
    const socket = await connector.nextSocket();
    await waitFor(() => conn.state === "awaiting_hello", "awaiting hello");
    assert.equal(getEventListeners(controller.signal, "abort").length, 1);
    socket.serverClose(1000);
  }

  controller.abort();
  await running;
});
