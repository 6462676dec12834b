//shardcore/gateway/GatewayConnection.ts

import { AsyncChannel } from "../core/AsyncChannel";
import {
  AuthenticationError,
  DisallowedIntentsError,
  FatalGatewayError,
  GatewayClosedError,
  RetryBudgetExhaustedError,
  ShardingError,
  ZombieConnectionError,
  isCancellation,
} from "../core/errors";
import { withTaskScope, type TaskScope } from "../core/TaskScope";
import { deadlineSignal, sleep } from "../core/time";
import type { GatewayOptions } from "../config/config";
import { Logger } from "../utils/logger";
import { Backoff } from "./Backoff";
import { HelloSchema, ReadySessionSchema, decodeFrame, encodeCommand, type GatewayEnvelope } from "./GatewayCodec";
import type {
  IncomingGatewayEvent,
  OutgoingGatewayEvent,
  ShardCommand,
  ShardIdentity,
} from "./GatewayEvents";
import { GATEWAY_VERSION, GatewayCloseCode, GatewayOp, classifyCloseCode } from "./GatewayOpcodes";
import type { GatewaySocket, SocketFrame } from "./GatewaySocket";
import { SessionState, type SessionSnapshot } from "./SessionState";

export type ConnectionState =
  | "disconnected"
  | "connecting"
  | "awaiting_hello"
  | "identifying"
  | "resuming"
  | "steady"
  | "reconnecting"
  | "closed";

export type StateListener = (state: ConnectionState, previous: ConnectionState) => void;

export interface GatewayConnectionInit {
  shard: ShardIdentity;
  token: string;
  initialUrl: string;
  /** Shared fan-in stream; the connection never closes it. */
  events: AsyncChannel<IncomingGatewayEvent>;
  options: GatewayOptions;
}

type LoopInput = { kind: "frame"; frame: SocketFrame } | { kind: "command"; command: ShardCommand };

type SessionEnd =
  | { kind: "closed"; code: number; reason: string }
  | { kind: "zombie" }
  | { kind: "hello_timeout" }
  | { kind: "reconnect_requested" }
  | { kind: "invalidated"; resumable: boolean };

/**
 * One shard's gateway connection.
 *
 * `run()` owns the transport for its whole life: connect, Hello, Identify or
 * Resume, steady heartbeating, and reconnects with backoff. Only fatal errors
 * (and a spent retry budget) escape it; cancellation returns normally.
 *
 * Everything on the wire for one session happens in a single loop, so frames,
 * heartbeats and outgoing commands never interleave mid-write.
 */
export class GatewayConnection {
  /** Outgoing commands; buffered while the shard is not steady. */
  readonly commands: AsyncChannel<ShardCommand>;

  private readonly sessionState = new SessionState();
  private readonly backoff: Backoff;
  private readonly listeners = new Set<StateListener>();
  private readonly log: Logger;
  // Pulled from `commands` but not written before the session ended.
  private readonly carryOver: ShardCommand[] = [];

  private current: ConnectionState = "disconnected";
  private steadySince: number | null = null;
  private failedAttempts = 0;
  private sentHeartbeats = 0;
  private receivedAcks = 0;
  private droppedEvents = 0;

  constructor(private readonly init: GatewayConnectionInit) {
    this.commands = new AsyncChannel<ShardCommand>(init.options.outboundQueueSize);
    this.backoff = new Backoff(
      { minMs: init.options.backoffMinMs, maxMs: init.options.backoffMaxMs },
      init.options.random,
    );
    this.log = Logger.scope("SHARD").child(String(init.shard.shardId));
  }

  get shardId(): number {
    return this.init.shard.shardId;
  }

  get shardCount(): number {
    return this.init.shard.shardCount;
  }

  get state(): ConnectionState {
    return this.current;
  }

  get session(): SessionSnapshot {
    return this.sessionState.snapshot();
  }

  get heartbeatCount(): number {
    return this.sentHeartbeats;
  }

  get ackCount(): number {
    return this.receivedAcks;
  }

  /** Voidable events dropped because the event stream was full. */
  get droppedEventCount(): number {
    return this.droppedEvents;
  }

  onStateChange(listener: StateListener): () => void {
    this.listeners.add(listener);
    return () => {
      this.listeners.delete(listener);
    };
  }

  // ---------------------------------------------------------------------------
  // Lifecycle
  // ---------------------------------------------------------------------------

  async run(signal: AbortSignal): Promise<void> {
    try {
      while (!signal.aborted) {
        let cause: unknown;
        try {
          const end = await this.attempt(signal);
          cause = this.settle(end);
        } catch (err) {
          if (err instanceof FatalGatewayError || signal.aborted) throw err;
          this.log.warn("Connection attempt failed", { err });
          cause = err;
        }

        const steadyMs = this.steadySince === null ? 0 : Date.now() - this.steadySince;
        this.steadySince = null;

        if (steadyMs >= this.init.options.backoffResetAfterMs) {
          this.backoff.reset();
          this.failedAttempts = 0;
        } else {
          this.failedAttempts++;
        }

        const budget = this.init.options.retryBudget;
        if (budget > 0 && this.failedAttempts >= budget) {
          throw new RetryBudgetExhaustedError(this.shardId, this.failedAttempts, cause);
        }

        this.setState("reconnecting");
        const delay = this.backoff.next();
        this.log.warn(`Reconnecting in ${delay}ms`, { failedAttempts: this.failedAttempts });
        await sleep(delay, signal);
      }
    } catch (err) {
      if (isCancellation(err) && signal.aborted) return;
      throw err;
    } finally {
      this.setState("closed");
      this.commands.close();
    }
  }

  private async attempt(signal: AbortSignal): Promise<SessionEnd> {
    this.setState("connecting");
    const url = this.gatewayUrl();
    this.log.debug(`Connecting to ${url}`);

    const connectTimeoutMs = this.init.options.connectTimeoutMs;
    const deadline = deadlineSignal(connectTimeoutMs, signal);
    let socket: GatewaySocket;
    try {
      socket = await this.init.options.connector(url, deadline.signal);
    } catch (err) {
      if (deadline.expired()) {
        throw new GatewayClosedError(GatewayCloseCode.Abnormal, `connect timed out after ${connectTimeoutMs}ms`);
      }
      throw err;
    } finally {
      deadline.dispose();
    }

    let closeCode: number = GatewayCloseCode.UnknownError;
    let closeReason = "reconnecting";
    try {
      const end = await this.runSession(socket, signal);
      if (end.kind === "zombie") {
        closeCode = GatewayCloseCode.Zombie;
        closeReason = "heartbeat ack not received";
      }
      return end;
    } catch (err) {
      if (signal.aborted) {
        closeCode = GatewayCloseCode.Normal;
        closeReason = "shutting down";
      }
      throw err;
    } finally {
      socket.close(closeCode, closeReason);
    }
  }

  /** Apply what the end of a session means for the next attempt. Throws when it is fatal. */
  private settle(end: SessionEnd): unknown {
    switch (end.kind) {
      case "closed": {
        const disposition = classifyCloseCode(end.code);
        if (disposition === "fatal") throw this.fatalFor(end.code, end.reason);
        if (disposition === "identify") this.sessionState.clear();

        const err = new GatewayClosedError(end.code, end.reason);
        this.log.warn(`Gateway closed (${end.code})`, { reason: end.reason, disposition });
        return err;
      }

      case "zombie":
        this.log.warn("No heartbeat ack within one interval, closing as zombie");
        return new ZombieConnectionError();

      case "hello_timeout":
        this.log.warn(`No Hello within ${this.init.options.helloTimeoutMs}ms`);
        return new GatewayClosedError(GatewayCloseCode.Abnormal, "hello not received");

      case "reconnect_requested":
        this.sessionState.clear();
        this.log.info("Server requested a reconnect");
        return new GatewayClosedError(GatewayCloseCode.UnknownError, "reconnect requested");

      case "invalidated":
        if (!end.resumable) this.sessionState.clear();
        this.log.info(`Session invalidated (resumable=${end.resumable})`);
        return new GatewayClosedError(GatewayCloseCode.UnknownError, "session invalidated");
    }
  }

  private fatalFor(code: number, reason: string): FatalGatewayError {
    const id = this.shardId;
    const cause = new GatewayClosedError(code, reason);

    switch (code) {
      case GatewayCloseCode.AuthenticationFailed:
        return new AuthenticationError(`shard ${id}: authentication failed`, id, { cause });
      case GatewayCloseCode.InvalidShard:
      case GatewayCloseCode.ShardingRequired:
        return new ShardingError(`shard ${id}: invalid sharding (${code})`, id, { cause });
      case GatewayCloseCode.InvalidIntents:
      case GatewayCloseCode.DisallowedIntents:
        return new DisallowedIntentsError(`shard ${id}: intents rejected (${code})`, id, { cause });
      default:
        return new FatalGatewayError(`shard ${id}: gateway refused the session (${code})`, id, { cause });
    }
  }

  // ---------------------------------------------------------------------------
  // Session loop
  // ---------------------------------------------------------------------------

  private runSession(socket: GatewaySocket, signal: AbortSignal): Promise<SessionEnd> {
    return withTaskScope(
      `shard-${this.shardId}`,
      async (scope) => {
        const inbox = new AsyncChannel<LoopInput>(0);
        scope.spawn("frames", (s) => this.pumpFrames(socket, inbox, s));

        this.setState("awaiting_hello");
        let interval: number | null = null;
        let nextBeatAt = Date.now() + this.init.options.helloTimeoutMs;
        let awaitingAck = false;

        while (true) {
          const input = await this.nextInput(inbox, nextBeatAt, scope.signal);

          if (input === null) {
            if (interval === null) return { kind: "hello_timeout" };
            if (awaitingAck) return { kind: "zombie" };
            await this.sendHeartbeat(socket);
            awaitingAck = true;
            nextBeatAt = Date.now() + interval;
            continue;
          }

          if (input.kind === "command") {
            try {
              await this.writeCommand(socket, input.command);
            } catch (err) {
              this.carryOver.push(input.command);
              throw err;
            }
            continue;
          }

          const frame = input.frame;
          if (frame.kind === "close") {
            return { kind: "closed", code: frame.code, reason: frame.reason };
          }

          let envelope: GatewayEnvelope;
          try {
            envelope = decodeFrame(frame.data);
          } catch (err) {
            this.log.warn("Dropping undecodable frame", { err });
            continue;
          }

          switch (envelope.op) {
            case GatewayOp.Hello: {
              if (interval !== null) break;
              const hello = HelloSchema.safeParse(envelope.d);
              if (!hello.success) {
                this.log.warn("Malformed Hello", { issues: hello.error.issues });
                break;
              }
              interval = hello.data.heartbeat_interval;
              nextBeatAt = Date.now() + Math.floor(this.init.options.random() * interval);
              this.log.info(`Hello received, heartbeat interval ${interval}ms`);
              this.emitVoidable({ type: "gateway.hello", shardId: this.shardId, heartbeatInterval: interval });
              await this.authenticate(socket);
              break;
            }

            case GatewayOp.HeartbeatAck:
              awaitingAck = false;
              this.receivedAcks++;
              this.emitVoidable({ type: "gateway.heartbeat_ack", shardId: this.shardId, ackCount: this.receivedAcks });
              break;

            case GatewayOp.Heartbeat:
              await this.sendHeartbeat(socket);
              break;

            case GatewayOp.Reconnect:
              this.emitVoidable({ type: "gateway.reconnect_requested", shardId: this.shardId });
              return { kind: "reconnect_requested" };

            case GatewayOp.InvalidSession: {
              const resumable = envelope.d === true;
              this.emitVoidable({ type: "gateway.invalidate_session", shardId: this.shardId, resumable });
              return { kind: "invalidated", resumable };
            }

            case GatewayOp.Dispatch:
              await this.handleDispatch(envelope, socket, inbox, scope);
              break;

            default:
              this.log.debug(`Ignoring opcode ${envelope.op}`);
          }
        }
      },
      signal,
    );
  }

  /** Next frame or command; null once `deadlineAt` passes first. */
  private async nextInput(
    inbox: AsyncChannel<LoopInput>,
    deadlineAt: number,
    signal: AbortSignal,
  ): Promise<LoopInput | null> {
    // A backlogged inbox never lets the timer win, so check the clock first.
    if (Date.now() >= deadlineAt) return null;

    const deadline = deadlineSignal(deadlineAt - Date.now(), signal);
    try {
      return await inbox.receive(deadline.signal);
    } catch (err) {
      if (deadline.expired() && !signal.aborted) return null;
      throw err;
    } finally {
      deadline.dispose();
    }
  }

  private async pumpFrames(socket: GatewaySocket, inbox: AsyncChannel<LoopInput>, signal: AbortSignal): Promise<void> {
    while (true) {
      const frame = await socket.receive(signal);
      await inbox.send({ kind: "frame", frame }, signal);
      if (frame.kind === "close") return;
    }
  }

  private async pumpCommands(inbox: AsyncChannel<LoopInput>, signal: AbortSignal): Promise<void> {
    while (true) {
      const command = await this.commands.receive(signal);
      try {
        await inbox.send({ kind: "command", command }, signal);
      } catch (err) {
        this.carryOver.push(command);
        throw err;
      }
    }
  }

  private async handleDispatch(
    envelope: GatewayEnvelope,
    socket: GatewaySocket,
    inbox: AsyncChannel<LoopInput>,
    scope: TaskScope,
  ): Promise<void> {
    if (envelope.t === null || envelope.s === null) {
      this.log.warn("Dispatch without name or sequence", { op: envelope.op, t: envelope.t, s: envelope.s });
      return;
    }

    if (!this.sessionState.acceptSequence(envelope.s)) {
      this.log.warn(`Dropping ${envelope.t}: sequence ${envelope.s} is behind ${this.sessionState.sequence}`);
      return;
    }

    if (envelope.t === "READY") {
      const ready = ReadySessionSchema.safeParse(envelope.d);
      if (ready.success) {
        this.sessionState.begin(ready.data.session_id, ready.data.resume_gateway_url ?? null);
        this.log.info(`Session ${ready.data.session_id} issued`);
        await this.enterSteady(socket, inbox, scope);
      } else {
        this.log.warn("READY without a usable session id", { issues: ready.error.issues });
      }
    } else if (envelope.t === "RESUMED") {
      this.log.info(`Session resumed at sequence ${envelope.s}`);
      await this.enterSteady(socket, inbox, scope);
    }

    await this.init.events.send(
      {
        type: "gateway.dispatch",
        shardId: this.shardId,
        eventName: envelope.t,
        sequence: envelope.s,
        payload: envelope.d,
      },
      scope.signal,
    );
  }

  private async enterSteady(socket: GatewaySocket, inbox: AsyncChannel<LoopInput>, scope: TaskScope): Promise<void> {
    if (this.current === "steady") return;
    this.steadySince = Date.now();
    this.setState("steady");

    while (this.carryOver.length > 0) {
      await this.writeCommand(socket, this.carryOver[0]);
      this.carryOver.shift();
    }
    scope.spawn("commands", (s) => this.pumpCommands(inbox, s));
  }

  // ---------------------------------------------------------------------------
  // Writing
  // ---------------------------------------------------------------------------

  private async authenticate(socket: GatewaySocket): Promise<void> {
    const sessionId = this.sessionState.sessionId;
    const sequence = this.sessionState.sequence;

    if (sessionId !== null && sequence !== null) {
      this.setState("resuming");
      this.log.debug(`Resuming session ${sessionId} at sequence ${sequence}`);
      await this.write(socket, { type: "resume", token: this.init.token, sessionId, sequence });
      return;
    }

    this.setState("identifying");
    await this.write(socket, {
      type: "identify",
      token: this.init.token,
      shard: this.init.shard,
      intents: this.init.options.intents,
      properties: this.init.options.properties,
    });
  }

  private async sendHeartbeat(socket: GatewaySocket): Promise<void> {
    const sequence = this.sessionState.sequence;
    await this.write(socket, { type: "heartbeat", sequence });
    this.sentHeartbeats++;
    this.emitVoidable({
      type: "gateway.heartbeat_sent",
      shardId: this.shardId,
      heartbeatCount: this.sentHeartbeats,
      sequence,
    });
  }

  private async writeCommand(socket: GatewaySocket, command: ShardCommand): Promise<void> {
    // Queued heartbeats may be stale; always send the live sequence.
    if (command.type === "heartbeat") {
      await this.sendHeartbeat(socket);
      return;
    }
    await this.write(socket, command);
  }

  private write(socket: GatewaySocket, event: OutgoingGatewayEvent): Promise<void> {
    return socket.send(encodeCommand(event));
  }

  private emitVoidable(event: IncomingGatewayEvent): void {
    if (!this.init.events.trySend(event)) {
      this.droppedEvents++;
      this.log.debug(`Event stream full, dropped ${event.type}`);
    }
  }

  // ---------------------------------------------------------------------------
  // Helpers
  // ---------------------------------------------------------------------------

  private gatewayUrl(): string {
    const resumeUrl = this.sessionState.canResume ? this.sessionState.resumeUrl : null;
    const url = new URL(resumeUrl ?? this.init.initialUrl);
    url.searchParams.set("v", String(GATEWAY_VERSION));
    url.searchParams.set("encoding", "json");
    return url.toString();
  }

  private setState(next: ConnectionState): void {
    const previous = this.current;
    if (previous === next) return;
    this.current = next;
    this.log.debug(`${previous} -> ${next}`);

    for (const listener of this.listeners) {
      try {
        listener(next, previous);
      } catch (err) {
        this.log.warn("State listener threw", { err });
      }
    }
  }
}
