//shardcore/gateway/GatewayEvents.ts

import type { Snowflake } from "../models/Snowflake";

// -------------------------
// Shard identity
// -------------------------

export interface ShardIdentity {
  readonly shardId: number;
  readonly shardCount: number;
}

// -------------------------
// Incoming (server -> client)
// -------------------------

interface IncomingBase {
  /** Shard the event was received on. */
  readonly shardId: number;
}

export interface GatewayHello extends IncomingBase {
  readonly type: "gateway.hello";
  /** Milliseconds between heartbeats. */
  readonly heartbeatInterval: number;
}

export interface GatewayDispatch extends IncomingBase {
  readonly type: "gateway.dispatch";
  readonly eventName: string;
  readonly sequence: number;
  readonly payload: unknown;
}

export interface GatewayHeartbeatAck extends IncomingBase {
  readonly type: "gateway.heartbeat_ack";
  /** Acks received on this shard so far, including this one. */
  readonly ackCount: number;
}

export interface GatewayInvalidateSession extends IncomingBase {
  readonly type: "gateway.invalidate_session";
  readonly resumable: boolean;
}

export interface GatewayReconnectRequested extends IncomingBase {
  readonly type: "gateway.reconnect_requested";
}

/** Self-observation: the connection just sent a heartbeat. */
export interface GatewayHeartbeatSent extends IncomingBase {
  readonly type: "gateway.heartbeat_sent";
  readonly heartbeatCount: number;
  readonly sequence: number | null;
}

export type IncomingGatewayEvent =
  | GatewayHello
  | GatewayDispatch
  | GatewayHeartbeatAck
  | GatewayInvalidateSession
  | GatewayReconnectRequested
  | GatewayHeartbeatSent;

export type IncomingEventType = IncomingGatewayEvent["type"];

// Telemetry-grade events: dropped when the event stream is full.
const VOIDABLE: ReadonlySet<IncomingEventType> = new Set<IncomingEventType>([
  "gateway.hello",
  "gateway.heartbeat_ack",
  "gateway.invalidate_session",
  "gateway.reconnect_requested",
  "gateway.heartbeat_sent",
]);

export function isVoidable(event: IncomingGatewayEvent): boolean {
  return VOIDABLE.has(event.type);
}

// -------------------------
// Outgoing (client -> server)
// -------------------------

export interface IdentifyProperties {
  readonly os: string;
  readonly browser: string;
  readonly device: string;
}

export interface IdentifyCommand {
  readonly type: "identify";
  readonly token: string;
  readonly shard: ShardIdentity;
  readonly intents: number;
  readonly properties: IdentifyProperties;
}

export interface ResumeCommand {
  readonly type: "resume";
  readonly token: string;
  readonly sessionId: string;
  readonly sequence: number;
}

export interface HeartbeatCommand {
  readonly type: "heartbeat";
  /** Ignored when sent through a shard: heartbeats always carry the live sequence. */
  readonly sequence: number | null;
}

export interface MemberChunkRequest {
  readonly type: "request_guild_members";
  readonly guildId: Snowflake;
  readonly userIds: readonly Snowflake[];
  readonly query: string | null;
  readonly limit: number | null;
  readonly presences: boolean;
  readonly nonce: string | null;
}

export type PresenceStatus = "online" | "dnd" | "idle" | "invisible" | "offline";

export interface PresenceActivity {
  readonly name: string;
  readonly type: number;
  readonly url?: string | null;
}

export interface PresenceUpdateCommand {
  readonly type: "presence_update";
  readonly status: PresenceStatus;
  readonly activities: readonly PresenceActivity[];
  readonly afk: boolean;
  readonly since: number | null;
}

export type OutgoingGatewayEvent =
  | IdentifyCommand
  | ResumeCommand
  | HeartbeatCommand
  | MemberChunkRequest
  | PresenceUpdateCommand;

/** What callers may push through a shard; authentication is the connection's job. */
export type ShardCommand = Exclude<OutgoingGatewayEvent, IdentifyCommand | ResumeCommand>;

export interface MemberChunkRequestInit {
  guildId: Snowflake;
  userIds?: Snowflake[];
  query?: string;
  limit?: number;
  presences?: boolean;
  nonce?: string;
}

export function memberChunkRequest(init: MemberChunkRequestInit): MemberChunkRequest {
  const userIds = init.userIds ?? [];

  if (userIds.length === 0 && init.query === undefined) {
    throw new RangeError("one of userIds or query must be given");
  }
  if (init.query !== undefined && init.limit === undefined) {
    throw new RangeError("limit is required when query is given");
  }
  if (init.nonce !== undefined && init.nonce.length > 32) {
    throw new RangeError("nonce must be at most 32 characters");
  }

  return {
    type: "request_guild_members",
    guildId: init.guildId,
    userIds,
    query: init.query ?? null,
    limit: init.limit ?? null,
    presences: init.presences ?? false,
    nonce: init.nonce ?? null,
  };
}

export function presenceUpdate(
  status: PresenceStatus,
  activities: PresenceActivity[] = [],
  afk = false,
): PresenceUpdateCommand {
  return {
    type: "presence_update",
    status,
    activities,
    afk,
    since: status === "idle" ? Date.now() : null,
  };
}
