//shardcore/gateway/GatewayOpcodes.ts

// -------------------------
// Opcodes
// -------------------------

export const GatewayOp = {
  Dispatch: 0,
  Heartbeat: 1,
  Identify: 2,
  PresenceUpdate: 3,
  VoiceStateUpdate: 4,
  Resume: 6,
  Reconnect: 7,
  RequestGuildMembers: 8,
  InvalidSession: 9,
  Hello: 10,
  HeartbeatAck: 11,
} as const;

export type GatewayOpcode = (typeof GatewayOp)[keyof typeof GatewayOp];

export const GATEWAY_VERSION = 10;

// Every intent bit up to and including message content (privileged ones too).
export const ALL_INTENTS = (1 << 22) - 1;

// -------------------------
// Close codes
// -------------------------

export const GatewayCloseCode = {
  Normal: 1000,
  GoingAway: 1001,
  Abnormal: 1006,

  UnknownError: 4000,
  UnknownOpcode: 4001,
  DecodeError: 4002,
  NotAuthenticated: 4003,
  AuthenticationFailed: 4004,
  AlreadyAuthenticated: 4005,
  InvalidSequence: 4007,
  RateLimited: 4008,
  SessionTimedOut: 4009,
  InvalidShard: 4010,
  ShardingRequired: 4011,
  InvalidApiVersion: 4012,
  InvalidIntents: 4013,
  DisallowedIntents: 4014,

  // Local: we closed because the server stopped acking heartbeats.
  Zombie: 4100,
} as const;

export type CloseDisposition = "resume" | "identify" | "fatal";

/** What a close code means for the next connection attempt. */
export function classifyCloseCode(code: number): CloseDisposition {
  switch (code) {
    case GatewayCloseCode.AuthenticationFailed:
    case GatewayCloseCode.InvalidShard:
    case GatewayCloseCode.ShardingRequired:
    case GatewayCloseCode.InvalidApiVersion:
    case GatewayCloseCode.InvalidIntents:
    case GatewayCloseCode.DisallowedIntents:
      return "fatal";

    case GatewayCloseCode.InvalidSequence:
    case GatewayCloseCode.SessionTimedOut:
      return "identify";

    default:
      return "resume";
  }
}
