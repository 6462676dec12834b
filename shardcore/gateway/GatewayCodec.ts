//shardcore/gateway/GatewayCodec.ts

import { inflateSync } from "node:zlib";
import { z } from "zod";

import { MalformedPayloadError } from "../core/errors";
import { snowflakeToString } from "../models/Snowflake";
import { GatewayOp } from "./GatewayOpcodes";
import type { OutgoingGatewayEvent } from "./GatewayEvents";

/** The `{op, d, s, t}` frame every gateway message is wrapped in. */
export interface GatewayEnvelope {
  op: number;
  d: unknown;
  s: number | null;
  t: string | null;
}

const EnvelopeSchema = z.object({
  op: z.number().int(),
  d: z.unknown(),
  s: z.number().int().nullable().optional(),
  t: z.string().nullable().optional(),
});

export const HelloSchema = z.object({
  heartbeat_interval: z.number().positive(),
});

export const ReadySessionSchema = z.object({
  session_id: z.string().min(1),
  resume_gateway_url: z.string().url().optional(),
});

export function decodeFrame(data: string | Buffer): GatewayEnvelope {
  let text: string;
  if (typeof data === "string") {
    text = data;
  } else {
    try {
      text = inflateSync(data).toString("utf-8");
    } catch (err) {
      throw new MalformedPayloadError("binary frame is not zlib data", { cause: err });
    }
  }

  let json: unknown;
  try {
    json = JSON.parse(text);
  } catch (err) {
    throw new MalformedPayloadError("frame is not valid JSON", { cause: err });
  }

  const parsed = EnvelopeSchema.safeParse(json);
  if (!parsed.success) {
    throw new MalformedPayloadError(`bad envelope: ${parsed.error.issues[0]?.message ?? "unknown"}`);
  }

  return {
    op: parsed.data.op,
    d: parsed.data.d,
    s: parsed.data.s ?? null,
    t: parsed.data.t ?? null,
  };
}

export function encodeCommand(command: OutgoingGatewayEvent): string {
  return JSON.stringify(toEnvelope(command));
}

export function toEnvelope(command: OutgoingGatewayEvent): GatewayEnvelope {
  switch (command.type) {
    case "identify":
      return envelope(GatewayOp.Identify, {
        token: command.token,
        properties: command.properties,
        compress: false,
        large_threshold: 50,
        shard: [command.shard.shardId, command.shard.shardCount],
        intents: command.intents,
      });

    case "resume":
      return envelope(GatewayOp.Resume, {
        token: command.token,
        session_id: command.sessionId,
        seq: command.sequence,
      });

    case "heartbeat":
      return envelope(GatewayOp.Heartbeat, command.sequence);

    case "request_guild_members": {
      const d: Record<string, unknown> = {
        guild_id: snowflakeToString(command.guildId),
        presences: command.presences,
      };
      if (command.userIds.length > 0) d.user_ids = command.userIds.map(snowflakeToString);
      if (command.query !== null) d.query = command.query;
      if (command.limit !== null) d.limit = command.limit;
      if (command.nonce !== null) d.nonce = command.nonce;
      return envelope(GatewayOp.RequestGuildMembers, d);
    }

    case "presence_update":
      return envelope(GatewayOp.PresenceUpdate, {
        since: command.since,
        activities: command.activities,
        status: command.status,
        afk: command.afk,
      });
  }
}

function envelope(op: number, d: unknown): GatewayEnvelope {
  return { op, d, s: null, t: null };
}
