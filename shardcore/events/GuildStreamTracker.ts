//shardcore/events/GuildStreamTracker.ts

import type { Snowflake } from "../models/Snowflake";

export type StreamStart = "streaming" | "ready_now" | "already_ready";

interface ShardStream {
  pending: Set<Snowflake>;
  ready: boolean;
}

/**
 * Per-shard bookkeeping of the initial guild stream: READY lists the guilds a
 * shard will receive, each GUILD_CREATE for one of them ticks it off, and the
 * shard is ready once the list is empty. Only the first session of a shard
 * streams; later READYs (after a fresh identify) deliver guilds as available.
 */
export class GuildStreamTracker {
  private readonly shards = new Map<number, ShardStream>();

  begin(shardId: number, guildIds: readonly Snowflake[]): StreamStart {
    const existing = this.shards.get(shardId);
    if (existing?.ready) return "already_ready";

    const pending = new Set(guildIds);
    const ready = pending.size === 0;
    this.shards.set(shardId, { pending, ready });
    return ready ? "ready_now" : "streaming";
  }

  isStreaming(shardId: number, guildId: Snowflake): boolean {
    return this.shards.get(shardId)?.pending.has(guildId) ?? false;
  }

  /** Tick a guild off; true when that made the shard ready. */
  complete(shardId: number, guildId: Snowflake): boolean {
    const stream = this.shards.get(shardId);
    if (!stream || !stream.pending.delete(guildId)) return false;
    if (stream.pending.size > 0 || stream.ready) return false;
    stream.ready = true;
    return true;
  }

  isReady(shardId: number): boolean {
    return this.shards.get(shardId)?.ready ?? false;
  }

  remaining(shardId: number): number {
    return this.shards.get(shardId)?.pending.size ?? 0;
  }
}
