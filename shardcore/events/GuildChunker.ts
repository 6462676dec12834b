//shardcore/events/GuildChunker.ts

import { AsyncChannel } from "../core/AsyncChannel";
import { GuildLeftError } from "../core/errors";
import { memberChunkRequest, type ShardCommand } from "../gateway/GatewayEvents";
import type { Guild } from "../models/Guild";
import type { Snowflake } from "../models/Snowflake";
import { Logger } from "../utils/logger";
import type { GuildMemberChunk } from "./DomainEvents";

const log = Logger.scope("CHUNKER");

/** Anything that can route a command to a shard; usually the gateway collection. */
export interface ShardSender {
  sendToShard(shardId: number, command: ShardCommand, signal?: AbortSignal): Promise<void>;
}

interface ChunkState {
  done: boolean;
  promise: Promise<void>;
  resolve: () => void;
  reject: (err: unknown) => void;
}

/**
 * Requests the full member list of every large guild once, and tracks when
 * the last chunk of each has arrived. Small guilds already carry their members.
 */
export class GuildChunker {
  private readonly outgoing = new AsyncChannel<{ shardId: number; command: ShardCommand }>(Infinity);
  private readonly guilds = new Map<Snowflake, ChunkState>();

  /**
   * Resolves once `guildId` is fully chunked. Rejects for a guild never seen,
   * and with GuildLeftError when the guild is left first.
   */
  waitForGuild(guildId: Snowflake): Promise<void> {
    const state = this.guilds.get(guildId);
    if (!state) return Promise.reject(new RangeError(`no such guild: ${guildId}`));
    return state.promise;
  }

  isFullyChunked(guildId: Snowflake): boolean {
    return this.guilds.get(guildId)?.done ?? false;
  }

  /** Number of requests waiting to be handed to a shard. */
  get queued(): number {
    return this.outgoing.size;
  }

  handleGuild(shardId: number, guild: Guild): void {
    if (this.guilds.has(guild.id)) return;

    const state = newState();
    this.guilds.set(guild.id, state);

    if (!guild.large) {
      log.debug(`Guild ${guild.id} is not large, no chunk request`);
      markDone(state);
      return;
    }

    log.debug(`Guild ${guild.id} is large, requesting members`);
    this.outgoing.trySend({
      shardId,
      command: memberChunkRequest({ guildId: guild.id, query: "", limit: 0, presences: false }),
    });
  }

  handleMemberChunk(event: GuildMemberChunk): void {
    log.debug(`Chunk ${event.chunkIndex + 1}/${event.chunkCount} for guild ${event.guild.id}`);
    if (event.chunkIndex + 1 < event.chunkCount) return;

    const state = this.guilds.get(event.guild.id);
    if (!state) {
      // Chunk we never asked for (a user-issued request); still counts.
      const fresh = newState();
      markDone(fresh);
      this.guilds.set(event.guild.id, fresh);
      return;
    }
    if (!state.done) log.debug(`Guild ${event.guild.id} fully chunked`);
    markDone(state);
  }

  /** Forget a guild the client left; a pending wait on it rejects. */
  handleGuildLeft(guildId: Snowflake): void {
    const state = this.guilds.get(guildId);
    if (!state) return;
    this.guilds.delete(guildId);
    if (state.done) return;

    log.debug(`Left guild ${guildId} before its last chunk`);
    state.promise.catch((err: unknown) => log.debug(`Chunk wait for ${guildId} ended`, { err }));
    state.reject(new GuildLeftError(guildId));
  }

  /** Forward queued requests to their shards until cancelled. */
  async sendToOutgoing(sender: ShardSender, signal: AbortSignal): Promise<void> {
    for await (const { shardId, command } of this.outgoing.iterate(signal)) {
      await sender.sendToShard(shardId, command, signal);
    }
  }
}

function newState(): ChunkState {
  let resolve: () => void = () => undefined;
  let reject: (err: unknown) => void = () => undefined;
  const promise = new Promise<void>((res, rej) => {
    resolve = res;
    reject = rej;
  });
  return { done: false, promise, resolve, reject };
}

function markDone(state: ChunkState): void {
  state.done = true;
  state.resolve();
}
