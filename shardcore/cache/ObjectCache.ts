//shardcore/cache/ObjectCache.ts

import { KeyedMutex } from "../core/KeyedMutex";
import type { Channel } from "../models/Channel";
import type { CachedGuild, Guild } from "../models/Guild";
import type { Snowflake } from "../models/Snowflake";
import type { User } from "../models/User";
import { Logger } from "../utils/logger";

const log = Logger.scope("CACHE");

interface CacheValues {
  guild: CachedGuild;
  channel: Channel;
  user: User;
}

export type CacheKind = keyof CacheValues;

/**
 * Id-keyed store of immutable models.
 *
 * Reads never wait. Every write replaces a whole value, so a reader sees
 * either the old or the new one. Async read-modify-write goes through
 * `replaceExclusive`, which serialises writers of the same key.
 */
export class ObjectCache {
  private readonly guilds = new Map<Snowflake, CachedGuild>();
  private readonly channels = new Map<Snowflake, Channel>();
  private readonly users = new Map<Snowflake, User>();
  private readonly writers = new KeyedMutex<string>();

  // -------------------------
  // Reads
  // -------------------------

  guild(id: Snowflake): CachedGuild | undefined {
    return this.guilds.get(id);
  }

  availableGuild(id: Snowflake): Guild | undefined {
    const guild = this.guilds.get(id);
    return guild && !guild.unavailable ? guild : undefined;
  }

  channel(id: Snowflake): Channel | undefined {
    return this.channels.get(id);
  }

  user(id: Snowflake): User | undefined {
    return this.users.get(id);
  }

  guildIds(): Snowflake[] {
    return [...this.guilds.keys()];
  }

  get guildCount(): number {
    return this.guilds.size;
  }

  get channelCount(): number {
    return this.channels.size;
  }

  get userCount(): number {
    return this.users.size;
  }

  // -------------------------
  // Writes
  // -------------------------

  /** Store a guild; an available guild also indexes its channels and member users. */
  putGuild(guild: CachedGuild): CachedGuild | undefined {
    const previous = this.guilds.get(guild.id);
    this.guilds.set(guild.id, guild);

    if (!guild.unavailable) {
      for (const channel of guild.channels.values()) this.channels.set(channel.id, channel);
      for (const member of guild.members.values()) this.users.set(member.user.id, member.user);
    }
    return previous;
  }

  /** Drop a guild and the channels it owned. */
  removeGuild(id: Snowflake): CachedGuild | undefined {
    const previous = this.guilds.get(id);
    if (!previous) return undefined;

    this.guilds.delete(id);
    if (!previous.unavailable) {
      for (const channelId of previous.channels.keys()) this.channels.delete(channelId);
    }
    log.debug(`Removed guild ${id}`);
    return previous;
  }

  putChannel(channel: Channel): Channel | undefined {
    const previous = this.channels.get(channel.id);
    this.channels.set(channel.id, channel);
    return previous;
  }

  removeChannel(id: Snowflake): Channel | undefined {
    const previous = this.channels.get(id);
    this.channels.delete(id);
    return previous;
  }

  putUser(user: User): User | undefined {
    const previous = this.users.get(user.id);
    this.users.set(user.id, user);
    return previous;
  }

  /**
   * Serialised read-modify-write of one entry. `producer` gets the current
   * value and returns the replacement, or undefined to delete the entry.
   *
   * For callers outside the event parser whose update awaits something (a
   * REST fetch, say) between read and write. The parser itself only uses the
   * synchronous `put*`/`remove*` methods, which cannot interleave.
   */
  replaceExclusive<K extends CacheKind>(
    kind: K,
    id: Snowflake,
    producer: (current: CacheValues[K] | undefined) => Promise<CacheValues[K] | undefined>,
  ): Promise<CacheValues[K] | undefined> {
    return this.writers.runExclusive(`${kind}:${id}`, async () => {
      const next = await producer(this.read(kind, id));
      this.write(kind, id, next);
      return next;
    });
  }

  clear(): void {
    this.guilds.clear();
    this.channels.clear();
    this.users.clear();
  }

  private read<K extends CacheKind>(kind: K, id: Snowflake): CacheValues[K] | undefined {
    const table: Map<Snowflake, CacheValues[K]> = this.table(kind);
    return table.get(id);
  }

  private write<K extends CacheKind>(kind: K, id: Snowflake, value: CacheValues[K] | undefined): void {
    const table: Map<Snowflake, CacheValues[K]> = this.table(kind);
    if (value === undefined) table.delete(id);
    else table.set(id, value);
  }

  private table<K extends CacheKind>(kind: K): Map<Snowflake, CacheValues[K]> {
    const tables: { [P in CacheKind]: Map<Snowflake, CacheValues[P]> } = {
      guild: this.guilds,
      channel: this.channels,
      user: this.users,
    };
    return tables[kind];
  }
}
