//shardcore/models/Guild.ts

import type { Channel } from "./Channel";
import type { ClientRef } from "./ClientRef";
import type { Member } from "./Member";
import type { RawEmoji, RawGuild } from "./schemas";
import type { Snowflake } from "./Snowflake";

/** Guild fields without the collections the Guild wrapper holds itself. */
export type RawGuildCore = Omit<RawGuild, "channels" | "members" | "emojis">;

/** A guild we know exists but have no data for (outage or not yet streamed). */
export interface UnavailableGuild {
  readonly id: Snowflake;
  readonly unavailable: true;
}

export function unavailableGuild(id: Snowflake): UnavailableGuild {
  return Object.freeze({ id, unavailable: true as const });
}

interface GuildParts {
  core: RawGuildCore;
  channels: ReadonlyMap<Snowflake, Channel>;
  members: ReadonlyMap<Snowflake, Member>;
  emojis: readonly RawEmoji[];
}

/**
 * Immutable guild. Every `with*` method returns a new Guild; the cache swaps
 * the whole value, so readers never see a half-applied update.
 */
export class Guild {
  readonly unavailable = false as const;
  readonly core: RawGuildCore;
  readonly channels: ReadonlyMap<Snowflake, Channel>;
  readonly members: ReadonlyMap<Snowflake, Member>;
  readonly emojis: readonly RawEmoji[];

  constructor(
    parts: GuildParts,
    private readonly client: ClientRef,
  ) {
    this.core = parts.core;
    this.channels = parts.channels;
    this.members = parts.members;
    this.emojis = Object.freeze([...parts.emojis]);
    Object.freeze(this);
  }

  get id(): Snowflake {
    return this.core.id;
  }

  get name(): string {
    return this.core.name;
  }

  get large(): boolean {
    return this.core.large ?? false;
  }

  get memberCount(): number {
    return this.core.member_count ?? this.members.size;
  }

  get ownerId(): Snowflake | null {
    return this.core.owner_id ?? null;
  }

  channel(id: Snowflake): Channel | undefined {
    return this.channels.get(id);
  }

  member(userId: Snowflake): Member | undefined {
    return this.members.get(userId);
  }

  /** New top-level fields (from GUILD_UPDATE); collections carry over. */
  withCore(core: RawGuildCore): Guild {
    return this.copy({ core });
  }

  withChannel(channel: Channel): Guild {
    const channels = new Map(this.channels);
    channels.set(channel.id, channel);
    return this.copy({ channels });
  }

  withoutChannel(channelId: Snowflake): Guild {
    if (!this.channels.has(channelId)) return this;
    const channels = new Map(this.channels);
    channels.delete(channelId);
    return this.copy({ channels });
  }

  withMembers(added: readonly Member[]): Guild {
    const members = new Map(this.members);
    for (const member of added) members.set(member.id, member);
    return this.copy({ members });
  }

  withoutMember(userId: Snowflake): Guild {
    if (!this.members.has(userId)) return this;
    const members = new Map(this.members);
    members.delete(userId);
    return this.copy({ members });
  }

  withEmojis(emojis: readonly RawEmoji[]): Guild {
    return this.copy({ emojis });
  }

  private copy(changes: Partial<GuildParts>): Guild {
    return new Guild(
      {
        core: changes.core ?? this.core,
        channels: changes.channels ?? this.channels,
        members: changes.members ?? this.members,
        emojis: changes.emojis ?? this.emojis,
      },
      this.client,
    );
  }
}

export type CachedGuild = Guild | UnavailableGuild;
