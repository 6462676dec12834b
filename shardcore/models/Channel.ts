//shardcore/models/Channel.ts

import { UnsupportedOperationError } from "../core/errors";
import type { ClientRef } from "./ClientRef";
import type { Guild } from "./Guild";
import type { Message } from "./Message";
import type { RawChannel, RawUser } from "./schemas";
import type { Snowflake } from "./Snowflake";

export const ChannelType = {
  GuildText: 0,
  DM: 1,
  GuildVoice: 2,
  GroupDM: 3,
  GuildCategory: 4,
  GuildAnnouncement: 5,
  AnnouncementThread: 10,
  PublicThread: 11,
  PrivateThread: 12,
  GuildStageVoice: 13,
} as const;

interface ChannelBase {
  readonly id: Snowflake;
  readonly guildId: Snowflake | null;
  readonly name: string | null;
  readonly position: number;
  readonly parentId: Snowflake | null;
}

export type ChannelSnapshot =
  | (ChannelBase & { readonly kind: "text"; readonly topic: string | null; readonly nsfw: boolean })
  | (ChannelBase & { readonly kind: "news"; readonly topic: string | null; readonly nsfw: boolean })
  | (ChannelBase & { readonly kind: "voice"; readonly bitrate: number | null; readonly userLimit: number | null })
  | (ChannelBase & { readonly kind: "category" })
  | (ChannelBase & { readonly kind: "thread"; readonly threadType: number })
  | (ChannelBase & { readonly kind: "dm"; readonly recipients: readonly RawUser[] })
  | (ChannelBase & { readonly kind: "group_dm"; readonly recipients: readonly RawUser[] })
  | (ChannelBase & { readonly kind: "unsupported"; readonly rawType: number });

export type ChannelKind = ChannelSnapshot["kind"];

/** Map a raw channel onto the closed variant; unknown types become "unsupported". */
export function toChannelSnapshot(raw: RawChannel, guildId?: Snowflake): ChannelSnapshot {
  const base: ChannelBase = {
    id: raw.id,
    guildId: raw.guild_id ?? guildId ?? null,
    name: raw.name ?? null,
    position: raw.position ?? 0,
    parentId: raw.parent_id ?? null,
  };

  switch (raw.type) {
    case ChannelType.GuildText:
      return { ...base, kind: "text", topic: raw.topic ?? null, nsfw: raw.nsfw ?? false };
    case ChannelType.GuildAnnouncement:
      return { ...base, kind: "news", topic: raw.topic ?? null, nsfw: raw.nsfw ?? false };
    case ChannelType.GuildVoice:
    case ChannelType.GuildStageVoice:
      return { ...base, kind: "voice", bitrate: raw.bitrate ?? null, userLimit: raw.user_limit ?? null };
    case ChannelType.GuildCategory:
      return { ...base, kind: "category" };
    case ChannelType.AnnouncementThread:
    case ChannelType.PublicThread:
    case ChannelType.PrivateThread:
      return { ...base, kind: "thread", threadType: raw.type };
    case ChannelType.DM:
      return { ...base, kind: "dm", recipients: raw.recipients ?? [] };
    case ChannelType.GroupDM:
      return { ...base, kind: "group_dm", recipients: raw.recipients ?? [] };
    default:
      return { ...base, kind: "unsupported", rawType: raw.type };
  }
}

export function channelName(snapshot: ChannelSnapshot): string | null {
  return snapshot.name;
}

export function channelGuildId(snapshot: ChannelSnapshot): Snowflake | null {
  return snapshot.guildId;
}

export function isTextual(snapshot: ChannelSnapshot): boolean {
  switch (snapshot.kind) {
    case "text":
    case "news":
    case "thread":
    case "dm":
    case "group_dm":
      return true;
    case "voice":
    case "category":
    case "unsupported":
      return false;
  }
}

export class Channel {
  constructor(
    readonly snapshot: ChannelSnapshot,
    private readonly client: ClientRef,
  ) {
    Object.freeze(this);
  }

  get id(): Snowflake {
    return this.snapshot.id;
  }

  get kind(): ChannelKind {
    return this.snapshot.kind;
  }

  get name(): string | null {
    return channelName(this.snapshot);
  }

  get guildId(): Snowflake | null {
    return channelGuildId(this.snapshot);
  }

  get mention(): string {
    return `<#${this.snapshot.id}>`;
  }

  get guild(): Guild | undefined {
    return this.guildId === null ? undefined : this.client.cache.availableGuild(this.guildId);
  }

  async sendMessage(content: string): Promise<Message> {
    if (!isTextual(this.snapshot)) {
      throw new UnsupportedOperationError(`cannot send messages to a ${this.kind} channel`);
    }
    const raw = await this.client.http.sendMessage(this.id, content);
    return this.client.models.makeMessage(raw);
  }
}
