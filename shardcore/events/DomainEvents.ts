//shardcore/events/DomainEvents.ts

import type { Channel } from "../models/Channel";
import type { Guild } from "../models/Guild";
import type { Member } from "../models/Member";
import type { Message } from "../models/Message";
import type { RawEmoji } from "../models/schemas";
import type { Snowflake } from "../models/Snowflake";
import type { User } from "../models/User";

// -------------------------
// Session
// -------------------------

/** A new session was issued (READY). */
export interface Connected {
  readonly type: "connected";
}

/** This shard has streamed every guild it was given at session start. */
export interface ShardReady {
  readonly type: "shard_ready";
}

/** Every shard of the client is ready. Emitted once per run. */
export interface Ready {
  readonly type: "ready";
}

export interface Resumed {
  readonly type: "resumed";
}

// -------------------------
// Guilds
// -------------------------

/** Guild delivered as part of the session's initial stream. */
export interface GuildStreamed {
  readonly type: "guild_streamed";
  readonly guild: Guild;
}

/** The bot was added to a guild. */
export interface GuildJoined {
  readonly type: "guild_joined";
  readonly guild: Guild;
}

/** A previously unavailable guild came back. */
export interface GuildAvailable {
  readonly type: "guild_available";
  readonly guild: Guild;
}

export interface GuildUpdate {
  readonly type: "guild_update";
  readonly oldGuild: Guild | null;
  readonly guild: Guild;
}

export interface GuildUnavailable {
  readonly type: "guild_unavailable";
  readonly guildId: Snowflake;
}

export interface GuildLeft {
  readonly type: "guild_left";
  readonly guildId: Snowflake;
  readonly guild: Guild | null;
}

export interface GuildEmojiUpdate {
  readonly type: "guild_emoji_update";
  readonly guild: Guild;
  readonly previousEmojis: readonly RawEmoji[];
  readonly emojis: readonly RawEmoji[];
}

// -------------------------
// Channels
// -------------------------

export interface ChannelCreate {
  readonly type: "channel_create";
  readonly channel: Channel;
}

export interface ChannelUpdate {
  readonly type: "channel_update";
  readonly oldChannel: Channel | null;
  readonly channel: Channel;
}

export interface ChannelDelete {
  readonly type: "channel_delete";
  readonly channel: Channel;
}

// -------------------------
// Messages
// -------------------------

export interface MessageCreate {
  readonly type: "message_create";
  readonly message: Message;
}

export interface MessageUpdate {
  readonly type: "message_update";
  readonly message: Message;
}

export interface MessageDelete {
  readonly type: "message_delete";
  readonly messageId: Snowflake;
  readonly channelId: Snowflake;
  readonly channel: Channel | null;
  readonly guild: Guild | null;
}

export interface MessageBulkDelete {
  readonly type: "message_bulk_delete";
  /** In payload order. */
  readonly messageIds: readonly Snowflake[];
  readonly channelId: Snowflake;
  readonly channel: Channel | null;
  readonly guild: Guild | null;
}

/** Split a bulk delete into one MessageDelete per id, in order. */
export function asSingleEvents(event: MessageBulkDelete): MessageDelete[] {
  return event.messageIds.map((messageId) => ({
    type: "message_delete",
    messageId,
    channelId: event.channelId,
    channel: event.channel,
    guild: event.guild,
  }));
}

// -------------------------
// Members
// -------------------------

export interface GuildMemberAdd {
  readonly type: "guild_member_add";
  readonly guild: Guild;
  readonly member: Member;
}

export interface GuildMemberUpdate {
  readonly type: "guild_member_update";
  readonly guild: Guild;
  readonly oldMember: Member | null;
  readonly member: Member;
}

export interface GuildMemberRemove {
  readonly type: "guild_member_remove";
  readonly guildId: Snowflake;
  readonly user: User;
  readonly cachedMember: Member | null;
  readonly guild: Guild | null;
}

export interface GuildMemberChunk {
  readonly type: "guild_member_chunk";
  readonly guild: Guild;
  readonly members: readonly Member[];
  readonly chunkIndex: number;
  readonly chunkCount: number;
  readonly nonce: string | null;
}

/** A member chunk arrived for a guild the cache does not know. */
export interface InvalidGuildChunk {
  readonly type: "invalid_guild_chunk";
  readonly guildId: Snowflake;
}

export type DomainEvent =
  | Connected
  | ShardReady
  | Ready
  | Resumed
  | GuildStreamed
  | GuildJoined
  | GuildAvailable
  | GuildUpdate
  | GuildUnavailable
  | GuildLeft
  | GuildEmojiUpdate
  | ChannelCreate
  | ChannelUpdate
  | ChannelDelete
  | MessageCreate
  | MessageUpdate
  | MessageDelete
  | MessageBulkDelete
  | GuildMemberAdd
  | GuildMemberUpdate
  | GuildMemberRemove
  | GuildMemberChunk
  | InvalidGuildChunk;

export type DomainEventType = DomainEvent["type"];
