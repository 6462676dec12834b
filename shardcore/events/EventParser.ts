//shardcore/events/EventParser.ts

import { z } from "zod";

import type { ObjectCache } from "../cache/ObjectCache";
import { MalformedPayloadError } from "../core/errors";
import type { GatewayDispatch } from "../gateway/GatewayEvents";
import { unavailableGuild } from "../models/Guild";
import { parseWith, type ModelFactory } from "../models/ModelFactory";
import { EmojiSchema, MemberSchema, UnavailableGuildSchema, UserSchema } from "../models/schemas";
import { SnowflakeSchema } from "../models/Snowflake";
import { Logger } from "../utils/logger";
import type { DomainEvent } from "./DomainEvents";
import type { GuildStreamTracker } from "./GuildStreamTracker";

const log = Logger.scope("PARSER");

const ReadySchema = z.object({
  user: UserSchema,
  guilds: z.array(UnavailableGuildSchema).default([]),
});

const MessageDeleteSchema = z.object({
  id: SnowflakeSchema,
  channel_id: SnowflakeSchema,
  guild_id: SnowflakeSchema.optional(),
});

const MessageDeleteBulkSchema = z.object({
  ids: z.array(SnowflakeSchema),
  channel_id: SnowflakeSchema,
  guild_id: SnowflakeSchema.optional(),
});

const GuildMemberSchema = MemberSchema.extend({ guild_id: SnowflakeSchema });

const MemberRemoveSchema = z.object({
  guild_id: SnowflakeSchema,
  user: UserSchema,
});

const MembersChunkSchema = z.object({
  guild_id: SnowflakeSchema,
  members: z.array(MemberSchema),
  chunk_index: z.number().int().nonnegative(),
  chunk_count: z.number().int().positive(),
  nonce: z.string().optional(),
});

const EmojisUpdateSchema = z.object({
  guild_id: SnowflakeSchema,
  emojis: z.array(EmojiSchema),
});

type DispatchParser = (dispatch: GatewayDispatch) => DomainEvent[];

/**
 * Turns one dispatch into zero or more domain events, applying its effect to
 * the cache first. Each handler validates the whole body before touching the
 * cache, so a malformed dispatch changes nothing.
 */
export class EventParser {
  private readonly parsers: ReadonlyMap<string, DispatchParser>;

  constructor(
    private readonly cache: ObjectCache,
    private readonly models: ModelFactory,
    private readonly streams: GuildStreamTracker,
  ) {
    this.parsers = new Map<string, DispatchParser>([
      ["READY", (d) => this.ready(d)],
      ["RESUMED", () => [{ type: "resumed" }]],
      ["GUILD_CREATE", (d) => this.guildCreate(d)],
      ["GUILD_UPDATE", (d) => this.guildUpdate(d)],
      ["GUILD_DELETE", (d) => this.guildDelete(d)],
      ["GUILD_EMOJIS_UPDATE", (d) => this.emojisUpdate(d)],
      ["CHANNEL_CREATE", (d) => this.channelCreate(d)],
      ["CHANNEL_UPDATE", (d) => this.channelUpdate(d)],
      ["CHANNEL_DELETE", (d) => this.channelDelete(d)],
      ["MESSAGE_CREATE", (d) => this.messageCreate(d)],
      ["MESSAGE_UPDATE", (d) => this.messageUpdate(d)],
      ["MESSAGE_DELETE", (d) => this.messageDelete(d)],
      ["MESSAGE_DELETE_BULK", (d) => this.messageDeleteBulk(d)],
      ["GUILD_MEMBER_ADD", (d) => this.memberAdd(d)],
      ["GUILD_MEMBER_UPDATE", (d) => this.memberUpdate(d)],
      ["GUILD_MEMBER_REMOVE", (d) => this.memberRemove(d)],
      ["GUILD_MEMBERS_CHUNK", (d) => this.membersChunk(d)],
    ]);
  }

  handles(eventName: string): boolean {
    return this.parsers.has(eventName);
  }

  parse(dispatch: GatewayDispatch): DomainEvent[] {
    const parser = this.parsers.get(dispatch.eventName);
    if (!parser) {
      log.info(`No parser for dispatch ${dispatch.eventName}`, { shardId: dispatch.shardId });
      return [];
    }

    try {
      return parser(dispatch);
    } catch (err) {
      if (err instanceof MalformedPayloadError) {
        log.warn(`Skipping malformed ${dispatch.eventName}`, {
          shardId: dispatch.shardId,
          sequence: dispatch.sequence,
          err,
        });
        return [];
      }
      throw err;
    }
  }

  // -------------------------
  // Session
  // -------------------------

  private ready(dispatch: GatewayDispatch): DomainEvent[] {
    const body = parseWith(ReadySchema, dispatch.payload, "READY");
    const me = this.models.upgradeUser(body.user);
    const guildIds = body.guilds.map((g) => g.id);

    this.cache.putUser(me);
    for (const id of guildIds) {
      if (!this.cache.guild(id)) this.cache.putGuild(unavailableGuild(id));
    }

    const start = this.streams.begin(dispatch.shardId, guildIds);
    log.debug(`Shard ${dispatch.shardId} READY with ${guildIds.length} guild(s): ${start}`);

    return start === "ready_now" ? [{ type: "connected" }, { type: "shard_ready" }] : [{ type: "connected" }];
  }

  // -------------------------
  // Guilds
  // -------------------------

  private guildCreate(dispatch: GatewayDispatch): DomainEvent[] {
    const guild = this.models.makeGuild(dispatch.payload);
    const previous = this.cache.putGuild(guild);
    if (guild.unavailable) return [];

    if (this.streams.isStreaming(dispatch.shardId, guild.id)) {
      const shardDone = this.streams.complete(dispatch.shardId, guild.id);
      return shardDone ? [{ type: "guild_streamed", guild }, { type: "shard_ready" }] : [{ type: "guild_streamed", guild }];
    }

    if (previous) return [{ type: "guild_available", guild }];
    return [{ type: "guild_joined", guild }];
  }

  private guildUpdate(dispatch: GatewayDispatch): DomainEvent[] {
    const raw = this.models.parseGuild(dispatch.payload);
    const oldGuild = this.cache.availableGuild(raw.id) ?? null;

    const { channels: _channels, members: _members, emojis, ...core } = raw;
    const guild = oldGuild ? oldGuild.withCore(core).withEmojis(emojis) : this.models.upgradeGuild(raw);

    this.cache.putGuild(guild);
    return [{ type: "guild_update", oldGuild, guild }];
  }

  private guildDelete(dispatch: GatewayDispatch): DomainEvent[] {
    const body = parseWith(UnavailableGuildSchema, dispatch.payload, "GUILD_DELETE");

    if (body.unavailable === true) {
      this.cache.putGuild(unavailableGuild(body.id));
      return [{ type: "guild_unavailable", guildId: body.id }];
    }

    const previous = this.cache.removeGuild(body.id);
    const guild = previous && !previous.unavailable ? previous : null;
    return [{ type: "guild_left", guildId: body.id, guild }];
  }

  private emojisUpdate(dispatch: GatewayDispatch): DomainEvent[] {
    const body = parseWith(EmojisUpdateSchema, dispatch.payload, "GUILD_EMOJIS_UPDATE");
    const old = this.cache.availableGuild(body.guild_id);
    if (!old) {
      log.debug(`Emoji update for uncached guild ${body.guild_id}`);
      return [];
    }

    const guild = old.withEmojis(body.emojis);
    this.cache.putGuild(guild);
    return [{ type: "guild_emoji_update", guild, previousEmojis: old.emojis, emojis: guild.emojis }];
  }

  // -------------------------
  // Channels
  // -------------------------

  private channelCreate(dispatch: GatewayDispatch): DomainEvent[] {
    const channel = this.models.makeChannel(dispatch.payload);
    this.cache.putChannel(channel);

    const guild = channel.guildId === null ? undefined : this.cache.availableGuild(channel.guildId);
    if (guild) this.cache.putGuild(guild.withChannel(channel));

    return [{ type: "channel_create", channel }];
  }

  private channelUpdate(dispatch: GatewayDispatch): DomainEvent[] {
    const channel = this.models.makeChannel(dispatch.payload);
    const oldChannel = this.cache.putChannel(channel) ?? null;

    const guild = channel.guildId === null ? undefined : this.cache.availableGuild(channel.guildId);
    if (guild) this.cache.putGuild(guild.withChannel(channel));

    return [{ type: "channel_update", oldChannel, channel }];
  }

  private channelDelete(dispatch: GatewayDispatch): DomainEvent[] {
    const parsed = this.models.makeChannel(dispatch.payload);
    const channel = this.cache.removeChannel(parsed.id) ?? parsed;

    const guild = channel.guildId === null ? undefined : this.cache.availableGuild(channel.guildId);
    if (guild) this.cache.putGuild(guild.withoutChannel(channel.id));

    return [{ type: "channel_delete", channel }];
  }

  // -------------------------
  // Messages
  // -------------------------

  private messageCreate(dispatch: GatewayDispatch): DomainEvent[] {
    const message = this.models.makeMessage(dispatch.payload);
    this.cache.putUser(message.author);
    return [{ type: "message_create", message }];
  }

  private messageUpdate(dispatch: GatewayDispatch): DomainEvent[] {
    const message = this.models.makeMessage(dispatch.payload);
    this.cache.putUser(message.author);
    return [{ type: "message_update", message }];
  }

  private messageDelete(dispatch: GatewayDispatch): DomainEvent[] {
    const body = parseWith(MessageDeleteSchema, dispatch.payload, "MESSAGE_DELETE");
    return [
      {
        type: "message_delete",
        messageId: body.id,
        channelId: body.channel_id,
        channel: this.cache.channel(body.channel_id) ?? null,
        guild: body.guild_id === undefined ? null : (this.cache.availableGuild(body.guild_id) ?? null),
      },
    ];
  }

  private messageDeleteBulk(dispatch: GatewayDispatch): DomainEvent[] {
    const body = parseWith(MessageDeleteBulkSchema, dispatch.payload, "MESSAGE_DELETE_BULK");
    return [
      {
        type: "message_bulk_delete",
        messageIds: body.ids,
        channelId: body.channel_id,
        channel: this.cache.channel(body.channel_id) ?? null,
        guild: body.guild_id === undefined ? null : (this.cache.availableGuild(body.guild_id) ?? null),
      },
    ];
  }

  // -------------------------
  // Members
  // -------------------------

  private memberAdd(dispatch: GatewayDispatch): DomainEvent[] {
    const body = parseWith(GuildMemberSchema, dispatch.payload, "GUILD_MEMBER_ADD");
    const old = this.cache.availableGuild(body.guild_id);
    if (!old) {
      log.debug(`Member add for uncached guild ${body.guild_id}`);
      return [];
    }

    const { guild_id: guildId, ...raw } = body;
    const member = this.models.upgradeMember(raw, guildId);
    const guild = old.withMembers([member]);
    this.cache.putGuild(guild);
    return [{ type: "guild_member_add", guild, member }];
  }

  private memberUpdate(dispatch: GatewayDispatch): DomainEvent[] {
    const body = parseWith(GuildMemberSchema, dispatch.payload, "GUILD_MEMBER_UPDATE");
    const old = this.cache.availableGuild(body.guild_id);
    if (!old) {
      log.debug(`Member update for uncached guild ${body.guild_id}`);
      return [];
    }

    const { guild_id: guildId, ...raw } = body;
    const member = this.models.upgradeMember(raw, guildId);
    const oldMember = old.member(member.id) ?? null;
    const guild = old.withMembers([member]);
    this.cache.putGuild(guild);
    return [{ type: "guild_member_update", guild, oldMember, member }];
  }

  private memberRemove(dispatch: GatewayDispatch): DomainEvent[] {
    const body = parseWith(MemberRemoveSchema, dispatch.payload, "GUILD_MEMBER_REMOVE");
    const user = this.models.upgradeUser(body.user);
    const old = this.cache.availableGuild(body.guild_id);

    const cachedMember = old?.member(user.id) ?? null;
    const guild = old ? old.withoutMember(user.id) : null;
    if (guild) this.cache.putGuild(guild);

    return [{ type: "guild_member_remove", guildId: body.guild_id, user, cachedMember, guild }];
  }

  private membersChunk(dispatch: GatewayDispatch): DomainEvent[] {
    const body = parseWith(MembersChunkSchema, dispatch.payload, "GUILD_MEMBERS_CHUNK");
    const old = this.cache.availableGuild(body.guild_id);
    if (!old) return [{ type: "invalid_guild_chunk", guildId: body.guild_id }];

    const members = body.members.map((m) => this.models.upgradeMember(m, body.guild_id));
    const guild = old.withMembers(members);
    this.cache.putGuild(guild);
    for (const member of members) this.cache.putUser(member.user);

    return [
      {
        type: "guild_member_chunk",
        guild,
        members,
        chunkIndex: body.chunk_index,
        chunkCount: body.chunk_count,
        nonce: body.nonce ?? null,
      },
    ];
  }
}
