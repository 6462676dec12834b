//shardcore/models/ModelFactory.ts

import { z } from "zod";

import { MalformedPayloadError } from "../core/errors";
import { Channel, toChannelSnapshot } from "./Channel";
import type { ClientRef } from "./ClientRef";
import { Guild, unavailableGuild, type CachedGuild } from "./Guild";
import { Member } from "./Member";
import { Message } from "./Message";
import {
  ChannelSchema,
  EmojiSchema,
  GuildSchema,
  MemberSchema,
  MessageSchema,
  UnavailableGuildSchema,
  UserSchema,
  type RawChannel,
  type RawEmoji,
  type RawGuild,
  type RawMember,
  type RawMessage,
  type RawUser,
} from "./schemas";
import type { Snowflake } from "./Snowflake";
import { User } from "./User";

/** Validate `raw` against `schema`, turning zod failures into MalformedPayloadError. */
export function parseWith<T>(schema: z.ZodType<T, z.ZodTypeDef, unknown>, raw: unknown, what: string): T {
  const result = schema.safeParse(raw);
  if (result.success) return result.data;

  const issue = result.error.issues[0];
  const where = issue && issue.path.length > 0 ? ` at ${issue.path.join(".")}` : "";
  throw new MalformedPayloadError(`malformed ${what}${where}: ${issue?.message ?? "invalid"}`, {
    cause: result.error,
  });
}

const EmojiListSchema = z.array(EmojiSchema);

/**
 * Two steps for every entity: `parse*` validates a raw body into a snapshot,
 * `upgrade*` wraps a snapshot into a stateful model bound to the client.
 */
export class ModelFactory {
  constructor(private readonly client: ClientRef) {}

  // -------------------------
  // parse
  // -------------------------

  parseUser(raw: unknown): RawUser {
    return parseWith(UserSchema, raw, "user");
  }

  parseMember(raw: unknown): RawMember {
    return parseWith(MemberSchema, raw, "member");
  }

  parseChannel(raw: unknown): RawChannel {
    return parseWith(ChannelSchema, raw, "channel");
  }

  parseGuild(raw: unknown): RawGuild {
    return parseWith(GuildSchema, raw, "guild");
  }

  parseMessage(raw: unknown): RawMessage {
    return parseWith(MessageSchema, raw, "message");
  }

  parseEmojis(raw: unknown): RawEmoji[] {
    return parseWith(EmojiListSchema, raw, "emoji list");
  }

  // -------------------------
  // upgrade
  // -------------------------

  upgradeUser(raw: RawUser): User {
    return new User(raw);
  }

  upgradeMember(raw: RawMember, guildId: Snowflake): Member {
    return new Member(raw, this.upgradeUser(raw.user), guildId, this.client);
  }

  upgradeChannel(raw: RawChannel, guildId?: Snowflake): Channel {
    return new Channel(toChannelSnapshot(raw, guildId), this.client);
  }

  upgradeGuild(raw: RawGuild): Guild {
    const { channels, members, emojis, ...core } = raw;

    return new Guild(
      {
        core,
        channels: new Map(channels.map((c) => [c.id, this.upgradeChannel(c, raw.id)])),
        members: new Map(members.map((m) => [m.user.id, this.upgradeMember(m, raw.id)])),
        emojis,
      },
      this.client,
    );
  }

  upgradeMessage(raw: RawMessage): Message {
    const author = this.upgradeUser(raw.author);
    const member =
      raw.member && raw.guild_id !== undefined
        ? this.upgradeMember({ ...raw.member, user: raw.author }, raw.guild_id)
        : null;
    return new Message(raw, author, member, this.client);
  }

  // -------------------------
  // make = parse + upgrade
  // -------------------------

  makeUser(raw: unknown): User {
    return this.upgradeUser(this.parseUser(raw));
  }

  makeMember(raw: unknown, guildId: Snowflake): Member {
    return this.upgradeMember(this.parseMember(raw), guildId);
  }

  makeChannel(raw: unknown, guildId?: Snowflake): Channel {
    return this.upgradeChannel(this.parseChannel(raw), guildId);
  }

  /** Unavailable guild objects (`{id, unavailable: true}`) become stubs. */
  makeGuild(raw: unknown): CachedGuild {
    const stub = UnavailableGuildSchema.safeParse(raw);
    if (stub.success && stub.data.unavailable === true) return unavailableGuild(stub.data.id);
    return this.upgradeGuild(this.parseGuild(raw));
  }

  makeMessage(raw: unknown): Message {
    return this.upgradeMessage(this.parseMessage(raw));
  }
}
