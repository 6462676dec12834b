//shardcore/models/schemas.ts

import { z } from "zod";

import { SnowflakeSchema } from "./Snowflake";

// Raw entity snapshots as they arrive on the wire. Unknown fields are
// stripped; ids become bigints.

export const UserSchema = z.object({
  id: SnowflakeSchema,
  username: z.string(),
  global_name: z.string().nullish(),
  discriminator: z.string().optional(),
  avatar: z.string().nullish(),
  bot: z.boolean().optional(),
});
export type RawUser = z.output<typeof UserSchema>;

export const MemberSchema = z.object({
  user: UserSchema,
  nick: z.string().nullish(),
  roles: z.array(SnowflakeSchema).default([]),
  joined_at: z.string().nullish(),
  deaf: z.boolean().optional(),
  mute: z.boolean().optional(),
});
export type RawMember = z.output<typeof MemberSchema>;

export const EmojiSchema = z.object({
  id: SnowflakeSchema,
  name: z.string().nullable(),
  animated: z.boolean().optional(),
  available: z.boolean().optional(),
});
export type RawEmoji = z.output<typeof EmojiSchema>;

export const ChannelSchema = z.object({
  id: SnowflakeSchema,
  type: z.number().int(),
  guild_id: SnowflakeSchema.optional(),
  name: z.string().nullish(),
  position: z.number().int().optional(),
  topic: z.string().nullish(),
  nsfw: z.boolean().optional(),
  parent_id: SnowflakeSchema.nullish(),
  bitrate: z.number().int().optional(),
  user_limit: z.number().int().optional(),
  recipients: z.array(UserSchema).optional(),
});
export type RawChannel = z.output<typeof ChannelSchema>;

export const UnavailableGuildSchema = z.object({
  id: SnowflakeSchema,
  unavailable: z.boolean().optional(),
});
export type RawUnavailableGuild = z.output<typeof UnavailableGuildSchema>;

export const GuildSchema = z.object({
  id: SnowflakeSchema,
  name: z.string(),
  icon: z.string().nullish(),
  owner_id: SnowflakeSchema.optional(),
  unavailable: z.boolean().optional(),
  large: z.boolean().optional(),
  member_count: z.number().int().optional(),
  channels: z.array(ChannelSchema).default([]),
  members: z.array(MemberSchema).default([]),
  emojis: z.array(EmojiSchema).default([]),
});
export type RawGuild = z.output<typeof GuildSchema>;

export const MessageSchema = z.object({
  id: SnowflakeSchema,
  channel_id: SnowflakeSchema,
  guild_id: SnowflakeSchema.optional(),
  author: UserSchema,
  member: MemberSchema.omit({ user: true }).optional(),
  content: z.string().default(""),
  timestamp: z.string(),
  edited_timestamp: z.string().nullish(),
  mentions: z.array(UserSchema).default([]),
  type: z.number().int().default(0),
});
export type RawMessage = z.output<typeof MessageSchema>;
