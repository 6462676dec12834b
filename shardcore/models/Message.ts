//shardcore/models/Message.ts

import type { Channel } from "./Channel";
import type { ClientRef } from "./ClientRef";
import type { Guild } from "./Guild";
import type { Member } from "./Member";
import type { RawMessage } from "./schemas";
import type { Snowflake } from "./Snowflake";
import type { User } from "./User";

export class Message {
  constructor(
    readonly raw: RawMessage,
    readonly author: User,
    /** Set for guild messages when the payload carried member data. */
    readonly member: Member | null,
    private readonly client: ClientRef,
  ) {
    Object.freeze(this);
  }

  get id(): Snowflake {
    return this.raw.id;
  }

  get channelId(): Snowflake {
    return this.raw.channel_id;
  }

  get guildId(): Snowflake | null {
    return this.raw.guild_id ?? null;
  }

  get content(): string {
    return this.raw.content;
  }

  get editedAt(): string | null {
    return this.raw.edited_timestamp ?? null;
  }

  get channel(): Channel | undefined {
    return this.client.cache.channel(this.channelId);
  }

  get guild(): Guild | undefined {
    return this.guildId === null ? undefined : this.client.cache.availableGuild(this.guildId);
  }

  /** Post `content` in the same channel. */
  async reply(content: string): Promise<Message> {
    const channel = this.channel;
    if (channel) return channel.sendMessage(content);

    const raw = await this.client.http.sendMessage(this.channelId, content);
    return this.client.models.makeMessage(raw);
  }
}
