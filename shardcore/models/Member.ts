//shardcore/models/Member.ts

import type { ClientRef } from "./ClientRef";
import type { Guild } from "./Guild";
import type { RawMember } from "./schemas";
import type { Snowflake } from "./Snowflake";
import type { User } from "./User";

export class Member {
  constructor(
    readonly raw: RawMember,
    readonly user: User,
    readonly guildId: Snowflake,
    private readonly client: ClientRef,
  ) {
    Object.freeze(this);
  }

  get id(): Snowflake {
    return this.user.id;
  }

  get nickname(): string | null {
    return this.raw.nick ?? null;
  }

  get displayName(): string {
    return this.raw.nick ?? this.user.displayName;
  }

  get roles(): readonly Snowflake[] {
    return this.raw.roles;
  }

  get guild(): Guild | undefined {
    return this.client.cache.availableGuild(this.guildId);
  }
}
