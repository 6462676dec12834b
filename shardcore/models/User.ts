//shardcore/models/User.ts

import type { RawUser } from "./schemas";
import type { Snowflake } from "./Snowflake";

export class User {
  constructor(readonly raw: RawUser) {
    Object.freeze(this);
  }

  get id(): Snowflake {
    return this.raw.id;
  }

  get username(): string {
    return this.raw.username;
  }

  get displayName(): string {
    return this.raw.global_name ?? this.raw.username;
  }

  get bot(): boolean {
    return this.raw.bot ?? false;
  }

  get mention(): string {
    return `<@${this.raw.id}>`;
  }
}
