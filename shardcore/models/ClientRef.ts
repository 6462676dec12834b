//shardcore/models/ClientRef.ts

import type { ObjectCache } from "../cache/ObjectCache";
import type { ModelFactory } from "./ModelFactory";
import type { Snowflake } from "./Snowflake";

export interface MessageSender {
  /** Post a message; resolves to the created message's raw body. */
  sendMessage(channelId: Snowflake, content: string): Promise<unknown>;
}

/**
 * What a stateful model may reach through its client. Models hold this
 * reference but never own the client.
 */
export interface ClientRef {
  readonly http: MessageSender;
  readonly cache: ObjectCache;
  readonly models: ModelFactory;
}
