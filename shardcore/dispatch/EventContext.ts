//shardcore/dispatch/EventContext.ts

import type { DomainEvent } from "../events/DomainEvents";
import type { EventStream } from "../gateway/GatewayCollection";
import type { IncomingGatewayEvent } from "../gateway/GatewayEvents";
import type { ClientRef } from "../models/ClientRef";

export type AnyEvent = IncomingGatewayEvent | DomainEvent;
export type EventType = AnyEvent["type"];
export type EventOf<K extends EventType> = Extract<AnyEvent, { type: K }>;

/** The client as dispatchers see it: models and cache plus an event source. */
export interface DispatcherClient extends ClientRef {
  /**
   * Open the gateway, run `body` against its event stream and tear the
   * gateway down when `body` settles. Resolves undefined when `signal` aborts.
   */
  startReceivingEvents<T>(
    body: (stream: EventStream, signal: AbortSignal) => Promise<T>,
    signal?: AbortSignal,
  ): Promise<T | undefined>;
}

export interface EventContext {
  readonly shardId: number;
  /** Dispatch name (e.g. MESSAGE_CREATE) the event came from, if any. */
  readonly dispatchName: string | null;
  readonly sequence: number | null;
  readonly client: DispatcherClient;
  /** Aborted when the handler unit should stop. */
  readonly signal: AbortSignal;
}

export type EventHandler<K extends EventType> = (ctx: EventContext, event: EventOf<K>) => void | Promise<void>;

export function isEventOf<K extends EventType>(event: AnyEvent, type: K): event is EventOf<K> {
  return event.type === type;
}
