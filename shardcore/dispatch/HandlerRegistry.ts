//shardcore/dispatch/HandlerRegistry.ts

import { isEventOf, type AnyEvent, type EventContext, type EventHandler, type EventType } from "./EventContext";

export interface HandlerOptions {
  /** Shown in logs; defaults to the function's name. */
  name?: string;
  /** Channel dispatcher only: how many events may queue in front of this handler. */
  capacity?: number;
}

export interface Registration {
  readonly id: number;
  readonly type: EventType;
  readonly name: string;
  readonly capacity: number;
  invoke(ctx: EventContext, event: AnyEvent): void | Promise<void>;
}

/** Handlers by event type, in registration order. */
export class HandlerRegistry {
  private readonly byType = new Map<EventType, Registration[]>();
  private nextId = 0;

  add<K extends EventType>(type: K, handler: EventHandler<K>, options: HandlerOptions = {}): Registration {
    const capacity = options.capacity ?? 0;
    if (Number.isNaN(capacity) || capacity < 0) {
      throw new RangeError(`handler capacity must be >= 0, got ${capacity}`);
    }

    const id = this.nextId++;
    const registration: Registration = {
      id,
      type,
      name: options.name ?? (handler.name || `handler#${id}`),
      capacity,
      invoke: (ctx, event) => {
        if (isEventOf(event, type)) return handler(ctx, event);
      },
    };

    const list = this.byType.get(type) ?? [];
    list.push(registration);
    this.byType.set(type, list);
    return registration;
  }

  remove(registration: Registration): boolean {
    const list = this.byType.get(registration.type);
    const idx = list ? list.indexOf(registration) : -1;
    if (!list || idx === -1) return false;
    list.splice(idx, 1);
    return true;
  }

  /** Snapshot; registering during delivery does not affect the current event. */
  handlersFor(type: EventType): readonly Registration[] {
    return this.byType.get(type)?.slice() ?? [];
  }

  all(): Registration[] {
    return [...this.byType.values()].flat().sort((a, b) => a.id - b.id);
  }
}
