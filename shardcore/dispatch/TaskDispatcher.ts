//shardcore/dispatch/TaskDispatcher.ts

import { CapacityLimiter } from "../core/CapacityLimiter";
import type { TaskScope } from "../core/TaskScope";
import type { DomainEvent } from "../events/DomainEvents";
import type { IncomingGatewayEvent } from "../gateway/GatewayEvents";
import { BaseDispatcher } from "./BaseDispatcher";
import type { DispatcherClient, EventContext } from "./EventContext";

export interface TaskDispatcherOptions {
  /** Handler units that may run at once (default 16). */
  maxTasks?: number;
}

/**
 * Runs every domain-event handler as its own unit, at most `maxTasks` at a
 * time. When every slot is taken the pull loop waits, which stalls the stream.
 * Gateway events are handled inline, in order.
 */
export class TaskDispatcher extends BaseDispatcher {
  readonly limiter: CapacityLimiter;

  constructor(client: DispatcherClient, options: TaskDispatcherOptions = {}) {
    super(client);
    this.limiter = new CapacityLimiter(options.maxTasks ?? 16);
  }

  protected async deliverGateway(ctx: EventContext, event: IncomingGatewayEvent): Promise<void> {
    for (const registration of this.registry.handlersFor(event.type)) {
      await this.invoke(registration, ctx, event);
    }
  }

  protected async deliverDomain(ctx: EventContext, event: DomainEvent, units: TaskScope): Promise<void> {
    for (const registration of this.registry.handlersFor(event.type)) {
      const release = await this.limiter.acquire(units.signal);
      try {
        units.spawn(`${event.type}:${registration.name}`, async (signal) => {
          try {
            await this.invoke(registration, { ...ctx, signal }, event);
          } finally {
            release();
          }
        });
      } catch (err) {
        release();
        throw err;
      }
    }
  }
}
