//shardcore/dispatch/ChannelDispatcher.ts

import { AsyncChannel } from "../core/AsyncChannel";
import type { TaskScope } from "../core/TaskScope";
import type { DomainEvent } from "../events/DomainEvents";
import type { IncomingGatewayEvent } from "../gateway/GatewayEvents";
import { BaseDispatcher } from "./BaseDispatcher";
import type { AnyEvent, EventContext } from "./EventContext";
import type { Registration } from "./HandlerRegistry";

interface Delivery {
  ctx: EventContext;
  event: AnyEvent;
}

/**
 * One channel and one long-lived worker per registered handler. The pull loop
 * pushes each event into every matching channel and waits for all pushes, so
 * a single slow handler (with a full channel) holds up the whole stream.
 */
export class ChannelDispatcher extends BaseDispatcher {
  private readonly routes = new Map<number, AsyncChannel<Delivery>>();

  protected onStart(units: TaskScope): void {
    this.routes.clear();
    for (const registration of this.registry.all()) this.route(registration, units);
  }

  protected onStreamEnd(): void {
    // Workers finish what is queued, then exit.
    for (const channel of this.routes.values()) channel.close();
  }

  protected deliverGateway(ctx: EventContext, event: IncomingGatewayEvent, units: TaskScope): Promise<void> {
    return this.push(ctx, event, units);
  }

  protected deliverDomain(ctx: EventContext, event: DomainEvent, units: TaskScope): Promise<void> {
    return this.push(ctx, event, units);
  }

  private async push(ctx: EventContext, event: AnyEvent, units: TaskScope): Promise<void> {
    const pushes = this.registry
      .handlersFor(event.type)
      .map((registration) => this.route(registration, units).send({ ctx, event }, units.signal));
    await Promise.all(pushes);
  }

  private route(registration: Registration, units: TaskScope): AsyncChannel<Delivery> {
    const existing = this.routes.get(registration.id);
    if (existing) return existing;

    const channel = new AsyncChannel<Delivery>(registration.capacity);
    this.routes.set(registration.id, channel);

    units.spawn(`worker:${registration.name}`, async (signal) => {
      for await (const { ctx, event } of channel.iterate(signal)) {
        await this.invoke(registration, { ...ctx, signal }, event);
      }
    });
    return channel;
  }
}
