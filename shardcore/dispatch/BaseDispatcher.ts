//shardcore/dispatch/BaseDispatcher.ts

import { isCancellation } from "../core/errors";
import { withTaskScope, type TaskScope } from "../core/TaskScope";
import type { DomainEvent } from "../events/DomainEvents";
import { EventParser } from "../events/EventParser";
import { GuildChunker } from "../events/GuildChunker";
import { GuildStreamTracker } from "../events/GuildStreamTracker";
import type { EventStream } from "../gateway/GatewayCollection";
import type { IncomingGatewayEvent } from "../gateway/GatewayEvents";
import { Logger } from "../utils/logger";
import type { AnyEvent, DispatcherClient, EventContext, EventHandler, EventType } from "./EventContext";
import { HandlerRegistry, type HandlerOptions, type Registration } from "./HandlerRegistry";

export interface RunOptions {
  /** Request member lists for large guilds (default true). */
  enableChunking?: boolean;
}

/**
 * Pull loop shared by the dispatcher variants: read the merged stream, deliver
 * each gateway event, parse dispatches into domain events and deliver those.
 * Subclasses decide how a delivery becomes a handler unit.
 */
export abstract class BaseDispatcher {
  readonly streams = new GuildStreamTracker();
  readonly chunker = new GuildChunker();
  readonly parser: EventParser;

  protected readonly registry = new HandlerRegistry();
  protected readonly log = Logger.scope("DISPATCH");

  private readonly readyShards = new Set<number>();
  private readyFired = false;
  private chunking = true;

  constructor(readonly client: DispatcherClient) {
    this.parser = new EventParser(client.cache, client.models, this.streams);
  }

  on<K extends EventType>(type: K, handler: EventHandler<K>, options?: HandlerOptions): Registration {
    return this.registry.add(type, handler, options);
  }

  off(registration: Registration): boolean {
    return this.registry.remove(registration);
  }

  /** Open the client's gateway and dispatch until `signal` aborts or a shard fails fatally. */
  async run(options: RunOptions = {}, signal?: AbortSignal): Promise<void> {
    await this.client.startReceivingEvents((stream, s) => this.consume(stream, options, s), signal);
  }

  /** Dispatch everything `stream` yields until it ends or `signal` aborts. */
  async consume(stream: EventStream, options: RunOptions = {}, signal?: AbortSignal): Promise<void> {
    this.readyShards.clear();
    this.readyFired = false;
    this.chunking = options.enableChunking ?? true;

    try {
      await this.loop(stream, signal);
    } catch (err) {
      if (isCancellation(err) && signal?.aborted) return;
      throw err;
    }
  }

  private async loop(stream: EventStream, signal?: AbortSignal): Promise<void> {
    await withTaskScope(
      "dispatch",
      async (helpers) => {
        if (this.chunking) {
          helpers.spawn("chunker", (s) => this.chunker.sendToOutgoing(stream, s));
        }

        await withTaskScope(
          "handlers",
          async (units) => {
            this.onStart(units);
            for await (const event of stream.iterate(units.signal)) {
              await this.handle(event, stream.shardCount, units);
            }

            // Stream ended: let in-flight units finish.
            this.onStreamEnd();
            await units.join();
          },
          helpers.signal,
        );
      },
      signal,
    );
  }

  protected abstract deliverGateway(ctx: EventContext, event: IncomingGatewayEvent, units: TaskScope): Promise<void>;

  protected abstract deliverDomain(ctx: EventContext, event: DomainEvent, units: TaskScope): Promise<void>;

  /** Hook: the dispatch scope is open. */
  protected onStart(_units: TaskScope): void {}

  /** Hook: no more events will be delivered. */
  protected onStreamEnd(): void {}

  protected async invoke(registration: Registration, ctx: EventContext, event: AnyEvent): Promise<void> {
    try {
      await registration.invoke(ctx, event);
    } catch (err) {
      if (isCancellation(err) && ctx.signal.aborted) {
        this.log.debug(`Handler ${registration.name} cancelled during ${event.type}`);
        return;
      }
      this.log.error(`Handler ${registration.name} failed on ${event.type}`, {
        shardId: ctx.shardId,
        dispatch: ctx.dispatchName,
        err,
      });
    }
  }

  private async handle(event: IncomingGatewayEvent, shardCount: number, units: TaskScope): Promise<void> {
    const ctx: EventContext = {
      shardId: event.shardId,
      dispatchName: event.type === "gateway.dispatch" ? event.eventName : null,
      sequence: event.type === "gateway.dispatch" ? event.sequence : null,
      client: this.client,
      signal: units.signal,
    };

    await this.deliverGateway(ctx, event, units);
    if (event.type !== "gateway.dispatch") return;

    for (const domain of this.parser.parse(event)) {
      this.observe(event.shardId, domain);
      await this.deliverDomain(ctx, domain, units);

      if (domain.type === "shard_ready" && this.markReady(event.shardId, shardCount)) {
        this.log.info(`All ${shardCount} shard(s) ready`);
        await this.deliverDomain(ctx, { type: "ready" }, units);
      }
    }
  }

  private observe(shardId: number, event: DomainEvent): void {
    if (!this.chunking) return;

    switch (event.type) {
      case "guild_joined":
      case "guild_streamed":
      case "guild_available":
        this.chunker.handleGuild(shardId, event.guild);
        break;
      case "guild_member_chunk":
        this.chunker.handleMemberChunk(event);
        break;
      case "guild_left":
        this.chunker.handleGuildLeft(event.guildId);
        break;
      default:
        break;
    }
  }

  /** True exactly once: when the last shard becomes ready. */
  private markReady(shardId: number, shardCount: number): boolean {
    this.readyShards.add(shardId);
    if (this.readyFired || this.readyShards.size < shardCount) return false;
    this.readyFired = true;
    return true;
  }
}
