//shardcore/gateway/GatewayCollection.ts

import { AsyncChannel } from "../core/AsyncChannel";
import { ShardAddressError } from "../core/errors";
import { withTaskScope } from "../core/TaskScope";
import type { GatewayOptions } from "../config/config";
import type { Snowflake } from "../models/Snowflake";
import { Logger } from "../utils/logger";
import { GatewayConnection } from "./GatewayConnection";
import type { IncomingGatewayEvent, ShardCommand } from "./GatewayEvents";

const log = Logger.scope("COLLECTION");

/** Shard that owns an entity: `id % shardCount`. */
export function shardForId(id: Snowflake, shardCount: number): number {
  return Number(id % BigInt(shardCount));
}

/** What consumers of a running collection see. */
export interface EventStream {
  readonly shardCount: number;
  iterate(signal?: AbortSignal): AsyncIterable<IncomingGatewayEvent>;
  sendToShard(shardId: number, command: ShardCommand, signal?: AbortSignal): Promise<void>;
}

export interface GatewayCollectionInit {
  token: string;
  initialUrl: string;
  shardCount: number;
  options: GatewayOptions;
}

/**
 * Every shard of one client. Incoming events from all shards merge into one
 * stream (per-shard order kept, no order across shards); outgoing commands go
 * to exactly one shard.
 */
export class GatewayCollection implements EventStream, AsyncIterable<IncomingGatewayEvent> {
  private readonly events: AsyncChannel<IncomingGatewayEvent>;
  private readonly connections: readonly GatewayConnection[];

  constructor(init: GatewayCollectionInit) {
    if (!Number.isInteger(init.shardCount) || init.shardCount < 1) {
      throw new RangeError(`shard count must be a positive integer, got ${init.shardCount}`);
    }

    this.events = new AsyncChannel<IncomingGatewayEvent>(init.options.eventBufferSize);

    const connections: GatewayConnection[] = [];
    for (let shardId = 0; shardId < init.shardCount; shardId++) {
      connections.push(
        new GatewayConnection({
          shard: { shardId, shardCount: init.shardCount },
          token: init.token,
          initialUrl: init.initialUrl,
          events: this.events,
          options: init.options,
        }),
      );
    }
    this.connections = connections;
  }

  get shardCount(): number {
    return this.connections.length;
  }

  connection(shardId: number): GatewayConnection {
    const conn = Number.isInteger(shardId) ? this.connections[shardId] : undefined;
    if (!conn) throw new ShardAddressError(shardId, this.connections.length);
    return conn;
  }

  /**
   * Queue a command on one shard. Address errors throw synchronously; the
   * returned promise waits only for room in that shard's outgoing queue.
   */
  sendToShard(shardId: number, command: ShardCommand, signal?: AbortSignal): Promise<void> {
    const conn = this.connection(shardId);
    return conn.commands.send(command, signal);
  }

  sendForGuild(guildId: Snowflake, command: ShardCommand, signal?: AbortSignal): Promise<void> {
    return this.sendToShard(shardForId(guildId, this.shardCount), command, signal);
  }

  /** Run every shard until `signal` aborts or one fails fatally. */
  async run(signal: AbortSignal): Promise<void> {
    log.info(`Starting ${this.connections.length} shard(s)`);
    try {
      await withTaskScope(
        "collection",
        async (scope) => {
          for (const conn of this.connections) {
            scope.spawn(`shard-${conn.shardId}`, (s) => conn.run(s));
          }
          await scope.join();
        },
        signal,
      );
    } finally {
      this.events.close();
      log.info("All shards stopped");
    }
  }

  iterate(signal?: AbortSignal): AsyncIterable<IncomingGatewayEvent> {
    return this.events.iterate(signal);
  }

  [Symbol.asyncIterator](): AsyncIterator<IncomingGatewayEvent> {
    return this.events.iterate();
  }

  /** Consume and discard events so shards never stall on backpressure. */
  async drainForever(signal?: AbortSignal): Promise<void> {
    for await (const event of this.events.iterate(signal)) {
      log.debug(`drained ${event.type} from shard ${event.shardId}`);
    }
  }
}
