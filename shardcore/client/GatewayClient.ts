//shardcore/client/GatewayClient.ts

import { ObjectCache } from "../cache/ObjectCache";
import { isCancellation } from "../core/errors";
import { withTaskScope } from "../core/TaskScope";
import { gatewayOptions, type GatewayOptions } from "../config/config";
import type { DispatcherClient } from "../dispatch/EventContext";
import { GatewayCollection, type EventStream } from "../gateway/GatewayCollection";
import { RestClient, type GatewayInfo } from "../http/RestClient";
import { ModelFactory } from "../models/ModelFactory";
import { Logger } from "../utils/logger";

const log = Logger.scope("CLIENT");

export interface ClientOptions {
  token: string;
  apiBase: string;
  gateway?: Partial<GatewayOptions>;
  /** Passed to the REST client; tests swap in a stub. */
  fetchImpl?: typeof fetch;
}

/**
 * Ties the REST collaborator, model factory, cache and gateway together.
 * Obtain one through `openClient`.
 */
export class GatewayClient implements DispatcherClient {
  readonly cache = new ObjectCache();
  readonly models: ModelFactory = new ModelFactory(this);

  constructor(
    readonly http: RestClient,
    readonly gateway: GatewayInfo,
    private readonly token: string,
    readonly options: GatewayOptions,
  ) {}

  /** Configured override, else the count the platform recommends. */
  get shardCount(): number {
    return this.options.shardCount ?? this.gateway.shards;
  }

  async startReceivingEvents<T>(
    body: (stream: EventStream, signal: AbortSignal) => Promise<T>,
    signal?: AbortSignal,
  ): Promise<T | undefined> {
    const collection = new GatewayCollection({
      token: this.token,
      initialUrl: this.gateway.url,
      shardCount: this.shardCount,
      options: this.options,
    });

    try {
      return await withTaskScope(
        "gateway",
        async (scope) => {
          scope.spawn("collection", (s) => collection.run(s));
          return await body(collection, scope.signal);
        },
        signal,
      );
    } catch (err) {
      if (isCancellation(err) && signal?.aborted) {
        log.info("Event receiving stopped");
        return undefined;
      }
      throw err;
    }
  }
}

/**
 * Resolve gateway info, run `body` with a ready client, and release the HTTP
 * side however `body` ends.
 */
export async function openClient<T>(options: ClientOptions, body: (client: GatewayClient) => Promise<T>): Promise<T> {
  const http = new RestClient({ token: options.token, baseUrl: options.apiBase, fetchImpl: options.fetchImpl });
  try {
    const gateway = await http.getGatewayBot();
    log.info(`Gateway ${gateway.url}, ${gateway.shards} shard(s) recommended`, {
      sessionsRemaining: gateway.sessionStartLimit.remaining,
    });

    const client = new GatewayClient(http, gateway, options.token, gatewayOptions(options.gateway));
    return await body(client);
  } finally {
    http.close();
  }
}
