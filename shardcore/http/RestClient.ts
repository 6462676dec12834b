//shardcore/http/RestClient.ts

import { z } from "zod";

import { HttpError, RateLimitedError } from "../core/errors";
import { deadlineSignal } from "../core/time";
import type { MessageSender } from "../models/ClientRef";
import { parseWith } from "../models/ModelFactory";
import { snowflakeToString, SnowflakeSchema, type Snowflake } from "../models/Snowflake";
import { Logger } from "../utils/logger";

const log = Logger.scope("HTTP");

export type HttpMethod = "GET" | "POST" | "PUT" | "PATCH" | "DELETE";

export interface RestClientOptions {
  token: string;
  baseUrl: string;
  userAgent?: string;
  timeoutMs?: number;
  /** Swappable for tests; defaults to the global fetch. */
  fetchImpl?: typeof fetch;
}

const GatewayBotSchema = z.object({
  url: z.string().url(),
  shards: z.number().int().positive(),
  session_start_limit: z.object({
    total: z.number().int(),
    remaining: z.number().int(),
    reset_after: z.number().int(),
    max_concurrency: z.number().int().positive(),
  }),
});

const ApplicationSchema = z.object({
  id: SnowflakeSchema,
  name: z.string(),
  bot_public: z.boolean().optional(),
});

const RateLimitBodySchema = z.object({
  retry_after: z.number().nonnegative(),
  global: z.boolean().optional(),
});

export interface GatewayInfo {
  url: string;
  /** Recommended shard count. */
  shards: number;
  sessionStartLimit: {
    total: number;
    remaining: number;
    resetAfterMs: number;
    maxConcurrency: number;
  };
}

export interface ApplicationInfo {
  id: Snowflake;
  name: string;
}

/**
 * Minimal REST collaborator: authorised JSON requests and the handful of
 * routes the gateway client needs. No rate-limit bucket tracking; a 429
 * surfaces as RateLimitedError for the caller to handle.
 */
export class RestClient implements MessageSender {
  private readonly lifetime = new AbortController();
  private readonly fetchImpl: typeof fetch;
  private readonly baseUrl: string;

  constructor(private readonly options: RestClientOptions) {
    this.fetchImpl = options.fetchImpl ?? fetch;
    this.baseUrl = options.baseUrl.replace(/\/+$/, "");
  }

  get closed(): boolean {
    return this.lifetime.signal.aborted;
  }

  async request(route: string, method: HttpMethod, body?: unknown): Promise<unknown> {
    const deadline = deadlineSignal(this.options.timeoutMs ?? 15_000, this.lifetime.signal);
    const headers: Record<string, string> = {
      Authorization: `Bot ${this.options.token}`,
      "User-Agent": this.options.userAgent ?? "DiscordBot (shardline, 0.1.0)",
    };
    if (body !== undefined) headers["Content-Type"] = "application/json";

    try {
      const res = await this.fetchImpl(`${this.baseUrl}${route}`, {
        method,
        headers,
        body: body === undefined ? undefined : JSON.stringify(body),
        signal: deadline.signal,
      });

      const payload = await readBody(res);
      log.debug(`${method} ${route} -> ${res.status}`);

      if (res.status === 429) {
        const limit = RateLimitBodySchema.safeParse(payload);
        const retryAfterMs = limit.success ? Math.ceil(limit.data.retry_after * 1000) : 1000;
        const global = limit.success ? (limit.data.global ?? false) : false;
        log.warn(`Rate limited on ${method} ${route}, retry after ${retryAfterMs}ms`, { global });
        throw new RateLimitedError(route, payload, retryAfterMs, global);
      }
      if (!res.ok) throw new HttpError(res.status, route, payload);

      return payload;
    } finally {
      deadline.dispose();
    }
  }

  async getGatewayBot(): Promise<GatewayInfo> {
    const body = parseWith(GatewayBotSchema, await this.request("/gateway/bot", "GET"), "gateway info");
    return {
      url: body.url,
      shards: body.shards,
      sessionStartLimit: {
        total: body.session_start_limit.total,
        remaining: body.session_start_limit.remaining,
        resetAfterMs: body.session_start_limit.reset_after,
        maxConcurrency: body.session_start_limit.max_concurrency,
      },
    };
  }

  async getCurrentApplication(): Promise<ApplicationInfo> {
    const body = parseWith(ApplicationSchema, await this.request("/oauth2/applications/@me", "GET"), "application");
    return { id: body.id, name: body.name };
  }

  sendMessage(channelId: Snowflake, content: string): Promise<unknown> {
    return this.request(`/channels/${snowflakeToString(channelId)}/messages`, "POST", { content });
  }

  /** Abort in-flight requests; later requests fail at once. */
  close(): void {
    this.lifetime.abort();
  }
}

async function readBody(res: Response): Promise<unknown> {
  if (res.status === 204) return null;
  const text = await res.text();
  if (text.length === 0) return null;

  const type = res.headers.get("content-type") ?? "";
  if (!type.includes("application/json")) return text;
  try {
    return JSON.parse(text);
  } catch (err) {
    log.warn("Response claimed JSON but did not parse", { err });
    return text;
  }
}
