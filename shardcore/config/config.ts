//shardcore/config/config.ts

import { z } from "zod";

import { ALL_INTENTS } from "../gateway/GatewayOpcodes";
import { connectWs, type SocketConnector } from "../gateway/GatewaySocket";
import type { IdentifyProperties } from "../gateway/GatewayEvents";

// -------------------------
// Gateway tuning
// -------------------------

export interface GatewayOptions {
  intents: number;
  connectTimeoutMs: number;
  /** How long to wait for Hello after the transport opens. */
  helloTimeoutMs: number;
  backoffMinMs: number;
  backoffMaxMs: number;
  /** Steady time after which backoff and retry budget start over. */
  backoffResetAfterMs: number;
  /** Consecutive failed attempts before a shard gives up; 0 = never. */
  retryBudget: number;
  outboundQueueSize: number;
  /** Capacity of the merged event stream (0 = hand-off). */
  eventBufferSize: number;
  /** Overrides the recommended shard count when set. */
  shardCount: number | null;
  properties: IdentifyProperties;
  connector: SocketConnector;
  random: () => number;
}

export const DEFAULT_GATEWAY_OPTIONS: Readonly<GatewayOptions> = Object.freeze({
  intents: ALL_INTENTS,
  connectTimeoutMs: 10_000,
  helloTimeoutMs: 41_250,
  backoffMinMs: 1_000,
  backoffMaxMs: 60_000,
  backoffResetAfterMs: 30_000,
  retryBudget: 10,
  outboundQueueSize: 64,
  eventBufferSize: 0,
  shardCount: null,
  properties: { os: process.platform, browser: "shardline", device: "shardline" },
  connector: connectWs,
  random: Math.random,
});

export function gatewayOptions(overrides: Partial<GatewayOptions> = {}): GatewayOptions {
  return { ...DEFAULT_GATEWAY_OPTIONS, ...overrides };
}

// -------------------------
// Environment
// -------------------------

export type DispatcherKind = "task" | "channel";

export interface ClientConfig {
  token: string;
  apiBase: string;
  dispatcher: DispatcherKind;
  maxTasks: number;
  chunking: boolean;
  gateway: GatewayOptions;
}

function intVar(name: string, fallback: number, min: number) {
  return z
    .string()
    .optional()
    .transform((v) => (v ? Number(v) : fallback))
    .refine((n) => Number.isInteger(n) && n >= min, {
      message: `${name} must be an integer >= ${min}`,
    });
}

function boolVar(fallback: boolean) {
  return z
    .string()
    .optional()
    .transform((v) => (v ? v.toLowerCase() === "true" || v === "1" : fallback));
}

const EnvSchema = z
  .object({
    SHARDLINE_TOKEN: z.string().optional().default(""),
    SHARDLINE_API_BASE: z.string().url().optional().default("https://discord.com/api/v10"),
    SHARDLINE_INTENTS: intVar("SHARDLINE_INTENTS", ALL_INTENTS, 0),

    SHARDLINE_CONNECT_TIMEOUT_MS: intVar("SHARDLINE_CONNECT_TIMEOUT_MS", 10_000, 100),
    SHARDLINE_HELLO_TIMEOUT_MS: intVar("SHARDLINE_HELLO_TIMEOUT_MS", 41_250, 100),
    SHARDLINE_BACKOFF_MIN_MS: intVar("SHARDLINE_BACKOFF_MIN_MS", 1_000, 0),
    SHARDLINE_BACKOFF_MAX_MS: intVar("SHARDLINE_BACKOFF_MAX_MS", 60_000, 0),
    SHARDLINE_BACKOFF_RESET_AFTER_MS: intVar("SHARDLINE_BACKOFF_RESET_AFTER_MS", 30_000, 0),
    SHARDLINE_RETRY_BUDGET: intVar("SHARDLINE_RETRY_BUDGET", 10, 0),
    SHARDLINE_OUTBOUND_QUEUE_SIZE: intVar("SHARDLINE_OUTBOUND_QUEUE_SIZE", 64, 1),
    SHARDLINE_EVENT_BUFFER_SIZE: intVar("SHARDLINE_EVENT_BUFFER_SIZE", 0, 0),
    SHARDLINE_SHARD_COUNT: z
      .string()
      .optional()
      .transform((v) => (v ? Number(v) : null))
      .refine((n) => n === null || (Number.isInteger(n) && n >= 1), {
        message: "SHARDLINE_SHARD_COUNT must be an integer >= 1",
      }),

    SHARDLINE_MAX_TASKS: intVar("SHARDLINE_MAX_TASKS", 16, 1),
    SHARDLINE_DISPATCHER: z.enum(["task", "channel"]).optional().default("task"),
    SHARDLINE_CHUNKING: boolVar(true),
  })
  .refine((env) => env.SHARDLINE_BACKOFF_MAX_MS >= env.SHARDLINE_BACKOFF_MIN_MS, {
    message: "SHARDLINE_BACKOFF_MAX_MS must be >= SHARDLINE_BACKOFF_MIN_MS",
  });

/** Parse `env` into a config; throws a ZodError listing every bad variable. */
export function loadConfig(env: NodeJS.ProcessEnv = process.env): ClientConfig {
  const parsed = EnvSchema.parse(env);

  return {
    token: parsed.SHARDLINE_TOKEN,
    apiBase: parsed.SHARDLINE_API_BASE,
    dispatcher: parsed.SHARDLINE_DISPATCHER,
    maxTasks: parsed.SHARDLINE_MAX_TASKS,
    chunking: parsed.SHARDLINE_CHUNKING,
    gateway: gatewayOptions({
      intents: parsed.SHARDLINE_INTENTS,
      connectTimeoutMs: parsed.SHARDLINE_CONNECT_TIMEOUT_MS,
      helloTimeoutMs: parsed.SHARDLINE_HELLO_TIMEOUT_MS,
      backoffMinMs: parsed.SHARDLINE_BACKOFF_MIN_MS,
      backoffMaxMs: parsed.SHARDLINE_BACKOFF_MAX_MS,
      backoffResetAfterMs: parsed.SHARDLINE_BACKOFF_RESET_AFTER_MS,
      retryBudget: parsed.SHARDLINE_RETRY_BUDGET,
      outboundQueueSize: parsed.SHARDLINE_OUTBOUND_QUEUE_SIZE,
      eventBufferSize: parsed.SHARDLINE_EVENT_BUFFER_SIZE,
      shardCount: parsed.SHARDLINE_SHARD_COUNT,
    }),
  };
}
