// sample-bot/index.ts
//
// Minimal daemon on top of shardcore: reads SHARDLINE_* from the environment
// (and a .env file when present), connects every shard and answers !ping.
// SIGINT/SIGTERM shut it down cleanly; a fatal gateway error exits with 1.

import dotenv from "dotenv";
import fs from "node:fs";
import path from "node:path";
import { ZodError } from "zod";

import { openClient, type GatewayClient } from "../shardcore/client/GatewayClient";
import { loadConfig, type ClientConfig } from "../shardcore/config/config";
import { FatalGatewayError } from "../shardcore/core/errors";
import type { BaseDispatcher } from "../shardcore/dispatch/BaseDispatcher";
import { ChannelDispatcher } from "../shardcore/dispatch/ChannelDispatcher";
import { TaskDispatcher } from "../shardcore/dispatch/TaskDispatcher";
import { Logger } from "../shardcore/utils/logger";
import { registerHandlers } from "./handlers";

const log = Logger.scope("BOT");

function loadDotEnv(): void {
  const candidates = [path.resolve(process.cwd(), ".env"), path.resolve(__dirname, "..", ".env")];

  for (const p of candidates) {
    if (fs.existsSync(p)) {
      dotenv.config({ path: p });
      log.debug("Loaded env file", { path: p });
      return;
    }
  }

  log.debug("No .env file found (continuing with process.env)");
}

function makeDispatcher(client: GatewayClient, config: ClientConfig): BaseDispatcher {
  return config.dispatcher === "channel"
    ? new ChannelDispatcher(client)
    : new TaskDispatcher(client, { maxTasks: config.maxTasks });
}

async function main(): Promise<number> {
  loadDotEnv();

  let config: ClientConfig;
  try {
    config = loadConfig(process.env);
  } catch (err) {
    if (err instanceof ZodError) {
      for (const issue of err.issues) log.error(`Config: ${issue.path.join(".") || "env"}: ${issue.message}`);
      return 1;
    }
    throw err;
  }

  if (!config.token) {
    log.error("SHARDLINE_TOKEN is not set");
    return 1;
  }

  const shutdown = new AbortController();
  const onSignal = (sig: NodeJS.Signals): void => {
    log.info(`${sig} received, shutting down`);
    shutdown.abort();
  };
  process.once("SIGINT", onSignal);
  process.once("SIGTERM", onSignal);

  try {
    await openClient({ token: config.token, apiBase: config.apiBase, gateway: config.gateway }, async (client) => {
      log.info(`Starting ${client.shardCount} shard(s) with the ${config.dispatcher} dispatcher`);
      const dispatcher = makeDispatcher(client, config);
      registerHandlers(dispatcher);
      await dispatcher.run({ enableChunking: config.chunking }, shutdown.signal);
    });
    log.info("Stopped");
    return 0;
  } catch (err) {
    if (err instanceof FatalGatewayError) {
      log.error(`Shard ${err.shardId} failed fatally: ${err.message}`, { err });
      return 1;
    }
    throw err;
  } finally {
    process.removeListener("SIGINT", onSignal);
    process.removeListener("SIGTERM", onSignal);
  }
}

main()
  .then((code) => {
    process.exitCode = code;
  })
  .catch((err: unknown) => {
    log.error("Unexpected failure", { err });
    process.exitCode = 1;
  });
