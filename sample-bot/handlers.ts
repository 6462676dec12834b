//sample-bot/handlers.ts

import type { BaseDispatcher } from "../shardcore/dispatch/BaseDispatcher";
import { Logger } from "../shardcore/utils/logger";

const log = Logger.scope("BOT");

export const PING_COMMAND = "!ping";
export const PONG_REPLY = "pong";

/** Wire the sample bot's handlers onto a dispatcher. */
export function registerHandlers(dispatcher: BaseDispatcher): void {
  dispatcher.on("ready", function onReady(ctx) {
    log.success(`Ready: ${ctx.client.cache.guildCount} guild(s) cached`);
  });

  dispatcher.on("guild_joined", function onGuildJoined(_ctx, event) {
    log.info(`Joined guild ${event.guild.name} (${event.guild.id})`);
  });

  dispatcher.on("guild_left", function onGuildLeft(_ctx, event) {
    log.info(`Left guild ${event.guildId}`);
  });

  dispatcher.on("gateway.invalidate_session", function onInvalidated(ctx, event) {
    log.warn(`Shard ${ctx.shardId} session invalidated`, { resumable: event.resumable });
  });

  dispatcher.on("message_create", async function onPing(_ctx, event) {
    const { message } = event;
    if (message.author.bot) return;
    if (message.content.trim() !== PING_COMMAND) return;

    log.debug(`Ping from ${message.author.username} in ${message.channelId}`);
    await message.reply(PONG_REPLY);
  });
}
