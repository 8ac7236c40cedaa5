/**
 * Picture poster: loads config.json, arms the post schedule and runs the Telegram
 * command bot (long polling) until SIGINT/SIGTERM.
 */
import createDebug from "debug";
import { Bot } from "grammy";
import {
  createAdminNotifier,
  createTelegramSender,
  registerCommandHandlers,
} from "./channels/telegram-adapter.js";
import { createCommands, describeFailure } from "./channels/commands.js";
import { ConfigStore, createDefaultConfig } from "./config.js";
import { env } from "./env.js";
import { PostCoordinator } from "./posting/post-coordinator.js";
import { IntervalScheduler } from "./scheduling/interval-scheduler.js";
import { getWorkspaceConfigPath, getWorkspacePicturesDir } from "./workspace.js";

const debug = createDebug("poster:main");

async function main() {
  const store = new ConfigStore(getWorkspaceConfigPath(), {
    defaults: () =>
      createDefaultConfig({
        botToken: env.BOT_TOKEN,
        adminId: env.ADMIN_ID,
        postInterval: env.DEFAULT_POST_INTERVAL,
      }),
  });
  const config = await store.load();

  const token = env.BOT_TOKEN || config.botToken;
  if (!token) {
    throw new Error(
      `No bot token: set BOT_TOKEN or bot_token in ${store.filePath}`,
    );
  }
  const adminId = env.ADMIN_ID || config.adminId;
  if (!adminId) {
    debug("No admin id configured; every command will be refused");
  }

  const bot = new Bot(token);
  const notifyAdmin = createAdminNotifier(bot.api, adminId);

  const scheduler = new IntervalScheduler({
    retryDelayMs: env.POST_RETRY_DELAY_SECONDS * 1000,
    maxRetries: env.POST_MAX_RETRIES,
    onFailure: (report) => {
      notifyAdmin(describeFailure(report)).catch((err) => {
        debug("admin notification failed: %o", err);
      });
    },
  });
  const coordinator = new PostCoordinator({
    store,
    scheduler,
    sender: createTelegramSender(bot.api, env.SEND_TIMEOUT_MS),
  });

  registerCommandHandlers(bot, {
    commands: createCommands({ store, coordinator, scheduler }),
    isAuthorized: (senderId) => adminId !== 0 && senderId === adminId,
    token,
    picturesDir: getWorkspacePicturesDir(),
  });

  scheduler.initialize(config, () => coordinator.runScheduled());

  const shutdown = async () => {
    debug("Shutting down…");
    scheduler.cancel();
    await scheduler.drain();
    await bot.stop();
    process.exit(0);
  };
  process.on("SIGINT", () => void shutdown());
  process.on("SIGTERM", () => void shutdown());

  await bot.start({
    onStart: (me) => debug("Polling as @%s", me.username),
  });
}

main().catch((err) => {
  debug("Picture poster failed: %o", err);
  process.exit(1);
});
