/**
 * Telegram channel adapter (grammY long polling). Inbound: admin commands in private
 * chat. Outbound: the channel photo and failure notes to the admin.
 */
import createDebug from "debug";
import { mkdir, writeFile } from "fs/promises";
import { join } from "path";
import {
  InputFile,
  type Api,
  type Bot,
  type CommandContext,
  type Context,
} from "grammy";
import type { AdminNotifier, PhotoSender } from "../types.js";
import { toError } from "../errors.js";
import { runWithTimeout } from "../utils/helpers.js";
import { NOT_AUTHORIZED_TEXT, type Commands } from "./commands.js";

const debug = createDebug("poster:telegram");

const TELEGRAM_FILE_BASE = "https://api.telegram.org/file";

export function createTelegramSender(api: Api, timeoutMs: number): PhotoSender {
  return {
    async sendPhoto(channel: string, picturePath: string): Promise<void> {
      await runWithTimeout(
        () => api.sendPhoto(channel, new InputFile(picturePath)),
        timeoutMs > 0 ? timeoutMs : null,
        new Error(`sendPhoto timed out after ${timeoutMs}ms`),
      );
    },
  };
}

export function createAdminNotifier(api: Api, adminId: number): AdminNotifier {
  return async (text: string) => {
    await api.sendMessage(adminId, text);
  };
}

export interface TelegramCommandOptions {
  commands: Commands;
  isAuthorized: (senderId: number) => boolean;
  /** Needed to build file download URLs. */
  token: string;
  picturesDir: string;
  /** Epoch ms clock, used for picture file names. */
  now?: () => number;
}

function firstArg(match: string): string | undefined {
  return match.trim().split(/\s+/)[0] || undefined;
}

async function downloadPhoto(
  api: Api,
  fileId: string,
  options: TelegramCommandOptions,
): Promise<string> {
  const file = await api.getFile(fileId);
  if (!file.file_path) throw new Error("Telegram returned no file path");
  const res = await fetch(
    `${TELEGRAM_FILE_BASE}/bot${options.token}/${file.file_path}`,
  );
  if (!res.ok) throw new Error(`download failed: ${res.status}`);
  await mkdir(options.picturesDir, { recursive: true });
  const now = options.now ?? Date.now;
  const path = join(
    options.picturesDir,
    `picture_${Math.floor(now() / 1000)}.jpg`,
  );
  await writeFile(path, Buffer.from(await res.arrayBuffer()));
  return path;
}

export function registerCommandHandlers(
  bot: Bot,
  options: TelegramCommandOptions,
): void {
  const { commands, isAuthorized } = options;

  type CommandCtx = CommandContext<Context>;

  function guarded(
    handler: (ctx: CommandCtx) => Promise<unknown>,
  ): (ctx: CommandCtx) => Promise<void> {
    return async (ctx: CommandCtx) => {
      const senderId = ctx.from?.id;
      if (senderId === undefined || !isAuthorized(senderId)) {
        debug("Ignoring command from unauthorized sender %s", senderId ?? "?");
        await ctx.reply(NOT_AUTHORIZED_TEXT);
        return;
      }
      await handler(ctx);
    };
  }

  bot.command(
    ["start", "help"],
    guarded((ctx) => ctx.reply(commands.help())),
  );

  bot.command(
    "status",
    guarded((ctx) => ctx.reply(commands.status())),
  );

  bot.command(
    "setchannel",
    guarded(async (ctx) =>
      ctx.reply(await commands.setChannel(firstArg(ctx.match))),
    ),
  );

  bot.command(
    "setinterval",
    guarded(async (ctx) =>
      ctx.reply(await commands.setInterval(firstArg(ctx.match))),
    ),
  );

  bot.command(
    "post",
    guarded(async (ctx) => {
      await ctx.reply("Posting the picture…");
      // Not awaited: updates are handled one at a time, and /status must stay responsive.
      commands
        .post()
        .then((text) => ctx.reply(text))
        .catch((err) => {
          debug("/post reply error: %o", err);
        });
    }),
  );

  bot.command(
    "setpicture",
    guarded(async (ctx) => {
      const photos = ctx.message?.reply_to_message?.photo;
      const largest =
        photos && photos.length > 0 ? photos[photos.length - 1] : undefined;
      if (!largest) {
        await ctx.reply(
          "Please reply to a photo with /setpicture to set it as the picture to post.",
        );
        return;
      }
      let path: string;
      try {
        path = await downloadPhoto(ctx.api, largest.file_id, options);
      } catch (err) {
        debug("Picture download failed: %o", err);
        await ctx.reply(
          `Could not download the picture: ${toError(err).message}`,
        );
        return;
      }
      await ctx.reply(await commands.setPicture(path));
    }),
  );

  bot.catch((err) => {
    debug("Update %d failed: %o", err.ctx.update.update_id, err.error);
  });
}
