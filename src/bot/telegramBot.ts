import { Markup, Telegraf, TelegramError, type Context } from "telegraf";
import { message } from "telegraf/filters";
import { PIPELINE_LIMITS } from "../config/limits";
import { LogLevel, describeError, log } from "../utils/logger";
import type { BotController, ChatSurface } from "./botController";
import {
  Actions,
  GENERIC_ERROR_TEXT,
  MODE_ACTION_PREFIX,
  TONE_ACTION_PREFIX,
  formatView,
  helpView,
  modePickerView,
  tonePickerView,
  welcomeView,
  type BotView
} from "./views";

export const BOT_COMMANDS = [
  { command: "start", description: "Show the main menu" },
  { command: "summarize", description: "Summarize a YouTube video" },
  { command: "settings", description: "Change summary mode and tone" },
  { command: "format", description: "Show supported URL formats" },
  { command: "about", description: "About this bot" },
  { command: "help", description: "Show help" }
];

function toExtra(view: BotView) {
  const keyboard = view.keyboard
    ? Markup.inlineKeyboard(
        view.keyboard.map((row) =>
          row.map((button) => Markup.button.callback(button.text, button.action))
        )
      )
    : Markup.inlineKeyboard([]);

  return {
    ...(view.html ? { parse_mode: "HTML" as const } : {}),
    ...keyboard
  };
}

function isNotModified(err: unknown): boolean {
  return err instanceof TelegramError && err.description.includes("message is not modified");
}

function surfaceFor(ctx: Context): ChatSurface {
  return {
    async send(view) {
      const sent = await ctx.reply(view.text, toExtra(view));
      return sent.message_id;
    },
    async edit(messageId, view) {
      try {
        await ctx.telegram.editMessageText(
          ctx.chat?.id,
          messageId,
          undefined,
          view.text,
          toExtra(view)
        );
      } catch (err: unknown) {
        if (!isNotModified(err)) throw err;
      }
    }
  };
}

function senderOf(ctx: Context): string {
  const from = ctx.from;
  if (!from) throw new Error("Update has no sender");
  return String(from.id);
}

/**
 * Replaces the message that carried the tapped button.
 */
async function showInPlace(ctx: Context, view: BotView): Promise<void> {
  await ctx.answerCbQuery();
  try {
    await ctx.editMessageText(view.text, toExtra(view));
  } catch (err: unknown) {
    if (!isNotModified(err)) throw err;
  }
}

/**
 * Wires Telegram updates to the controller: commands, inline buttons and free text.
 * Summaries run detached from the update handler; polling keeps delivering
 * updates (and Cancel taps) while one is in flight.
 * @param token Bot API token
 * @param controller Platform-independent chat logic
 */
export function createTelegramBot(token: string, controller: BotController): Telegraf {
  const bot = new Telegraf(token, { handlerTimeout: PIPELINE_LIMITS.HANDLER_TIMEOUT_MS });

  const startSummary = (ctx: Context, text: string) => {
    const senderId = senderOf(ctx);
    void controller.handleText(senderId, text, surfaceFor(ctx)).catch(async (err: unknown) => {
      log(LogLevel.ERROR, `[${senderId}] Summary request crashed`, describeError(err));
      await ctx.reply(GENERIC_ERROR_TEXT).catch((replyErr: unknown) => {
        log(LogLevel.ERROR, "Could not deliver the error reply", describeError(replyErr));
      });
    });
  };

  bot.start((ctx) => ctx.reply(welcomeView().text, toExtra(welcomeView())));
  bot.help((ctx) => ctx.reply(helpView().text, toExtra(helpView())));
  bot.command("format", (ctx) => ctx.reply(formatView().text, toExtra(formatView())));
  bot.command("about", (ctx) => {
    const view = controller.about();
    return ctx.reply(view.text, toExtra(view));
  });
  bot.command("summarize", (ctx) => {
    const view = controller.requestUrl(senderOf(ctx));
    return ctx.reply(view.text, toExtra(view));
  });
  bot.command("settings", async (ctx) => {
    const view = await controller.showSettings(senderOf(ctx));
    await ctx.reply(view.text, toExtra(view));
  });

  bot.action(Actions.SUMMARIZE, (ctx) => showInPlace(ctx, controller.requestUrl(senderOf(ctx))));
  bot.action(Actions.HELP, (ctx) => showInPlace(ctx, helpView()));
  bot.action(Actions.ABOUT, (ctx) => showInPlace(ctx, controller.about()));
  bot.action(Actions.FORMAT, (ctx) => showInPlace(ctx, formatView()));
  bot.action(Actions.CANCEL, (ctx) => showInPlace(ctx, controller.cancel(senderOf(ctx))));
  bot.action(Actions.SETTINGS, async (ctx) =>
    showInPlace(ctx, await controller.showSettings(senderOf(ctx)))
  );
  bot.action(Actions.SET_MODE, (ctx) => showInPlace(ctx, modePickerView()));
  bot.action(Actions.SET_TONE, (ctx) => showInPlace(ctx, tonePickerView()));
  bot.action(Actions.MODEL_STATUS, (ctx) => showInPlace(ctx, controller.modelStatus()));

  bot.action(new RegExp(`^${MODE_ACTION_PREFIX}(.+)$`), async (ctx) => {
    const view = await controller.updateMode(senderOf(ctx), ctx.match[1]);
    await showInPlace(ctx, view);
  });
  bot.action(new RegExp(`^${TONE_ACTION_PREFIX}(.+)$`), async (ctx) => {
    const view = await controller.updateTone(senderOf(ctx), ctx.match[1]);
    await showInPlace(ctx, view);
  });

  bot.on(message("text"), async (ctx) => {
    if (ctx.message.text.startsWith("/")) {
      await ctx.reply("Unknown command. Send /help to see what I can do.");
      return;
    }
    startSummary(ctx, ctx.message.text);
  });

  bot.catch(async (err, ctx) => {
    log(LogLevel.ERROR, `Update ${ctx.update.update_id} failed`, describeError(err));
    try {
      await ctx.reply(GENERIC_ERROR_TEXT);
    } catch (replyErr: unknown) {
      log(LogLevel.ERROR, "Could not deliver the error reply", describeError(replyErr));
    }
  });

  return bot;
}
