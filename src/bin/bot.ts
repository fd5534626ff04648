#!/usr/bin/env npx tsx
import { BotController } from "../bot/botController";
import { BOT_COMMANDS, createTelegramBot } from "../bot/telegramBot";
import { youtubeCaptionSource } from "../clients/captionClient";
import { createLlmClient } from "../clients/llmClient";
import { loadConfig, maskSecret, type AppConfig } from "../config/env";
import { createDatabase, type Database } from "../db/client";
import {
  InMemoryRunRepository,
  PgRunRepository,
  type RunRepository
} from "../db/runRepository";
import {
  InMemorySettingsRepository,
  PgSettingsRepository,
  type SettingsRepository
} from "../db/settingsRepository";
import { Orchestrator } from "../jobs/orchestrator";
import { ModelManager } from "../services/modelManager";
import { SummaryService } from "../services/summaryService";
import { TranscriptService } from "../services/transcriptService";
import { LogLevel, describeError, log } from "../utils/logger";
import { runSentinelCheck, type SentinelProbe } from "../utils/sentinel";

interface Storage {
  db: Database | null;
  settings: SettingsRepository;
  runs: RunRepository;
}

function openStorage(config: Readonly<AppConfig>): Storage {
  if (!config.databaseUrl) {
    log(LogLevel.WARN, "DATABASE_URL not set; settings and run history stay in memory.");
    return {
      db: null,
      settings: new InMemorySettingsRepository(),
      runs: new InMemoryRunRepository()
    };
  }

  const db = createDatabase(config);
  return {
    db,
    settings: new PgSettingsRepository(db),
    runs: new PgRunRepository(db)
  };
}

async function main() {
  let config: Readonly<AppConfig>;
  try {
    config = loadConfig();
  } catch (err: unknown) {
    console.error(`💥 Configuration error: ${describeError(err)}`);
    process.exit(1);
  }

  console.log(
    "========================================\n",
    "🚀 Starting YouTube summary bot",
    "\n========================================"
  );
  log(LogLevel.INFO, `Telegram token: ${maskSecret(config.telegramBotToken)}`);
  log(LogLevel.INFO, `Gemini key: ${maskSecret(config.geminiApiKey)}`);
  log(LogLevel.INFO, `Models: ${config.geminiModels.join(", ")}`);

  const storage = openStorage(config);
  const llm = createLlmClient(config);
  const models = new ModelManager(llm.completions, config.geminiModels);

  const orchestrator = new Orchestrator(
    {
      retriever: new TranscriptService(youtubeCaptionSource),
      generator: new SummaryService(models, config.maxTranscriptChars),
      runs: storage.runs
    },
    config
  );

  const controller = new BotController({
    pipeline: orchestrator,
    settings: storage.settings,
    models,
    modelNames: config.geminiModels
  });
  const bot = createTelegramBot(config.telegramBotToken, controller);

  const probes: SentinelProbe[] = [
    {
      name: "Telegram Bot API",
      critical: true,
      check: async () => {
        const me = await bot.telegram.getMe();
        log(LogLevel.INFO, `    Logged in as @${me.username}`);
      }
    },
    {
      name: "Gemini API",
      critical: false,
      check: async () => {
        await llm.models.list();
      }
    }
  ];
  const db = storage.db;
  if (db) {
    probes.push({
      name: "PostgreSQL",
      critical: true,
      check: async () => {
        await db.query("SELECT 1");
      }
    });
  }

  let polling = false;
  const stop = (signal: string) => {
    log(LogLevel.INFO, `${signal} received, stopping bot...`);
    if (polling) bot.stop(signal);
    else process.exit(0);
  };
  process.once("SIGINT", () => stop("SIGINT"));
  process.once("SIGTERM", () => stop("SIGTERM"));

  try {
    await runSentinelCheck(probes);
    await bot.telegram.setMyCommands(BOT_COMMANDS);
    // Resolves once polling stops
    await bot.launch({ dropPendingUpdates: true }, () => {
      polling = true;
      log(LogLevel.INFO, "🤖 Bot is polling for updates");
    });
    await db?.shutdown();
    process.exit(0);
  } catch (err: unknown) {
    console.error(`💥 Fatal bot error: ${describeError(err)}`);
    await db?.shutdown().catch((shutdownErr: unknown) => {
      log(LogLevel.ERROR, "Pool shutdown failed", describeError(shutdownErr));
    });
    process.exit(1);
  }
}

void main();
