import "dotenv/config";
import { Server } from "http";
import { OAuth2Client } from "google-auth-library";
import { Bot } from "grammy";
import { createServices } from "./container";
import { createApp } from "./app";
import { createPool } from "./db/pool";
import { PgStore } from "./db/pgStore";
import { runMigrations } from "./db/runMigrations";
import type { Store } from "./db/store";
import { scheduleLocalJobs } from "./jobs/localScheduler";
import { AppConfig, validateEnvironment } from "./middleware/validateEnv";
import { createChatCompletions } from "./services/contentGenerator";
import { TokenCipher } from "./services/encryption";
import { ConsoleEventSink } from "./services/events";
import { InMemoryStore } from "./services/inMemoryStore";
import { configureWebhook, TelegramMessenger, TelegramPoller } from "./services/telegram";
import { WhoopApiClient } from "./services/whoop/client";
import { WhoopOAuthClient } from "./services/whoop/oauth";

async function openStore(config: AppConfig): Promise<Store> {
  if (config.storage.driver === "memory") {
    console.warn("[db] using in-memory storage");
    return new InMemoryStore();
  }

  const cipher = TokenCipher.fromBase64(config.storage.encryptionKey);
  const pool = createPool(config.storage.databaseUrl);
  await runMigrations(pool);
  return new PgStore(pool, cipher, () => pool.end());
}

async function main(): Promise<void> {
  const config = validateEnvironment();
  const store = await openStore(config);
  const bot = new Bot(config.telegram.token);
  const oauth = new WhoopOAuthClient({
    clientId: config.whoop.clientId,
    clientSecret: config.whoop.clientSecret,
    redirectUri: config.whoop.redirectUri,
  });

  const services = createServices(config, {
    store,
    messenger: new TelegramMessenger(bot.api),
    completions: createChatCompletions(config.genai.apiKey, config.genai.baseUrl),
    verifier: new OAuth2Client(),
    oauth,
    whoop: new WhoopApiClient(),
    events: new ConsoleEventSink(),
  });

  const app = createApp(services, {
    nodeEnv: config.nodeEnv,
    callbackBudgetMs: config.budgets.webhookMs,
  });

  const server: Server = app.listen(config.port, () => {
    console.log(`engagement-core listening on port ${config.port}`);
  });

  let poller: TelegramPoller | null = null;
  if (config.telegram.mode === "webhook") {
    await configureWebhook(bot.api, config.serviceUrl, config.telegram.webhookSecret);
  } else {
    poller = new TelegramPoller(bot, async (update) => {
      await services.triggers.processPolledUpdate(update);
    });
    await poller.start();
  }

  const tasks = config.scheduler.local
    ? scheduleLocalJobs(services.triggers, { timezone: config.scheduler.timezone })
    : [];

  let shuttingDown = false;
  const shutdown = async (signal: string) => {
    if (shuttingDown) return;
    shuttingDown = true;
    console.log(`${signal} received, shutting down`);

    tasks.forEach((task) => task.stop());
    await poller?.stop();
    await new Promise<void>((resolve) => server.close(() => resolve()));
    await store.close();
    process.exit(0);
  };

  for (const signal of ["SIGTERM", "SIGINT"] as const) {
    process.on(signal, () => {
      shutdown(signal).catch((err) => {
        console.error("Shutdown failed:", err);
        process.exit(1);
      });
    });
  }
}

main().catch((err) => {
  console.error("❌ Startup failed:", err);
  process.exit(1);
});
