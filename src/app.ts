// src/app.ts
import express, { Express, Request, Response } from "express";
import morgan from "morgan";
import type { Services } from "./container";
import { errorHandler } from "./middleware/errorHandler";
import { sendNotFound, sendSuccess } from "./middleware/responseHelper";
import { createScheduledRouter } from "./routes/scheduled";
import { createTelegramRouter } from "./routes/telegram";
import { createWhoopRouter } from "./routes/whoop";

export interface AppOptions {
  nodeEnv: string;
  /** Budget for the OAuth callback (code exchange and confirmation message) */
  callbackBudgetMs: number;
}

export function createApp(services: Services, options: AppOptions): Express {
  const app = express();

  // ======================================================================
  //                     CORE MIDDLEWARE (LOGGING, BODY)
  // ======================================================================

  if (options.nodeEnv !== "test") {
    app.use(morgan(options.nodeEnv === "production" ? "combined" : "dev"));
  }
  app.use(express.json({ limit: "1mb" }));

  // ======================================================================
  //                              HEALTH
  // ======================================================================

  const health = (_req: Request, res: Response) => {
    sendSuccess(res, { status: "ok", service: "engagement-core" });
  };
  app.get("/", health);
  app.get("/health", health);

  // ======================================================================
  //                              TRIGGERS
  // ======================================================================

  app.use(createScheduledRouter(services.triggers));
  app.use(createTelegramRouter(services.triggers));
  app.use(
    createWhoopRouter({
      linking: services.linking,
      dispatcher: services.dispatcher,
      budgetMs: options.callbackBudgetMs,
    })
  );

  app.use((req: Request, res: Response) => {
    sendNotFound(res, `Not Found: ${req.method} ${req.originalUrl}`);
  });

  app.use(errorHandler);

  return app;
}
