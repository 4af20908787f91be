// src/routes/telegram.ts
// Telegram webhook. Anything past secret validation is answered 200 so Telegram does not redeliver.

import { Router } from "express";
import { asyncHandler } from "../middleware/asyncHandler";
import { sendTriggerResponse } from "../middleware/responseHelper";
import type { TriggerRouter } from "../services/triggerRouter";

export function createTelegramRouter(triggers: TriggerRouter): Router {
  const router = Router();

  router.post(
    "/webhook",
    asyncHandler(async (req, res) => {
      const result = await triggers.handleWebhook({
        secretToken: req.get("x-telegram-bot-api-secret-token"),
        body: req.body,
      });
      sendTriggerResponse(res, result);
    })
  );

  return router;
}
