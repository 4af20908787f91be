// src/routes/whoop.ts
// OAuth redirect target for /linkwhoop

import { Router } from "express";
import { z } from "zod";
import { asyncHandler } from "../middleware/asyncHandler";
import { sendError } from "../middleware/responseHelper";
import type { AccountLinking } from "../services/accountLinking";
import { Deadline } from "../services/deadline";
import type { Dispatcher } from "../services/dispatcher";
import { TEXTS } from "../services/templates";

const callbackQuerySchema = z.object({
  code: z.string().min(1),
  state: z.string().min(1),
});

export interface WhoopRouterDeps {
  linking: AccountLinking;
  dispatcher: Pick<Dispatcher, "dispatch">;
  budgetMs: number;
}

export function createWhoopRouter({ linking, dispatcher, budgetMs }: WhoopRouterDeps): Router {
  const router = Router();

  router.get(
    "/whoop/callback",
    asyncHandler(async (req, res) => {
      const parsed = callbackQuerySchema.safeParse(req.query);
      if (!parsed.success) {
        const denied = typeof req.query.error === "string" ? req.query.error : undefined;
        return sendError(res, denied ? `WHOOP authorization failed: ${denied}` : "Missing code or state", 400);
      }

      const deadline = new Deadline(budgetMs);
      try {
        const { code, state } = parsed.data;
        const { userId } = await linking.completeLink(code, state, deadline);

        try {
          await dispatcher.dispatch(`whoop-link:${state}`, userId, TEXTS.linkSuccess, deadline);
        } catch (err) {
          // the link itself succeeded
          console.warn(`[whoop] linked ${userId} but could not notify:`, err instanceof Error ? err.message : err);
        }

        res
          .status(200)
          .type("text/plain")
          .send("WHOOP connected. You can close this window and return to Telegram.");
      } finally {
        deadline.release();
      }
    })
  );

  return router;
}
