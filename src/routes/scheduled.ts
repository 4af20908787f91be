// src/routes/scheduled.ts
// Cloud Scheduler targets. Each call carries a Google-signed OIDC identity token.

import { Request, Router } from "express";
import { asyncHandler } from "../middleware/asyncHandler";
import { sendTriggerResponse } from "../middleware/responseHelper";
import type { ScheduledJob, ScheduledRequest, TriggerRouter } from "../services/triggerRouter";

function scheduledRequest(req: Request): ScheduledRequest {
  return {
    authorization: req.get("authorization"),
    jobName: req.get("x-cloudscheduler-jobname"),
    scheduleTime: req.get("x-cloudscheduler-scheduletime"),
  };
}

export function createScheduledRouter(triggers: TriggerRouter): Router {
  const router = Router();

  const handle = (job: ScheduledJob) =>
    asyncHandler(async (req, res) => {
      const result = await triggers.handleScheduled(job, scheduledRequest(req));
      sendTriggerResponse(res, result);
    });

  router.get("/morning_motivation", handle("morning_motivation"));
  router.post("/scheduled/check-in", handle("check_in"));
  router.post("/scheduled/update-health-data", handle("update_health_data"));

  return router;
}
