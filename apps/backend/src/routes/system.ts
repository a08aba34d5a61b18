import { Router } from "express";
import type { JobManager } from "../services/jobManager";
import { sendError } from "./comparisons";

export function createSystemRouter(manager: JobManager): Router {
  const router = Router();

  router.get("/health", async (_req, res) => {
    try {
      const stats = await manager.stats();
      res.json({
        status: "ok",
        version: "0.1.0",
        jobs: stats,
        time: new Date().toISOString(),
      });
    } catch (err) {
      sendError(res, err);
    }
  });

  return router;
}
