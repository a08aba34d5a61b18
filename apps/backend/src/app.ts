import express, { type Express } from "express";
import cors from "cors";
import type { AppConfig } from "./config";
import { createComparisonRouter } from "./routes/comparisons";
import { createSystemRouter } from "./routes/system";
import type { JobManager } from "./services/jobManager";

export function createApp(
  manager: JobManager,
  config: Pick<AppConfig, "corsOrigin" | "maxUploadBytes" | "submitRateLimit">,
): Express {
  const app = express();

  app.use(
    cors({
      origin: config.corsOrigin,
      credentials: true,
    }),
  );
  app.use(express.json());

  // Routes
  app.use("/api/system", createSystemRouter(manager));
  app.use(
    "/api/comparisons",
    createComparisonRouter(manager, {
      maxUploadBytes: config.maxUploadBytes,
      submitRateLimit: config.submitRateLimit,
    }),
  );

  // Health Checks
  app.get("/api/health", (_req, res) => {
    res.json({ ok: true, ts: Date.now() });
  });

  return app;
}
