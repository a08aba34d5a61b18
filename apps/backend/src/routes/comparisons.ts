import { Router, type ErrorRequestHandler, type Request, type RequestHandler, type Response } from "express";
import multer from "multer";
import { HppdError, describeError, type HppdErrorCode } from "../errors";
import type { JobManager } from "../services/jobManager";

const XLSX_MIME = "application/vnd.openxmlformats-officedocument.spreadsheetml.sheet";

const RATE_LIMIT_WINDOW = 60 * 1000; // 1 min

const STATUS_BY_CODE: Record<HppdErrorCode, number> = {
  INVALID_SUBMISSION: 400,
  INVALID_ARCHIVE: 400,
  MALFORMED_SHEET: 400,
  NOT_FOUND: 404,
  NOT_READY: 409,
  DUPLICATE_JOB_ID: 409,
  NO_USABLE_DATA: 422,
  INTERNAL_FAILURE: 500,
};

export interface ComparisonRouteOptions {
  maxUploadBytes: number;
  submitRateLimit: number;
}

// Simple in-memory rate limit per client address
export function createRateLimiter(maxRequests: number, windowMs = RATE_LIMIT_WINDOW): RequestHandler {
  const requestCounts = new Map<string, { count: number; resetAt: number }>();

  return (req, res, next) => {
    const ip = req.ip ?? "unknown";
    const now = Date.now();
    const record = requestCounts.get(ip);

    if (!record || now > record.resetAt) {
      requestCounts.set(ip, { count: 1, resetAt: now + windowMs });
      return next();
    }

    if (record.count >= maxRequests) {
      return res.status(429).json({
        ok: false,
        code: "RATE_LIMIT_EXCEEDED",
        message: "Too many requests, please try again later.",
      });
    }

    record.count++;
    next();
  };
}

export function sendError(res: Response, err: unknown): void {
  if (err instanceof HppdError) {
    const status = STATUS_BY_CODE[err.code];
    if (status >= 500) console.error(`[Server] ${err.code}: ${err.message}`);
    res.status(status).json({ ok: false, code: err.code, message: err.message });
    return;
  }
  console.error(`[Server] Unhandled error: ${describeError(err)}`);
  res.status(500).json({ ok: false, code: "INTERNAL_ERROR", message: "Internal error" });
}

function uploadedFile(req: Request, field: string): Buffer | undefined {
  const files = req.files;
  if (!files || Array.isArray(files)) return undefined;
  return files[field]?.[0]?.buffer;
}

function bodyField(req: Request, field: string): string | undefined {
  const body: unknown = req.body;
  if (typeof body !== "object" || body === null) return undefined;
  const value: unknown = Reflect.get(body, field);
  return typeof value === "string" ? value : undefined;
}

export function createComparisonRouter(manager: JobManager, options: ComparisonRouteOptions): Router {
  const router = Router();

  const upload = multer({
    storage: multer.memoryStorage(),
    limits: { fileSize: options.maxUploadBytes, files: 2 },
  });

  router.post(
    "/",
    createRateLimiter(options.submitRateLimit),
    upload.fields([
      { name: "templates", maxCount: 1 },
      { name: "reports", maxCount: 1 },
    ]),
    async (req, res) => {
      try {
        const job = await manager.submit({
          jobId: bodyField(req, "jobId"),
          targetDate: bodyField(req, "date"),
          templateArchive: uploadedFile(req, "templates"),
          actualArchive: uploadedFile(req, "reports"),
        });
        res.status(202).json({ ok: true, job });
      } catch (err) {
        sendError(res, err);
      }
    },
  );

  router.get("/:jobId/progress", async (req, res) => {
    try {
      const progress = await manager.getProgress(req.params.jobId);
      res.set("Cache-Control", "no-store");
      res.json({ ok: true, ...progress });
    } catch (err) {
      sendError(res, err);
    }
  });

  router.get("/:jobId/download", async (req, res) => {
    try {
      const artifact = await manager.fetchArtifact(req.params.jobId);
      res.attachment(artifact.fileName);
      res.type(XLSX_MIME);
      res.send(artifact.data);
    } catch (err) {
      sendError(res, err);
    }
  });

  router.delete("/:jobId", async (req, res) => {
    try {
      await manager.discard(req.params.jobId);
      res.status(204).end();
    } catch (err) {
      sendError(res, err);
    }
  });

  // Error handling for Multer
  const uploadErrors: ErrorRequestHandler = (err, _req, res, next) => {
    if (err instanceof multer.MulterError) {
      if (err.code === "LIMIT_FILE_SIZE") {
        const maxMb = Math.round(options.maxUploadBytes / (1024 * 1024));
        return res.status(413).json({ ok: false, code: "FILE_TOO_LARGE", message: `File too large (Max ${maxMb}MB)` });
      }
      return res.status(400).json({ ok: false, code: "INVALID_SUBMISSION", message: err.message });
    }
    next(err);
  };
  router.use(uploadErrors);

  return router;
}
