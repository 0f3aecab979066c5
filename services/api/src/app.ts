import fs from "node:fs/promises";
import path from "node:path";
import express, { type NextFunction, type Request, type Response } from "express";
import multer from "multer";
import { z, ZodError } from "zod";
import { COMPARE_ID_RE, runComparison } from "./lib/compare";
import { loadConfig } from "./lib/config";
import { AppError } from "./lib/errors";
import { CONTENT_TYPES, EXPORT_FORMATS, exportFileName, renderExport } from "./lib/export";
import type { UploadedDocument } from "./lib/extract";
import { createLogger } from "./lib/logger";
import { exportJobId, type ExportJobData, type ExportQueue } from "./lib/queue";
import { ensureArtifacts, fileExists, readComparison, writeExportState } from "./lib/storage";
import type { ExportJobState } from "./lib/types";

const log = createLogger("http");

const compareParams = z.object({
  compareId: z.string().regex(COMPARE_ID_RE, "expected cmp_<32 hex>")
});

const exportParams = compareParams.extend({
  format: z.enum(EXPORT_FORMATS)
});

export type AppDeps = {
  exportQueue: ExportQueue;
};

type UploadField = "oldFile" | "newFile";

function uploadedFile(req: Request, field: UploadField): UploadedDocument | null {
  const files = req.files;
  if (!files || Array.isArray(files)) return null;
  const f = files[field]?.[0];
  if (!f) return null;
  return { buffer: f.buffer, fileName: f.originalname, mimeType: f.mimetype };
}

export function createApp(deps: AppDeps): express.Express {
  const config = loadConfig();
  const app = express();
  const upload = multer({
    storage: multer.memoryStorage(),
    limits: { fileSize: config.maxUploadMb * 1024 * 1024 }
  });

  // CORS
  app.use((req, res, next) => {
    res.header("Access-Control-Allow-Origin", "*");
    res.header("Access-Control-Allow-Headers", "*");
    res.header("Access-Control-Allow-Methods", "GET,POST,OPTIONS");
    if (req.method === "OPTIONS") {
      res.sendStatus(204);
      return;
    }
    next();
  });

  app.use(express.json({ limit: "2mb" }));
  app.use(express.static(path.join(__dirname, "../public")));

  app.get("/health", (_req, res) => {
    res.json({ status: "ok" });
  });

  app.post(
    "/api/compare",
    upload.fields([
      { name: "oldFile", maxCount: 1 },
      { name: "newFile", maxCount: 1 }
    ]),
    async (req, res, next) => {
      try {
        const oldDoc = uploadedFile(req, "oldFile");
        const newDoc = uploadedFile(req, "newFile");
        if (!oldDoc || !newDoc) {
          res.status(400).json({ error: "missing files: oldFile and newFile are both required" });
          return;
        }
        const comparison = await runComparison({ oldDoc, newDoc });
        res.json({
          compareId: comparison.compareId,
          summary: comparison.summary,
          units: { old: comparison.document.old.units, new: comparison.document.new.units },
          records: comparison.records,
          artifacts: comparison.artifacts
        });
      } catch (e) {
        next(e);
      }
    }
  );

  app.get("/api/compare/:compareId", async (req, res, next) => {
    try {
      const { compareId } = compareParams.parse(req.params);
      const artifacts = await ensureArtifacts(compareId);
      res.json(await readComparison(artifacts));
    } catch (e) {
      next(e);
    }
  });

  app.get("/api/compare/:compareId/report", async (req, res, next) => {
    try {
      const { compareId } = compareParams.parse(req.params);
      const artifacts = await ensureArtifacts(compareId);
      if (!(await fileExists(artifacts.reportPath))) {
        res.status(404).json({ error: "not found" });
        return;
      }
      res.type("text/html").send(await fs.readFile(artifacts.reportPath, "utf8"));
    } catch (e) {
      next(e);
    }
  });

  app.get("/api/compare/:compareId/export/:format", async (req, res, next) => {
    try {
      const { compareId, format } = exportParams.parse(req.params);
      const artifacts = await ensureArtifacts(compareId);
      const comparison = await readComparison(artifacts);
      const built = artifacts.exportPaths[format];
      const body =
        comparison.exports[format].status === "done" && (await fileExists(built))
          ? await fs.readFile(built)
          : (await renderExport(format, comparison)).buffer;
      res
        .status(200)
        .attachment(exportFileName(format))
        .type(CONTENT_TYPES[format])
        .send(body);
    } catch (e) {
      next(e);
    }
  });

  app.post("/api/compare/:compareId/export/:format", async (req, res, next) => {
    try {
      const { compareId, format } = exportParams.parse(req.params);
      const artifacts = await ensureArtifacts(compareId);
      const comparison = await readComparison(artifacts);
      const state = comparison.exports[format];
      if (state.status === "pending" || state.status === "running") {
        res.status(202).json({ compareId, format, ...state });
        return;
      }

      // Pending is recorded before the job exists.
      const data: ExportJobData = { compareId, format };
      const pending: ExportJobState = { status: "pending", jobId: exportJobId(data), error: null };
      await writeExportState(artifacts, format, pending);
      try {
        await deps.exportQueue.enqueue(data);
      } catch (e) {
        const error = e instanceof Error ? e.message : String(e);
        await writeExportState(artifacts, format, { status: "failed", jobId: null, error });
        throw e;
      }
      log.info({ compareId, format, jobId: pending.jobId }, "export queued");
      res.status(202).json({ compareId, format, ...pending });
    } catch (e) {
      next(e);
    }
  });

  app.use("/api", (_req, res) => {
    res.status(404).json({ error: "not found" });
  });

  app.use((err: unknown, req: Request, res: Response, _next: NextFunction) => {
    if (err instanceof ZodError) {
      res.status(400).json({ error: "invalid request", issues: err.issues });
      return;
    }
    if (err instanceof multer.MulterError) {
      res.status(err.code === "LIMIT_FILE_SIZE" ? 413 : 400).json({ error: err.message });
      return;
    }
    if (err instanceof AppError) {
      if (err.status >= 500) log.error({ err, path: req.path }, "request failed");
      else log.warn({ err: err.message, path: req.path }, "request rejected");
      res.status(err.status).json({ error: err.message });
      return;
    }
    log.error({ err, path: req.path }, "request failed");
    res.status(500).json({ error: err instanceof Error ? err.message : String(err) });
  });

  return app;
}
