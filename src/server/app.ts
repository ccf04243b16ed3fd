import express, { type Express, type Response } from "express";
import {
  ConversionError,
  convertMsgBuffer,
  describeError,
  inspectMsg,
  kilobytes,
  type Logger,
  pdfFileName,
  type RenderingEngine,
  runBatch,
} from "./msg-to-pdf/index.js";
import { type AppConfig, loadConfig } from "./config.js";
import { resolveUnderRoot } from "./paths.js";

export interface AppOptions {
  config?: AppConfig;
  logger?: Logger;
  /** Rendering engine override, mainly for tests */
  engine?: RenderingEngine;
}

function uploadedBytes(body: unknown): Uint8Array | undefined {
  return Buffer.isBuffer(body) && body.length > 0 ? body : undefined;
}

function queryString(value: unknown): string | undefined {
  return typeof value === "string" && value.length > 0 ? value : undefined;
}

function queryFlag(value: unknown, fallback: boolean): boolean {
  if (value === "false" || value === "0") return false;
  if (value === "true" || value === "1") return true;
  return fallback;
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

/** Quotes are not allowed inside the filename parameter, nor is non-ASCII */
function safeFileName(name: string): string {
  return name.replace(/[^\x20-\x7e]|["\\]/g, "_");
}

export function statusFor(error: unknown): number {
  if (error instanceof RangeError) return 400;
  if (!(error instanceof ConversionError)) return 500;
  switch (error.kind) {
    case "MalformedContainer":
    case "AttachmentTooDeep":
      return 422;
    case "IoFailed":
      return 400;
    default:
      return 500;
  }
}

function sendFailure(res: Response, logger: Logger, prefix: string, error: unknown, startTime: number): void {
  const elapsed = Date.now() - startTime;
  const status = statusFor(error);
  logger.error(`${prefix} Failed after ${elapsed}ms:`, error instanceof Error ? error.stack : error);
  res.status(status).json({
    error: status === 500 ? "Failed to convert file" : "Invalid input",
    kind: error instanceof ConversionError ? error.kind : undefined,
    details: describeError(error),
  });
}

export function createApp(options: AppOptions = {}): Express {
  const config = options.config ?? loadConfig(process.env);
  const logger = options.logger ?? console;
  const app = express();
  const rawUpload = express.raw({ type: "*/*", limit: `${config.maxUploadMb}mb` });

  // Health check
  app.get("/api/health", (_req, res) => {
    res.json({ status: "ok" });
  });

  // Convert a single MSG file, returned as PDF
  app.post("/api/convert", rawUpload, async (req, res) => {
    const startTime = Date.now();
    const bytes = uploadedBytes(req.body);
    if (!bytes) {
      logger.warn(`[convert] Bad request: empty body`);
      res.status(400).json({ error: "No file provided" });
      return;
    }

    const sourceName = queryString(req.query.name) ?? "message.msg";
    logger.log(`[convert] Received ${sourceName} (${kilobytes(bytes.length)})`);

    try {
      const pdf = await convertMsgBuffer(bytes, sourceName, {
        mergeAttachments: queryFlag(req.query.merge, config.mergeAttachments),
        showSourceBanner: queryFlag(req.query.banner, config.showSourceBanner),
        engine: options.engine,
      });

      for (const warning of pdf.warnings) {
        logger.warn(`[convert] ${warning.fileName}: ${warning.message}`);
      }
      const elapsed = Date.now() - startTime;
      logger.log(`[convert] Success in ${elapsed}ms (${pdf.pageCount} pages, output ${kilobytes(pdf.bytes.length)})`);

      res.setHeader("Content-Type", "application/pdf");
      res.setHeader("Content-Disposition", `attachment; filename="${safeFileName(pdfFileName(sourceName))}"`);
      res.send(Buffer.from(pdf.bytes));
    } catch (error) {
      sendFailure(res, logger, "[convert]", error, startTime);
    }
  });

  // Describe a single MSG file without converting it
  app.post("/api/inspect", rawUpload, (req, res) => {
    const startTime = Date.now();
    const bytes = uploadedBytes(req.body);
    if (!bytes) {
      logger.warn(`[inspect] Bad request: empty body`);
      res.status(400).json({ error: "No file provided" });
      return;
    }

    try {
      const report = inspectMsg(bytes);
      logger.log(`[inspect] ${report.attachments.length} attachment(s) in ${Date.now() - startTime}ms`);
      res.json(report);
    } catch (error) {
      sendFailure(res, logger, "[inspect]", error, startTime);
    }
  });

  // Convert a file or directory below the configured batch root
  app.post("/api/batch", express.json(), async (req, res) => {
    const startTime = Date.now();
    const batchRoot = config.batchRoot;
    if (!batchRoot) {
      logger.warn(`[batch] Rejected: no batch root configured`);
      res.status(403).json({ error: "Batch conversion is disabled" });
      return;
    }

    const body: unknown = req.body;
    if (!isRecord(body) || typeof body.inputPath !== "string" || typeof body.outputDirectory !== "string") {
      logger.warn(`[batch] Bad request: inputPath and outputDirectory are required`);
      res.status(400).json({ error: "inputPath and outputDirectory are required" });
      return;
    }

    try {
      const inputPath = await resolveUnderRoot(batchRoot, body.inputPath);
      const outputDirectory = await resolveUnderRoot(batchRoot, body.outputDirectory);
      if (!inputPath || !outputDirectory) {
        logger.warn(`[batch] Bad request: path outside ${batchRoot}`);
        res.status(400).json({ error: "inputPath and outputDirectory must stay inside the batch root" });
        return;
      }

      const report = await runBatch({
        inputPath,
        outputDirectory,
        recursive: body.recursive === true,
        workerCount: typeof body.workers === "number" ? body.workers : config.workerCount,
        mergeAttachments: typeof body.mergeAttachments === "boolean" ? body.mergeAttachments : config.mergeAttachments,
        showSourceBanner: typeof body.showSourceBanner === "boolean" ? body.showSourceBanner : config.showSourceBanner,
        engine: options.engine,
        logger,
      });
      res.json(report);
    } catch (error) {
      sendFailure(res, logger, "[batch]", error, startTime);
    }
  });

  return app;
}
