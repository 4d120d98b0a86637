import { Router, type Request, type Response } from "express";
import multer from "multer";
import { env } from "../config/env.js";
import { IngestRequestSchema } from "../schemas/transaction.js";
import { BatchAbortedError, ingestMessages, runStatus } from "../services/ingestion.js";
import { parseSmsBackup, SmsBackupFormatError } from "../services/smsBackup.js";
import { store } from "../services/supabase.js";
import type { IngestResponse, IngestSummary, RawMessage } from "../types/index.js";

const router = Router();

// Uploads are kept in memory; a backup is one bounded batch
const upload = multer({
  storage: multer.memoryStorage(),
  limits: { fileSize: env.maxUploadBytes },
  fileFilter: (_req, file, cb) => {
    if (file.originalname.toLowerCase().endsWith(".xml")) {
      cb(null, true);
    } else {
      cb(new SmsBackupFormatError("Only XML files are allowed"));
    }
  },
});

const EMPTY_SUMMARY: IngestSummary = {
  total: 0,
  succeeded: 0,
  skipped_duplicate: 0,
  failed: 0,
  processed: 0,
  success_rate: 0,
  newly_created: 0,
};

/**
 * Shared tail of both ingestion endpoints: run the batch, answer with the
 * summary (or 503 on a store fault), then record the run.
 */
async function ingestAndRespond(
  messages: RawMessage[],
  source: "json" | "xml",
  res: Response
): Promise<void> {
  const tag = source === "xml" ? "[Upload]" : "[Ingest]";
  const startTime = Date.now();
  console.log(`${tag} ${messages.length} messages`);

  let summary: IngestSummary = EMPTY_SUMMARY;
  let errorMessage: string | undefined;

  try {
    const result = await ingestMessages(messages, store);
    summary = result.summary;

    const response: IngestResponse = {
      success: true,
      ...summary,
      details: result.details,
    };
    res.json(response);
  } catch (error) {
    errorMessage = error instanceof Error ? error.message : String(error);
    if (error instanceof BatchAbortedError) {
      // Messages finished before the outage stay written and are counted in the run
      summary = error.partial.summary;
      console.error(`${tag} Batch aborted, store unavailable:`, error.message);
      res.status(503).json({
        success: false,
        error: "Storage unavailable, batch aborted",
        details: error.message,
        completed: summary,
      });
    } else {
      console.error(`${tag} Batch aborted:`, error);
      res.status(500).json({
        success: false,
        error: "Ingestion failed",
        message: env.isDev ? errorMessage : undefined,
      });
    }
  }

  const completedAt = new Date();
  const duration = completedAt.getTime() - startTime;
  console.log(
    `${tag} Completed in ${duration}ms - created: ${summary.succeeded}, duplicates: ${summary.skipped_duplicate}, failed: ${summary.failed}`
  );

  // Recorded after the response is sent; a failure here never changes the answer
  await store
    .recordIngestionRun({
      startedAt: new Date(startTime),
      completedAt,
      durationMs: duration,
      status: errorMessage ? "failed" : runStatus(summary),
      source,
      summary,
      errorMessage,
    })
    .catch((err: unknown) => {
      console.error(`${tag} Failed to record ingestion run:`, err);
    });
}

function toReceivedAt(value: number | string | null | undefined): Date | null {
  if (value === null || value === undefined) return null;
  const date = new Date(value);
  return Number.isNaN(date.getTime()) ? null : date;
}

/**
 * POST /api/sms/ingest
 *
 * Receives raw SMS bodies as JSON and runs them through the pipeline.
 */
router.post("/ingest", async (req: Request, res: Response) => {
  const parseResult = IngestRequestSchema.safeParse(req.body);
  if (!parseResult.success) {
    res.status(400).json({
      success: false,
      error: "Invalid request body",
      details: parseResult.error.errors,
    });
    return;
  }

  const messages: RawMessage[] = parseResult.data.messages.map((m) => ({
    body: m.body,
    receivedAt: toReceivedAt(m.received_at),
    address: m.address ?? null,
  }));

  await ingestAndRespond(messages, "json", res);
});

/**
 * POST /api/sms/upload
 *
 * Accepts an SMS backup XML file (multipart field "file").
 */
router.post("/upload", upload.single("file"), async (req: Request, res: Response) => {
  if (!req.file) {
    res.status(400).json({ success: false, error: "No file uploaded (field \"file\")" });
    return;
  }

  let messages: RawMessage[];
  try {
    messages = parseSmsBackup(req.file.buffer.toString("utf8"));
  } catch (error) {
    if (error instanceof SmsBackupFormatError) {
      res.status(400).json({ success: false, error: error.message });
    } else {
      console.error("[Upload] Could not read backup:", error);
      res.status(500).json({ success: false, error: "Could not read uploaded file" });
    }
    return;
  }

  console.log(`[Upload] ${req.file.originalname}: ${messages.length} <sms> elements`);
  await ingestAndRespond(messages, "xml", res);
});

/**
 * GET /api/sms/health
 *
 * Health check endpoint, including store connectivity
 */
router.get("/health", async (_req: Request, res: Response) => {
  try {
    const transactionCount = await store.countTransactions();
    res.json({
      status: "healthy",
      database: "connected",
      transaction_count: transactionCount,
      timestamp: new Date().toISOString(),
    });
  } catch (error) {
    const message = error instanceof Error ? error.message : String(error);
    console.error("[Health] Store check failed:", message);
    res.status(503).json({
      status: "unhealthy",
      database: "unreachable",
      error: message,
      timestamp: new Date().toISOString(),
    });
  }
});

export default router;
