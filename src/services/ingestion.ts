import crypto from "node:crypto";
import type {
  IngestionRunStatus,
  IngestResult,
  IngestSummary,
  MessageOutcome,
  RawMessage,
} from "../types/index.js";
import { classifyMessage } from "./classifier.js";
import { extractFields } from "./extractor.js";
import { minorToDecimal } from "./money.js";
import { normalizeMessage } from "./normalizer.js";
import { PersistenceError, type TransactionStore } from "./store.js";

/**
 * Idempotency key for messages without a reference: the normalized text plus
 * the occurrence time, so the same wording on another day is a new transaction.
 */
export function fingerprintMessage(normalized: string, occurredAt: string | null): string {
  return crypto
    .createHash("sha256")
    .update(`${normalized.toLowerCase()}|${occurredAt ?? ""}`)
    .digest("hex");
}

/** A store fault stopped the batch; `partial` covers the messages finished before it. */
export class BatchAbortedError extends Error {
  constructor(
    readonly cause: PersistenceError,
    readonly partial: IngestResult
  ) {
    super(cause.message);
    this.name = "BatchAbortedError";
  }
}

/**
 * Run one message through normalize → classify → extract → persist. Every
 * message ends in exactly one terminal state; only a PersistenceError from
 * the store escapes.
 */
export async function ingestMessage(
  message: RawMessage,
  index: number,
  store: TransactionStore
): Promise<MessageOutcome> {
  const rawMessageId = await store.recordRawMessage(message);

  const normalized = normalizeMessage(message.body);
  const category = classifyMessage(normalized);
  const textFingerprint = fingerprintMessage(normalized, null);

  if (category === "UNCLASSIFIED") {
    await store.recordUnprocessed({
      rawMessageId,
      rawText: message.body,
      reason: "unclassified",
      fingerprint: textFingerprint,
    });
    return { index, state: "UNCLASSIFIED", category, reason: "unclassified" };
  }

  const extraction = extractFields(normalized, category, message.receivedAt);
  if (!extraction.success) {
    await store.recordUnprocessed({
      rawMessageId,
      rawText: message.body,
      reason: extraction.missingField,
      fingerprint: textFingerprint,
    });
    return {
      index,
      state: "EXTRACTION_FAILED",
      category,
      reason: extraction.missingField,
    };
  }

  const { fields } = extraction;
  const outcome = await store.insertTransaction({
    ...fields,
    category,
    fingerprint: fingerprintMessage(normalized, fields.occurredAt),
    rawText: message.body,
    rawMessageId,
  });

  return {
    index,
    state: outcome === "inserted" ? "PERSISTED" : "DUPLICATE_SKIPPED",
    category,
    external_reference: fields.externalReference,
    amount: minorToDecimal(fields.amountMinor),
  };
}

export function summarize(outcomes: MessageOutcome[]): IngestSummary {
  let succeeded = 0;
  let skippedDuplicate = 0;
  let failed = 0;

  for (const outcome of outcomes) {
    switch (outcome.state) {
      case "PERSISTED":
        succeeded++;
        break;
      case "DUPLICATE_SKIPPED":
        skippedDuplicate++;
        break;
      case "UNCLASSIFIED":
      case "EXTRACTION_FAILED":
        failed++;
        break;
    }
  }

  const total = outcomes.length;
  const processed = succeeded + skippedDuplicate;

  return {
    total,
    succeeded,
    skipped_duplicate: skippedDuplicate,
    failed,
    processed,
    success_rate: total === 0 ? 0 : Math.round((processed / total) * 1000) / 10,
    newly_created: succeeded,
  };
}

/**
 * Ingest a batch sequentially. Per-message failures are recorded and counted;
 * a store fault aborts the batch with a BatchAbortedError.
 */
export async function ingestMessages(
  messages: RawMessage[],
  store: TransactionStore
): Promise<IngestResult> {
  const details: MessageOutcome[] = [];

  for (let i = 0; i < messages.length; i++) {
    try {
      details.push(await ingestMessage(messages[i], i, store));
    } catch (error) {
      if (error instanceof PersistenceError) {
        throw new BatchAbortedError(error, { summary: summarize(details), details });
      }
      throw error;
    }
  }

  return { summary: summarize(details), details };
}

export function runStatus(summary: IngestSummary): IngestionRunStatus {
  if (summary.total === 0) return "empty";
  if (summary.failed === 0) return "success";
  return summary.processed === 0 ? "failed" : "partial";
}
