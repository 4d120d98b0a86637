import type { TransactionCategory, TransactionStatus } from "../schemas/transaction.js";

export type ClassifiedCategory = Exclude<TransactionCategory, "UNCLASSIFIED">;

/** An SMS exactly as received. `receivedAt` is null when the source carried no usable timestamp. */
export interface RawMessage {
  body: string;
  receivedAt: Date | null;
  address: string | null;
}

export interface ExtractedFields {
  amountMinor: number;
  feeMinor: number;
  counterparty: string | null;
  externalReference: string | null;
  occurredAt: string;
  status: TransactionStatus;
}

export type MissingField = "amount" | "date";

export type ExtractionResult =
  | { success: true; fields: ExtractedFields }
  | { success: false; missingField: MissingField };

/** What the coordinator hands to the store for a classified, extracted message. */
export interface NewTransaction extends ExtractedFields {
  category: ClassifiedCategory;
  fingerprint: string;
  rawText: string;
  rawMessageId: number;
}

export interface NewUnprocessedEntry {
  rawMessageId: number;
  rawText: string;
  reason: string;
  /** Normalized-text hash; one log entry per fingerprint and reason. */
  fingerprint: string;
}

export type InsertOutcome = "inserted" | "duplicate";

export type TerminalState =
  | "PERSISTED"
  | "DUPLICATE_SKIPPED"
  | "UNCLASSIFIED"
  | "EXTRACTION_FAILED";

export interface MessageOutcome {
  index: number;
  state: TerminalState;
  category: TransactionCategory;
  reason?: string;
  external_reference?: string | null;
  amount?: number;
}

export interface IngestSummary {
  total: number;
  succeeded: number;
  skipped_duplicate: number;
  failed: number;
  processed: number;
  success_rate: number;
  newly_created: number;
}

export interface IngestResult {
  summary: IngestSummary;
  details: MessageOutcome[];
}

export interface IngestResponse extends IngestSummary {
  success: boolean;
  details?: MessageOutcome[];
}

/** Tabular record read by query and report code. */
export interface TransactionRecord {
  id: number;
  external_reference: string | null;
  category: ClassifiedCategory;
  amount: number;
  fee: number;
  recipient: string | null;
  receiver: string | null;
  occurred_at: string;
  status: TransactionStatus;
  description: string | null;
  raw_message: string;
  raw_body: string;
  created_at: string;
}

export interface UnprocessedRecord {
  id: number;
  raw_message: string;
  raw_body: string;
  reason: string;
  created_at: string;
}

export interface Page<T> {
  rows: T[];
  total: number;
}

export interface CategoryTotal {
  category: ClassifiedCategory;
  count: number;
  amountMinor: number;
}

export type IngestionRunStatus = "success" | "partial" | "failed" | "empty";

export interface IngestionRun {
  startedAt: Date;
  completedAt: Date;
  durationMs: number;
  status: IngestionRunStatus;
  source: "json" | "xml";
  summary: IngestSummary;
  errorMessage?: string;
}
