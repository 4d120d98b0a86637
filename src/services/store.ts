import type {
  StoredTransactionRow,
  StoredUnprocessedRow,
  TransactionQuery,
  PageQuery,
} from "../schemas/transaction.js";
import type {
  CategoryTotal,
  IngestionRun,
  InsertOutcome,
  NewTransaction,
  NewUnprocessedEntry,
  Page,
  RawMessage,
  TransactionRecord,
  UnprocessedRecord,
} from "../types/index.js";
import { categoryLabel } from "./classifier.js";
import { formatMinor, minorToDecimal } from "./money.js";

/**
 * Raised when the store itself is unreachable or rejects a write for any
 * reason other than a uniqueness conflict. Fatal to the running batch.
 */
export class PersistenceError extends Error {
  constructor(
    message: string,
    readonly code?: string
  ) {
    super(message);
    this.name = "PersistenceError";
  }
}

/**
 * Everything the ingestion pipeline and the query routes need from storage.
 * `insertTransaction` must rely on the store's own unique constraints and
 * report a conflict as "duplicate".
 */
export interface TransactionStore {
  recordRawMessage(message: RawMessage): Promise<number>;
  insertTransaction(transaction: NewTransaction): Promise<InsertOutcome>;
  /** A repeat of an already logged fingerprint and reason is ignored. */
  recordUnprocessed(entry: NewUnprocessedEntry): Promise<void>;
  recordIngestionRun(run: IngestionRun): Promise<void>;

  findTransactionByReference(reference: string): Promise<TransactionRecord | null>;
  listTransactions(query: TransactionQuery): Promise<Page<TransactionRecord>>;
  listUnprocessed(query: PageQuery): Promise<Page<UnprocessedRecord>>;
  countTransactions(): Promise<number>;
  countUnprocessed(): Promise<number>;
  getCategoryTotals(): Promise<CategoryTotal[]>;
}

// ─── Row mapping ────────────────────────────────────────────────────────────
// Columns that exist twice for older readers (recipient/receiver,
// raw_message/raw_body) are written here and nowhere else.

export type TransactionInsertRow = Omit<StoredTransactionRow, "id" | "created_at">;

export type UnprocessedInsertRow = Omit<StoredUnprocessedRow, "id" | "created_at">;

export function describeTransaction(transaction: NewTransaction): string {
  return `${categoryLabel(transaction.category)} - ${formatMinor(transaction.amountMinor)} RWF`;
}

export function toTransactionRow(transaction: NewTransaction): TransactionInsertRow {
  return {
    external_reference: transaction.externalReference,
    fingerprint: transaction.fingerprint,
    category: transaction.category,
    amount_minor: transaction.amountMinor,
    fee_minor: transaction.feeMinor,
    recipient: transaction.counterparty,
    receiver: transaction.counterparty,
    occurred_at: transaction.occurredAt,
    status: transaction.status,
    description: describeTransaction(transaction),
    raw_message: transaction.rawText,
    raw_body: transaction.rawText,
    raw_message_id: transaction.rawMessageId,
  };
}

export function toUnprocessedRow(entry: NewUnprocessedEntry): UnprocessedInsertRow {
  return {
    raw_message_id: entry.rawMessageId,
    raw_message: entry.rawText,
    raw_body: entry.rawText,
    reason: entry.reason,
    fingerprint: entry.fingerprint,
  };
}

export function toTransactionRecord(row: StoredTransactionRow): TransactionRecord {
  return {
    id: row.id,
    external_reference: row.external_reference,
    category: row.category,
    amount: minorToDecimal(row.amount_minor),
    fee: minorToDecimal(row.fee_minor),
    recipient: row.recipient,
    receiver: row.receiver,
    occurred_at: row.occurred_at,
    status: row.status,
    description: row.description,
    raw_message: row.raw_message,
    raw_body: row.raw_body,
    created_at: row.created_at,
  };
}

export function toUnprocessedRecord(row: StoredUnprocessedRow): UnprocessedRecord {
  return {
    id: row.id,
    raw_message: row.raw_message,
    raw_body: row.raw_body,
    reason: row.reason,
    created_at: row.created_at,
  };
}
