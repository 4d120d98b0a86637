import { createClient, type SupabaseClient } from "@supabase/supabase-js";
import { z } from "zod";
import { env } from "../config/env.js";
import {
  CategoryTotalRowSchema,
  StoredTransactionRowSchema,
  StoredUnprocessedRowSchema,
  type PageQuery,
  type TransactionQuery,
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
import { decimalToMinor } from "./money.js";
import {
  PersistenceError,
  toTransactionRecord,
  toTransactionRow,
  toUnprocessedRecord,
  toUnprocessedRow,
  type TransactionStore,
} from "./store.js";

// Postgres unique_violation
const UNIQUE_VIOLATION = "23505";

interface PostgrestFailure {
  message: string;
  code?: string;
}

function fail(operation: string, error: PostgrestFailure): never {
  console.error(`[Store] ${operation} failed:`, error.message);
  throw new PersistenceError(`${operation} failed: ${error.message}`, error.code);
}

function parseRows<T>(operation: string, schema: z.ZodType<T>, data: unknown): T[] {
  const result = z.array(schema).safeParse(data ?? []);
  if (!result.success) {
    throw new PersistenceError(`${operation} returned unexpected rows: ${result.error.message}`);
  }
  return result.data;
}

// Characters that would break a PostgREST or() filter expression
function escapeSearchTerm(term: string): string {
  return term.replace(/[,()%*\\]/g, " ").trim();
}

/**
 * TransactionStore backed by the Supabase tables in supabase/migrations.
 * Uses the service role key, so row level security does not apply.
 */
export class SupabaseStore implements TransactionStore {
  constructor(private readonly client: SupabaseClient) {}

  async recordRawMessage(message: RawMessage): Promise<number> {
    const { data, error } = await this.client
      .from("raw_messages")
      .insert({
        body: message.body,
        received_at: message.receivedAt?.toISOString() ?? null,
        address: message.address,
      })
      .select("id")
      .single();

    if (error) fail("Recording raw message", error);
    const row = z.object({ id: z.number().int() }).safeParse(data);
    if (!row.success) throw new PersistenceError("Recording raw message returned no id");
    return row.data.id;
  }

  async insertTransaction(transaction: NewTransaction): Promise<InsertOutcome> {
    // The unique indexes on external_reference and fingerprint decide duplicates
    const { error } = await this.client
      .from("transactions")
      .insert(toTransactionRow(transaction));

    if (!error) return "inserted";
    if (error.code === UNIQUE_VIOLATION) return "duplicate";
    fail("Inserting transaction", error);
  }

  async recordUnprocessed(entry: NewUnprocessedEntry): Promise<void> {
    const { error } = await this.client
      .from("unprocessed_sms")
      .insert(toUnprocessedRow(entry));

    if (error && error.code !== UNIQUE_VIOLATION) fail("Recording unprocessed SMS", error);
  }

  async recordIngestionRun(run: IngestionRun): Promise<void> {
    const { error } = await this.client.from("ingestion_runs").insert({
      started_at: run.startedAt.toISOString(),
      completed_at: run.completedAt.toISOString(),
      duration_ms: run.durationMs,
      status: run.status,
      source: run.source,
      total_messages: run.summary.total,
      succeeded: run.summary.succeeded,
      skipped_duplicate: run.summary.skipped_duplicate,
      failed: run.summary.failed,
      error_message: run.errorMessage ?? null,
    });

    if (error) fail("Recording ingestion run", error);
  }

  async findTransactionByReference(reference: string): Promise<TransactionRecord | null> {
    const { data, error } = await this.client
      .from("transactions")
      .select("*")
      .eq("external_reference", reference.toUpperCase())
      .limit(1);

    if (error) fail("Fetching transaction", error);
    const [row] = parseRows("Fetching transaction", StoredTransactionRowSchema, data);
    return row ? toTransactionRecord(row) : null;
  }

  async listTransactions(query: TransactionQuery): Promise<Page<TransactionRecord>> {
    let request = this.client.from("transactions").select("*", { count: "exact" });

    if (query.category) request = request.eq("category", query.category);
    if (query.status) request = request.eq("status", query.status);
    if (query.start_date) request = request.gte("occurred_at", `${query.start_date} 00:00:00`);
    if (query.end_date) request = request.lte("occurred_at", `${query.end_date} 23:59:59`);
    if (query.min_amount !== undefined) {
      request = request.gte("amount_minor", decimalToMinor(query.min_amount));
    }
    if (query.max_amount !== undefined) {
      request = request.lte("amount_minor", decimalToMinor(query.max_amount));
    }
    if (query.q) {
      const term = escapeSearchTerm(query.q);
      if (term) {
        request = request.or(
          ["recipient", "external_reference", "description", "raw_message"]
            .map((column) => `${column}.ilike.%${term}%`)
            .join(",")
        );
      }
    }

    const { data, error, count } = await request
      .order("occurred_at", { ascending: false })
      .order("id", { ascending: false })
      .range(query.offset, query.offset + query.limit - 1);

    if (error) fail("Listing transactions", error);
    const rows = parseRows("Listing transactions", StoredTransactionRowSchema, data);
    return { rows: rows.map(toTransactionRecord), total: count ?? rows.length };
  }

  async listUnprocessed(query: PageQuery): Promise<Page<UnprocessedRecord>> {
    const { data, error, count } = await this.client
      .from("unprocessed_sms")
      .select("*", { count: "exact" })
      .order("id", { ascending: false })
      .range(query.offset, query.offset + query.limit - 1);

    if (error) fail("Listing unprocessed SMS", error);
    const rows = parseRows("Listing unprocessed SMS", StoredUnprocessedRowSchema, data);
    return { rows: rows.map(toUnprocessedRecord), total: count ?? rows.length };
  }

  async countTransactions(): Promise<number> {
    return this.count("transactions");
  }

  async countUnprocessed(): Promise<number> {
    return this.count("unprocessed_sms");
  }

  async getCategoryTotals(): Promise<CategoryTotal[]> {
    const { data, error } = await this.client
      .from("transaction_category_totals")
      .select("category, transaction_count, amount_minor");

    if (error) fail("Loading category totals", error);
    return parseRows("Loading category totals", CategoryTotalRowSchema, data).map((row) => ({
      category: row.category,
      count: row.transaction_count,
      amountMinor: row.amount_minor,
    }));
  }

  private async count(table: string): Promise<number> {
    const { count, error } = await this.client
      .from(table)
      .select("id", { count: "exact", head: true });

    if (error) fail(`Counting ${table}`, error);
    return count ?? 0;
  }
}

// Create Supabase client with service role key (bypasses RLS)
export const supabase = createClient(env.supabaseUrl, env.supabaseServiceRoleKey, {
  auth: { persistSession: false },
});

export const store: TransactionStore = new SupabaseStore(supabase);
