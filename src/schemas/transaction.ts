import { z } from "zod";

export const TransactionCategorySchema = z.enum([
  "INCOMING_MONEY",
  "PAYMENT",
  "TRANSFER",
  "WITHDRAWAL",
  "AIRTIME",
  "BUNDLE",
  "BANK_DEPOSIT",
  "CASH_POWER",
  "THIRD_PARTY",
  "UNCLASSIFIED",
]);

export type TransactionCategory = z.infer<typeof TransactionCategorySchema>;

export const TransactionStatusSchema = z.enum(["completed", "failed"]);

export type TransactionStatus = z.infer<typeof TransactionStatusSchema>;

// Epoch milliseconds (as sent by SMS backup apps) or an ISO datetime
const ReceivedAtSchema = z
  .union([z.number().int().nonnegative(), z.string().datetime({ offset: true })])
  .nullable()
  .optional();

// Schema for incoming SMS ingest request
export const IngestRequestSchema = z.object({
  messages: z.array(
    z.object({
      body: z.string(),
      received_at: ReceivedAtSchema,
      address: z.string().nullable().optional(),
    })
  ),
});

export type IngestRequestBody = z.infer<typeof IngestRequestSchema>;

const DateParamSchema = z
  .string()
  .regex(/^\d{4}-\d{2}-\d{2}$/, "Expected YYYY-MM-DD");

const AmountParamSchema = z.coerce.number().nonnegative();

export const PageQuerySchema = z.object({
  limit: z.coerce.number().int().min(1).max(500).default(100),
  offset: z.coerce.number().int().min(0).default(0),
});

export type PageQuery = z.infer<typeof PageQuerySchema>;

// Query string for GET /api/transactions
export const TransactionQuerySchema = PageQuerySchema.extend({
  category: TransactionCategorySchema.exclude(["UNCLASSIFIED"]).optional(),
  status: TransactionStatusSchema.optional(),
  start_date: DateParamSchema.optional(),
  end_date: DateParamSchema.optional(),
  min_amount: AmountParamSchema.optional(),
  max_amount: AmountParamSchema.optional(),
  q: z.string().trim().min(1).max(100).optional(),
});

export type TransactionQuery = z.infer<typeof TransactionQuerySchema>;

// Row shape as stored in the transactions table
export const StoredTransactionRowSchema = z.object({
  id: z.number().int(),
  external_reference: z.string().nullable(),
  fingerprint: z.string(),
  category: TransactionCategorySchema.exclude(["UNCLASSIFIED"]),
  amount_minor: z.number().int().nonnegative(),
  fee_minor: z.number().int().nonnegative(),
  recipient: z.string().nullable(),
  receiver: z.string().nullable(),
  occurred_at: z.string(),
  status: TransactionStatusSchema,
  description: z.string().nullable(),
  raw_message: z.string(),
  raw_body: z.string(),
  raw_message_id: z.number().int(),
  created_at: z.string(),
});

export type StoredTransactionRow = z.infer<typeof StoredTransactionRowSchema>;

export const StoredUnprocessedRowSchema = z.object({
  id: z.number().int(),
  raw_message_id: z.number().int(),
  raw_message: z.string(),
  raw_body: z.string(),
  reason: z.string(),
  fingerprint: z.string(),
  created_at: z.string(),
});

export type StoredUnprocessedRow = z.infer<typeof StoredUnprocessedRowSchema>;

// One row of the transaction_category_totals view
export const CategoryTotalRowSchema = z.object({
  category: TransactionCategorySchema.exclude(["UNCLASSIFIED"]),
  transaction_count: z.number().int().nonnegative(),
  amount_minor: z.number().int().nonnegative(),
});

export type CategoryTotalRow = z.infer<typeof CategoryTotalRowSchema>;
