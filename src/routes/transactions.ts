import { Router, type Request, type Response } from "express";
import { PageQuerySchema, TransactionQuerySchema } from "../schemas/transaction.js";
import { buildStatistics } from "../services/statistics.js";
import { store } from "../services/supabase.js";

const router = Router();

function sendStoreError(res: Response, operation: string, error: unknown): void {
  const message = error instanceof Error ? error.message : String(error);
  console.error(`[Query] ${operation} failed:`, message);
  res.status(503).json({ success: false, error: `Failed to ${operation}` });
}

/**
 * GET /api/transactions
 *
 * Filtered, paginated transaction list (newest first)
 */
router.get("/transactions", async (req: Request, res: Response) => {
  const parseResult = TransactionQuerySchema.safeParse(req.query);
  if (!parseResult.success) {
    res.status(400).json({
      success: false,
      error: "Invalid query parameters",
      details: parseResult.error.errors,
    });
    return;
  }

  const query = parseResult.data;
  try {
    const page = await store.listTransactions(query);
    res.json({
      total: page.total,
      limit: query.limit,
      offset: query.offset,
      transactions: page.rows,
    });
  } catch (error) {
    sendStoreError(res, "fetch transactions", error);
  }
});

/**
 * GET /api/transactions/:reference
 */
router.get("/transactions/:reference", async (req: Request, res: Response) => {
  try {
    const transaction = await store.findTransactionByReference(req.params.reference);
    if (!transaction) {
      res.status(404).json({ success: false, error: "Transaction not found" });
      return;
    }
    res.json(transaction);
  } catch (error) {
    sendStoreError(res, "fetch transaction", error);
  }
});

/**
 * GET /api/statistics
 *
 * Totals for the dashboard: money in/out, per-category breakdown, failure log size
 */
router.get("/statistics", async (_req: Request, res: Response) => {
  try {
    const [totals, unprocessedCount] = await Promise.all([
      store.getCategoryTotals(),
      store.countUnprocessed(),
    ]);
    res.json(buildStatistics(totals, unprocessedCount));
  } catch (error) {
    sendStoreError(res, "compute statistics", error);
  }
});

/**
 * GET /api/unprocessed
 *
 * Operator view of messages that could not be turned into transactions
 */
router.get("/unprocessed", async (req: Request, res: Response) => {
  const parseResult = PageQuerySchema.safeParse(req.query);
  if (!parseResult.success) {
    res.status(400).json({
      success: false,
      error: "Invalid query parameters",
      details: parseResult.error.errors,
    });
    return;
  }

  const query = parseResult.data;
  try {
    const page = await store.listUnprocessed(query);
    res.json({
      total: page.total,
      limit: query.limit,
      offset: query.offset,
      entries: page.rows,
    });
  } catch (error) {
    sendStoreError(res, "fetch unprocessed messages", error);
  }
});

export default router;
