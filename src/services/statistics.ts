import type { CategoryTotal, ClassifiedCategory } from "../types/index.js";
import { minorToDecimal } from "./money.js";

// Categories that bring money into the wallet; everything else moves money out
const INCOME_CATEGORIES: ReadonlySet<ClassifiedCategory> = new Set([
  "INCOMING_MONEY",
  "BANK_DEPOSIT",
]);

export interface Statistics {
  total_transactions: number;
  money_in: number;
  money_out: number;
  net_balance: number;
  total_volume: number;
  unprocessed_count: number;
  by_category: Array<{
    category: ClassifiedCategory;
    count: number;
    total_amount: number;
    average_amount: number;
  }>;
}

export function buildStatistics(
  totals: CategoryTotal[],
  unprocessedCount: number
): Statistics {
  let count = 0;
  let inMinor = 0;
  let outMinor = 0;

  for (const total of totals) {
    count += total.count;
    if (INCOME_CATEGORIES.has(total.category)) {
      inMinor += total.amountMinor;
    } else {
      outMinor += total.amountMinor;
    }
  }

  const byCategory = [...totals]
    .sort((a, b) => b.amountMinor - a.amountMinor || a.category.localeCompare(b.category))
    .map((total) => ({
      category: total.category,
      count: total.count,
      total_amount: minorToDecimal(total.amountMinor),
      average_amount:
        total.count === 0 ? 0 : minorToDecimal(Math.round(total.amountMinor / total.count)),
    }));

  return {
    total_transactions: count,
    money_in: minorToDecimal(inMinor),
    money_out: minorToDecimal(outMinor),
    net_balance: minorToDecimal(inMinor - outMinor),
    total_volume: minorToDecimal(inMinor + outMinor),
    unprocessed_count: unprocessedCount,
    by_category: byCategory,
  };
}
