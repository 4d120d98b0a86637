import { describe, expect, it } from "vitest";
import { buildStatistics } from "./statistics.js";

describe("buildStatistics", () => {
  it("splits money in and out and sorts categories by volume", () => {
    const stats = buildStatistics(
      [
        { category: "INCOMING_MONEY", count: 2, amountMinor: 7500000 },
        { category: "BANK_DEPOSIT", count: 1, amountMinor: 1000050 },
        { category: "PAYMENT", count: 1, amountMinor: 2500000 },
      ],
      3
    );

    expect(stats).toEqual({
      total_transactions: 4,
      money_in: 85000.5,
      money_out: 25000,
      net_balance: 60000.5,
      total_volume: 110000.5,
      unprocessed_count: 3,
      by_category: [
        { category: "INCOMING_MONEY", count: 2, total_amount: 75000, average_amount: 37500 },
        { category: "PAYMENT", count: 1, total_amount: 25000, average_amount: 25000 },
        { category: "BANK_DEPOSIT", count: 1, total_amount: 10000.5, average_amount: 10000.5 },
      ],
    });
  });

  it("handles an empty ledger", () => {
    expect(buildStatistics([], 0)).toEqual({
      total_transactions: 0,
      money_in: 0,
      money_out: 0,
      net_balance: 0,
      total_volume: 0,
      unprocessed_count: 0,
      by_category: [],
    });
  });
});
