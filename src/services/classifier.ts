import type { TransactionCategory } from "../schemas/transaction.js";
import type { ClassifiedCategory } from "../types/index.js";

export interface ClassificationRule {
  category: ClassifiedCategory;
  patterns: RegExp[];
}

// ─── Rule table ─────────────────────────────────────────────────────────────
// Evaluated top to bottom, first match wins. Wording overlaps between
// categories (an airtime purchase is also a "payment of ... to ..."), so the
// more specific categories sit above the generic money-movement ones.
export const CLASSIFICATION_RULES: readonly ClassificationRule[] = [
  {
    // "A transaction of 3500 RWF by DIRECT PAYMENT LTD on your MOMO account..."
    category: "THIRD_PARTY",
    patterns: [
      /\btransaction of \d+(?:\.\d+)? RWF by\b/i,
      /\bthird[- ]party\b/i,
      /\bon behalf of\b/i,
    ],
  },
  {
    // "A bank deposit of 40000 RWF has been added to your mobile money account"
    category: "BANK_DEPOSIT",
    patterns: [/\bbank deposit\b/i, /\bdeposited\b.*\bbank\b/i],
  },
  {
    // "You Jane Doe (*********036) have via agent: Agent Sophia (250790777777), withdrawn 20000 RWF"
    category: "WITHDRAWAL",
    patterns: [/\bwithdrawn\b/i, /\bwithdrawal\b/i],
  },
  {
    category: "CASH_POWER",
    patterns: [/\bcash ?power\b/i, /\belectricity\b/i],
  },
  {
    category: "BUNDLE",
    patterns: [/\bbundles?\b/i],
  },
  {
    category: "AIRTIME",
    patterns: [/\bairtime\b/i],
  },
  {
    // "You have received 2000 RWF from Jane Smith (*********013)..."
    category: "INCOMING_MONEY",
    patterns: [/\breceived\b.*\bfrom\b/i],
  },
  {
    // "*165*S*10000 RWF transferred to Samuel Carter (250791666666)..."
    category: "TRANSFER",
    patterns: [/\btransfer(?:red)?\b.*\bto\b/i, /\bsent\b.*\bto\b/i],
  },
  {
    // "Your payment of 1000 RWF to Jane Smith 12845 has been completed..."
    category: "PAYMENT",
    patterns: [/\bpayment of\b.*\bto\b/i, /\bpaid\b.*\bto\b/i],
  },
];

/**
 * Classify a normalized message. Never throws: a message no rule recognises is
 * UNCLASSIFIED.
 */
export function classifyMessage(
  normalized: string,
  rules: readonly ClassificationRule[] = CLASSIFICATION_RULES
): TransactionCategory {
  const rule = rules.find((candidate) =>
    candidate.patterns.some((pattern) => pattern.test(normalized))
  );
  return rule?.category ?? "UNCLASSIFIED";
}

/** Human label used in derived descriptions ("CASH_POWER" → "Cash Power"). */
export function categoryLabel(category: TransactionCategory): string {
  return category
    .toLowerCase()
    .split("_")
    .map((word) => word.charAt(0).toUpperCase() + word.slice(1))
    .join(" ");
}
