import type {
  ClassifiedCategory,
  ExtractionResult,
} from "../types/index.js";
import type { TransactionStatus } from "../schemas/transaction.js";
import { parseAmountToMinor } from "./money.js";

// Patterns run against normalized text: no thousands separators, "RWF" label.
// An amount never starts inside a longer number.
const AMOUNT = String.raw`(?<![\d.,])(\d+(?:\.\d{1,2})?)\s*RWF`;
const NAME = String.raw`([A-Za-z][A-Za-z.&'\- ]*?)`;
// A counterparty name ends at a digit, a parenthesis, punctuation or a linking word.
// A period after a lone initial ("J. Doe") does not end it.
const NAME_END = String.raw`(?=\s*(?:\(|\d|(?<!\b[A-Z])\.(?:\s|$)|[,;:](?:\s|$)|\b(?:on|at|has|was|with|from|for|and)\b|$))`;

function rx(source: string): RegExp {
  return new RegExp(source, "i");
}

const AMOUNT_PATTERNS: Record<ClassifiedCategory, RegExp[]> = {
  INCOMING_MONEY: [rx(String.raw`\breceived\s+${AMOUNT}`)],
  PAYMENT: [rx(String.raw`\b(?:payment of|paid)\s+${AMOUNT}`)],
  TRANSFER: [
    rx(String.raw`${AMOUNT}\s+(?:transferred|sent)\b`),
    rx(String.raw`\b(?:transferred|sent)\s+${AMOUNT}`),
  ],
  WITHDRAWAL: [rx(String.raw`\bwithdrawn\s+${AMOUNT}`)],
  AIRTIME: [rx(String.raw`\b(?:payment of|purchased?)\s+${AMOUNT}`)],
  BUNDLE: [
    rx(String.raw`\b(?:payment of|purchased?)\s+${AMOUNT}`),
    rx(String.raw`\bfor\s+${AMOUNT}`),
  ],
  BANK_DEPOSIT: [rx(String.raw`\bdeposit of\s+${AMOUNT}`)],
  CASH_POWER: [rx(String.raw`\b(?:payment of|purchased?)\s+${AMOUNT}`)],
  THIRD_PARTY: [rx(String.raw`\btransaction of\s+${AMOUNT}`)],
};

const TO_NAME = rx(String.raw`\bto\s+${NAME}${NAME_END}`);

const COUNTERPARTY_PATTERNS: Record<ClassifiedCategory, RegExp[]> = {
  INCOMING_MONEY: [rx(String.raw`\bfrom\s+${NAME}${NAME_END}`)],
  PAYMENT: [
    rx(String.raw`\b(?:payment of|paid)\s+${AMOUNT}\s+to\s+${NAME}${NAME_END}`),
    TO_NAME,
  ],
  TRANSFER: [rx(String.raw`\b(?:transferred|sent)\s+to\s+${NAME}${NAME_END}`), TO_NAME],
  WITHDRAWAL: [rx(String.raw`\bvia agent\s*:?\s*${NAME}${NAME_END}`)],
  AIRTIME: [TO_NAME],
  BUNDLE: [TO_NAME],
  BANK_DEPOSIT: [rx(String.raw`\bfrom\s+${NAME}${NAME_END}`)],
  CASH_POWER: [TO_NAME],
  THIRD_PARTY: [
    rx(String.raw`\bby\s+${NAME}${NAME_END}`),
    rx(String.raw`\bon behalf of\s+${NAME}${NAME_END}`),
  ],
};

const GENERIC_AMOUNT =
  /\bRWF\s*(\d+(?:\.\d{1,2})?)(?!\d|[.,]\d)|(?<![\d.,])(\d+(?:\.\d{1,2})?)\s*RWF\b/gi;
const NOT_AN_AMOUNT_CONTEXT = /\b(?:fee|fees|balance|charge|charges)\b[^.]*$/i;

const FEE = /\bfees?(?:\s+(?:was|paid))?\s*:?\s*(\d+(?:\.\d{1,2})?)/i;

const REFERENCE =
  /\b(?:financial transaction id|external transaction id|transaction id|txid|reference|ref)\s*[:#]?\s*([A-Z0-9]{6,20})\b/i;

const DATE_TIME =
  /\b(\d{4})-(\d{2})-(\d{2})(?:[ T](\d{2}):(\d{2})(?::(\d{2}))?)?\b/g;

const FAILURE_WORDS = /\b(?:failed|declined|rejected|cancell?ed)\b/i;

function firstCapture(text: string, patterns: RegExp[]): string | null {
  for (const pattern of patterns) {
    const match = pattern.exec(text);
    if (match?.[1]) return match[1];
  }
  return null;
}

/** First "N RWF" / "RWF N" that is not a fee or balance figure. */
function findGenericAmount(text: string): string | null {
  for (const match of text.matchAll(GENERIC_AMOUNT)) {
    const start = match.index ?? 0;
    const preceding = text.slice(Math.max(0, start - 24), start);
    if (NOT_AN_AMOUNT_CONTEXT.test(preceding)) continue;
    const value = match[1] ?? match[2];
    if (value) return value;
  }
  return null;
}

export function extractAmountMinor(
  text: string,
  category: ClassifiedCategory
): number | null {
  const raw = firstCapture(text, AMOUNT_PATTERNS[category]) ?? findGenericAmount(text);
  return raw === null ? null : parseAmountToMinor(raw);
}

export function extractFeeMinor(text: string): number {
  const match = FEE.exec(text);
  if (!match?.[1]) return 0;
  return parseAmountToMinor(match[1]) ?? 0;
}

function cleanName(name: string): string | null {
  const cleaned = name
    .replace(/\s+/g, " ")
    .replace(/^[\s.&'-]+|[\s.&'-]+$/g, "");
  if (cleaned.length < 2) return null;
  // "to your mobile money account" is not a counterparty
  if (/^(?:you|your)\b/i.test(cleaned)) return null;
  return cleaned;
}

export function extractCounterparty(
  text: string,
  category: ClassifiedCategory
): string | null {
  for (const pattern of COUNTERPARTY_PATTERNS[category]) {
    const match = pattern.exec(text);
    const name = match ? match[match.length - 1] : undefined;
    if (!name) continue;
    const cleaned = cleanName(name);
    if (cleaned) return cleaned;
  }
  return null;
}

export function extractReference(text: string): string | null {
  const match = REFERENCE.exec(text);
  const candidate = match?.[1];
  if (!candidate || !/\d/.test(candidate)) return null;
  return candidate.toUpperCase();
}

function pad(value: number): string {
  return String(value).padStart(2, "0");
}

function formatTimestamp(
  year: number,
  month: number,
  day: number,
  hours: number,
  minutes: number,
  seconds: number
): string {
  return `${year}-${pad(month)}-${pad(day)} ${pad(hours)}:${pad(minutes)}:${pad(seconds)}`;
}

function isValidTimestamp(
  year: number,
  month: number,
  day: number,
  hours: number,
  minutes: number,
  seconds: number
): boolean {
  const date = new Date(Date.UTC(year, month - 1, day, hours, minutes, seconds));
  return (
    date.getUTCFullYear() === year &&
    date.getUTCMonth() === month - 1 &&
    date.getUTCDate() === day &&
    date.getUTCHours() === hours &&
    date.getUTCMinutes() === minutes &&
    date.getUTCSeconds() === seconds
  );
}

/**
 * Occurrence time embedded in the text as "YYYY-MM-DD[ HH:MM[:SS]]", falling
 * back to the receipt timestamp (UTC). Null when neither is available.
 */
export function extractOccurredAt(text: string, receivedAt: Date | null): string | null {
  for (const match of text.matchAll(DATE_TIME)) {
    const [year, month, day] = [match[1], match[2], match[3]].map(Number);
    const [hours, minutes, seconds] = [match[4], match[5], match[6]].map((part) =>
      part === undefined ? 0 : Number(part)
    );
    if (isValidTimestamp(year, month, day, hours, minutes, seconds)) {
      return formatTimestamp(year, month, day, hours, minutes, seconds);
    }
  }

  if (receivedAt && !Number.isNaN(receivedAt.getTime())) {
    return formatTimestamp(
      receivedAt.getUTCFullYear(),
      receivedAt.getUTCMonth() + 1,
      receivedAt.getUTCDate(),
      receivedAt.getUTCHours(),
      receivedAt.getUTCMinutes(),
      receivedAt.getUTCSeconds()
    );
  }

  return null;
}

export function detectStatus(text: string): TransactionStatus {
  return FAILURE_WORDS.test(text) ? "failed" : "completed";
}

/**
 * Pull the structured fields out of a classified message. Amount and
 * occurrence date are required; the result names whichever is missing.
 */
export function extractFields(
  normalized: string,
  category: ClassifiedCategory,
  receivedAt: Date | null
): ExtractionResult {
  const amountMinor = extractAmountMinor(normalized, category);
  if (amountMinor === null) {
    return { success: false, missingField: "amount" };
  }

  const occurredAt = extractOccurredAt(normalized, receivedAt);
  if (occurredAt === null) {
    return { success: false, missingField: "date" };
  }

  return {
    success: true,
    fields: {
      amountMinor,
      feeMinor: extractFeeMinor(normalized),
      counterparty: extractCounterparty(normalized, category),
      externalReference: extractReference(normalized),
      occurredAt,
      status: detectStatus(normalized),
    },
  };
}
