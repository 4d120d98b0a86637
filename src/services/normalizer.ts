// Digit groups split by spaces or dots ("50 000", "1.500.000") next to the currency label
const GROUPED_BEFORE_LABEL = /(?<![\w.,:-])\d{1,3}(?:[ .]\d{3})+(?= RWF\b)/g;
const GROUPED_AFTER_LABEL = /(?<=\bRWF )\d{1,3}(?:[ .]\d{3})+(?!\d|[.,]\d)/g;

function joinDigitGroups(amount: string): string {
  return amount.replace(/[ .]/g, "");
}

/**
 * Canonical form used for classification and extraction. Casing is kept so
 * names survive; every rule downstream matches case-insensitively.
 */
export function normalizeMessage(raw: string): string {
  return raw
    .replace(/\s+/g, " ")
    .trim()
    .replace(/(\d),(?=\d{3}(?!\d))/g, "$1")
    .replace(/(\d)\s*(?:RWF|FRW)\b/gi, "$1 RWF")
    .replace(/\b(?:RWF|FRW)\s*(?=\d)/gi, "RWF ")
    .replace(/\b(?:RWF|FRW)\b/gi, "RWF")
    .replace(GROUPED_BEFORE_LABEL, joinDigitGroups)
    .replace(GROUPED_AFTER_LABEL, joinDigitGroups);
}
