import { describe, expect, it } from "vitest";
import { normalizeMessage } from "./normalizer.js";

describe("normalizeMessage", () => {
  it("trims and collapses whitespace", () => {
    expect(normalizeMessage("  You have received 50,000 RWF\n from  John Doe ")).toBe(
      "You have received 50000 RWF from John Doe"
    );
  });

  it("removes thousands separators inside numbers", () => {
    expect(normalizeMessage("1,234,567.50 RWF")).toBe("1234567.50 RWF");
  });

  it("keeps commas that are not thousands separators", () => {
    expect(normalizeMessage("Hello, 12,34 RWF")).toBe("Hello, 12,34 RWF");
  });

  it("unifies currency labels", () => {
    expect(normalizeMessage("1000 Rwf and 200 FRW")).toBe("1000 RWF and 200 RWF");
  });

  it("separates amounts glued to the currency label", () => {
    expect(normalizeMessage("Paid 5000RWF and RWF200")).toBe("Paid 5000 RWF and RWF 200");
  });

  it("joins digit groups split by dots or spaces", () => {
    expect(normalizeMessage("received 1.500.000 RWF")).toBe("received 1500000 RWF");
    expect(normalizeMessage("received 50 000 FRW")).toBe("received 50000 RWF");
    expect(normalizeMessage("balance: RWF 12 500.")).toBe("balance: RWF 12500.");
  });

  it("leaves decimals and dates alone", () => {
    expect(normalizeMessage("received 1500.50 RWF")).toBe("received 1500.50 RWF");
    expect(normalizeMessage("at 2024-05-10 21:45:42 500 RWF")).toBe(
      "at 2024-05-10 21:45:42 500 RWF"
    );
  });

  it("keeps original casing of names", () => {
    expect(normalizeMessage("from JOHN doe")).toBe("from JOHN doe");
  });

  it("returns an empty string for blank input", () => {
    expect(normalizeMessage(" \n\t ")).toBe("");
  });
});
