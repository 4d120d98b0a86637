import { describe, expect, it } from "vitest";
import { decimalToMinor, formatMinor, minorToDecimal, parseAmountToMinor } from "./money.js";

describe("parseAmountToMinor", () => {
  it("parses written amounts", () => {
    expect(parseAmountToMinor("50,000")).toBe(5000000);
    expect(parseAmountToMinor("1500.50 RWF")).toBe(150050);
    expect(parseAmountToMinor("RWF 200")).toBe(20000);
  });

  it("rejects sub-cent and malformed amounts", () => {
    expect(parseAmountToMinor("12.345")).toBeNull();
    expect(parseAmountToMinor("abc")).toBeNull();
    expect(parseAmountToMinor("")).toBeNull();
    expect(parseAmountToMinor("-5")).toBeNull();
  });
});

describe("conversions", () => {
  it("converts minor units back to decimals", () => {
    expect(minorToDecimal(150050)).toBe(1500.5);
    expect(formatMinor(5000000)).toBe("50000.00");
  });

  it("rounds query amounts half-up", () => {
    expect(decimalToMinor(10.005)).toBe(1001);
    expect(decimalToMinor(0.1)).toBe(10);
  });
});
