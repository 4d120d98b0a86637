import { describe, expect, it } from "vitest";
import {
  detectStatus,
  extractAmountMinor,
  extractCounterparty,
  extractFeeMinor,
  extractFields,
  extractOccurredAt,
  extractReference,
} from "./extractor.js";
import { normalizeMessage } from "./normalizer.js";

const INCOMING = normalizeMessage(
  "You have received 50,000 RWF from John Doe on 2024-03-15. TxId: TX12345678"
);
const PAYMENT = normalizeMessage(
  "You have paid 25,000 RWF to EUCL. Fee: 250 RWF. Date: 2024-03-16 09:00:00"
);
const TRANSFER = normalizeMessage(
  "*165*S*10000 RWF transferred to Samuel Carter (250791666666) from 36521838 at 2024-05-10 21:45:42. Fee was: 100 RWF."
);
const WITHDRAWAL = normalizeMessage(
  "You Jane Doe (*********036) have via agent: Agent Sophia (250790777777), withdrawn 20000 RWF from your mobile money account: 36521838 at 2024-05-26 02:10:27."
);
const THIRD_PARTY = normalizeMessage(
  "A transaction of 3500 RWF by DIRECT PAYMENT LTD on your MOMO account was successfully completed at 2024-05-10 21:32:32."
);

describe("extractFields", () => {
  it("extracts an incoming transfer", () => {
    expect(extractFields(INCOMING, "INCOMING_MONEY", null)).toEqual({
      success: true,
      fields: {
        amountMinor: 5000000,
        feeMinor: 0,
        counterparty: "John Doe",
        externalReference: "TX12345678",
        occurredAt: "2024-03-15 00:00:00",
        status: "completed",
      },
    });
  });

  it("extracts a payment with a fee", () => {
    expect(extractFields(PAYMENT, "PAYMENT", null)).toEqual({
      success: true,
      fields: {
        amountMinor: 2500000,
        feeMinor: 25000,
        counterparty: "EUCL",
        externalReference: null,
        occurredAt: "2024-03-16 09:00:00",
        status: "completed",
      },
    });
  });

  it("reports a missing amount", () => {
    const text = normalizeMessage("You have received money from Jane on 2024-03-17");
    expect(extractFields(text, "INCOMING_MONEY", null)).toEqual({
      success: false,
      missingField: "amount",
    });
  });

  it("reports a missing date when there is no receipt time either", () => {
    const text = normalizeMessage("You have received 500 RWF from Jane");
    expect(extractFields(text, "INCOMING_MONEY", null)).toEqual({
      success: false,
      missingField: "date",
    });
  });

  it("uses the receipt time when the text carries no date", () => {
    const text = normalizeMessage("You have received 500 RWF from Jane");
    const result = extractFields(text, "INCOMING_MONEY", new Date(1715351458724));
    expect(result.success && result.fields.occurredAt).toBe("2024-05-10 14:30:58");
  });
});

describe("extractAmountMinor", () => {
  it("reads the amount for each category", () => {
    expect(extractAmountMinor(TRANSFER, "TRANSFER")).toBe(1000000);
    expect(extractAmountMinor(WITHDRAWAL, "WITHDRAWAL")).toBe(2000000);
    expect(extractAmountMinor(THIRD_PARTY, "THIRD_PARTY")).toBe(350000);
  });

  it("keeps two decimal places", () => {
    expect(extractAmountMinor("You have received 1500.50 RWF from Jane", "INCOMING_MONEY")).toBe(
      150050
    );
  });

  it("never reads an amount out of a longer number", () => {
    const text = normalizeMessage("You have received 1500.555 RWF from Jane on 2024-05-01");
    expect(extractFields(text, "INCOMING_MONEY", null)).toEqual({
      success: false,
      missingField: "amount",
    });
    expect(extractAmountMinor("Bundle activated: RWF 1500.555", "BUNDLE")).toBeNull();
  });

  it("reads amounts grouped with dots or spaces", () => {
    expect(
      extractAmountMinor(normalizeMessage("You have received 50.000 RWF from Jane"), "INCOMING_MONEY")
    ).toBe(5000000);
    expect(
      extractAmountMinor(normalizeMessage("You have received 50 000 RWF from Jane"), "INCOMING_MONEY")
    ).toBe(5000000);
  });

  it("skips balance figures in the fallback", () => {
    const text = "Your balance is 9000 RWF. Bundle activated: 500 RWF";
    expect(extractAmountMinor(text, "BUNDLE")).toBe(50000);
  });
});

describe("extractFeeMinor", () => {
  it("reads fee variants", () => {
    expect(extractFeeMinor(TRANSFER)).toBe(10000);
    expect(extractFeeMinor("Fee paid: 350 RWF")).toBe(35000);
  });

  it("defaults to zero", () => {
    expect(extractFeeMinor(INCOMING)).toBe(0);
  });
});

describe("extractCounterparty", () => {
  it("stops the name at a parenthesis or a linking word", () => {
    expect(extractCounterparty(TRANSFER, "TRANSFER")).toBe("Samuel Carter");
    expect(extractCounterparty(WITHDRAWAL, "WITHDRAWAL")).toBe("Agent Sophia");
    expect(extractCounterparty(THIRD_PARTY, "THIRD_PARTY")).toBe("DIRECT PAYMENT LTD");
  });

  it("keeps initials in names", () => {
    const text = normalizeMessage("You have received 500 RWF from J. Doe on 2024-05-01");
    expect(extractCounterparty(text, "INCOMING_MONEY")).toBe("J. Doe");
    expect(extractCounterparty(PAYMENT, "PAYMENT")).toBe("EUCL");
  });

  it("ignores the account holder's own account", () => {
    expect(
      extractCounterparty("You have received 500 RWF from your savings", "INCOMING_MONEY")
    ).toBeNull();
  });
});

describe("extractReference", () => {
  it("upper-cases the reference", () => {
    expect(extractReference("Ref: abc123xy")).toBe("ABC123XY");
    expect(extractReference(WITHDRAWAL)).toBeNull();
  });

  it("rejects words without digits", () => {
    expect(extractReference("Reference: PAYMENT")).toBeNull();
  });

  it("reads financial transaction ids", () => {
    expect(extractReference("Financial Transaction Id: 14098463509.")).toBe("14098463509");
  });
});

describe("extractOccurredAt", () => {
  it("accepts an ISO separator and missing seconds", () => {
    expect(extractOccurredAt("at 2024-03-15T08:05", null)).toBe("2024-03-15 08:05:00");
  });

  it("ignores impossible calendar dates", () => {
    expect(extractOccurredAt("on 2024-02-30", null)).toBeNull();
    expect(extractOccurredAt("on 2024-02-30", new Date(Date.UTC(2024, 1, 1, 6, 0, 0)))).toBe(
      "2024-02-01 06:00:00"
    );
  });
});

describe("detectStatus", () => {
  it("flags failed transactions", () => {
    expect(detectStatus("Your payment of 1000 RWF to Jane Smith has failed")).toBe("failed");
    expect(detectStatus(PAYMENT)).toBe("completed");
  });
});
