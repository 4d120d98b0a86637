import { describe, expect, it } from "vitest";
import {
  categoryLabel,
  classifyMessage,
  CLASSIFICATION_RULES,
  type ClassificationRule,
} from "./classifier.js";
import { normalizeMessage } from "./normalizer.js";

function classify(raw: string) {
  return classifyMessage(normalizeMessage(raw));
}

describe("classifyMessage", () => {
  it("classifies incoming money", () => {
    expect(classify("You have received 50,000 RWF from John Doe on 2024-03-15")).toBe(
      "INCOMING_MONEY"
    );
  });

  it("classifies payments", () => {
    expect(classify("You have paid 25,000 RWF to EUCL. Fee: 250 RWF")).toBe("PAYMENT");
  });

  it("classifies transfers", () => {
    expect(
      classify(
        "*165*S*10000 RWF transferred to Samuel Carter (250791666666) from 36521838 at 2024-05-10 21:45:42. Fee was: 100 RWF."
      )
    ).toBe("TRANSFER");
  });

  it("classifies agent withdrawals", () => {
    expect(
      classify(
        "You Jane Doe (*********036) have via agent: Agent Sophia (250790777777), withdrawn 20000 RWF from your mobile money account: 36521838 at 2024-05-26 02:10:27."
      )
    ).toBe("WITHDRAWAL");
  });

  it("classifies bank deposits", () => {
    expect(
      classify(
        "A bank deposit of 40000 RWF has been added to your mobile money account at 2024-05-11 18:43:49."
      )
    ).toBe("BANK_DEPOSIT");
  });

  it("classifies third party transactions", () => {
    expect(
      classify(
        "A transaction of 3500 RWF by DIRECT PAYMENT LTD on your MOMO account was successfully completed at 2024-05-10 21:32:32."
      )
    ).toBe("THIRD_PARTY");
  });

  it("classifies service purchases", () => {
    expect(
      classify("Your payment of 2000 RWF to Airtime with token has been completed at 2024-05-12 11:41:28.")
    ).toBe("AIRTIME");
    expect(
      classify("Your payment of 5000 RWF to MTN Cash Power with token 1234-5678 has been completed")
    ).toBe("CASH_POWER");
    expect(classify("Yello! You have purchased an internet bundle of 1GB for 2000 RWF")).toBe(
      "BUNDLE"
    );
  });

  it("matches case-insensitively", () => {
    expect(classify("YOU HAVE RECEIVED 100 RWF FROM JANE")).toBe("INCOMING_MONEY");
  });

  it("returns UNCLASSIFIED when no rule matches", () => {
    expect(classify("Your one-time code is 4821")).toBe("UNCLASSIFIED");
    expect(classify("")).toBe("UNCLASSIFIED");
  });

  it("resolves overlapping rules by list position", () => {
    const airtime = normalizeMessage("Your payment of 2000 RWF to Airtime has been completed");
    const paymentOnly = CLASSIFICATION_RULES.filter((rule) => rule.category === "PAYMENT");

    // Both rules match; AIRTIME sits earlier in the table
    expect(classifyMessage(airtime, paymentOnly)).toBe("PAYMENT");
    expect(classifyMessage(airtime)).toBe("AIRTIME");
  });

  it("always picks the earlier of two matching rules", () => {
    const transfer: ClassificationRule = { category: "TRANSFER", patterns: [/\bsent\b/i] };
    const payment: ClassificationRule = { category: "PAYMENT", patterns: [/\bsent .* to\b/i] };
    const message = "sent 100 RWF to Jane";

    expect(classifyMessage(message, [transfer, payment])).toBe("TRANSFER");
    expect(classifyMessage(message, [payment, transfer])).toBe("PAYMENT");
  });

  it("keeps the documented precedence order", () => {
    expect(CLASSIFICATION_RULES.map((rule) => rule.category)).toEqual([
      "THIRD_PARTY",
      "BANK_DEPOSIT",
      "WITHDRAWAL",
      "CASH_POWER",
      "BUNDLE",
      "AIRTIME",
      "INCOMING_MONEY",
      "TRANSFER",
      "PAYMENT",
    ]);
  });
});

describe("categoryLabel", () => {
  it("turns category names into labels", () => {
    expect(categoryLabel("CASH_POWER")).toBe("Cash Power");
    expect(categoryLabel("INCOMING_MONEY")).toBe("Incoming Money");
  });
});
