import { describe, it } from "node:test";
import assert from "node:assert";
import { stripVTControlCharacters } from "node:util";
import {
  formatAmounts,
  formatIdentifier,
  formatSnapshot,
  maskSecret,
  parseAmountArgument
} from "../src/utils/formatting.js";

describe("Formatting", () => {
  it("should shorten long identifiers", () => {
    assert.equal(formatIdentifier("escrow_1"), "escrow_1");
    assert.equal(formatIdentifier("0123456789abcdef0123456789abcdef"), "0123456789ab...89abcdef");
  });

  it("should parse quantity:unit amounts", () => {
    assert.deepEqual(parseAmountArgument("5000000:lovelace"), { amount: "5000000", unit: "lovelace" });
    assert.deepEqual(parseAmountArgument("12"), { amount: "12", unit: "" });
    assert.equal(formatAmounts([{ amount: "12", unit: "" }, { amount: "3", unit: "usdm" }]), "12 lovelace, 3 usdm");
  });

  it("should mask secrets", () => {
    assert.equal(maskSecret(undefined), "(not set)");
    assert.equal(maskSecret("abc"), "****");
    assert.equal(maskSecret("test-secret"), "test****");
  });

  it("should show the next action error when present", () => {
    const line = formatSnapshot({
      blockchainIdentifier: "escrow_1",
      onChainState: "Disputed",
      nextAction: { requestedAction: "None", errorType: "NetworkError", errorNote: "retry later" },
      lifecycle: "Disputed",
      observedAt: new Date("2026-03-01T12:00:00.000Z")
    });

    assert.equal(
      stripVTControlCharacters(line),
      "escrow_1  Disputed  onChain=Disputed  next=None  error=NetworkError"
    );
  });
});
