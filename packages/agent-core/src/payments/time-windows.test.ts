import assert from "node:assert/strict";
import test from "node:test";
import { ValidationError } from "../errors.js";
import {
  assertCompleteTimeWindows,
  buildTimeWindows,
  timeWindowIssues,
  toEpochMillisString
} from "./time-windows.js";
import { PurchaserIdentifierSchema } from "@agent-escrow/types/rest";
import { generatePurchaserIdentifier } from "./identifiers.js";

const NOW = new Date("2026-03-01T12:00:00.000Z");

test("buildTimeWindows applies the default offsets", () => {
  const windows = buildTimeWindows(NOW);
  assert.equal(windows.payByTime.toISOString(), "2026-03-01T12:10:00.000Z");
  assert.equal(windows.submitResultTime.toISOString(), "2026-03-01T13:00:00.000Z");
  assert.equal(windows.unlockTime.toISOString(), "2026-03-01T14:00:00.000Z");
  assert.equal(windows.externalDisputeUnlockTime.toISOString(), "2026-03-02T12:00:00.000Z");
});

test("buildTimeWindows rejects offsets that are not increasing", () => {
  assert.throws(
    () =>
      buildTimeWindows(NOW, {
        payByMinutes: 10,
        submitResultMinutes: 10,
        unlockMinutes: 120,
        externalDisputeUnlockMinutes: 1440
      }),
    (error: unknown) =>
      error instanceof ValidationError &&
      error.message === "Invalid time windows: payByTime must be earlier than submitResultTime"
  );
});

test("timeWindowIssues checks only the windows that are present", () => {
  assert.deepEqual(
    timeWindowIssues({
      payByTime: NOW,
      submitResultTime: new Date("2026-03-01T13:00:00.000Z"),
      externalDisputeUnlockTime: new Date("2026-03-01T12:30:00.000Z")
    }),
    ["submitResultTime must be earlier than externalDisputeUnlockTime"]
  );
  assert.deepEqual(timeWindowIssues({ payByTime: new Date("soon"), submitResultTime: NOW }), [
    "payByTime is not a valid date"
  ]);
});

test("assertCompleteTimeWindows names each missing window", () => {
  assert.throws(
    () => assertCompleteTimeWindows({ payByTime: NOW, submitResultTime: NOW }),
    (error: unknown) =>
      error instanceof ValidationError &&
      error.issues.join(",") === "unlockTime is required,externalDisputeUnlockTime is required"
  );
});

test("toEpochMillisString writes milliseconds as a decimal string", () => {
  assert.equal(toEpochMillisString(NOW), "1772366400000");
});

test("generatePurchaserIdentifier returns lowercase hex of the requested length", () => {
  assert.match(generatePurchaserIdentifier(), /^[0-9a-f]{26}$/);
  assert.match(generatePurchaserIdentifier(15), /^[0-9a-f]{15}$/);
  assert.notEqual(generatePurchaserIdentifier(), generatePurchaserIdentifier());
  assert.throws(() => generatePurchaserIdentifier(14), { kind: "validation" });
  assert.throws(() => generatePurchaserIdentifier(27), { kind: "validation" });
});

test("generated identifiers satisfy the purchaser identifier wire rule", () => {
  assert.equal(PurchaserIdentifierSchema.safeParse(generatePurchaserIdentifier()).success, true);
  assert.equal(PurchaserIdentifierSchema.safeParse("ABCDEF0123456789").success, true);
  assert.equal(PurchaserIdentifierSchema.safeParse("ABCDEF012345678G").success, false);
  assert.equal(PurchaserIdentifierSchema.safeParse("abcdef0123456").success, false);
});
