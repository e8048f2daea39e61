import assert from "node:assert/strict";
import test from "node:test";
import { parseEscrowClientConfig } from "./config.js";
import {
  AuthError,
  ClientError,
  ProtocolError,
  ServerError,
  StateError,
  ValidationError,
  describeError,
  errorFromResponse,
  isEscrowError
} from "./errors.js";

test("errorFromResponse maps HTTP status to an error kind", () => {
  assert.ok(errorFromResponse(401, "bad token") instanceof AuthError);
  assert.ok(errorFromResponse(400, "bad body") instanceof ClientError);
  assert.ok(errorFromResponse(404, "missing") instanceof ClientError);
  assert.ok(errorFromResponse(502, "gateway") instanceof ServerError);
  assert.ok(errorFromResponse(302, "moved") instanceof ProtocolError);
  assert.equal(errorFromResponse(500, "boom").status, 500);
});

test("errors carry their kind and class name", () => {
  const error = new StateError("Payment escrow_1 is already Completed");
  assert.equal(error.name, "StateError");
  assert.equal(error.kind, "state");
  assert.equal(isEscrowError(error), true);
  assert.equal(isEscrowError(new Error("plain")), false);
  assert.equal(describeError(error), "[state] Payment escrow_1 is already Completed");
  assert.equal(describeError("text"), "text");
});

test("ValidationError folds its issues into the message", () => {
  const error = new ValidationError("Invalid payment request", ["a", "b"]);
  assert.equal(error.message, "Invalid payment request: a; b");
  assert.deepEqual(error.issues, ["a", "b"]);
  assert.equal(error.retryable, false);
});

test("parseEscrowClientConfig fills defaults and strips trailing slashes", () => {
  const config = parseEscrowClientConfig({
    paymentServiceUrl: "https://payments.test/api/v1/",
    paymentApiKey: "test-secret"
  });

  assert.deepEqual(config, {
    paymentServiceUrl: "https://payments.test/api/v1",
    paymentApiKey: "test-secret",
    network: "Preprod",
    paymentType: "Web3CardanoV1",
    requestTimeoutMs: 30000
  });
});

test("parseEscrowClientConfig lists every problem", () => {
  assert.throws(
    () =>
      parseEscrowClientConfig({
        paymentServiceUrl: "ftp://payments.test",
        paymentApiKey: ""
      }),
    (error: unknown) => {
      assert.ok(error instanceof ValidationError);
      assert.deepEqual(error.issues, [
        "paymentServiceUrl: must be an http(s) URL",
        "paymentApiKey: String must contain at least 1 character(s)"
      ]);
      return true;
    }
  );
});

test("a registry URL without a registry key is rejected", () => {
  assert.throws(
    () =>
      parseEscrowClientConfig({
        paymentServiceUrl: "https://payments.test",
        paymentApiKey: "test-secret",
        registryServiceUrl: "https://registry.test"
      }),
    (error: unknown) =>
      error instanceof ValidationError &&
      error.issues[0] === "registryApiKey: registryApiKey is required when registryServiceUrl is set"
  );
});
