import assert from "node:assert/strict";
import test from "node:test";
import { createEscrowContext } from "../context.js";
import { TransportError } from "../errors.js";
import type { StatusSnapshot } from "../payments/lifecycle.js";
import { PaymentRequest } from "../payments/payment-request.js";
import { buildTimeWindows } from "../payments/time-windows.js";
import { createFakeEscrowService } from "../testing/fake-escrow-service.js";
import { StatusMonitor, type StatusSource } from "./status-monitor.js";

function sleep(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}

function snapshot(onChainState: string | null): StatusSnapshot {
  return {
    blockchainIdentifier: "escrow_1",
    onChainState,
    nextAction: { requestedAction: "WaitingForExternalAction" },
    lifecycle: onChainState === null ? "Requested" : "FundsLocked",
    observedAt: new Date()
  };
}

class CountingSource implements StatusSource {
  calls = 0;

  constructor(private readonly failOn: ReadonlySet<number> = new Set()) {}

  async pollStatus(): Promise<StatusSnapshot[]> {
    this.calls += 1;
    if (this.failOn.has(this.calls)) {
      throw new TransportError("connection reset");
    }
    return [snapshot(this.calls > 1 ? "FundsLocked" : null)];
  }
}

class SlowSource implements StatusSource {
  calls = 0;
  inFlight = 0;
  maxInFlight = 0;

  constructor(private readonly latencyMs: number) {}

  async pollStatus(): Promise<StatusSnapshot[]> {
    this.calls += 1;
    this.inFlight += 1;
    this.maxInFlight = Math.max(this.maxInFlight, this.inFlight);
    await sleep(this.latencyMs);
    this.inFlight -= 1;
    return [snapshot("FundsLocked")];
  }
}

test("start rejects a non-positive interval", () => {
  const monitor = new StatusMonitor();
  assert.throws(() => monitor.start(new CountingSource(), 0, () => undefined), RangeError);
  assert.throws(() => monitor.start(new CountingSource(), Number.NaN, () => undefined), RangeError);
});

test("polls immediately and then once per interval", async () => {
  const monitor = new StatusMonitor();
  const source = new CountingSource();
  const batches: StatusSnapshot[][] = [];

  const handle = monitor.start(source, 40, (snapshots) => {
    batches.push(snapshots);
  });
  await sleep(190);
  handle.stop();
  await handle.done;

  // floor(190 / 40) + 1 polls, give or take one.
  assert.ok(source.calls >= 4 && source.calls <= 6, `unexpected poll count ${source.calls}`);
  assert.equal(batches.length, source.calls);
  assert.equal(handle.polls, source.calls);
  assert.equal(batches[0]?.[0]?.onChainState, null);
  assert.equal(handle.latest?.[0]?.onChainState, "FundsLocked");
});

test("a failing poll is logged and the loop keeps going", async () => {
  const monitor = new StatusMonitor();
  const source = new CountingSource(new Set([1, 2]));
  const received: number[] = [];

  const handle = monitor.start(source, 20, () => {
    received.push(source.calls);
  });
  await sleep(110);
  await monitor.stopAll();

  assert.ok(source.calls >= 4, `unexpected poll count ${source.calls}`);
  assert.equal(received[0], 3);
  assert.equal(handle.polls, source.calls - 2);
});

test("a throwing callback does not stop monitoring", async () => {
  const monitor = new StatusMonitor();
  const source = new CountingSource();
  let invocations = 0;

  const handle = monitor.start(source, 20, async () => {
    invocations += 1;
    throw new Error("consumer failed");
  });
  await sleep(90);
  handle.stop();
  await handle.done;

  assert.ok(invocations >= 3, `unexpected callback count ${invocations}`);
});

test("stop ends the loop and no callback runs afterwards", async () => {
  const monitor = new StatusMonitor();
  const source = new CountingSource();
  let invocations = 0;

  const handle = monitor.start(source, 20, () => {
    invocations += 1;
  });
  await sleep(50);
  handle.stop();
  handle.stop();
  await handle.done;
  const afterStop = invocations;
  await sleep(60);

  assert.equal(handle.active, false);
  assert.equal(invocations, afterStop);
  assert.equal(monitor.handleFor(source), undefined);
});

test("starting a target twice replaces the earlier loop", async () => {
  const first = new StatusMonitor();
  const second = new StatusMonitor();
  const source = new CountingSource();

  const original = first.start(source, 20, () => undefined);
  const replacement = second.start(source, 20, () => undefined);

  assert.equal(original.active, false);
  assert.equal(replacement.active, true);
  assert.equal(first.handleFor(source), replacement);

  await original.done;
  await second.stopAll();
  assert.equal(replacement.active, false);
});

test("payment requests monitor through their context", async () => {
  const service = createFakeEscrowService();
  const context = createEscrowContext(
    { paymentServiceUrl: "https://payments.test", paymentApiKey: "test-secret" },
    { fetcher: service.fetcher }
  );
  const payment = new PaymentRequest(context, {
    agentIdentifier: "agent-summariser",
    identifierFromPurchaser: "abc123def456abc123def456ab",
    inputData: { prompt: "summarise" }
  });
  const { blockchainIdentifier } = await payment.create(
    buildTimeWindows(new Date("2026-03-01T12:00:00.000Z")),
    [{ amount: "1", unit: "lovelace" }]
  );
  service.lockFunds(blockchainIdentifier);
  const seen: string[] = [];

  const handle = payment.startStatusMonitoring((snapshots) => {
    for (const item of snapshots) {
      seen.push(`${item.blockchainIdentifier}:${item.lifecycle}`);
    }
  }, 20);
  await sleep(30);
  payment.stopStatusMonitoring();
  await handle.done;

  assert.equal(seen[0], "escrow_1:FundsLocked");
  assert.equal(handle.active, false);
  assert.equal(context.monitor.handleFor(payment), undefined);
});

test("polls never overlap and a slow callback holds back the next poll", async () => {
  const monitor = new StatusMonitor();
  const source = new SlowSource(10);
  let pollsDuringCallback = 0;
  let invocations = 0;

  const handle = monitor.start(source, 10, async () => {
    invocations += 1;
    const before = source.calls;
    await sleep(60);
    pollsDuringCallback += source.calls - before;
  });
  await sleep(150);
  handle.stop();
  await handle.done;

  // Each cycle takes about 10 + 60 + 10 ms, so 150 ms fits two of them.
  assert.equal(source.maxInFlight, 1);
  assert.equal(pollsDuringCallback, 0);
  assert.ok(source.calls >= 1 && source.calls <= 3, `unexpected poll count ${source.calls}`);
  assert.ok(invocations <= source.calls);
});

test("stopping while a poll is in flight discards its result", async () => {
  const service = createFakeEscrowService({ latencyMs: 40 });
  const context = createEscrowContext(
    { paymentServiceUrl: "https://payments.test", paymentApiKey: "test-secret" },
    { fetcher: service.fetcher }
  );
  const payment = new PaymentRequest(context, {
    agentIdentifier: "agent-summariser",
    identifierFromPurchaser: "abc123def456abc123def456ab",
    inputData: { prompt: "summarise" }
  });
  const { blockchainIdentifier } = await payment.create(
    buildTimeWindows(new Date("2026-03-01T12:00:00.000Z")),
    [{ amount: "1", unit: "lovelace" }]
  );
  service.lockFunds(blockchainIdentifier);
  let invocations = 0;

  const handle = payment.startStatusMonitoring(() => {
    invocations += 1;
  }, 20);
  await sleep(10);
  assert.equal(service.calls.at(-1)?.method, "GET");
  handle.stop();
  await handle.done;
  await sleep(60);

  assert.equal(invocations, 0);
  assert.equal(handle.polls, 0);
  assert.equal(handle.latest, undefined);
  assert.equal(service.calls.filter((call) => call.method === "GET").length, 1);
});
