import { PaymentRequest, type MonitorHandle } from "@agent-escrow/core";
import type { CliRuntime } from "../runtime.js";
import type { MonitorOptions } from "../types.js";
import { formatSnapshot, header, keyValue } from "../utils/formatting.js";

const STOP_SIGNALS = ["SIGINT", "SIGTERM"] as const;

/** Resolves after `durationMs`, or on SIGINT/SIGTERM when no duration is set. */
function waitForStop(durationMs: number | undefined): Promise<void> {
  return new Promise((resolve) => {
    const finish = () => {
      clearTimeout(timer);
      for (const signal of STOP_SIGNALS) {
        process.off(signal, finish);
      }
      resolve();
    };
    const timer = durationMs === undefined ? undefined : setTimeout(finish, durationMs);
    for (const signal of STOP_SIGNALS) {
      process.once(signal, finish);
    }
  });
}

export async function monitorCommand(
  runtime: CliRuntime,
  ids: string[],
  options: MonitorOptions
): Promise<MonitorHandle> {
  const payment = PaymentRequest.tracking(runtime.escrow, ids);
  const intervalMs = options.interval ?? runtime.config.pollIntervalMs;

  runtime.print(header("Monitoring Payments"));
  runtime.print(keyValue("Interval", `${intervalMs}ms`));

  const handle = payment.startStatusMonitoring((snapshots) => {
    for (const snapshot of snapshots) {
      runtime.print(formatSnapshot(snapshot));
    }
  }, intervalMs);

  await waitForStop(options.duration);
  payment.stopStatusMonitoring();
  await handle.done;

  runtime.print(keyValue("Polls", String(handle.polls)));
  return handle;
}
