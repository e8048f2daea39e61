import {
  DEFAULT_TIME_WINDOW_OFFSETS,
  PaymentRequest,
  ValidationError,
  buildTimeWindows,
  generatePurchaserIdentifier,
  outputHashOf,
  type CompletionReceipt,
  type PaymentReceipt,
  type StatusBatch,
  type TimeWindowOffsets
} from "@agent-escrow/core";
import type { CliRuntime } from "../runtime.js";
import type { PaymentCompleteOptions, PaymentCreateOptions } from "../types.js";
import {
  formatAmounts,
  formatSnapshot,
  formatTime,
  header,
  keyValue,
  parseAmountArgument,
  success,
  warning
} from "../utils/formatting.js";
import { parseJsonArgument } from "./hash.js";

export function offsetsFor(options: Pick<PaymentCreateOptions, "payByMinutes" | "submitMinutes">): TimeWindowOffsets {
  const defaults = DEFAULT_TIME_WINDOW_OFFSETS;
  const submitResultMinutes = options.submitMinutes ?? defaults.submitResultMinutes;
  const unlockMinutes = submitResultMinutes + (defaults.unlockMinutes - defaults.submitResultMinutes);
  return {
    payByMinutes: options.payByMinutes ?? defaults.payByMinutes,
    submitResultMinutes,
    unlockMinutes,
    externalDisputeUnlockMinutes:
      unlockMinutes + (defaults.externalDisputeUnlockMinutes - defaults.unlockMinutes)
  };
}

export async function paymentCreateCommand(
  runtime: CliRuntime,
  options: PaymentCreateOptions,
  now: Date = new Date()
): Promise<PaymentReceipt> {
  const payment = new PaymentRequest(runtime.escrow, {
    agentIdentifier: options.agent,
    identifierFromPurchaser: options.purchaserId ?? generatePurchaserIdentifier(),
    inputData: parseJsonArgument(options.input, "--input"),
    metadata: options.metadata
  });

  const spinner = runtime.spinner("Creating payment request...");
  let receipt: PaymentReceipt;
  try {
    receipt = await payment.create(buildTimeWindows(now, offsetsFor(options)), options.amount.map(parseAmountArgument));
  } catch (error) {
    spinner.fail("Payment request failed");
    throw error;
  }
  spinner.succeed("Payment request created");

  runtime.print(header("Payment Request"));
  runtime.print(keyValue("Blockchain ID", receipt.blockchainIdentifier));
  runtime.print(keyValue("Purchaser ID", receipt.identifierFromPurchaser));
  runtime.print(keyValue("Input hash", receipt.inputHash));
  runtime.print(keyValue("Amounts", formatAmounts(receipt.amounts)));
  runtime.print(keyValue("Pay by", formatTime(receipt.timeWindows.payByTime)));
  runtime.print(keyValue("Submit result by", formatTime(receipt.timeWindows.submitResultTime)));
  runtime.print(keyValue("Unlock at", formatTime(receipt.timeWindows.unlockTime)));
  runtime.print(keyValue("Dispute until", formatTime(receipt.timeWindows.externalDisputeUnlockTime)));
  if (receipt.sellerVerificationKey) {
    runtime.print(keyValue("Seller vkey", receipt.sellerVerificationKey));
  }
  return receipt;
}

export async function paymentStatusCommand(runtime: CliRuntime, ids: string[]): Promise<StatusBatch> {
  const payment = PaymentRequest.tracking(runtime.escrow, ids);
  const batch = await payment.checkStatuses();

  runtime.print(header("Payment Status"));
  for (const snapshot of batch.snapshots) {
    runtime.print(formatSnapshot(snapshot));
  }
  for (const id of batch.missing) {
    runtime.print(warning(`${id} is not listed by the payment service`));
  }
  return batch;
}

export async function paymentCompleteCommand(
  runtime: CliRuntime,
  blockchainIdentifier: string,
  options: PaymentCompleteOptions
): Promise<CompletionReceipt> {
  if ((options.output === undefined) === (options.hash === undefined)) {
    throw new ValidationError("Invalid completion", ["pass exactly one of --output or --hash"]);
  }
  const outputHash =
    options.hash ?? outputHashOf(parseJsonArgument(options.output ?? "", "--output"));

  const payment = PaymentRequest.tracking(runtime.escrow, [blockchainIdentifier]);
  const receipt = await payment.complete(blockchainIdentifier, outputHash);

  runtime.print(success(`Result submitted for ${blockchainIdentifier}`));
  runtime.print(keyValue("Result hash", receipt.resultHash));
  return receipt;
}
