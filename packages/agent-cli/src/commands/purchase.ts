import { TimestampSchema } from "@agent-escrow/types/rest";
import {
  PurchaseRequest,
  StateError,
  ValidationError,
  findPurchaseStatus,
  submitRefundAction,
  type PurchaseReceipt,
  type RefundAction,
  type RefundReceipt
} from "@agent-escrow/core";
import type { CliRuntime } from "../runtime.js";
import type { PurchaseCreateOptions } from "../types.js";
import { formatSnapshot, header, keyValue, parseAmountArgument, success } from "../utils/formatting.js";
import { parseJsonArgument } from "./hash.js";

/** Accepts ISO-8601 or epoch milliseconds, the forms the seller hands out. */
export function parseTimeArgument(value: string, flag: string): Date {
  const parsed = TimestampSchema.safeParse(value);
  if (!parsed.success) {
    throw new ValidationError("Invalid time", [`${flag} must be an ISO-8601 time or epoch milliseconds`]);
  }
  return parsed.data;
}

export async function purchaseCreateCommand(
  runtime: CliRuntime,
  options: PurchaseCreateOptions
): Promise<PurchaseReceipt> {
  const purchase = new PurchaseRequest(runtime.escrow, {
    blockchainIdentifier: options.blockchainId,
    sellerVerificationKey: options.sellerVkey,
    agentIdentifier: options.agent,
    identifierFromPurchaser: options.purchaserId,
    timeWindows: {
      payByTime: parseTimeArgument(options.payBy, "--pay-by"),
      submitResultTime: parseTimeArgument(options.submitBy, "--submit-by"),
      unlockTime: parseTimeArgument(options.unlockAt, "--unlock-at"),
      externalDisputeUnlockTime: parseTimeArgument(options.disputeUntil, "--dispute-until")
    },
    inputData: parseJsonArgument(options.input, "--input"),
    amounts: options.amount?.map(parseAmountArgument),
    metadata: options.metadata
  });

  const spinner = runtime.spinner("Creating purchase...");
  let receipt: PurchaseReceipt;
  try {
    receipt = await purchase.create();
  } catch (error) {
    spinner.fail("Purchase failed");
    throw error;
  }
  spinner.succeed("Purchase created, funds locking requested");

  runtime.print(header("Purchase"));
  runtime.print(keyValue("Purchase ID", receipt.purchaseId));
  runtime.print(keyValue("Blockchain ID", receipt.blockchainIdentifier));
  runtime.print(keyValue("Input hash", receipt.inputHash));
  runtime.print(keyValue("Next action", receipt.nextAction.requestedAction));
  return receipt;
}

/**
 * Refund actions for a purchase made by an earlier run. The service must list
 * the purchase; an unknown identifier never reaches the refund endpoint.
 */
export async function purchaseRefundCommand(
  runtime: CliRuntime,
  blockchainIdentifier: string,
  action: RefundAction
): Promise<RefundReceipt> {
  const status = await findPurchaseStatus(runtime.escrow, blockchainIdentifier);
  if (!status) {
    throw new StateError(`No purchase ${blockchainIdentifier} to refund`);
  }
  runtime.print(formatSnapshot(status));

  const receipt = await submitRefundAction(runtime.escrow, blockchainIdentifier, action);
  runtime.print(
    success(action === "request" ? "Refund requested" : "Refund request cancelled")
  );
  runtime.print(keyValue("On-chain state", receipt.onChainState ?? "pending"));
  return receipt;
}
