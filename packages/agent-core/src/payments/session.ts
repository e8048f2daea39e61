import type { Amount } from "@agent-escrow/types/payments";
import type { HexDigest } from "../hashing/content-hash.js";
import type { PaymentReceipt } from "./payment-request.js";
import type { CompleteTimeWindows } from "./time-windows.js";

/**
 * Terms of one escrow payment as agreed between seller and buyer. Built from
 * the seller's creation receipt and handed to the buyer's purchase.
 */
export interface EscrowSession {
  readonly agentIdentifier: string;
  readonly blockchainIdentifier: string;
  readonly identifierFromPurchaser: string;
  readonly inputHash: HexDigest;
  readonly timeWindows: Readonly<CompleteTimeWindows>;
  readonly amounts: readonly Readonly<Amount>[];
  readonly sellerVerificationKey?: string;
}

export function sessionFromReceipt(
  receipt: PaymentReceipt,
  sellerVerificationKey: string | undefined = receipt.sellerVerificationKey
): EscrowSession {
  return Object.freeze({
    agentIdentifier: receipt.agentIdentifier,
    blockchainIdentifier: receipt.blockchainIdentifier,
    identifierFromPurchaser: receipt.identifierFromPurchaser,
    inputHash: receipt.inputHash,
    timeWindows: Object.freeze({ ...receipt.timeWindows }),
    amounts: Object.freeze(receipt.amounts.map((amount) => Object.freeze({ ...amount }))),
    sellerVerificationKey
  });
}
