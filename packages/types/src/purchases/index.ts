import { z } from "zod";
import {
  HexDigestSchema,
  NetworkSchema,
  NextActionSchema,
  NonEmptyStringSchema,
  PurchaserIdentifierSchema,
  successEnvelope
} from "../rest/index.js";
import { AmountSchema } from "../payments/index.js";

/** Next action the service reports right after funds were committed by a buyer. */
export const FUNDS_LOCKING_REQUESTED = "FundsLockingRequested";

const EpochMillisSchema = z.string().regex(/^\d+$/, "must be epoch milliseconds");

export const CreatePurchaseBodySchema = z.object({
  blockchainIdentifier: NonEmptyStringSchema,
  network: NetworkSchema,
  sellerVkey: NonEmptyStringSchema,
  agentIdentifier: NonEmptyStringSchema,
  identifierFromPurchaser: PurchaserIdentifierSchema,
  paymentType: z.string().min(1),
  smartContractAddress: z.string().min(1).optional(),
  payByTime: EpochMillisSchema,
  submitResultTime: EpochMillisSchema,
  unlockTime: EpochMillisSchema,
  externalDisputeUnlockTime: EpochMillisSchema,
  inputHash: HexDigestSchema,
  amounts: z.array(AmountSchema).min(1, "must contain at least one entry").optional(),
  metadata: z.string().optional()
});

export type CreatePurchaseBody = z.infer<typeof CreatePurchaseBodySchema>;

export const CreatedPurchaseSchema = z.object({
  id: z.string().min(1),
  blockchainIdentifier: z.string().optional(),
  onChainState: z.string().nullish(),
  NextAction: NextActionSchema
});

export type CreatedPurchase = z.infer<typeof CreatedPurchaseSchema>;

export const CreatePurchaseResponseSchema = successEnvelope(CreatedPurchaseSchema);

export const PurchaseStatusEntrySchema = z.object({
  id: z.string().optional(),
  blockchainIdentifier: z.string().min(1),
  onChainState: z.string().nullish().transform((value) => value ?? null),
  NextAction: NextActionSchema,
  resultHash: z.string().nullish()
});

export type PurchaseStatusEntry = z.infer<typeof PurchaseStatusEntrySchema>;

export const ListPurchasesResponseSchema = successEnvelope(
  z.object({
    Purchases: z.array(PurchaseStatusEntrySchema)
  })
);

export const RefundBodySchema = z.object({
  blockchainIdentifier: NonEmptyStringSchema,
  network: NetworkSchema
});

export type RefundBody = z.infer<typeof RefundBodySchema>;

export const RefundResponseSchema = successEnvelope(
  z
    .object({
      id: z.string().optional(),
      onChainState: z.string().nullish(),
      NextAction: NextActionSchema.optional()
    })
    .passthrough()
);
