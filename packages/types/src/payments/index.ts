import { z } from "zod";
import {
  HexDigestSchema,
  NetworkSchema,
  NextActionSchema,
  NonEmptyStringSchema,
  PurchaserIdentifierSchema,
  TimestampSchema,
  successEnvelope
} from "../rest/index.js";

export const PAYMENT_LIFECYCLE_STATES = [
  "Created",
  "Requested",
  "FundsLocked",
  "ResultSubmitted",
  "Completed",
  "Disputed",
  "Expired"
] as const;

export type PaymentLifecycleState = (typeof PAYMENT_LIFECYCLE_STATES)[number];

export const TERMINAL_LIFECYCLE_STATES: readonly PaymentLifecycleState[] = [
  "Completed",
  "Disputed",
  "Expired"
];

export const AmountSchema = z.object({
  amount: z.string().regex(/^\d+$/, "must be a non-negative integer"),
  unit: z.string()
});

export type Amount = z.infer<typeof AmountSchema>;

const WireAmountSchema = z.object({
  amount: z.union([z.string().regex(/^\d+$/), z.number().int().nonnegative()]).transform(String),
  unit: z.string()
});

export const CreatePaymentBodySchema = z.object({
  agentIdentifier: NonEmptyStringSchema,
  network: NetworkSchema,
  paymentContractAddress: z.string().min(1).optional(),
  amounts: z.array(AmountSchema).min(1, "must contain at least one entry"),
  paymentType: z.string().min(1),
  payByTime: z.string(),
  submitResultTime: z.string(),
  unlockTime: z.string().optional(),
  externalDisputeUnlockTime: z.string().optional(),
  inputHash: HexDigestSchema,
  identifierFromPurchaser: PurchaserIdentifierSchema,
  metadata: z.string().optional()
});

export type CreatePaymentBody = z.infer<typeof CreatePaymentBodySchema>;

export const CreatedPaymentSchema = z.object({
  id: z.string().optional(),
  blockchainIdentifier: z.string().min(1),
  inputHash: HexDigestSchema,
  payByTime: TimestampSchema.optional(),
  submitResultTime: TimestampSchema,
  unlockTime: TimestampSchema,
  externalDisputeUnlockTime: TimestampSchema,
  onChainState: z.string().nullish(),
  NextAction: NextActionSchema.optional(),
  RequestedFunds: z.array(WireAmountSchema).optional(),
  SmartContractWallet: z.object({ walletVkey: z.string() }).nullish()
});

export type CreatedPayment = z.infer<typeof CreatedPaymentSchema>;

export const CreatePaymentResponseSchema = successEnvelope(CreatedPaymentSchema);

export const PaymentStatusEntrySchema = z.object({
  id: z.string().optional(),
  blockchainIdentifier: z.string().min(1),
  onChainState: z.string().nullish().transform((value) => value ?? null),
  NextAction: NextActionSchema,
  resultHash: z.string().nullish(),
  inputHash: z.string().nullish(),
  updatedAt: TimestampSchema.optional()
});

export type PaymentStatusEntry = z.infer<typeof PaymentStatusEntrySchema>;

export const ListPaymentsResponseSchema = successEnvelope(
  z.object({
    Payments: z.array(PaymentStatusEntrySchema)
  })
);

export const SubmitResultBodySchema = z.object({
  network: NetworkSchema,
  paymentContractAddress: z.string().min(1).optional(),
  hash: HexDigestSchema,
  identifier: NonEmptyStringSchema
});

export type SubmitResultBody = z.infer<typeof SubmitResultBodySchema>;

export const SubmitResultResponseSchema = successEnvelope(
  z
    .object({
      blockchainIdentifier: z.string().optional(),
      onChainState: z.string().nullish(),
      NextAction: NextActionSchema.optional()
    })
    .passthrough()
);
