import { z } from "zod";

export type ErrorKind =
  | "validation"
  | "auth"
  | "client"
  | "server"
  | "protocol"
  | "state"
  | "transport";

export type Network = "Preprod" | "Mainnet";

export const NetworkSchema = z.enum(["Preprod", "Mainnet"]);

export const NonEmptyStringSchema = z
  .string()
  .refine((value) => value.trim().length > 0, "must not be empty");

export const HexDigestSchema = z
  .string()
  .regex(/^[0-9a-f]{64}$/, "must be 64 lowercase hexadecimal characters");

export const PurchaserIdentifierSchema = z
  .string()
  .regex(/^[0-9a-fA-F]{15,26}$/, "must be 15-26 hexadecimal characters");

/**
 * Wire timestamps arrive either as ISO-8601 strings or as epoch milliseconds
 * (number or decimal string). All of them parse to a Date.
 */
export const TimestampSchema = z.union([z.string(), z.number()]).transform((value, ctx) => {
  const millis =
    typeof value === "number" || /^\d+$/.test(value) ? Number(value) : Date.parse(value);
  if (!Number.isFinite(millis)) {
    ctx.addIssue({ code: z.ZodIssueCode.custom, message: `invalid timestamp: ${String(value)}` });
    return z.NEVER;
  }
  return new Date(millis);
});

export const NextActionSchema = z.object({
  requestedAction: z.string(),
  errorType: z.string().nullish(),
  errorNote: z.string().nullish()
});

export type NextAction = z.infer<typeof NextActionSchema>;

export function successEnvelope<T extends z.ZodTypeAny>(data: T) {
  return z.object({
    status: z.literal("success"),
    data
  });
}

export const ServiceErrorBodySchema = z.object({
  status: z.string().optional(),
  message: z.string().optional(),
  error: z
    .union([
      z.string(),
      z.object({
        message: z.string().optional()
      })
    ])
    .optional()
});

export type ServiceErrorBody = z.infer<typeof ServiceErrorBodySchema>;

export function serviceErrorMessage(body: ServiceErrorBody): string | undefined {
  if (typeof body.error === "string") return body.error;
  return body.error?.message ?? body.message;
}
