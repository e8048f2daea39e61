import { z } from "zod";
import { NetworkSchema } from "@agent-escrow/types/rest";
import { ValidationError } from "./errors.js";

const ServiceUrlSchema = z
  .string()
  .url()
  .refine((value) => /^https?:\/\//.test(value), "must be an http(s) URL")
  .transform((value) => value.replace(/\/+$/, ""));

export const EscrowClientConfigSchema = z
  .object({
    paymentServiceUrl: ServiceUrlSchema,
    paymentApiKey: z.string().min(1),
    registryServiceUrl: ServiceUrlSchema.optional(),
    registryApiKey: z.string().min(1).optional(),
    network: NetworkSchema.default("Preprod"),
    paymentContractAddress: z.string().min(1).optional(),
    paymentType: z.string().min(1).default("Web3CardanoV1"),
    requestTimeoutMs: z.number().int().positive().default(30_000)
  })
  .superRefine((data, ctx) => {
    if (data.registryServiceUrl && !data.registryApiKey) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ["registryApiKey"],
        message: "registryApiKey is required when registryServiceUrl is set"
      });
    }
  });

export type EscrowClientConfig = z.infer<typeof EscrowClientConfigSchema>;
export type EscrowClientConfigInput = z.input<typeof EscrowClientConfigSchema>;

export function parseEscrowClientConfig(input: EscrowClientConfigInput): EscrowClientConfig {
  const parsed = EscrowClientConfigSchema.safeParse(input);
  if (!parsed.success) {
    throw new ValidationError("Invalid escrow client configuration", formatIssues(parsed.error));
  }
  return parsed.data;
}

export function formatIssues(error: z.ZodError): string[] {
  return error.issues.map((issue) => {
    const path = issue.path.join(".");
    return path ? `${path}: ${issue.message}` : issue.message;
  });
}
