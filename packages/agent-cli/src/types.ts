import { z } from "zod";
import { NetworkSchema } from "@agent-escrow/types/rest";

export const LOG_LEVELS = ["debug", "info", "warn", "error"] as const;

export const ConfigSchema = z.object({
  paymentServiceUrl: z.string().url().default("http://localhost:3001/api/v1"),
  paymentApiKey: z.string().optional(),
  registryServiceUrl: z.string().url().optional(),
  registryApiKey: z.string().optional(),
  network: NetworkSchema.default("Preprod"),
  paymentContractAddress: z.string().optional(),
  pollIntervalMs: z.number().int().positive().default(10000),
  requestTimeoutMs: z.number().int().positive().default(30000),
  logLevel: z.enum(LOG_LEVELS).default("info")
});

export type Config = z.infer<typeof ConfigSchema>;

/** Flag values layered over the resolved configuration; validated after merging. */
export type ConfigOverrides = Record<string, unknown>;

/** What `config.json` may contain; every key is optional. */
export const ConfigFileSchema = ConfigSchema.partial();

export type ConfigFile = z.infer<typeof ConfigFileSchema>;

export interface PaymentCreateOptions {
  agent: string;
  purchaserId?: string;
  input: string;
  amount: string[];
  payByMinutes?: number;
  submitMinutes?: number;
  metadata?: string;
}

export interface PaymentCompleteOptions {
  output?: string;
  hash?: string;
}

export interface PurchaseCreateOptions {
  blockchainId: string;
  sellerVkey: string;
  agent: string;
  purchaserId: string;
  input: string;
  payBy: string;
  submitBy: string;
  unlockAt: string;
  disputeUntil: string;
  amount?: string[];
  metadata?: string;
}

export interface MonitorOptions {
  interval?: number;
  duration?: number;
}
