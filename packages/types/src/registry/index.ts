import { z } from "zod";
import { NetworkSchema, successEnvelope } from "../rest/index.js";
import { AmountSchema } from "../payments/index.js";

export const ExampleOutputSchema = z.object({
  name: z.string().min(1),
  url: z.string().url(),
  mimeType: z.string().min(1)
});

export const RegisterAgentBodySchema = z.object({
  network: NetworkSchema,
  name: z.string().min(1),
  description: z.string().optional(),
  apiBaseUrl: z.string().url(),
  sellingWalletVkey: z.string().min(1),
  Tags: z.array(z.string()).min(1),
  ExampleOutputs: z.array(ExampleOutputSchema).default([]),
  Capability: z.object({
    name: z.string().min(1),
    version: z.string().min(1)
  }),
  Author: z.object({
    name: z.string().min(1),
    contactEmail: z.string().optional(),
    organization: z.string().optional()
  }),
  Legal: z
    .object({
      privacyPolicy: z.string().optional(),
      terms: z.string().optional(),
      other: z.string().optional()
    })
    .optional(),
  AgentPricing: z.object({
    pricingType: z.literal("Fixed"),
    Pricing: z.array(AmountSchema).min(1)
  })
});

export type RegisterAgentBody = z.input<typeof RegisterAgentBodySchema>;

export const RegisteredAgentSchema = z
  .object({
    id: z.string().optional(),
    name: z.string(),
    state: z.string().optional(),
    agentIdentifier: z.string().nullish()
  })
  .passthrough();

export const RegisterAgentResponseSchema = successEnvelope(RegisteredAgentSchema);

export const RegistryAssetSchema = z.object({
  name: z.string(),
  state: z.string(),
  agentIdentifier: z.string().nullish()
});

export type RegistryAsset = z.infer<typeof RegistryAssetSchema>;

export const RegistryStatusResponseSchema = successEnvelope(
  z.object({
    Assets: z.array(RegistryAssetSchema)
  })
);

export const PaymentSourcesResponseSchema = successEnvelope(
  z.object({
    PaymentSources: z.array(
      z.object({
        network: NetworkSchema,
        smartContractAddress: z.string().optional(),
        SellingWallets: z.array(
          z.object({
            walletVkey: z.string().min(1),
            walletAddress: z.string().optional()
          })
        )
      })
    )
  })
);
