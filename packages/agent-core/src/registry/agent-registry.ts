import {
  PaymentSourcesResponseSchema,
  RegisterAgentBodySchema,
  RegisterAgentResponseSchema,
  RegistryStatusResponseSchema,
  type RegisterAgentBody,
  type RegistryAsset
} from "@agent-escrow/types/registry";
import type { EscrowContext } from "../context.js";
import { formatIssues } from "../config.js";
import { ProtocolError, ValidationError } from "../errors.js";
import type { ServiceClient } from "../http/service-client.js";
import type { Logger } from "../logger.js";

/** Agent listing as the caller describes it; wallet and network are filled in here. */
export type AgentListing = Omit<RegisterAgentBody, "network" | "sellingWalletVkey">;

export interface RegisteredAgent {
  name: string;
  state?: string;
  agentIdentifier?: string;
}

export class AgentRegistry {
  private readonly logger: Logger;

  constructor(private readonly context: EscrowContext) {
    this.logger = context.logger.child({ component: "registry" });
  }

  /** Registers a selling agent. Uses the first selling wallet when no key is given. */
  async register(listing: AgentListing, sellingWalletVkey?: string): Promise<RegisteredAgent> {
    const registry = this.requireRegistry();
    const vkey = sellingWalletVkey ?? (await this.sellingWalletVkey());

    const parsed = RegisterAgentBodySchema.safeParse({
      ...listing,
      network: this.context.config.network,
      sellingWalletVkey: vkey
    });
    if (!parsed.success) {
      throw new ValidationError("Invalid agent registration", formatIssues(parsed.error));
    }

    const response = await registry.request("/registry/", {
      method: "POST",
      body: parsed.data,
      schema: RegisterAgentResponseSchema
    });

    this.logger.info({ name: listing.name }, "Agent registration submitted");
    return {
      name: response.data.name,
      state: response.data.state,
      agentIdentifier: response.data.agentIdentifier ?? undefined
    };
  }

  async registrationStatus(sellingWalletVkey: string): Promise<RegistryAsset[]> {
    const registry = this.requireRegistry();
    if (sellingWalletVkey.trim().length === 0) {
      throw new ValidationError("Invalid registry lookup", ["walletVKey must not be empty"]);
    }

    const response = await registry.request("/registry/", {
      query: { walletVKey: sellingWalletVkey, network: this.context.config.network },
      schema: RegistryStatusResponseSchema
    });
    return response.data.Assets;
  }

  async findRegistration(name: string, sellingWalletVkey: string): Promise<RegistryAsset | undefined> {
    const assets = await this.registrationStatus(sellingWalletVkey);
    return assets.find((asset) => asset.name === name);
  }

  async sellingWalletVkey(): Promise<string> {
    const response = await this.context.paymentService.request("/payment-source/", {
      schema: PaymentSourcesResponseSchema
    });
    const source = response.data.PaymentSources.find(
      (candidate) => candidate.network === this.context.config.network
    );
    const wallet = source?.SellingWallets[0];
    if (!wallet) {
      throw new ProtocolError(
        `No selling wallet is configured for ${this.context.config.network}`,
        { details: { sources: response.data.PaymentSources.length } }
      );
    }
    return wallet.walletVkey;
  }

  private requireRegistry(): ServiceClient {
    if (!this.context.registryService) {
      throw new ValidationError("Registry service is not configured", [
        "registryServiceUrl and registryApiKey are required for registry calls"
      ]);
    }
    return this.context.registryService;
  }
}
