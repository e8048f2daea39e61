#!/usr/bin/env node
import { Command, InvalidArgumentError } from "commander";
import { config as loadEnv } from "dotenv";
import chalk from "chalk";
import { describeError, isEscrowError } from "@agent-escrow/core";
import { getConfigPath, resolveConfig } from "./config.js";
import { createRuntime } from "./runtime.js";
import type { ConfigOverrides, MonitorOptions, PaymentCompleteOptions, PaymentCreateOptions, PurchaseCreateOptions } from "./types.js";
import { hashCommand } from "./commands/hash.js";
import { paymentCompleteCommand, paymentCreateCommand, paymentStatusCommand } from "./commands/payment.js";
import { purchaseCreateCommand, purchaseRefundCommand } from "./commands/purchase.js";
import { monitorCommand } from "./commands/monitor.js";
import { configCommand, configSetCommand } from "./commands/config.js";
import { failure } from "./utils/formatting.js";

const VERSION = "0.1.0";

loadEnv();

function parsePositiveInt(value: string): number {
  const parsed = parseInt(value, 10);
  if (Number.isNaN(parsed) || parsed <= 0) {
    throw new InvalidArgumentError("Not a positive integer.");
  }
  return parsed;
}

function collect(value: string, previous: string[] = []): string[] {
  return [...previous, value];
}

async function run(action: () => Promise<unknown> | unknown): Promise<void> {
  try {
    await action();
  } catch (error) {
    const label = isEscrowError(error) ? error.kind : "error";
    console.error(failure(`${chalk.bold(label)} ${describeError(error)}`));
    process.exit(1);
  }
}

const program = new Command();

program
  .name("escrow-agent")
  .description("Escrow payments between AI agents: sell, buy, monitor and complete")
  .version(VERSION)
  .option("--payment-url <url>", "Payment service base URL")
  .option("--network <network>", "Preprod or Mainnet")
  .option("--log-level <level>", "debug, info, warn or error");

function overrides(): ConfigOverrides {
  const options = program.opts<{ paymentUrl?: string; network?: string; logLevel?: string }>();
  const raw: Record<string, unknown> = {
    paymentServiceUrl: options.paymentUrl,
    network: options.network,
    logLevel: options.logLevel
  };
  return Object.fromEntries(Object.entries(raw).filter(([, value]) => value !== undefined));
}

program
  .command("hash [json]")
  .description("Print the content hash of a JSON document")
  .option("-f, --file <path>", "Read the JSON document from a file")
  .action(async (json: string | undefined, options: { file?: string }) => {
    await run(() => hashCommand(json, options, (line) => console.log(line)));
  });

const payment = program.command("payment").description("Seller side: payment requests");

payment
  .command("create")
  .description("Create a payment request for a purchaser")
  .requiredOption("--agent <id>", "Agent identifier")
  .requiredOption("--input <json>", "Purchaser input data as JSON")
  .requiredOption("--amount <qty:unit>", "Price, repeatable", collect)
  .option("--purchaser-id <hex>", "Purchaser identifier (generated when omitted)")
  .option("--pay-by-minutes <n>", "Minutes until payment is due", parsePositiveInt)
  .option("--submit-minutes <n>", "Minutes until the result is due", parsePositiveInt)
  .option("--metadata <text>", "Free-form metadata")
  .action(async (options: PaymentCreateOptions) => {
    await run(() => paymentCreateCommand(createRuntime(overrides()), options));
  });

payment
  .command("status <ids...>")
  .description("Show the escrow status of payments")
  .action(async (ids: string[]) => {
    await run(() => paymentStatusCommand(createRuntime(overrides()), ids));
  });

payment
  .command("complete <blockchainId>")
  .description("Submit the result hash for a payment")
  .option("--output <json>", "Result as JSON, hashed before submission")
  .option("--hash <hex>", "Precomputed result hash")
  .action(async (blockchainId: string, options: PaymentCompleteOptions) => {
    await run(() => paymentCompleteCommand(createRuntime(overrides()), blockchainId, options));
  });

const purchase = program.command("purchase").description("Buyer side: purchases and refunds");

purchase
  .command("create")
  .description("Lock funds for a seller's payment request")
  .requiredOption("--blockchain-id <id>", "Blockchain identifier from the seller")
  .requiredOption("--seller-vkey <vkey>", "Seller verification key")
  .requiredOption("--agent <id>", "Agent identifier")
  .requiredOption("--purchaser-id <hex>", "Purchaser identifier")
  .requiredOption("--input <json>", "Input data as JSON")
  .requiredOption("--pay-by <time>", "Payment deadline")
  .requiredOption("--submit-by <time>", "Result deadline")
  .requiredOption("--unlock-at <time>", "Unlock time")
  .requiredOption("--dispute-until <time>", "External dispute unlock time")
  .option("--amount <qty:unit>", "Amount, repeatable", collect)
  .option("--metadata <text>", "Free-form metadata")
  .action(async (options: PurchaseCreateOptions) => {
    await run(() => purchaseCreateCommand(createRuntime(overrides()), options));
  });

purchase
  .command("refund <blockchainId>")
  .description("Request a refund for a purchase")
  .action(async (blockchainId: string) => {
    await run(() => purchaseRefundCommand(createRuntime(overrides()), blockchainId, "request"));
  });

purchase
  .command("cancel-refund <blockchainId>")
  .description("Withdraw a refund request")
  .action(async (blockchainId: string) => {
    await run(() => purchaseRefundCommand(createRuntime(overrides()), blockchainId, "cancel"));
  });

program
  .command("monitor <ids...>")
  .description("Poll payment status until interrupted")
  .option("-i, --interval <ms>", "Poll interval in milliseconds", parsePositiveInt)
  .option("-d, --duration <ms>", "Stop after this many milliseconds", parsePositiveInt)
  .action(async (ids: string[], options: MonitorOptions) => {
    await run(() => monitorCommand(createRuntime(overrides()), ids, options));
  });

const config = program.command("config").description("Show or change the saved configuration");

config
  .command("show", { isDefault: true })
  .description("Show current configuration")
  .action(async () => {
    await run(() => configCommand(resolveConfig(overrides()), getConfigPath(), (line) => console.log(line)));
  });

config
  .command("set <key> <value>")
  .description("Save a setting to the config file")
  .action(async (key: string, value: string) => {
    await run(() => configSetCommand(key, value, getConfigPath(), (line) => console.log(line)));
  });

program.parseAsync().catch((error: unknown) => {
  console.error(failure(describeError(error)));
  process.exit(1);
});
