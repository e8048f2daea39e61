import chalk from "chalk";
import type { Amount } from "@agent-escrow/types/payments";
import type { StatusSnapshot } from "@agent-escrow/core";

export function formatIdentifier(identifier: string): string {
  if (identifier.length < 24) return identifier;
  return `${identifier.slice(0, 12)}...${identifier.slice(-8)}`;
}

export function formatAmounts(amounts: readonly Amount[]): string {
  return amounts.map(({ amount, unit }) => `${amount} ${unit || "lovelace"}`).join(", ");
}

/** Parses `quantity:unit` (unit optional) as given on the command line. */
export function parseAmountArgument(value: string): Amount {
  const [amount = "", unit = ""] = value.split(":", 2);
  return { amount: amount.trim(), unit: unit.trim() };
}

export function maskSecret(value: string | undefined): string {
  if (!value) return "(not set)";
  if (value.length <= 4) return "****";
  return `${value.slice(0, 4)}****`;
}

export function formatTime(value: Date): string {
  return value.toISOString();
}

export function formatSnapshot(snapshot: StatusSnapshot): string {
  const state = snapshot.onChainState ?? "pending";
  const parts = [
    formatIdentifier(snapshot.blockchainIdentifier),
    chalk.cyan(snapshot.lifecycle),
    chalk.dim(`onChain=${state}`),
    chalk.dim(`next=${snapshot.nextAction.requestedAction}`)
  ];
  if (snapshot.nextAction.errorType) {
    parts.push(chalk.red(`error=${snapshot.nextAction.errorType}`));
  }
  return parts.join("  ");
}

export function header(title: string): string {
  return chalk.bold.blue(`═══ ${title} ═══`);
}

export function keyValue(key: string, value: string): string {
  return `  ${chalk.dim(key)}: ${chalk.white(value)}`;
}

export function success(message: string): string {
  return chalk.green(`  ✓ ${message}`);
}

export function failure(message: string): string {
  return chalk.red(`  ✗ ${message}`);
}

export function warning(message: string): string {
  return chalk.yellow(`  ⚠ ${message}`);
}
