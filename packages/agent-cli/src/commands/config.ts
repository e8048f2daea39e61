import chalk from "chalk";
import { ValidationError, formatIssues } from "@agent-escrow/core";
import { saveConfigFile } from "../config.js";
import { ConfigFileSchema, ConfigSchema, type Config, type ConfigFile } from "../types.js";
import { header, keyValue, maskSecret, success } from "../utils/formatting.js";

const SECRET_KEYS: ReadonlySet<string> = new Set(["paymentApiKey", "registryApiKey"]);
const NUMERIC_KEYS: ReadonlySet<string> = new Set(["pollIntervalMs", "requestTimeoutMs"]);

function display(key: string, value: unknown): string {
  return SECRET_KEYS.has(key)
    ? maskSecret(typeof value === "string" ? value : undefined)
    : String(value ?? "(not set)");
}

export function configCommand(config: Config, configPath: string, print: (line: string) => void): void {
  print(header("Current Configuration"));
  for (const key of ConfigSchema.keyof().options) {
    print(keyValue(key, display(key, config[key])));
  }
  print("");
  print(chalk.dim(`Config file: ${configPath}`));
  print(chalk.dim("Precedence: CLI flags > Environment variables > Config file > Defaults"));
}

/** Validates one setting and merges it into the config file. */
export function configSetCommand(
  key: string,
  value: string,
  configPath: string,
  print: (line: string) => void
): ConfigFile {
  const known = ConfigSchema.keyof().safeParse(key);
  if (!known.success) {
    throw new ValidationError("Unknown config key", [
      `${key} is not one of ${ConfigSchema.keyof().options.join(", ")}`
    ]);
  }

  const parsed = ConfigFileSchema.safeParse({
    [known.data]: NUMERIC_KEYS.has(known.data) ? Number(value) : value
  });
  if (!parsed.success) {
    throw new ValidationError(`Invalid value for ${known.data}`, formatIssues(parsed.error));
  }

  saveConfigFile(parsed.data);
  print(success(`Saved ${known.data}`));
  print(keyValue(known.data, display(known.data, parsed.data[known.data])));
  print(chalk.dim(`Config file: ${configPath}`));
  return parsed.data;
}
