import { existsSync, readFileSync, writeFileSync } from "fs";
import { ValidationError, formatIssues, type EscrowClientConfigInput } from "@agent-escrow/core";
import { ConfigFileSchema, ConfigSchema, type Config, type ConfigFile, type ConfigOverrides } from "./types.js";
import { ensureHomeDir, getConfigFilePath } from "./home.js";

const ENV_MAPPINGS: Record<string, keyof Config> = {
  AGENT_ESCROW_PAYMENT_URL: "paymentServiceUrl",
  AGENT_ESCROW_PAYMENT_KEY: "paymentApiKey",
  AGENT_ESCROW_REGISTRY_URL: "registryServiceUrl",
  AGENT_ESCROW_REGISTRY_KEY: "registryApiKey",
  AGENT_ESCROW_NETWORK: "network",
  AGENT_ESCROW_CONTRACT_ADDRESS: "paymentContractAddress",
  AGENT_ESCROW_POLL_INTERVAL_MS: "pollIntervalMs",
  AGENT_ESCROW_REQUEST_TIMEOUT_MS: "requestTimeoutMs",
  AGENT_ESCROW_LOG_LEVEL: "logLevel"
};

const NUMERIC_KEYS: ReadonlySet<keyof Config> = new Set(["pollIntervalMs", "requestTimeoutMs"]);

function loadConfigFile(): ConfigFile | null {
  const path = getConfigFilePath();
  if (!existsSync(path)) {
    return null;
  }

  let raw: unknown;
  try {
    raw = JSON.parse(readFileSync(path, "utf-8"));
  } catch (error) {
    throw new ValidationError(`Config file ${path} is not valid JSON`, [], { cause: error });
  }

  const parsed = ConfigFileSchema.safeParse(raw);
  if (!parsed.success) {
    throw new ValidationError(`Config file ${path} is invalid`, formatIssues(parsed.error));
  }
  return parsed.data;
}

function loadEnvConfig(): Record<string, unknown> {
  const config: Record<string, unknown> = {};

  for (const [envKey, configKey] of Object.entries(ENV_MAPPINGS)) {
    const value = process.env[envKey];
    if (value === undefined || value === "") continue;

    if (NUMERIC_KEYS.has(configKey)) {
      const parsed = parseInt(value, 10);
      if (!Number.isNaN(parsed)) {
        config[configKey] = parsed;
      }
    } else {
      config[configKey] = value;
    }
  }

  return config;
}

/** Defaults < config file < environment < CLI flags. */
export function resolveConfig(cliOverrides: ConfigOverrides = {}): Config {
  const merged: Record<string, unknown> = { ...ConfigSchema.parse({}) };

  for (const layer of [loadConfigFile() ?? {}, loadEnvConfig(), cliOverrides]) {
    for (const [key, value] of Object.entries(layer)) {
      if (value !== undefined) {
        merged[key] = value;
      }
    }
  }

  const parsed = ConfigSchema.safeParse(merged);
  if (!parsed.success) {
    throw new ValidationError("Invalid configuration", formatIssues(parsed.error));
  }
  return parsed.data;
}

export function saveConfigFile(config: ConfigFile): void {
  ensureHomeDir();
  const existing = loadConfigFile() ?? {};
  const merged = { ...existing, ...config };
  writeFileSync(getConfigFilePath(), JSON.stringify(merged, null, 2), { mode: 0o600 });
}

export function getConfigPath(): string {
  return getConfigFilePath();
}

export function toClientConfig(config: Config): EscrowClientConfigInput {
  return {
    paymentServiceUrl: config.paymentServiceUrl,
    paymentApiKey: config.paymentApiKey ?? "",
    registryServiceUrl: config.registryServiceUrl,
    registryApiKey: config.registryApiKey,
    network: config.network,
    paymentContractAddress: config.paymentContractAddress,
    requestTimeoutMs: config.requestTimeoutMs
  };
}
