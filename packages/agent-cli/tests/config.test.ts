import { describe, it, beforeEach, afterEach } from "node:test";
import assert from "node:assert";
import { existsSync, mkdirSync, readFileSync, rmSync, statSync, writeFileSync } from "fs";
import { join } from "path";
import { tmpdir } from "os";
import { stripVTControlCharacters } from "util";
import { isEscrowError } from "@agent-escrow/core";
import { getConfigPath, resolveConfig, saveConfigFile, toClientConfig } from "../src/config.js";
import { configSetCommand } from "../src/commands/config.js";

const TEST_DIR = join(tmpdir(), "agent-escrow-config-test-" + Date.now());

const ENV_KEYS = [
  "AGENT_ESCROW_HOME",
  "AGENT_ESCROW_PAYMENT_URL",
  "AGENT_ESCROW_PAYMENT_KEY",
  "AGENT_ESCROW_NETWORK",
  "AGENT_ESCROW_POLL_INTERVAL_MS",
  "AGENT_ESCROW_LOG_LEVEL"
];

describe("Config Module", () => {
  const originalEnv: Record<string, string | undefined> = {};

  beforeEach(() => {
    for (const key of ENV_KEYS) {
      originalEnv[key] = process.env[key];
      delete process.env[key];
    }
    process.env.AGENT_ESCROW_HOME = TEST_DIR;
    rmSync(TEST_DIR, { recursive: true, force: true });
    mkdirSync(TEST_DIR, { recursive: true });
  });

  afterEach(() => {
    rmSync(TEST_DIR, { recursive: true, force: true });
    for (const [key, value] of Object.entries(originalEnv)) {
      if (value === undefined) {
        delete process.env[key];
      } else {
        process.env[key] = value;
      }
    }
  });

  it("should return default config values", () => {
    const config = resolveConfig();

    assert.equal(config.paymentServiceUrl, "http://localhost:3001/api/v1");
    assert.equal(config.network, "Preprod");
    assert.equal(config.pollIntervalMs, 10000);
    assert.equal(config.logLevel, "info");
    assert.equal(config.paymentApiKey, undefined);
  });

  it("should layer file < env < CLI overrides", () => {
    writeFileSync(
      join(TEST_DIR, "config.json"),
      JSON.stringify({ paymentServiceUrl: "https://file.test", paymentApiKey: "test-file-key", pollIntervalMs: 500 })
    );
    process.env.AGENT_ESCROW_PAYMENT_URL = "https://env.test";
    process.env.AGENT_ESCROW_NETWORK = "Mainnet";

    const config = resolveConfig({ network: "Preprod" });

    assert.equal(config.paymentServiceUrl, "https://env.test");
    assert.equal(config.paymentApiKey, "test-file-key");
    assert.equal(config.pollIntervalMs, 500);
    assert.equal(config.network, "Preprod");
  });

  it("should ignore non-numeric numeric env values", () => {
    process.env.AGENT_ESCROW_POLL_INTERVAL_MS = "often";

    assert.equal(resolveConfig().pollIntervalMs, 10000);

    process.env.AGENT_ESCROW_POLL_INTERVAL_MS = "2500";
    assert.equal(resolveConfig().pollIntervalMs, 2500);
  });

  it("should reject an invalid merged value", () => {
    process.env.AGENT_ESCROW_LOG_LEVEL = "loud";

    assert.throws(() => resolveConfig(), (error: unknown) => {
      assert.ok(isEscrowError(error));
      assert.equal(error.kind, "validation");
      return true;
    });
  });

  it("should reject a config file that is not JSON", () => {
    writeFileSync(join(TEST_DIR, "config.json"), "{not json");

    assert.throws(() => resolveConfig(), /is not valid JSON/);
  });

  it("should merge saved config into the file with private permissions", () => {
    saveConfigFile({ paymentApiKey: "test-secret" });
    saveConfigFile({ network: "Mainnet" });

    const path = getConfigPath();
    assert.ok(existsSync(path));
    assert.deepEqual(JSON.parse(readFileSync(path, "utf-8")), {
      paymentApiKey: "test-secret",
      network: "Mainnet"
    });
    assert.equal(statSync(path).mode & 0o777, 0o600);
  });

  it("should save settings from config set and resolve them", () => {
    const printed: string[] = [];
    const print = (line: string) => printed.push(stripVTControlCharacters(line));

    assert.deepEqual(configSetCommand("network", "Mainnet", getConfigPath(), print), { network: "Mainnet" });
    assert.deepEqual(configSetCommand("pollIntervalMs", "5000", getConfigPath(), print), { pollIntervalMs: 5000 });
    configSetCommand("paymentApiKey", "test-secret", getConfigPath(), print);

    assert.deepEqual(JSON.parse(readFileSync(getConfigPath(), "utf-8")), {
      network: "Mainnet",
      pollIntervalMs: 5000,
      paymentApiKey: "test-secret"
    });
    const config = resolveConfig();
    assert.equal(config.network, "Mainnet");
    assert.equal(config.pollIntervalMs, 5000);
    assert.deepEqual(printed.slice(-3, -1), ["  ✓ Saved paymentApiKey", "  paymentApiKey: test****"]);
  });

  it("should reject unknown keys and invalid values without writing", () => {
    assert.throws(() => configSetCommand("colour", "blue", getConfigPath(), () => undefined), {
      kind: "validation",
      message: /^Unknown config key: colour is not one of paymentServiceUrl, /
    });
    assert.throws(() => configSetCommand("pollIntervalMs", "soon", getConfigPath(), () => undefined), {
      kind: "validation",
      message: /^Invalid value for pollIntervalMs: pollIntervalMs: /
    });
    assert.throws(() => configSetCommand("network", "Testnet", getConfigPath(), () => undefined), {
      kind: "validation"
    });
    assert.equal(existsSync(getConfigPath()), false);
  });

  it("should map to the escrow client config", () => {
    const config = resolveConfig({ paymentApiKey: "test-secret" });

    assert.deepEqual(toClientConfig(config), {
      paymentServiceUrl: "http://localhost:3001/api/v1",
      paymentApiKey: "test-secret",
      registryServiceUrl: undefined,
      registryApiKey: undefined,
      network: "Preprod",
      paymentContractAddress: undefined,
      requestTimeoutMs: 30000
    });
  });
});
