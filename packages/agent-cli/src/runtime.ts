import ora, { type Ora } from "ora";
import { createEscrowContext, type EscrowContext, type Logger } from "@agent-escrow/core";
import { resolveConfig, toClientConfig } from "./config.js";
import { createFileLogger } from "./logger.js";
import type { Config, ConfigOverrides } from "./types.js";

export interface CliRuntime {
  config: Config;
  escrow: EscrowContext;
  logger: Logger;
  print: (line: string) => void;
  spinner: (text: string) => Ora;
}

export interface RuntimeOptions {
  config?: Config;
  fetcher?: typeof fetch;
  logger?: Logger;
  print?: (line: string) => void;
  /** Show ora spinners. Off when output is not a terminal. */
  spinners?: boolean;
}

export function createRuntime(overrides: ConfigOverrides = {}, options: RuntimeOptions = {}): CliRuntime {
  const config = options.config ?? resolveConfig(overrides);
  const logger = options.logger ?? createFileLogger(config.logLevel);
  const escrow = createEscrowContext(toClientConfig(config), { fetcher: options.fetcher, logger });
  const showSpinners = options.spinners ?? Boolean(process.stdout.isTTY);

  return {
    config,
    escrow,
    logger,
    print: options.print ?? ((line) => console.log(line)),
    spinner: (text) => ora({ text, isSilent: !showSpinners }).start()
  };
}
