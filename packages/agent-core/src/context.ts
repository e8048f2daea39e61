import { parseEscrowClientConfig, type EscrowClientConfig, type EscrowClientConfigInput } from "./config.js";
import { ServiceClient } from "./http/service-client.js";
import { silentLogger, type Logger } from "./logger.js";
import { StatusMonitor } from "./monitoring/status-monitor.js";

export interface EscrowContext {
  config: EscrowClientConfig;
  paymentService: ServiceClient;
  /** Present only when a registry URL and key are configured. */
  registryService?: ServiceClient;
  monitor: StatusMonitor;
  logger: Logger;
}

export interface EscrowContextOptions {
  fetcher?: typeof fetch;
  logger?: Logger;
}

export function createEscrowContext(
  input: EscrowClientConfigInput,
  options: EscrowContextOptions = {}
): EscrowContext {
  const config = parseEscrowClientConfig(input);
  const logger = options.logger ?? silentLogger();

  return {
    config,
    paymentService: new ServiceClient({
      baseUrl: config.paymentServiceUrl,
      apiKey: config.paymentApiKey,
      timeoutMs: config.requestTimeoutMs,
      fetcher: options.fetcher,
      logger
    }),
    registryService:
      config.registryServiceUrl && config.registryApiKey
        ? new ServiceClient({
            baseUrl: config.registryServiceUrl,
            apiKey: config.registryApiKey,
            timeoutMs: config.requestTimeoutMs,
            fetcher: options.fetcher,
            logger
          })
        : undefined,
    monitor: new StatusMonitor({ logger }),
    logger
  };
}
