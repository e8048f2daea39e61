export * from "./errors.js";
export * from "./logger.js";
export * from "./config.js";
export * from "./context.js";
export * from "./hashing/content-hash.js";
export * from "./http/service-client.js";
export * from "./monitoring/status-monitor.js";
export * from "./payments/identifiers.js";
export * from "./payments/lifecycle.js";
export * from "./payments/payment-request.js";
export * from "./payments/purchase-request.js";
export * from "./payments/session.js";
export * from "./payments/status-listing.js";
export * from "./payments/time-windows.js";
export * from "./registry/agent-registry.js";
