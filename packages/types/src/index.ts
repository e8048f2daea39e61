export * from "./rest/index.js";
export * from "./payments/index.js";
export * from "./purchases/index.js";
export * from "./registry/index.js";
