export * from "./errors.js";
export * from "./log.js";
export * from "./config.js";
export * from "./operation.js";
export * from "./estimate.js";
export * from "./fingerprint.js";
export * from "./tokenStore.js";
export * from "./decide.js";
