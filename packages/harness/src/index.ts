export * from "./assistant-api.js";
export * from "./config.js";
export * from "./errors.js";
export * from "./harness.js";
export * from "./identity-store.js";
export * from "./instructions.js";
export * from "./logger.js";
export * from "./openai-assistant-api.js";
export * from "./run-coordinator.js";
export * from "./session-identity.js";
