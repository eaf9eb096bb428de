// Errors & Results
export * from "./errors.js";
export * from "./envelope.js";

// Configuration & Logging
export * from "./config.js";
export * from "./logger.js";

// Sandbox
export * from "./sandbox/sandbox.js";
export * from "./sandbox/http-client.js";
export * from "./sandbox/cleanup.js";
export * from "./session/session-manager.js";

// File Transfer
export * from "./transfer/mime.js";
export * from "./transfer/policy.js";
export * from "./transfer/executor.js";

// Utils
export * from "./utils/shell.js";
