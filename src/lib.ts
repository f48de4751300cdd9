export * from "./types.js";
export * from "./errors.js";
export * from "./db/index.js";
export * from "./detector/index.js";
export * from "./privacy/index.js";
export * from "./review/index.js";
export { LedgerContext } from "./context.js";
export type { LedgerContextOptions } from "./context.js";
export { createServer } from "./server.js";
export { loadConfig } from "./config.js";
export type { LedgerConfig } from "./config.js";
