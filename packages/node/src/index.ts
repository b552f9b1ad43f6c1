/**
 * @amoca/node: HTTP node for the AMOCA token core.
 *
 * The Protocol composes the engines and commits their events; the Hono
 * app exposes it under /api/v1.
 */

export { Protocol } from "./services/protocol.js";
export type { ProtocolConfig, ProtocolDeps, AccountSummary } from "./services/protocol.js";
export { loadConfig, parseApiKeys, parseAddressList, toProtocolConfig, ConfigSchema } from "./config.js";
export type { AppConfig, ParsedApiKey } from "./config.js";
export { createApp } from "./app.js";
export type { CreateAppOptions, AppInstance } from "./app.js";
export * from "./middleware/index.js";
export * from "./routes/index.js";
export * from "./types/index.js";
