/**
 * @custody-gate/node — HTTP control plane for an authority.
 *
 * @packageDocumentation
 */

export { AuthorityService } from "./services/authority-service.js";
export type { AuthorityInfo, AuthorityServiceConfig } from "./services/authority-service.js";
export { loadConfig, parseApiKeys, ConfigSchema } from "./config.js";
export type { AppConfig, ParsedApiKey } from "./config.js";
export { createApp } from "./app.js";
export type { CreateAppOptions, AppInstance } from "./app.js";
export * from "./middleware/index.js";
export * from "./routes/index.js";
export * from "./types/index.js";
