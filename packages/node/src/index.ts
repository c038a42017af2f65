/**
 * @collegium/node - HTTP service for the organization.
 *
 * @packageDocumentation
 */

export { AcademyService } from "./services/academy-service.js";
export type {
  AcademyServiceConfig,
  AcademyServiceOptions,
  LedgerAccountView,
} from "./services/academy-service.js";
export { loadConfig, parseApiKeys, parseBoardMembers, ConfigSchema } from "./config.js";
export type { AppConfig, ParsedApiKey } from "./config.js";
export { createApp } from "./app.js";
export type { CreateAppOptions, AppInstance } from "./app.js";
export * from "./middleware/index.js";
export * from "./routes/index.js";
export * from "./types/index.js";
