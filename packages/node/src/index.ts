/**
 * @strongbox/node — HTTP service over the Strongbox vault.
 *
 * @packageDocumentation
 */

export { StrongboxService, KEY_ALGORITHM } from "./services/strongbox-service.js";
export type {
  StrongboxServiceConfig,
  StorageDriver,
  PublicKeyInfo,
} from "./services/strongbox-service.js";
export { loadConfig, ConfigSchema, DEFAULT_MAX_OBJECT_BYTES } from "./config.js";
export type { AppConfig } from "./config.js";
export { createApp, LEDGER_DROPPED_METRIC } from "./app.js";
export type { CreateAppOptions, AppInstance } from "./app.js";
export * from "./middleware/index.js";
export * from "./routes/index.js";
export * from "./types/index.js";
