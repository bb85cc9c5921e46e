/**
 * @strongroom/node: HTTP service for the custodial vault.
 *
 * The package's public API; main.ts is the executable entry point.
 */

export { VaultService } from "./services/vault-service.js";
export type {
  VaultServiceOptions,
  FromConfigOptions,
  VaultStats,
} from "./services/vault-service.js";
export { Serializer } from "./services/serializer.js";
export { Faucet } from "./services/faucet.js";
export { chainlinkFeedFactory, manualFeedFactory } from "./services/feed-factory.js";
export type { FeedFactory } from "./services/feed-factory.js";
export { loadConfig, ConfigSchema } from "./config.js";
export type { AppConfig } from "./config.js";
export { createApp } from "./app.js";
export type { CreateAppOptions, AppInstance } from "./app.js";
export * from "./middleware/index.js";
export * from "./types/index.js";
