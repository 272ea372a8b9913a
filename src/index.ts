/**
 * Parcel marketplace escrow and settlement engine.
 *
 * Library entrypoint. Hosts call `ensureMarketplaceIndexes()` once, then build the service
 * with `createMarketplaceFromEnv()` (or `createMarketplace(deps)` for custom collaborators).
 */

export * from "@/modules/marketplace";
export { createMarketplaceFromEnv } from "./bootstrap";
export {
  loadEnv,
  MarketplaceSettingsSchema,
  MongoSettingsProvider,
  SettingsStore,
  settingsStore,
  type Env,
  type MarketplaceSettings,
  type MarketplaceSettingsInput,
  type SettingsProvider,
  type SettingsSource,
} from "@/configuration";
export { disconnectDb, getDb } from "@/db/mongo";
export { ErrResult, OkResult, type Result } from "@/utils/result";
