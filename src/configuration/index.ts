/**
 * Configuration entrypoint.
 *
 * Usage:
 *   import { settingsStore } from "@/configuration";
 *   const settings = await settingsStore.get();
 */
export { SettingsKey } from "./constants";
export {
  MarketplaceSettingsSchema,
  type MarketplaceSettings,
  type MarketplaceSettingsInput,
} from "./definitions";
export { MongoSettingsProvider, type SettingsProvider } from "./provider";
export { SettingsStore, settingsStore, type SettingsSource } from "./store";
export { loadEnv, type Env } from "./env";
