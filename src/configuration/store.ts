import { MarketplaceSettingsSchema, type MarketplaceSettings } from "./definitions";
import { SettingsKey } from "./constants";
import { MongoSettingsProvider, type SettingsProvider } from "./provider";

const CACHE_TTL_MS = 30_000;

/** Read side used by services; lets tests hand in fixed settings. */
export interface SettingsSource {
  get(): Promise<MarketplaceSettings>;
}

export class SettingsStore implements SettingsSource {
  private cached: { expiresAt: number; value: MarketplaceSettings } | null = null;

  constructor(
    private readonly provider: SettingsProvider,
    private readonly ttlMs: number = CACHE_TTL_MS,
  ) {}

  async get(): Promise<MarketplaceSettings> {
    if (this.cached && this.cached.expiresAt >= Date.now()) {
      return { ...this.cached.value };
    }

    const raw = await this.provider.getSettings(SettingsKey.Marketplace);
    // An empty document parses to the defaults.
    const value = MarketplaceSettingsSchema.parse(raw);

    this.cached = { expiresAt: Date.now() + this.ttlMs, value };
    return { ...value };
  }

  async set(partial: Partial<MarketplaceSettings>): Promise<MarketplaceSettings> {
    const current = await this.get();
    const validation = MarketplaceSettingsSchema.safeParse({ ...current, ...partial });

    if (!validation.success) {
      throw new Error(`Invalid marketplace settings update: ${validation.error.message}`);
    }

    await this.provider.setSettings(SettingsKey.Marketplace, partial);

    // Keep the cache coherent without another read.
    this.cached = { expiresAt: Date.now() + this.ttlMs, value: validation.data };
    return { ...validation.data };
  }

  invalidate(): void {
    this.cached = null;
  }
}

export const settingsStore = new SettingsStore(new MongoSettingsProvider());
