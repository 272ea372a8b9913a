/**
 * Marketplace settings schema.
 *
 * Role in system:
 * - Business variables of the settlement engine (fee rate, pricing floors, cooldown window,
 *   profit withdraw defaults) live in one settings document.
 * - The schema applies defaults, so an empty or partial stored document is always usable.
 *
 * Gotchas:
 * - `feeRateBps` is read when a buy request is created and stored on it; changing it does not
 *   affect offers already in escrow.
 */
import { z } from "zod";

export const MarketplaceSettingsSchema = z
  .object({
    feeRateBps: z.number().int().min(0).max(5_000).default(500),
    platformUserId: z.string().min(1).default("platform"),
    publicPricingLimit: z.number().positive().default(80),
    minorPricingLimit: z.number().positive().default(110),
    minimumPercentageShortcut: z.number().positive().default(80),
    underpricedThreshold: z.number().positive().default(100),
    underpricedLockHours: z.number().positive().default(24),
    defaultWithdrawProfitDays: z.number().int().positive().default(10),
    creditRetryAttempts: z.number().int().min(1).max(10).default(3),
    gracePeriodMinDays: z.number().int().min(1).default(1),
    gracePeriodMaxDays: z.number().int().min(1).default(30),
  })
  .refine((value) => value.gracePeriodMinDays <= value.gracePeriodMaxDays, {
    message: "gracePeriodMinDays must not exceed gracePeriodMaxDays",
    path: ["gracePeriodMinDays"],
  });

export type MarketplaceSettings = z.infer<typeof MarketplaceSettingsSchema>;
export type MarketplaceSettingsInput = z.input<typeof MarketplaceSettingsSchema>;
