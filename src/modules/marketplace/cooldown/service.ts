/**
 * Underpriced-sale cooldown.
 *
 * Purpose: A seller whose latest completed listing was priced under the underpriced threshold
 * and who sold that feature is barred from selling again until the lock window after that sale has
 * passed. Evaluated on every settlement; nothing is cached.
 */

import type { MarketplaceSettings } from "@/configuration";
import { ErrResult, OkResult, type Result } from "@/utils/result";
import { HOUR_MS } from "@/utils/time";
import type { SellRequestRepository } from "../requests/sell-repository";
import type { TradeLedger } from "../trades/repository";

export interface CooldownStatus {
  readonly restricted: boolean;
  readonly remainingMs: number;
  readonly tradeId?: string;
}

const UNRESTRICTED: CooldownStatus = { restricted: false, remainingMs: 0 };

export class UnderpricedCooldownChecker {
  constructor(
    private readonly sellRequests: SellRequestRepository,
    private readonly trades: TradeLedger,
  ) {}

  /** `featureId` is the feature of the calling operation; it only appears in the log line. */
  async isRestricted(
    sellerId: string,
    featureId: string,
    settings: MarketplaceSettings,
  ): Promise<Result<CooldownStatus, Error>> {
    const listingRes = await this.sellRequests.latestUnderpricedBySeller(
      sellerId,
      settings.underpricedThreshold,
    );
    if (listingRes.isErr()) return ErrResult(listingRes.error);
    const listing = listingRes.value;
    if (!listing) return OkResult(UNRESTRICTED);

    const tradeRes = await this.trades.latestTradeForSeller(sellerId, listing.featureId);
    if (tradeRes.isErr()) return ErrResult(tradeRes.error);
    const trade = tradeRes.value;
    // A trade older than the listing was not made at the underpriced terms.
    if (!trade || trade.createdAt.getTime() < listing.createdAt.getTime()) {
      return OkResult(UNRESTRICTED);
    }

    const windowMs = settings.underpricedLockHours * HOUR_MS;
    const elapsed = Date.now() - trade.createdAt.getTime();
    if (elapsed >= windowMs) return OkResult(UNRESTRICTED);

    const remainingMs = windowMs - elapsed;
    console.warn(`[Cooldown] Seller ${sellerId} restricted on ${featureId} for ${remainingMs}ms.`, {
      tradeId: trade._id,
      listingId: listing._id,
    });
    return OkResult({ restricted: true, remainingMs, tradeId: trade._id });
  }
}
