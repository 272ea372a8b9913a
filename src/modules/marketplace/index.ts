/**
 * Marketplace Module Public API.
 *
 * `createMarketplace` wires the settlement service from explicit collaborators; the Mongo
 * and HTTP defaults are assembled in `@/bootstrap`.
 */

import { MarketplaceServiceImpl, type MarketplaceDeps } from "./settlement/service";
import type { MarketplaceService } from "./types";

export function createMarketplace(deps: MarketplaceDeps): MarketplaceService {
  return new MarketplaceServiceImpl(deps);
}

// -------------------------------------------------------------------------
// Service & Types
// -------------------------------------------------------------------------
export { MarketplaceServiceImpl, movementKey, type MarketplaceDeps } from "./settlement/service";
export * from "./types";
export * from "./schema";

// -------------------------------------------------------------------------
// Pricing, Fees & Messages
// -------------------------------------------------------------------------
export * from "./fees";
export * from "./pricing";
export { describeMarketError, formatDuration } from "./messages";

// -------------------------------------------------------------------------
// Ledger
// -------------------------------------------------------------------------
export { HttpLedgerClient, type HttpLedgerClientOptions } from "./ledger/http-client";
export { LedgerJournal, type AppliedMovement, type MovementDirection } from "./ledger/journal";
export {
  LedgerError,
  type LedgerCallOptions,
  type LedgerFailureKind,
  type LedgerMovement,
  type LedgerService,
  type LedgerTransaction,
  type TransactionDirection,
} from "./ledger/types";

// -------------------------------------------------------------------------
// Repositories (Mongo singletons)
// -------------------------------------------------------------------------
export { catalogStore, featureUpdateFields } from "./catalog/repository";
export { rateSource, DEFAULT_RATE } from "./catalog/rates";
export { identityDirectory, isMinorAt } from "./catalog/identity";
export type { CatalogStore, IdentityDirectory, RateSource, UserProfile } from "./catalog/types";
export { escrowStore, type EscrowStore, type LockInput } from "./escrow/repository";
export { incidentRepository, reportIncident, type IncidentRepository } from "./incidents/repository";
export { featureLimitationRepository, type FeatureLimitationRepository } from "./limits/repository";
export { hourlyProfitRepository, type HourlyProfitRepository } from "./profit/repository";
export { buyRequestRepository, type BuyRequestRepository } from "./requests/buy-repository";
export { sellRequestRepository, type SellRequestRepository } from "./requests/sell-repository";
export { tradeLedger, type TradeLedger } from "./trades/repository";
export { ensureMarketplaceIndexes } from "./indexes";

// -------------------------------------------------------------------------
// Collaborating services
// -------------------------------------------------------------------------
export { ProfitContinuityManager } from "./profit/service";
export { UnderpricedCooldownChecker, type CooldownStatus } from "./cooldown/service";
