/**
 * Settlement service.
 *
 * Purpose: Entry points of the parcel marketplace. Immediate purchases on three acquisition
 * paths (limited campaign, platform primary sale, owner listing), the negotiated buy
 * request lifecycle, and owner listings.
 *
 * Step order of a settlement:
 *   funds locked -> price verified -> funds settled -> ownership transferred
 *   -> profit reassigned -> requests reconciled
 *
 * Failures before funds settle reverse the confirmed debits, newest first. A lost ownership
 * race after funds settled reverses the fund movement only. Later local writes (trade,
 * profit, reconciliation) are logged on failure and never undo the sale.
 */

import type { MarketplaceSettings, SettingsSource } from "@/configuration";
import { generateId } from "@/utils/ids";
import { ErrResult, OkResult, toError } from "@/utils/result";
import { addDays } from "@/utils/time";
import type { CatalogStore, IdentityDirectory, RateSource, UserProfile } from "../catalog/types";
import { UnderpricedCooldownChecker } from "../cooldown/service";
import type { EscrowStore } from "../escrow/repository";
import { splitPrice, buyerCharge } from "../fees";
import { reportIncident, type IncidentRepository } from "../incidents/repository";
import { LedgerJournal, type MovementDirection } from "../ledger/journal";
import type {
  LedgerError,
  LedgerMovement,
  LedgerService,
  LedgerTransaction,
} from "../ledger/types";
import type { FeatureLimitationRepository } from "../limits/repository";
import {
  isAmount,
  offerPercentage,
  pricesFromPercentage,
  pricingFloor,
  type ValuationInput,
} from "../pricing";
import { ProfitContinuityManager } from "../profit/service";
import type { HourlyProfitRepository } from "../profit/repository";
import type { BuyRequestRepository, TerminalBuyRequestStatus } from "../requests/buy-repository";
import type { SellRequestRepository } from "../requests/sell-repository";
import type {
  BuyRequestDoc,
  CommissionDoc,
  FeatureDoc,
  FeatureLimitationDoc,
  LockedAssetDoc,
  SellRequestDoc,
  TradeDoc,
} from "../schema";
import type { TradeLedger } from "../trades/repository";
import {
  CATEGORY_COLOR,
  MarketError,
  type AcceptBuyRequestResult,
  type BuyFeatureInput,
  type BuyFeatureResult,
  type BuyRequestView,
  type CreateSellRequestInput,
  type CurrencyId,
  type MarketResult,
  type MarketplaceService,
  type OperationOptions,
  type OutstandingCredit,
  type RefundResult,
  type ResourceId,
  type SellRequestView,
  type SendBuyRequestInput,
  type SettlementOutcome,
} from "../types";
import { toBuyRequestView, toSellRequestView } from "./views";

export interface MarketplaceDeps {
  readonly ledger: LedgerService;
  readonly catalog: CatalogStore;
  readonly rates: RateSource;
  readonly identity: IdentityDirectory;
  readonly settings: SettingsSource;
  readonly escrow: EscrowStore;
  readonly trades: TradeLedger;
  readonly buyRequests: BuyRequestRepository;
  readonly sellRequests: SellRequestRepository;
  readonly profits: HourlyProfitRepository;
  readonly limitations: FeatureLimitationRepository;
  readonly incidents: IncidentRepository;
}

interface TransferContext {
  readonly operation: string;
  readonly feature: FeatureDoc;
  readonly sellerId: string;
  readonly buyer: UserProfile;
  readonly settings: MarketplaceSettings;
  readonly settledPSC: number;
  readonly settledIRR: number;
  readonly commission: { readonly feePSC: number; readonly feeIRR: number } | null;
  readonly outstandingCredits: readonly OutstandingCredit[];
  readonly excludeRequestId?: string;
}

interface PurchaseContext {
  readonly operationId: string;
  readonly feature: FeatureDoc;
  readonly buyer: UserProfile;
  readonly settings: MarketplaceSettings;
  readonly signal?: AbortSignal;
}

const CURRENCY_ORDER: readonly CurrencyId[] = ["psc", "irr"];

export const movementKey = (
  operation: string,
  entityId: string,
  step: string,
  resource: ResourceId,
): string => `${operation}:${entityId}:${step}:${resource}`;

function storageFailure(context: string, error: Error): MarketError {
  console.error(`[Settlement] Storage failure while ${context}:`, error);
  return new MarketError("STORAGE_FAILURE", `Storage failure while ${context}.`, {}, { cause: error });
}

function asMarketError(context: string, error: Error): MarketError {
  return error instanceof MarketError ? error : storageFailure(context, error);
}

export class MarketplaceServiceImpl implements MarketplaceService {
  private readonly profit: ProfitContinuityManager;
  private readonly cooldown: UnderpricedCooldownChecker;

  constructor(private readonly deps: MarketplaceDeps) {
    this.profit = new ProfitContinuityManager(deps.profits, deps.ledger);
    this.cooldown = new UnderpricedCooldownChecker(deps.sellRequests, deps.trades);
  }

  // -------------------------------------------------------------------------
  // Immediate purchase
  // -------------------------------------------------------------------------

  async buyFeature(
    input: BuyFeatureInput,
    options: OperationOptions = {},
  ): Promise<MarketResult<BuyFeatureResult>> {
    const settingsRes = await this.loadSettings();
    if (settingsRes.isErr()) return ErrResult(settingsRes.error);
    const settings = settingsRes.value;

    const featureRes = await this.loadFeature(input.featureId);
    if (featureRes.isErr()) return ErrResult(featureRes.error);
    const feature = featureRes.value;

    if (feature.ownerId === input.buyerId) {
      return ErrResult(new MarketError("SELF_TRADE_FORBIDDEN", "You already own this feature."));
    }

    const buyerRes = await this.loadProfile(input.buyerId);
    if (buyerRes.isErr()) return ErrResult(buyerRes.error);

    const ctx: PurchaseContext = {
      operationId: options.operationId ?? generateId("buy"),
      feature,
      buyer: buyerRes.value,
      settings,
      signal: options.signal,
    };

    const limitationRes = await this.deps.limitations.findActiveForSequence(feature.sequence, new Date());
    if (limitationRes.isErr()) {
      return ErrResult(storageFailure("reading feature limitations", limitationRes.error));
    }

    if (limitationRes.value) return this.buyLimited(ctx, limitationRes.value);
    if (feature.ownerId === settings.platformUserId) return this.buyPrimary(ctx);
    return this.buySecondary(ctx);
  }

  /** Campaign sale: optional quota, optional payment of the valuation to the owner. */
  private async buyLimited(
    ctx: PurchaseContext,
    limitation: FeatureLimitationDoc,
  ): Promise<MarketResult<BuyFeatureResult>> {
    const { feature, buyer } = ctx;

    if (limitation.individualBuyLimit) {
      const countRes = await this.deps.limitations.countPurchases(buyer.userId, limitation._id);
      if (countRes.isErr()) return ErrResult(storageFailure("counting limited purchases", countRes.error));
      if (countRes.value >= limitation.individualBuyCount) {
        return ErrResult(
          new MarketError(
            "QUOTA_EXCEEDED",
            `You can buy at most ${limitation.individualBuyCount} features in "${limitation.title}".`,
          ),
        );
      }
    }

    const journal = this.journal("buy-limited", ctx.operationId, ctx.signal);
    if (limitation.priceEnforced) {
      const paid = await this.payValuation(journal, ctx, feature.ownerId);
      if (paid.isErr()) return ErrResult(paid.error);
    }

    const flip = await this.transferOwnership(feature._id, feature.ownerId, buyer.userId);
    if (flip.isErr()) return ErrResult(await this.unwind(journal, flip.error));

    const purchase = await this.deps.limitations.recordPurchase(buyer.userId, limitation._id, feature._id);
    if (purchase.isErr()) {
      console.error("[Settlement] Failed to record limited purchase; quota may undercount.", {
        featureId: feature._id,
        limitationId: limitation._id,
        buyerId: buyer.userId,
        error: purchase.error.message,
      });
    }

    const outcome = await this.completeTransfer({
      operation: "buy-limited",
      feature,
      sellerId: feature.ownerId,
      buyer,
      settings: ctx.settings,
      settledPSC: 0,
      settledIRR: 0,
      commission: null,
      outstandingCredits: [],
    });
    return OkResult({ path: "limited", ...outcome });
  }

  /** Primary sale by the platform account at the feature valuation, no fee split. */
  private async buyPrimary(ctx: PurchaseContext): Promise<MarketResult<BuyFeatureResult>> {
    const { feature, buyer, settings } = ctx;
    const journal = this.journal("buy-primary", ctx.operationId, ctx.signal);

    const paid = await this.payValuation(journal, ctx, settings.platformUserId);
    if (paid.isErr()) return ErrResult(paid.error);

    const flip = await this.transferOwnership(feature._id, feature.ownerId, buyer.userId);
    if (flip.isErr()) return ErrResult(await this.unwind(journal, flip.error));

    const outcome = await this.completeTransfer({
      operation: "buy-primary",
      feature,
      sellerId: feature.ownerId,
      buyer,
      settings,
      settledPSC: 0,
      settledIRR: 0,
      commission: null,
      outstandingCredits: [],
    });
    return OkResult({ path: "primary", ...outcome });
  }

  /** Purchase at the owner's listed price, fees split between both sides. */
  private async buySecondary(ctx: PurchaseContext): Promise<MarketResult<BuyFeatureResult>> {
    const { feature, buyer, settings } = ctx;
    const sellerId = feature.ownerId;

    if (
      feature.marketStatus !== "listed_priced" ||
      feature.listedPricePSC === null ||
      feature.listedPriceIRR === null ||
      (feature.listedPricePSC === 0 && feature.listedPriceIRR === 0)
    ) {
      return ErrResult(new MarketError("FEATURE_NOT_FOR_SALE", "This feature has no listed price."));
    }

    const restricted = await this.ensureNotRestricted(sellerId, feature._id, settings);
    if (restricted.isErr()) return ErrResult(restricted.error);

    const split = {
      psc: splitPrice(feature.listedPricePSC, settings.feeRateBps),
      irr: splitPrice(feature.listedPriceIRR, settings.feeRateBps),
    };

    for (const currency of CURRENCY_ORDER) {
      const funds = await this.ensureFunds(buyer.userId, currency, split[currency].buyerCharge, ctx.signal);
      if (funds.isErr()) return ErrResult(funds.error);
    }

    const journal = this.journal("buy", ctx.operationId, ctx.signal);
    for (const currency of CURRENCY_ORDER) {
      const movement: LedgerMovement = {
        userId: buyer.userId,
        resource: currency,
        amount: split[currency].buyerCharge,
        idempotencyKey: movementKey("buy", ctx.operationId, "debit", currency),
      };
      const debited = await this.debit(journal, movement);
      if (debited.isErr()) return ErrResult(debited.error);
    }

    const outstanding = await this.disburse(journal, [
      ...CURRENCY_ORDER.map((currency) => ({
        userId: sellerId,
        resource: currency,
        amount: split[currency].sellerPayment,
        idempotencyKey: movementKey("buy", ctx.operationId, "seller", currency),
      })),
      ...CURRENCY_ORDER.map((currency) => ({
        userId: settings.platformUserId,
        resource: currency,
        amount: split[currency].platformFee,
        idempotencyKey: movementKey("buy", ctx.operationId, "platform", currency),
      })),
    ], settings);

    const flip = await this.transferOwnership(feature._id, sellerId, buyer.userId);
    if (flip.isErr()) return ErrResult(await this.unwind(journal, flip.error));

    await this.recordHistory(journal, "feature", feature._id);

    const outcome = await this.completeTransfer({
      operation: "buy",
      feature,
      sellerId,
      buyer,
      settings,
      settledPSC: feature.listedPricePSC,
      settledIRR: feature.listedPriceIRR,
      commission: { feePSC: split.psc.platformFee, feeIRR: split.irr.platformFee },
      outstandingCredits: outstanding,
    });
    return OkResult({ path: "secondary", ...outcome });
  }

  /**
   * Buyer pays the feature valuation in its color to `payeeId`. A definitive credit failure
   * reverses the debit; an ambiguous one leaves both sides to reconciliation.
   */
  private async payValuation(
    journal: LedgerJournal,
    ctx: PurchaseContext,
    payeeId: string,
  ): Promise<MarketResult<void>> {
    const resource = CATEGORY_COLOR[ctx.feature.category];
    const amount = ctx.feature.stabilityValue;
    if (amount === 0) return OkResult(undefined);

    const funds = await this.ensureFunds(ctx.buyer.userId, resource, amount, ctx.signal);
    if (funds.isErr()) return ErrResult(funds.error);

    const debited = await this.debit(journal, {
      userId: ctx.buyer.userId,
      resource,
      amount,
      idempotencyKey: movementKey(journal.operation, ctx.operationId, "debit", resource),
    });
    if (debited.isErr()) return ErrResult(debited.error);

    const credit: LedgerMovement = {
      userId: payeeId,
      resource,
      amount,
      idempotencyKey: movementKey(journal.operation, ctx.operationId, "payee", resource),
    };
    const credited = await journal.credit(credit, ctx.settings.creditRetryAttempts);
    if (credited.isOk()) return OkResult(undefined);

    const failure = await this.movementFailure(journal, "credit", credit, credited.error);
    if (credited.error.kind === "ambiguous") return ErrResult(failure);
    return ErrResult(await this.unwind(journal, failure));
  }

  // -------------------------------------------------------------------------
  // Buy requests
  // -------------------------------------------------------------------------

  async sendBuyRequest(
    input: SendBuyRequestInput,
    options: OperationOptions = {},
  ): Promise<MarketResult<BuyRequestView>> {
    const { buyerId, featureId, pricePSC, priceIRR } = input;

    if (!isAmount(pricePSC) || !isAmount(priceIRR)) {
      return ErrResult(new MarketError("INVALID_PRICE", "Prices must be non-negative whole amounts."));
    }
    if (pricePSC === 0 && priceIRR === 0) {
      return ErrResult(new MarketError("INVALID_PRICE", "An offer needs a PSC or IRR price."));
    }

    const settingsRes = await this.loadSettings();
    if (settingsRes.isErr()) return ErrResult(settingsRes.error);
    const settings = settingsRes.value;

    const featureRes = await this.loadFeature(featureId);
    if (featureRes.isErr()) return ErrResult(featureRes.error);
    const feature = featureRes.value;

    if (feature.ownerId === buyerId) {
      return ErrResult(new MarketError("SELF_TRADE_FORBIDDEN", "You cannot make an offer on your own feature."));
    }
    if (feature.ownerId === settings.platformUserId) {
      return ErrResult(
        new MarketError("FEATURE_NOT_FOR_SALE", "Platform features are bought directly, not through offers."),
      );
    }

    const existing = await this.deps.buyRequests.findPendingByBuyer(buyerId, featureId);
    if (existing.isErr()) return ErrResult(storageFailure("looking up pending offers", existing.error));
    if (existing.value) {
      return ErrResult(
        new MarketError("DUPLICATE_REQUEST", "You already have a pending offer on this feature."),
      );
    }

    const valuationRes = await this.loadValuation(feature);
    if (valuationRes.isErr()) return ErrResult(valuationRes.error);
    const offered = offerPercentage(pricePSC, priceIRR, valuationRes.value);
    if (offered < feature.minimumPricePercentage) {
      return ErrResult(
        new MarketError(
          "PRICE_BELOW_FLOOR",
          `Offer is ${offered.toFixed(2)}% of the feature value; the minimum is ${feature.minimumPricePercentage}%.`,
          { floorPercentage: feature.minimumPricePercentage, offeredPercentage: offered },
        ),
      );
    }

    const charges: Record<CurrencyId, number> = {
      psc: buyerCharge(pricePSC, settings.feeRateBps),
      irr: buyerCharge(priceIRR, settings.feeRateBps),
    };
    for (const currency of CURRENCY_ORDER) {
      const funds = await this.ensureFunds(buyerId, currency, charges[currency], options.signal);
      if (funds.isErr()) return ErrResult(funds.error);
    }

    // Created under a claim so reconciliation skips it until the funds are in escrow.
    const claimToken = generateId("claim");
    const now = new Date();
    const request: BuyRequestDoc = {
      _id: generateId("br"),
      buyerId,
      sellerId: feature.ownerId,
      featureId,
      pricePSC,
      priceIRR,
      feeRateBps: settings.feeRateBps,
      note: input.note?.trim() ?? "",
      status: "pending",
      gracePeriodDeadline: null,
      claimToken,
      deletedAt: null,
      createdAt: now,
      updatedAt: now,
    };
    const created = await this.deps.buyRequests.create(request);
    if (created.isErr()) return ErrResult(storageFailure("creating buy request", created.error));

    const journal = this.journal("buy-request", request._id, options.signal);
    for (const currency of CURRENCY_ORDER) {
      const debited = await this.debit(journal, {
        userId: buyerId,
        resource: currency,
        amount: charges[currency],
        idempotencyKey: movementKey("buy-request", request._id, "debit", currency),
      });
      if (debited.isErr()) {
        return ErrResult(await this.abandonBuyRequest(request._id, debited.error));
      }
    }

    const lock = await this.deps.escrow.lock({
      buyRequestId: request._id,
      featureId,
      lockedPSC: charges.psc,
      lockedIRR: charges.irr,
    });
    if (lock.isErr()) {
      const failure = asMarketError("locking escrow", lock.error);
      return ErrResult(await this.abandonBuyRequest(request._id, await this.unwind(journal, failure)));
    }

    await this.recordHistory(journal, "buy_request", request._id);
    await this.releaseClaim(request._id, claimToken);

    const stale = await this.refundIfTransferred(request, settings, options.signal);
    if (stale) {
      // REQUEST_BUSY: the settlement that moved the feature is refunding it.
      if (stale.isErr() && stale.error.code !== "REQUEST_BUSY") return ErrResult(stale.error);
      return ErrResult(
        new MarketError(
          "OWNERSHIP_CONFLICT",
          "The feature changed hands while your offer was placed; your payment is returned.",
        ),
      );
    }

    console.log(`[Settlement] Buy request ${request._id} placed on ${featureId} by ${buyerId}.`);
    return OkResult(toBuyRequestView(request, lock.value));
  }

  async acceptBuyRequest(
    requestId: string,
    sellerId: string,
    options: OperationOptions = {},
  ): Promise<MarketResult<AcceptBuyRequestResult>> {
    const requestRes = await this.loadPendingRequest(requestId);
    if (requestRes.isErr()) return ErrResult(requestRes.error);
    const request = requestRes.value;

    if (request.sellerId !== sellerId) {
      return ErrResult(new MarketError("UNAUTHORIZED", "Only the seller can accept this offer."));
    }

    const settingsRes = await this.loadSettings();
    if (settingsRes.isErr()) return ErrResult(settingsRes.error);
    const settings = settingsRes.value;

    const featureRes = await this.loadFeature(request.featureId);
    if (featureRes.isErr()) return ErrResult(featureRes.error);
    const feature = featureRes.value;
    if (feature.ownerId !== request.sellerId) {
      return ErrResult(
        new MarketError("OWNERSHIP_CONFLICT", "The feature changed hands since this offer was made."),
      );
    }

    const restricted = await this.ensureNotRestricted(sellerId, request.featureId, settings);
    if (restricted.isErr()) return ErrResult(restricted.error);

    const buyerRes = await this.loadProfile(request.buyerId);
    if (buyerRes.isErr()) return ErrResult(buyerRes.error);

    const token = generateId("claim");
    const claimed = await this.claim(requestId, token);
    if (claimed.isErr()) return ErrResult(claimed.error);

    const lockRes = await this.deps.escrow.get(requestId);
    if (lockRes.isErr()) {
      await this.releaseClaim(requestId, token);
      return ErrResult(asMarketError("reading escrow", lockRes.error));
    }

    const split = {
      psc: splitPrice(request.pricePSC, request.feeRateBps),
      irr: splitPrice(request.priceIRR, request.feeRateBps),
    };
    if (
      lockRes.value.lockedPSC !== split.psc.buyerCharge ||
      lockRes.value.lockedIRR !== split.irr.buyerCharge
    ) {
      console.warn(`[Settlement] Escrow of ${requestId} does not match its offer charges.`, {
        lockedPSC: lockRes.value.lockedPSC,
        lockedIRR: lockRes.value.lockedIRR,
        expectedPSC: split.psc.buyerCharge,
        expectedIRR: split.irr.buyerCharge,
      });
    }

    const journal = this.journal("accept", requestId, options.signal);
    const outstanding = await this.disburse(journal, [
      ...CURRENCY_ORDER.map((currency) => ({
        userId: sellerId,
        resource: currency,
        amount: split[currency].sellerPayment,
        idempotencyKey: movementKey("accept", requestId, "seller", currency),
      })),
      ...CURRENCY_ORDER.map((currency) => ({
        userId: settings.platformUserId,
        resource: currency,
        amount: split[currency].platformFee,
        idempotencyKey: movementKey("accept", requestId, "platform", currency),
      })),
    ], settings);

    const flip = await this.transferOwnership(feature._id, sellerId, request.buyerId);
    if (flip.isErr()) {
      const failure = await this.unwind(journal, flip.error);
      await this.releaseClaim(requestId, token);
      if (failure.code === "OWNERSHIP_CONFLICT") {
        const stale = await this.refundIfTransferred(request, settings, options.signal);
        if (stale && stale.isErr()) {
          console.warn(`[Settlement] Offer ${requestId} left pending after a lost transfer: ${stale.error.code}`);
        }
      }
      return ErrResult(failure);
    }

    await this.releaseEscrow(requestId);
    const finalized = await this.deps.buyRequests.finalize(requestId, token, "accepted");
    if (finalized.isErr() || !finalized.value) {
      console.error(`[Settlement] Failed to mark buy request ${requestId} accepted after transfer.`);
    }
    await this.recordHistory(journal, "trade", requestId);

    const outcome = await this.completeTransfer({
      operation: "accept",
      feature,
      sellerId,
      buyer: buyerRes.value,
      settings,
      settledPSC: request.pricePSC,
      settledIRR: request.priceIRR,
      commission: { feePSC: split.psc.platformFee, feeIRR: split.irr.platformFee },
      outstandingCredits: outstanding,
      excludeRequestId: requestId,
    });
    return OkResult({ requestId, ...outcome });
  }

  async rejectBuyRequest(
    requestId: string,
    sellerId: string,
    options: OperationOptions = {},
  ): Promise<MarketResult<RefundResult>> {
    const requestRes = await this.loadPendingRequest(requestId);
    if (requestRes.isErr()) return ErrResult(requestRes.error);
    if (requestRes.value.sellerId !== sellerId) {
      return ErrResult(new MarketError("UNAUTHORIZED", "Only the seller can reject this offer."));
    }

    const settingsRes = await this.loadSettings();
    if (settingsRes.isErr()) return ErrResult(settingsRes.error);

    return this.refundRequest(requestRes.value, "rejected", settingsRes.value, options.signal);
  }

  async deleteBuyRequest(
    requestId: string,
    buyerId: string,
    options: OperationOptions = {},
  ): Promise<MarketResult<RefundResult>> {
    const requestRes = await this.loadPendingRequest(requestId);
    if (requestRes.isErr()) return ErrResult(requestRes.error);
    if (requestRes.value.buyerId !== buyerId) {
      return ErrResult(new MarketError("UNAUTHORIZED", "Only the buyer can withdraw this offer."));
    }

    const settingsRes = await this.loadSettings();
    if (settingsRes.isErr()) return ErrResult(settingsRes.error);

    return this.refundRequest(requestRes.value, "cancelled", settingsRes.value, options.signal);
  }

  async updateGracePeriod(
    requestId: string,
    sellerId: string,
    days: number,
  ): Promise<MarketResult<BuyRequestView>> {
    const settingsRes = await this.loadSettings();
    if (settingsRes.isErr()) return ErrResult(settingsRes.error);
    const { gracePeriodMinDays, gracePeriodMaxDays } = settingsRes.value;

    if (!Number.isInteger(days) || days < gracePeriodMinDays || days > gracePeriodMaxDays) {
      return ErrResult(
        new MarketError(
          "INVALID_GRACE_PERIOD",
          `Grace period must be between ${gracePeriodMinDays} and ${gracePeriodMaxDays} days.`,
        ),
      );
    }

    const requestRes = await this.loadPendingRequest(requestId);
    if (requestRes.isErr()) return ErrResult(requestRes.error);
    if (requestRes.value.sellerId !== sellerId) {
      return ErrResult(new MarketError("UNAUTHORIZED", "Only the seller can set the grace period."));
    }

    const updated = await this.deps.buyRequests.updateGracePeriod(requestId, addDays(new Date(), days));
    if (updated.isErr()) return ErrResult(storageFailure("updating grace period", updated.error));
    if (!updated.value) {
      return ErrResult(new MarketError("REQUEST_NOT_PENDING", "This offer is no longer pending."));
    }

    const lock = await this.findLock(requestId);
    if (lock.isErr()) return ErrResult(lock.error);
    return OkResult(toBuyRequestView(updated.value, lock.value));
  }

  // -------------------------------------------------------------------------
  // Sell requests
  // -------------------------------------------------------------------------

  async createSellRequest(input: CreateSellRequestInput): Promise<MarketResult<SellRequestView>> {
    const hasPrices = input.pricePSC !== undefined || input.priceIRR !== undefined;
    const hasPercentage = input.percentage !== undefined;
    if (hasPrices && hasPercentage) {
      return ErrResult(new MarketError("INVALID_PRICE", "Set either prices or a percentage, not both."));
    }
    if (!hasPrices && !hasPercentage) {
      return ErrResult(new MarketError("INVALID_PRICE", "Set prices or a percentage of the feature value."));
    }

    const settingsRes = await this.loadSettings();
    if (settingsRes.isErr()) return ErrResult(settingsRes.error);
    const settings = settingsRes.value;

    const featureRes = await this.loadFeature(input.featureId);
    if (featureRes.isErr()) return ErrResult(featureRes.error);
    const feature = featureRes.value;
    if (feature.ownerId !== input.sellerId) {
      return ErrResult(new MarketError("UNAUTHORIZED", "Only the owner can list this feature."));
    }

    const existing = await this.deps.sellRequests.findPendingByFeature(feature._id);
    if (existing.isErr()) return ErrResult(storageFailure("looking up listings", existing.error));
    if (existing.value) {
      return ErrResult(new MarketError("SELL_REQUEST_EXISTS", "This feature is already listed."));
    }

    const sellerRes = await this.loadProfile(input.sellerId);
    if (sellerRes.isErr()) return ErrResult(sellerRes.error);
    const floor = pricingFloor(settings, sellerRes.value.isMinor);

    const valuationRes = await this.loadValuation(feature);
    if (valuationRes.isErr()) return ErrResult(valuationRes.error);
    const valuation = valuationRes.value;

    let askPSC: number;
    let askIRR: number;
    let floorPercentage: number;

    if (input.percentage !== undefined) {
      const percentage = input.percentage;
      if (!Number.isFinite(percentage) || percentage <= 0) {
        return ErrResult(new MarketError("INVALID_PRICE", "Percentage must be a positive number."));
      }
      const minimum = Math.max(floor, settings.minimumPercentageShortcut);
      if (percentage < minimum) {
        return ErrResult(
          new MarketError("PRICE_BELOW_FLOOR", `Percentage must be at least ${minimum}%.`, {
            floorPercentage: minimum,
            offeredPercentage: percentage,
          }),
        );
      }
      ({ askPSC, askIRR } = pricesFromPercentage(percentage, valuation));
      floorPercentage = percentage;
    } else {
      askPSC = input.pricePSC ?? 0;
      askIRR = input.priceIRR ?? 0;
      if (!isAmount(askPSC) || !isAmount(askIRR) || (askPSC === 0 && askIRR === 0)) {
        return ErrResult(new MarketError("INVALID_PRICE", "Prices must be non-negative whole amounts, not both zero."));
      }
      const implied = offerPercentage(askPSC, askIRR, valuation);
      floorPercentage = Number.isFinite(implied) ? Math.floor(implied) : settings.underpricedThreshold;
      if (floorPercentage < floor) {
        return ErrResult(
          new MarketError("PRICE_BELOW_FLOOR", `The price must be at least ${floor}% of the feature value.`, {
            floorPercentage: floor,
            offeredPercentage: floorPercentage,
          }),
        );
      }
    }

    const now = new Date();
    const doc: SellRequestDoc = {
      _id: generateId("sr"),
      sellerId: input.sellerId,
      featureId: feature._id,
      askPSC,
      askIRR,
      floorPercentage,
      status: "pending",
      createdAt: now,
      updatedAt: now,
    };
    const created = await this.deps.sellRequests.create(doc);
    if (created.isErr()) return ErrResult(storageFailure("creating listing", created.error));

    const listed = await this.deps.catalog.updateMarketStatus(feature._id, {
      kind: "listed",
      askPSC,
      askIRR,
      floorPercentage,
    });
    if (listed.isErr() || !listed.value) {
      const removed = await this.deps.sellRequests.deleteById(doc._id);
      if (removed.isErr()) {
        console.error(`[Settlement] Orphan listing ${doc._id} left after catalog update failed.`);
      }
      return ErrResult(
        storageFailure("updating feature listing", listed.isErr() ? listed.error : new Error("feature missing")),
      );
    }

    return OkResult(toSellRequestView(doc, settings));
  }

  async deleteSellRequest(sellRequestId: string, sellerId: string): Promise<MarketResult<void>> {
    const found = await this.deps.sellRequests.findById(sellRequestId);
    if (found.isErr()) return ErrResult(storageFailure("reading listing", found.error));
    const listing = found.value;
    if (!listing) {
      return ErrResult(new MarketError("SELL_REQUEST_NOT_FOUND", "Listing not found."));
    }
    if (listing.sellerId !== sellerId) {
      return ErrResult(new MarketError("UNAUTHORIZED", "Only the seller can remove this listing."));
    }
    if (listing.status !== "pending") {
      return ErrResult(new MarketError("REQUEST_NOT_PENDING", "This listing is already completed."));
    }

    const settingsRes = await this.loadSettings();
    if (settingsRes.isErr()) return ErrResult(settingsRes.error);
    const sellerRes = await this.loadProfile(sellerId);
    if (sellerRes.isErr()) return ErrResult(sellerRes.error);

    const removed = await this.deps.sellRequests.deleteById(sellRequestId);
    if (removed.isErr()) return ErrResult(storageFailure("deleting listing", removed.error));

    const delisted = await this.deps.catalog.updateMarketStatus(listing.featureId, {
      kind: "delisted",
      floorPercentage: pricingFloor(settingsRes.value, sellerRes.value.isMinor),
    });
    if (delisted.isErr()) {
      console.error(`[Settlement] Listing ${sellRequestId} removed but feature status not reset.`, delisted.error);
    }
    return OkResult(undefined);
  }

  // -------------------------------------------------------------------------
  // Listings
  // -------------------------------------------------------------------------

  async listBuyRequests(buyerId: string): Promise<MarketResult<BuyRequestView[]>> {
    const res = await this.deps.buyRequests.listByBuyer(buyerId);
    if (res.isErr()) return ErrResult(storageFailure("listing sent offers", res.error));
    return this.withLocks(res.value);
  }

  async listReceivedBuyRequests(sellerId: string): Promise<MarketResult<BuyRequestView[]>> {
    const res = await this.deps.buyRequests.listBySeller(sellerId);
    if (res.isErr()) return ErrResult(storageFailure("listing received offers", res.error));
    return this.withLocks(res.value);
  }

  async listSellRequests(sellerId: string): Promise<MarketResult<SellRequestView[]>> {
    const settingsRes = await this.loadSettings();
    if (settingsRes.isErr()) return ErrResult(settingsRes.error);
    const res = await this.deps.sellRequests.listBySeller(sellerId);
    if (res.isErr()) return ErrResult(storageFailure("listing sell requests", res.error));
    return OkResult(res.value.map((doc) => toSellRequestView(doc, settingsRes.value)));
  }

  private async withLocks(docs: BuyRequestDoc[]): Promise<MarketResult<BuyRequestView[]>> {
    const views: BuyRequestView[] = [];
    for (const doc of docs) {
      if (doc.status !== "pending") {
        views.push(toBuyRequestView(doc, null));
        continue;
      }
      const lock = await this.findLock(doc._id);
      if (lock.isErr()) return ErrResult(lock.error);
      views.push(toBuyRequestView(doc, lock.value));
    }
    return OkResult(views);
  }

  // -------------------------------------------------------------------------
  // Settlement steps
  // -------------------------------------------------------------------------

  /** Everything after the ownership flip. Failures here are logged, not returned. */
  private async completeTransfer(ctx: TransferContext): Promise<SettlementOutcome> {
    const { feature, buyer, settings } = ctx;

    let trade: TradeDoc | null = null;
    let commission: CommissionDoc | null = null;
    const tradeRes = await this.deps.trades.recordTrade({
      featureId: feature._id,
      buyerId: buyer.userId,
      sellerId: ctx.sellerId,
      settledPSC: ctx.settledPSC,
      settledIRR: ctx.settledIRR,
    });
    if (tradeRes.isErr()) {
      console.error(`[Settlement] Failed to record trade for ${feature._id}.`, tradeRes.error);
    } else {
      trade = tradeRes.value;
      if (ctx.commission) {
        const commissionRes = await this.deps.trades.recordCommission(
          trade._id,
          ctx.commission.feePSC,
          ctx.commission.feeIRR,
        );
        if (commissionRes.isErr()) {
          console.error(`[Settlement] Failed to record commission for ${trade._id}.`, commissionRes.error);
        } else {
          commission = commissionRes.value;
        }
      }
    }

    const profit = await this.profit.flushAndReassign({
      featureId: feature._id,
      oldOwnerId: ctx.sellerId,
      newOwnerId: buyer.userId,
      resource: CATEGORY_COLOR[feature.category],
      withdrawDays: buyer.withdrawProfitDays ?? settings.defaultWithdrawProfitDays,
    });
    if (profit.isErr()) {
      console.warn(`[ProfitContinuity] Transfer of ${feature._id} failed; continuing.`, profit.error.message);
    }

    const { reconciled, unresolved } = await this.reconcilePending(
      feature._id,
      settings,
      ctx.excludeRequestId,
    );

    const completed = await this.deps.sellRequests.completeForFeature(feature._id);
    if (completed.isErr()) {
      console.error(`[Settlement] Failed to complete listings of ${feature._id}.`, completed.error);
    }

    const status = await this.deps.catalog.updateMarketStatus(feature._id, {
      kind: "transferred",
      label: buyer.displayName,
      floorPercentage: pricingFloor(settings, buyer.isMinor),
    });
    if (status.isErr()) {
      console.error(`[Settlement] Failed to update status of ${feature._id}.`, status.error);
    }

    console.log(
      `[Settlement] ${ctx.operation}: ${feature._id} transferred ${ctx.sellerId} -> ${buyer.userId}.`,
      { tradeId: trade?._id, reconciled: reconciled.length, outstanding: ctx.outstandingCredits.length },
    );

    return {
      featureId: feature._id,
      previousOwnerId: ctx.sellerId,
      newOwnerId: buyer.userId,
      trade,
      commission,
      outstandingCredits: ctx.outstandingCredits,
      reconciledRequestIds: reconciled,
      unresolvedRequestIds: unresolved,
    };
  }

  /** Refunds and cancels every other pending offer on a feature that changed hands. */
  private async reconcilePending(
    featureId: string,
    settings: MarketplaceSettings,
    excludeRequestId?: string,
  ): Promise<{ reconciled: string[]; unresolved: string[] }> {
    const reconciled: string[] = [];
    const unresolved: string[] = [];

    const pending = await this.deps.buyRequests.listPendingByFeature(featureId);
    if (pending.isErr()) {
      console.error(`[Settlement] Could not list competing offers on ${featureId}.`, pending.error);
      return { reconciled, unresolved };
    }

    for (const request of pending.value) {
      if (request._id === excludeRequestId) continue;
      const refunded = await this.refundRequest(request, "cancelled", settings);
      if (refunded.isOk()) {
        reconciled.push(request._id);
      } else {
        console.warn(`[Settlement] Competing offer ${request._id} not reconciled: ${refunded.error.code}`);
        unresolved.push(request._id);
      }
    }

    return { reconciled, unresolved };
  }

  /**
   * Returns the full locked amount to the buyer and closes the request. Refund credits are
   * not compensated; a retry reuses the same keys, so a partial refund completes without
   * paying twice.
   */
  private async refundRequest(
    request: BuyRequestDoc,
    status: TerminalBuyRequestStatus,
    settings: MarketplaceSettings,
    signal?: AbortSignal,
  ): Promise<MarketResult<RefundResult>> {
    const token = generateId("claim");
    const claimed = await this.claim(request._id, token);
    if (claimed.isErr()) return ErrResult(claimed.error);

    const lockRes = await this.deps.escrow.get(request._id);
    if (lockRes.isErr()) {
      await this.releaseClaim(request._id, token);
      return ErrResult(asMarketError("reading escrow", lockRes.error));
    }
    const lock = lockRes.value;

    const journal = this.journal("refund", request._id, signal);
    const amounts: Record<CurrencyId, number> = { psc: lock.lockedPSC, irr: lock.lockedIRR };
    for (const currency of CURRENCY_ORDER) {
      if (amounts[currency] === 0) continue;
      const movement: LedgerMovement = {
        userId: request.buyerId,
        resource: currency,
        amount: amounts[currency],
        idempotencyKey: movementKey("refund", request._id, "credit", currency),
      };
      const credited = await journal.credit(movement, settings.creditRetryAttempts);
      if (credited.isOk()) continue;

      const failure =
        credited.error.kind === "ambiguous"
          ? await this.movementFailure(journal, "credit", movement, credited.error)
          : await this.refundFailure(journal, movement, credited.error);
      await this.releaseClaim(request._id, token);
      return ErrResult(failure);
    }

    await this.releaseEscrow(request._id);
    const finalized = await this.deps.buyRequests.finalize(request._id, token, status);
    if (finalized.isErr() || !finalized.value) {
      console.error(`[Settlement] Refunded buy request ${request._id} but could not mark it ${status}.`);
    }

    await this.recordHistory(journal, "buy_request", request._id);
    return OkResult({
      requestId: request._id,
      status,
      refundedPSC: lock.lockedPSC,
      refundedIRR: lock.lockedIRR,
    });
  }

  /** Credits each movement; failures become incidents and are returned as outstanding. */
  private async disburse(
    journal: LedgerJournal,
    credits: readonly LedgerMovement[],
    settings: MarketplaceSettings,
  ): Promise<OutstandingCredit[]> {
    const outstanding: OutstandingCredit[] = [];
    for (const movement of credits) {
      if (movement.amount === 0) continue;
      const res = await journal.credit(movement, settings.creditRetryAttempts);
      if (res.isOk()) continue;

      const incidentId =
        res.error.kind === "ambiguous"
          ? await journal.flagAmbiguous("credit", movement, res.error)
          : await reportIncident(this.deps.incidents, {
              kind: "credit_outstanding",
              operation: journal.operation,
              entityId: journal.entityId,
              userId: movement.userId,
              resource: movement.resource,
              amount: movement.amount,
              idempotencyKey: movement.idempotencyKey,
              message: res.error.message,
            });
      outstanding.push({ ...movement, incidentId });
    }
    return outstanding;
  }

  /** Debits through the journal; on failure reverses what the journal already holds. */
  private async debit(journal: LedgerJournal, movement: LedgerMovement): Promise<MarketResult<void>> {
    if (movement.amount === 0) return OkResult(undefined);
    const res = await journal.debit(movement);
    if (res.isOk()) return OkResult(undefined);
    const failure = await this.movementFailure(journal, "debit", movement, res.error);
    return ErrResult(await this.unwind(journal, failure));
  }

  private async unwind(journal: LedgerJournal, failure: MarketError): Promise<MarketError> {
    const res = await journal.compensate();
    if (res.isErr()) return failure.withCompensationFailure(res.error);
    return failure;
  }

  /**
   * Refunds an offer whose feature no longer belongs to its seller. Resolves to null while the
   * seller still owns it or when the feature cannot be read.
   */
  private async refundIfTransferred(
    request: BuyRequestDoc,
    settings: MarketplaceSettings,
    signal?: AbortSignal,
  ): Promise<MarketResult<RefundResult> | null> {
    const current = await this.deps.catalog.getFeature(request.featureId);
    if (current.isErr()) {
      console.warn(`[Settlement] Could not re-read ${request.featureId} for ${request._id}.`, current.error);
      return null;
    }
    if (current.value?.ownerId === request.sellerId) return null;

    console.warn(`[Settlement] Feature ${request.featureId} changed hands; refunding ${request._id}.`);
    return this.refundRequest(request, "cancelled", settings, signal);
  }

  /** Removes a buy request whose funds never reached escrow; debits are already reversed. */
  private async abandonBuyRequest(requestId: string, failure: MarketError): Promise<MarketError> {
    const removed = await this.deps.buyRequests.deleteById(requestId);
    if (removed.isErr()) {
      console.error(`[Settlement] Could not remove abandoned buy request ${requestId}.`, removed.error);
    }
    return failure;
  }

  private async movementFailure(
    journal: LedgerJournal,
    direction: MovementDirection,
    movement: LedgerMovement,
    error: LedgerError,
  ): Promise<MarketError> {
    switch (error.kind) {
      case "insufficient_balance":
        return this.insufficientBalance(movement.userId, movement.resource, movement.amount);
      case "rejected":
        return new MarketError(
          "LEDGER_REJECTED",
          `The ledger rejected a ${direction} of ${movement.amount} ${movement.resource}.`,
          { resource: movement.resource, required: movement.amount },
          { cause: error },
        );
      case "ambiguous": {
        const incidentId = await journal.flagAmbiguous(direction, movement, error);
        return new MarketError(
          "AMBIGUOUS_LEDGER_FAILURE",
          `The outcome of a ${direction} of ${movement.amount} ${movement.resource} is unknown.`,
          { resource: movement.resource, required: movement.amount },
          { cause: error, incidentId },
        );
      }
    }
  }

  private async refundFailure(
    journal: LedgerJournal,
    movement: LedgerMovement,
    error: LedgerError,
  ): Promise<MarketError> {
    const incidentId = await reportIncident(this.deps.incidents, {
      kind: "refund_failed",
      operation: journal.operation,
      entityId: journal.entityId,
      userId: movement.userId,
      resource: movement.resource,
      amount: movement.amount,
      idempotencyKey: movement.idempotencyKey,
      message: error.message,
    });
    return new MarketError(
      "LEDGER_REJECTED",
      `The ledger rejected the refund of ${movement.amount} ${movement.resource}.`,
      { resource: movement.resource, required: movement.amount },
      { cause: error, incidentId },
    );
  }

  private async insufficientBalance(
    userId: string,
    resource: ResourceId,
    required: number,
  ): Promise<MarketError> {
    const balance = await this.deps.ledger.getBalance(userId, resource);
    const available = balance.isOk() ? balance.value : undefined;
    return new MarketError(
      "INSUFFICIENT_BALANCE",
      `Insufficient ${resource}: ${required} required.`,
      { resource, required, available },
    );
  }

  private async ensureFunds(
    userId: string,
    resource: ResourceId,
    amount: number,
    signal?: AbortSignal,
  ): Promise<MarketResult<void>> {
    if (amount === 0) return OkResult(undefined);
    const res = await this.deps.ledger.checkBalance(userId, resource, amount, { signal });
    if (res.isErr()) {
      return ErrResult(
        new MarketError("LEDGER_UNAVAILABLE", `Could not read the ${resource} balance.`, { resource }, {
          cause: res.error,
        }),
      );
    }
    if (!res.value) return ErrResult(await this.insufficientBalance(userId, resource, amount));
    return OkResult(undefined);
  }

  private async ensureNotRestricted(
    sellerId: string,
    featureId: string,
    settings: MarketplaceSettings,
  ): Promise<MarketResult<void>> {
    const res = await this.cooldown.isRestricted(sellerId, featureId, settings);
    if (res.isErr()) return ErrResult(storageFailure("checking underpriced cooldown", res.error));
    if (res.value.restricted) {
      return ErrResult(
        new MarketError(
          "UNDERPRICED_COOLDOWN_ACTIVE",
          "Seller is restricted after an underpriced sale.",
          { remainingMs: res.value.remainingMs },
        ),
      );
    }
    return OkResult(undefined);
  }

  private async transferOwnership(
    featureId: string,
    expectedOwnerId: string,
    newOwnerId: string,
  ): Promise<MarketResult<FeatureDoc>> {
    const res = await this.deps.catalog.setOwner(featureId, expectedOwnerId, newOwnerId);
    if (res.isErr()) return ErrResult(storageFailure("transferring ownership", res.error));
    if (!res.value) {
      return ErrResult(
        new MarketError("OWNERSHIP_CONFLICT", "Another settlement transferred this feature first."),
      );
    }
    return OkResult(res.value);
  }

  private async claim(requestId: string, token: string): Promise<MarketResult<BuyRequestDoc>> {
    const res = await this.deps.buyRequests.claim(requestId, token);
    if (res.isErr()) return ErrResult(storageFailure("claiming buy request", res.error));
    if (!res.value) {
      return ErrResult(
        new MarketError("REQUEST_BUSY", "This offer is being processed or is no longer pending."),
      );
    }
    return OkResult(res.value);
  }

  private async releaseClaim(requestId: string, token: string): Promise<void> {
    const res = await this.deps.buyRequests.releaseClaim(requestId, token);
    if (res.isErr()) {
      console.error(`[Settlement] Failed to release claim on ${requestId}.`, res.error);
    }
  }

  private async releaseEscrow(requestId: string): Promise<void> {
    const res = await this.deps.escrow.release(requestId);
    if (res.isErr()) {
      console.error(`[Escrow] Failed to release lock of ${requestId}.`, res.error);
    }
  }

  private async findLock(requestId: string): Promise<MarketResult<LockedAssetDoc | null>> {
    const res = await this.deps.escrow.get(requestId);
    if (res.isOk()) return OkResult(res.value);
    if (res.error instanceof MarketError && res.error.code === "ESCROW_NOT_FOUND") return OkResult(null);
    return ErrResult(asMarketError("reading escrow", res.error));
  }

  /** Ledger history entries for confirmed movements. Best effort. */
  private async recordHistory(
    journal: LedgerJournal,
    relatedEntityType: LedgerTransaction["relatedEntityType"],
    relatedEntityId: string,
  ): Promise<void> {
    for (const entry of journal.entries) {
      const res = await this.deps.ledger.recordTransaction({
        userId: entry.movement.userId,
        resource: entry.movement.resource,
        amount: entry.movement.amount,
        direction: entry.direction === "debit" ? "withdraw" : "deposit",
        relatedEntityType,
        relatedEntityId,
      });
      if (res.isErr()) {
        console.warn(`[Settlement] Failed to record ledger history for ${relatedEntityId}.`, res.error.message);
      }
    }
  }

  private journal(operation: string, entityId: string, signal?: AbortSignal): LedgerJournal {
    return new LedgerJournal(this.deps.ledger, this.deps.incidents, operation, entityId, signal);
  }

  // -------------------------------------------------------------------------
  // Lookups
  // -------------------------------------------------------------------------

  private async loadSettings(): Promise<MarketResult<MarketplaceSettings>> {
    try {
      return OkResult(await this.deps.settings.get());
    } catch (error) {
      return ErrResult(storageFailure("loading marketplace settings", toError(error)));
    }
  }

  private async loadFeature(featureId: string): Promise<MarketResult<FeatureDoc>> {
    const res = await this.deps.catalog.getFeature(featureId);
    if (res.isErr()) return ErrResult(storageFailure("reading feature", res.error));
    if (!res.value) return ErrResult(new MarketError("FEATURE_NOT_FOUND", "Feature not found."));
    return OkResult(res.value);
  }

  private async loadPendingRequest(requestId: string): Promise<MarketResult<BuyRequestDoc>> {
    const res = await this.deps.buyRequests.findById(requestId);
    if (res.isErr()) return ErrResult(storageFailure("reading buy request", res.error));
    const request = res.value;
    if (!request) return ErrResult(new MarketError("BUY_REQUEST_NOT_FOUND", "Offer not found."));
    if (request.status !== "pending" || request.deletedAt !== null) {
      return ErrResult(new MarketError("REQUEST_NOT_PENDING", "This offer is no longer pending."));
    }
    return OkResult(request);
  }

  private async loadProfile(userId: string): Promise<MarketResult<UserProfile>> {
    const res = await this.deps.identity.getProfile(userId);
    if (res.isErr()) return ErrResult(storageFailure("reading user profile", res.error));
    return OkResult(res.value ?? { userId, displayName: userId, isMinor: false });
  }

  private async loadValuation(feature: FeatureDoc): Promise<MarketResult<ValuationInput>> {
    const colorRate = await this.deps.rates.getRate(CATEGORY_COLOR[feature.category]);
    if (colorRate.isErr()) return ErrResult(storageFailure("reading color rate", colorRate.error));
    const pscRate = await this.deps.rates.getRate("psc");
    if (pscRate.isErr()) return ErrResult(storageFailure("reading PSC rate", pscRate.error));
    return OkResult({
      stabilityValue: feature.stabilityValue,
      colorRate: colorRate.value,
      pscRate: pscRate.value,
    });
  }
}
