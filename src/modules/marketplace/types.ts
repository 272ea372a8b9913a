/**
 * Marketplace domain types.
 *
 * Purpose: Define resources, statuses, service contracts and the error model of the
 * parcel escrow and settlement engine.
 */

import type { Result } from "@/utils/result";
import type { CommissionDoc, TradeDoc } from "./schema";

export const CURRENCIES = ["psc", "irr"] as const;
export const COLOR_RESOURCES = ["yellow", "red", "blue"] as const;
export const RESOURCES = ["psc", "irr", "yellow", "red", "blue"] as const;
export const FEATURE_CATEGORIES = ["residential", "commercial", "educational"] as const;
export const MARKET_STATUSES = [
  "unlisted",
  "listed_unpriced",
  "listed_priced",
  "sold_pending",
] as const;
export const BUY_REQUEST_STATUSES = ["pending", "accepted", "rejected", "cancelled"] as const;
export const SELL_REQUEST_STATUSES = ["pending", "completed"] as const;

/** PSC is the in-game token (price component A), IRR the fiat-pegged currency (component B). */
export type CurrencyId = (typeof CURRENCIES)[number];
export type ColorResource = (typeof COLOR_RESOURCES)[number];
export type ResourceId = (typeof RESOURCES)[number];
export type FeatureCategory = (typeof FEATURE_CATEGORIES)[number];
export type MarketStatus = (typeof MARKET_STATUSES)[number];
export type BuyRequestStatus = (typeof BUY_REQUEST_STATUSES)[number];
export type SellRequestStatus = (typeof SELL_REQUEST_STATUSES)[number];

export const CATEGORY_COLOR: Readonly<Record<FeatureCategory, ColorResource>> = {
  residential: "yellow",
  commercial: "red",
  educational: "blue",
};

export type AcquisitionPath = "limited" | "primary" | "secondary";

/**
 * The only feature mutations this engine performs besides the ownership flip.
 */
export type FeatureUpdate =
  | {
      readonly kind: "listed";
      readonly askPSC: number;
      readonly askIRR: number;
      readonly floorPercentage: number;
    }
  | { readonly kind: "delisted"; readonly floorPercentage: number }
  | { readonly kind: "transferred"; readonly label: string; readonly floorPercentage: number };

export interface OperationOptions {
  /** Cancels outstanding ledger calls of the forward path. */
  readonly signal?: AbortSignal;
  /**
   * Stable id of the operation; idempotency keys of an immediate buy derive from it, so a
   * client retry with the same id cannot charge twice.
   */
  readonly operationId?: string;
}

export interface SendBuyRequestInput {
  readonly buyerId: string;
  readonly featureId: string;
  readonly pricePSC: number;
  readonly priceIRR: number;
  readonly note?: string;
}

export interface BuyFeatureInput {
  readonly buyerId: string;
  readonly featureId: string;
}

/**
 * Raw listing input. Either explicit prices or a percentage of the valuation, never both.
 */
export interface CreateSellRequestInput {
  readonly sellerId: string;
  readonly featureId: string;
  readonly pricePSC?: number;
  readonly priceIRR?: number;
  readonly percentage?: number;
}

export interface BuyRequestView {
  readonly requestId: string;
  readonly featureId: string;
  readonly buyerId: string;
  readonly sellerId: string;
  readonly pricePSC: number;
  readonly priceIRR: number;
  readonly note: string;
  readonly status: BuyRequestStatus;
  readonly gracePeriodDeadline: Date | null;
  readonly lockedPSC: number;
  readonly lockedIRR: number;
  readonly createdAt: Date;
}

export interface SellRequestView {
  readonly sellRequestId: string;
  readonly featureId: string;
  readonly askPSC: number;
  readonly askIRR: number;
  readonly floorPercentage: number;
  readonly underpriced: boolean;
  readonly status: SellRequestStatus;
  readonly createdAt: Date;
}

/** A credit the ledger did not confirm; tracked by an open incident. */
export interface OutstandingCredit {
  readonly userId: string;
  readonly resource: ResourceId;
  readonly amount: number;
  readonly idempotencyKey: string;
  readonly incidentId?: string;
}

export interface SettlementOutcome {
  readonly featureId: string;
  readonly previousOwnerId: string;
  readonly newOwnerId: string;
  /** Null when the trade record could not be written; the sale itself stands. */
  readonly trade: TradeDoc | null;
  readonly commission: CommissionDoc | null;
  readonly outstandingCredits: readonly OutstandingCredit[];
  readonly reconciledRequestIds: readonly string[];
  readonly unresolvedRequestIds: readonly string[];
}

export interface BuyFeatureResult extends SettlementOutcome {
  readonly path: AcquisitionPath;
}

export interface AcceptBuyRequestResult extends SettlementOutcome {
  readonly requestId: string;
}

export interface RefundResult {
  readonly requestId: string;
  readonly status: BuyRequestStatus;
  readonly refundedPSC: number;
  readonly refundedIRR: number;
}

export interface MarketplaceService {
  buyFeature(input: BuyFeatureInput, options?: OperationOptions): Promise<MarketResult<BuyFeatureResult>>;
  sendBuyRequest(
    input: SendBuyRequestInput,
    options?: OperationOptions,
  ): Promise<MarketResult<BuyRequestView>>;
  acceptBuyRequest(
    requestId: string,
    sellerId: string,
    options?: OperationOptions,
  ): Promise<MarketResult<AcceptBuyRequestResult>>;
  rejectBuyRequest(
    requestId: string,
    sellerId: string,
    options?: OperationOptions,
  ): Promise<MarketResult<RefundResult>>;
  deleteBuyRequest(
    requestId: string,
    buyerId: string,
    options?: OperationOptions,
  ): Promise<MarketResult<RefundResult>>;
  updateGracePeriod(
    requestId: string,
    sellerId: string,
    days: number,
  ): Promise<MarketResult<BuyRequestView>>;
  createSellRequest(input: CreateSellRequestInput): Promise<MarketResult<SellRequestView>>;
  deleteSellRequest(sellRequestId: string, sellerId: string): Promise<MarketResult<void>>;
  listBuyRequests(buyerId: string): Promise<MarketResult<BuyRequestView[]>>;
  listReceivedBuyRequests(sellerId: string): Promise<MarketResult<BuyRequestView[]>>;
  listSellRequests(sellerId: string): Promise<MarketResult<SellRequestView[]>>;
}

export type MarketErrorCode =
  | "INSUFFICIENT_BALANCE"
  | "PRICE_BELOW_FLOOR"
  | "UNDERPRICED_COOLDOWN_ACTIVE"
  | "REQUEST_NOT_PENDING"
  | "UNAUTHORIZED"
  | "FEATURE_NOT_FOUND"
  | "ESCROW_NOT_FOUND"
  | "DUPLICATE_LOCK"
  | "AMBIGUOUS_LEDGER_FAILURE"
  | "COMPENSATION_FAILED"
  | "BUY_REQUEST_NOT_FOUND"
  | "SELL_REQUEST_NOT_FOUND"
  | "OWNERSHIP_CONFLICT"
  | "REQUEST_BUSY"
  | "INVALID_PRICE"
  | "INVALID_GRACE_PERIOD"
  | "FEATURE_NOT_FOR_SALE"
  | "SELF_TRADE_FORBIDDEN"
  | "DUPLICATE_REQUEST"
  | "SELL_REQUEST_EXISTS"
  | "QUOTA_EXCEEDED"
  | "LEDGER_REJECTED"
  | "LEDGER_UNAVAILABLE"
  | "STORAGE_FAILURE";

export interface MarketErrorDetails {
  readonly resource?: ResourceId;
  readonly required?: number;
  readonly available?: number;
  readonly remainingMs?: number;
  readonly floorPercentage?: number;
  readonly offeredPercentage?: number;
}

export interface MarketErrorOptions {
  readonly cause?: unknown;
  /** Set when reversing earlier ledger movements also failed. */
  readonly compensationFailure?: MarketError;
  /** Incident recorded for manual reconciliation. */
  readonly incidentId?: string;
}

export class MarketError extends Error {
  readonly compensationFailure?: MarketError;
  readonly incidentId?: string;

  constructor(
    public readonly code: MarketErrorCode,
    message: string,
    public readonly details: MarketErrorDetails = {},
    options: MarketErrorOptions = {},
  ) {
    super(message, options.cause === undefined ? undefined : { cause: options.cause });
    this.name = "MarketError";
    this.compensationFailure = options.compensationFailure;
    this.incidentId = options.incidentId;
  }

  /** Copy of this error carrying the failed compensation. */
  withCompensationFailure(failure: MarketError): MarketError {
    return new MarketError(this.code, this.message, this.details, {
      cause: this.cause,
      compensationFailure: failure,
      incidentId: this.incidentId,
    });
  }

  get requiresReconciliation(): boolean {
    return this.code === "AMBIGUOUS_LEDGER_FAILURE" || this.compensationFailure !== undefined;
  }
}

export type MarketResult<T> = Result<T, MarketError>;

