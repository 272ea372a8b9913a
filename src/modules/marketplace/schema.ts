/**
 * Marketplace persistence schemas.
 *
 * Purpose: Validate documents read from Mongo; the inferred types are the record shapes
 * used across the engine.
 */

import { z } from "zod";
import {
  BUY_REQUEST_STATUSES,
  COLOR_RESOURCES,
  FEATURE_CATEGORIES,
  MARKET_STATUSES,
  RESOURCES,
  SELL_REQUEST_STATUSES,
} from "./types";

/** Amounts are integer minor units. */
export const AmountSchema = z.number().int().nonnegative();

export const ResourceSchema = z.enum(RESOURCES);

export const FeatureSchema = z.object({
  _id: z.string(),
  ownerId: z.string(),
  category: z.enum(FEATURE_CATEGORIES),
  sequence: z.number().int(),
  stabilityValue: AmountSchema,
  listedPricePSC: AmountSchema.nullable().catch(null),
  listedPriceIRR: AmountSchema.nullable().catch(null),
  minimumPricePercentage: z.number().nonnegative(),
  marketStatus: z.enum(MARKET_STATUSES).catch("unlisted"),
  label: z.string().catch(""),
  version: z.number().int().nonnegative().catch(0),
  createdAt: z.date(),
  updatedAt: z.date(),
});

export const BuyRequestSchema = z.object({
  _id: z.string(),
  buyerId: z.string(),
  sellerId: z.string(),
  featureId: z.string(),
  pricePSC: AmountSchema,
  priceIRR: AmountSchema,
  feeRateBps: z.number().int().nonnegative(),
  note: z.string().catch(""),
  status: z.enum(BUY_REQUEST_STATUSES),
  gracePeriodDeadline: z.date().nullable().catch(null),
  claimToken: z.string().nullable(),
  deletedAt: z.date().nullable(),
  createdAt: z.date(),
  updatedAt: z.date(),
});

export const LockedAssetSchema = z.object({
  _id: z.string(),
  featureId: z.string(),
  lockedPSC: AmountSchema,
  lockedIRR: AmountSchema,
  createdAt: z.date(),
  updatedAt: z.date(),
});

export const SellRequestSchema = z.object({
  _id: z.string(),
  sellerId: z.string(),
  featureId: z.string(),
  askPSC: AmountSchema,
  askIRR: AmountSchema,
  floorPercentage: z.number().nonnegative(),
  status: z.enum(SELL_REQUEST_STATUSES),
  createdAt: z.date(),
  updatedAt: z.date(),
});

export const TradeSchema = z.object({
  _id: z.string(),
  featureId: z.string(),
  buyerId: z.string(),
  sellerId: z.string(),
  settledPSC: AmountSchema,
  settledIRR: AmountSchema,
  createdAt: z.date(),
});

export const CommissionSchema = z.object({
  _id: z.string(),
  tradeId: z.string(),
  feePSC: AmountSchema,
  feeIRR: AmountSchema,
  createdAt: z.date(),
});

export const HourlyProfitSchema = z.object({
  _id: z.string(),
  featureId: z.string(),
  currentHolderId: z.string(),
  resourceType: z.enum(COLOR_RESOURCES),
  accruedAmount: AmountSchema,
  nextWithdrawDeadline: z.date(),
  isActive: z.boolean(),
  version: z.number().int().nonnegative(),
  createdAt: z.date(),
  updatedAt: z.date(),
});

export const FeatureLimitationSchema = z.object({
  _id: z.string(),
  title: z.string(),
  startsAt: z.date(),
  endsAt: z.date(),
  startSequence: z.number().int(),
  endSequence: z.number().int(),
  priceEnforced: z.boolean(),
  individualBuyLimit: z.boolean(),
  individualBuyCount: z.number().int().nonnegative(),
  expired: z.boolean().catch(false),
  createdAt: z.date(),
  updatedAt: z.date(),
});

export const LimitedPurchaseSchema = z.object({
  _id: z.string(),
  userId: z.string(),
  limitationId: z.string(),
  featureId: z.string(),
  createdAt: z.date(),
});

export const INCIDENT_KINDS = [
  "ambiguous_ledger",
  "compensation_failed",
  "credit_outstanding",
  "refund_failed",
] as const;

export const IncidentSchema = z.object({
  _id: z.string(),
  kind: z.enum(INCIDENT_KINDS),
  operation: z.string(),
  entityId: z.string(),
  userId: z.string(),
  resource: ResourceSchema,
  amount: AmountSchema,
  idempotencyKey: z.string(),
  message: z.string(),
  status: z.enum(["open", "resolved"]),
  createdAt: z.date(),
  resolvedAt: z.date().nullable(),
});

export type FeatureDoc = z.infer<typeof FeatureSchema>;
export type BuyRequestDoc = z.infer<typeof BuyRequestSchema>;
export type LockedAssetDoc = z.infer<typeof LockedAssetSchema>;
export type SellRequestDoc = z.infer<typeof SellRequestSchema>;
export type TradeDoc = z.infer<typeof TradeSchema>;
export type CommissionDoc = z.infer<typeof CommissionSchema>;
export type HourlyProfitDoc = z.infer<typeof HourlyProfitSchema>;
export type FeatureLimitationDoc = z.infer<typeof FeatureLimitationSchema>;
export type LimitedPurchaseDoc = z.infer<typeof LimitedPurchaseSchema>;
export type IncidentKind = (typeof INCIDENT_KINDS)[number];
export type IncidentDoc = z.infer<typeof IncidentSchema>;
