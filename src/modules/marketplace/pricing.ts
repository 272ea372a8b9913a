/**
 * Pricing rules.
 *
 * Purpose: Valuation-relative price checks for offers and listings. A feature is valued at
 * `stabilityValue` units of its category color; offers are compared against that valuation
 * as a percentage.
 */

import type { MarketplaceSettings } from "@/configuration";

export interface ValuationInput {
  readonly stabilityValue: number;
  /** IRR value of one unit of the feature's color. */
  readonly colorRate: number;
  /** IRR value of one PSC. */
  readonly pscRate: number;
}

export function isAmount(value: unknown): value is number {
  return typeof value === "number" && Number.isSafeInteger(value) && value >= 0;
}

export function valuationOf(input: ValuationInput): number {
  return input.stabilityValue * input.colorRate;
}

/**
 * Offer as a percentage of the valuation. A feature with no valuation accepts any offer.
 */
export function offerPercentage(
  pricePSC: number,
  priceIRR: number,
  input: ValuationInput,
): number {
  const valuation = valuationOf(input);
  if (valuation <= 0) return Number.POSITIVE_INFINITY;
  return ((priceIRR + pricePSC * input.pscRate) * 100) / valuation;
}

/** Minors list and buy against a higher floor. */
export function pricingFloor(settings: MarketplaceSettings, isMinor: boolean): number {
  return isMinor ? settings.minorPricingLimit : settings.publicPricingLimit;
}

/**
 * Ask prices for a listing expressed as a percentage: half of the total in IRR, the other
 * half converted to PSC.
 */
export function pricesFromPercentage(
  percentage: number,
  input: ValuationInput,
): { askPSC: number; askIRR: number } {
  const total = (valuationOf(input) * percentage) / 100;
  const half = total * 0.5;
  return {
    askPSC: input.pscRate > 0 ? Math.floor(half / input.pscRate) : 0,
    askIRR: Math.floor(half),
  };
}

export function isUnderpriced(floorPercentage: number, settings: MarketplaceSettings): boolean {
  return floorPercentage < settings.underpricedThreshold;
}
