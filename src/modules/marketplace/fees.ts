/**
 * Fee schedule.
 *
 * Purpose: Split a price into what the buyer pays, what the seller receives and what the
 * platform keeps. Buyer and seller are charged the same fee, so the platform takes twice it.
 *
 * Invariant (per currency, for every price):
 *   buyerCharge(p) === sellerPayment(p) + platformFee(p)
 */

export const BPS_DENOMINATOR = 10_000;

export interface FeeBreakdown {
  readonly price: number;
  readonly fee: number;
  readonly buyerCharge: number;
  readonly sellerPayment: number;
  readonly platformFee: number;
}

function assertAmount(value: number, label: string): void {
  if (!Number.isSafeInteger(value) || value < 0) {
    throw new RangeError(`${label} must be a non-negative integer, got ${value}`);
  }
}

/** One side's fee, floored. BigInt keeps the product exact for large prices. */
export function feeFor(price: number, feeRateBps: number): number {
  assertAmount(price, "price");
  assertAmount(feeRateBps, "feeRateBps");
  return Number((BigInt(price) * BigInt(feeRateBps)) / BigInt(BPS_DENOMINATOR));
}

export function buyerCharge(price: number, feeRateBps: number): number {
  return price + feeFor(price, feeRateBps);
}

export function sellerPayment(price: number, feeRateBps: number): number {
  return price - feeFor(price, feeRateBps);
}

export function platformFee(price: number, feeRateBps: number): number {
  return 2 * feeFor(price, feeRateBps);
}

export function splitPrice(price: number, feeRateBps: number): FeeBreakdown {
  const fee = feeFor(price, feeRateBps);
  return {
    price,
    fee,
    buyerCharge: price + fee,
    sellerPayment: price - fee,
    platformFee: 2 * fee,
  };
}
