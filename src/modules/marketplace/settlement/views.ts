import type { MarketplaceSettings } from "@/configuration";
import { isUnderpriced } from "../pricing";
import type { BuyRequestDoc, LockedAssetDoc, SellRequestDoc } from "../schema";
import type { BuyRequestView, SellRequestView } from "../types";

export function toBuyRequestView(doc: BuyRequestDoc, lock: LockedAssetDoc | null): BuyRequestView {
  return {
    requestId: doc._id,
    featureId: doc.featureId,
    buyerId: doc.buyerId,
    sellerId: doc.sellerId,
    pricePSC: doc.pricePSC,
    priceIRR: doc.priceIRR,
    note: doc.note,
    status: doc.status,
    gracePeriodDeadline: doc.gracePeriodDeadline,
    lockedPSC: lock?.lockedPSC ?? 0,
    lockedIRR: lock?.lockedIRR ?? 0,
    createdAt: doc.createdAt,
  };
}

export function toSellRequestView(doc: SellRequestDoc, settings: MarketplaceSettings): SellRequestView {
  return {
    sellRequestId: doc._id,
    featureId: doc.featureId,
    askPSC: doc.askPSC,
    askIRR: doc.askIRR,
    floorPercentage: doc.floorPercentage,
    underpriced: isUnderpriced(doc.floorPercentage, settings),
    status: doc.status,
    createdAt: doc.createdAt,
  };
}
