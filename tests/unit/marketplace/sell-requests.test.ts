/**
 * Unit Tests: Owner listings
 */

import { afterEach, beforeEach, describe, it, expect, vi } from "vitest";
import { createHarness, expectErr, expectOk, makeFeature, type Harness } from "../../_utils/fakes";

const SELLER = "seller-1";
const BUYER = "buyer-1";

describe("createSellRequest", () => {
  let h: Harness;

  beforeEach(() => {
    h = createHarness();
    h.catalog.add(makeFeature({ _id: "feat-1", ownerId: SELLER }));
    h.identity.add({ userId: SELLER, displayName: "Seller One", isMinor: false });
  });

  it("derives prices from a percentage of the valuation", async () => {
    const view = expectOk(await h.service.createSellRequest({ sellerId: SELLER, featureId: "feat-1", percentage: 120 }));

    expect(view).toMatchObject({
      featureId: "feat-1",
      askPSC: 600,
      askIRR: 600_000,
      floorPercentage: 120,
      underpriced: false,
      status: "pending",
    });
    expect(h.catalog.features.get("feat-1")).toMatchObject({
      marketStatus: "listed_priced",
      listedPricePSC: 600,
      listedPriceIRR: 600_000,
      minimumPricePercentage: 120,
    });
  });

  it("rejects a percentage under the shortcut minimum", async () => {
    const error = expectErr(await h.service.createSellRequest({ sellerId: SELLER, featureId: "feat-1", percentage: 70 }));
    expect(error.code).toBe("PRICE_BELOW_FLOOR");
    expect(error.details).toEqual({ floorPercentage: 80, offeredPercentage: 70 });
  });

  it("applies the minor floor", async () => {
    h.identity.add({ userId: SELLER, displayName: "Seller One", isMinor: true });
    const error = expectErr(await h.service.createSellRequest({ sellerId: SELLER, featureId: "feat-1", percentage: 100 }));
    expect(error.code).toBe("PRICE_BELOW_FLOOR");
    expect(error.details.floorPercentage).toBe(110);
  });

  it("marks explicit prices under the threshold as underpriced", async () => {
    const view = expectOk(
      await h.service.createSellRequest({ sellerId: SELLER, featureId: "feat-1", pricePSC: 0, priceIRR: 900_000 }),
    );
    expect(view.floorPercentage).toBe(90);
    expect(view.underpriced).toBe(true);
  });

  it("rejects explicit prices under the floor", async () => {
    const error = expectErr(
      await h.service.createSellRequest({ sellerId: SELLER, featureId: "feat-1", pricePSC: 0, priceIRR: 500_000 }),
    );
    expect(error.code).toBe("PRICE_BELOW_FLOOR");
    expect(error.details).toEqual({ floorPercentage: 80, offeredPercentage: 50 });
    expect(h.sellRequests.docs.size).toBe(0);
  });

  it("takes either prices or a percentage", async () => {
    const both = expectErr(
      await h.service.createSellRequest({ sellerId: SELLER, featureId: "feat-1", priceIRR: 900_000, percentage: 90 }),
    );
    const neither = expectErr(await h.service.createSellRequest({ sellerId: SELLER, featureId: "feat-1" }));
    expect(both.code).toBe("INVALID_PRICE");
    expect(neither.code).toBe("INVALID_PRICE");
  });

  it("only lets the owner list", async () => {
    const error = expectErr(await h.service.createSellRequest({ sellerId: BUYER, featureId: "feat-1", percentage: 120 }));
    expect(error.code).toBe("UNAUTHORIZED");
  });

  it("allows one pending listing per feature", async () => {
    expectOk(await h.service.createSellRequest({ sellerId: SELLER, featureId: "feat-1", percentage: 120 }));
    const error = expectErr(await h.service.createSellRequest({ sellerId: SELLER, featureId: "feat-1", percentage: 130 }));
    expect(error.code).toBe("SELL_REQUEST_EXISTS");
  });
});

describe("deleteSellRequest", () => {
  let h: Harness;
  let sellRequestId: string;

  beforeEach(async () => {
    h = createHarness();
    h.catalog.add(makeFeature({ _id: "feat-1", ownerId: SELLER }));
    sellRequestId = expectOk(
      await h.service.createSellRequest({ sellerId: SELLER, featureId: "feat-1", percentage: 120 }),
    ).sellRequestId;
  });

  it("removes the listing and clears the asking price", async () => {
    expectOk(await h.service.deleteSellRequest(sellRequestId, SELLER));

    expect(h.catalog.features.get("feat-1")).toMatchObject({
      marketStatus: "listed_unpriced",
      listedPricePSC: null,
      listedPriceIRR: null,
      minimumPricePercentage: 80,
    });
    expect(expectOk(await h.service.listSellRequests(SELLER))).toEqual([]);
  });

  it("only lets the seller remove it", async () => {
    expect(expectErr(await h.service.deleteSellRequest(sellRequestId, BUYER)).code).toBe("UNAUTHORIZED");
  });

  it("fails for an unknown listing", async () => {
    expect(expectErr(await h.service.deleteSellRequest("sr_missing", SELLER)).code).toBe("SELL_REQUEST_NOT_FOUND");
  });
});

describe("listing at an underpriced level", () => {
  beforeEach(() => {
    vi.useFakeTimers({ toFake: ["Date"] });
    vi.setSystemTime(new Date("2026-06-01T00:00:00.000Z"));
  });

  afterEach(() => {
    vi.useRealTimers();
  });

  it("locks the seller out of the next sale for the cooldown window", async () => {
    const h = createHarness();
    h.catalog.add(makeFeature({ _id: "feat-1", ownerId: SELLER }));
    h.catalog.add(makeFeature({ _id: "feat-2", ownerId: SELLER }));
    h.ledger.setBalance(BUYER, "irr", 2_000_000);
    h.ledger.setBalance("buyer-2", "irr", 2_000_000);

    expectOk(await h.service.createSellRequest({ sellerId: SELLER, featureId: "feat-1", pricePSC: 0, priceIRR: 900_000 }));
    expectOk(await h.service.buyFeature({ buyerId: BUYER, featureId: "feat-1" }));
    expectOk(await h.service.createSellRequest({ sellerId: SELLER, featureId: "feat-2", percentage: 120 }));

    const error = expectErr(await h.service.buyFeature({ buyerId: "buyer-2", featureId: "feat-2" }));

    expect(error.code).toBe("UNDERPRICED_COOLDOWN_ACTIVE");
    expect(error.details.remainingMs).toBe(24 * 60 * 60 * 1000);
    expect(h.ledger.balance("buyer-2", "irr")).toBe(2_000_000);
  });

  it("keeps the lock when the seller lists another feature underpriced", async () => {
    const h = createHarness();
    h.catalog.add(makeFeature({ _id: "feat-1", ownerId: SELLER }));
    h.catalog.add(makeFeature({ _id: "feat-2", ownerId: SELLER }));
    h.ledger.setBalance(BUYER, "irr", 2_000_000);
    h.ledger.setBalance("buyer-2", "irr", 2_000_000);

    expectOk(await h.service.createSellRequest({ sellerId: SELLER, featureId: "feat-1", pricePSC: 0, priceIRR: 900_000 }));
    expectOk(await h.service.buyFeature({ buyerId: BUYER, featureId: "feat-1" }));
    vi.setSystemTime(new Date("2026-06-01T00:02:00.000Z"));
    expectOk(await h.service.createSellRequest({ sellerId: SELLER, featureId: "feat-2", pricePSC: 0, priceIRR: 900_000 }));

    const error = expectErr(await h.service.buyFeature({ buyerId: "buyer-2", featureId: "feat-2" }));

    expect(error.code).toBe("UNDERPRICED_COOLDOWN_ACTIVE");
    expect(error.details.remainingMs).toBe(24 * 60 * 60 * 1000 - 2 * 60_000);
  });
});
