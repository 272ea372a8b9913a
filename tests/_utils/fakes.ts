/**
 * In-memory collaborators for marketplace tests.
 *
 * Each fake mirrors the filter and compare-and-set semantics of its Mongo counterpart so the
 * settlement service runs unchanged against it.
 */

import {
  MarketplaceSettingsSchema,
  type MarketplaceSettings,
  type MarketplaceSettingsInput,
  type SettingsKey,
  type SettingsProvider,
  type SettingsSource,
} from "@/configuration";
import { buildIncident, type IncidentRepository, type RecordIncidentInput } from "@/modules/marketplace/incidents/repository";
import {
  buildLockedAsset,
  duplicateLockError,
  escrowNotFoundError,
  type EscrowStore,
  type LockInput,
} from "@/modules/marketplace/escrow/repository";
import { featureUpdateFields } from "@/modules/marketplace/catalog/repository";
import type {
  CatalogStore,
  IdentityDirectory,
  RateSource,
  UserProfile,
} from "@/modules/marketplace/catalog/types";
import { LedgerError, type LedgerFailureKind, type LedgerMovement, type LedgerService, type LedgerTransaction } from "@/modules/marketplace/ledger/types";
import type { FeatureLimitationRepository } from "@/modules/marketplace/limits/repository";
import type { HourlyProfitRepository, ReassignInput } from "@/modules/marketplace/profit/repository";
import type {
  BuyRequestRepository,
  TerminalBuyRequestStatus,
} from "@/modules/marketplace/requests/buy-repository";
import type { SellRequestRepository } from "@/modules/marketplace/requests/sell-repository";
import {
  FeatureSchema,
  type BuyRequestDoc,
  type CommissionDoc,
  type FeatureDoc,
  type FeatureLimitationDoc,
  type HourlyProfitDoc,
  type IncidentDoc,
  type LimitedPurchaseDoc,
  type LockedAssetDoc,
  type SellRequestDoc,
  type TradeDoc,
} from "@/modules/marketplace/schema";
import { buildCommission, buildTrade, type RecordTradeInput, type TradeLedger } from "@/modules/marketplace/trades/repository";
import { MarketplaceServiceImpl } from "@/modules/marketplace/settlement/service";
import type { FeatureUpdate, MarketError, ResourceId } from "@/modules/marketplace/types";
import { generateId } from "@/utils/ids";
import { ErrResult, OkResult, type Result } from "@/utils/result";

const byNewest = <T extends { createdAt: Date }>(a: T, b: T): number =>
  b.createdAt.getTime() - a.createdAt.getTime();

// -------------------------------------------------------------------------
// Ledger
// -------------------------------------------------------------------------

export type LedgerOp = "debit" | "credit";

export interface LedgerCall {
  readonly op: LedgerOp;
  readonly movement: LedgerMovement;
}

interface ScriptedFailure {
  readonly op: LedgerOp;
  readonly keySuffix: string;
  readonly kind: LedgerFailureKind;
  remaining: number;
}

/**
 * Wallet ledger with idempotent movements. A repeated key is acknowledged without moving
 * funds again. Failures are scripted per operation and key suffix.
 */
export class FakeLedger implements LedgerService {
  readonly calls: LedgerCall[] = [];
  readonly history: LedgerTransaction[] = [];
  private readonly balances = new Map<string, number>();
  private readonly applied = new Set<string>();
  private readonly failures: ScriptedFailure[] = [];

  setBalance(userId: string, resource: ResourceId, amount: number): void {
    this.balances.set(`${userId}:${resource}`, amount);
  }

  balance(userId: string, resource: ResourceId): number {
    return this.balances.get(`${userId}:${resource}`) ?? 0;
  }

  failOn(op: LedgerOp, keySuffix: string, kind: LedgerFailureKind, times = 1): void {
    this.failures.push({ op, keySuffix, kind, remaining: times });
  }

  keys(op: LedgerOp): string[] {
    return this.calls.filter((call) => call.op === op).map((call) => call.movement.idempotencyKey);
  }

  async checkBalance(userId: string, resource: ResourceId, amount: number): Promise<Result<boolean, LedgerError>> {
    return OkResult(this.balance(userId, resource) >= amount);
  }

  async getBalance(userId: string, resource: ResourceId): Promise<Result<number, LedgerError>> {
    return OkResult(this.balance(userId, resource));
  }

  async debit(movement: LedgerMovement): Promise<Result<void, LedgerError>> {
    return this.move("debit", movement);
  }

  async credit(movement: LedgerMovement): Promise<Result<void, LedgerError>> {
    return this.move("credit", movement);
  }

  async recordTransaction(transaction: LedgerTransaction): Promise<Result<void, LedgerError>> {
    this.history.push(transaction);
    return OkResult(undefined);
  }

  private move(op: LedgerOp, movement: LedgerMovement): Result<void, LedgerError> {
    this.calls.push({ op, movement });

    const scripted = this.failures.find(
      (failure) =>
        failure.op === op && failure.remaining > 0 && movement.idempotencyKey.endsWith(failure.keySuffix),
    );
    if (scripted) {
      scripted.remaining -= 1;
      return ErrResult(new LedgerError(scripted.kind, `scripted ${scripted.kind} on ${movement.idempotencyKey}`));
    }

    if (this.applied.has(movement.idempotencyKey)) return OkResult(undefined);

    const current = this.balance(movement.userId, movement.resource);
    if (op === "debit" && current < movement.amount) {
      return ErrResult(new LedgerError("insufficient_balance", "insufficient balance"));
    }
    const next = op === "debit" ? current - movement.amount : current + movement.amount;
    this.balances.set(`${movement.userId}:${movement.resource}`, next);
    this.applied.add(movement.idempotencyKey);
    return OkResult(undefined);
  }
}

// -------------------------------------------------------------------------
// Catalog, rates, identity
// -------------------------------------------------------------------------

export class InMemoryCatalog implements CatalogStore {
  readonly features = new Map<string, FeatureDoc>();
  /** Simulates a concurrent settlement winning the next ownership flip. */
  loseNextFlip = false;

  add(feature: FeatureDoc): void {
    this.features.set(feature._id, feature);
  }

  async getFeature(featureId: string): Promise<Result<FeatureDoc | null, Error>> {
    return OkResult(this.features.get(featureId) ?? null);
  }

  async setOwner(featureId: string, expectedOwnerId: string, newOwnerId: string): Promise<Result<FeatureDoc | null, Error>> {
    const doc = this.features.get(featureId);
    if (this.loseNextFlip) {
      this.loseNextFlip = false;
      return OkResult(null);
    }
    if (!doc || doc.ownerId !== expectedOwnerId) return OkResult(null);
    const next: FeatureDoc = { ...doc, ownerId: newOwnerId, version: doc.version + 1, updatedAt: new Date() };
    this.features.set(featureId, next);
    return OkResult(next);
  }

  async updateMarketStatus(featureId: string, update: FeatureUpdate): Promise<Result<FeatureDoc | null, Error>> {
    const doc = this.features.get(featureId);
    if (!doc) return OkResult(null);
    const next = FeatureSchema.parse({
      ...doc,
      ...featureUpdateFields(update),
      version: doc.version + 1,
      updatedAt: new Date(),
    });
    this.features.set(featureId, next);
    return OkResult(next);
  }
}

export class StaticRates implements RateSource {
  constructor(private readonly rates: Partial<Record<ResourceId, number>> = {}) {}

  async getRate(resource: ResourceId): Promise<Result<number, Error>> {
    return OkResult(this.rates[resource] ?? 1);
  }
}

export class InMemoryIdentity implements IdentityDirectory {
  private readonly profiles = new Map<string, UserProfile>();

  add(profile: UserProfile): void {
    this.profiles.set(profile.userId, profile);
  }

  async getProfile(userId: string): Promise<Result<UserProfile | null, Error>> {
    return OkResult(this.profiles.get(userId) ?? null);
  }
}

// -------------------------------------------------------------------------
// Settings
// -------------------------------------------------------------------------

export class StaticSettings implements SettingsSource {
  readonly value: MarketplaceSettings;

  constructor(overrides: MarketplaceSettingsInput = {}) {
    this.value = MarketplaceSettingsSchema.parse(overrides);
  }

  async get(): Promise<MarketplaceSettings> {
    return { ...this.value };
  }
}

export class InMemorySettingsProvider implements SettingsProvider {
  readonly docs = new Map<string, Record<string, unknown>>();
  reads = 0;

  async getSettings(key: SettingsKey): Promise<Record<string, unknown>> {
    this.reads += 1;
    return { ...(this.docs.get(key) ?? {}) };
  }

  async setSettings(key: SettingsKey, partial: Record<string, unknown>): Promise<void> {
    const current = this.docs.get(key) ?? {};
    const next = { ...current };
    for (const [field, value] of Object.entries(partial)) {
      if (value !== undefined) next[field] = value;
    }
    this.docs.set(key, next);
  }
}

// -------------------------------------------------------------------------
// Repositories
// -------------------------------------------------------------------------

export class InMemoryEscrow implements EscrowStore {
  readonly locks = new Map<string, LockedAssetDoc>();

  async ensureIndexes(): Promise<void> {}

  async lock(input: LockInput): Promise<Result<LockedAssetDoc, MarketError | Error>> {
    if (this.locks.has(input.buyRequestId)) return ErrResult(duplicateLockError(input.buyRequestId));
    const doc = buildLockedAsset(input);
    this.locks.set(doc._id, doc);
    return OkResult(doc);
  }

  async get(buyRequestId: string): Promise<Result<LockedAssetDoc, MarketError | Error>> {
    const doc = this.locks.get(buyRequestId);
    if (!doc) return ErrResult(escrowNotFoundError(buyRequestId));
    return OkResult(doc);
  }

  async release(buyRequestId: string): Promise<Result<void, Error>> {
    this.locks.delete(buyRequestId);
    return OkResult(undefined);
  }
}

export class InMemoryBuyRequests implements BuyRequestRepository {
  readonly docs = new Map<string, BuyRequestDoc>();

  async ensureIndexes(): Promise<void> {}

  async create(doc: BuyRequestDoc): Promise<Result<BuyRequestDoc, Error>> {
    this.docs.set(doc._id, doc);
    return OkResult(doc);
  }

  async findById(requestId: string): Promise<Result<BuyRequestDoc | null, Error>> {
    return OkResult(this.docs.get(requestId) ?? null);
  }

  async findPendingByBuyer(buyerId: string, featureId: string): Promise<Result<BuyRequestDoc | null, Error>> {
    const doc = this.all().find(
      (item) => item.buyerId === buyerId && item.featureId === featureId && item.status === "pending",
    );
    return OkResult(doc ?? null);
  }

  async listPendingByFeature(featureId: string): Promise<Result<BuyRequestDoc[], Error>> {
    return OkResult(this.all().filter((item) => item.featureId === featureId && item.status === "pending"));
  }

  async listByBuyer(buyerId: string): Promise<Result<BuyRequestDoc[], Error>> {
    return OkResult(this.all().filter((item) => item.buyerId === buyerId && item.deletedAt === null));
  }

  async listBySeller(sellerId: string): Promise<Result<BuyRequestDoc[], Error>> {
    return OkResult(this.all().filter((item) => item.sellerId === sellerId && item.deletedAt === null));
  }

  async claim(requestId: string, token: string): Promise<Result<BuyRequestDoc | null, Error>> {
    return OkResult(
      this.patch(requestId, (doc) => doc.status === "pending" && doc.claimToken === null, { claimToken: token }),
    );
  }

  async releaseClaim(requestId: string, token: string): Promise<Result<void, Error>> {
    this.patch(requestId, (doc) => doc.claimToken === token, { claimToken: null });
    return OkResult(undefined);
  }

  async finalize(
    requestId: string,
    token: string,
    status: TerminalBuyRequestStatus,
  ): Promise<Result<BuyRequestDoc | null, Error>> {
    return OkResult(
      this.patch(requestId, (doc) => doc.status === "pending" && doc.claimToken === token, {
        status,
        claimToken: null,
        deletedAt: new Date(),
      }),
    );
  }

  async updateGracePeriod(requestId: string, deadline: Date): Promise<Result<BuyRequestDoc | null, Error>> {
    return OkResult(
      this.patch(requestId, (doc) => doc.status === "pending", { gracePeriodDeadline: deadline }),
    );
  }

  async deleteById(requestId: string): Promise<Result<void, Error>> {
    this.docs.delete(requestId);
    return OkResult(undefined);
  }

  private all(): BuyRequestDoc[] {
    return [...this.docs.values()].sort(byNewest);
  }

  private patch(
    requestId: string,
    matches: (doc: BuyRequestDoc) => boolean,
    fields: Partial<BuyRequestDoc>,
  ): BuyRequestDoc | null {
    const doc = this.docs.get(requestId);
    if (!doc || !matches(doc)) return null;
    const next: BuyRequestDoc = { ...doc, ...fields, updatedAt: new Date() };
    this.docs.set(requestId, next);
    return next;
  }
}

export class InMemorySellRequests implements SellRequestRepository {
  readonly docs = new Map<string, SellRequestDoc>();

  async ensureIndexes(): Promise<void> {}

  async create(doc: SellRequestDoc): Promise<Result<SellRequestDoc, Error>> {
    if (this.all().some((item) => item.featureId === doc.featureId && item.status === "pending")) {
      return ErrResult(new Error("duplicate pending listing"));
    }
    this.docs.set(doc._id, doc);
    return OkResult(doc);
  }

  async findById(sellRequestId: string): Promise<Result<SellRequestDoc | null, Error>> {
    return OkResult(this.docs.get(sellRequestId) ?? null);
  }

  async findPendingByFeature(featureId: string): Promise<Result<SellRequestDoc | null, Error>> {
    return OkResult(this.all().find((item) => item.featureId === featureId && item.status === "pending") ?? null);
  }

  async latestUnderpricedBySeller(sellerId: string, threshold: number): Promise<Result<SellRequestDoc | null, Error>> {
    return OkResult(
      this.all().find(
        (item) => item.sellerId === sellerId && item.status === "completed" && item.floorPercentage < threshold,
      ) ?? null,
    );
  }

  async listBySeller(sellerId: string): Promise<Result<SellRequestDoc[], Error>> {
    return OkResult(this.all().filter((item) => item.sellerId === sellerId));
  }

  async completeForFeature(featureId: string): Promise<Result<number, Error>> {
    let count = 0;
    for (const doc of this.docs.values()) {
      if (doc.featureId !== featureId || doc.status !== "pending") continue;
      this.docs.set(doc._id, { ...doc, status: "completed", updatedAt: new Date() });
      count += 1;
    }
    return OkResult(count);
  }

  async deleteById(sellRequestId: string): Promise<Result<void, Error>> {
    this.docs.delete(sellRequestId);
    return OkResult(undefined);
  }

  private all(): SellRequestDoc[] {
    return [...this.docs.values()].sort(byNewest);
  }
}

export class InMemoryTrades implements TradeLedger {
  readonly trades: TradeDoc[] = [];
  readonly commissions: CommissionDoc[] = [];

  async ensureIndexes(): Promise<void> {}

  async recordTrade(input: RecordTradeInput): Promise<Result<TradeDoc, Error>> {
    const doc = buildTrade(input);
    this.trades.push(doc);
    return OkResult(doc);
  }

  async recordCommission(tradeId: string, feePSC: number, feeIRR: number): Promise<Result<CommissionDoc, Error>> {
    const doc = buildCommission(tradeId, feePSC, feeIRR);
    this.commissions.push(doc);
    return OkResult(doc);
  }

  async latestTradeForSeller(sellerId: string, featureId: string): Promise<Result<TradeDoc | null, Error>> {
    const doc = [...this.trades]
      .sort(byNewest)
      .find((item) => item.sellerId === sellerId && item.featureId === featureId);
    return OkResult(doc ?? null);
  }
}

export class InMemoryProfits implements HourlyProfitRepository {
  readonly docs = new Map<string, HourlyProfitDoc>();

  async ensureIndexes(): Promise<void> {}

  async findLiveByFeature(featureId: string): Promise<Result<HourlyProfitDoc | null, Error>> {
    return OkResult([...this.docs.values()].find((doc) => doc.featureId === featureId) ?? null);
  }

  async create(doc: HourlyProfitDoc): Promise<Result<HourlyProfitDoc, Error>> {
    this.docs.set(doc._id, doc);
    return OkResult(doc);
  }

  async reassign(recordId: string, expectedVersion: number, input: ReassignInput): Promise<Result<HourlyProfitDoc | null, Error>> {
    const doc = this.docs.get(recordId);
    if (!doc || doc.version !== expectedVersion) return OkResult(null);
    const next: HourlyProfitDoc = {
      ...doc,
      currentHolderId: input.holderId,
      accruedAmount: 0,
      nextWithdrawDeadline: input.nextWithdrawDeadline,
      isActive: true,
      version: doc.version + 1,
      updatedAt: new Date(),
    };
    this.docs.set(recordId, next);
    return OkResult(next);
  }
}

export class InMemoryLimitations implements FeatureLimitationRepository {
  readonly limitations: FeatureLimitationDoc[] = [];
  readonly purchases: LimitedPurchaseDoc[] = [];

  async ensureIndexes(): Promise<void> {}

  async findActiveForSequence(sequence: number, at: Date): Promise<Result<FeatureLimitationDoc | null, Error>> {
    const doc = this.limitations.find(
      (item) =>
        !item.expired &&
        item.startsAt.getTime() <= at.getTime() &&
        item.endsAt.getTime() >= at.getTime() &&
        item.startSequence <= sequence &&
        item.endSequence >= sequence,
    );
    return OkResult(doc ?? null);
  }

  async countPurchases(userId: string, limitationId: string): Promise<Result<number, Error>> {
    return OkResult(
      this.purchases.filter((item) => item.userId === userId && item.limitationId === limitationId).length,
    );
  }

  async recordPurchase(userId: string, limitationId: string, featureId: string): Promise<Result<LimitedPurchaseDoc, Error>> {
    const doc: LimitedPurchaseDoc = { _id: generateId("lp"), userId, limitationId, featureId, createdAt: new Date() };
    this.purchases.push(doc);
    return OkResult(doc);
  }
}

export class InMemoryIncidents implements IncidentRepository {
  readonly docs: IncidentDoc[] = [];

  async ensureIndexes(): Promise<void> {}

  async record(input: RecordIncidentInput): Promise<Result<IncidentDoc, Error>> {
    const doc = buildIncident(input);
    this.docs.push(doc);
    return OkResult(doc);
  }

  async listOpen(limit = 100): Promise<Result<IncidentDoc[], Error>> {
    return OkResult(this.docs.filter((doc) => doc.status === "open").slice(0, limit));
  }

  async resolve(incidentId: string): Promise<Result<IncidentDoc | null, Error>> {
    const index = this.docs.findIndex((doc) => doc._id === incidentId && doc.status === "open");
    if (index < 0) return OkResult(null);
    const next: IncidentDoc = { ...this.docs[index], status: "resolved", resolvedAt: new Date() };
    this.docs[index] = next;
    return OkResult(next);
  }
}

// -------------------------------------------------------------------------
// Harness
// -------------------------------------------------------------------------

export function makeFeature(overrides: Partial<FeatureDoc> & Pick<FeatureDoc, "_id" | "ownerId">): FeatureDoc {
  const now = new Date();
  return {
    category: "residential",
    sequence: 1,
    stabilityValue: 1_000,
    listedPricePSC: null,
    listedPriceIRR: null,
    minimumPricePercentage: 80,
    marketStatus: "listed_unpriced",
    label: "",
    version: 0,
    createdAt: now,
    updatedAt: now,
    ...overrides,
  };
}

export function createHarness(settingsOverrides: MarketplaceSettingsInput = {}) {
  const ledger = new FakeLedger();
  const catalog = new InMemoryCatalog();
  const rates = new StaticRates({ psc: 1_000, yellow: 1_000, red: 1_000, blue: 1_000 });
  const identity = new InMemoryIdentity();
  const settings = new StaticSettings(settingsOverrides);
  const escrow = new InMemoryEscrow();
  const trades = new InMemoryTrades();
  const buyRequests = new InMemoryBuyRequests();
  const sellRequests = new InMemorySellRequests();
  const profits = new InMemoryProfits();
  const limitations = new InMemoryLimitations();
  const incidents = new InMemoryIncidents();

  const service = new MarketplaceServiceImpl({
    ledger,
    catalog,
    rates,
    identity,
    settings,
    escrow,
    trades,
    buyRequests,
    sellRequests,
    profits,
    limitations,
    incidents,
  });

  return {
    service,
    ledger,
    catalog,
    rates,
    identity,
    settings,
    escrow,
    trades,
    buyRequests,
    sellRequests,
    profits,
    limitations,
    incidents,
  };
}

export type Harness = ReturnType<typeof createHarness>;

/** Unwraps an expected success, failing the test with the error otherwise. */
export function expectOk<T>(result: Result<T, MarketError>): T {
  if (result.isErr()) throw new Error(`expected Ok, got ${result.error.code}: ${result.error.message}`);
  return result.value;
}

/** Unwraps an expected failure. */
export function expectErr<T>(result: Result<T, MarketError>): MarketError {
  if (result.isOk()) throw new Error("expected Err, got Ok");
  return result.error;
}
