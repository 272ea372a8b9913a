/**
 * Escrow store.
 *
 * Purpose: Funds held against a pending buy request. Records are keyed by the buy request
 * id, so the primary key itself rejects a second lock for the same request.
 */

import type { Collection } from "mongodb";
import { isDuplicateKeyError } from "@/db/errors";
import { getDb } from "@/db/mongo";
import { ErrResult, OkResult, toError, type Result } from "@/utils/result";
import { LockedAssetSchema, type LockedAssetDoc } from "../schema";
import { MarketError } from "../types";

const COLLECTION_NAME = "locked_assets";

export interface LockInput {
  readonly buyRequestId: string;
  readonly featureId: string;
  readonly lockedPSC: number;
  readonly lockedIRR: number;
}

export interface EscrowStore {
  ensureIndexes(): Promise<void>;
  /** Fails with `DUPLICATE_LOCK` when the request already holds funds. */
  lock(input: LockInput): Promise<Result<LockedAssetDoc, MarketError | Error>>;
  /** Fails with `ESCROW_NOT_FOUND` when nothing is held for the request. */
  get(buyRequestId: string): Promise<Result<LockedAssetDoc, MarketError | Error>>;
  /** Deleting an absent record is a no-op. */
  release(buyRequestId: string): Promise<Result<void, Error>>;
}

export function buildLockedAsset(input: LockInput): LockedAssetDoc {
  const now = new Date();
  return {
    _id: input.buyRequestId,
    featureId: input.featureId,
    lockedPSC: input.lockedPSC,
    lockedIRR: input.lockedIRR,
    createdAt: now,
    updatedAt: now,
  };
}

export const duplicateLockError = (buyRequestId: string): MarketError =>
  new MarketError("DUPLICATE_LOCK", `Funds are already locked for buy request ${buyRequestId}.`);

export const escrowNotFoundError = (buyRequestId: string): MarketError =>
  new MarketError("ESCROW_NOT_FOUND", `No locked funds found for buy request ${buyRequestId}.`);

class EscrowStoreImpl implements EscrowStore {
  private async collection(): Promise<Collection<LockedAssetDoc>> {
    const db = await getDb();
    return db.collection<LockedAssetDoc>(COLLECTION_NAME);
  }

  async ensureIndexes(): Promise<void> {
    const col = await this.collection();
    await col.createIndex({ featureId: 1 }, { name: "feature_idx" });
  }

  async lock(input: LockInput): Promise<Result<LockedAssetDoc, MarketError | Error>> {
    const doc = buildLockedAsset(input);
    try {
      const col = await this.collection();
      await col.insertOne(doc);
      return OkResult(doc);
    } catch (error) {
      if (isDuplicateKeyError(error)) return ErrResult(duplicateLockError(input.buyRequestId));
      return ErrResult(toError(error));
    }
  }

  async get(buyRequestId: string): Promise<Result<LockedAssetDoc, MarketError | Error>> {
    try {
      const col = await this.collection();
      const doc = await col.findOne({ _id: buyRequestId });
      if (!doc) return ErrResult(escrowNotFoundError(buyRequestId));
      return OkResult(LockedAssetSchema.parse(doc));
    } catch (error) {
      return ErrResult(toError(error));
    }
  }

  async release(buyRequestId: string): Promise<Result<void, Error>> {
    try {
      const col = await this.collection();
      await col.deleteOne({ _id: buyRequestId });
      return OkResult(undefined);
    } catch (error) {
      return ErrResult(toError(error));
    }
  }
}

export const escrowStore: EscrowStore = new EscrowStoreImpl();
