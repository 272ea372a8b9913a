/**
 * Buy request repository.
 *
 * Purpose: Persist offers and guard their lifecycle with conditional updates.
 *
 * Claims: accept, reject, delete and reconciliation first take a lease on the request
 * (`claimToken`), which only succeeds while the request is pending and unclaimed. The lease
 * keeps two settlements from disbursing the same escrow.
 */

import type { Collection, Filter } from "mongodb";
import { getDb } from "@/db/mongo";
import { ErrResult, OkResult, toError, type Result } from "@/utils/result";
import { BuyRequestSchema, type BuyRequestDoc } from "../schema";
import type { BuyRequestStatus } from "../types";

const COLLECTION_NAME = "buy_requests";

export type TerminalBuyRequestStatus = Exclude<BuyRequestStatus, "pending">;

export interface BuyRequestRepository {
  ensureIndexes(): Promise<void>;
  create(doc: BuyRequestDoc): Promise<Result<BuyRequestDoc, Error>>;
  findById(requestId: string): Promise<Result<BuyRequestDoc | null, Error>>;
  findPendingByBuyer(buyerId: string, featureId: string): Promise<Result<BuyRequestDoc | null, Error>>;
  listPendingByFeature(featureId: string): Promise<Result<BuyRequestDoc[], Error>>;
  listByBuyer(buyerId: string): Promise<Result<BuyRequestDoc[], Error>>;
  listBySeller(sellerId: string): Promise<Result<BuyRequestDoc[], Error>>;
  /** Null when the request is no longer pending or another operation holds it. */
  claim(requestId: string, token: string): Promise<Result<BuyRequestDoc | null, Error>>;
  releaseClaim(requestId: string, token: string): Promise<Result<void, Error>>;
  /** Moves a claimed request to a terminal status and soft-deletes it. */
  finalize(
    requestId: string,
    token: string,
    status: TerminalBuyRequestStatus,
  ): Promise<Result<BuyRequestDoc | null, Error>>;
  updateGracePeriod(requestId: string, deadline: Date): Promise<Result<BuyRequestDoc | null, Error>>;
  /** Removes a request whose funds were never locked. */
  deleteById(requestId: string): Promise<Result<void, Error>>;
}

const parseBuyRequest = (doc: unknown): BuyRequestDoc => BuyRequestSchema.parse(doc);

class BuyRequestRepositoryImpl implements BuyRequestRepository {
  private async collection(): Promise<Collection<BuyRequestDoc>> {
    const db = await getDb();
    return db.collection<BuyRequestDoc>(COLLECTION_NAME);
  }

  async ensureIndexes(): Promise<void> {
    const col = await this.collection();
    await col.createIndex({ featureId: 1, status: 1 }, { name: "feature_status_idx" });
    await col.createIndex(
      { buyerId: 1, deletedAt: 1, createdAt: -1 },
      { name: "buyer_deleted_created_idx" },
    );
    await col.createIndex(
      { sellerId: 1, deletedAt: 1, createdAt: -1 },
      { name: "seller_deleted_created_idx" },
    );
  }

  async create(doc: BuyRequestDoc): Promise<Result<BuyRequestDoc, Error>> {
    try {
      const col = await this.collection();
      await col.insertOne(doc);
      return OkResult(doc);
    } catch (error) {
      return ErrResult(toError(error));
    }
  }

  async findById(requestId: string): Promise<Result<BuyRequestDoc | null, Error>> {
    return this.findOne({ _id: requestId });
  }

  async findPendingByBuyer(
    buyerId: string,
    featureId: string,
  ): Promise<Result<BuyRequestDoc | null, Error>> {
    return this.findOne({ buyerId, featureId, status: "pending" });
  }

  async listPendingByFeature(featureId: string): Promise<Result<BuyRequestDoc[], Error>> {
    return this.findMany({ featureId, status: "pending" });
  }

  async listByBuyer(buyerId: string): Promise<Result<BuyRequestDoc[], Error>> {
    return this.findMany({ buyerId, deletedAt: null });
  }

  async listBySeller(sellerId: string): Promise<Result<BuyRequestDoc[], Error>> {
    return this.findMany({ sellerId, deletedAt: null });
  }

  async claim(requestId: string, token: string): Promise<Result<BuyRequestDoc | null, Error>> {
    return this.conditionalSet(
      { _id: requestId, status: "pending", claimToken: null },
      { claimToken: token },
    );
  }

  async releaseClaim(requestId: string, token: string): Promise<Result<void, Error>> {
    const res = await this.conditionalSet({ _id: requestId, claimToken: token }, { claimToken: null });
    return res.map(() => undefined);
  }

  async finalize(
    requestId: string,
    token: string,
    status: TerminalBuyRequestStatus,
  ): Promise<Result<BuyRequestDoc | null, Error>> {
    return this.conditionalSet(
      { _id: requestId, status: "pending", claimToken: token },
      { status, claimToken: null, deletedAt: new Date() },
    );
  }

  async updateGracePeriod(
    requestId: string,
    deadline: Date,
  ): Promise<Result<BuyRequestDoc | null, Error>> {
    return this.conditionalSet(
      { _id: requestId, status: "pending" },
      { gracePeriodDeadline: deadline },
    );
  }

  async deleteById(requestId: string): Promise<Result<void, Error>> {
    try {
      const col = await this.collection();
      await col.deleteOne({ _id: requestId });
      return OkResult(undefined);
    } catch (error) {
      return ErrResult(toError(error));
    }
  }

  private async findOne(filter: Filter<BuyRequestDoc>): Promise<Result<BuyRequestDoc | null, Error>> {
    try {
      const col = await this.collection();
      const doc = await col.findOne(filter);
      return OkResult(doc ? parseBuyRequest(doc) : null);
    } catch (error) {
      return ErrResult(toError(error));
    }
  }

  private async findMany(filter: Filter<BuyRequestDoc>): Promise<Result<BuyRequestDoc[], Error>> {
    try {
      const col = await this.collection();
      const docs = await col.find(filter).sort({ createdAt: -1 }).toArray();
      return OkResult(docs.map(parseBuyRequest));
    } catch (error) {
      return ErrResult(toError(error));
    }
  }

  private async conditionalSet(
    filter: Filter<BuyRequestDoc>,
    patch: Partial<BuyRequestDoc>,
  ): Promise<Result<BuyRequestDoc | null, Error>> {
    try {
      const col = await this.collection();
      const doc = await col.findOneAndUpdate(
        filter,
        { $set: { ...patch, updatedAt: new Date() } },
        { returnDocument: "after" },
      );
      return OkResult(doc ? parseBuyRequest(doc) : null);
    } catch (error) {
      return ErrResult(toError(error));
    }
  }
}

export const buyRequestRepository: BuyRequestRepository = new BuyRequestRepositoryImpl();
