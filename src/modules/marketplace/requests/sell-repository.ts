/**
 * Sell request repository.
 *
 * Purpose: Owner listings. At most one pending listing per feature; completed listings are
 * kept because the underpriced cooldown looks them up.
 */

import type { Collection } from "mongodb";
import { getDb } from "@/db/mongo";
import { ErrResult, OkResult, toError, type Result } from "@/utils/result";
import { SellRequestSchema, type SellRequestDoc } from "../schema";

const COLLECTION_NAME = "sell_requests";

export interface SellRequestRepository {
  ensureIndexes(): Promise<void>;
  create(doc: SellRequestDoc): Promise<Result<SellRequestDoc, Error>>;
  findById(sellRequestId: string): Promise<Result<SellRequestDoc | null, Error>>;
  findPendingByFeature(featureId: string): Promise<Result<SellRequestDoc | null, Error>>;
  /** Most recent completed listing of the seller priced under `threshold` percent. */
  latestUnderpricedBySeller(
    sellerId: string,
    threshold: number,
  ): Promise<Result<SellRequestDoc | null, Error>>;
  listBySeller(sellerId: string): Promise<Result<SellRequestDoc[], Error>>;
  completeForFeature(featureId: string): Promise<Result<number, Error>>;
  deleteById(sellRequestId: string): Promise<Result<void, Error>>;
}

const parseSellRequest = (doc: unknown): SellRequestDoc => SellRequestSchema.parse(doc);

class SellRequestRepositoryImpl implements SellRequestRepository {
  private async collection(): Promise<Collection<SellRequestDoc>> {
    const db = await getDb();
    return db.collection<SellRequestDoc>(COLLECTION_NAME);
  }

  async ensureIndexes(): Promise<void> {
    const col = await this.collection();
    await col.createIndex(
      { featureId: 1 },
      {
        name: "feature_pending_unique_idx",
        unique: true,
        partialFilterExpression: { status: "pending" },
      },
    );
    await col.createIndex(
      { sellerId: 1, status: 1, floorPercentage: 1, createdAt: -1 },
      { name: "seller_status_floor_created_idx" },
    );
  }

  async create(doc: SellRequestDoc): Promise<Result<SellRequestDoc, Error>> {
    try {
      const col = await this.collection();
      await col.insertOne(doc);
      return OkResult(doc);
    } catch (error) {
      return ErrResult(toError(error));
    }
  }

  async findById(sellRequestId: string): Promise<Result<SellRequestDoc | null, Error>> {
    try {
      const col = await this.collection();
      const doc = await col.findOne({ _id: sellRequestId });
      return OkResult(doc ? parseSellRequest(doc) : null);
    } catch (error) {
      return ErrResult(toError(error));
    }
  }

  async findPendingByFeature(featureId: string): Promise<Result<SellRequestDoc | null, Error>> {
    try {
      const col = await this.collection();
      const doc = await col.findOne({ featureId, status: "pending" });
      return OkResult(doc ? parseSellRequest(doc) : null);
    } catch (error) {
      return ErrResult(toError(error));
    }
  }

  async latestUnderpricedBySeller(
    sellerId: string,
    threshold: number,
  ): Promise<Result<SellRequestDoc | null, Error>> {
    try {
      const col = await this.collection();
      const doc = await col.findOne(
        { sellerId, status: "completed", floorPercentage: { $lt: threshold } },
        { sort: { createdAt: -1 } },
      );
      return OkResult(doc ? parseSellRequest(doc) : null);
    } catch (error) {
      return ErrResult(toError(error));
    }
  }

  async listBySeller(sellerId: string): Promise<Result<SellRequestDoc[], Error>> {
    try {
      const col = await this.collection();
      const docs = await col.find({ sellerId }).sort({ createdAt: -1 }).toArray();
      return OkResult(docs.map(parseSellRequest));
    } catch (error) {
      return ErrResult(toError(error));
    }
  }

  async completeForFeature(featureId: string): Promise<Result<number, Error>> {
    try {
      const col = await this.collection();
      const res = await col.updateMany(
        { featureId, status: "pending" },
        { $set: { status: "completed", updatedAt: new Date() } },
      );
      return OkResult(res.modifiedCount);
    } catch (error) {
      return ErrResult(toError(error));
    }
  }

  async deleteById(sellRequestId: string): Promise<Result<void, Error>> {
    try {
      const col = await this.collection();
      await col.deleteOne({ _id: sellRequestId });
      return OkResult(undefined);
    } catch (error) {
      return ErrResult(toError(error));
    }
  }
}

export const sellRequestRepository: SellRequestRepository = new SellRequestRepositoryImpl();
