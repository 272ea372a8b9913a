/**
 * Feature limitation repository.
 *
 * Purpose: Time-boxed sales campaigns over a range of catalog sequences, with an optional
 * per-user purchase quota counted from `limited_purchases`.
 */

import type { Collection } from "mongodb";
import { getDb } from "@/db/mongo";
import { generateId } from "@/utils/ids";
import { ErrResult, OkResult, toError, type Result } from "@/utils/result";
import {
  FeatureLimitationSchema,
  type FeatureLimitationDoc,
  type LimitedPurchaseDoc,
} from "../schema";

const LIMITATIONS = "feature_limitations";
const PURCHASES = "limited_purchases";

export interface FeatureLimitationRepository {
  ensureIndexes(): Promise<void>;
  /** Active campaign covering the sequence at `at`, if any. */
  findActiveForSequence(sequence: number, at: Date): Promise<Result<FeatureLimitationDoc | null, Error>>;
  countPurchases(userId: string, limitationId: string): Promise<Result<number, Error>>;
  recordPurchase(
    userId: string,
    limitationId: string,
    featureId: string,
  ): Promise<Result<LimitedPurchaseDoc, Error>>;
}

class FeatureLimitationRepositoryImpl implements FeatureLimitationRepository {
  private async limitations(): Promise<Collection<FeatureLimitationDoc>> {
    const db = await getDb();
    return db.collection<FeatureLimitationDoc>(LIMITATIONS);
  }

  private async purchases(): Promise<Collection<LimitedPurchaseDoc>> {
    const db = await getDb();
    return db.collection<LimitedPurchaseDoc>(PURCHASES);
  }

  async ensureIndexes(): Promise<void> {
    const limitations = await this.limitations();
    await limitations.createIndex(
      { expired: 1, startSequence: 1, endSequence: 1 },
      { name: "expired_range_idx" },
    );
    const purchases = await this.purchases();
    await purchases.createIndex({ userId: 1, limitationId: 1 }, { name: "user_limitation_idx" });
  }

  async findActiveForSequence(
    sequence: number,
    at: Date,
  ): Promise<Result<FeatureLimitationDoc | null, Error>> {
    try {
      const col = await this.limitations();
      const doc = await col.findOne(
        {
          expired: false,
          startsAt: { $lte: at },
          endsAt: { $gte: at },
          startSequence: { $lte: sequence },
          endSequence: { $gte: sequence },
        },
        { sort: { startsAt: -1 } },
      );
      return OkResult(doc ? FeatureLimitationSchema.parse(doc) : null);
    } catch (error) {
      return ErrResult(toError(error));
    }
  }

  async countPurchases(userId: string, limitationId: string): Promise<Result<number, Error>> {
    try {
      const col = await this.purchases();
      return OkResult(await col.countDocuments({ userId, limitationId }));
    } catch (error) {
      return ErrResult(toError(error));
    }
  }

  async recordPurchase(
    userId: string,
    limitationId: string,
    featureId: string,
  ): Promise<Result<LimitedPurchaseDoc, Error>> {
    try {
      const doc: LimitedPurchaseDoc = {
        _id: generateId("lp"),
        userId,
        limitationId,
        featureId,
        createdAt: new Date(),
      };
      const col = await this.purchases();
      await col.insertOne(doc);
      return OkResult(doc);
    } catch (error) {
      return ErrResult(toError(error));
    }
  }
}

export const featureLimitationRepository: FeatureLimitationRepository =
  new FeatureLimitationRepositoryImpl();
