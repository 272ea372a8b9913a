/**
 * Hourly profit repository.
 *
 * Purpose: The passive-income record of a feature. Accrual happens elsewhere; this engine
 * only reads the live record and moves it to a new holder on transfer.
 */

import type { Collection } from "mongodb";
import { getDb } from "@/db/mongo";
import { ErrResult, OkResult, toError, type Result } from "@/utils/result";
import { HourlyProfitSchema, type HourlyProfitDoc } from "../schema";

const COLLECTION_NAME = "hourly_profits";

export interface ReassignInput {
  readonly holderId: string;
  readonly nextWithdrawDeadline: Date;
}

export interface HourlyProfitRepository {
  ensureIndexes(): Promise<void>;
  findLiveByFeature(featureId: string): Promise<Result<HourlyProfitDoc | null, Error>>;
  create(doc: HourlyProfitDoc): Promise<Result<HourlyProfitDoc, Error>>;
  /**
   * Moves the record to a new holder with zero accrual. CAS on `version`; null when the
   * record changed since it was read.
   */
  reassign(
    recordId: string,
    expectedVersion: number,
    input: ReassignInput,
  ): Promise<Result<HourlyProfitDoc | null, Error>>;
}

class HourlyProfitRepositoryImpl implements HourlyProfitRepository {
  private async collection(): Promise<Collection<HourlyProfitDoc>> {
    const db = await getDb();
    return db.collection<HourlyProfitDoc>(COLLECTION_NAME);
  }

  async ensureIndexes(): Promise<void> {
    const col = await this.collection();
    await col.createIndex({ featureId: 1 }, { name: "feature_unique_idx", unique: true });
    await col.createIndex({ currentHolderId: 1, isActive: 1 }, { name: "holder_active_idx" });
  }

  async findLiveByFeature(featureId: string): Promise<Result<HourlyProfitDoc | null, Error>> {
    try {
      const col = await this.collection();
      const doc = await col.findOne({ featureId });
      return OkResult(doc ? HourlyProfitSchema.parse(doc) : null);
    } catch (error) {
      return ErrResult(toError(error));
    }
  }

  async create(doc: HourlyProfitDoc): Promise<Result<HourlyProfitDoc, Error>> {
    try {
      const col = await this.collection();
      await col.insertOne(doc);
      return OkResult(doc);
    } catch (error) {
      return ErrResult(toError(error));
    }
  }

  async reassign(
    recordId: string,
    expectedVersion: number,
    input: ReassignInput,
  ): Promise<Result<HourlyProfitDoc | null, Error>> {
    try {
      const col = await this.collection();
      const doc = await col.findOneAndUpdate(
        { _id: recordId, version: expectedVersion },
        {
          $set: {
            currentHolderId: input.holderId,
            accruedAmount: 0,
            nextWithdrawDeadline: input.nextWithdrawDeadline,
            isActive: true,
            updatedAt: new Date(),
          },
          $inc: { version: 1 },
        },
        { returnDocument: "after" },
      );
      return OkResult(doc ? HourlyProfitSchema.parse(doc) : null);
    } catch (error) {
      return ErrResult(toError(error));
    }
  }
}

export const hourlyProfitRepository: HourlyProfitRepository = new HourlyProfitRepositoryImpl();
