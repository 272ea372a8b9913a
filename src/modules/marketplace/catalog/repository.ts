/**
 * Feature catalog store (Mongo).
 *
 * Purpose: Read features, flip ownership with a compare-and-set on the current owner, and
 * apply the listing/transfer updates of `FeatureUpdate`.
 */

import type { Collection, MatchKeysAndValues } from "mongodb";
import { getDb } from "@/db/mongo";
import { ErrResult, OkResult, toError, type Result } from "@/utils/result";
import { FeatureSchema, type FeatureDoc } from "../schema";
import type { FeatureUpdate } from "../types";
import type { CatalogStore } from "./types";

const COLLECTION_NAME = "features";

/** Translates a tagged update into the exact fields it may touch. */
export function featureUpdateFields(update: FeatureUpdate): MatchKeysAndValues<FeatureDoc> {
  switch (update.kind) {
    case "listed":
      return {
        marketStatus: "listed_priced",
        listedPricePSC: update.askPSC,
        listedPriceIRR: update.askIRR,
        minimumPricePercentage: update.floorPercentage,
      };
    case "delisted":
      return {
        marketStatus: "listed_unpriced",
        listedPricePSC: null,
        listedPriceIRR: null,
        minimumPricePercentage: update.floorPercentage,
      };
    case "transferred":
      return {
        marketStatus: "listed_unpriced",
        listedPricePSC: null,
        listedPriceIRR: null,
        label: update.label,
        minimumPricePercentage: update.floorPercentage,
      };
  }
}

class MongoCatalogStore implements CatalogStore {
  private async collection(): Promise<Collection<FeatureDoc>> {
    const db = await getDb();
    return db.collection<FeatureDoc>(COLLECTION_NAME);
  }

  async ensureIndexes(): Promise<void> {
    const col = await this.collection();
    await col.createIndex({ ownerId: 1 }, { name: "owner_idx" });
    await col.createIndex({ sequence: 1 }, { name: "sequence_idx" });
  }

  async getFeature(featureId: string): Promise<Result<FeatureDoc | null, Error>> {
    try {
      const col = await this.collection();
      const doc = await col.findOne({ _id: featureId });
      return OkResult(doc ? FeatureSchema.parse(doc) : null);
    } catch (error) {
      return ErrResult(toError(error));
    }
  }

  async setOwner(
    featureId: string,
    expectedOwnerId: string,
    newOwnerId: string,
  ): Promise<Result<FeatureDoc | null, Error>> {
    try {
      const col = await this.collection();
      const doc = await col.findOneAndUpdate(
        { _id: featureId, ownerId: expectedOwnerId },
        { $set: { ownerId: newOwnerId, updatedAt: new Date() }, $inc: { version: 1 } },
        { returnDocument: "after" },
      );
      return OkResult(doc ? FeatureSchema.parse(doc) : null);
    } catch (error) {
      return ErrResult(toError(error));
    }
  }

  async updateMarketStatus(
    featureId: string,
    update: FeatureUpdate,
  ): Promise<Result<FeatureDoc | null, Error>> {
    try {
      const col = await this.collection();
      const doc = await col.findOneAndUpdate(
        { _id: featureId },
        { $set: { ...featureUpdateFields(update), updatedAt: new Date() }, $inc: { version: 1 } },
        { returnDocument: "after" },
      );
      return OkResult(doc ? FeatureSchema.parse(doc) : null);
    } catch (error) {
      return ErrResult(toError(error));
    }
  }
}

export const catalogStore = new MongoCatalogStore();
