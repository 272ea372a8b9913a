/**
 * Exchange rates read from the `variables` collection (`{ _id: symbol, rate }`).
 * An unset rate counts as 1.
 */

import type { Collection } from "mongodb";
import { z } from "zod";
import { getDb } from "@/db/mongo";
import { ErrResult, OkResult, toError, type Result } from "@/utils/result";
import type { ResourceId } from "../types";
import type { RateSource } from "./types";

const VariableSchema = z.object({ _id: z.string(), rate: z.number().positive() });

type VariableDoc = z.infer<typeof VariableSchema>;

export const DEFAULT_RATE = 1;

class MongoRateSource implements RateSource {
  private async collection(): Promise<Collection<VariableDoc>> {
    const db = await getDb();
    return db.collection<VariableDoc>("variables");
  }

  async getRate(resource: ResourceId): Promise<Result<number, Error>> {
    try {
      const col = await this.collection();
      const doc = await col.findOne({ _id: resource });
      if (!doc) return OkResult(DEFAULT_RATE);
      return OkResult(VariableSchema.parse(doc).rate);
    } catch (error) {
      return ErrResult(toError(error));
    }
  }
}

export const rateSource: RateSource = new MongoRateSource();
