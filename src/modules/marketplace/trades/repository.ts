/**
 * Trade ledger accessor.
 *
 * Purpose: Append-only history of settled sales and the platform commission taken on each.
 * The underpriced cooldown reads the latest trade of a seller from here.
 */

import type { Collection } from "mongodb";
import { getDb } from "@/db/mongo";
import { generateId } from "@/utils/ids";
import { ErrResult, OkResult, toError, type Result } from "@/utils/result";
import { TradeSchema, type CommissionDoc, type TradeDoc } from "../schema";

const TRADES = "trades";
const COMMISSIONS = "commissions";

export interface RecordTradeInput {
  readonly featureId: string;
  readonly buyerId: string;
  readonly sellerId: string;
  readonly settledPSC: number;
  readonly settledIRR: number;
}

export interface TradeLedger {
  ensureIndexes(): Promise<void>;
  recordTrade(input: RecordTradeInput): Promise<Result<TradeDoc, Error>>;
  recordCommission(tradeId: string, feePSC: number, feeIRR: number): Promise<Result<CommissionDoc, Error>>;
  latestTradeForSeller(sellerId: string, featureId: string): Promise<Result<TradeDoc | null, Error>>;
}

export function buildTrade(input: RecordTradeInput): TradeDoc {
  return { _id: generateId("trade"), ...input, createdAt: new Date() };
}

export function buildCommission(tradeId: string, feePSC: number, feeIRR: number): CommissionDoc {
  return { _id: generateId("comm"), tradeId, feePSC, feeIRR, createdAt: new Date() };
}

class TradeLedgerImpl implements TradeLedger {
  private async trades(): Promise<Collection<TradeDoc>> {
    const db = await getDb();
    return db.collection<TradeDoc>(TRADES);
  }

  private async commissions(): Promise<Collection<CommissionDoc>> {
    const db = await getDb();
    return db.collection<CommissionDoc>(COMMISSIONS);
  }

  async ensureIndexes(): Promise<void> {
    const trades = await this.trades();
    await trades.createIndex(
      { sellerId: 1, featureId: 1, createdAt: -1 },
      { name: "seller_feature_created_idx" },
    );
    const commissions = await this.commissions();
    await commissions.createIndex({ tradeId: 1 }, { name: "trade_idx", unique: true });
  }

  async recordTrade(input: RecordTradeInput): Promise<Result<TradeDoc, Error>> {
    try {
      const doc = buildTrade(input);
      const col = await this.trades();
      await col.insertOne(doc);
      return OkResult(doc);
    } catch (error) {
      return ErrResult(toError(error));
    }
  }

  async recordCommission(
    tradeId: string,
    feePSC: number,
    feeIRR: number,
  ): Promise<Result<CommissionDoc, Error>> {
    try {
      const doc = buildCommission(tradeId, feePSC, feeIRR);
      const col = await this.commissions();
      await col.insertOne(doc);
      return OkResult(doc);
    } catch (error) {
      return ErrResult(toError(error));
    }
  }

  async latestTradeForSeller(
    sellerId: string,
    featureId: string,
  ): Promise<Result<TradeDoc | null, Error>> {
    try {
      const col = await this.trades();
      const doc = await col.findOne({ sellerId, featureId }, { sort: { createdAt: -1 } });
      return OkResult(doc ? TradeSchema.parse(doc) : null);
    } catch (error) {
      return ErrResult(toError(error));
    }
  }
}

export const tradeLedger: TradeLedger = new TradeLedgerImpl();
