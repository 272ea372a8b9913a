/**
 * Settlement incident repository.
 *
 * Purpose: Persist ledger outcomes the engine could not settle on its own (ambiguous calls,
 * failed compensations, undelivered credits and refunds). These records are the local
 * source of truth for the manual reconciliation pass.
 */

import type { Collection } from "mongodb";
import { getDb } from "@/db/mongo";
import { generateId } from "@/utils/ids";
import { ErrResult, OkResult, toError, type Result } from "@/utils/result";
import { IncidentSchema, type IncidentDoc, type IncidentKind } from "../schema";
import type { ResourceId } from "../types";

const COLLECTION_NAME = "settlement_incidents";

export interface RecordIncidentInput {
  readonly kind: IncidentKind;
  readonly operation: string;
  readonly entityId: string;
  readonly userId: string;
  readonly resource: ResourceId;
  readonly amount: number;
  readonly idempotencyKey: string;
  readonly message: string;
}

export interface IncidentRepository {
  ensureIndexes(): Promise<void>;
  record(input: RecordIncidentInput): Promise<Result<IncidentDoc, Error>>;
  listOpen(limit?: number): Promise<Result<IncidentDoc[], Error>>;
  resolve(incidentId: string): Promise<Result<IncidentDoc | null, Error>>;
}

export function buildIncident(input: RecordIncidentInput): IncidentDoc {
  return {
    _id: generateId("inc"),
    ...input,
    status: "open",
    createdAt: new Date(),
    resolvedAt: null,
  };
}

/**
 * Records an incident and logs it. Never fails: if the incident cannot be stored the log
 * line is the only trace, so it carries the full payload.
 */
export async function reportIncident(
  repo: IncidentRepository,
  input: RecordIncidentInput,
): Promise<string | undefined> {
  const res = await repo.record(input);
  if (res.isErr()) {
    console.error("[Incidents] Failed to persist incident, manual follow-up required:", {
      ...input,
      error: res.error.message,
    });
    return undefined;
  }
  console.error(`[Incidents] ${input.kind} during ${input.operation} (${res.value._id})`, {
    entityId: input.entityId,
    userId: input.userId,
    resource: input.resource,
    amount: input.amount,
    idempotencyKey: input.idempotencyKey,
  });
  return res.value._id;
}

class IncidentRepositoryImpl implements IncidentRepository {
  private async collection(): Promise<Collection<IncidentDoc>> {
    const db = await getDb();
    return db.collection<IncidentDoc>(COLLECTION_NAME);
  }

  async ensureIndexes(): Promise<void> {
    const col = await this.collection();
    await col.createIndex({ status: 1, createdAt: 1 }, { name: "status_created_idx" });
    await col.createIndex({ entityId: 1 }, { name: "entity_idx" });
  }

  async record(input: RecordIncidentInput): Promise<Result<IncidentDoc, Error>> {
    try {
      const doc = buildIncident(input);
      const col = await this.collection();
      await col.insertOne(doc);
      return OkResult(doc);
    } catch (error) {
      return ErrResult(toError(error));
    }
  }

  async listOpen(limit = 100): Promise<Result<IncidentDoc[], Error>> {
    try {
      const col = await this.collection();
      const docs = await col.find({ status: "open" }).sort({ createdAt: 1 }).limit(limit).toArray();
      return OkResult(docs.map((doc) => IncidentSchema.parse(doc)));
    } catch (error) {
      return ErrResult(toError(error));
    }
  }

  async resolve(incidentId: string): Promise<Result<IncidentDoc | null, Error>> {
    try {
      const col = await this.collection();
      const doc = await col.findOneAndUpdate(
        { _id: incidentId, status: "open" },
        { $set: { status: "resolved", resolvedAt: new Date() } },
        { returnDocument: "after" },
      );
      return OkResult(doc ? IncidentSchema.parse(doc) : null);
    } catch (error) {
      return ErrResult(toError(error));
    }
  }
}

export const incidentRepository: IncidentRepository = new IncidentRepositoryImpl();
