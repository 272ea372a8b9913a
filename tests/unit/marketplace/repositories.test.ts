/**
 * Unit Tests: Escrow and incident repositories
 *
 * Purpose: Run the Mongo-backed stores against an in-process collection stand-in.
 */

import { afterEach, beforeEach, describe, it, expect, vi } from "vitest";
import { escrowStore } from "@/modules/marketplace/escrow/repository";
import { incidentRepository, type RecordIncidentInput } from "@/modules/marketplace/incidents/repository";
import { MarketError } from "@/modules/marketplace/types";

const state = vi.hoisted(() => ({
  collections: new Map<string, Map<string, Record<string, unknown>>>(),
}));

vi.mock("@/db/mongo", async () => {
  const { MongoServerError } = await import("mongodb");

  type Doc = Record<string, unknown>;
  interface Cursor {
    sort(spec: { createdAt: 1 | -1 }): Cursor;
    limit(count: number): Cursor;
    toArray(): Promise<Doc[]>;
  }

  const time = (value: unknown): number => (value instanceof Date ? value.getTime() : 0);
  const matches = (doc: Doc, filter: Doc): boolean =>
    Object.entries(filter).every(([field, value]) => doc[field] === value);

  const collection = (name: string) => {
    const docs = state.collections.get(name) ?? new Map<string, Doc>();
    state.collections.set(name, docs);
    const select = (filter: Doc): Doc[] => [...docs.values()].filter((doc) => matches(doc, filter));

    return {
      insertOne: async (doc: Doc) => {
        const id = String(doc._id);
        if (docs.has(id)) {
          throw new MongoServerError({ message: "E11000 duplicate key error", code: 11000 });
        }
        docs.set(id, { ...doc });
        return { acknowledged: true, insertedId: id };
      },
      findOne: async (filter: Doc) => select(filter)[0] ?? null,
      deleteOne: async (filter: Doc) => {
        const [doc] = select(filter);
        if (doc) docs.delete(String(doc._id));
        return { acknowledged: true, deletedCount: doc ? 1 : 0 };
      },
      find: (filter: Doc): Cursor => {
        let rows = select(filter);
        const cursor: Cursor = {
          sort: (spec) => {
            rows = [...rows].sort((a, b) => spec.createdAt * (time(a.createdAt) - time(b.createdAt)));
            return cursor;
          },
          limit: (count) => {
            rows = rows.slice(0, count);
            return cursor;
          },
          toArray: async () => rows,
        };
        return cursor;
      },
      findOneAndUpdate: async (filter: Doc, update: { $set: Doc }) => {
        const [doc] = select(filter);
        if (!doc) return null;
        const next = { ...doc, ...update.$set };
        docs.set(String(doc._id), next);
        return next;
      },
    };
  };

  return { getDb: async () => ({ collection }) };
});

const codeOf = (error: Error): string | undefined => (error instanceof MarketError ? error.code : undefined);

beforeEach(() => {
  state.collections.clear();
});

describe("escrowStore", () => {
  const input = { buyRequestId: "br-1", featureId: "feat-1", lockedPSC: 52, lockedIRR: 892_500 };

  it("locks funds under the buy request id", async () => {
    expect((await escrowStore.lock(input)).isOk()).toBe(true);

    const res = await escrowStore.get("br-1");
    expect(res.isOk() && res.value).toMatchObject({ _id: "br-1", featureId: "feat-1", lockedPSC: 52, lockedIRR: 892_500 });
  });

  it("refuses a second lock for the same request", async () => {
    expect((await escrowStore.lock(input)).isOk()).toBe(true);

    const res = await escrowStore.lock({ ...input, lockedIRR: 1 });

    expect(res.isErr() && codeOf(res.error)).toBe("DUPLICATE_LOCK");
    const held = await escrowStore.get("br-1");
    expect(held.isOk() && held.value.lockedIRR).toBe(892_500);
  });

  it("releases idempotently", async () => {
    await escrowStore.lock(input);

    const first = await escrowStore.release("br-1");
    const second = await escrowStore.release("br-1");

    expect(first.isOk()).toBe(true);
    expect(second.isOk()).toBe(true);
    const res = await escrowStore.get("br-1");
    expect(res.isErr() && codeOf(res.error)).toBe("ESCROW_NOT_FOUND");
  });
});

describe("incidentRepository", () => {
  const incident = (entityId: string): RecordIncidentInput => ({
    kind: "credit_outstanding",
    operation: "accept",
    entityId,
    userId: "seller-1",
    resource: "irr",
    amount: 807_500,
    idempotencyKey: `accept:${entityId}:seller:irr`,
    message: "scripted rejection",
  });

  beforeEach(() => {
    vi.useFakeTimers({ toFake: ["Date"] });
    vi.setSystemTime(new Date("2026-05-01T00:00:00.000Z"));
  });

  afterEach(() => {
    vi.useRealTimers();
  });

  async function recordTwo(): Promise<[string, string]> {
    const first = await incidentRepository.record(incident("br-1"));
    vi.setSystemTime(new Date("2026-05-01T00:01:00.000Z"));
    const second = await incidentRepository.record(incident("br-2"));
    if (first.isErr() || second.isErr()) throw new Error("recording failed");
    return [first.value._id, second.value._id];
  }

  it("lists open incidents oldest first", async () => {
    const [first, second] = await recordTwo();

    const res = await incidentRepository.listOpen();

    expect(res.isOk() && res.value.map((doc) => doc._id)).toEqual([first, second]);
    expect(res.isOk() && res.value[0]).toMatchObject({ status: "open", resolvedAt: null, entityId: "br-1" });
  });

  it("honours the limit", async () => {
    const [first] = await recordTwo();

    const res = await incidentRepository.listOpen(1);

    expect(res.isOk() && res.value.map((doc) => doc._id)).toEqual([first]);
  });

  it("resolves an incident once", async () => {
    const [first, second] = await recordTwo();
    vi.setSystemTime(new Date("2026-05-01T01:00:00.000Z"));

    const resolved = await incidentRepository.resolve(first);
    const again = await incidentRepository.resolve(first);

    expect(resolved.isOk() && resolved.value).toMatchObject({
      _id: first,
      status: "resolved",
      resolvedAt: new Date("2026-05-01T01:00:00.000Z"),
    });
    expect(again.isOk() && again.value).toBeNull();
    const open = await incidentRepository.listOpen();
    expect(open.isOk() && open.value.map((doc) => doc._id)).toEqual([second]);
  });
});
