/**
 * Settings provider backed by Mongo (native driver).
 * Purpose: read/write settings documents in `system_variables` without exposing persistence details.
 */

import type { Collection } from "mongodb";
import { getDb } from "@/db/mongo";
import type { SettingsKey } from "./constants";

export interface SettingsProvider {
  getSettings(key: SettingsKey): Promise<Record<string, unknown>>;
  setSettings(key: SettingsKey, partial: Record<string, unknown>): Promise<void>;
}

interface SystemVariableDoc {
  _id: string;
  values: Record<string, unknown>;
  updatedAt: Date;
}

const COLLECTION_NAME = "system_variables";

export class MongoSettingsProvider implements SettingsProvider {
  private async collection(): Promise<Collection<SystemVariableDoc>> {
    const db = await getDb();
    return db.collection<SystemVariableDoc>(COLLECTION_NAME);
  }

  async getSettings(key: SettingsKey): Promise<Record<string, unknown>> {
    const col = await this.collection();
    const doc = await col.findOne({ _id: key });
    return doc?.values ?? {};
  }

  async setSettings(key: SettingsKey, partial: Record<string, unknown>): Promise<void> {
    const updates: Record<string, unknown> = {};
    for (const [subKey, value] of Object.entries(partial)) {
      if (value === undefined) continue;
      updates[`values.${subKey}`] = value;
    }

    if (!Object.keys(updates).length) return;

    // $set per path so concurrent edits of other fields are kept.
    const col = await this.collection();
    await col.updateOne(
      { _id: key },
      { $set: { ...updates, updatedAt: new Date() } },
      { upsert: true },
    );
  }
}
