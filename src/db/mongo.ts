/**
 * Mongo client singleton for the native driver.
 * Purpose: provide a single entrypoint to obtain the database handle (`getDb`) and close it (`disconnectDb`).
 */
import { MongoClient, type Db } from "mongodb";
import { loadEnv } from "@/configuration/env";

let client: MongoClient | null = null;
let dbInstance: Db | null = null;

export async function getDb(): Promise<Db> {
  if (dbInstance) return dbInstance;
  const env = loadEnv();
  if (!env.MONGO_URI) throw new Error("MongoDB URI not configured (MONGO_URI).");
  if (!client) {
    client = new MongoClient(env.MONGO_URI);
  }
  await client.connect();
  dbInstance = client.db(env.DB_NAME);
  return dbInstance;
}

export async function disconnectDb(): Promise<void> {
  if (client) {
    await client.close();
  }
  client = null;
  dbInstance = null;
}
