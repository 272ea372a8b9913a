/**
 * Process environment.
 *
 * Loaded once through dotenv and validated with zod; infrastructure settings only.
 * Business variables live in the settings store.
 */
import "dotenv/config";
import { z } from "zod";

const EnvSchema = z.object({
  MONGO_URI: z.string().optional(),
  DB_NAME: z.string().min(1).default("parcel_market"),
  LEDGER_BASE_URL: z.string().url().default("http://localhost:8081"),
  LEDGER_API_TOKEN: z.string().optional(),
  LEDGER_TIMEOUT_MS: z.coerce.number().int().positive().default(5_000),
});

export type Env = z.infer<typeof EnvSchema>;

let cached: Env | null = null;

export function loadEnv(source: NodeJS.ProcessEnv = process.env): Env {
  if (source === process.env && cached) return cached;
  const parsed = EnvSchema.safeParse(source);
  if (!parsed.success) {
    throw new Error(`Invalid environment: ${parsed.error.message}`);
  }
  if (source === process.env) cached = parsed.data;
  return parsed.data;
}
