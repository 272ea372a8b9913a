/**
 * User profiles read from `user_profiles`. Age comes from the verified birth date; a user
 * without one is treated as an adult.
 */

import type { Collection } from "mongodb";
import { z } from "zod";
import { getDb } from "@/db/mongo";
import { ErrResult, OkResult, toError, type Result } from "@/utils/result";
import type { IdentityDirectory, UserProfile } from "./types";

const ProfileSchema = z.object({
  _id: z.string(),
  displayName: z.string().catch(""),
  birthDate: z.date().nullable().catch(null),
  withdrawProfitDays: z.number().int().positive().optional().catch(undefined),
});

type ProfileDoc = z.infer<typeof ProfileSchema>;

const ADULT_AGE = 18;

export function isMinorAt(birthDate: Date | null, at: Date): boolean {
  if (!birthDate) return false;
  let age = at.getUTCFullYear() - birthDate.getUTCFullYear();
  const beforeBirthday =
    at.getUTCMonth() < birthDate.getUTCMonth() ||
    (at.getUTCMonth() === birthDate.getUTCMonth() && at.getUTCDate() < birthDate.getUTCDate());
  if (beforeBirthday) age -= 1;
  return age < ADULT_AGE;
}

class MongoIdentityDirectory implements IdentityDirectory {
  private async collection(): Promise<Collection<ProfileDoc>> {
    const db = await getDb();
    return db.collection<ProfileDoc>("user_profiles");
  }

  async getProfile(userId: string): Promise<Result<UserProfile | null, Error>> {
    try {
      const col = await this.collection();
      const raw = await col.findOne({ _id: userId });
      if (!raw) return OkResult(null);
      const doc = ProfileSchema.parse(raw);
      return OkResult({
        userId,
        displayName: doc.displayName || userId,
        isMinor: isMinorAt(doc.birthDate, new Date()),
        withdrawProfitDays: doc.withdrawProfitDays,
      });
    } catch (error) {
      return ErrResult(toError(error));
    }
  }
}

export const identityDirectory: IdentityDirectory = new MongoIdentityDirectory();
