import { MongoServerError } from "mongodb";

/** Mongo reports unique index violations with code 11000. */
export function isDuplicateKeyError(error: unknown): boolean {
  return error instanceof MongoServerError && error.code === 11000;
}
