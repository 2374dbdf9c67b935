import { isObjectIdOrHexString, Types } from "mongoose";
import { DatabaseError, HttpError } from "../utils/errors";

/**
 * Runs a Mongo operation, turning driver failures into a DatabaseError so
 * nothing about the store leaks past the HTTP boundary.
 */
export async function guard<T>(operation: string, fn: () => Promise<T>): Promise<T> {
  try {
    return await fn();
  } catch (err) {
    if (err instanceof HttpError) throw err;
    console.error(`Database error during ${operation}`, err);
    throw new DatabaseError(err);
  }
}

export function isDuplicateKeyError(err: unknown): boolean {
  return typeof err === "object" && err !== null && "code" in err && err.code === 11000;
}

export function toObjectId(id: string): Types.ObjectId | null {
  return isObjectIdOrHexString(id) ? new Types.ObjectId(id) : null;
}
