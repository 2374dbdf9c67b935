import RefreshToken, { RefreshTokenDoc } from "../models/RefreshToken";
import { RefreshTokenRecord } from "../types/auth";
import { guard, toObjectId } from "./mongo";

export interface NewRefreshToken {
  userId: string;
  token: string;
  expiresAt: Date;
}

export interface RefreshTokenRepository {
  create(input: NewRefreshToken): Promise<RefreshTokenRecord>;
  /** Non-revoked row for the exact token string. Expiry is not checked here. */
  findActive(token: string): Promise<RefreshTokenRecord | null>;
  /** Flags the row revoked; true when a row with that token exists at all. */
  markRevoked(token: string): Promise<boolean>;
  /**
   * Single conditional update: flips a non-revoked, unexpired row to revoked
   * and returns it, or returns null when no such row exists.
   */
  consume(token: string, now: Date): Promise<RefreshTokenRecord | null>;
  revokeAllForUser(userId: string): Promise<number>;
  deleteExpired(now: Date): Promise<number>;
}

function toRecord(doc: RefreshTokenDoc): RefreshTokenRecord {
  return {
    id: doc._id.toString(),
    userId: doc.userId.toString(),
    token: doc.token,
    expiresAt: doc.expiresAt,
    isRevoked: doc.isRevoked,
    createdAt: doc.createdAt,
  };
}

export class MongoRefreshTokenRepository implements RefreshTokenRepository {
  async create(input: NewRefreshToken) {
    return guard("refresh token create", async () => {
      const doc = await RefreshToken.create({ ...input, userId: toObjectId(input.userId) });
      return toRecord(doc);
    });
  }

  async findActive(token: string) {
    return guard("refresh token lookup", async () => {
      const doc = await RefreshToken.findOne({ token, isRevoked: false });
      return doc ? toRecord(doc) : null;
    });
  }

  async markRevoked(token: string) {
    return guard("refresh token revoke", async () => {
      const { matchedCount } = await RefreshToken.updateOne({ token }, { $set: { isRevoked: true } });
      return matchedCount > 0;
    });
  }

  async consume(token: string, now: Date) {
    return guard("refresh token rotation", async () => {
      const doc = await RefreshToken.findOneAndUpdate(
        { token, isRevoked: false, expiresAt: { $gt: now } },
        { $set: { isRevoked: true } },
        { new: true }
      );
      return doc ? toRecord(doc) : null;
    });
  }

  async revokeAllForUser(userId: string) {
    const _id = toObjectId(userId);
    if (!_id) return 0;
    return guard("refresh token bulk revoke", async () => {
      const { modifiedCount } = await RefreshToken.updateMany(
        { userId: _id, isRevoked: false },
        { $set: { isRevoked: true } }
      );
      return modifiedCount;
    });
  }

  async deleteExpired(now: Date) {
    return guard("refresh token cleanup", async () => {
      const { deletedCount } = await RefreshToken.deleteMany({ expiresAt: { $lt: now } });
      return deletedCount;
    });
  }
}
