import { FilterQuery } from "mongoose";
import OpaqueToken, { OpaqueTokenDoc } from "../models/OpaqueToken";
import { OpaqueTokenRecord, TokenType } from "../types/auth";
import { guard, toObjectId } from "./mongo";

export interface NewOpaqueToken {
  userId: string;
  token: string;
  tokenType: TokenType;
  expiresAt: Date;
}

export interface OpaqueTokenRepository {
  create(input: NewOpaqueToken): Promise<OpaqueTokenRecord>;
  /** Non-revoked row for the exact token string, narrowed to a type when given. */
  findActive(token: string, tokenType?: TokenType): Promise<OpaqueTokenRecord | null>;
  touch(id: string, at: Date): Promise<void>;
  /** Flags the row revoked; true when a row with that token exists at all. */
  markRevoked(token: string): Promise<boolean>;
  consume(token: string, tokenType: TokenType, now: Date): Promise<OpaqueTokenRecord | null>;
  revokeAllForUser(userId: string, tokenType?: TokenType): Promise<number>;
  deleteExpired(now: Date): Promise<number>;
}

function toRecord(doc: OpaqueTokenDoc): OpaqueTokenRecord {
  return {
    id: doc._id.toString(),
    userId: doc.userId.toString(),
    token: doc.token,
    tokenType: doc.tokenType,
    expiresAt: doc.expiresAt,
    isRevoked: doc.isRevoked,
    createdAt: doc.createdAt,
    lastUsedAt: doc.lastUsedAt ?? null,
  };
}

export class MongoOpaqueTokenRepository implements OpaqueTokenRepository {
  async create(input: NewOpaqueToken) {
    return guard("opaque token create", async () => {
      const doc = await OpaqueToken.create({ ...input, userId: toObjectId(input.userId) });
      return toRecord(doc);
    });
  }

  async findActive(token: string, tokenType?: TokenType) {
    const filter: FilterQuery<OpaqueTokenDoc> = { token, isRevoked: false };
    if (tokenType) filter.tokenType = tokenType;
    return guard("opaque token lookup", async () => {
      const doc = await OpaqueToken.findOne(filter);
      return doc ? toRecord(doc) : null;
    });
  }

  async touch(id: string, at: Date) {
    const _id = toObjectId(id);
    if (!_id) return;
    await guard("opaque token touch", async () => {
      await OpaqueToken.updateOne({ _id }, { $set: { lastUsedAt: at } });
    });
  }

  async markRevoked(token: string) {
    return guard("opaque token revoke", async () => {
      const { matchedCount } = await OpaqueToken.updateOne({ token }, { $set: { isRevoked: true } });
      return matchedCount > 0;
    });
  }

  async consume(token: string, tokenType: TokenType, now: Date) {
    return guard("opaque token rotation", async () => {
      const doc = await OpaqueToken.findOneAndUpdate(
        { token, tokenType, isRevoked: false, expiresAt: { $gt: now } },
        { $set: { isRevoked: true } },
        { new: true }
      );
      return doc ? toRecord(doc) : null;
    });
  }

  async revokeAllForUser(userId: string, tokenType?: TokenType) {
    const _id = toObjectId(userId);
    if (!_id) return 0;
    const filter: FilterQuery<OpaqueTokenDoc> = { userId: _id, isRevoked: false };
    if (tokenType) filter.tokenType = tokenType;
    return guard("opaque token bulk revoke", async () => {
      const { modifiedCount } = await OpaqueToken.updateMany(filter, { $set: { isRevoked: true } });
      return modifiedCount;
    });
  }

  async deleteExpired(now: Date) {
    return guard("opaque token cleanup", async () => {
      const { deletedCount } = await OpaqueToken.deleteMany({ expiresAt: { $lt: now } });
      return deletedCount;
    });
  }
}
