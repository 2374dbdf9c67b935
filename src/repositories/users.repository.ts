import User, { UserDoc } from "../models/User";
import RefreshToken from "../models/RefreshToken";
import OpaqueToken from "../models/OpaqueToken";
import { NewUser, UserPatch, UserRecord } from "../types/auth";
import { UserAlreadyExistsError } from "../utils/errors";
import { guard, isDuplicateKeyError, toObjectId } from "./mongo";

export interface UserRepository {
  findById(id: string): Promise<UserRecord | null>;
  findByEmail(email: string): Promise<UserRecord | null>;
  /** Throws UserAlreadyExistsError when the email is already taken. */
  create(input: NewUser): Promise<UserRecord>;
  update(id: string, patch: UserPatch): Promise<UserRecord | null>;
  /** Removes the user together with every token it owns. */
  delete(id: string): Promise<boolean>;
}

export function toUserRecord(doc: UserDoc): UserRecord {
  return {
    id: doc._id.toString(),
    name: doc.name,
    email: doc.email ?? null,
    phone: doc.phone ?? null,
    passwordHash: doc.passwordHash,
    active: doc.active !== false,
    createdAt: doc.createdAt,
    updatedAt: doc.updatedAt,
  };
}

export class MongoUserRepository implements UserRepository {
  async findById(id: string) {
    const _id = toObjectId(id);
    if (!_id) return null;
    return guard("user lookup", async () => {
      const doc = await User.findById(_id);
      return doc ? toUserRecord(doc) : null;
    });
  }

  async findByEmail(email: string) {
    return guard("user lookup", async () => {
      const doc = await User.findOne({ email: email.trim().toLowerCase() });
      return doc ? toUserRecord(doc) : null;
    });
  }

  async create(input: NewUser) {
    return guard("user create", async () => {
      try {
        const doc = await User.create(input);
        return toUserRecord(doc);
      } catch (err) {
        // Lost a race against a concurrent registration for the same email
        if (isDuplicateKeyError(err)) throw new UserAlreadyExistsError(input.email ?? "");
        throw err;
      }
    });
  }

  async update(id: string, patch: UserPatch) {
    const _id = toObjectId(id);
    if (!_id) return null;
    return guard("user update", async () => {
      try {
        const doc = await User.findByIdAndUpdate(_id, { $set: patch }, { new: true, runValidators: true });
        return doc ? toUserRecord(doc) : null;
      } catch (err) {
        if (isDuplicateKeyError(err)) throw new UserAlreadyExistsError(patch.email ?? "");
        throw err;
      }
    });
  }

  async delete(id: string) {
    const _id = toObjectId(id);
    if (!_id) return false;
    return guard("user delete", async () => {
      const { deletedCount } = await User.deleteOne({ _id });
      if (deletedCount === 0) return false;
      await Promise.all([RefreshToken.deleteMany({ userId: _id }), OpaqueToken.deleteMany({ userId: _id })]);
      return true;
    });
  }
}
