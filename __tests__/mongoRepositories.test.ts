import { Types } from 'mongoose';
import User from '../src/models/User';
import RefreshToken from '../src/models/RefreshToken';
import OpaqueToken from '../src/models/OpaqueToken';
import { MongoUserRepository } from '../src/repositories/users.repository';
import { MongoRefreshTokenRepository } from '../src/repositories/refreshTokens.repository';
import { MongoOpaqueTokenRepository } from '../src/repositories/opaqueTokens.repository';
import { DatabaseError, UserAlreadyExistsError } from '../src/utils/errors';
import { silenceConsole } from './helpers/memoryRepositories';

// Model statics are stubbed; no Mongo server is involved
describe('Mongo repositories', () => {
  beforeEach(() => silenceConsole());
  afterEach(() => jest.restoreAllMocks());

  const now = new Date('2026-03-01T12:00:00.000Z');
  const userId = new Types.ObjectId();

  describe('MongoRefreshTokenRepository', () => {
    const repo = new MongoRefreshTokenRepository();

    it('rotates with one conditional update', async () => {
      const doc = {
        _id: new Types.ObjectId(),
        userId,
        token: 'refresh-a',
        expiresAt: new Date('2026-03-08T12:00:00.000Z'),
        isRevoked: true,
        createdAt: now,
      };
      const spy = jest.spyOn(RefreshToken, 'findOneAndUpdate').mockResolvedValue(doc as never);

      const row = await repo.consume('refresh-a', now);

      expect(spy).toHaveBeenCalledWith(
        { token: 'refresh-a', isRevoked: false, expiresAt: { $gt: now } },
        { $set: { isRevoked: true } },
        { new: true }
      );
      expect(row).toEqual({
        id: doc._id.toString(),
        userId: userId.toString(),
        token: 'refresh-a',
        expiresAt: doc.expiresAt,
        isRevoked: true,
        createdAt: now,
      });
    });

    it('returns null when the conditional update matched nothing', async () => {
      jest.spyOn(RefreshToken, 'findOneAndUpdate').mockResolvedValue(null as never);
      expect(await repo.consume('refresh-a', now)).toBeNull();
    });

    it('reports revoke by whether a row matched', async () => {
      const spy = jest
        .spyOn(RefreshToken, 'updateOne')
        .mockResolvedValueOnce({ matchedCount: 1, modifiedCount: 0 } as never)
        .mockResolvedValueOnce({ matchedCount: 0, modifiedCount: 0 } as never);

      expect(await repo.markRevoked('refresh-a')).toBe(true);
      expect(await repo.markRevoked('missing')).toBe(false);
      expect(spy).toHaveBeenCalledWith({ token: 'refresh-a' }, { $set: { isRevoked: true } });
    });

    it('wraps driver failures in a DatabaseError', async () => {
      jest.spyOn(RefreshToken, 'findOne').mockRejectedValue(new Error('connection reset') as never);
      await expect(repo.findActive('refresh-a')).rejects.toBeInstanceOf(DatabaseError);
    });

    it('deletes by expiry only', async () => {
      const spy = jest.spyOn(RefreshToken, 'deleteMany').mockResolvedValue({ deletedCount: 3 } as never);
      expect(await repo.deleteExpired(now)).toBe(3);
      expect(spy).toHaveBeenCalledWith({ expiresAt: { $lt: now } });
    });
  });

  describe('MongoOpaqueTokenRepository', () => {
    const repo = new MongoOpaqueTokenRepository();

    it('filters lookups by type when asked', async () => {
      const spy = jest.spyOn(OpaqueToken, 'findOne').mockResolvedValue(null as never);

      await repo.findActive('tok', 'refresh');
      await repo.findActive('tok');

      expect(spy).toHaveBeenNthCalledWith(1, { token: 'tok', isRevoked: false, tokenType: 'refresh' });
      expect(spy).toHaveBeenNthCalledWith(2, { token: 'tok', isRevoked: false });
    });

    it('bulk revokes live rows and returns the count', async () => {
      const spy = jest.spyOn(OpaqueToken, 'updateMany').mockResolvedValue({ modifiedCount: 2 } as never);

      expect(await repo.revokeAllForUser(userId.toString(), 'access')).toBe(2);
      expect(spy).toHaveBeenCalledWith(
        expect.objectContaining({ userId, isRevoked: false, tokenType: 'access' }),
        { $set: { isRevoked: true } }
      );
    });

    it('does not query for ids that cannot exist', async () => {
      const spy = jest.spyOn(OpaqueToken, 'updateMany');
      expect(await repo.revokeAllForUser('not-an-object-id')).toBe(0);
      expect(spy).not.toHaveBeenCalled();
    });
  });

  describe('MongoUserRepository', () => {
    const repo = new MongoUserRepository();

    it('maps a duplicate-key insert to UserAlreadyExistsError', async () => {
      jest.spyOn(User, 'create').mockRejectedValue(Object.assign(new Error('E11000 duplicate key'), { code: 11000 }));

      await expect(
        repo.create({ name: 'A', email: 'a@x.com', phone: null, passwordHash: 'hash' })
      ).rejects.toBeInstanceOf(UserAlreadyExistsError);
    });

    it('looks emails up lower-cased', async () => {
      const spy = jest.spyOn(User, 'findOne').mockResolvedValue(null as never);
      await repo.findByEmail(' A@X.com ');
      expect(spy).toHaveBeenCalledWith({ email: 'a@x.com' });
    });

    it('returns null for malformed ids without querying', async () => {
      const spy = jest.spyOn(User, 'findById');
      expect(await repo.findById('42')).toBeNull();
      expect(spy).not.toHaveBeenCalled();
    });

    it('cascades a delete to both token collections', async () => {
      jest.spyOn(User, 'deleteOne').mockResolvedValue({ deletedCount: 1 } as never);
      const refresh = jest.spyOn(RefreshToken, 'deleteMany').mockResolvedValue({ deletedCount: 2 } as never);
      const opaque = jest.spyOn(OpaqueToken, 'deleteMany').mockResolvedValue({ deletedCount: 4 } as never);

      expect(await repo.delete(userId.toString())).toBe(true);
      expect(refresh).toHaveBeenCalledWith({ userId });
      expect(opaque).toHaveBeenCalledWith({ userId });
    });

    it('leaves tokens alone when the user did not exist', async () => {
      jest.spyOn(User, 'deleteOne').mockResolvedValue({ deletedCount: 0 } as never);
      const refresh = jest.spyOn(RefreshToken, 'deleteMany');

      expect(await repo.delete(userId.toString())).toBe(false);
      expect(refresh).not.toHaveBeenCalled();
    });
  });
});
