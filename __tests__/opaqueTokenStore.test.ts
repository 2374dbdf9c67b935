import { OpaqueTokenStore } from '../src/services/opaqueTokenStore';
import {
  MemoryOpaqueTokenRepository,
  manualClock,
  silenceConsole,
  testConfig,
} from './helpers/memoryRepositories';

const MINUTE = 60 * 1000;
const DAY = 24 * 60 * MINUTE;

describe('OpaqueTokenStore', () => {
  let repo: MemoryOpaqueTokenRepository;
  let clock: ReturnType<typeof manualClock>;
  let store: OpaqueTokenStore;

  beforeAll(() => silenceConsole());

  beforeEach(() => {
    repo = new MemoryOpaqueTokenRepository();
    clock = manualClock();
    store = new OpaqueTokenStore(repo, testConfig(), clock.now);
  });

  it('generates 43-character url-safe strings without repeats', () => {
    const seen = new Set<string>();
    for (let i = 0; i < 200; i++) {
      const token = store.generate();
      expect(token).toMatch(/^[A-Za-z0-9_-]{43}$/);
      seen.add(token);
    }
    expect(seen.size).toBe(200);
  });

  it('defaults the ttl by token type and accepts an override', async () => {
    const start = clock.now().getTime();
    const access = await store.issue('u1', 'access');
    const refresh = await store.issue('u1', 'refresh');
    const custom = await store.issue('u1', 'access', 5);

    expect(access.expiresAt.getTime()).toBe(start + 30 * MINUTE);
    expect(refresh.expiresAt.getTime()).toBe(start + 7 * DAY);
    expect(custom.expiresAt.getTime()).toBe(start + 5000);
    expect(access).toMatchObject({ userId: 'u1', tokenType: 'access', isRevoked: false, lastUsedAt: null });
  });

  it('validates a live token and stamps lastUsedAt', async () => {
    const issued = await store.issue('u1', 'access');
    clock.advance(MINUTE);

    const row = await store.validate(issued.token);

    expect(row?.id).toBe(issued.id);
    expect(row?.lastUsedAt).toEqual(clock.now());
    expect(repo.rows[0].lastUsedAt).toEqual(clock.now());
  });

  it('keeps access and refresh namespaces apart', async () => {
    const access = await store.issue('u1', 'access');
    const refresh = await store.issue('u1', 'refresh');

    expect(await store.validate(access.token, 'refresh')).toBeNull();
    expect(await store.validate(refresh.token, 'access')).toBeNull();
    expect((await store.validate(access.token, 'access'))?.tokenType).toBe('access');
    expect((await store.validate(refresh.token, 'refresh'))?.tokenType).toBe('refresh');
  });

  it('treats a token as dead once its expiry has passed', async () => {
    const issued = await store.issue('u1', 'access');
    clock.advance(30 * MINUTE);
    expect(await store.validate(issued.token)).toBeNull();
  });

  it('returns null for unknown tokens', async () => {
    expect(await store.validate('no-such-token')).toBeNull();
  });

  it('still accepts the token when stamping lastUsedAt fails', async () => {
    const issued = await store.issue('u1', 'access');
    jest.spyOn(repo, 'touch').mockRejectedValueOnce(new Error('write conflict'));

    const row = await store.validate(issued.token, 'access');

    expect(row?.token).toBe(issued.token);
    expect(row?.lastUsedAt).toBeNull();
  });

  // revoke answers "does this token exist", not "did this call flip it"
  it('reports true on every revoke of an existing token, false for unknown ones', async () => {
    const issued = await store.issue('u1', 'refresh');

    expect(await store.revoke(issued.token)).toBe(true);
    expect(await store.validate(issued.token)).toBeNull();
    expect(await store.revoke(issued.token)).toBe(true);
    expect(await store.revoke('no-such-token')).toBe(false);
  });

  it('revokes all live tokens of a user, optionally by type', async () => {
    await store.issue('u1', 'access');
    await store.issue('u1', 'refresh');
    await store.issue('u1', 'refresh');
    const other = await store.issue('u2', 'refresh');

    expect(await store.revokeAllForUser('u1', 'refresh')).toBe(2);
    expect(await store.revokeAllForUser('u1')).toBe(1);
    expect(await store.revokeAllForUser('u1')).toBe(0);
    expect(await store.validate(other.token)).not.toBeNull();
  });

  it('consumes a refresh token exactly once', async () => {
    const issued = await store.issue('u1', 'refresh');

    expect((await store.consume(issued.token, 'refresh'))?.isRevoked).toBe(true);
    expect(await store.consume(issued.token, 'refresh')).toBeNull();
  });

  it('does not consume a token of the other type or past expiry', async () => {
    const access = await store.issue('u1', 'access');
    const refresh = await store.issue('u1', 'refresh', 60);
    clock.advance(2 * MINUTE);

    expect(await store.consume(access.token, 'refresh')).toBeNull();
    expect(await store.consume(refresh.token, 'refresh')).toBeNull();
  });

  it('deletes expired rows whether or not they were revoked', async () => {
    const shortLived = await store.issue('u1', 'access', 60);
    const revoked = await store.issue('u1', 'access', 60);
    await store.revoke(revoked.token);
    const live = await store.issue('u1', 'refresh');
    clock.advance(2 * MINUTE);

    expect(await store.cleanupExpired()).toBe(2);
    expect(repo.rows.map((r) => r.token)).toEqual([live.token]);
    expect(repo.rows.some((r) => r.token === shortLived.token)).toBe(false);
  });
});
