import { ZodError } from 'zod';
import { loadConfig, accessTtlSeconds, refreshTtlSeconds } from '../src/config/env';

const required = { MONGO_URI: 'mongodb://localhost:27017/auth', JWT_SECRET_KEY: 'test-secret' };

describe('loadConfig', () => {
  it('fills in defaults', () => {
    const config = loadConfig(required);

    expect(config.port).toBe(4000);
    expect(config.jwt).toEqual({
      secret: 'test-secret',
      algorithm: 'HS256',
      accessTtlMinutes: 30,
      refreshTtlDays: 7,
    });
    expect(config.password).toEqual({ minLength: 4, bcryptRounds: 12 });
    expect(config.http.allowedOrigins).toEqual([]);
    expect(config.maintenanceToken).toBeUndefined();
    expect(accessTtlSeconds(config)).toBe(1800);
    expect(refreshTtlSeconds(config)).toBe(604800);
  });

  it('parses numbers, lists and flags from strings', () => {
    const config = loadConfig({
      ...required,
      JWT_ALGORITHM: 'HS512',
      JWT_ACCESS_TOKEN_EXPIRE_MINUTES: '5',
      PASSWORD_MIN_LENGTH: '10',
      ALLOWED_ORIGINS: 'https://a.example, https://b.example ,',
      COOKIE_SECURE: 'false',
      COOKIE_SAMESITE: 'Lax',
    });

    expect(config.jwt.algorithm).toBe('HS512');
    expect(config.jwt.accessTtlMinutes).toBe(5);
    expect(config.password.minLength).toBe(10);
    expect(config.http.allowedOrigins).toEqual(['https://a.example', 'https://b.example']);
    expect(config.http.cookieSecure).toBe(false);
    expect(config.http.cookieSameSite).toBe('lax');
  });

  it('is frozen', () => {
    const config = loadConfig(required);
    expect(Object.isFrozen(config)).toBe(true);
    expect(Object.isFrozen(config.jwt)).toBe(true);
  });

  it('refuses to start without a signing secret', () => {
    expect(() => loadConfig({ MONGO_URI: required.MONGO_URI })).toThrow(ZodError);
  });

  it('only accepts shared-secret algorithms', () => {
    expect(() => loadConfig({ ...required, JWT_ALGORITHM: 'RS256' })).toThrow(ZodError);
  });
});
