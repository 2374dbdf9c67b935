import crypto from "crypto";
import { AppConfig, accessTtlSeconds, refreshTtlSeconds } from "../config/env";
import { OpaqueTokenRepository } from "../repositories/opaqueTokens.repository";
import { OpaqueTokenRecord, TokenType } from "../types/auth";

export type Clock = () => Date;

/**
 * Random bearer strings whose only meaning is the row they point at.
 * Access and refresh rows share one collection; tokenType keeps them apart.
 */
export class OpaqueTokenStore {
  constructor(
    private readonly repo: OpaqueTokenRepository,
    private readonly config: AppConfig,
    private readonly now: Clock = () => new Date()
  ) {}

  /** 32 random bytes, base64url: 43 characters, 256 bits. */
  generate(): string {
    return crypto.randomBytes(32).toString("base64url");
  }

  async issue(userId: string, tokenType: TokenType, ttlSeconds?: number): Promise<OpaqueTokenRecord> {
    const ttl = ttlSeconds ?? (tokenType === "access" ? accessTtlSeconds(this.config) : refreshTtlSeconds(this.config));
    const expiresAt = new Date(this.now().getTime() + ttl * 1000);
    return this.repo.create({ userId, token: this.generate(), tokenType, expiresAt });
  }

  async validate(token: string, tokenType?: TokenType): Promise<OpaqueTokenRecord | null> {
    const row = await this.repo.findActive(token, tokenType);
    if (!row) return null;
    const now = this.now();
    if (row.expiresAt.getTime() <= now.getTime()) return null;

    try {
      await this.repo.touch(row.id, now);
    } catch (err) {
      // lastUsedAt is telemetry only
      console.warn("Could not stamp opaque token last use", { tokenId: row.id, err });
      return row;
    }
    return { ...row, lastUsedAt: now };
  }

  /** True whenever the token exists, including when it was already revoked. */
  async revoke(token: string): Promise<boolean> {
    return this.repo.markRevoked(token);
  }

  /** Atomically retires a live token of the given type; null if another caller got there first. */
  async consume(token: string, tokenType: TokenType): Promise<OpaqueTokenRecord | null> {
    return this.repo.consume(token, tokenType, this.now());
  }

  async revokeAllForUser(userId: string, tokenType?: TokenType): Promise<number> {
    return this.repo.revokeAllForUser(userId, tokenType);
  }

  async cleanupExpired(): Promise<number> {
    return this.repo.deleteExpired(this.now());
  }
}
