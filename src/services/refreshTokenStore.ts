import { AppConfig, refreshTtlSeconds } from "../config/env";
import { RefreshTokenRepository } from "../repositories/refreshTokens.repository";
import { RefreshTokenRecord } from "../types/auth";
import { Clock } from "./opaqueTokenStore";

// Rotation ledger for signed refresh tokens. Its own collection, so opaque
// and JWT credentials can never be accepted in each other's flow.
export class RefreshTokenStore {
  constructor(
    private readonly repo: RefreshTokenRepository,
    private readonly config: AppConfig,
    private readonly now: Clock = () => new Date()
  ) {}

  async create(userId: string, token: string): Promise<RefreshTokenRecord> {
    const expiresAt = new Date(this.now().getTime() + refreshTtlSeconds(this.config) * 1000);
    return this.repo.create({ userId, token, expiresAt });
  }

  async get(token: string): Promise<RefreshTokenRecord | null> {
    return this.repo.findActive(token);
  }

  isExpired(record: RefreshTokenRecord): boolean {
    return record.expiresAt.getTime() <= this.now().getTime();
  }

  async revoke(token: string): Promise<boolean> {
    return this.repo.markRevoked(token);
  }

  async consume(token: string): Promise<RefreshTokenRecord | null> {
    return this.repo.consume(token, this.now());
  }

  async revokeAllForUser(userId: string): Promise<number> {
    return this.repo.revokeAllForUser(userId);
  }

  async cleanupExpired(): Promise<number> {
    return this.repo.deleteExpired(this.now());
  }
}
