import { JwtEngine, TokenClaims } from "../utils/jwt";
import { InvalidRefreshTokenError, TokenInvalidError } from "../utils/errors";
import { TokenResponse, TokenType, UserRecord } from "../types/auth";
import { RefreshTokenStore } from "./refreshTokenStore";
import { OpaqueTokenStore } from "./opaqueTokenStore";

export type AuthMode = "jwt" | "opaque";

export interface TokenGrant {
  userId: string;
  tokenType: TokenType;
  expiresAt: Date;
}

/**
 * One way of minting and checking credentials. AuthService drives the
 * login/refresh/logout flow and leaves every mode-specific step to this.
 */
export interface TokenIssuer {
  readonly mode: AuthMode;
  issuePair(user: UserRecord): Promise<TokenResponse>;
  /**
   * Checks a refresh token and returns the owning user id. Throws
   * InvalidRefreshTokenError. Leaves the token usable; the only write is the
   * opaque store's lastUsedAt stamp.
   */
  checkRefresh(token: string): Promise<string>;
  /** Retires a checked refresh token. False when a concurrent caller already did. */
  retire(token: string): Promise<boolean>;
  /** User id behind a live access token; throws TokenInvalidError otherwise. */
  authenticate(accessToken: string): Promise<string>;
  /** Grant behind a live access or refresh token, null when it is not live. */
  inspect(token: string): Promise<TokenGrant | null>;
  revoke(token: string): Promise<boolean>;
  revokeAllForUser(userId: string): Promise<number>;
}

const pair = (access_token: string, refresh_token: string): TokenResponse => ({
  access_token,
  refresh_token,
  token_type: "bearer",
});

export class JwtTokenIssuer implements TokenIssuer {
  readonly mode = "jwt" as const;

  constructor(
    private readonly jwt: JwtEngine,
    private readonly ledger: RefreshTokenStore
  ) {}

  async issuePair(user: UserRecord) {
    const subject = { sub: user.id, email: user.email };
    const access = this.jwt.issueAccess(subject);
    const refresh = this.jwt.issueRefresh(subject);
    await this.ledger.create(user.id, refresh);
    return pair(access, refresh);
  }

  async checkRefresh(token: string) {
    const claims = this.tryDecode(token);
    if (!claims) {
      console.warn("Token refresh failed: invalid token");
      throw new InvalidRefreshTokenError();
    }
    if (claims.type !== "refresh") {
      console.warn("Token refresh failed: wrong token type");
      throw new InvalidRefreshTokenError();
    }
    const record = await this.ledger.get(token);
    if (!record) {
      console.warn("Token refresh failed: token not found or revoked");
      throw new InvalidRefreshTokenError();
    }
    if (this.ledger.isExpired(record)) {
      console.warn("Token refresh failed: token expired");
      throw new InvalidRefreshTokenError();
    }
    if (record.userId !== claims.sub) {
      console.warn("Token refresh failed: subject does not own the ledger row", { userId: claims.sub });
      throw new InvalidRefreshTokenError();
    }
    return claims.sub;
  }

  async retire(token: string) {
    return (await this.ledger.consume(token)) !== null;
  }

  async authenticate(accessToken: string) {
    const claims = this.jwt.decode(accessToken);
    if (claims.type !== "access") throw new TokenInvalidError();
    return claims.sub;
  }

  async inspect(token: string) {
    const claims = this.tryDecode(token);
    if (!claims) return null;
    if (claims.type === "refresh" && !(await this.ledger.get(token))) return null;
    return { userId: claims.sub, tokenType: claims.type, expiresAt: new Date(claims.exp * 1000) };
  }

  async revoke(token: string) {
    return this.ledger.revoke(token);
  }

  async revokeAllForUser(userId: string) {
    return this.ledger.revokeAllForUser(userId);
  }

  private tryDecode(token: string): TokenClaims | null {
    try {
      return this.jwt.decode(token);
    } catch (err) {
      if (err instanceof TokenInvalidError) return null;
      throw err;
    }
  }
}

export class OpaqueTokenIssuer implements TokenIssuer {
  readonly mode = "opaque" as const;

  constructor(private readonly store: OpaqueTokenStore) {}

  async issuePair(user: UserRecord) {
    const access = await this.store.issue(user.id, "access");
    const refresh = await this.store.issue(user.id, "refresh");
    return pair(access.token, refresh.token);
  }

  async checkRefresh(token: string) {
    const row = await this.store.validate(token, "refresh");
    if (!row) {
      console.warn("Opaque token refresh failed: invalid or expired refresh token");
      throw new InvalidRefreshTokenError();
    }
    return row.userId;
  }

  async retire(token: string) {
    return (await this.store.consume(token, "refresh")) !== null;
  }

  async authenticate(accessToken: string) {
    const row = await this.store.validate(accessToken, "access");
    if (!row) throw new TokenInvalidError();
    return row.userId;
  }

  async inspect(token: string) {
    const row = await this.store.validate(token);
    return row ? { userId: row.userId, tokenType: row.tokenType, expiresAt: row.expiresAt } : null;
  }

  async revoke(token: string) {
    return this.store.revoke(token);
  }

  async revokeAllForUser(userId: string) {
    return this.store.revokeAllForUser(userId);
  }
}
