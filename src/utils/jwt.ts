import crypto from "crypto";
import jwt, { JsonWebTokenError, JwtPayload } from "jsonwebtoken";
import { z } from "zod";
import { AppConfig, accessTtlSeconds, refreshTtlSeconds } from "../config/env";
import { TokenInvalidError } from "./errors";
import { TokenType } from "../types/auth";

export interface TokenSubject {
  sub: string;
  email?: string | null;
}

const ClaimsSchema = z
  .object({
    sub: z.string().min(1),
    email: z.string().nullable().optional(),
    type: z.enum(["access", "refresh"]),
    exp: z.number(),
    iat: z.number().optional(),
    jti: z.string().optional(),
  })
  .passthrough();

export type TokenClaims = z.infer<typeof ClaimsSchema>;

/**
 * Signs and verifies self-contained bearer tokens with the configured
 * shared secret. Decoding proves origin and freshness only; callers must
 * still load the user named by `sub`.
 */
export class JwtEngine {
  constructor(private readonly config: AppConfig) {}

  issueAccess(claims: TokenSubject, ttlSeconds: number = accessTtlSeconds(this.config)): string {
    return this.sign(claims, "access", ttlSeconds);
  }

  issueRefresh(claims: TokenSubject): string {
    return this.sign(claims, "refresh", refreshTtlSeconds(this.config));
  }

  decode(token: string): TokenClaims {
    let payload: string | JwtPayload;
    try {
      // exp is enforced by verify itself
      payload = jwt.verify(token, this.config.jwt.secret, { algorithms: [this.config.jwt.algorithm] });
    } catch (err) {
      if (err instanceof JsonWebTokenError) throw new TokenInvalidError();
      throw err;
    }
    const parsed = ClaimsSchema.safeParse(payload);
    if (!parsed.success) throw new TokenInvalidError();
    return parsed.data;
  }

  private sign(claims: TokenSubject, type: TokenType, ttlSeconds: number): string {
    const now = Math.floor(Date.now() / 1000);
    // jti keeps two tokens minted in the same second for the same user distinct
    const payload = { ...claims, type, exp: now + ttlSeconds, jti: crypto.randomUUID() };
    return jwt.sign(payload, this.config.jwt.secret, { algorithm: this.config.jwt.algorithm });
  }
}
