import { AppConfig } from "../config/env";
import { UserRepository } from "../repositories/users.repository";
import {
  IntrospectionResponse,
  TokenResponse,
  UserRecord,
  UserResponse,
  toUserResponse,
} from "../types/auth";
import {
  InvalidCredentialsError,
  InvalidRefreshTokenError,
  TokenInvalidError,
  UserAlreadyExistsError,
  UserInactiveError,
  UserNotFoundError,
} from "../utils/errors";
import { hashPassword, verifyPassword } from "../utils/password";
import { AuthMode, TokenIssuer } from "./tokenIssuers";

export interface RegisterInput {
  name: string;
  email: string;
  password: string;
  phone?: string | null;
}

export interface LoginInput {
  email: string;
  password: string;
}

export interface AuthServiceDeps {
  config: AppConfig;
  users: UserRepository;
  issuer: TokenIssuer;
  /** Issuers of the other modes; password changes revoke their tokens as well. */
  peers?: readonly TokenIssuer[];
}

const normalizeEmail = (email: string) => email.trim().toLowerCase();

/**
 * Register, login, refresh, logout and identity lookups for one token mode.
 *
 * Every flow checks before it mutates: a rejected login or refresh leaves
 * token state untouched, and a refresh retires the old token in a single
 * conditional update before minting the new pair, so a token that two
 * requests race on rotates at most once.
 */
export class AuthService {
  private readonly config: AppConfig;
  private readonly users: UserRepository;
  private readonly issuer: TokenIssuer;
  private readonly peers: readonly TokenIssuer[];
  private decoyDigest?: Promise<string>;

  constructor(deps: AuthServiceDeps) {
    this.config = deps.config;
    this.users = deps.users;
    this.issuer = deps.issuer;
    this.peers = deps.peers ?? [];
  }

  get mode(): AuthMode {
    return this.issuer.mode;
  }

  async register(input: RegisterInput): Promise<UserResponse> {
    const email = normalizeEmail(input.email);
    if (await this.users.findByEmail(email)) {
      console.warn("Registration failed: email already registered", { email });
      throw new UserAlreadyExistsError(email);
    }
    const passwordHash = await hashPassword(input.password, this.config.password.bcryptRounds);
    const user = await this.users.create({
      name: input.name,
      email,
      phone: input.phone ?? null,
      passwordHash,
    });
    console.info("User registered", { userId: user.id });
    return toUserResponse(user);
  }

  async login(input: LoginInput): Promise<TokenResponse> {
    const user = await this.users.findByEmail(normalizeEmail(input.email));
    // Unknown email and wrong password must look identical to the caller
    if (!user) {
      // Pay the same bcrypt cost as a real comparison
      await verifyPassword(input.password, await this.decoy());
      console.warn(`Login failed (${this.mode}): unknown email`);
      throw new InvalidCredentialsError();
    }
    if (!(await verifyPassword(input.password, user.passwordHash))) {
      console.warn(`Login failed (${this.mode}): wrong password`, { userId: user.id });
      throw new InvalidCredentialsError();
    }
    if (!user.active) throw new UserInactiveError();

    const tokens = await this.issuer.issuePair(user);
    console.info(`User logged in (${this.mode})`, { userId: user.id });
    return tokens;
  }

  async refresh(refreshToken: string): Promise<TokenResponse> {
    const userId = await this.issuer.checkRefresh(refreshToken);

    // Claims and ledger rows are not enough: the account must still exist
    const user = await this.users.findById(userId);
    if (!user || !user.active) {
      console.warn(`Token refresh failed (${this.mode}): user missing or inactive`, { userId });
      throw new InvalidRefreshTokenError();
    }

    if (!(await this.issuer.retire(refreshToken))) {
      console.warn(`Token refresh failed (${this.mode}): token already rotated`, { userId });
      throw new InvalidRefreshTokenError();
    }

    const tokens = await this.issuer.issuePair(user);
    console.info(`Tokens refreshed (${this.mode})`, { userId });
    return tokens;
  }

  /** Always succeeds so the response says nothing about the token. */
  async logout(refreshToken: string): Promise<void> {
    const found = await this.issuer.revoke(refreshToken);
    if (found) console.info(`User logged out (${this.mode})`);
    else console.warn(`Logout (${this.mode}): token not found`);
  }

  async currentUser(accessToken: string): Promise<UserRecord> {
    const userId = await this.issuer.authenticate(accessToken);
    const user = await this.users.findById(userId);
    if (!user) throw new TokenInvalidError();
    if (!user.active) throw new UserInactiveError();
    return user;
  }

  async introspect(token: string): Promise<IntrospectionResponse> {
    const grant = await this.issuer.inspect(token);
    if (!grant) throw new TokenInvalidError();
    const user = await this.users.findById(grant.userId);
    if (!user) throw new TokenInvalidError();
    if (!user.active) throw new UserInactiveError();
    return {
      valid: true,
      user_id: user.id,
      email: user.email,
      token_type: grant.tokenType,
      expires_at: grant.expiresAt.toISOString(),
    };
  }

  async logoutAll(userId: string): Promise<number> {
    const revoked = await this.issuer.revokeAllForUser(userId);
    console.info(`Revoked all tokens (${this.mode})`, { userId, revoked });
    return revoked;
  }

  async changePassword(userId: string, currentPassword: string, newPassword: string): Promise<void> {
    const user = await this.users.findById(userId);
    if (!user) throw new UserNotFoundError(userId);
    if (!(await verifyPassword(currentPassword, user.passwordHash))) throw new InvalidCredentialsError();

    const passwordHash = await hashPassword(newPassword, this.config.password.bcryptRounds);
    await this.users.update(userId, { passwordHash });

    // JWT access tokens already handed out stay valid until they expire
    for (const issuer of [this.issuer, ...this.peers]) {
      await issuer.revokeAllForUser(userId);
    }
    console.info("Password changed", { userId });
  }

  async deleteAccount(userId: string): Promise<void> {
    if (!(await this.users.delete(userId))) throw new UserNotFoundError(userId);
    console.info("User deleted", { userId });
  }

  private decoy(): Promise<string> {
    this.decoyDigest ??= hashPassword("unused-login-decoy", this.config.password.bcryptRounds);
    return this.decoyDigest;
  }
}
