export type TokenType = "access" | "refresh";

export interface UserRecord {
  id: string;
  name: string;
  email: string | null;
  phone: string | null;
  passwordHash: string;
  active: boolean;
  createdAt: Date;
  updatedAt: Date;
}

export interface NewUser {
  name: string;
  email: string | null;
  phone: string | null;
  passwordHash: string;
}

export type UserPatch = Partial<Pick<UserRecord, "name" | "email" | "phone" | "passwordHash" | "active">>;

/** Ledger row for a JWT-mode refresh token. */
export interface RefreshTokenRecord {
  id: string;
  userId: string;
  token: string;
  expiresAt: Date;
  isRevoked: boolean;
  createdAt: Date;
}

export interface OpaqueTokenRecord {
  id: string;
  userId: string;
  token: string;
  tokenType: TokenType;
  expiresAt: Date;
  isRevoked: boolean;
  createdAt: Date;
  lastUsedAt: Date | null;
}

// Wire shapes

export interface UserResponse {
  id: string;
  name: string;
  email: string | null;
  phone: string | null;
}

export interface TokenResponse {
  access_token: string;
  refresh_token: string;
  token_type: "bearer";
}

export interface IntrospectionResponse {
  valid: true;
  user_id: string;
  email: string | null;
  token_type: TokenType;
  expires_at: string;
}

export function toUserResponse(user: UserRecord): UserResponse {
  return { id: user.id, name: user.name, email: user.email, phone: user.phone };
}
