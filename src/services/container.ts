import { AppConfig } from "../config/env";
import { UserRepository } from "../repositories/users.repository";
import { RefreshTokenRepository } from "../repositories/refreshTokens.repository";
import { OpaqueTokenRepository } from "../repositories/opaqueTokens.repository";
import { JwtEngine } from "../utils/jwt";
import { AuthService } from "./authService";
import { Clock, OpaqueTokenStore } from "./opaqueTokenStore";
import { RefreshTokenStore } from "./refreshTokenStore";
import { JwtTokenIssuer, OpaqueTokenIssuer } from "./tokenIssuers";

export interface Repositories {
  users: UserRepository;
  refreshTokens: RefreshTokenRepository;
  opaqueTokens: OpaqueTokenRepository;
}

export interface Services {
  jwtAuth: AuthService;
  opaqueAuth: AuthService;
  refreshTokens: RefreshTokenStore;
  opaqueTokens: OpaqueTokenStore;
}

// Wires one AuthService per token mode over the shared user store.
export function buildServices(config: AppConfig, repos: Repositories, now?: Clock): Services {
  const refreshTokens = new RefreshTokenStore(repos.refreshTokens, config, now);
  const opaqueTokens = new OpaqueTokenStore(repos.opaqueTokens, config, now);

  const jwtIssuer = new JwtTokenIssuer(new JwtEngine(config), refreshTokens);
  const opaqueIssuer = new OpaqueTokenIssuer(opaqueTokens);

  return {
    jwtAuth: new AuthService({ config, users: repos.users, issuer: jwtIssuer, peers: [opaqueIssuer] }),
    opaqueAuth: new AuthService({ config, users: repos.users, issuer: opaqueIssuer, peers: [jwtIssuer] }),
    refreshTokens,
    opaqueTokens,
  };
}
