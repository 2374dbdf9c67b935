import { Router, Request, Response, CookieOptions } from "express";
import { z } from "zod";
import rateLimit from "express-rate-limit";
import { AppConfig, refreshTtlSeconds } from "../config/env";
import { requireAuth, authedUser } from "../middleware/auth";
import { AuthService } from "../services/authService";
import { toUserResponse } from "../types/auth";
import { InvalidRefreshTokenError } from "../utils/errors";

export const AUTH_BASE_PATH = "/api/v1/auth";
const REFRESH_COOKIE = "refreshToken";

function isSecureCookie(config: AppConfig) {
  if (config.http.cookieSecure !== undefined) return config.http.cookieSecure;
  if (config.nodeEnv === "production") return true;
  // Dev: secure only if CLIENT_URL is https
  return (config.http.clientUrl || "").startsWith("https:");
}

function cookieOptions(config: AppConfig): CookieOptions {
  return {
    httpOnly: true,
    secure: isSecureCookie(config),
    // 'none' in production for cross-site setups
    sameSite: config.http.cookieSameSite ?? (config.nodeEnv === "production" ? "none" : "strict"),
    path: AUTH_BASE_PATH,
  };
}

function readRefreshCookie(req: Request): string | undefined {
  const value: unknown = req.cookies?.[REFRESH_COOKIE];
  return typeof value === "string" && value ? value : undefined;
}

interface AuthRouterDeps {
  config: AppConfig;
  jwtAuth: AuthService;
  opaqueAuth: AuthService;
}

export function createAuthRouter({ config, jwtAuth, opaqueAuth }: AuthRouterDeps) {
  const router = Router();
  const minLength = config.password.minLength;

  const RegisterSchema = z.object({
    name: z.string().min(1).max(100),
    email: z.string().email(),
    password: z.string().min(minLength, `Password must be at least ${minLength} characters long`),
    phone: z.string().max(20).nullish(),
  });

  const LoginSchema = z.object({
    email: z.string().email(),
    password: z.string().min(1),
  });

  const RefreshSchema = z.object({
    refresh_token: z.string().min(1).optional(),
  });

  const OpaqueTokenSchema = z.object({
    token: z.string().min(1),
  });

  const ChangePwSchema = z.object({
    current_password: z.string().min(1),
    new_password: z.string().min(minLength, `Password must be at least ${minLength} characters long`),
  });

  const authLimiter = rateLimit({
    windowMs: 15 * 60 * 1000,
    limit: config.http.authRateLimitMax,
    standardHeaders: true,
    legacyHeaders: false,
  });

  const setRefreshCookie = (res: Response, token: string) =>
    res.cookie(REFRESH_COOKIE, token, { ...cookieOptions(config), maxAge: refreshTtlSeconds(config) * 1000 });

  router.post("/register", async (req, res, next) => {
    try {
      const body = RegisterSchema.parse(req.body);
      const user = await jwtAuth.register(body);
      res.status(201).json(user);
    } catch (e) {
      next(e);
    }
  });

  // --- Signed (JWT) mode ---

  router.post("/login", authLimiter, async (req, res, next) => {
    try {
      const body = LoginSchema.parse(req.body);
      const tokens = await jwtAuth.login(body);
      setRefreshCookie(res, tokens.refresh_token);
      res.json(tokens);
    } catch (e) {
      next(e);
    }
  });

  // Rotate: the presented refresh token is retired and a new pair returned
  router.post("/refresh", authLimiter, async (req, res, next) => {
    try {
      const { refresh_token } = RefreshSchema.parse(req.body ?? {});
      const token = refresh_token ?? readRefreshCookie(req);
      if (!token) throw new InvalidRefreshTokenError();
      const tokens = await jwtAuth.refresh(token);
      setRefreshCookie(res, tokens.refresh_token);
      res.json(tokens);
    } catch (e) {
      next(e);
    }
  });

  router.post("/logout", async (req, res, next) => {
    try {
      const { refresh_token } = RefreshSchema.parse(req.body ?? {});
      const token = refresh_token ?? readRefreshCookie(req);
      if (token) await jwtAuth.logout(token);
      res.clearCookie(REFRESH_COOKIE, cookieOptions(config));
      res.status(204).end();
    } catch (e) {
      next(e);
    }
  });

  router.get("/me", requireAuth(jwtAuth), (req, res) => {
    res.json(toUserResponse(authedUser(req)));
  });

  router.post("/logout-all", requireAuth(jwtAuth), async (req, res, next) => {
    try {
      const revoked = await jwtAuth.logoutAll(authedUser(req).id);
      res.clearCookie(REFRESH_COOKIE, cookieOptions(config));
      res.json({ revoked });
    } catch (e) {
      next(e);
    }
  });

  router.post("/change-password", requireAuth(jwtAuth), async (req, res, next) => {
    try {
      const { current_password, new_password } = ChangePwSchema.parse(req.body);
      await jwtAuth.changePassword(authedUser(req).id, current_password, new_password);
      res.clearCookie(REFRESH_COOKIE, cookieOptions(config));
      res.status(204).end();
    } catch (e) {
      next(e);
    }
  });

  router.delete("/me", requireAuth(jwtAuth), async (req, res, next) => {
    try {
      await jwtAuth.deleteAccount(authedUser(req).id);
      res.clearCookie(REFRESH_COOKIE, cookieOptions(config));
      res.status(204).end();
    } catch (e) {
      next(e);
    }
  });

  // --- Server-side (opaque) mode ---

  router.post("/login-opaque", authLimiter, async (req, res, next) => {
    try {
      const body = LoginSchema.parse(req.body);
      res.json(await opaqueAuth.login(body));
    } catch (e) {
      next(e);
    }
  });

  router.post("/refresh-opaque", authLimiter, async (req, res, next) => {
    try {
      const { token } = OpaqueTokenSchema.parse(req.body);
      res.json(await opaqueAuth.refresh(token));
    } catch (e) {
      next(e);
    }
  });

  router.post("/logout-opaque", async (req, res, next) => {
    try {
      const { token } = OpaqueTokenSchema.parse(req.body);
      await opaqueAuth.logout(token);
      res.status(204).end();
    } catch (e) {
      next(e);
    }
  });

  // Introspection for other services holding an opaque token
  router.post("/validate-opaque", async (req, res, next) => {
    try {
      const { token } = OpaqueTokenSchema.parse(req.body);
      res.json(await opaqueAuth.introspect(token));
    } catch (e) {
      next(e);
    }
  });

  router.get("/me-opaque", requireAuth(opaqueAuth), (req, res) => {
    res.json(toUserResponse(authedUser(req)));
  });

  return router;
}
