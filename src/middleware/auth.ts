import { Request, Response, NextFunction } from "express";
import "../types/express";
import { AuthService } from "../services/authService";
import { TokenInvalidError } from "../utils/errors";
import { UserRecord } from "../types/auth";

export function bearerToken(req: Request): string {
  const hdr = req.headers.authorization || "";
  return hdr.startsWith("Bearer ") ? hdr.slice(7).trim() : "";
}

/** Resolves the bearer access token through the given mode and sets req.user. */
export function requireAuth(auth: AuthService) {
  return async (req: Request, res: Response, next: NextFunction): Promise<void> => {
    const token = bearerToken(req);
    if (!token) {
      res.status(401).json({ error: "No access token" });
      return;
    }

    try {
      req.user = await auth.currentUser(token);
      next();
    } catch (err) {
      next(err);
    }
  };
}

export function authedUser(req: Request): UserRecord {
  if (!req.user) throw new TokenInvalidError();
  return req.user;
}
