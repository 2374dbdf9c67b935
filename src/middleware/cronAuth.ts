import crypto from "crypto";
import { Request, Response, NextFunction } from "express";
import { AppConfig } from "../config/env";
import { bearerToken } from "./auth";

const sameSecret = (a: string, b: string) => {
  const left = Buffer.from(a);
  const right = Buffer.from(b);
  return left.length === right.length && crypto.timingSafeEqual(left, right);
};

// Guards maintenance jobs triggered by an external scheduler.
export function requireCronAuth(config: AppConfig) {
  return (req: Request, res: Response, next: NextFunction): void => {
    const expected = config.maintenanceToken;
    if (!expected) {
      console.error("MAINTENANCE_TOKEN is not configured");
      res.status(500).json({ error: "Cron auth not configured" });
      return;
    }
    const token = bearerToken(req);
    if (!token || !sameSecret(token, expected)) {
      res.status(401).json({ error: "Unauthorized" });
      return;
    }
    next();
  };
}
