import { Router } from "express";
import { AppConfig } from "../config/env";
import { requireCronAuth } from "../middleware/cronAuth";
import { cleanupExpiredTokens } from "../services/tokenCleanup";
import { OpaqueTokenStore } from "../services/opaqueTokenStore";
import { RefreshTokenStore } from "../services/refreshTokenStore";

export function createMaintenanceRouter(
  config: AppConfig,
  refreshTokens: RefreshTokenStore,
  opaqueTokens: OpaqueTokenStore
) {
  const r = Router();

  r.post("/cleanup-tokens", requireCronAuth(config), async (_req, res) => {
    try {
      const summary = await cleanupExpiredTokens(refreshTokens, opaqueTokens);
      res.json(summary);
    } catch (err) {
      console.error("Token cleanup job failed", err);
      res.status(500).json({ error: "Token cleanup job failed" });
    }
  });

  return r;
}
