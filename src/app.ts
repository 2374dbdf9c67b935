import express from "express";
import cors from "cors";
import helmet from "helmet";
import cookieParser from "cookie-parser";
import morgan from "morgan";
import { ZodError } from "zod";

import { AppConfig } from "./config/env";
import { createAuthRouter, AUTH_BASE_PATH } from "./routes/auth.routes";
import { createMaintenanceRouter } from "./routes/maintenance.routes";
import { buildServices, Repositories } from "./services/container";
import { Clock } from "./services/opaqueTokenStore";
import { HttpError } from "./utils/errors";

// Build CORS allowlist from ALLOWED_ORIGINS and CLIENT_URL
function buildCors(config: AppConfig) {
  const normalize = (value: string) => {
    try {
      const url = new URL(value);
      // e.g. http://localhost:5173 (no trailing slash)
      return `${url.protocol}//${url.host}`;
    } catch {
      return value.replace(/\/$/, "");
    }
  };

  const client = config.http.clientUrl?.trim();
  const allowlist = new Set<string>([
    ...config.http.allowedOrigins.map(normalize),
    ...(client ? [normalize(client)] : []),
  ]);
  const isDev = config.nodeEnv !== "production";

  return cors({
    origin(origin: string | undefined, cb: (err: Error | null, allow?: boolean) => void) {
      if (!origin) return cb(null, true); // same-origin or tools without Origin header
      if (allowlist.has(normalize(origin))) return cb(null, true);

      // In dev, allow localhost and 127.0.0.1 on any port
      if (isDev) {
        const hostname = URL.canParse(origin) ? new URL(origin).hostname : "";
        if (hostname === "localhost" || hostname === "127.0.0.1") return cb(null, true);
      }

      console.warn("CORS: origin not allowed", { origin });
      return cb(new HttpError(403, "CORS: origin not allowed"));
    },
    credentials: true,
  });
}

// Body-parser and similar middleware attach a 4xx status to their errors
function clientErrorStatus(err: unknown): number | undefined {
  if (typeof err !== "object" || err === null || !("status" in err)) return undefined;
  const { status } = err;
  return typeof status === "number" && status >= 400 && status < 500 ? status : undefined;
}

export interface AppDeps {
  config: AppConfig;
  repos: Repositories;
  now?: Clock;
}

export function createApp({ config, repos, now }: AppDeps) {
  const app = express();
  const services = buildServices(config, repos, now);

  // Security headers
  app.use(
    helmet({
      contentSecurityPolicy: false,
      referrerPolicy: { policy: "no-referrer" },
      crossOriginOpenerPolicy: { policy: "same-origin" },
      crossOriginResourcePolicy: { policy: "cross-origin" },
      hsts: config.nodeEnv === "production" ? undefined : false,
    })
  );

  app.use(buildCors(config));
  app.use(cookieParser());
  app.use(express.json());
  if (config.nodeEnv !== "test") app.use(morgan("tiny"));

  // Health
  app.get("/health", (_req, res) => res.json({ ok: true }));

  // Routes
  app.use(AUTH_BASE_PATH, createAuthRouter({ config, jwtAuth: services.jwtAuth, opaqueAuth: services.opaqueAuth }));
  app.use("/api/v1/maintenance", createMaintenanceRouter(config, services.refreshTokens, services.opaqueTokens));

  // Error handler (last)
  // eslint-disable-next-line @typescript-eslint/no-unused-vars
  app.use((err: unknown, _req: express.Request, res: express.Response, _next: express.NextFunction) => {
    if (err instanceof ZodError) {
      res.status(422).json({
        error: "Validation failed",
        issues: err.issues.map((i) => ({ path: i.path.join("."), message: i.message })),
      });
      return;
    }
    if (err instanceof HttpError) {
      // 5xx messages are generic by construction; details were logged where they happened
      res.status(err.status).json({ error: err.message });
      return;
    }
    const status = clientErrorStatus(err);
    if (status) {
      res.status(status).json({ error: "Bad request" });
      return;
    }
    console.error("Unhandled error:", err);
    res.status(500).json({ error: "Server error" });
  });

  return app;
}
