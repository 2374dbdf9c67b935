import { z } from "zod";

const emptyToUndefined = (value: unknown) =>
  typeof value === "string" && value.trim() === "" ? undefined : value;

const EnvSchema = z.object({
  MONGO_URI: z.string().min(1),
  PORT: z.coerce.number().int().positive().default(4000),
  NODE_ENV: z.string().default("development"),

  JWT_SECRET_KEY: z.string().min(1),
  // Single shared secret, so only the HMAC family applies
  JWT_ALGORITHM: z.enum(["HS256", "HS384", "HS512"]).default("HS256"),
  JWT_ACCESS_TOKEN_EXPIRE_MINUTES: z.coerce.number().int().positive().default(30),
  JWT_REFRESH_TOKEN_EXPIRE_DAYS: z.coerce.number().int().positive().default(7),

  PASSWORD_MIN_LENGTH: z.coerce.number().int().positive().default(4),
  BCRYPT_ROUNDS: z.coerce.number().int().min(4).max(31).default(12),

  ALLOWED_ORIGINS: z.string().default(""),
  CLIENT_URL: z.preprocess(emptyToUndefined, z.string().optional()),
  COOKIE_SECURE: z.preprocess(emptyToUndefined, z.enum(["true", "false"]).optional()),
  COOKIE_SAMESITE: z.preprocess(
    (v) => (typeof v === "string" ? emptyToUndefined(v.toLowerCase()) : v),
    z.enum(["strict", "lax", "none"]).optional()
  ),
  AUTH_RATE_LIMIT_MAX: z.coerce.number().int().positive().default(20),
  MAINTENANCE_TOKEN: z.preprocess(emptyToUndefined, z.string().optional()),
});

export type JwtAlgorithm = z.infer<typeof EnvSchema>["JWT_ALGORITHM"];

export interface AppConfig {
  readonly mongoUri: string;
  readonly port: number;
  readonly nodeEnv: string;
  readonly jwt: {
    readonly secret: string;
    readonly algorithm: JwtAlgorithm;
    readonly accessTtlMinutes: number;
    readonly refreshTtlDays: number;
  };
  readonly password: {
    readonly minLength: number;
    readonly bcryptRounds: number;
  };
  readonly http: {
    readonly allowedOrigins: readonly string[];
    readonly clientUrl?: string;
    readonly cookieSecure?: boolean;
    readonly cookieSameSite?: "strict" | "lax" | "none";
    readonly authRateLimitMax: number;
  };
  readonly maintenanceToken?: string;
}

/**
 * Reads the process environment once into an immutable config object.
 * Throws a ZodError listing every missing or malformed variable.
 */
export function loadConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
  const e = EnvSchema.parse(env);

  const config: AppConfig = {
    mongoUri: e.MONGO_URI,
    port: e.PORT,
    nodeEnv: e.NODE_ENV,
    jwt: Object.freeze({
      secret: e.JWT_SECRET_KEY,
      algorithm: e.JWT_ALGORITHM,
      accessTtlMinutes: e.JWT_ACCESS_TOKEN_EXPIRE_MINUTES,
      refreshTtlDays: e.JWT_REFRESH_TOKEN_EXPIRE_DAYS,
    }),
    password: Object.freeze({
      minLength: e.PASSWORD_MIN_LENGTH,
      bcryptRounds: e.BCRYPT_ROUNDS,
    }),
    http: Object.freeze({
      allowedOrigins: Object.freeze(
        e.ALLOWED_ORIGINS.split(",")
          .map((s) => s.trim())
          .filter(Boolean)
      ),
      clientUrl: e.CLIENT_URL,
      cookieSecure: e.COOKIE_SECURE === undefined ? undefined : e.COOKIE_SECURE === "true",
      cookieSameSite: e.COOKIE_SAMESITE,
      authRateLimitMax: e.AUTH_RATE_LIMIT_MAX,
    }),
    maintenanceToken: e.MAINTENANCE_TOKEN,
  };
  return Object.freeze(config);
}

export const accessTtlSeconds = (config: AppConfig) => config.jwt.accessTtlMinutes * 60;
export const refreshTtlSeconds = (config: AppConfig) => config.jwt.refreshTtlDays * 24 * 60 * 60;
