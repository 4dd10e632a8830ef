/**
 * Application configuration.
 *
 * Built once from process.env (falling back to the data-dir config file),
 * validated with zod and frozen. Operations receive the AppConfig value
 * explicitly; only route handlers and the startup hook call getConfig().
 */

import * as z from "zod";
import ms from "ms";
import type { SignOptions } from "jsonwebtoken";
import { swapResendPolicySchema, type SwapResendPolicy } from "@/lib/schemas";
import { getDefaultSqlitePath, readConfigFile } from "./data-dir";

const DEV_JWT_SECRET = "skillswap-dev-secret";

/** Token lifetime in the form jsonwebtoken takes: "7d", "12h", "2 days". */
export type TokenLifetime = NonNullable<SignOptions["expiresIn"]>;

/** A timespan `ms` understands and that is longer than zero. */
const tokenLifetimeSchema = z
  .string()
  .min(1)
  .pipe(
    z.custom<TokenLifetime>((value: ms.StringValue) => ms(value) > 0, {
      message: 'JWT_EXPIRES_IN must be a timespan such as "7d", "12h" or "2 days"',
    })
  );

export interface DatabaseConfig {
  readonly driver: "sqlite";
  /** Filesystem path, or ":memory:" */
  readonly path: string;
}

export interface AppConfig {
  readonly database: DatabaseConfig;
  readonly auth: {
    readonly secret: string;
    readonly expiresIn: TokenLifetime;
    /** scrypt N */
    readonly passwordHashCost: number;
  };
  readonly cors: {
    readonly allowedOrigin: string;
  };
  readonly swaps: {
    readonly resendPolicy: SwapResendPolicy;
  };
}

const envSchema = z.object({
  NODE_ENV: z.string().optional(),
  DATABASE_URL: z.string().min(1).optional(),
  JWT_SECRET_KEY: z.string().min(8, "JWT_SECRET_KEY must be at least 8 characters").optional(),
  JWT_EXPIRES_IN: tokenLifetimeSchema.default("7d"),
  FRONTEND_URL: z.string().url().default("http://localhost:3000"),
  SWAP_RESEND_POLICY: swapResendPolicySchema.default("block_pending"),
  PASSWORD_HASH_COST: z.coerce
    .number()
    .int()
    .min(1024)
    .refine((n) => (n & (n - 1)) === 0, { message: "PASSWORD_HASH_COST must be a power of two" })
    .default(16384),
});

/**
 * Resolve DATABASE_URL into a SQLite file path.
 * Accepts sqlite:///relative.db, sqlite:////absolute.db, file:path, :memory: or a bare path.
 */
export function parseDatabaseUrl(url: string): DatabaseConfig {
  if (url === ":memory:") return { driver: "sqlite", path: ":memory:" };
  if (/^postgres(ql)?:\/\//.test(url)) {
    throw new Error(
      "Postgres is not supported. Use a SQLite DATABASE_URL (sqlite:///path/to/file.db)."
    );
  }
  if (url.startsWith("sqlite:///")) return { driver: "sqlite", path: url.slice("sqlite:///".length) };
  if (url.startsWith("file:")) return { driver: "sqlite", path: url.slice("file:".length) };
  if (/^[a-z][a-z0-9+.-]*:\/\//i.test(url)) {
    throw new Error(`Unsupported DATABASE_URL scheme: ${url.split(":")[0]}`);
  }
  return { driver: "sqlite", path: url };
}

function nonEmpty(values: Record<string, string | undefined>): Record<string, string> {
  const out: Record<string, string> = {};
  for (const [key, value] of Object.entries(values)) {
    if (value !== undefined && value.trim() !== "") out[key] = value.trim();
  }
  return out;
}

/**
 * Build a frozen AppConfig. Environment variables win over the config file.
 * Throws with every invalid key listed when validation fails.
 */
export function loadConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
  const merged = { ...nonEmpty(readConfigFile(env)), ...nonEmpty(env) };
  const parsed = envSchema.safeParse(merged);
  if (!parsed.success) {
    const problems = parsed.error.issues.map((i) => `${i.path.join(".")}: ${i.message}`);
    throw new Error(`Invalid configuration: ${problems.join("; ")}`);
  }
  const values = parsed.data;

  if (!values.JWT_SECRET_KEY && values.NODE_ENV === "production") {
    throw new Error("JWT_SECRET_KEY must be set in production");
  }

  const config: AppConfig = {
    database: Object.freeze(
      values.DATABASE_URL
        ? parseDatabaseUrl(values.DATABASE_URL)
        : { driver: "sqlite" as const, path: getDefaultSqlitePath(env) }
    ),
    auth: Object.freeze({
      secret: values.JWT_SECRET_KEY ?? DEV_JWT_SECRET,
      expiresIn: values.JWT_EXPIRES_IN,
      passwordHashCost: values.PASSWORD_HASH_COST,
    }),
    cors: Object.freeze({ allowedOrigin: new URL(values.FRONTEND_URL).origin }),
    swaps: Object.freeze({ resendPolicy: values.SWAP_RESEND_POLICY }),
  };
  return Object.freeze(config);
}

let _config: AppConfig | null = null;

/** Process-wide config, loaded on first use and immutable thereafter. */
export function getConfig(): AppConfig {
  if (!_config) _config = loadConfig();
  return _config;
}

/** For tests: replace the process-wide config */
export function resetConfigForTesting(env: NodeJS.ProcessEnv): AppConfig {
  _config = loadConfig(env);
  return _config;
}
