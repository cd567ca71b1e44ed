import dotenv from "dotenv";
import { z } from "zod";
import type { AuthFormat } from "./types";

/**
 * Interprets environment variables as booleans.
 *
 * Accepts `1`, `true` and `yes` (any case); everything else is false.
 */
const envFlag = z
  .string()
  .optional()
  .transform((v) => {
    if (!v) return undefined;
    const s = v.trim().toLowerCase();
    return s === "1" || s === "true" || s === "yes";
  });

const positiveInt = (fallback: number) =>
  z.coerce.number().int().positive().default(fallback);

const required = z.string().trim().min(1, "is required");

const envSchema = z.object({
  TOKEN_URL: required.url(),
  MCID_URL: required.url(),
  MEDICAL_URL: required.url(),
  OAUTH_CLIENT_ID: required,
  OAUTH_CLIENT_SECRET: required,
  MCID_API_USER: required,
  MEDICAL_CALLER_ID: required,
  MCID_VERIFY_TLS: envFlag,
  MEDICAL_AUTH_FORMAT: z
    .enum(["bearer", "raw", "token", "basic"])
    .default("bearer"),
  MEDICAL_AUTH_DIAGNOSTIC: envFlag,
  UPSTREAM_TIMEOUT_MS: positiveInt(30_000),
  TOKEN_TIMEOUT_MS: positiveInt(10_000),
  TOKEN_CACHE_TTL_SECONDS: z.coerce.number().int().min(0).default(0),
  PORT: positiveInt(8000),
});

/**
 * Order matters: the first format answered with HTTP 200 wins.
 */
export const DIAGNOSTIC_AUTH_FORMATS: readonly AuthFormat[] = [
  "bearer",
  "raw",
  "token",
];

export type AppConfig = {
  tokenUrl: string;
  mcidUrl: string;
  medicalUrl: string;
  clientId: string;
  clientSecret: string;
  mcidApiUser: string;
  medicalCallerId: string;
  mcidVerifyTls: boolean;
  /** Never empty. */
  medicalAuthFormats: readonly AuthFormat[];
  upstreamTimeoutMs: number;
  tokenTimeoutMs: number;
  tokenCacheTtlSeconds: number;
  port: number;
};

export class ConfigError extends Error {
  constructor(readonly problems: string[]) {
    super(`Invalid configuration: ${problems.join("; ")}`);
    this.name = "ConfigError";
  }
}

/**
 * Reads configuration from an environment map.
 *
 * Endpoints and credentials have no defaults; a missing one is reported with
 * every other problem in a single `ConfigError`.
 */
export function readConfig(
  env: Record<string, string | undefined>
): AppConfig {
  const parsed = envSchema.safeParse(env);
  if (!parsed.success) {
    throw new ConfigError(
      parsed.error.issues.map((i) => `${i.path.join(".")} ${i.message}`)
    );
  }

  const e = parsed.data;
  return {
    tokenUrl: e.TOKEN_URL,
    mcidUrl: e.MCID_URL,
    medicalUrl: e.MEDICAL_URL,
    clientId: e.OAUTH_CLIENT_ID,
    clientSecret: e.OAUTH_CLIENT_SECRET,
    mcidApiUser: e.MCID_API_USER,
    medicalCallerId: e.MEDICAL_CALLER_ID,
    mcidVerifyTls: e.MCID_VERIFY_TLS ?? false,
    medicalAuthFormats: e.MEDICAL_AUTH_DIAGNOSTIC
      ? DIAGNOSTIC_AUTH_FORMATS
      : [e.MEDICAL_AUTH_FORMAT],
    upstreamTimeoutMs: e.UPSTREAM_TIMEOUT_MS,
    tokenTimeoutMs: e.TOKEN_TIMEOUT_MS,
    tokenCacheTtlSeconds: e.TOKEN_CACHE_TTL_SECONDS,
    port: e.PORT,
  };
}

/**
 * Loads `.env` (if present) into `process.env`, then reads it.
 */
export function loadConfig(): AppConfig {
  dotenv.config();
  return readConfig(process.env);
}
