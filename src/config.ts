import { config } from "dotenv";
import { z } from "zod";
import { StreamError } from "./websocket/error";
import {
  DEFAULT_WS_URL,
  AUTH_TIMEOUT_MS,
  SUBSCRIPTION_TIMEOUT_MS,
  ASSUMED_AUTH_GRACE_MS,
} from "./websocket/constants";
import type { StreamSessionConfig } from "./websocket/session";

config();

const booleanFlag = z
  .string()
  .transform((v) => v.toLowerCase() !== "false" && v !== "0");

const envSchema = z.object({
  OPENALGO_API_KEY: z.string().min(1).optional(),
  OPENALGO_WS_URL: z.string().url().default(DEFAULT_WS_URL),
  OPENALGO_CONFIRMATION_MODE: z.enum(["confirmed", "assumed"]).default("confirmed"),
  OPENALGO_AUTH_TIMEOUT_MS: z.coerce.number().int().positive().default(AUTH_TIMEOUT_MS),
  OPENALGO_SUBSCRIPTION_TIMEOUT_MS: z.coerce
    .number()
    .int()
    .positive()
    .default(SUBSCRIPTION_TIMEOUT_MS),
  OPENALGO_AUTH_GRACE_MS: z.coerce.number().int().nonnegative().default(ASSUMED_AUTH_GRACE_MS),
  OPENALGO_AUTO_RESUBSCRIBE: booleanFlag.default("true"),
  NODE_ENV: z.enum(["development", "production", "test"]).default("production"),
  LOG_LEVEL: z
    .enum(["trace", "debug", "info", "warn", "error", "fatal", "silent"])
    .default("info"),
});

export type Env = z.infer<typeof envSchema>;

/**
 * Validate environment variables.
 * @throws {StreamError} InvalidConfig listing every offending variable
 */
export function loadEnv(source: NodeJS.ProcessEnv = process.env): Env {
  const result = envSchema.safeParse(source);
  if (!result.success) {
    const problems = result.error.issues
      .map((issue) => `${issue.path.join(".")}: ${issue.message}`)
      .join("; ");
    throw StreamError.invalidConfig(problems);
  }
  return result.data;
}

let cached: Env | undefined;

/**
 * The process environment, validated on first use.
 */
export function getEnv(): Env {
  if (!cached) {
    cached = loadEnv();
  }
  return cached;
}

const logEnvSchema = envSchema.pick({ NODE_ENV: true, LOG_LEVEL: true });

export type LogEnv = z.infer<typeof logEnvSchema>;

/**
 * Only the logger's variables. Session variables are not validated here, so
 * loading the package never fails on them.
 */
export function loadLogEnv(source: NodeJS.ProcessEnv = process.env): LogEnv {
  const result = logEnvSchema.safeParse(source);
  if (!result.success) {
    const problems = result.error.issues
      .map((issue) => `${issue.path.join(".")}: ${issue.message}`)
      .join("; ");
    throw StreamError.invalidConfig(problems);
  }
  return result.data;
}

/**
 * Session settings taken from the environment. Explicit constructor options
 * are spread over this.
 */
export function sessionConfigFromEnv(source: Env = getEnv()): StreamSessionConfig {
  return {
    url: source.OPENALGO_WS_URL,
    apiKey: source.OPENALGO_API_KEY,
    confirmation: source.OPENALGO_CONFIRMATION_MODE,
    authTimeoutMs: source.OPENALGO_AUTH_TIMEOUT_MS,
    assumedAuthGraceMs: source.OPENALGO_AUTH_GRACE_MS,
    subscriptionTimeoutMs: source.OPENALGO_SUBSCRIPTION_TIMEOUT_MS,
    autoResubscribe: source.OPENALGO_AUTO_RESUBSCRIBE,
  };
}
