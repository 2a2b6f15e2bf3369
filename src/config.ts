// ---------------------------------------------------------------------------
// Barte SDK – Client Configuration
// ---------------------------------------------------------------------------
// Resolves user-facing options into an immutable ClientConfig: validated
// API key, recognised environment, derived base URL and auth header.
// ---------------------------------------------------------------------------

import { z } from "zod";
import { ConfigurationError } from "./errors";

/** Environments exposed by the Barte API. */
export const ENVIRONMENTS = ["production", "sandbox"] as const;

export type Environment = (typeof ENVIRONMENTS)[number];

/** Fixed API hosts, one per environment. */
export const BASE_URLS: Readonly<Record<Environment, string>> = {
  production: "https://api.barte.com.br",
  sandbox: "https://sandbox-api.barte.com.br",
};

/** Header carrying the API key on every v2 request. */
export const AUTH_HEADER_NAME = "X-Token-Api";

/** Path prefix of the API version this SDK targets. */
export const API_VERSION_PREFIX = "/v2";

/** Resolved, validated configuration shared by the transport and resources. */
export interface ClientConfig {
  readonly apiKey: string;
  readonly environment: Environment;
  readonly baseUrl: string;
  readonly authHeader: Readonly<Record<string, string>>;
}

const configSchema = z.object({
  apiKey: z
    .string({ required_error: "An API key is required." })
    .trim()
    .min(1, "An API key is required. Pass it as `apiKey`."),
  environment: z
    .enum(ENVIRONMENTS, {
      errorMap: () => ({
        message: `Invalid environment. Must be one of: ${ENVIRONMENTS.join(", ")}`,
      }),
    })
    .default("production"),
});

/**
 * Validate raw options and derive the base URL and auth header.
 *
 * @throws {ConfigurationError} for an empty key or an unknown environment.
 */
export function resolveConfig(options: {
  apiKey: string;
  environment?: string;
}): ClientConfig {
  const parsed = configSchema.safeParse(options);
  if (!parsed.success) {
    const issue = parsed.error.issues[0];
    throw new ConfigurationError(issue?.message ?? "Invalid Barte configuration");
  }

  const { apiKey, environment } = parsed.data;
  return Object.freeze({
    apiKey,
    environment,
    baseUrl: BASE_URLS[environment],
    authHeader: Object.freeze({ [AUTH_HEADER_NAME]: apiKey }),
  });
}

const envSchema = z.object({
  BARTE_API_KEY: z.string().optional(),
  BARTE_ENVIRONMENT: z.string().optional(),
});

/**
 * Build a ClientConfig from environment variables
 * (`BARTE_API_KEY`, `BARTE_ENVIRONMENT`).
 */
export function configFromEnv(
  env: Record<string, string | undefined> = process.env,
): ClientConfig {
  const { BARTE_API_KEY, BARTE_ENVIRONMENT } = envSchema.parse(env);
  if (BARTE_API_KEY === undefined) {
    throw new ConfigurationError("BARTE_API_KEY is not set");
  }
  return resolveConfig({
    apiKey: BARTE_API_KEY,
    environment: BARTE_ENVIRONMENT,
  });
}
