import { config as loadEnv } from "dotenv";

import { DEFAULT_CLIENT_CONFIG, type ClientConfig, type RetryPolicy } from "@/application/options";
import { ConfigError } from "@/domain/error";
import { isEntityMode } from "@/domain/services/text-correction";

export type ClientConfigOverrides = Partial<Omit<ClientConfig, "retry">> & {
  readonly retry?: Partial<RetryPolicy>;
};

export type CreateClientConfigOptions = {
  /** Variables to read; defaults to `process.env`. */
  readonly env?: NodeJS.ProcessEnv;
  /** `.env` file loaded into `process.env` before reading. */
  readonly envPath?: string;
  readonly overrides?: ClientConfigOverrides;
};

const readString = (env: NodeJS.ProcessEnv, key: string): string | undefined => {
  const value = env[key]?.trim();
  return value === undefined || value === "" ? undefined : value;
};

const readNumber = (env: NodeJS.ProcessEnv, key: string): number | undefined => {
  const raw = readString(env, key);
  if (raw === undefined) return undefined;

  const value = Number(raw);
  if (!Number.isFinite(value)) {
    throw new ConfigError(`${key} must be a number, got "${raw}"`, key);
  }
  return value;
};

const requireInteger = (value: number, key: string, min: number): void => {
  if (!Number.isInteger(value) || value < min) {
    throw new ConfigError(`${key} must be an integer >= ${min}, got ${value}`, key);
  }
};

/**
 * Throws `ConfigError` for the first invalid setting and returns the config with a normalised base URL.
 */
export const validateClientConfig = (config: ClientConfig): ClientConfig => {
  let baseUrl: URL;
  try {
    baseUrl = new URL(config.baseUrl);
  } catch (error) {
    throw new ConfigError(`baseUrl is not a valid URL: "${config.baseUrl}"`, "baseUrl", error);
  }
  if (baseUrl.protocol !== "http:" && baseUrl.protocol !== "https:") {
    throw new ConfigError(`baseUrl must use http or https: "${config.baseUrl}"`, "baseUrl");
  }

  const { retry } = config;
  requireInteger(retry.maxAttempts, "maxAttempts", 1);
  requireInteger(retry.initialDelayMs, "initialDelayMs", 0);
  requireInteger(retry.maxDelayMs, "maxDelayMs", 0);
  if (!Number.isFinite(retry.backoffFactor) || retry.backoffFactor < 1) {
    throw new ConfigError(`backoffFactor must be >= 1, got ${retry.backoffFactor}`, "backoffFactor");
  }
  if (config.requestTimeoutMs !== undefined) {
    requireInteger(config.requestTimeoutMs, "requestTimeoutMs", 1);
  }
  if (!isEntityMode(config.entityMode)) {
    throw new ConfigError(`entityMode must be "repair" or "preserve", got "${config.entityMode}"`, "entityMode");
  }

  return { ...config, baseUrl: config.baseUrl.replace(/\/+$/, "") };
};

const readEntityMode = (env: NodeJS.ProcessEnv): ClientConfig["entityMode"] | undefined => {
  const raw = readString(env, "BGG_ENTITY_MODE");
  if (raw === undefined) return undefined;
  if (!isEntityMode(raw)) {
    throw new ConfigError(`BGG_ENTITY_MODE must be "repair" or "preserve", got "${raw}"`, "BGG_ENTITY_MODE");
  }
  return raw;
};

/**
 * Builds a client configuration from `BGG_*` environment variables.
 * Explicit overrides win over the environment, the environment over the defaults.
 */
export function createClientConfig(options: CreateClientConfigOptions = {}): ClientConfig {
  if (options.envPath !== undefined) {
    loadEnv({ path: options.envPath });
  }
  const env = options.env ?? process.env;
  const overrides = options.overrides ?? {};
  const defaults = DEFAULT_CLIENT_CONFIG;

  const retry: RetryPolicy = {
    maxAttempts: overrides.retry?.maxAttempts ?? readNumber(env, "BGG_MAX_ATTEMPTS") ?? defaults.retry.maxAttempts,
    initialDelayMs:
      overrides.retry?.initialDelayMs ?? readNumber(env, "BGG_RETRY_INITIAL_DELAY_MS") ?? defaults.retry.initialDelayMs,
    backoffFactor:
      overrides.retry?.backoffFactor ?? readNumber(env, "BGG_RETRY_BACKOFF_FACTOR") ?? defaults.retry.backoffFactor,
    maxDelayMs: overrides.retry?.maxDelayMs ?? readNumber(env, "BGG_RETRY_MAX_DELAY_MS") ?? defaults.retry.maxDelayMs
  };

  return validateClientConfig({
    baseUrl: overrides.baseUrl ?? readString(env, "BGG_BASE_URL") ?? defaults.baseUrl,
    retry,
    requestTimeoutMs: overrides.requestTimeoutMs ?? readNumber(env, "BGG_REQUEST_TIMEOUT_MS"),
    entityMode: overrides.entityMode ?? readEntityMode(env) ?? defaults.entityMode,
    apiToken: overrides.apiToken ?? readString(env, "BGG_API_TOKEN"),
    userAgent: overrides.userAgent
  });
}
