import { Result } from "better-result";
import { ValidationError } from "@hcloud-ts/errors";
import { createLogger, isLogLevel } from "@hcloud-ts/logger";
import { Client, type ClientConfig } from "./client";

export type Env = Record<string, string | undefined>;

/**
 * Read client settings from the environment:
 *
 *   HCLOUD_TOKEN       API token (required)
 *   HCLOUD_ENDPOINT    API base URL
 *   HCLOUD_TIMEOUT_MS  per-request deadline, positive integer
 *   HCLOUD_LOG_LEVEL   debug | info | warn | error
 */
export function configFromEnv(env: Env): Result<ClientConfig, ValidationError> {
  const token = env.HCLOUD_TOKEN?.trim();
  if (!token) {
    return Result.err(new ValidationError({ message: "HCLOUD_TOKEN is not set" }));
  }

  const config: ClientConfig = { token };

  const endpoint = env.HCLOUD_ENDPOINT?.trim();
  if (endpoint) {
    config.endpoint = endpoint;
  }

  const timeout = env.HCLOUD_TIMEOUT_MS?.trim();
  if (timeout) {
    const timeoutMs = Number(timeout);
    if (!Number.isSafeInteger(timeoutMs) || timeoutMs <= 0) {
      return Result.err(
        new ValidationError({ message: `HCLOUD_TIMEOUT_MS must be a positive integer, got "${timeout}"` })
      );
    }
    config.timeoutMs = timeoutMs;
  }

  const level = env.HCLOUD_LOG_LEVEL?.trim().toLowerCase();
  if (level) {
    if (!isLogLevel(level)) {
      return Result.err(new ValidationError({ message: `HCLOUD_LOG_LEVEL is not a log level: "${level}"` }));
    }
    config.logger = createLogger({ component: "hcloud" }, { level });
  }

  return Result.ok(config);
}

/**
 * Build a client from the environment. Explicit overrides win over
 * environment values.
 */
export function clientFromEnv(
  env: Env = process.env,
  overrides: Partial<ClientConfig> = {}
): Result<Client, ValidationError> {
  return configFromEnv(env).map(
    (config) => new Client({ ...config, ...overrides, token: overrides.token ?? config.token })
  );
}
