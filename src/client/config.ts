import { z } from 'zod';
import { ConfigError } from '../errors.js';

export const DEFAULT_TIMEOUT_MS = 30_000;

export interface ClientConfig {
  /** Service root, without a trailing slash. */
  baseUrl: string;
  /** Bearer token presented on every request. */
  token: string;
  /** Inserted between the service root and the resource path. */
  datasetId?: string;
  timeoutMs: number;
}

export interface ClientConfigOptions {
  datasetId?: string;
  timeoutMs?: number;
}

function trimTrailingSlashes(url: string): string {
  return url.replace(/\/+$/, '');
}

export function createClientConfig(
  baseUrl: string,
  token: string,
  options: ClientConfigOptions = {},
): ClientConfig {
  const config: ClientConfig = {
    baseUrl: trimTrailingSlashes(baseUrl),
    token,
    timeoutMs: options.timeoutMs ?? DEFAULT_TIMEOUT_MS,
  };
  if (options.datasetId !== undefined) {
    config.datasetId = options.datasetId;
  }
  return config;
}

// An unparsable RESO_TIMEOUT falls back to the default instead of failing.
const timeoutSeconds = z
  .string()
  .regex(/^\d+$/)
  .transform(Number)
  .catch(DEFAULT_TIMEOUT_MS / 1000);

const EnvSchema = z.object({
  RESO_BASE_URL: z.string({ required_error: 'RESO_BASE_URL not set' }),
  RESO_TOKEN: z.string({ required_error: 'RESO_TOKEN not set' }),
  RESO_DATASET_ID: z.string().optional(),
  RESO_TIMEOUT: timeoutSeconds.optional(),
});

/**
 * Reads the client configuration from environment variables:
 * RESO_BASE_URL and RESO_TOKEN (required), RESO_DATASET_ID and
 * RESO_TIMEOUT in seconds (optional).
 *
 * @throws ConfigError when a required variable is missing.
 */
export function configFromEnv(env: NodeJS.ProcessEnv = process.env): ClientConfig {
  const parsed = EnvSchema.safeParse(env);
  if (!parsed.success) {
    const first = parsed.error.issues[0];
    throw new ConfigError(first?.message ?? 'Invalid environment configuration', parsed.error);
  }

  const { RESO_BASE_URL, RESO_TOKEN, RESO_DATASET_ID, RESO_TIMEOUT } = parsed.data;
  const options: ClientConfigOptions = {
    timeoutMs: (RESO_TIMEOUT ?? DEFAULT_TIMEOUT_MS / 1000) * 1000,
  };
  if (RESO_DATASET_ID !== undefined) {
    options.datasetId = RESO_DATASET_ID;
  }
  return createClientConfig(RESO_BASE_URL, RESO_TOKEN, options);
}

/** A copy of the configuration that is safe to log. */
export function describeConfig(config: ClientConfig): ClientConfig {
  return { ...config, token: '<redacted>' };
}
