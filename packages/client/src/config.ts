import type { KyInstance } from 'ky';
import { ConfigError } from './errors/index.js';
import { clientConfigSchema } from './schemas/index.js';
import type { ResolvedConfig } from './types/index.js';

/**
 * Address used when none is configured. Points at the public SaaS service.
 */
export const DEFAULT_ADDRESS = 'https://app.terraform.io';

/**
 * Timeout of the default transport in milliseconds
 */
export const DEFAULT_TIMEOUT = 30000;

/**
 * Configuration options for TfeClient
 */
export interface ClientConfig {
  /**
   * Address of the API server
   * @default DEFAULT_ADDRESS
   */
  address?: string;

  /**
   * API token, sent as `Authorization: Bearer <token>`
   */
  token: string;

  /**
   * Custom ky instance used to send requests.
   * Retries and HTTP error throwing are disabled per request regardless of
   * its own settings.
   */
  transport?: KyInstance;

  /**
   * Request timeout of the default transport in milliseconds.
   * Ignored when a custom transport is given.
   * @default 30000 (30 seconds)
   */
  timeout?: number;
}

/**
 * Defaults the caller's configuration is laid over
 */
export function defaultConfig(): Omit<ResolvedConfig, 'token'> {
  return {
    address: DEFAULT_ADDRESS,
    timeout: DEFAULT_TIMEOUT,
  };
}

/**
 * Apply defaults to a client configuration and validate the result
 *
 * @throws {ConfigError} if the configuration or its token is missing, or
 * the address is not a valid URL
 */
export function resolveConfig(config?: ClientConfig): ResolvedConfig {
  // No safe default exists for these
  if (!config) {
    throw new ConfigError('Missing client config');
  }
  if (!config.token) {
    throw new ConfigError('Missing client token');
  }

  const merged = { ...defaultConfig(), token: config.token };
  if (config.address) {
    merged.address = config.address;
  }
  if (config.timeout !== undefined) {
    merged.timeout = config.timeout;
  }

  const result = clientConfigSchema.safeParse(merged);
  if (!result.success) {
    throw new ConfigError('Invalid client config', result.error);
  }
  return result.data;
}
