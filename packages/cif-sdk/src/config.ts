/**
 * Client configuration: defaults, validation and the frozen config record
 * every client carries for its whole lifetime.
 */

import { ConfigurationError } from './errors.js';
import { MAX_TIMER_MS, toTimeoutMs } from './transport.js';
import { ACCEPT, USER_AGENT } from './version.js';

export interface ClientOptions {
  token?: string;
  /** Base URL of the service, e.g. `https://cif.example.org/api`. */
  remote?: string;
  /** Request timeout in seconds. */
  timeout?: number;
  /** Proxy URL; absent means a direct connection. */
  proxy?: string;
  /** Set to false to skip TLS certificate verification. */
  verifySsl?: boolean;
}

export interface ClientConfig {
  readonly remote: string;
  readonly token: string;
  readonly timeout: number;
  readonly proxy?: string;
  readonly verifySsl: boolean;
  readonly headers: Readonly<Record<string, string>>;
  readonly userAgent: string;
}

export const DEFAULT_REMOTE = 'https://localhost';
export const DEFAULT_TIMEOUT = 300;

/**
 * Default configuration values
 */
export const DEFAULT_CONFIG: Omit<ClientConfig, 'token' | 'proxy'> = {
  remote: DEFAULT_REMOTE,
  timeout: DEFAULT_TIMEOUT,
  verifySsl: true,
  headers: { Accept: ACCEPT },
  userAgent: USER_AGENT,
};

/**
 * Validate configuration values
 */
export function validateConfig(options: ClientOptions): string[] {
  const problems: string[] = [];

  if (!options.token || options.token.trim() === '') {
    problems.push('token is required');
  }

  if (options.remote !== undefined && !isHttpUrl(options.remote)) {
    problems.push(`remote must be an http(s) URL: ${options.remote}`);
  }

  if (
    options.timeout !== undefined &&
    (!Number.isFinite(options.timeout) || options.timeout <= 0)
  ) {
    problems.push(`timeout must be a positive number of seconds: ${options.timeout}`);
  } else if (options.timeout !== undefined && toTimeoutMs(options.timeout) > MAX_TIMER_MS) {
    problems.push(`timeout must not exceed ${MAX_TIMER_MS / 1000} seconds: ${options.timeout}`);
  }

  if (options.proxy !== undefined && !isHttpUrl(options.proxy)) {
    problems.push(`proxy must be an http(s) URL: ${options.proxy}`);
  }

  return problems;
}

/**
 * Merge user options with defaults. Throws ConfigurationError listing every
 * problem found.
 */
export function resolveConfig(options: ClientOptions): ClientConfig {
  const problems = validateConfig(options);
  const token = options.token;
  if (problems.length > 0 || token === undefined) {
    throw new ConfigurationError(problems);
  }

  const config: ClientConfig = {
    remote: (options.remote ?? DEFAULT_CONFIG.remote).replace(/\/+$/, ''),
    token,
    timeout: options.timeout ?? DEFAULT_CONFIG.timeout,
    verifySsl: options.verifySsl ?? DEFAULT_CONFIG.verifySsl,
    headers: Object.freeze({ ...DEFAULT_CONFIG.headers }),
    userAgent: DEFAULT_CONFIG.userAgent,
  };

  return Object.freeze(options.proxy ? { ...config, proxy: options.proxy } : config);
}

function isHttpUrl(value: string): boolean {
  try {
    const url = new URL(value);
    return url.protocol === 'http:' || url.protocol === 'https:';
  } catch {
    return false;
  }
}
