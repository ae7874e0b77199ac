/**
 * HTTP transport on axios.
 *
 * One axios instance is created per transport and shared by every call made
 * through it; axios instances hold no per-request state, so concurrent calls
 * on one client are safe.
 */

import https from 'node:https';

import axios, { type AxiosAdapter, type AxiosInstance, type AxiosProxyConfig, type AxiosResponse } from 'axios';

import { TransportError } from './errors.js';
import { err, ok, type Result } from './result.js';

export interface TransportResponse {
  status: number;
  reason: string;
  headers: Record<string, string>;
  /** Raw body text. */
  body: string;
}

export type TransportResult = Result<TransportResponse, TransportError>;

/**
 * A transport never throws for network failures: connection, timeout and TLS
 * problems come back as a failed result. Every HTTP status is a response.
 */
export interface Transport {
  get(url: string): Promise<TransportResult>;
  put(url: string, body: string): Promise<TransportResult>;
}

export interface HttpTransportOptions {
  /** Seconds. */
  timeout: number;
  headers: Readonly<Record<string, string>>;
  userAgent: string;
  proxy?: string;
  verifySsl: boolean;
  /** Replaces axios' network adapter; used to keep tests in process. */
  adapter?: AxiosAdapter;
}

export class HttpTransport implements Transport {
  private readonly http: AxiosInstance;

  constructor(options: HttpTransportOptions) {
    this.http = axios.create({
      timeout: toTimeoutMs(options.timeout),
      headers: { ...options.headers, 'User-Agent': options.userAgent },
      proxy: options.proxy ? parseProxy(options.proxy) : false,
      httpsAgent: new https.Agent({ rejectUnauthorized: options.verifySsl }),
      responseType: 'text',
      transformResponse: [(data: unknown) => data],
      validateStatus: () => true,
      adapter: options.adapter,
    });
  }

  async get(url: string): Promise<TransportResult> {
    return this.send(() => this.http.get<string>(url));
  }

  async put(url: string, body: string): Promise<TransportResult> {
    return this.send(() =>
      this.http.put<string>(url, body, { headers: { 'Content-Type': 'application/json' } }),
    );
  }

  private async send(request: () => Promise<AxiosResponse<string>>): Promise<TransportResult> {
    try {
      const response = await request();
      return ok({
        status: response.status,
        reason: response.statusText,
        headers: flattenHeaders(response.headers),
        body: typeof response.data === 'string' ? response.data : '',
      });
    } catch (error) {
      return err(toTransportError(error));
    }
  }
}

/** Largest delay a Node timer accepts; longer ones fire after 1 ms. */
export const MAX_TIMER_MS = 2_147_483_647;

/**
 * Seconds to axios milliseconds. Rounds up and never yields 0, which axios
 * reads as "no timeout".
 */
export function toTimeoutMs(seconds: number): number {
  return Math.max(1, Math.ceil(seconds * 1000));
}

/** Converts a proxy URL into axios' proxy settings. */
export function parseProxy(proxyUrl: string): AxiosProxyConfig {
  const url = new URL(proxyUrl);
  const protocol = url.protocol.replace(/:$/, '');
  const proxy: AxiosProxyConfig = {
    protocol,
    host: url.hostname,
    port: url.port ? Number(url.port) : protocol === 'https' ? 443 : 80,
  };
  if (url.username) {
    proxy.auth = {
      username: decodeURIComponent(url.username),
      password: decodeURIComponent(url.password),
    };
  }
  return proxy;
}

function flattenHeaders(headers: AxiosResponse['headers']): Record<string, string> {
  const entries: Array<[string, unknown]> = Object.entries(headers);
  const out: Record<string, string> = {};
  for (const [name, value] of entries) {
    if (value === undefined || value === null || value === false) continue;
    out[name.toLowerCase()] = Array.isArray(value) ? value.join(', ') : String(value);
  }
  return out;
}

function toTransportError(error: unknown): TransportError {
  if (axios.isAxiosError(error)) {
    return new TransportError(error.message, error.code, { cause: error });
  }
  if (error instanceof Error) {
    return new TransportError(error.message, undefined, { cause: error });
  }
  return new TransportError(String(error));
}
