/**
 * In-process transport for exercising clients without a network.
 */

import { STATUS_CODES } from 'node:http';

import { ok } from './result.js';
import type { Transport, TransportResponse, TransportResult } from './transport.js';

export interface RecordedRequest {
  method: 'GET' | 'PUT';
  url: string;
  body?: string;
}

export type Responder = (request: RecordedRequest) => TransportResult | Promise<TransportResult>;

export class RecordingTransport implements Transport {
  private readonly responder: Responder;
  private readonly sent: RecordedRequest[] = [];

  constructor(responder: Responder) {
    this.responder = responder;
  }

  async get(url: string): Promise<TransportResult> {
    return this.dispatch({ method: 'GET', url });
  }

  async put(url: string, body: string): Promise<TransportResult> {
    return this.dispatch({ method: 'PUT', url, body });
  }

  /** All requests that have been sent through this transport. */
  get requests(): RecordedRequest[] {
    return [...this.sent];
  }

  private async dispatch(request: RecordedRequest): Promise<TransportResult> {
    this.sent.push(request);
    return this.responder(request);
  }
}

/** A successful transport result with the standard reason phrase for `status`. */
export function respond(
  status: number,
  body: string,
  headers: Record<string, string> = {},
): TransportResult {
  const response: TransportResponse = {
    status,
    reason: STATUS_CODES[status] ?? '',
    headers,
    body,
  };
  return ok(response);
}
