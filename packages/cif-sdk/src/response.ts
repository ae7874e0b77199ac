import { DecodeError, RequestError, SubmissionError } from './errors.js';
import { err, ok, type Result } from './result.js';
import type { TransportResponse } from './transport.js';
import type { JsonValue } from './types.js';

export interface ResponseMetadata {
  status: number;
  reason: string;
  headers: Record<string, string>;
}

export interface SubmitResult {
  data: JsonValue;
  response: ResponseMetadata;
}

export function isReadSuccess(status: number): boolean {
  return status === 200;
}

export function isWriteFailure(status: number): boolean {
  return status >= 399;
}

export function decodeBody(body: string): Result<JsonValue, DecodeError> {
  try {
    const data: JsonValue = JSON.parse(body);
    return ok(data);
  } catch (error) {
    return err(new DecodeError(body, { cause: error }));
  }
}

/** Only a 200 is a successful read; error bodies are kept as raw text. */
export function interpretRead(response: TransportResponse): Result<JsonValue, RequestError | DecodeError> {
  if (!isReadSuccess(response.status)) {
    return err(new RequestError(response.status, response.reason, response.body));
  }
  return decodeBody(response.body);
}

/**
 * Any status below 399 is an accepted submission. Anything else throws a
 * SubmissionError instead of returning.
 */
export function interpretWrite(response: TransportResponse): Result<SubmitResult, DecodeError> {
  if (isWriteFailure(response.status)) {
    throw new SubmissionError(response.status, response.reason, response.body);
  }

  const decoded = decodeBody(response.body);
  if (!decoded.ok) {
    return decoded;
  }

  return ok({
    data: decoded.value,
    response: {
      status: response.status,
      reason: response.reason,
      headers: response.headers,
    },
  });
}
