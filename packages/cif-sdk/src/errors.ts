export type CifErrorKind = 'encode' | 'transport' | 'request' | 'decode';

/** Errors returned (never thrown) by client operations. */
export abstract class CifError extends Error {
  abstract readonly kind: CifErrorKind;
}

/** A request could not be built, e.g. a parameter is not well-formed UTF-16. */
export class EncodeError extends CifError {
  readonly kind = 'encode' as const;

  constructor(message: string, options?: ErrorOptions) {
    super(message, options);
    this.name = 'EncodeError';
  }
}

export class TransportError extends CifError {
  readonly kind = 'transport' as const;
  readonly code?: string;

  constructor(message: string, code?: string, options?: ErrorOptions) {
    super(message, options);
    this.name = 'TransportError';
    this.code = code;
  }
}

const MAX_BODY_IN_MESSAGE = 2048;

export class RequestError extends CifError {
  readonly kind = 'request' as const;
  readonly status: number;
  readonly reason: string;
  /** Raw response text; it is not parsed. */
  readonly body: string;

  constructor(status: number, reason: string, body: string) {
    super(`request failed(${status}): ${reason}: ${truncate(body)}`);
    this.name = 'RequestError';
    this.status = status;
    this.reason = reason;
    this.body = body;
  }
}

export class DecodeError extends CifError {
  readonly kind = 'decode' as const;
  readonly body: string;

  constructor(body: string, options?: ErrorOptions) {
    const detail = options?.cause instanceof Error ? `: ${options.cause.message}` : '';
    super(`invalid JSON in response body${detail}`, options);
    this.name = 'DecodeError';
    this.body = body;
  }
}

export type ReadError = EncodeError | TransportError | RequestError | DecodeError;
export type WriteError = EncodeError | TransportError | DecodeError;

/**
 * Thrown when the service rejects a submission (status >= 399). Write
 * failures are escalated rather than returned.
 */
export class SubmissionError extends Error {
  readonly status: number;
  readonly reason: string;
  readonly body: string;

  constructor(status: number, reason: string, body: string) {
    super(`submission failed (${status} ${reason}): contact administrator`);
    this.name = 'SubmissionError';
    this.status = status;
    this.reason = reason;
    this.body = body;
  }
}

export class ConfigurationError extends Error {
  readonly problems: string[];

  constructor(problems: string[]) {
    super(`invalid client configuration: ${problems.join('; ')}`);
    this.name = 'ConfigurationError';
    this.problems = problems;
  }
}

function truncate(text: string): string {
  return text.length > MAX_BODY_IN_MESSAGE ? `${text.slice(0, MAX_BODY_IN_MESSAGE)}…` : text;
}
