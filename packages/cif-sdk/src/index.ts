/**
 * cif-sdk
 *
 * Client for the CIF threat-intelligence sharing API.
 */

export { CifClient } from './client.js';
export type { CifClientOptions, ReadResult, SubmitOutcome } from './client.js';

export type { ClientConfig, ClientOptions } from './config.js';
export { DEFAULT_CONFIG, DEFAULT_REMOTE, DEFAULT_TIMEOUT, resolveConfig, validateConfig } from './config.js';

export type { CifErrorKind, ReadError, WriteError } from './errors.js';
export {
  CifError,
  ConfigurationError,
  DecodeError,
  EncodeError,
  RequestError,
  SubmissionError,
  TransportError,
} from './errors.js';

export type { Err, Ok, Result } from './result.js';
export { err, ok } from './result.js';

export type { LogLevel, Logger } from './logger.js';
export { createConsoleLogger, isLogLevel, noopLogger, redactToken } from './logger.js';

export type { HttpTransportOptions, Transport, TransportResponse, TransportResult } from './transport.js';
export { HttpTransport, MAX_TIMER_MS, parseProxy, toTimeoutMs } from './transport.js';

export { buildQueryUrl, buildSubmitUrl, encodeSubmission, isOmitted, normalizeSubmission } from './request.js';

export type { ResponseMetadata, SubmitResult } from './response.js';
export { decodeBody, interpretRead, interpretWrite, isReadSuccess, isWriteFailure } from './response.js';

export type { Clock } from './timing.js';
export { Stopwatch, monotonicClock } from './timing.js';

export type { RecordedRequest, Responder } from './testing.js';
export { RecordingTransport, respond } from './testing.js';

export type {
  JsonObject,
  JsonPrimitive,
  JsonValue,
  ParamValue,
  RequestParameters,
  Resource,
  SearchByIdParams,
  SearchParams,
  Submission,
} from './types.js';
export { isJsonObject } from './types.js';

export * from './format/index.js';

export { API_VERSION, ACCEPT, USER_AGENT, VERSION } from './version.js';
