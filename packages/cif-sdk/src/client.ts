/**
 * CIF client: the public operations over the request builder, the transport
 * and the response interpreter.
 *
 * @example
 * ```ts
 * const client = new CifClient({ token: 'test-token', remote: 'https://cif.example.org' });
 *
 * const roundtrip = await client.ping();
 * if (roundtrip.ok) console.log(`roundtrip: ${roundtrip.value}s`);
 *
 * const found = await client.search({ query: 'example.com', confidence: 25, limit: 500 });
 * ```
 */

import { resolveConfig, type ClientConfig, type ClientOptions } from './config.js';
import { EncodeError, type ReadError, type WriteError } from './errors.js';
import { noopLogger, redactToken, type Logger } from './logger.js';
import { buildQueryUrl, buildSubmitUrl, encodeSubmission } from './request.js';
import { interpretRead, interpretWrite, isWriteFailure, type SubmitResult } from './response.js';
import { err, ok, type Result } from './result.js';
import { monotonicClock, Stopwatch, type Clock } from './timing.js';
import { HttpTransport, type Transport, type TransportResult } from './transport.js';
import type {
  JsonValue,
  ParamValue,
  RequestParameters,
  Resource,
  SearchByIdParams,
  SearchParams,
  Submission,
} from './types.js';

export interface CifClientOptions extends ClientOptions {
  logger?: Logger;
  /** Defaults to an HttpTransport built from the resolved config. */
  transport?: Transport;
  clock?: Clock;
}

export type ReadResult<T = JsonValue> = Result<T, ReadError>;
export type SubmitOutcome = Result<SubmitResult, WriteError>;

export class CifClient {
  readonly config: ClientConfig;
  private readonly transport: Transport;
  private readonly logger: Logger;
  private readonly clock: Clock;

  constructor(options: CifClientOptions) {
    this.config = resolveConfig(options);
    this.logger = options.logger ?? noopLogger;
    this.clock = options.clock ?? monotonicClock;
    this.transport =
      options.transport ??
      new HttpTransport({
        timeout: this.config.timeout,
        headers: this.config.headers,
        userAgent: this.config.userAgent,
        proxy: this.config.proxy,
        verifySsl: this.config.verifySsl,
      });
  }

  /** Round trip to the `ping` resource, in fractional seconds. */
  async ping(): Promise<ReadResult<number>> {
    this.logger.debug('generating ping...');
    const url = this.queryUrl('ping');
    if (!url.ok) {
      return url;
    }

    const stopwatch = Stopwatch.start(this.clock);
    const response = await this.transport.get(url.value);
    const elapsed = stopwatch.elapsedSeconds();

    const result = this.readResponse(response);
    if (!result.ok) {
      return result;
    }
    this.logger.debug(`roundtrip: ${elapsed}s`);
    return ok(elapsed);
  }

  async search(params: SearchParams | ReadonlyMap<string, ParamValue> = {}): Promise<ReadResult> {
    return this.query('observables', params);
  }

  /** Only `id` and `token` are sent; other keys are dropped. */
  async searchById(params: SearchByIdParams): Promise<ReadResult> {
    return this.query('observables', { id: params.id, token: params.token });
  }

  async searchFeed(params: SearchParams | ReadonlyMap<string, ParamValue> = {}): Promise<ReadResult> {
    return this.query('feeds', params);
  }

  /** @throws SubmissionError when the service answers with status >= 399. */
  async submit(submission: Submission): Promise<SubmitOutcome> {
    return this.send('observables', submission);
  }

  /** @throws SubmissionError when the service answers with status >= 399. */
  async submitFeed(submission: Submission): Promise<SubmitOutcome> {
    return this.send('feeds', submission);
  }

  private queryUrl(resource: Resource, params?: RequestParameters): Result<string, EncodeError> {
    const url = this.encode(() => buildQueryUrl(this.config.remote, resource, this.config.token, params));
    if (url.ok) {
      this.logger.debug(`uri created: ${redactToken(url.value)}`);
    }
    return url;
  }

  private async query(resource: Resource, params: RequestParameters): Promise<ReadResult> {
    const url = this.queryUrl(resource, params);
    if (!url.ok) {
      return url;
    }
    this.logger.debug('making request...');
    return this.readResponse(await this.transport.get(url.value));
  }

  /** URL and body encoding throw URIError on lone surrogates. */
  private encode<T>(build: () => T): Result<T, EncodeError> {
    try {
      return ok(build());
    } catch (error) {
      if (!(error instanceof URIError)) {
        throw error;
      }
      const failure = new EncodeError(`cannot encode request: ${error.message}`, { cause: error });
      this.logger.error(failure.message);
      return err(failure);
    }
  }

  private readResponse(response: TransportResult): ReadResult {
    if (!response.ok) {
      this.logger.error(`request failed: ${response.error.message}`);
      return response;
    }

    const result = interpretRead(response.value);
    if (!result.ok) {
      this.logger.error(result.error.message);
      return result;
    }

    this.logger.debug('success, decoded response');
    return result;
  }

  private async send(resource: Resource, submission: Submission): Promise<SubmitOutcome> {
    this.logger.debug('encoding submission...');
    const body = encodeSubmission(submission);

    const url = this.encode(() => buildSubmitUrl(this.config.remote, resource, this.config.token));
    if (!url.ok) {
      return url;
    }
    this.logger.debug(`uri generated: ${redactToken(url.value)}`);
    this.logger.debug('making request...');

    const response = await this.transport.put(url.value, body);
    if (!response.ok) {
      this.logger.error(`submission request failed: ${response.error.message}`);
      return response;
    }

    const { status, reason } = response.value;
    if (isWriteFailure(status)) {
      this.logger.fatal(`status: ${status} -- ${reason}`);
    }

    this.logger.debug('decoding response...');
    const result = interpretWrite(response.value);
    if (!result.ok) {
      this.logger.error(result.error.message);
      return result;
    }

    this.logger.debug('success...');
    return result;
  }
}
