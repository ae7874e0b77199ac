import { describe, expect, it } from 'vitest';

import { CifClient } from './client.js';
import { ConfigurationError, EncodeError, RequestError, SubmissionError, TransportError } from './errors.js';
import type { Logger } from './logger.js';
import { err } from './result.js';
import { RecordingTransport, respond, type Responder } from './testing.js';

function recordingLogger() {
  const lines: string[] = [];
  const logger: Logger = {
    debug: (message) => lines.push(`debug ${message}`),
    info: (message) => lines.push(`info ${message}`),
    warn: (message) => lines.push(`warn ${message}`),
    error: (message) => lines.push(`error ${message}`),
    fatal: (message) => lines.push(`fatal ${message}`),
  };
  return { logger, lines };
}

function setup(responder: Responder = () => respond(200, '[]')) {
  const transport = new RecordingTransport(responder);
  const { logger, lines } = recordingLogger();
  const client = new CifClient({ token: 'test-token', remote: 'https://cif.local', transport, logger });
  return { client, transport, lines };
}

describe('CifClient construction', () => {
  it('uses documented defaults', () => {
    const client = new CifClient({ token: 'test-token' });
    expect(client.config.remote).toBe('https://localhost');
    expect(client.config.verifySsl).toBe(true);
    expect(client.config.timeout).toBe(300);
  });

  it('rejects a missing token', () => {
    expect(() => new CifClient({ remote: 'https://cif.local' })).toThrow(ConfigurationError);
  });
});

describe('CifClient.search', () => {
  it('passes every parameter through to observables', async () => {
    const { client, transport } = setup(() => respond(200, '[{"observable":"example.com"}]'));
    const result = await client.search({ query: 'example.com', confidence: 25, limit: 500 });

    expect(transport.requests).toEqual([
      {
        method: 'GET',
        url: 'https://cif.local/observables?token=test-token&query=example.com&confidence=25&limit=500',
      },
    ]);
    expect(result).toEqual({ ok: true, value: [{ observable: 'example.com' }] });
  });

  it('returns non-200 responses as request errors', async () => {
    const { client } = setup(() => respond(404, 'not found'));
    const result = await client.search({ query: 'example.com' });

    expect(result.ok).toBe(false);
    if (result.ok) return;
    expect(result.error).toBeInstanceOf(RequestError);
    expect(result.error.message).toBe('request failed(404): Not Found: not found');
  });

  it('returns transport failures instead of throwing', async () => {
    const { client, lines } = setup(() => err(new TransportError('connect ECONNREFUSED 127.0.0.1:443', 'ECONNREFUSED')));
    const result = await client.search({ query: 'example.com' });

    expect(result.ok).toBe(false);
    if (!result.ok) expect(result.error.kind).toBe('transport');
    expect(lines).toContain('error request failed: connect ECONNREFUSED 127.0.0.1:443');
  });

  it('returns unencodable parameters as an error without sending', async () => {
    const { client, transport, lines } = setup();
    const result = await client.search({ query: 'a\uD800' });

    expect(result.ok).toBe(false);
    if (result.ok) return;
    expect(result.error).toBeInstanceOf(EncodeError);
    expect(result.error.kind).toBe('encode');
    expect(result.error.message).toBe('cannot encode request: URI malformed');
    expect(transport.requests).toHaveLength(0);
    expect(lines).toContain('error cannot encode request: URI malformed');
  });

  it('accepts an ordered Map of parameters', async () => {
    const { client, transport } = setup();
    await client.search(
      new Map([
        ['query', 'example.com'],
        ['10', 'y'],
      ]),
    );

    expect(transport.requests[0].url).toBe('https://cif.local/observables?token=test-token&query=example.com&10=y');
  });

  it('logs the request URL without the token', async () => {
    const { client, lines } = setup();
    await client.search({ query: 'example.com' });

    expect(lines).toContain('debug uri created: https://cif.local/observables?token=***&query=example.com');
    expect(lines.some((line) => line.includes('test-token'))).toBe(false);
  });
});

describe('CifClient.searchById', () => {
  it('sends only id and token', async () => {
    const { client, transport } = setup();
    await client.searchById({ id: 'X', token: 'T', extra: 'Y' });

    expect(transport.requests[0].url).toBe('https://cif.local/observables?token=T&id=X');
  });

  it('falls back to the client token', async () => {
    const { client, transport } = setup();
    await client.searchById({ id: 'X' });

    expect(transport.requests[0].url).toBe('https://cif.local/observables?token=test-token&id=X');
  });
});

describe('CifClient.searchFeed', () => {
  it('reads from feeds', async () => {
    const { client, transport } = setup(() => respond(200, '{"feed":[]}'));
    const result = await client.searchFeed({ tags: 'botnet', limit: 0 });

    expect(transport.requests[0].url).toBe('https://cif.local/feeds?token=test-token&tags=botnet');
    expect(result).toEqual({ ok: true, value: { feed: [] } });
  });
});

describe('CifClient.submit', () => {
  const record = { observable: 'example.com', tags: ['botnet'], tlp: 'green' };

  it('PUTs a single record wrapped in an array', async () => {
    const { client, transport } = setup(() => respond(201, '{"inserted":1}'));
    await client.submit(record);
    await client.submit([record]);

    const [single, batch] = transport.requests;
    expect(single.method).toBe('PUT');
    expect(single.url).toBe('https://cif.local/observables/?token=test-token');
    expect(single.body).toBe('[{"observable":"example.com","tags":["botnet"],"tlp":"green"}]');
    expect(batch.body).toBe(single.body);
  });

  it('returns the decoded body with response metadata', async () => {
    const { client } = setup(() => respond(201, '{"inserted":1}', { location: '/observables/1' }));
    const result = await client.submit(record);

    expect(result).toEqual({
      ok: true,
      value: {
        data: { inserted: 1 },
        response: { status: 201, reason: 'Created', headers: { location: '/observables/1' } },
      },
    });
  });

  it('escalates rejected submissions', async () => {
    const { client, lines } = setup(() => respond(500, 'boom'));

    await expect(client.submit(record)).rejects.toBeInstanceOf(SubmissionError);
    expect(lines).toContain('fatal status: 500 -- Internal Server Error');
  });

  it('returns transport failures on the write path', async () => {
    const { client } = setup(() => err(new TransportError('socket hang up')));
    const result = await client.submit(record);

    expect(result.ok).toBe(false);
    if (!result.ok) expect(result.error.kind).toBe('transport');
  });

  it('returns an unencodable token as an error on the write path', async () => {
    const transport = new RecordingTransport(() => respond(201, '{}'));
    const client = new CifClient({ token: 'bad\uDC00', remote: 'https://cif.local', transport });

    const submitted = await client.submit(record);
    const pinged = await client.ping();

    expect(submitted.ok).toBe(false);
    if (!submitted.ok) expect(submitted.error.kind).toBe('encode');
    expect(pinged.ok).toBe(false);
    if (!pinged.ok) expect(pinged.error.kind).toBe('encode');
    expect(transport.requests).toHaveLength(0);
  });

  it('submits feeds to the feeds resource', async () => {
    const { client, transport } = setup(() => respond(200, '[]'));
    await client.submitFeed({ name: 'botnets', entries: [] });

    expect(transport.requests[0].url).toBe('https://cif.local/feeds/?token=test-token');
    expect(transport.requests[0].body).toBe('[{"name":"botnets","entries":[]}]');
  });
});

describe('CifClient.ping', () => {
  it('measures the round trip around the transport call', async () => {
    const ticks = [1000, 1012.5];
    const transport = new RecordingTransport(() => respond(200, '"pong"'));
    const client = new CifClient({
      token: 'test-token',
      remote: 'https://cif.local',
      transport,
      clock: () => ticks.shift() ?? 0,
    });

    const result = await client.ping();

    expect(transport.requests).toEqual([{ method: 'GET', url: 'https://cif.local/ping?token=test-token' }]);
    expect(result.ok).toBe(true);
    if (result.ok) expect(result.value).toBeCloseTo(0.0125, 10);
  });

  it('returns a positive duration below the timeout', async () => {
    const { client } = setup(async () => {
      await new Promise((resolve) => setTimeout(resolve, 20));
      return respond(200, '{}');
    });

    const result = await client.ping();

    expect(result.ok).toBe(true);
    if (!result.ok) return;
    expect(result.value).toBeGreaterThan(0);
    expect(result.value).toBeLessThan(client.config.timeout);
  });

  it('propagates a failed ping', async () => {
    const { client } = setup(() => respond(503, 'down'));
    const result = await client.ping();

    expect(result.ok).toBe(false);
    if (result.ok) return;
    expect(result.error.kind).toBe('request');
  });
});
