import { describe, expect, it } from 'vitest';

import { buildQueryUrl, buildSubmitUrl, encodeSubmission, isOmitted, normalizeSubmission } from './request.js';

const REMOTE = 'https://cif.local';

describe('buildQueryUrl', () => {
  it('starts with the resource and the fallback token', () => {
    expect(buildQueryUrl(REMOTE, 'ping', 'test-token')).toBe('https://cif.local/ping?token=test-token');
  });

  it('appends parameters in mapping order', () => {
    const url = buildQueryUrl(REMOTE, 'observables', 'test-token', { limit: 500, query: 'example.com' });
    expect(url).toBe('https://cif.local/observables?token=test-token&limit=500&query=example.com');
  });

  it('skips empty, zero and unset values', () => {
    const url = buildQueryUrl(REMOTE, 'observables', 'test-token', {
      query: 'example.com',
      confidence: 0,
      limit: '',
      tags: undefined,
      provider: null,
      otype: 'fqdn',
    });
    expect(url).toBe('https://cif.local/observables?token=test-token&query=example.com&otype=fqdn');
  });

  it('treats "0", false and NaN as omitted', () => {
    const url = buildQueryUrl(REMOTE, 'feeds', 'test-token', { a: '0', b: false, c: Number.NaN, d: true });
    expect(url).toBe('https://cif.local/feeds?token=test-token&d=true');
  });

  it('uses an explicit token once, in place of the fallback', () => {
    const url = buildQueryUrl(REMOTE, 'observables', 'test-token', { query: 'x', token: 'other-token' });
    expect(url).toBe('https://cif.local/observables?token=other-token&query=x');
  });

  it('falls back when the explicit token is empty', () => {
    const url = buildQueryUrl(REMOTE, 'observables', 'test-token', { token: '', id: '42' });
    expect(url).toBe('https://cif.local/observables?token=test-token&id=42');
  });

  it('follows Map insertion order exactly', () => {
    const params = new Map<string, string>([
      ['query', 'x'],
      ['10', 'y'],
      ['token', 'other-token'],
    ]);
    expect(buildQueryUrl(REMOTE, 'observables', 'test-token', params)).toBe(
      'https://cif.local/observables?token=other-token&query=x&10=y',
    );
  });

  it('lists integer-like keys of plain objects first', () => {
    expect(buildQueryUrl(REMOTE, 'observables', 'test-token', { query: 'x', '10': 'y' })).toBe(
      'https://cif.local/observables?token=test-token&10=y&query=x',
    );
  });

  it('percent-encodes keys and values', () => {
    const url = buildQueryUrl(REMOTE, 'observables', 'a/b', { query: 'a b&c', 'x y': '1' });
    expect(url).toBe('https://cif.local/observables?token=a%2Fb&query=a%20b%26c&x%20y=1');
  });
});

describe('isOmitted', () => {
  it('keeps non-zero numbers and non-empty strings', () => {
    expect(isOmitted(1)).toBe(false);
    expect(isOmitted(-1)).toBe(false);
    expect(isOmitted('00')).toBe(false);
    expect(isOmitted(' ')).toBe(false);
  });
});

describe('buildSubmitUrl', () => {
  it('adds a trailing slash before the token', () => {
    expect(buildSubmitUrl(REMOTE, 'feeds', 'test-token')).toBe('https://cif.local/feeds/?token=test-token');
  });
});

describe('submission encoding', () => {
  const record = { observable: 'example.com', tags: ['botnet'] };

  it('wraps a single record', () => {
    expect(normalizeSubmission(record)).toEqual([record]);
  });

  it('encodes a single record and a one-element batch identically', () => {
    expect(encodeSubmission(record)).toBe(encodeSubmission([record]));
    expect(encodeSubmission(record)).toBe('[{"observable":"example.com","tags":["botnet"]}]');
  });

  it('leaves batches as they are', () => {
    const batch = [record, { observable: '192.0.2.1' }];
    expect(normalizeSubmission(batch)).toBe(batch);
  });
});
