import type { ParamValue, RequestParameters, Resource, Submission, JsonObject } from './types.js';

/**
 * True for values the query builder leaves out: unset, null, false, empty,
 * zero (including the string "0") and NaN. A caller cannot send any of these
 * through a query string.
 */
export function isOmitted(value: ParamValue): boolean {
  return (
    value === undefined ||
    value === null ||
    value === false ||
    value === '' ||
    value === '0' ||
    value === 0 ||
    Number.isNaN(value)
  );
}

/**
 * Builds `<remote>/<resource>?token=<token>&key=value...`.
 *
 * A usable `token` entry in `params` replaces the fallback token and is not
 * repeated. Every other non-omitted entry is appended once, in the mapping's
 * iteration order: a Map's insertion order, or for a plain object the usual
 * property order, where integer-like keys come first. Keys and values are
 * percent-encoded.
 */
export function buildQueryUrl(
  remote: string,
  resource: Resource,
  fallbackToken: string,
  params: RequestParameters = {},
): string {
  const entries: Array<[string, ParamValue]> = isParamMap(params) ? [...params] : Object.entries(params);
  const explicit = entries.find(([key]) => key === 'token')?.[1];
  const token = isOmitted(explicit) ? fallbackToken : String(explicit);
  let url = `${remote}/${resource}?token=${encodeURIComponent(token)}`;

  for (const [key, value] of entries) {
    if (key === 'token' || isOmitted(value)) continue;
    url += `&${encodeURIComponent(key)}=${encodeURIComponent(String(value))}`;
  }

  return url;
}

function isParamMap(params: RequestParameters): params is ReadonlyMap<string, ParamValue> {
  return params instanceof Map;
}

/** Submissions always use the client's own token. */
export function buildSubmitUrl(remote: string, resource: Resource, token: string): string {
  return `${remote}/${resource}/?token=${encodeURIComponent(token)}`;
}

export function normalizeSubmission(submission: Submission): JsonObject[] {
  return Array.isArray(submission) ? submission : [submission];
}

export function encodeSubmission(submission: Submission): string {
  return JSON.stringify(normalizeSubmission(submission));
}
