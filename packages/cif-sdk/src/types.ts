export type JsonPrimitive = string | number | boolean | null;
export type JsonValue = JsonPrimitive | JsonValue[] | { [key: string]: JsonValue };
export type JsonObject = { [key: string]: JsonValue };

/** A single observable record or a batch of them, as accepted by submit operations. */
export type Submission = JsonObject | JsonObject[];

export type ParamValue = string | number | boolean | null | undefined;
/**
 * Query parameters. Plain objects enumerate integer-like keys first, in
 * ascending order; a Map keeps exact insertion order.
 */
export type RequestParameters = Record<string, ParamValue> | ReadonlyMap<string, ParamValue>;

export type Resource = 'ping' | 'observables' | 'feeds';

export interface SearchParams {
  query?: string;
  confidence?: number | string;
  limit?: number | string;
  tags?: string;
  otype?: string;
  /** Overrides the client token for this request. */
  token?: string;
  [key: string]: ParamValue;
}

export interface SearchByIdParams {
  id: string;
  token?: string;
  [key: string]: ParamValue;
}

export function isJsonObject(value: unknown): value is JsonObject {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}
