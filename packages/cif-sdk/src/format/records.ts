import { isJsonObject, type JsonObject, type JsonValue } from '../types.js';

/** Rows of a result: array elements that are objects, or a lone object. */
export function toRecords(data: JsonValue): JsonObject[] {
  if (Array.isArray(data)) {
    return data.filter(isJsonObject);
  }
  return isJsonObject(data) ? [data] : [];
}
