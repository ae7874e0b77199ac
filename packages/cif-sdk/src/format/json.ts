import type { JsonValue } from '../types.js';
import type { Formatter } from './formatter.js';

export class JsonFormatter implements Formatter {
  readonly name = 'json';

  format(data: JsonValue): string {
    return JSON.stringify(data, null, 2);
  }
}
