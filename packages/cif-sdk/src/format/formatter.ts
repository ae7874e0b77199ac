import type { JsonValue } from '../types.js';
import { BroFormatter } from './bro.js';
import { CsvFormatter } from './csv.js';
import { JsonFormatter } from './json.js';

/** Renders decoded results as text. */
export interface Formatter {
  readonly name: string;
  format(data: JsonValue): string;
}

export const FORMAT_NAMES = ['json', 'csv', 'bro'] as const;
export type FormatName = (typeof FORMAT_NAMES)[number];

export interface FormatterOptions {
  /** CSV column list. */
  columns?: readonly string[];
}

export class FormatError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'FormatError';
  }
}

export function isFormatName(value: string): value is FormatName {
  return FORMAT_NAMES.some((name) => name === value);
}

export function createFormatter(name: string, options: FormatterOptions = {}): Formatter {
  if (!isFormatName(name)) {
    throw new FormatError(`unknown format: ${name}. Must be one of: ${FORMAT_NAMES.join(', ')}`);
  }

  switch (name) {
    case 'json':
      return new JsonFormatter();
    case 'csv':
      return new CsvFormatter(options.columns);
    case 'bro':
      return new BroFormatter();
    default: {
      const exhaustive: never = name;
      return exhaustive;
    }
  }
}
