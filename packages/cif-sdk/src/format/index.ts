export type { Formatter, FormatName, FormatterOptions } from './formatter.js';
export { FORMAT_NAMES, FormatError, createFormatter, isFormatName } from './formatter.js';
export { JsonFormatter } from './json.js';
export { CsvFormatter, DEFAULT_CSV_COLUMNS } from './csv.js';
export { BroFormatter } from './bro.js';
