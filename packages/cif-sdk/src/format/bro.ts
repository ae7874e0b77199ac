import type { JsonValue } from '../types.js';
import type { Formatter } from './formatter.js';
import { toRecords } from './records.js';

const INTEL_TYPES = new Map<string, string>([
  ['fqdn', 'Intel::DOMAIN'],
  ['ipv4', 'Intel::ADDR'],
  ['ipv6', 'Intel::ADDR'],
  ['url', 'Intel::URL'],
  ['email', 'Intel::EMAIL'],
  ['md5', 'Intel::FILE_HASH'],
  ['sha1', 'Intel::FILE_HASH'],
  ['sha256', 'Intel::FILE_HASH'],
  ['sha512', 'Intel::FILE_HASH'],
]);

const FIELDS = ['indicator', 'indicator_type', 'meta.source', 'meta.desc'];
const EMPTY = '-';

/**
 * Bro/Zeek intel framework input file. Observables whose otype has no intel
 * type are dropped.
 */
export class BroFormatter implements Formatter {
  readonly name = 'bro';

  format(data: JsonValue): string {
    const lines = [`#fields\t${FIELDS.join('\t')}`];

    for (const record of toRecords(data)) {
      const { observable, otype } = record;
      if (typeof observable !== 'string' || typeof otype !== 'string') continue;

      const intelType = INTEL_TYPES.get(otype);
      if (!intelType) continue;

      const source = typeof record.provider === 'string' && record.provider ? record.provider : EMPTY;
      const desc = describeTags(record.tags) || EMPTY;
      lines.push([observable, intelType, source, desc].map(field).join('\t'));
    }

    return lines.join('\n');
  }
}

function describeTags(tags: JsonValue | undefined): string {
  if (typeof tags === 'string') return tags;
  if (Array.isArray(tags)) {
    return tags.filter((tag): tag is string => typeof tag === 'string').join(',');
  }
  return '';
}

// Tabs and newlines would break the column layout.
function field(value: string): string {
  return value.replace(/[\t\r\n]+/g, ' ');
}
