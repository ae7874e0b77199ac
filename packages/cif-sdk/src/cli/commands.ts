import { readFileSync } from 'node:fs';

import type { CifClient, ReadResult, SubmitOutcome } from '../client.js';
import { SubmissionError } from '../errors.js';
import type { Formatter } from '../format/formatter.js';
import { isJsonObject, type SearchParams, type Submission } from '../types.js';

export type SearchOptions = {
  confidence?: string;
  limit?: string;
  tags?: string;
  otype?: string;
};

export interface CommandContext {
  client: CifClient;
  formatter: Formatter;
}

export const cifCommands = {
  async ping({ client }: CommandContext): Promise<void> {
    const result = await client.ping();
    if (!result.ok) {
      fail(result.error.message);
      return;
    }
    console.log(`roundtrip: ${result.value}s`);
  },

  async search(context: CommandContext, query: string | undefined, options: SearchOptions = {}): Promise<void> {
    print(context, await context.client.search(searchParams(query, options)));
  },

  async get(context: CommandContext, id: string): Promise<void> {
    print(context, await context.client.searchById({ id }));
  },

  async feed(context: CommandContext, options: SearchOptions = {}): Promise<void> {
    print(context, await context.client.searchFeed(searchParams(undefined, options)));
  },

  async submit(context: CommandContext, file: string): Promise<void> {
    await submitFrom(file, (submission) => context.client.submit(submission));
  },

  async submitFeed(context: CommandContext, file: string): Promise<void> {
    await submitFrom(file, (submission) => context.client.submitFeed(submission));
  },
};

/** Reads a submission from a JSON file, or from stdin when `file` is `-`. */
export function readSubmission(file: string): Submission {
  const parsed: unknown = JSON.parse(readFileSync(file === '-' ? 0 : file, 'utf-8'));
  if (isJsonObject(parsed)) {
    return parsed;
  }
  if (Array.isArray(parsed) && parsed.every(isJsonObject)) {
    return parsed;
  }
  throw new Error(`${file}: expected a JSON object or an array of objects`);
}

function searchParams(query: string | undefined, options: SearchOptions): SearchParams {
  return {
    query,
    confidence: options.confidence,
    limit: options.limit,
    tags: options.tags,
    otype: options.otype,
  };
}

function print({ formatter }: CommandContext, result: ReadResult): void {
  if (!result.ok) {
    fail(result.error.message);
    return;
  }
  console.log(formatter.format(result.value));
}

async function submitFrom(
  file: string,
  send: (submission: Submission) => Promise<SubmitOutcome>,
): Promise<void> {
  let submission: Submission;
  try {
    submission = readSubmission(file);
  } catch (err) {
    fail(err instanceof Error ? err.message : String(err));
    return;
  }

  try {
    const result = await send(submission);
    if (!result.ok) {
      fail(result.error.message);
      return;
    }
    console.log(JSON.stringify(result.value.data, null, 2));
  } catch (err) {
    if (err instanceof SubmissionError) {
      console.error(err.message);
      process.exit(2);
      return;
    }
    throw err;
  }
}

function fail(message: string): void {
  console.error(`error: ${message}`);
  process.exit(1);
}
