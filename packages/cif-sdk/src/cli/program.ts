import { Command } from 'commander';

import { CifClient, type CifClientOptions } from '../client.js';
import type { ClientOptions } from '../config.js';
import { FORMAT_NAMES, createFormatter } from '../format/formatter.js';
import { createConsoleLogger } from '../logger.js';
import { VERSION } from '../version.js';
import { cifCommands, type CommandContext, type SearchOptions } from './commands.js';
import { loadConfigFile, mergeOptions, optionsFromEnv } from './config-file.js';

export type GlobalOptions = {
  config?: string;
  token?: string;
  remote?: string;
  timeout?: string;
  proxy?: string;
  verifySsl: boolean;
  debug?: boolean;
  format: string;
};

export interface ProgramDeps {
  env?: NodeJS.ProcessEnv;
  createClient?: (options: CifClientOptions) => CifClient;
}

export function createProgram(deps: ProgramDeps = {}): Command {
  const env = deps.env ?? process.env;
  const createClient = deps.createClient ?? ((options: CifClientOptions) => new CifClient(options));

  const program = new Command();
  program
    .name('cif')
    .description('Search and submit threat intelligence on a CIF service')
    .version(VERSION)
    .option('--config <path>', 'Config file path (default: ~/.cif.yml)')
    .option('--token <token>', 'API token')
    .option('--remote <url>', 'Service URL')
    .option('--timeout <seconds>', 'Request timeout in seconds')
    .option('--proxy <url>', 'Proxy URL')
    .option('--no-verify-ssl', 'Skip TLS certificate verification')
    .option('-d, --debug', 'Debug logging')
    .option('-f, --format <name>', `Output format (${FORMAT_NAMES.join(', ')})`, 'json');

  const context = (): CommandContext | undefined => {
    const opts = program.opts<GlobalOptions>();
    try {
      const flags: ClientOptions = { token: opts.token, remote: opts.remote, proxy: opts.proxy };
      if (opts.timeout !== undefined) {
        flags.timeout = Number(opts.timeout);
      }
      if (program.getOptionValueSource('verifySsl') === 'cli') {
        flags.verifySsl = opts.verifySsl;
      }

      const options = mergeOptions(loadConfigFile(opts.config), optionsFromEnv(env), flags);
      return {
        client: createClient({ ...options, logger: createConsoleLogger(opts.debug ? 'debug' : 'warn') }),
        formatter: createFormatter(opts.format),
      };
    } catch (err) {
      console.error(`error: ${err instanceof Error ? err.message : String(err)}`);
      process.exit(1);
      return undefined;
    }
  };

  const withFilters = (command: Command): Command =>
    command
      .option('-c, --confidence <n>', 'Minimum confidence')
      .option('-l, --limit <n>', 'Maximum number of results')
      .option('--tags <tags>', 'Comma separated tags')
      .option('--otype <type>', 'Observable type');

  program
    .command('ping')
    .description('Measure the round trip to the service')
    .action(async () => {
      const ctx = context();
      if (ctx) await cifCommands.ping(ctx);
    });

  withFilters(program.command('search [query]'))
    .description('Search observables')
    .action(async (query: string | undefined, options: SearchOptions) => {
      const ctx = context();
      if (ctx) await cifCommands.search(ctx, query, options);
    });

  program
    .command('get <id>')
    .description('Fetch an observable by id')
    .action(async (id: string) => {
      const ctx = context();
      if (ctx) await cifCommands.get(ctx, id);
    });

  withFilters(program.command('feed'))
    .description('Search feeds')
    .action(async (options: SearchOptions) => {
      const ctx = context();
      if (ctx) await cifCommands.feed(ctx, options);
    });

  program
    .command('submit <file>')
    .description('Submit observables from a JSON file (- for stdin)')
    .action(async (file: string) => {
      const ctx = context();
      if (ctx) await cifCommands.submit(ctx, file);
    });

  program
    .command('submit-feed <file>')
    .description('Submit a feed from a JSON file (- for stdin)')
    .action(async (file: string) => {
      const ctx = context();
      if (ctx) await cifCommands.submitFeed(ctx, file);
    });

  return program;
}
