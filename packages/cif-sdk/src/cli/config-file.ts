/**
 * Client settings for the command line: `~/.cif.yml`, then the environment,
 * then flags.
 *
 * ```yaml
 * client:
 *   remote: https://cif.example.org
 *   token: test-token
 *   verify_ssl: false
 * ```
 */

import { existsSync, readFileSync } from 'node:fs';
import { homedir } from 'node:os';
import path from 'node:path';

import { load as loadYaml } from 'js-yaml';

import type { ClientOptions } from '../config.js';
import { ConfigurationError } from '../errors.js';

export const DEFAULT_CONFIG_PATH = path.join(homedir(), '.cif.yml');

export function parseConfigFile(content: string, source: string): ClientOptions {
  const doc: unknown = loadYaml(content);
  if (doc === undefined || doc === null) {
    return {};
  }
  if (!isRecord(doc)) {
    throw new ConfigurationError([`${source}: expected a mapping at the top level`]);
  }

  const section = doc.client;
  if (section === undefined || section === null) {
    return {};
  }
  if (!isRecord(section)) {
    throw new ConfigurationError([`${source}: "client" must be a mapping`]);
  }

  const options: ClientOptions = {};
  const problems: string[] = [];

  for (const key of ['token', 'remote', 'proxy'] as const) {
    const value = section[key];
    if (value === undefined || value === null) continue;
    if (typeof value === 'string') {
      options[key] = value;
    } else {
      problems.push(`${source}: client.${key} must be a string`);
    }
  }

  const timeout = section.timeout;
  if (timeout !== undefined && timeout !== null) {
    if (typeof timeout === 'number') {
      options.timeout = timeout;
    } else {
      problems.push(`${source}: client.timeout must be a number`);
    }
  }

  const verify = section.verify_ssl;
  if (verify !== undefined && verify !== null) {
    if (typeof verify === 'boolean') {
      options.verifySsl = verify;
    } else if (verify === 0 || verify === 1) {
      options.verifySsl = verify === 1;
    } else {
      problems.push(`${source}: client.verify_ssl must be a boolean`);
    }
  }

  if (problems.length > 0) {
    throw new ConfigurationError(problems);
  }
  return options;
}

/**
 * Reads a config file. A missing file is only an error when the path was
 * asked for explicitly.
 */
export function loadConfigFile(filePath?: string): ClientOptions {
  const target = filePath ?? DEFAULT_CONFIG_PATH;
  if (!existsSync(target)) {
    if (filePath) {
      throw new ConfigurationError([`config file not found: ${filePath}`]);
    }
    return {};
  }
  return parseConfigFile(readFileSync(target, 'utf-8'), target);
}

export function optionsFromEnv(env: NodeJS.ProcessEnv): ClientOptions {
  const options: ClientOptions = {};
  if (env.CIF_TOKEN) options.token = env.CIF_TOKEN;
  if (env.CIF_REMOTE) options.remote = env.CIF_REMOTE;
  return options;
}

/** Later layers win; unset keys never clear an earlier value. */
export function mergeOptions(...layers: ClientOptions[]): ClientOptions {
  const merged: ClientOptions = {};
  for (const layer of layers) {
    if (layer.token !== undefined) merged.token = layer.token;
    if (layer.remote !== undefined) merged.remote = layer.remote;
    if (layer.timeout !== undefined) merged.timeout = layer.timeout;
    if (layer.proxy !== undefined) merged.proxy = layer.proxy;
    if (layer.verifySsl !== undefined) merged.verifySsl = layer.verifySsl;
  }
  return merged;
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}
