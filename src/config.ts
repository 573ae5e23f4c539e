import { readFile } from 'fs/promises';
import { ConfigurationError, errorMessage } from './errors.js';
import { isRdfFormat } from './formats.js';
import { isRecord } from './xml.js';
import type { DereferenceConfig, RdfFormat } from './types.js';

export const EMPTY_DEREFERENCE_CONFIG: DereferenceConfig = new Map();

/**
 * Read the `dereference` section of a configuration document. Other keys are
 * ignored.
 *
 * ```json
 * { "dereference": { "http://id.loc.gov/ontologies/bibframe/Person": ["http://id.loc.gov/rwo/agents/"] } }
 * ```
 */
export function parseDereferenceConfig(raw: unknown): DereferenceConfig {
  if (!isRecord(raw)) {
    throw new ConfigurationError('Configuration must be a JSON object');
  }

  const section = raw.dereference;
  if (section === undefined || section === null) {
    return EMPTY_DEREFERENCE_CONFIG;
  }
  if (!isRecord(section)) {
    throw new ConfigurationError('"dereference" must map class IRIs to arrays of IRI prefixes');
  }

  const config = new Map<string, readonly string[]>();
  for (const [classIri, prefixes] of Object.entries(section)) {
    if (!Array.isArray(prefixes)) {
      throw new ConfigurationError(`"dereference" entry for <${classIri}> must be an array`);
    }
    const checked: string[] = [];
    for (const prefix of prefixes) {
      if (typeof prefix !== 'string' || prefix === '') {
        throw new ConfigurationError(`"dereference" entry for <${classIri}> holds a prefix that is not a non-empty string`);
      }
      checked.push(prefix);
    }
    config.set(classIri, Object.freeze(checked));
  }
  return config;
}

export async function loadDereferenceConfig(path: string): Promise<DereferenceConfig> {
  let text: string;
  try {
    text = await readFile(path, 'utf8');
  } catch (error) {
    throw new ConfigurationError(`Failed to read configuration ${path}: ${errorMessage(error)}`, { cause: error });
  }
  if (text.trim() === '') {
    return EMPTY_DEREFERENCE_CONFIG;
  }

  let raw: unknown;
  try {
    raw = JSON.parse(text);
  } catch (error) {
    throw new ConfigurationError(`Failed to parse configuration ${path}: ${errorMessage(error)}`, { cause: error });
  }
  return parseDereferenceConfig(raw);
}

export function parseRdfFormat(name: string): RdfFormat {
  const normalized = name.trim().toLowerCase();
  if (!isRdfFormat(normalized)) {
    throw new ConfigurationError(`Unknown input format: ${name}`);
  }
  return normalized;
}

/** Parse a millisecond option: a positive integer. */
export function parseMilliseconds(value: string, option: string): number {
  const parsed = Number(value);
  if (!Number.isInteger(parsed) || parsed <= 0) {
    throw new ConfigurationError(`${option} must be a positive number of milliseconds, got "${value}"`);
  }
  return parsed;
}
