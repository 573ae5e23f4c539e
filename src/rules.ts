import { readFile } from 'fs/promises';
import { fileURLToPath } from 'url';
import { ConfigurationError, errorMessage } from './errors.js';
import { isRecord } from './xml.js';

export const DEFAULT_RULES_FILE = fileURLToPath(new URL('../share/rules/bibframe2marc.json', import.meta.url));

/**
 * A path over the striped tree, e.g. `$instance/bf:title/bf:Title/bf:mainTitle`.
 * Steps hold the expanded name (namespace IRI + local name), `*`, or a final
 * `@attribute`.
 */
export interface CompiledPath {
  source: string;
  root?: 'work' | 'instance';
  steps: string[];
  attribute?: string;
}

export interface SubfieldRule {
  code: string;
  select: CompiledPath[];
  first: boolean;
  prefix: string;
  suffix: string;
}

export interface DataFieldRule {
  tag: string;
  ind1: string;
  ind2: string;
  context?: CompiledPath;
  first: boolean;
  subfields: SubfieldRule[];
}

export interface ControlFieldRule {
  tag: string;
  select: CompiledPath[];
  value?: string;
}

export interface RuleSet {
  version: number;
  leader: string;
  required: CompiledPath[];
  controlFields: ControlFieldRule[];
  dataFields: DataFieldRule[];
}

const SUPPORTED_VERSION = 1;
const XML_NS = 'http://www.w3.org/XML/1998/namespace';
const RDF_NS = 'http://www.w3.org/1999/02/22-rdf-syntax-ns#';

export async function loadRules(path: string = DEFAULT_RULES_FILE): Promise<RuleSet> {
  let raw: unknown;
  try {
    raw = JSON.parse(await readFile(path, 'utf8'));
  } catch (error) {
    throw new ConfigurationError(`Failed to load mapping rules from ${path}: ${errorMessage(error)}`, { cause: error });
  }
  return compileRules(raw);
}

/**
 * Validate a rule document and resolve every path against its namespace
 * table.
 */
export function compileRules(raw: unknown): RuleSet {
  if (!isRecord(raw)) {
    throw new ConfigurationError('Mapping rules must be a JSON object');
  }
  if (raw.version !== SUPPORTED_VERSION) {
    throw new ConfigurationError(`Unsupported mapping rules version: ${String(raw.version)}`);
  }

  const namespaces = new Map<string, string>([
    ['xml', XML_NS],
    ['rdf', RDF_NS]
  ]);
  if (!isRecord(raw.namespaces)) {
    throw new ConfigurationError('Mapping rules must declare "namespaces"');
  }
  for (const [prefix, iri] of Object.entries(raw.namespaces)) {
    if (typeof iri !== 'string') {
      throw new ConfigurationError(`Namespace "${prefix}" must be a string`);
    }
    namespaces.set(prefix, iri);
  }

  const leader = raw.leader;
  if (typeof leader !== 'string' || leader.length !== 24) {
    throw new ConfigurationError('"leader" must be a 24 character string');
  }

  const path = (value: unknown, where: string, absolute = false): CompiledPath => {
    const compiled = compilePath(value, namespaces, where);
    if (absolute && !compiled.root) {
      throw new ConfigurationError(`${where}: path must start at $work or $instance`);
    }
    return compiled;
  };
  const paths = (value: unknown, where: string, absolute = false): CompiledPath[] =>
    Array.isArray(value)
      ? value.map((entry, i) => path(entry, `${where}[${i}]`, absolute))
      : [path(value, where, absolute)];

  const required = raw.required === undefined ? [] : paths(raw.required, 'required', true);

  const controlFields = arrayOf(raw.controlFields, 'controlFields').map((rule, i): ControlFieldRule => {
    const where = `controlFields[${i}]`;
    const tag = fieldTag(rule.tag, where);
    if (!/^00\d$/.test(tag)) {
      throw new ConfigurationError(`${where}: control field tags run from 001 to 009`);
    }
    const value = rule.value;
    if (value !== undefined && typeof value !== 'string') {
      throw new ConfigurationError(`${where}: "value" must be a string`);
    }
    if (rule.select === undefined && value === undefined) {
      throw new ConfigurationError(`${where}: needs "select" or "value"`);
    }
    return {
      tag,
      select: rule.select === undefined ? [] : paths(rule.select, `${where}.select`, true),
      value
    };
  });

  const dataFields = arrayOf(raw.dataFields, 'dataFields').map((rule, i): DataFieldRule => {
    const where = `dataFields[${i}]`;
    const tag = fieldTag(rule.tag, where);
    if (/^00\d$/.test(tag)) {
      throw new ConfigurationError(`${where}: ${tag} is a control field tag`);
    }
    const subfields = arrayOf(rule.subfields, `${where}.subfields`).map((sub, j): SubfieldRule => {
      const at = `${where}.subfields[${j}]`;
      const code = sub.code;
      if (typeof code !== 'string' || code.length !== 1) {
        throw new ConfigurationError(`${at}: "code" must be a single character`);
      }
      return {
        code,
        select: paths(sub.select, `${at}.select`),
        first: sub.first === true,
        prefix: typeof sub.prefix === 'string' ? sub.prefix : '',
        suffix: typeof sub.suffix === 'string' ? sub.suffix : ''
      };
    });
    if (subfields.length === 0) {
      throw new ConfigurationError(`${where}: needs at least one subfield`);
    }
    return {
      tag,
      ind1: indicator(rule.ind1, `${where}.ind1`),
      ind2: indicator(rule.ind2, `${where}.ind2`),
      context: rule.context === undefined ? undefined : path(rule.context, `${where}.context`, true),
      first: rule.first === true,
      subfields
    };
  });

  return { version: SUPPORTED_VERSION, leader, required, controlFields, dataFields };
}

function arrayOf(value: unknown, where: string): Record<string, unknown>[] {
  if (value === undefined) {
    return [];
  }
  if (!Array.isArray(value)) {
    throw new ConfigurationError(`"${where}" must be an array`);
  }
  return value.map((entry, i) => {
    if (!isRecord(entry)) {
      throw new ConfigurationError(`${where}[${i}] must be an object`);
    }
    return entry;
  });
}

function fieldTag(value: unknown, where: string): string {
  if (typeof value !== 'string' || !/^\d{3}$/.test(value)) {
    throw new ConfigurationError(`${where}: "tag" must be three digits`);
  }
  return value;
}

function indicator(value: unknown, where: string): string {
  if (value === undefined) {
    return ' ';
  }
  if (typeof value !== 'string' || value.length !== 1) {
    throw new ConfigurationError(`${where} must be a single character`);
  }
  return value;
}

function expandName(qname: string, namespaces: ReadonlyMap<string, string>): string | undefined {
  const colon = qname.indexOf(':');
  if (colon < 1) {
    return undefined;
  }
  const namespace = namespaces.get(qname.slice(0, colon));
  return namespace === undefined ? undefined : namespace + qname.slice(colon + 1);
}

function compilePath(value: unknown, namespaces: ReadonlyMap<string, string>, where: string): CompiledPath {
  if (typeof value !== 'string' || value.trim() === '') {
    throw new ConfigurationError(`${where}: path must be a non-empty string`);
  }
  const tokens = value.split('/').map(token => token.trim());
  const compiled: CompiledPath = { source: value, steps: [] };

  if (tokens[0] === '$work' || tokens[0] === '$instance') {
    compiled.root = tokens[0] === '$work' ? 'work' : 'instance';
    tokens.shift();
  }

  tokens.forEach((token, index) => {
    if (token.startsWith('@')) {
      if (index !== tokens.length - 1) {
        throw new ConfigurationError(`${where}: an attribute step must come last in "${value}"`);
      }
      const attribute = expandName(token.slice(1), namespaces);
      if (!attribute) {
        throw new ConfigurationError(`${where}: unknown prefix in "${token}"`);
      }
      compiled.attribute = attribute;
      return;
    }
    if (token === '*') {
      compiled.steps.push('*');
      return;
    }
    const name = expandName(token, namespaces);
    if (!name) {
      throw new ConfigurationError(`${where}: cannot resolve step "${token}" in "${value}"`);
    }
    compiled.steps.push(name);
  });

  return compiled;
}
