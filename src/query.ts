import { readFile } from 'fs/promises';
import { fileURLToPath } from 'url';
import { DataFactory } from 'n3';
import type * as RDF from '@rdfjs/types';
import { QueryError, errorMessage } from './errors.js';
import { RDF_TYPE, termKey, type GraphView } from './store.js';

const { namedNode, literal } = DataFactory;

export const DEFAULT_QUERY_FILE = fileURLToPath(new URL('../share/queries/descriptions.json', import.meta.url));

export type PatternTerm =
  | { kind: 'variable'; name: string }
  | { kind: 'term'; term: RDF.Term };

export interface TriplePattern {
  subject: PatternTerm;
  predicate: PatternTerm;
  object: PatternTerm;
}

/**
 * Compiled form of a description query: alternative groups of triple
 * patterns whose solutions bind a work and an instance variable.
 */
export interface QueryPlan {
  version: number;
  workVariable: string;
  instanceVariable: string;
  alternatives: TriplePattern[][];
  closureDepth: number;
}

export type Binding = ReadonlyMap<string, RDF.Term>;

const SUPPORTED_VERSION = 1;

export async function loadQuery(path: string = DEFAULT_QUERY_FILE): Promise<QueryPlan> {
  let text: string;
  try {
    text = await readFile(path, 'utf8');
  } catch (error) {
    throw new QueryError(`Failed to read query file ${path}: ${errorMessage(error)}`, { cause: error });
  }

  let raw: unknown;
  try {
    raw = JSON.parse(text);
  } catch (error) {
    throw new QueryError(`Query file ${path} is not valid JSON: ${errorMessage(error)}`, { cause: error });
  }
  return compileQuery(raw);
}

export function compileQuery(raw: unknown): QueryPlan {
  if (!isRecord(raw)) {
    throw new QueryError('Query must be a JSON object');
  }
  if (raw.version !== SUPPORTED_VERSION) {
    throw new QueryError(`Unsupported query version: ${String(raw.version)}`);
  }

  const prefixes = new Map<string, string>([['rdf', 'http://www.w3.org/1999/02/22-rdf-syntax-ns#']]);
  if (raw.prefixes !== undefined) {
    if (!isRecord(raw.prefixes)) {
      throw new QueryError('"prefixes" must be an object');
    }
    for (const [prefix, iri] of Object.entries(raw.prefixes)) {
      if (typeof iri !== 'string') {
        throw new QueryError(`Prefix "${prefix}" must map to a string`);
      }
      prefixes.set(prefix, iri);
    }
  }

  if (!isRecord(raw.select)) {
    throw new QueryError('"select" must name the work and instance variables');
  }
  const workVariable = variableName(raw.select.work, 'select.work');
  const instanceVariable = variableName(raw.select.instance, 'select.instance');

  if (!Array.isArray(raw.union) || raw.union.length === 0) {
    throw new QueryError('"union" must be a non-empty array of pattern groups');
  }
  const alternatives = raw.union.map((group, index) => {
    if (!Array.isArray(group) || group.length === 0) {
      throw new QueryError(`union[${index}] must be a non-empty array of patterns`);
    }
    const patterns = group.map(pattern => compilePattern(pattern, prefixes));
    const bound = new Set(patterns.flatMap(patternVariables));
    for (const name of [workVariable, instanceVariable]) {
      if (!bound.has(name)) {
        throw new QueryError(`union[${index}] never binds ?${name}`);
      }
    }
    return patterns;
  });

  const closureDepth = raw.closureDepth ?? 4;
  if (typeof closureDepth !== 'number' || !Number.isInteger(closureDepth) || closureDepth < 1) {
    throw new QueryError('"closureDepth" must be a positive integer');
  }

  return {
    version: SUPPORTED_VERSION,
    workVariable,
    instanceVariable,
    alternatives,
    closureDepth
  };
}

function variableName(value: unknown, where: string): string {
  if (typeof value !== 'string' || !/^\?[A-Za-z_][\w-]*$/.test(value)) {
    throw new QueryError(`${where} must be a variable such as "?work"`);
  }
  return value.slice(1);
}

function compilePattern(pattern: unknown, prefixes: ReadonlyMap<string, string>): TriplePattern {
  if (!Array.isArray(pattern) || pattern.length !== 3) {
    throw new QueryError(`Pattern must be a [subject, predicate, object] array: ${JSON.stringify(pattern)}`);
  }
  const [subject, predicate, object] = pattern.map(token => compileTerm(token, prefixes));
  if (predicate.kind === 'term' && predicate.term.termType !== 'NamedNode') {
    throw new QueryError(`Predicate must be an IRI or a variable: ${JSON.stringify(pattern[1])}`);
  }
  return { subject, predicate, object };
}

/**
 * Tokens: `?name` variable, `<iri>` absolute IRI, `prefix:local` name,
 * `a` for rdf:type, `"text"` literal.
 */
function compileTerm(token: unknown, prefixes: ReadonlyMap<string, string>): PatternTerm {
  if (typeof token !== 'string' || token.length === 0) {
    throw new QueryError(`Pattern terms must be non-empty strings: ${JSON.stringify(token)}`);
  }
  if (token.startsWith('?')) {
    return { kind: 'variable', name: variableName(token, 'pattern variable') };
  }
  if (token === 'a') {
    return { kind: 'term', term: namedNode(RDF_TYPE) };
  }
  if (token.startsWith('<') && token.endsWith('>')) {
    return { kind: 'term', term: namedNode(token.slice(1, -1)) };
  }
  if (token.startsWith('"') && token.endsWith('"') && token.length >= 2) {
    return { kind: 'term', term: literal(token.slice(1, -1)) };
  }
  const colon = token.indexOf(':');
  if (colon > -1) {
    const namespace = prefixes.get(token.slice(0, colon));
    if (namespace === undefined) {
      throw new QueryError(`Unknown prefix in "${token}"`);
    }
    return { kind: 'term', term: namedNode(namespace + token.slice(colon + 1)) };
  }
  throw new QueryError(`Cannot interpret pattern term "${token}"`);
}

function patternVariables(pattern: TriplePattern): string[] {
  return [pattern.subject, pattern.predicate, pattern.object]
    .flatMap(term => (term.kind === 'variable' ? [term.name] : []));
}

/**
 * Evaluate every alternative and return the distinct solutions in the order
 * they were found.
 */
export function evaluateQuery(plan: QueryPlan, graph: GraphView): Binding[] {
  const solutions: Binding[] = [];
  const seen = new Set<string>();

  for (const group of plan.alternatives) {
    let bindings: Binding[] = [new Map()];
    for (const pattern of group) {
      bindings = bindings.flatMap(binding => matchPattern(pattern, binding, graph));
      if (bindings.length === 0) {
        break;
      }
    }

    for (const binding of bindings) {
      const key = [...binding.entries()]
        .sort(([a], [b]) => (a < b ? -1 : a > b ? 1 : 0))
        .map(([name, term]) => `${name}=${termKey(term)}`)
        .join(' ');
      if (!seen.has(key)) {
        seen.add(key);
        solutions.push(binding);
      }
    }
  }

  return solutions;
}

function matchPattern(pattern: TriplePattern, binding: Binding, graph: GraphView): Binding[] {
  const resolveTerm = (term: PatternTerm): RDF.Term | null =>
    term.kind === 'term' ? term.term : binding.get(term.name) ?? null;

  const triples = graph.match(resolveTerm(pattern.subject), resolveTerm(pattern.predicate), resolveTerm(pattern.object));
  const extended: Binding[] = [];

  for (const triple of triples) {
    const next = new Map(binding);
    if (
      bindVariable(next, pattern.subject, triple.subject) &&
      bindVariable(next, pattern.predicate, triple.predicate) &&
      bindVariable(next, pattern.object, triple.object)
    ) {
      extended.push(next);
    }
  }
  return extended;
}

/** Returns false when the variable is already bound to a different term. */
function bindVariable(binding: Map<string, RDF.Term>, pattern: PatternTerm, value: RDF.Term): boolean {
  if (pattern.kind === 'term') {
    return true;
  }
  const current = binding.get(pattern.name);
  if (current) {
    return current.equals(value);
  }
  binding.set(pattern.name, value);
  return true;
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}
