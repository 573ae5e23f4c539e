import { HttpRdfFetcher, type RdfFetcher } from './fetcher.js';
import { errorMessage } from './errors.js';
import { silentLogger, type Logger } from './logger.js';
import { OverlayGraph, typesOf } from './store.js';
import type { DereferenceConfig, DereferenceFailure, Description } from './types.js';

export const DEFAULT_DEREFERENCE_TIMEOUT = 10000;

export interface ResolverOptions {
  /** Milliseconds allowed for each lookup. */
  timeout?: number;
  fetcher?: RdfFetcher;
  logger?: Logger;
}

export interface ResolvedView {
  graph: OverlayGraph;
  dereferenced: string[];
  failures: DereferenceFailure[];
}

/**
 * Object IRIs of the description that should be fetched: the subject carries
 * a configured class and the object starts with one of that class's prefixes.
 * Each IRI is listed once, in the order first met.
 */
export function dereferenceCandidates(description: Description, config: DereferenceConfig): string[] {
  const candidates: string[] = [];
  if (config.size === 0) {
    return candidates;
  }

  const seen = new Set<string>();
  const prefixesBySubject = new Map<string, readonly string[]>();

  for (const triple of description.graph.triples()) {
    if (triple.object.termType !== 'NamedNode') {
      continue;
    }

    const subjectKey = `${triple.subject.termType}:${triple.subject.value}`;
    let prefixes = prefixesBySubject.get(subjectKey);
    if (!prefixes) {
      prefixes = typesOf(description.graph, triple.subject).flatMap(type => config.get(type) ?? []);
      prefixesBySubject.set(subjectKey, prefixes);
    }

    const iri = triple.object.value;
    if (!seen.has(iri) && prefixes.some(prefix => iri.startsWith(prefix))) {
      seen.add(iri);
      candidates.push(iri);
    }
  }

  return candidates;
}

/**
 * Augments one description with the triples of the external resources it
 * references. The triples land in a view private to this description; the
 * description's own graph, and the store it came from, are left untouched.
 */
export class DereferenceResolver {
  private readonly timeout: number;
  private readonly fetcher: RdfFetcher;
  private readonly logger: Logger;

  constructor(options: ResolverOptions = {}) {
    this.timeout = options.timeout ?? DEFAULT_DEREFERENCE_TIMEOUT;
    this.fetcher = options.fetcher ?? new HttpRdfFetcher();
    this.logger = options.logger ?? silentLogger;
  }

  async resolve(description: Description, config: DereferenceConfig): Promise<ResolvedView> {
    const view: ResolvedView = {
      graph: new OverlayGraph(description.graph),
      dereferenced: [],
      failures: []
    };

    for (const iri of dereferenceCandidates(description, config)) {
      try {
        const triples = await this.fetcher.fetchQuads(iri, { timeout: this.timeout });
        const added = view.graph.addAll(triples);
        view.dereferenced.push(iri);
        this.logger.debug(`Dereferenced ${iri} (${added} triples)`);
      } catch (error) {
        const message = errorMessage(error);
        view.failures.push({ iri, message });
        this.logger.warn(`Failed to dereference ${iri}: ${message}`);
      }
    }

    return view;
  }
}
