import { DataFactory, Store } from 'n3';
import type * as RDF from '@rdfjs/types';

const { quad, defaultGraph } = DataFactory;

export const RDF_TYPE = 'http://www.w3.org/1999/02/22-rdf-syntax-ns#type';

export type TermPattern = RDF.Term | null | undefined;

/**
 * Read access to a set of triples. Implemented by the graph store and by
 * overlay views built on top of it.
 */
export interface GraphView {
  match(subject?: TermPattern, predicate?: TermPattern, object?: TermPattern): RDF.Quad[];
  readonly size: number;
}

/**
 * Canonical string key of a term, used for identity, de-duplication and
 * stable ordering.
 */
export function termKey(term: RDF.Term): string {
  switch (term.termType) {
    case 'NamedNode':
      return `<${term.value}>`;
    case 'BlankNode':
      return `_:${term.value}`;
    case 'Literal':
      if (term.language) {
        return `${JSON.stringify(term.value)}@${term.language}`;
      }
      return `${JSON.stringify(term.value)}^^<${term.datatype.value}>`;
    default:
      return `?${term.value}`;
  }
}

export function isResource(term: RDF.Term): term is RDF.NamedNode | RDF.BlankNode {
  return term.termType === 'NamedNode' || term.termType === 'BlankNode';
}

/**
 * In-memory triple store. Named graphs are collapsed into the default graph,
 * so a triple asserted in several graphs or several sources is stored once.
 */
export class GraphStore implements GraphView {
  private readonly store = new Store();
  private frozen = false;

  constructor(triples: Iterable<RDF.Quad> = []) {
    this.addAll(triples);
  }

  get size(): number {
    return this.store.size;
  }

  get isFrozen(): boolean {
    return this.frozen;
  }

  /**
   * Add a triple. Returns false when the triple was already present.
   */
  add(triple: RDF.Quad): boolean {
    if (this.frozen) {
      throw new Error('Graph store is read-only once conversion has started');
    }
    const before = this.store.size;
    this.store.addQuad(quad(triple.subject, triple.predicate, triple.object, defaultGraph()));
    return this.store.size > before;
  }

  addAll(triples: Iterable<RDF.Quad>): number {
    let added = 0;
    for (const triple of triples) {
      if (this.add(triple)) {
        added++;
      }
    }
    return added;
  }

  match(subject?: TermPattern, predicate?: TermPattern, object?: TermPattern): RDF.Quad[] {
    return this.store.getQuads(subject ?? null, predicate ?? null, object ?? null, null);
  }

  /** Forbid further additions. */
  freeze(): this {
    this.frozen = true;
    return this;
  }

  triples(): RDF.Quad[] {
    return this.match();
  }
}

/**
 * Copy-on-read view: reads see the base graph plus a private overlay, writes
 * only ever reach the overlay. The base is never modified.
 */
export class OverlayGraph implements GraphView {
  readonly overlay = new GraphStore();

  constructor(private readonly base: GraphView) {}

  get size(): number {
    return this.base.size + this.overlay.match().filter(t => !this.inBase(t)).length;
  }

  add(triple: RDF.Quad): boolean {
    if (this.inBase(triple)) {
      return false;
    }
    return this.overlay.add(triple);
  }

  addAll(triples: Iterable<RDF.Quad>): number {
    let added = 0;
    for (const triple of triples) {
      if (this.add(triple)) {
        added++;
      }
    }
    return added;
  }

  match(subject?: TermPattern, predicate?: TermPattern, object?: TermPattern): RDF.Quad[] {
    const fromBase = this.base.match(subject, predicate, object);
    const extra = this.overlay.match(subject, predicate, object);
    if (extra.length === 0) {
      return fromBase;
    }
    return [...fromBase, ...extra];
  }

  private inBase(triple: RDF.Quad): boolean {
    return this.base.match(triple.subject, triple.predicate, triple.object).length > 0;
  }
}

/** IRIs of the asserted `rdf:type`s of a node, sorted. */
export function typesOf(graph: GraphView, node: RDF.Term): string[] {
  const types = new Set<string>();
  for (const triple of graph.match(node, DataFactory.namedNode(RDF_TYPE), null)) {
    if (triple.object.termType === 'NamedNode') {
      types.add(triple.object.value);
    }
  }
  return [...types].sort();
}
