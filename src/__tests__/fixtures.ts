import { DataFactory } from 'n3';
import type * as RDF from '@rdfjs/types';
import type { RdfFetcher } from '../fetcher.js';
import { parseRdf } from '../formats.js';
import type { Logger } from '../logger.js';
import { GraphStore, typesOf } from '../store.js';
import type { Description } from '../types.js';

export const BF = 'http://id.loc.gov/ontologies/bibframe/';
export const EX = 'http://example.org/';
export const RDFS_LABEL = 'http://www.w3.org/2000/01/rdf-schema#label';

export const PREFIXES = `
@prefix rdf: <http://www.w3.org/1999/02/22-rdf-syntax-ns#> .
@prefix rdfs: <http://www.w3.org/2000/01/rdf-schema#> .
@prefix bf: <http://id.loc.gov/ontologies/bibframe/> .
@prefix bflc: <http://id.loc.gov/ontologies/bflc/> .
@prefix ex: <http://example.org/> .
`;

/** One Work with one Instance, enough for 020, 041, 245 and 650. */
export const BOOK = `
ex:work1 a bf:Text, bf:Work ;
  bf:language <http://id.loc.gov/vocabulary/languages/eng> ;
  bf:subject ex:topic1 ;
  bf:hasInstance ex:instance1 .
<http://id.loc.gov/vocabulary/languages/eng> a bf:Language ; bf:code "eng" .
ex:topic1 a bf:Topic ; rdfs:label "Cataloging" .
ex:instance1 a bf:Instance ;
  bf:instanceOf ex:work1 ;
  bf:title [ a bf:Title ; bf:mainTitle "A test book" ; bf:subtitle "with a subtitle" ] ;
  bf:identifiedBy [ a bf:Isbn ; rdf:value "9780000000002" ] ;
  bf:responsibilityStatement "by A. Author" .
`;

export async function parseTurtle(body: string): Promise<RDF.Quad[]> {
  return parseRdf(PREFIXES + body, 'turtle');
}

export async function turtleStore(body: string): Promise<GraphStore> {
  return new GraphStore(await parseTurtle(body));
}

export function iri(local: string): RDF.NamedNode {
  return DataFactory.namedNode(EX + local);
}

/** A description over the whole store, bypassing extraction. */
export function descriptionOf(store: GraphStore, work: string, instance: string): Description {
  const workNode = iri(work);
  const instanceNode = iri(instance);
  return {
    work: workNode,
    instance: instanceNode,
    workTypes: typesOf(store, workNode),
    instanceTypes: typesOf(store, instanceNode),
    graph: store
  };
}

/**
 * In-process stand-in for HTTP dereferencing: serves Turtle documents by IRI
 * and records every request.
 */
export class FakeFetcher implements RdfFetcher {
  readonly requests: string[] = [];

  constructor(private readonly documents: Record<string, string> = {}) {}

  async fetchQuads(target: string): Promise<RDF.Quad[]> {
    this.requests.push(target);
    const document = this.documents[target];
    if (document === undefined) {
      throw new Error('HTTP 404: Not Found');
    }
    return parseTurtle(document);
  }
}

/** Logger that keeps what it is given. */
export class RecordingLogger implements Logger {
  readonly infos: string[] = [];
  readonly debugs: string[] = [];
  readonly warnings: string[] = [];
  readonly errors: string[] = [];

  info(message: string): void {
    this.infos.push(message);
  }

  debug(message: string): void {
    this.debugs.push(message);
  }

  warn(message: string): void {
    this.warnings.push(message);
  }

  error(message: string): void {
    this.errors.push(message);
  }
}
