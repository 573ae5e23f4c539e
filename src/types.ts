/**
 * BIBFRAME to MARC conversion types and interfaces
 */

import type * as RDF from '@rdfjs/types';
import type { GraphStore } from './store.js';

export type RdfFormat = 'rdfxml' | 'ntriples' | 'turtle' | 'rdfjson' | 'nquads' | 'trig';

export type OutputFormat = 'marcxml' | 'marc';

/** Subject or object of a description link: never a literal. */
export type ResourceTerm = RDF.NamedNode | RDF.BlankNode;

export interface Description {
  work: ResourceTerm;
  instance: ResourceTerm;
  workTypes: string[];
  instanceTypes: string[];
  /** Triples reachable from the Work and the Instance, bounded by the query's closure depth. */
  graph: GraphStore;
}

/** Class IRI -> IRI prefixes whose objects are fetched before striping. */
export type DereferenceConfig = ReadonlyMap<string, readonly string[]>;

export interface SubField {
  code: string;
  value: string;
}

export interface DataField {
  tag: string;
  ind1: string;
  ind2: string;
  subfields: SubField[];
}

export interface ControlField {
  tag: string;
  value: string;
}

export interface MarcRecord {
  leader: string;
  controlFields: ControlField[];
  dataFields: DataField[];
}

export interface SourceOptions {
  format: RdfFormat;
  /** Milliseconds to wait for the first bytes on stdin when no source is given. */
  stdinTimeout?: number;
  /** Milliseconds allowed for each URL fetch. */
  fetchTimeout?: number;
}

export interface ConvertOptions {
  dereference?: DereferenceConfig;
  /** Per-lookup timeout for dereferencing, in milliseconds. */
  dereferenceTimeout?: number;
  /** Override for the mapping rule file. */
  rulesFile?: string;
  /** Override for the description query file. */
  queryFile?: string;
  progressInterval?: number;
  /** Records that cannot be written in this form fail at the assemble stage. */
  outputFormat?: OutputFormat;
}

export type PipelineStage = 'dereference' | 'stripe' | 'transform' | 'assemble';

export type ConversionResult =
  | { status: 'converted'; description: Description; record: MarcRecord }
  | { status: 'empty'; description: Description }
  | { status: 'failed'; description: Description; stage: PipelineStage; error: Error };

export interface OutputCollection {
  records: MarcRecord[];
  warnings: string[];
}

export interface ConversionReport {
  results: ConversionResult[];
  collection: OutputCollection;
  descriptions: number;
  converted: number;
  empty: number;
  failed: number;
  processingTime: number;
}

export interface DereferenceFailure {
  iri: string;
  message: string;
}
