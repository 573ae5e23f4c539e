/**
 * bf2marc - convert BIBFRAME RDF descriptions to MARC records
 * Main library exports
 */

export { Bf2MarcConverter, exitCodeFor } from './converter.js';
export type { ConverterDependencies } from './converter.js';
export { runConversion } from './run.js';
export type { RunOptions, RunEnvironment, RunResult } from './run.js';
export { GraphStore, OverlayGraph, termKey, typesOf } from './store.js';
export type { GraphView } from './store.js';
export { loadSources, readStdin } from './loader.js';
export { parseRdf, RDF_FORMATS, DEFAULT_FORMAT } from './formats.js';
export { DescriptionExtractor, descriptionLabel } from './extractor.js';
export { loadQuery, compileQuery, evaluateQuery } from './query.js';
export { DereferenceResolver, dereferenceCandidates } from './resolver.js';
export { HttpRdfFetcher } from './fetcher.js';
export type { RdfFetcher } from './fetcher.js';
export { Striper } from './striper.js';
export type { StripedDocument, NamespaceTable } from './striper.js';
export { RecordTransformEngine } from './transformer.js';
export { loadRules, compileRules } from './rules.js';
export { RecordAssembler } from './assembler.js';
export { parseCollection, renderRecord, serializeCollection } from './marcxml.js';
export { encodeRecord, encodeCollection, decodeRecord, decodeCollection } from './iso2709.js';
export { loadDereferenceConfig, parseDereferenceConfig } from './config.js';
export { createLogger, silentLogger } from './logger.js';
export type { Logger } from './logger.js';
export * from './errors.js';
export type {
  RdfFormat,
  OutputFormat,
  Description,
  DereferenceConfig,
  MarcRecord,
  DataField,
  ControlField,
  SubField,
  ConvertOptions,
  ConversionResult,
  ConversionReport,
  OutputCollection
} from './types.js';
