import { writeFile } from 'fs/promises';
import { resolve } from 'path';
import type { Writable } from 'stream';
import { RecordAssembler } from './assembler.js';
import { loadDereferenceConfig, EMPTY_DEREFERENCE_CONFIG } from './config.js';
import { Bf2MarcConverter, exitCodeFor } from './converter.js';
import type { RdfFetcher } from './fetcher.js';
import { loadSources, type StdinStream } from './loader.js';
import { createLogger, type Logger } from './logger.js';
import { GraphStore } from './store.js';
import type { ConversionReport, OutputFormat, RdfFormat } from './types.js';

export interface RunOptions {
  format: RdfFormat;
  outputFormat: OutputFormat;
  output?: string;
  config?: string;
  /** Per-request timeout for URL sources and dereferencing. */
  timeout?: number;
  stdinWait?: number;
  verbose?: boolean;
  rulesFile?: string;
  queryFile?: string;
}

export interface RunEnvironment {
  stdin?: StdinStream;
  stdout?: Writable;
  logger?: Logger;
  fetcher?: RdfFetcher;
}

export interface RunResult {
  report: ConversionReport;
  exitCode: number;
  bytes: number;
}

/**
 * Load the sources, convert every description and write the collection.
 * Fatal errors propagate before anything has been written.
 */
export async function runConversion(
  sources: string[],
  options: RunOptions,
  environment: RunEnvironment = {}
): Promise<RunResult> {
  const logger = environment.logger ?? createLogger({ verbose: options.verbose });

  const dereference = options.config ? await loadDereferenceConfig(resolve(options.config)) : EMPTY_DEREFERENCE_CONFIG;
  const converter = await Bf2MarcConverter.create(
    {
      dereference,
      dereferenceTimeout: options.timeout,
      rulesFile: options.rulesFile,
      queryFile: options.queryFile,
      outputFormat: options.outputFormat
    },
    { logger, fetcher: environment.fetcher }
  );

  const store = new GraphStore();
  const loaded = await loadSources(
    store,
    sources,
    { format: options.format, stdinTimeout: options.stdinWait, fetchTimeout: options.timeout },
    logger,
    environment.stdin
  );
  logger.info(`Loaded ${loaded.triples} triples from ${loaded.sources} source(s)`);

  const report = await converter.convert(store);
  const output = new RecordAssembler(logger).serialize(report.collection, options.outputFormat);

  if (options.output) {
    const outputPath = resolve(options.output);
    await writeFile(outputPath, output);
    logger.info(`Records written to: ${outputPath}`);
  } else {
    await writeAll(environment.stdout ?? process.stdout, output);
  }

  return { report, exitCode: exitCodeFor(report), bytes: output.length };
}

function writeAll(stream: Writable, data: Buffer): Promise<void> {
  return new Promise((resolvePromise, reject) => {
    stream.write(data, error => (error ? reject(error) : resolvePromise()));
  });
}
