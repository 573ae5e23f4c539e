import { readFile } from 'fs/promises';
import { resolve } from 'path';
import { pathToFileURL } from 'url';
import type { Readable } from 'stream';
import type * as RDF from '@rdfjs/types';
import { fetchDocument } from './fetcher.js';
import { formatForMediaType, parseRdf } from './formats.js';
import { NoInputError, SourceError, errorMessage } from './errors.js';
import { silentLogger, type Logger } from './logger.js';
import type { GraphStore } from './store.js';
import type { RdfFormat, SourceOptions } from './types.js';

export const DEFAULT_STDIN_TIMEOUT = 2000;
export const DEFAULT_FETCH_TIMEOUT = 30000;

export type StdinStream = Readable & { isTTY?: boolean };

export interface LoadResult {
  sources: number;
  triples: number;
}

export function isUrl(source: string): boolean {
  return /^https?:\/\//i.test(source);
}

/**
 * Populate the store from every source, in order. With no sources, standard
 * input is read instead. Any unreadable source aborts the run.
 */
export async function loadSources(
  store: GraphStore,
  sources: string[],
  options: SourceOptions,
  logger: Logger = silentLogger,
  stdin: StdinStream = process.stdin
): Promise<LoadResult> {
  const before = store.size;

  if (sources.length === 0) {
    const text = await readStdin(stdin, options.stdinTimeout ?? DEFAULT_STDIN_TIMEOUT);
    if (text === null) {
      throw new NoInputError();
    }
    logger.info('Reading RDF from standard input');
    store.addAll(await parseSource('<stdin>', text, options.format));
  } else {
    for (const source of sources) {
      const triples = isUrl(source)
        ? await readUrl(source, options, logger)
        : await readLocalFile(source, options.format);
      const added = store.addAll(triples);
      logger.info(`Loaded ${added} triples from ${source}`);
    }
  }

  return {
    sources: Math.max(sources.length, 1),
    triples: store.size - before
  };
}

async function parseSource(source: string, text: string, format: RdfFormat, baseIRI?: string): Promise<RDF.Quad[]> {
  try {
    return await parseRdf(text, format, baseIRI);
  } catch (error) {
    throw new SourceError(source, `Failed to parse ${source} as ${format}: ${errorMessage(error)}`, { cause: error });
  }
}

async function readLocalFile(source: string, format: RdfFormat): Promise<RDF.Quad[]> {
  const path = resolve(source);
  let text: string;
  try {
    text = await readFile(path, 'utf8');
  } catch (error) {
    throw new SourceError(source, `Failed to read ${path}: ${errorMessage(error)}`, { cause: error });
  }
  return parseSource(source, text, format, pathToFileURL(path).href);
}

/**
 * Two attempts at most: first with the content type the server negotiates,
 * then, whatever went wrong, a fresh fetch parsed with the declared format.
 */
export async function readUrl(url: string, options: SourceOptions, logger: Logger = silentLogger): Promise<RDF.Quad[]> {
  const timeout = options.fetchTimeout ?? DEFAULT_FETCH_TIMEOUT;

  try {
    const document = await fetchDocument(url, { timeout });
    const format = formatForMediaType(document.contentType);
    if (!format) {
      throw new Error(`unsupported content type ${document.contentType ?? '(none)'}`);
    }
    return await parseRdf(document.body, format, document.url);
  } catch (error) {
    logger.info(`Negotiated load of ${url} failed (${errorMessage(error)}), retrying as ${options.format}`);
  }

  try {
    const document = await fetchDocument(url, { timeout });
    return await parseRdf(document.body, options.format, document.url);
  } catch (error) {
    throw new SourceError(url, `Failed to load ${url} as ${options.format}: ${errorMessage(error)}`, { cause: error });
  }
}

/**
 * Read all of standard input, provided the first bytes arrive within
 * `timeout` ms. Resolves to null when nothing arrives: an interactive
 * terminal, an empty stream, or silence until the deadline.
 */
export function readStdin(stream: StdinStream, timeout: number): Promise<string | null> {
  if (stream.isTTY) {
    return Promise.resolve(null);
  }

  return new Promise((resolvePromise, reject) => {
    const chunks: Buffer[] = [];
    let received = false;

    const cleanup = () => {
      clearTimeout(timer);
      stream.off('data', onData);
      stream.off('end', onEnd);
      stream.off('error', onError);
    };

    const timer = setTimeout(() => {
      if (!received) {
        cleanup();
        stream.pause();
        stream.destroy();
        resolvePromise(null);
      }
    }, timeout);

    const onData = (chunk: Buffer | string) => {
      received = true;
      clearTimeout(timer);
      chunks.push(typeof chunk === 'string' ? Buffer.from(chunk, 'utf8') : chunk);
    };

    const onEnd = () => {
      cleanup();
      resolvePromise(received ? Buffer.concat(chunks).toString('utf8') : null);
    };

    const onError = (error: Error) => {
      cleanup();
      reject(new SourceError('<stdin>', `Failed to read standard input: ${error.message}`, { cause: error }));
    };

    stream.on('data', onData);
    stream.on('end', onEnd);
    stream.on('error', onError);
  });
}
