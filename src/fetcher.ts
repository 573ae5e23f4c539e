import type * as RDF from '@rdfjs/types';
import { DereferenceError, errorMessage } from './errors.js';
import { acceptHeader, formatForMediaType, parseRdf } from './formats.js';

export interface FetchedDocument {
  url: string;
  contentType: string | null;
  body: string;
}

export interface FetchOptions {
  /** Milliseconds before the request is aborted. */
  timeout: number;
  accept?: string;
}

/**
 * GET a URL with a hard timeout. Redirects are followed; any non-2xx status
 * is an error.
 */
export async function fetchDocument(url: string, options: FetchOptions): Promise<FetchedDocument> {
  const controller = new AbortController();
  const timer = setTimeout(() => controller.abort(), options.timeout);

  try {
    const response = await fetch(url, {
      signal: controller.signal,
      redirect: 'follow',
      headers: {
        Accept: options.accept ?? acceptHeader(),
        'User-Agent': 'bf2marc/0.1'
      }
    });

    if (!response.ok) {
      throw new Error(`HTTP ${response.status}: ${response.statusText}`);
    }

    return {
      url: response.url || url,
      contentType: response.headers.get('content-type'),
      body: await response.text()
    };
  } catch (error) {
    if (controller.signal.aborted) {
      throw new Error(`Request timeout after ${options.timeout}ms`);
    }
    throw error;
  } finally {
    clearTimeout(timer);
  }
}

/**
 * Source of triples describing an external resource.
 */
export interface RdfFetcher {
  fetchQuads(iri: string, options: FetchOptions): Promise<RDF.Quad[]>;
}

/**
 * Dereferences an IRI over HTTP with content negotiation: the response's
 * Content-Type picks the parser.
 */
export class HttpRdfFetcher implements RdfFetcher {
  async fetchQuads(iri: string, options: FetchOptions): Promise<RDF.Quad[]> {
    try {
      const document = await fetchDocument(iri, options);
      const format = formatForMediaType(document.contentType);
      if (!format) {
        throw new Error(`Unsupported content type: ${document.contentType ?? 'none'}`);
      }
      return await parseRdf(document.body, format, document.url);
    } catch (error) {
      throw new DereferenceError(iri, errorMessage(error), { cause: error });
    }
  }
}
