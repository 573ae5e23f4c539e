import { afterEach, describe, it, expect, vi } from 'vitest';
import { DereferenceError } from '../errors.js';
import { HttpRdfFetcher } from '../fetcher.js';
import { DescriptionExtractor } from '../extractor.js';
import { loadQuery } from '../query.js';
import { DereferenceResolver, dereferenceCandidates } from '../resolver.js';
import { Striper } from '../striper.js';
import { EX, FakeFetcher, RDFS_LABEL, RecordingLogger, descriptionOf, turtleStore } from './fixtures.js';

const CLASS_X = `${EX}ClassX`;
const config = new Map([[CLASS_X, ['http://example.org/auth/']]]);

const GRAPH = `
ex:w a ex:ClassX ;
  ex:p <http://example.org/auth/123>, <http://other.org/123> ;
  bf:hasInstance ex:i .
ex:i ex:p <http://example.org/auth/456> .
`;

describe('dereferenceCandidates', () => {
  it('selects objects under a configured prefix of the subject class', async () => {
    const store = await turtleStore(GRAPH);

    expect(dereferenceCandidates(descriptionOf(store, 'w', 'i'), config)).toEqual(['http://example.org/auth/123']);
  });

  it('lists an IRI once however many subjects point at it', async () => {
    const store = await turtleStore(`
      ex:w a ex:ClassX ; ex:p <http://example.org/auth/1> .
      ex:i a ex:ClassX ; ex:p <http://example.org/auth/1> .
    `);

    expect(dereferenceCandidates(descriptionOf(store, 'w', 'i'), config)).toEqual(['http://example.org/auth/1']);
  });
});

describe('DereferenceResolver', () => {
  it('adds fetched triples to a private view only', async () => {
    const store = (await turtleStore(GRAPH)).freeze();
    const fetcher = new FakeFetcher({
      'http://example.org/auth/123': '<http://example.org/auth/123> rdfs:label "Authority 123" .'
    });
    const resolver = new DereferenceResolver({ fetcher });

    const view = await resolver.resolve(descriptionOf(store, 'w', 'i'), config);

    expect(fetcher.requests).toEqual(['http://example.org/auth/123']);
    expect(view.dereferenced).toEqual(['http://example.org/auth/123']);
    expect(view.graph.match(null, null, null).map(triple => triple.predicate.value)).toContain(RDFS_LABEL);
    expect(store.match(null, null, null).map(triple => triple.predicate.value)).not.toContain(RDFS_LABEL);
  });

  it('leaves the striped document of another description unchanged', async () => {
    const store = (await turtleStore(`
      ex:w1 a bf:Work, ex:ClassX ; ex:p <http://example.org/auth/1> ; bf:hasInstance ex:i1 .
      ex:i1 a bf:Instance .
      ex:w2 a bf:Work, ex:ClassX ; ex:p ex:local ; bf:hasInstance ex:i2 .
      ex:i2 a bf:Instance .
    `)).freeze();
    const descriptions = new DescriptionExtractor(await loadQuery()).extract(store);
    const [first, second] = [`${EX}w1`, `${EX}w2`].map(work => {
      const found = descriptions.find(description => description.work.value === work);
      if (!found) {
        throw new Error(`no description for ${work}`);
      }
      return found;
    });
    const striper = new Striper();
    const documents = { 'http://example.org/auth/1': '<http://example.org/auth/1> rdfs:label "One" .' };

    const alone = await new DereferenceResolver({ fetcher: new FakeFetcher(documents) }).resolve(second, config);
    const expected = striper.stripe(second, alone.graph).xml;

    const fetcher = new FakeFetcher(documents);
    const resolver = new DereferenceResolver({ fetcher });
    const firstView = await resolver.resolve(first, config);
    const secondView = await resolver.resolve(second, config);

    expect(fetcher.requests).toEqual(['http://example.org/auth/1']);
    expect(firstView.graph.overlay.size).toBe(1);
    expect(secondView.graph.overlay.size).toBe(0);
    expect(striper.stripe(second, secondView.graph).xml).toBe(expected);
  });

  it('records a failed lookup and carries on', async () => {
    const store = await turtleStore(GRAPH);
    const logger = new RecordingLogger();
    const resolver = new DereferenceResolver({ fetcher: new FakeFetcher(), logger });

    const view = await resolver.resolve(descriptionOf(store, 'w', 'i'), config);

    expect(view.dereferenced).toEqual([]);
    expect(view.failures).toEqual([{ iri: 'http://example.org/auth/123', message: 'HTTP 404: Not Found' }]);
    expect(logger.warnings).toEqual(['Failed to dereference http://example.org/auth/123: HTTP 404: Not Found']);
    expect(view.graph.size).toBe(store.size);
  });

  it('does nothing without configuration', async () => {
    const store = await turtleStore(GRAPH);
    const fetcher = new FakeFetcher();

    const view = await new DereferenceResolver({ fetcher }).resolve(descriptionOf(store, 'w', 'i'), new Map());

    expect(fetcher.requests).toEqual([]);
    expect(view.graph.overlay.size).toBe(0);
  });
});

describe('HttpRdfFetcher', () => {
  afterEach(() => {
    vi.unstubAllGlobals();
  });

  it('parses the negotiated content type', async () => {
    const fetchMock = vi.fn(async () =>
      new Response('<http://example.org/auth/1> <http://www.w3.org/2000/01/rdf-schema#label> "One" .', {
        status: 200,
        headers: { 'content-type': 'text/turtle; charset=utf-8' }
      })
    );
    vi.stubGlobal('fetch', fetchMock);

    const quads = await new HttpRdfFetcher().fetchQuads('http://example.org/auth/1', { timeout: 1000 });

    expect(fetchMock).toHaveBeenCalledTimes(1);
    expect(quads).toHaveLength(1);
    expect(quads[0].object.value).toBe('One');
  });

  it('wraps failures in a DereferenceError', async () => {
    vi.stubGlobal('fetch', vi.fn(async () => new Response('<html></html>', { status: 200, headers: { 'content-type': 'text/html' } })));

    const attempt = new HttpRdfFetcher().fetchQuads('http://example.org/auth/1', { timeout: 1000 });

    await expect(attempt).rejects.toBeInstanceOf(DereferenceError);
    await expect(attempt).rejects.toThrow('Unsupported content type: text/html');
  });

  it('gives up on a lookup that does not answer in time', async () => {
    vi.stubGlobal(
      'fetch',
      vi.fn(
        (_input: string | URL | Request, init?: RequestInit) =>
          new Promise<Response>((_resolve, reject) => {
            init?.signal?.addEventListener('abort', () => reject(new Error('aborted')));
          })
      )
    );
    const store = await turtleStore(GRAPH);
    const resolver = new DereferenceResolver({ timeout: 50 });

    const view = await resolver.resolve(descriptionOf(store, 'w', 'i'), config);

    expect(view.dereferenced).toEqual([]);
    expect(view.failures).toEqual([{ iri: 'http://example.org/auth/123', message: 'Request timeout after 50ms' }]);
  });

  it('turns a non-2xx status into an error', async () => {
    vi.stubGlobal('fetch', vi.fn(async () => new Response('gone', { status: 410, statusText: 'Gone' })));

    await expect(new HttpRdfFetcher().fetchQuads('http://example.org/auth/1', { timeout: 1000 })).rejects.toThrow('HTTP 410: Gone');
  });
});
