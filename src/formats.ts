import { DataFactory, Parser } from 'n3';
import { RdfXmlParser } from 'rdfxml-streaming-parser';
import type * as RDF from '@rdfjs/types';
import type { RdfFormat } from './types.js';

const { namedNode, blankNode, literal, quad } = DataFactory;

interface FormatInfo {
  mediaTypes: string[];
}

export const RDF_FORMATS: Record<RdfFormat, FormatInfo> = {
  rdfxml: { mediaTypes: ['application/rdf+xml', 'application/xml', 'text/xml'] },
  ntriples: { mediaTypes: ['application/n-triples', 'text/plain'] },
  turtle: { mediaTypes: ['text/turtle', 'application/x-turtle'] },
  rdfjson: { mediaTypes: ['application/rdf+json', 'application/json'] },
  nquads: { mediaTypes: ['application/n-quads'] },
  trig: { mediaTypes: ['application/trig'] }
};

export const DEFAULT_FORMAT: RdfFormat = 'rdfxml';

export function isRdfFormat(name: string): name is RdfFormat {
  return Object.prototype.hasOwnProperty.call(RDF_FORMATS, name);
}

/** Accept header listing every format we can parse, preferred first. */
export function acceptHeader(): string {
  return [
    'application/rdf+xml',
    'text/turtle;q=0.9',
    'application/n-triples;q=0.8',
    'application/n-quads;q=0.7',
    'application/trig;q=0.7',
    'application/rdf+json;q=0.6',
    '*/*;q=0.1'
  ].join(', ');
}

/**
 * Map a Content-Type header to a format, ignoring parameters such as charset.
 */
export function formatForMediaType(contentType: string | null | undefined): RdfFormat | undefined {
  if (!contentType) {
    return undefined;
  }
  const mediaType = contentType.split(';')[0].trim().toLowerCase();
  for (const [name, info] of Object.entries(RDF_FORMATS)) {
    if (info.mediaTypes.includes(mediaType) && isRdfFormat(name)) {
      return name;
    }
  }
  return undefined;
}

const N3_FORMATS: Partial<Record<RdfFormat, string>> = {
  ntriples: 'N-Triples',
  turtle: 'Turtle',
  nquads: 'N-Quads',
  trig: 'TriG'
};

/**
 * Parse an RDF document. Blank nodes are given labels that are unique to this
 * call, so documents parsed separately never share a blank node by accident.
 */
export async function parseRdf(text: string, format: RdfFormat, baseIRI?: string): Promise<RDF.Quad[]> {
  switch (format) {
    case 'rdfxml':
      return relabelBlankNodes(await parseRdfXml(text, baseIRI));
    case 'rdfjson':
      return parseRdfJson(text);
    default: {
      const parser = new Parser({ format: N3_FORMATS[format], baseIRI });
      return parser.parse(text);
    }
  }
}

function parseRdfXml(text: string, baseIRI?: string): Promise<RDF.Quad[]> {
  return new Promise((resolve, reject) => {
    const quads: RDF.Quad[] = [];
    const parser = new RdfXmlParser({ baseIRI });

    parser.on('data', (data: RDF.Quad) => {
      quads.push(data);
    });
    parser.on('error', reject);
    parser.on('end', () => resolve(quads));

    parser.write(text);
    parser.end();
  });
}

function relabelBlankNodes(quads: RDF.Quad[]): RDF.Quad[] {
  const labels = new Map<string, RDF.BlankNode>();
  const fresh = (node: RDF.BlankNode): RDF.BlankNode => {
    let relabelled = labels.get(node.value);
    if (!relabelled) {
      relabelled = blankNode();
      labels.set(node.value, relabelled);
    }
    return relabelled;
  };

  return quads.map(q => {
    const subject = q.subject.termType === 'BlankNode' ? fresh(q.subject) : q.subject;
    const object = q.object.termType === 'BlankNode' ? fresh(q.object) : q.object;
    return quad(subject, q.predicate, object, q.graph);
  });
}

/**
 * RDF/JSON: `{ subject: { predicate: [ { type, value, lang?, datatype? } ] } }`.
 */
export function parseRdfJson(text: string): RDF.Quad[] {
  let document: unknown;
  try {
    document = JSON.parse(text);
  } catch (error) {
    throw new Error(`Invalid RDF/JSON: ${error instanceof Error ? error.message : 'Unknown error'}`);
  }
  if (!isObject(document)) {
    throw new Error('Invalid RDF/JSON: top level must be an object');
  }

  const blanks = new Map<string, RDF.BlankNode>();
  const resource = (value: string): RDF.NamedNode | RDF.BlankNode => {
    if (!value.startsWith('_:')) {
      return namedNode(value);
    }
    let node = blanks.get(value);
    if (!node) {
      node = blankNode();
      blanks.set(value, node);
    }
    return node;
  };

  const quads: RDF.Quad[] = [];
  for (const [subjectValue, predicates] of Object.entries(document)) {
    if (!isObject(predicates)) {
      throw new Error(`Invalid RDF/JSON: properties of ${subjectValue} must be an object`);
    }
    const subject = resource(subjectValue);

    for (const [predicateValue, objects] of Object.entries(predicates)) {
      if (!Array.isArray(objects)) {
        throw new Error(`Invalid RDF/JSON: values of ${predicateValue} must be an array`);
      }
      for (const object of objects) {
        if (!isObject(object) || typeof object.value !== 'string') {
          throw new Error(`Invalid RDF/JSON: malformed object of ${predicateValue}`);
        }
        const value = object.value;

        switch (object.type) {
          case 'uri':
            quads.push(quad(subject, namedNode(predicateValue), namedNode(value)));
            break;
          case 'bnode':
            quads.push(quad(subject, namedNode(predicateValue), resource(value.startsWith('_:') ? value : `_:${value}`)));
            break;
          case 'literal': {
            const lang = typeof object.lang === 'string' ? object.lang : undefined;
            const datatype = typeof object.datatype === 'string' ? namedNode(object.datatype) : undefined;
            quads.push(quad(subject, namedNode(predicateValue), literal(value, lang ?? datatype)));
            break;
          }
          default:
            throw new Error(`Invalid RDF/JSON: unknown object type ${String(object.type)}`);
        }
      }
    }
  }
  return quads;
}

function isObject(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}
