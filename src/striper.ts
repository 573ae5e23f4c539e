import { readFileSync } from 'fs';
import { fileURLToPath } from 'url';
import type * as RDF from '@rdfjs/types';
import { StripingError, errorMessage } from './errors.js';
import { RDF_TYPE, isResource, termKey, typesOf, type GraphView } from './store.js';
import { buildXml, type XmlBuildElement } from './xml.js';
import type { Description } from './types.js';

export const RDF_NS = 'http://www.w3.org/1999/02/22-rdf-syntax-ns#';
const XSD_STRING = 'http://www.w3.org/2001/XMLSchema#string';
const RDF_LANG_STRING = `${RDF_NS}langString`;

const NAMESPACES_FILE = fileURLToPath(new URL('../share/namespaces.json', import.meta.url));

/** Prefix -> namespace IRI. */
export type NamespaceTable = Readonly<Record<string, string>>;

export function loadNamespaces(path: string = NAMESPACES_FILE): NamespaceTable {
  const raw: unknown = JSON.parse(readFileSync(path, 'utf8'));
  if (typeof raw !== 'object' || raw === null || Array.isArray(raw)) {
    throw new Error(`Namespace table ${path} must be a JSON object`);
  }
  const table: Record<string, string> = {};
  for (const [prefix, iri] of Object.entries(raw)) {
    if (typeof iri === 'string') {
      table[prefix] = iri;
    }
  }
  return table;
}

export interface StripedDocument {
  xml: string;
  /** Prefixes declared on the root element. */
  namespaces: Record<string, string>;
}

const NCNAME = /^[\p{L}_][\p{L}\p{N}_.-]*$/u;

/**
 * Split an IRI into namespace and local name at the last `#` or `/`, as long
 * as what follows is a valid XML name.
 */
export function splitIri(iri: string): { namespace: string; local: string } | undefined {
  const cut = Math.max(iri.lastIndexOf('#'), iri.lastIndexOf('/'));
  if (cut < 0 || cut === iri.length - 1) {
    return undefined;
  }
  const local = iri.slice(cut + 1);
  if (!NCNAME.test(local)) {
    return undefined;
  }
  return { namespace: iri.slice(0, cut + 1), local };
}

function compareTerms(a: RDF.Term, b: RDF.Term): number {
  const ka = termKey(a);
  const kb = termKey(b);
  return ka < kb ? -1 : ka > kb ? 1 : 0;
}

/**
 * State of one striping run: namespace prefixes and blank node labels are
 * handed out in traversal order, so equal input gives equal output.
 */
class StripingContext {
  readonly used = new Map<string, string>();
  private readonly prefixByNamespace = new Map<string, string>();
  private readonly blankLabels = new Map<string, string>();
  private generated = 0;

  constructor(readonly graph: GraphView, known: NamespaceTable) {
    for (const [prefix, namespace] of Object.entries(known)) {
      if (!this.prefixByNamespace.has(namespace)) {
        this.prefixByNamespace.set(namespace, prefix);
      }
    }
    this.prefixByNamespace.set(RDF_NS, 'rdf');
  }

  qname(iri: string): string | undefined {
    const parts = splitIri(iri);
    if (!parts) {
      return undefined;
    }
    let prefix = this.prefixByNamespace.get(parts.namespace);
    if (!prefix) {
      do {
        prefix = `ns${++this.generated}`;
      } while ([...this.prefixByNamespace.values()].includes(prefix));
      this.prefixByNamespace.set(parts.namespace, prefix);
    }
    this.used.set(prefix, parts.namespace);
    return `${prefix}:${parts.local}`;
  }

  blankLabel(node: RDF.BlankNode): string {
    let label = this.blankLabels.get(node.value);
    if (!label) {
      label = `b${this.blankLabels.size + 1}`;
      this.blankLabels.set(node.value, label);
    }
    return label;
  }
}

/**
 * Flattens the graph of one description into an alternating
 * resource / property XML tree rooted at the Work and the Instance.
 */
export class Striper {
  private readonly namespaces: NamespaceTable;

  constructor(namespaces?: NamespaceTable) {
    this.namespaces = namespaces ?? loadNamespaces();
  }

  stripe(description: Description, graph: GraphView): StripedDocument {
    const context = new StripingContext(graph, this.namespaces);
    context.used.set('rdf', RDF_NS);

    const root: XmlBuildElement = { $: {} };
    for (const node of [description.work, description.instance]) {
      const [name, element] = this.resource(context, node, new Set());
      const siblings = root[name];
      if (Array.isArray(siblings)) {
        siblings.push(element);
      } else {
        root[name] = [element];
      }
    }

    const declarations: Record<string, string> = {};
    for (const prefix of [...context.used.keys()].sort()) {
      declarations[`xmlns:${prefix}`] = context.used.get(prefix) ?? '';
    }
    root.$ = declarations;

    let xml: string;
    try {
      xml = buildXml('rdf:RDF', root);
    } catch (error) {
      throw new StripingError(`Failed to serialise striped document: ${errorMessage(error)}`, { cause: error });
    }

    return { xml, namespaces: Object.fromEntries(context.used) };
  }

  /**
   * Expand one resource node. `path` holds the nodes being expanded above
   * this one; meeting one of them again yields a reference instead.
   */
  private resource(
    context: StripingContext,
    node: RDF.NamedNode | RDF.BlankNode,
    path: Set<string>
  ): [string, XmlBuildElement] {
    const key = termKey(node);
    path.add(key);

    const types = typesOf(context.graph, node);
    const primary = types.length > 0 ? context.qname(types[0]) : undefined;
    const name = primary ?? 'rdf:Description';

    const element: XmlBuildElement = {
      $: node.termType === 'NamedNode'
        ? { 'rdf:about': node.value }
        : { 'rdf:nodeID': context.blankLabel(node) }
    };

    const extraTypes = primary ? types.slice(1) : types;
    if (extraTypes.length > 0) {
      element['rdf:type'] = extraTypes.map(type => ({ $: { 'rdf:resource': type } }));
    }

    const byPredicate = new Map<string, RDF.Term[]>();
    for (const triple of context.graph.match(node, null, null)) {
      const predicate = triple.predicate.value;
      if (predicate === RDF_TYPE && triple.object.termType === 'NamedNode') {
        continue;
      }
      const objects = byPredicate.get(predicate) ?? [];
      if (!objects.some(existing => existing.equals(triple.object))) {
        objects.push(triple.object);
      }
      byPredicate.set(predicate, objects);
    }

    for (const predicate of [...byPredicate.keys()].sort()) {
      const property = context.qname(predicate);
      if (!property) {
        throw new StripingError(`Cannot express predicate <${predicate}> as an XML element name`);
      }
      const objects = (byPredicate.get(predicate) ?? []).sort(compareTerms);
      const children = objects.map(object => this.property(context, object, path));
      const existing = element[property];
      element[property] = Array.isArray(existing) ? [...existing, ...children] : children;
    }

    path.delete(key);
    return [name, element];
  }

  private property(context: StripingContext, object: RDF.Term, path: Set<string>): XmlBuildElement {
    if (object.termType === 'Literal') {
      const property: XmlBuildElement = { _: object.value };
      if (object.language) {
        property.$ = { 'xml:lang': object.language };
      } else if (object.datatype.value !== XSD_STRING && object.datatype.value !== RDF_LANG_STRING) {
        property.$ = { 'rdf:datatype': object.datatype.value };
      }
      return property;
    }

    if (!isResource(object)) {
      throw new StripingError(`Unsupported object term ${termKey(object)}`);
    }

    const reference: XmlBuildElement = object.termType === 'NamedNode'
      ? { $: { 'rdf:resource': object.value } }
      : { $: { 'rdf:nodeID': context.blankLabel(object) } };

    if (path.has(termKey(object)) || context.graph.match(object, null, null).length === 0) {
      return reference;
    }

    const [name, element] = this.resource(context, object, path);
    const property: XmlBuildElement = {};
    property[name] = [element];
    return property;
  }
}
