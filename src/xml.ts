import { Builder, parseStringPromise } from 'xml2js';

/**
 * Object shape consumed by the xml2js builder: `$` holds attributes, `_`
 * text, every other key a list of child elements of that name. Children are
 * written in key order.
 */
export interface XmlBuildElement {
  $?: Record<string, string>;
  _?: string;
  [child: string]: XmlBuildElement[] | Record<string, string> | string | undefined;
}

/** Parsed element, children in document order. */
export interface XmlElement {
  name: string;
  attributes: Record<string, string>;
  text: string;
  children: XmlElement[];
}

export function buildXml(rootName: string, root: XmlBuildElement, options: { headless?: boolean } = {}): string {
  const builder = new Builder({
    headless: options.headless ?? false,
    xmldec: { version: '1.0', encoding: 'UTF-8' },
    renderOpts: { pretty: true, indent: '  ', newline: '\n' }
  });
  return builder.buildObject({ [rootName]: root });
}

/**
 * Parse an XML document into a tree of elements that keeps the document
 * order of children.
 */
export async function parseXml(text: string): Promise<XmlElement> {
  const result: unknown = await parseStringPromise(text, {
    explicitRoot: true,
    explicitArray: true,
    explicitCharkey: true,
    explicitChildren: true,
    preserveChildrenOrder: true
  });

  if (!isRecord(result)) {
    throw new Error('XML document has no root element');
  }
  const names = Object.keys(result);
  if (names.length !== 1) {
    throw new Error('XML document has no root element');
  }
  return toElement(names[0], result[names[0]]);
}

function toElement(name: string, value: unknown): XmlElement {
  if (typeof value === 'string') {
    return { name, attributes: {}, text: value, children: [] };
  }
  if (!isRecord(value)) {
    throw new Error(`Unexpected content in <${name}>`);
  }

  const attributes: Record<string, string> = {};
  if (isRecord(value.$)) {
    for (const [key, attribute] of Object.entries(value.$)) {
      if (typeof attribute === 'string') {
        attributes[key] = attribute;
      }
    }
  }

  const children: XmlElement[] = [];
  if (Array.isArray(value.$$)) {
    for (const child of value.$$) {
      const childName = isRecord(child) ? child['#name'] : undefined;
      if (typeof childName !== 'string') {
        throw new Error(`Unnamed child element in <${name}>`);
      }
      children.push(toElement(childName, child));
    }
  }

  return {
    name,
    attributes,
    text: typeof value._ === 'string' ? value._ : '',
    children
  };
}

export function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}
