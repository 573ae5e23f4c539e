import { ConversionError, errorMessage } from './errors.js';
import { loadRules, type CompiledPath, type DataFieldRule, type RuleSet } from './rules.js';
import { RDF_NS, type StripedDocument } from './striper.js';
import { renderRecord } from './marcxml.js';
import { parseXml, type XmlElement } from './xml.js';
import type { ControlField, DataField, SubField } from './types.js';

const XML_NS = 'http://www.w3.org/XML/1998/namespace';

const RDF_ABOUT = `${RDF_NS}about`;
const RDF_RESOURCE = `${RDF_NS}resource`;
const RDF_NODE_ID = `${RDF_NS}nodeID`;
const RDF_TYPE = `${RDF_NS}type`;

/** MARCXML of one record, or null when the description yields no record. */
export type TransformOutcome = string | null;

/**
 * Striped document after parsing: prefixes resolved, Work and Instance
 * located.
 */
class StripedTree {
  private readonly namespaces = new Map<string, string>([['xml', XML_NS]]);
  readonly work: XmlElement;
  readonly instance: XmlElement;

  constructor(root: XmlElement) {
    for (const [name, value] of Object.entries(root.attributes)) {
      if (name.startsWith('xmlns:')) {
        this.namespaces.set(name.slice('xmlns:'.length), value);
      }
    }
    if (this.expand(root.name) !== `${RDF_NS}RDF`) {
      throw new ConversionError(`Striped document root must be rdf:RDF, found <${root.name}>`);
    }
    if (root.children.length !== 2) {
      throw new ConversionError(`Striped document must hold a Work and an Instance, found ${root.children.length} root node(s)`);
    }
    const [work, instance] = root.children;
    for (const node of [work, instance]) {
      if (this.attribute(node, RDF_ABOUT) === undefined && this.attribute(node, RDF_NODE_ID) === undefined) {
        throw new ConversionError(`Root node <${node.name}> has neither rdf:about nor rdf:nodeID`);
      }
    }
    this.work = work;
    this.instance = instance;
  }

  expand(qname: string): string | undefined {
    const colon = qname.indexOf(':');
    if (colon < 1) {
      return undefined;
    }
    const namespace = this.namespaces.get(qname.slice(0, colon));
    return namespace === undefined ? undefined : namespace + qname.slice(colon + 1);
  }

  attribute(element: XmlElement, name: string): string | undefined {
    for (const [key, value] of Object.entries(element.attributes)) {
      if (this.expand(key) === name) {
        return value;
      }
    }
    return undefined;
  }

  /** An element matches a step by its own name or, for resources, by any rdf:type. */
  matches(element: XmlElement, step: string): boolean {
    if (step === '*' || this.expand(element.name) === step) {
      return true;
    }
    return element.children.some(child =>
      this.expand(child.name) === RDF_TYPE && this.attribute(child, RDF_RESOURCE) === step
    );
  }

  elements(path: CompiledPath, context: XmlElement[]): XmlElement[] {
    let current = path.root === 'work' ? [this.work] : path.root === 'instance' ? [this.instance] : context;
    for (const step of path.steps) {
      current = current.flatMap(element => element.children.filter(child => this.matches(child, step)));
    }
    return current;
  }

  values(path: CompiledPath, context: XmlElement[]): string[] {
    const elements = this.elements(path, context);
    const attribute = path.attribute;
    const raw = attribute
      ? elements.map(element => this.attribute(element, attribute))
      : elements.map(element => this.value(element));
    return raw
      .filter((value): value is string => value !== undefined)
      .map(value => value.trim())
      .filter(value => value !== '');
  }

  private value(element: XmlElement): string | undefined {
    if (element.text.trim() !== '') {
      return element.text;
    }
    return this.attribute(element, RDF_RESOURCE) ?? this.attribute(element, RDF_ABOUT);
  }
}

/**
 * Applies a declarative rule set to a striped document and renders the
 * result as a MARCXML record.
 */
export class RecordTransformEngine {
  constructor(private readonly rules: RuleSet) {}

  static async fromFile(path?: string): Promise<RecordTransformEngine> {
    return new RecordTransformEngine(await loadRules(path));
  }

  async transform(striped: StripedDocument | string): Promise<TransformOutcome> {
    const xml = typeof striped === 'string' ? striped : striped.xml;

    let root: XmlElement;
    try {
      root = await parseXml(xml);
    } catch (error) {
      throw new ConversionError(`Failed to parse striped document: ${errorMessage(error)}`, { cause: error });
    }
    const tree = new StripedTree(root);

    for (const path of this.rules.required) {
      if (tree.elements(path, []).length === 0) {
        return null;
      }
    }

    const controlFields: ControlField[] = [];
    for (const rule of this.rules.controlFields) {
      const value = rule.select.map(path => tree.values(path, [])).find(found => found.length > 0)?.[0] ?? rule.value;
      if (value !== undefined) {
        controlFields.push({ tag: rule.tag, value });
      }
    }

    const dataFields: DataField[] = this.rules.dataFields
      .flatMap(rule => this.dataFields(tree, rule))
      .map((field, index) => ({ field, index }))
      .sort((a, b) => (a.field.tag === b.field.tag ? a.index - b.index : a.field.tag < b.field.tag ? -1 : 1))
      .map(({ field }) => field);

    if (controlFields.length === 0 && dataFields.length === 0) {
      return null;
    }

    return renderRecord({ leader: this.rules.leader, controlFields, dataFields });
  }

  private dataFields(tree: StripedTree, rule: DataFieldRule): DataField[] {
    const contexts = rule.context ? tree.elements(rule.context, []) : [tree.instance];
    const selected = rule.first ? contexts.slice(0, 1) : contexts;
    const fields: DataField[] = [];

    for (const context of selected) {
      const subfields: SubField[] = [];
      for (const sub of rule.subfields) {
        const values = sub.select.map(path => tree.values(path, [context])).find(found => found.length > 0) ?? [];
        for (const value of sub.first ? values.slice(0, 1) : values) {
          subfields.push({ code: sub.code, value: `${sub.prefix}${value}${sub.suffix}` });
        }
      }
      if (subfields.length > 0) {
        fields.push({ tag: rule.tag, ind1: rule.ind1, ind2: rule.ind2, subfields });
      }
    }

    return fields;
  }
}
