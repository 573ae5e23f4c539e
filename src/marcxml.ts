import { ConversionError } from './errors.js';
import { FIELD_TERMINATOR, RECORD_TERMINATOR, SUBFIELD_DELIMITER } from './iso2709.js';
import { buildXml, parseXml, type XmlBuildElement, type XmlElement } from './xml.js';
import type { ControlField, DataField, MarcRecord, SubField } from './types.js';

export const MARC_NS = 'http://www.loc.gov/MARC21/slim';

const STRUCTURAL_CHARACTERS = new RegExp(`[${FIELD_TERMINATOR}${RECORD_TERMINATOR}${SUBFIELD_DELIMITER}]`);

function localName(element: XmlElement): string {
  const colon = element.name.indexOf(':');
  return colon === -1 ? element.name : element.name.slice(colon + 1);
}

function childrenNamed(element: XmlElement, name: string): XmlElement[] {
  return element.children.filter(child => localName(child) === name);
}

function checkContent(value: string, where: string): string {
  if (STRUCTURAL_CHARACTERS.test(value)) {
    throw new ConversionError(`${where} contains a MARC delimiter character`);
  }
  return value;
}

/**
 * Turn a parsed `record` element into a MARC record, rejecting anything
 * that would not survive serialisation.
 */
export function recordFromElement(element: XmlElement): MarcRecord {
  if (localName(element) !== 'record') {
    throw new ConversionError(`Expected a MARC record element, found <${element.name}>`);
  }

  const leaders = childrenNamed(element, 'leader');
  if (leaders.length !== 1) {
    throw new ConversionError(`Record must have exactly one leader, found ${leaders.length}`);
  }
  const leader = leaders[0].text;
  if (leader.length !== 24) {
    throw new ConversionError(`Leader must be 24 characters, found ${leader.length}`);
  }

  const controlFields: ControlField[] = childrenNamed(element, 'controlfield').map(field => {
    const tag = field.attributes.tag ?? '';
    if (!/^00[1-9]$/.test(tag)) {
      throw new ConversionError(`Invalid control field tag "${tag}"`);
    }
    return { tag, value: checkContent(field.text, `Control field ${tag}`) };
  });

  const dataFields: DataField[] = childrenNamed(element, 'datafield').map(field => {
    const tag = field.attributes.tag ?? '';
    if (!/^[0-9A-Za-z]{3}$/.test(tag) || /^00\d$/.test(tag)) {
      throw new ConversionError(`Invalid data field tag "${tag}"`);
    }
    const ind1 = field.attributes.ind1 ?? ' ';
    const ind2 = field.attributes.ind2 ?? ' ';
    if (ind1.length !== 1 || ind2.length !== 1) {
      throw new ConversionError(`Field ${tag}: indicators must be single characters`);
    }

    const subfields: SubField[] = childrenNamed(field, 'subfield').map(sub => {
      const code = sub.attributes.code ?? '';
      if (code.length !== 1) {
        throw new ConversionError(`Field ${tag}: invalid subfield code "${code}"`);
      }
      return { code, value: checkContent(sub.text, `Field ${tag} $${code}`) };
    });
    if (subfields.length === 0) {
      throw new ConversionError(`Field ${tag} has no subfields`);
    }
    return { tag, ind1, ind2, subfields };
  });

  return { leader, controlFields, dataFields };
}

export function recordElement(record: MarcRecord): XmlBuildElement {
  return {
    'marc:leader': [{ _: record.leader }],
    'marc:controlfield': record.controlFields.map(field => ({ $: { tag: field.tag }, _: field.value })),
    'marc:datafield': record.dataFields.map(field => ({
      $: { tag: field.tag, ind1: field.ind1, ind2: field.ind2 },
      'marc:subfield': field.subfields.map(sub => ({ $: { code: sub.code }, _: sub.value }))
    }))
  };
}

/** A standalone MARCXML record document. */
export function renderRecord(record: MarcRecord): string {
  const root = recordElement(record);
  root.$ = { 'xmlns:marc': MARC_NS };
  return buildXml('marc:record', root);
}

export function serializeCollection(records: MarcRecord[]): string {
  const root: XmlBuildElement = {
    $: { 'xmlns:marc': MARC_NS },
    'marc:record': records.map(recordElement)
  };
  return buildXml('marc:collection', root);
}

/**
 * Read a MARCXML collection (or a single record) back into records.
 */
export async function parseCollection(xml: string): Promise<MarcRecord[]> {
  const root = await parseXml(xml.normalize('NFC'));
  if (localName(root) === 'record') {
    return [recordFromElement(root)];
  }
  if (localName(root) !== 'collection') {
    throw new ConversionError(`Expected a MARC collection, found <${root.name}>`);
  }
  return childrenNamed(root, 'record').map(recordFromElement);
}
