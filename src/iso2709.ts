/**
 * ISO 2709 (binary MARC) encoding of bibliographic records, UTF-8.
 */

import { ConversionError } from './errors.js';
import type { DataField, MarcRecord } from './types.js';

export const FIELD_TERMINATOR = '\x1e';
export const RECORD_TERMINATOR = '\x1d';
export const SUBFIELD_DELIMITER = '\x1f';

const LEADER_LENGTH = 24;
const DIRECTORY_ENTRY_LENGTH = 12;
const MAX_FIELD_LENGTH = 9999;
const MAX_RECORD_LENGTH = 99999;

function pad(value: number, width: number): string {
  return value.toString().padStart(width, '0');
}

function fieldData(field: DataField): string {
  const subfields = field.subfields.map(sub => `${SUBFIELD_DELIMITER}${sub.code}${sub.value}`).join('');
  return `${field.ind1}${field.ind2}${subfields}${FIELD_TERMINATOR}`;
}

export function encodeRecord(record: MarcRecord): Buffer {
  const fields: Array<{ tag: string; data: Buffer }> = [
    ...record.controlFields.map(field => ({ tag: field.tag, data: Buffer.from(`${field.value}${FIELD_TERMINATOR}`, 'utf8') })),
    ...record.dataFields.map(field => ({ tag: field.tag, data: Buffer.from(fieldData(field), 'utf8') }))
  ];

  let directory = '';
  let offset = 0;
  for (const field of fields) {
    if (field.data.length > MAX_FIELD_LENGTH) {
      throw new ConversionError(`Field ${field.tag} is too long for ISO 2709 (${field.data.length} bytes)`);
    }
    directory += `${field.tag}${pad(field.data.length, 4)}${pad(offset, 5)}`;
    offset += field.data.length;
  }
  directory += FIELD_TERMINATOR;

  const baseAddress = LEADER_LENGTH + directory.length;
  const recordLength = baseAddress + offset + 1;
  if (recordLength > MAX_RECORD_LENGTH) {
    throw new ConversionError(`Record is too long for ISO 2709 (${recordLength} bytes)`);
  }

  const template = record.leader.padEnd(LEADER_LENGTH, ' ').slice(0, LEADER_LENGTH);
  const leader =
    pad(recordLength, 5) +
    template.slice(5, 9) +
    'a' +
    '22' +
    pad(baseAddress, 5) +
    template.slice(17, 20) +
    '4500';

  return Buffer.concat([
    Buffer.from(leader + directory, 'ascii'),
    ...fields.map(field => field.data),
    Buffer.from(RECORD_TERMINATOR, 'ascii')
  ]);
}

export function encodeCollection(records: MarcRecord[]): Buffer {
  return Buffer.concat(records.map(encodeRecord));
}

/**
 * Decode one ISO 2709 record. Tags 001-009 are read as control fields.
 */
export function decodeRecord(bytes: Buffer): MarcRecord {
  const leader = bytes.subarray(0, LEADER_LENGTH).toString('ascii');
  if (leader.length !== LEADER_LENGTH) {
    throw new Error('Truncated record: no leader');
  }
  const baseAddress = parseInt(leader.slice(12, 17), 10);
  const directory = bytes.subarray(LEADER_LENGTH, baseAddress - 1).toString('ascii');

  const record: MarcRecord = { leader, controlFields: [], dataFields: [] };
  for (let i = 0; i + DIRECTORY_ENTRY_LENGTH <= directory.length; i += DIRECTORY_ENTRY_LENGTH) {
    const tag = directory.slice(i, i + 3);
    const length = parseInt(directory.slice(i + 3, i + 7), 10);
    const start = parseInt(directory.slice(i + 7, i + 12), 10);
    const data = bytes.subarray(baseAddress + start, baseAddress + start + length - 1).toString('utf8');

    if (/^00\d$/.test(tag)) {
      record.controlFields.push({ tag, value: data });
      continue;
    }
    const [indicators, ...subfields] = data.split(SUBFIELD_DELIMITER);
    record.dataFields.push({
      tag,
      ind1: indicators.charAt(0) || ' ',
      ind2: indicators.charAt(1) || ' ',
      subfields: subfields.map(sub => ({ code: sub.charAt(0), value: sub.slice(1) }))
    });
  }
  return record;
}

/** Split concatenated records on the record terminator. */
export function decodeCollection(bytes: Buffer): MarcRecord[] {
  const records: MarcRecord[] = [];
  let start = 0;
  let end = bytes.indexOf(RECORD_TERMINATOR.charCodeAt(0), start);
  while (end !== -1) {
    records.push(decodeRecord(bytes.subarray(start, end + 1)));
    start = end + 1;
    end = bytes.indexOf(RECORD_TERMINATOR.charCodeAt(0), start);
  }
  return records;
}
