import { describe, it, expect } from 'vitest';
import { RecordAssembler } from '../assembler.js';
import { ConversionError } from '../errors.js';
import { decodeCollection } from '../iso2709.js';
import { parseCollection, renderRecord } from '../marcxml.js';
import type { MarcRecord } from '../types.js';
import { RecordingLogger } from './fixtures.js';

function record(id: string, title: string): MarcRecord {
  return {
    leader: '00000nam a2200000uu 4500',
    controlFields: [{ tag: '001', value: id }],
    dataFields: [{ tag: '245', ind1: '0', ind2: '0', subfields: [{ code: 'a', value: title }] }]
  };
}

describe('RecordAssembler', () => {
  it('normalises text to NFC', async () => {
    const built = await new RecordAssembler().buildRecord(renderRecord(record('r1', 'Cafe\u0301')));

    expect(built.dataFields[0].subfields[0].value).toBe('Caf\u00e9');
  });

  it('gives the same record for composed and decomposed input', async () => {
    const assembler = new RecordAssembler();

    const composed = await assembler.buildRecord(renderRecord(record('r1', '\u00c5ngstr\u00f6m')));
    const decomposed = await assembler.buildRecord(renderRecord(record('r1', 'A\u030angstro\u0308m')));

    expect(decomposed).toEqual(composed);
  });

  it('drops an invalid document with a warning and keeps the rest', async () => {
    const logger = new RecordingLogger();
    const assembler = new RecordAssembler(logger);

    const collection = await assembler.assemble([
      renderRecord(record('r1', 'First')),
      renderRecord({ ...record('r2', 'Second'), leader: '0123456789' }),
      renderRecord(record('r3', 'Third'))
    ]);

    expect(collection.records.map(built => built.controlFields[0].value)).toEqual(['r1', 'r3']);
    expect(collection.warnings).toEqual(['Dropped record 2: Leader must be 24 characters, found 10']);
    expect(logger.warnings).toEqual(collection.warnings);
  });

  it('serialises MARCXML and binary MARC', async () => {
    const assembler = new RecordAssembler();
    const collection = { records: [record('r1', 'First'), record('r2', 'Second')], warnings: [] };

    const xml = assembler.serialize(collection, 'marcxml').toString('utf8');
    const binary = assembler.serialize(collection, 'marc');

    expect(xml.endsWith('</marc:collection>\n')).toBe(true);
    expect(await parseCollection(xml)).toEqual(collection.records);
    expect(decodeCollection(binary).map(built => built.controlFields[0].value)).toEqual(['r1', 'r2']);
  });

  it('leaves a record too long for ISO 2709 out of binary output', () => {
    const logger = new RecordingLogger();
    const collection = { records: [record('r1', 'First'), record('r2', 'x'.repeat(10000)), record('r3', 'Third')], warnings: [] };

    const binary = new RecordAssembler(logger).serialize(collection, 'marc');

    expect(decodeCollection(binary).map(built => built.controlFields[0].value)).toEqual(['r1', 'r3']);
    expect(collection.warnings).toEqual(['Dropped record 2: Field 245 is too long for ISO 2709 (10005 bytes)']);
    expect(logger.warnings).toEqual(collection.warnings);
  });

  it('checks that a record fits the chosen output form', () => {
    const assembler = new RecordAssembler();
    const long = record('r1', 'x'.repeat(10000));

    expect(() => assembler.checkWritable(long, 'marcxml')).not.toThrow();
    expect(() => assembler.checkWritable(long, 'marc')).toThrow(ConversionError);
  });
});
