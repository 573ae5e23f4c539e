import { describe, it, expect } from 'vitest';
import { ConfigurationError, ConversionError } from '../errors.js';
import { parseCollection } from '../marcxml.js';
import { compileRules, loadRules } from '../rules.js';
import { Striper } from '../striper.js';
import { RecordTransformEngine } from '../transformer.js';
import { BF, BOOK, EX, descriptionOf, turtleStore } from './fixtures.js';

const LEADER = '00000nam a2200000uu 4500';

async function stripedBook(body: string = BOOK) {
  const store = await turtleStore(body);
  return new Striper().stripe(descriptionOf(store, 'work1', 'instance1'), store);
}

describe('compileRules', () => {
  it('loads the bundled rule set', async () => {
    const rules = await loadRules();

    expect(rules.leader).toBe(LEADER);
    expect(rules.required.map(path => path.source)).toEqual(['$instance/bf:title']);
    expect(rules.dataFields.map(rule => rule.tag)).toContain('245');
  });

  it('expands prefixed steps to full IRIs', () => {
    const rules = compileRules({
      version: 1,
      namespaces: { bf: BF },
      leader: LEADER,
      required: ['$work/bf:subject/*/@rdf:about'],
      dataFields: []
    });

    expect(rules.required[0]).toEqual({
      source: '$work/bf:subject/*/@rdf:about',
      root: 'work',
      steps: [`${BF}subject`, '*'],
      attribute: 'http://www.w3.org/1999/02/22-rdf-syntax-ns#about'
    });
  });

  it('rejects rules that cannot be applied', () => {
    const base = { version: 1, namespaces: { bf: BF }, leader: LEADER };

    expect(() => compileRules({ ...base, leader: 'short' })).toThrow(ConfigurationError);
    expect(() => compileRules({ ...base, required: ['bf:title'] })).toThrow('path must start at $work or $instance');
    expect(() => compileRules({ ...base, required: ['$instance/dc:title'] })).toThrow(ConfigurationError);
    expect(() =>
      compileRules({ ...base, dataFields: [{ tag: '001', subfields: [{ code: 'a', select: 'bf:code' }] }] })
    ).toThrow('001 is a control field tag');
  });
});

describe('RecordTransformEngine', () => {
  it('maps a description onto MARC fields', async () => {
    const engine = await RecordTransformEngine.fromFile();

    const document = await engine.transform(await stripedBook());
    expect(document).not.toBeNull();
    const [record] = await parseCollection(document ?? '');

    expect(record.leader).toBe(LEADER);
    expect(record.controlFields).toEqual([
      { tag: '001', value: `${EX}instance1` },
      { tag: '008', value: '000000s        xx                  und d' }
    ]);
    expect(record.dataFields).toEqual([
      { tag: '020', ind1: ' ', ind2: ' ', subfields: [{ code: 'a', value: '9780000000002' }] },
      { tag: '041', ind1: '0', ind2: ' ', subfields: [{ code: 'a', value: 'eng' }] },
      {
        tag: '245',
        ind1: '0',
        ind2: '0',
        subfields: [
          { code: 'a', value: 'A test book' },
          { code: 'b', value: 'with a subtitle' },
          { code: 'c', value: 'by A. Author' }
        ]
      },
      {
        tag: '650',
        ind1: ' ',
        ind2: '0',
        subfields: [
          { code: 'a', value: 'Cataloging' },
          { code: '0', value: `${EX}topic1` }
        ]
      }
    ]);
  });

  it('yields no record when a required path is missing', async () => {
    const engine = await RecordTransformEngine.fromFile();
    const striped = await stripedBook(`
      ex:work1 a bf:Work ; bf:hasInstance ex:instance1 .
      ex:instance1 a bf:Instance ; bf:responsibilityStatement "Untitled" .
    `);

    expect(await engine.transform(striped)).toBeNull();
  });

  it('matches a step by rdf:type as well as by element name', async () => {
    const engine = new RecordTransformEngine(
      compileRules({
        version: 1,
        namespaces: { bf: BF, rdfs: 'http://www.w3.org/2000/01/rdf-schema#' },
        leader: LEADER,
        dataFields: [{ tag: '500', context: '$instance/bf:note/bf:Note', subfields: [{ code: 'a', select: 'rdfs:label' }] }]
      })
    );
    const striped = await stripedBook(`
      ex:work1 bf:hasInstance ex:instance1 .
      ex:instance1 bf:note [ a bf:Note, bf:AcquisitionNote ; rdfs:label "Gift of the author" ] .
    `);

    const [record] = await parseCollection((await engine.transform(striped)) ?? '');

    expect(record.dataFields).toEqual([
      { tag: '500', ind1: ' ', ind2: ' ', subfields: [{ code: 'a', value: 'Gift of the author' }] }
    ]);
  });

  it('rejects a document that is not a striped description', async () => {
    const engine = await RecordTransformEngine.fromFile();

    await expect(engine.transform('<record/>')).rejects.toBeInstanceOf(ConversionError);
    await expect(engine.transform('not xml at all <')).rejects.toThrow('Failed to parse striped document');
    await expect(
      engine.transform(
        '<rdf:RDF xmlns:rdf="http://www.w3.org/1999/02/22-rdf-syntax-ns#"><rdf:Description rdf:about="http://example.org/w"/></rdf:RDF>'
      )
    ).rejects.toThrow('found 1 root node(s)');
  });
});
