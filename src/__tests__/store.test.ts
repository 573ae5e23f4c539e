import { describe, it, expect } from 'vitest';
import { DataFactory } from 'n3';
import { GraphStore, OverlayGraph, termKey, typesOf } from '../store.js';
import { BF, EX, iri } from './fixtures.js';

const { namedNode, literal, quad } = DataFactory;

describe('GraphStore', () => {
  it('stores a triple once however often it is added', () => {
    const store = new GraphStore();
    const triple = quad(iri('a'), iri('p'), literal('x'));

    expect(store.add(triple)).toBe(true);
    expect(store.add(triple)).toBe(false);
    expect(store.size).toBe(1);
  });

  it('collapses named graphs into the default graph', () => {
    const store = new GraphStore([
      quad(iri('a'), iri('p'), iri('b'), iri('graph1')),
      quad(iri('a'), iri('p'), iri('b'), iri('graph2'))
    ]);

    expect(store.size).toBe(1);
    expect(store.match(iri('a'))[0].graph.termType).toBe('DefaultGraph');
  });

  it('refuses additions once frozen', () => {
    const store = new GraphStore().freeze();

    expect(store.isFrozen).toBe(true);
    expect(() => store.add(quad(iri('a'), iri('p'), iri('b')))).toThrow('read-only');
  });
});

describe('OverlayGraph', () => {
  it('reads through to the base and keeps its own additions apart', () => {
    const base = new GraphStore([quad(iri('a'), iri('p'), iri('b'))]).freeze();
    const view = new OverlayGraph(base);

    expect(view.add(quad(iri('a'), iri('p'), iri('b')))).toBe(false);
    expect(view.add(quad(iri('b'), iri('q'), literal('extra')))).toBe(true);

    expect(view.size).toBe(2);
    expect(view.match(iri('b'))).toHaveLength(1);
    expect(base.size).toBe(1);
    expect(base.match(iri('b'))).toHaveLength(0);
  });
});

describe('termKey', () => {
  it('distinguishes term kinds', () => {
    expect(termKey(iri('a'))).toBe(`<${EX}a>`);
    expect(termKey(DataFactory.blankNode('n1'))).toBe('_:n1');
    expect(termKey(literal('chat', 'fr'))).toBe('"chat"@fr');
    expect(termKey(literal('chat'))).toBe('"chat"^^<http://www.w3.org/2001/XMLSchema#string>');
  });
});

describe('typesOf', () => {
  it('returns the named types of a node, sorted', () => {
    const rdfType = namedNode('http://www.w3.org/1999/02/22-rdf-syntax-ns#type');
    const store = new GraphStore([
      quad(iri('w'), rdfType, namedNode(`${BF}Work`)),
      quad(iri('w'), rdfType, namedNode(`${BF}Text`)),
      quad(iri('w'), rdfType, literal('not a class'))
    ]);

    expect(typesOf(store, iri('w'))).toEqual([`${BF}Text`, `${BF}Work`]);
  });
});
