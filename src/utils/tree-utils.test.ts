import { describe, it, expect } from 'vitest';
import {
  attributeSetMatches,
  checkAttributes,
  checkExactAttributes,
  checkOnlyClassIs,
  checkSingleChild,
  childrenWithTags,
  nonBlankChildren,
} from './tree-utils';
import { parseCardMarkup } from './markup-tree';
import { createDiagnosticsStore } from '../stores/diagnosticsStore';
import { bodyHtml, firstElement, withoutLocation } from '../__fixtures__/card-markup';

function setup(markup: string) {
  const tree = parseCardMarkup(bodyHtml(markup));
  const store = createDiagnosticsStore(tree.locate);
  const messages = () => store.getState().diagnostics.map((d) => withoutLocation(d.message));
  return { tree, sink: store.getState(), store, messages };
}

/** Deterministic PRNG so that failures can be replayed */
function mulberry32(seed: number): () => number {
  let a = seed;
  return () => {
    a = (a + 0x6d2b79f5) | 0;
    let t = Math.imul(a ^ (a >>> 15), 1 | a);
    t = (t + Math.imul(t ^ (t >>> 7), 61 | t)) ^ t;
    return ((t ^ (t >>> 14)) >>> 0) / 4294967296;
  };
}

describe('nonBlankChildren', () => {
  it('skips comments and whitespace-only text', () => {
    const { tree } = setup('<div id="x"> <!-- note --> <p>a</p> text </div>');
    const children = nonBlankChildren(firstElement(tree.body, '#x'));

    expect(children).toHaveLength(2);
    expect(children[0].nodeName).toBe('P');
    expect(children[1].textContent).toBe(' text ');
  });
});

describe('attributeSetMatches', () => {
  it('accepts exactly the mandatory set, optionally with optional names', () => {
    expect(attributeSetMatches(['id', 'x'], ['x', 'id'])).toBe(true);
    expect(attributeSetMatches(['id', 'x', 'transform'], ['id', 'x'], ['transform'])).toBe(true);
    expect(attributeSetMatches(['id'], ['id', 'x'])).toBe(false);
    expect(attributeSetMatches(['id', 'x', 'style'], ['id', 'x'], ['transform'])).toBe(false);
  });

  it('holds iff M ⊆ A ⊆ M ∪ O over random sets', () => {
    const universe = ['id', 'x', 'y', 'width', 'height', 'class', 'style', 'transform'];
    const random = mulberry32(20240611);
    const pick = () => universe.filter(() => random() < 0.4);

    for (let i = 0; i < 500; i++) {
      const present = pick();
      const mandatory = pick();
      const optional = pick();
      const expected =
        mandatory.every((m) => present.includes(m)) &&
        present.every((p) => mandatory.includes(p) || optional.includes(p));

      expect(attributeSetMatches(present, mandatory, optional)).toBe(expected);
    }
  });
});

describe('checkExactAttributes', () => {
  it('returns values in the order of the requested names', () => {
    const { tree, sink, messages } = setup('<div id="x" data-a="1" data-b="2"></div>');
    const div = firstElement(tree.body, '#x');
    div.removeAttribute('id');

    expect(checkExactAttributes(div, ['data-b', 'data-a'], sink)).toEqual(['2', '1']);
    expect(messages()).toEqual([]);
  });

  it('reports and returns null when the set differs', () => {
    const { tree, sink, messages } = setup('<div data-a="1" data-b="2"></div>');
    const div = firstElement(tree.body, 'div');

    expect(checkExactAttributes(div, ['data-a'], sink)).toBeNull();
    expect(messages()).toEqual(['attrs should be exactly [data-a], not [data-a, data-b]']);
  });
});

describe('checkAttributes', () => {
  it('reports missing and forbidden names once each', () => {
    const { tree, sink, messages, store } = setup('<div id="x" style="color: red"></div>');
    const div = firstElement(tree.body, 'div');

    expect(checkAttributes(div, ['id', 'class'], sink)).toBe(false);
    expect(messages()).toEqual([
      'mandatory attribute(s) missing: [class]',
      'forbidden attribute(s) (should e.g. be in class definition): [style]',
    ]);
    expect(store.getState().diagnostics.map((d) => d.kind)).toEqual(['attribute', 'attribute']);
  });

  it('accepts optional names', () => {
    const { tree, sink, messages } = setup('<div id="x" title="t"></div>');
    const div = firstElement(tree.body, 'div');

    expect(checkAttributes(div, ['id'], sink, ['title', 'lang'])).toBe(true);
    expect(messages()).toEqual([]);
  });
});

describe('checkOnlyClassIs', () => {
  it('accepts a lone matching class', () => {
    const { tree, sink, messages } = setup('<div class="zooms"></div>');
    expect(checkOnlyClassIs(firstElement(tree.body, 'div'), 'zooms', sink)).toBe(true);
    expect(messages()).toEqual([]);
  });

  it('rejects other attributes', () => {
    const { tree, sink, messages } = setup('<div class="zooms" id="z"></div>');
    expect(checkOnlyClassIs(firstElement(tree.body, 'div'), 'zooms', sink)).toBe(false);
    expect(messages()).toEqual(['attrs should be just [class], not [class, id]']);
  });

  it('rejects several classes', () => {
    const { tree, sink, messages } = setup('<div class="zooms extra"></div>');
    expect(checkOnlyClassIs(firstElement(tree.body, 'div'), 'zooms', sink)).toBe(false);
    expect(messages()).toEqual(['there should be a single class, not 2']);
  });

  it('rejects another class', () => {
    const { tree, sink, messages } = setup('<div class="shapes"></div>');
    expect(checkOnlyClassIs(firstElement(tree.body, 'div'), 'zooms', sink)).toBe(false);
    expect(messages()).toEqual(['class should be zooms, not shapes']);
  });
});

describe('checkSingleChild', () => {
  it('returns the single child', () => {
    const { tree, sink, messages } = setup('<div> <svg></svg> </div>');
    expect(checkSingleChild(firstElement(tree.body, 'div'), 'svg', sink)?.localName).toBe('svg');
    expect(messages()).toEqual([]);
  });

  it('reports an empty parent', () => {
    const { tree, sink, messages } = setup('<div>  </div>');
    expect(checkSingleChild(firstElement(tree.body, 'div'), 'svg', sink)).toBeNull();
    expect(messages()).toEqual(['a single <svg> is expected, found nothing']);
  });

  it('reports extra nodes and a wrong first tag', () => {
    const { tree, sink, messages } = setup('<div><p>a</p><svg></svg></div>');
    expect(checkSingleChild(firstElement(tree.body, 'div'), 'svg', sink)).toBeNull();
    expect(messages()).toEqual(['a single <svg> is expected, found 2 nodes', 'should be a <svg>']);
  });

  it('still returns a leading right tag when followed by extra nodes', () => {
    const { tree, sink, messages } = setup('<div><svg></svg>tail</div>');
    expect(checkSingleChild(firstElement(tree.body, 'div'), 'svg', sink)?.localName).toBe('svg');
    expect(messages()).toEqual(['a single <svg> is expected, found 2 nodes']);
  });
});

describe('childrenWithTags', () => {
  it('keeps allowed elements and reports the rest in order', () => {
    const { tree, sink, messages } = setup('<div>text<p>a</p><span>b</span><p>c</p></div>');
    const kept = childrenWithTags(firstElement(tree.body, 'div'), ['p'], sink);

    expect(kept.map((e) => e.textContent)).toEqual(['a', 'c']);
    expect(messages()).toEqual(['free text is not allowed here', 'unexpected tag, should be one of [p]']);
  });
});
