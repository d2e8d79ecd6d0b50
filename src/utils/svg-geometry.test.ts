import { describe, it, expect } from 'vitest';
import {
  buildIdIndex,
  decomposePath,
  isAxisAligned,
  isRelativeCommand,
  parseReference,
  parseViewBox,
  resolveUse,
} from './svg-geometry';
import { parseCardMarkup } from './markup-tree';
import { bodyHtml, firstElement } from '../__fixtures__/card-markup';

const MARKUP =
  '<svg id="templates"><defs>' +
  '<symbol id="leg_segment"><g id="inner"></g></symbol>' +
  '<symbol id="empty_segment"> </symbol>' +
  '<rect id="plain" x="1" y="2" width="3" height="4"/>' +
  '</defs></svg>' +
  '<svg id="region">' +
  '<use id="u1" xlink:href="#leg_segment"/>' +
  '<use id="u2" href="#plain"/>' +
  '<use id="u3" xlink:href="#nowhere"/>' +
  '<use id="u4" xlink:href="#empty_segment"/>' +
  '<rect id="plain" x="9"/>' +
  '</svg>';

function setup() {
  const tree = parseCardMarkup(bodyHtml(MARKUP));
  const index = buildIdIndex([firstElement(tree.body, '#templates'), firstElement(tree.body, '#region')]);
  return { tree, index };
}

describe('buildIdIndex', () => {
  it('indexes roots and descendants, the first occurrence wins', () => {
    const { index } = setup();

    expect(index.get('templates')?.localName).toBe('svg');
    expect(index.get('inner')?.localName).toBe('g');
    expect(index.get('plain')?.getAttribute('x')).toBe('1');
  });
});

describe('parseReference', () => {
  it('accepts url(#id) and #id', () => {
    expect(parseReference('url(#antenna_triangle)')).toBe('antenna_triangle');
    expect(parseReference("url('#antenna_triangle')")).toBe('antenna_triangle');
    expect(parseReference(' #leg_segment ')).toBe('leg_segment');
  });

  it('rejects anything else', () => {
    expect(parseReference(null)).toBeNull();
    expect(parseReference('antenna_triangle')).toBeNull();
    expect(parseReference('other.svg#leg')).toBeNull();
  });
});

describe('resolveUse', () => {
  it('follows a <use> to its symbol and expansion', () => {
    const { tree, index } = setup();
    const resolved = resolveUse(firstElement(tree.body, '#u1'), index);

    expect(resolved.ref).toBe('leg_segment');
    expect(resolved.symbol?.id).toBe('leg_segment');
    expect(resolved.expansion?.id).toBe('inner');
  });

  it('keeps a target that is not a symbol apart', () => {
    const { tree, index } = setup();
    const resolved = resolveUse(firstElement(tree.body, '#u2'), index);

    expect(resolved.target?.localName).toBe('rect');
    expect(resolved.symbol).toBeNull();
    expect(resolved.expansion).toBeNull();
  });

  it('leaves unknown references and empty symbols unresolved', () => {
    const { tree, index } = setup();

    const unknown = resolveUse(firstElement(tree.body, '#u3'), index);
    expect(unknown.ref).toBe('nowhere');
    expect(unknown.target).toBeNull();

    const empty = resolveUse(firstElement(tree.body, '#u4'), index);
    expect(empty.symbol?.id).toBe('empty_segment');
    expect(empty.expansion).toBeNull();
  });
});

describe('decomposePath', () => {
  it('splits the initial move from the rest', () => {
    const path = decomposePath('M 10 20 c 1 1 2 2 3 3 Q 5 5 6 6');

    expect(path?.origin).toEqual({ x: 10, y: 20 });
    expect(path?.commands.map((c) => c.code)).toEqual(['c', 'Q']);
    expect(path?.commands.map(isRelativeCommand)).toEqual([true, false]);
  });

  it('makes a relative initial move absolute', () => {
    expect(decomposePath('m 5 7 c 1 1 2 2 3 3')?.origin).toEqual({ x: 5, y: 7 });
  });

  it('rejects data that does not start with a move or cannot be parsed', () => {
    expect(decomposePath('L 1 1')).toBeNull();
    expect(decomposePath('M 1')).toBeNull();
    expect(decomposePath('')).toBeNull();
  });
});

describe('rectangles', () => {
  it('parses viewBox values with spaces or commas', () => {
    expect(parseViewBox('0 0 720 360')).toEqual({ x: 0, y: 0, width: 720, height: 360 });
    expect(parseViewBox('10,20, 30 40')).toEqual({ x: 10, y: 20, width: 30, height: 40 });
    expect(parseViewBox('0 0 720')).toBeNull();
    expect(parseViewBox('0 0 a 360')).toBeNull();
    expect(parseViewBox(null)).toBeNull();
  });

  it('tells axis-aligned segments', () => {
    expect(isAxisAligned({ x: 0, y: 5 }, { x: 10, y: 5 })).toBe(true);
    expect(isAxisAligned({ x: 3, y: 0 }, { x: 3, y: 8 })).toBe(true);
    expect(isAxisAligned({ x: 0, y: 0 }, { x: 10, y: 1 })).toBe(false);
  });
});
