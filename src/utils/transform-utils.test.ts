import { describe, it, expect } from 'vitest';
import { accumulatedMatrix, applyMatrix, listToMatrix, parseTransformList, resolvePoint } from './transform-utils';
import { parseCardMarkup } from './markup-tree';
import { bodyHtml, firstElement } from '../__fixtures__/card-markup';

describe('parseTransformList', () => {
  it('reads operations and their numeric arguments', () => {
    expect(parseTransformList('rotate(45, 10, 20) translate(5)')).toEqual([
      { kind: 'rotate', values: [45, 10, 20] },
      { kind: 'translate', values: [5] },
    ]);
    expect(parseTransformList('scale(2 3),skewX(10)')).toEqual([
      { kind: 'scale', values: [2, 3] },
      { kind: 'skewX', values: [10] },
    ]);
  });

  it('gives an empty list for a blank value', () => {
    expect(parseTransformList('  ')).toEqual([]);
  });

  it('rejects unknown operations and non-numeric arguments', () => {
    expect(parseTransformList('spin(45)')).toBeNull();
    expect(parseTransformList('rotate(a)')).toBeNull();
    expect(parseTransformList('rotate(45) garbage')).toBeNull();
  });
});

describe('matrices', () => {
  it('rotates around a center', () => {
    const ops = parseTransformList('rotate(90, 10, 10)') ?? [];
    const p = applyMatrix(listToMatrix(ops), { x: 20, y: 10 });

    expect(p.x).toBeCloseTo(10);
    expect(p.y).toBeCloseTo(20);
  });

  it('applies the rightmost operation first', () => {
    const ops = parseTransformList('translate(10, 0) scale(2)') ?? [];
    expect(applyMatrix(listToMatrix(ops), { x: 1, y: 1 })).toEqual({ x: 12, y: 2 });
  });
});

describe('resolvePoint', () => {
  const markup =
    '<svg id="root" transform="translate(1000, 1000)">' +
    '<g transform="translate(10, 5)"><line id="l" transform="scale(2)" x1="1" y1="1" x2="3" y2="1"/></g>' +
    '<line id="plain" x1="1" y1="1" x2="3" y2="1"/>' +
    '</svg>';

  it('applies the element and ancestor transforms, root excluded', () => {
    const tree = parseCardMarkup(bodyHtml(markup));
    const root = firstElement(tree.body, '#root');
    const line = firstElement(tree.body, '#l');

    expect(resolvePoint(line, root, { x: 3, y: 1 })).toEqual({ x: 16, y: 7 });
  });

  it('returns the point itself when nothing is transformed', () => {
    const tree = parseCardMarkup(bodyHtml(markup));
    const root = firstElement(tree.body, '#root');
    const plain = firstElement(tree.body, '#plain');
    const point = { x: 3, y: 1 };

    expect(resolvePoint(plain, root, point)).toBe(point);
    expect(accumulatedMatrix(plain, root)).toEqual([1, 0, 0, 1, 0, 0]);
  });
});
