/**
 * Transform Utilities
 *
 * Parses SVG transform attributes and maps points through the transforms
 * accumulated from an element up to its region root.
 */

import type { Point } from '../types/card';
import { isElement } from './markup-tree';

/**
 * One operation of a transform list, e.g. rotate(45, 10, 20)
 */
export interface TransformOperation {
  kind: 'matrix' | 'translate' | 'scale' | 'rotate' | 'skewX' | 'skewY';
  values: number[];
}

/**
 * Affine matrix [a, b, c, d, e, f], as in SVG:
 *   x' = a*x + c*y + e
 *   y' = b*x + d*y + f
 */
export type Matrix = readonly [number, number, number, number, number, number];

export const IDENTITY: Matrix = [1, 0, 0, 1, 0, 0];

const OPERATION_KINDS: ReadonlySet<string> = new Set(['matrix', 'translate', 'scale', 'rotate', 'skewX', 'skewY']);

function isOperationKind(kind: string): kind is TransformOperation['kind'] {
  return OPERATION_KINDS.has(kind);
}

// =============================================================================
// Parsing
// =============================================================================

/**
 * Parse a transform list. Returns null if any part of the string is not
 * a known operation with numeric arguments.
 */
export function parseTransformList(value: string): TransformOperation[] | null {
  const ret: TransformOperation[] = [];
  const opRegex = /\s*([A-Za-z]+)\s*\(([^)]*)\)\s*,?/y;

  let pos = 0;
  while (pos < value.length) {
    if (value.slice(pos).trim() === '') break;
    opRegex.lastIndex = pos;
    const m = opRegex.exec(value);
    if (!m) return null;
    pos = opRegex.lastIndex;

    const [, kind, rawArgs] = m;
    if (!isOperationKind(kind)) return null;
    const args = rawArgs.trim() === '' ? [] : rawArgs.trim().split(/[\s,]+/).map(Number);
    if (args.some((n) => isNaN(n))) return null;
    ret.push({ kind, values: args });
  }

  return ret;
}

// =============================================================================
// Matrices
// =============================================================================

/**
 * m1 × m2, i.e. m2 is applied first
 */
export function multiply(m1: Matrix, m2: Matrix): Matrix {
  const [a1, b1, c1, d1, e1, f1] = m1;
  const [a2, b2, c2, d2, e2, f2] = m2;
  return [
    a1 * a2 + c1 * b2,
    b1 * a2 + d1 * b2,
    a1 * c2 + c1 * d2,
    b1 * c2 + d1 * d2,
    a1 * e2 + c1 * f2 + e1,
    b1 * e2 + d1 * f2 + f1,
  ];
}

function rotationMatrix(angleDeg: number): Matrix {
  // Convert rotation to radians
  const rad = (angleDeg * Math.PI) / 180;
  const cos = Math.cos(rad);
  const sin = Math.sin(rad);
  return [cos, sin, -sin, cos, 0, 0];
}

export function operationToMatrix(op: TransformOperation): Matrix {
  const v = op.values;
  switch (op.kind) {
    case 'matrix':
      return v.length === 6 ? [v[0], v[1], v[2], v[3], v[4], v[5]] : IDENTITY;
    case 'translate':
      return [1, 0, 0, 1, v[0] ?? 0, v[1] ?? 0];
    case 'scale':
      return [v[0] ?? 1, 0, 0, v[1] ?? v[0] ?? 1, 0, 0];
    case 'rotate': {
      // rotate(a, cx, cy) = translate(cx, cy) rotate(a) translate(-cx, -cy)
      const cx = v[1] ?? 0;
      const cy = v[2] ?? 0;
      const toCenter: Matrix = [1, 0, 0, 1, cx, cy];
      const fromCenter: Matrix = [1, 0, 0, 1, -cx, -cy];
      return multiply(multiply(toCenter, rotationMatrix(v[0] ?? 0)), fromCenter);
    }
    case 'skewX':
      return [1, 0, Math.tan(((v[0] ?? 0) * Math.PI) / 180), 1, 0, 0];
    case 'skewY':
      return [1, Math.tan(((v[0] ?? 0) * Math.PI) / 180), 0, 1, 0, 0];
  }
}

export function listToMatrix(ops: readonly TransformOperation[]): Matrix {
  return ops.reduce<Matrix>((acc, op) => multiply(acc, operationToMatrix(op)), IDENTITY);
}

export function applyMatrix(m: Matrix, point: Point): Point {
  const [a, b, c, d, e, f] = m;
  return {
    x: a * point.x + c * point.y + e,
    y: b * point.x + d * point.y + f,
  };
}

/**
 * Check if a matrix is effectively an identity (no visible change)
 */
export function isIdentityMatrix(m: Matrix): boolean {
  return m.every((value, i) => Math.abs(value - IDENTITY[i]) < 1e-9);
}

// =============================================================================
// Accumulation
// =============================================================================

/**
 * Compose the transforms of `element` and its ancestors, stopping before
 * `root`. Unparsable transform attributes are ignored here; validators that
 * care about them parse and report on their own.
 */
export function accumulatedMatrix(element: Element, root: Element): Matrix {
  let current: Matrix = IDENTITY;
  let node: Node | null = element;
  while (node && node !== root) {
    if (isElement(node)) {
      const attr = node.getAttribute('transform');
      const ops = attr ? parseTransformList(attr) : null;
      if (ops) {
        current = multiply(listToMatrix(ops), current);
      }
    }
    node = node.parentNode;
  }
  return current;
}

/**
 * Map a point given in `element` user space into `root` user space
 */
export function resolvePoint(element: Element, root: Element, point: Point): Point {
  const m = accumulatedMatrix(element, root);
  // Avoid float noise on the common untransformed case
  return isIdentityMatrix(m) ? point : applyMatrix(m, point);
}
