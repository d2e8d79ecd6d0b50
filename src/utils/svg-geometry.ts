/**
 * SVG Geometry
 *
 * What the readers need from the vector graphics: resolved coordinates,
 * decomposed path commands, and id-based reference resolution
 * (markers, <use> → <symbol>).
 */

import { parseSVG, makeAbsolute, type Command } from 'svg-path-parser';
import type { Point, Rectangle } from '../types/card';
import { isElement } from './markup-tree';
import { nonBlankChildren } from './tree-utils';
import { XLINK_HREF } from '../constants/card';

// =============================================================================
// Types
// =============================================================================

/** Elements by id, first occurrence wins */
export type IdIndex = ReadonlyMap<string, Element>;

export interface DecomposedPath {
  /** First point, absolute */
  origin: Point;
  /** Everything after the initial move, as written */
  commands: Command[];
}

/**
 * Result of following a <use>: the element itself, the <symbol> its href
 * designates, and what the symbol expands to.
 */
export interface ResolvedUse {
  use: Element;
  /** Target id, without '#' */
  ref: string | null;
  target: Element | null;
  symbol: Element | null;
  expansion: Element | null;
}

// =============================================================================
// Id Index
// =============================================================================

/**
 * Index every element with an id under the given roots, roots included
 */
export function buildIdIndex(roots: readonly Element[]): IdIndex {
  const index = new Map<string, Element>();
  const visit = (element: Element) => {
    const id = element.getAttribute('id');
    if (id !== null && !index.has(id)) {
      index.set(id, element);
    }
    for (const child of Array.from(element.children)) {
      visit(child);
    }
  };
  roots.forEach(visit);
  return index;
}

/**
 * Id designated by a same-document reference, `#id` or `url(#id)`
 */
export function parseReference(value: string | null): string | null {
  if (value === null) return null;
  const trimmed = value.trim();
  const url = /^url\(\s*['"]?#([^'")\s]+)['"]?\s*\)$/.exec(trimmed);
  if (url) return url[1];
  const hash = /^#(\S+)$/.exec(trimmed);
  return hash ? hash[1] : null;
}

/**
 * Follow a <use> through its href. Any part that cannot be found is null.
 */
export function resolveUse(use: Element, index: IdIndex): ResolvedUse {
  const ref = parseReference(use.getAttribute(XLINK_HREF) ?? use.getAttribute('href'));
  const target = ref !== null ? index.get(ref) ?? null : null;
  const symbol = target !== null && target.localName === 'symbol' ? target : null;

  let expansion: Element | null = null;
  if (symbol) {
    const first = nonBlankChildren(symbol)[0];
    expansion = first !== undefined && isElement(first) ? first : null;
  }

  return { use, ref, target, symbol, expansion };
}

// =============================================================================
// Paths
// =============================================================================

/**
 * Split path data into its origin and the commands after the initial move.
 * Returns null on malformed data.
 */
export function decomposePath(d: string): DecomposedPath | null {
  let commands: Command[];
  try {
    commands = parseSVG(d);
  } catch {
    return null;
  }
  if (commands.length === 0) return null;

  const first = makeAbsolute(commands.slice(0, 1))[0];
  if (first.code !== 'M' || !('x' in first) || !('y' in first)) return null;

  return {
    origin: { x: first.x, y: first.y },
    commands: commands.slice(1),
  };
}

export function isRelativeCommand(cmd: Command): boolean {
  return cmd.code === cmd.code.toLowerCase();
}

// =============================================================================
// Rectangles
// =============================================================================

/**
 * Parse a viewBox, "x y width height" with spaces and/or commas
 */
export function parseViewBox(value: string | null): Rectangle | null {
  if (!value) return null;
  const parts = value.trim().split(/[\s,]+/).map(parseFloat);
  if (parts.length !== 4 || parts.some((n) => isNaN(n))) return null;
  return { x: parts[0], y: parts[1], width: parts[2], height: parts[3] };
}

/**
 * A line is axis-aligned when its bounding box has no area
 */
export function isAxisAligned(from: Point, to: Point): boolean {
  return Math.abs(from.x - to.x) * Math.abs(from.y - to.y) === 0;
}
