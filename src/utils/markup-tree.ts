/**
 * Markup Tree
 *
 * Parses card HTML into a DOM that remembers where each node came from,
 * plus the small node helpers the readers share.
 */

import { JSDOM } from 'jsdom';
import type { SourceLocation } from '../types/diagnostics';

// =============================================================================
// Types
// =============================================================================

export type NodeLocator = (node: Node) => SourceLocation | undefined;

export interface MarkupTree {
  document: Document;
  body: HTMLElement;
  /** Source position of a parsed node, undefined for nodes created later */
  locate: NodeLocator;
}

// DOM node types, jsdom does not expose the Node constructor globally
const ELEMENT_NODE = 1;
const TEXT_NODE = 3;

// =============================================================================
// Parsing
// =============================================================================

/**
 * Parse an HTML string. Inline <svg> content keeps its case-sensitive tag
 * and attribute names (viewBox, xlink:href...).
 */
export function parseCardMarkup(html: string): MarkupTree {
  const dom = new JSDOM(html, { includeNodeLocations: true });
  const document = dom.window.document;

  const locate: NodeLocator = (node) => {
    const loc = dom.nodeLocation(node);
    if (!loc) return undefined;
    return { line: loc.startLine, column: loc.startCol };
  };

  return { document, body: document.body, locate };
}

// =============================================================================
// Node Helpers
// =============================================================================

export function isElement(node: Node): node is Element {
  return node.nodeType === ELEMENT_NODE;
}

export function isText(node: Node): node is Text {
  return node.nodeType === TEXT_NODE;
}

/**
 * Whitespace-separated values of the class attribute
 */
export function classesOf(element: Element): string[] {
  const value = element.getAttribute('class');
  if (value === null) return [];
  return value.split(/\s+/).filter((c) => c.length > 0);
}

/**
 * Parse an integer the way card ids are written: optional sign, digits only
 */
export function parseStrictInt(value: string | null): number | null {
  if (value === null || !/^\s*[+-]?\d+\s*$/.test(value)) return null;
  return parseInt(value, 10);
}

/**
 * Parse a numeric SVG attribute, ignoring a trailing unit
 */
export function parseNumeric(value: string | null | undefined): number | undefined {
  if (!value) return undefined;

  const num = parseFloat(value);
  return isNaN(num) ? undefined : num;
}
