/**
 * Tree Utilities
 *
 * Stateless checks over markup nodes. Every problem goes to the sink
 * and the caller gets the best value available; nothing here throws.
 */

import type { DiagnosticsSink } from '../stores/diagnosticsStore';
import { classesOf, isElement, isText } from './markup-tree';

const COMMENT_NODE = 8;
const PROCESSING_INSTRUCTION_NODE = 7;

// =============================================================================
// Blank Filtering
// =============================================================================

/**
 * Children without comments and whitespace-only text, in document order
 */
export function nonBlankChildren(node: Node): ChildNode[] {
  const ret: ChildNode[] = [];
  for (const child of Array.from(node.childNodes)) {
    if (child.nodeType === COMMENT_NODE || child.nodeType === PROCESSING_INSTRUCTION_NODE) {
      continue;
    }
    if (isText(child) && child.data.trim() === '') {
      continue;
    }
    ret.push(child);
  }
  return ret;
}

// =============================================================================
// Attributes
// =============================================================================

/**
 * mandatory ⊆ present ⊆ mandatory ∪ optional
 */
export function attributeSetMatches(
  present: Iterable<string>,
  mandatory: Iterable<string>,
  optional: Iterable<string> = []
): boolean {
  const presentSet = new Set(present);
  const allowed = new Set([...mandatory, ...optional]);
  for (const name of mandatory) {
    if (!presentSet.has(name)) return false;
  }
  for (const name of presentSet) {
    if (!allowed.has(name)) return false;
  }
  return true;
}

/**
 * The attribute keys must be exactly `names`. Returns the values in the same
 * order as `names`, or null after reporting.
 */
export function checkExactAttributes(
  element: Element,
  names: readonly string[],
  sink: DiagnosticsSink
): string[] | null {
  const present = element.getAttributeNames();
  if (!attributeSetMatches(present, names)) {
    sink.record('attribute', 'attrs should be exactly %s, not %s', element, names, present);
    return null;
  }
  return names.map((name) => element.getAttribute(name) ?? '');
}

/**
 * All mandatory attributes must be present, others only if optional.
 * Missing and forbidden names are reported once each.
 */
export function checkAttributes(
  element: Element,
  mandatory: readonly string[],
  sink: DiagnosticsSink,
  optional: readonly string[] = []
): boolean {
  const present = new Set(element.getAttributeNames());
  const missing = mandatory.filter((name) => !present.has(name));
  if (missing.length > 0) {
    sink.record('attribute', 'mandatory attribute(s) missing: %s', element, missing);
  }
  const allowed = new Set([...mandatory, ...optional]);
  const forbidden = [...present].filter((name) => !allowed.has(name));
  if (forbidden.length > 0) {
    sink.record(
      'attribute',
      'forbidden attribute(s) (should e.g. be in class definition): %s',
      element,
      forbidden
    );
  }
  return missing.length === 0 && forbidden.length === 0;
}

/**
 * The only attribute is class, and it holds just `expected`
 */
export function checkOnlyClassIs(element: Element, expected: string, sink: DiagnosticsSink): boolean {
  const names = element.getAttributeNames();
  if (names.length !== 1 || names[0] !== 'class') {
    sink.record('attribute', 'attrs should be just [class], not %s', element, names);
    return false;
  }
  const classes = classesOf(element);
  if (classes.length !== 1) {
    sink.record('attribute', 'there should be a single class, not %d', element, classes.length);
    return false;
  }
  if (classes[0] !== expected) {
    sink.record('attribute', 'class should be %s, not %s', element, expected, classes[0]);
    return false;
  }
  return true;
}

// =============================================================================
// Children
// =============================================================================

/**
 * Exactly one non-blank child, a `tag` element. When the shape is wrong the
 * first element child is still returned if it has the right tag.
 */
export function checkSingleChild(element: Element, tag: string, sink: DiagnosticsSink): Element | null {
  const children = nonBlankChildren(element);
  if (children.length === 0) {
    sink.record('structural', 'a single <%s> is expected, found nothing', element, tag);
    return null;
  }
  if (children.length > 1) {
    sink.record('structural', 'a single <%s> is expected, found %d nodes', element, tag, children.length);
  }
  const first = children.find(isElement);
  if (first === undefined) {
    sink.record('structural', 'a single <%s> is expected, found only text', element, tag);
    return null;
  }
  if (first.localName !== tag) {
    sink.record('structural', 'should be a <%s>', first, tag);
    return null;
  }
  return first;
}

/**
 * Element children whose tag is allowed. Free text and other tags
 * are reported once per occurrence and left out.
 */
export function childrenWithTags(
  element: Element,
  tags: readonly string[],
  sink: DiagnosticsSink
): Element[] {
  const ret: Element[] = [];
  for (const child of nonBlankChildren(element)) {
    if (!isElement(child)) {
      sink.record('structural', 'free text is not allowed here', child);
      continue;
    }
    if (!tags.includes(child.localName)) {
      sink.record('structural', 'unexpected tag, should be one of %s', child, tags);
      continue;
    }
    ret.push(child);
  }
  return ret;
}
