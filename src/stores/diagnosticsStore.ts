import { createStore, type StoreApi } from 'zustand/vanilla';
import type { Diagnostic, DiagnosticKind, MessageArg, SourceLocation } from '../types/diagnostics';
import { isElement, type NodeLocator } from '../utils/markup-tree';

// =============================================================================
// Types
// =============================================================================

/**
 * What validators report into. Recording never throws nor stops the caller.
 */
export interface DiagnosticsSink {
  /**
   * @param template - message with %s / %d placeholders, filled from args in order
   * @param location - the node the problem was found on
   */
  record: (kind: DiagnosticKind, template: string, location: Node, ...args: MessageArg[]) => void;
}

interface DiagnosticsState extends DiagnosticsSink {
  /** Records in traversal order, never deduplicated */
  diagnostics: Diagnostic[];

  // Getters
  getErrors: () => string[];
}

export type DiagnosticsStore = StoreApi<DiagnosticsState>;

// =============================================================================
// Formatting
// =============================================================================

function formatArg(arg: MessageArg): string {
  if (arg === null || arg === undefined) return String(arg);
  if (typeof arg === 'string' || typeof arg === 'number' || typeof arg === 'boolean') {
    return String(arg);
  }
  return `[${Array.from(arg).join(', ')}]`;
}

/**
 * Fill %s and %d placeholders in order. Missing args leave the placeholder.
 */
export function formatMessage(template: string, args: readonly MessageArg[]): string {
  let next = 0;
  return template.replace(/%[sd]/g, (placeholder) => {
    if (next >= args.length) return placeholder;
    return formatArg(args[next++]);
  });
}

/**
 * Location prefix: the tag and its position for an element,
 * a trimmed excerpt for anything else.
 */
function describeLocation(node: Node, where: SourceLocation | undefined): string {
  if (isElement(node)) {
    const position = where ? `(${where.line}, ${where.column})` : '(?, ?)';
    return `Tag <${node.localName}> at ${position}, `;
  }
  return `Near "${(node.textContent ?? '').trim()}", `;
}

// =============================================================================
// Store
// =============================================================================

/**
 * One store per read session. The locator maps nodes back to the source.
 */
export function createDiagnosticsStore(locate: NodeLocator): DiagnosticsStore {
  return createStore<DiagnosticsState>()((set, get) => ({
    diagnostics: [],

    record: (kind, template, location, ...args) => {
      const where = locate(location);
      const diagnostic: Diagnostic = {
        kind,
        message: describeLocation(location, where) + formatMessage(template, args),
        tag: isElement(location) ? location.localName : undefined,
        location: where,
      };
      set((state) => ({ diagnostics: [...state.diagnostics, diagnostic] }));
    },

    getErrors: () => get().diagnostics.map((d) => d.message),
  }));
}
