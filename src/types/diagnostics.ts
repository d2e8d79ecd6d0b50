/**
 * Diagnostic Type Definitions
 */

/**
 * - structural: wrong, missing, duplicate or extra element, wrong ordering
 * - attribute: missing mandatory, forbidden extra, bad conversion
 * - content: forbidden character or tag, disallowed curve command or geometry
 * - reference: dangling or mismatched marker/symbol reference
 * - consistency: values that disagree with each other
 */
export type DiagnosticKind = 'structural' | 'attribute' | 'content' | 'reference' | 'consistency';

/** Position in the source markup, both 1-based */
export interface SourceLocation {
  line: number;
  column: number;
}

export interface Diagnostic {
  kind: DiagnosticKind;
  /** Human readable message, location prefix included */
  message: string;
  /** Tag name, when reported on an element */
  tag?: string;
  location?: SourceLocation;
}

export type MessageArg = string | number | boolean | null | undefined | Iterable<string | number>;
