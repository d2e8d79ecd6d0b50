/**
 * Taxonomic card reader: parses a card HTML document into a Card and
 * collects every validation problem found on the way.
 */

export * from './reader';
export type * from './types/card';
export { rectangleCenter, isLineShape, isNumberShape } from './types/card';
export type * from './types/diagnostics';
export { createDiagnosticsStore, formatMessage, type DiagnosticsSink, type DiagnosticsStore } from './stores/diagnosticsStore';
export * as cardConstants from './constants/card';
