import type { SourceKind } from './graph.js';

/** Loosely typed field bag as it appears in an export file. */
export type RawRecord = Record<string, unknown>;

export interface RawCollection {
  kind: SourceKind;
  records: readonly unknown[];
  source?: string;
}
