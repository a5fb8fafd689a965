import type { EdgeKind, NodeKind } from './types/index.js';

export type DiagnosticStage = 'normalize' | 'resolve' | 'taxonomy' | 'load';

export type DiagnosticKind =
  | 'malformed-record'
  | 'missing-identifier'
  | 'duplicate-identifier'
  | 'invalid-value'
  | 'out-of-range'
  | 'invalid-reference'
  | 'missing-reference'
  | 'dangling-reference'
  | 'missing-category'
  | 'stale-node'
  | 'stale-edge';

export type DiagnosticSeverity = 'error' | 'warning';

export interface Diagnostic {
  stage: DiagnosticStage;
  identifier: string;
  kind: DiagnosticKind;
  severity: DiagnosticSeverity;
  detail: string;
  nodeKind?: NodeKind;
}

const ERROR_KINDS: ReadonlySet<DiagnosticKind> = new Set([
  'malformed-record',
  'missing-identifier',
  'dangling-reference'
]);

export class DiagnosticCollector {
  private readonly entries: Diagnostic[] = [];

  add(entry: Omit<Diagnostic, 'severity'>): void {
    this.entries.push({
      ...entry,
      severity: ERROR_KINDS.has(entry.kind) ? 'error' : 'warning'
    });
  }

  get size(): number {
    return this.entries.length;
  }

  list(): Diagnostic[] {
    return [...this.entries];
  }

  countByKind(): Partial<Record<DiagnosticKind, number>> {
    const counts: Partial<Record<DiagnosticKind, number>> = {};
    for (const entry of this.entries) {
      counts[entry.kind] = (counts[entry.kind] ?? 0) + 1;
    }
    return counts;
  }
}

export type WriteOutcome = 'created' | 'updated' | 'unchanged';

export type OutcomeCounts = Record<WriteOutcome, number>;

export type RunStatus = 'succeeded' | 'succeeded_with_warnings' | 'failed';

export type FailureStage = 'constraints' | 'nodes' | 'edges' | 'reconcile';

export interface RunFailure {
  stage: FailureStage;
  kind?: NodeKind | EdgeKind;
  batch?: number;
  message: string;
}

export interface IngestionReport {
  runId: string;
  status: RunStatus;
  startedAt: string;
  finishedAt: string;
  nodes: Record<NodeKind, OutcomeCounts>;
  edges: Record<EdgeKind, OutcomeCounts>;
  diagnosticCounts: Partial<Record<DiagnosticKind, number>>;
  diagnostics: Diagnostic[];
  failure?: RunFailure;
}

export function emptyCounts(): OutcomeCounts {
  return { created: 0, updated: 0, unchanged: 0 };
}

export function emptyNodeCounts(): Record<NodeKind, OutcomeCounts> {
  return {
    Weapon: emptyCounts(),
    Resource: emptyCounts(),
    Recipe: emptyCounts(),
    Category: emptyCounts()
  };
}

export function emptyEdgeCounts(): Record<EdgeKind, OutcomeCounts> {
  return {
    REQUIRES: emptyCounts(),
    BUILDS: emptyCounts(),
    BELONGS_TO: emptyCounts()
  };
}

export interface ReportInput {
  runId: string;
  startedAt: Date;
  finishedAt: Date;
  nodes: Record<NodeKind, OutcomeCounts>;
  edges: Record<EdgeKind, OutcomeCounts>;
  diagnostics: DiagnosticCollector;
  failure?: RunFailure;
}

export function resolveStatus(diagnosticCount: number, failure: RunFailure | undefined): RunStatus {
  if (failure) return 'failed';
  return diagnosticCount > 0 ? 'succeeded_with_warnings' : 'succeeded';
}

export function buildReport(input: ReportInput): IngestionReport {
  const report: IngestionReport = {
    runId: input.runId,
    status: resolveStatus(input.diagnostics.size, input.failure),
    startedAt: input.startedAt.toISOString(),
    finishedAt: input.finishedAt.toISOString(),
    nodes: input.nodes,
    edges: input.edges,
    diagnosticCounts: input.diagnostics.countByKind(),
    diagnostics: input.diagnostics.list()
  };
  if (input.failure) {
    report.failure = input.failure;
  }
  return report;
}

export function summarizeReport(report: IngestionReport): Record<string, unknown> {
  const total = (counts: Record<string, OutcomeCounts>) =>
    Object.fromEntries(
      Object.entries(counts).map(([kind, value]) => [kind, value.created + value.updated + value.unchanged])
    );
  return {
    runId: report.runId,
    status: report.status,
    nodes: total(report.nodes),
    edges: total(report.edges),
    diagnostics: report.diagnostics.length
  };
}
