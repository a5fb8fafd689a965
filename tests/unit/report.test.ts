import { describe, expect, it } from 'vitest';
import {
  DiagnosticCollector,
  buildReport,
  emptyEdgeCounts,
  emptyNodeCounts,
  resolveStatus,
  summarizeReport
} from '../../src/report.js';
import { FIXED_CLOCK } from '../helpers.js';

describe('DiagnosticCollector', () => {
  it('assigns severity by kind and counts entries', () => {
    const diagnostics = new DiagnosticCollector();
    diagnostics.add({ stage: 'normalize', identifier: 'Weapon[0]', kind: 'missing-identifier', detail: 'uniqueName is missing or empty' });
    diagnostics.add({ stage: 'normalize', identifier: 'W1', kind: 'invalid-value', detail: 'slot: expected a number, got "x"; using default' });
    diagnostics.add({ stage: 'normalize', identifier: 'W2', kind: 'invalid-value', detail: 'slot: expected a number, got "y"; using default' });

    expect(diagnostics.list().map((entry) => entry.severity)).toEqual(['error', 'warning', 'warning']);
    expect(diagnostics.countByKind()).toEqual({ 'missing-identifier': 1, 'invalid-value': 2 });
  });
});

describe('resolveStatus', () => {
  it('fails only on a store failure', () => {
    expect(resolveStatus(0, undefined)).toBe('succeeded');
    expect(resolveStatus(3, undefined)).toBe('succeeded_with_warnings');
    expect(resolveStatus(0, { stage: 'constraints', message: 'unreachable' })).toBe('failed');
  });
});

describe('summarizeReport', () => {
  it('totals outcomes per kind', () => {
    const nodes = emptyNodeCounts();
    nodes.Weapon = { created: 2, updated: 1, unchanged: 4 };
    const edges = emptyEdgeCounts();
    edges.REQUIRES.unchanged = 3;
    const report = buildReport({
      runId: 'run-1',
      startedAt: FIXED_CLOCK(),
      finishedAt: FIXED_CLOCK(),
      nodes,
      edges,
      diagnostics: new DiagnosticCollector()
    });

    expect(summarizeReport(report)).toEqual({
      runId: 'run-1',
      status: 'succeeded',
      nodes: { Weapon: 7, Resource: 0, Recipe: 0, Category: 0 },
      edges: { REQUIRES: 3, BUILDS: 0, BELONGS_TO: 0 },
      diagnostics: 0
    });
  });
});
