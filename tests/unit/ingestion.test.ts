import { beforeEach, describe, expect, it, vi } from 'vitest';
import { DiffWriter, computeDiff } from '../../src/diffs.js';
import { DiagnosticCollector, buildReport, emptyEdgeCounts, emptyNodeCounts } from '../../src/report.js';
import { createDiffRows, createRun, isDirectusConfigured, updateRun } from '../../src/utils/directus.js';
import { IngestionRun } from '../../src/utils/ingestion.js';
import { FIXED_CLOCK } from '../helpers.js';

vi.mock('../../src/utils/directus.js', () => ({
  isDirectusConfigured: vi.fn(() => true),
  createRun: vi.fn(async () => 'run-42'),
  updateRun: vi.fn(async () => undefined),
  createDiffRows: vi.fn(async () => undefined)
}));

function failedReport() {
  return buildReport({
    runId: 'local-run',
    startedAt: FIXED_CLOCK(),
    finishedAt: FIXED_CLOCK(),
    nodes: emptyNodeCounts(),
    edges: emptyEdgeCounts(),
    diagnostics: new DiagnosticCollector(),
    failure: { stage: 'edges', kind: 'BUILDS', batch: 0, message: 'disk full' }
  });
}

beforeEach(() => {
  vi.clearAllMocks();
  vi.mocked(isDirectusConfigured).mockReturnValue(true);
});

describe('IngestionRun', () => {
  it('records the run lifecycle', async () => {
    const run = new IngestionRun();
    await run.start({ store: 'memory', dataRoot: './data_raw' });

    expect(run.id).toBe('run-42');
    expect(createRun).toHaveBeenCalledWith(
      expect.objectContaining({ state: 'running', store: 'memory', data_root: './data_raw' })
    );

    await run.updateStats({ nodes: 4 });
    await run.finish(failedReport(), 'reports/local-run.json');

    expect(updateRun).toHaveBeenLastCalledWith(
      'run-42',
      expect.objectContaining({
        state: 'failed',
        log: 'edges: disk full',
        report_path: 'reports/local-run.json',
        stats_json: { nodes: 4, status: 'failed', diagnostics: {} }
      })
    );
  });

  it('does nothing when Directus is not configured', async () => {
    vi.mocked(isDirectusConfigured).mockReturnValue(false);
    const run = new IngestionRun();
    await run.start({ store: 'memory', dataRoot: './data_raw' });
    await run.finishFail(new Error('boom'));

    expect(run.id).toBeUndefined();
    expect(createRun).not.toHaveBeenCalled();
    expect(updateRun).not.toHaveBeenCalled();
  });
});

describe('computeDiff', () => {
  it('lists changed, added and dropped fields', () => {
    expect(computeDiff({ a: 1, b: [1, 2], c: 'x' }, { a: 1, b: [1, 3], d: true })).toEqual({
      b: { before: [1, 2], after: [1, 3] },
      c: { before: 'x', after: null },
      d: { before: null, after: true }
    });
    expect(computeDiff({ a: [1] }, { a: [1] })).toBeNull();
  });
});

describe('DiffWriter', () => {
  it('flushes queued changes in chunks tagged with the run', async () => {
    const diffs = new DiffWriter({ chunkSize: 2 });
    for (const id of ['R1', 'R2', 'R3']) {
      diffs.addChange({ entityType: 'Resource', entityId: id, changeType: 'created', diff: { after: { uniqueName: id } } });
    }
    expect(diffs.addChange({ entityType: 'Resource', entityId: 'R4', changeType: 'updated', diff: {} })).toBe(false);

    await diffs.flush('run-42');

    expect(createDiffRows).toHaveBeenCalledTimes(2);
    expect(vi.mocked(createDiffRows).mock.calls[1]?.[0]).toEqual([
      expect.objectContaining({ run: 'run-42', entity_type: 'Resource', entity_id: 'R3', change_type: 'created' })
    ]);
    expect(diffs.size).toBe(0);
  });

  it('queues nothing when skipped', async () => {
    const diffs = new DiffWriter({ skip: true });
    expect(diffs.addChange({ entityType: 'Resource', entityId: 'R1', changeType: 'deleted', diff: { deleted: true } })).toBe(false);
    await diffs.flush('run-42');
    expect(createDiffRows).not.toHaveBeenCalled();
  });
});
