import { mkdir, mkdtemp, rm, writeFile } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import { dirname, join } from 'node:path';
import { fileURLToPath } from 'node:url';
import { describe, expect, it } from 'vitest';
import { prepareGraph } from '../../src/pipeline.js';
import { DiagnosticCollector, buildReport, emptyEdgeCounts, emptyNodeCounts } from '../../src/report.js';
import type { GraphBundle } from '../../src/types/index.js';
import {
  DEFAULT_SCHEMA_DIR,
  findSchemaDir,
  validateExportEnvelope,
  validateGraphBundle,
  validateReport
} from '../../src/validate.js';
import { FIXED_CLOCK, sampleCollections } from '../helpers.js';

describe('findSchemaDir', () => {
  it('points at the schemas beside package.json', () => {
    const root = join(dirname(fileURLToPath(import.meta.url)), '..', '..');
    expect(DEFAULT_SCHEMA_DIR).toBe(join(root, 'schemas'));
  });

  it('finds the package schemas from a compiled module directory', async () => {
    const root = await mkdtemp(join(tmpdir(), 'export-graph-pkg-'));
    try {
      await writeFile(join(root, 'package.json'), '{}', 'utf8');
      await mkdir(join(root, 'schemas'));
      await mkdir(join(root, 'dist', 'src'), { recursive: true });

      expect(findSchemaDir(join(root, 'dist', 'src'))).toBe(join(root, 'schemas'));
      expect(findSchemaDir(join(root, 'src'))).toBe(join(root, 'schemas'));
    } finally {
      await rm(root, { recursive: true, force: true });
    }
  });
});

describe('validateGraphBundle', () => {
  it('accepts a prepared graph', async () => {
    const { bundle } = prepareGraph(sampleCollections());
    await expect(validateGraphBundle(bundle)).resolves.toBeUndefined();
  });

  it('rejects a node with an undeclared property', async () => {
    const bundle: GraphBundle = {
      nodes: [{ kind: 'Category', identifier: 'pistols', properties: { key: 'pistols', name: 'Pistols', extra: 1 } }],
      edges: []
    };
    await expect(validateGraphBundle(bundle)).rejects.toThrow('Category.properties[0]');
  });

  it('rejects a BUILDS edge that does not start at a recipe', async () => {
    const bundle: GraphBundle = {
      nodes: [],
      edges: [
        {
          kind: 'BUILDS',
          source: { kind: 'Weapon', identifier: 'W1' },
          target: { kind: 'Resource', identifier: 'R1' },
          properties: { quantity: 1 }
        }
      ]
    };
    await expect(validateGraphBundle(bundle)).rejects.toThrow('edges[0]');
  });

  it('rejects a REQUIRES edge without a quantity', async () => {
    const bundle: GraphBundle = {
      nodes: [],
      edges: [
        {
          kind: 'REQUIRES',
          source: { kind: 'Recipe', identifier: 'B1' },
          target: { kind: 'Resource', identifier: 'R1' },
          properties: {}
        }
      ]
    };
    await expect(validateGraphBundle(bundle)).rejects.toThrow('quantity');
  });
});

describe('validateExportEnvelope', () => {
  it('requires an object whose values are lists', async () => {
    await expect(validateExportEnvelope({ ExportWeapons: [] }, 'weapons')).resolves.toBeUndefined();
    await expect(validateExportEnvelope([], 'weapons')).rejects.toThrow('weapons must be object');
    await expect(validateExportEnvelope({}, 'weapons')).rejects.toThrow('weapons');
  });
});

describe('validateReport', () => {
  it('accepts a built report and rejects a malformed timestamp', async () => {
    const report = buildReport({
      runId: 'run-1',
      startedAt: FIXED_CLOCK(),
      finishedAt: FIXED_CLOCK(),
      nodes: emptyNodeCounts(),
      edges: emptyEdgeCounts(),
      diagnostics: new DiagnosticCollector()
    });
    await expect(validateReport(report)).resolves.toBeUndefined();
    await expect(validateReport({ ...report, startedAt: 'yesterday' })).rejects.toThrow('report/startedAt');
  });
});
