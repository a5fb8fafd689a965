import { randomUUID } from 'node:crypto';
import type { DiffWriter } from './diffs.js';
import { StoreCommitError, loadGraph, type LoadResult } from './load.js';
import { normalizeCollections } from './normalize.js';
import {
  DiagnosticCollector,
  buildReport,
  emptyEdgeCounts,
  emptyNodeCounts,
  type IngestionReport,
  type RunFailure
} from './report.js';
import { resolveReferences } from './resolve.js';
import type { GraphStore } from './store/types.js';
import { buildTaxonomy } from './taxonomy.js';
import type { GraphBundle, RawCollection } from './types/index.js';
import { SOURCE_KINDS } from './types/index.js';
import { log } from './utils/log.js';
import { validateGraphBundle } from './validate.js';

export interface PipelineOptions {
  runId?: string;
  batchSize?: number;
  pruneStale?: boolean;
  diffs?: DiffWriter;
  schemaDir?: string;
  clock?: () => Date;
}

export interface PreparedGraph {
  bundle: GraphBundle;
  diagnostics: DiagnosticCollector;
}

/**
 * Everything up to the store: normalize each kind, then, once every identifier space is
 * known, derive the taxonomy and resolve references. Pure apart from diagnostics.
 */
export function prepareGraph(
  collections: readonly RawCollection[],
  diagnostics: DiagnosticCollector = new DiagnosticCollector()
): PreparedGraph {
  const sets = normalizeCollections(collections, diagnostics);
  const items = SOURCE_KINDS.flatMap((kind) => sets[kind]);

  const taxonomy = buildTaxonomy(items, diagnostics);
  const resolution = resolveReferences(sets, diagnostics);

  const bundle: GraphBundle = {
    nodes: [
      ...items.map(({ kind, identifier, properties }) => ({ kind, identifier, properties })),
      ...taxonomy.categories
    ],
    edges: [...resolution.edges, ...taxonomy.memberships]
  };
  log.info('Prepared graph', {
    nodes: bundle.nodes.length,
    edges: bundle.edges.length,
    diagnostics: diagnostics.size
  });
  return { bundle, diagnostics };
}

/**
 * One full ingestion run against `store`. Record-level problems end up as diagnostics; only a
 * store that cannot commit fails the run, and that failure is returned in the report rather
 * than thrown.
 */
export async function runIngestion(
  collections: readonly RawCollection[],
  store: GraphStore,
  options: PipelineOptions = {}
): Promise<IngestionReport> {
  const clock = options.clock ?? (() => new Date());
  const runId = options.runId ?? randomUUID();
  const startedAt = clock();

  const { bundle, diagnostics } = prepareGraph(collections);
  await validateGraphBundle(bundle, options.schemaDir);

  let load: LoadResult | undefined;
  let failure: RunFailure | undefined;
  try {
    load = await loadGraph(store, bundle, {
      diagnostics,
      batchSize: options.batchSize,
      pruneStale: options.pruneStale,
      diffs: options.diffs
    });
  } catch (error) {
    if (!(error instanceof StoreCommitError)) throw error;
    failure = error.toFailure();
    log.error('Store commit failed; run aborted', { runId, stage: error.stage, kind: error.kind, batch: error.batch, error });
  }

  return buildReport({
    runId,
    startedAt,
    finishedAt: clock(),
    nodes: load?.nodes ?? emptyNodeCounts(),
    edges: load?.edges ?? emptyEdgeCounts(),
    diagnostics,
    failure
  });
}
