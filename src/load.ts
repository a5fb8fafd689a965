import { computeDiff, type DiffWriter } from './diffs.js';
import {
  emptyEdgeCounts,
  emptyNodeCounts,
  type DiagnosticCollector,
  type FailureStage,
  type OutcomeCounts,
  type RunFailure,
  type WriteOutcome
} from './report.js';
import type { GraphStore, GraphTransaction, StoredEdge, UpsertResult } from './store/types.js';
import type { EdgeKind, GraphBundle, GraphEdge, GraphNode, NodeKind, Properties } from './types/index.js';
import { EDGE_KINDS, NODE_KINDS, edgeKey, nodeKey } from './types/index.js';
import { log } from './utils/log.js';

export const DEFAULT_BATCH_SIZE = 500;

export interface LoadOptions {
  diagnostics: DiagnosticCollector;
  batchSize?: number;
  pruneStale?: boolean;
  diffs?: DiffWriter;
}

export interface LoadResult {
  nodes: Record<NodeKind, OutcomeCounts>;
  edges: Record<EdgeKind, OutcomeCounts>;
  staleNodes: number;
  staleEdges: number;
  pruned: boolean;
}

/** A store batch that did not commit. Fatal for the run; nothing in the batch is claimed. */
export class StoreCommitError extends Error {
  constructor(
    readonly stage: FailureStage,
    readonly kind: NodeKind | EdgeKind | undefined,
    readonly batch: number | undefined,
    readonly size: number,
    options?: { cause?: unknown }
  ) {
    const cause = options?.cause;
    const reason = cause instanceof Error ? cause.message : String(cause);
    const where = [kind, batch === undefined ? undefined : `batch ${batch}`].filter(Boolean).join(' ');
    super(`Store rejected ${stage}${where ? ` (${where})` : ''}: ${reason}`, options);
    this.name = 'StoreCommitError';
  }

  toFailure(): RunFailure {
    const failure: RunFailure = { stage: this.stage, message: this.message };
    if (this.kind) failure.kind = this.kind;
    if (this.batch !== undefined) failure.batch = this.batch;
    return failure;
  }
}

function chunk<T>(items: readonly T[], size: number): T[][] {
  if (size <= 0) throw new Error('chunk size must be greater than zero');
  const result: T[][] = [];
  for (let i = 0; i < items.length; i += size) {
    result.push(items.slice(i, i + size));
  }
  return result;
}

function groupBy<K extends string, T extends { kind: K }>(kinds: readonly K[], items: readonly T[]): Map<K, T[]> {
  const groups = new Map<K, T[]>(kinds.map((kind) => [kind, []]));
  for (const item of items) {
    groups.get(item.kind)?.push(item);
  }
  return groups;
}

interface PendingWrite {
  outcome: WriteOutcome;
  entityType: string;
  entityId: string;
  diff: Record<string, unknown> | null;
}

function classify(result: UpsertResult, properties: Properties, entityType: string, entityId: string): PendingWrite {
  if (result.created) {
    return { outcome: 'created', entityType, entityId, diff: { after: properties } };
  }
  const diff = computeDiff(result.previous, properties);
  return { outcome: diff ? 'updated' : 'unchanged', entityType, entityId, diff };
}

async function commitBatch(
  store: GraphStore,
  stage: FailureStage,
  kind: NodeKind | EdgeKind | undefined,
  batch: number,
  size: number,
  work: (tx: GraphTransaction) => Promise<PendingWrite[]>
): Promise<PendingWrite[]> {
  try {
    return await store.transaction(work);
  } catch (error) {
    throw new StoreCommitError(stage, kind, batch, size, { cause: error });
  }
}

function record(writes: readonly PendingWrite[], counts: OutcomeCounts, diffs: DiffWriter | undefined) {
  for (const write of writes) {
    counts[write.outcome]++;
    if (diffs && write.diff && write.outcome !== 'unchanged') {
      diffs.addChange({
        entityType: write.entityType,
        entityId: write.entityId,
        changeType: write.outcome === 'created' ? 'created' : 'updated',
        diff: write.diff
      });
    }
  }
}

function describeEdge(edge: StoredEdge | GraphEdge): string {
  return `${edge.source.identifier} -[${edge.kind}]-> ${edge.target.identifier}`;
}

async function writeNodes(
  store: GraphStore,
  kind: NodeKind,
  nodes: readonly GraphNode[],
  batchSize: number,
  counts: OutcomeCounts,
  diffs: DiffWriter | undefined
) {
  for (const [index, batch] of chunk(nodes, batchSize).entries()) {
    const writes = await commitBatch(store, 'nodes', kind, index, batch.length, async (tx) => {
      const pending: PendingWrite[] = [];
      for (const node of batch) {
        const result = await tx.upsertNode(node.kind, node.identifier, node.properties);
        pending.push(classify(result, node.properties, node.kind, node.identifier));
      }
      return pending;
    });
    record(writes, counts, diffs);
  }
}

async function writeEdges(
  store: GraphStore,
  kind: EdgeKind,
  edges: readonly GraphEdge[],
  batchSize: number,
  counts: OutcomeCounts,
  diffs: DiffWriter | undefined
) {
  for (const [index, batch] of chunk(edges, batchSize).entries()) {
    const writes = await commitBatch(store, 'edges', kind, index, batch.length, async (tx) => {
      const pending: PendingWrite[] = [];
      for (const edge of batch) {
        const result = await tx.upsertEdge(edge.kind, edge.source, edge.target, edge.properties);
        pending.push(classify(result, edge.properties, edge.kind, describeEdge(edge)));
      }
      return pending;
    });
    record(writes, counts, diffs);
  }
}

interface StaleSet {
  nodes: { kind: NodeKind; identifier: string }[];
  edges: StoredEdge[];
}

async function findStale(store: GraphStore, bundle: GraphBundle): Promise<StaleSet> {
  const currentNodes = new Set(bundle.nodes.map(nodeKey));
  const currentEdges = new Set(bundle.edges.map((edge) => edgeKey(edge.kind, edge.source, edge.target)));
  const stale: StaleSet = { nodes: [], edges: [] };

  try {
    for (const kind of NODE_KINDS) {
      for (const identifier of await store.listNodeIds(kind)) {
        if (!currentNodes.has(nodeKey({ kind, identifier }))) {
          stale.nodes.push({ kind, identifier });
        }
      }
    }
    for (const kind of EDGE_KINDS) {
      for (const edge of await store.listEdges(kind)) {
        if (!currentEdges.has(edgeKey(edge.kind, edge.source, edge.target))) {
          stale.edges.push(edge);
        }
      }
    }
  } catch (error) {
    throw new StoreCommitError('reconcile', undefined, undefined, 0, { cause: error });
  }
  return stale;
}

async function deleteStaleEdges(store: GraphStore, edges: readonly StoredEdge[], batchSize: number, diffs: DiffWriter | undefined) {
  for (const [index, batch] of chunk(edges, batchSize).entries()) {
    await commitBatch(store, 'reconcile', undefined, index, batch.length, async (tx) => {
      for (const edge of batch) {
        await tx.deleteEdge(edge.kind, edge.source, edge.target);
      }
      return [];
    });
  }
  for (const edge of edges) {
    diffs?.addChange({ entityType: edge.kind, entityId: describeEdge(edge), changeType: 'deleted', diff: { deleted: true } });
  }
}

async function deleteStaleNodes(store: GraphStore, nodes: StaleSet['nodes'], batchSize: number, diffs: DiffWriter | undefined) {
  for (const [index, batch] of chunk(nodes, batchSize).entries()) {
    await commitBatch(store, 'reconcile', undefined, index, batch.length, async (tx) => {
      for (const node of batch) {
        await tx.deleteNode(node.kind, node.identifier);
      }
      return [];
    });
  }
  for (const node of nodes) {
    diffs?.addChange({ entityType: node.kind, entityId: node.identifier, changeType: 'deleted', diff: { deleted: true } });
  }
}

interface PruneProgress {
  edges: boolean;
  nodes: boolean;
}

// Recorded once the prune outcome is known: whatever a failed prune did not reach is kept.
function reportStale(diagnostics: DiagnosticCollector, stale: StaleSet, deleted: PruneProgress) {
  const outcome = (done: boolean) => (done ? 'deleted' : 'kept');
  for (const node of stale.nodes) {
    diagnostics.add({
      stage: 'load',
      identifier: node.identifier,
      nodeKind: node.kind,
      kind: 'stale-node',
      detail: `${node.kind} is absent from this export; ${outcome(deleted.nodes)}`
    });
  }
  for (const edge of stale.edges) {
    diagnostics.add({
      stage: 'load',
      identifier: describeEdge(edge),
      nodeKind: edge.source.kind,
      kind: 'stale-edge',
      detail: `${edge.kind} edge is absent from this export; ${outcome(deleted.edges)}`
    });
  }
}

/**
 * Applies a resolved graph to the store: constraints, every node batch, then edge batches
 * (one sequential stream per edge kind, kinds concurrently), then stale reconciliation.
 * Throws StoreCommitError at the first batch the store rejects.
 */
export async function loadGraph(store: GraphStore, bundle: GraphBundle, options: LoadOptions): Promise<LoadResult> {
  const batchSize = Math.max(1, options.batchSize ?? DEFAULT_BATCH_SIZE);
  const nodeCounts = emptyNodeCounts();
  const edgeCounts = emptyEdgeCounts();

  try {
    await store.declareConstraints();
  } catch (error) {
    throw new StoreCommitError('constraints', undefined, undefined, 0, { cause: error });
  }

  for (const [kind, nodes] of groupBy(NODE_KINDS, bundle.nodes)) {
    await writeNodes(store, kind, nodes, batchSize, nodeCounts[kind], options.diffs);
    log.info('Upserted nodes', { kind, ...nodeCounts[kind] });
  }

  const edgeGroups = [...groupBy(EDGE_KINDS, bundle.edges)];
  const settled = await Promise.allSettled(
    edgeGroups.map(([kind, edges]) => writeEdges(store, kind, edges, batchSize, edgeCounts[kind], options.diffs))
  );
  const rejected = settled.find((outcome): outcome is PromiseRejectedResult => outcome.status === 'rejected');
  if (rejected) {
    throw rejected.reason;
  }
  for (const [kind] of edgeGroups) {
    log.info('Upserted edges', { kind, ...edgeCounts[kind] });
  }

  const stale = await findStale(store, bundle);
  const progress: PruneProgress = { edges: false, nodes: false };
  try {
    // Edges before nodes.
    if (options.pruneStale === true && (stale.nodes.length || stale.edges.length)) {
      await deleteStaleEdges(store, stale.edges, batchSize, options.diffs);
      progress.edges = true;
      await deleteStaleNodes(store, stale.nodes, batchSize, options.diffs);
      progress.nodes = true;
      log.info('Pruned stale graph entries', { nodes: stale.nodes.length, edges: stale.edges.length });
    }
  } finally {
    reportStale(options.diagnostics, stale, progress);
  }

  return {
    nodes: nodeCounts,
    edges: edgeCounts,
    staleNodes: stale.nodes.length,
    staleEdges: stale.edges.length,
    pruned: progress.edges && progress.nodes
  };
}
