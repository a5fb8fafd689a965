import type { EdgeKind, GraphEdge, GraphNode, NodeKind, NodeRef, Properties } from '../types/index.js';
import { edgeKey, nodeKey } from '../types/index.js';
import type { GraphStore, GraphTransaction, StoredEdge, UpsertResult } from './types.js';

interface EdgeEntry extends StoredEdge {
  properties: Properties;
}

interface NodeEntry {
  kind: NodeKind;
  identifier: string;
  properties: Properties;
}

function cloneProperties(properties: Properties): Properties {
  const copy: Properties = {};
  for (const [key, value] of Object.entries(properties)) {
    copy[key] = Array.isArray(value) ? [...value] : value;
  }
  return copy;
}

function compareText(a: string, b: string): number {
  if (a === b) return 0;
  return a < b ? -1 : 1;
}

/**
 * Staged writes over the committed maps. `null` marks a deletion. Reads see staged writes
 * first, so a transaction observes its own upserts.
 */
class MemoryTransaction implements GraphTransaction {
  readonly nodes = new Map<string, NodeEntry | null>();
  readonly edges = new Map<string, EdgeEntry | null>();

  constructor(private readonly store: MemoryGraphStore) {}

  private readNode(key: string): NodeEntry | undefined {
    const staged = this.nodes.get(key);
    if (staged !== undefined) return staged ?? undefined;
    return this.store.committedNode(key);
  }

  private readEdge(key: string): EdgeEntry | undefined {
    const staged = this.edges.get(key);
    if (staged !== undefined) return staged ?? undefined;
    return this.store.committedEdge(key);
  }

  async upsertNode(kind: NodeKind, identifier: string, properties: Properties): Promise<UpsertResult> {
    const key = nodeKey({ kind, identifier });
    const existing = this.readNode(key);
    this.nodes.set(key, { kind, identifier, properties: cloneProperties(properties) });
    return {
      created: !existing,
      previous: existing ? cloneProperties(existing.properties) : {}
    };
  }

  async upsertEdge(kind: EdgeKind, source: NodeRef, target: NodeRef, properties: Properties): Promise<UpsertResult> {
    for (const endpoint of [source, target]) {
      if (!this.readNode(nodeKey(endpoint))) {
        throw new Error(`Cannot write ${kind} edge: ${endpoint.kind} ${JSON.stringify(endpoint.identifier)} does not exist`);
      }
    }
    const key = edgeKey(kind, source, target);
    const existing = this.readEdge(key);
    this.edges.set(key, { kind, source: { ...source }, target: { ...target }, properties: cloneProperties(properties) });
    return {
      created: !existing,
      previous: existing ? cloneProperties(existing.properties) : {}
    };
  }

  async deleteNode(kind: NodeKind, identifier: string): Promise<void> {
    const key = nodeKey({ kind, identifier });
    this.nodes.set(key, null);
    for (const edge of this.store.committedEdgesTouching(key)) {
      this.edges.set(edgeKey(edge.kind, edge.source, edge.target), null);
    }
    for (const [stagedKey, edge] of this.edges) {
      if (edge && (nodeKey(edge.source) === key || nodeKey(edge.target) === key)) {
        this.edges.set(stagedKey, null);
      }
    }
  }

  async deleteEdge(kind: EdgeKind, source: NodeRef, target: NodeRef): Promise<void> {
    this.edges.set(edgeKey(kind, source, target), null);
  }
}

/** In-process graph used for dry runs and tests. */
export class MemoryGraphStore implements GraphStore {
  readonly name = 'memory';
  private readonly nodes = new Map<string, NodeEntry>();
  private readonly edges = new Map<string, EdgeEntry>();
  private constraintsDeclared = false;

  get hasConstraints(): boolean {
    return this.constraintsDeclared;
  }

  async declareConstraints(): Promise<void> {
    this.constraintsDeclared = true;
  }

  async transaction<T>(work: (tx: GraphTransaction) => Promise<T>): Promise<T> {
    const tx = new MemoryTransaction(this);
    const result = await work(tx);
    for (const [key, entry] of tx.nodes) {
      if (entry) this.nodes.set(key, entry);
      else this.nodes.delete(key);
    }
    for (const [key, entry] of tx.edges) {
      if (entry) this.edges.set(key, entry);
      else this.edges.delete(key);
    }
    return result;
  }

  async listNodeIds(kind: NodeKind): Promise<string[]> {
    return [...this.nodes.values()].filter((node) => node.kind === kind).map((node) => node.identifier);
  }

  async listEdges(kind: EdgeKind): Promise<StoredEdge[]> {
    return [...this.edges.values()]
      .filter((edge) => edge.kind === kind)
      .map((edge) => ({ kind: edge.kind, source: { ...edge.source }, target: { ...edge.target } }));
  }

  async close(): Promise<void> {
    // nothing to release
  }

  committedNode(key: string): NodeEntry | undefined {
    return this.nodes.get(key);
  }

  committedEdge(key: string): EdgeEntry | undefined {
    return this.edges.get(key);
  }

  committedEdgesTouching(key: string): EdgeEntry[] {
    return [...this.edges.values()].filter(
      (edge) => nodeKey(edge.source) === key || nodeKey(edge.target) === key
    );
  }

  getNode(kind: NodeKind, identifier: string): GraphNode | undefined {
    const entry = this.nodes.get(nodeKey({ kind, identifier }));
    return entry ? { kind: entry.kind, identifier: entry.identifier, properties: cloneProperties(entry.properties) } : undefined;
  }

  getEdge(kind: EdgeKind, source: NodeRef, target: NodeRef): GraphEdge | undefined {
    const entry = this.edges.get(edgeKey(kind, source, target));
    return entry
      ? { kind, source: { ...entry.source }, target: { ...entry.target }, properties: cloneProperties(entry.properties) }
      : undefined;
  }

  /** Every node and edge, sorted by key; two equal graphs give deep-equal snapshots. */
  snapshot(): { nodes: GraphNode[]; edges: GraphEdge[] } {
    const nodes = [...this.nodes.entries()]
      .sort(([a], [b]) => compareText(a, b))
      .map(([, entry]) => ({ kind: entry.kind, identifier: entry.identifier, properties: cloneProperties(entry.properties) }));
    const edges = [...this.edges.entries()]
      .sort(([a], [b]) => compareText(a, b))
      .map(([, entry]) => ({
        kind: entry.kind,
        source: { ...entry.source },
        target: { ...entry.target },
        properties: cloneProperties(entry.properties)
      }));
    return { nodes, edges };
  }
}
