import type { EdgeKind, NodeKind, NodeRef, Properties } from '../types/index.js';

export interface UpsertResult {
  created: boolean;
  /** Properties before this write; empty when the entity was created. */
  previous: Properties;
}

export interface StoredEdge {
  kind: EdgeKind;
  source: NodeRef;
  target: NodeRef;
}

/**
 * Writes issued inside one store transaction. Node upserts replace every property; edge
 * upserts are keyed by (source, kind, target) and require both endpoints to exist.
 */
export interface GraphTransaction {
  upsertNode(kind: NodeKind, identifier: string, properties: Properties): Promise<UpsertResult>;
  upsertEdge(kind: EdgeKind, source: NodeRef, target: NodeRef, properties: Properties): Promise<UpsertResult>;
  deleteNode(kind: NodeKind, identifier: string): Promise<void>;
  deleteEdge(kind: EdgeKind, source: NodeRef, target: NodeRef): Promise<void>;
}

export interface GraphStore {
  readonly name: string;
  /** Unique (kind, identifier) per node kind. Safe to call on every run. */
  declareConstraints(): Promise<void>;
  /** Commits when `work` resolves, rolls back when it rejects. Never retries. */
  transaction<T>(work: (tx: GraphTransaction) => Promise<T>): Promise<T>;
  listNodeIds(kind: NodeKind): Promise<string[]>;
  listEdges(kind: EdgeKind): Promise<StoredEdge[]>;
  close(): Promise<void>;
}
