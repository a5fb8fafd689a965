export const SOURCE_KINDS = ['Weapon', 'Resource', 'Recipe'] as const;
export type SourceKind = (typeof SOURCE_KINDS)[number];

export const NODE_KINDS = [...SOURCE_KINDS, 'Category'] as const;
export type NodeKind = (typeof NODE_KINDS)[number];

export const EDGE_KINDS = ['REQUIRES', 'BUILDS', 'BELONGS_TO'] as const;
export type EdgeKind = (typeof EDGE_KINDS)[number];

// Property carrying the identifier of each node kind, both in the store and in node properties.
// A Category is keyed by its normalized label; its display spelling may change between runs.
export const IDENTIFIER_PROPERTY: Record<NodeKind, string> = {
  Weapon: 'uniqueName',
  Resource: 'uniqueName',
  Recipe: 'uniqueName',
  Category: 'key'
};

export type PropertyValue = string | number | boolean | number[];
export type Properties = Record<string, PropertyValue>;

export interface NodeRef {
  kind: NodeKind;
  identifier: string;
}

export interface GraphNode extends NodeRef {
  properties: Properties;
}

export interface GraphEdge {
  kind: EdgeKind;
  source: NodeRef;
  target: NodeRef;
  properties: Properties;
}

/** A reference declared by a normalized record, not yet looked up. */
export interface ReferenceCandidate {
  edge: EdgeKind;
  field: string;
  identifier: string;
  quantity: number;
  targets: readonly SourceKind[];
}

export interface NormalizedNode extends GraphNode {
  kind: SourceKind;
  references: ReferenceCandidate[];
}

export interface GraphBundle {
  nodes: GraphNode[];
  edges: GraphEdge[];
}

const NODE_KIND_NAMES: ReadonlySet<string> = new Set(NODE_KINDS);

export function isNodeKind(value: unknown): value is NodeKind {
  return typeof value === 'string' && NODE_KIND_NAMES.has(value);
}

export function nodeKey(ref: NodeRef): string {
  return `${ref.kind}:${ref.identifier}`;
}

export function edgeKey(kind: EdgeKind, source: NodeRef, target: NodeRef): string {
  return `${nodeKey(source)}|${kind}|${nodeKey(target)}`;
}
