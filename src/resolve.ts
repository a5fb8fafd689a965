import type { NormalizedSets } from './normalize.js';
import type { DiagnosticCollector } from './report.js';
import type { GraphEdge, NormalizedNode, SourceKind } from './types/index.js';
import { SOURCE_KINDS, edgeKey } from './types/index.js';
import { log } from './utils/log.js';

export type IdentifierIndex = Record<SourceKind, ReadonlyMap<string, NormalizedNode>>;

export interface Resolution {
  edges: GraphEdge[];
  dangling: number;
}

function indexOf(nodes: readonly NormalizedNode[]): Map<string, NormalizedNode> {
  return new Map(nodes.map((node) => [node.identifier, node]));
}

export function buildIdentifierIndex(sets: NormalizedSets): IdentifierIndex {
  return {
    Weapon: indexOf(sets.Weapon),
    Resource: indexOf(sets.Resource),
    Recipe: indexOf(sets.Recipe)
  };
}

function lookup(
  index: IdentifierIndex,
  targets: readonly SourceKind[],
  identifier: string
): NormalizedNode | undefined {
  for (const kind of targets) {
    const hit = index[kind].get(identifier);
    if (hit) return hit;
  }
  return undefined;
}

function describeTargets(targets: readonly SourceKind[]): string {
  if (targets.length <= 1) return targets.join('');
  return `${targets.slice(0, -1).join(', ')} or ${targets[targets.length - 1]}`;
}

/**
 * Turns every reference candidate into an edge once all identifier spaces are known.
 * Edges are keyed by (source, kind, target); repeated keys sum their quantities. A failed
 * lookup is reported on its own and never drops the source's other edges.
 */
export function resolveReferences(sets: NormalizedSets, diagnostics: DiagnosticCollector): Resolution {
  const index = buildIdentifierIndex(sets);
  const edges = new Map<string, GraphEdge>();
  let dangling = 0;

  for (const kind of SOURCE_KINDS) {
    for (const node of sets[kind]) {
      const source = { kind: node.kind, identifier: node.identifier };
      for (const reference of node.references) {
        const target = lookup(index, reference.targets, reference.identifier);
        if (!target) {
          dangling++;
          diagnostics.add({
            stage: 'resolve',
            identifier: node.identifier,
            nodeKind: node.kind,
            kind: 'dangling-reference',
            detail: `${reference.field} references ${JSON.stringify(reference.identifier)}, which is not a known ${describeTargets(reference.targets)}; no ${reference.edge} edge`
          });
          continue;
        }

        const targetRef = { kind: target.kind, identifier: target.identifier };
        const key = edgeKey(reference.edge, source, targetRef);
        const existing = edges.get(key);
        const previous = existing?.properties.quantity;
        if (existing && typeof previous === 'number') {
          existing.properties.quantity = previous + reference.quantity;
          continue;
        }
        edges.set(key, {
          kind: reference.edge,
          source,
          target: targetRef,
          properties: { quantity: reference.quantity }
        });
      }
    }
  }

  log.debug('Resolved references', { edges: edges.size, dangling });
  return { edges: [...edges.values()], dangling };
}
