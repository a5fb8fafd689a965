import { MemoryGraphStore } from '../src/store/memory.js';
import type { GraphTransaction } from '../src/store/types.js';
import type { EdgeKind, RawCollection } from '../src/types/index.js';

export const FIXED_CLOCK = () => new Date('2026-01-01T00:00:00.000Z');

/** One weapon, one resource, and a recipe that builds the weapon from five of the resource. */
export function sampleCollections(): RawCollection[] {
  return [
    { kind: 'Weapon', records: [{ uniqueName: 'W1', name: 'Lex', productCategory: 'Pistols' }] },
    { kind: 'Resource', records: [{ uniqueName: 'R1', name: 'Ferrite' }] },
    {
      kind: 'Recipe',
      records: [{ uniqueName: 'B1', resultType: 'W1', ingredients: [{ ItemType: 'R1', ItemCount: 5 }] }]
    }
  ];
}

/** Memory store whose edge writes of the given kind are rejected. */
export class RejectingEdgeStore extends MemoryGraphStore {
  constructor(
    private readonly rejectedKind: EdgeKind,
    private readonly reason = 'write rejected'
  ) {
    super();
  }

  override transaction<T>(work: (tx: GraphTransaction) => Promise<T>): Promise<T> {
    return super.transaction((tx) =>
      work({
        upsertNode: (kind, identifier, properties) => tx.upsertNode(kind, identifier, properties),
        upsertEdge: (kind, source, target, properties) =>
          kind === this.rejectedKind
            ? Promise.reject(new Error(this.reason))
            : tx.upsertEdge(kind, source, target, properties),
        deleteNode: (kind, identifier) => tx.deleteNode(kind, identifier),
        deleteEdge: (kind, source, target) => tx.deleteEdge(kind, source, target)
      })
    );
  }
}

/** Memory store whose node deletions are rejected. */
export class RejectingNodeDeleteStore extends MemoryGraphStore {
  override transaction<T>(work: (tx: GraphTransaction) => Promise<T>): Promise<T> {
    return super.transaction((tx) =>
      work({
        upsertNode: (kind, identifier, properties) => tx.upsertNode(kind, identifier, properties),
        upsertEdge: (kind, source, target, properties) => tx.upsertEdge(kind, source, target, properties),
        deleteNode: () => Promise.reject(new Error('delete refused')),
        deleteEdge: (kind, source, target) => tx.deleteEdge(kind, source, target)
      })
    );
  }
}
