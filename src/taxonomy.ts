import { NODE_KIND_RULES } from './config/nodeKinds.js';
import { DisplayNameTally, canonicalCategory } from './lib/canon.js';
import type { DiagnosticCollector } from './report.js';
import type { GraphEdge, GraphNode, NormalizedNode } from './types/index.js';
import { log } from './utils/log.js';

export interface Taxonomy {
  categories: GraphNode[];
  memberships: GraphEdge[];
}

interface CategoryEntry {
  tally: DisplayNameTally;
  members: NormalizedNode[];
}

/**
 * Derives one Category per distinct normalized label across every item kind that declares a
 * category field, plus a BELONGS_TO candidate per categorized item. Collected in one pass and
 * returned as a batch; nothing is written here.
 */
export function buildTaxonomy(
  nodes: readonly NormalizedNode[],
  diagnostics: DiagnosticCollector
): Taxonomy {
  const entries = new Map<string, CategoryEntry>();

  for (const node of nodes) {
    const field = NODE_KIND_RULES[node.kind].categoryField;
    if (!field) continue;

    const raw = node.properties[field];
    const canonical = typeof raw === 'string' ? canonicalCategory(raw) : undefined;
    if (!canonical) {
      diagnostics.add({
        stage: 'taxonomy',
        identifier: node.identifier,
        nodeKind: node.kind,
        kind: 'missing-category',
        detail: `${field} is empty; ${node.kind} is not linked to a Category`
      });
      continue;
    }

    let entry = entries.get(canonical.key);
    if (!entry) {
      entry = { tally: new DisplayNameTally(), members: [] };
      entries.set(canonical.key, entry);
    }
    entry.tally.observe(canonical.display);
    entry.members.push(node);
  }

  const categories: GraphNode[] = [];
  const memberships: GraphEdge[] = [];

  for (const [key, entry] of entries) {
    const name = entry.tally.pick() ?? key;
    categories.push({
      kind: 'Category',
      identifier: key,
      properties: { key, name }
    });
    for (const member of entry.members) {
      memberships.push({
        kind: 'BELONGS_TO',
        source: { kind: member.kind, identifier: member.identifier },
        target: { kind: 'Category', identifier: key },
        properties: {}
      });
    }
  }

  log.debug('Derived taxonomy', { categories: categories.length, memberships: memberships.length });
  return { categories, memberships };
}
