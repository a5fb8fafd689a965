import type { EdgeKind, PropertyValue, SourceKind } from '../types/index.js';

export type FieldType = 'string' | 'number' | 'boolean' | 'numberList';

export interface FieldRule {
  type: FieldType;
  /** Overrides the type default (0, false, '' or []). */
  default?: PropertyValue;
  /** Values in [0, 1]; every numeric field is also checked against 0. */
  chance?: boolean;
}

/** A scalar property whose value is the identifier of another node. */
export interface ReferenceRule {
  field: string;
  edge: EdgeKind;
  targets: readonly SourceKind[];
  /** Property of the source node carrying the edge quantity. */
  quantityField?: string;
}

/** A raw list of `{ <itemKey>, <quantityKey> }` entries, each one a reference. */
export interface ListReferenceRule {
  field: string;
  edge: EdgeKind;
  targets: readonly SourceKind[];
  itemKey: string;
  quantityKey: string;
  defaultQuantity: number;
}

export interface NodeKindRule {
  exportKey: string;
  identifierField: string;
  fields: Readonly<Record<string, FieldRule>>;
  categoryField?: string;
  references: readonly ReferenceRule[];
  listReferences: readonly ListReferenceRule[];
}

const CODEX_FLAGS = {
  codexSecret: { type: 'boolean' },
  excludeFromCodex: { type: 'boolean' }
} as const satisfies Record<string, FieldRule>;

export const NODE_KIND_RULES: Readonly<Record<SourceKind, NodeKindRule>> = {
  Weapon: {
    exportKey: 'ExportWeapons',
    identifierField: 'uniqueName',
    categoryField: 'productCategory',
    fields: {
      name: { type: 'string' },
      description: { type: 'string' },
      productCategory: { type: 'string' },
      slot: { type: 'number' },
      masteryReq: { type: 'number' },
      totalDamage: { type: 'number' },
      damagePerShot: { type: 'numberList' },
      criticalChance: { type: 'number', chance: true },
      criticalMultiplier: { type: 'number' },
      procChance: { type: 'number', chance: true },
      fireRate: { type: 'number' },
      accuracy: { type: 'number' },
      magazineSize: { type: 'number' },
      reloadTime: { type: 'number' },
      multishot: { type: 'number' },
      omegaAttenuation: { type: 'number' },
      noise: { type: 'string' },
      trigger: { type: 'string' },
      sentinel: { type: 'boolean' },
      ...CODEX_FLAGS
    },
    references: [],
    listReferences: []
  },
  Resource: {
    exportKey: 'ExportResources',
    identifierField: 'uniqueName',
    fields: {
      name: { type: 'string' },
      description: { type: 'string' },
      longDescription: { type: 'string' },
      parentName: { type: 'string' },
      primeSellingPrice: { type: 'number' },
      showInInventory: { type: 'boolean' },
      ...CODEX_FLAGS
    },
    references: [],
    listReferences: []
  },
  Recipe: {
    exportKey: 'ExportRecipes',
    identifierField: 'uniqueName',
    fields: {
      resultType: { type: 'string' },
      buildPrice: { type: 'number' },
      buildTime: { type: 'number' },
      skipBuildTimePrice: { type: 'number' },
      num: { type: 'number', default: 1 },
      consumeOnUse: { type: 'boolean' },
      alwaysAvailable: { type: 'boolean' },
      primeSellingPrice: { type: 'number' },
      ...CODEX_FLAGS
    },
    references: [
      { field: 'resultType', edge: 'BUILDS', targets: ['Weapon', 'Resource'], quantityField: 'num' }
    ],
    listReferences: [
      {
        field: 'ingredients',
        edge: 'REQUIRES',
        targets: ['Resource', 'Weapon', 'Recipe'],
        itemKey: 'ItemType',
        quantityKey: 'ItemCount',
        defaultQuantity: 1
      }
    ]
  }
};

export function defaultFor(rule: FieldRule): PropertyValue {
  if (rule.default !== undefined) {
    return Array.isArray(rule.default) ? [...rule.default] : rule.default;
  }
  switch (rule.type) {
    case 'string':
      return '';
    case 'number':
      return 0;
    case 'boolean':
      return false;
    case 'numberList':
      return [];
  }
}
