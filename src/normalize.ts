import {
  NODE_KIND_RULES,
  defaultFor,
  type FieldRule,
  type ListReferenceRule,
  type NodeKindRule
} from './config/nodeKinds.js';
import type { DiagnosticCollector } from './report.js';
import type {
  NormalizedNode,
  Properties,
  PropertyValue,
  RawCollection,
  RawRecord,
  ReferenceCandidate,
  SourceKind
} from './types/index.js';
import { SOURCE_KINDS } from './types/index.js';
import {
  coerceBoolean,
  coerceNumber,
  coerceString,
  isAbsent,
  isPlainRecord,
  normalizeIdentifier
} from './utils/coerce.js';
import { log } from './utils/log.js';

export type NormalizedSets = Record<SourceKind, NormalizedNode[]>;

export interface FieldContext {
  kind: SourceKind;
  identifier: string;
  diagnostics: DiagnosticCollector;
}

function formatValue(value: unknown): string {
  try {
    return JSON.stringify(value) ?? String(value);
  } catch {
    return String(value);
  }
}

function warnInvalid(ctx: FieldContext, field: string, value: unknown, expected: string) {
  ctx.diagnostics.add({
    stage: 'normalize',
    identifier: ctx.identifier,
    nodeKind: ctx.kind,
    kind: 'invalid-value',
    detail: `${field}: expected ${expected}, got ${formatValue(value)}; using default`
  });
}

function checkRange(ctx: FieldContext, field: string, rule: FieldRule, value: number) {
  const tooHigh = rule.chance === true && value > 1;
  if (value >= 0 && !tooHigh) return;
  ctx.diagnostics.add({
    stage: 'normalize',
    identifier: ctx.identifier,
    nodeKind: ctx.kind,
    kind: 'out-of-range',
    detail: `${field}: ${value} is outside ${rule.chance ? '[0, 1]' : '[0, ∞)'}`
  });
}

function normalizeNumberList(ctx: FieldContext, field: string, rule: FieldRule, value: unknown): number[] {
  if (!Array.isArray(value)) {
    warnInvalid(ctx, field, value, 'a list of numbers');
    return [];
  }
  const numbers: number[] = [];
  let dropped = 0;
  for (const entry of value) {
    const coerced = coerceNumber(entry);
    if (coerced.ok) {
      numbers.push(coerced.value);
    } else {
      dropped++;
    }
  }
  if (dropped) {
    ctx.diagnostics.add({
      stage: 'normalize',
      identifier: ctx.identifier,
      nodeKind: ctx.kind,
      kind: 'invalid-value',
      detail: `${field}: dropped ${dropped} non-numeric ${dropped === 1 ? 'entry' : 'entries'}`
    });
  }
  const negative = numbers.find((entry) => entry < 0);
  if (negative !== undefined) {
    checkRange(ctx, field, rule, negative);
  }
  return numbers;
}

export function normalizeField(
  ctx: FieldContext,
  field: string,
  rule: FieldRule,
  value: unknown
): PropertyValue {
  if (isAbsent(value)) return defaultFor(rule);

  switch (rule.type) {
    case 'string': {
      const coerced = coerceString(value);
      if (coerced.ok) return coerced.value;
      warnInvalid(ctx, field, value, 'a string');
      return defaultFor(rule);
    }
    case 'number': {
      const coerced = coerceNumber(value);
      if (!coerced.ok) {
        warnInvalid(ctx, field, value, 'a number');
        return defaultFor(rule);
      }
      checkRange(ctx, field, rule, coerced.value);
      return coerced.value;
    }
    case 'boolean': {
      const coerced = coerceBoolean(value);
      if (coerced.ok) return coerced.value;
      warnInvalid(ctx, field, value, 'a boolean');
      return defaultFor(rule);
    }
    case 'numberList':
      return normalizeNumberList(ctx, field, rule, value);
  }
}

function collectListReferences(
  ctx: FieldContext,
  rule: ListReferenceRule,
  value: unknown
): ReferenceCandidate[] {
  if (isAbsent(value)) return [];
  if (!Array.isArray(value)) {
    ctx.diagnostics.add({
      stage: 'normalize',
      identifier: ctx.identifier,
      nodeKind: ctx.kind,
      kind: 'invalid-reference',
      detail: `${rule.field}: expected a list, got ${formatValue(value)}`
    });
    return [];
  }

  const entries: unknown[] = value;
  const candidates: ReferenceCandidate[] = [];
  entries.forEach((entry, index) => {
    const target = isPlainRecord(entry) ? normalizeIdentifier(entry[rule.itemKey]) : undefined;
    if (!isPlainRecord(entry) || !target) {
      ctx.diagnostics.add({
        stage: 'normalize',
        identifier: ctx.identifier,
        nodeKind: ctx.kind,
        kind: 'invalid-reference',
        detail: `${rule.field}[${index}]: missing ${rule.itemKey}`
      });
      return;
    }

    let quantity = rule.defaultQuantity;
    const rawQuantity = entry[rule.quantityKey];
    if (!isAbsent(rawQuantity)) {
      const coerced = coerceNumber(rawQuantity);
      if (coerced.ok) {
        quantity = coerced.value;
        checkRange(ctx, `${rule.field}[${index}].${rule.quantityKey}`, { type: 'number' }, quantity);
      } else {
        warnInvalid(ctx, `${rule.field}[${index}].${rule.quantityKey}`, rawQuantity, 'a number');
      }
    }

    candidates.push({
      edge: rule.edge,
      field: rule.field,
      identifier: target,
      quantity,
      targets: rule.targets
    });
  });
  return candidates;
}

function collectScalarReferences(
  ctx: FieldContext,
  kindRule: NodeKindRule,
  properties: Properties
): ReferenceCandidate[] {
  const candidates: ReferenceCandidate[] = [];
  for (const rule of kindRule.references) {
    const value = properties[rule.field];
    if (typeof value !== 'string' || !value) {
      ctx.diagnostics.add({
        stage: 'normalize',
        identifier: ctx.identifier,
        nodeKind: ctx.kind,
        kind: 'missing-reference',
        detail: `${rule.field} is empty; no ${rule.edge} edge`
      });
      continue;
    }
    const quantity = rule.quantityField ? properties[rule.quantityField] : undefined;
    candidates.push({
      edge: rule.edge,
      field: rule.field,
      identifier: value,
      quantity: typeof quantity === 'number' ? quantity : 1,
      targets: rule.targets
    });
  }
  return candidates;
}

/**
 * Maps one raw record onto the canonical node of its kind. Returns undefined, after
 * reporting why, when the record cannot become a node.
 */
export function normalizeRecord(
  raw: unknown,
  kind: SourceKind,
  diagnostics: DiagnosticCollector,
  position = 0
): NormalizedNode | undefined {
  const kindRule = NODE_KIND_RULES[kind];
  const placeholder = `${kind}[${position}]`;

  if (!isPlainRecord(raw)) {
    diagnostics.add({
      stage: 'normalize',
      identifier: placeholder,
      nodeKind: kind,
      kind: 'malformed-record',
      detail: `expected an object, got ${Array.isArray(raw) ? 'an array' : formatValue(raw)}`
    });
    return undefined;
  }

  const record: RawRecord = raw;
  const identifier = normalizeIdentifier(record[kindRule.identifierField]);
  if (!identifier) {
    const name = normalizeIdentifier(record.name);
    diagnostics.add({
      stage: 'normalize',
      identifier: placeholder,
      nodeKind: kind,
      kind: 'missing-identifier',
      detail: `${kindRule.identifierField} is missing or empty${name ? ` (name ${JSON.stringify(name)})` : ''}`
    });
    return undefined;
  }

  const ctx: FieldContext = { kind, identifier, diagnostics };
  const properties: Properties = { [kindRule.identifierField]: identifier };
  for (const [field, rule] of Object.entries(kindRule.fields)) {
    properties[field] = normalizeField(ctx, field, rule, record[field]);
  }

  const references = collectScalarReferences(ctx, kindRule, properties);
  for (const rule of kindRule.listReferences) {
    references.push(...collectListReferences(ctx, rule, record[rule.field]));
  }

  return { kind, identifier, properties, references };
}

export function normalizeCollection(
  collection: RawCollection,
  diagnostics: DiagnosticCollector
): NormalizedNode[] {
  const byIdentifier = new Map<string, NormalizedNode>();
  collection.records.forEach((raw, position) => {
    const node = normalizeRecord(raw, collection.kind, diagnostics, position);
    if (!node) return;
    if (byIdentifier.has(node.identifier)) {
      diagnostics.add({
        stage: 'normalize',
        identifier: node.identifier,
        nodeKind: node.kind,
        kind: 'duplicate-identifier',
        detail: `record ${position} repeats an earlier ${node.kind}; keeping the later values`
      });
    }
    byIdentifier.set(node.identifier, node);
  });
  return [...byIdentifier.values()];
}

export function emptyNormalizedSets(): NormalizedSets {
  return { Weapon: [], Resource: [], Recipe: [] };
}

/**
 * Normalizes every collection. Collections declaring the same kind are concatenated in
 * the order given, so duplicates across them follow the same last-wins rule.
 */
export function normalizeCollections(
  collections: readonly RawCollection[],
  diagnostics: DiagnosticCollector
): NormalizedSets {
  const sets = emptyNormalizedSets();
  for (const kind of SOURCE_KINDS) {
    const records = collections
      .filter((collection) => collection.kind === kind)
      .flatMap((collection) => collection.records);
    const nodes = normalizeCollection({ kind, records }, diagnostics);
    sets[kind] = nodes;
    log.debug('Normalized collection', { kind, records: records.length, nodes: nodes.length });
  }
  return sets;
}
