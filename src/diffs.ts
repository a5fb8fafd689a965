import { isDeepStrictEqual } from 'node:util';
import type { Properties } from './types/index.js';
import { createDiffRows } from './utils/directus.js';

export type DiffChangeType = 'created' | 'updated' | 'deleted';

export interface DiffEntry {
  entityType: string;
  entityId: string;
  changeType: DiffChangeType;
  diff: Record<string, unknown>;
}

export interface DiffWriterOptions {
  skip?: boolean;
  chunkSize?: number;
}

const DEFAULT_CHUNK_SIZE = 100;

function chunk<T>(items: readonly T[], size: number): T[][] {
  if (size <= 0) throw new Error('chunk size must be greater than zero');
  const result: T[][] = [];
  for (let i = 0; i < items.length; i += size) {
    result.push(items.slice(i, i + size));
  }
  return result;
}

/**
 * Field-level difference between two property sets, or null when they are equal. Fields are
 * the union of both sides: a full-replace write can drop a field as well as change one.
 */
export function computeDiff(before: Properties, after: Properties): Record<string, unknown> | null {
  const fields = new Set([...Object.keys(before), ...Object.keys(after)]);
  const changes: Record<string, { before: unknown; after: unknown }> = {};
  for (const field of fields) {
    const prev = before[field];
    const next = after[field];
    if (!isDeepStrictEqual(prev, next)) {
      changes[field] = { before: prev ?? null, after: next ?? null };
    }
  }
  return Object.keys(changes).length ? changes : null;
}

export class DiffWriter {
  private readonly chunkSize: number;
  private readonly skip: boolean;
  private readonly entries: DiffEntry[] = [];

  constructor(options: DiffWriterOptions = {}) {
    this.skip = Boolean(options.skip);
    this.chunkSize = Math.max(1, options.chunkSize ?? DEFAULT_CHUNK_SIZE);
  }

  get size(): number {
    return this.entries.length;
  }

  list(): DiffEntry[] {
    return [...this.entries];
  }

  addChange(entry: DiffEntry): boolean {
    if (this.skip) return false;
    if (!Object.keys(entry.diff).length) return false;
    this.entries.push(entry);
    return true;
  }

  async flush(runId: string): Promise<void> {
    if (this.skip || !this.entries.length) return;
    const nowIso = new Date().toISOString();
    for (const batch of chunk(this.entries, this.chunkSize)) {
      await createDiffRows(batch.map((entry) => ({
        run: runId,
        entity_type: entry.entityType,
        entity_id: entry.entityId,
        change_type: entry.changeType,
        diff: entry.diff,
        date_created: nowIso
      })));
    }
    this.entries.length = 0;
  }
}
