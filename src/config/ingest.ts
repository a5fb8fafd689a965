import { log } from '../utils/log.js';
import type { Neo4jConnectionConfig } from '../store/neo4j.js';

export type StoreBackend = 'neo4j' | 'memory';

export interface IngestConfig {
  dataRoot: string;
  lang: string;
  store: StoreBackend;
  neo4j: Neo4jConnectionConfig;
  batchSize: number;
  pruneStale: boolean;
  skipDiffs: boolean;
  reportDir: string;
}

export type IngestConfigOverrides = Partial<Omit<IngestConfig, 'neo4j'>> & {
  neo4j?: Partial<Neo4jConnectionConfig>;
};

const DEFAULT_BATCH_SIZE = 500;
const LANG_PATTERN = /^[a-z]{2}(?:-[a-z]{2,4})?$/i;

function readString(raw: string | undefined, fallback: string): string {
  const trimmed = raw?.trim();
  return trimmed ? trimmed : fallback;
}

export function parseBoolean(raw: string | undefined, defaultValue: boolean): boolean {
  if (!raw) return defaultValue;
  const normalized = raw.trim().toLowerCase();
  if (['1', 'true', 'yes', 'on'].includes(normalized)) return true;
  if (['0', 'false', 'no', 'off'].includes(normalized)) return false;
  log.warn('Unable to parse boolean env flag, falling back to default', {
    value: raw
  });
  return defaultValue;
}

export function parsePositiveInt(raw: string | undefined, defaultValue: number): number {
  if (!raw) return defaultValue;
  const parsed = Number(raw.trim());
  if (Number.isInteger(parsed) && parsed > 0) return parsed;
  log.warn('Unable to parse positive integer, falling back to default', {
    value: raw,
    defaultValue
  });
  return defaultValue;
}

export function parseStoreBackend(raw: string | undefined, defaultValue: StoreBackend): StoreBackend {
  if (!raw) return defaultValue;
  const normalized = raw.trim().toLowerCase();
  if (normalized === 'neo4j' || normalized === 'memory') return normalized;
  log.warn('Unknown GRAPH_STORE, falling back to default', { value: raw, defaultValue });
  return defaultValue;
}

export function parseLang(raw: string | undefined, defaultValue: string): string {
  if (!raw) return defaultValue;
  const trimmed = raw.trim();
  if (LANG_PATTERN.test(trimmed)) return trimmed;
  log.warn('Ignoring malformed EXPORT_LANG', { value: raw, defaultValue });
  return defaultValue;
}

export function loadIngestConfig(
  overrides: IngestConfigOverrides = {},
  env: NodeJS.ProcessEnv = process.env
): IngestConfig {
  const neo4j: Neo4jConnectionConfig = {
    uri: overrides.neo4j?.uri ?? readString(env.NEO4J_URI, 'bolt://localhost:7687'),
    user: overrides.neo4j?.user ?? readString(env.NEO4J_USER, 'neo4j'),
    password: overrides.neo4j?.password ?? env.NEO4J_PASSWORD ?? ''
  };
  const database = overrides.neo4j?.database ?? env.NEO4J_DATABASE?.trim();
  if (database) {
    neo4j.database = database;
  }

  return {
    dataRoot: overrides.dataRoot ?? readString(env.DATA_ROOT, './data_raw'),
    lang: overrides.lang ?? parseLang(env.EXPORT_LANG, 'en'),
    store: overrides.store ?? parseStoreBackend(env.GRAPH_STORE, 'neo4j'),
    neo4j,
    batchSize: overrides.batchSize ?? parsePositiveInt(env.BATCH_SIZE, DEFAULT_BATCH_SIZE),
    pruneStale: overrides.pruneStale ?? parseBoolean(env.PRUNE_STALE, false),
    skipDiffs: overrides.skipDiffs ?? parseBoolean(env.SKIP_DIFFS, false),
    reportDir: overrides.reportDir ?? readString(env.REPORT_DIR, './reports')
  };
}
