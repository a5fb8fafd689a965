import { parseBoolean, parsePositiveInt, parseStoreBackend, type IngestConfigOverrides } from './ingest.js';

export type CliArgs = Record<string, string | boolean>;

export function parseCliArgs(tokens: string[]): CliArgs {
  const result: CliArgs = {};
  for (let i = 0; i < tokens.length; i++) {
    const token = tokens[i];
    if (!token.startsWith('--') || token === '--') continue;

    const body = token.slice(2);
    const eq = body.indexOf('=');
    if (eq >= 0) {
      result[body.slice(0, eq)] = body.slice(eq + 1);
      continue;
    }
    const next = tokens[i + 1];
    if (next !== undefined && !next.startsWith('--')) {
      result[body] = next;
      i++;
    } else {
      result[body] = true;
    }
  }
  return result;
}

export function getStringArg(args: CliArgs, key: string): string | undefined {
  const value = args[key];
  if (value === undefined) return undefined;
  if (typeof value === 'boolean') return value ? 'true' : 'false';
  return value;
}

/** `--report` must name a file. */
export function getReportPath(args: CliArgs): string | undefined {
  const value = args.report;
  if (value === undefined) return undefined;
  if (typeof value === 'boolean' || value.trim() === '') {
    throw new Error('--report needs a file path');
  }
  return value;
}

export function getFlag(args: CliArgs, key: string): boolean | undefined {
  const value = args[key];
  if (value === undefined) return undefined;
  if (typeof value === 'boolean') return value;
  return parseBoolean(value, true);
}

export function overridesFromArgs(args: CliArgs): IngestConfigOverrides {
  const overrides: IngestConfigOverrides = {};
  const dataRoot = getStringArg(args, 'data-root');
  if (dataRoot) overrides.dataRoot = dataRoot;
  const lang = getStringArg(args, 'lang');
  if (lang) overrides.lang = lang;
  const store = getStringArg(args, 'store');
  if (store) overrides.store = parseStoreBackend(store, 'neo4j');
  if (getFlag(args, 'dry-run')) overrides.store = 'memory';
  const batchSize = getStringArg(args, 'batch-size');
  if (batchSize) overrides.batchSize = parsePositiveInt(batchSize, 500);
  const pruneStale = getFlag(args, 'prune-stale');
  if (pruneStale !== undefined) overrides.pruneStale = pruneStale;
  const skipDiffs = getFlag(args, 'skip-diffs');
  if (skipDiffs !== undefined) overrides.skipDiffs = skipDiffs;
  return overrides;
}
