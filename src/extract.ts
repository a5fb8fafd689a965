import { basename, join } from 'node:path';
import fg from 'fast-glob';
import { NODE_KIND_RULES } from './config/nodeKinds.js';
import type { RawCollection } from './types/index.js';
import { SOURCE_KINDS } from './types/index.js';
import { isPlainRecord } from './utils/coerce.js';
import { pathExists, readJson } from './utils/fs.js';
import { log } from './utils/log.js';
import { validateExportEnvelope } from './validate.js';

export interface ExtractOptions {
  dataRoot: string;
  lang: string;
  schemaDir?: string;
}

export interface ExtractResult {
  collections: RawCollection[];
  discoveredFiles: string[];
}

export function exportFileName(exportKey: string, lang: string): string {
  return `${exportKey}_${lang}.json`;
}

/**
 * Reads one export file per source kind (`ExportWeapons_en.json` and friends) from the data
 * root. Every kind must be present; a missing file or bad envelope fails before anything is
 * normalized.
 */
export async function extract(opts: ExtractOptions): Promise<ExtractResult> {
  if (!(await pathExists(opts.dataRoot))) {
    throw new Error(`Data root ${opts.dataRoot} does not exist.`);
  }

  const discoveredFiles = await fg(`Export*_${fg.escapePath(opts.lang)}.json`, {
    cwd: opts.dataRoot,
    onlyFiles: true,
    caseSensitiveMatch: false,
    deep: 1
  });
  discoveredFiles.sort();
  log.debug('Discovered export files', { dataRoot: opts.dataRoot, files: discoveredFiles });

  const located = SOURCE_KINDS.map((kind) => {
    const expected = exportFileName(NODE_KIND_RULES[kind].exportKey, opts.lang);
    const file = discoveredFiles.find((candidate) => basename(candidate).toLowerCase() === expected.toLowerCase());
    return { kind, expected, file };
  });

  const missing = located.filter((entry) => !entry.file).map((entry) => entry.expected);
  if (missing.length) {
    throw new Error(`Missing export files under ${opts.dataRoot}: ${missing.join(', ')}`);
  }

  const collections: RawCollection[] = [];
  for (const { kind, expected, file } of located) {
    if (!file) continue;
    const path = join(opts.dataRoot, file);
    const data = await readJson(path);
    await validateExportEnvelope(data, expected, opts.schemaDir);

    const exportKey = NODE_KIND_RULES[kind].exportKey;
    const records = isPlainRecord(data) ? data[exportKey] : undefined;
    if (!Array.isArray(records)) {
      throw new Error(`${expected} has no ${exportKey} list.`);
    }
    collections.push({ kind, records, source: path });
    log.info('Read export file', { kind, file, records: records.length });
  }

  return { collections, discoveredFiles };
}
