import { existsSync } from 'node:fs';
import { readFile } from 'node:fs/promises';
import { dirname, join } from 'node:path';
import { fileURLToPath } from 'node:url';
import { Ajv, type AnySchema, type ValidateFunction } from 'ajv';
import addFormatsPlugin, { type FormatsPluginOptions } from 'ajv-formats';
import type { IngestionReport } from './report.js';
import type { GraphBundle, NodeKind } from './types/index.js';
import { NODE_KINDS } from './types/index.js';

const ajv = new Ajv({ allErrors: true, strict: false });
const addFormats = addFormatsPlugin as unknown as (
  ajv: Ajv,
  options?: FormatsPluginOptions
) => Ajv;
addFormats(ajv);

/**
 * Walks up from `startDir` to the package root, the first directory holding both a
 * package.json and `schemas/`. Sources run from `src/`, the build from `dist/src/`.
 */
export function findSchemaDir (startDir: string): string {
  let dir = startDir;
  for (;;) {
    const candidate = join(dir, 'schemas');
    if (existsSync(join(dir, 'package.json')) && existsSync(candidate)) {
      return candidate;
    }
    const parent = dirname(dir);
    if (parent === dir) {
      throw new Error(`No schemas directory found above ${startDir}`);
    }
    dir = parent;
  }
}

export const DEFAULT_SCHEMA_DIR = findSchemaDir(dirname(fileURLToPath(import.meta.url)));

const validatorCache = new Map<string, ValidateFunction>();

async function loadValidator (schemaPath: string): Promise<ValidateFunction> {
  const cached = validatorCache.get(schemaPath);
  if (cached) return cached;
  const schema: AnySchema = JSON.parse(await readFile(schemaPath, 'utf8'));
  const validator = ajv.compile(schema);
  validatorCache.set(schemaPath, validator);
  return validator;
}

export async function validateValue (schemaPath: string, data: unknown, label: string) {
  const validator = await loadValidator(schemaPath);
  if (!validator(data)) {
    throw new Error(ajv.errorsText(validator.errors, { dataVar: label }));
  }
}

export async function validateArray (schemaPath: string, data: readonly unknown[], label: string) {
  const validator = await loadValidator(schemaPath);
  for (const [index, entry] of data.entries()) {
    if (!validator(entry)) {
      throw new Error(ajv.errorsText(validator.errors, { dataVar: `${label}[${index}]` }));
    }
  }
}

function nodeSchemaFile (kind: NodeKind): string {
  return `${kind.toLowerCase()}.json`;
}

/** Checks every node's property set and every edge against the graph contract. */
export async function validateGraphBundle (
  bundle: GraphBundle,
  schemaDir: string = DEFAULT_SCHEMA_DIR
) {
  await Promise.all([
    ...NODE_KINDS.map((kind) =>
      validateArray(
        join(schemaDir, nodeSchemaFile(kind)),
        bundle.nodes.filter((node) => node.kind === kind).map((node) => node.properties),
        `${kind}.properties`
      )
    ),
    validateArray(join(schemaDir, 'edge.json'), bundle.edges, 'edges')
  ]);
}

export async function validateExportEnvelope (
  data: unknown,
  label: string,
  schemaDir: string = DEFAULT_SCHEMA_DIR
) {
  await validateValue(join(schemaDir, 'export.json'), data, label);
}

export async function validateReport (
  report: IngestionReport,
  schemaDir: string = DEFAULT_SCHEMA_DIR
) {
  await validateValue(join(schemaDir, 'report.json'), report, 'report');
}
