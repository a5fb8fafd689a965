import {
  createDirectus,
  createItem,
  createItems,
  rest,
  staticToken,
  updateItem,
  type DirectusClient,
  type RestClient,
  type StaticTokenClient
} from '@directus/sdk';
import { log } from './log.js';

export interface IngestionRunRow {
  id: string;
  state: 'running' | 'success' | 'failed';
  store?: string | null;
  data_root?: string | null;
  stats_json?: unknown;
  log?: string | null;
  report_path?: string | null;
  started_at?: string | null;
  updated_at?: string | null;
  finished_at?: string | null;
}

export interface GraphDiffRow {
  id: string;
  run: string;
  entity_type: string;
  entity_id: string;
  change_type: string;
  diff: unknown;
  date_created: string;
}

export interface RunSchema {
  ingestion_runs: IngestionRunRow[];
  graph_diffs: GraphDiffRow[];
}

export type RunCollection = keyof RunSchema;

type Client = DirectusClient<RunSchema> & StaticTokenClient<RunSchema> & RestClient<RunSchema>;

export class DirectusRequestError extends Error {
  constructor(
    readonly action: string,
    readonly collection: RunCollection,
    readonly status: number | undefined,
    readonly body: unknown,
    options?: { cause?: unknown }
  ) {
    super(
      `Directus ${action} for ${collection} failed${status ? ` with status ${status}` : ''}`,
      options
    );
    this.name = 'DirectusRequestError';
  }
}

let client: Client | undefined;

export function isDirectusConfigured(): boolean {
  return Boolean(process.env.DIRECTUS_URL && process.env.DIRECTUS_TOKEN);
}

function getClient(): Client {
  if (client) return client;
  const directusUrl = process.env.DIRECTUS_URL;
  const directusToken = process.env.DIRECTUS_TOKEN;
  if (!directusUrl || !directusToken) {
    throw new Error('DIRECTUS_URL and DIRECTUS_TOKEN must be configured in environment variables.');
  }
  client = createDirectus<RunSchema>(directusUrl).with(staticToken(directusToken)).with(rest());
  return client;
}

// The SDK throws `{ errors, response }` objects rather than Error instances.
function extractErrorDetails(error: unknown): { status?: number; body: unknown } {
  if (typeof error !== 'object' || error === null) return { body: error };
  const response = 'response' in error ? error.response : undefined;
  const status = response instanceof Response ? response.status : undefined;
  const body = 'errors' in error ? error.errors : error instanceof Error ? error.message : error;
  return { status, body };
}

async function request<T>(
  action: string,
  collection: RunCollection,
  send: (directus: Client) => Promise<T>
): Promise<T> {
  try {
    return await send(getClient());
  } catch (error) {
    const { status, body } = extractErrorDetails(error);
    log.debug('Directus request failed', { action, collection, status, body });
    throw new DirectusRequestError(action, collection, status, body, { cause: error });
  }
}

function readId(result: unknown, action: string, collection: RunCollection): string {
  if (typeof result === 'object' && result !== null && 'id' in result) {
    const { id } = result;
    if (typeof id === 'string' || typeof id === 'number') return String(id);
  }
  throw new DirectusRequestError(action, collection, undefined, result);
}

export async function createRun(item: Partial<IngestionRunRow>): Promise<string> {
  const result: unknown = await request('createOne', 'ingestion_runs', (directus) =>
    directus.request(createItem('ingestion_runs', item))
  );
  return readId(result, 'createOne', 'ingestion_runs');
}

export async function updateRun(key: string, item: Partial<IngestionRunRow>): Promise<void> {
  await request('updateOne', 'ingestion_runs', (directus) =>
    directus.request(updateItem('ingestion_runs', key, item))
  );
}

export async function createDiffRows(items: Partial<GraphDiffRow>[]): Promise<void> {
  if (!items.length) return;
  await request('createMany', 'graph_diffs', (directus) =>
    directus.request(createItems('graph_diffs', items))
  );
}
