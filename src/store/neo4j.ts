import neo4j, { type Driver, type ManagedTransaction, type ServerInfo, type Transaction } from 'neo4j-driver';
import type { EdgeKind, NodeKind, NodeRef, Properties } from '../types/index.js';
import { EDGE_KINDS, IDENTIFIER_PROPERTY, NODE_KINDS, isNodeKind } from '../types/index.js';
import { log } from '../utils/log.js';
import type { GraphStore, GraphTransaction, StoredEdge, UpsertResult } from './types.js';

export interface Neo4jConnectionConfig {
  uri: string;
  user: string;
  password: string;
  database?: string;
}

// Labels and relationship types cannot be parameters; every interpolated name comes from these lists.
function label(kind: NodeKind): string {
  if (!NODE_KINDS.includes(kind)) throw new Error(`Unknown node kind ${String(kind)}`);
  return `\`${kind}\``;
}

function relType(kind: EdgeKind): string {
  if (!EDGE_KINDS.includes(kind)) throw new Error(`Unknown edge kind ${String(kind)}`);
  return `\`${kind}\``;
}

function constraintName(kind: NodeKind): string {
  return `${kind.toLowerCase()}_${IDENTIFIER_PROPERTY[kind].toLowerCase()}_unique`;
}

export function constraintQuery(kind: NodeKind): string {
  return `CREATE CONSTRAINT ${constraintName(kind)} IF NOT EXISTS FOR (n:${label(kind)}) REQUIRE n.${IDENTIFIER_PROPERTY[kind]} IS UNIQUE`;
}

export function nodeUpsertQuery(kind: NodeKind): string {
  return [
    `MERGE (n:${label(kind)} {${IDENTIFIER_PROPERTY[kind]}: $identifier})`,
    'ON CREATE SET n.__created = true',
    'WITH n, coalesce(n.__created, false) AS created, properties(n) AS previous',
    'SET n = $properties',
    'RETURN created, previous'
  ].join('\n');
}

export function edgeUpsertQuery(kind: EdgeKind, source: NodeKind, target: NodeKind): string {
  return [
    `MATCH (a:${label(source)} {${IDENTIFIER_PROPERTY[source]}: $source})`,
    `MATCH (b:${label(target)} {${IDENTIFIER_PROPERTY[target]}: $target})`,
    `MERGE (a)-[r:${relType(kind)}]->(b)`,
    'ON CREATE SET r.__created = true',
    'WITH r, coalesce(r.__created, false) AS created, properties(r) AS previous',
    'SET r = $properties',
    'RETURN created, previous'
  ].join('\n');
}

export function nodeDeleteQuery(kind: NodeKind): string {
  return `MATCH (n:${label(kind)} {${IDENTIFIER_PROPERTY[kind]}: $identifier}) DETACH DELETE n`;
}

export function edgeDeleteQuery(kind: EdgeKind, source: NodeKind, target: NodeKind): string {
  return [
    `MATCH (a:${label(source)} {${IDENTIFIER_PROPERTY[source]}: $source})`,
    `-[r:${relType(kind)}]->`,
    `(b:${label(target)} {${IDENTIFIER_PROPERTY[target]}: $target})`,
    'DELETE r'
  ].join(' ');
}

export function nodeListQuery(kind: NodeKind): string {
  return `MATCH (n:${label(kind)}) RETURN n.${IDENTIFIER_PROPERTY[kind]} AS identifier`;
}

export function edgeListQuery(kind: EdgeKind): string {
  return [
    `MATCH (a)-[:${relType(kind)}]->(b)`,
    'RETURN labels(a) AS sourceLabels, coalesce(a.uniqueName, a.key) AS source,',
    'labels(b) AS targetLabels, coalesce(b.uniqueName, b.key) AS target'
  ].join('\n');
}

function toProperties(value: unknown): Properties {
  const properties: Properties = {};
  if (typeof value !== 'object' || value === null) return properties;
  for (const [key, entry] of Object.entries(value)) {
    if (key === '__created') continue;
    if (typeof entry === 'string' || typeof entry === 'number' || typeof entry === 'boolean') {
      properties[key] = entry;
    } else if (Array.isArray(entry) && entry.every((item) => typeof item === 'number')) {
      properties[key] = entry;
    } else if (neo4j.isInt(entry)) {
      properties[key] = entry.toNumber();
    }
  }
  return properties;
}

function kindFromLabels(labels: unknown): NodeKind | undefined {
  if (!Array.isArray(labels)) return undefined;
  return labels.find(isNodeKind);
}

interface UpsertRow {
  created: boolean;
  previous: unknown;
}

type Runner = Transaction | ManagedTransaction;

async function runUpsert(
  tx: Runner,
  query: string,
  params: Record<string, unknown>,
  missing: string
): Promise<UpsertResult> {
  const result = await tx.run<UpsertRow>(query, params);
  const record = result.records[0];
  if (!record) {
    throw new Error(missing);
  }
  const created = record.get('created');
  return { created, previous: created ? {} : toProperties(record.get('previous')) };
}

class Neo4jTransaction implements GraphTransaction {
  constructor(private readonly tx: Transaction) {}

  upsertNode(kind: NodeKind, identifier: string, properties: Properties): Promise<UpsertResult> {
    return runUpsert(
      this.tx,
      nodeUpsertQuery(kind),
      { identifier, properties },
      `MERGE on ${kind} ${JSON.stringify(identifier)} returned no row`
    );
  }

  upsertEdge(kind: EdgeKind, source: NodeRef, target: NodeRef, properties: Properties): Promise<UpsertResult> {
    return runUpsert(
      this.tx,
      edgeUpsertQuery(kind, source.kind, target.kind),
      { source: source.identifier, target: target.identifier, properties },
      `Cannot write ${kind} edge: ${source.kind} ${JSON.stringify(source.identifier)} or ${target.kind} ${JSON.stringify(target.identifier)} does not exist`
    );
  }

  async deleteNode(kind: NodeKind, identifier: string): Promise<void> {
    await this.tx.run(nodeDeleteQuery(kind), { identifier });
  }

  async deleteEdge(kind: EdgeKind, source: NodeRef, target: NodeRef): Promise<void> {
    await this.tx.run(edgeDeleteQuery(kind, source.kind, target.kind), {
      source: source.identifier,
      target: target.identifier
    });
  }
}

export class Neo4jGraphStore implements GraphStore {
  readonly name = 'neo4j';

  constructor(
    private readonly driver: Driver,
    private readonly database?: string
  ) {}

  static connect(config: Neo4jConnectionConfig): Neo4jGraphStore {
    const driver = neo4j.driver(config.uri, neo4j.auth.basic(config.user, config.password));
    return new Neo4jGraphStore(driver, config.database);
  }

  private session(mode: 'READ' | 'WRITE') {
    return this.driver.session({
      database: this.database,
      defaultAccessMode: mode === 'READ' ? neo4j.session.READ : neo4j.session.WRITE
    });
  }

  async verify(): Promise<ServerInfo> {
    return this.driver.getServerInfo({ database: this.database });
  }

  async declareConstraints(): Promise<void> {
    const session = this.session('WRITE');
    try {
      for (const kind of NODE_KINDS) {
        await session.run(constraintQuery(kind));
      }
      log.debug('Declared node constraints', { kinds: NODE_KINDS.length });
    } finally {
      await session.close();
    }
  }

  // Explicit transaction rather than executeWrite: the driver would retry the work on
  // transient errors, and a failed batch must surface to the caller instead.
  async transaction<T>(work: (tx: GraphTransaction) => Promise<T>): Promise<T> {
    const session = this.session('WRITE');
    const tx = session.beginTransaction();
    try {
      const result = await work(new Neo4jTransaction(tx));
      await tx.commit();
      return result;
    } catch (error) {
      if (tx.isOpen()) {
        await tx.rollback();
      }
      throw error;
    } finally {
      await session.close();
    }
  }

  async listNodeIds(kind: NodeKind): Promise<string[]> {
    const session = this.session('READ');
    try {
      const result = await session.executeRead((tx) =>
        tx.run<{ identifier: unknown }>(nodeListQuery(kind))
      );
      return result.records
        .map((record) => record.get('identifier'))
        .filter((identifier): identifier is string => typeof identifier === 'string');
    } finally {
      await session.close();
    }
  }

  async listEdges(kind: EdgeKind): Promise<StoredEdge[]> {
    const session = this.session('READ');
    try {
      const result = await session.executeRead((tx) =>
        tx.run<{ sourceLabels: unknown; source: unknown; targetLabels: unknown; target: unknown }>(edgeListQuery(kind))
      );
      const edges: StoredEdge[] = [];
      for (const record of result.records) {
        const sourceKind = kindFromLabels(record.get('sourceLabels'));
        const targetKind = kindFromLabels(record.get('targetLabels'));
        const source = record.get('source');
        const target = record.get('target');
        if (!sourceKind || !targetKind || typeof source !== 'string' || typeof target !== 'string') continue;
        edges.push({
          kind,
          source: { kind: sourceKind, identifier: source },
          target: { kind: targetKind, identifier: target }
        });
      }
      return edges;
    } finally {
      await session.close();
    }
  }

  async close(): Promise<void> {
    await this.driver.close();
  }
}
