import type { IngestConfig } from '../config/ingest.js';
import { log } from '../utils/log.js';
import { MemoryGraphStore } from './memory.js';
import { Neo4jGraphStore } from './neo4j.js';
import type { GraphStore } from './types.js';

export function createStore(config: Pick<IngestConfig, 'store' | 'neo4j'>): GraphStore {
  if (config.store === 'memory') {
    log.info('Using in-memory graph store; nothing will be persisted');
    return new MemoryGraphStore();
  }
  if (!config.neo4j.password) {
    throw new Error('NEO4J_PASSWORD must be configured to use the neo4j store.');
  }
  log.info('Connecting to Neo4j', { uri: config.neo4j.uri, database: config.neo4j.database ?? 'default' });
  return Neo4jGraphStore.connect(config.neo4j);
}
