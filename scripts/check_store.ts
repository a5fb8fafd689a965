#!/usr/bin/env tsx
import 'dotenv/config';
import { loadIngestConfig } from '../src/config/ingest.js';
import { Neo4jGraphStore } from '../src/store/neo4j.js';
import { log } from '../src/utils/log.js';

async function main() {
  const { neo4j } = loadIngestConfig();
  if (!neo4j.password) {
    throw new Error('NEO4J_PASSWORD must be configured to check the store.');
  }

  const store = Neo4jGraphStore.connect(neo4j);
  try {
    const info = await store.verify();
    log.info('Neo4j connection ok', {
      uri: neo4j.uri,
      database: neo4j.database ?? 'default',
      address: info.address,
      agent: info.agent,
      protocolVersion: info.protocolVersion
    });
  } finally {
    await store.close();
  }
}

main().catch((error: unknown) => {
  log.error('Neo4j connection check failed', error);
  process.exitCode = 1;
});
