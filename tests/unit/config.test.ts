import { describe, expect, it } from 'vitest';
import { loadIngestConfig, parseBoolean, parseLang, parsePositiveInt, parseStoreBackend } from '../../src/config/ingest.js';
import { createStore } from '../../src/store/index.js';
import { MemoryGraphStore } from '../../src/store/memory.js';

describe('loadIngestConfig', () => {
  it('falls back to defaults for an empty environment', () => {
    expect(loadIngestConfig({}, {})).toEqual({
      dataRoot: './data_raw',
      lang: 'en',
      store: 'neo4j',
      neo4j: { uri: 'bolt://localhost:7687', user: 'neo4j', password: '' },
      batchSize: 500,
      pruneStale: false,
      skipDiffs: false,
      reportDir: './reports'
    });
  });

  it('reads the environment', () => {
    const config = loadIngestConfig(
      {},
      {
        DATA_ROOT: '/srv/exports',
        EXPORT_LANG: 'de',
        GRAPH_STORE: 'Memory',
        NEO4J_URI: 'neo4j://graph:7687',
        NEO4J_PASSWORD: 'test-secret',
        NEO4J_DATABASE: ' items ',
        BATCH_SIZE: '250',
        PRUNE_STALE: 'yes',
        SKIP_DIFFS: '1'
      }
    );

    expect(config).toMatchObject({
      dataRoot: '/srv/exports',
      lang: 'de',
      store: 'memory',
      neo4j: { uri: 'neo4j://graph:7687', user: 'neo4j', password: 'test-secret', database: 'items' },
      batchSize: 250,
      pruneStale: true,
      skipDiffs: true
    });
  });

  it('lets overrides win over the environment', () => {
    const config = loadIngestConfig(
      { batchSize: 10, store: 'memory', neo4j: { user: 'loader' } },
      { BATCH_SIZE: '250', GRAPH_STORE: 'neo4j', NEO4J_USER: 'neo4j' }
    );
    expect(config.batchSize).toBe(10);
    expect(config.store).toBe('memory');
    expect(config.neo4j.user).toBe('loader');
  });

  it('ignores malformed values', () => {
    const config = loadIngestConfig({}, { BATCH_SIZE: '-3', EXPORT_LANG: 'english!', GRAPH_STORE: 'sqlite', PRUNE_STALE: 'maybe' });
    expect(config).toMatchObject({ batchSize: 500, lang: 'en', store: 'neo4j', pruneStale: false });
  });
});

describe('env parsers', () => {
  it('parse the accepted spellings', () => {
    expect(parseBoolean(' OFF ', true)).toBe(false);
    expect(parseBoolean(undefined, true)).toBe(true);
    expect(parsePositiveInt('2.5', 7)).toBe(7);
    expect(parseStoreBackend(' NEO4J ', 'memory')).toBe('neo4j');
    expect(parseLang('pt-BR', 'en')).toBe('pt-BR');
  });
});

describe('createStore', () => {
  it('returns an in-memory store for dry runs', () => {
    const store = createStore(loadIngestConfig({ store: 'memory' }, {}));
    expect(store).toBeInstanceOf(MemoryGraphStore);
    expect(store.name).toBe('memory');
  });

  it('requires a password for neo4j', () => {
    expect(() => createStore(loadIngestConfig({}, {}))).toThrow('NEO4J_PASSWORD must be configured to use the neo4j store.');
  });
});
