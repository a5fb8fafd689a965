import { describe, expect, it } from 'vitest';
import {
  constraintQuery,
  edgeDeleteQuery,
  edgeListQuery,
  edgeUpsertQuery,
  nodeDeleteQuery,
  nodeListQuery,
  nodeUpsertQuery
} from '../../src/store/neo4j.js';

describe('neo4j queries', () => {
  it('declares one uniqueness constraint per node kind on its identifier property', () => {
    expect(constraintQuery('Weapon')).toBe(
      'CREATE CONSTRAINT weapon_uniquename_unique IF NOT EXISTS FOR (n:`Weapon`) REQUIRE n.uniqueName IS UNIQUE'
    );
    expect(constraintQuery('Category')).toBe(
      'CREATE CONSTRAINT category_key_unique IF NOT EXISTS FOR (n:`Category`) REQUIRE n.key IS UNIQUE'
    );
  });

  it('merges nodes by identifier and replaces their properties', () => {
    expect(nodeUpsertQuery('Resource').split('\n')).toEqual([
      'MERGE (n:`Resource` {uniqueName: $identifier})',
      'ON CREATE SET n.__created = true',
      'WITH n, coalesce(n.__created, false) AS created, properties(n) AS previous',
      'SET n = $properties',
      'RETURN created, previous'
    ]);
  });

  it('matches both endpoints before merging an edge', () => {
    expect(edgeUpsertQuery('BELONGS_TO', 'Weapon', 'Category').split('\n')).toEqual([
      'MATCH (a:`Weapon` {uniqueName: $source})',
      'MATCH (b:`Category` {key: $target})',
      'MERGE (a)-[r:`BELONGS_TO`]->(b)',
      'ON CREATE SET r.__created = true',
      'WITH r, coalesce(r.__created, false) AS created, properties(r) AS previous',
      'SET r = $properties',
      'RETURN created, previous'
    ]);
  });

  it('builds delete and listing queries', () => {
    expect(nodeDeleteQuery('Recipe')).toBe('MATCH (n:`Recipe` {uniqueName: $identifier}) DETACH DELETE n');
    expect(edgeDeleteQuery('REQUIRES', 'Recipe', 'Resource')).toBe(
      'MATCH (a:`Recipe` {uniqueName: $source}) -[r:`REQUIRES`]-> (b:`Resource` {uniqueName: $target}) DELETE r'
    );
    expect(nodeListQuery('Category')).toBe('MATCH (n:`Category`) RETURN n.key AS identifier');
    expect(edgeListQuery('BELONGS_TO').split('\n')).toEqual([
      'MATCH (a)-[:`BELONGS_TO`]->(b)',
      'RETURN labels(a) AS sourceLabels, coalesce(a.uniqueName, a.key) AS source,',
      'labels(b) AS targetLabels, coalesce(b.uniqueName, b.key) AS target'
    ]);
  });
});
