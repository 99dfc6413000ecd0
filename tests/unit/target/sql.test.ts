/**
 * Unit tests for destination table SQL
 */

import { describe, it, expect } from 'vitest';
import {
  TARGET_COLUMNS,
  columnDefinition,
  countRowsSql,
  createSchemaSql,
  createTableSql,
  dropTableSql,
  insertRowSql,
  qualifiedTableName,
  quoteIdentifier,
} from '../../../src/lib/target/index.js';

const TARGET = { schema: 'survey', table: 'public_health_data' };

describe('identifiers', () => {
  it('quotes identifiers and doubles embedded quotes', () => {
    expect(quoteIdentifier('survey')).toBe('"survey"');
    expect(quoteIdentifier('odd"name')).toBe('"odd""name"');
  });

  it('qualifies the table with its schema', () => {
    expect(qualifiedTableName(TARGET)).toBe('"survey"."public_health_data"');
    expect(qualifiedTableName({ schema: 'Health Data', table: 'x' })).toBe('"Health Data"."x"');
  });
});

describe('DDL', () => {
  it('creates the schema if missing', () => {
    expect(createSchemaSql(TARGET)).toBe('CREATE SCHEMA IF NOT EXISTS "survey"');
  });

  it('drops the previous table', () => {
    expect(dropTableSql(TARGET)).toBe('DROP TABLE IF EXISTS "survey"."public_health_data"');
  });

  it('creates the destination table', () => {
    expect(createTableSql(TARGET)).toBe(
      [
        'CREATE TABLE "survey"."public_health_data" (',
        '  id INTEGER GENERATED ALWAYS AS IDENTITY PRIMARY KEY,',
        '  submission_start TIMESTAMP,',
        '  submission_end TIMESTAMP,',
        '  age_group VARCHAR(100),',
        '  gender VARCHAR(50),',
        '  vaccination_status VARCHAR(100),',
        '  healthcare_visits_count INTEGER NOT NULL,',
        '  exercise_frequency VARCHAR(100),',
        '  water_source VARCHAR(100),',
        '  sleep_hours DECIMAL(5,2) NOT NULL,',
        '  health_insurance VARCHAR(50),',
        '  created_at TIMESTAMP DEFAULT CURRENT_TIMESTAMP',
        ')',
      ].join('\n'),
    );
  });
});

describe('DML', () => {
  it('inserts the ten loaded columns positionally', () => {
    expect(insertRowSql(TARGET)).toBe(
      'INSERT INTO "survey"."public_health_data" (submission_start, submission_end, age_group, gender, vaccination_status, healthcare_visits_count, exercise_frequency, water_source, sleep_hours, health_insurance) VALUES ($1, $2, $3, $4, $5, $6, $7, $8, $9, $10)',
    );
  });

  it('counts rows', () => {
    expect(countRowsSql(TARGET)).toBe('SELECT COUNT(*) AS count FROM "survey"."public_health_data"');
  });
});

describe('column limits', () => {
  it('marks numeric columns NOT NULL', () => {
    const definitions = TARGET_COLUMNS.map(columnDefinition);
    expect(definitions.filter((definition) => definition.endsWith('NOT NULL'))).toEqual([
      'INTEGER NOT NULL',
      'DECIMAL(5,2) NOT NULL',
    ]);
  });
});
