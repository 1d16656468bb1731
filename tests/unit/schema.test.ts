import { describe, it, expect, vi } from 'vitest';
import type pg from 'pg';
import { applyEntitySchema, buildCreateTableSql } from '../../src/gateway/schema.js';
import type { TableShape } from '../../src/types.js';
import { userDescriptor } from './helpers.js';

describe('buildCreateTableSql', () => {
  it('renders one column per line with its constraints', () => {
    expect(buildCreateTableSql(userDescriptor)).toBe(
      [
        'CREATE TABLE IF NOT EXISTS users (',
        '  id SERIAL PRIMARY KEY,',
        '  email VARCHAR(255) NOT NULL UNIQUE,',
        '  full_name TEXT,',
        '  age INTEGER NOT NULL,',
        '  active BOOLEAN NOT NULL',
        ')',
      ].join('\n'),
    );
  });

  it('maps every column type', () => {
    const table: TableShape = {
      tableName: 'samples',
      columns: [
        { name: 'code', type: 'integer', nullable: false, unique: false, primaryKey: true },
        { name: 'score', type: 'float', nullable: true, unique: false, primaryKey: false },
        { name: 'seen_at', type: 'datetime', nullable: true, unique: false, primaryKey: false },
        { name: 'data', type: 'json', nullable: true, unique: false, primaryKey: false },
      ],
    };
    expect(buildCreateTableSql(table)).toBe(
      [
        'CREATE TABLE IF NOT EXISTS samples (',
        '  code INTEGER PRIMARY KEY,',
        '  score DOUBLE PRECISION,',
        '  seen_at TIMESTAMPTZ,',
        '  data JSONB',
        ')',
      ].join('\n'),
    );
  });
});

describe('applyEntitySchema', () => {
  it('issues one CREATE TABLE per entity in order', async () => {
    const client = { query: vi.fn().mockResolvedValue({ rows: [] }) };
    const other: TableShape = {
      tableName: 'tags',
      columns: [{ name: 'label', type: 'string', nullable: false, unique: false, primaryKey: true }],
    };
    await applyEntitySchema(client as unknown as pg.ClientBase, [userDescriptor, other]);
    expect(client.query).toHaveBeenCalledTimes(2);
    expect(client.query.mock.calls[0]?.[0]).toBe(buildCreateTableSql(userDescriptor));
    expect(client.query.mock.calls[1]?.[0]).toBe('CREATE TABLE IF NOT EXISTS tags (\n  label TEXT PRIMARY KEY\n)');
  });
});
