import type pg from 'pg';
import type { TableShape } from '../types.js';

type ColumnShape = TableShape['columns'][number];

function columnType(column: ColumnShape): string {
  switch (column.type) {
    case 'integer':
      return column.generated === true ? 'SERIAL' : 'INTEGER';
    case 'float':
      return 'DOUBLE PRECISION';
    case 'string':
      return column.length !== undefined ? `VARCHAR(${column.length})` : 'TEXT';
    case 'boolean':
      return 'BOOLEAN';
    case 'datetime':
      return 'TIMESTAMPTZ';
    case 'json':
      return 'JSONB';
  }
}

function columnDefinition(column: ColumnShape): string {
  const parts = [column.name, columnType(column)];
  if (column.primaryKey) {
    parts.push('PRIMARY KEY');
  } else {
    if (!column.nullable) parts.push('NOT NULL');
    if (column.unique) parts.push('UNIQUE');
  }
  return parts.join(' ');
}

export function buildCreateTableSql(table: TableShape): string {
  const columns = table.columns.map((c) => `  ${columnDefinition(c)}`).join(',\n');
  return `CREATE TABLE IF NOT EXISTS ${table.tableName} (\n${columns}\n)`;
}

/** Creates missing tables for the given entities, in order. Idempotent. */
export async function applyEntitySchema(
  client: pg.ClientBase,
  tables: readonly TableShape[],
): Promise<void> {
  for (const table of tables) {
    await client.query(buildCreateTableSql(table));
  }
}
