import { vi } from 'vitest';
import type pg from 'pg';
import type { EntityDescriptor } from '../../src/types.js';

export interface User {
  id?: number;
  email: string;
  fullName: string | null;
  age: number;
  active: boolean;
}

function optionalNumber(value: unknown): number | undefined {
  return value === undefined || value === null ? undefined : Number(value);
}

export const userDescriptor: EntityDescriptor<User> = {
  tableName: 'users',
  columns: [
    { name: 'id', type: 'integer', nullable: false, unique: true, primaryKey: true, generated: true },
    { name: 'email', type: 'string', nullable: false, unique: true, primaryKey: false, length: 255 },
    { name: 'full_name', property: 'fullName', type: 'string', nullable: true, unique: false, primaryKey: false },
    { name: 'age', type: 'integer', nullable: false, unique: false, primaryKey: false },
    { name: 'active', type: 'boolean', nullable: false, unique: false, primaryKey: false },
  ],
  create: (values) => ({
    id: optionalNumber(values['id']),
    email: String(values['email']),
    fullName: values['fullName'] === null || values['fullName'] === undefined ? null : String(values['fullName']),
    age: Number(values['age']),
    active: Boolean(values['active']),
  }),
};

export function userRow(overrides: Partial<Record<string, unknown>> = {}): Record<string, unknown> {
  return {
    id: 1,
    email: 'a@b.com',
    full_name: 'Ada Lovelace',
    age: 36,
    active: true,
    ...overrides,
  };
}

export interface ScriptedResult {
  rows?: Record<string, unknown>[];
  rowCount?: number;
  /** Completion tag; defaults to the statement's first word, as pg reports it. */
  command?: string;
}

export type Responder = (sql: string, params: unknown[]) => ScriptedResult | undefined;

/**
 * In-process stand-in for a pg pool: every statement goes to `responder`,
 * which answers with scripted rows (or throws to simulate a backend failure).
 * Statements it does not answer return no rows.
 */
export function makeMockPool(responder: Responder = () => undefined) {
  const client = {
    query: vi.fn(async (sql: string, params: unknown[] = []) => {
      const result = responder(sql, params) ?? {};
      const rows = result.rows ?? [];
      return {
        rows,
        rowCount: result.rowCount ?? rows.length,
        command: result.command ?? sql.split(' ', 1)[0],
      };
    }),
    release: vi.fn(),
  };
  const pool = { connect: vi.fn().mockResolvedValue(client) } as unknown as pg.Pool;
  return { pool, client };
}

/** SQL text of every statement the mock client received, in order. */
export function statements(client: ReturnType<typeof makeMockPool>['client']): string[] {
  return client.query.mock.calls.map((call) => call[0]);
}
