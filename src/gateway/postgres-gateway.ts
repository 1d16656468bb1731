import type pg from 'pg';
import type { QueryOperation } from '../query/types.js';
import type {
  BoundParam,
  ColumnDescriptor,
  EntityDescriptor,
  GatewayHooks,
  PersistenceGateway,
} from '../types.js';
import { BackendError, EntityMappingError, QueryArgumentError, TransactionStateError } from '../errors.js';
import { columnValue, mapRow, primaryKeyOf } from './row-mapper.js';
import type { Row } from './row-mapper.js';
import { countPlaceholders, toNativePlaceholders } from './placeholders.js';
import { TransactionStack } from './transaction-stack.js';

export interface GatewayConfig {
  pool: pg.Pool;
  hooks?: GatewayHooks;
}

function defaultOnError(context: string, error: unknown): void {
  console.error(`[derived-repo] ${context} failed:`, error);
}

function isAbsent(value: unknown): boolean {
  return value === undefined || value === null;
}

function toDriverValue<E extends object>(column: ColumnDescriptor<E>, value: unknown): unknown {
  // pg would send arrays as Postgres array literals; JSONB wants JSON text
  if (column.type === 'json' && !isAbsent(value)) return JSON.stringify(value);
  return value;
}

function scalarOf(result: pg.QueryResult<Row>, sql: string): unknown {
  const row = result.rows[0];
  if (row === undefined) {
    throw new BackendError(`Scalar query returned no row: ${sql}`);
  }
  return Object.values(row)[0];
}

/**
 * One backend session: a single pg connection, acquired on first use, plus its
 * transaction stack. Not safe for concurrent units of work.
 */
export class PostgresGateway implements PersistenceGateway {
  private readonly pool: pg.Pool;
  private readonly hooks: GatewayHooks;
  private readonly transactions: TransactionStack;
  private clientPromise: Promise<pg.PoolClient> | null = null;
  private closed = false;

  constructor(config: GatewayConfig) {
    this.pool = config.pool;
    this.hooks = config.hooks ?? {};
    this.transactions = new TransactionStack((sql) => this.query(sql));
  }

  get depth(): number {
    return this.transactions.depth;
  }


  async beginTransaction(): Promise<void> {
    await this.transactions.begin();
  }

  async commit(): Promise<void> {
    await this.transactions.commit();
  }

  async rollback(): Promise<void> {
    await this.transactions.rollback();
  }

  reportError(context: string, error: unknown): void {
    try {
      (this.hooks.onError ?? defaultOnError)(context, error);
    } catch {
      // a failing error hook must not replace the error being reported
    }
  }

  async save<E extends object>(descriptor: EntityDescriptor<E>, entity: E): Promise<E> {
    return this.inWriteScope(() => this.insert(descriptor, entity));
  }

  async findById<E extends object>(descriptor: EntityDescriptor<E>, id: unknown): Promise<E | null> {
    const key = primaryKeyOf(descriptor);
    const result = await this.query(`SELECT * FROM ${descriptor.tableName} WHERE ${key.name} = $1`, [id]);
    const row = result.rows[0];
    return row === undefined ? null : mapRow(descriptor, row);
  }

  async findAll<E extends object>(descriptor: EntityDescriptor<E>): Promise<E[]> {
    const result = await this.query(`SELECT * FROM ${descriptor.tableName}`);
    return result.rows.map((row) => mapRow(descriptor, row));
  }

  async delete<E extends object>(descriptor: EntityDescriptor<E>, entity: E): Promise<void> {
    const key = primaryKeyOf(descriptor);
    const id = columnValue(entity, key);
    if (isAbsent(id)) {
      throw new EntityMappingError(
        descriptor.tableName,
        key.name,
        `Cannot delete from "${descriptor.tableName}": primary key "${key.name}" is not set`,
      );
    }
    await this.inWriteScope(() =>
      this.query(`DELETE FROM ${descriptor.tableName} WHERE ${key.name} = $1`, [id]),
    );
  }

  /**
   * Reconciles a possibly detached entity on its primary key: updates the row
   * when it exists, inserts it otherwise.
   */
  async update<E extends object>(descriptor: EntityDescriptor<E>, entity: E): Promise<E> {
    const key = primaryKeyOf(descriptor);
    const id = columnValue(entity, key);
    if (isAbsent(id)) return this.save(descriptor, entity);

    const assignments = descriptor.columns.filter(
      (c) => !c.primaryKey && columnValue(entity, c) !== undefined,
    );
    if (assignments.length === 0) {
      const existing = await this.findById(descriptor, id);
      return existing ?? this.save(descriptor, entity);
    }

    const setClause = assignments.map((c, i) => `${c.name} = $${i + 1}`).join(', ');
    const params = [...assignments.map((c) => toDriverValue(c, columnValue(entity, c))), id];
    const sql = `UPDATE ${descriptor.tableName} SET ${setClause} WHERE ${key.name} = $${params.length} RETURNING *`;

    return this.inWriteScope(async () => {
      const result = await this.query(sql, params);
      const row = result.rows[0];
      if (row !== undefined) return mapRow(descriptor, row);
      return this.insert(descriptor, entity);
    });
  }

  async exists<E extends object>(descriptor: EntityDescriptor<E>, id: unknown): Promise<boolean> {
    const key = primaryKeyOf(descriptor);
    const sql = `SELECT EXISTS(SELECT 1 FROM ${descriptor.tableName} WHERE ${key.name} = $1)`;
    return Boolean(scalarOf(await this.query(sql, [id]), sql));
  }

  async count<E extends object>(descriptor: EntityDescriptor<E>): Promise<number> {
    const sql = `SELECT COUNT(*) FROM ${descriptor.tableName}`;
    // COUNT(*) is a bigint, which pg returns as a string
    return Number(scalarOf(await this.query(sql), sql));
  }

  executeQuery<E extends object>(
    sql: string,
    params: readonly BoundParam[],
    descriptor: EntityDescriptor<E>,
    operation: 'find',
  ): Promise<E[]>;
  executeQuery<E extends object>(
    sql: string,
    params: readonly BoundParam[],
    descriptor: EntityDescriptor<E>,
    operation: 'count',
  ): Promise<number>;
  executeQuery<E extends object>(
    sql: string,
    params: readonly BoundParam[],
    descriptor: EntityDescriptor<E>,
    operation: 'exists',
  ): Promise<boolean>;
  executeQuery<E extends object>(
    sql: string,
    params: readonly BoundParam[],
    descriptor: EntityDescriptor<E>,
    operation: 'delete',
  ): Promise<void>;
  executeQuery<E extends object>(
    sql: string,
    params: readonly BoundParam[],
    descriptor: EntityDescriptor<E>,
    operation: QueryOperation,
  ): Promise<E[] | number | boolean | void>;
  async executeQuery<E extends object>(
    sql: string,
    params: readonly BoundParam[],
    descriptor: EntityDescriptor<E>,
    operation: QueryOperation,
  ): Promise<E[] | number | boolean | void> {
    const expected = countPlaceholders(sql);
    if (expected !== params.length) {
      throw new QueryArgumentError(sql, expected, params.length);
    }
    const text = toNativePlaceholders(sql);
    const values = params.map((p) => {
      const column = descriptor.columns.find((c) => c.name === p.name);
      return column === undefined ? p.value : toDriverValue(column, p.value);
    });

    switch (operation) {
      case 'find': {
        const result = await this.query(text, values);
        return result.rows.map((row) => mapRow(descriptor, row));
      }
      case 'count':
        return Number(scalarOf(await this.query(text, values), text));
      case 'exists':
        return Boolean(scalarOf(await this.query(text, values), text));
      case 'delete':
        await this.inWriteScope(() => this.query(text, values));
        return;
    }
  }

  /**
   * Rolls back frames left open by an abandoned unit of work, then returns the
   * connection to the pool. A connection whose rollback failed is destroyed.
   */
  async close(): Promise<void> {
    if (this.closed) return;
    // A failed connect already rejected the call that triggered it
    const client = this.clientPromise === null ? null : await this.clientPromise.catch(() => null);

    let rollbackError: unknown;
    if (client !== null && this.transactions.isOpen) {
      try {
        await this.transactions.rollbackAll();
      } catch (err) {
        rollbackError = err;
        this.reportError('rollback of open frames on close', err);
      }
    }

    this.closed = true;
    this.clientPromise = null;
    client?.release(rollbackError instanceof Error ? rollbackError : undefined);
  }

  private async insert<E extends object>(descriptor: EntityDescriptor<E>, entity: E): Promise<E> {
    const columns = descriptor.columns.filter((c) => {
      const value = columnValue(entity, c);
      return value !== undefined && !(c.generated === true && value === null);
    });

    const sql = columns.length === 0
      ? `INSERT INTO ${descriptor.tableName} DEFAULT VALUES RETURNING *`
      : `INSERT INTO ${descriptor.tableName} (${columns.map((c) => c.name).join(', ')}) ` +
        `VALUES (${columns.map((_, i) => `$${i + 1}`).join(', ')}) RETURNING *`;
    const params = columns.map((c) => toDriverValue(c, columnValue(entity, c)));

    const result = await this.query(sql, params);
    const row = result.rows[0];
    if (row === undefined) {
      throw new BackendError(`INSERT into "${descriptor.tableName}" returned no row`);
    }
    return mapRow(descriptor, row);
  }

  /** Writes auto-commit only when no frame is open; otherwise the open frame owns them. */
  private async inWriteScope<T>(work: () => Promise<T>): Promise<T> {
    if (this.transactions.isOpen) return work();

    await this.transactions.begin();
    let result: T;
    try {
      result = await work();
    } catch (err) {
      try {
        await this.transactions.rollback();
      } catch (rollbackErr) {
        this.reportError('auto-commit rollback', rollbackErr);
      }
      throw err;
    }
    await this.transactions.commit();
    return result;
  }

  private async query(sql: string, params: readonly unknown[] = []): Promise<pg.QueryResult<Row>> {
    const client = await this.connection();
    this.hooks.onQuery?.(sql, params);
    return client.query<Row>(sql, [...params]);
  }

  private connection(): Promise<pg.PoolClient> {
    if (this.closed) {
      return Promise.reject(new TransactionStateError('query', 'Gateway session is closed'));
    }
    this.clientPromise ??= this.pool.connect().catch((err: unknown) => {
      this.clientPromise = null;
      throw err;
    });
    return this.clientPromise;
  }
}
