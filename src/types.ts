import type { QueryOperation } from './query/types.js';

export type ColumnType = 'integer' | 'float' | 'string' | 'boolean' | 'datetime' | 'json';

export interface ColumnDescriptor<E extends object = object> {
  /** Storage column name, e.g. `created_at`. */
  name: string;
  /** Entity property the column hydrates into. Defaults to `name`. */
  property?: keyof E & string;
  type: ColumnType;
  nullable: boolean;
  unique: boolean;
  primaryKey: boolean;
  /** Value is assigned by the database (SERIAL identity). */
  generated?: boolean;
  /** VARCHAR length for string columns. */
  length?: number;
}

/**
 * Read-only description of one mapped table, supplied by the entity-metadata
 * layer. Columns are listed in table order.
 */
export interface EntityDescriptor<E extends object = object> {
  readonly tableName: string;
  readonly columns: readonly ColumnDescriptor<E>[];
  /** Builds an entity from hydrated values keyed by property name. */
  create(values: Record<string, unknown>): E;
}

/** Entity-independent view of a descriptor, enough to emit DDL. */
export interface TableShape {
  readonly tableName: string;
  readonly columns: readonly Omit<ColumnDescriptor, 'property'>[];
}

/** One positional placeholder value, in placeholder order. */
export interface BoundParam {
  name: string;
  value: unknown;
}

export interface GatewayHooks {
  /** Called before every statement is sent to the backend. */
  onQuery?: (sql: string, params: readonly unknown[]) => void;
  /** Called when a cleanup step fails while another error is already propagating. */
  onError?: (context: string, error: unknown) => void;
}

/** Transaction primitives shared by every gateway. */
export interface TransactionControl {
  readonly depth: number;
  beginTransaction(): Promise<void>;
  /** Closes the top frame. Rejects if the backend rolled the transaction back instead. */
  commit(): Promise<void>;
  /** Closes the top frame; the frame is discarded even if the statement fails. */
  rollback(): Promise<void>;
  reportError(context: string, error: unknown): void;
}

export interface PersistenceGateway extends TransactionControl {
  save<E extends object>(descriptor: EntityDescriptor<E>, entity: E): Promise<E>;
  findById<E extends object>(descriptor: EntityDescriptor<E>, id: unknown): Promise<E | null>;
  findAll<E extends object>(descriptor: EntityDescriptor<E>): Promise<E[]>;
  delete<E extends object>(descriptor: EntityDescriptor<E>, entity: E): Promise<void>;
  update<E extends object>(descriptor: EntityDescriptor<E>, entity: E): Promise<E>;
  exists<E extends object>(descriptor: EntityDescriptor<E>, id: unknown): Promise<boolean>;
  count<E extends object>(descriptor: EntityDescriptor<E>): Promise<number>;

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

  /** Rolls back any open frames and releases the backend connection. */
  close(): Promise<void>;
}
