export {
  parseMethodName,
  normalizeMethodName,
  toCamelCase,
  toStorageName,
  isDerivableName,
  operationOf,
} from './query/parser.js';
export { generateSql, wildcardFor } from './query/generator.js';
export type {
  QueryOperation,
  QueryCondition,
  Connector,
  SortDirection,
  QueryPart,
  OrderSpec,
  ParsedQuery,
  ParamBinding,
  GeneratedQuery,
} from './query/types.js';
export type {
  ColumnType,
  ColumnDescriptor,
  EntityDescriptor,
  TableShape,
  BoundParam,
  GatewayHooks,
  TransactionControl,
  PersistenceGateway,
} from './types.js';
export { PostgresGateway } from './gateway/postgres-gateway.js';
export type { GatewayConfig } from './gateway/postgres-gateway.js';
export { buildCreateTableSql, applyEntitySchema } from './gateway/schema.js';
export { transactional, makeTransactional } from './transaction/transactional.js';
export type { Outcome, TransactionalOptions, UnitOfWork } from './transaction/transactional.js';
export { Repository } from './repository/repository.js';
export type { ExplicitMethod } from './repository/repository.js';
export { DerivedMethod } from './repository/derived-method.js';
export type { DerivedResult } from './repository/derived-method.js';
export { loadDatabaseConfig, createPool, maskConnectionString } from './config.js';
export type { DatabaseConfig } from './config.js';
export { createDataContext } from './context.js';
export type { DataContext, DataContextOptions } from './context.js';
export {
  QueryNameSyntaxError,
  QueryArgumentError,
  EntityMappingError,
  BackendError,
  TransactionStateError,
  ConfigurationError,
} from './errors.js';
