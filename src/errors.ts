export class QueryNameSyntaxError extends Error {
  override readonly name = 'QueryNameSyntaxError';

  constructor(
    readonly methodName: string,
    readonly atom?: string,
    message?: string,
  ) {
    super(
      message ??
        (atom !== undefined
          ? `Invalid query method name "${methodName}": cannot resolve "${atom}"`
          : `Invalid query method name "${methodName}"`),
    );
    // Restore prototype chain for instanceof checks
    Object.setPrototypeOf(this, new.target.prototype);
  }
}

export class QueryArgumentError extends Error {
  override readonly name = 'QueryArgumentError';

  constructor(
    readonly methodName: string,
    readonly expected: number,
    readonly received: number,
    message?: string,
  ) {
    super(message ?? `${methodName}: expected ${expected} argument(s), got ${received}`);
    Object.setPrototypeOf(this, new.target.prototype);
  }
}

export class EntityMappingError extends Error {
  override readonly name = 'EntityMappingError';

  constructor(
    readonly tableName: string,
    readonly column?: string,
    message?: string,
  ) {
    super(
      message ??
        (column !== undefined
          ? `Cannot map column "${column}" of table "${tableName}"`
          : `Cannot map rows of table "${tableName}"`),
    );
    Object.setPrototypeOf(this, new.target.prototype);
  }
}

/**
 * Raised by gateway implementations for failures of their own. Errors thrown
 * by the driver are never wrapped in it.
 */
export class BackendError extends Error {
  override readonly name = 'BackendError';

  constructor(
    message: string,
    override readonly cause?: unknown,
  ) {
    super(message);
    Object.setPrototypeOf(this, new.target.prototype);
  }
}

export class TransactionStateError extends Error {
  override readonly name = 'TransactionStateError';

  constructor(
    readonly operation: string,
    message?: string,
  ) {
    super(message ?? `Cannot ${operation}: no transaction is open`);
    Object.setPrototypeOf(this, new.target.prototype);
  }
}

export class ConfigurationError extends Error {
  override readonly name = 'ConfigurationError';

  constructor(
    readonly key: string,
    message?: string,
  ) {
    super(message ?? `Missing required configuration value ${key}`);
    Object.setPrototypeOf(this, new.target.prototype);
  }
}
