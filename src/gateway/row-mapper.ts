import { EntityMappingError } from '../errors.js';
import type { ColumnDescriptor, EntityDescriptor } from '../types.js';

export type Row = Record<string, unknown>;

export function propertyOf<E extends object>(column: ColumnDescriptor<E>): string {
  return column.property ?? column.name;
}

export function primaryKeyOf<E extends object>(descriptor: EntityDescriptor<E>): ColumnDescriptor<E> {
  const keys = descriptor.columns.filter((c) => c.primaryKey);
  const [key] = keys;
  if (key === undefined || keys.length > 1) {
    throw new EntityMappingError(
      descriptor.tableName,
      undefined,
      `Table "${descriptor.tableName}" must declare exactly one primary key column, found ${keys.length}`,
    );
  }
  return key;
}

/** Reads the entity value stored for a column. */
export function columnValue<E extends object>(entity: E, column: ColumnDescriptor<E>): unknown {
  const value: unknown = Reflect.get(entity, propertyOf(column));
  return value;
}

/**
 * Hydrates one row by column name. Row order is irrelevant, but the row and
 * the descriptor must name the same set of columns.
 */
export function mapRow<E extends object>(descriptor: EntityDescriptor<E>, row: Row): E {
  const values: Record<string, unknown> = {};
  for (const column of descriptor.columns) {
    if (!Object.prototype.hasOwnProperty.call(row, column.name)) {
      throw new EntityMappingError(
        descriptor.tableName,
        column.name,
        `Column "${column.name}" missing from result row of table "${descriptor.tableName}"`,
      );
    }
    values[propertyOf(column)] = row[column.name];
  }

  const described = new Set(descriptor.columns.map((c) => c.name));
  for (const name of Object.keys(row)) {
    if (!described.has(name)) {
      throw new EntityMappingError(
        descriptor.tableName,
        name,
        `Result column "${name}" is not described for table "${descriptor.tableName}"`,
      );
    }
  }

  return descriptor.create(values);
}
