import { QueryNameSyntaxError } from '../errors.js';
import type { GeneratedQuery, ParamBinding, ParsedQuery, QueryCondition, QueryPart } from './types.js';

interface Fragment {
  sql: string;
  arity: 0 | 1 | 2;
}

/**
 * Renders one condition. LIKE-family operators share a fragment; wildcard
 * insertion happens where values are bound (see wildcardFor).
 * `In` takes a single placeholder: callers pass an already flattened value.
 */
function renderCondition(field: string, operator: QueryCondition): Fragment {
  switch (operator) {
    case 'Equals':
      return { sql: `${field} = ?`, arity: 1 };
    case 'GreaterThan':
      return { sql: `${field} > ?`, arity: 1 };
    case 'LessThan':
      return { sql: `${field} < ?`, arity: 1 };
    case 'GreaterThanEqual':
      return { sql: `${field} >= ?`, arity: 1 };
    case 'LessThanEqual':
      return { sql: `${field} <= ?`, arity: 1 };
    case 'Like':
    case 'Containing':
    case 'StartingWith':
    case 'EndingWith':
      return { sql: `${field} LIKE ?`, arity: 1 };
    case 'Between':
      return { sql: `${field} BETWEEN ? AND ?`, arity: 2 };
    case 'In':
      return { sql: `${field} IN (?)`, arity: 1 };
    case 'Not':
      return { sql: `${field} != ?`, arity: 1 };
    case 'IsNull':
      return { sql: `${field} IS NULL`, arity: 0 };
    case 'IsNotNull':
      return { sql: `${field} IS NOT NULL`, arity: 0 };
    case 'True':
      return { sql: `${field} = TRUE`, arity: 0 };
    case 'False':
      return { sql: `${field} = FALSE`, arity: 0 };
  }
}

function compileWhereClause(parts: readonly QueryPart[], bindings: ParamBinding[]): string {
  return parts
    .map((part, index) => {
      const { sql, arity } = renderCondition(part.field, part.operator);
      for (let n = 0; n < arity; n++) {
        bindings.push({ field: part.field, operator: part.operator });
      }
      if (index === 0) return sql;
      if (part.connector === null) {
        throw new QueryNameSyntaxError(
          part.field,
          undefined,
          `Condition on "${part.field}" has no connector to the preceding condition`,
        );
      }
      return ` ${part.connector.toUpperCase()} ${sql}`;
    })
    .join('');
}

/**
 * Compiles a parsed derivation into a statement with positional `?`
 * placeholders. paramOrder names the bound field of each placeholder in order.
 */
export function generateSql(parsed: ParsedQuery, tableName: string): GeneratedQuery {
  const bindings: ParamBinding[] = [];
  const where = parsed.parts.length > 0
    ? ` WHERE ${compileWhereClause(parsed.parts, bindings)}`
    : '';

  let sql: string;
  switch (parsed.operation) {
    case 'find': {
      const orderBy = parsed.orderBy.length > 0
        ? ` ORDER BY ${parsed.orderBy.map((o) => `${o.field} ${o.direction}`).join(', ')}`
        : '';
      sql = `SELECT * FROM ${tableName}${where}${orderBy}`;
      break;
    }
    case 'count':
      sql = `SELECT COUNT(*) FROM ${tableName}${where}`;
      break;
    case 'delete':
      sql = `DELETE FROM ${tableName}${where}`;
      break;
    case 'exists':
      sql = `SELECT EXISTS(SELECT 1 FROM ${tableName}${where})`;
      break;
  }

  return { sql, paramOrder: bindings.map((b) => b.field), bindings };
}

/** Applies the LIKE wildcard policy for a bound value. */
export function wildcardFor(operator: QueryCondition, value: unknown): unknown {
  if (typeof value !== 'string') return value;
  switch (operator) {
    case 'Containing':
      return `%${value}%`;
    case 'StartingWith':
      return `${value}%`;
    case 'EndingWith':
      return `%${value}`;
    default:
      return value;
  }
}
