import { QueryNameSyntaxError } from '../errors.js';
import type {
  Connector,
  OrderSpec,
  ParsedQuery,
  QueryCondition,
  QueryOperation,
  QueryPart,
} from './types.js';

const OPERATIONS: readonly QueryOperation[] = ['find', 'count', 'delete', 'exists'];
const OPERATION_PATTERN = /^(find|count|delete|exists)By/;
const SNAKE_OPERATION_PATTERN = /^(find|count|delete|exists)_by_/;

// A connector only splits when the next atom starts (uppercase) or the name ends,
// so fields like OrderId or Android stay whole.
const CONNECTOR_SPLIT = /(And|Or)(?=[A-Z]|$)/;
const ORDER_SPLIT = /And(?=[A-Z]|$)/;
const FIELD_PATTERN = /^[A-Za-z][A-Za-z0-9]*$/;

/** Longest suffix first: GreaterThanEqual must win over GreaterThan. */
const OPERATOR_SUFFIXES: readonly Exclude<QueryCondition, 'Equals'>[] = [
  'GreaterThanEqual',
  'LessThanEqual',
  'StartingWith',
  'GreaterThan',
  'Containing',
  'EndingWith',
  'IsNotNull',
  'LessThan',
  'Between',
  'IsNull',
  'False',
  'True',
  'Like',
  'Not',
  'In',
];

/**
 * Converts a boundary-cased identifier to its storage name:
 * `createdAt` -> `created_at`, `HTTPStatus` -> `http_status`.
 */
export function toStorageName(identifier: string): string {
  const acronymSplit = identifier.replace(/(.)([A-Z][a-z]+)/g, '$1_$2');
  return acronymSplit.replace(/([a-z0-9])([A-Z])/g, '$1_$2').toLowerCase();
}

/** True when the name follows the derivation convention in either casing. */
export function isDerivableName(name: string): boolean {
  return OPERATION_PATTERN.test(name) || SNAKE_OPERATION_PATTERN.test(name);
}

/**
 * Maps a snake_case derivation name onto the camelCase grammar the parser reads.
 * `find_by_email_and_active` -> `findByEmailAndActive`. Other names are returned as is.
 */
export function normalizeMethodName(name: string): string {
  return SNAKE_OPERATION_PATTERN.test(name) ? toCamelCase(name) : name;
}

/** `delete_by_id` -> `deleteById`. Names without underscores are returned as is. */
export function toCamelCase(name: string): string {
  if (!name.includes('_')) return name;
  const [head = '', ...rest] = name.split('_');
  return head + rest.map((word) => word.charAt(0).toUpperCase() + word.slice(1).toLowerCase()).join('');
}

/** Reads only the operation prefix of a camelCase derivation name. */
export function operationOf(name: string): QueryOperation {
  const prefix = OPERATION_PATTERN.exec(name)?.[1];
  const operation = OPERATIONS.find((op) => op === prefix);
  if (operation === undefined) {
    throw new QueryNameSyntaxError(name);
  }
  return operation;
}

function parseAtom(methodName: string, atom: string): { field: string; operator: QueryCondition } {
  if (atom === '') {
    throw new QueryNameSyntaxError(methodName, atom, `Invalid query method name "${methodName}": empty condition`);
  }

  for (const operator of OPERATOR_SUFFIXES) {
    if (!atom.endsWith(operator)) continue;
    const field = atom.slice(0, -operator.length);
    if (field === '') break; // the whole atom may still be a bare field, e.g. "Like"
    if (!FIELD_PATTERN.test(field)) throw new QueryNameSyntaxError(methodName, atom);
    return { field: toStorageName(field), operator };
  }

  if (!FIELD_PATTERN.test(atom)) throw new QueryNameSyntaxError(methodName, atom);
  return { field: toStorageName(atom), operator: 'Equals' };
}

function parseConditions(methodName: string, segment: string): QueryPart[] {
  if (segment === '') {
    throw new QueryNameSyntaxError(
      methodName,
      undefined,
      `Invalid query method name "${methodName}": no conditions after "By"`,
    );
  }

  // split() with a capture group interleaves atoms and connectors: [atom, conn, atom, ...]
  const tokens = segment.split(CONNECTOR_SPLIT);
  const parts: QueryPart[] = [];
  let connector: Connector | null = null;

  for (let i = 0; i < tokens.length; i++) {
    const token = tokens[i] ?? '';
    if (i % 2 === 1) {
      connector = token === 'Or' ? 'Or' : 'And';
      continue;
    }
    const { field, operator } = parseAtom(methodName, token);
    parts.push({ field, operator, connector });
  }

  return parts;
}

function parseOrderBy(methodName: string, segment: string): OrderSpec[] {
  return segment.split(ORDER_SPLIT).map((token) => {
    let field = token;
    let direction: OrderSpec['direction'] = 'ASC';
    if (token.endsWith('Desc')) {
      field = token.slice(0, -4);
      direction = 'DESC';
    } else if (token.endsWith('Asc')) {
      field = token.slice(0, -3);
    }
    if (!FIELD_PATTERN.test(field)) {
      throw new QueryNameSyntaxError(methodName, token);
    }
    return { field: toStorageName(field), direction };
  });
}

/**
 * Parses `<find|count|delete|exists>By<conditions>[OrderBy<orders>]`.
 * Conditions are kept flat and left-to-right; no precedence is applied.
 */
export function parseMethodName(name: string): ParsedQuery {
  const operation = operationOf(name);
  const remainder = name.slice(operation.length + 'By'.length);

  const orderIndex = remainder.indexOf('OrderBy');
  const conditionSegment = orderIndex === -1 ? remainder : remainder.slice(0, orderIndex);
  const orderBy = orderIndex === -1 ? [] : parseOrderBy(name, remainder.slice(orderIndex + 'OrderBy'.length));

  return {
    operation,
    parts: parseConditions(name, conditionSegment),
    orderBy,
  };
}
