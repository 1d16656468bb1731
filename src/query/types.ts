export type QueryOperation = 'find' | 'count' | 'delete' | 'exists';

export type QueryCondition =
  | 'Equals'
  | 'GreaterThan'
  | 'LessThan'
  | 'GreaterThanEqual'
  | 'LessThanEqual'
  | 'Like'
  | 'Containing'
  | 'StartingWith'
  | 'EndingWith'
  | 'Between'
  | 'In'
  | 'Not'
  | 'IsNull'
  | 'IsNotNull'
  | 'True'
  | 'False';

export type Connector = 'And' | 'Or';

export type SortDirection = 'ASC' | 'DESC';

/** `connector` is null only on the first part. */
export interface QueryPart {
  field: string;
  operator: QueryCondition;
  connector: Connector | null;
}

export interface OrderSpec {
  field: string;
  direction: SortDirection;
}

export interface ParsedQuery {
  operation: QueryOperation;
  parts: QueryPart[];
  orderBy: OrderSpec[];
}

export interface ParamBinding {
  field: string;
  operator: QueryCondition;
}

export interface GeneratedQuery {
  sql: string;
  /** Bound field names in placeholder order. */
  paramOrder: string[];
  /** Same order as paramOrder, with the operator that consumes each placeholder. */
  bindings: ParamBinding[];
}
