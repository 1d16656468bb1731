import { QueryNameSyntaxError } from '../errors.js';
import { operationOf } from '../query/parser.js';
import type { QueryOperation } from '../query/types.js';

export type DerivedResult<E> = E[] | number | boolean | void;

/** Executes a derived query by its normalized name, compiling it on first use. */
export interface DerivationRunner<E extends object> {
  find(name: string, args: readonly unknown[]): Promise<E[]>;
  count(name: string, args: readonly unknown[]): Promise<number>;
  exists(name: string, args: readonly unknown[]): Promise<boolean>;
  delete(name: string, args: readonly unknown[]): Promise<void>;
  run(name: string, args: readonly unknown[]): Promise<DerivedResult<E>>;
}

/**
 * Typed declaration of a derived repository method. The shape methods turn
 * it into a callable whose result matches the declared return type.
 *
 * @example
 * class UserRepository extends Repository<User> {
 *   readonly findByEmail = this.derive<[email: string]>('findByEmail').one();
 *   readonly countByActive = this.derive<[active: boolean]>('countByActive').count();
 * }
 */
export class DerivedMethod<E extends object, A extends unknown[]> {
  readonly operation: QueryOperation;

  constructor(
    readonly name: string,
    private readonly runner: DerivationRunner<E>,
  ) {
    this.operation = operationOf(name);
  }

  /** Single entity: the first row, or null when nothing matches. */
  one(): (...args: A) => Promise<E | null> {
    this.expect('find', 'one');
    return async (...args: A) => {
      const rows = await this.runner.find(this.name, args);
      return rows[0] ?? null;
    };
  }

  many(): (...args: A) => Promise<E[]> {
    this.expect('find', 'many');
    return (...args: A) => this.runner.find(this.name, args);
  }

  count(): (...args: A) => Promise<number> {
    this.expect('count', 'count');
    return (...args: A) => this.runner.count(this.name, args);
  }

  exists(): (...args: A) => Promise<boolean> {
    this.expect('exists', 'exists');
    return (...args: A) => this.runner.exists(this.name, args);
  }

  delete(): (...args: A) => Promise<void> {
    this.expect('delete', 'delete');
    return (...args: A) => this.runner.delete(this.name, args);
  }

  /** Unspecified result shape: find returns the full list. */
  run(): (...args: A) => Promise<DerivedResult<E>> {
    return (...args: A) => this.runner.run(this.name, args);
  }

  private expect(operation: QueryOperation, shape: string): void {
    if (this.operation !== operation) {
      throw new QueryNameSyntaxError(
        this.name,
        undefined,
        `"${this.name}" is a ${this.operation} query and cannot be declared as ${shape}()`,
      );
    }
  }
}
