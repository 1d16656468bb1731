import { EntityMappingError, QueryArgumentError, QueryNameSyntaxError } from '../errors.js';
import { generateSql, wildcardFor } from '../query/generator.js';
import { isDerivableName, normalizeMethodName, parseMethodName, toCamelCase } from '../query/parser.js';
import type { GeneratedQuery, QueryOperation } from '../query/types.js';
import { transactional } from '../transaction/transactional.js';
import type { BoundParam, EntityDescriptor, PersistenceGateway } from '../types.js';
import { DerivedMethod } from './derived-method.js';
import type { DerivationRunner, DerivedResult } from './derived-method.js';

export type ExplicitMethod = (...args: unknown[]) => Promise<unknown>;

interface CompiledDerivation {
  operation: QueryOperation;
  query: GeneratedQuery;
}

/**
 * CRUD facade over one gateway session and one entity descriptor.
 *
 * Method names resolve through a registry built at construction: explicit
 * implementations are bound up front, derived queries are compiled on first
 * use and cached for the life of the instance.
 */
export class Repository<E extends object> {
  private readonly explicit = new Map<string, ExplicitMethod>();
  private readonly compiled = new Map<string, CompiledDerivation>();
  private readonly runner: DerivationRunner<E>;

  constructor(
    protected readonly gateway: PersistenceGateway,
    readonly descriptor: EntityDescriptor<E>,
  ) {
    this.runner = {
      find: async (name, args) => {
        const { query } = this.compile(name);
        return this.gateway.executeQuery(query.sql, this.bind(name, args), this.descriptor, 'find');
      },
      count: async (name, args) => {
        const { query } = this.compile(name);
        return this.gateway.executeQuery(query.sql, this.bind(name, args), this.descriptor, 'count');
      },
      exists: async (name, args) => {
        const { query } = this.compile(name);
        return this.gateway.executeQuery(query.sql, this.bind(name, args), this.descriptor, 'exists');
      },
      delete: async (name, args) => {
        const { query } = this.compile(name);
        return this.gateway.executeQuery(query.sql, this.bind(name, args), this.descriptor, 'delete');
      },
      run: async (name, args) => this.execute(name, this.bind(name, args)),
    };

    this.implement('save', (entity) => this.save(this.toEntity(entity)));
    this.implement('saveAll', (entities) => this.saveAll(this.toEntities(entities)));
    this.implement('findById', (id) => this.findById(id));
    this.implement('findAll', () => this.findAll());
    this.implement('delete', (entity) => this.delete(this.toEntity(entity)));
    this.implement('deleteById', (id) => this.deleteById(id));
    this.implement('deleteAll', (entities) => this.deleteAll(this.toEntities(entities)));
    this.implement('deleteAllById', (ids) => this.deleteAllById(Array.isArray(ids) ? ids : [ids]));
    this.implement('update', (entity) => this.update(this.toEntity(entity)));
    this.implement('exists', (id) => this.exists(id));
    this.implement('count', () => this.count());
  }

  save(entity: E): Promise<E> {
    return this.gateway.save(this.descriptor, entity);
  }

  /** Saves in order inside one frame, so a failure leaves none of them written. */
  saveAll(entities: readonly E[]): Promise<E[]> {
    return transactional(this.gateway, async () => {
      const saved: E[] = [];
      for (const entity of entities) {
        saved.push(await this.save(entity));
      }
      return saved;
    });
  }

  findById(id: unknown): Promise<E | null> {
    return this.gateway.findById(this.descriptor, id);
  }

  findAll(): Promise<E[]> {
    return this.gateway.findAll(this.descriptor);
  }

  delete(entity: E): Promise<void> {
    return this.gateway.delete(this.descriptor, entity);
  }

  /** Resolves to false when no entity has the id. */
  async deleteById(id: unknown): Promise<boolean> {
    const entity = await this.findById(id);
    if (entity === null) return false;
    await this.delete(entity);
    return true;
  }

  deleteAll(entities: readonly E[]): Promise<void> {
    return transactional(this.gateway, async () => {
      for (const entity of entities) {
        await this.delete(entity);
      }
    });
  }

  deleteAllById(ids: readonly unknown[]): Promise<void> {
    return transactional(this.gateway, async () => {
      for (const id of ids) {
        await this.deleteById(id);
      }
    });
  }

  update(entity: E): Promise<E> {
    return this.gateway.update(this.descriptor, entity);
  }

  exists(id: unknown): Promise<boolean> {
    return this.gateway.exists(this.descriptor, id);
  }

  count(): Promise<number> {
    return this.gateway.count(this.descriptor);
  }

  /**
   * Calls a method by name, in camelCase or snake_case. Registered
   * implementations win under either spelling; any other name must follow the
   * derivation grammar and runs with an unspecified result shape, so find
   * queries return the full list.
   */
  async invoke(name: string, ...args: unknown[]): Promise<unknown> {
    const method = this.explicit.get(name) ?? this.explicit.get(toCamelCase(name));
    if (method !== undefined) return method(...args);
    if (!isDerivableName(name)) throw new QueryNameSyntaxError(name);
    return this.runner.run(normalizeMethodName(name), args);
  }

  /**
   * Calls a derived query with arguments keyed by storage column or entity
   * property name. A Between condition takes a `[low, high]` pair.
   */
  async invokeNamed(name: string, named: Readonly<Record<string, unknown>>): Promise<DerivedResult<E>> {
    const normalized = normalizeMethodName(name);
    const { query } = this.compile(normalized);
    const args: unknown[] = [];

    for (let i = 0; i < query.bindings.length; i++) {
      const binding = query.bindings[i];
      if (binding === undefined) break;
      const value = this.namedValue(normalized, named, binding.field);
      if (binding.operator !== 'Between') {
        args.push(value);
        continue;
      }
      if (!Array.isArray(value) || value.length !== 2) {
        throw new QueryArgumentError(
          normalized,
          2,
          Array.isArray(value) ? value.length : 1,
          `${normalized}: "${binding.field}" needs a [low, high] pair`,
        );
      }
      args.push(value[0], value[1]);
      i++; // Between consumed both of its placeholders
    }

    return this.execute(normalized, this.bind(normalized, args));
  }

  /** Declares a typed derived method. Compilation is deferred to the first call. */
  derive<A extends unknown[]>(name: string): DerivedMethod<E, A> {
    return new DerivedMethod<E, A>(normalizeMethodName(name), this.runner);
  }

  /** Compiled statement for a derived name, compiling it if needed. */
  compiledQuery(name: string): GeneratedQuery {
    return this.compile(normalizeMethodName(name)).query;
  }

  /** Registers a real implementation under a method name, taking precedence over derivation. */
  protected implement(name: string, method: ExplicitMethod): void {
    this.explicit.set(name, method);
  }

  private compile(name: string): CompiledDerivation {
    const cached = this.compiled.get(name);
    if (cached !== undefined) return cached;

    const parsed = parseMethodName(name);
    const entry: CompiledDerivation = {
      operation: parsed.operation,
      query: generateSql(parsed, this.descriptor.tableName),
    };
    this.compiled.set(name, entry);
    return entry;
  }

  private execute(name: string, params: readonly BoundParam[]): Promise<DerivedResult<E>> {
    const { query, operation } = this.compile(name);
    return this.gateway.executeQuery(query.sql, params, this.descriptor, operation);
  }

  /** Zips positional arguments onto the placeholders, applying LIKE wildcards. */
  private bind(name: string, args: readonly unknown[]): BoundParam[] {
    const { bindings } = this.compile(name).query;
    if (args.length !== bindings.length) {
      throw new QueryArgumentError(name, bindings.length, args.length);
    }
    return bindings.map((binding, i) => ({
      name: binding.field,
      value: wildcardFor(binding.operator, args[i]),
    }));
  }

  private namedValue(name: string, named: Readonly<Record<string, unknown>>, field: string): unknown {
    const property = this.descriptor.columns.find((c) => c.name === field)?.property;
    for (const key of [field, property]) {
      if (key !== undefined && Object.prototype.hasOwnProperty.call(named, key)) {
        return named[key];
      }
    }
    throw new QueryArgumentError(name, 1, 0, `${name}: missing argument "${field}"`);
  }

  private toEntity(value: unknown): E {
    if (typeof value !== 'object' || value === null || Array.isArray(value)) {
      throw new EntityMappingError(
        this.descriptor.tableName,
        undefined,
        `Expected an entity object for table "${this.descriptor.tableName}"`,
      );
    }
    return this.descriptor.create(Object.fromEntries(Object.entries(value)));
  }

  private toEntities(value: unknown): E[] {
    if (!Array.isArray(value)) {
      throw new EntityMappingError(
        this.descriptor.tableName,
        undefined,
        `Expected a list of entities for table "${this.descriptor.tableName}"`,
      );
    }
    return value.map((item) => this.toEntity(item));
  }
}
