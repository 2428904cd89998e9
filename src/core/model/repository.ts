import { UsageException } from '../exceptions/custom-exceptions';
import type { Property } from '../property/property';
import type { SqlStatement } from '../../shared/types/query-builder.types';
import { Comparison, Scalar, comparison, isScalar } from '../query/condition';
import { Query, QueryOptions } from '../query/query';
import {
  Adapter,
  ReadBySqlOptions,
  isSqlCapableAdapter,
} from './interfaces/adapter.interface';
import type { Model } from './model';
import type { Resource } from './resource';

/** Hand-written SQL: the statement followed by its bind values. */
export type SqlInput = string | readonly [string, ...unknown[]];

function identityOf(values: readonly unknown[]): string {
  return JSON.stringify(values, (_key, value: unknown) =>
    typeof value === 'bigint' ? value.toString() : value,
  );
}

/**
 * A named store. Builds queries against it and moves resources in and out
 * through its adapter.
 */
export class Repository {
  constructor(
    readonly name: string,
    readonly adapter: Adapter,
  ) {}

  query(model: Model, options: QueryOptions = {}): Query {
    return new Query(this, model, options);
  }

  async all(model: Model, options: QueryOptions = {}): Promise<Resource[]> {
    return this.collect(this.adapter.read(this.query(model, options)));
  }

  async first(model: Model, options: QueryOptions = {}): Promise<Resource | null> {
    const [found] = await this.all(model, { ...options, limit: 1 });
    return found ?? null;
  }

  /** The resource with the given key values, in key order. */
  async get(model: Model, ...key: Scalar[]): Promise<Resource | null> {
    const keyProperties = model.key(this.name);
    if (key.length !== keyProperties.length) {
      throw new UsageException(
        `${model.name} has a ${keyProperties.length}-part key, got ${key.length} values`,
        { expected: keyProperties.length, actual: key.length },
      );
    }
    const conditions = keyProperties.map((property, index) =>
      comparison('eql', property, key[index]),
    );
    return this.first(model, { conditions });
  }

  async count(model: Model, options: QueryOptions = {}): Promise<number> {
    const found = await this.all(model, { ...options, fields: [...model.key(this.name)] });
    return found.length;
  }

  async create(model: Model, attributes: Record<string, unknown> = {}): Promise<Resource> {
    const resource = model.build(attributes, this.name);
    await this.save(resource);
    return resource;
  }

  /**
   * Inserts a new resource or writes the dirty attributes of a saved one.
   * Returns false when nothing was written.
   */
  async save(resource: Resource): Promise<boolean> {
    if (resource.isDestroyed) {
      throw new UsageException(`${resource} has been destroyed`);
    }

    if (resource.isNew) {
      await resource.applyDefaults();
      const created = await this.adapter.create([resource]);
      resource.markSaved(this);
      return created > 0;
    }

    const dirty = resource.dirtyAttributes();
    if (dirty.size === 0) {
      return true;
    }
    const updated = await this.adapter.update(dirty, this.keyQuery(resource));
    resource.markSaved(this);
    return updated > 0;
  }

  async destroy(resource: Resource): Promise<boolean> {
    if (!resource.isSaved) {
      return false;
    }
    const deleted = await this.adapter.delete(this.keyQuery(resource));
    resource.markDestroyed();
    return deleted > 0;
  }

  /**
   * Loads `properties` into `resource` and every saved resource read
   * together with it, with one read for the group where the key has a
   * single column.
   */
  async reload(resource: Resource, properties: readonly Property[]): Promise<void> {
    const model = resource.model;
    const keyProperties = model.key(this.name);
    const fields = [...new Set([...keyProperties, ...properties])];

    const group = resource.loadGroup.filter(
      (member) => member.isSaved && member.model === model && member.persistedKey().every(isScalar),
    );
    if (!group.includes(resource)) {
      group.push(resource);
    }

    const [onlyKey] = keyProperties;
    const queries: Query[] =
      keyProperties.length === 1 && onlyKey && group.length > 1
        ? [
            this.query(model, {
              fields,
              conditions: [comparison('in', onlyKey, group.map((member) => this.scalarKey(member)[0]))],
            }),
          ]
        : group.map((member) => this.query(model, { fields, conditions: this.keyConditions(member) }));

    const byKey = new Map<string, Resource>();
    for (const member of group) {
      byKey.set(identityOf(member.persistedKey()), member);
    }

    for (const query of queries) {
      for await (const loaded of this.adapter.read(query)) {
        const target = byKey.get(identityOf(loaded.key()));
        if (!target) continue;
        for (const property of properties) {
          if (!property.isLoaded(target)) {
            property.setRaw(target, property.getRaw(loaded));
          }
        }
      }
    }
  }

  /**
   * Resources decoded from hand-written SQL, or from the SQL a query
   * compiles to.
   */
  async findBySql(model: Model, input: SqlInput | Query, options: ReadBySqlOptions = {}): Promise<Resource[]> {
    const adapter = this.adapter;
    if (!isSqlCapableAdapter(adapter)) {
      throw new UsageException(`findBySql is not supported by the ${adapter.kind} adapter`, {
        repository: this.name,
      });
    }

    let statement: SqlStatement;
    if (input instanceof Query) {
      statement = adapter.compileSelect(input);
    } else if (typeof input === 'string') {
      statement = { sql: input, bindings: [] };
    } else {
      const [sql, ...bindings] = input;
      statement = { sql, bindings };
    }

    const fields = options.fields ?? (input instanceof Query ? input.fields : undefined);
    return this.collect(adapter.readBySql(this, model, statement, { fields }));
  }

  toString(): string {
    return `#<Repository ${this.name} ${this.adapter.kind}>`;
  }

  private async collect(source: AsyncIterable<Resource>): Promise<Resource[]> {
    const resources: Resource[] = [];
    for await (const resource of source) {
      resources.push(resource);
    }
    for (const resource of resources) {
      resource.loadGroup = resources;
    }
    return resources;
  }

  private keyQuery(resource: Resource): Query {
    return this.query(resource.model, { conditions: this.keyConditions(resource) });
  }

  private keyConditions(resource: Resource): Comparison[] {
    const values = this.scalarKey(resource);
    return resource.model
      .key(this.name)
      .map((property, index) => comparison('eql', property, values[index]));
  }

  private scalarKey(resource: Resource): Scalar[] {
    const values = resource.persistedKey();
    const scalars = values.filter(isScalar);
    if (values.length === 0 || scalars.length !== values.length) {
      throw new UsageException(`${resource} has an incomplete key`, {
        model: resource.model.name,
      });
    }
    return scalars;
  }
}
