import { UsageException } from '../exceptions/custom-exceptions';
import type { Resource } from '../model/resource';
import type { Property } from './property';
import type { IndexOption } from './property.types';

/** index name -> ordered field names */
export type IndexMap = Map<string, string[]>;

/**
 * The ordered, name-keyed collection of a model's properties.
 *
 * Declaration order is significant: it is the order of composite keys,
 * of default field lists and of multi-column indexes.
 */
export class PropertySet implements Iterable<Property> {
  private readonly entries: Property[] = [];
  private readonly byName = new Map<string, Property>();

  private keyCache?: readonly Property[];
  private defaultsCache?: readonly Property[];
  private lazyContextsCache?: ReadonlyMap<string, readonly string[]>;

  constructor(properties: Iterable<Property> = []) {
    for (const property of properties) {
      this.add(property);
    }
  }

  get size(): number {
    return this.entries.length;
  }

  [Symbol.iterator](): Iterator<Property> {
    return this.entries[Symbol.iterator]();
  }

  toArray(): Property[] {
    return [...this.entries];
  }

  names(): string[] {
    return this.entries.map((property) => property.name);
  }

  get(name: string): Property | undefined {
    return this.byName.get(name);
  }

  named(name: string): boolean {
    return this.byName.has(name);
  }

  has(property: Property): boolean {
    return this.named(property.name);
  }

  valuesAt(...names: string[]): Array<Property | undefined> {
    return names.map((name) => this.byName.get(name));
  }

  /**
   * Appends `property`, or replaces the property of the same name in its
   * original position.
   */
  add(property: Property): this {
    const existing = this.byName.get(property.name);
    if (existing) {
      const position = this.entries.indexOf(existing);
      this.entries[position] = property;
    } else {
      this.entries.push(property);
    }
    this.byName.set(property.name, property);
    this.clearCache();
    return this;
  }

  key(): readonly Property[] {
    if (!this.keyCache) {
      this.keyCache = Object.freeze(this.entries.filter((property) => property.key));
    }
    return this.keyCache;
  }

  /** Key properties and every eagerly loaded property, in declaration order. */
  defaults(): readonly Property[] {
    if (!this.defaultsCache) {
      this.defaultsCache = Object.freeze(
        this.entries.filter((property) => property.key || !property.lazy),
      );
    }
    return this.defaultsCache;
  }

  indexes(): IndexMap {
    const indexes: IndexMap = new Map();
    for (const property of this.entries) {
      parseIndex(property.index, property.field(), indexes);
    }
    return indexes;
  }

  uniqueIndexes(): IndexMap {
    const indexes: IndexMap = new Map();
    for (const property of this.entries) {
      parseIndex(property.uniqueIndex, property.field(), indexes);
    }
    return indexes;
  }

  /** lazy context -> names of the properties loaded with it */
  lazyContexts(): ReadonlyMap<string, readonly string[]> {
    if (!this.lazyContextsCache) {
      const contexts = new Map<string, string[]>();
      for (const property of this.entries) {
        for (const context of property.lazyContexts) {
          const names = contexts.get(context) ?? [];
          names.push(property.name);
          contexts.set(context, names);
        }
      }
      this.lazyContextsCache = contexts;
    }
    return this.lazyContextsCache;
  }

  lazyContext(context: string): readonly string[] {
    return this.lazyContexts().get(context) ?? [];
  }

  propertyContexts(name: string): string[] {
    const contexts: string[] = [];
    for (const [context, names] of this.lazyContexts()) {
      if (names.includes(name)) {
        contexts.push(context);
      }
    }
    return contexts;
  }

  /**
   * Expands `names` to everything that has to be fetched with them: a name in
   * one or more lazy contexts brings in every property of those contexts,
   * other names pass through unchanged.
   */
  lazyLoadContext(names: string | readonly string[]): string[] {
    if (typeof names !== 'string' && names.length === 0) {
      throw new UsageException('names cannot be empty');
    }

    const result = new Set<string>();
    for (const name of typeof names === 'string' ? [names] : names) {
      const contexts = this.propertyContexts(name);
      if (contexts.length === 0) {
        result.add(name);
        continue;
      }
      for (const context of contexts) {
        for (const member of this.lazyContext(context)) {
          result.add(member);
        }
      }
    }
    return [...result];
  }

  async getValues(resource: Resource): Promise<unknown[]> {
    const values: unknown[] = [];
    for (const property of this.entries) {
      values.push(await property.get(resource));
    }
    return values;
  }

  setValues(resource: Resource, values: readonly unknown[]): void {
    this.entries.forEach((property, index) => {
      if (index < values.length) {
        property.set(resource, values[index]);
      }
    });
  }

  clone(): PropertySet {
    return new PropertySet(this.entries);
  }

  toString(): string {
    return `#<PropertySet { ${this.entries.map(String).join(', ')} }>`;
  }

  private clearCache(): void {
    this.keyCache = undefined;
    this.defaultsCache = undefined;
    this.lazyContextsCache = undefined;
  }
}

function parseIndex(index: IndexOption | undefined, field: string, indexes: IndexMap): void {
  if (index === undefined) {
    return;
  }
  if (index === true) {
    indexes.set(field, [field]);
    return;
  }
  if (typeof index === 'string') {
    const fields = indexes.get(index) ?? [];
    fields.push(field);
    indexes.set(index, fields);
    return;
  }
  for (const entry of index) {
    parseIndex(entry, field, indexes);
  }
}
