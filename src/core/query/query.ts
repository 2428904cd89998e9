import { UsageException } from '../exceptions/custom-exceptions';
import type { Model } from '../model/model';
import type { Repository } from '../model/repository';
import { Property } from '../property/property';
import type { PropertySet } from '../property/property-set';
import { Condition, WhereHash, parseWhere } from './condition';
import type { Link } from './link';

export type SortDirection = 'asc' | 'desc';

export interface Direction {
  readonly property: Property;
  readonly direction: SortDirection;
}

/** `'name'`, `'-name'` (descending) or an explicit direction */
export type OrderInput = string | Direction;

export interface QueryOptions {
  fields?: ReadonlyArray<string | Property>;
  where?: WhereHash;
  conditions?: readonly Condition[];
  order?: readonly OrderInput[];
  limit?: number;
  offset?: number;
  links?: readonly Link[];
  unique?: boolean;
}

function assertCount(name: string, value: number | undefined): void {
  if (value !== undefined && !(Number.isInteger(value) && value >= 0)) {
    throw new UsageException(`${name} must be a non-negative integer, but was ${value}`);
  }
}

/**
 * What to read: the model, the projected fields, the AND-ed conditions,
 * ordering, paging and the links to join through.
 */
export class Query {
  readonly fields: readonly Property[];
  readonly conditions: readonly Condition[];
  readonly order: readonly Direction[];
  readonly limit?: number;
  readonly offset: number;
  readonly links: readonly Link[];
  readonly unique: boolean;

  constructor(
    readonly repository: Repository,
    readonly model: Model,
    private readonly options: QueryOptions = {},
  ) {
    assertCount('limit', options.limit);
    assertCount('offset', options.offset);

    const properties = this.properties;

    this.fields = Object.freeze(
      options.fields
        ? options.fields.map((field) => this.resolve(field))
        : [...properties.defaults()],
    );
    this.conditions = Object.freeze([
      ...(options.where ? parseWhere(model.name, properties, options.where) : []),
      ...(options.conditions ?? []),
    ]);
    this.order = Object.freeze(
      options.order
        ? options.order.map((entry) => this.parseOrder(entry))
        : properties.key().map((property): Direction => ({ property, direction: 'asc' })),
    );
    this.limit = options.limit;
    this.offset = options.offset ?? 0;
    this.links = Object.freeze([...(options.links ?? [])]);
    this.unique = options.unique ?? false;
  }

  get properties(): PropertySet {
    return this.model.properties(this.repository.name);
  }

  /** A copy of this query with `overrides` applied. */
  merge(overrides: QueryOptions): Query {
    return new Query(this.repository, this.model, { ...this.options, ...overrides });
  }

  toString(): string {
    const conditions = this.conditions
      .map((condition) =>
        condition.operator === 'raw'
          ? condition.statement
          : `${condition.subject.name} ${condition.operator} ${String(condition.operand)}`,
      )
      .join(', ');
    return `#<Query ${this.model.name} [${conditions}] limit=${this.limit ?? '-'} offset=${this.offset}>`;
  }

  private resolve(field: string | Property): Property {
    if (field instanceof Property) {
      return field;
    }
    return this.model.propertyNamed(field, this.repository.name);
  }

  private parseOrder(entry: OrderInput): Direction {
    if (typeof entry !== 'string') {
      return entry;
    }
    const trimmed = entry.trim();
    if (trimmed.startsWith('-')) {
      return { property: this.resolve(trimmed.substring(1)), direction: 'desc' };
    }
    return { property: this.resolve(trimmed), direction: 'asc' };
  }
}
