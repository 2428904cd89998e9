import { cloneDeep, isEqual } from 'lodash';
import {
  DefinitionException,
  UsageException,
} from '../exceptions/custom-exceptions';
import type { Resource } from '../model/resource';
import type { NamingConvention } from '../../shared/utils/naming-helpers';
import { decodePrimitive, isCustomType } from './field-type.registry';
import type { PropertySet } from './property-set';
import {
  DefaultGenerator,
  DefaultValue,
  FieldType,
  IndexOption,
  LazyOption,
  LengthRange,
  PropertyOptions,
  StaticDefault,
  Visibility,
} from './property.types';

/**
 * What a property needs from the model that declares it.
 */
export interface PropertyOwner {
  readonly name: string;
  readonly repositoryName: string;
  fieldNamingConvention(repositoryName: string): NamingConvention;
  properties(repositoryName?: string): PropertySet;
  storageName(repositoryName?: string): string;
}

export const DEFAULT_LAZY_CONTEXT = 'default';

function isDefaultGenerator(value: StaticDefault | DefaultGenerator): value is DefaultGenerator {
  return typeof value === 'function';
}

function isLengthRange(length: number | LengthRange): length is LengthRange {
  return typeof length === 'object';
}

function toLazyContexts(lazy: LazyOption | undefined): string[] {
  if (lazy === undefined || lazy === false) return [];
  if (lazy === true) return [DEFAULT_LAZY_CONTEXT];
  if (typeof lazy === 'string') return [lazy];
  return [...new Set(lazy)];
}

/**
 * A typed field declared on a model.
 *
 * Holds the storage metadata of the field (name in the store, key and serial
 * flags, indexes, size) and implements reading and writing the field on a
 * resource: defaults for new resources, lazy loading for persisted ones and
 * the original-value bookkeeping that dirty tracking relies on.
 */
export class Property {
  readonly name: string;
  readonly repositoryName: string;
  readonly options: Readonly<PropertyOptions>;

  readonly key: boolean;
  readonly serial: boolean;
  readonly nullable: boolean;
  readonly unique: boolean;
  readonly lazy: boolean;
  readonly lazyContexts: readonly string[];
  readonly index?: IndexOption;
  readonly uniqueIndex?: IndexOption;
  readonly length?: number;
  readonly precision?: number;
  readonly scale?: number;
  readonly readerVisibility: Visibility;
  readonly writerVisibility: Visibility;

  private readonly defaultValue?: DefaultValue;
  private fieldName?: string;

  constructor(
    readonly owner: PropertyOwner,
    name: string,
    readonly type: FieldType,
    options: PropertyOptions = {},
  ) {
    this.name = name.replace(/\?$/, '');
    this.repositoryName = owner.repositoryName;

    const merged: PropertyOptions = { ...type.defaultOptions, ...options };
    this.options = Object.freeze(merged);

    if ('default' in options) {
      const value = options.default;
      if (value === null || value === undefined) {
        throw this.definitionError('options.default must not be null');
      }
      this.defaultValue = isDefaultGenerator(value)
        ? { kind: 'computed', generate: value }
        : { kind: 'static', value };
    }

    if (merged.field !== undefined && merged.field.trim() === '') {
      throw this.definitionError('options.field must not be blank');
    }

    this.serial = merged.serial ?? false;
    this.key = merged.key ?? this.serial;
    this.nullable = merged.nullable ?? !this.key;
    this.unique = merged.unique ?? (this.serial || this.key);
    this.lazyContexts = this.key ? [] : toLazyContexts(merged.lazy);
    this.lazy = this.lazyContexts.length > 0;
    this.index = merged.index;
    this.uniqueIndex = merged.uniqueIndex;

    if (type.bounded && merged.length !== undefined) {
      this.length = this.resolveLength(merged.length);
    }

    if (type.numeric) {
      this.precision = merged.precision;
      this.scale = merged.scale;
      this.assertValidPrecision();
    }

    this.readerVisibility = merged.reader ?? merged.accessor ?? 'public';
    this.writerVisibility = merged.writer ?? merged.accessor ?? 'public';
  }

  get isBoolean(): boolean {
    return this.type.isBoolean;
  }

  get custom(): boolean {
    return this.type.custom;
  }

  /**
   * Name of the column in the data store. Resolved through the owner's naming
   * convention the first time it is needed, then memoized.
   */
  field(repositoryName?: string): string {
    if (repositoryName !== undefined && repositoryName !== this.repositoryName) {
      throw new UsageException(
        `Mismatching repository name for ${this}: ${repositoryName} != ${this.repositoryName}`,
        { repositoryName, expected: this.repositoryName },
      );
    }

    if (this.fieldName === undefined) {
      this.fieldName =
        this.options.field ??
        this.owner.fieldNamingConvention(this.repositoryName)(this.name);
    }
    return this.fieldName;
  }

  hasDefault(): boolean {
    return this.defaultValue !== undefined;
  }

  defaultFor(resource: Resource): unknown {
    if (!this.defaultValue) {
      return null;
    }
    return this.defaultValue.kind === 'computed'
      ? this.defaultValue.generate(resource, this)
      : cloneDeep(this.defaultValue.value);
  }

  isLoaded(resource: Resource): boolean {
    return resource.slot(this).loaded;
  }

  /**
   * Reads the value of this property, applying the default on new resources
   * and lazy loading unloaded fields of persisted ones.
   */
  async get(resource: Resource): Promise<unknown> {
    const slot = resource.slot(this);

    if (resource.isNew) {
      if (slot.loaded) return slot.value;
      if (this.hasDefault()) return this.set(resource, this.defaultFor(resource));
      return null;
    }

    if (!slot.loaded) {
      await this.lazyLoad(resource);
    }
    return this.getRaw(resource);
  }

  /** Current slot value without loading or defaulting. */
  getRaw(resource: Resource): unknown {
    const slot = resource.slot(this);
    return slot.loaded ? slot.value : null;
  }

  set(resource: Resource, value: unknown): unknown {
    const slot = resource.slot(this);
    const original = slot.loaded ? slot.value : null;

    if (slot.loaded && isEqual(value, original)) {
      return original;
    }

    this.setOriginalValue(resource, original, value);
    return this.setRaw(resource, value);
  }

  /** Stores a value without touching dirty tracking. */
  setRaw(resource: Resource, value: unknown): unknown {
    const slot = resource.slot(this);
    slot.loaded = true;
    slot.value = value;
    return value;
  }

  setOriginalValue(resource: Resource, original: unknown, next: unknown): void {
    const originalValues = resource.originalValues;

    if (originalValues.has(this)) {
      // back to the persisted value: nothing left to save for this property
      if (resource.isSaved && isEqual(this.value(next), originalValues.get(this))) {
        originalValues.delete(this);
      }
      return;
    }

    originalValues.set(this, this.value(original));
  }

  async lazyLoad(resource: Resource): Promise<void> {
    const names = this.lazy
      ? [this.name]
      : this.owner
          .properties(this.repositoryName)
          .defaults()
          .map((property) => property.name);
    await resource.lazyLoad(names);
  }

  /** The primitive to hand to the store for `value`. */
  value(value: unknown): unknown {
    if (value === null || value === undefined) {
      return null;
    }
    return isCustomType(this.type) ? this.type.dump(value, this) : value;
  }

  /** The value exposed to callers for a primitive read from the store. */
  decode(primitive: unknown): unknown {
    if (isCustomType(this.type)) {
      return primitive === null || primitive === undefined
        ? null
        : this.type.load(primitive, this);
    }
    return decodePrimitive(this.type.primitive, primitive);
  }

  equals(other: unknown): boolean {
    if (other === this) return true;
    if (!(other instanceof Property)) return false;
    return other.owner === this.owner && other.name === this.name;
  }

  toString(): string {
    return `#<Property ${this.owner.name}.${this.name} ${this.type.name}>`;
  }

  private resolveLength(length: number | LengthRange): number {
    if (isLengthRange(length)) {
      if (!Number.isInteger(length.min) || length.min < 0 || length.max < length.min) {
        throw this.definitionError(
          `options.length must be a range with 0 <= min <= max, but was ${length.min}..${length.max}`,
        );
      }
      return length.max;
    }
    if (!Number.isInteger(length) || length <= 0) {
      throw this.definitionError(`options.length must be a positive integer, but was ${length}`);
    }
    return length;
  }

  private assertValidPrecision(): void {
    const { precision, scale } = this;

    if (precision !== undefined && !(Number.isInteger(precision) && precision > 0)) {
      throw this.definitionError(`precision must be greater than 0, but was ${precision}`);
    }

    if (scale !== undefined && !(Number.isInteger(scale) && scale >= 0)) {
      throw this.definitionError(
        `scale must be equal to or greater than 0, but was ${scale}`,
      );
    }

    if (precision !== undefined && scale !== undefined && precision < scale) {
      throw this.definitionError(
        `precision must be equal to or greater than scale, but was ${precision} and scale was ${scale}`,
      );
    }
  }

  private definitionError(message: string): DefinitionException {
    return new DefinitionException(`${this.owner.name}.${this.name}: ${message}`, {
      model: this.owner.name,
      property: this.name,
    });
  }
}
