import type { Property } from './property';
import type { Resource } from '../model/resource';

export type Visibility = 'public' | 'protected' | 'private';

/**
 * `true` declares an anonymous single-column index, a string names a
 * (possibly multi-column) index, an array puts the property in several.
 */
export type IndexName = true | string;
export type IndexOption = IndexName | readonly IndexName[];

/**
 * `true` places the property in the `default` lazy context, a string or list
 * of strings names the contexts it is fetched with.
 */
export type LazyOption = boolean | string | readonly string[];

export type DefaultGenerator<T = unknown> = (
  resource: Resource,
  property: Property,
) => T;

/** A literal default; an explicit `null` is rejected when the property is declared */
export type StaticDefault = string | number | boolean | bigint | object | null;

export type DefaultValue =
  | { kind: 'static'; value: unknown }
  | { kind: 'computed'; generate: DefaultGenerator };

export interface LengthRange {
  min: number;
  max: number;
}

export interface PropertyOptions<T = unknown> {
  field?: string;
  key?: boolean;
  serial?: boolean;
  nullable?: boolean;
  unique?: boolean;
  lazy?: LazyOption;
  index?: IndexOption;
  uniqueIndex?: IndexOption;
  default?: StaticDefault | DefaultGenerator<T>;
  length?: number | LengthRange;
  precision?: number;
  scale?: number;
  reader?: Visibility;
  writer?: Visibility;
  accessor?: Visibility;
}

export type TypeDefaultOptions = Pick<
  PropertyOptions,
  | 'key'
  | 'serial'
  | 'nullable'
  | 'unique'
  | 'lazy'
  | 'index'
  | 'uniqueIndex'
  | 'length'
  | 'precision'
  | 'scale'
>;

export type FieldPrimitive =
  | 'string'
  | 'text'
  | 'integer'
  | 'float'
  | 'decimal'
  | 'boolean'
  | 'datetime'
  | 'date'
  | 'time'
  | 'json';

export interface FieldType<T = unknown> {
  readonly name: string;
  readonly primitive: FieldPrimitive;
  readonly defaultOptions: Readonly<TypeDefaultOptions>;
  /** `length` applies */
  readonly bounded: boolean;
  /** `precision` / `scale` apply */
  readonly numeric: boolean;
  readonly isBoolean: boolean;
  readonly custom: boolean;
}

/**
 * Types that are not native to the store serialize to a primitive on the way
 * in and back on the way out.
 */
export interface CustomFieldType<T = unknown> extends FieldType<T> {
  readonly custom: true;
  dump(value: T, property: Property): unknown;
  load(primitive: unknown, property: Property): T;
}
