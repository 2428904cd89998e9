import { DefinitionException } from '../exceptions/custom-exceptions';
import type { Property } from './property';
import {
  CustomFieldType,
  FieldPrimitive,
  FieldType,
  TypeDefaultOptions,
} from './property.types';

interface FieldTypeDefinition {
  name: string;
  primitive: FieldPrimitive;
  defaultOptions?: TypeDefaultOptions;
  bounded?: boolean;
  numeric?: boolean;
}

interface CustomFieldTypeDefinition<T> extends FieldTypeDefinition {
  dump(value: T, property: Property): unknown;
  load(primitive: unknown, property: Property): T;
}

export function defineFieldType(definition: FieldTypeDefinition): FieldType {
  return Object.freeze({
    name: definition.name,
    primitive: definition.primitive,
    defaultOptions: Object.freeze({ ...definition.defaultOptions }),
    bounded: definition.bounded ?? false,
    numeric: definition.numeric ?? false,
    isBoolean: definition.primitive === 'boolean',
    custom: false,
  });
}

/**
 * Declares a type whose values are stored through `dump` and read back
 * through `load`.
 *
 * @example
 * const Csv = defineCustomType<string[]>({
 *   name: 'Csv',
 *   primitive: 'text',
 *   dump: (value) => value.join(','),
 *   load: (primitive) => String(primitive).split(','),
 * });
 */
export function defineCustomType<T>(
  definition: CustomFieldTypeDefinition<T>,
): CustomFieldType<T> {
  return Object.freeze({
    name: definition.name,
    primitive: definition.primitive,
    defaultOptions: Object.freeze({ ...definition.defaultOptions }),
    bounded: definition.bounded ?? false,
    numeric: definition.numeric ?? false,
    isBoolean: definition.primitive === 'boolean',
    custom: true,
    dump: definition.dump,
    load: definition.load,
  });
}

export function isCustomType(type: FieldType): type is CustomFieldType {
  return type.custom && 'dump' in type && 'load' in type;
}

export const Types = {
  String: defineFieldType({
    name: 'String',
    primitive: 'string',
    bounded: true,
    defaultOptions: { length: 50 },
  }),
  Text: defineFieldType({
    name: 'Text',
    primitive: 'text',
    bounded: true,
    defaultOptions: { length: 65535, lazy: true },
  }),
  Integer: defineFieldType({ name: 'Integer', primitive: 'integer' }),
  Serial: defineFieldType({
    name: 'Serial',
    primitive: 'integer',
    defaultOptions: { serial: true },
  }),
  Float: defineFieldType({
    name: 'Float',
    primitive: 'float',
    numeric: true,
    defaultOptions: { precision: 10 },
  }),
  Decimal: defineFieldType({
    name: 'Decimal',
    primitive: 'decimal',
    numeric: true,
    defaultOptions: { precision: 10, scale: 0 },
  }),
  Boolean: defineFieldType({ name: 'Boolean', primitive: 'boolean' }),
  DateTime: defineFieldType({ name: 'DateTime', primitive: 'datetime' }),
  Date: defineFieldType({ name: 'Date', primitive: 'date' }),
  Time: defineFieldType({ name: 'Time', primitive: 'time' }),
  Json: defineCustomType<unknown>({
    name: 'Json',
    primitive: 'json',
    dump: (value) => (value === null || value === undefined ? null : JSON.stringify(value)),
    load: (primitive) =>
      typeof primitive === 'string' ? JSON.parse(primitive) : primitive,
  }),
};

export class FieldTypeRegistry {
  private readonly types = new Map<string, FieldType>();

  constructor(types: Iterable<FieldType> = Object.values(Types)) {
    for (const type of types) {
      this.register(type);
    }
  }

  register(type: FieldType): this {
    if (this.types.has(type.name)) {
      throw new DefinitionException(`Field type ${type.name} is already registered`, {
        type: type.name,
      });
    }
    this.types.set(type.name, type);
    return this;
  }

  get(name: string): FieldType | undefined {
    return this.types.get(name);
  }

  has(name: string): boolean {
    return this.types.has(name);
  }

  resolve(typeOrName: FieldType | string): FieldType {
    if (typeof typeOrName !== 'string') {
      return typeOrName;
    }
    const type = this.types.get(typeOrName);
    if (!type) {
      throw new DefinitionException(`Unknown field type ${typeOrName}`, {
        type: typeOrName,
      });
    }
    return type;
  }

  all(): FieldType[] {
    return [...this.types.values()];
  }
}

function toInteger(raw: unknown): number {
  if (typeof raw === 'number') return Math.trunc(raw);
  if (typeof raw === 'bigint') return Number(raw);
  return parseInt(String(raw), 10);
}

function toDate(raw: unknown): Date {
  if (raw instanceof Date) return raw;
  if (typeof raw === 'number' || typeof raw === 'bigint') {
    return new Date(Number(raw));
  }
  return new Date(String(raw));
}

/**
 * Converts what a driver hands back for a column into the value a built-in
 * type exposes.
 */
export function decodePrimitive(primitive: FieldPrimitive, raw: unknown): unknown {
  if (raw === null || raw === undefined) {
    return null;
  }

  switch (primitive) {
    case 'integer':
      return toInteger(raw);
    case 'float':
      return typeof raw === 'number' ? raw : Number(raw);
    case 'decimal':
      return String(raw);
    case 'boolean':
      return raw === true || raw === 1 || raw === '1' || raw === 't' || raw === 'true';
    case 'datetime':
    case 'date':
      return toDate(raw);
    case 'json':
      return typeof raw === 'string' ? JSON.parse(raw) : raw;
    case 'string':
    case 'text':
    case 'time':
      return raw instanceof Buffer ? raw.toString('utf8') : String(raw);
  }
}
