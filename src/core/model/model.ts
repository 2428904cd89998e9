import { UnknownPropertyException } from '../exceptions/custom-exceptions';
import { FieldTypeRegistry } from '../property/field-type.registry';
import { Property, PropertyOwner } from '../property/property';
import { PropertySet } from '../property/property-set';
import { FieldType, PropertyOptions } from '../property/property.types';
import type { Query } from '../query/query';
import {
  NamingConvention,
  NamingConventions,
} from '../../shared/utils/naming-helpers';
import { Resource } from './resource';

export const DEFAULT_REPOSITORY_NAME = 'default';

export interface PropertyDeclaration {
  type: FieldType | string;
  options?: PropertyOptions;
}

export type ModelSchema = Record<string, FieldType | string | PropertyDeclaration>;

export interface ModelOptions {
  repositoryName?: string;
  /** storage name per repository, overriding the naming convention */
  storageNames?: Record<string, string>;
  storageNamingConvention?: NamingConvention;
  fieldNamingConvention?: NamingConvention;
  types?: FieldTypeRegistry;
}

const builtinTypes = new FieldTypeRegistry();

export function property(type: FieldType | string, options?: PropertyOptions): PropertyDeclaration {
  return { type, options };
}

function isDeclaration(entry: FieldType | string | PropertyDeclaration): entry is PropertyDeclaration {
  return typeof entry === 'object' && 'type' in entry;
}

/**
 * An entity type: its name, where it is stored and the properties it
 * declares, per repository.
 *
 * @example
 * const Heffalump = new Model('Heffalump', {
 *   id: Types.Serial,
 *   color: Types.String,
 *   numSpots: property(Types.Integer, { index: true }),
 * });
 */
export class Model implements PropertyOwner {
  readonly repositoryName: string;

  private readonly propertySets = new Map<string, PropertySet>();
  private readonly types: FieldTypeRegistry;

  constructor(
    readonly name: string,
    schema: ModelSchema = {},
    private readonly modelOptions: ModelOptions = {},
  ) {
    this.repositoryName = modelOptions.repositoryName ?? DEFAULT_REPOSITORY_NAME;
    this.types = modelOptions.types ?? builtinTypes;

    for (const [propertyName, entry] of Object.entries(schema)) {
      if (isDeclaration(entry)) {
        this.property(propertyName, entry.type, entry.options);
      } else {
        this.property(propertyName, entry);
      }
    }
  }

  /**
   * Declares a property, replacing an earlier declaration of the same name in
   * place.
   */
  property(name: string, type: FieldType | string, options?: PropertyOptions): Property {
    const declared = new Property(this, name, this.types.resolve(type), options);

    this.properties(this.repositoryName).add(declared);
    for (const [repositoryName, properties] of this.propertySets) {
      if (repositoryName !== this.repositoryName) {
        properties.add(declared);
      }
    }
    return declared;
  }

  properties(repositoryName: string = this.repositoryName): PropertySet {
    let properties = this.propertySets.get(repositoryName);
    if (!properties) {
      properties =
        repositoryName === this.repositoryName
          ? new PropertySet()
          : this.properties(this.repositoryName).clone();
      this.propertySets.set(repositoryName, properties);
    }
    return properties;
  }

  propertyNamed(name: string, repositoryName?: string): Property {
    const found = this.properties(repositoryName).get(name);
    if (!found) {
      throw new UnknownPropertyException(this.name, name);
    }
    return found;
  }

  key(repositoryName?: string): readonly Property[] {
    return this.properties(repositoryName).key();
  }

  /** The serial property whose value the store assigns on insert. */
  identityField(repositoryName?: string): Property | undefined {
    return this.properties(repositoryName)
      .toArray()
      .find((candidate) => candidate.serial);
  }

  storageName(repositoryName: string = this.repositoryName): string {
    const explicit = this.modelOptions.storageNames?.[repositoryName];
    if (explicit) {
      return explicit;
    }
    const convention =
      this.modelOptions.storageNamingConvention ?? NamingConventions.underscoredAndPluralized;
    return convention(this.name);
  }

  fieldNamingConvention(_repositoryName: string): NamingConvention {
    return this.modelOptions.fieldNamingConvention ?? NamingConventions.underscored;
  }

  /** A new, unsaved resource with `attributes` assigned. */
  build(attributes: Record<string, unknown> = {}, repositoryName?: string): Resource {
    const resource = new Resource(this, repositoryName ?? this.repositoryName);
    resource.assign(attributes);
    return resource;
  }

  /**
   * A persisted resource from decoded values aligned with `query.fields`.
   */
  load(values: readonly unknown[], query: Query): Resource {
    const resource = new Resource(this, query.repository.name);
    query.fields.forEach((field, index) => {
      if (index < values.length) {
        field.setRaw(resource, values[index]);
      }
    });
    resource.markLoaded(query);
    return resource;
  }

  toString(): string {
    return this.name;
  }
}
