import { isEqual } from 'lodash';
import {
  UnknownPropertyException,
  UsageException,
} from '../exceptions/custom-exceptions';
import type { Property } from '../property/property';
import type { PropertySet } from '../property/property-set';
import type { Query } from '../query/query';
import type { Model } from './model';
import type { Repository } from './repository';

/** Storage for one property of one resource. */
export interface Slot {
  loaded: boolean;
  value: unknown;
}

type ResourceState = 'new' | 'saved' | 'destroyed';

/**
 * One instance of a model. Every property has a slot that is either unloaded
 * or holds a value; `originalValues` holds the persisted value of each
 * property changed since the last save.
 */
export class Resource {
  readonly originalValues = new Map<Property, unknown>();

  private readonly slots = new Map<string, Slot>();
  private state: ResourceState = 'new';
  private attachedRepository?: Repository;
  private originQuery?: Query;
  private group?: readonly Resource[];

  constructor(
    readonly model: Model,
    readonly repositoryName: string = model.repositoryName,
  ) {}

  get isNew(): boolean {
    return this.state === 'new';
  }

  get isSaved(): boolean {
    return this.state === 'saved';
  }

  get isDestroyed(): boolean {
    return this.state === 'destroyed';
  }

  get repository(): Repository | undefined {
    return this.attachedRepository;
  }

  get query(): Query | undefined {
    return this.originQuery;
  }

  /** Resources read together with this one; lazy loads cover all of them. */
  get loadGroup(): readonly Resource[] {
    return this.group ?? [this];
  }

  set loadGroup(group: readonly Resource[]) {
    this.group = group;
  }

  get properties(): PropertySet {
    return this.model.properties(this.repositoryName);
  }

  slot(property: Property): Slot {
    if (property.owner !== this.model) {
      throw new UsageException(`${property} does not belong to ${this.model.name}`);
    }
    let slot = this.slots.get(property.name);
    if (!slot) {
      slot = { loaded: false, value: null };
      this.slots.set(property.name, slot);
    }
    return slot;
  }

  property(name: string): Property {
    const found = this.properties.get(name);
    if (!found) {
      throw new UnknownPropertyException(this.model.name, name);
    }
    return found;
  }

  get(name: string): Promise<unknown> {
    return this.property(name).get(this);
  }

  set(name: string, value: unknown): unknown {
    return this.property(name).set(this, value);
  }

  async is(name: string): Promise<boolean> {
    const found = this.property(name);
    if (!found.isBoolean) {
      throw new UsageException(`${found} is not a boolean property`);
    }
    return (await found.get(this)) === true;
  }

  /** Values of every property with a public reader. */
  async attributes(): Promise<Record<string, unknown>> {
    const attributes: Record<string, unknown> = {};
    for (const property of this.properties) {
      if (property.readerVisibility === 'public') {
        attributes[property.name] = await property.get(this);
      }
    }
    return attributes;
  }

  /** Mass assignment; only properties with a public writer are accepted. */
  assign(attributes: Record<string, unknown>): this {
    for (const [name, value] of Object.entries(attributes)) {
      const found = this.property(name);
      if (found.writerVisibility !== 'public') {
        throw new UsageException(`${found} has a ${found.writerVisibility} writer`, {
          property: name,
        });
      }
      found.set(this, value);
    }
    return this;
  }

  /**
   * Properties to persist mapped to their storable values, in declaration
   * order.
   */
  dirtyAttributes(): Map<Property, unknown> {
    const dirty = new Map<Property, unknown>();
    for (const property of this.properties) {
      if (!this.originalValues.has(property)) continue;

      const slot = this.slot(property);
      if (!slot.loaded) continue;

      const value = property.value(slot.value);
      if (this.isNew || !isEqual(value, this.originalValues.get(property))) {
        dirty.set(property, value);
      }
    }
    return dirty;
  }

  isDirty(): boolean {
    return this.dirtyAttributes().size > 0;
  }

  /** Key values in key order; null for unloaded parts. */
  key(): unknown[] {
    return this.properties.key().map((property) => property.getRaw(this));
  }

  /**
   * Key values as last persisted. Differs from `key()` while a changed
   * natural key is unsaved.
   */
  persistedKey(): unknown[] {
    return this.properties
      .key()
      .map((property) =>
        this.originalValues.has(property)
          ? property.decode(this.originalValues.get(property))
          : property.getRaw(this),
      );
  }

  async applyDefaults(): Promise<void> {
    for (const property of this.properties) {
      if (property.hasDefault() && !property.isLoaded(this)) {
        await property.get(this);
      }
    }
  }

  markLoaded(query: Query): void {
    this.state = 'saved';
    this.attachedRepository = query.repository;
    this.originQuery = query;
  }

  markSaved(repository: Repository): void {
    this.state = 'saved';
    this.attachedRepository = repository;
    this.originalValues.clear();
  }

  markDestroyed(): void {
    this.state = 'destroyed';
    this.originalValues.clear();
  }

  /**
   * Loads `names` (expanded to their lazy contexts) that are not loaded yet,
   * in one round trip for the whole load group.
   */
  async lazyLoad(names: readonly string[]): Promise<void> {
    const repository = this.attachedRepository;
    if (!repository) {
      throw new UsageException(`${this.model.name} resource is not attached to a repository`);
    }

    const properties = this.properties;
    const missing = properties
      .lazyLoadContext(names)
      .map((name) => properties.get(name))
      .filter((candidate): candidate is Property => candidate !== undefined)
      .filter((candidate) => !candidate.isLoaded(this));

    if (missing.length === 0) {
      return;
    }

    await repository.reload(this, missing);

    // fields the store did not return stay null rather than reloading forever
    for (const property of missing) {
      if (!property.isLoaded(this)) {
        property.setRaw(this, null);
      }
    }
  }

  toString(): string {
    return `#<${this.model.name} ${this.state} key=${JSON.stringify(this.key())}>`;
  }
}
