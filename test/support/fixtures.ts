import { Adapter } from '../../src/core/model/interfaces/adapter.interface';
import { Model, property } from '../../src/core/model/model';
import { Repository } from '../../src/core/model/repository';
import type { Resource } from '../../src/core/model/resource';
import type { Property } from '../../src/core/property/property';
import { Types } from '../../src/core/property/field-type.registry';
import type { Query } from '../../src/core/query/query';

/** Stores nothing; records what it was asked to do. */
export class RecordingAdapter implements Adapter {
  readonly kind = 'recording';
  readonly created: Resource[] = [];
  readonly queries: Query[] = [];

  async create(resources: readonly Resource[]): Promise<number> {
    this.created.push(...resources);
    return resources.length;
  }

  async *read(query: Query): AsyncGenerator<Resource> {
    this.queries.push(query);
  }

  async update(_attributes: ReadonlyMap<Property, unknown>, query: Query): Promise<number> {
    this.queries.push(query);
    return 1;
  }

  async delete(query: Query): Promise<number> {
    this.queries.push(query);
    return 1;
  }
}

export function recordingRepository(name = 'default'): Repository {
  return new Repository(name, new RecordingAdapter());
}

export function defineHeffalump(): Model {
  return new Model('Heffalump', {
    id: Types.Serial,
    color: Types.String,
    numSpots: Types.Integer,
    'striped?': Types.Boolean,
    notes: Types.Text,
    tags: Types.Json,
    createdAt: property(Types.DateTime, {
      default: () => new Date('2024-01-02T03:04:05.000Z'),
    }),
  });
}

export const HEFFALUMP_TABLE = `CREATE TABLE "heffalumps" (
  "id" INTEGER PRIMARY KEY AUTOINCREMENT,
  "color" VARCHAR(50),
  "num_spots" INTEGER,
  "striped" BOOLEAN,
  "notes" TEXT,
  "tags" TEXT,
  "created_at" TEXT
)`;
