import type { Property } from '../../property/property';
import type { Query } from '../../query/query';
import type { SqlStatement } from '../../../shared/types/query-builder.types';
import type { Model } from '../model';
import type { Repository } from '../repository';
import type { Resource } from '../resource';

/**
 * The storage operations a repository delegates to.
 */
export interface Adapter {
  readonly kind: string;

  /** Inserts every resource; returns the number of rows written. */
  create(resources: readonly Resource[]): Promise<number>;

  /** Single pass over the matching resources, decoded as rows arrive. */
  read(query: Query): AsyncIterable<Resource>;

  update(attributes: ReadonlyMap<Property, unknown>, query: Query): Promise<number>;

  delete(query: Query): Promise<number>;
}

export interface ReadBySqlOptions {
  fields?: ReadonlyArray<string | Property>;
}

/** An adapter that also runs hand-written SQL. */
export interface SqlCapableAdapter extends Adapter {
  compileSelect(query: Query): SqlStatement;

  readBySql(
    repository: Repository,
    model: Model,
    statement: SqlStatement,
    options?: ReadBySqlOptions,
  ): AsyncIterable<Resource>;
}

export function isSqlCapableAdapter(adapter: Adapter): adapter is SqlCapableAdapter {
  return (
    'readBySql' in adapter &&
    typeof adapter.readBySql === 'function' &&
    'compileSelect' in adapter &&
    typeof adapter.compileSelect === 'function'
  );
}
