import { Injectable } from '@nestjs/common';
import { LoggingService } from '../../core/exceptions/services/logging.service';
import {
  ReadBySqlOptions,
  SqlCapableAdapter,
} from '../../core/model/interfaces/adapter.interface';
import type { Model } from '../../core/model/model';
import type { Repository } from '../../core/model/repository';
import type { Resource } from '../../core/model/resource';
import { Property } from '../../core/property/property';
import { Query } from '../../core/query/query';
import { ExecuteResult, SqlStatement } from '../../shared/types/query-builder.types';
import { DriverConnection, KnexService } from '../knex/knex.service';
import { collapseRow, decodeRow, Row } from '../sql/row-decoder';
import { SqlStatementBuilder } from '../sql/sql-statement.builder';

@Injectable()
export class SqlAdapterService implements SqlCapableAdapter {
  readonly kind = 'sql';

  private statementBuilder?: SqlStatementBuilder;

  constructor(
    private readonly knexService: KnexService,
    private readonly loggingService: LoggingService,
  ) {}

  get builder(): SqlStatementBuilder {
    if (!this.statementBuilder) {
      this.statementBuilder = new SqlStatementBuilder(this.knexService.getDialect());
    }
    return this.statementBuilder;
  }

  /**
   * Inserts each resource on one connection and writes generated identities
   * back into them.
   */
  async create(resources: readonly Resource[]): Promise<number> {
    if (resources.length === 0) {
      return 0;
    }

    const table = resources[0].model.storageName(resources[0].repositoryName);
    return this.track('create', table, () =>
      this.knexService.withConnection(async (connection) => {
        let created = 0;
        for (const resource of resources) {
          created += await this.insert(resource, connection);
        }
        return created;
      }),
    );
  }

  async *read(query: Query): AsyncGenerator<Resource> {
    const statement = this.builder.select(query);
    const result = await this.track('read', this.tableOf(query), () =>
      this.knexService.run(statement),
    );
    for (const row of result.rows) {
      yield query.model.load(decodeRow(query.fields, row), query);
    }
  }

  async update(attributes: ReadonlyMap<Property, unknown>, query: Query): Promise<number> {
    const statement = this.builder.update(attributes, query);
    const result = await this.track('update', this.tableOf(query), () =>
      this.knexService.run(statement),
    );
    return result.affectedRows;
  }

  async delete(query: Query): Promise<number> {
    const statement = this.builder.delete(query);
    const result = await this.track('delete', this.tableOf(query), () =>
      this.knexService.run(statement),
    );
    return result.affectedRows;
  }

  /** Runs a statement and hands back the normalized driver result. */
  async execute(sql: string, ...bindings: unknown[]): Promise<ExecuteResult> {
    return this.knexService.run({ sql, bindings });
  }

  /**
   * Rows of a hand-written SELECT. Single-column rows collapse to their
   * value; wider rows become records keyed by underscored column names.
   */
  async query(sql: string, ...bindings: unknown[]): Promise<unknown[]> {
    const result = await this.knexService.run({ sql, bindings });
    return result.rows.map(collapseRow);
  }

  compileSelect(query: Query): SqlStatement {
    return this.builder.select(query);
  }

  async *readBySql(
    repository: Repository,
    model: Model,
    statement: SqlStatement,
    options: ReadBySqlOptions = {},
  ): AsyncGenerator<Resource> {
    const result = await this.track('findBySql', model.storageName(repository.name), () =>
      this.knexService.run(statement),
    );
    const [firstRow] = result.rows;
    if (!firstRow) {
      return;
    }

    const fields = options.fields ?? this.fieldsIn(model, repository.name, firstRow);
    const query = new Query(repository, model, { fields });
    for (const row of result.rows) {
      yield model.load(decodeRow(query.fields, row), query);
    }
  }

  private async insert(resource: Resource, connection: DriverConnection): Promise<number> {
    const model = resource.model;
    const identity = model.identityField(resource.repositoryName);
    const statement = this.builder.insert(
      model,
      resource.repositoryName,
      resource.dirtyAttributes(),
      identity,
    );
    const result = await this.knexService.run(statement, connection);

    if (identity && identity.getRaw(resource) === null) {
      const generated = this.builder.dialect.supportsReturning
        ? result.rows[0]?.[identity.field()]
        : result.insertId;
      if (generated !== undefined && generated !== null) {
        identity.setRaw(resource, identity.decode(generated));
      }
    }
    return result.affectedRows;
  }

  /** Model properties whose column appears in `row`, in declaration order. */
  private fieldsIn(model: Model, repositoryName: string, row: Row): Property[] {
    return model
      .properties(repositoryName)
      .toArray()
      .filter((property) => property.field() in row);
  }

  private tableOf(query: Query): string {
    return query.model.storageName(query.repository.name);
  }

  private async track<T>(operation: string, table: string, work: () => Promise<T>): Promise<T> {
    const started = Date.now();
    try {
      const outcome = await work();
      this.loggingService.logDatabaseOperation(operation, table, Date.now() - started, true);
      return outcome;
    } catch (error) {
      this.loggingService.logDatabaseOperation(operation, table, Date.now() - started, false, error);
      throw error;
    }
  }
}
