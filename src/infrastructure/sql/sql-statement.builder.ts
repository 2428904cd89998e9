import { UsageException } from '../../core/exceptions/custom-exceptions';
import type { Model } from '../../core/model/model';
import { Property } from '../../core/property/property';
import {
  Comparison,
  Condition,
  Operand,
  Scalar,
  isOperandList,
  isRange,
  isRawCondition,
  isUniqueMatch,
} from '../../core/query/condition';
import type { Query } from '../../core/query/query';
import { SqlStatement } from '../../shared/types/query-builder.types';
import { SqlDialect } from './sql-dialect';

const ORDERING_OPERATORS = {
  gt: '>',
  gte: '>=',
  lt: '<',
  lte: '<=',
} as const;

/**
 * Compiles queries into SQL text with `?` placeholders for one dialect.
 *
 * SELECTs are memoized per query object; a query is immutable, so compiling
 * it twice yields the same statement.
 */
export class SqlStatementBuilder {
  private readonly selects = new WeakMap<Query, SqlStatement>();

  constructor(readonly dialect: SqlDialect) {}

  select(query: Query): SqlStatement {
    const cached = this.selects.get(query);
    if (cached) {
      return { sql: cached.sql, bindings: [...cached.bindings] };
    }

    const qualify = query.links.length > 0 || query.unique;
    const repositoryName = query.repository.name;
    const scope = qualify ? repositoryName : undefined;
    const columns = query.fields.map((field) => this.column(field, scope)).join(', ');
    const bindings: unknown[] = [];

    let sql = `SELECT ${columns} FROM ${this.table(query.model, query.repository.name)}`;

    const joined = new Set<Model>([query.model]);
    for (const link of [...query.links].reverse()) {
      const target = joined.has(link.parentModel) ? link.childModel : link.parentModel;
      joined.add(target);
      const on = link.parentKey
        .map(
          (parentKey, index) =>
            `${this.column(parentKey, repositoryName)} = ${this.column(link.childKey[index], repositoryName)}`,
        )
        .join(' AND ');
      sql += ` INNER JOIN ${this.table(target, repositoryName)} ON ${on}`;
    }

    const where = this.where(query.conditions, bindings, scope);
    if (where) {
      sql += ` WHERE ${where}`;
    }

    if (qualify) {
      sql += ` GROUP BY ${columns}`;
    }

    // at most one row matches, so ordering and limiting change nothing
    const singleRow =
      query.links.length === 0 &&
      (query.limit === undefined || query.limit <= 1) &&
      query.offset === 0 &&
      query.conditions.length === 1 &&
      query.conditions.every(isUniqueMatch);

    if (!singleRow) {
      if (query.order.length > 0) {
        const order = query.order
          .map(({ property, direction }) => {
            const column = this.column(property, scope);
            return direction === 'desc' ? `${column} DESC` : column;
          })
          .join(', ');
        sql += ` ORDER BY ${order}`;
      }
      sql += this.paging(query.limit, query.offset);
    }

    const statement = { sql, bindings };
    this.selects.set(query, { sql, bindings: [...bindings] });
    return statement;
  }

  /**
   * INSERT of the given column values. An unset identity column is left to
   * the store and read back through RETURNING where the dialect has it.
   */
  insert(
    model: Model,
    repositoryName: string,
    attributes: ReadonlyMap<Property, unknown>,
    identity?: Property,
  ): SqlStatement {
    const columns: string[] = [];
    const bindings: unknown[] = [];

    for (const [property, value] of attributes) {
      if (property === identity && (value === null || value === undefined)) {
        continue;
      }
      columns.push(this.column(property));
      bindings.push(value);
    }

    let sql = `INSERT INTO ${this.table(model, repositoryName)}`;
    if (columns.length > 0) {
      sql += ` (${columns.join(', ')}) VALUES (${columns.map(() => '?').join(', ')})`;
    } else if (this.dialect.supportsDefaultValues) {
      sql += ' DEFAULT VALUES';
    } else {
      sql += ' () VALUES ()';
    }

    if (this.dialect.supportsReturning && identity) {
      sql += ` RETURNING ${this.column(identity)}`;
    }

    return { sql, bindings };
  }

  update(attributes: ReadonlyMap<Property, unknown>, query: Query): SqlStatement {
    if (attributes.size === 0) {
      throw new UsageException(`Nothing to update for ${query.model.name}`);
    }

    const bindings: unknown[] = [];
    const assignments: string[] = [];
    for (const [property, value] of attributes) {
      assignments.push(`${this.column(property)} = ?`);
      bindings.push(value);
    }

    let sql = `UPDATE ${this.table(query.model, query.repository.name)} SET ${assignments.join(', ')}`;
    const where = this.where(query.conditions, bindings);
    if (where) {
      sql += ` WHERE ${where}`;
    }
    return { sql, bindings };
  }

  delete(query: Query): SqlStatement {
    const bindings: unknown[] = [];
    let sql = `DELETE FROM ${this.table(query.model, query.repository.name)}`;
    const where = this.where(query.conditions, bindings);
    if (where) {
      sql += ` WHERE ${where}`;
    }
    return { sql, bindings };
  }

  /**
   * AND-ed conditions; binds are appended to `bindings` in text order.
   * Columns are qualified with their table in `scope` when one is given.
   */
  where(conditions: readonly Condition[], bindings: unknown[], scope?: string): string {
    return conditions
      .map((condition) => this.condition(condition, bindings, scope))
      .join(' AND ');
  }

  condition(condition: Condition, bindings: unknown[], scope?: string): string {
    if (isRawCondition(condition)) {
      bindings.push(...(condition.binds ?? []));
      return condition.statement;
    }

    const { operator, subject, operand } = condition;
    const column = this.column(subject, scope);

    if (operand instanceof Property) {
      return `${column} ${this.comparator(condition)} ${this.column(operand, scope)}`;
    }

    switch (operator) {
      case 'eql':
      case 'in':
        return this.equality(column, subject, operand, false, bindings);
      case 'not':
        return this.equality(column, subject, operand, true, bindings);
      case 'like':
        if (operand instanceof RegExp) {
          bindings.push(operand.source);
          return `${column} ${this.dialect.regexpOperator} ?`;
        }
        bindings.push(this.dump(subject, this.scalarOperand(condition)));
        return `${column} LIKE ?`;
      default:
        bindings.push(this.dump(subject, this.scalarOperand(condition)));
        return `${column} ${ORDERING_OPERATORS[operator]} ?`;
    }
  }

  private equality(
    column: string,
    subject: Property,
    operand: Exclude<Operand, Property>,
    negate: boolean,
    bindings: unknown[],
  ): string {
    if (operand === null) {
      return negate ? `${column} IS NOT NULL` : `${column} IS NULL`;
    }

    if (isOperandList(operand)) {
      if (operand.length === 0) {
        return negate ? '1 = 1' : '1 = 0';
      }
      bindings.push(...operand.map((value) => this.dump(subject, value)));
      const placeholders = operand.map(() => '?').join(', ');
      return `${column} ${negate ? 'NOT IN' : 'IN'} (${placeholders})`;
    }

    if (isRange(operand)) {
      bindings.push(this.dump(subject, operand.min), this.dump(subject, operand.max));
      if (operand.excludeEnd) {
        return negate
          ? `(${column} < ? OR ${column} >= ?)`
          : `(${column} >= ? AND ${column} < ?)`;
      }
      return `${column} ${negate ? 'NOT BETWEEN' : 'BETWEEN'} ? AND ?`;
    }

    if (operand instanceof RegExp) {
      bindings.push(operand.source);
      return negate
        ? `NOT (${column} ${this.dialect.regexpOperator} ?)`
        : `${column} ${this.dialect.regexpOperator} ?`;
    }

    bindings.push(this.dump(subject, operand));
    return `${column} ${negate ? '<>' : '='} ?`;
  }

  private comparator({ operator }: Comparison): string {
    switch (operator) {
      case 'eql':
      case 'in':
        return '=';
      case 'not':
        return '<>';
      case 'like':
        return 'LIKE';
      default:
        return ORDERING_OPERATORS[operator];
    }
  }

  private scalarOperand({ operator, subject, operand }: Comparison): Scalar | null {
    if (
      isOperandList(operand) ||
      isRange(operand) ||
      operand instanceof RegExp ||
      operand instanceof Property
    ) {
      throw new UsageException(`'${operator}' on ${subject.name} takes a single value`, {
        property: subject.name,
        operator,
      });
    }
    return operand;
  }

  private dump(subject: Property, value: Scalar | null): unknown {
    return subject.value(value);
  }

  private paging(limit: number | undefined, offset: number): string {
    if (limit !== undefined) {
      return offset > 0 ? ` LIMIT ${limit} OFFSET ${offset}` : ` LIMIT ${limit}`;
    }
    if (offset === 0) {
      return '';
    }
    return this.dialect.unboundedLimit === undefined
      ? ` OFFSET ${offset}`
      : ` LIMIT ${this.dialect.unboundedLimit} OFFSET ${offset}`;
  }

  private table(model: Model, repositoryName: string): string {
    return this.dialect.quoteIdentifier(model.storageName(repositoryName));
  }

  private column(property: Property, scope?: string): string {
    const field = this.dialect.quoteIdentifier(property.field());
    if (scope === undefined) {
      return field;
    }
    const table = this.dialect.quoteIdentifier(property.owner.storageName(scope));
    return `${table}.${field}`;
  }
}
