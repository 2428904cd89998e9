import { DatabaseType } from '../../shared/types/query-builder.types';

/**
 * What the statement builder needs to know about one SQL dialect
 */
export interface SqlDialect {
  readonly type: DatabaseType;
  /** knex client driving this dialect */
  readonly client: 'pg' | 'mysql2' | 'better-sqlite3';
  readonly supportsReturning: boolean;
  readonly supportsDefaultValues: boolean;
  /** native regular-expression match operator */
  readonly regexpOperator: string;
  /** LIMIT needed before an OFFSET when no limit was requested, if any */
  readonly unboundedLimit?: string;
  quoteIdentifier(name: string): string;
}

function quoteWith(quote: string): (name: string) => string {
  return (name) => `${quote}${name.split(quote).join(quote + quote)}${quote}`;
}

const DIALECTS: Record<DatabaseType, SqlDialect> = {
  postgres: {
    type: 'postgres',
    client: 'pg',
    supportsReturning: true,
    supportsDefaultValues: true,
    regexpOperator: '~',
    quoteIdentifier: quoteWith('"'),
  },
  mysql: {
    type: 'mysql',
    client: 'mysql2',
    supportsReturning: false,
    supportsDefaultValues: false,
    regexpOperator: 'REGEXP',
    unboundedLimit: '18446744073709551615',
    quoteIdentifier: quoteWith('`'),
  },
  sqlite: {
    type: 'sqlite',
    client: 'better-sqlite3',
    supportsReturning: false,
    supportsDefaultValues: true,
    regexpOperator: 'REGEXP',
    unboundedLimit: '-1',
    quoteIdentifier: quoteWith('"'),
  },
};

export function getDialect(type: DatabaseType): SqlDialect {
  return DIALECTS[type];
}

export function isDatabaseType(value: string): value is DatabaseType {
  return value === 'postgres' || value === 'mysql' || value === 'sqlite';
}
