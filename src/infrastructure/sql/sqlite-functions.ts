import type Database from 'better-sqlite3';

/**
 * SQLite parses `x REGEXP y` as `regexp(y, x)` but ships no implementation.
 */
export function registerSqliteFunctions(connection: Database.Database): void {
  connection.function(
    'regexp',
    { deterministic: true },
    (pattern: unknown, value: unknown) => {
      if (pattern === null || value === null) {
        return null;
      }
      return new RegExp(String(pattern)).test(String(value)) ? 1 : 0;
    },
  );
}
