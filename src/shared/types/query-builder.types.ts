export type DatabaseType = 'mysql' | 'postgres' | 'sqlite';

export type BindValue = string | number | boolean | bigint | Date | Buffer | null;

/** SQL text with `?` placeholders and its positional bindings. */
export interface SqlStatement {
  sql: string;
  bindings: unknown[];
}

export interface ExecuteResult {
  /** rows changed by an INSERT, UPDATE or DELETE; row count for a SELECT */
  affectedRows: number;
  /** id the store generated for the last inserted row, if it reports one */
  insertId?: number | bigint | string;
  rows: Record<string, unknown>[];
  /** the driver's own result, untouched */
  raw: unknown;
}

export interface ConnectionDescriptor {
  type: DatabaseType;
  host?: string;
  port?: number;
  user?: string;
  password?: string;
  database?: string;
  filename?: string;
  pool: {
    min: number;
    max: number;
  };
  acquireConnectionTimeout: number;
}
