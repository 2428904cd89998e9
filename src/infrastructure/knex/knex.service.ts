import { Injectable, Logger, OnModuleDestroy, OnModuleInit } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import type Database from 'better-sqlite3';
import { Knex, knex } from 'knex';
import { ConfigurationException, UsageException } from '../../core/exceptions/custom-exceptions';
import {
  BindValue,
  ConnectionDescriptor,
  DatabaseType,
  ExecuteResult,
  SqlStatement,
} from '../../shared/types/query-builder.types';
import { getDialect, isDatabaseType, SqlDialect } from '../sql/sql-dialect';
import { normalizeDriverResult } from '../sql/row-decoder';
import { registerSqliteFunctions } from '../sql/sqlite-functions';
import { getDefaultPort, parseDatabaseUri, redactDatabaseUri } from './utils/uri-parser';

/** A pooled driver connection checked out for one logical operation. */
export type DriverConnection = unknown;

type BindPrimitive = Exclude<BindValue, bigint>;

/**
 * Owns the knex instance and runs statements on connections it checks out
 * and returns around each logical operation.
 */
@Injectable()
export class KnexService implements OnModuleInit, OnModuleDestroy {
  private knexInstance?: Knex;
  private descriptor?: ConnectionDescriptor;
  private readonly logger = new Logger(KnexService.name);

  constructor(private readonly configService: ConfigService) {}

  async onModuleInit(): Promise<void> {
    const descriptor = this.getConnectionDescriptor();
    this.logger.log(`🔌 Initializing Knex connection (${descriptor.type})...`);

    try {
      await this.getKnex().raw('SELECT 1');
      this.logger.log('Knex connection established');
    } catch (error) {
      this.logger.error(`Failed to establish Knex connection: ${errorText(error)}`);
      throw error;
    }
  }

  async onModuleDestroy(): Promise<void> {
    if (this.knexInstance) {
      await this.knexInstance.destroy();
      this.knexInstance = undefined;
      this.logger.log('Knex connection closed');
    }
  }

  getKnex(): Knex {
    if (!this.knexInstance) {
      this.knexInstance = this.createKnex(this.getConnectionDescriptor());
    }
    return this.knexInstance;
  }

  getDatabaseType(): DatabaseType {
    return this.getConnectionDescriptor().type;
  }

  getDialect(): SqlDialect {
    return getDialect(this.getDatabaseType());
  }

  /**
   * Settings resolved from `DB_URI`, or from the discrete `DB_*` keys when it
   * is absent. Computed once.
   */
  getConnectionDescriptor(): ConnectionDescriptor {
    if (!this.descriptor) {
      this.descriptor = this.resolveConnectionDescriptor();
    }
    return this.descriptor;
  }

  /**
   * Runs `work` on a connection checked out of the pool, returning it on
   * every exit path. Failures are logged and rethrown as they are.
   */
  async withConnection<T>(work: (connection: DriverConnection) => Promise<T>): Promise<T> {
    const client = this.getKnex().client;
    const connection: DriverConnection = await client.acquireConnection();
    try {
      return await work(connection);
    } catch (error) {
      this.logger.error(`Statement execution failed: ${errorText(error)}`);
      throw error;
    } finally {
      await client.releaseConnection(connection);
    }
  }

  /** Executes one statement on `connection`, or on its own connection. */
  async run(statement: SqlStatement, connection?: DriverConnection): Promise<ExecuteResult> {
    if (connection === undefined) {
      return this.withConnection((acquired) => this.runOn(acquired, statement));
    }
    return this.runOn(connection, statement);
  }

  private async runOn(connection: DriverConnection, statement: SqlStatement): Promise<ExecuteResult> {
    const type = this.getDatabaseType();
    const bindings = statement.bindings.map((value) => this.toBindValue(value));
    this.logger.debug(`${statement.sql} -- ${bindings.length} bind value(s)`);

    const raw: unknown = await this.getKnex().raw(statement.sql, bindings).connection(connection);
    return normalizeDriverResult(type, raw);
  }

  /** A value the current driver accepts as a binding. */
  toBindValue(value: unknown): BindPrimitive {
    const sqlite = this.getDatabaseType() === 'sqlite';

    if (value === null || value === undefined) {
      return null;
    }
    if (typeof value === 'boolean') {
      return sqlite ? Number(value) : value;
    }
    if (typeof value === 'bigint') {
      return Number.isSafeInteger(Number(value)) ? Number(value) : value.toString();
    }
    if (typeof value === 'string' || typeof value === 'number') {
      return value;
    }
    if (value instanceof Date) {
      return sqlite ? value.toISOString() : value;
    }
    if (Buffer.isBuffer(value)) {
      return value;
    }
    throw new UsageException(`Unsupported bind value of type ${typeof value}`, {
      value: String(value),
    });
  }

  private resolveConnectionDescriptor(): ConnectionDescriptor {
    const configuredType = this.configService.get<string>('DB_TYPE') || 'mysql';
    if (!isDatabaseType(configuredType)) {
      throw new ConfigurationException(
        `Unsupported DB_TYPE: ${configuredType}. Supported: mysql, postgres, sqlite`,
        'DB_TYPE',
      );
    }

    const pool = {
      min: this.intSetting('DB_POOL_MIN_SIZE', 2),
      max: this.intSetting('DB_POOL_MAX_SIZE', 10),
    };
    const acquireConnectionTimeout = this.intSetting('DB_ACQUIRE_TIMEOUT', 10000);

    const DB_URI = this.configService.get<string>('DB_URI');
    if (DB_URI) {
      const parsed = parseDatabaseUri(DB_URI);
      this.logger.log(`Using database URI: ${redactDatabaseUri(DB_URI)}`);
      return {
        ...parsed,
        pool: parsed.type === 'sqlite' ? { min: 1, max: 1 } : pool,
        acquireConnectionTimeout,
      };
    }

    if (configuredType === 'sqlite') {
      return {
        type: 'sqlite',
        filename: this.configService.get<string>('DB_FILENAME') || ':memory:',
        pool: { min: 1, max: 1 },
        acquireConnectionTimeout,
      };
    }

    this.logger.warn(
      'Using legacy DB_HOST/DB_PORT/DB_USERNAME/DB_PASSWORD/DB_NAME format. Consider migrating to DB_URI format.',
    );
    return {
      type: configuredType,
      host: this.configService.get<string>('DB_HOST') || 'localhost',
      port: this.intSetting('DB_PORT', getDefaultPort(configuredType) ?? 3306),
      user: this.configService.get<string>('DB_USERNAME') || 'root',
      password: this.configService.get<string>('DB_PASSWORD') || '',
      database: this.configService.get<string>('DB_NAME') || 'orm',
      pool,
      acquireConnectionTimeout,
    };
  }

  private createKnex(descriptor: ConnectionDescriptor): Knex {
    const dialect = getDialect(descriptor.type);

    if (descriptor.type === 'sqlite') {
      return knex({
        client: dialect.client,
        connection: { filename: descriptor.filename ?? ':memory:' },
        useNullAsDefault: true,
        pool: {
          ...descriptor.pool,
          afterCreate: (
            connection: Database.Database,
            done: (error: Error | null, connection: Database.Database) => void,
          ) => {
            registerSqliteFunctions(connection);
            done(null, connection);
          },
        },
        acquireConnectionTimeout: descriptor.acquireConnectionTimeout,
      });
    }

    return knex({
      client: dialect.client,
      connection: {
        host: descriptor.host,
        port: descriptor.port,
        user: descriptor.user,
        password: descriptor.password,
        database: descriptor.database,
      },
      pool: descriptor.pool,
      acquireConnectionTimeout: descriptor.acquireConnectionTimeout,
      debug: false,
    });
  }

  private intSetting(key: string, fallback: number): number {
    const configured = this.configService.get<string | number>(key);
    if (configured === undefined || configured === '') {
      return fallback;
    }
    const parsed = typeof configured === 'number' ? configured : parseInt(configured, 10);
    if (!Number.isInteger(parsed)) {
      throw new ConfigurationException(`${key} must be an integer, but was ${configured}`, key);
    }
    return parsed;
  }
}

function errorText(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
