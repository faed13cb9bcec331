import { Logger, type OnApplicationShutdown } from '@nestjs/common';
import { Pool, type QueryResultRow } from 'pg';
import { assertReadOnlySql } from '../common/sql-guard';

export type SqlRows<T extends QueryResultRow> = {
  rowCount: number;
  rows: T[];
};

export type SqlServiceOptions = {
  connectionString?: string;
  statementTimeoutMs?: number;
  pool?: Pool;
};

/**
 * Read-only access to PostgreSQL. The pool is created on first use so the
 * app can boot without a database when nothing needs one.
 */
export class SqlService implements OnApplicationShutdown {
  private readonly logger = new Logger(SqlService.name);
  private pool: Pool | null;
  private readonly statementTimeoutMs: number;

  constructor(private readonly options: SqlServiceOptions) {
    this.pool = options.pool ?? null;
    this.statementTimeoutMs = options.statementTimeoutMs ?? 8000;
  }

  private getPool(): Pool {
    if (!this.pool) {
      this.pool = new Pool({
        connectionString: this.options.connectionString,
        max: 5,
        application_name: 'support_chat_backend',
      });
      this.pool.on('error', (err) =>
        this.logger.error(`Idle pg client error: ${err.message}`),
      );
    }
    return this.pool;
  }

  async query<T extends QueryResultRow>(
    sql: string,
    params: unknown[] = [],
  ): Promise<SqlRows<T>> {
    assertReadOnlySql(sql);

    const client = await this.getPool().connect();
    try {
      await client.query(
        `set statement_timeout = '${Math.floor(this.statementTimeoutMs)}ms'`,
      );
      const res = await client.query<T>(sql, params);
      return { rowCount: res.rowCount ?? res.rows.length, rows: res.rows };
    } finally {
      client.release();
    }
  }

  async onApplicationShutdown() {
    if (this.pool) {
      await this.pool.end();
      this.pool = null;
    }
  }
}
