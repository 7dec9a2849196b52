import { Injectable, Logger, OnModuleDestroy } from '@nestjs/common';
import { Pool, PoolConfig, QueryResult, QueryResultRow } from 'pg';

/** The part of a pg client that migrations need. */
export interface SqlClient {
  query(text: string, values?: unknown[]): Promise<{ rows: QueryResultRow[] }>;
}

const FALSE_FLAGS = new Set(['', 'false', '0', 'no', 'off']);

function sslFromEnv(env: NodeJS.ProcessEnv): PoolConfig['ssl'] {
  if (FALSE_FLAGS.has((env.DATABASE_SSL ?? '').trim().toLowerCase())) {
    return undefined;
  }
  const strict = (env.DATABASE_SSL_REJECT_UNAUTHORIZED ?? 'true').trim().toLowerCase();
  return { rejectUnauthorized: strict !== 'false' };
}

/**
 * Pool settings from `DATABASE_URL`, or from the `DB_*` variables when no URL
 * is given. Null leaves storage disabled.
 */
export function resolveDatabaseConfig(env: NodeJS.ProcessEnv): PoolConfig | null {
  const ssl = sslFromEnv(env);
  if (env.DATABASE_URL) {
    return { connectionString: env.DATABASE_URL, ssl };
  }
  const { DB_HOST: host, DB_NAME: database, DB_USER: user } = env;
  if (!host || !database || !user) {
    return null;
  }
  const port = Number.parseInt(env.DB_PORT ?? '5432', 10);
  if (!Number.isInteger(port) || port <= 0) {
    throw new Error(`DB_PORT must be a port number, got "${env.DB_PORT}"`);
  }
  return { host, port, database, user, password: env.DB_PASSWORD, ssl };
}

@Injectable()
export class DatabaseService implements OnModuleDestroy {
  private readonly logger = new Logger(DatabaseService.name);
  private readonly pool: Pool | null = null;

  constructor() {
    const config = resolveDatabaseConfig(process.env);
    if (!config) {
      this.logger.warn(
        'No database configured (DATABASE_URL or DB_HOST/DB_NAME/DB_USER); network documents stay in memory.',
      );
      return;
    }
    this.pool = new Pool(config);
    this.pool.on('error', (error) => {
      this.logger.error('Idle PostgreSQL client failed', error.stack);
    });
  }

  get enabled(): boolean {
    return this.pool !== null;
  }

  async query<T extends QueryResultRow = QueryResultRow>(
    text: string,
    values?: unknown[],
  ): Promise<QueryResult<T>> {
    return this.requirePool().query<T>(text, values);
  }

  /** Runs `work` on one pooled connection, so BEGIN/COMMIT stay on it. */
  async withClient<T>(work: (client: SqlClient) => Promise<T>): Promise<T> {
    const client = await this.requirePool().connect();
    try {
      return await work({ query: (text, values) => client.query<QueryResultRow>(text, values) });
    } finally {
      client.release();
    }
  }

  async onModuleDestroy(): Promise<void> {
    await this.pool?.end();
  }

  private requirePool(): Pool {
    if (!this.pool) {
      throw new Error('Network storage is disabled: no database configured.');
    }
    return this.pool;
  }
}
