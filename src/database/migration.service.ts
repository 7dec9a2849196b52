import { createHash } from 'crypto';
import { promises as fs } from 'fs';
import { Injectable, Logger, OnModuleInit } from '@nestjs/common';
import * as path from 'path';
import { DatabaseService, type SqlClient } from './database.service';

export const MIGRATIONS_DIR = path.resolve(__dirname, '..', '..', 'sql', 'migrations');
const LEDGER_TABLE = 'network_schema_migration';

export interface Migration {
  filename: string;
  sql: string;
  checksum: string;
}

export interface MigrationPlan {
  pending: Migration[];
  /** Applied files whose content changed or that are gone from disk. */
  drifted: string[];
}

export function checksumOf(sql: string): string {
  return createHash('sha256').update(sql).digest('hex');
}

/** Compares the files on disk with the ledger of applied checksums. */
export function planMigrations(
  migrations: readonly Migration[],
  applied: ReadonlyMap<string, string>,
): MigrationPlan {
  const onDisk = new Map(migrations.map((migration) => [migration.filename, migration]));
  const drifted = Array.from(applied.entries())
    .filter(([filename, checksum]) => onDisk.get(filename)?.checksum !== checksum)
    .map(([filename]) => filename);
  const pending = migrations.filter((migration) => !applied.has(migration.filename));
  return { pending, drifted };
}

function isMissingDirectory(error: unknown): boolean {
  return typeof error === 'object' && error !== null && 'code' in error && error.code === 'ENOENT';
}

/**
 * Applies `sql/migrations/*.sql` in file name order, each in its own
 * transaction. An applied file must never change: the service refuses to
 * start instead of touching stored networks.
 */
@Injectable()
export class MigrationService implements OnModuleInit {
  private readonly logger = new Logger(MigrationService.name);
  protected readonly directory: string = MIGRATIONS_DIR;

  constructor(private readonly database: DatabaseService) {}

  async onModuleInit(): Promise<void> {
    if (!this.database.enabled) {
      this.logger.log('Storage disabled, no migrations to run');
      return;
    }
    await this.migrate();
  }

  /** Returns the file names applied in this run. */
  async migrate(): Promise<string[]> {
    const migrations = await this.readMigrations();
    if (!migrations.length) {
      this.logger.warn(`No migrations in ${this.directory}`);
      return [];
    }
    return this.database.withClient(async (client) => {
      await client.query(
        `CREATE TABLE IF NOT EXISTS ${LEDGER_TABLE} (
           filename TEXT PRIMARY KEY,
           checksum TEXT NOT NULL,
           applied_at TIMESTAMPTZ NOT NULL DEFAULT now()
         )`,
      );
      const plan = planMigrations(migrations, await this.appliedChecksums(client));
      if (plan.drifted.length) {
        const message = `Applied migrations changed or missing: ${plan.drifted.join(', ')}. Add a new migration instead of editing an applied one.`;
        this.logger.error(message);
        throw new Error(message);
      }
      if (!plan.pending.length) {
        this.logger.log('Schema is up to date');
        return [];
      }
      for (const migration of plan.pending) {
        await this.apply(client, migration);
      }
      return plan.pending.map((migration) => migration.filename);
    });
  }

  private async appliedChecksums(client: SqlClient): Promise<Map<string, string>> {
    const { rows } = await client.query(`SELECT filename, checksum FROM ${LEDGER_TABLE}`);
    const applied = new Map<string, string>();
    rows.forEach((row) => {
      if (typeof row.filename === 'string' && typeof row.checksum === 'string') {
        applied.set(row.filename, row.checksum);
      }
    });
    return applied;
  }

  private async apply(client: SqlClient, migration: Migration): Promise<void> {
    await client.query('BEGIN');
    try {
      await client.query(migration.sql);
      await client.query(`INSERT INTO ${LEDGER_TABLE} (filename, checksum) VALUES ($1, $2)`, [
        migration.filename,
        migration.checksum,
      ]);
      await client.query('COMMIT');
    } catch (error) {
      await client.query('ROLLBACK');
      this.logger.error(
        `Migration ${migration.filename} failed and was rolled back`,
        error instanceof Error ? error.stack : String(error),
      );
      throw error;
    }
    this.logger.log(`Applied ${migration.filename}`);
  }

  private async readMigrations(): Promise<Migration[]> {
    let names: string[];
    try {
      names = await fs.readdir(this.directory);
    } catch (error) {
      if (isMissingDirectory(error)) {
        return [];
      }
      throw error;
    }
    const files = names.filter((name) => name.toLowerCase().endsWith('.sql')).sort();
    return Promise.all(
      files.map(async (filename) => {
        const sql = await fs.readFile(path.join(this.directory, filename), 'utf8');
        return { filename, sql, checksum: checksumOf(sql) };
      }),
    );
  }
}
