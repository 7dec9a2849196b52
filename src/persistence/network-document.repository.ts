import { Injectable, Logger } from '@nestjs/common';
import { DatabaseService } from '../database/database.service';
import type { NetworkDocument } from './network-document';

interface NetworkDocumentRow {
  name: string;
  body: unknown;
  updated_at: string;
}

export interface StoredNetworkDocument {
  name: string;
  body: unknown;
  updatedAt: string;
}

@Injectable()
export class NetworkDocumentRepository {
  private readonly logger = new Logger(NetworkDocumentRepository.name);

  constructor(private readonly database: DatabaseService) {}

  get isEnabled(): boolean {
    return this.database.enabled;
  }

  /** The raw body is returned unchecked; callers parse it. */
  async load(name: string): Promise<StoredNetworkDocument | null> {
    if (!this.isEnabled) {
      return null;
    }
    const result = await this.database.query<NetworkDocumentRow>(
      `
        SELECT name, body, updated_at
        FROM network_document
        WHERE name = $1
      `,
      [name],
    );
    const row = result.rows[0];
    if (!row) {
      return null;
    }
    return { name: row.name, body: row.body, updatedAt: row.updated_at };
  }

  async save(name: string, document: NetworkDocument): Promise<void> {
    if (!this.isEnabled) {
      return;
    }
    await this.database.query(
      `
        INSERT INTO network_document (name, body)
        VALUES ($1, $2::jsonb)
        ON CONFLICT (name)
        DO UPDATE SET body = EXCLUDED.body, updated_at = now()
      `,
      [name, JSON.stringify(document)],
    );
    this.logger.log(`Network document ${name} saved`);
  }
}
