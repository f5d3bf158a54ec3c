/**
 * @fileoverview SQLite snapshot of an evidence store.
 *
 * `save` writes every chunk of a store; `loadInto` re-adds archived rows
 * through {@link EvidenceStore.addChunk}, so a hydrated store recomputes and
 * checks each id instead of trusting the file.
 */

import type Database from 'better-sqlite3';
import { EvidenceStoreError } from '../core/errors.js';
import { logDebug } from '../telemetry/logger.js';
import type { EvidenceStore } from './evidence_store.js';

interface ChunkRow {
  chunk_id: string;
  source: string;
  locator: string;
  text: string;
}

interface CountRow {
  total: number;
}

export class SqliteChunkArchive {
  private db: Database.Database | null = null;

  /** `:memory:` gives a throwaway archive. */
  constructor(private readonly dbPath: string) {}

  async initialize(): Promise<void> {
    if (this.db) return;

    const BetterSqlite3 = (await import('better-sqlite3')).default;
    this.db = new BetterSqlite3(this.dbPath);
    this.db.pragma('journal_mode = WAL');
    this.db.pragma('busy_timeout = 5000');

    this.db.exec(`
      CREATE TABLE IF NOT EXISTS evidence_chunks (
        seq INTEGER PRIMARY KEY AUTOINCREMENT,
        chunk_id TEXT NOT NULL UNIQUE,
        source TEXT NOT NULL,
        locator TEXT NOT NULL,
        text TEXT NOT NULL
      );
    `);
  }

  /** Rows actually inserted; chunks already archived are skipped. */
  save(store: EvidenceStore): number {
    const db = this.requireDb();
    const insert = db.prepare<[string, string, string, string]>(
      'INSERT OR IGNORE INTO evidence_chunks (chunk_id, source, locator, text) VALUES (?, ?, ?, ?)',
    );
    const insertAll = db.transaction(() => {
      let written = 0;
      for (const chunk of store.chunks()) {
        written += insert.run(chunk.chunkId, chunk.source, chunk.locator, chunk.text).changes;
      }
      return written;
    });
    const written = insertAll();
    logDebug('Archived evidence chunks', { dbPath: this.dbPath, written });
    return written;
  }

  /**
   * Adds archived chunks to `store` in archive order and returns the number of
   * rows read.
   *
   * @throws EvidenceStoreError('archive') when a row's content no longer hashes to its id
   */
  loadInto(store: EvidenceStore): number {
    const db = this.requireDb();
    const rows = db
      .prepare<[], ChunkRow>('SELECT chunk_id, source, locator, text FROM evidence_chunks ORDER BY seq')
      .all();
    for (const row of rows) {
      const chunkId = store.addChunk(row.source, row.locator, row.text);
      if (chunkId !== row.chunk_id) {
        throw new EvidenceStoreError('archive', `archived id ${row.chunk_id} does not match content (${chunkId})`, row.chunk_id);
      }
    }
    return rows.length;
  }

  count(): number {
    const row = this.requireDb().prepare<[], CountRow>('SELECT COUNT(*) AS total FROM evidence_chunks').get();
    return row?.total ?? 0;
  }

  close(): void {
    if (this.db) {
      this.db.close();
      this.db = null;
    }
  }

  private requireDb(): Database.Database {
    if (!this.db) {
      throw new EvidenceStoreError('archive', 'archive not initialized');
    }
    return this.db;
  }
}
