/**
 * Local SQLite persistence (better-sqlite3). Documents and segments are
 * immutable, so they are inserted once; the graph is one JSON row replaced on
 * every flush.
 */
import { mkdirSync } from 'node:fs';
import { dirname } from 'node:path';
import { z } from 'zod';
import { STORAGE } from '../config.js';
import { logger } from '../utils/logger.js';
import {
  GraphDataSchema, SegmentSchema, SourceDocumentSchema, type PersistedState,
} from '../types.js';
import type { GraphPersistence } from './persistence.js';

const BodyRow = z.object({ body: z.string() });

const SCHEMA = `
  CREATE TABLE IF NOT EXISTS documents (
    id TEXT PRIMARY KEY, kind TEXT NOT NULL, title TEXT NOT NULL,
    body TEXT NOT NULL, created_at TEXT NOT NULL DEFAULT (datetime('now'))
  );
  CREATE TABLE IF NOT EXISTS segments (
    id TEXT PRIMARY KEY, document_id TEXT NOT NULL REFERENCES documents(id) ON DELETE CASCADE,
    ordinal INTEGER NOT NULL, body TEXT NOT NULL
  );
  CREATE INDEX IF NOT EXISTS segments_document ON segments(document_id, ordinal);
  CREATE TABLE IF NOT EXISTS graph (
    id INTEGER PRIMARY KEY CHECK (id = 1), version INTEGER NOT NULL, body TEXT NOT NULL,
    updated_at TEXT NOT NULL DEFAULT (datetime('now'))
  );
`;

function parseBody<T>(schema: z.ZodType<T>, row: unknown): T {
  return schema.parse(JSON.parse(BodyRow.parse(row).body));
}

export class SqlitePersistence implements GraphPersistence {
  readonly name = 'sqlite';
  private db: import('better-sqlite3').Database | null = null;

  constructor(private readonly path: string = STORAGE.sqlitePath) {}

  private async open(): Promise<import('better-sqlite3').Database> {
    if (!this.db) {
      const { default: Database } = await import('better-sqlite3');
      if (this.path !== ':memory:') mkdirSync(dirname(this.path), { recursive: true });
      this.db = new Database(this.path);
      this.db.pragma('journal_mode = WAL');
      this.db.pragma('foreign_keys = ON');
      this.db.exec(SCHEMA);
      logger.debug('SQLite opened', { path: this.path });
    }
    return this.db;
  }

  async load(): Promise<PersistedState | null> {
    const db = await this.open();
    const graphRow = db.prepare('SELECT body FROM graph WHERE id = 1').get();
    if (graphRow === undefined) return null;
    const documents = db.prepare('SELECT body FROM documents ORDER BY id').all()
      .map((row) => parseBody(SourceDocumentSchema, row));
    const segments = db.prepare('SELECT body FROM segments ORDER BY id').all()
      .map((row) => parseBody(SegmentSchema, row));
    return { documents, segments, graph: parseBody(GraphDataSchema, graphRow) };
  }

  async save(state: PersistedState): Promise<void> {
    const db = await this.open();
    const insertDocument = db.prepare('INSERT OR IGNORE INTO documents (id, kind, title, body) VALUES (?, ?, ?, ?)');
    const insertSegment = db.prepare('INSERT OR IGNORE INTO segments (id, document_id, ordinal, body) VALUES (?, ?, ?, ?)');
    const putGraph = db.prepare(
      `INSERT INTO graph (id, version, body) VALUES (1, ?, ?)
       ON CONFLICT(id) DO UPDATE SET version = excluded.version, body = excluded.body, updated_at = datetime('now')`,
    );
    db.transaction(() => {
      for (const d of state.documents) insertDocument.run(d.id, d.kind, d.title, JSON.stringify(d));
      for (const s of state.segments) insertSegment.run(s.id, s.documentId, s.ordinal, JSON.stringify(s));
      putGraph.run(state.graph.version, JSON.stringify(state.graph));
    })();
  }

  async close(): Promise<void> {
    this.db?.close();
    this.db = null;
  }
}
