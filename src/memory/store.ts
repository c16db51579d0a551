import * as fs from 'fs';
import Database from 'better-sqlite3';
import { z } from 'zod';
import { MemoriaError, StorageFault, ValidationError, errorMessage } from '../errors.js';
import type { MemoryMetadata, MemoryRecord, MemoryUpdate } from './types.js';

const DIMENSIONS_KEY = 'embedding_dimensions';

export interface MemoryStoreOptions {
  // Pin the embedding dimensionality up front instead of taking it from the first write
  dimensions?: number;
  now?: () => Date;
}

const StoredMetadataSchema = z.object({
  importance: z.number().optional(),
  category: z.string().optional(),
  entities: z.array(z.string()).optional(),
  extra: z.record(z.unknown()).optional(),
}).passthrough();

export class MemoryStore {
  private db: Database.Database;
  private now: () => Date;
  private dimensions: number | null;

  constructor(dbPath: string, options: MemoryStoreOptions = {}) {
    this.now = options.now ?? (() => new Date());

    try {
      this.db = new Database(dbPath);
      this.db.pragma('journal_mode = WAL');
      this.runMigrations();
    } catch (error) {
      throw new StorageFault(`Failed to open memory database at ${dbPath}: ${errorMessage(error)}`, { cause: error });
    }

    // Restrict database file permissions (owner read/write only)
    if (dbPath !== ':memory:') {
      try {
        fs.chmodSync(dbPath, 0o600);
      } catch {
        // May fail on some filesystems - not critical
      }
    }

    this.dimensions = this.readDimensions();
    if (options.dimensions !== undefined) {
      this.checkDimensions(options.dimensions);
    }
  }

  private runMigrations(): void {
    this.db.exec(`
      CREATE TABLE IF NOT EXISTS migrations (
        id INTEGER PRIMARY KEY,
        name TEXT NOT NULL,
        applied_at TEXT DEFAULT (datetime('now'))
      );
    `);

    const appliedMigrations = new Set(
      this.db.prepare<[], { name: string }>('SELECT name FROM migrations').all()
        .map((row) => row.name)
    );

    // Migration 001: Initial schema
    if (!appliedMigrations.has('001_initial')) {
      this.db.exec(`
        -- AUTOINCREMENT: ids are never reused after deletion
        CREATE TABLE memories (
          id INTEGER PRIMARY KEY AUTOINCREMENT,
          content TEXT NOT NULL,
          embedding BLOB,
          metadata TEXT NOT NULL DEFAULT '{}',
          created_at INTEGER NOT NULL,
          updated_at INTEGER NOT NULL
        );

        CREATE TABLE store_meta (
          key TEXT PRIMARY KEY,
          value TEXT NOT NULL
        );

        CREATE INDEX idx_memories_created ON memories(created_at DESC, id DESC);
      `);

      this.db.prepare('INSERT INTO migrations (name) VALUES (?)').run('001_initial');
    }
  }

  close(): void {
    this.db.close();
  }

  transaction<T>(fn: () => T): T {
    try {
      return this.db.transaction(fn)();
    } catch (error) {
      // A rolled-back first write may have taken the store_meta row with it
      if (this.db.open) {
        this.dimensions = this.readDimensions();
      }
      throw error;
    }
  }

  getDimensions(): number | null {
    return this.dimensions;
  }

  add(content: string, embedding?: Float32Array | null, metadata: MemoryMetadata = {}): number {
    return this.guard('add memory', () => {
      if (embedding) {
        this.checkDimensions(embedding.length);
      }

      const timestamp = this.now().getTime();
      const result = this.db.prepare(`
        INSERT INTO memories (content, embedding, metadata, created_at, updated_at)
        VALUES (?, ?, ?, ?, ?)
      `).run(
        content,
        embedding ? encodeEmbedding(embedding) : null,
        JSON.stringify(metadata),
        timestamp,
        timestamp
      );

      return Number(result.lastInsertRowid);
    });
  }

  get(id: number): MemoryRecord | null {
    return this.guard('read memory', () => {
      const row = this.db.prepare<[number], MemoryRow>(`
        SELECT * FROM memories WHERE id = ?
      `).get(id);

      return row ? rowToRecord(row) : null;
    });
  }

  /**
   * Partial update. Only fields that differ from the stored row are written,
   * and updated_at moves only when at least one of them does. Content compares
   * as text, embeddings by bytes, metadata by its JSON serialization.
   */
  update(id: number, changes: MemoryUpdate): boolean {
    return this.guard('update memory', () => {
      const existing = this.db.prepare<[number], Omit<MemoryRow, 'id' | 'updated_at'>>(`
        SELECT content, embedding, metadata, created_at FROM memories WHERE id = ?
      `).get(id);

      if (!existing) return false;

      const assignments: string[] = [];
      const params: Array<string | number | Buffer> = [];

      if (changes.content !== undefined && changes.content !== existing.content) {
        assignments.push('content = ?');
        params.push(changes.content);
      }

      if (changes.embedding !== undefined) {
        this.checkDimensions(changes.embedding.length);
        const blob = encodeEmbedding(changes.embedding);
        if (!existing.embedding || !blob.equals(existing.embedding)) {
          assignments.push('embedding = ?');
          params.push(blob);
        }
      }

      if (changes.metadata !== undefined) {
        const json = JSON.stringify(changes.metadata);
        if (json !== existing.metadata) {
          assignments.push('metadata = ?');
          params.push(json);
        }
      }

      if (assignments.length === 0) {
        return true;
      }

      // Never move updated_at behind created_at, even if the clock does
      assignments.push('updated_at = ?');
      params.push(Math.max(this.now().getTime(), existing.created_at));

      this.db.prepare(`
        UPDATE memories SET ${assignments.join(', ')} WHERE id = ?
      `).run(...params, id);

      return true;
    });
  }

  delete(id: number): boolean {
    return this.guard('delete memory', () => {
      const result = this.db.prepare(`
        DELETE FROM memories WHERE id = ?
      `).run(id);

      return result.changes > 0;
    });
  }

  // Newest first; id breaks ties between rows created in the same millisecond
  listAll(): MemoryRecord[] {
    return this.guard('list memories', () => {
      const rows = this.db.prepare<[], MemoryRow>(`
        SELECT * FROM memories
        ORDER BY created_at DESC, id DESC
      `).all();

      return rows.map(rowToRecord);
    });
  }

  /**
   * Case-insensitive literal substring match (ASCII folding, as SQLite's
   * lower() does), ordered like listAll.
   */
  searchByContent(substring: string, limit: number = 5): MemoryRecord[] {
    if (limit <= 0) return [];

    return this.guard('search memories', () => {
      const rows = this.db.prepare<[string, number], MemoryRow>(`
        SELECT * FROM memories
        WHERE instr(lower(content), lower(?)) > 0
        ORDER BY created_at DESC, id DESC
        LIMIT ?
      `).all(substring, limit);

      return rows.map(rowToRecord);
    });
  }

  count(): number {
    return this.guard('count memories', () => {
      const row = this.db.prepare<[], { total: number }>(`
        SELECT COUNT(*) as total FROM memories
      `).get();

      return row?.total ?? 0;
    });
  }

  private readDimensions(): number | null {
    return this.guard('read store metadata', () => {
      const row = this.db.prepare<[string], { value: string }>(`
        SELECT value FROM store_meta WHERE key = ?
      `).get(DIMENSIONS_KEY);

      return row ? Number(row.value) : null;
    });
  }

  // The first embedding written fixes the dimensionality for the life of the store
  private checkDimensions(length: number): void {
    if (!Number.isInteger(length) || length <= 0) {
      throw new ValidationError(`Embedding dimension must be a positive integer, got ${length}`);
    }

    if (this.dimensions === null) {
      this.guard('write store metadata', () => {
        this.db.prepare(`
          INSERT INTO store_meta (key, value) VALUES (?, ?)
        `).run(DIMENSIONS_KEY, String(length));
      });
      this.dimensions = length;
      return;
    }

    if (length !== this.dimensions) {
      throw new ValidationError(`Embedding dimension mismatch: expected ${this.dimensions}, got ${length}`);
    }
  }

  private guard<T>(operation: string, fn: () => T): T {
    try {
      return fn();
    } catch (error) {
      if (error instanceof MemoriaError) throw error;
      throw new StorageFault(`Failed to ${operation}: ${errorMessage(error)}`, { cause: error });
    }
  }
}

export function encodeEmbedding(embedding: Float32Array): Buffer {
  return Buffer.from(embedding.buffer, embedding.byteOffset, embedding.byteLength);
}

// Copy out of the row buffer: SQLite blobs carry no alignment guarantee
export function decodeEmbedding(blob: Buffer): Float32Array {
  const copy = new Uint8Array(blob.byteLength);
  copy.set(blob);
  return new Float32Array(copy.buffer, 0, Math.floor(blob.byteLength / 4));
}

function parseMetadata(json: string): MemoryMetadata {
  let raw: unknown;
  try {
    raw = JSON.parse(json);
  } catch {
    return {};
  }

  const parsed = StoredMetadataSchema.safeParse(raw);
  if (!parsed.success) return {};

  const { importance, category, entities, extra, ...unknownKeys } = parsed.data;
  const metadata: MemoryMetadata = {};

  if (importance !== undefined) metadata.importance = importance;
  if (category !== undefined) metadata.category = category;
  if (entities !== undefined) metadata.entities = entities;

  const mergedExtra = { ...unknownKeys, ...extra };
  if (Object.keys(mergedExtra).length > 0) metadata.extra = mergedExtra;

  return metadata;
}

function rowToRecord(row: MemoryRow): MemoryRecord {
  return {
    id: row.id,
    content: row.content,
    embedding: row.embedding ? decodeEmbedding(row.embedding) : null,
    createdAt: new Date(row.created_at),
    updatedAt: new Date(row.updated_at),
    metadata: parseMetadata(row.metadata),
  };
}

// Database row type
interface MemoryRow {
  id: number;
  content: string;
  embedding: Buffer | null;
  metadata: string;
  created_at: number;
  updated_at: number;
}
