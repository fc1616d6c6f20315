/**
 * SQLite Embedding Backend
 *
 * Persistent store with one row per user:
 *
 *   CREATE TABLE speaker_embeddings (
 *     user_key   TEXT PRIMARY KEY,
 *     payload    BLOB NOT NULL,
 *     created_at INTEGER NOT NULL,   -- ms epoch
 *     expires_at INTEGER NOT NULL,   -- ms epoch
 *     CHECK (expires_at > created_at)
 *   );
 *
 * SQLite has no native expiry: get/exists treat rows past expires_at as absent
 * and delete them, and sweepExpired removes the rest in bulk.
 */

import { mkdirSync } from 'node:fs';
import { dirname } from 'node:path';
import Database from 'better-sqlite3';
import type { Logger } from 'pino';
import type { Embedding } from '../../types.js';
import { decodeEmbedding, encodeEmbedding } from '../codec/EmbeddingCodec.js';
import { BackendGuard } from './BackendGuard.js';
import type { BackendGuardConfig, BackendResult, IEmbeddingBackend } from './types.js';
import { fail, isOutage, ok } from './types.js';

const SCHEMA = `
  CREATE TABLE IF NOT EXISTS speaker_embeddings (
    user_key   TEXT PRIMARY KEY,
    payload    BLOB NOT NULL,
    created_at INTEGER NOT NULL,
    expires_at INTEGER NOT NULL,
    CHECK (expires_at > created_at)
  );
  CREATE INDEX IF NOT EXISTS idx_speaker_embeddings_expires_at
    ON speaker_embeddings (expires_at);
`;

interface EmbeddingRow {
  payload: Buffer;
  expires_at: number;
}

interface ExpiryRow {
  expires_at: number;
}

export interface SqliteEmbeddingBackendConfig {
  /** Database file, or ':memory:' */
  path: string;
  /** Wait this long on a locked database before failing (default: 5000) */
  busyTimeoutMs: number;
  guard: Partial<BackendGuardConfig>;
}

export class SqliteEmbeddingBackend implements IEmbeddingBackend {
  readonly label = 'sqlite' as const;
  readonly nativeExpiry = false;

  private readonly log: Logger;
  private readonly guard: BackendGuard;
  private readonly path: string;
  private readonly busyTimeoutMs: number;
  private db: Database.Database | null = null;
  private healthy = false;

  constructor(logger: Logger, config: Partial<SqliteEmbeddingBackendConfig> = {}) {
    this.log = logger.child({ component: 'SqliteEmbeddingBackend' });
    this.path = config.path ?? ':memory:';
    this.busyTimeoutMs = config.busyTimeoutMs ?? 5000;
    this.guard = new BackendGuard(this.label, logger, config.guard);
  }

  async connect(): Promise<boolean> {
    const result = await this.guard.run('connect', async () => {
      if (this.db?.open) {
        this.db.prepare('SELECT 1').get();
        return;
      }

      if (this.path !== ':memory:') {
        mkdirSync(dirname(this.path), { recursive: true });
      }
      const db = new Database(this.path, { timeout: this.busyTimeoutMs });
      try {
        if (this.path !== ':memory:') {
          db.pragma('journal_mode = WAL');
        }
        db.exec(SCHEMA);
      } catch (error) {
        db.close();
        throw error;
      }
      this.db = db;
    });

    this.healthy = result.ok;
    if (result.ok) {
      this.log.info({ path: this.path }, 'Connected to SQLite');
    } else {
      this.log.warn({ path: this.path, error: result.error.message }, 'Failed to open SQLite');
    }
    return this.healthy;
  }

  isHealthy(): boolean {
    return this.healthy && this.db?.open === true;
  }

  async set(key: string, embedding: Embedding, ttlSeconds: number): Promise<BackendResult<void>> {
    const payload = encodeEmbedding(embedding);
    const createdAt = Date.now();
    const expiresAt = createdAt + ttlSeconds * 1000;

    return this.track(
      await this.guard.run('set', async () => {
        this.requireDb()
          .prepare(
            `INSERT INTO speaker_embeddings (user_key, payload, created_at, expires_at)
             VALUES (?, ?, ?, ?)
             ON CONFLICT(user_key) DO UPDATE SET
               payload = excluded.payload,
               created_at = excluded.created_at,
               expires_at = excluded.expires_at`
          )
          .run(key, payload, createdAt, expiresAt);
      })
    );
  }

  async get(key: string): Promise<BackendResult<Embedding | null>> {
    const result = this.track(
      await this.guard.run('get', async () => {
        const db = this.requireDb();
        const row = db
          .prepare('SELECT payload, expires_at FROM speaker_embeddings WHERE user_key = ?')
          .get(key) as EmbeddingRow | undefined;

        if (row && row.expires_at < Date.now()) {
          db.prepare('DELETE FROM speaker_embeddings WHERE user_key = ? AND expires_at = ?')
            .run(key, row.expires_at);
          this.log.debug({ key }, 'Expired embedding removed on read');
          return null;
        }
        return row ?? null;
      })
    );
    if (!result.ok) return result;
    if (result.value === null) return ok(null);

    try {
      return ok(decodeEmbedding(result.value.payload));
    } catch (error) {
      const message = error instanceof Error ? error.message : String(error);
      this.log.error({ key, error: message }, 'Corrupt embedding in SQLite, evicting');
      await this.guard.run('evict', async () => {
        this.requireDb().prepare('DELETE FROM speaker_embeddings WHERE user_key = ?').run(key);
      });
      return fail({ kind: 'corrupt', backend: this.label, message, cause: error });
    }
  }

  async delete(key: string): Promise<BackendResult<boolean>> {
    return this.track(
      await this.guard.run('delete', async () => {
        const row = this.requireDb()
          .prepare('DELETE FROM speaker_embeddings WHERE user_key = ? RETURNING expires_at')
          .get(key) as ExpiryRow | undefined;
        // An expired row was already logically absent
        return row !== undefined && row.expires_at >= Date.now();
      })
    );
  }

  async exists(key: string): Promise<BackendResult<boolean>> {
    return this.track(
      await this.guard.run('exists', async () => {
        const db = this.requireDb();
        const row = db
          .prepare('SELECT expires_at FROM speaker_embeddings WHERE user_key = ?')
          .get(key) as ExpiryRow | undefined;

        if (!row) return false;
        if (row.expires_at < Date.now()) {
          db.prepare('DELETE FROM speaker_embeddings WHERE user_key = ? AND expires_at = ?')
            .run(key, row.expires_at);
          return false;
        }
        return true;
      })
    );
  }

  async sweepExpired(): Promise<BackendResult<number>> {
    const result = this.track(
      await this.guard.run('sweep', async () => {
        const info = this.requireDb()
          .prepare('DELETE FROM speaker_embeddings WHERE expires_at < ?')
          .run(Date.now());
        return info.changes;
      })
    );
    if (result.ok && result.value > 0) {
      this.log.info({ removed: result.value }, 'Expired embeddings swept');
    }
    return result;
  }

  async close(): Promise<void> {
    this.guard.shutdown();
    this.healthy = false;
    if (this.db?.open) {
      this.db.close();
      this.log.info('SQLite connection closed');
    }
    this.db = null;
  }

  private requireDb(): Database.Database {
    if (!this.db?.open) {
      throw new Error('SQLite database is not open');
    }
    return this.db;
  }

  private track<T>(result: BackendResult<T>): BackendResult<T> {
    if (!result.ok && isOutage(result.error.kind)) {
      this.healthy = false;
    }
    return result;
  }
}
