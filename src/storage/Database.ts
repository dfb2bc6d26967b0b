import Database from 'better-sqlite3';
import { existsSync, mkdirSync } from 'fs';
import path from 'path';
import { createLogger } from '../utils/logger.js';
import { ErrorCode, StorageError, errorMessage } from '../core/errors.js';

const logger = createLogger('Database');

// Initial schema migration
const INITIAL_SCHEMA = `
-- Protocol metric snapshots; (protocol_id, timestamp) is the natural key
CREATE TABLE IF NOT EXISTS protocol_snapshots (
    id INTEGER PRIMARY KEY AUTOINCREMENT,
    protocol_id TEXT NOT NULL,
    timestamp INTEGER NOT NULL,
    tvl_usd REAL,
    apy_7d REAL,
    utilization_rate REAL,
    UNIQUE(protocol_id, timestamp)
);

CREATE INDEX IF NOT EXISTS idx_snapshots_protocol_time ON protocol_snapshots(protocol_id, timestamp DESC);

-- Alert ledger
CREATE TABLE IF NOT EXISTS protocol_alerts (
    id TEXT PRIMARY KEY,
    protocol_id TEXT NOT NULL,
    alert_kind TEXT NOT NULL,
    severity TEXT NOT NULL,
    message TEXT NOT NULL,
    triggered_at INTEGER NOT NULL,
    resolved_at INTEGER
);

CREATE INDEX IF NOT EXISTS idx_alerts_protocol_kind ON protocol_alerts(protocol_id, alert_kind, triggered_at);
CREATE INDEX IF NOT EXISTS idx_alerts_open ON protocol_alerts(resolved_at) WHERE resolved_at IS NULL;
CREATE INDEX IF NOT EXISTS idx_alerts_triggered_at ON protocol_alerts(triggered_at);

-- Migrations tracking
CREATE TABLE IF NOT EXISTS migrations (
    id INTEGER PRIMARY KEY,
    name TEXT NOT NULL,
    applied_at INTEGER DEFAULT (unixepoch())
);
`;

export interface DatabaseOptions {
  databasePath: string;
  busyTimeoutMs: number;
}

export const IN_MEMORY = ':memory:';

// Database wrapper class
export class DatabaseWrapper {
  private db: Database.Database | null = null;
  private readonly dbPath: string;
  private readonly busyTimeoutMs: number;

  constructor(options: DatabaseOptions) {
    this.dbPath = options.databasePath;
    this.busyTimeoutMs = options.busyTimeoutMs;
  }

  // Initialize database connection
  initialize(): void {
    if (this.db) {
      return;
    }

    // Ensure data directory exists
    if (this.dbPath !== IN_MEMORY) {
      const dir = path.dirname(this.dbPath);
      if (!existsSync(dir)) {
        mkdirSync(dir, { recursive: true });
        logger.info(`Created database directory: ${dir}`);
      }
    }

    try {
      // Open database connection; timeout bounds waits on a locked database
      this.db = new Database(this.dbPath, { timeout: this.busyTimeoutMs });
      if (this.dbPath !== IN_MEMORY) {
        this.db.pragma('journal_mode = WAL');
      }
      this.db.pragma('foreign_keys = ON');
    } catch (error) {
      throw new StorageError(`Failed to open database ${this.dbPath}: ${errorMessage(error)}`, ErrorCode.StorageUnavailable);
    }

    logger.info(`Connected to database: ${this.dbPath}`);

    // Run migrations
    this.runMigrations();
  }

  // Run database migrations
  private runMigrations(): void {
    const db = this.getDb();

    // Check if initial schema has been applied
    const migrationExists = db
      .prepare("SELECT name FROM sqlite_master WHERE type='table' AND name='migrations'")
      .get();

    if (!migrationExists) {
      logger.info('Applying initial schema...');
      db.exec(INITIAL_SCHEMA);
      db.prepare('INSERT INTO migrations (name) VALUES (?)').run('001_initial_schema');
      logger.info('Initial schema applied');
    }
  }

  // Get database instance
  getDb(): Database.Database {
    if (!this.db) {
      throw new StorageError('Database not initialized. Call initialize() first.', ErrorCode.StorageUnavailable);
    }
    return this.db;
  }

  prepare(sql: string): Database.Statement {
    return this.getDb().prepare(sql);
  }

  // Run in a BEGIN IMMEDIATE transaction so the write lock is held from the first read
  immediate<T>(fn: () => T): T {
    return this.getDb().transaction(fn).immediate();
  }

  // Connectivity check used by the health endpoint
  ping(): void {
    this.prepare('SELECT 1').get();
  }

  // Close database connection
  close(): void {
    if (this.db) {
      this.db.close();
      this.db = null;
      logger.info('Database connection closed');
    }
  }
}

function sqliteCode(error: unknown): string | undefined {
  if (error instanceof Error && 'code' in error && typeof error.code === 'string') {
    return error.code;
  }
  return undefined;
}

// Wrap driver failures in StorageError
export function storageCall<T>(operation: string, fn: () => T): T {
  try {
    return fn();
  } catch (error) {
    if (error instanceof StorageError) {
      throw error;
    }
    const code = sqliteCode(error);
    throw new StorageError(
      `${operation} failed: ${errorMessage(error)}`,
      code === 'SQLITE_BUSY' || code === 'SQLITE_LOCKED' ? ErrorCode.StorageUnavailable : ErrorCode.StorageQueryFailed,
      code ? { sqliteCode: code } : undefined
    );
  }
}

export function openDatabase(options: DatabaseOptions): DatabaseWrapper {
  const database = new DatabaseWrapper(options);
  database.initialize();
  return database;
}

export default DatabaseWrapper;
