import Database from 'better-sqlite3';
import { dirname } from 'path';
import { existsSync, mkdirSync } from 'fs';

function initializeSchema(database: Database.Database): void {
  database.exec(`
    CREATE TABLE IF NOT EXISTS analysis_jobs (
      id TEXT PRIMARY KEY,
      kind TEXT NOT NULL,
      repo_owner TEXT NOT NULL,
      repo_name TEXT NOT NULL,
      path TEXT NOT NULL DEFAULT '',
      revision TEXT,
      input_key TEXT NOT NULL,
      status TEXT NOT NULL DEFAULT 'pending',
      result TEXT,
      error TEXT,
      parent_id TEXT,
      child_ids TEXT NOT NULL DEFAULT '[]',
      requested_by TEXT,
      attempts INTEGER NOT NULL DEFAULT 0,
      content_hash TEXT,
      created_at TEXT NOT NULL,
      updated_at TEXT NOT NULL,
      FOREIGN KEY (parent_id) REFERENCES analysis_jobs(id) ON DELETE CASCADE,
      CHECK (result IS NULL OR error IS NULL)
    );

    CREATE INDEX IF NOT EXISTS idx_analysis_jobs_dedup ON analysis_jobs(kind, input_key, status);
    CREATE INDEX IF NOT EXISTS idx_analysis_jobs_status ON analysis_jobs(status);
    CREATE INDEX IF NOT EXISTS idx_analysis_jobs_parent ON analysis_jobs(parent_id);
    CREATE INDEX IF NOT EXISTS idx_analysis_jobs_content ON analysis_jobs(kind, content_hash, status);
  `);
}

/**
 * Create a new database connection at the specified path
 */
export function createDatabase(dbPath: string): Database.Database {
  const dataDir = dirname(dbPath);
  if (!existsSync(dataDir)) {
    mkdirSync(dataDir, { recursive: true });
  }
  const database = new Database(dbPath);
  database.pragma('journal_mode = WAL');
  database.pragma('foreign_keys = ON');
  initializeSchema(database);
  return database;
}

// For testing purposes
export function createTestDatabase(): Database.Database {
  const testDb = new Database(':memory:');
  testDb.pragma('foreign_keys = ON');
  initializeSchema(testDb);
  return testDb;
}
