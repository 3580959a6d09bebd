// Database connection and initialization

import Database from 'better-sqlite3';
import path from 'node:path';
import { promises as fs } from 'node:fs';
import { createLogger } from '../shared/logger.js';
import { createPersistenceError } from '../shared/errors.js';

const log = createLogger('DB');

let db: Database.Database | null = null;

export interface DatabaseConfig {
  path?: string;
  verbose?: boolean;
  // Pipeline runs never create the store; only "init" does
  fileMustExist?: boolean;
}

const defaultPath = (): string => path.resolve('data', 'db', 'agency.sqlite');

export const getDatabase = (config: DatabaseConfig = {}): Database.Database => {
  if (db) return db;

  const dbPath = config.path || defaultPath();

  try {
    db = new Database(dbPath, {
      fileMustExist: config.fileMustExist ?? false,
      verbose: config.verbose ? (message?: unknown) => log.debug(String(message)) : undefined
    });
  } catch (error) {
    throw createPersistenceError(`open the store at ${dbPath}`, error);
  }

  // Enable foreign keys
  db.pragma('foreign_keys = ON');

  return db;
};

export const initializeDatabase = async (config: DatabaseConfig = {}): Promise<Database.Database> => {
  const dbPath = config.path || defaultPath();

  // Ensure directory exists
  if (dbPath !== ':memory:') {
    await fs.mkdir(path.dirname(dbPath), { recursive: true });
  }

  const database = getDatabase({ ...config, path: dbPath, fileMustExist: false });

  // Run migrations
  runMigrations(database);

  return database;
};

export const runMigrations = (database: Database.Database): void => {
  // Create migrations table if not exists
  database.exec(`
    CREATE TABLE IF NOT EXISTS migrations (
      id INTEGER PRIMARY KEY AUTOINCREMENT,
      name TEXT NOT NULL UNIQUE,
      applied_at TEXT NOT NULL DEFAULT (datetime('now'))
    )
  `);

  const migrations = getMigrations();

  for (const migration of migrations) {
    const applied = database.prepare('SELECT 1 FROM migrations WHERE name = ?').get(migration.name);

    if (!applied) {
      log.info(`Applying migration: ${migration.name}`);
      database.transaction(() => {
        database.exec(migration.sql);
        database.prepare('INSERT INTO migrations (name) VALUES (?)').run(migration.name);
      })();
    }
  }
};

interface Migration {
  name: string;
  sql: string;
}

const getMigrations = (): Migration[] => [
  {
    name: '001_create_clients',
    sql: `
      CREATE TABLE clients (
        id TEXT PRIMARY KEY,
        business_name TEXT NOT NULL,
        category TEXT NOT NULL,
        city TEXT NOT NULL,
        website_url TEXT,
        created_at TEXT NOT NULL
      );
      CREATE UNIQUE INDEX idx_clients_id_lower ON clients(lower(id));
    `
  },
  {
    name: '002_create_research_records',
    sql: `
      CREATE TABLE research_records (
        id TEXT PRIMARY KEY,
        client_id TEXT NOT NULL REFERENCES clients(id),
        city TEXT NOT NULL,
        category TEXT NOT NULL,
        raw_text TEXT NOT NULL,
        services TEXT NOT NULL DEFAULT '[]',
        pricing_signals TEXT NOT NULL DEFAULT '{}',
        gaps TEXT NOT NULL DEFAULT '[]',
        keywords TEXT NOT NULL DEFAULT '[]',
        extraction_status TEXT NOT NULL,
        extraction_backend TEXT,
        sources TEXT NOT NULL DEFAULT '[]',
        created_at TEXT NOT NULL
      );
      CREATE INDEX idx_research_client ON research_records(client_id, created_at);
    `
  },
  {
    name: '003_create_content_drafts',
    sql: `
      CREATE TABLE content_drafts (
        id TEXT PRIMARY KEY,
        client_id TEXT NOT NULL REFERENCES clients(id),
        research_record_id TEXT REFERENCES research_records(id),
        platform TEXT NOT NULL,
        topic TEXT NOT NULL,
        title TEXT NOT NULL,
        body TEXT NOT NULL,
        differentiation_notes TEXT NOT NULL DEFAULT '[]',
        score REAL NOT NULL,
        status TEXT NOT NULL DEFAULT 'pending',
        feedback TEXT,
        created_at TEXT NOT NULL,
        updated_at TEXT NOT NULL
      );
      CREATE INDEX idx_drafts_client ON content_drafts(client_id);
      CREATE INDEX idx_drafts_status ON content_drafts(status);
    `
  },
  {
    name: '004_create_run_locks',
    sql: `
      CREATE TABLE run_locks (
        client_id TEXT PRIMARY KEY,
        stage TEXT NOT NULL,
        owner TEXT NOT NULL,
        acquired_at TEXT NOT NULL,
        expires_at TEXT NOT NULL
      );
    `
  }
];

export const closeDatabase = (): void => {
  if (db) {
    db.close();
    db = null;
  }
};

export default {
  getDatabase,
  initializeDatabase,
  closeDatabase
};
