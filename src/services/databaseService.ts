/**
 * Database Service
 *
 * Owns the SQLite database (sql.js, SQLite compiled to WebAssembly) and the
 * schema. The whole database lives in memory; when DATABASE_PATH names a file
 * it is loaded from there on open and written back shortly after each change
 * and on close. The schema is created idempotently on open; there is no
 * migration tooling.
 *
 * Rows come back as plain objects and are checked against a zod schema by
 * the caller, so each service owns the shape of its own rows.
 *
 * @module services/databaseService
 */

import fs from 'fs';
import path from 'path';
import initSqlJs from 'sql.js';
import type { Database, SqlJsStatic } from 'sql.js';
import { z } from 'zod';
import { config } from '../config/env';
import { getErrorMessage } from '../utils/errors';
import { dbLogger } from '../utils/logger';

export type SqlParam = string | number | null;

const SCHEMA = `
  CREATE TABLE IF NOT EXISTS subscribers (
    id                    INTEGER PRIMARY KEY AUTOINCREMENT,
    email                 TEXT    NOT NULL UNIQUE COLLATE NOCASE,
    name                  TEXT,
    phone                 TEXT,
    insurance_type        TEXT,
    status                TEXT    NOT NULL DEFAULT 'active',
    subscribed_at         TEXT    NOT NULL,
    last_campaign_sent_at TEXT
  );
  CREATE INDEX IF NOT EXISTS idx_subscribers_status ON subscribers (status);

  CREATE TABLE IF NOT EXISTS campaigns (
    id               INTEGER PRIMARY KEY AUTOINCREMENT,
    name             TEXT    NOT NULL,
    subject          TEXT    NOT NULL,
    content          TEXT    NOT NULL,
    template_type    TEXT    NOT NULL DEFAULT 'default',
    target_segment   TEXT    NOT NULL DEFAULT 'all',
    status           TEXT    NOT NULL DEFAULT 'draft',
    created_at       TEXT    NOT NULL,
    sent_at          TEXT,
    total_recipients INTEGER NOT NULL DEFAULT 0,
    sent_count       INTEGER NOT NULL DEFAULT 0,
    failed_count     INTEGER NOT NULL DEFAULT 0,
    opened_count     INTEGER NOT NULL DEFAULT 0
  );

  CREATE TABLE IF NOT EXISTS contact_messages (
    id         INTEGER PRIMARY KEY AUTOINCREMENT,
    name       TEXT    NOT NULL,
    email      TEXT    NOT NULL,
    phone      TEXT,
    subject    TEXT    NOT NULL,
    message    TEXT    NOT NULL,
    created_at TEXT    NOT NULL,
    is_read    INTEGER NOT NULL DEFAULT 0
  );

  CREATE TABLE IF NOT EXISTS admins (
    id            INTEGER PRIMARY KEY AUTOINCREMENT,
    username      TEXT    NOT NULL UNIQUE,
    email         TEXT    NOT NULL UNIQUE COLLATE NOCASE,
    password_hash TEXT    NOT NULL,
    is_active     INTEGER NOT NULL DEFAULT 1,
    last_login_at TEXT,
    created_at    TEXT    NOT NULL
  );

  CREATE TABLE IF NOT EXISTS admin_sessions (
    id           INTEGER PRIMARY KEY AUTOINCREMENT,
    admin_id     INTEGER NOT NULL REFERENCES admins (id) ON DELETE CASCADE,
    token_hash   TEXT    NOT NULL UNIQUE,
    expires_at   TEXT    NOT NULL,
    ip_address   TEXT,
    user_agent   TEXT,
    created_at   TEXT    NOT NULL,
    last_used_at TEXT    NOT NULL
  );
`;

// Writes are batched into one file write per window
const SAVE_DELAY_MS = 200;

const countRowSchema = z.object({ count: z.number() });
const rowIdSchema = z.object({ id: z.number() });

// ========================================
// DATABASE
// ========================================

export class SqliteDatabase {
  private saveTimer: NodeJS.Timeout | null = null;

  constructor(
    private readonly db: Database,
    /** null for an in-memory database that is never written out */
    private readonly filePath: string | null
  ) {
    this.applyPragmas();
  }

  /**
   * Run one or more statements without parameters (schema, bulk deletes).
   */
  exec(sql: string): void {
    this.db.exec(sql);
    this.scheduleSave();
  }

  /**
   * Run a write statement.
   *
   * @returns Number of rows changed
   */
  run(sql: string, params: SqlParam[] = []): number {
    this.db.run(sql, params);
    const changes = this.db.getRowsModified();
    this.scheduleSave();
    return changes;
  }

  /**
   * Run an INSERT and return the id of the new row.
   */
  insert(sql: string, params: SqlParam[] = []): number {
    this.db.run(sql, params);
    const row = this.get(rowIdSchema, 'SELECT last_insert_rowid() AS id');
    this.scheduleSave();
    if (!row) {
      throw new Error('Insert did not report a row id');
    }
    return row.id;
  }

  get<S extends z.ZodTypeAny>(schema: S, sql: string, params: SqlParam[] = []): z.output<S> | undefined {
    return this.all(schema, sql, params)[0];
  }

  all<S extends z.ZodTypeAny>(schema: S, sql: string, params: SqlParam[] = []): z.output<S>[] {
    const statement = this.db.prepare(sql);
    try {
      statement.bind(params);
      const rows: z.output<S>[] = [];
      while (statement.step()) {
        rows.push(schema.parse(statement.getAsObject()));
      }
      return rows;
    } finally {
      statement.free();
    }
  }

  count(sql: string, params: SqlParam[] = []): number {
    return this.get(countRowSchema, sql, params)?.count ?? 0;
  }

  /**
   * Write the database file now, if there is one.
   */
  save(): void {
    if (this.saveTimer) {
      clearTimeout(this.saveTimer);
      this.saveTimer = null;
    }
    if (!this.filePath) {
      return;
    }

    const data = this.db.export();
    // export() reopens the database, which resets pragmas
    this.applyPragmas();

    const tempPath = `${this.filePath}.tmp`;
    fs.writeFileSync(tempPath, data);
    fs.renameSync(tempPath, this.filePath);
  }

  close(): void {
    this.save();
    this.db.close();
  }

  private scheduleSave(): void {
    if (!this.filePath || this.saveTimer) {
      return;
    }
    this.saveTimer = setTimeout(() => {
      this.saveTimer = null;
      try {
        this.save();
      } catch (error) {
        dbLogger.error('Failed to write database file', { path: this.filePath, error: getErrorMessage(error) });
      }
    }, SAVE_DELAY_MS);
    this.saveTimer.unref();
  }

  private applyPragmas(): void {
    this.db.run('PRAGMA foreign_keys = ON');
  }
}

// ========================================
// CONNECTION
// ========================================

let sqlModule: Promise<SqlJsStatic> | null = null;
let connection: SqliteDatabase | null = null;

function loadSqlModule(): Promise<SqlJsStatic> {
  if (!sqlModule) {
    sqlModule = initSqlJs();
  }
  return sqlModule;
}

/**
 * Open a database file (or ":memory:") and make sure the schema exists.
 */
export async function openDatabase(filePath: string): Promise<SqliteDatabase> {
  const SQL = await loadSqlModule();

  let db: Database;
  let target: string | null = null;
  if (filePath === ':memory:') {
    db = new SQL.Database();
  } else {
    target = path.resolve(filePath);
    fs.mkdirSync(path.dirname(target), { recursive: true });
    db = fs.existsSync(target) ? new SQL.Database(fs.readFileSync(target)) : new SQL.Database();
  }

  const database = new SqliteDatabase(db, target);
  database.exec(SCHEMA);

  dbLogger.info('Database ready', { path: filePath });
  return database;
}

/**
 * Open the shared database from DATABASE_PATH. Must be awaited once at
 * start-up before any service touches the database.
 */
export async function initDatabase(filePath: string = config.database.path): Promise<SqliteDatabase> {
  if (!connection) {
    connection = await openDatabase(filePath);
  }
  return connection;
}

/**
 * The shared database opened by `initDatabase`.
 */
export function getDatabase(): SqliteDatabase {
  if (!connection) {
    throw new Error('Database is not initialised; await initDatabase() first');
  }
  return connection;
}

export function closeDatabase(): void {
  if (connection) {
    connection.close();
    connection = null;
    dbLogger.info('Database connection closed');
  }
}

// ========================================
// ROW HELPERS
// ========================================

export function toIsoString(date: Date): string {
  return date.toISOString();
}

export function fromIsoString(value: string): Date;
export function fromIsoString(value: string | null): Date | null;
export function fromIsoString(value: string | null): Date | null {
  return value === null ? null : new Date(value);
}

/**
 * Page of results as returned by the admin list endpoints.
 */
export interface Page<T> {
  items: T[];
  page: number;
  perPage: number;
  total: number;
  pages: number;
}

export function buildPage<T>(items: T[], page: number, perPage: number, total: number): Page<T> {
  return {
    items,
    page,
    perPage,
    total,
    pages: Math.max(1, Math.ceil(total / perPage)),
  };
}
