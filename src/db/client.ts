import Database from 'better-sqlite3';
import path from 'node:path';
import fs from 'node:fs';
import { runMigrations } from './migrations.js';
import { DEFAULT_DB_PATH } from '../config.js';

export interface DBContext {
  db: Database.Database;
}

export function initDB(dbPath = DEFAULT_DB_PATH): DBContext {
  if (dbPath !== ':memory:') fs.mkdirSync(path.dirname(dbPath), { recursive: true });
  const db = new Database(dbPath);
  if (dbPath !== ':memory:') db.pragma('journal_mode = WAL');
  db.pragma('foreign_keys = ON');
  runMigrations(db);
  return { db };
}

export function closeDB(ctx: DBContext): void {
  if (ctx.db.open) ctx.db.close();
}
