/**
 * @module: SqliteBlacklistStore
 * @scope: storage
 * @risk: moderate
 *
 * @description
 * Persists banned user ids in SQLite. Ids are stored as text because Discord
 * snowflakes do not fit in a JavaScript number.
 */
import Database from 'better-sqlite3';
import fs from 'fs';
import path from 'path';
import { createModuleLogger } from '@slashkit/shared';
import { isRecord } from '../context/parsePayload.js';
import type { BlacklistStore } from './PermissionResolver.js';

const blacklistLogger = createModuleLogger('sqliteBlacklistStore');

export interface BlacklistEntry {
  userId: string;
  reason: string | null;
  createdAt: string;
}

export interface SqliteBlacklistStoreConfig {
  dbPath: string;
}

export class SqliteBlacklistStore implements BlacklistStore {
  private readonly db: Database.Database;
  private readonly selectStatement: Database.Statement;
  private readonly insertStatement: Database.Statement;
  private readonly deleteStatement: Database.Statement;
  private readonly listStatement: Database.Statement;

  constructor(config: SqliteBlacklistStoreConfig) {
    const resolvedPath = path.resolve(config.dbPath);
    fs.mkdirSync(path.dirname(resolvedPath), { recursive: true });

    this.db = new Database(resolvedPath);
    this.db.pragma('journal_mode = WAL');

    this.db.exec(`
      CREATE TABLE IF NOT EXISTS blacklist (
        user_id TEXT PRIMARY KEY,
        reason TEXT,
        created_at TEXT NOT NULL
      );
    `);

    this.selectStatement = this.db.prepare('SELECT user_id FROM blacklist WHERE user_id = ? LIMIT 1');
    this.insertStatement = this.db.prepare(`
      INSERT INTO blacklist (user_id, reason, created_at)
      VALUES (@user_id, @reason, @created_at)
      ON CONFLICT(user_id) DO UPDATE SET reason = excluded.reason
    `);
    this.deleteStatement = this.db.prepare('DELETE FROM blacklist WHERE user_id = ?');
    this.listStatement = this.db.prepare('SELECT user_id, reason, created_at FROM blacklist ORDER BY created_at, user_id');

    blacklistLogger.info(`Initialized SQLite blacklist store at ${resolvedPath}`);
  }

  async isBanned(userId: string): Promise<boolean> {
    const row: unknown = this.selectStatement.get(userId);
    return row !== undefined;
  }

  async ban(userId: string, reason?: string): Promise<void> {
    this.insertStatement.run({
      user_id: userId,
      reason: reason ?? null,
      created_at: new Date().toISOString()
    });
    blacklistLogger.info(`Banned user ${userId}`);
  }

  /**
   * Returns false when the user was not banned.
   */
  async unban(userId: string): Promise<boolean> {
    const result = this.deleteStatement.run(userId);
    return result.changes > 0;
  }

  async list(): Promise<BlacklistEntry[]> {
    const rows: unknown[] = this.listStatement.all();
    return rows.filter(isRecord).map((row) => ({
      userId: String(row.user_id),
      reason: typeof row.reason === 'string' ? row.reason : null,
      createdAt: String(row.created_at)
    }));
  }

  close(): void {
    this.db.close();
  }
}
