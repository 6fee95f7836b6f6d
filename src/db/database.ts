/**
 * Local key-value database on SQLite (better-sqlite3).
 * Holds the app-state snapshot and device preferences in one `kv` table.
 */
import Database from 'better-sqlite3';

export interface KvRow {
  key: string;
  value: string;
  updated_at: string;
}

export class KvDatabase {
  private readonly db: Database.Database;

  constructor(path: string) {
    this.db = new Database(path);

    // WAL does not apply to in-memory databases
    if (path !== ':memory:') {
      this.db.pragma('journal_mode = WAL');
    }

    this.db.exec(`
      CREATE TABLE IF NOT EXISTS kv (
        key TEXT PRIMARY KEY,
        value TEXT NOT NULL,
        updated_at TEXT NOT NULL DEFAULT (datetime('now'))
      )
    `);

    const count = this.db.prepare('SELECT COUNT(*) AS n FROM kv').get() as { n: number };
    console.log(`[KvDatabase] Opened ${path} (${count.n} keys)`);
  }

  get(key: string): string | null {
    const row = this.db.prepare('SELECT value FROM kv WHERE key = ?').get(key) as
      | Pick<KvRow, 'value'>
      | undefined;
    return row ? row.value : null;
  }

  put(key: string, value: string): void {
    this.db
      .prepare(
        `INSERT INTO kv (key, value, updated_at) VALUES (?, ?, datetime('now'))
         ON CONFLICT(key) DO UPDATE SET value = excluded.value, updated_at = excluded.updated_at`,
      )
      .run(key, value);
  }

  delete(key: string): void {
    this.db.prepare('DELETE FROM kv WHERE key = ?').run(key);
  }

  close(): void {
    this.db.close();
  }
}
