import BetterSqlite3 from 'better-sqlite3'

export interface DocumentRow {
  key: string
  body: string
  updated: Date
}

export class Database {
  private db: BetterSqlite3.Database

  constructor(dbPath: string) {
    this.db = new BetterSqlite3(dbPath)
    if (dbPath !== ':memory:') {
      this.db.pragma('journal_mode = WAL')
    }
    this.createTables()
  }

  private createTables(): void {
    this.db.exec(`
      CREATE TABLE IF NOT EXISTS documents (
        key TEXT PRIMARY KEY,
        body JSON NOT NULL,
        updated DATETIME NOT NULL
      );
    `)
  }

  // --- Documents ---

  getDocument(key: string): DocumentRow | null {
    const row = this.db.prepare('SELECT key, body, updated FROM documents WHERE key = ?').get(key) as
      { key: string; body: string; updated: string } | undefined
    if (!row) return null

    return {
      key: row.key,
      body: row.body,
      updated: new Date(row.updated)
    }
  }

  putDocument(key: string, body: string): void {
    this.db.prepare(`
      INSERT INTO documents (key, body, updated)
      VALUES (?, ?, ?)
      ON CONFLICT(key) DO UPDATE SET
        body = excluded.body,
        updated = excluded.updated
    `).run(key, body, new Date().toISOString())
  }

  deleteDocument(key: string): boolean {
    const result = this.db.prepare('DELETE FROM documents WHERE key = ?').run(key)
    return result.changes > 0
  }

  // --- Lifecycle ---

  close(): void {
    this.db.close()
  }
}
