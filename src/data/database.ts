import fs from 'node:fs'
import path from 'node:path'
import Database from 'better-sqlite3'

/**
 * Owns the single write-capable connection. better-sqlite3 runs every
 * statement synchronously, so the sampling loop and classification callers
 * sharing this connection are serialized per statement; multi-statement
 * changes go through `db.transaction`.
 */
class AppDatabase {
  db: Database.Database

  constructor(dbPath: string) {
    if (dbPath !== ':memory:') {
      fs.mkdirSync(path.dirname(dbPath), { recursive: true })
    }
    this.db = new Database(dbPath)
    this.db.pragma('journal_mode = WAL')
    this.db.pragma('foreign_keys = ON')
    this.migrate()
  }

  migrate() {
    this.db.exec('CREATE TABLE IF NOT EXISTS schema_version (version INTEGER PRIMARY KEY)')
    const row = this.db.prepare('SELECT MAX(version) as v FROM schema_version').get() as { v: number | null } | undefined
    const currentVersion = row?.v || 0
    const migrations = [this._v1.bind(this), this._v2.bind(this)]
    for (let i = currentVersion; i < migrations.length; i++) {
      this.db.transaction(() => {
        migrations[i]()
        this.db.prepare('INSERT INTO schema_version (version) VALUES (?)').run(i + 1)
      })()
    }
  }

  _v1() {
    this.db.exec(`
      CREATE TABLE activities (
        id INTEGER PRIMARY KEY AUTOINCREMENT,
        timestamp INTEGER NOT NULL,
        app_name TEXT NOT NULL,
        bundle_id TEXT NOT NULL DEFAULT '',
        window_title TEXT NOT NULL DEFAULT '',
        url TEXT,
        extra_info TEXT,
        duration_seconds INTEGER NOT NULL DEFAULT 0,
        date TEXT NOT NULL
      );
      CREATE INDEX idx_activities_date ON activities(date);
      CREATE INDEX idx_activities_app ON activities(app_name);
      CREATE INDEX idx_activities_bundle ON activities(bundle_id);
    `)
  }

  _v2() {
    this.db.exec(`
      CREATE TABLE brands (
        id INTEGER PRIMARY KEY AUTOINCREMENT,
        name TEXT NOT NULL UNIQUE COLLATE NOCASE,
        color TEXT NOT NULL DEFAULT '#6366f1',
        sort_order INTEGER NOT NULL DEFAULT 0,
        created_at INTEGER NOT NULL
      );

      CREATE TABLE projects (
        id INTEGER PRIMARY KEY AUTOINCREMENT,
        brand_id INTEGER NOT NULL REFERENCES brands(id) ON DELETE CASCADE,
        name TEXT NOT NULL COLLATE NOCASE,
        color TEXT NOT NULL DEFAULT '#6366f1',
        sort_order INTEGER NOT NULL DEFAULT 0,
        created_at INTEGER NOT NULL,
        UNIQUE (brand_id, name)
      );
      CREATE INDEX idx_projects_brand ON projects(brand_id);

      CREATE TABLE project_rules (
        id INTEGER PRIMARY KEY AUTOINCREMENT,
        project_id INTEGER NOT NULL REFERENCES projects(id) ON DELETE CASCADE,
        rule_type TEXT NOT NULL,
        pattern TEXT NOT NULL,
        is_regex INTEGER NOT NULL DEFAULT 0,
        priority INTEGER NOT NULL DEFAULT 0,
        created_at INTEGER NOT NULL
      );
      CREATE INDEX idx_rules_project ON project_rules(project_id);

      CREATE TABLE dismissed_suggestions (
        token TEXT PRIMARY KEY,
        dismissed_at INTEGER NOT NULL
      );

      ALTER TABLE activities ADD COLUMN project_id INTEGER REFERENCES projects(id) ON DELETE SET NULL;
      ALTER TABLE activities ADD COLUMN project_source TEXT;
      CREATE INDEX idx_activities_project ON activities(project_id);
    `)
  }

  close() {
    this.db.close()
  }
}

export { AppDatabase }
