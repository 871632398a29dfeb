/**
 * Ordered, idempotent schema migrations for the item store.
 *
 * Every migration checks the live schema before changing it, so a database
 * that was altered by hand (or by an older build) converges on the same shape.
 * Applied migrations are recorded in schema_migrations and never run twice.
 */

import type { Database } from 'better-sqlite3';
import { Logger } from '../utils';

export interface Migration {
  id: string;
  description: string;
  up(db: Database): void;
}

export function tableExists(db: Database, table: string): boolean {
  const row = db
    .prepare<[string], { name: string }>("SELECT name FROM sqlite_master WHERE type = 'table' AND name = ?")
    .get(table);
  return row !== undefined;
}

export function columnExists(db: Database, table: string, column: string): boolean {
  // PRAGMA does not take bound parameters; table names here are constants
  const columns = db.prepare<[], { name: string }>(`PRAGMA table_info(${table})`).all();
  return columns.some(info => info.name === column);
}

function addColumn(db: Database, table: string, column: string, definition: string): boolean {
  if (columnExists(db, table, column)) {
    return false;
  }
  db.exec(`ALTER TABLE ${table} ADD COLUMN ${column} ${definition}`);
  return true;
}

export const MIGRATIONS: readonly Migration[] = [
  {
    id: '001_create_items',
    description: 'Create the items table',
    up(db) {
      db.exec(`
        CREATE TABLE IF NOT EXISTS items (
          id TEXT PRIMARY KEY,
          source TEXT NOT NULL,
          title TEXT NOT NULL,
          url TEXT NOT NULL,
          raw_text TEXT,
          summary TEXT,
          category TEXT,
          audio_path TEXT,
          processed INTEGER NOT NULL DEFAULT 0
        )
      `);
    },
  },
  {
    id: '002_items_synthesized',
    description: 'Track whether an item has been folded into a report',
    up(db) {
      const added = addColumn(db, 'items', 'synthesized', 'INTEGER NOT NULL DEFAULT 0');
      if (added) {
        // Existing backlog counts as already reported so the first report stays small
        db.exec('UPDATE items SET synthesized = 1 WHERE processed = 1');
      }
    },
  },
  {
    id: '003_items_published_at',
    description: 'Record the best-effort publish timestamp',
    up(db) {
      addColumn(db, 'items', 'published_at', 'TEXT');
    },
  },
  {
    id: '004_items_ingested_at',
    description: 'Record when each item was stored',
    up(db) {
      if (addColumn(db, 'items', 'ingested_at', 'TEXT')) {
        db.prepare('UPDATE items SET ingested_at = ? WHERE ingested_at IS NULL').run(new Date().toISOString());
      }
    },
  },
  {
    id: '005_items_insertion_sequence',
    description: 'Store-assigned recency order independent of publish timestamps',
    up(db) {
      if (addColumn(db, 'items', 'insertion_sequence', 'INTEGER')) {
        db.exec('UPDATE items SET insertion_sequence = rowid WHERE insertion_sequence IS NULL');
      }
      db.exec('CREATE UNIQUE INDEX IF NOT EXISTS idx_items_insertion_sequence ON items (insertion_sequence)');
    },
  },
  {
    id: '006_create_reports',
    description: 'Create the reports table',
    up(db) {
      db.exec(`
        CREATE TABLE IF NOT EXISTS reports (
          id INTEGER PRIMARY KEY AUTOINCREMENT,
          generated_at TEXT NOT NULL,
          whats_new TEXT NOT NULL,
          feature_brief_summary TEXT NOT NULL,
          key_takeaways TEXT NOT NULL,
          audio_path TEXT NOT NULL
        )
      `);
    },
  },
  {
    id: '007_selection_indexes',
    description: 'Index the distillation and synthesis selection queries',
    up(db) {
      db.exec('CREATE INDEX IF NOT EXISTS idx_items_state ON items (processed, synthesized)');
      db.exec('CREATE INDEX IF NOT EXISTS idx_items_source_sequence ON items (source, insertion_sequence)');
    },
  },
];

/**
 * Apply every migration not yet recorded, each in its own transaction.
 * Returns the ids that were applied by this call.
 */
export function runMigrations(db: Database, migrations: readonly Migration[] = MIGRATIONS): string[] {
  db.exec(`
    CREATE TABLE IF NOT EXISTS schema_migrations (
      id TEXT PRIMARY KEY,
      applied_at TEXT NOT NULL
    )
  `);

  const applied = new Set(
    db
      .prepare<[], { id: string }>('SELECT id FROM schema_migrations')
      .all()
      .map(row => row.id)
  );
  const record = db.prepare<[string, string]>('INSERT INTO schema_migrations (id, applied_at) VALUES (?, ?)');
  const newlyApplied: string[] = [];

  for (const migration of migrations) {
    if (applied.has(migration.id)) {
      continue;
    }

    db.transaction(() => {
      migration.up(db);
      record.run(migration.id, new Date().toISOString());
    })();

    Logger.info('Applied migration', { id: migration.id, description: migration.description });
    newlyApplied.push(migration.id);
  }

  return newlyApplied;
}
