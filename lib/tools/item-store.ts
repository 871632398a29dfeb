/**
 * Item Store - durable items and reports on SQLite
 *
 * The only source of truth for dedup and for the processed/synthesized flags.
 * Column names are read by the dashboard; change them only through a migration.
 */

import * as fs from 'fs';
import * as path from 'path';
import BetterSqlite3, { type Database } from 'better-sqlite3';
import { StoreUnavailableError } from '../errors';
import type { Distillation, Item, NewItem, NewReport, Report } from '../types';
import { Logger, errorMessage } from '../utils';
import { runMigrations } from './migrations';

interface ItemRow {
  id: string;
  source: string;
  title: string;
  url: string;
  raw_text: string | null;
  summary: string | null;
  category: string | null;
  audio_path: string | null;
  published_at: string | null;
  ingested_at: string | null;
  processed: number;
  synthesized: number;
  insertion_sequence: number;
}

export interface PendingDistillation {
  id: string;
  raw_text: string;
}

const ITEM_COLUMNS = `id, source, title, url, raw_text, summary, category, audio_path,
  published_at, ingested_at, processed, synthesized, insertion_sequence`;

function toItem(row: ItemRow): Item {
  return {
    ...row,
    raw_text: row.raw_text ?? '',
    summary: row.summary ?? '',
    processed: row.processed === 1,
    synthesized: row.synthesized === 1,
  };
}

function isMissingNativeBindingError(error: unknown): boolean {
  return error instanceof Error && /Could not locate the bindings file|NODE_MODULE_VERSION/.test(error.message);
}

export class ItemStore {
  private constructor(
    private db: Database,
    /** Migration ids applied by this open, in order. Empty when the schema was current. */
    readonly appliedMigrations: string[]
  ) {}

  /**
   * Open (creating if needed) the database at dbPath and bring its schema up
   * to date. Any failure is reported as StoreUnavailableError.
   */
  static open(dbPath: string): ItemStore {
    let db: Database | undefined;
    try {
      if (dbPath !== ':memory:') {
        fs.mkdirSync(path.dirname(dbPath), { recursive: true });
      }
      db = new BetterSqlite3(dbPath);
      db.pragma('journal_mode = WAL');
      const applied = runMigrations(db);
      return new ItemStore(db, applied);
    } catch (error) {
      db?.close();
      const troubleshooting = isMissingNativeBindingError(error)
        ? ['Rebuild the native module with "npm rebuild better-sqlite3".']
        : ['Check that the directory is writable and the file is a SQLite database.'];
      throw new StoreUnavailableError(`Item store unavailable at ${dbPath}: ${errorMessage(error)}`, {
        dbPath,
        troubleshooting,
        cause: error,
      });
    }
  }

  close(): void {
    this.db.close();
  }

  hasItem(id: string): boolean {
    const row = this.db.prepare<[string], { found: number }>('SELECT 1 AS found FROM items WHERE id = ?').get(id);
    return row !== undefined;
  }

  getItem(id: string): Item | undefined {
    const row = this.db.prepare<[string], ItemRow>(`SELECT ${ITEM_COLUMNS} FROM items WHERE id = ?`).get(id);
    return row ? toItem(row) : undefined;
  }

  countItems(): number {
    const row = this.db.prepare<[], { total: number }>('SELECT COUNT(*) AS total FROM items').get();
    return row?.total ?? 0;
  }

  /**
   * Insert a new item with the next insertion sequence. Returns false when an
   * item with the same id already exists; that is "already known", not an error.
   */
  insertItem(item: NewItem, ingestedAt: Date = new Date()): boolean {
    const result = this.db
      .prepare(
        `INSERT INTO items (
           id, source, title, url, raw_text, summary, category, audio_path,
           published_at, ingested_at, processed, synthesized, insertion_sequence
         ) VALUES (
           @id, @source, @title, @url, @raw_text, @summary, NULL, @audio_path,
           @published_at, @ingested_at, 0, 0,
           (SELECT COALESCE(MAX(insertion_sequence), 0) + 1 FROM items)
         )
         ON CONFLICT(id) DO NOTHING`
      )
      .run({ ...item, ingested_at: ingestedAt.toISOString() });

    return result.changes > 0;
  }

  listUnprocessed(): PendingDistillation[] {
    return this.db
      .prepare<[], { id: string; raw_text: string | null }>(
        'SELECT id, raw_text FROM items WHERE processed = 0 ORDER BY insertion_sequence ASC'
      )
      .all()
      .map(row => ({ id: row.id, raw_text: row.raw_text ?? '' }));
  }

  markProcessedWithoutContent(id: string): void {
    this.db.prepare<[string]>('UPDATE items SET processed = 1 WHERE id = ?').run(id);
  }

  saveDistillation(id: string, distillation: Distillation): void {
    this.db
      .prepare<[string, string, string]>('UPDATE items SET summary = ?, category = ?, processed = 1 WHERE id = ?')
      .run(distillation.summary, distillation.category, id);
  }

  /**
   * Processed items not yet folded into a report, most recent first.
   */
  listPendingSynthesis(): Item[] {
    return this.db
      .prepare<[], ItemRow>(
        `SELECT ${ITEM_COLUMNS} FROM items
         WHERE processed = 1 AND synthesized = 0
         ORDER BY insertion_sequence DESC`
      )
      .all()
      .map(toItem);
  }

  /**
   * Newest distilled item from the given source published at or after `since`,
   * whatever its synthesized flag. Items without a publish timestamp never match;
   * undistilled ones wait for the next run.
   */
  latestFromSourceSince(source: string, since: Date): Item | undefined {
    const row = this.db
      .prepare<[string, string], ItemRow>(
        `SELECT ${ITEM_COLUMNS} FROM items
         WHERE source = ? AND processed = 1 AND published_at IS NOT NULL AND published_at >= ?
         ORDER BY insertion_sequence DESC
         LIMIT 1`
      )
      .get(source, since.toISOString());
    return row ? toItem(row) : undefined;
  }

  latestFromSource(source: string): Item | undefined {
    const row = this.db
      .prepare<[string], ItemRow>(
        `SELECT ${ITEM_COLUMNS} FROM items WHERE source = ? ORDER BY insertion_sequence DESC LIMIT 1`
      )
      .get(source);
    return row ? toItem(row) : undefined;
  }

  /**
   * Insert the report and flag every batch item as synthesized in one
   * transaction. Either both happen or neither does. Only distilled items
   * can be flagged.
   */
  commitReport(report: NewReport, itemIds: readonly string[]): Report {
    const insertReport = this.db.prepare<[string, string, string, string, string]>(
      `INSERT INTO reports (generated_at, whats_new, feature_brief_summary, key_takeaways, audio_path)
       VALUES (?, ?, ?, ?, ?)`
    );
    const flagItem = this.db.prepare<[string]>('UPDATE items SET synthesized = 1 WHERE id = ? AND processed = 1');

    const commit = this.db.transaction((ids: readonly string[]): number => {
      const result = insertReport.run(
        report.generated_at,
        report.whats_new,
        report.feature_brief_summary,
        report.key_takeaways,
        report.audio_path
      );
      for (const id of ids) {
        if (flagItem.run(id).changes !== 1) {
          throw new Error(`Cannot flag item ${id} as synthesized: unknown or not distilled`);
        }
      }
      return Number(result.lastInsertRowid);
    });

    const reportId = commit(itemIds);
    Logger.debug('Committed report', { reportId, items: itemIds.length });
    return { id: reportId, ...report };
  }

  latestReport(): Report | undefined {
    return this.db
      .prepare<[], Report>(
        `SELECT id, generated_at, whats_new, feature_brief_summary, key_takeaways, audio_path
         FROM reports ORDER BY id DESC LIMIT 1`
      )
      .get();
  }

  countReports(): number {
    const row = this.db.prepare<[], { total: number }>('SELECT COUNT(*) AS total FROM reports').get();
    return row?.total ?? 0;
  }
}
