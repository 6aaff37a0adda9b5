/**
 * SQLite connection and schema
 */
import Database from "better-sqlite3";
import { foldText } from "../lib/text";
import { BackendError } from "./errors";

export type Db = Database.Database;

/** Returns the current time; injectable so tests control timestamps */
export type Clock = () => Date;

export const systemClock: Clock = () => new Date();

/**
 * Ordered schema migrations. Index + 1 is the resulting user_version.
 */
const MIGRATIONS: string[] = [
  `
  CREATE TABLE folders (
    id          TEXT PRIMARY KEY,
    name        TEXT NOT NULL,
    parent_id   TEXT REFERENCES folders(id) ON DELETE CASCADE,
    created_at  TEXT NOT NULL,
    is_in_trash INTEGER NOT NULL DEFAULT 0
  );
  CREATE INDEX idx_folders_parent ON folders(parent_id);

  CREATE TABLE notes (
    id           TEXT PRIMARY KEY,
    title        TEXT NOT NULL DEFAULT '',
    content      TEXT,
    rich_content BLOB,
    folder_id    TEXT REFERENCES folders(id) ON DELETE CASCADE,
    created_at   TEXT NOT NULL,
    updated_at   TEXT NOT NULL,
    is_in_trash  INTEGER NOT NULL DEFAULT 0
  );
  CREATE INDEX idx_notes_folder ON notes(folder_id);
  CREATE INDEX idx_notes_updated ON notes(updated_at);

  CREATE TABLE images (
    id         TEXT PRIMARY KEY,
    note_id    TEXT REFERENCES notes(id) ON DELETE CASCADE,
    data       BLOB NOT NULL,
    mime_type  TEXT,
    created_at TEXT NOT NULL
  );
  CREATE INDEX idx_images_note ON images(note_id);

  CREATE TABLE reminders (
    id            TEXT PRIMARY KEY,
    note_id       TEXT REFERENCES notes(id) ON DELETE CASCADE,
    title         TEXT NOT NULL,
    reminder_date TEXT NOT NULL,
    created_at    TEXT NOT NULL,
    is_active     INTEGER NOT NULL DEFAULT 1,
    repeat_type   TEXT NOT NULL DEFAULT 'none'
  );
  CREATE INDEX idx_reminders_note ON reminders(note_id);
  CREATE INDEX idx_reminders_date ON reminders(reminder_date);

  CREATE TABLE tags (
    id         TEXT PRIMARY KEY,
    name       TEXT NOT NULL UNIQUE COLLATE NOCASE,
    created_at TEXT NOT NULL
  );

  CREATE TABLE note_tags (
    note_id TEXT NOT NULL REFERENCES notes(id) ON DELETE CASCADE,
    tag_id  TEXT NOT NULL REFERENCES tags(id) ON DELETE CASCADE,
    PRIMARY KEY (note_id, tag_id)
  );
  CREATE INDEX idx_note_tags_tag ON note_tags(tag_id);
  `,
  // NOCASE only folds ASCII: tags differing in other letters' case ("Élan",
  // "élan") are merged into the oldest one, then kept unique by casefold()
  `
  INSERT OR IGNORE INTO note_tags (note_id, tag_id)
    SELECT nt.note_id, keep.id
    FROM note_tags nt
    JOIN tags t ON t.id = nt.tag_id
    JOIN tags keep ON keep.rowid = (
      SELECT min(k.rowid) FROM tags k WHERE casefold(k.name) = casefold(t.name)
    )
    WHERE keep.id <> t.id;

  DELETE FROM tags
  WHERE rowid <> (SELECT min(k.rowid) FROM tags k WHERE casefold(k.name) = casefold(tags.name));

  CREATE UNIQUE INDEX idx_tags_casefold ON tags(casefold(name));
  `,
];

export const SCHEMA_VERSION = MIGRATIONS.length;

/**
 * Open (and migrate) a database. Pass ":memory:" for a throwaway store.
 */
export function openDatabase(path: string): Db {
  let db: Db;
  try {
    db = new Database(path);
  } catch (error) {
    throw new BackendError("STORAGE", `Failed to open database at ${path}`, {
      cause: error,
    });
  }

  db.pragma("foreign_keys = ON");
  if (path !== ":memory:") {
    db.pragma("journal_mode = WAL");
  }

  // Case- and diacritic-insensitive matching for search queries
  db.function("fold", { deterministic: true }, (value: unknown) =>
    typeof value === "string" ? foldText(value) : null,
  );
  // Unicode-aware lower case for tag name uniqueness
  db.function("casefold", { deterministic: true }, (value: unknown) =>
    typeof value === "string" ? value.toLowerCase() : null,
  );

  migrate(db);
  return db;
}

function migrate(db: Db): void {
  const current = Number(db.pragma("user_version", { simple: true }));
  if (current > SCHEMA_VERSION) {
    throw new BackendError(
      "STORAGE",
      `Database schema version ${current} is newer than supported version ${SCHEMA_VERSION}`,
    );
  }

  const pending = MIGRATIONS.slice(current);
  if (pending.length === 0) return;

  db.transaction(() => {
    for (const sql of pending) {
      db.exec(sql);
    }
    db.pragma(`user_version = ${SCHEMA_VERSION}`);
  })();

  console.log(`[Backend] Migrated database schema ${current} -> ${SCHEMA_VERSION}`);
}

export function toBool(value: number): boolean {
  return value !== 0;
}

export function toBlob(value: Buffer | null): Uint8Array | null {
  return value === null ? null : new Uint8Array(value);
}
