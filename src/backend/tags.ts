/**
 * Tag repository. Tags and notes are linked many-to-many through note_tags;
 * deleting either side only drops the link.
 */
import { randomUUID } from "node:crypto";
import type { Note, Tag } from "../types/note";
import { type Clock, type Db } from "./db";
import { invalidInput, notFound } from "./errors";
import { NEWEST_FIRST, NOTE_COLUMNS, type NoteRow, requireNote, toNote } from "./notes";

interface TagRow {
  id: string;
  name: string;
  created_at: string;
}

const COLUMNS = "t.id, t.name, t.created_at";
const BY_NAME = "ORDER BY t.name COLLATE NOCASE, t.name";

function toTag(row: TagRow): Tag {
  return { id: row.id, name: row.name, createdAt: row.created_at };
}

export class TagRepository {
  constructor(
    private readonly db: Db,
    private readonly clock: Clock,
  ) {}

  /** Create a tag, or return the existing one with the same name */
  create(nameRaw: string): Tag {
    const name = nameRaw.trim();
    if (!name) throw invalidInput("Tag name must not be empty");

    const existing = this.findByName(name);
    if (existing) return existing;

    const tag: Tag = { id: randomUUID(), name, createdAt: this.clock().toISOString() };
    this.db
      .prepare("INSERT INTO tags (id, name, created_at) VALUES (?, ?, ?)")
      .run(tag.id, tag.name, tag.createdAt);
    return tag;
  }

  get(id: string): Tag | null {
    const row = this.db
      .prepare<[string], TagRow>(`SELECT ${COLUMNS} FROM tags t WHERE t.id = ?`)
      .get(id);
    return row ? toTag(row) : null;
  }

  findByName(name: string): Tag | null {
    const row = this.db
      .prepare<[string], TagRow>(`SELECT ${COLUMNS} FROM tags t WHERE casefold(t.name) = casefold(?)`)
      .get(name.trim());
    return row ? toTag(row) : null;
  }

  list(): Tag[] {
    return this.db
      .prepare<[], TagRow>(`SELECT ${COLUMNS} FROM tags t ${BY_NAME}`)
      .all()
      .map(toTag);
  }

  /** Tags whose name contains the query (case- and diacritic-insensitive) */
  search(query: string, limit?: number): Tag[] {
    return this.db
      .prepare<[string, number], TagRow>(
        `SELECT ${COLUMNS} FROM tags t
         WHERE instr(fold(t.name), fold(?)) > 0 ${BY_NAME} LIMIT ?`,
      )
      .all(query, limit ?? -1)
      .map(toTag);
  }

  rename(id: string, nameRaw: string): Tag {
    const tag = this.get(id);
    if (!tag) throw notFound("Tag", id);
    const name = nameRaw.trim();
    if (!name) throw invalidInput("Tag name must not be empty");
    if (name === tag.name) return tag;

    const clash = this.findByName(name);
    if (clash && clash.id !== id) throw invalidInput(`A tag named "${name}" already exists`);

    this.db.prepare("UPDATE tags SET name = ? WHERE id = ?").run(name, id);
    return { ...tag, name };
  }

  delete(id: string): boolean {
    return this.db.prepare("DELETE FROM tags WHERE id = ?").run(id).changes > 0;
  }

  /** Tag a note by name, creating the tag when needed. Re-tagging is a no-op. */
  addToNote(noteId: string, tagName: string): Tag {
    requireNote(this.db, noteId);
    const tag = this.create(tagName);
    this.db
      .prepare("INSERT OR IGNORE INTO note_tags (note_id, tag_id) VALUES (?, ?)")
      .run(noteId, tag.id);
    return tag;
  }

  removeFromNote(noteId: string, tagId: string): boolean {
    return (
      this.db
        .prepare("DELETE FROM note_tags WHERE note_id = ? AND tag_id = ?")
        .run(noteId, tagId).changes > 0
    );
  }

  listForNote(noteId: string): Tag[] {
    return this.db
      .prepare<[string], TagRow>(
        `SELECT ${COLUMNS} FROM tags t
         JOIN note_tags nt ON nt.tag_id = t.id
         WHERE nt.note_id = ? ${BY_NAME}`,
      )
      .all(noteId)
      .map(toTag);
  }

  /** Notes carrying a tag, outside the trash */
  listNotes(tagId: string): Note[] {
    return this.db
      .prepare<[string], NoteRow>(
        `SELECT ${NOTE_COLUMNS} FROM notes n
         JOIN note_tags nt ON nt.note_id = n.id
         WHERE nt.tag_id = ? AND n.is_in_trash = 0 ${NEWEST_FIRST}`,
      )
      .all(tagId)
      .map(toNote);
  }
}
