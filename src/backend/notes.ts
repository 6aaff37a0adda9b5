/**
 * Note repository
 */
import { randomUUID } from "node:crypto";
import type { CreateNoteInput, Note, UpdateNoteInput } from "../types/note";
import { type Clock, type Db, toBlob, toBool } from "./db";
import { invalidInput, notFound } from "./errors";
import type { FolderRepository } from "./folders";

export interface NoteRow {
  id: string;
  title: string;
  content: string | null;
  rich_content: Buffer | null;
  folder_id: string | null;
  created_at: string;
  updated_at: string;
  is_in_trash: number;
}

export const NOTE_COLUMNS =
  "n.id, n.title, n.content, n.rich_content, n.folder_id, n.created_at, n.updated_at, n.is_in_trash";

/** Most recently updated first; insertion order breaks ties */
export const NEWEST_FIRST = "ORDER BY n.updated_at DESC, n.rowid DESC";

export function toNote(row: NoteRow): Note {
  return {
    id: row.id,
    title: row.title,
    content: row.content,
    richContent: toBlob(row.rich_content),
    folderId: row.folder_id,
    createdAt: row.created_at,
    updatedAt: row.updated_at,
    isInTrash: toBool(row.is_in_trash),
  };
}

/** Throw NOT_FOUND unless a note with this id exists (trashed or not) */
export function requireNote(db: Db, id: string): void {
  const row = db.prepare<[string], { id: string }>("SELECT id FROM notes WHERE id = ?").get(id);
  if (!row) throw notFound("Note", id);
}

function sameBlob(a: Uint8Array | null, b: Uint8Array | null): boolean {
  if (a === null || b === null) return a === b;
  return Buffer.from(a).equals(Buffer.from(b));
}

export class NoteRepository {
  constructor(
    private readonly db: Db,
    private readonly clock: Clock,
    private readonly folders: FolderRepository,
  ) {}

  create(input: CreateNoteInput): Note {
    const folderId = input.folderId ?? null;
    if (folderId !== null) this.folders.require(folderId);

    const now = this.clock().toISOString();
    const note: Note = {
      id: randomUUID(),
      title: input.title,
      content: input.content ?? null,
      richContent: input.richContent ?? null,
      folderId,
      createdAt: now,
      updatedAt: now,
      isInTrash: false,
    };

    this.db
      .prepare(
        `INSERT INTO notes (id, title, content, rich_content, folder_id, created_at, updated_at, is_in_trash)
         VALUES (?, ?, ?, ?, ?, ?, ?, 0)`,
      )
      .run(
        note.id,
        note.title,
        note.content,
        note.richContent ? Buffer.from(note.richContent) : null,
        note.folderId,
        note.createdAt,
        note.updatedAt,
      );
    return note;
  }

  get(id: string): Note | null {
    const row = this.db
      .prepare<[string], NoteRow>(`SELECT ${NOTE_COLUMNS} FROM notes n WHERE n.id = ?`)
      .get(id);
    return row ? toNote(row) : null;
  }

  require(id: string): Note {
    const note = this.get(id);
    if (!note) throw notFound("Note", id);
    return note;
  }

  /** Every note outside the trash */
  list(): Note[] {
    return this.db
      .prepare<[], NoteRow>(
        `SELECT ${NOTE_COLUMNS} FROM notes n WHERE n.is_in_trash = 0 ${NEWEST_FIRST}`,
      )
      .all()
      .map(toNote);
  }

  /** Notes in a folder, or unfiled notes when folderId is null */
  listInFolder(folderId: string | null): Note[] {
    const rows =
      folderId === null
        ? this.db
            .prepare<[], NoteRow>(
              `SELECT ${NOTE_COLUMNS} FROM notes n
               WHERE n.folder_id IS NULL AND n.is_in_trash = 0 ${NEWEST_FIRST}`,
            )
            .all()
        : this.db
            .prepare<[string], NoteRow>(
              `SELECT ${NOTE_COLUMNS} FROM notes n
               WHERE n.folder_id = ? AND n.is_in_trash = 0 ${NEWEST_FIRST}`,
            )
            .all(folderId);
    return rows.map(toNote);
  }

  listTrashed(): Note[] {
    return this.db
      .prepare<[], NoteRow>(
        `SELECT ${NOTE_COLUMNS} FROM notes n WHERE n.is_in_trash = 1 ${NEWEST_FIRST}`,
      )
      .all()
      .map(toNote);
  }

  /**
   * Apply changed fields. Nothing is written, and updatedAt stays put, when
   * every provided field already holds the given value.
   */
  update(id: string, input: UpdateNoteInput): Note {
    const note = this.require(id);
    const next: Note = {
      ...note,
      title: input.title ?? note.title,
      content: input.content !== undefined ? input.content : note.content,
      richContent: input.richContent !== undefined ? input.richContent : note.richContent,
    };

    const changed =
      next.title !== note.title ||
      next.content !== note.content ||
      !sameBlob(next.richContent, note.richContent);
    if (!changed) return note;

    next.updatedAt = this.clock().toISOString();
    this.db
      .prepare(
        "UPDATE notes SET title = ?, content = ?, rich_content = ?, updated_at = ? WHERE id = ?",
      )
      .run(
        next.title,
        next.content,
        next.richContent ? Buffer.from(next.richContent) : null,
        next.updatedAt,
        id,
      );
    return next;
  }

  /** Move to a folder (or unfile with null) */
  move(id: string, folderId: string | null): Note {
    const note = this.require(id);
    if (folderId !== null) {
      const folder = this.folders.require(folderId);
      if (folder.isInTrash) throw invalidInput("Cannot move a note into a folder in the trash");
    }

    const updatedAt = this.clock().toISOString();
    this.db
      .prepare("UPDATE notes SET folder_id = ?, updated_at = ? WHERE id = ?")
      .run(folderId, updatedAt, id);
    return { ...note, folderId, updatedAt };
  }

  trash(id: string): Note {
    return this.setTrashed(id, true);
  }

  /** Take a note out of the trash; a trashed folder chain above it comes back too */
  restore(id: string): Note {
    const note = this.require(id);
    if (note.folderId !== null) {
      const folder = this.folders.require(note.folderId);
      if (folder.isInTrash) this.folders.restore(folder.id);
    }
    return this.setTrashed(id, false);
  }

  /** Hard delete; images, reminders and tag links go with it */
  delete(id: string): boolean {
    const result = this.db.prepare("DELETE FROM notes WHERE id = ?").run(id);
    return result.changes > 0;
  }

  private setTrashed(id: string, inTrash: boolean): Note {
    const note = this.require(id);
    const updatedAt = this.clock().toISOString();
    this.db
      .prepare("UPDATE notes SET is_in_trash = ?, updated_at = ? WHERE id = ?")
      .run(inTrash ? 1 : 0, updatedAt, id);
    return { ...note, isInTrash: inTrash, updatedAt };
  }
}
