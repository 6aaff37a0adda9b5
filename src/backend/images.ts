/**
 * Image repository
 */
import { randomUUID } from "node:crypto";
import type { NoteImage } from "../types/note";
import { type Clock, type Db } from "./db";
import { invalidInput } from "./errors";
import { requireNote } from "./notes";

interface ImageRow {
  id: string;
  note_id: string | null;
  data: Buffer;
  mime_type: string | null;
  created_at: string;
}

const COLUMNS = "id, note_id, data, mime_type, created_at";

function toImage(row: ImageRow): NoteImage {
  return {
    id: row.id,
    noteId: row.note_id,
    data: new Uint8Array(row.data),
    mimeType: row.mime_type,
    createdAt: row.created_at,
  };
}

export class ImageRepository {
  constructor(
    private readonly db: Db,
    private readonly clock: Clock,
  ) {}

  add(noteId: string, data: Uint8Array, mimeType: string | null = null): NoteImage {
    requireNote(this.db, noteId);
    if (data.byteLength === 0) throw invalidInput("Image data must not be empty");

    const image: NoteImage = {
      id: randomUUID(),
      noteId,
      data,
      mimeType,
      createdAt: this.clock().toISOString(),
    };
    this.db
      .prepare(`INSERT INTO images (${COLUMNS}) VALUES (?, ?, ?, ?, ?)`)
      .run(image.id, noteId, Buffer.from(data), mimeType, image.createdAt);
    return image;
  }

  get(id: string): NoteImage | null {
    const row = this.db
      .prepare<[string], ImageRow>(`SELECT ${COLUMNS} FROM images WHERE id = ?`)
      .get(id);
    return row ? toImage(row) : null;
  }

  /** Images of a note, oldest first */
  listForNote(noteId: string): NoteImage[] {
    return this.db
      .prepare<[string], ImageRow>(
        `SELECT ${COLUMNS} FROM images WHERE note_id = ? ORDER BY created_at, rowid`,
      )
      .all(noteId)
      .map(toImage);
  }

  delete(id: string): boolean {
    return this.db.prepare("DELETE FROM images WHERE id = ?").run(id).changes > 0;
  }
}
