/**
 * Trash queries spanning notes and folders
 */
import type { Db } from "./db";
import type { FolderRepository } from "./folders";
import type { NoteRepository } from "./notes";

export interface EmptyTrashResult {
  notesDeleted: number;
  foldersDeleted: number;
}

export class TrashRepository {
  constructor(
    private readonly db: Db,
    private readonly notes: NoteRepository,
    private readonly folders: FolderRepository,
  ) {}

  count(): number {
    const row = this.db
      .prepare<[], { total: number }>(
        `SELECT (SELECT count(*) FROM notes WHERE is_in_trash = 1)
              + (SELECT count(*) FROM folders WHERE is_in_trash = 1) AS total`,
      )
      .get();
    return row?.total ?? 0;
  }

  /** Permanently delete trashed notes first, then trashed folders */
  empty(): EmptyTrashResult {
    return this.db.transaction((): EmptyTrashResult => {
      let notesDeleted = 0;
      for (const note of this.notes.listTrashed()) {
        if (this.notes.delete(note.id)) notesDeleted++;
      }

      let foldersDeleted = 0;
      for (const folder of this.folders.listTrashed()) {
        // A parent deleted earlier in the loop may already have taken this one
        if (this.folders.delete(folder.id)) foldersDeleted++;
      }

      return { notesDeleted, foldersDeleted };
    })();
  }
}
