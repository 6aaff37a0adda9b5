/**
 * Folder repository
 *
 * Folders form a tree through parent_id. Hard deletes cascade to the whole
 * subtree and its notes; trashing is a soft flag applied recursively.
 */
import { randomUUID } from "node:crypto";
import type { Folder } from "../types/note";
import { type Clock, type Db, toBool } from "./db";
import { BackendError, invalidInput, notFound } from "./errors";

interface FolderRow {
  id: string;
  name: string;
  parent_id: string | null;
  created_at: string;
  is_in_trash: number;
}

const COLUMNS = "id, name, parent_id, created_at, is_in_trash";
const BY_NAME = "ORDER BY name COLLATE NOCASE, name";

function toFolder(row: FolderRow): Folder {
  return {
    id: row.id,
    name: row.name,
    parentId: row.parent_id,
    createdAt: row.created_at,
    isInTrash: toBool(row.is_in_trash),
  };
}

export class FolderRepository {
  constructor(
    private readonly db: Db,
    private readonly clock: Clock,
  ) {}

  create(nameRaw: string, parentId: string | null = null): Folder {
    const name = nameRaw.trim();
    if (!name) throw invalidInput("Folder name must not be empty");
    if (parentId !== null) this.require(parentId);

    const folder: Folder = {
      id: randomUUID(),
      name,
      parentId,
      createdAt: this.clock().toISOString(),
      isInTrash: false,
    };
    this.db
      .prepare(
        "INSERT INTO folders (id, name, parent_id, created_at, is_in_trash) VALUES (?, ?, ?, ?, 0)",
      )
      .run(folder.id, folder.name, folder.parentId, folder.createdAt);
    return folder;
  }

  get(id: string): Folder | null {
    const row = this.db
      .prepare<[string], FolderRow>(`SELECT ${COLUMNS} FROM folders WHERE id = ?`)
      .get(id);
    return row ? toFolder(row) : null;
  }

  require(id: string): Folder {
    const folder = this.get(id);
    if (!folder) throw notFound("Folder", id);
    return folder;
  }

  /** All folders outside the trash, by name */
  list(): Folder[] {
    return this.db
      .prepare<[], FolderRow>(`SELECT ${COLUMNS} FROM folders WHERE is_in_trash = 0 ${BY_NAME}`)
      .all()
      .map(toFolder);
  }

  /** Child folders of a parent (or root folders for null), outside the trash */
  listChildren(parentId: string | null): Folder[] {
    const rows =
      parentId === null
        ? this.db
            .prepare<[], FolderRow>(
              `SELECT ${COLUMNS} FROM folders WHERE parent_id IS NULL AND is_in_trash = 0 ${BY_NAME}`,
            )
            .all()
        : this.db
            .prepare<[string], FolderRow>(
              `SELECT ${COLUMNS} FROM folders WHERE parent_id = ? AND is_in_trash = 0 ${BY_NAME}`,
            )
            .all(parentId);
    return rows.map(toFolder);
  }

  listTrashed(): Folder[] {
    return this.db
      .prepare<[], FolderRow>(`SELECT ${COLUMNS} FROM folders WHERE is_in_trash = 1 ${BY_NAME}`)
      .all()
      .map(toFolder);
  }

  /** Rename; an empty or unchanged name leaves the folder as it is */
  rename(id: string, nameRaw: string): Folder {
    const folder = this.require(id);
    const name = nameRaw.trim();
    if (!name || name === folder.name) return folder;

    this.db.prepare("UPDATE folders SET name = ? WHERE id = ?").run(name, id);
    return { ...folder, name };
  }

  /** Re-parent a folder. Moving into itself or a descendant is rejected. */
  move(id: string, parentId: string | null): Folder {
    const folder = this.require(id);
    if (parentId !== null) {
      const parent = this.require(parentId);
      if (parent.isInTrash) throw invalidInput("Cannot move a folder into a folder in the trash");
      if (parentId === id || this.descendantIds(id).has(parentId)) {
        throw new BackendError(
          "INVALID_MOVE",
          "Cannot move a folder into itself or one of its subfolders",
        );
      }
    }

    this.db.prepare("UPDATE folders SET parent_id = ? WHERE id = ?").run(parentId, id);
    return { ...folder, parentId };
  }

  /** Folders a folder may be moved into: everything but itself and its subtree */
  availableTargets(id: string): Folder[] {
    this.require(id);
    const excluded = this.descendantIds(id);
    excluded.add(id);
    return this.list().filter((f) => !excluded.has(f.id));
  }

  /** "Parent/Child/Name" */
  path(id: string): string {
    return this.ancestors(id)
      .reverse()
      .map((f) => f.name)
      .join("/");
  }

  /** The folder followed by its parent, grandparent, ... up to the root */
  ancestors(id: string): Folder[] {
    const chain: Folder[] = [];
    const seen = new Set<string>();
    let current: Folder | null = this.require(id);
    while (current && !seen.has(current.id)) {
      chain.push(current);
      seen.add(current.id);
      current = current.parentId ? this.get(current.parentId) : null;
    }
    return chain;
  }

  /** Ids of every folder below id (not including id) */
  descendantIds(id: string): Set<string> {
    const rows = this.db
      .prepare<[string], { id: string }>(
        `WITH RECURSIVE subtree(id) AS (
           SELECT id FROM folders WHERE parent_id = ?
           UNION
           SELECT f.id FROM folders f JOIN subtree s ON f.parent_id = s.id
         )
         SELECT id FROM subtree`,
      )
      .all(id);
    return new Set(rows.map((r) => r.id));
  }

  /**
   * Move a folder, its subfolders and all their notes to the trash.
   * Notes that were not already trashed get their updatedAt bumped.
   */
  trash(id: string): void {
    this.require(id);
    const now = this.clock().toISOString();
    const ids = [id, ...this.descendantIds(id)];

    const markFolder = this.db.prepare("UPDATE folders SET is_in_trash = 1 WHERE id = ?");
    const markNotes = this.db.prepare(
      "UPDATE notes SET is_in_trash = 1, updated_at = ? WHERE folder_id = ? AND is_in_trash = 0",
    );

    this.db.transaction(() => {
      for (const folderId of ids) {
        markFolder.run(folderId);
        markNotes.run(now, folderId);
      }
    })();
  }

  /** Take a folder out of the trash, along with any trashed ancestors */
  restore(id: string): Folder {
    const chain = this.ancestors(id);
    const unmark = this.db.prepare("UPDATE folders SET is_in_trash = 0 WHERE id = ?");

    this.db.transaction(() => {
      unmark.run(id);
      for (const ancestor of chain.slice(1)) {
        if (!ancestor.isInTrash) break;
        unmark.run(ancestor.id);
      }
    })();

    return { ...chain[0], isInTrash: false };
  }

  /** Hard delete; the schema cascades to subfolders, notes and their children */
  delete(id: string): boolean {
    const result = this.db.prepare("DELETE FROM folders WHERE id = ?").run(id);
    return result.changes > 0;
  }
}
