import { afterEach, beforeEach, describe, expect, it } from "vitest";
import type { Folder } from "../types/note";
import { openTestBackend, thrownCode } from "../test/helpers";
import type { Backend } from "./backend";

describe("FolderRepository", () => {
  let backend: Backend;
  let work: Folder;
  let projects: Folder;
  let archive: Folder;
  let meetings: Folder;
  let personal: Folder;

  beforeEach(() => {
    backend = openTestBackend();
    const { folders } = backend;
    work = folders.create("Work");
    projects = folders.create("Projects", work.id);
    archive = folders.create("Archive", projects.id);
    meetings = folders.create("Meetings", work.id);
    personal = folders.create("Personal");
  });

  afterEach(() => {
    backend.close();
  });

  const names = (folders: Folder[]) => folders.map((f) => f.name);

  it("creates folders with trimmed names", () => {
    const folder = backend.folders.create("  Recipes  ");
    expect(folder.name).toBe("Recipes");
    expect(folder.parentId).toBeNull();
    expect(folder.isInTrash).toBe(false);
    expect(backend.folders.get(folder.id)).toEqual(folder);
  });

  it("rejects empty names and unknown parents", () => {
    expect(thrownCode(() => backend.folders.create("   "))).toBe("INVALID_INPUT");
    expect(thrownCode(() => backend.folders.create("Orphan", "missing"))).toBe("NOT_FOUND");
  });

  it("lists root and child folders by name", () => {
    expect(names(backend.folders.listChildren(null))).toEqual(["Personal", "Work"]);
    expect(names(backend.folders.listChildren(work.id))).toEqual(["Meetings", "Projects"]);
    expect(names(backend.folders.list())).toEqual([
      "Archive",
      "Meetings",
      "Personal",
      "Projects",
      "Work",
    ]);
  });

  it("leaves the folder alone when renamed to an empty or identical name", () => {
    expect(backend.folders.rename(work.id, "   ")).toEqual(work);
    expect(backend.folders.rename(work.id, "Work")).toEqual(work);
    expect(backend.folders.rename(work.id, " Office ").name).toBe("Office");
    expect(backend.folders.get(work.id)?.name).toBe("Office");
  });

  it("builds the full path", () => {
    expect(backend.folders.path(archive.id)).toBe("Work/Projects/Archive");
    expect(backend.folders.path(personal.id)).toBe("Personal");
  });

  it("refuses to move a folder into itself or below itself", () => {
    expect(thrownCode(() => backend.folders.move(work.id, work.id))).toBe("INVALID_MOVE");
    expect(thrownCode(() => backend.folders.move(work.id, archive.id))).toBe("INVALID_MOVE");

    const moved = backend.folders.move(archive.id, personal.id);
    expect(moved.parentId).toBe(personal.id);
    expect(backend.folders.path(archive.id)).toBe("Personal/Archive");

    expect(backend.folders.move(projects.id, null).parentId).toBeNull();
  });

  it("refuses to move a folder into a trashed folder", () => {
    backend.folders.trash(personal.id);
    expect(thrownCode(() => backend.folders.move(projects.id, personal.id))).toBe("INVALID_INPUT");
  });

  it("offers every folder but the subtree as a move target", () => {
    expect(names(backend.folders.availableTargets(projects.id))).toEqual([
      "Meetings",
      "Personal",
      "Work",
    ]);
  });

  it("trashes the folder, its subfolders and their notes", () => {
    const { folders, notes } = backend;
    const inArchive = notes.create({ title: "Old plan", folderId: archive.id });
    const unfiled = notes.create({ title: "Loose note" });

    folders.trash(work.id);

    expect(names(folders.list())).toEqual(["Personal"]);
    expect(names(folders.listTrashed())).toEqual(["Archive", "Meetings", "Projects", "Work"]);

    const trashed = notes.get(inArchive.id);
    expect(trashed?.isInTrash).toBe(true);
    expect(trashed && trashed.updatedAt > inArchive.updatedAt).toBe(true);
    expect(notes.get(unfiled.id)?.isInTrash).toBe(false);
  });

  it("restores a folder with its trashed ancestors but not its contents", () => {
    const { folders, notes } = backend;
    const note = notes.create({ title: "Old plan", folderId: archive.id });
    folders.trash(work.id);

    const restored = folders.restore(projects.id);

    expect(restored.isInTrash).toBe(false);
    expect(folders.get(work.id)?.isInTrash).toBe(false);
    expect(folders.get(archive.id)?.isInTrash).toBe(true);
    expect(folders.get(meetings.id)?.isInTrash).toBe(true);
    expect(notes.get(note.id)?.isInTrash).toBe(true);
  });

  it("deletes the whole subtree and its notes", () => {
    const { folders, notes } = backend;
    const note = notes.create({ title: "Old plan", folderId: archive.id });
    const kept = notes.create({ title: "Diary", folderId: personal.id });

    expect(folders.delete(work.id)).toBe(true);

    expect(folders.get(archive.id)).toBeNull();
    expect(folders.get(meetings.id)).toBeNull();
    expect(notes.get(note.id)).toBeNull();
    expect(notes.get(kept.id)).not.toBeNull();
    expect(folders.delete(work.id)).toBe(false);
  });
});
