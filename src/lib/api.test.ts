import { afterEach, beforeEach, describe, expect, it } from "vitest";
import { steppingClock } from "../test/helpers";
import { BackendError } from "../backend/errors";
import * as api from "./api";
import { closeBackend, getBackend, initBackend, invoke } from "./ipc";

describe("command API", () => {
  beforeEach(() => {
    initBackend({ databasePath: ":memory:", clock: steppingClock() });
  });

  afterEach(() => {
    closeBackend();
  });

  it("fails every command before the backend is opened", async () => {
    closeBackend();
    await expect(api.getAllNotes()).rejects.toMatchObject({ code: "NOT_INITIALIZED" });
    expect(() => getBackend()).toThrow(BackendError);
  });

  it("creates and lists notes inside folders", async () => {
    const folder = await api.createFolder({ name: "Work" });
    const note = await api.createNote({ title: "Standup", folderId: folder.id });
    await api.createNote({ title: "Unfiled" });

    expect((await api.getNotesInFolder(folder.id)).map((n) => n.id)).toEqual([note.id]);
    expect((await api.getNotesInFolder(null)).map((n) => n.title)).toEqual(["Unfiled"]);
    expect(await api.getNote("missing")).toBeNull();
  });

  it("lists root and child folders by name", async () => {
    const work = await api.createFolder({ name: "Work" });
    await api.createFolder({ name: "Archive" });
    await api.createFolder({ name: "Meetings", parentId: work.id });

    expect((await api.getRootFolders()).map((f) => f.name)).toEqual(["Archive", "Work"]);
    expect((await api.getChildFolders(work.id)).map((f) => f.name)).toEqual(["Meetings"]);
  });

  it("surfaces backend errors as rejections", async () => {
    const parent = await api.createFolder({ name: "Parent" });
    const child = await api.createFolder({ name: "Child", parentId: parent.id });

    await expect(api.moveFolder(parent.id, child.id)).rejects.toMatchObject({
      code: "INVALID_MOVE",
    });
    await expect(api.createFolder({ name: " " })).rejects.toBeInstanceOf(BackendError);
  });

  it("runs the trash workflow", async () => {
    const folder = await api.createFolder({ name: "Old" });
    await api.createNote({ title: "Stale", folderId: folder.id });

    expect(await api.trashFolder(folder.id)).toBe(true);
    expect(await api.getTrashItemCount()).toBe(2);
    expect((await api.getTrashedFolders()).map((f) => f.name)).toEqual(["Old"]);
    expect((await api.getTrashedNotes()).map((n) => n.title)).toEqual(["Stale"]);

    expect(await api.emptyTrash()).toEqual({ notesDeleted: 1, foldersDeleted: 1 });
    expect(await api.getTrashItemCount()).toBe(0);
  });

  it("lists every tag for an empty tag query", async () => {
    const note = await api.createNote({ title: "Plan" });
    await api.addTagToNote(note.id, "beta");
    await api.createTag("alpha");

    expect((await api.searchTags("")).map((t) => t.name)).toEqual(["alpha", "beta"]);
    expect((await api.searchTags("be")).map((t) => t.name)).toEqual(["beta"]);
    expect((await api.getNoteTags(note.id)).map((t) => t.name)).toEqual(["beta"]);
  });

  it("attaches images and reminders to notes", async () => {
    const note = await api.createNote({ title: "Trip" });
    const image = await api.addImageToNote(note.id, new Uint8Array([1, 2]), "image/jpeg");
    const reminder = await api.createReminder(note.id, {
      title: "Pack",
      reminderDate: "2025-06-01T08:00:00.000Z",
      repeatType: "weekly",
    });

    expect((await api.getNoteImages(note.id)).map((i) => i.id)).toEqual([image.id]);
    expect(await api.getReminder(reminder.id)).toEqual(reminder);
    expect((await api.getNoteReminders(note.id)).map((r) => r.repeatType)).toEqual(["weekly"]);
  });

  it("dispatches raw commands by name", async () => {
    const folder = await invoke("create_folder", { name: "Inbox", parentId: null });
    expect(await invoke("get_folder_path", { id: folder.id })).toBe("Inbox");
  });
});
