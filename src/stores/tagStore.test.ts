import { afterEach, beforeEach, describe, expect, it } from "vitest";
import * as api from "../lib/api";
import { setUpStores, tearDownStores } from "../test/stores";
import { tagStore } from "./tagStore";

const tagNames = (tags: { name: string }[]) => tags.map((t) => t.name);

describe("tagStore", () => {
  let noteId: string;

  beforeEach(async () => {
    setUpStores();
    noteId = (await api.createNote({ title: "Garden" })).id;
  });

  afterEach(() => {
    tearDownStores();
  });

  it("tags a note and tracks tags per note", async () => {
    await tagStore.getState().addTagToNote(noteId, "plants");
    await tagStore.getState().addTagToNote(noteId, "Outdoor");
    await tagStore.getState().addTagToNote(noteId, "PLANTS");

    expect(tagNames(tagStore.getState().tags)).toEqual(["Outdoor", "plants"]);
    expect(tagNames(tagStore.getState().tagsByNote[noteId])).toEqual(["Outdoor", "plants"]);
    expect(tagNames(await api.getNoteTags(noteId))).toEqual(["Outdoor", "plants"]);
  });

  it("removes a tag from a note", async () => {
    const tag = await tagStore.getState().addTagToNote(noteId, "plants");
    await tagStore.getState().removeTagFromNote(noteId, tag.id);

    expect(tagStore.getState().tagsByNote[noteId]).toEqual([]);
    expect(tagNames(tagStore.getState().tags)).toEqual(["plants"]);
  });

  it("renames and deletes tags everywhere", async () => {
    const tag = await tagStore.getState().addTagToNote(noteId, "plant");

    await tagStore.getState().renameTag(tag.id, "plants");
    expect(tagNames(tagStore.getState().tags)).toEqual(["plants"]);
    expect(tagNames(tagStore.getState().tagsByNote[noteId])).toEqual(["plants"]);

    await tagStore.getState().deleteTag(tag.id);
    expect(tagStore.getState().tags).toEqual([]);
    expect(tagStore.getState().tagsByNote[noteId]).toEqual([]);
    expect(await api.getNote(noteId)).not.toBeNull();
  });

  it("fetches, searches and lists tagged notes", async () => {
    await api.addTagToNote(noteId, "compost");
    await api.createTag("cooking");
    await api.createTag("travel");

    await tagStore.getState().fetchTags();
    expect(tagNames(tagStore.getState().tags)).toEqual(["compost", "cooking", "travel"]);

    expect(tagNames(await tagStore.getState().searchTags("co"))).toEqual(["compost", "cooking"]);
    expect(tagNames(await tagStore.getState().fetchNoteTags(noteId))).toEqual(["compost"]);

    const [compost] = tagStore.getState().tags;
    const notes = await tagStore.getState().getTagNotes(compost.id);
    expect(notes.map((n) => n.id)).toEqual([noteId]);
  });

  it("records a failed rename", async () => {
    await api.createTag("alpha");
    const beta = await tagStore.getState().createTag("beta");

    await expect(tagStore.getState().renameTag(beta.id, "Alpha")).rejects.toMatchObject({
      code: "INVALID_INPUT",
    });
    expect(tagStore.getState().error).toBe('BackendError: A tag named "Alpha" already exists');
  });
});
