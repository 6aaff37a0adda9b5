import { afterEach, describe, expect, it, vi } from "vitest";
import { api, closeShelf, noteShareText, openShelf } from "./index";

describe("openShelf", () => {
  afterEach(() => {
    closeShelf();
  });

  it("opens the configured database for the stores", async () => {
    vi.spyOn(console, "log").mockImplementation(() => {});

    await openShelf({
      config: { dataDir: null, databasePath: ":memory:" },
      seed: true,
      scheduleReminders: true,
    });

    const notes = await api.getAllNotes();
    expect(notes).toHaveLength(11);
    const [first] = notes;
    expect(noteShareText(first)).toBe(`Title: ${first.title}\n\n${first.content ?? ""}`);
  });

  it("closes the backend", async () => {
    await openShelf({ config: { dataDir: null, databasePath: ":memory:" } });
    closeShelf();
    await expect(api.getAllNotes()).rejects.toMatchObject({ code: "NOT_INITIALIZED" });
  });
});
