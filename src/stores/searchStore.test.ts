import { afterEach, beforeEach, describe, expect, it, vi } from "vitest";
import * as api from "../lib/api";
import { setUpStores, tearDownStores } from "../test/stores";
import { searchStore } from "./searchStore";
import { settingsStore } from "./settingsStore";

const resultTitles = () => searchStore.getState().results.map((n) => n.title);

describe("searchStore", () => {
  beforeEach(async () => {
    vi.useFakeTimers();
    vi.setSystemTime(new Date("2025-01-01T00:00:00.000Z"));
    setUpStores();

    const alpha = await api.createNote({ title: "Alpha release", content: "ship it" });
    await api.createNote({ title: "Alphabet", content: "letters" });
    await api.createNote({ title: "Beta notes", content: "more letters" });
    await api.addTagToNote(alpha.id, "launch");
  });

  afterEach(() => {
    tearDownStores();
    vi.useRealTimers();
  });

  it("runs the first query right away", async () => {
    await searchStore.getState().performSearch("alpha");

    expect(resultTitles()).toEqual(["Alphabet", "Alpha release"]);
    expect(searchStore.getState()).toMatchObject({
      query: "alpha",
      hasMoreResults: false,
      isSearching: false,
      suggestions: ["Alphabet", "Alpha release"],
    });
  });

  it("asks for suggestions by the typed length of the query", async () => {
    await searchStore.getState().performSearch(" n");

    expect(resultTitles()).toEqual(["Beta notes"]);
    expect(searchStore.getState().suggestions).toEqual(["Beta notes"]);
  });

  it("debounces queries that follow each other quickly", async () => {
    await searchStore.getState().performSearch("alpha");

    const pending = searchStore.getState().performSearch("letters");
    expect(searchStore.getState().query).toBe("letters");
    expect(resultTitles()).toEqual(["Alphabet", "Alpha release"]);

    await vi.advanceTimersByTimeAsync(300);
    await pending;
    expect(resultTitles()).toEqual(["Beta notes", "Alphabet"]);
  });

  it("lets a newer query cancel the one waiting", async () => {
    await searchStore.getState().performSearch("alpha");

    let firstSettled = false;
    const first = searchStore.getState().performSearch("beta");
    first.then(() => {
      firstSettled = true;
    });

    await vi.advanceTimersByTimeAsync(100);
    const second = searchStore.getState().performSearch("ship");
    await first;
    expect(firstSettled).toBe(true);
    expect(resultTitles()).toEqual(["Alphabet", "Alpha release"]);

    await vi.advanceTimersByTimeAsync(300);
    await second;
    expect(resultTitles()).toEqual(["Alpha release"]);
  });

  it("runs again without delay once typing pauses", async () => {
    await searchStore.getState().performSearch("alpha");
    vi.advanceTimersByTime(500);

    await searchStore.getState().performSearch("beta");
    expect(resultTitles()).toEqual(["Beta notes"]);
  });

  it("clears everything for an empty query", async () => {
    await searchStore.getState().performSearch("alpha");
    await searchStore.getState().performSearch("   ");

    expect(searchStore.getState()).toMatchObject({
      query: "",
      results: [],
      suggestions: [],
      hasMoreResults: false,
    });
  });

  it("pages through results", async () => {
    settingsStore.getState().setSearchPageSize(1);

    await searchStore.getState().performSearch("letters");
    expect(resultTitles()).toEqual(["Beta notes"]);
    expect(searchStore.getState()).toMatchObject({ limit: 1, hasMoreResults: true });

    await searchStore.getState().loadMore();
    expect(resultTitles()).toEqual(["Beta notes", "Alphabet"]);
    expect(searchStore.getState()).toMatchObject({ limit: 2, hasMoreResults: false });

    await searchStore.getState().loadMore();
    expect(searchStore.getState().limit).toBe(2);
  });

  it("searches tags after switching mode", async () => {
    await searchStore.getState().performSearch("launch");
    expect(resultTitles()).toEqual([]);

    await searchStore.getState().setMode("tag");
    expect(resultTitles()).toEqual(["Alpha release"]);
    expect(searchStore.getState().suggestions).toEqual(["#launch"]);
  });
});
