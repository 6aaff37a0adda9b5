import { describe, expect, it } from "vitest";
import { extractPreview, findMatchRanges, foldText, highlightSegments } from "./text";

describe("foldText", () => {
  it("lower-cases and strips diacritics", () => {
    expect(foldText("Café Crème")).toBe("cafe creme");
  });
});

describe("findMatchRanges", () => {
  it("matches regardless of case and accents, in original offsets", () => {
    expect(findMatchRanges("Café au lait, CAFE noir", "cafe")).toEqual([
      { start: 0, end: 4 },
      { start: 14, end: 18 },
    ]);
  });

  it("maps decomposed characters back to the original text", () => {
    // "e" followed by a combining acute accent: two code units, one letter
    const text = "Cafe\u0301!";
    const [range] = findMatchRanges(text, "caf\u00e9");
    expect(range).toEqual({ start: 0, end: 5 });
    expect(text.slice(range.start, range.end)).toBe("Cafe\u0301");
  });

  it("does not overlap matches", () => {
    expect(findMatchRanges("aaaa", "aa")).toEqual([
      { start: 0, end: 2 },
      { start: 2, end: 4 },
    ]);
  });

  it("returns nothing for an empty keyword", () => {
    expect(findMatchRanges("anything", "")).toEqual([]);
  });
});

describe("extractPreview", () => {
  it("returns short text whole", () => {
    expect(extractPreview("hello world", "world")).toBe("hello world");
  });

  it("keeps at most 75 characters before the match and marks cut sides", () => {
    const text = "a".repeat(100) + "needle" + "b".repeat(100);
    const preview = extractPreview(text, "needle");
    expect(preview).toBe("..." + "a".repeat(75) + "needle" + "b".repeat(69) + "...");
  });

  it("falls back to the first 200 characters without a match", () => {
    expect(extractPreview("x".repeat(300), "zzz")).toBe("x".repeat(200));
    expect(extractPreview("y".repeat(250), "")).toBe("y".repeat(200));
  });

  it("never splits an emoji at a cut", () => {
    expect(extractPreview("a".repeat(199) + "😀 tail", "")).toBe("a".repeat(199) + "😀");

    const text = "😀".repeat(100) + "needle" + "b".repeat(10);
    expect(extractPreview(text, "needle")).toBe("..." + "😀".repeat(75) + "needle" + "b".repeat(10));
  });
});

describe("highlightSegments", () => {
  it("splits text around each match", () => {
    expect(highlightSegments("Say hello, Hello", "hello")).toEqual([
      { text: "Say ", highlighted: false },
      { text: "hello", highlighted: true },
      { text: ", ", highlighted: false },
      { text: "Hello", highlighted: true },
    ]);
  });

  it("returns the text as a single plain segment without matches", () => {
    expect(highlightSegments("plain", "zzz")).toEqual([{ text: "plain", highlighted: false }]);
  });
});
