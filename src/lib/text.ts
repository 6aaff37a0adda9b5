/**
 * Text matching helpers shared by search queries and result presentation
 */

/** Number of characters shown around the first match in a preview */
export const PREVIEW_LENGTH = 150;

/** Number of characters shown when there is nothing to center on */
export const PREVIEW_FALLBACK_LENGTH = 200;

/** A half-open [start, end) range into the original string */
export interface TextRange {
  start: number;
  end: number;
}

const COMBINING_MARKS = /\p{M}/u;

/**
 * Lower-case a string and strip diacritics ("Café" -> "cafe")
 */
export function foldText(text: string): string {
  return text.normalize("NFD").replace(/\p{M}/gu, "").toLowerCase();
}

/**
 * Fold a string while remembering, for every folded character, where it
 * came from in the original. Used to map match positions back.
 */
function foldWithOffsets(text: string): { folded: string; offsets: number[] } {
  let folded = "";
  const offsets: number[] = [];
  let index = 0;

  for (const char of text) {
    const decomposed = char.normalize("NFD");
    for (const part of decomposed) {
      if (COMBINING_MARKS.test(part)) continue;
      const lowered = part.toLowerCase();
      folded += lowered;
      for (let i = 0; i < lowered.length; i++) offsets.push(index);
    }
    index += char.length;
  }
  offsets.push(text.length);

  return { folded, offsets };
}

/**
 * Find every non-overlapping occurrence of keyword in text, ignoring case and
 * diacritics. Ranges index into the original text.
 */
export function findMatchRanges(text: string, keyword: string): TextRange[] {
  const needle = foldText(keyword);
  if (!needle || !text) return [];

  const { folded, offsets } = foldWithOffsets(text);
  const ranges: TextRange[] = [];
  let from = 0;

  while (from <= folded.length - needle.length) {
    const at = folded.indexOf(needle, from);
    if (at === -1) break;
    const end = at + needle.length;
    ranges.push({ start: offsets[at], end: nextOffset(offsets, end - 1, text.length) });
    from = end;
  }

  return ranges;
}

// End of the original character that produced folded[index]
function nextOffset(offsets: number[], index: number, textLength: number): number {
  const start = offsets[index];
  for (let i = index + 1; i < offsets.length; i++) {
    if (offsets[i] !== start) return offsets[i];
  }
  return textLength;
}

/**
 * Cut a preview of text centered on the first match of keyword.
 *
 * Up to half the preview length is taken from before the match; the rest
 * follows it. Truncated sides are marked with "...". Without a keyword or a
 * match, the first 200 characters are returned.
 */
export function extractPreview(text: string, keyword: string): string {
  // Lengths count characters (code points), never half a surrogate pair
  const chars = Array.from(text);
  const fallback = () => chars.slice(0, PREVIEW_FALLBACK_LENGTH).join("");
  if (!keyword || !text) return fallback();

  const [first] = findMatchRanges(text, keyword);
  if (!first) return fallback();

  const matchStart = codePointLength(text.slice(0, first.start));
  const matchEnd = matchStart + codePointLength(text.slice(first.start, first.end));

  const contextBefore = Math.min(Math.floor(PREVIEW_LENGTH / 2), matchStart);
  const start = matchStart - contextBefore;
  const remaining = PREVIEW_LENGTH - (matchEnd - matchStart) - contextBefore;
  const end = matchEnd + Math.max(0, Math.min(remaining, chars.length - matchEnd));

  let preview = chars.slice(start, end).join("");
  if (start > 0) preview = "..." + preview;
  if (end < chars.length) preview = preview + "...";
  return preview;
}

/** Length in code points rather than UTF-16 units */
export function codePointLength(text: string): number {
  return Array.from(text).length;
}

/**
 * Split text into plain and highlighted segments for rendering
 */
export function highlightSegments(
  text: string,
  keyword: string,
): { text: string; highlighted: boolean }[] {
  const ranges = findMatchRanges(text, keyword);
  if (ranges.length === 0) return text ? [{ text, highlighted: false }] : [];

  const segments: { text: string; highlighted: boolean }[] = [];
  let cursor = 0;
  for (const range of ranges) {
    if (range.start > cursor) {
      segments.push({ text: text.slice(cursor, range.start), highlighted: false });
    }
    segments.push({ text: text.slice(range.start, range.end), highlighted: true });
    cursor = range.end;
  }
  if (cursor < text.length) {
    segments.push({ text: text.slice(cursor), highlighted: false });
  }
  return segments;
}
