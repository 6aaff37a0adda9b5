/**
 * Note search queries
 *
 * Matching goes through the fold() SQL function, so "cafe" finds "Café".
 */
import type { Note } from "../types/note";
import { codePointLength } from "../lib/text";
import { type Db } from "./db";
import { NEWEST_FIRST, NOTE_COLUMNS, type NoteRow, toNote } from "./notes";
import type { TagRepository } from "./tags";

export type SearchMode = "fulltext" | "tag";

export interface SearchPage {
  notes: Note[];
  /** More matches exist beyond the requested limit */
  hasMore: boolean;
}

export const MIN_SUGGESTION_QUERY_LENGTH = 2;
const TITLE_SUGGESTION_LIMIT = 5;
const TAG_SUGGESTION_LIMIT = 3;

/** Suggestions start at two characters, counted as typed (untrimmed) */
export function isSuggestionQuery(query: string): boolean {
  return codePointLength(query) >= MIN_SUGGESTION_QUERY_LENGTH;
}

export class SearchRepository {
  constructor(
    private readonly db: Db,
    private readonly tags: TagRepository,
  ) {}

  search(query: string, mode: SearchMode, limit: number): SearchPage {
    if (!query) return { notes: [], hasMore: false };

    // Fetch one extra row to learn whether there is another page
    const rows = mode === "tag" ? this.byTag(query, limit + 1) : this.byText(query, limit + 1);
    const hasMore = rows.length > limit;
    return { notes: rows.slice(0, limit).map(toNote), hasMore };
  }

  /**
   * Recent note titles and tag names ("#name") matching the query
   */
  suggestions(query: string): string[] {
    if (!isSuggestionQuery(query)) return [];

    const suggestions: string[] = [];
    const push = (value: string) => {
      if (value && !suggestions.includes(value)) suggestions.push(value);
    };

    const titles = this.db
      .prepare<[string, number], { title: string }>(
        `SELECT n.title FROM notes n
         WHERE n.is_in_trash = 0 AND instr(fold(n.title), fold(?)) > 0
         ${NEWEST_FIRST} LIMIT ?`,
      )
      .all(query, TITLE_SUGGESTION_LIMIT);
    for (const { title } of titles) push(title);

    for (const tag of this.tags.search(query, TAG_SUGGESTION_LIMIT)) {
      push(`#${tag.name}`);
    }

    return suggestions;
  }

  private byText(query: string, limit: number): NoteRow[] {
    return this.db
      .prepare<[string, string, number], NoteRow>(
        `SELECT ${NOTE_COLUMNS} FROM notes n
         WHERE n.is_in_trash = 0
           AND (instr(fold(n.title), fold(?)) > 0
                OR instr(fold(coalesce(n.content, '')), fold(?)) > 0)
         ${NEWEST_FIRST} LIMIT ?`,
      )
      .all(query, query, limit);
  }

  private byTag(query: string, limit: number): NoteRow[] {
    return this.db
      .prepare<[string, number], NoteRow>(
        `SELECT ${NOTE_COLUMNS} FROM notes n
         WHERE n.is_in_trash = 0
           AND n.id IN (
             SELECT nt.note_id FROM note_tags nt
             JOIN tags t ON t.id = nt.tag_id
             WHERE instr(fold(t.name), fold(?)) > 0
           )
         ${NEWEST_FIRST} LIMIT ?`,
      )
      .all(query, limit);
  }
}
