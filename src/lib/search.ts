/**
 * Typed wrappers for search commands
 */
import { invoke } from "./ipc";
import type { SearchMode, SearchPage } from "../backend/search";

export type { SearchMode, SearchPage };
export { isSuggestionQuery } from "../backend/search";

/** Results per page */
export const DEFAULT_SEARCH_PAGE_SIZE = 50;

/** Delay applied to queries typed in quick succession */
export const DEFAULT_SEARCH_DEBOUNCE_MS = 300;

/**
 * Search notes by text (title or content) or by tag name
 */
export async function searchNotes(
  query: string,
  mode: SearchMode = "fulltext",
  limit: number = DEFAULT_SEARCH_PAGE_SIZE,
): Promise<SearchPage> {
  return invoke("search_notes", { query, mode, limit });
}

/**
 * Matching note titles and "#tag" names to offer while typing
 */
export async function getSearchSuggestions(query: string): Promise<string[]> {
  return invoke("get_search_suggestions", { query });
}
