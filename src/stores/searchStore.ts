import { createStore } from "zustand/vanilla";
import type { Note } from "../types/note";
import * as search from "../lib/search";
import type { SearchMode } from "../lib/search";
import { settingsStore } from "./settingsStore";

export interface SearchState {
  // State
  query: string;
  mode: SearchMode;
  results: Note[];
  suggestions: string[];
  /** Rows requested for the current query; grows with loadMore */
  limit: number;
  hasMoreResults: boolean;
  isSearching: boolean;
  error: string | null;

  // Actions
  /** Debounced: queries typed in quick succession wait; a newer one cancels the wait */
  performSearch: (query: string) => Promise<void>;
  setMode: (mode: SearchMode) => Promise<void>;
  loadMore: () => Promise<void>;
  resetSearch: () => void;
  clearError: () => void;
}

interface PendingSearch {
  timer: ReturnType<typeof setTimeout>;
  resolve: () => void;
}

let pending: PendingSearch | null = null;
let lastQueryAt = Number.NEGATIVE_INFINITY;

function cancelPending(): void {
  if (!pending) return;
  clearTimeout(pending.timer);
  pending.resolve();
  pending = null;
}

const pageSize = () => settingsStore.getState().searchPageSize;

export const searchStore = createStore<SearchState>()((set, get) => {
  // Run the current query with the current mode and limit
  const execute = async () => {
    const { query, mode, limit } = get();
    if (!query.trim()) return;

    set({ isSearching: true, error: null });
    try {
      const page = await search.searchNotes(query, mode, limit);
      const suggestions = search.isSuggestionQuery(query)
        ? await search.getSearchSuggestions(query)
        : [];

      // A newer query has taken over
      if (get().query !== query || get().mode !== mode) return;
      set({
        results: page.notes,
        hasMoreResults: page.hasMore,
        suggestions,
        isSearching: false,
      });
    } catch (error) {
      set({ error: String(error), isSearching: false });
    }
  };

  return {
    // Initial state
    query: "",
    mode: "fulltext",
    results: [],
    suggestions: [],
    limit: search.DEFAULT_SEARCH_PAGE_SIZE,
    hasMoreResults: false,
    isSearching: false,
    error: null,

    performSearch: (query: string) => {
      cancelPending();
      if (!query.trim()) {
        get().resetSearch();
        return Promise.resolve();
      }

      set({ query, limit: pageSize() });

      const now = Date.now();
      const { searchDebounceMs } = settingsStore.getState();
      const typingFast = now - lastQueryAt < searchDebounceMs;
      lastQueryAt = now;

      if (!typingFast) return execute();

      return new Promise<void>((resolve) => {
        pending = {
          resolve,
          timer: setTimeout(() => {
            pending = null;
            execute().then(resolve, resolve);
          }, searchDebounceMs),
        };
      });
    },

    // Switching mode re-runs the current query from the first page
    setMode: async (mode: SearchMode) => {
      if (get().mode === mode) return;
      cancelPending();
      set({ mode, limit: pageSize(), results: [], hasMoreResults: false });
      await execute();
    },

    loadMore: async () => {
      const { hasMoreResults, isSearching } = get();
      if (!hasMoreResults || isSearching) return;
      set((state) => ({ limit: state.limit + pageSize() }));
      await execute();
    },

    resetSearch: () => {
      cancelPending();
      lastQueryAt = Number.NEGATIVE_INFINITY;
      set({
        query: "",
        results: [],
        suggestions: [],
        limit: pageSize(),
        hasMoreResults: false,
        isSearching: false,
        error: null,
      });
    },

    clearError: () => set({ error: null }),
  };
});
