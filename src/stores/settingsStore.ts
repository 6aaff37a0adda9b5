import { join } from "node:path";
import { createStore } from "zustand/vanilla";
import { createJSONStorage, persist, type StateStorage } from "zustand/middleware";
import { loadConfig, SETTINGS_FILENAME } from "../lib/config";
import { createFileStorage, createMemoryStorage } from "../lib/storage";
import { DEFAULT_SEARCH_DEBOUNCE_MS, DEFAULT_SEARCH_PAGE_SIZE } from "../lib/search";
import { DEFAULT_REMINDER_OFFSET_MS, UPCOMING_WINDOW_MS } from "../lib/reminders";
import { DEFAULT_OCR_LANGUAGES } from "../lib/ocr";

/** User-tunable settings */
export interface Settings {
  /** Search results per page */
  searchPageSize: number;
  /** Delay before running a query typed in quick succession */
  searchDebounceMs: number;
  /** Offset from now used when a reminder is created without a date */
  reminderOffsetMs: number;
  /** How far ahead "upcoming" reminders reach */
  upcomingWindowMs: number;
  /** Languages passed to the text recognizer, in priority order */
  ocrLanguages: string[];
}

export const DEFAULT_SETTINGS: Settings = {
  searchPageSize: DEFAULT_SEARCH_PAGE_SIZE,
  searchDebounceMs: DEFAULT_SEARCH_DEBOUNCE_MS,
  reminderOffsetMs: DEFAULT_REMINDER_OFFSET_MS,
  upcomingWindowMs: UPCOMING_WINDOW_MS,
  ocrLanguages: [...DEFAULT_OCR_LANGUAGES],
};

export interface SettingsState extends Settings {
  setSearchPageSize: (size: number) => void;
  setSearchDebounceMs: (ms: number) => void;
  setReminderOffsetMs: (ms: number) => void;
  setUpcomingWindowMs: (ms: number) => void;
  setOcrLanguages: (languages: string[]) => void;
  resetSettings: () => void;
}

export const SETTINGS_STORAGE_KEY = "memoshelf-settings";

function settingsStorage(): StateStorage {
  const { dataDir } = loadConfig();
  return dataDir ? createFileStorage(join(dataDir, SETTINGS_FILENAME)) : createMemoryStorage();
}

/** Whole numbers only; anything below `min` falls back to `min` */
function wholeNumber(value: number, min: number): number {
  return Number.isFinite(value) ? Math.max(min, Math.floor(value)) : min;
}

export const settingsStore = createStore<SettingsState>()(
  persist(
    (set) => ({
      ...DEFAULT_SETTINGS,

      setSearchPageSize: (size: number) => set({ searchPageSize: wholeNumber(size, 1) }),

      setSearchDebounceMs: (ms: number) => set({ searchDebounceMs: wholeNumber(ms, 0) }),

      setReminderOffsetMs: (ms: number) => set({ reminderOffsetMs: wholeNumber(ms, 0) }),

      setUpcomingWindowMs: (ms: number) => set({ upcomingWindowMs: wholeNumber(ms, 0) }),

      // Empty or blank entries fall back to the defaults
      setOcrLanguages: (languages: string[]) => {
        const cleaned = languages.map((l) => l.trim()).filter((l) => l.length > 0);
        set({ ocrLanguages: cleaned.length > 0 ? cleaned : [...DEFAULT_OCR_LANGUAGES] });
      },

      resetSettings: () => set({ ...DEFAULT_SETTINGS, ocrLanguages: [...DEFAULT_OCR_LANGUAGES] }),
    }),
    {
      name: SETTINGS_STORAGE_KEY,
      version: 1,
      storage: createJSONStorage(settingsStorage),
      partialize: (state): Settings => ({
        searchPageSize: state.searchPageSize,
        searchDebounceMs: state.searchDebounceMs,
        reminderOffsetMs: state.reminderOffsetMs,
        upcomingWindowMs: state.upcomingWindowMs,
        ocrLanguages: state.ocrLanguages,
      }),
    },
  ),
);
