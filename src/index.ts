import { mkdirSync } from "node:fs";
import { dirname } from "node:path";
import type { Backend } from "./backend/backend";
import { seedSampleData } from "./backend/seed";
import { type AppConfig, loadConfig } from "./lib/config";
import { closeBackend, initBackend } from "./lib/ipc";
import { reminderStore } from "./stores/reminderStore";

export * from "./types";
export * as api from "./lib/api";
export { invoke, initBackend, closeBackend, getBackend } from "./lib/ipc";
export { Backend, type BackendOptions } from "./backend/backend";
export type { CommandMap, CommandName } from "./backend/commands";
export { BackendError, isBackendError, type BackendErrorCode } from "./backend/errors";
export { seedSampleData, type SeedResult } from "./backend/seed";
export { loadConfig, type AppConfig } from "./lib/config";
export {
  searchNotes,
  getSearchSuggestions,
  type SearchMode,
  type SearchPage,
} from "./lib/search";
export { findMatchRanges, extractPreview, highlightSegments, type TextRange } from "./lib/text";
export {
  nextReminderDate,
  calculateNextReminderDate,
  isOverdue,
  timeRemainingDescription,
} from "./lib/reminders";
export {
  ReminderScheduler,
  type ReminderNotification,
  type ReminderListener,
} from "./lib/reminderScheduler";
export {
  recognizeText,
  setTextRecognizer,
  OcrError,
  type TextRecognizer,
  type TextObservation,
  type RecognitionOptions,
} from "./lib/ocr";
export { renderRichContent, decodeRichContent, noteShareText } from "./lib/richText";
export { folderStore, buildFolderTree, type FolderTreeNode } from "./stores/folderStore";
export { noteStore, selectSelectedNote, type ViewMode } from "./stores/noteStore";
export { tagStore } from "./stores/tagStore";
export { reminderStore, reminderScheduler } from "./stores/reminderStore";
export { searchStore } from "./stores/searchStore";
export { trashStore } from "./stores/trashStore";
export { ocrStore } from "./stores/ocrStore";
export { settingsStore, DEFAULT_SETTINGS, type Settings } from "./stores/settingsStore";

export interface OpenShelfOptions {
  config?: AppConfig;
  /** Fill an empty database with sample folders and notes */
  seed?: boolean;
  /** Schedule notifications for active reminders */
  scheduleReminders?: boolean;
}

/**
 * Open the database named by the environment (or `config`) and make it the
 * backend every store talks to.
 */
export async function openShelf(options: OpenShelfOptions = {}): Promise<Backend> {
  const config = options.config ?? loadConfig();
  if (config.databasePath !== ":memory:") {
    mkdirSync(dirname(config.databasePath), { recursive: true });
  }

  const backend = initBackend({ databasePath: config.databasePath });
  console.log(`[Backend] Opened ${config.databasePath}`);

  if (options.seed) seedSampleData(backend);
  if (options.scheduleReminders) {
    await reminderStore.getState().loadAndScheduleAll();
  }
  return backend;
}

/**
 * Stop reminder notifications and close the database
 */
export function closeShelf(): void {
  reminderStore.getState().stopScheduling();
  closeBackend();
}
