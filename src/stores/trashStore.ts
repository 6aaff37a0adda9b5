import { createStore } from "zustand/vanilla";
import type { Folder, Note } from "../types/note";
import * as api from "../lib/api";
import type { EmptyTrashResult } from "../lib/api";
import { folderStore } from "./folderStore";
import { noteStore } from "./noteStore";
import { reminderStore } from "./reminderStore";

export interface TrashState {
  // State
  trashedNotes: Note[];
  trashedFolders: Folder[];
  itemCount: number;
  isLoading: boolean;
  error: string | null;

  // Actions
  fetchTrash: () => Promise<void>;
  restoreNote: (id: string) => Promise<void>;
  restoreFolder: (id: string) => Promise<void>;
  deleteNotePermanently: (id: string) => Promise<void>;
  deleteFolderPermanently: (id: string) => Promise<void>;
  emptyTrash: () => Promise<EmptyTrashResult>;
  clearError: () => void;
}

export const trashStore = createStore<TrashState>()((set, get) => ({
  // Initial state
  trashedNotes: [],
  trashedFolders: [],
  itemCount: 0,
  isLoading: false,
  error: null,

  fetchTrash: async () => {
    set({ isLoading: true, error: null });
    try {
      const [trashedNotes, trashedFolders, itemCount] = await Promise.all([
        api.getTrashedNotes(),
        api.getTrashedFolders(),
        api.getTrashItemCount(),
      ]);
      set({ trashedNotes, trashedFolders, itemCount, isLoading: false });
    } catch (error) {
      set({ error: String(error), isLoading: false });
    }
  },

  // Restoring a note also brings back its trashed folder chain
  restoreNote: async (id: string) => {
    set({ error: null });
    try {
      await noteStore.getState().restoreNote(id);
      await get().fetchTrash();
      await folderStore.getState().fetchFolders();
    } catch (error) {
      set({ error: String(error) });
      throw error;
    }
  },

  restoreFolder: async (id: string) => {
    set({ error: null });
    try {
      await folderStore.getState().restoreFolder(id);
      await get().fetchTrash();
    } catch (error) {
      set({ error: String(error) });
      throw error;
    }
  },

  deleteNotePermanently: async (id: string) => {
    set({ error: null });
    try {
      await api.deleteNote(id);
      await reminderStore.getState().syncScheduled();
      await get().fetchTrash();
    } catch (error) {
      set({ error: String(error) });
      throw error;
    }
  },

  deleteFolderPermanently: async (id: string) => {
    set({ error: null });
    try {
      await api.deleteFolder(id);
      await reminderStore.getState().syncScheduled();
      await get().fetchTrash();
    } catch (error) {
      set({ error: String(error) });
      throw error;
    }
  },

  // Trashed notes go first, then trashed folders
  emptyTrash: async () => {
    set({ isLoading: true, error: null });
    try {
      const result = await api.emptyTrash();
      await reminderStore.getState().syncScheduled();
      console.log(
        `[Trash] Emptied ${result.notesDeleted} notes and ${result.foldersDeleted} folders`,
      );
      set({ trashedNotes: [], trashedFolders: [], itemCount: 0, isLoading: false });
      return result;
    } catch (error) {
      set({ error: String(error), isLoading: false });
      throw error;
    }
  },

  clearError: () => set({ error: null }),
}));
