import { createStore } from "zustand/vanilla";
import type { Folder } from "../types/note";
import * as api from "../lib/api";
import { reminderStore } from "./reminderStore";

export interface FolderState {
  // State
  folders: Folder[];
  selectedFolderId: string | null;
  /** True while the "All Notes" pseudo-folder is selected */
  showAllNotes: boolean;
  isLoading: boolean;
  error: string | null;

  // Actions
  fetchFolders: () => Promise<void>;
  selectFolder: (id: string | null) => void;
  selectAllNotes: () => void;
  createFolder: (name: string, parentId?: string | null) => Promise<Folder>;
  renameFolder: (id: string, name: string) => Promise<Folder>;
  moveFolder: (id: string, parentId: string | null) => Promise<Folder>;
  getAvailableTargetFolders: (id: string) => Promise<Folder[]>;
  getFolderPath: (id: string) => Promise<string>;
  trashFolder: (id: string) => Promise<void>;
  restoreFolder: (id: string) => Promise<Folder>;
  deleteFolder: (id: string) => Promise<void>;
  clearError: () => void;
}

export const folderStore = createStore<FolderState>()((set, get) => ({
  // Initial state
  folders: [],
  selectedFolderId: null,
  showAllNotes: true,
  isLoading: false,
  error: null,

  // Fetch all folders outside the trash
  fetchFolders: async () => {
    set({ isLoading: true, error: null });
    try {
      const folders = await api.getAllFolders();
      set({ folders, isLoading: false });
    } catch (error) {
      set({ error: String(error), isLoading: false });
    }
  },

  // Select a folder by ID (null = unfiled notes)
  selectFolder: (id: string | null) => {
    set({ selectedFolderId: id, showAllNotes: false });
  },

  selectAllNotes: () => {
    set({ selectedFolderId: null, showAllNotes: true });
  },

  // Create a new folder
  createFolder: async (name: string, parentId?: string | null) => {
    set({ isLoading: true, error: null });
    try {
      const folder = await api.createFolder({ name, parentId });
      set((state) => ({
        folders: sortByName([...state.folders, folder]),
        isLoading: false,
      }));
      return folder;
    } catch (error) {
      set({ error: String(error), isLoading: false });
      throw error;
    }
  },

  // Rename; an empty or unchanged name leaves the folder as it is
  renameFolder: async (id: string, name: string) => {
    set({ error: null });
    try {
      const folder = await api.renameFolder(id, name);
      set((state) => ({
        folders: sortByName(state.folders.map((f) => (f.id === id ? folder : f))),
      }));
      return folder;
    } catch (error) {
      set({ error: String(error) });
      throw error;
    }
  },

  // Re-parent a folder (null = top level)
  moveFolder: async (id: string, parentId: string | null) => {
    set({ error: null });
    try {
      const folder = await api.moveFolder(id, parentId);
      set((state) => ({
        folders: state.folders.map((f) => (f.id === id ? folder : f)),
      }));
      return folder;
    } catch (error) {
      set({ error: String(error) });
      throw error;
    }
  },

  getAvailableTargetFolders: async (id: string) => {
    try {
      return await api.getAvailableTargetFolders(id);
    } catch (error) {
      set({ error: String(error) });
      return [];
    }
  },

  getFolderPath: async (id: string) => {
    try {
      return await api.getFolderPath(id);
    } catch (error) {
      set({ error: String(error) });
      return "";
    }
  },

  // Move a folder and its whole subtree to the trash
  trashFolder: async (id: string) => {
    set({ error: null });
    try {
      await api.trashFolder(id);
      await reminderStore.getState().syncScheduled();
      await get().fetchFolders();
      clearMissingSelection(get().folders);
    } catch (error) {
      set({ error: String(error) });
      throw error;
    }
  },

  // Bring a folder (and its trashed ancestors) back
  restoreFolder: async (id: string) => {
    set({ error: null });
    try {
      const folder = await api.restoreFolder(id);
      await get().fetchFolders();
      return folder;
    } catch (error) {
      set({ error: String(error) });
      throw error;
    }
  },

  // Delete a folder permanently, with its subfolders and notes
  deleteFolder: async (id: string) => {
    set({ error: null });
    try {
      await api.deleteFolder(id);
      await reminderStore.getState().syncScheduled();
      await get().fetchFolders();
      clearMissingSelection(get().folders);
    } catch (error) {
      set({ error: String(error) });
      throw error;
    }
  },

  // Clear error
  clearError: () => set({ error: null }),
}));

function sortByName(folders: Folder[]): Folder[] {
  return [...folders].sort((a, b) => a.name.localeCompare(b.name));
}

function clearMissingSelection(folders: Folder[]): void {
  const { selectedFolderId } = folderStore.getState();
  if (selectedFolderId && !folders.some((f) => f.id === selectedFolderId)) {
    folderStore.setState({ selectedFolderId: null, showAllNotes: true });
  }
}

// Helper to build folder tree structure
export interface FolderTreeNode extends Folder {
  children: FolderTreeNode[];
}

/**
 * Nest folders by parentId, children sorted by name. Folders whose parent is
 * not in the list are treated as roots.
 */
export function buildFolderTree(folders: Folder[]): FolderTreeNode[] {
  const ids = new Set(folders.map((f) => f.id));

  const buildTree = (parentId: string | null): FolderTreeNode[] => {
    return folders
      .filter((f) =>
        parentId === null
          ? f.parentId === null || !ids.has(f.parentId)
          : f.parentId === parentId,
      )
      .map((folder) => ({
        ...folder,
        children: buildTree(folder.id),
      }))
      .sort((a, b) => a.name.localeCompare(b.name));
  };

  return buildTree(null);
}
