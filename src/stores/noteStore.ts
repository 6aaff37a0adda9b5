import { createStore } from "zustand/vanilla";
import type { CreateNoteInput, Note, UpdateNoteInput } from "../types/note";
import * as api from "../lib/api";
import { reminderStore } from "./reminderStore";

export type ViewMode = "all" | "unfiled" | "folder";

export interface NoteState {
  // State
  notes: Note[];
  selectedNoteId: string | null;
  isLoading: boolean;
  error: string | null;
  viewMode: ViewMode;
  currentFolderId: string | null;

  // Actions
  fetchAllNotes: () => Promise<void>;
  fetchUnfiledNotes: () => Promise<void>;
  fetchNotesInFolder: (folderId: string) => Promise<void>;
  /** Re-fetch whatever the current view shows */
  refresh: () => Promise<void>;
  selectNote: (id: string | null) => void;
  createNote: (input: CreateNoteInput) => Promise<Note>;
  updateNote: (id: string, updates: UpdateNoteInput) => Promise<Note>;
  moveNoteToFolder: (noteId: string, folderId: string | null) => Promise<void>;
  trashNote: (id: string) => Promise<void>;
  restoreNote: (id: string) => Promise<Note>;
  deleteNote: (id: string) => Promise<void>;
  clearError: () => void;
}

export const noteStore = createStore<NoteState>()((set, get) => {
  // Whether a note in the given folder belongs in the current list
  const isVisible = (folderId: string | null) => {
    const { viewMode, currentFolderId } = get();
    return (
      viewMode === "all" ||
      (viewMode === "unfiled" && folderId === null) ||
      (viewMode === "folder" && folderId === currentFolderId)
    );
  };

  // Drop a note from the list and the selection
  const removeFromList = (id: string) => {
    set((state) => ({
      notes: state.notes.filter((n) => n.id !== id),
      selectedNoteId: state.selectedNoteId === id ? null : state.selectedNoteId,
    }));
  };

  return {
    // Initial state
    notes: [],
    selectedNoteId: null,
    isLoading: false,
    error: null,
    viewMode: "all",
    currentFolderId: null,

    // Fetch all notes
    fetchAllNotes: async () => {
      set({ isLoading: true, error: null, viewMode: "all", currentFolderId: null });
      try {
        const notes = await api.getAllNotes();
        set({ notes, isLoading: false });
      } catch (error) {
        set({ error: String(error), isLoading: false });
      }
    },

    // Fetch unfiled notes (notes with no folder)
    fetchUnfiledNotes: async () => {
      set({ isLoading: true, error: null, viewMode: "unfiled", currentFolderId: null });
      try {
        const notes = await api.getNotesInFolder(null);
        set({ notes, isLoading: false });
      } catch (error) {
        set({ error: String(error), isLoading: false });
      }
    },

    // Fetch notes in a specific folder
    fetchNotesInFolder: async (folderId: string) => {
      set({ isLoading: true, error: null, viewMode: "folder", currentFolderId: folderId });
      try {
        const notes = await api.getNotesInFolder(folderId);
        set({ notes, isLoading: false });
      } catch (error) {
        set({ error: String(error), isLoading: false });
      }
    },

    refresh: async () => {
      const { viewMode, currentFolderId } = get();
      if (viewMode === "folder" && currentFolderId) {
        return get().fetchNotesInFolder(currentFolderId);
      }
      if (viewMode === "unfiled") return get().fetchUnfiledNotes();
      return get().fetchAllNotes();
    },

    selectNote: (id: string | null) => {
      set({ selectedNoteId: id });
    },

    // Create a new note and select it
    createNote: async (input: CreateNoteInput) => {
      set({ isLoading: true, error: null });
      try {
        const note = await api.createNote(input);
        const shouldAddToList = isVisible(note.folderId);

        set((state) => ({
          notes: shouldAddToList ? [note, ...state.notes] : state.notes,
          selectedNoteId: note.id,
          isLoading: false,
        }));
        return note;
      } catch (error) {
        set({ error: String(error), isLoading: false });
        throw error;
      }
    },

    // Update an existing note; edited notes move to the top of the list
    updateNote: async (id: string, updates: UpdateNoteInput) => {
      set({ error: null });
      try {
        const updatedNote = await api.updateNote(id, updates);
        set((state) => {
          const current = state.notes.find((n) => n.id === id);
          if (!current) return {};
          if (current.updatedAt === updatedNote.updatedAt) {
            return { notes: state.notes.map((n) => (n.id === id ? updatedNote : n)) };
          }
          return { notes: [updatedNote, ...state.notes.filter((n) => n.id !== id)] };
        });
        return updatedNote;
      } catch (error) {
        set({ error: String(error) });
        throw error;
      }
    },

    // Move a note to a different folder
    moveNoteToFolder: async (noteId: string, folderId: string | null) => {
      set({ error: null });
      try {
        const updatedNote = await api.moveNoteToFolder(noteId, folderId);

        // Update the note in the list, or remove it if it's no longer visible
        if (isVisible(updatedNote.folderId)) {
          set((state) => ({
            notes: state.notes.map((n) => (n.id === noteId ? updatedNote : n)),
          }));
        } else {
          set((state) => ({ notes: state.notes.filter((n) => n.id !== noteId) }));
        }
      } catch (error) {
        set({ error: String(error) });
        throw error;
      }
    },

    trashNote: async (id: string) => {
      set({ error: null });
      try {
        await api.trashNote(id);
        removeFromList(id);
        await reminderStore.getState().syncScheduled();
      } catch (error) {
        set({ error: String(error) });
        throw error;
      }
    },

    // Restore from the trash; the note reappears if the current view shows it
    restoreNote: async (id: string) => {
      set({ error: null });
      try {
        const note = await api.restoreNote(id);
        await reminderStore.getState().syncScheduled();
        if (isVisible(note.folderId) && !get().notes.some((n) => n.id === id)) {
          await get().refresh();
        }
        return note;
      } catch (error) {
        set({ error: String(error) });
        throw error;
      }
    },

    // Delete a note permanently
    deleteNote: async (id: string) => {
      set({ error: null });
      try {
        await api.deleteNote(id);
        removeFromList(id);
        await reminderStore.getState().syncScheduled();
      } catch (error) {
        set({ error: String(error) });
        throw error;
      }
    },

    // Clear error
    clearError: () => set({ error: null }),
  };
});

// Selector for the currently selected note
export const selectSelectedNote = (state: NoteState): Note | null =>
  state.notes.find((n) => n.id === state.selectedNoteId) ?? null;
