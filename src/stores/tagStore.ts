import { createStore } from "zustand/vanilla";
import type { Note, Tag } from "../types/note";
import * as api from "../lib/api";

export interface TagState {
  // State
  tags: Tag[];
  /** Tags per note, filled by fetchNoteTags */
  tagsByNote: Record<string, Tag[]>;
  isLoading: boolean;
  error: string | null;

  // Actions
  fetchTags: () => Promise<void>;
  fetchNoteTags: (noteId: string) => Promise<Tag[]>;
  searchTags: (query: string) => Promise<Tag[]>;
  getTagNotes: (tagId: string) => Promise<Note[]>;
  createTag: (name: string) => Promise<Tag>;
  addTagToNote: (noteId: string, tagName: string) => Promise<Tag>;
  removeTagFromNote: (noteId: string, tagId: string) => Promise<void>;
  renameTag: (tagId: string, name: string) => Promise<Tag>;
  deleteTag: (tagId: string) => Promise<void>;
  clearError: () => void;
}

const byName = (a: Tag, b: Tag) => a.name.localeCompare(b.name);

function upsert(tags: Tag[], tag: Tag): Tag[] {
  return [...tags.filter((t) => t.id !== tag.id), tag].sort(byName);
}

export const tagStore = createStore<TagState>()((set) => ({
  tags: [],
  tagsByNote: {},
  isLoading: false,
  error: null,

  fetchTags: async () => {
    set({ isLoading: true, error: null });
    try {
      const tags = await api.getAllTags();
      set({ tags, isLoading: false });
    } catch (error) {
      set({ error: String(error), isLoading: false });
    }
  },

  fetchNoteTags: async (noteId: string) => {
    try {
      const tags = await api.getNoteTags(noteId);
      set((state) => ({ tagsByNote: { ...state.tagsByNote, [noteId]: tags } }));
      return tags;
    } catch (error) {
      set({ error: String(error) });
      return [];
    }
  },

  searchTags: async (query: string) => {
    try {
      return await api.searchTags(query);
    } catch (error) {
      set({ error: String(error) });
      return [];
    }
  },

  getTagNotes: async (tagId: string) => {
    try {
      return await api.getTagNotes(tagId);
    } catch (error) {
      set({ error: String(error) });
      return [];
    }
  },

  // Returns the existing tag when one with the same name exists
  createTag: async (name: string) => {
    set({ error: null });
    try {
      const tag = await api.createTag(name);
      set((state) => ({ tags: upsert(state.tags, tag) }));
      return tag;
    } catch (error) {
      set({ error: String(error) });
      throw error;
    }
  },

  // Tag a note, creating the tag if needed
  addTagToNote: async (noteId: string, tagName: string) => {
    set({ error: null });
    try {
      const tag = await api.addTagToNote(noteId, tagName);
      set((state) => ({
        tags: upsert(state.tags, tag),
        tagsByNote: {
          ...state.tagsByNote,
          [noteId]: upsert(state.tagsByNote[noteId] ?? [], tag),
        },
      }));
      return tag;
    } catch (error) {
      set({ error: String(error) });
      throw error;
    }
  },

  removeTagFromNote: async (noteId: string, tagId: string) => {
    set({ error: null });
    try {
      await api.removeTagFromNote(noteId, tagId);
      set((state) => ({
        tagsByNote: {
          ...state.tagsByNote,
          [noteId]: (state.tagsByNote[noteId] ?? []).filter((t) => t.id !== tagId),
        },
      }));
    } catch (error) {
      set({ error: String(error) });
      throw error;
    }
  },

  renameTag: async (tagId: string, name: string) => {
    set({ error: null });
    try {
      const tag = await api.renameTag(tagId, name);
      set((state) => ({
        tags: upsert(state.tags, tag),
        tagsByNote: Object.fromEntries(
          Object.entries(state.tagsByNote).map(([noteId, tags]) => [
            noteId,
            tags.some((t) => t.id === tagId) ? upsert(tags, tag) : tags,
          ]),
        ),
      }));
      return tag;
    } catch (error) {
      set({ error: String(error) });
      throw error;
    }
  },

  // Deleting a tag only removes it from notes; the notes stay
  deleteTag: async (tagId: string) => {
    set({ error: null });
    try {
      await api.deleteTag(tagId);
      set((state) => ({
        tags: state.tags.filter((t) => t.id !== tagId),
        tagsByNote: Object.fromEntries(
          Object.entries(state.tagsByNote).map(([noteId, tags]) => [
            noteId,
            tags.filter((t) => t.id !== tagId),
          ]),
        ),
      }));
    } catch (error) {
      set({ error: String(error) });
      throw error;
    }
  },

  clearError: () => set({ error: null }),
}));
