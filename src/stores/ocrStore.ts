import { createStore } from "zustand/vanilla";
import type { Note } from "../types/note";
import { recognizeText } from "../lib/ocr";
import { renderPlainText } from "../lib/richText";
import { noteStore } from "./noteStore";
import { settingsStore } from "./settingsStore";

export const DEFAULT_OCR_NOTE_TITLE = "OCR Scan";

export interface OcrResult {
  text: string;
  image: Uint8Array;
}

export interface OcrState {
  // State
  isProcessing: boolean;
  result: OcrResult | null;
  error: string | null;

  // Actions
  /** Recognize text in an image; returns null (and sets error) on failure */
  extractText: (image: Uint8Array) => Promise<string | null>;
  /** Replace the recognized text, e.g. after the user corrects it */
  editResultText: (text: string) => void;
  createNoteFromResult: (title?: string, folderId?: string | null) => Promise<Note>;
  reset: () => void;
}

export const ocrStore = createStore<OcrState>()((set, get) => ({
  isProcessing: false,
  result: null,
  error: null,

  extractText: async (image: Uint8Array) => {
    set({ isProcessing: true, error: null, result: null });
    try {
      const text = await recognizeText(image, {
        languages: settingsStore.getState().ocrLanguages,
      });
      set({ result: { text, image }, isProcessing: false });
      return text;
    } catch (error) {
      const message = error instanceof Error ? error.message : String(error);
      console.warn("[OCR]", message);
      set({ error: message, isProcessing: false });
      return null;
    }
  },

  editResultText: (text: string) => {
    const { result } = get();
    if (result) set({ result: { ...result, text } });
  },

  // Create a note holding the recognized text
  createNoteFromResult: async (title: string = DEFAULT_OCR_NOTE_TITLE, folderId: string | null = null) => {
    const { result } = get();
    if (!result || !result.text.trim()) {
      const message = "No recognized text to save";
      set({ error: message });
      throw new Error(message);
    }

    set({ error: null });
    try {
      const note = await noteStore.getState().createNote({
        title: title.trim() || DEFAULT_OCR_NOTE_TITLE,
        content: result.text,
        richContent: await renderPlainText(result.text),
        folderId,
      });
      set({ result: null });
      return note;
    } catch (error) {
      const message = error instanceof Error ? error.message : String(error);
      set({ error: message });
      throw error;
    }
  },

  reset: () => set({ isProcessing: false, result: null, error: null }),
}));
