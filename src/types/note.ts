/**
 * A note stored on the shelf
 */
export interface Note {
  id: string;
  title: string;
  content: string | null;
  /** Rendered rich content (UTF-8 HTML), if any */
  richContent: Uint8Array | null;
  folderId: string | null;
  createdAt: string;
  updatedAt: string;
  isInTrash: boolean;
}

/**
 * Input for creating a new note
 */
export interface CreateNoteInput {
  title: string;
  content?: string | null;
  richContent?: Uint8Array | null;
  folderId?: string | null;
}

/**
 * Input for updating an existing note
 *
 * Omitted fields are left untouched.
 */
export interface UpdateNoteInput {
  title?: string;
  content?: string | null;
  richContent?: Uint8Array | null;
}

/**
 * A folder for organizing notes
 */
export interface Folder {
  id: string;
  name: string;
  parentId: string | null;
  createdAt: string;
  isInTrash: boolean;
}

/**
 * Input for creating a new folder
 */
export interface CreateFolderInput {
  name: string;
  parentId?: string | null;
}

/**
 * A tag for categorizing notes
 */
export interface Tag {
  id: string;
  name: string;
  createdAt: string;
}

/**
 * An image attached to a note
 */
export interface NoteImage {
  id: string;
  noteId: string | null;
  data: Uint8Array;
  mimeType: string | null;
  createdAt: string;
}
