/**
 * Typed wrappers for backend commands
 */
import { invoke } from "./ipc";
import type {
  Note,
  Folder,
  Tag,
  NoteImage,
  CreateNoteInput,
  UpdateNoteInput,
  CreateFolderInput,
} from "../types/note";
import type {
  Reminder,
  CreateReminderInput,
  UpdateReminderInput,
} from "../types/reminder";
import type { EmptyTrashResult } from "../backend/trash";

export type { EmptyTrashResult };

// ============================================================================
// Note Commands
// ============================================================================

/**
 * Create a new note
 */
export async function createNote(input: CreateNoteInput): Promise<Note> {
  return invoke("create_note", {
    title: input.title,
    content: input.content ?? null,
    richContent: input.richContent ?? null,
    folderId: input.folderId ?? null,
  });
}

/**
 * Get a note by ID
 */
export async function getNote(id: string): Promise<Note | null> {
  return invoke("get_note", { id });
}

/**
 * Get all notes outside the trash
 */
export async function getAllNotes(): Promise<Note[]> {
  return invoke("get_all_notes", {});
}

/**
 * Get notes in a specific folder (or unfiled notes if folderId is null)
 */
export async function getNotesInFolder(folderId: string | null): Promise<Note[]> {
  return invoke("get_notes_in_folder", { folderId });
}

/**
 * Update an existing note; fields left undefined are unchanged
 */
export async function updateNote(id: string, input: UpdateNoteInput): Promise<Note> {
  return invoke("update_note", { id, ...input });
}

/**
 * Move a note to a different folder (or to unfiled if folderId is null)
 */
export async function moveNoteToFolder(
  noteId: string,
  folderId: string | null,
): Promise<Note> {
  return invoke("move_note_to_folder", { noteId, folderId });
}

/**
 * Move a note to the trash
 */
export async function trashNote(id: string): Promise<Note> {
  return invoke("trash_note", { id });
}

/**
 * Restore a note from the trash
 */
export async function restoreNote(id: string): Promise<Note> {
  return invoke("restore_note", { id });
}

/**
 * Permanently delete a note
 */
export async function deleteNote(id: string): Promise<boolean> {
  return invoke("delete_note", { id });
}

export async function getTrashedNotes(): Promise<Note[]> {
  return invoke("get_trashed_notes", {});
}

// ============================================================================
// Folder Commands
// ============================================================================

/**
 * Create a new folder
 */
export async function createFolder(input: CreateFolderInput): Promise<Folder> {
  return invoke("create_folder", {
    name: input.name,
    parentId: input.parentId ?? null,
  });
}

/**
 * Get a folder by ID
 */
export async function getFolder(id: string): Promise<Folder | null> {
  return invoke("get_folder", { id });
}

/**
 * Get all folders outside the trash
 */
export async function getAllFolders(): Promise<Folder[]> {
  return invoke("get_all_folders", {});
}

export async function getRootFolders(): Promise<Folder[]> {
  return invoke("get_child_folders", { parentId: null });
}

/**
 * Get child folders of a parent (or root folders if parentId is null)
 */
export async function getChildFolders(parentId: string | null): Promise<Folder[]> {
  return invoke("get_child_folders", { parentId });
}

export async function renameFolder(id: string, name: string): Promise<Folder> {
  return invoke("rename_folder", { id, name });
}

/**
 * Move a folder under a new parent (or to the root if parentId is null)
 */
export async function moveFolder(id: string, parentId: string | null): Promise<Folder> {
  return invoke("move_folder", { id, parentId });
}

/**
 * Folders a folder can be moved into (excludes itself and its subfolders)
 */
export async function getAvailableTargetFolders(id: string): Promise<Folder[]> {
  return invoke("get_available_target_folders", { id });
}

export async function getFolderPath(id: string): Promise<string> {
  return invoke("get_folder_path", { id });
}

/**
 * Move a folder, its subfolders and their notes to the trash
 */
export async function trashFolder(id: string): Promise<boolean> {
  return invoke("trash_folder", { id });
}

/**
 * Restore a folder (and its trashed parents) from the trash
 */
export async function restoreFolder(id: string): Promise<Folder> {
  return invoke("restore_folder", { id });
}

/**
 * Permanently delete a folder with everything in it
 */
export async function deleteFolder(id: string): Promise<boolean> {
  return invoke("delete_folder", { id });
}

export async function getTrashedFolders(): Promise<Folder[]> {
  return invoke("get_trashed_folders", {});
}

// ============================================================================
// Trash Commands
// ============================================================================

export async function getTrashItemCount(): Promise<number> {
  return invoke("get_trash_item_count", {});
}

/**
 * Permanently delete everything in the trash
 */
export async function emptyTrash(): Promise<EmptyTrashResult> {
  return invoke("empty_trash", {});
}

// ============================================================================
// Tag Commands
// ============================================================================

/**
 * Get all tags
 */
export async function getAllTags(): Promise<Tag[]> {
  return invoke("get_all_tags", {});
}

/**
 * Search tags by name
 */
export async function searchTags(query: string): Promise<Tag[]> {
  return invoke("search_tags", { query });
}

/**
 * Get tags for a specific note
 */
export async function getNoteTags(noteId: string): Promise<Tag[]> {
  return invoke("get_note_tags", { noteId });
}

/**
 * Get the notes carrying a tag
 */
export async function getTagNotes(tagId: string): Promise<Note[]> {
  return invoke("get_tag_notes", { tagId });
}

/**
 * Create a new tag (returns the existing tag if the name is taken)
 */
export async function createTag(name: string): Promise<Tag> {
  return invoke("create_tag", { name });
}

/**
 * Add a tag to a note (creates the tag if it doesn't exist)
 */
export async function addTagToNote(noteId: string, tagName: string): Promise<Tag> {
  return invoke("add_tag_to_note", { noteId, tagName });
}

/**
 * Remove a tag from a note
 */
export async function removeTagFromNote(noteId: string, tagId: string): Promise<boolean> {
  return invoke("remove_tag_from_note", { noteId, tagId });
}

/**
 * Delete a tag entirely
 */
export async function deleteTag(tagId: string): Promise<boolean> {
  return invoke("delete_tag", { tagId });
}

export async function renameTag(tagId: string, name: string): Promise<Tag> {
  return invoke("rename_tag", { tagId, name });
}

// ============================================================================
// Image Commands
// ============================================================================

export async function addImageToNote(
  noteId: string,
  data: Uint8Array,
  mimeType?: string | null,
): Promise<NoteImage> {
  return invoke("add_image_to_note", { noteId, data, mimeType: mimeType ?? null });
}

export async function getNoteImages(noteId: string): Promise<NoteImage[]> {
  return invoke("get_note_images", { noteId });
}

export async function getImage(id: string): Promise<NoteImage | null> {
  return invoke("get_image", { id });
}

export async function deleteImage(id: string): Promise<boolean> {
  return invoke("delete_image", { id });
}

// ============================================================================
// Reminder Commands
// ============================================================================

/**
 * Create a reminder on a note (defaults to one hour from now, no repeat)
 */
export async function createReminder(
  noteId: string,
  input: CreateReminderInput,
): Promise<Reminder> {
  return invoke("create_reminder", {
    noteId,
    title: input.title,
    reminderDate: input.reminderDate ?? null,
    repeatType: input.repeatType ?? "none",
  });
}

export async function updateReminder(
  id: string,
  input: UpdateReminderInput,
): Promise<Reminder> {
  return invoke("update_reminder", { id, ...input });
}

export async function deleteReminder(id: string): Promise<boolean> {
  return invoke("delete_reminder", { id });
}

export async function getReminder(id: string): Promise<Reminder | null> {
  return invoke("get_reminder", { id });
}

export async function getNoteReminders(noteId: string): Promise<Reminder[]> {
  return invoke("get_note_reminders", { noteId });
}

export async function getActiveReminders(): Promise<Reminder[]> {
  return invoke("get_active_reminders", {});
}

/**
 * Active reminders due within the given window from now
 */
export async function getUpcomingReminders(windowMs: number): Promise<Reminder[]> {
  return invoke("get_upcoming_reminders", { windowMs });
}

export async function getOverdueReminders(): Promise<Reminder[]> {
  return invoke("get_overdue_reminders", {});
}

/**
 * Move a repeating reminder to its next occurrence (after `firedAt`, when given)
 */
export async function advanceReminder(
  id: string,
  firedAt: string | null = null,
): Promise<Reminder> {
  return invoke("advance_reminder", { id, firedAt });
}
