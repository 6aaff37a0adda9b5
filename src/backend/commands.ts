/**
 * Command table: every operation the stores can ask of the backend, keyed by
 * command name, with its argument and result types.
 */
import type { Folder, Note, NoteImage, Tag } from "../types/note";
import type { Reminder, RepeatType } from "../types/reminder";
import type { Backend } from "./backend";
import type { SearchMode, SearchPage } from "./search";
import type { EmptyTrashResult } from "./trash";

type NoArgs = Record<string, never>;

export interface CommandMap {
  // Notes
  create_note: {
    args: {
      title: string;
      content: string | null;
      richContent: Uint8Array | null;
      folderId: string | null;
    };
    result: Note;
  };
  get_note: { args: { id: string }; result: Note | null };
  get_all_notes: { args: NoArgs; result: Note[] };
  get_notes_in_folder: { args: { folderId: string | null }; result: Note[] };
  update_note: {
    args: {
      id: string;
      title?: string;
      content?: string | null;
      richContent?: Uint8Array | null;
    };
    result: Note;
  };
  move_note_to_folder: { args: { noteId: string; folderId: string | null }; result: Note };
  trash_note: { args: { id: string }; result: Note };
  restore_note: { args: { id: string }; result: Note };
  delete_note: { args: { id: string }; result: boolean };
  get_trashed_notes: { args: NoArgs; result: Note[] };

  // Folders
  create_folder: { args: { name: string; parentId: string | null }; result: Folder };
  get_folder: { args: { id: string }; result: Folder | null };
  get_all_folders: { args: NoArgs; result: Folder[] };
  get_child_folders: { args: { parentId: string | null }; result: Folder[] };
  rename_folder: { args: { id: string; name: string }; result: Folder };
  move_folder: { args: { id: string; parentId: string | null }; result: Folder };
  get_available_target_folders: { args: { id: string }; result: Folder[] };
  get_folder_path: { args: { id: string }; result: string };
  trash_folder: { args: { id: string }; result: boolean };
  restore_folder: { args: { id: string }; result: Folder };
  delete_folder: { args: { id: string }; result: boolean };
  get_trashed_folders: { args: NoArgs; result: Folder[] };

  // Trash
  get_trash_item_count: { args: NoArgs; result: number };
  empty_trash: { args: NoArgs; result: EmptyTrashResult };

  // Tags
  create_tag: { args: { name: string }; result: Tag };
  get_all_tags: { args: NoArgs; result: Tag[] };
  search_tags: { args: { query: string }; result: Tag[] };
  get_note_tags: { args: { noteId: string }; result: Tag[] };
  get_tag_notes: { args: { tagId: string }; result: Note[] };
  add_tag_to_note: { args: { noteId: string; tagName: string }; result: Tag };
  remove_tag_from_note: { args: { noteId: string; tagId: string }; result: boolean };
  rename_tag: { args: { tagId: string; name: string }; result: Tag };
  delete_tag: { args: { tagId: string }; result: boolean };

  // Images
  add_image_to_note: {
    args: { noteId: string; data: Uint8Array; mimeType: string | null };
    result: NoteImage;
  };
  get_note_images: { args: { noteId: string }; result: NoteImage[] };
  get_image: { args: { id: string }; result: NoteImage | null };
  delete_image: { args: { id: string }; result: boolean };

  // Reminders
  create_reminder: {
    args: {
      noteId: string;
      title: string;
      reminderDate: string | null;
      repeatType: RepeatType;
    };
    result: Reminder;
  };
  update_reminder: {
    args: {
      id: string;
      title: string;
      reminderDate: string;
      isActive: boolean;
      repeatType: RepeatType;
    };
    result: Reminder;
  };
  delete_reminder: { args: { id: string }; result: boolean };
  get_reminder: { args: { id: string }; result: Reminder | null };
  get_note_reminders: { args: { noteId: string }; result: Reminder[] };
  get_active_reminders: { args: NoArgs; result: Reminder[] };
  get_upcoming_reminders: { args: { windowMs: number }; result: Reminder[] };
  get_overdue_reminders: { args: NoArgs; result: Reminder[] };
  advance_reminder: { args: { id: string; firedAt?: string | null }; result: Reminder };

  // Search
  search_notes: {
    args: { query: string; mode: SearchMode; limit: number };
    result: SearchPage;
  };
  get_search_suggestions: { args: { query: string }; result: string[] };
}

export type CommandName = keyof CommandMap;

export type CommandHandlers = {
  [K in CommandName]: (args: CommandMap[K]["args"]) => CommandMap[K]["result"];
};

export function createCommandHandlers(backend: Backend): CommandHandlers {
  const { notes, folders, tags, images, reminders, search, trash } = backend;

  return {
    // Notes
    create_note: (args) => notes.create(args),
    get_note: ({ id }) => notes.get(id),
    get_all_notes: () => notes.list(),
    get_notes_in_folder: ({ folderId }) => notes.listInFolder(folderId),
    update_note: ({ id, ...input }) => notes.update(id, input),
    move_note_to_folder: ({ noteId, folderId }) => notes.move(noteId, folderId),
    trash_note: ({ id }) => notes.trash(id),
    restore_note: ({ id }) => notes.restore(id),
    delete_note: ({ id }) => notes.delete(id),
    get_trashed_notes: () => notes.listTrashed(),

    // Folders
    create_folder: ({ name, parentId }) => folders.create(name, parentId),
    get_folder: ({ id }) => folders.get(id),
    get_all_folders: () => folders.list(),
    get_child_folders: ({ parentId }) => folders.listChildren(parentId),
    rename_folder: ({ id, name }) => folders.rename(id, name),
    move_folder: ({ id, parentId }) => folders.move(id, parentId),
    get_available_target_folders: ({ id }) => folders.availableTargets(id),
    get_folder_path: ({ id }) => folders.path(id),
    trash_folder: ({ id }) => {
      folders.trash(id);
      return true;
    },
    restore_folder: ({ id }) => folders.restore(id),
    delete_folder: ({ id }) => folders.delete(id),
    get_trashed_folders: () => folders.listTrashed(),

    // Trash
    get_trash_item_count: () => trash.count(),
    empty_trash: () => trash.empty(),

    // Tags
    create_tag: ({ name }) => tags.create(name),
    get_all_tags: () => tags.list(),
    search_tags: ({ query }) => (query ? tags.search(query) : tags.list()),
    get_note_tags: ({ noteId }) => tags.listForNote(noteId),
    get_tag_notes: ({ tagId }) => tags.listNotes(tagId),
    add_tag_to_note: ({ noteId, tagName }) => tags.addToNote(noteId, tagName),
    remove_tag_from_note: ({ noteId, tagId }) => tags.removeFromNote(noteId, tagId),
    rename_tag: ({ tagId, name }) => tags.rename(tagId, name),
    delete_tag: ({ tagId }) => tags.delete(tagId),

    // Images
    add_image_to_note: ({ noteId, data, mimeType }) => images.add(noteId, data, mimeType),
    get_note_images: ({ noteId }) => images.listForNote(noteId),
    get_image: ({ id }) => images.get(id),
    delete_image: ({ id }) => images.delete(id),

    // Reminders
    create_reminder: ({ noteId, ...input }) => reminders.create(noteId, input),
    update_reminder: ({ id, ...input }) => reminders.update(id, input),
    delete_reminder: ({ id }) => reminders.delete(id),
    get_reminder: ({ id }) => reminders.get(id),
    get_note_reminders: ({ noteId }) => reminders.listForNote(noteId),
    get_active_reminders: () => reminders.listActive(),
    get_upcoming_reminders: ({ windowMs }) => reminders.listUpcoming(windowMs),
    get_overdue_reminders: () => reminders.listOverdue(),
    advance_reminder: ({ id, firedAt }) => reminders.advance(id, firedAt ?? null),

    // Search
    search_notes: ({ query, mode, limit }) => search.search(query, mode, limit),
    get_search_suggestions: ({ query }) => search.suggestions(query),
  };
}
