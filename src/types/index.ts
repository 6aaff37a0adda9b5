export type {
  Note,
  CreateNoteInput,
  UpdateNoteInput,
  Folder,
  CreateFolderInput,
  Tag,
  NoteImage,
} from "./note";

export type {
  RepeatType,
  Reminder,
  CreateReminderInput,
  UpdateReminderInput,
} from "./reminder";

export { REPEAT_TYPES, REPEAT_TYPE_LABELS, isRepeatType } from "./reminder";
