/**
 * The in-process backend: one database and the repositories over it
 */
import { DEFAULT_REMINDER_OFFSET_MS } from "../lib/reminders";
import { type Clock, type Db, openDatabase, systemClock } from "./db";
import { FolderRepository } from "./folders";
import { ImageRepository } from "./images";
import { NoteRepository } from "./notes";
import { ReminderRepository } from "./reminders";
import { SearchRepository } from "./search";
import { TagRepository } from "./tags";
import { TrashRepository } from "./trash";

export interface BackendOptions {
  /** SQLite file path, or ":memory:" */
  databasePath: string;
  clock?: Clock;
  /** Lead time for reminders created without a date */
  reminderOffsetMs?: number;
}

export class Backend {
  readonly db: Db;
  readonly clock: Clock;
  readonly folders: FolderRepository;
  readonly notes: NoteRepository;
  readonly tags: TagRepository;
  readonly images: ImageRepository;
  readonly reminders: ReminderRepository;
  readonly search: SearchRepository;
  readonly trash: TrashRepository;

  constructor(options: BackendOptions) {
    this.db = openDatabase(options.databasePath);
    this.clock = options.clock ?? systemClock;
    this.folders = new FolderRepository(this.db, this.clock);
    this.notes = new NoteRepository(this.db, this.clock, this.folders);
    this.tags = new TagRepository(this.db, this.clock);
    this.images = new ImageRepository(this.db, this.clock);
    this.reminders = new ReminderRepository(
      this.db,
      this.clock,
      options.reminderOffsetMs ?? DEFAULT_REMINDER_OFFSET_MS,
    );
    this.search = new SearchRepository(this.db, this.tags);
    this.trash = new TrashRepository(this.db, this.notes, this.folders);
  }

  close(): void {
    if (this.db.open) this.db.close();
  }
}
