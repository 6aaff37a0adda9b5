/**
 * Reminder repository
 */
import { randomUUID } from "node:crypto";
import {
  DEFAULT_REMINDER_OFFSET_MS,
  calculateNextReminderDate,
  nextReminderDate,
  normalizeReminderDate,
} from "../lib/reminders";
import {
  type CreateReminderInput,
  type Reminder,
  type UpdateReminderInput,
  isRepeatType,
} from "../types/reminder";
import { type Clock, type Db, toBool } from "./db";
import { invalidInput, notFound } from "./errors";
import { requireNote } from "./notes";

interface ReminderRow {
  id: string;
  note_id: string | null;
  title: string;
  reminder_date: string;
  created_at: string;
  is_active: number;
  repeat_type: string;
}

const COLUMNS = "id, note_id, title, reminder_date, created_at, is_active, repeat_type";
const BY_DATE = "ORDER BY reminder_date, rowid";

function toReminder(row: ReminderRow): Reminder {
  return {
    id: row.id,
    noteId: row.note_id,
    title: row.title,
    reminderDate: row.reminder_date,
    createdAt: row.created_at,
    isActive: toBool(row.is_active),
    // Unknown values from older data fall back to a one-off reminder
    repeatType: isRepeatType(row.repeat_type) ? row.repeat_type : "none",
  };
}

function parseDate(value: string): string {
  const normalized = normalizeReminderDate(value);
  if (!normalized) throw invalidInput(`Invalid reminder date: ${value}`);
  return normalized;
}

export class ReminderRepository {
  constructor(
    private readonly db: Db,
    private readonly clock: Clock,
    private readonly defaultOffsetMs: number = DEFAULT_REMINDER_OFFSET_MS,
  ) {}

  create(noteId: string, input: CreateReminderInput): Reminder {
    requireNote(this.db, noteId);
    const now = this.clock();
    const reminder: Reminder = {
      id: randomUUID(),
      noteId,
      title: input.title,
      reminderDate: input.reminderDate
        ? parseDate(input.reminderDate)
        : new Date(now.getTime() + this.defaultOffsetMs).toISOString(),
      createdAt: now.toISOString(),
      isActive: true,
      repeatType: input.repeatType ?? "none",
    };

    this.db
      .prepare(`INSERT INTO reminders (${COLUMNS}) VALUES (?, ?, ?, ?, ?, 1, ?)`)
      .run(
        reminder.id,
        noteId,
        reminder.title,
        reminder.reminderDate,
        reminder.createdAt,
        reminder.repeatType,
      );
    return reminder;
  }

  get(id: string): Reminder | null {
    const row = this.db
      .prepare<[string], ReminderRow>(`SELECT ${COLUMNS} FROM reminders WHERE id = ?`)
      .get(id);
    return row ? toReminder(row) : null;
  }

  require(id: string): Reminder {
    const reminder = this.get(id);
    if (!reminder) throw notFound("Reminder", id);
    return reminder;
  }

  update(id: string, input: UpdateReminderInput): Reminder {
    const reminder = this.require(id);
    const next: Reminder = {
      ...reminder,
      title: input.title,
      reminderDate: parseDate(input.reminderDate),
      isActive: input.isActive,
      repeatType: input.repeatType,
    };

    this.db
      .prepare(
        "UPDATE reminders SET title = ?, reminder_date = ?, is_active = ?, repeat_type = ? WHERE id = ?",
      )
      .run(next.title, next.reminderDate, next.isActive ? 1 : 0, next.repeatType, id);
    return next;
  }

  delete(id: string): boolean {
    return this.db.prepare("DELETE FROM reminders WHERE id = ?").run(id).changes > 0;
  }

  listForNote(noteId: string): Reminder[] {
    return this.db
      .prepare<[string], ReminderRow>(
        `SELECT ${COLUMNS} FROM reminders WHERE note_id = ? ${BY_DATE}`,
      )
      .all(noteId)
      .map(toReminder);
  }

  listActive(): Reminder[] {
    return this.db
      .prepare<[], ReminderRow>(`SELECT ${COLUMNS} FROM reminders WHERE is_active = 1 ${BY_DATE}`)
      .all()
      .map(toReminder);
  }

  /** Active reminders due between now and now + windowMs (inclusive) */
  listUpcoming(windowMs: number): Reminder[] {
    const now = this.clock();
    const until = new Date(now.getTime() + windowMs);
    return this.db
      .prepare<[string, string], ReminderRow>(
        `SELECT ${COLUMNS} FROM reminders
         WHERE is_active = 1 AND reminder_date >= ? AND reminder_date <= ? ${BY_DATE}`,
      )
      .all(now.toISOString(), until.toISOString())
      .map(toReminder);
  }

  /** Active reminders whose date has passed */
  listOverdue(): Reminder[] {
    return this.db
      .prepare<[string], ReminderRow>(
        `SELECT ${COLUMNS} FROM reminders WHERE is_active = 1 AND reminder_date < ? ${BY_DATE}`,
      )
      .all(this.clock().toISOString())
      .map(toReminder);
  }

  /**
   * Called when a reminder fires: repeating reminders move on to their next
   * date, one-off reminders are returned unchanged. With `firedAt`, the new
   * date is the first occurrence after that instant, so a reminder whose
   * stored date lagged behind catches up in one call.
   */
  advance(id: string, firedAt: string | null = null): Reminder {
    const reminder = this.require(id);
    let next = calculateNextReminderDate(reminder);
    if (!next) return reminder;

    const after = firedAt ? new Date(firedAt).getTime() : Number.NaN;
    while (next && !Number.isNaN(after) && next.getTime() <= after) {
      next = nextReminderDate(reminder.repeatType, next);
    }
    if (!next) return reminder;

    const reminderDate = next.toISOString();
    this.db.prepare("UPDATE reminders SET reminder_date = ? WHERE id = ?").run(reminderDate, id);
    return { ...reminder, reminderDate };
  }
}
