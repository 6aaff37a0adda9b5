/**
 * Local notification scheduling for reminders
 *
 * One timer per active reminder. Timers are unref'd: a pending reminder never
 * keeps the process alive on its own.
 */
import type { Reminder } from "../types/reminder";
import { nextReminderDate } from "./reminders";

/** Largest delay setTimeout accepts (~24.8 days); longer waits are chained */
const MAX_TIMER_DELAY_MS = 2 ** 31 - 1;

export interface ReminderNotification {
  /** `reminder-<reminder id>` */
  identifier: string;
  reminderId: string;
  noteId: string | null;
  title: string;
  /** Title of the note the reminder belongs to, when known */
  noteTitle: string | null;
  fireAt: string;
}

export type ReminderListener = (notification: ReminderNotification) => void;
export type UnlistenFn = () => void;

interface ScheduledEntry {
  notification: ReminderNotification;
  timer: NodeJS.Timeout;
}

export interface ReminderSchedulerOptions {
  now?: () => Date;
}

export function notificationIdentifier(reminderId: string): string {
  return `reminder-${reminderId}`;
}

export class ReminderScheduler {
  private readonly scheduled = new Map<string, ScheduledEntry>();
  private readonly listeners = new Set<ReminderListener>();
  private readonly now: () => Date;

  constructor(options: ReminderSchedulerOptions = {}) {
    this.now = options.now ?? (() => new Date());
  }

  /**
   * Subscribe to fired reminders
   */
  listen(listener: ReminderListener): UnlistenFn {
    this.listeners.add(listener);
    return () => {
      this.listeners.delete(listener);
    };
  }

  /**
   * Schedule (or reschedule) a reminder. Returns the time it will fire, or
   * null when nothing was scheduled: inactive reminders, and one-off
   * reminders whose date has passed.
   */
  schedule(reminder: Reminder, noteTitle: string | null = null): Date | null {
    this.cancel(reminder.id);
    if (!reminder.isActive) return null;

    const fireAt = this.resolveFireDate(reminder);
    if (!fireAt) return null;

    const notification: ReminderNotification = {
      identifier: notificationIdentifier(reminder.id),
      reminderId: reminder.id,
      noteId: reminder.noteId,
      title: reminder.title,
      noteTitle,
      fireAt: fireAt.toISOString(),
    };
    this.arm(notification, fireAt);
    return fireAt;
  }

  cancel(reminderId: string): boolean {
    const entry = this.scheduled.get(reminderId);
    if (!entry) return false;
    clearTimeout(entry.timer);
    this.scheduled.delete(reminderId);
    return true;
  }

  cancelAll(): void {
    for (const entry of this.scheduled.values()) {
      clearTimeout(entry.timer);
    }
    this.scheduled.clear();
  }

  /**
   * Drop every pending notification and schedule the given reminders afresh
   */
  rescheduleAll(
    reminders: Reminder[],
    noteTitles: ReadonlyMap<string, string> = new Map(),
  ): number {
    this.cancelAll();
    let count = 0;
    for (const reminder of reminders) {
      const title = reminder.noteId ? (noteTitles.get(reminder.noteId) ?? null) : null;
      if (this.schedule(reminder, title)) count++;
    }
    console.log(`[ReminderScheduler] Scheduled ${count} of ${reminders.length} reminders`);
    return count;
  }

  isScheduled(reminderId: string): boolean {
    return this.scheduled.has(reminderId);
  }

  /** Pending notifications, soonest first */
  pending(): ReminderNotification[] {
    return [...this.scheduled.values()]
      .map((entry) => entry.notification)
      .sort((a, b) => a.fireAt.localeCompare(b.fireAt));
  }

  dispose(): void {
    this.cancelAll();
    this.listeners.clear();
  }

  /**
   * A repeating reminder whose date has passed (or is due this instant, as
   * when it has just fired) fires at its next future occurrence instead.
   */
  private resolveFireDate(reminder: Reminder): Date | null {
    const now = this.now().getTime();
    let fireAt: Date | null = new Date(reminder.reminderDate);
    if (Number.isNaN(fireAt.getTime())) return null;

    const repeats = reminder.repeatType !== "none";
    while (fireAt && (repeats ? fireAt.getTime() <= now : fireAt.getTime() < now)) {
      fireAt = nextReminderDate(reminder.repeatType, fireAt);
    }
    return fireAt;
  }

  private arm(notification: ReminderNotification, fireAt: Date): void {
    const delay = fireAt.getTime() - this.now().getTime();
    const wait = Math.min(Math.max(delay, 0), MAX_TIMER_DELAY_MS);

    const timer = setTimeout(() => {
      if (delay > MAX_TIMER_DELAY_MS) {
        this.arm(notification, fireAt);
        return;
      }
      this.scheduled.delete(notification.reminderId);
      this.emit(notification);
    }, wait);
    timer.unref();

    this.scheduled.set(notification.reminderId, { notification, timer });
  }

  private emit(notification: ReminderNotification): void {
    for (const listener of this.listeners) {
      try {
        listener(notification);
      } catch (error) {
        console.error("[ReminderScheduler] Listener failed:", error);
      }
    }
  }
}
