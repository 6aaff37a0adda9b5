/**
 * Reminder date rules
 *
 * All calendar arithmetic is done in local time, so "every day at 9:00"
 * stays at 9:00 across DST changes.
 */
import type { Reminder, RepeatType } from "../types/reminder";

const MINUTE_MS = 60 * 1000;
const HOUR_MS = 60 * MINUTE_MS;
const DAY_MS = 24 * HOUR_MS;

/** Default lead time for a new reminder */
export const DEFAULT_REMINDER_OFFSET_MS = HOUR_MS;

/** Window used for "upcoming" reminders */
export const UPCOMING_WINDOW_MS = DAY_MS;

function addDays(date: Date, days: number): Date {
  const next = new Date(date);
  next.setDate(next.getDate() + days);
  return next;
}

/** Add months, clamping to the last day of the target month (Jan 31 + 1 -> Feb 28/29) */
function addMonths(date: Date, months: number): Date {
  const next = new Date(date);
  const day = next.getDate();
  next.setDate(1);
  next.setMonth(next.getMonth() + months);
  const lastDay = new Date(next.getFullYear(), next.getMonth() + 1, 0).getDate();
  next.setDate(Math.min(day, lastDay));
  return next;
}

/**
 * Compute when a repeating reminder fires next, or null for one-off reminders
 */
export function nextReminderDate(repeatType: RepeatType, after: Date): Date | null {
  switch (repeatType) {
    case "none":
      return null;
    case "daily":
      return addDays(after, 1);
    case "weekly":
      return addDays(after, 7);
    case "monthly":
      return addMonths(after, 1);
    case "yearly":
      return addMonths(after, 12);
    case "weekdays": {
      const next = addDays(after, 1);
      const day = next.getDay();
      if (day === 6) return addDays(next, 2); // Saturday -> Monday
      if (day === 0) return addDays(next, 1); // Sunday -> Monday
      return next;
    }
    case "weekends": {
      const next = addDays(after, 1);
      const day = next.getDay();
      // Monday..Friday -> the coming Saturday
      if (day >= 1 && day <= 5) return addDays(next, 6 - day);
      return next;
    }
  }
}

/**
 * Next occurrence of a reminder after its current date
 */
export function calculateNextReminderDate(reminder: Reminder): Date | null {
  return nextReminderDate(reminder.repeatType, new Date(reminder.reminderDate));
}

export function isOverdue(reminder: Reminder, now: Date = new Date()): boolean {
  return reminder.isActive && new Date(reminder.reminderDate).getTime() < now.getTime();
}

function plural(count: number, unit: string): string {
  return `in ${count} ${unit}${count === 1 ? "" : "s"}`;
}

/**
 * Human-readable time left until a reminder, in its largest whole unit
 */
export function timeRemainingDescription(reminder: Reminder, now: Date = new Date()): string {
  const diff = new Date(reminder.reminderDate).getTime() - now.getTime();
  if (diff < 0) return "Overdue";

  const days = Math.floor(diff / DAY_MS);
  if (days > 0) return plural(days, "day");

  const hours = Math.floor(diff / HOUR_MS);
  if (hours > 0) return plural(hours, "hour");

  const minutes = Math.floor(diff / MINUTE_MS);
  if (minutes > 0) return plural(minutes, "minute");

  return "Due soon";
}

/**
 * Parse a user-supplied date string into a canonical ISO string
 */
export function normalizeReminderDate(value: string): string | null {
  const time = Date.parse(value);
  return Number.isNaN(time) ? null : new Date(time).toISOString();
}
