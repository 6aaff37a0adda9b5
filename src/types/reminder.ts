/**
 * How a reminder repeats after it fires
 * - none: fires once
 * - weekdays: next Monday–Friday
 * - weekends: next Saturday or Sunday
 */
export type RepeatType =
  | "none"
  | "daily"
  | "weekly"
  | "monthly"
  | "yearly"
  | "weekdays"
  | "weekends";

export const REPEAT_TYPES: readonly RepeatType[] = [
  "none",
  "daily",
  "weekly",
  "monthly",
  "yearly",
  "weekdays",
  "weekends",
];

export const REPEAT_TYPE_LABELS: Record<RepeatType, string> = {
  none: "Never",
  daily: "Every day",
  weekly: "Every week",
  monthly: "Every month",
  yearly: "Every year",
  weekdays: "Weekdays",
  weekends: "Weekends",
};

/**
 * A reminder attached to a note
 */
export interface Reminder {
  id: string;
  noteId: string | null;
  title: string;
  reminderDate: string; // ISO datetime string
  createdAt: string;
  isActive: boolean;
  repeatType: RepeatType;
}

/**
 * Input for creating a reminder
 */
export interface CreateReminderInput {
  title: string;
  reminderDate?: string | null;
  repeatType?: RepeatType;
}

/**
 * Input for updating a reminder
 */
export interface UpdateReminderInput {
  title: string;
  reminderDate: string;
  isActive: boolean;
  repeatType: RepeatType;
}

const REPEAT_TYPE_NAMES: ReadonlySet<string> = new Set(REPEAT_TYPES);

export function isRepeatType(value: string): value is RepeatType {
  return REPEAT_TYPE_NAMES.has(value);
}
