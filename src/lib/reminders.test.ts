import { describe, expect, it } from "vitest";
import type { Reminder } from "../types/reminder";
import {
  isOverdue,
  nextReminderDate,
  normalizeReminderDate,
  timeRemainingDescription,
} from "./reminders";

// Local times; 2025-01-01 is a Wednesday
const at = (day: number, month = 0, year = 2025) => new Date(year, month, day, 9, 0);

function reminder(overrides: Partial<Reminder> = {}): Reminder {
  return {
    id: "r1",
    noteId: "n1",
    title: "Call the plumber",
    reminderDate: "2025-01-01T12:00:00.000Z",
    createdAt: "2025-01-01T00:00:00.000Z",
    isActive: true,
    repeatType: "none",
    ...overrides,
  };
}

describe("nextReminderDate", () => {
  it("returns null for one-off reminders", () => {
    expect(nextReminderDate("none", at(1))).toBeNull();
  });

  it("adds a day, a week, a month or a year", () => {
    expect(nextReminderDate("daily", at(1))).toEqual(at(2));
    expect(nextReminderDate("weekly", at(1))).toEqual(at(8));
    expect(nextReminderDate("monthly", at(15))).toEqual(at(15, 1));
    expect(nextReminderDate("yearly", at(15))).toEqual(at(15, 0, 2026));
  });

  it("clamps to the end of shorter months", () => {
    expect(nextReminderDate("monthly", at(31))).toEqual(at(28, 1));
    expect(nextReminderDate("yearly", at(29, 1, 2024))).toEqual(at(28, 1, 2025));
  });

  it("skips weekends for weekday reminders", () => {
    expect(nextReminderDate("weekdays", at(1))).toEqual(at(2)); // Wed -> Thu
    expect(nextReminderDate("weekdays", at(3))).toEqual(at(6)); // Fri -> Mon
    expect(nextReminderDate("weekdays", at(4))).toEqual(at(6)); // Sat -> Mon
  });

  it("lands on Saturday or Sunday for weekend reminders", () => {
    expect(nextReminderDate("weekends", at(1))).toEqual(at(4)); // Wed -> Sat
    expect(nextReminderDate("weekends", at(3))).toEqual(at(4)); // Fri -> Sat
    expect(nextReminderDate("weekends", at(4))).toEqual(at(5)); // Sat -> Sun
    expect(nextReminderDate("weekends", at(5))).toEqual(at(11)); // Sun -> next Sat
  });
});

describe("isOverdue", () => {
  const now = new Date("2025-01-02T00:00:00.000Z");

  it("is true for active reminders in the past", () => {
    expect(isOverdue(reminder(), now)).toBe(true);
  });

  it("ignores inactive and future reminders", () => {
    expect(isOverdue(reminder({ isActive: false }), now)).toBe(false);
    expect(isOverdue(reminder({ reminderDate: "2025-01-03T00:00:00.000Z" }), now)).toBe(false);
  });
});

describe("timeRemainingDescription", () => {
  const now = new Date("2025-01-01T00:00:00.000Z");
  const describeIn = (ms: number) =>
    timeRemainingDescription(
      reminder({ reminderDate: new Date(now.getTime() + ms).toISOString() }),
      now,
    );

  it("uses the largest whole unit", () => {
    expect(describeIn((2 * 24 + 3) * 3600_000)).toBe("in 2 days");
    expect(describeIn(24 * 3600_000)).toBe("in 1 day");
    expect(describeIn(5 * 3600_000 + 59 * 60_000)).toBe("in 5 hours");
    expect(describeIn(3600_000)).toBe("in 1 hour");
    expect(describeIn(90_000)).toBe("in 1 minute");
    expect(describeIn(30 * 60_000)).toBe("in 30 minutes");
  });

  it("says due soon under a minute and overdue in the past", () => {
    expect(describeIn(30_000)).toBe("Due soon");
    expect(describeIn(0)).toBe("Due soon");
    expect(describeIn(-1000)).toBe("Overdue");
  });
});

describe("normalizeReminderDate", () => {
  it("returns a canonical ISO string", () => {
    expect(normalizeReminderDate("2025-03-01T10:00:00Z")).toBe("2025-03-01T10:00:00.000Z");
  });

  it("rejects unparseable input", () => {
    expect(normalizeReminderDate("not a date")).toBeNull();
  });
});
