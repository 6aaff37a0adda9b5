import { afterEach, beforeEach, describe, expect, it } from "vitest";
import { manualClock, openTestBackend, thrownCode } from "../test/helpers";
import type { Backend } from "./backend";

const HOUR = 3600_000;

describe("ReminderRepository", () => {
  let backend: Backend;
  let noteId: string;

  beforeEach(() => {
    backend = openTestBackend(manualClock("2025-01-01T00:00:00.000Z").clock);
    noteId = backend.notes.create({ title: "Dentist" }).id;
  });

  afterEach(() => {
    backend.close();
  });

  it("defaults to an active one-off reminder an hour from now", () => {
    const reminder = backend.reminders.create(noteId, { title: "Book appointment" });
    expect(reminder).toMatchObject({
      noteId,
      title: "Book appointment",
      reminderDate: "2025-01-01T01:00:00.000Z",
      createdAt: "2025-01-01T00:00:00.000Z",
      isActive: true,
      repeatType: "none",
    });
    expect(backend.reminders.get(reminder.id)).toEqual(reminder);
  });

  it("normalizes given dates and rejects invalid ones", () => {
    const reminder = backend.reminders.create(noteId, {
      title: "Call",
      reminderDate: "2025-02-01T08:30:00+01:00",
    });
    expect(reminder.reminderDate).toBe("2025-02-01T07:30:00.000Z");
    expect(
      thrownCode(() => backend.reminders.create(noteId, { title: "Bad", reminderDate: "not a date" })),
    ).toBe("INVALID_INPUT");
    expect(thrownCode(() => backend.reminders.create("missing", { title: "x" }))).toBe("NOT_FOUND");
  });

  it("updates every field", () => {
    const reminder = backend.reminders.create(noteId, { title: "Call" });
    const updated = backend.reminders.update(reminder.id, {
      title: "Call back",
      reminderDate: "2025-01-05T10:00:00.000Z",
      isActive: false,
      repeatType: "weekly",
    });

    expect(updated).toEqual({
      ...reminder,
      title: "Call back",
      reminderDate: "2025-01-05T10:00:00.000Z",
      isActive: false,
      repeatType: "weekly",
    });
    expect(backend.reminders.get(reminder.id)).toEqual(updated);
  });

  it("separates upcoming and overdue reminders", () => {
    const { reminders } = backend;
    const at = (offset: number) => new Date(Date.parse("2025-01-01T00:00:00.000Z") + offset).toISOString();

    const soon = reminders.create(noteId, { title: "Soon", reminderDate: at(HOUR) });
    const later = reminders.create(noteId, { title: "Later", reminderDate: at(30 * HOUR) });
    const missed = reminders.create(noteId, { title: "Missed", reminderDate: at(-HOUR) });
    const off = reminders.create(noteId, { title: "Off", reminderDate: at(2 * HOUR) });
    reminders.update(off.id, { ...off, isActive: false });

    expect(reminders.listUpcoming(24 * HOUR).map((r) => r.id)).toEqual([soon.id]);
    expect(reminders.listOverdue().map((r) => r.id)).toEqual([missed.id]);
    expect(reminders.listActive().map((r) => r.id)).toEqual([missed.id, soon.id, later.id]);
    expect(reminders.listForNote(noteId).map((r) => r.title)).toEqual([
      "Missed",
      "Soon",
      "Off",
      "Later",
    ]);
  });

  it("advances repeating reminders and leaves one-off reminders alone", () => {
    const { reminders } = backend;
    const nineAm = new Date(2025, 0, 1, 9, 0).toISOString();
    const daily = reminders.create(noteId, { title: "Stretch", reminderDate: nineAm, repeatType: "daily" });
    const once = reminders.create(noteId, { title: "Once", reminderDate: nineAm });

    const advanced = reminders.advance(daily.id);
    expect(advanced.reminderDate).toBe(new Date(2025, 0, 2, 9, 0).toISOString());
    expect(reminders.get(daily.id)?.reminderDate).toBe(advanced.reminderDate);

    expect(reminders.advance(once.id)).toEqual(once);
  });

  it("advances a lagging reminder past the occurrence that fired", () => {
    const daily = backend.reminders.create(noteId, {
      title: "Stretch",
      reminderDate: new Date(2025, 0, 1, 9, 0).toISOString(),
      repeatType: "daily",
    });

    const advanced = backend.reminders.advance(daily.id, new Date(2025, 0, 4, 9, 0).toISOString());

    expect(advanced.reminderDate).toBe(new Date(2025, 0, 5, 9, 0).toISOString());
    expect(backend.reminders.get(daily.id)?.reminderDate).toBe(advanced.reminderDate);
  });

  it("reads unknown repeat values as one-off", () => {
    const reminder = backend.reminders.create(noteId, { title: "Legacy", repeatType: "daily" });
    backend.db.prepare("UPDATE reminders SET repeat_type = 'hourly' WHERE id = ?").run(reminder.id);
    expect(backend.reminders.get(reminder.id)?.repeatType).toBe("none");
  });
});
