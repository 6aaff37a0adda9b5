import { createStore } from "zustand/vanilla";
import type {
  CreateReminderInput,
  Reminder,
  UpdateReminderInput,
} from "../types/reminder";
import * as api from "../lib/api";
import {
  ReminderScheduler,
  type ReminderNotification,
  type UnlistenFn,
} from "../lib/reminderScheduler";
import { settingsStore } from "./settingsStore";

/** Shared scheduler for local reminder notifications */
export const reminderScheduler = new ReminderScheduler();

export interface ReminderState {
  // State
  /** Note whose reminders are listed in `reminders` */
  noteId: string | null;
  reminders: Reminder[];
  upcoming: Reminder[];
  overdue: Reminder[];
  isLoading: boolean;
  error: string | null;

  // Actions
  fetchNoteReminders: (noteId: string) => Promise<void>;
  fetchUpcoming: () => Promise<void>;
  fetchOverdue: () => Promise<void>;
  createReminder: (noteId: string, input: CreateReminderInput) => Promise<Reminder>;
  updateReminder: (id: string, input: UpdateReminderInput) => Promise<Reminder>;
  setReminderActive: (id: string, isActive: boolean) => Promise<Reminder>;
  deleteReminder: (id: string) => Promise<void>;
  handleReminderTriggered: (id: string, firedAt?: string | null) => Promise<Reminder | null>;
  loadAndScheduleAll: () => Promise<number>;
  /** Re-sync timers after notes were trashed, restored or deleted */
  syncScheduled: () => Promise<number>;
  stopScheduling: () => void;
  clearError: () => void;
}

let unlistenTriggered: UnlistenFn | null = null;

const byDate = (a: Reminder, b: Reminder) => a.reminderDate.localeCompare(b.reminderDate);

async function noteTitle(noteId: string | null): Promise<string | null> {
  if (!noteId) return null;
  const note = await api.getNote(noteId);
  return note?.title ?? null;
}

// Schedule every active reminder whose note exists outside the trash
async function scheduleActive(): Promise<number> {
  const active = await api.getActiveReminders();
  const titles = new Map<string, string>();
  const schedulable: Reminder[] = [];

  for (const reminder of active) {
    if (!reminder.noteId) continue;
    const note = await api.getNote(reminder.noteId);
    if (!note || note.isInTrash) continue;
    titles.set(note.id, note.title);
    schedulable.push(reminder);
  }
  return reminderScheduler.rescheduleAll(schedulable, titles);
}

export const reminderStore = createStore<ReminderState>()((set, get) => {
  // Replace a reminder in the note list, keeping date order
  const replaceInList = (reminder: Reminder) => {
    set((state) => ({
      reminders: state.reminders.map((r) => (r.id === reminder.id ? reminder : r)).sort(byDate),
    }));
  };

  const onNotification = (notification: ReminderNotification) => {
    console.log(
      `[Reminders] "${notification.title}" fired` +
        (notification.noteTitle ? ` for note "${notification.noteTitle}"` : ""),
    );
    get()
      .handleReminderTriggered(notification.reminderId, notification.fireAt)
      .catch((error) => {
        console.error("[Reminders] Failed to handle fired reminder:", error);
      });
  };

  return {
    // Initial state
    noteId: null,
    reminders: [],
    upcoming: [],
    overdue: [],
    isLoading: false,
    error: null,

    fetchNoteReminders: async (noteId: string) => {
      set({ isLoading: true, error: null, noteId });
      try {
        const reminders = await api.getNoteReminders(noteId);
        set({ reminders, isLoading: false });
      } catch (error) {
        set({ error: String(error), isLoading: false });
      }
    },

    // Active reminders due within the configured window
    fetchUpcoming: async () => {
      try {
        const { upcomingWindowMs } = settingsStore.getState();
        const upcoming = await api.getUpcomingReminders(upcomingWindowMs);
        set({ upcoming });
      } catch (error) {
        set({ error: String(error) });
      }
    },

    fetchOverdue: async () => {
      try {
        const overdue = await api.getOverdueReminders();
        set({ overdue });
      } catch (error) {
        set({ error: String(error) });
      }
    },

    // Without a date the reminder is due after the configured offset
    createReminder: async (noteId: string, input: CreateReminderInput) => {
      set({ error: null });
      try {
        const { reminderOffsetMs } = settingsStore.getState();
        const reminder = await api.createReminder(noteId, {
          ...input,
          reminderDate:
            input.reminderDate ?? new Date(Date.now() + reminderOffsetMs).toISOString(),
        });
        reminderScheduler.schedule(reminder, await noteTitle(reminder.noteId));

        if (get().noteId === noteId) {
          set((state) => ({ reminders: [...state.reminders, reminder].sort(byDate) }));
        }
        return reminder;
      } catch (error) {
        set({ error: String(error) });
        throw error;
      }
    },

    updateReminder: async (id: string, input: UpdateReminderInput) => {
      set({ error: null });
      try {
        const reminder = await api.updateReminder(id, input);
        // schedule() cancels the old notification and skips inactive reminders
        reminderScheduler.schedule(reminder, await noteTitle(reminder.noteId));
        replaceInList(reminder);
        return reminder;
      } catch (error) {
        set({ error: String(error) });
        throw error;
      }
    },

    setReminderActive: async (id: string, isActive: boolean) => {
      const current = await api.getReminder(id);
      if (!current) {
        const message = `Reminder not found: ${id}`;
        set({ error: message });
        throw new Error(message);
      }
      return get().updateReminder(id, {
        title: current.title,
        reminderDate: current.reminderDate,
        isActive,
        repeatType: current.repeatType,
      });
    },

    deleteReminder: async (id: string) => {
      set({ error: null });
      try {
        await api.deleteReminder(id);
        reminderScheduler.cancel(id);
        set((state) => ({
          reminders: state.reminders.filter((r) => r.id !== id),
          upcoming: state.upcoming.filter((r) => r.id !== id),
          overdue: state.overdue.filter((r) => r.id !== id),
        }));
      } catch (error) {
        set({ error: String(error) });
        throw error;
      }
    },

    // Repeating reminders move past the occurrence that fired and are scheduled again
    handleReminderTriggered: async (id: string, firedAt: string | null = null) => {
      try {
        const reminder = await api.getReminder(id);
        if (!reminder) return null;
        if (reminder.repeatType === "none") return reminder;

        const advanced = await api.advanceReminder(id, firedAt);
        reminderScheduler.schedule(advanced, await noteTitle(advanced.noteId));
        replaceInList(advanced);
        return advanced;
      } catch (error) {
        set({ error: String(error) });
        throw error;
      }
    },

    /**
     * Schedule every active reminder whose note is outside the trash and
     * start handling fired reminders. Returns the number scheduled.
     */
    loadAndScheduleAll: async () => {
      set({ error: null });
      try {
        if (!unlistenTriggered) {
          unlistenTriggered = reminderScheduler.listen(onNotification);
        }
        return await scheduleActive();
      } catch (error) {
        set({ error: String(error) });
        throw error;
      }
    },

    // Reminders on trashed or deleted notes stop; restored notes get theirs back
    syncScheduled: async () => {
      try {
        return await scheduleActive();
      } catch (error) {
        set({ error: String(error) });
        throw error;
      }
    },

    stopScheduling: () => {
      unlistenTriggered?.();
      unlistenTriggered = null;
      reminderScheduler.cancelAll();
    },

    clearError: () => set({ error: null }),
  };
});
