import { Backend } from "../backend/backend";
import type { Clock } from "../backend/db";
import { isBackendError } from "../backend/errors";

export const START = "2025-01-01T00:00:00.000Z";

/** A clock that moves forward by `stepMs` every time it is read */
export function steppingClock(start: string = START, stepMs = 1000): Clock {
  let current = Date.parse(start);
  return () => {
    const now = new Date(current);
    current += stepMs;
    return now;
  };
}

/** A clock that only moves when told to */
export function manualClock(start: string = START) {
  let current = Date.parse(start);
  const clock: Clock = () => new Date(current);
  return {
    clock,
    set: (iso: string) => {
      current = Date.parse(iso);
    },
    advance: (ms: number) => {
      current += ms;
    },
  };
}

export function openTestBackend(clock: Clock = steppingClock()): Backend {
  return new Backend({ databasePath: ":memory:", clock });
}

/** Code of the BackendError thrown by fn, if any */
export function thrownCode(fn: () => unknown): string | null {
  try {
    fn();
  } catch (error) {
    return isBackendError(error) ? error.code : `non-backend: ${String(error)}`;
  }
  return null;
}
