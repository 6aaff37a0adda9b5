/**
 * Key/value storage backends for persisted store state
 */
import { mkdirSync, readFileSync, renameSync, writeFileSync } from "node:fs";
import { dirname } from "node:path";
import type { StateStorage } from "zustand/middleware";

/**
 * Storage kept in a Map; nothing survives the process
 */
export function createMemoryStorage(): StateStorage {
  const items = new Map<string, string>();
  return {
    getItem: (name) => items.get(name) ?? null,
    setItem: (name, value) => {
      items.set(name, value);
    },
    removeItem: (name) => {
      items.delete(name);
    },
  };
}

function isMissingFile(error: unknown): boolean {
  return error instanceof Error && "code" in error && error.code === "ENOENT";
}

function readEntries(path: string): Record<string, string> {
  let raw: string;
  try {
    raw = readFileSync(path, "utf8");
  } catch (error) {
    // A missing file is an empty store; anything else must not be overwritten
    if (isMissingFile(error)) return {};
    throw error;
  }

  try {
    const parsed: unknown = JSON.parse(raw);
    if (typeof parsed !== "object" || parsed === null) return {};
    const entries: Record<string, string> = {};
    for (const [key, value] of Object.entries(parsed)) {
      if (typeof value === "string") entries[key] = value;
    }
    return entries;
  } catch (error) {
    console.warn(`[Storage] Ignoring unreadable settings file ${path}:`, error);
    return {};
  }
}

/**
 * Storage backed by a single JSON file. Writes go to a temp file first and
 * are renamed into place.
 */
export function createFileStorage(path: string): StateStorage {
  const write = (entries: Record<string, string>) => {
    mkdirSync(dirname(path), { recursive: true });
    const tmp = `${path}.tmp`;
    writeFileSync(tmp, JSON.stringify(entries, null, 2), "utf8");
    renameSync(tmp, path);
  };

  return {
    getItem: (name) => readEntries(path)[name] ?? null,
    setItem: (name, value) => {
      write({ ...readEntries(path), [name]: value });
    },
    removeItem: (name) => {
      const entries = readEntries(path);
      delete entries[name];
      write(entries);
    },
  };
}
