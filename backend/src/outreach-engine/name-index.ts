import { containsEither, normalizeName } from "./normalize";
import type { NameIndex, NameIndexEntry, TaskRecord } from "./types";

// Scan order is preserved; lookups return the first hit.
export function buildNameIndex(tasks: readonly TaskRecord[]): NameIndex {
  const entries: NameIndexEntry[] = [];
  for (const task of tasks) {
    const normalized = normalizeName(task.name);
    if (!normalized) continue;
    entries.push(Object.freeze({ original: task.name.trim(), normalized, task }));
  }
  return Object.freeze(entries);
}

export function findExactName(index: NameIndex, normalized: string): NameIndexEntry | null {
  if (!normalized) return null;
  return index.find((entry) => entry.normalized === normalized) ?? null;
}

// First entry where either name contains the other. No scoring: a short
// query contained in several names resolves to the earliest one.
export function findContainment(index: NameIndex, normalized: string): NameIndexEntry | null {
  if (!normalized) return null;
  return index.find((entry) => containsEither(normalized, entry.normalized)) ?? null;
}

export function findById(index: NameIndex, taskId: string): NameIndexEntry | null {
  if (!taskId) return null;
  return index.find((entry) => entry.task.id === taskId) ?? null;
}
