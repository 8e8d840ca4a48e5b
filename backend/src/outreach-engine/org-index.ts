import { normalizeOrgCode, splitOrgCodes } from "./normalize";
import type { OrgCodeIndex, TaskRecord } from "./types";

/**
 * Maps every org code found in a task's "Org Code" labels to that task.
 * A bundled label ("A, B-C") registers each code separately. When two tasks
 * claim the same code the later one in scan order wins.
 */
export function buildOrgCodeIndex(tasks: readonly TaskRecord[]): OrgCodeIndex {
  const index = new Map<string, TaskRecord>();
  for (const task of tasks) {
    for (const label of task.org_code_labels) {
      for (const code of splitOrgCodes(label)) {
        index.set(code, task);
      }
    }
  }
  return index;
}

export type OrgCodeClaim = {
  task: TaskRecord;
  label: string;
};

// Every task whose Org Code labels contain the code as a whole token, in scan
// order. Unlike the index, duplicates are all reported.
export function findTasksByOrgCode(tasks: readonly TaskRecord[], orgCode: string): OrgCodeClaim[] {
  const wanted = normalizeOrgCode(orgCode);
  if (!wanted) return [];
  const claims: OrgCodeClaim[] = [];
  for (const task of tasks) {
    for (const label of task.org_code_labels) {
      if (splitOrgCodes(label).includes(wanted)) claims.push({ task, label });
    }
  }
  return claims;
}
