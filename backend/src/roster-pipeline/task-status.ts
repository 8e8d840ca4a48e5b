import { companyNameMap, findTasksByOrgCode, toTaskRecords, type OrgCodeClaim } from "../outreach-engine";
import type { WarehouseRepository } from "./types";

// All tasks claiming an org code. Lists duplicates the Org Code Index
// collapses to a single task.
export async function lookupTaskStatus(
  repository: WarehouseRepository,
  listId: string,
  orgCode: string
): Promise<OrgCodeClaim[]> {
  if (!orgCode.trim()) throw new Error("Org code is required.");
  const rows = await repository.loadTasks(listId);
  return findTasksByOrgCode(toTaskRecords(rows, companyNameMap([])), orgCode);
}

export function formatTaskStatus(orgCode: string, claims: readonly OrgCodeClaim[]): string[] {
  if (!claims.length) return [`No task found with Org Code: ${orgCode}`];
  const lines: string[] = [];
  for (const { task, label } of claims) {
    lines.push(
      "Match found!",
      `Org Code: ${orgCode}`,
      `Task ID: ${task.id}`,
      `Task Status: ${task.status}`,
      `Full Label: ${label}`,
      "-".repeat(30)
    );
  }
  return lines;
}
