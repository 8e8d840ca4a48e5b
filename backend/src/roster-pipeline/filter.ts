import { FILTER_COLUMNS } from "@roster-outreach/shared";
import { appendColumns, cell, type CsvRow, type CsvTable } from "./csv";
import type { OutreachRules } from "./config";
import { COL_CORPORATION, COL_LAST_NAME, COL_ORG_CODE } from "./types";

export type FilterResult = {
  table: CsvTable;
  removedByOrgCode: number;
  removedByCorporation: number;
};

const JOB_TITLE_PATTERN = /\((.*?)\)/;

export function filterTable(table: CsvTable, exclusions: OutreachRules["exclusions"]): FilterResult {
  if (!table.fields.includes(COL_ORG_CODE)) {
    throw new Error(`'${COL_ORG_CODE}' column not found. Found columns: ${table.fields.join(", ")}`);
  }

  const kept: CsvRow[] = [];
  let removedByOrgCode = 0;
  let removedByCorporation = 0;

  for (const row of table.rows) {
    if (exclusions.orgCodes.has(cell(row, COL_ORG_CODE))) {
      removedByOrgCode += 1;
      continue;
    }
    if (exclusions.corporations.has(cell(row, COL_CORPORATION).toUpperCase())) {
      removedByCorporation += 1;
      continue;
    }
    kept.push(withJobTitle(row));
  }

  return {
    table: { fields: appendColumns(table.fields, FILTER_COLUMNS), rows: kept },
    removedByOrgCode,
    removedByCorporation,
  };
}

// "Smith (Director of Nursing)" -> { lastName: "Smith", jobTitle: "Director of Nursing" }
export function splitJobTitle(lastName: string): { lastName: string; jobTitle: string } {
  const match = JOB_TITLE_PATTERN.exec(lastName);
  if (!match) return { lastName, jobTitle: "" };
  return {
    lastName: lastName.replace(/\(.*?\)/g, "").trim(),
    jobTitle: match[1] ?? "",
  };
}

function withJobTitle(row: CsvRow): CsvRow {
  if (row[COL_LAST_NAME] === undefined) return { ...row, "job title": row["job title"] ?? "" };
  const { lastName, jobTitle } = splitJobTitle(row[COL_LAST_NAME]);
  return { ...row, [COL_LAST_NAME]: lastName, "job title": jobTitle };
}
